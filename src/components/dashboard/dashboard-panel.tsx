"use client";

import { motion } from "framer-motion";
import { Loader2 } from "lucide-react";
import { KpiCardGrid } from "./kpi-card-grid";
import { ChartRenderer } from "./chart-renderer";
import type { ChartSlot, DashboardSpec } from "@/lib/types";

// Charts anchos ocupan las dos columnas de la grilla
const FULL_WIDTH: ReadonlySet<ChartSlot> = new Set(["globalTrend", "animatedMap", "heatmap"]);

interface DashboardPanelProps {
  spec: DashboardSpec;
  loading: boolean;
  error: string | null;
}

export function DashboardPanel({ spec, loading, error }: DashboardPanelProps) {
  return (
    <div className="space-y-5">
      <KpiCardGrid kpis={spec.kpis} />

      <div className="flex h-5 items-center gap-2 text-xs text-zinc-500">
        {loading ? (
          <>
            <Loader2 className="h-3 w-3 animate-spin" />
            <span>Updating charts...</span>
          </>
        ) : error ? (
          <span className="text-amber-400">Could not update: {error}</span>
        ) : (
          <span>{spec.rowCount.toLocaleString("en-US")} observations match the current filters</span>
        )}
      </div>

      <div className={`grid grid-cols-1 gap-4 lg:grid-cols-2 ${loading ? "opacity-60" : ""}`}>
        {spec.charts.map((chart, idx) => (
          <motion.div
            key={chart.slot}
            initial={{ opacity: 0, y: 12 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.4, delay: 0.05 + idx * 0.05 }}
            className={FULL_WIDTH.has(chart.slot) ? "lg:col-span-2" : ""}
          >
            <ChartRenderer chart={chart} />
          </motion.div>
        ))}
      </div>
    </div>
  );
}
