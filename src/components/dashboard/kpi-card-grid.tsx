"use client";

import { motion } from "framer-motion";
import { CalendarRange, Database, Factory, Globe2 } from "lucide-react";
import type { KpiCardData } from "@/lib/types";

const ACCENTS: Record<KpiCardData["accent"], { bar: string; icon: string }> = {
  primary: { bar: "from-sky-500/50", icon: "text-sky-400" },
  success: { bar: "from-emerald-500/50", icon: "text-emerald-400" },
  warning: { bar: "from-amber-500/50", icon: "text-amber-400" },
  danger: { bar: "from-red-500/50", icon: "text-red-400" },
};

const ICONS = [Globe2, Factory, CalendarRange, Database];

function formatKpiValue(kpi: KpiCardData): string {
  if (typeof kpi.value === "string") return kpi.value;
  return kpi.value.toLocaleString("en-US", { maximumFractionDigits: 1 });
}

interface KpiCardGridProps {
  kpis: KpiCardData[];
}

export function KpiCardGrid({ kpis }: KpiCardGridProps) {
  if (!kpis.length) return null;

  const cols = kpis.length <= 2 ? "grid-cols-2" : kpis.length === 3 ? "grid-cols-3" : "grid-cols-2 md:grid-cols-4";

  return (
    <div className={`grid ${cols} gap-3`}>
      {kpis.map((kpi, idx) => {
        const accent = ACCENTS[kpi.accent];
        const Icon = ICONS[idx % ICONS.length];
        return (
          <motion.div
            key={kpi.label}
            initial={{ opacity: 0, y: 10 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.3, delay: idx * 0.05 }}
            className="relative overflow-hidden rounded-xl border border-zinc-800 bg-zinc-900/50 p-4 backdrop-blur-sm transition-colors hover:border-zinc-700"
          >
            <div className="flex items-center justify-between">
              <p className="text-xs font-medium uppercase tracking-wider text-zinc-500">{kpi.label}</p>
              <Icon className={`h-4 w-4 ${accent.icon}`} />
            </div>
            <p className={`mt-1 font-bold text-white ${kpi.format === "text" ? "text-xl" : "text-2xl"}`}>
              {formatKpiValue(kpi)}
            </p>
            <div className={`absolute bottom-0 left-0 right-0 h-0.5 bg-gradient-to-r ${accent.bar} to-transparent`} />
          </motion.div>
        );
      })}
    </div>
  );
}
