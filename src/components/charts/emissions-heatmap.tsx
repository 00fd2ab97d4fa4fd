"use client";

import { memo } from "react";
import { ResponsiveHeatMap } from "@nivo/heatmap";
import { NIVO_THEME, formatEmissions } from "@/lib/chart-utils";
import type { HeatmapChartSpec } from "@/lib/types";

interface EmissionsHeatmapProps {
  spec: HeatmapChartSpec;
}

function EmissionsHeatmapInner({ spec }: EmissionsHeatmapProps) {
  if (!spec.data.length || !spec.years.length) {
    return (
      <div className="rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
        <p className="text-sm text-zinc-400">No data for this heatmap</p>
      </div>
    );
  }

  return (
    <div className="w-full rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
      <h3 className="mb-3 text-base font-semibold text-white">{spec.title}</h3>
      <div style={{ height: spec.layout.height }}>
        <ResponsiveHeatMap
          data={spec.data}
          margin={{ top: 60, right: 30, bottom: 30, left: 140 }}
          valueFormat={(v) => formatEmissions(v)}
          axisTop={{
            tickSize: 0,
            tickPadding: 8,
            tickRotation: -45,
            legend: spec.x.label,
            legendPosition: "middle",
            legendOffset: -48,
          }}
          axisLeft={{
            tickSize: 0,
            tickPadding: 8,
            legend: spec.y.label,
            legendPosition: "middle",
            legendOffset: -120,
          }}
          colors={{ type: "sequential", scheme: spec.colorScale === "Reds" ? "reds" : "viridis" }}
          // Celdas sin observacion: hueco, no cero
          emptyColor="#18181b"
          enableLabels={false}
          borderWidth={1}
          borderColor="#09090b"
          animate={false}
          hoverTarget="cell"
          theme={NIVO_THEME}
        />
      </div>
    </div>
  );
}

export const EmissionsHeatmap = memo(EmissionsHeatmapInner);
export default EmissionsHeatmap;
