"use client";

import { ResponsivePie } from "@nivo/pie";
import { NIVO_THEME, formatEmissions } from "@/lib/chart-utils";
import type { PieChartSpec } from "@/lib/types";

interface EmissionsPieProps {
  spec: PieChartSpec;
}

export function EmissionsPie({ spec }: EmissionsPieProps) {
  const total = spec.data.reduce((sum, d) => sum + d.value, 0);

  if (!spec.data.length || total <= 0) {
    return (
      <div className="rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
        <p className="text-sm text-zinc-400">No data for this pie chart</p>
      </div>
    );
  }

  const percent = (value: number) => `${((value / total) * 100).toFixed(1)}%`;

  return (
    <div className="w-full rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
      <h3 className="mb-3 text-base font-semibold text-white">{spec.title}</h3>
      <div style={{ height: spec.layout.height }}>
        <ResponsivePie
          data={spec.data}
          margin={{ top: 30, right: 120, bottom: 30, left: 20 }}
          innerRadius={spec.hole}
          padAngle={0.7}
          cornerRadius={3}
          activeOuterRadiusOffset={8}
          colors={{ scheme: "reds" }}
          borderWidth={1}
          borderColor={{ from: "color", modifiers: [["darker", 0.2]] }}
          valueFormat={(v) => formatEmissions(v)}
          arcLabel={(d) => (spec.textInfo === "percent+label" ? `${d.label} ${percent(d.value)}` : percent(d.value))}
          arcLinkLabelsSkipAngle={10}
          arcLinkLabelsTextColor="#a1a1aa"
          arcLinkLabelsThickness={2}
          arcLinkLabelsColor={{ from: "color" }}
          arcLabelsSkipAngle={14}
          arcLabelsTextColor={{ from: "color", modifiers: [["darker", 2]] }}
          legends={[
            {
              anchor: "right",
              direction: "column",
              justify: false,
              translateX: 100,
              translateY: 0,
              itemsSpacing: 4,
              itemWidth: 80,
              itemHeight: 18,
              itemTextColor: "#a1a1aa",
              itemDirection: "left-to-right",
              symbolSize: 12,
              symbolShape: "circle",
            },
          ]}
          theme={NIVO_THEME}
        />
      </div>
    </div>
  );
}

export default EmissionsPie;
