"use client";

import { memo } from "react";
import { ResponsiveBar, type BarDatum } from "@nivo/bar";
import { NIVO_THEME, colorForValue, formatEmissions, formatPercent, valueDomain } from "@/lib/chart-utils";
import type { BarChartSpec } from "@/lib/types";

interface EmissionsBarProps {
  spec: BarChartSpec;
}

function EmissionsBarInner({ spec }: EmissionsBarProps) {
  // Sin valor (p.ej. crecimiento sin anio base) no hay barra
  const present = spec.data.flatMap((d) =>
    d.value === null ? [] : [{ category: d.category, value: d.value }]
  );

  if (!present.length) {
    return (
      <div className="rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
        <p className="text-sm text-zinc-400">No data for this bar chart</p>
      </div>
    );
  }

  const horizontal = spec.orientation === "horizontal";
  // Nivo dibuja el primer indice abajo en horizontal
  const data: BarDatum[] =
    spec.layout.categoryOrder === "total ascending"
      ? [...present].sort((a, b) => a.value - b.value)
      : present;
  const domain = valueDomain(present.map((d) => d.value));
  const format =
    spec.value.field === "growth_rate"
      ? (v: string | number) => formatPercent(Number(v))
      : (v: string | number) => formatEmissions(Number(v));

  return (
    <div className="w-full rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
      <h3 className="mb-3 text-base font-semibold text-white">{spec.title}</h3>
      <div style={{ height: spec.layout.height }}>
        <ResponsiveBar
          data={data}
          keys={["value"]}
          indexBy="category"
          layout={spec.orientation}
          margin={
            horizontal
              ? { top: 10, right: 20, bottom: 50, left: 160 }
              : { top: 10, right: 20, bottom: 110, left: 70 }
          }
          padding={0.3}
          valueScale={{ type: "linear" }}
          indexScale={{ type: "band", round: true }}
          colors={(bar) => colorForValue(spec.color.scale, bar.value ?? domain[0], domain)}
          borderRadius={3}
          borderColor={{ from: "color", modifiers: [["darker", 1.6]] }}
          animate={false}
          valueFormat={format}
          axisBottom={
            horizontal
              ? {
                  tickSize: 0,
                  tickPadding: 8,
                  format,
                  legend: spec.value.label,
                  legendPosition: "middle",
                  legendOffset: 40,
                }
              : {
                  tickSize: 0,
                  tickPadding: 8,
                  tickRotation: spec.layout.tickAngle ?? 0,
                }
          }
          axisLeft={{
            tickSize: 0,
            tickPadding: 8,
            ...(horizontal
              ? {}
              : { format, legend: spec.value.label, legendPosition: "middle" as const, legendOffset: -60 }),
          }}
          enableGridY={!horizontal}
          enableGridX={horizontal}
          enableLabel={false}
          legends={[]}
          tooltipLabel={(bar) => `${bar.indexValue}`}
          theme={NIVO_THEME}
        />
      </div>
    </div>
  );
}

export const EmissionsBar = memo(EmissionsBarInner);
export default EmissionsBar;
