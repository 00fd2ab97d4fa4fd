"use client";

import { memo } from "react";
import { ResponsiveLine } from "@nivo/line";
import { NIVO_THEME, formatEmissions, seriesYears } from "@/lib/chart-utils";
import type { AreaChartSpec, LineChartSpec } from "@/lib/types";

interface EmissionsLineProps {
  spec: LineChartSpec | AreaChartSpec;
}

/** Lineas por pais/global y area apilada por sector comparten renderer. */
function EmissionsLineInner({ spec }: EmissionsLineProps) {
  if (!spec.data.some((s) => s.data.length > 0)) {
    return (
      <div className="rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
        <p className="text-sm text-zinc-400">No data for this line chart</p>
      </div>
    );
  }

  const stacked = spec.kind === "area";
  const series = spec.kind === "line" ? spec.series : spec.band;
  const showLegend = series !== null;
  const markers = spec.kind === "line" && spec.markers;
  const years = seriesYears(spec.data);

  return (
    <div className="w-full rounded-lg border border-zinc-800 bg-zinc-900/50 p-4">
      <h3 className="mb-3 text-base font-semibold text-white">{spec.title}</h3>
      <div style={{ height: spec.layout.height }}>
        <ResponsiveLine
          data={spec.data}
          margin={{ top: 20, right: showLegend ? 140 : 30, bottom: 60, left: 80 }}
          xScale={{ type: "linear", min: years[0], max: years[years.length - 1] }}
          yScale={{ type: "linear", min: stacked ? 0 : "auto", max: "auto", stacked }}
          curve="monotoneX"
          animate={false}
          axisBottom={{
            tickSize: 0,
            tickPadding: 8,
            tickRotation: -45,
            tickValues: years,
            format: (v) => String(v),
            legend: spec.x.label,
            legendPosition: "middle",
            legendOffset: 48,
          }}
          axisLeft={{
            tickSize: 0,
            tickPadding: 8,
            format: (v) => formatEmissions(Number(v)),
            legend: spec.y.label,
            legendPosition: "middle",
            legendOffset: -64,
          }}
          enableGridX={false}
          colors={stacked ? { scheme: "category10" } : showLegend ? { scheme: "set2" } : ["#d62728"]}
          lineWidth={showLegend ? 2 : 3}
          enablePoints={markers}
          pointSize={8}
          pointColor={{ theme: "background" }}
          pointBorderWidth={2}
          pointBorderColor={{ from: "color" }}
          enableArea={stacked || !showLegend}
          areaOpacity={stacked ? 0.7 : 0.1}
          enableSlices={spec.layout.hovermode === "x unified" ? "x" : false}
          useMesh={spec.layout.hovermode !== "x unified"}
          yFormat={(v) => formatEmissions(Number(v))}
          legends={
            showLegend
              ? [
                  {
                    anchor: "bottom-right",
                    direction: "column",
                    justify: false,
                    translateX: 130,
                    translateY: 0,
                    itemsSpacing: 4,
                    itemWidth: 120,
                    itemHeight: 20,
                    itemTextColor: "#a1a1aa",
                    symbolSize: 12,
                    symbolShape: "circle",
                  },
                ]
              : []
          }
          theme={NIVO_THEME}
        />
      </div>
    </div>
  );
}

export const EmissionsLine = memo(EmissionsLineInner);
export default EmissionsLine;
