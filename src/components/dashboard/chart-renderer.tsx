"use client";

import dynamic from "next/dynamic";
import { validateChartSpec } from "@/lib/chart-utils";
import { ChartErrorBoundary } from "@/components/dashboard/chart-error-boundary";
import { DataFallback } from "@/components/dashboard/data-fallback";
import type { ChartSpec } from "@/lib/types";

// Dynamic imports: code-splitting de Nivo (no SSR)
const EmissionsBar = dynamic(() => import("@/components/charts/emissions-bar"), { ssr: false });
const EmissionsLine = dynamic(() => import("@/components/charts/emissions-line"), { ssr: false });
const EmissionsPie = dynamic(() => import("@/components/charts/emissions-pie"), { ssr: false });
const EmissionsMap = dynamic(() => import("@/components/charts/emissions-map"), { ssr: false });
const EmissionsHeatmap = dynamic(() => import("@/components/charts/emissions-heatmap"), { ssr: false });

interface ChartRendererProps {
  chart: ChartSpec;
}

function renderChart(chart: ChartSpec) {
  switch (chart.kind) {
    case "bar":
      return <EmissionsBar spec={chart} />;
    case "line":
    case "area":
      return <EmissionsLine spec={chart} />;
    case "pie":
      return <EmissionsPie spec={chart} />;
    case "choropleth":
      return <EmissionsMap spec={chart} />;
    case "heatmap":
      return <EmissionsHeatmap spec={chart} />;
    default: {
      const unknownKind: never = chart;
      return unknownKind;
    }
  }
}

export function ChartRenderer({ chart }: ChartRendererProps) {
  // Validar data antes de renderizar
  const validation = validateChartSpec(chart);
  if (!validation.valid) {
    return <DataFallback chart={chart} reason={validation.fallbackReason ?? "No data"} />;
  }

  return <ChartErrorBoundary chart={chart}>{renderChart(chart)}</ChartErrorBoundary>;
}
