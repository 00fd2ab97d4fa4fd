import { interpolateReds, interpolateViridis } from "d3-scale-chromatic";
import type { ChartSpec, ColorScaleName, Series } from "@/lib/types";

/**
 * Formatea un monto de emisiones a formato legible.
 */
export function formatEmissions(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1_000_000_000) return `${(value / 1_000_000_000).toFixed(1)} B`;
  if (abs >= 1_000_000) return `${(value / 1_000_000).toFixed(1)} M`;
  if (abs >= 1_000) return `${(value / 1_000).toFixed(1)} K`;
  if (abs >= 1) return value.toFixed(0);
  return value.toFixed(2);
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

const INTERPOLATORS: Record<ColorScaleName, (t: number) => string> = {
  Reds: interpolateReds,
  Viridis: interpolateViridis,
};

/** Color por magnitud dentro del dominio [min, max]. */
export function colorForValue(scale: ColorScaleName, value: number, [min, max]: [number, number]): string {
  const t = max === min ? 1 : (value - min) / (max - min);
  // Reds arranca casi blanco: piso en 0.2 para que se vea sobre fondo oscuro
  const floor = scale === "Reds" ? 0.2 : 0;
  return INTERPOLATORS[scale](floor + (1 - floor) * Math.min(1, Math.max(0, t)));
}

export function valueDomain(values: readonly (number | null)[]): [number, number] {
  const present = values.filter((v): v is number => v !== null);
  if (!present.length) return [0, 0];
  return [Math.min(...present), Math.max(...present)];
}

/** Anios de todas las series, ordenados: las series pueden no compartir anios. */
export function seriesYears(series: readonly Series[]): number[] {
  return [...new Set(series.flatMap((s) => s.data.map((p) => p.x)))].sort((a, b) => a - b);
}

/**
 * Valida que un chart tenga data renderizable.
 * Si no, retorna fallback para mostrar tabla en vez de chart roto.
 */
export function validateChartSpec(chart: ChartSpec): {
  valid: boolean;
  fallbackReason?: string;
} {
  switch (chart.kind) {
    case "bar":
      if (!chart.data.some((d) => d.value !== null)) {
        return { valid: false, fallbackReason: "No data for the selected filters" };
      }
      return { valid: true };
    case "line":
    case "area":
      if (!chart.data.some((s) => s.data.length > 0)) {
        return { valid: false, fallbackReason: "No series for the selected filters" };
      }
      return { valid: true };
    case "pie":
      if (!chart.data.some((d) => d.value > 0)) {
        return { valid: false, fallbackReason: "No positive totals to split" };
      }
      return { valid: true };
    case "choropleth":
      if (!chart.frames.length) {
        return { valid: false, fallbackReason: "No yearly totals to map" };
      }
      return { valid: true };
    case "heatmap":
      if (!chart.data.length || !chart.years.length) {
        return { valid: false, fallbackReason: "Empty country x year matrix" };
      }
      return { valid: true };
  }
}

/** Filas planas para la tabla de fallback. */
export function chartRows(chart: ChartSpec): Record<string, string | number | null>[] {
  switch (chart.kind) {
    case "bar":
      return chart.data.map((d) => ({ [chart.category.field]: d.category, [chart.value.field]: d.value }));
    case "line":
    case "area":
      return chart.data.flatMap((s) => s.data.map((p) => ({ series: s.id, year: p.x, value: p.y })));
    case "pie":
      return chart.data.map((d) => ({ country: d.label, value: d.value }));
    case "choropleth":
      return chart.frames.flatMap((f) => f.data.map((d) => ({ year: f.year, country: d.country, value: d.value })));
    case "heatmap":
      return chart.data.flatMap((r) => r.data.map((c) => ({ country: r.id, year: c.x, value: c.y })));
  }
}

export const NIVO_THEME = {
  text: { fill: "#a1a1aa", fontSize: 11 },
  axis: {
    ticks: { text: { fill: "#a1a1aa", fontSize: 10 } },
    legend: { text: { fill: "#d4d4d8", fontSize: 11 } },
  },
  grid: { line: { stroke: "#27272a" } },
  crosshair: { line: { stroke: "#a1a1aa", strokeWidth: 1 } },
  tooltip: {
    container: {
      background: "#18181b",
      color: "#fafafa",
      fontSize: 12,
      borderRadius: 8,
      boxShadow: "0 4px 12px rgba(0,0,0,0.5)",
    },
  },
};
