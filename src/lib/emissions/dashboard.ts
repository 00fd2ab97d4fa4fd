import { z } from "zod/v3";

import { compareText } from "./aggregate";
import {
  createAnimatedMapChart,
  createComparisonChart,
  createCountryTrendsChart,
  createGlobalTrendChart,
  createGrowthRateChart,
  createHeatmapChart,
  createPieChart,
  createSectoralBreakdownChart,
  createSectoralTrendChart,
  createTopEmittersChart,
} from "./charts";
import { topEmitters } from "./processor";
import type { DashboardFilters, DashboardSpec, FilterOptions, Observation } from "@/lib/types";

const TOP_EMITTERS_N = 15;
const GROWTH_RANKING_N = 15;
const DEFAULT_COUNTRY_COUNT = 10;
const HEATMAP_YEARS = 10;

export const dashboardFiltersSchema = z
  .object({
    countries: z.array(z.string()).default([]),
    sectors: z.array(z.string()).default([]),
    yearRange: z.tuple([z.number().int(), z.number().int()]),
    metric: z.enum(["total", "average"]).default("total"),
  })
  .refine((f) => f.yearRange[0] <= f.yearRange[1], {
    message: "yearRange[0] debe ser <= yearRange[1]",
    path: ["yearRange"],
  });

export function filterOptions(rows: readonly Observation[]): FilterOptions {
  const years = rows.map((r) => r.year);
  return {
    countries: [...new Set(rows.map((r) => r.country))].sort(compareText),
    sectors: [
      ...new Set(rows.map((r) => r.sector).filter((s): s is string => s !== null)),
    ].sort(compareText),
    minYear: years.length ? years.reduce((a, b) => Math.min(a, b)) : 0,
    maxYear: years.length ? years.reduce((a, b) => Math.max(a, b)) : 0,
    defaultCountries: topEmitters(rows, DEFAULT_COUNTRY_COUNT).map((r) => r.country),
  };
}

export function defaultFilters(options: FilterOptions): DashboardFilters {
  return {
    countries: [...options.defaultCountries],
    sectors: [...options.sectors],
    yearRange: [options.minYear, options.maxYear],
    metric: "total",
  };
}

/** Sets vacios no filtran; el rango de anios es inclusivo. */
export function applyFilters(rows: readonly Observation[], filters: DashboardFilters): Observation[] {
  const countries = new Set(filters.countries);
  const sectors = new Set(filters.sectors);
  const [from, to] = filters.yearRange;

  return rows.filter(
    (r) =>
      (countries.size === 0 || countries.has(r.country)) &&
      (sectors.size === 0 || (r.sector !== null && sectors.has(r.sector))) &&
      r.year >= from &&
      r.year <= to
  );
}

/**
 * Recalcula todos los charts para un cambio de filtros.
 * Los KPIs describen la tabla completa, los charts el subconjunto filtrado.
 */
export function buildDashboard(rows: readonly Observation[], filters: DashboardFilters): DashboardSpec {
  const options = filterOptions(rows);
  const filtered = applyFilters(rows, filters);
  const focus = filters.countries.length ? filters.countries : options.defaultCountries;

  return {
    kpis: [
      { label: "Total Countries", value: options.countries.length, format: "number", accent: "primary" },
      { label: "Sectors Tracked", value: options.sectors.length, format: "number", accent: "success" },
      {
        label: "Year Range",
        value: rows.length ? `${options.minYear}-${options.maxYear}` : "-",
        format: "text",
        accent: "warning",
      },
      { label: "Data Points", value: rows.length, format: "number", accent: "danger" },
    ],
    charts: [
      createGlobalTrendChart(filtered),
      createTopEmittersChart(filtered, TOP_EMITTERS_N, filters.yearRange[1]),
      createSectoralBreakdownChart(filtered),
      createCountryTrendsChart(filtered, focus),
      createSectoralTrendChart(filtered),
      createGrowthRateChart(filtered, GROWTH_RANKING_N),
      createAnimatedMapChart(filtered),
      createPieChart(filtered, focus),
      createComparisonChart(filtered, focus, filters.metric),
      createHeatmapChart(filtered, focus, HEATMAP_YEARS),
    ],
    rowCount: filtered.length,
  };
}
