/**
 * Chart builders: cada funcion toma la tabla (ya filtrada) y devuelve un
 * ChartSpec listo para el renderer. Son puras, se pueden llamar en cualquier
 * orden y ninguna modifica las filas recibidas.
 */

import { compareText, groupSum, KEY_SEP, mean } from "./aggregate";
import { resolveRegionId } from "./geo";
import { growthRates, sectoralBreakdown, topEmitters } from "./processor";
import type {
  AreaChartSpec,
  BarChartSpec,
  ChoroplethChartSpec,
  ComparisonMetric,
  HeatmapChartSpec,
  LineChartSpec,
  MapFrame,
  Observation,
  PieChartSpec,
  Series,
} from "@/lib/types";

const COLOR_SCALE = "Reds";
const GROWTH_WINDOW_YEARS = 5;

function maxYear(rows: readonly { year: number }[]): number | null {
  if (!rows.length) return null;
  return rows.reduce((max, r) => (r.year > max ? r.year : max), rows[0].year);
}

function inCountries(rows: readonly Observation[], countries: readonly string[]): Observation[] {
  const selected = new Set(countries);
  return rows.filter((r) => selected.has(r.country));
}

/** Agrupa por (anio, serie) y arma una serie por clave, ordenadas alfabeticamente. */
function seriesByYear(
  rows: readonly Observation[],
  seriesOf: (row: Observation) => string | null,
  fillMissingYears: boolean
): Series[] {
  const groups = groupSum(
    rows,
    (r) => {
      const id = seriesOf(r);
      return id === null ? null : { id, year: r.year };
    },
    (r) => r.value,
    (k) => `${k.id}${KEY_SEP}${k.year}`
  );

  const years = [...new Set(groups.map((g) => g.key.year))].sort((a, b) => a - b);
  const bySeries = new Map<string, Map<number, number>>();
  for (const g of groups) {
    const points = bySeries.get(g.key.id) ?? new Map<number, number>();
    points.set(g.key.year, g.total);
    bySeries.set(g.key.id, points);
  }

  return [...bySeries.keys()].sort(compareText).map((id) => {
    const points = bySeries.get(id) ?? new Map<number, number>();
    const xs = fillMissingYears ? years : [...points.keys()].sort((a, b) => a - b);
    return { id, data: xs.map((x) => ({ x, y: points.get(x) ?? 0 })) };
  });
}

// ------------------------------------------------------------
// Agregados
// ------------------------------------------------------------

export function globalTrend(rows: readonly Observation[]) {
  return groupSum(rows, (r) => r.year, (r) => r.value)
    .sort((a, b) => a.key - b.key)
    .map((g) => ({ year: g.key, total_emissions: g.total }));
}

/**
 * Promedio de crecimiento por pais en la ventana `max - 5 .. max`.
 * Los null no cuentan para el promedio; sin ningun valor el promedio es null.
 */
export function averageGrowth(rows: readonly Observation[], windowYears = GROWTH_WINDOW_YEARS) {
  const records = growthRates(rows);
  const latest = maxYear(records);
  if (latest === null) return [];

  const recent = records.filter((r) => r.year >= latest - windowYears);
  const byCountry = new Map<string, (number | null)[]>();
  for (const r of recent) {
    const rates = byCountry.get(r.country) ?? [];
    rates.push(r.growth_rate);
    byCountry.set(r.country, rates);
  }

  return [...byCountry.entries()]
    .map(([country, rates]) => ({ country, growth_rate: mean(rates) }))
    .sort((a, b) => {
      if (a.growth_rate === null) return b.growth_rate === null ? 0 : 1;
      if (b.growth_rate === null) return -1;
      return b.growth_rate - a.growth_rate;
    });
}

export function heatmapMatrix(rows: readonly Observation[], countries: readonly string[], nYears = 10) {
  const selected = inCountries(rows, countries);
  const latest = maxYear(selected);
  if (latest === null) return { years: [], data: [] };

  const windowed = selected.filter((r) => r.year >= latest - nYears + 1);
  const cells = new Map(
    groupSum(windowed, (r) => `${r.country}${KEY_SEP}${r.year}`, (r) => r.value).map((g) => [
      g.key,
      g.total,
    ])
  );
  const years = [...new Set(windowed.map((r) => r.year))].sort((a, b) => a - b);
  const names = [...new Set(windowed.map((r) => r.country))].sort(compareText);

  return {
    years,
    data: names.map((id) => ({
      id,
      data: years.map((x) => ({ x, y: cells.get(`${id}${KEY_SEP}${x}`) ?? null })),
    })),
  };
}

// ------------------------------------------------------------
// Charts
// ------------------------------------------------------------

export function createTopEmittersChart(
  rows: readonly Observation[],
  n = 15,
  year?: number
): BarChartSpec {
  return {
    kind: "bar",
    slot: "topEmitters",
    title:
      year === undefined
        ? `Top ${n} CO2 Emitting Countries (All Time)`
        : `Top ${n} CO2 Emitting Countries - ${year}`,
    orientation: "horizontal",
    category: { field: "country", label: "Country" },
    value: { field: "total_emissions", label: "Total CO2 Emissions" },
    color: { field: "total_emissions", scale: COLOR_SCALE },
    data: topEmitters(rows, n, year).map((r) => ({ category: r.country, value: r.total_emissions })),
    layout: { height: 600, showLegend: false, categoryOrder: "total ascending" },
  };
}

export function createGlobalTrendChart(rows: readonly Observation[]): LineChartSpec {
  return {
    kind: "line",
    slot: "globalTrend",
    title: "Global CO2 Emissions Trend",
    x: { field: "year", label: "Year" },
    y: { field: "total_emissions", label: "Total CO2 Emissions" },
    series: null,
    markers: true,
    data: [
      {
        id: "Global",
        data: globalTrend(rows).map((p) => ({ x: p.year, y: p.total_emissions })),
      },
    ],
    layout: { height: 500, hovermode: "x unified" },
  };
}

export function createCountryTrendsChart(
  rows: readonly Observation[],
  countries: readonly string[]
): LineChartSpec {
  return {
    kind: "line",
    slot: "countryTrends",
    title: "CO2 Emissions Trend by Country",
    x: { field: "year", label: "Year" },
    y: { field: "total_emissions", label: "CO2 Emissions" },
    series: { field: "country", label: "Country" },
    markers: true,
    data: seriesByYear(inCountries(rows, countries), (r) => r.country, false),
    layout: { height: 600, hovermode: "x unified" },
  };
}

export function createSectoralBreakdownChart(
  rows: readonly Observation[],
  country?: string
): BarChartSpec {
  return {
    kind: "bar",
    slot: "sectoralBreakdown",
    title: country === undefined ? "Global CO2 Emissions by Sector" : `CO2 Emissions by Sector - ${country}`,
    orientation: "vertical",
    category: { field: "sector", label: "Sector" },
    value: { field: "total_emissions", label: "Total CO2 Emissions" },
    color: { field: "total_emissions", scale: "Viridis" },
    data: sectoralBreakdown(rows, country).map((r) => ({ category: r.sector, value: r.total_emissions })),
    layout: { height: 500, tickAngle: -45 },
  };
}

/** Area apilada: un sector sin datos en un anio aporta 0 a la banda. */
export function createSectoralTrendChart(rows: readonly Observation[]): AreaChartSpec {
  return {
    kind: "area",
    slot: "sectoralTrend",
    title: "CO2 Emissions by Sector Over Time",
    stacked: true,
    x: { field: "year", label: "Year" },
    y: { field: "total_emissions", label: "CO2 Emissions" },
    band: { field: "sector", label: "Sector" },
    data: seriesByYear(rows, (r) => r.sector, true),
    layout: { height: 600, hovermode: "x unified" },
  };
}

export function createAnimatedMapChart(rows: readonly Observation[]): ChoroplethChartSpec {
  const groups = groupSum(
    rows,
    (r) => ({ country: r.country, year: r.year }),
    (r) => r.value,
    (k) => `${k.country}${KEY_SEP}${k.year}`
  );

  const frames = new Map<number, MapFrame>();
  const unresolved = new Set<string>();
  let min = Infinity;
  let max = -Infinity;

  const ordered = [...groups].sort(
    (a, b) => a.key.year - b.key.year || compareText(a.key.country, b.key.country)
  );
  for (const g of ordered) {
    const frame: MapFrame = frames.get(g.key.year) ?? { year: g.key.year, data: [] };
    frames.set(g.key.year, frame);
    min = Math.min(min, g.total);
    max = Math.max(max, g.total);

    const id = resolveRegionId(g.key.country);
    if (id === null) {
      unresolved.add(g.key.country);
      continue;
    }
    frame.data.push({ id, country: g.key.country, value: g.total });
  }

  return {
    kind: "choropleth",
    slot: "animatedMap",
    title: "Global CO2 Emissions Over Time",
    location: { field: "country", label: "Country" },
    locationMode: "country names",
    color: {
      field: "total_emissions",
      scale: COLOR_SCALE,
      domain: groups.length ? [min, max] : [0, 0],
    },
    animationFrame: "year",
    frames: [...frames.values()],
    unresolved: [...unresolved].sort(compareText),
    layout: { height: 600 },
  };
}

export function createGrowthRateChart(rows: readonly Observation[], n = 20): BarChartSpec {
  return {
    kind: "bar",
    slot: "growthRanking",
    title: `Top ${n} Countries by Average CO2 Growth Rate (Last ${GROWTH_WINDOW_YEARS} Years)`,
    orientation: "horizontal",
    category: { field: "country", label: "Country" },
    value: { field: "growth_rate", label: "Average Growth Rate (%)" },
    color: { field: "growth_rate", scale: COLOR_SCALE },
    data: averageGrowth(rows)
      .slice(0, Math.max(0, n))
      .map((r) => ({ category: r.country, value: r.growth_rate })),
    layout: { height: 600, categoryOrder: "total ascending" },
  };
}

export function createPieChart(
  rows: readonly Observation[],
  countries: readonly string[],
  year?: number
): PieChartSpec {
  const scoped = year === undefined ? rows : rows.filter((r) => r.year === year);
  const totals = groupSum(inCountries(scoped, countries), (r) => r.country, (r) => r.value).sort((a, b) =>
    compareText(a.key, b.key)
  );

  return {
    kind: "pie",
    slot: "sharePie",
    title: year === undefined ? "CO2 Emissions Share (All Time)" : `CO2 Emissions Share - ${year}`,
    names: { field: "country", label: "Country" },
    values: { field: "total_emissions", label: "CO2 Emissions" },
    hole: 0.4,
    textInfo: "percent+label",
    data: totals.map((g) => ({ id: g.key, label: g.key, value: g.total })),
    layout: { height: 500 },
  };
}

export function createComparisonChart(
  rows: readonly Observation[],
  countries: readonly string[],
  metric: ComparisonMetric = "total"
): BarChartSpec {
  const groups = groupSum(inCountries(rows, countries), (r) => r.country, (r) => r.value).sort((a, b) =>
    compareText(a.key, b.key)
  );
  const field = metric === "total" ? "total_emissions" : "average_emissions";

  return {
    kind: "bar",
    slot: "comparison",
    title: metric === "total" ? "Total CO2 Emissions Comparison" : "Average CO2 Emissions Comparison",
    orientation: "vertical",
    category: { field: "country", label: "Country" },
    value: { field, label: metric === "total" ? "Total Emissions" : "Average Emissions" },
    color: { field, scale: COLOR_SCALE },
    data: groups.map((g) => ({
      category: g.key,
      value: metric === "total" ? g.total : g.total / g.count,
    })),
    layout: { height: 500 },
  };
}

export function createHeatmapChart(
  rows: readonly Observation[],
  countries: readonly string[],
  nYears = 10
): HeatmapChartSpec {
  const { years, data } = heatmapMatrix(rows, countries, nYears);
  return {
    kind: "heatmap",
    slot: "heatmap",
    title: `CO2 Emissions Heatmap (Last ${nYears} Years)`,
    x: { field: "year", label: "Year" },
    y: { field: "country", label: "Country" },
    colorScale: COLOR_SCALE,
    hoverOnGaps: false,
    years,
    data,
    layout: { height: 600 },
  };
}
