// DashboardSpec — contrato entre el pipeline de emisiones y la UI

// ------------------------------------------------------------
// Tabla
// ------------------------------------------------------------

/** Fila tal cual sale del CSV: columnas normalizadas a snake_case. */
export type RawRecord = Record<string, string>;

export interface RawTable {
  columns: string[];
  rows: RawRecord[];
}

export type Observation = {
  country: string;
  sector: string | null;
  date: Date;
  year: number;
  month: number;
  value: number;
  /** Columnas del archivo fuente que no forman parte del modelo. */
  attributes: Record<string, string>;
};

/** Columnas del artefacto procesado; solo estan las que se escribieron. */
export type MetricFields = {
  total_emissions?: number | null;
  population?: number | null;
  emissions_per_capita?: number | null;
  gdp?: number | null;
  emission_intensity?: number | null;
};

export type ProcessedObservation = Observation & MetricFields;

export type EnrichedObservation = Observation & {
  total_emissions: number;
  population?: number | null;
  emissions_per_capita?: number | null;
  gdp?: number | null;
  emission_intensity?: number | null;
};

export interface ReferenceRow {
  country: string;
  year: number;
  value: number | null;
}

export interface CountryTotal {
  country: string;
  total_emissions: number;
}

export interface SectorTotal {
  sector: string;
  total_emissions: number;
}

export interface GrowthRecord {
  country: string;
  year: number;
  total_emissions: number;
  prev_year_emissions: number | null;
  growth_rate: number | null;
}

export interface DataExploration {
  shape: [rows: number, columns: number];
  columns: string[];
  missingValues: Record<string, number>;
  uniqueCountries: number;
  uniqueSectors: number;
  dateRange: [first: string, last: string] | null;
  sample: RawRecord[];
}

// ------------------------------------------------------------
// Chart specs
// ------------------------------------------------------------

export type ChartSlot =
  | "globalTrend"
  | "topEmitters"
  | "sectoralBreakdown"
  | "countryTrends"
  | "sectoralTrend"
  | "growthRanking"
  | "animatedMap"
  | "sharePie"
  | "comparison"
  | "heatmap";

export type ColorScaleName = "Reds" | "Viridis";

export interface AxisBinding<F extends string> {
  field: F;
  label: string;
}

export interface LayoutHints {
  height: number;
  hovermode?: "x unified";
  categoryOrder?: "total ascending";
  tickAngle?: number;
  showLegend?: boolean;
}

interface ChartSpecBase {
  slot: ChartSlot;
  title: string;
  layout: LayoutHints;
}

export interface BarDatum {
  category: string;
  value: number | null;
}

export type BarValueField = "total_emissions" | "average_emissions" | "growth_rate";

export interface BarChartSpec extends ChartSpecBase {
  kind: "bar";
  orientation: "horizontal" | "vertical";
  category: AxisBinding<"country" | "sector">;
  value: AxisBinding<BarValueField>;
  color: { field: BarValueField; scale: ColorScaleName };
  data: BarDatum[];
}

export interface SeriesPoint {
  x: number;
  y: number;
}

export interface Series {
  id: string;
  data: SeriesPoint[];
}

export interface LineChartSpec extends ChartSpecBase {
  kind: "line";
  x: AxisBinding<"year">;
  y: AxisBinding<"total_emissions">;
  series: AxisBinding<"country"> | null;
  markers: boolean;
  data: Series[];
}

export interface AreaChartSpec extends ChartSpecBase {
  kind: "area";
  stacked: true;
  x: AxisBinding<"year">;
  y: AxisBinding<"total_emissions">;
  band: AxisBinding<"sector">;
  data: Series[];
}

export interface PieDatum {
  id: string;
  label: string;
  value: number;
}

export interface PieChartSpec extends ChartSpecBase {
  kind: "pie";
  names: AxisBinding<"country">;
  values: AxisBinding<"total_emissions">;
  hole: number;
  textInfo: "percent+label";
  data: PieDatum[];
}

export interface MapDatum {
  /** ISO 3166-1 numerico, mismo id que las features de world-atlas. */
  id: string;
  country: string;
  value: number;
}

export interface MapFrame {
  year: number;
  data: MapDatum[];
}

export interface ChoroplethChartSpec extends ChartSpecBase {
  kind: "choropleth";
  location: AxisBinding<"country">;
  locationMode: "country names";
  color: { field: "total_emissions"; scale: ColorScaleName; domain: [number, number] };
  animationFrame: "year";
  frames: MapFrame[];
  /** Paises que no se pudieron mapear a una region: quedan en blanco. */
  unresolved: string[];
}

export interface HeatmapRow {
  id: string;
  data: { x: number; y: number | null }[];
}

export interface HeatmapChartSpec extends ChartSpecBase {
  kind: "heatmap";
  x: AxisBinding<"year">;
  y: AxisBinding<"country">;
  colorScale: ColorScaleName;
  hoverOnGaps: false;
  years: number[];
  data: HeatmapRow[];
}

export type ChartSpec =
  | BarChartSpec
  | LineChartSpec
  | AreaChartSpec
  | PieChartSpec
  | ChoroplethChartSpec
  | HeatmapChartSpec;

export type ChartKind = ChartSpec["kind"];

// ------------------------------------------------------------
// Dashboard
// ------------------------------------------------------------

export type ComparisonMetric = "total" | "average";

export interface DashboardFilters {
  countries: string[];
  sectors: string[];
  yearRange: [min: number, max: number];
  metric: ComparisonMetric;
}

export interface FilterOptions {
  countries: string[];
  sectors: string[];
  minYear: number;
  maxYear: number;
  defaultCountries: string[];
}

export interface KpiCardData {
  label: string;
  value: number | string;
  format: "number" | "text";
  accent: "primary" | "success" | "warning" | "danger";
}

export interface DashboardSpec {
  kpis: KpiCardData[];
  charts: ChartSpec[];
  rowCount: number;
}
