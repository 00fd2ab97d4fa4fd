/**
 * Pipeline de emisiones: carga → coercion de tipos → descarte de filas
 * invalidas → agregados anuales → metricas derivadas → artefacto procesado.
 *
 * Todas las transformaciones devuelven tablas nuevas; ninguna muta su entrada.
 */

import { readDelimited, writeDelimited, type CsvCell } from "./csv";
import { DataSourceError } from "./errors";
import {
  compareText,
  groupSum,
  safeDivide,
  sortByTotalDesc,
  yearKey,
} from "./aggregate";
import type {
  CountryTotal,
  DataExploration,
  EnrichedObservation,
  GrowthRecord,
  Observation,
  ProcessedObservation,
  RawTable,
  ReferenceRow,
  SectorTotal,
} from "@/lib/types";

export type ProcessorLogger = Pick<Console, "log" | "warn">;

export interface ProcessorOptions {
  logger?: ProcessorLogger;
}

/** Cualquier fila de entrada para `clean`: un registro crudo o una Observation ya limpia. */
export type CleanInput = { readonly [column: string]: unknown };

export interface CleanResult {
  rows: Observation[];
  dropped: number;
}

const MODEL_COLUMNS = new Set(["country", "sector", "date", "year", "month", "value", "attributes"]);
const METRIC_COLUMNS = [
  "total_emissions",
  "population",
  "emissions_per_capita",
  "gdp",
  "emission_intensity",
] as const;
const METRIC_COLUMN_SET = new Set<string>(METRIC_COLUMNS);

type MetricColumn = (typeof METRIC_COLUMNS)[number];

// ------------------------------------------------------------
// Coercion
// ------------------------------------------------------------

const DMY_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

function utcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/** Formato fijo dd/mm/yyyy. Fechas ya parseadas se aceptan tal cual. */
export function parseDate(input: unknown): Date | null {
  if (input instanceof Date) return Number.isNaN(input.getTime()) ? null : input;
  if (typeof input !== "string") return null;
  const m = DMY_DATE.exec(input.trim());
  if (!m) return null;
  return utcDate(Number(m[3]), Number(m[2]), Number(m[1]));
}

/** Fechas del artefacto procesado (yyyy-mm-dd). */
export function parseIsoDate(input: unknown): Date | null {
  if (input instanceof Date) return Number.isNaN(input.getTime()) ? null : input;
  if (typeof input !== "string") return null;
  const m = ISO_DATE.exec(input.trim());
  if (!m) return null;
  return utcDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// Solo decimal con exponente opcional: Number() tambien acepta 0x, 0b y 0o
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumber(input: unknown): number | null {
  if (typeof input === "number") return Number.isFinite(input) ? input : null;
  if (typeof input !== "string") return null;
  const s = input.trim();
  if (!DECIMAL.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function parseText(input: unknown): string | null {
  if (typeof input !== "string") return null;
  const s = input.trim();
  return s.length ? s : null;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

function passthroughColumns(row: CleanInput): Record<string, string> {
  const attributes: Record<string, string> = {};
  const nested = row.attributes;
  if (isStringRecord(nested)) Object.assign(attributes, nested);
  for (const [column, value] of Object.entries(row)) {
    if (MODEL_COLUMNS.has(column) || METRIC_COLUMN_SET.has(column)) continue;
    if (typeof value === "string") attributes[column] = value;
  }
  return attributes;
}

function toObservation(row: CleanInput, toDate: (input: unknown) => Date | null): Observation | null {
  const country = parseText(row.country);
  const date = toDate(row.date);
  const value = parseNumber(row.value);
  if (country === null || date === null || value === null) return null;

  return {
    country,
    sector: parseText(row.sector),
    date,
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    value,
    attributes: passthroughColumns(row),
  };
}

function cleanWith(
  rows: readonly CleanInput[],
  toDate: (input: unknown) => Date | null
): CleanResult {
  const cleaned: Observation[] = [];
  for (const row of rows) {
    const observation = toObservation(row, toDate);
    if (observation) cleaned.push(observation);
  }
  return { rows: cleaned, dropped: rows.length - cleaned.length };
}

// ------------------------------------------------------------
// Operaciones
// ------------------------------------------------------------

export async function load(path: string, options: ProcessorOptions = {}): Promise<RawTable> {
  const logger = options.logger ?? console;
  logger.log(`Loading data from ${path}...`);
  const table = await readDelimited(path, logger);
  logger.log(
    `Loaded ${table.rows.length.toLocaleString("en-US")} rows and ${table.columns.length} columns`
  );
  return table;
}

export function explore(table: RawTable): DataExploration {
  const missingValues: Record<string, number> = {};
  for (const column of table.columns) {
    missingValues[column] = table.rows.filter((r) => !(r[column] ?? "").trim()).length;
  }

  const distinct = (column: string) =>
    new Set(table.rows.map((r) => (r[column] ?? "").trim()).filter(Boolean)).size;

  const dates = table.rows
    .map((r) => (r.date ?? "").trim())
    .filter(Boolean)
    .sort(compareText);

  return {
    shape: [table.rows.length, table.columns.length],
    columns: [...table.columns],
    missingValues,
    uniqueCountries: table.columns.includes("country") ? distinct("country") : 0,
    uniqueSectors: table.columns.includes("sector") ? distinct("sector") : 0,
    dateRange: dates.length ? [dates[0], dates[dates.length - 1]] : null,
    sample: table.rows.slice(0, 10),
  };
}

/**
 * Coerciona tipos y descarta filas sin `country`, `date` o `value`.
 * Las filas descartadas se informan, no son error.
 */
export function clean(rows: readonly CleanInput[], options: ProcessorOptions = {}): CleanResult {
  const logger = options.logger ?? console;
  const result = cleanWith(rows, parseDate);
  logger.log(`Removed ${result.dropped.toLocaleString("en-US")} rows with missing critical values`);
  logger.log(`Cleaned data: ${result.rows.length.toLocaleString("en-US")} rows`);
  return result;
}

function indexReference(rows: readonly ReferenceRow[]): Map<string, number | null> {
  const index = new Map<string, number | null>();
  for (const row of rows) {
    const key = yearKey(row.country, row.year);
    // Claves duplicadas: gana la primera
    if (!index.has(key)) index.set(key, row.value);
  }
  return index;
}

export function deriveMetrics(
  rows: readonly Observation[],
  population?: readonly ReferenceRow[],
  gdp?: readonly ReferenceRow[]
): EnrichedObservation[] {
  const totals = new Map(
    groupSum(rows, (r) => yearKey(r.country, r.year), (r) => r.value).map((g) => [g.key, g.total])
  );
  const populationIndex = population ? indexReference(population) : null;
  const gdpIndex = gdp ? indexReference(gdp) : null;

  return rows.map((row) => {
    const key = yearKey(row.country, row.year);
    const total = totals.get(key) ?? 0;
    const enriched: EnrichedObservation = { ...row, total_emissions: total };

    if (populationIndex) {
      const people = populationIndex.get(key) ?? null;
      enriched.population = people;
      enriched.emissions_per_capita = safeDivide(total, people);
    }
    if (gdpIndex) {
      const output = gdpIndex.get(key) ?? null;
      enriched.gdp = output;
      enriched.emission_intensity = safeDivide(total, output);
    }
    return enriched;
  });
}

export function yearlyTotals(rows: readonly Observation[]) {
  return groupSum(
    rows,
    (r) => ({ country: r.country, year: r.year }),
    (r) => r.value,
    (k) => yearKey(k.country, k.year)
  )
    .map((g) => ({ country: g.key.country, year: g.key.year, total: g.total }))
    .sort((a, b) => compareText(a.country, b.country) || a.year - b.year);
}

/**
 * Variacion interanual por pais contra el anio observado anterior.
 * Primer anio de cada pais, o anterior en cero: null.
 */
export function growthRates(rows: readonly Observation[]): GrowthRecord[] {
  const records: GrowthRecord[] = [];
  let previous: { country: string; total: number } | null = null;

  for (const { country, year, total } of yearlyTotals(rows)) {
    const prev = previous && previous.country === country ? previous.total : null;
    const delta = prev === null ? null : safeDivide(total - prev, prev);
    records.push({
      country,
      year,
      total_emissions: total,
      prev_year_emissions: prev,
      growth_rate: delta === null ? null : delta * 100,
    });
    previous = { country, total };
  }
  return records;
}

export function topEmitters(rows: readonly Observation[], n = 10, year?: number): CountryTotal[] {
  const scoped = year === undefined ? rows : rows.filter((r) => r.year === year);
  return sortByTotalDesc(groupSum(scoped, (r) => r.country, (r) => r.value))
    .slice(0, Math.max(0, n))
    .map((g) => ({ country: g.key, total_emissions: g.total }));
}

export function sectoralBreakdown(rows: readonly Observation[], country?: string): SectorTotal[] {
  const scoped = country === undefined ? rows : rows.filter((r) => r.country === country);
  return sortByTotalDesc(groupSum(scoped, (r) => r.sector, (r) => r.value)).map((g) => ({
    sector: g.key,
    total_emissions: g.total,
  }));
}

// ------------------------------------------------------------
// Persistencia
// ------------------------------------------------------------

function metricOf(row: Observation | EnrichedObservation, column: MetricColumn): number | null | undefined {
  if (!(column in row)) return undefined;
  const value: unknown = Reflect.get(row, column);
  return typeof value === "number" ? value : null;
}

/** Escribe la tabla limpia; crea directorios y sobreescribe sin preguntar. */
export async function save(
  rows: readonly (Observation | EnrichedObservation)[],
  path: string,
  options: ProcessorOptions = {}
): Promise<void> {
  const logger = options.logger ?? console;

  const attributeColumns: string[] = [];
  const presentMetrics = new Set<MetricColumn>();
  for (const row of rows) {
    for (const column of Object.keys(row.attributes)) {
      if (!attributeColumns.includes(column)) attributeColumns.push(column);
    }
    for (const column of METRIC_COLUMNS) {
      if (metricOf(row, column) !== undefined) presentMetrics.add(column);
    }
  }
  const metricColumns = METRIC_COLUMNS.filter((c) => presentMetrics.has(c));
  const columns = ["country", "sector", "date", "value", ...attributeColumns, "year", "month", ...metricColumns];

  const records = rows.map((row) => {
    const record: Record<string, CsvCell> = {
      ...row.attributes,
      country: row.country,
      sector: row.sector,
      date: formatIsoDate(row.date),
      value: row.value,
      year: row.year,
      month: row.month,
    };
    for (const column of metricColumns) record[column] = metricOf(row, column) ?? null;
    return record;
  });

  await writeDelimited(path, columns, records);
  logger.log(`Saved processed data to ${path}`);
}

/**
 * Relee el artefacto procesado (fechas ISO) como tabla tipada. Las columnas de
 * metricas presentes en el header vuelven como numero, celda vacia como null.
 */
export async function loadProcessed(
  path: string,
  options: ProcessorOptions = {}
): Promise<ProcessedObservation[]> {
  const logger = options.logger ?? console;
  const table = await readDelimited(path, logger);
  const metricColumns = METRIC_COLUMNS.filter((c) => table.columns.includes(c));

  const rows: ProcessedObservation[] = [];
  for (const raw of table.rows) {
    const observation = toObservation(raw, parseIsoDate);
    if (!observation) continue;
    const row: ProcessedObservation = { ...observation };
    for (const column of metricColumns) row[column] = parseNumber(raw[column]);
    rows.push(row);
  }

  const dropped = table.rows.length - rows.length;
  if (dropped > 0) {
    logger.warn(`Processed file ${path} had ${dropped} invalid rows; skipped`);
  }
  return rows;
}

/** Tabla de referencia `country, year, <column>` para los joins de poblacion/PBI. */
export async function loadReferenceTable(
  path: string,
  column: string,
  options: ProcessorOptions = {}
): Promise<ReferenceRow[]> {
  const table = await readDelimited(path, options.logger);
  for (const required of ["country", "year", column]) {
    if (!table.columns.includes(required)) {
      throw new DataSourceError(path, `Falta la columna "${required}"`);
    }
  }

  const rows: ReferenceRow[] = [];
  for (const raw of table.rows) {
    const country = parseText(raw.country);
    const year = parseNumber(raw.year);
    if (country === null || year === null || !Number.isInteger(year)) continue;
    rows.push({ country, year, value: parseNumber(raw[column]) });
  }
  return rows;
}
