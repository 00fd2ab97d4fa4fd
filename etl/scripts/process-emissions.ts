/**
 * ETL - Emisiones de CO2 por pais y sector
 *
 * Lee el CSV crudo (country, sector, date dd/mm/yyyy, value), lo limpia,
 * agrega metricas derivadas y escribe el artefacto que consume el dashboard.
 *
 * Uso:
 *   npx tsx etl/scripts/process-emissions.ts
 *   npx tsx etl/scripts/process-emissions.ts --input data/raw/dataset.csv --output data/processed/out.csv
 *   npx tsx etl/scripts/process-emissions.ts --population data/raw/population.csv --gdp data/raw/gdp.csv --top 10
 */

import { config } from "dotenv";
import { isAbsolute, join } from "node:path";

import { intArg, parseArgs, stringArg } from "./_shared";
import { getDataPaths } from "@/lib/config";
import {
  clean,
  deriveMetrics,
  explore,
  load,
  loadReferenceTable,
  save,
  topEmitters,
} from "@/lib/emissions/processor";

config({ path: join(process.cwd(), ".env.local") });

function resolveArg(value: string | undefined, fallback: string | null): string | null {
  if (value === undefined) return fallback;
  return isAbsolute(value) ? value : join(process.cwd(), value);
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const paths = getDataPaths();

  const input = resolveArg(stringArg(args, "input"), paths.raw) ?? paths.raw;
  const output = resolveArg(stringArg(args, "output"), paths.processed) ?? paths.processed;
  const populationPath = resolveArg(stringArg(args, "population"), paths.population);
  const gdpPath = resolveArg(stringArg(args, "gdp"), paths.gdp);
  const top = intArg(args, "top", 10);

  const raw = await load(input);
  const exploration = explore(raw);

  console.log("\n=== DATA EXPLORATION ===");
  console.log(`Shape: ${exploration.shape[0]} x ${exploration.shape[1]}`);
  console.log(`Columns: ${exploration.columns.join(", ")}`);
  console.log(`Unique Countries: ${exploration.uniqueCountries}`);
  console.log(`Unique Sectors: ${exploration.uniqueSectors}`);
  console.log(`Date Range: ${exploration.dateRange ? exploration.dateRange.join(" -> ") : "-"}`);
  console.log("Missing Values:");
  for (const [column, count] of Object.entries(exploration.missingValues)) {
    console.log(`  ${column}: ${count}`);
  }

  console.log("");
  const { rows } = clean(raw.rows);

  const population = populationPath ? await loadReferenceTable(populationPath, "population") : undefined;
  const gdp = gdpPath ? await loadReferenceTable(gdpPath, "gdp") : undefined;
  if (population) console.log(`Population rows: ${population.length.toLocaleString("en-US")}`);
  if (gdp) console.log(`GDP rows: ${gdp.length.toLocaleString("en-US")}`);

  const enriched = deriveMetrics(rows, population, gdp);

  console.log(`\n=== TOP ${top} EMITTERS (ALL TIME) ===`);
  topEmitters(enriched, top).forEach((r, i) => {
    console.log(`${String(i + 1).padStart(3)}. ${r.country.padEnd(32)} ${r.total_emissions.toLocaleString("en-US")}`);
  });

  console.log("");
  await save(enriched, output);
  console.log("\nETL completado.");
}

main().catch((err) => {
  console.error("Error fatal:", err);
  process.exit(1);
});
