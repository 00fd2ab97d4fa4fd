import { isAbsolute, join } from "node:path";

export interface DataPaths {
  raw: string;
  processed: string;
  population: string | null;
  gdp: string | null;
}

function resolvePath(value: string): string {
  return isAbsolute(value) ? value : join(process.cwd(), value);
}

function optionalPath(value: string | undefined): string | null {
  return value?.trim() ? resolvePath(value.trim()) : null;
}

export function getDataPaths(env: NodeJS.ProcessEnv = process.env): DataPaths {
  return {
    raw: resolvePath(env.EMISSIONS_RAW_PATH || "data/raw/dataset.csv"),
    processed: resolvePath(
      env.EMISSIONS_PROCESSED_PATH || "data/processed/co2_emissions_processed.csv"
    ),
    population: optionalPath(env.EMISSIONS_POPULATION_PATH),
    gdp: optionalPath(env.EMISSIONS_GDP_PATH),
  };
}
