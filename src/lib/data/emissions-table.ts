import { getDataPaths } from "@/lib/config";
import { loadProcessed } from "@/lib/emissions/processor";
import type { Observation } from "@/lib/types";

// Una lectura por path; las filas no se modifican despues de cargadas.
const tables = new Map<string, Promise<readonly Observation[]>>();

export function getEmissionsTable(path = getDataPaths().processed): Promise<readonly Observation[]> {
  const cached = tables.get(path);
  if (cached) return cached;

  const pending = loadProcessed(path).catch((err: unknown) => {
    tables.delete(path);
    throw err;
  });
  tables.set(path, pending);
  return pending;
}
