export const KEY_SEP = "\u001f";

export interface Group<K> {
  key: K;
  total: number;
  count: number;
}

/**
 * Agrupa y suma preservando el orden de primera aparicion de cada clave.
 * Las filas cuya clave es null no forman grupo.
 */
export function groupSum<R, K>(
  rows: readonly R[],
  keyOf: (row: R) => K | null,
  valueOf: (row: R) => number,
  idOf: (key: K) => string = String
): Group<K>[] {
  const groups = new Map<string, Group<K>>();
  for (const row of rows) {
    const key = keyOf(row);
    if (key === null) continue;
    const id = idOf(key);
    const existing = groups.get(id);
    if (existing) {
      existing.total += valueOf(row);
      existing.count++;
    } else {
      groups.set(id, { key, total: valueOf(row), count: 1 });
    }
  }
  return [...groups.values()];
}

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Orden descendente por total; Array#sort es estable, los empates conservan su orden. */
export function sortByTotalDesc<G extends { total: number }>(groups: readonly G[]): G[] {
  return [...groups].sort((a, b) => b.total - a.total);
}

export function yearKey(country: string, year: number): string {
  return `${country}${KEY_SEP}${year}`;
}

export function safeDivide(numerator: number, denominator: number | null | undefined): number | null {
  if (denominator === null || denominator === undefined || denominator === 0) return null;
  return numerator / denominator;
}

export function mean(values: readonly (number | null)[]): number | null {
  const present = values.filter((v): v is number => v !== null);
  if (!present.length) return null;
  return present.reduce((a, b) => a + b, 0) / present.length;
}
