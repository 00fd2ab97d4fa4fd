import worldCountries from "world-countries";

// nombre (common, official o alternativo) en minusculas -> ISO 3166-1 numerico
const REGION_INDEX = new Map<string, string>();

for (const c of worldCountries) {
  if (!c.ccn3) continue;
  for (const name of [c.name.common, c.name.official, ...c.altSpellings]) {
    const key = name.trim().toLowerCase();
    if (key && !REGION_INDEX.has(key)) REGION_INDEX.set(key, c.ccn3);
  }
}

/**
 * Resuelve un nombre de pais a la region del mapa.
 * Devuelve null si no hay match: el renderer lo deja en blanco.
 */
export function resolveRegionId(country: string): string | null {
  return REGION_INDEX.get(country.trim().toLowerCase()) ?? null;
}
