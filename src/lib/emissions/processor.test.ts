import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { DataSourceError } from "./errors";
import {
  clean,
  deriveMetrics,
  explore,
  growthRates,
  load,
  loadProcessed,
  loadReferenceTable,
  parseDate,
  parseNumber,
  save,
  sectoralBreakdown,
  topEmitters,
  yearlyTotals,
} from "./processor";
import type { Observation } from "@/lib/types";

function silentLogger() {
  return { log: vi.fn(), warn: vi.fn() };
}

function obs(country: string, year: number, value: number, sector: string | null = "Power", month = 1): Observation {
  return {
    country,
    sector,
    date: new Date(Date.UTC(year, month - 1, 1)),
    year,
    month,
    value,
    attributes: {},
  };
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "emissions-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseDate", () => {
  it("parses day-first dates as UTC", () => {
    expect(parseDate("15/03/2020")).toEqual(new Date(Date.UTC(2020, 2, 15)));
  });

  it("rejects impossible or differently formatted dates", () => {
    expect(parseDate("31/02/2021")).toBeNull();
    expect(parseDate("2020-03-15")).toBeNull();
    expect(parseDate("")).toBeNull();
  });
});

describe("parseNumber", () => {
  it("accepts decimal and exponent notation", () => {
    expect(parseNumber(" 12.5 ")).toBe(12.5);
    expect(parseNumber("-.5")).toBe(-0.5);
    expect(parseNumber("1e3")).toBe(1000);
  });

  it("rejects other numeric literals and blanks", () => {
    expect(parseNumber("0x10")).toBeNull();
    expect(parseNumber("0b11")).toBeNull();
    expect(parseNumber("0o7")).toBeNull();
    expect(parseNumber("Infinity")).toBeNull();
    expect(parseNumber("")).toBeNull();
  });
});

describe("clean", () => {
  const raw = [
    { country: "Chile", date: "15/03/2020", sector: "Power", value: "1.5", source: "x" },
    { country: "", date: "01/01/2020", sector: "Power", value: "1", source: "x" },
    { country: "   ", date: "01/01/2020", sector: "Power", value: "1", source: "x" },
    { country: "Peru", date: "31/02/2021", sector: "Power", value: "1", source: "x" },
    { country: "Peru", date: "01/05/2021", sector: "Industry", value: "n/a", source: "x" },
    { country: "Peru", date: "01/06/2021", sector: "Industry", value: "0x10", source: "x" },
    { country: "Peru", date: "01/01/2021", sector: "", value: "2", source: "" },
  ];

  it("drops rows missing a country, a valid date or a numeric value", () => {
    const logger = silentLogger();
    const { rows, dropped } = clean(raw, { logger });

    expect(dropped).toBe(5);
    expect(rows).toEqual([
      {
        country: "Chile",
        sector: "Power",
        date: new Date(Date.UTC(2020, 2, 15)),
        year: 2020,
        month: 3,
        value: 1.5,
        attributes: { source: "x" },
      },
      {
        country: "Peru",
        sector: null,
        date: new Date(Date.UTC(2021, 0, 1)),
        year: 2021,
        month: 1,
        value: 2,
        attributes: { source: "" },
      },
    ]);
    expect(logger.log).toHaveBeenCalledWith("Removed 5 rows with missing critical values");
    expect(logger.log).toHaveBeenCalledWith("Cleaned data: 2 rows");
  });

  it("keeps every derived date field consistent with the date", () => {
    const { rows } = clean(raw, { logger: silentLogger() });
    for (const row of rows) {
      expect(row.year).toBe(row.date.getUTCFullYear());
      expect(row.month).toBe(row.date.getUTCMonth() + 1);
    }
  });

  it("is idempotent on already clean rows", () => {
    const first = clean(raw, { logger: silentLogger() }).rows;
    const second = clean(first, { logger: silentLogger() });
    expect(second.dropped).toBe(0);
    expect(second.rows).toEqual(first);
  });

  it("does not modify its input", () => {
    const before = structuredClone(raw);
    clean(raw, { logger: silentLogger() });
    expect(raw).toEqual(before);
  });
});

describe("yearlyTotals and growthRates", () => {
  const rows = [
    obs("A", 2018, 10),
    obs("B", 2018, 4),
    obs("A", 2019, 5),
    obs("A", 2019, 10, "Industry"),
    obs("A", 2020, 0),
    obs("A", 2021, 5),
    obs("B", 2020, 6),
  ];

  it("sums per country and year, ordered by country then year", () => {
    expect(yearlyTotals(rows)).toEqual([
      { country: "A", year: 2018, total: 10 },
      { country: "A", year: 2019, total: 15 },
      { country: "A", year: 2020, total: 0 },
      { country: "A", year: 2021, total: 5 },
      { country: "B", year: 2018, total: 4 },
      { country: "B", year: 2020, total: 6 },
    ]);
  });

  it("compares against the previous observed year and nulls undefined rates", () => {
    expect(growthRates(rows)).toEqual([
      { country: "A", year: 2018, total_emissions: 10, prev_year_emissions: null, growth_rate: null },
      { country: "A", year: 2019, total_emissions: 15, prev_year_emissions: 10, growth_rate: 50 },
      { country: "A", year: 2020, total_emissions: 0, prev_year_emissions: 15, growth_rate: -100 },
      { country: "A", year: 2021, total_emissions: 5, prev_year_emissions: 0, growth_rate: null },
      { country: "B", year: 2018, total_emissions: 4, prev_year_emissions: null, growth_rate: null },
      { country: "B", year: 2020, total_emissions: 6, prev_year_emissions: 4, growth_rate: 50 },
    ]);
  });
});

describe("growth over consecutive years", () => {
  it("gives the year-over-year percentage change", () => {
    const rates = growthRates([obs("A", 2019, 100), obs("A", 2020, 150), obs("A", 2021, 120)]).map((r) => r.growth_rate);
    expect(rates[0]).toBeNull();
    expect(rates[1]).toBeCloseTo(50);
    expect(rates[2]).toBeCloseTo(-20);
  });
});

describe("topEmitters", () => {
  const rows = [obs("X", 2020, 5), obs("Y", 2020, 7), obs("Z", 2020, 5), obs("W", 2020, 1), obs("W", 2021, 50)];

  it("ranks by total and keeps first-seen order on ties", () => {
    expect(topEmitters(rows, 3, 2020)).toEqual([
      { country: "Y", total_emissions: 7 },
      { country: "X", total_emissions: 5 },
      { country: "Z", total_emissions: 5 },
    ]);
  });

  it("uses every year when none is given", () => {
    expect(topEmitters(rows, 1)).toEqual([{ country: "W", total_emissions: 51 }]);
  });

  it("sums each country over its rows", () => {
    const energy = [obs("A", 2020, 100, "Energy"), obs("A", 2021, 200, "Energy"), obs("B", 2020, 50, "Energy")];
    expect(topEmitters(energy, 2)).toEqual([
      { country: "A", total_emissions: 300 },
      { country: "B", total_emissions: 50 },
    ]);
  });

  it("returns fewer rows when there are fewer countries", () => {
    expect(topEmitters(rows, 10, 2021)).toHaveLength(1);
    expect(topEmitters([], 10)).toEqual([]);
  });
});

describe("sectoralBreakdown", () => {
  const rows = [obs("A", 2020, 2, "Power"), obs("A", 2020, 3, "Industry"), obs("B", 2020, 4, "Power"), obs("B", 2020, 9, null)];

  it("sums by sector and skips rows without one", () => {
    expect(sectoralBreakdown(rows)).toEqual([
      { sector: "Power", total_emissions: 6 },
      { sector: "Industry", total_emissions: 3 },
    ]);
  });

  it("restricts to a single country", () => {
    expect(sectoralBreakdown(rows, "A")).toEqual([
      { sector: "Industry", total_emissions: 3 },
      { sector: "Power", total_emissions: 2 },
    ]);
    expect(sectoralBreakdown(rows, "Nowhere")).toEqual([]);
  });

  it("adds up to the country total when every row has a sector", () => {
    const sectorSum = sectoralBreakdown(rows, "A").reduce((sum, s) => sum + s.total_emissions, 0);
    const [countryTotal] = topEmitters(rows.filter((r) => r.country === "A"), 1);
    expect(sectorSum).toBe(countryTotal.total_emissions);
  });
});

describe("deriveMetrics", () => {
  const rows = [obs("Chile", 2020, 2), obs("Chile", 2020, 3, "Industry"), obs("Peru", 2020, 4)];

  it("keeps the row count and the source fields", () => {
    const enriched = deriveMetrics(rows);
    expect(enriched).toHaveLength(3);
    expect(enriched.map((r) => [r.country, r.sector, r.value])).toEqual([
      ["Chile", "Power", 2],
      ["Chile", "Industry", 3],
      ["Peru", "Power", 4],
    ]);
  });

  it("adds the country-year total to every row", () => {
    const enriched = deriveMetrics(rows);
    expect(enriched.map((r) => r.total_emissions)).toEqual([5, 5, 4]);
    expect("population" in enriched[0]).toBe(false);
  });

  it("joins population with first-wins keys and nulls a zero denominator", () => {
    const population = [
      { country: "Chile", year: 2020, value: 10 },
      { country: "Chile", year: 2020, value: 99 },
      { country: "Peru", year: 2020, value: 0 },
    ];
    const [chile, , peru] = deriveMetrics(rows, population);

    expect(chile.population).toBe(10);
    expect(chile.emissions_per_capita).toBe(0.5);
    expect(peru.population).toBe(0);
    expect(peru.emissions_per_capita).toBeNull();
    expect("gdp" in chile).toBe(false);
  });

  it("leaves intensity null when the gdp row is missing", () => {
    const [chile] = deriveMetrics(rows, undefined, [{ country: "Peru", year: 2020, value: 8 }]);
    expect(chile.gdp).toBeNull();
    expect(chile.emission_intensity).toBeNull();
  });
});

describe("load and explore", () => {
  it("normalizes headers and detects the delimiter", async () => {
    const path = join(dir, "raw.csv");
    writeFileSync(
      path,
      "Country;Date;Sector;Value;Fuente de Datos\nChile;01/02/2020;Power;3.5;oficial\nPeru;15/06/2021;;2;\n"
    );
    const logger = silentLogger();
    const table = await load(path, { logger });

    expect(table.columns).toEqual(["country", "date", "sector", "value", "fuente_de_datos"]);
    expect(table.rows[1]).toEqual({
      country: "Peru",
      date: "15/06/2021",
      sector: "",
      value: "2",
      fuente_de_datos: "",
    });
    expect(logger.log).toHaveBeenCalledWith("Loaded 2 rows and 5 columns");

    const summary = explore(table);
    expect(summary.shape).toEqual([2, 5]);
    expect(summary.missingValues).toEqual({ country: 0, date: 0, sector: 1, value: 0, fuente_de_datos: 1 });
    expect(summary.uniqueCountries).toBe(2);
    expect(summary.uniqueSectors).toBe(1);
    expect(summary.dateRange).toEqual(["01/02/2020", "15/06/2021"]);
  });

  it("fails with a DataSourceError when the file is missing", async () => {
    const path = join(dir, "missing.csv");
    await expect(load(path, { logger: silentLogger() })).rejects.toBeInstanceOf(DataSourceError);
    await expect(load(path, { logger: silentLogger() })).rejects.toThrow(`Archivo no encontrado: ${path}`);
  });

  it.each([
    ["an unclosed quote", 'country,date,sector,value\n"Chile,01/01/2020,Power,1\n'],
    ["a row with extra fields", "country,date,sector,value\nChile,01/01/2020,Power,1,extra\n"],
    ["an empty file", ""],
  ])("rejects a file with %s after retrying as latin1", async (_, content) => {
    const path = join(dir, "broken.csv");
    writeFileSync(path, content);
    const logger = silentLogger();

    const result = load(path, { logger });
    await expect(result).rejects.toBeInstanceOf(DataSourceError);
    await expect(result).rejects.toThrow(`No se pudo interpretar como tabla: ${path}`);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining("Reintentando con latin1"));
  });
});

describe("save and loadProcessed", () => {
  it("writes the processed table and reads rows and metrics back", async () => {
    const { rows } = clean(
      [
        { country: "Chile", date: "15/03/2020", sector: "Power", value: "1.5", source: "x" },
        { country: "Peru", date: "01/01/2021", sector: "", value: "2", source: "y" },
      ],
      { logger: silentLogger() }
    );
    const path = join(dir, "nested", "processed.csv");
    const logger = silentLogger();

    await save(deriveMetrics(rows, [{ country: "Chile", year: 2020, value: 10 }]), path, { logger });

    const [header] = readFileSync(path, "utf8").split("\n");
    expect(header).toBe(
      "country,sector,date,value,source,year,month,total_emissions,population,emissions_per_capita"
    );
    expect(logger.log).toHaveBeenCalledWith(`Saved processed data to ${path}`);

    const reloaded = await loadProcessed(path, { logger });
    expect(reloaded).toEqual([
      { ...rows[0], total_emissions: 1.5, population: 10, emissions_per_capita: 0.15 },
      { ...rows[1], total_emissions: 2, population: null, emissions_per_capita: null },
    ]);
    expect("gdp" in reloaded[0]).toBe(false);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe("loadReferenceTable", () => {
  it("reads country, year and the requested column", async () => {
    const path = join(dir, "population.csv");
    writeFileSync(path, "country,year,population\nChile,2020,19\nPeru,not-a-year,33\nPeru,2021,\n");
    expect(await loadReferenceTable(path, "population")).toEqual([
      { country: "Chile", year: 2020, value: 19 },
      { country: "Peru", year: 2021, value: null },
    ]);
  });

  it("rejects a table without the requested column", async () => {
    const path = join(dir, "gdp.csv");
    writeFileSync(path, "country,year,population\nChile,2020,19\n");
    await expect(loadReferenceTable(path, "gdp")).rejects.toThrow(`Falta la columna "gdp": ${path}`);
  });
});
