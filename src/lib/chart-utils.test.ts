import { interpolateReds, interpolateViridis } from "d3-scale-chromatic";
import { describe, expect, it } from "vitest";

import {
  chartRows,
  colorForValue,
  formatEmissions,
  formatPercent,
  seriesYears,
  validateChartSpec,
  valueDomain,
} from "./chart-utils";
import type { BarChartSpec, HeatmapChartSpec } from "./types";

const bar: BarChartSpec = {
  kind: "bar",
  slot: "growthRanking",
  title: "Growth",
  orientation: "horizontal",
  category: { field: "country", label: "Country" },
  value: { field: "growth_rate", label: "Average Growth Rate (%)" },
  color: { field: "growth_rate", scale: "Reds" },
  data: [{ category: "Chile", value: null }],
  layout: { height: 600 },
};

const heatmap: HeatmapChartSpec = {
  kind: "heatmap",
  slot: "heatmap",
  title: "Heatmap",
  x: { field: "year", label: "Year" },
  y: { field: "country", label: "Country" },
  colorScale: "Reds",
  hoverOnGaps: false,
  years: [2020, 2021],
  data: [
    {
      id: "Chile",
      data: [
        { x: 2020, y: null },
        { x: 2021, y: 4 },
      ],
    },
  ],
  layout: { height: 600 },
};

describe("formatEmissions", () => {
  it("abbreviates large magnitudes", () => {
    expect(formatEmissions(1_500_000_000)).toBe("1.5 B");
    expect(formatEmissions(2_500_000)).toBe("2.5 M");
    expect(formatEmissions(2_500)).toBe("2.5 K");
  });

  it("keeps small values readable", () => {
    expect(formatEmissions(12.4)).toBe("12");
    expect(formatEmissions(0.456)).toBe("0.46");
    expect(formatPercent(-12.34)).toBe("-12.3%");
  });
});

describe("colorForValue", () => {
  it("maps the domain onto the scale", () => {
    expect(colorForValue("Viridis", 0, [0, 10])).toBe(interpolateViridis(0));
    expect(colorForValue("Viridis", 10, [0, 10])).toBe(interpolateViridis(1));
    expect(colorForValue("Reds", 0, [0, 10])).toBe(interpolateReds(0.2));
  });

  it("uses the darkest color for a single-value domain", () => {
    expect(colorForValue("Reds", 5, [5, 5])).toBe(interpolateReds(1));
  });

  it("ignores gaps when computing the domain", () => {
    expect(valueDomain([3, null, -1, 8])).toEqual([-1, 8]);
    expect(valueDomain([null])).toEqual([0, 0]);
  });
});

describe("validateChartSpec", () => {
  it("falls back when a bar chart has no values", () => {
    expect(validateChartSpec(bar)).toEqual({ valid: false, fallbackReason: "No data for the selected filters" });
    expect(validateChartSpec({ ...bar, data: [{ category: "Peru", value: 2 }] })).toEqual({ valid: true });
  });

  it("accepts a heatmap with gaps", () => {
    expect(validateChartSpec(heatmap)).toEqual({ valid: true });
  });
});

describe("chartRows", () => {
  it("flattens a chart into table rows", () => {
    expect(chartRows(bar)).toEqual([{ country: "Chile", growth_rate: null }]);
    expect(chartRows(heatmap)).toEqual([
      { country: "Chile", year: 2020, value: null },
      { country: "Chile", year: 2021, value: 4 },
    ]);
  });
});

describe("seriesYears", () => {
  it("orders the year axis across series that start at different years", () => {
    expect(
      seriesYears([
        { id: "Argentina", data: [{ x: 2021, y: 1 }, { x: 2022, y: 2 }] },
        { id: "Brazil", data: [{ x: 2019, y: 3 }, { x: 2021, y: 4 }] },
      ])
    ).toEqual([2019, 2021, 2022]);
    expect(seriesYears([])).toEqual([]);
  });
});
