import { isValidElement } from "react";
import { describe, expect, it } from "vitest";

import { ChartErrorBoundary } from "./chart-error-boundary";
import { DataFallback } from "./data-fallback";
import type { ChartSpec, PieChartSpec } from "@/lib/types";

const pie: PieChartSpec = {
  kind: "pie",
  slot: "sharePie",
  title: "CO2 Emissions Share (All Time)",
  names: { field: "country", label: "Country" },
  values: { field: "total_emissions", label: "CO2 Emissions" },
  hole: 0.4,
  textInfo: "percent+label",
  data: [{ id: "Chile", label: "Chile", value: 4 }],
  layout: { height: 500 },
};

describe("ChartErrorBoundary", () => {
  it("keeps the error message for the fallback", () => {
    expect(ChartErrorBoundary.getDerivedStateFromError(new Error("boom"))).toEqual({ error: "boom" });
    expect(ChartErrorBoundary.getDerivedStateFromError("boom")).toEqual({ error: "render error" });
  });

  it("renders the chart rows as a table after a render error", () => {
    const boundary = new ChartErrorBoundary({ chart: pie, children: "chart" });
    expect(boundary.render()).toBe("chart");

    boundary.state = ChartErrorBoundary.getDerivedStateFromError(new Error("boom"));
    const element = boundary.render();
    if (!isValidElement<{ chart: ChartSpec; reason: string }>(element)) {
      throw new Error("expected a fallback element");
    }
    expect(element.type).toBe(DataFallback);
    expect(element.props.chart).toBe(pie);
    expect(element.props.reason).toBe("failed to render (boom)");
  });
});
