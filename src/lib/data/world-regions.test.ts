import { describe, expect, it } from "vitest";

import { resolveRegionId } from "@/lib/emissions/geo";
import { getWorldRegions } from "./world-regions";

describe("getWorldRegions", () => {
  it("returns country features keyed by ISO numeric id", () => {
    const chile = getWorldRegions().find((r) => r.id === "152");
    expect(chile?.properties.name).toBe("Chile");
  });

  it("shares ids with the country name resolver", () => {
    const ids = new Set(getWorldRegions().map((r) => r.id));
    expect(ids.has(resolveRegionId("Germany") ?? "")).toBe(true);
    expect(ids.has(resolveRegionId("Brazil") ?? "")).toBe(true);
  });

  it("builds the regions once", () => {
    expect(getWorldRegions()).toBe(getWorldRegions());
  });
});
