import { describe, expect, it } from "vitest";

import { intArg, parseArgs, stringArg } from "./_shared";

describe("parseArgs", () => {
  it("reads valued flags and bare switches", () => {
    const args = parseArgs(["--input", "data/raw.csv", "--dry-run", "--top", "5"]);
    expect(args.get("input")).toBe("data/raw.csv");
    expect(args.get("dry-run")).toBe(true);
    expect(args.get("top")).toBe("5");
  });

  it("ignores positional arguments", () => {
    expect([...parseArgs(["extra", "--output", "out.csv"]).keys()]).toEqual(["output"]);
  });
});

describe("stringArg and intArg", () => {
  const args = parseArgs(["--top", "5", "--bad", "abc", "--zero", "0", "--flag"]);

  it("treats a switch without value as absent", () => {
    expect(stringArg(args, "flag")).toBeUndefined();
    expect(stringArg(args, "top")).toBe("5");
  });

  it("parses positive integers and falls back when absent", () => {
    expect(intArg(args, "top", 10)).toBe(5);
    expect(intArg(args, "missing", 10)).toBe(10);
  });

  it("rejects values that are not positive integers", () => {
    expect(() => intArg(args, "bad", 10)).toThrow("--bad debe ser un entero positivo (recibido: abc)");
    expect(() => intArg(args, "zero", 10)).toThrow("--zero debe ser un entero positivo (recibido: 0)");
  });
});
