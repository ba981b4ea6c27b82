import { describe, it, expect, beforeEach } from "vitest";
import { ZodError } from "zod";
import { loadConfig, parseConfig, resetConfigCache } from "../src/config/configManager";

describe("config manager", () => {
  beforeEach(() => resetConfigCache());

  it("loads and freezes the default config", () => {
    const cfg = loadConfig();
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.market)).toBe(true);
    expect(cfg.market).toEqual({ rate: 0, up: 1, down: -0.5 });
    expect(cfg.pricing.bound).toBe("exclusive");
    expect(cfg.sweeps.map((s) => s.name)).toEqual([
      "price-vs-maturity",
      "price-vs-barrier",
      "price-vs-strike",
      "price-vs-rate",
    ]);
  });

  it("caches per file", () => {
    expect(loadConfig()).toBe(loadConfig());
  });

  it("an explicit path that does not exist is an error", () => {
    expect(() => loadConfig("config/nope.yaml")).toThrow("Unable to locate configuration file");
  });

  it("fills defaults for optional sections", () => {
    const cfg = parseConfig(`
market: { rate: 0.01, up: 0.1, down: -0.1 }
contract: { maturity: 10, startPrice: 100, strike: 100, barrier: 121 }
`);
    expect(cfg.pricing).toEqual({ bound: "exclusive" });
    expect(cfg.guards).toEqual({ validateInputs: false });
    expect(cfg.sweeps).toEqual([]);
  });

  it("rejects a fractional maturity", () => {
    expect(() => parseConfig(`
market: { rate: 0.0, up: 1.0, down: -0.5 }
contract: { maturity: 2.5, startPrice: 1, strike: 1, barrier: 8 }
`)).toThrow(ZodError);
  });

  it("rejects an unknown range kind", () => {
    expect(() => parseConfig(`
market: { rate: 0.0, up: 1.0, down: -0.5 }
contract: { maturity: 20, startPrice: 1, strike: 1, barrier: 8 }
sweeps:
  - name: bad
    instrument: call
    parameter: strike
    values: { kind: log, start: 1, stop: 2 }
    series: [{ label: a }]
`)).toThrow(ZodError);
  });
});
