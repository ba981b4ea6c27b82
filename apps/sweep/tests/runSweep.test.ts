import { describe, it, expect } from "vitest";
import { priceCall, priceUpAndInCall, InvalidModelParametersError } from "@crr-pricer/crr-core";
import { runSweep, priceInstrument, defaultsFromConfig, type SweepDefaults } from "../src/sweep/runSweep";
import { loadConfig } from "../src/config/configManager";
import { toCsv, formatTable } from "../src/sweep/output";
import type { SweepDefinition } from "../src/config/schema";

const defaults: SweepDefaults = {
  market: { rate: 0, up: 1.0, down: -0.5 },
  contract: { maturity: 20, startPrice: 1, strike: 1, barrier: 8 },
  options: { bound: "exclusive" },
};

describe("runSweep", () => {
  it("prices each series at each swept value", () => {
    const def: SweepDefinition = {
      name: "maturity",
      instrument: "upAndInCall",
      parameter: "maturity",
      values: { kind: "integer", start: 4, stop: 7 },
      series: [
        { label: "r0", overrides: {} },
        { label: "r25", overrides: { rate: 0.25 } },
      ],
    };
    const res = runSweep(def, defaults);

    expect(res.xs).toEqual([4, 5, 6]);
    expect(res.skipped).toBe(0);
    expect(res.series.map((s) => s.label)).toEqual(["r0", "r25"]);
    expect(res.series[0].prices[0]).toBeCloseTo(2 / 27, 14);
    expect(res.series[1].prices[2]).toBe(priceUpAndInCall(0.25, 1.0, -0.5, 6, 1, 1, 8));
  });

  it("marks barriers off the lattice as NaN", () => {
    const def: SweepDefinition = {
      name: "barrier",
      instrument: "upAndInCall",
      parameter: "barrier",
      values: { kind: "list", values: [4, 5, 8] },
      series: [{ label: "r0", overrides: {} }],
    };
    const res = runSweep(def, defaults);

    expect(res.skipped).toBe(1);
    expect(Number.isNaN(res.series[0].prices[1])).toBe(true);
    expect(res.series[0].prices[2]).toBeCloseTo(0.8516694703430274, 10);
  });

  it("other pricing errors propagate", () => {
    const def: SweepDefinition = {
      name: "bad-rate",
      instrument: "call",
      parameter: "rate",
      values: { kind: "list", values: [2] },
      series: [{ label: "x", overrides: {} }],
    };
    expect(() => runSweep(def, { ...defaults, options: { validate: true } })).toThrow(InvalidModelParametersError);
  });

  it("every shipped sweep passes input validation", () => {
    const cfg = loadConfig();
    const base = defaultsFromConfig(cfg);
    const strict: SweepDefaults = { ...base, options: { ...base.options, validate: true } };

    for (const def of cfg.sweeps) {
      const res = runSweep(def, strict);
      expect(res.skipped).toBe(0);
      for (const s of res.series) {
        expect(s.prices.every((v) => Number.isFinite(v) && v >= 0)).toBe(true);
      }
    }
  });

  it("dispatches by instrument", () => {
    const p = { rate: 0, up: 1.0, down: -0.5, maturity: 20, startPrice: 1, strike: 1, barrier: 8 };
    expect(priceInstrument("call", p, {})).toBe(priceCall(0, 1.0, -0.5, 20, 1, 1));
    // r = 0 and S = K: parity makes put and call equal on the full lattice
    expect(priceInstrument("put", p, { bound: "inclusive" }))
      .toBeCloseTo(priceCall(0, 1.0, -0.5, 20, 1, 1, { bound: "inclusive" }), 10);
  });
});

describe("sweep output", () => {
  const result = {
    name: "demo",
    instrument: "call" as const,
    parameter: "strike" as const,
    xs: [1, 2],
    series: [
      { label: "a", prices: [0.5, NaN] },
      { label: "b,c", prices: [0.25, 0.125] },
    ],
    skipped: 1,
  };

  it("writes CSV with blank cells for missing points", () => {
    expect(toCsv(result)).toBe('strike,a,"b,c"\n1,0.5,0.25\n2,,0.125\n');
  });

  it("formats an aligned table", () => {
    expect(formatTable(result, 3).split("\n")).toEqual([
      "demo (call)",
      "strike      a    b,c",
      "------  -----  -----",
      "     1  0.500  0.250",
      "     2      -  0.125",
    ]);
  });
});
