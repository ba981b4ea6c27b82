import type {
  BarrierContractSpec,
  InstrumentKind,
  MarketModel,
  PricingOptions,
} from "@crr-pricer/core-types";
import {
  BarrierLevelNotFoundError,
  PAYOFFS,
  price,
  priceUpAndInCall,
} from "@crr-pricer/crr-core";
import type { SweepConfig, SweepDefinition, SweepParameter } from "../config/schema";
import { buildRange } from "./ranges";

export type PricingPoint = MarketModel & BarrierContractSpec;

export interface SweepDefaults {
  market: MarketModel;
  contract: BarrierContractSpec;
  options: PricingOptions;
}

export interface SweepSeries {
  label: string;
  prices: number[];   // NaN where the barrier is not a lattice level
}

export interface SweepResult {
  name: string;
  instrument: InstrumentKind;
  parameter: SweepParameter;
  xs: number[];
  series: SweepSeries[];
  skipped: number;
}

export function defaultsFromConfig(cfg: SweepConfig): SweepDefaults {
  return {
    market: { ...cfg.market },
    contract: { ...cfg.contract },
    options: { bound: cfg.pricing.bound, validate: cfg.guards.validateInputs },
  };
}

export function priceInstrument(instrument: InstrumentKind, p: PricingPoint, options: PricingOptions): number {
  switch (instrument) {
    case "call":
    case "put":
      return price({ rate: p.rate, up: p.up, down: p.down }, p.maturity, p.startPrice, p.strike, PAYOFFS[instrument], options);
    case "upAndInCall":
      return priceUpAndInCall(p.rate, p.up, p.down, p.maturity, p.startPrice, p.strike, p.barrier, options);
  }
}

/**
 * Price one instrument over a range of a single parameter, once per series.
 * Points whose barrier sits between lattice levels come back as NaN.
 */
export function runSweep(def: SweepDefinition, defaults: SweepDefaults): SweepResult {
  const xs = buildRange(def.values);
  let skipped = 0;

  const series = def.series.map(({ label, overrides }) => {
    const prices = xs.map((x) => {
      const point: PricingPoint = {
        ...defaults.market,
        ...defaults.contract,
        ...overrides,
        [def.parameter]: x,
      };
      try {
        return priceInstrument(def.instrument, point, defaults.options);
      } catch (err) {
        if (err instanceof BarrierLevelNotFoundError) {
          skipped++;
          return NaN;
        }
        throw err;
      }
    });
    return { label, prices };
  });

  return { name: def.name, instrument: def.instrument, parameter: def.parameter, xs, series, skipped };
}
