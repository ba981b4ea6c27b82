import type { MarketModel, RiskNeutralMeasure } from "@crr-pricer/core-types";

/**
 * Risk-neutral (martingale) measure of a one-step CRR model.
 *
 * Requires down < rate < up for both probabilities to land in (0,1).
 * Nothing here checks that: out-of-range inputs return the formula's value
 * as is. Use `validateMarket` from ./guards when the inputs are untrusted.
 */
export function deriveMeasure(rate: number, up: number, down: number): RiskNeutralMeasure {
  const probabilityUp = (rate - down) / (up - down);
  return { probabilityUp, probabilityDown: 1.0 - probabilityUp };
}

export function measureOf(market: MarketModel): RiskNeutralMeasure {
  return deriveMeasure(market.rate, market.up, market.down);
}

/** Discount factor over `maturity` steps: (1+r)^n */
export function compoundFactor(rate: number, maturity: number): number {
  return (1.0 + rate) ** maturity;
}
