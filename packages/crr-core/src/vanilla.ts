import type { MarketModel, PricingOptions, TerminalPayoff } from "@crr-pricer/core-types";
import { DEFAULT_SUMMATION_BOUND } from "./constants";
import { assertValid, validateContract, validateMarket } from "./guards";
import { compoundFactor, measureOf } from "./measure";
import { binomialPmf } from "./binomial";
import { enumerateScenarios } from "./scenarios";
import { callPayoff, putPayoff } from "./payoff";

/**
 * Discounted risk-neutral expectation of a terminal payoff on the CRR lattice.
 *
 * With the default exclusive bound the all-ups node (numberUps = maturity)
 * is left out of the sum; pass `{ bound: "inclusive" }` for the full lattice.
 */
export function price(
  market: MarketModel,
  maturity: number,
  startPrice: number,
  strike: number,
  payoff: TerminalPayoff,
  options: PricingOptions = {}
): number {
  if (options.validate) {
    assertValid(validateMarket(market), validateContract({ maturity, startPrice, strike }));
  }
  const { probabilityUp } = measureOf(market);
  const bound = options.bound ?? DEFAULT_SUMMATION_BOUND;

  let expectedValue = 0.0;
  for (const s of enumerateScenarios(market, maturity, startPrice, bound)) {
    expectedValue += binomialPmf(s.numberUps, maturity, probabilityUp) * payoff(s.terminalPrice, strike);
  }
  return expectedValue / compoundFactor(market.rate, maturity);
}

export function priceCall(
  rate: number,
  up: number,
  down: number,
  maturity: number,
  startPrice: number,
  strike: number,
  options?: PricingOptions
): number {
  return price({ rate, up, down }, maturity, startPrice, strike, callPayoff, options);
}

export function pricePut(
  rate: number,
  up: number,
  down: number,
  maturity: number,
  startPrice: number,
  strike: number,
  options?: PricingOptions
): number {
  return price({ rate, up, down }, maturity, startPrice, strike, putPayoff, options);
}
