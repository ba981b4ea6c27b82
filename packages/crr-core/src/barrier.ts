import type {
  BarrierLevelResult,
  MarketModel,
  PricingOptions,
  SummationBound,
} from "@crr-pricer/core-types";
import { DEFAULT_SUMMATION_BOUND } from "./constants";
import { BarrierLevelNotFoundError } from "./errors";
import { assertValid, validateBarrierContract, validateMarket } from "./guards";
import { compoundFactor, measureOf } from "./measure";
import { binomialPmf } from "./binomial";
import { scenarioCount, symmetricTerminalPrice } from "./scenarios";
import { callPayoff } from "./payoff";

// Up-and-in call on a lattice with (1+u)(1+d) = 1, priced through the
// reflection principle instead of walking all 2^n paths:
//
//   V = [ Σ_{S_T ≥ B} (S_T - K)^+ P(k)
//       + (p/q)^L (B/S_0)^2 Σ_{S_T < S_0²/B} (S_T - K(1+u)^(-2L))^+ P(k) ] / (1+r)^n
//
// where L is the number of net ups taking S_0 onto B.

/**
 * Number of up-moves L with startPrice·(1+up)^L === barrier, searched over [0, maturity).
 * Only exact lattice levels match.
 */
export function findBarrierLevel(up: number, maturity: number, startPrice: number, barrier: number): BarrierLevelResult {
  const upReturn = 1.0 + up;
  for (let numberUps = 0; numberUps < maturity; numberUps++) {
    if (barrier === startPrice * upReturn ** numberUps) {
      return { kind: "found", level: numberUps };
    }
  }
  return { kind: "not_found" };
}

export function barrierLimit(up: number, maturity: number, startPrice: number, barrier: number): number {
  const res = findBarrierLevel(up, maturity, startPrice, barrier);
  if (res.kind === "not_found") {
    throw new BarrierLevelNotFoundError({ up, maturity, startPrice, barrier });
  }
  return res.level;
}

/** Terminal nodes at or above the barrier: knocked in for sure. */
export function sumAboveBarrier(
  market: MarketModel,
  maturity: number,
  startPrice: number,
  strike: number,
  barrier: number,
  bound: SummationBound = DEFAULT_SUMMATION_BOUND
): number {
  const { probabilityUp } = measureOf(market);
  let sum = 0.0;
  for (let numberUps = 0; numberUps < scenarioCount(maturity, bound); numberUps++) {
    const endPrice = symmetricTerminalPrice(market.up, startPrice, numberUps, maturity);
    if (endPrice >= barrier) {
      sum += callPayoff(endPrice, strike) * binomialPmf(numberUps, maturity, probabilityUp);
    }
  }
  return sum;
}

/** Paths that touched the barrier but finished below it, counted on the reflected lattice. */
export function sumBelowReflectedBarrier(
  market: MarketModel,
  maturity: number,
  startPrice: number,
  strike: number,
  barrier: number,
  bound: SummationBound = DEFAULT_SUMMATION_BOUND
): number {
  const { probabilityUp, probabilityDown } = measureOf(market);
  const upReturn = 1.0 + market.up;
  const limit = barrierLimit(market.up, maturity, startPrice, barrier);
  const reflectedStrike = strike * upReturn ** (-2.0 * limit);
  const reflectedBarrier = (startPrice * startPrice) / barrier;

  let sum = 0.0;
  for (let numberUps = 0; numberUps < scenarioCount(maturity, bound); numberUps++) {
    const endPrice = symmetricTerminalPrice(market.up, startPrice, numberUps, maturity);
    if (endPrice < reflectedBarrier) {
      sum += callPayoff(endPrice, reflectedStrike) * binomialPmf(numberUps, maturity, probabilityUp);
    }
  }
  return (probabilityUp / probabilityDown) ** limit * (barrier / startPrice) ** 2.0 * sum;
}

export function priceUpAndInCall(
  rate: number,
  up: number,
  down: number,
  maturity: number,
  startPrice: number,
  strike: number,
  barrier: number,
  options: PricingOptions = {}
): number {
  const market: MarketModel = { rate, up, down };
  if (options.validate) {
    assertValid(
      validateMarket(market),
      validateBarrierContract(market, { maturity, startPrice, strike, barrier })
    );
  }
  const bound = options.bound ?? DEFAULT_SUMMATION_BOUND;
  const above = sumAboveBarrier(market, maturity, startPrice, strike, barrier, bound);
  const below = sumBelowReflectedBarrier(market, maturity, startPrice, strike, barrier, bound);
  return (above + below) / compoundFactor(rate, maturity);
}
