import type { MarketModel, PathPayoff, PricePath } from "@crr-pricer/core-types";
import { MAX_ENUMERATION_STEPS } from "./constants";
import { InvalidModelParametersError } from "./errors";
import { compoundFactor, measureOf } from "./measure";

/**
 * Every up/down path of length `maturity`, prices from t = 0 to maturity.
 * Exponential in maturity; meant for cross-checking the closed forms.
 */
export function enumeratePaths(maturity: number, startPrice: number, up: number, down: number): PricePath[] {
  if (!Number.isInteger(maturity) || maturity < 0 || maturity > MAX_ENUMERATION_STEPS) {
    throw new InvalidModelParametersError([
      `path enumeration needs an integer maturity in [0, ${MAX_ENUMERATION_STEPS}], got ${maturity}`,
    ]);
  }
  const out: PricePath[] = [];
  for (let mask = 0; mask < 2 ** maturity; mask++) {
    const prices = [startPrice];
    let numberUps = 0;
    let s = startPrice;
    for (let t = 0; t < maturity; t++) {
      if ((mask >> t) & 1) {
        s *= 1.0 + up;
        numberUps++;
      } else {
        s *= 1.0 + down;
      }
      prices.push(s);
    }
    out.push({ numberUps, prices });
  }
  return out;
}

export function priceByPathEnumeration(
  market: MarketModel,
  maturity: number,
  startPrice: number,
  strike: number,
  barrier: number,
  payoff: PathPayoff
): number {
  const { probabilityUp, probabilityDown } = measureOf(market);
  let expectedValue = 0.0;
  for (const path of enumeratePaths(maturity, startPrice, market.up, market.down)) {
    const weight = probabilityUp ** path.numberUps * probabilityDown ** (maturity - path.numberUps);
    expectedValue += weight * payoff(path.prices, strike, barrier);
  }
  return expectedValue / compoundFactor(market.rate, maturity);
}
