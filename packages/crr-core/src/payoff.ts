import type { TerminalPayoff, PathPayoff } from "@crr-pricer/core-types";

export function callPayoff(assetPrice: number, strike: number): number {
  return Math.max(assetPrice - strike, 0);
}

export function putPayoff(assetPrice: number, strike: number): number {
  return Math.max(strike - assetPrice, 0);
}

/** True once any price on the path (t = 0 .. maturity) touches or exceeds the barrier. */
export function barrierCrossed(assetPrices: readonly number[], barrier: number): boolean {
  for (const price of assetPrices) {
    if (price >= barrier) return true;
  }
  return false;
}

/** Up-and-in call on a full price path: call payoff of the last price, if knocked in. */
export const upAndInCallPayoff: PathPayoff = (assetPrices, strike, barrier) => {
  if (assetPrices.length === 0 || !barrierCrossed(assetPrices, barrier)) return 0;
  return callPayoff(assetPrices[assetPrices.length - 1], strike);
};

export const PAYOFFS = {
  call: callPayoff,
  put: putPayoff,
} as const satisfies Record<string, TerminalPayoff>;
