import type { MarketModel, Scenario, SummationBound } from "@crr-pricer/core-types";
import { DEFAULT_SUMMATION_BOUND } from "./constants";

/** Number of terminal nodes a sum visits: maturity (exclusive) or maturity + 1 (inclusive). */
export function scenarioCount(maturity: number, bound: SummationBound = DEFAULT_SUMMATION_BOUND): number {
  return bound === "inclusive" ? maturity + 1 : maturity;
}

export function terminalPrice(market: MarketModel, startPrice: number, numberUps: number, maturity: number): number {
  const numberDowns = maturity - numberUps;
  return startPrice * (1.0 + market.up) ** numberUps * (1.0 + market.down) ** numberDowns;
}

// Lattice with (1+u)(1+d) = 1: every down cancels one up.
export function symmetricTerminalPrice(up: number, startPrice: number, numberUps: number, maturity: number): number {
  return startPrice * (1.0 + up) ** (2.0 * numberUps - maturity);
}

export function enumerateScenarios(
  market: MarketModel,
  maturity: number,
  startPrice: number,
  bound: SummationBound = DEFAULT_SUMMATION_BOUND
): Scenario[] {
  const out: Scenario[] = [];
  for (let numberUps = 0; numberUps < scenarioCount(maturity, bound); numberUps++) {
    out.push({
      numberUps,
      numberDowns: maturity - numberUps,
      terminalPrice: terminalPrice(market, startPrice, numberUps, maturity),
    });
  }
  return out;
}
