export type InstrumentKind = 'call' | 'put' | 'upAndInCall';

/**
 * Which lattice nodes a pricing sum visits.
 *  - exclusive: numberUps in [0, maturity), the all-ups node is skipped
 *  - inclusive: numberUps in [0, maturity], the textbook CRR range
 */
export type SummationBound = 'exclusive' | 'inclusive';

export interface MarketModel {
  rate: number;  // riskless rate per step, > -1
  up: number;    // up return per step, > rate
  down: number;  // down return per step, < rate
}

export interface RiskNeutralMeasure {
  probabilityUp: number;
  probabilityDown: number;
}

export interface ContractSpec {
  maturity: number;    // number of steps, positive integer
  startPrice: number;
  strike: number;
}

export interface BarrierContractSpec extends ContractSpec {
  barrier: number;     // > strike
}

export interface Scenario {
  numberUps: number;
  numberDowns: number;
  terminalPrice: number;
}

export interface PricingOptions {
  bound?: SummationBound;
  validate?: boolean;
}

export type BarrierLevelResult =
  | { kind: 'found'; level: number }
  | { kind: 'not_found' };

export interface PricePath {
  numberUps: number;
  prices: number[];    // t = 0 .. maturity
}

export type TerminalPayoff = (assetPrice: number, strike: number) => number;
export type PathPayoff = (assetPrices: readonly number[], strike: number, barrier: number) => number;

export interface ModelValidation {
  valid: boolean;
  errors: string[];
}
