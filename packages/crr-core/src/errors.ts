export class CrrPricingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised by the opt-in validators; never by the pricing math itself. */
export class InvalidModelParametersError extends CrrPricingError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`Invalid model parameters: ${violations.join("; ")}`);
    this.violations = violations;
  }
}

export interface BarrierSearchInputs {
  up: number;
  maturity: number;
  startPrice: number;
  barrier: number;
}

export class BarrierLevelNotFoundError extends CrrPricingError {
  readonly inputs: BarrierSearchInputs;

  constructor(inputs: BarrierSearchInputs) {
    const { up, maturity, startPrice, barrier } = inputs;
    super(
      `No valid barrier crossing level found for given parameters ` +
      `(up=${up}, maturity=${maturity}, startPrice=${startPrice}, barrier=${barrier})`
    );
    this.inputs = inputs;
  }
}
