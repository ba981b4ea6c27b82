import type {
  BarrierContractSpec,
  ContractSpec,
  MarketModel,
  ModelValidation,
} from "@crr-pricer/core-types";
import { SYMMETRY_TOL } from "./constants";
import { InvalidModelParametersError } from "./errors";

function finite(errors: string[], values: Record<string, number>): boolean {
  let ok = true;
  for (const [name, value] of Object.entries(values)) {
    if (!Number.isFinite(value)) {
      errors.push(`${name} must be finite, got ${value}`);
      ok = false;
    }
  }
  return ok;
}

export function validateMarket(market: MarketModel): ModelValidation {
  const errors: string[] = [];
  const { rate, up, down } = market;

  if (finite(errors, { rate, up, down })) {
    if (rate <= -1) errors.push(`rate must be > -1, got ${rate}`);
    if (!(down < rate && rate < up)) {
      errors.push(`no-arbitrage requires down < rate < up, got down=${down}, rate=${rate}, up=${up}`);
    }
  }
  return { valid: errors.length === 0, errors };
}

export function validateContract(spec: ContractSpec): ModelValidation {
  const errors: string[] = [];
  const { maturity, startPrice, strike } = spec;

  if (!Number.isInteger(maturity) || maturity <= 0) {
    errors.push(`maturity must be a positive integer, got ${maturity}`);
  }
  if (finite(errors, { startPrice, strike })) {
    if (startPrice <= 0) errors.push(`startPrice must be > 0, got ${startPrice}`);
    if (strike <= 0) errors.push(`strike must be > 0, got ${strike}`);
  }
  return { valid: errors.length === 0, errors };
}

/** Contract checks plus the barrier level and the (1+u)(1+d) = 1 lattice the reflection identity needs. */
export function validateBarrierContract(market: MarketModel, spec: BarrierContractSpec): ModelValidation {
  const { errors } = validateContract(spec);
  const { barrier, strike } = spec;

  if (finite(errors, { barrier })) {
    if (barrier <= strike) errors.push(`barrier must be > strike, got barrier=${barrier}, strike=${strike}`);
  }
  const drift = (1 + market.up) * (1 + market.down) - 1;
  if (!(Math.abs(drift) <= SYMMETRY_TOL)) {
    errors.push(`barrier pricing requires (1+up)(1+down) = 1, got ${1 + drift}`);
  }
  return { valid: errors.length === 0, errors };
}

export function assertValid(...checks: ModelValidation[]): void {
  const errors = checks.flatMap((c) => c.errors);
  if (errors.length > 0) throw new InvalidModelParametersError(errors);
}
