import type { SummationBound } from "@crr-pricer/core-types";

// Lattice range used when a caller does not pick one. Exclusive skips the
// all-ups terminal node; switch to 'inclusive' for the textbook CRR sum.
export const DEFAULT_SUMMATION_BOUND: SummationBound = "exclusive";

// |(1+u)(1+d) - 1| allowed by the barrier validator
export const SYMMETRY_TOL = 1e-12;

// Brute-force path pricing visits 2^n paths
export const MAX_ENUMERATION_STEPS = 16;

// Lanczos approximation, g = 7, n = 9
export const LANCZOS_G = 7;
export const LANCZOS_COEFFS = [
  0.99999999999980993,
  676.5203681218851,
  -1259.1392167224028,
  771.32342877765313,
  -176.61502916214059,
  12.507343278686905,
  -0.13857109526572012,
  9.9843695780195716e-6,
  1.5056327351493116e-7,
] as const;
