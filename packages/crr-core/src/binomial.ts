import { LANCZOS_COEFFS, LANCZOS_G } from "./constants";

/** ln Γ(x) via Lanczos (g=7, n=9), reflection for x < 0.5 */
export function lnGamma(x: number): number {
  if (x < 0.5) {
    // Γ(x)Γ(1-x) = π / sin(πx)
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * x))) - lnGamma(1 - x);
  }
  const z = x - 1;
  let a: number = LANCZOS_COEFFS[0];
  const t = z + LANCZOS_G + 0.5;
  for (let i = 1; i < LANCZOS_COEFFS.length; i++) {
    a += LANCZOS_COEFFS[i] / (z + i);
  }
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(a);
}

/** ln C(n, k); -Infinity outside 0 <= k <= n */
export function lnChoose(n: number, k: number): number {
  if (k < 0 || k > n) return -Infinity;
  if (k === 0 || k === n) return 0;
  return lnGamma(n + 1) - lnGamma(k + 1) - lnGamma(n - k + 1);
}

/**
 * Binomial probability mass C(n,k) p^k (1-p)^(n-k).
 *
 * Works in log space for p in (0,1) so that n in the hundreds does not
 * overflow the binomial coefficient. For p outside [0,1] the same formula is
 * evaluated directly; the result is defined but carries no probabilistic meaning.
 */
export function binomialPmf(k: number, n: number, p: number): number {
  if (!Number.isInteger(k) || k < 0 || k > n) return 0;
  if (p === 0) return k === 0 ? 1 : 0;
  if (p === 1) return k === n ? 1 : 0;

  const logC = lnChoose(n, k);
  if (p > 0 && p < 1) {
    return Math.exp(logC + k * Math.log(p) + (n - k) * Math.log1p(-p));
  }
  return Math.exp(logC) * p ** k * (1 - p) ** (n - k);
}
