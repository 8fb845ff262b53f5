/**
 * Smoothness predicate.
 *
 * A number is smooth with respect to a factor set when every prime in its
 * factorization belongs to the set. 1 has an empty factorization and is
 * treated as not smooth.
 */

import { DEFAULT_ALLOWED_FACTORS } from "@shared/smooth-const";
import { AllowedFactors, Dimension, parseArgument } from "@shared/smooth-schema";

export type AllowedFactorsInput = readonly number[] | ReadonlySet<number>;

export interface FactorSet {
  /** Distinct factors, ascending. */
  factors: readonly number[];
  min: number;
  /** Only prime members can appear in a factorization; composites never match. */
  primes: readonly number[];
}

export function isPrime(n: number): boolean {
  if (!Number.isInteger(n) || n < 2) return false;
  if (n < 4) return true;
  if (n % 2 === 0) return false;
  for (let d = 3; d * d <= n; d += 2) {
    if (n % d === 0) return false;
  }
  return true;
}

export function resolveFactorSet(allowedFactors: AllowedFactorsInput = DEFAULT_ALLOWED_FACTORS): FactorSet {
  const factors = parseArgument(AllowedFactors, Array.from(allowedFactors), "allowedFactors");
  return {
    factors,
    min: factors[0],
    primes: factors.filter(isPrime),
  };
}

const factorizeUnchecked = (n: number): Map<number, number> => {
  const factors = new Map<number, number>();
  let residue = n;
  const divideOut = (p: number) => {
    let exponent = 0;
    while (residue % p === 0) {
      residue /= p;
      exponent += 1;
    }
    if (exponent > 0) factors.set(p, exponent);
  };

  divideOut(2);
  for (let d = 3; d * d <= residue; d += 2) {
    divideOut(d);
  }
  if (residue > 1) factors.set(residue, 1);
  return factors;
};

/**
 * Prime factorization of `n` as prime -> exponent, in ascending prime order.
 * `factorize(1)` is an empty map.
 */
export function factorize(n: number): Map<number, number> {
  return factorizeUnchecked(parseArgument(Dimension, n, "n"));
}

/**
 * Hot-path predicate; `n` must be a positive safe integer. Dividing out the
 * allowed primes leaves 1 exactly when no other prime divides `n`.
 */
export function isSmoothUnchecked(n: number, set: FactorSet): boolean {
  if (n === 1) return false;

  let residue = n;
  for (const p of set.primes) {
    while (residue % p === 0) residue /= p;
    if (residue === 1) return true;
  }
  return false;
}

export function isSmooth(n: number, allowedFactors: AllowedFactorsInput = DEFAULT_ALLOWED_FACTORS): boolean {
  const value = parseArgument(Dimension, n, "n");
  return isSmoothUnchecked(value, resolveFactorSet(allowedFactors));
}
