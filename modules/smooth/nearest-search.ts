import { DEFAULT_ALLOWED_FACTORS } from "@shared/smooth-const";
import { InvalidArgumentError } from "@shared/smooth-errors";
import { Dimension, parseArgument } from "@shared/smooth-schema";
import {
  isSmoothUnchecked,
  resolveFactorSet,
  type AllowedFactorsInput,
  type FactorSet,
} from "./smoothness";

export type SearchDirection = "ascending" | "descending";

export const BOUNDARY_MESSAGE =
  "dimension is smaller than the smallest allowed factor and search direction is decreasing";

export type BoundaryDiagnostic = {
  kind: "boundary";
  input: number;
  /** Where the descending walk stopped before clamping (0 when it ran off the bottom). */
  reached: number;
  clampedTo: number;
  message: string;
  /** Position of the element in a batch query. */
  index?: number;
};

export type SearchResult = {
  value: number;
  diagnostic?: BoundaryDiagnostic;
};

export const toDirection = (ascending: boolean): SearchDirection =>
  ascending ? "ascending" : "descending";

/**
 * Walks from `n` one step at a time until a smooth value is found. A descending
 * walk that ends below the smallest allowed factor is clamped to that factor
 * and reported through `diagnostic`; ascending walks never clamp.
 */
export function searchNearest(n: number, ascending: boolean, set: FactorSet): SearchResult {
  if (ascending && set.primes.length === 0) {
    throw new InvalidArgumentError(
      "allowedFactors",
      `[${set.factors.join(", ")}] contains no prime, so no value is smooth`,
    );
  }
  let candidate = n;
  while (candidate >= 1 && !isSmoothUnchecked(candidate, set)) {
    if (ascending) {
      candidate += 1;
      if (!Number.isSafeInteger(candidate)) {
        throw new InvalidArgumentError("n", `ascending search from ${n} left the safe integer range`);
      }
    } else {
      candidate -= 1;
    }
  }

  if (candidate < set.min) {
    return {
      value: set.min,
      diagnostic: {
        kind: "boundary",
        input: n,
        reached: candidate,
        clampedTo: set.min,
        message: BOUNDARY_MESSAGE,
      },
    };
  }
  return { value: candidate };
}

export function nearestSmooth(
  n: number,
  ascending = true,
  allowedFactors: AllowedFactorsInput = DEFAULT_ALLOWED_FACTORS,
): SearchResult {
  const value = parseArgument(Dimension, n, "n");
  return searchNearest(value, ascending, resolveFactorSet(allowedFactors));
}

export function nearestSmoothValue(
  n: number,
  ascending = true,
  allowedFactors: AllowedFactorsInput = DEFAULT_ALLOWED_FACTORS,
): number {
  return nearestSmooth(n, ascending, allowedFactors).value;
}
