/**
 * Closest FFT-friendly dimensions.
 *
 * `closestOptimal` answers a single dimension, `closestOptimalAll` a list of
 * them in order. Boundary clamps are returned with the values and, when an
 * `onDiagnostic` callback is given, passed to it as they happen.
 */

import { DEFAULT_ALLOWED_FACTORS, LOG_TAG } from "@shared/smooth-const";
import { Dimension, Dimensions, parseArgument } from "@shared/smooth-schema";
import { searchNearest, type BoundaryDiagnostic, type SearchResult } from "./nearest-search";
import { resolveFactorSet, type AllowedFactorsInput } from "./smoothness";

export type ClosestOptimalOptions = {
  onDiagnostic?: (diagnostic: BoundaryDiagnostic) => void;
};

export type BatchResult = {
  values: number[];
  diagnostics: BoundaryDiagnostic[];
};

export const reportDiagnostic = (diagnostic: BoundaryDiagnostic): void => {
  console.warn(`${LOG_TAG} ${diagnostic.message}`, {
    input: diagnostic.input,
    clampedTo: diagnostic.clampedTo,
    ...(diagnostic.index !== undefined ? { index: diagnostic.index } : {}),
  });
};

export function closestOptimal(
  n: number,
  ascending = true,
  allowedFactors: AllowedFactorsInput = DEFAULT_ALLOWED_FACTORS,
  options: ClosestOptimalOptions = {},
): SearchResult {
  const value = parseArgument(Dimension, n, "n");
  const result = searchNearest(value, ascending, resolveFactorSet(allowedFactors));
  if (result.diagnostic) options.onDiagnostic?.(result.diagnostic);
  return result;
}

export function closestOptimalAll(
  dims: readonly number[],
  ascending = true,
  allowedFactors: AllowedFactorsInput = DEFAULT_ALLOWED_FACTORS,
  options: ClosestOptimalOptions = {},
): BatchResult {
  const inputs = parseArgument(Dimensions, dims, "dims");
  const set = resolveFactorSet(allowedFactors);
  const values: number[] = [];
  const diagnostics: BoundaryDiagnostic[] = [];

  inputs.forEach((dim, index) => {
    const result = searchNearest(dim, ascending, set);
    values.push(result.value);
    if (result.diagnostic) {
      const diagnostic = { ...result.diagnostic, index };
      diagnostics.push(diagnostic);
      options.onDiagnostic?.(diagnostic);
    }
  });

  return { values, diagnostics };
}
