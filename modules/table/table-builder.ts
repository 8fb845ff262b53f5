/**
 * Smooth-number table.
 *
 * Enumerates every product of the configured prime powers below a ceiling.
 * The default ceiling is the smallest configured prime power, which is the
 * largest bound below which the enumeration is guaranteed complete.
 */

import { InvalidArgumentError } from "@shared/smooth-errors";
import {
  AllowedFactors,
  Ceiling,
  ExponentEntries,
  parseArgument,
  type TExponentEntries,
} from "@shared/smooth-schema";

export type SmoothTable = readonly number[];

export type MaxExponentsInput = Readonly<Record<number, number>> | ReadonlyMap<number, number>;

const isExponentMap = (input: MaxExponentsInput): input is ReadonlyMap<number, number> =>
  input instanceof Map;

export function toExponentEntries(maxExponents: MaxExponentsInput): TExponentEntries {
  const raw = isExponentMap(maxExponents)
    ? Array.from(maxExponents.entries())
    : Object.entries(maxExponents).map(([factor, exponent]) => [Number(factor), exponent]);
  return parseArgument(ExponentEntries, raw, "maxExponents");
}

const ceilingOf = (entries: TExponentEntries): number => {
  let ceiling = Number.POSITIVE_INFINITY;
  for (const [factor, exponent] of entries) {
    ceiling = Math.min(ceiling, factor ** exponent);
  }
  if (!Number.isSafeInteger(ceiling)) {
    throw new InvalidArgumentError("maxExponents", `ceiling ${ceiling} exceeds the safe integer range`);
  }
  return ceiling;
};

export function deriveCeiling(maxExponents: MaxExponentsInput): number {
  return ceilingOf(toExponentEntries(maxExponents));
}

/** Per-factor exponents whose smallest prime power reaches at least `ceiling`. */
export function exponentsForCeiling(factors: readonly number[], ceiling: number): Map<number, number> {
  const bound = parseArgument(Ceiling, ceiling, "ceiling");
  const exponents = new Map<number, number>();
  for (const factor of parseArgument(AllowedFactors, Array.from(factors), "factors")) {
    let exponent = 1;
    let power = factor;
    while (power < bound) {
      power *= factor;
      exponent += 1;
    }
    exponents.set(factor, exponent);
  }
  return exponents;
}

/**
 * Ascending, duplicate-free products `prod(p_i ** e_i)` with `0 <= e_i <= max_i`
 * that fall strictly below `ceiling`. 1 is left out.
 */
export function buildTable(maxExponents: MaxExponentsInput, ceiling?: number): SmoothTable {
  const entries = toExponentEntries(maxExponents);
  const complete = ceilingOf(entries);
  const bound = ceiling === undefined ? complete : parseArgument(Ceiling, ceiling, "ceiling");
  if (bound > complete) {
    throw new InvalidArgumentError(
      "ceiling",
      `${bound} exceeds ${complete}; products above the smallest prime power are not enumerated`,
    );
  }

  const products = new Set<number>();
  const walk = (depth: number, product: number) => {
    if (depth === entries.length) {
      products.add(product);
      return;
    }
    const [factor, maxExponent] = entries[depth];
    let value = product;
    for (let exponent = 0; exponent <= maxExponent && value < bound; exponent += 1) {
      walk(depth + 1, value);
      value *= factor;
    }
  };
  walk(0, 1);

  products.delete(1);
  return Object.freeze(Array.from(products).sort((a, b) => a - b));
}
