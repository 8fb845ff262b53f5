import { InvalidArgumentError, OutOfRangeError } from "@shared/smooth-errors";
import type { SmoothTable } from "./table-builder";

const assertQuery = (x: number) => {
  if (!Number.isFinite(x)) {
    throw new InvalidArgumentError("x", `expected a finite number, got ${x}`);
  }
};

/** First index whose entry is >= x. */
export function bisectLeft(table: SmoothTable, x: number): number {
  let lo = 0;
  let hi = table.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (table[mid] < x) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** First index whose entry is > x. */
export function bisectRight(table: SmoothTable, x: number): number {
  let lo = 0;
  let hi = table.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (x < table[mid]) hi = mid;
    else lo = mid + 1;
  }
  return lo;
}

/** Smallest entry >= x. */
export function lookupLarger(table: SmoothTable, x: number): number {
  assertQuery(x);
  const index = bisectLeft(table, x);
  if (index >= table.length) {
    throw new OutOfRangeError(
      x,
      "larger",
      table.length
        ? `${x} exceeds the largest table entry ${table[table.length - 1]}`
        : `${x} cannot be looked up in an empty table`,
    );
  }
  return table[index];
}

/** Largest entry <= x. */
export function lookupSmaller(table: SmoothTable, x: number): number {
  assertQuery(x);
  const index = bisectRight(table, x);
  if (index === 0) {
    throw new OutOfRangeError(
      x,
      "smaller",
      table.length
        ? `${x} is below the smallest table entry ${table[0]}`
        : `${x} cannot be looked up in an empty table`,
    );
  }
  return table[index - 1];
}

export const lookup = (table: SmoothTable, x: number, ascending: boolean): number =>
  ascending ? lookupLarger(table, x) : lookupSmaller(table, x);
