import { describe, expect, it } from "vitest";
import {
  BOUNDARY_MESSAGE,
  nearestSmooth,
  nearestSmoothValue,
} from "../modules/smooth/nearest-search";
import { isSmooth } from "../modules/smooth/smoothness";
import { InvalidArgumentError } from "@shared/smooth-errors";

describe("nearest smooth search", () => {
  it("finds the next smooth value upward", () => {
    expect(nearestSmooth(123, true)).toEqual({ value: 125 });
    expect(nearestSmoothValue(11)).toBe(12);
    expect(nearestSmoothValue(97)).toBe(98);
    expect(nearestSmoothValue(1001)).toBe(1008);
  });

  it("finds the previous smooth value downward", () => {
    expect(nearestSmooth(123, false)).toEqual({ value: 120 });
    expect(nearestSmoothValue(97, false)).toBe(96);
    expect(nearestSmoothValue(1001, false)).toBe(1000);
  });

  it("honours restricted factor sets", () => {
    expect(nearestSmoothValue(123, false, [2, 3])).toBe(108);
    expect(nearestSmoothValue(123, false, [2])).toBe(64);
    expect(nearestSmoothValue(4, false, [3])).toBe(3);
  });

  it("returns smooth inputs unchanged in both directions", () => {
    expect(nearestSmoothValue(1000, true)).toBe(1000);
    expect(nearestSmoothValue(1000, false)).toBe(1000);
  });

  it("clamps a descending search that runs below the smallest factor", () => {
    const result = nearestSmooth(1, false);
    expect(result.value).toBe(2);
    expect(result.diagnostic).toEqual({
      kind: "boundary",
      input: 1,
      reached: 0,
      clampedTo: 2,
      message: BOUNDARY_MESSAGE,
    });

    const restricted = nearestSmooth(2, false, [3, 5]);
    expect(restricted.value).toBe(3);
    expect(restricted.diagnostic?.clampedTo).toBe(3);
  });

  it("never clamps an ascending search", () => {
    expect(nearestSmooth(1, true)).toEqual({ value: 2 });
    expect(nearestSmooth(1, true, [3, 5])).toEqual({ value: 3 });
  });

  it("is idempotent and lands on smooth values within the gap", () => {
    for (let n = 2; n <= 400; n += 1) {
      for (const ascending of [true, false]) {
        const first = nearestSmoothValue(n, ascending);
        expect(nearestSmoothValue(first, ascending)).toBe(first);
        expect(isSmooth(first)).toBe(true);
        const [lo, hi] = ascending ? [n, first] : [first, n];
        for (let between = lo + 1; between < hi; between += 1) {
          expect(isSmooth(between)).toBe(false);
        }
        if (ascending) expect(first).toBeGreaterThanOrEqual(n);
        else expect(first).toBeLessThanOrEqual(n);
      }
    }
  });

  it("rejects an ascending search over a set without primes", () => {
    expect(() => nearestSmooth(10, true, [4, 9])).toThrow(/contains no prime/);
    expect(nearestSmooth(7, false, [4, 9]).value).toBe(4);
  });

  it("rejects non-positive or fractional dimensions", () => {
    expect(() => nearestSmooth(0)).toThrow(InvalidArgumentError);
    expect(() => nearestSmooth(12.5)).toThrow(InvalidArgumentError);
    expect(() => nearestSmooth(Number.NaN)).toThrow(InvalidArgumentError);
  });
});
