import { describe, expect, it } from "vitest";
import { nearestSmoothValue } from "../modules/smooth/nearest-search";
import { buildTable, deriveCeiling } from "../modules/table/table-builder";
import {
  bisectLeft,
  bisectRight,
  lookup,
  lookupLarger,
  lookupSmaller,
} from "../modules/table/table-lookup";
import { InvalidArgumentError, OutOfRangeError } from "@shared/smooth-errors";

const TABLE = [2, 3, 4, 5, 6, 7, 8, 9, 10, 12, 14, 15, 16, 18, 20, 21, 24];

describe("table lookup", () => {
  it("bisects around equal entries", () => {
    expect(bisectLeft(TABLE, 12)).toBe(9);
    expect(bisectRight(TABLE, 12)).toBe(10);
    expect(bisectLeft(TABLE, 11)).toBe(9);
    expect(bisectRight(TABLE, 11)).toBe(9);
    expect(bisectLeft(TABLE, 1)).toBe(0);
    expect(bisectRight(TABLE, 30)).toBe(TABLE.length);
  });

  it("returns the smallest entry at or above the query", () => {
    expect(lookupLarger(TABLE, 11)).toBe(12);
    expect(lookupLarger(TABLE, 12)).toBe(12);
    expect(lookupLarger(TABLE, 1)).toBe(2);
    expect(lookupLarger(TABLE, 22.5)).toBe(24);
  });

  it("returns the largest entry at or below the query", () => {
    expect(lookupSmaller(TABLE, 11)).toBe(10);
    expect(lookupSmaller(TABLE, 12)).toBe(12);
    expect(lookupSmaller(TABLE, 2)).toBe(2);
    expect(lookupSmaller(TABLE, 100)).toBe(24);
  });

  it("dispatches on direction", () => {
    expect(lookup(TABLE, 17, true)).toBe(18);
    expect(lookup(TABLE, 17, false)).toBe(16);
  });

  it("fails outside the table", () => {
    expect(() => lookupLarger(TABLE, 25)).toThrow(OutOfRangeError);
    expect(() => lookupSmaller(TABLE, 1)).toThrow(OutOfRangeError);
    expect(() => lookupLarger([], 3)).toThrow(/empty table/);

    try {
      lookupLarger(TABLE, 25);
    } catch (error) {
      expect(error).toBeInstanceOf(OutOfRangeError);
      if (error instanceof OutOfRangeError) {
        expect(error.query).toBe(25);
        expect(error.side).toBe("larger");
        expect(error.message).toBe("25 exceeds the largest table entry 24");
      }
    }
  });

  it("rejects non-finite queries", () => {
    expect(() => lookupLarger(TABLE, Number.NaN)).toThrow(InvalidArgumentError);
  });

  it("agrees with the factorization search across the covered range", () => {
    const maxExponents = { 2: 12, 3: 8, 5: 5, 7: 4 };
    const table = buildTable(maxExponents);
    const ceiling = deriveCeiling(maxExponents);
    expect(ceiling).toBe(2401);

    for (let x = 2; x <= table[table.length - 1]; x += 1) {
      expect(lookupLarger(table, x)).toBe(nearestSmoothValue(x, true));
    }
    for (let x = 2; x < ceiling; x += 1) {
      expect(lookupSmaller(table, x)).toBe(nearestSmoothValue(x, false));
    }
  });

  it("agrees with restricted factor sets", () => {
    const table = buildTable({ 2: 10, 3: 7 });
    expect(lookupSmaller(table, 123)).toBe(nearestSmoothValue(123, false, [2, 3]));
    expect(lookupSmaller(table, 123)).toBe(108);
  });
});
