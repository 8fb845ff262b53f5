import { describe, expect, it } from "vitest";
import {
  buildTable,
  deriveCeiling,
  exponentsForCeiling,
  toExponentEntries,
} from "../modules/table/table-builder";
import { DEFAULT_TABLE_EXPONENTS } from "@shared/smooth-const";
import { InvalidArgumentError } from "@shared/smooth-errors";

describe("smooth-number table builder", () => {
  it("derives the ceiling from the smallest prime power", () => {
    expect(deriveCeiling({ 2: 4, 3: 2 })).toBe(9);
    expect(deriveCeiling(new Map([[2, 5], [3, 3], [5, 2], [7, 2]]))).toBe(25);
    expect(deriveCeiling(DEFAULT_TABLE_EXPONENTS)).toBe(678_223_072_849);
  });

  it("enumerates every product below the ceiling, ascending, without 1", () => {
    expect(buildTable({ 2: 4, 3: 2 })).toEqual([2, 3, 4, 6, 8]);
    expect(buildTable({ 2: 5, 3: 3, 5: 2, 7: 2 })).toEqual([
      2, 3, 4, 5, 6, 7, 8, 9, 10, 12, 14, 15, 16, 18, 20, 21, 24,
    ]);
  });

  it("accepts a lower explicit ceiling", () => {
    expect(buildTable({ 2: 5, 3: 3, 5: 2, 7: 2 }, 11)).toEqual([2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(buildTable({ 2: 1 }, 2)).toEqual([]);
  });

  it("refuses a ceiling above the complete range", () => {
    expect(() => buildTable({ 2: 4, 3: 2 }, 10)).toThrow(InvalidArgumentError);
  });

  it("builds the default table", () => {
    const table = buildTable(DEFAULT_TABLE_EXPONENTS);
    expect(table).toHaveLength(13931);
    expect(table.slice(0, 6)).toEqual([2, 3, 4, 5, 6, 7]);
    expect(table[7999]).toBe(14_224_896_000);
    expect(table[table.length - 1]).toBe(678_140_859_375);
    expect(Object.isFrozen(table)).toBe(true);
    for (let i = 1; i < table.length; i += 1) {
      expect(table[i]).toBeGreaterThan(table[i - 1]);
    }
  });

  it("drops duplicate products from composite factors", () => {
    expect(buildTable({ 2: 3, 4: 2 })).toEqual([2, 4]);
  });

  it("validates exponent maps", () => {
    expect(() => toExponentEntries({})).toThrow(/at least one prime exponent/);
    expect(() => toExponentEntries({ 2: 0 })).toThrow(InvalidArgumentError);
    expect(() => toExponentEntries({ 1: 3 })).toThrow(InvalidArgumentError);
    expect(() => deriveCeiling({ 2: 60 })).toThrow(/safe integer/);
  });

  it("picks exponents that cover a requested ceiling", () => {
    expect(Array.from(exponentsForCeiling([3, 2], 100))).toEqual([
      [2, 7],
      [3, 5],
    ]);
    expect(deriveCeiling(exponentsForCeiling([2, 3, 5, 7], 1000))).toBe(1024);
  });
});
