import { describe, expect, it } from "vitest";
import { parseIntegerList, resolveSmoothConfig } from "../config/env";

describe("smooth config", () => {
  it("falls back to defaults", () => {
    expect(resolveSmoothConfig({})).toEqual({
      allowedFactors: [2, 3, 5, 7],
      tablePath: "data/smooth-table.json",
      tableCount: 8000,
      warnBoundary: true,
    });
  });

  it("reads overrides from the environment", () => {
    expect(
      resolveSmoothConfig({
        SMOOTH_ALLOWED_FACTORS: " 2, 3 ",
        SMOOTH_TABLE_PATH: " /tmp/table.json ",
        SMOOTH_TABLE_COUNT: "500",
        SMOOTH_WARN_BOUNDARY: "off",
      }),
    ).toEqual({
      allowedFactors: [2, 3],
      tablePath: "/tmp/table.json",
      tableCount: 500,
      warnBoundary: false,
    });
  });

  it("ignores malformed values", () => {
    const config = resolveSmoothConfig({
      SMOOTH_ALLOWED_FACTORS: "2,x",
      SMOOTH_TABLE_COUNT: "-4",
      SMOOTH_WARN_BOUNDARY: "maybe",
    });
    expect(config.allowedFactors).toEqual([2, 3, 5, 7]);
    expect(config.tableCount).toBe(8000);
    expect(config.warnBoundary).toBe(true);
  });

  it("parses integer lists", () => {
    expect(parseIntegerList("123,23, 615")).toEqual([123, 23, 615]);
    expect(parseIntegerList("")).toBeNull();
    expect(parseIntegerList(undefined)).toBeNull();
    expect(parseIntegerList("1.5")).toBeNull();
  });
});
