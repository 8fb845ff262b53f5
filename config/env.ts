// Environment switches for the command-line surfaces; the library itself reads no environment
import {
  DEFAULT_ALLOWED_FACTORS,
  DEFAULT_TABLE_COUNT,
  DEFAULT_TABLE_PATH,
} from "@shared/smooth-const";

export type SmoothConfig = {
  allowedFactors: number[];
  tablePath: string;
  tableCount: number;
  warnBoundary: boolean;
};

const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

export const parseIntegerList = (value: string | undefined): number[] | null => {
  if (!value?.trim()) return null;
  const entries = value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => Number(entry));
  return entries.length > 0 && entries.every(Number.isInteger) ? entries : null;
};

const parseCount = (value: string | undefined, defaultValue: number): number => {
  if (!value?.trim()) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return defaultValue;
  return parsed;
};

export const resolveSmoothConfig = (env: NodeJS.ProcessEnv): SmoothConfig => ({
  allowedFactors: parseIntegerList(env.SMOOTH_ALLOWED_FACTORS) ?? [...DEFAULT_ALLOWED_FACTORS],
  tablePath: env.SMOOTH_TABLE_PATH?.trim() ? env.SMOOTH_TABLE_PATH.trim() : DEFAULT_TABLE_PATH,
  tableCount: parseCount(env.SMOOTH_TABLE_COUNT, DEFAULT_TABLE_COUNT),
  warnBoundary: flagEnabled(env.SMOOTH_WARN_BOUNDARY, true),
});

export const smoothConfig = resolveSmoothConfig(process.env);
