/**
 * Smooth-size constants (shared).
 *
 * Keeps the CLI, scripts and library on the same defaults.
 */

// Radices with dedicated fast kernels in common FFT libraries (cuFFT, FFTW, pocketfft).
export const DEFAULT_ALLOWED_FACTORS: readonly number[] = Object.freeze([2, 3, 5, 7]);

// ceiling = min(2^40, 3^25, 5^17, 7^14) = 7^14
export const DEFAULT_TABLE_EXPONENTS: Readonly<Record<number, number>> = Object.freeze({
  2: 40,
  3: 25,
  5: 17,
  7: 14,
});

// Entries kept in the persisted table artifact.
export const DEFAULT_TABLE_COUNT = 8000;

export const DEFAULT_TABLE_PATH = "data/smooth-table.json";

export const TABLE_ARTIFACT_KIND = "smooth-table" as const;
export const TABLE_ARTIFACT_VERSION = 1 as const;

export const LOG_TAG = "[smooth-dims]";
