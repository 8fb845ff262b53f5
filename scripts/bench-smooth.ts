import {
  DEFAULT_TABLE_EXPONENTS,
  buildTable,
  closestOptimalAll,
  lookupLarger,
} from "../modules/index";

const QUERY_COUNT = Number(process.env.BENCH_SMOOTH_QUERIES ?? "20000");
const QUERY_MAX = Number(process.env.BENCH_SMOOTH_MAX ?? "1000000");

function benchSearch(queries: number[]): number {
  const start = performance.now();
  closestOptimalAll(queries);
  return performance.now() - start;
}

function benchTable(queries: number[]): { buildMs: number; lookupMs: number; size: number } {
  const buildStart = performance.now();
  const table = buildTable(DEFAULT_TABLE_EXPONENTS);
  const buildMs = performance.now() - buildStart;

  const start = performance.now();
  for (const q of queries) lookupLarger(table, q);
  return { buildMs, lookupMs: performance.now() - start, size: table.length };
}

async function main() {
  if (!Number.isInteger(QUERY_COUNT) || QUERY_COUNT < 1 || !Number.isInteger(QUERY_MAX) || QUERY_MAX < 1) {
    throw new Error("BENCH_SMOOTH_QUERIES and BENCH_SMOOTH_MAX must be positive integers");
  }
  // Evenly spread queries keep runs comparable without a seeded RNG.
  const step = Math.max(1, Math.floor(QUERY_MAX / QUERY_COUNT));
  const queries = Array.from({ length: QUERY_COUNT }, (_, i) => 1 + ((i * step) % QUERY_MAX));

  const search_ms = benchSearch(queries);
  const { buildMs, lookupMs, size } = benchTable(queries);
  console.log(
    JSON.stringify({
      queries: QUERY_COUNT,
      search_ms: Number(search_ms.toFixed(2)),
      table_build_ms: Number(buildMs.toFixed(2)),
      table_lookup_ms: Number(lookupMs.toFixed(2)),
      table_size: size,
    }),
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
