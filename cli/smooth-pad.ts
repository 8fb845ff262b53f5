#!/usr/bin/env -S tsx

import { pathToFileURL } from "node:url";
import { smoothConfig, parseIntegerList, type SmoothConfig } from "../config/env";
import {
  ResolverRegistry,
  closestOptimalAll,
  createFactorizationResolver,
  createTableResolver,
  deriveCeiling,
  exponentsForCeiling,
  loadTableArtifact,
  reportDiagnostic,
  toDirection,
  type BoundaryDiagnostic,
  type SearchDirection,
  type TableSource,
} from "../modules/index";
import { DEFAULT_TABLE_EXPONENTS, LOG_TAG } from "@shared/smooth-const";
import { InvalidArgumentError, SmoothDimsError } from "@shared/smooth-errors";

export type SmoothPadArgs = {
  dims: number[];
  ascending: boolean;
  factors?: number[];
  table: boolean;
  json: boolean;
  help: boolean;
};

export type SmoothPadReport = {
  direction: SearchDirection;
  allowedFactors: number[];
  resolver: "factorization" | "table";
  results: Array<{ input: number; value: number }>;
  diagnostics: BoundaryDiagnostic[];
};

export const USAGE =
  "Usage: smooth-pad <dim> [<dim> ...] [--down] [--factors 2,3,5,7] [--table] [--json]";

export function parseArgs(argv: string[]): SmoothPadArgs {
  const parsed: SmoothPadArgs = { dims: [], ascending: true, table: false, json: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "--down" || token === "--descending") {
      parsed.ascending = false;
    } else if (token === "--up" || token === "--ascending") {
      parsed.ascending = true;
    } else if (token === "--table") {
      parsed.table = true;
    } else if (token === "--json") {
      parsed.json = true;
    } else if (token === "--help" || token === "-h") {
      parsed.help = true;
    } else if (token === "--factors") {
      const factors = parseIntegerList(argv[i + 1]);
      if (!factors) {
        throw new InvalidArgumentError("--factors", "expected a comma-separated list of integers");
      }
      parsed.factors = factors;
      i += 1;
    } else if (token.startsWith("--")) {
      throw new InvalidArgumentError(token, "unknown option");
    } else {
      const dims = parseIntegerList(token);
      if (!dims) {
        throw new InvalidArgumentError("dims", `expected integers, got ${token}`);
      }
      parsed.dims.push(...dims);
    }
  }

  return parsed;
}

const sameFactors = (a: readonly number[], b: readonly number[]): boolean => {
  const left = Array.from(new Set(a)).sort((x, y) => x - y);
  const right = Array.from(new Set(b)).sort((x, y) => x - y);
  return left.length === right.length && left.every((value, i) => value === right[i]);
};

async function loadTableSource(factors: number[], config: SmoothConfig): Promise<TableSource> {
  try {
    const artifact = await loadTableArtifact(config.tablePath);
    if (sameFactors(artifact.allowedFactors, factors)) {
      return { kind: "table", table: artifact.values };
    }
    console.warn(`${LOG_TAG} table artifact uses other factors; rebuilding in memory`, {
      path: config.tablePath,
      artifactFactors: artifact.allowedFactors,
      requested: factors,
    });
  } catch (error) {
    if (error instanceof SmoothDimsError) throw error;
    console.warn(`${LOG_TAG} table artifact unavailable; rebuilding in memory`, {
      path: config.tablePath,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  const maxExponents = exponentsForCeiling(factors, deriveCeiling(DEFAULT_TABLE_EXPONENTS));
  return { kind: "exponents", maxExponents };
}

export async function runSmoothPad(
  args: SmoothPadArgs,
  config: SmoothConfig = smoothConfig,
): Promise<SmoothPadReport> {
  if (args.dims.length === 0) {
    throw new InvalidArgumentError("dims", "at least one dimension is required");
  }
  const allowedFactors = args.factors ?? config.allowedFactors;
  const onDiagnostic = config.warnBoundary ? reportDiagnostic : undefined;

  if (!args.table) {
    const { values, diagnostics } = closestOptimalAll(args.dims, args.ascending, allowedFactors, {
      onDiagnostic,
    });
    return {
      direction: toDirection(args.ascending),
      allowedFactors,
      resolver: "factorization",
      results: args.dims.map((input, i) => ({ input, value: values[i] })),
      diagnostics,
    };
  }

  const registry = new ResolverRegistry();
  registry.register(createFactorizationResolver(allowedFactors));
  registry.register(
    createTableResolver({
      source: await loadTableSource(allowedFactors, config),
      fallback: "factorization",
    }),
  );

  const diagnostics: BoundaryDiagnostic[] = [];
  const results = args.dims.map((input, index) => {
    const result = registry.resolve("table", input, args.ascending);
    if (result.diagnostic) {
      const diagnostic = { ...result.diagnostic, index };
      diagnostics.push(diagnostic);
      onDiagnostic?.(diagnostic);
    }
    return { input, value: result.value };
  });
  registry.cleanup();

  return {
    direction: toDirection(args.ascending),
    allowedFactors,
    resolver: "table",
    results,
    diagnostics,
  };
}

export const formatReport = (report: SmoothPadReport, json: boolean): string => {
  if (json) return JSON.stringify(report, null, 2);
  const width = Math.max(...report.results.map(({ input }) => String(input).length));
  return report.results
    .map(({ input, value }) => `${String(input).padStart(width)} -> ${value}`)
    .join("\n");
};

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }
  const report = await runSmoothPad(args);
  console.log(formatReport(report, args.json));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    if (err instanceof SmoothDimsError) {
      console.error(`${err.name}: ${err.message}`);
      console.error(USAGE);
    } else {
      console.error(err);
    }
    process.exit(1);
  });
}
