import path from "node:path";
import { pathToFileURL } from "node:url";
import { smoothConfig } from "../config/env";
import {
  buildTable,
  createTableArtifact,
  deriveCeiling,
  toExponentEntries,
  writeTableArtifact,
  type MaxExponentsInput,
} from "../modules/index";
import { DEFAULT_TABLE_EXPONENTS, LOG_TAG } from "@shared/smooth-const";
import { InvalidArgumentError } from "@shared/smooth-errors";
import type { TTableArtifact } from "@shared/smooth-schema";

export type BuildTableArgs = {
  out: string;
  count: number;
  maxExponents: MaxExponentsInput;
};

// "2:40,3:25" -> Map { 2 => 40, 3 => 25 }
export function parseExponents(value: string): Map<number, number> {
  const exponents = new Map<number, number>();
  for (const entry of value.split(",").map((part) => part.trim()).filter(Boolean)) {
    const [factor, exponent] = entry.split(":").map((part) => Number(part.trim()));
    if (!Number.isInteger(factor) || !Number.isInteger(exponent)) {
      throw new InvalidArgumentError("--exponents", `expected <factor>:<exponent>, got ${entry}`);
    }
    exponents.set(factor, exponent);
  }
  return exponents;
}

export function parseArgs(argv: string[]): BuildTableArgs {
  const args: BuildTableArgs = {
    out: smoothConfig.tablePath,
    count: smoothConfig.tableCount,
    maxExponents: DEFAULT_TABLE_EXPONENTS,
  };
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const next = argv[i + 1];
    if (token === "--out" && next) {
      args.out = next;
      i += 1;
    } else if (token === "--count" && next) {
      args.count = Number.parseInt(next, 10);
      i += 1;
    } else if (token === "--exponents" && next) {
      args.maxExponents = parseExponents(next);
      i += 1;
    } else {
      throw new InvalidArgumentError(token, "unknown or incomplete option");
    }
  }
  return args;
}

export function buildArtifact(args: Omit<BuildTableArgs, "out">): TTableArtifact {
  const ceiling = deriveCeiling(args.maxExponents);
  const table = buildTable(args.maxExponents, ceiling);
  const allowedFactors = toExponentEntries(args.maxExponents).map(([factor]) => factor);
  return createTableArtifact(table, { ceiling, count: args.count, allowedFactors });
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const artifact = buildArtifact(args);
  const outPath = path.resolve(process.cwd(), args.out);
  await writeTableArtifact(outPath, artifact);
  console.log(
    `${LOG_TAG} wrote ${artifact.count} entries below ${artifact.ceiling} over [${artifact.allowedFactors.join(", ")}] to ${path.relative(process.cwd(), outPath)}`,
  );
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
