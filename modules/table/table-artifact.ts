/**
 * Persisted table prefix.
 *
 * The artifact stores the first `count` entries of the canonical table as a
 * JSON document so lookups can start without rebuilding the table.
 */

import fs from "node:fs/promises";
import path from "node:path";
import {
  DEFAULT_ALLOWED_FACTORS,
  DEFAULT_TABLE_COUNT,
  TABLE_ARTIFACT_KIND,
  TABLE_ARTIFACT_VERSION,
} from "@shared/smooth-const";
import { InvalidArgumentError } from "@shared/smooth-errors";
import { TableArtifact, parseArgument, type TTableArtifact } from "@shared/smooth-schema";
import { isSmoothUnchecked, resolveFactorSet, type AllowedFactorsInput } from "../smooth/smoothness";
import type { SmoothTable } from "./table-builder";

export type TableArtifactOptions = {
  ceiling: number;
  count?: number;
  allowedFactors?: AllowedFactorsInput;
};

export function createTableArtifact(table: SmoothTable, options: TableArtifactOptions): TTableArtifact {
  const count = options.count ?? DEFAULT_TABLE_COUNT;
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError("count", `expected a non-negative integer, got ${count}`);
  }
  const values = table.slice(0, count);
  return validateArtifact({
    kind: TABLE_ARTIFACT_KIND,
    version: TABLE_ARTIFACT_VERSION,
    allowedFactors: Array.from(options.allowedFactors ?? DEFAULT_ALLOWED_FACTORS),
    ceiling: options.ceiling,
    count: values.length,
    values,
  });
}

const validateArtifact = (input: unknown): TTableArtifact => {
  const artifact = parseArgument(TableArtifact, input, "artifact");
  const set = resolveFactorSet(artifact.allowedFactors);
  const stray = artifact.values.find((value) => !isSmoothUnchecked(value, set));
  if (stray !== undefined) {
    throw new InvalidArgumentError(
      "artifact",
      `values.${artifact.values.indexOf(stray)}: ${stray} is not smooth over [${set.factors.join(", ")}]`,
    );
  }
  return artifact;
};

export const serializeTableArtifact = (artifact: TTableArtifact): string =>
  `${JSON.stringify(artifact, null, 2)}\n`;

export function parseTableArtifact(text: string): TTableArtifact {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentError("artifact", `not valid JSON (${reason})`);
  }
  return validateArtifact(payload);
}

export async function loadTableArtifact(filePath: string): Promise<TTableArtifact> {
  const src = await fs.readFile(filePath, "utf8");
  return parseTableArtifact(src);
}

export async function writeTableArtifact(filePath: string, artifact: TTableArtifact): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeTableArtifact(artifact), "utf8");
}
