import { z } from "zod";
import { TABLE_ARTIFACT_KIND, TABLE_ARTIFACT_VERSION } from "./smooth-const";
import { InvalidArgumentError } from "./smooth-errors";

export const Dimension = z.number().int().safe().positive();

export const Factor = z.number().int().safe().min(2);

export const AllowedFactors = z
  .array(Factor)
  .min(1, "at least one allowed factor is required")
  .transform((factors) => Array.from(new Set(factors)).sort((a, b) => a - b));
export type TAllowedFactors = z.infer<typeof AllowedFactors>;

export const Dimensions = z.array(Dimension);

export const ExponentEntries = z
  .array(z.tuple([Factor, z.number().int().positive()]))
  .min(1, "at least one prime exponent is required")
  .superRefine((entries, ctx) => {
    const seen = new Set<number>();
    for (const [factor] of entries) {
      if (seen.has(factor)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate factor ${factor}` });
      }
      seen.add(factor);
    }
  });
export type TExponentEntries = z.infer<typeof ExponentEntries>;

export const Ceiling = z.number().int().safe().min(2);

export const TableArtifact = z
  .object({
    kind: z.literal(TABLE_ARTIFACT_KIND),
    version: z.literal(TABLE_ARTIFACT_VERSION),
    allowedFactors: AllowedFactors,
    ceiling: Ceiling,
    count: z.number().int().nonnegative(),
    values: z.array(Dimension),
  })
  .superRefine((artifact, ctx) => {
    if (artifact.values.length !== artifact.count) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["count"],
        message: `count ${artifact.count} does not match ${artifact.values.length} values`,
      });
    }
    for (let i = 0; i < artifact.values.length; i += 1) {
      const value = artifact.values[i];
      if (i > 0 && value <= artifact.values[i - 1]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["values", i],
          message: `values must be strictly increasing (${artifact.values[i - 1]} then ${value})`,
        });
        return;
      }
      if (value >= artifact.ceiling) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["values", i],
          message: `value ${value} is not below ceiling ${artifact.ceiling}`,
        });
        return;
      }
    }
  });
export type TTableArtifact = z.infer<typeof TableArtifact>;

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

export function parseArgument<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  argument: string,
): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(argument, formatIssues(parsed.error));
  }
  return parsed.data;
}
