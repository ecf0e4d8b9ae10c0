import { z } from "zod";

import { UserInputError } from "./errors.js";

const winnerSchema = z.enum(["A", "B", "Tie"]);

export const annotationSchema = z.object({
  image_id: z.string(),
  category: z.string(),
  // JSON has no NaN or Infinity; a permissive session writes those as null
  confidence: z.number().nullable(),
  timestamp: z.string(),
  notes: z.string()
});

export const qualityResultSchema = z.object({
  data_entry: z.record(z.unknown()),
  score: z.number().int(),
  max_score: z.number().int(),
  percentage: z.number(),
  feedback: z.array(z.string()),
  timestamp: z.string()
});

export const comparisonResultSchema = z.object({
  item_a: z.unknown(),
  item_b: z.unknown(),
  criterion: z.string(),
  winner: winnerSchema,
  timestamp: z.string()
});

export const reportSchema = z.object({
  summary: z.object({
    totalAnnotations: z.number().int().nonnegative(),
    totalQualityChecks: z.number().int().nonnegative(),
    totalComparisons: z.number().int().nonnegative(),
    generatedAt: z.string(),
    averageQualityScore: z.string().regex(/^\d+\.\d{2}%$/).optional()
  }),
  annotations: z.array(annotationSchema),
  qualityScores: z.array(qualityResultSchema),
  comparisons: z.array(comparisonResultSchema)
});

export type ParsedReport = z.infer<typeof reportSchema>;

/** Opt-in checks for strict sessions. The default session accepts anything the types allow. */
export const strictAnnotationInputSchema = z.object({
  imageId: z.string().trim().min(1, "image id must not be empty"),
  category: z.string().trim().min(1, "category must not be empty"),
  confidence: z.number().int("confidence must be an integer").min(1).max(5),
  notes: z.string()
});

export const annotationBatchSchema = z
  .array(
    z.object({
      id: z.string(),
      category: z.string(),
      confidence: z.number(),
      notes: z.string().optional()
    })
  )
  .min(1);

export type AnnotationBatch = z.infer<typeof annotationBatchSchema>;

export const packageManifestSchema = z.object({
  version: z.string()
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** JSON.parse followed by schema validation; both failures surface as user input errors naming `label`. */
export function parseJsonWithSchema<T>(raw: string, schema: z.ZodType<T>, label: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UserInputError(`${label} is not valid JSON: ${reason}`, { cause: error });
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    throw new UserInputError(`${label} has an unexpected shape: ${describeIssues(validated.error)}`, {
      cause: validated.error
    });
  }
  return validated.data;
}
