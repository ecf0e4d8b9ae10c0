import type { ConsistencyReport } from "./types.js";

export const MIN_ANNOTATIONS_FOR_CONSISTENCY = 2;

/** Live annotations, or annotations read back from a report where a NaN confidence became `null`. */
export interface CategorizedRecord {
  readonly category: string;
  readonly confidence: number | null;
}

/**
 * Returns `null` below two annotations; there is nothing to compare yet.
 * Confidences that are not finite numbers are left out of the average, which
 * is 0 when none remain.
 */
export function computeConsistencyReport(annotations: readonly CategorizedRecord[]): ConsistencyReport | null {
  if (annotations.length < MIN_ANNOTATIONS_FOR_CONSISTENCY) return null;

  const distribution = new Map<string, number>();
  let confidenceTotal = 0;
  let confidenceCount = 0;
  for (const annotation of annotations) {
    distribution.set(annotation.category, (distribution.get(annotation.category) ?? 0) + 1);
    if (typeof annotation.confidence === "number" && Number.isFinite(annotation.confidence)) {
      confidenceTotal += annotation.confidence;
      confidenceCount += 1;
    }
  }

  const totalAnnotations = annotations.length;
  return {
    totalAnnotations,
    uniqueCategories: distribution.size,
    averageConfidence: confidenceCount > 0 ? confidenceTotal / confidenceCount : 0,
    categoryDistribution: Object.fromEntries(distribution),
    consistencyScore: (distribution.size / totalAnnotations) * 100
  };
}

export function formatDistribution(distribution: Record<string, number>): string {
  return Object.entries(distribution)
    .map(([category, count]) => `${category}: ${count}`)
    .join(", ");
}
