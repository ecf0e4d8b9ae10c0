import type { Annotation } from "./annotation.js";
import type { ComparisonResult } from "./comparison.js";
import type { QualityResult } from "./quality.js";

export interface ReportSummary {
  totalAnnotations: number;
  totalQualityChecks: number;
  totalComparisons: number;
  generatedAt: string;
  /** Mean quality percentage, e.g. `"88.89%"`. Absent when no checks ran. */
  averageQualityScore?: string;
}

export interface AnnotationReport {
  summary: ReportSummary;
  annotations: Annotation[];
  qualityScores: QualityResult[];
  comparisons: ComparisonResult[];
}

export interface ConsistencyReport {
  totalAnnotations: number;
  uniqueCategories: number;
  averageConfidence: number;
  categoryDistribution: Record<string, number>;
  /** Distinct categories over total annotations, times 100. Measures diversity, not agreement. */
  consistencyScore: number;
}
