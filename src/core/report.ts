import { parseJsonWithSchema, reportSchema, type ParsedReport } from "./schemas.js";
import type { Annotation, AnnotationReport, ComparisonResult, QualityResult, ReportSummary } from "./types.js";

export const DEFAULT_REPORT_FILE = "annotation_report.json";

export interface ReportSource {
  annotations: readonly Annotation[];
  qualityScores: readonly QualityResult[];
  comparisons: readonly ComparisonResult[];
}

export function averageQualityPercentage(qualityScores: readonly QualityResult[]): number | null {
  if (!qualityScores.length) return null;
  const total = qualityScores.reduce((sum, result) => sum + result.percentage, 0);
  return total / qualityScores.length;
}

export function formatPercentage(value: number, fractionDigits = 2): string {
  return `${value.toFixed(fractionDigits)}%`;
}

export function buildReport(source: ReportSource, generatedAt: string): AnnotationReport {
  const summary: ReportSummary = {
    totalAnnotations: source.annotations.length,
    totalQualityChecks: source.qualityScores.length,
    totalComparisons: source.comparisons.length,
    generatedAt
  };

  const average = averageQualityPercentage(source.qualityScores);
  if (average !== null) {
    summary.averageQualityScore = formatPercentage(average);
  }

  return {
    summary,
    annotations: [...source.annotations],
    qualityScores: [...source.qualityScores],
    comparisons: [...source.comparisons]
  };
}

export function serializeReport(report: AnnotationReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export function parseReport(raw: string): ParsedReport {
  return parseJsonWithSchema(raw, reportSchema, "Annotation report");
}
