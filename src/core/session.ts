import { computeConsistencyReport, formatDistribution } from "./consistency.js";
import { toCsv } from "./csv.js";
import { ExportError, ReportWriteError, UserInputError } from "./errors.js";
import { randomOutcomeSource, type OutcomeSource } from "./outcomes.js";
import { evaluateCriteria } from "./quality.js";
import { DEFAULT_REPORT_FILE, buildReport, serializeReport } from "./report.js";
import { describeIssues, strictAnnotationInputSchema } from "./schemas.js";
import { clackSessionLogger, type SessionLogger } from "./session-logger.js";
import type {
  Annotation,
  AnnotationReport,
  ComparisonResult,
  ConsistencyReport,
  QualityEntry,
  QualityResult
} from "./types.js";
import { writeExportFile } from "./write.js";

export const DEFAULT_CSV_FILE = "annotations.csv";

export interface AnnotationSessionOptions {
  outcomes?: OutcomeSource;
  clock?: () => Date;
  logger?: SessionLogger;
  /** Reject empty ids/categories and confidence outside 1-5 instead of recording them. */
  strict?: boolean;
}

/**
 * Append-only log of one annotation session: annotations, quality checks and
 * pairwise comparisons, in the order they were recorded.
 */
export class AnnotationSession {
  private readonly annotationLog: Annotation[] = [];
  private readonly qualityLog: QualityResult[] = [];
  private readonly comparisonLog: ComparisonResult[] = [];
  private readonly outcomes: OutcomeSource;
  private readonly clock: () => Date;
  private readonly logger: SessionLogger;
  readonly strict: boolean;

  constructor(options: AnnotationSessionOptions = {}) {
    this.outcomes = options.outcomes ?? randomOutcomeSource();
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? clackSessionLogger;
    this.strict = options.strict ?? false;
  }

  get annotations(): readonly Annotation[] {
    return this.annotationLog;
  }

  get qualityScores(): readonly QualityResult[] {
    return this.qualityLog;
  }

  get comparisons(): readonly ComparisonResult[] {
    return this.comparisonLog;
  }

  private timestamp(): string {
    return this.clock().toISOString();
  }

  annotate(imageId: string, category: string, confidence: number, notes = ""): Annotation {
    if (this.strict) {
      const validated = strictAnnotationInputSchema.safeParse({ imageId, category, confidence, notes });
      if (!validated.success) {
        throw new UserInputError(`Rejected annotation for ${imageId}: ${describeIssues(validated.error)}`, {
          details: { imageId }
        });
      }
    }

    const annotation: Annotation = Object.freeze({
      image_id: imageId,
      category,
      confidence,
      timestamp: this.timestamp(),
      notes
    });
    this.annotationLog.push(annotation);
    this.logger.success(`Annotated image ${imageId} as '${category}' (confidence: ${confidence}/5)`);
    return annotation;
  }

  /**
   * Scores `entry` against the named criteria and records the result. Unknown
   * criterion names still count toward `max_score`. Throws `ScoringError` for
   * an empty criteria list and records nothing.
   */
  qualityCheck(entry: QualityEntry, criteria: readonly string[]): QualityResult {
    const evaluation = evaluateCriteria(entry, criteria);
    const result: QualityResult = Object.freeze({
      data_entry: { ...entry },
      score: evaluation.score,
      max_score: evaluation.maxScore,
      percentage: evaluation.percentage,
      feedback: Object.freeze(evaluation.feedback),
      timestamp: this.timestamp()
    });
    this.qualityLog.push(result);
    this.logger.info(
      `Quality score: ${result.score}/${result.max_score} (${result.percentage.toFixed(1)}%)`
    );
    return result;
  }

  compare<A, B = A>(itemA: A, itemB: B, criterion: string): ComparisonResult<A, B> {
    const comparison: ComparisonResult<A, B> = Object.freeze({
      item_a: itemA,
      item_b: itemB,
      criterion,
      winner: this.outcomes.pick(),
      timestamp: this.timestamp()
    });
    this.comparisonLog.push(comparison);
    this.logger.info(
      [
        `Pairwise comparison: ${criterion}`,
        `Item A: ${describeItem(itemA)}`,
        `Item B: ${describeItem(itemB)}`,
        `Result: ${comparison.winner === "Tie" ? "Tie" : `Item ${comparison.winner} is better`} for '${criterion}'`
      ].join("\n")
    );
    return comparison;
  }

  consistencyReport(): ConsistencyReport | null {
    const report = computeConsistencyReport(this.annotationLog);
    if (!report) {
      this.logger.warn("Need at least 2 annotations for a consistency report.");
      return null;
    }
    this.logger.info(
      [
        "Consistency report",
        `Total annotations: ${report.totalAnnotations}`,
        `Unique categories: ${report.uniqueCategories}`,
        `Average confidence: ${report.averageConfidence.toFixed(2)}/5`,
        `Category distribution: ${formatDistribution(report.categoryDistribution)}`
      ].join("\n")
    );
    return report;
  }

  buildReport(): AnnotationReport {
    return buildReport(
      {
        annotations: this.annotationLog,
        qualityScores: this.qualityLog,
        comparisons: this.comparisonLog
      },
      this.timestamp()
    );
  }

  /**
   * Builds the report and writes it as JSON. On a failed write the thrown
   * `ReportWriteError` still carries the built report.
   */
  generateReport(path: string = DEFAULT_REPORT_FILE): AnnotationReport {
    const report = this.buildReport();
    try {
      const written = writeExportFile(path, serializeReport(report));
      this.logger.success(`Report saved to ${written}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ReportWriteError(message, report, {
        cause: error,
        ...(error instanceof ExportError && error.details ? { details: error.details } : {})
      });
    }
    return report;
  }

  /** Returns the written path, or `null` when there was nothing to export. */
  exportCsv(path: string = DEFAULT_CSV_FILE): string | null {
    const [first] = this.annotationLog;
    if (!first) {
      this.logger.warn("No annotations to export.");
      return null;
    }
    const written = writeExportFile(path, toCsv(Object.keys(first), this.annotationLog));
    this.logger.success(`Annotations exported to ${written}`);
    return written;
  }
}

function describeItem(item: unknown): string {
  if (typeof item === "string") return item;
  try {
    return JSON.stringify(item) ?? String(item);
  } catch {
    return String(item);
  }
}
