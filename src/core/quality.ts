import { ScoringError } from "./errors.js";
import type { QualityCriterion, QualityEntry } from "./types.js";

export const STANDARD_CRITERIA: readonly QualityCriterion[] = ["completeness", "format", "consistency"];

const CONFIDENCE_MIN = 1;
const CONFIDENCE_MAX = 5;

interface CriterionRule {
  passes(entry: QualityEntry): boolean;
  passed: string;
  failed: string;
}

export interface CriteriaEvaluation {
  score: number;
  maxScore: number;
  percentage: number;
  feedback: string[];
}

/**
 * Falsy: null, undefined, false, 0, NaN, the empty string, and empty arrays,
 * maps, sets and plain objects. Everything else counts as present.
 */
export function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  if (typeof value === "bigint") return value !== 0n;
  if (typeof value === "string") return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Map || value instanceof Set) return value.size > 0;
  if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length > 0;
  }
  return true;
}

export function isConfidenceInRange(value: unknown): boolean {
  return (
    typeof value === "number" && Number.isInteger(value) && value >= CONFIDENCE_MIN && value <= CONFIDENCE_MAX
  );
}

const RULES: Record<QualityCriterion, CriterionRule> = {
  completeness: {
    passes: (entry) => Object.values(entry).every((value) => isPresent(value)),
    passed: "✓ Complete",
    failed: "✗ Missing data"
  },
  format: {
    passes: (entry) => typeof entry["image_id"] === "string",
    passed: "✓ Correct format",
    failed: "✗ Format issue"
  },
  consistency: {
    passes: (entry) => isConfidenceInRange(entry["confidence"]),
    passed: "✓ Consistent",
    failed: "✗ Inconsistent value"
  }
};

export function isKnownCriterion(name: string): name is QualityCriterion {
  return Object.hasOwn(RULES, name);
}

/**
 * Scores `entry` against `criteria` in order. Unknown names are skipped but
 * still count toward `maxScore`, so they pull the percentage down.
 */
export function evaluateCriteria(entry: QualityEntry, criteria: readonly string[]): CriteriaEvaluation {
  const maxScore = criteria.length;
  if (maxScore === 0) {
    throw new ScoringError("Cannot score a quality check with no criteria (max score is 0).");
  }

  let score = 0;
  const feedback: string[] = [];
  for (const criterion of criteria) {
    if (!isKnownCriterion(criterion)) continue;
    const rule = RULES[criterion];
    if (rule.passes(entry)) {
      score += 1;
      feedback.push(rule.passed);
    } else {
      feedback.push(rule.failed);
    }
  }

  return {
    score,
    maxScore,
    percentage: (score / maxScore) * 100,
    feedback
  };
}
