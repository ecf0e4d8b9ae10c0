import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { log } from "@clack/prompts";

import { computeConsistencyReport, formatDistribution } from "../core/consistency.js";
import { UserInputError, normalizeOutputFormat } from "../core/errors.js";
import { DEFAULT_REPORT_FILE, parseReport } from "../core/report.js";
import type { ParsedReport } from "../core/schemas.js";
import type { ConsistencyReport, InspectCommandOptions } from "../core/types.js";

export interface InspectResult {
  path: string;
  summary: ParsedReport["summary"];
  consistency: ConsistencyReport | null;
}

function renderText(result: InspectResult): string {
  const { summary, consistency } = result;
  const lines = [
    `Report: ${result.path}`,
    `Generated at: ${summary.generatedAt}`,
    `Annotations: ${summary.totalAnnotations}`,
    `Quality checks: ${summary.totalQualityChecks}`,
    `Comparisons: ${summary.totalComparisons}`,
    `Average quality score: ${summary.averageQualityScore ?? "n/a"}`
  ];
  if (consistency) {
    lines.push(
      `Unique categories: ${consistency.uniqueCategories}`,
      `Consistency score: ${consistency.consistencyScore.toFixed(2)}`,
      `Category distribution: ${formatDistribution(consistency.categoryDistribution)}`
    );
  }
  return lines.join("\n");
}

export function runInspect(
  reportArg: string | undefined,
  options: InspectCommandOptions,
  cwd: string = process.cwd()
): InspectResult {
  const format = normalizeOutputFormat(options.format);
  const path = resolve(cwd, reportArg ?? DEFAULT_REPORT_FILE);
  if (!existsSync(path)) {
    throw new UserInputError(`Report file not found: ${path}`);
  }

  const report = parseReport(readFileSync(path, "utf8"));
  const result: InspectResult = {
    path,
    summary: report.summary,
    consistency: computeConsistencyReport(report.annotations)
  };

  if (format === "json") {
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  } else {
    log.info(renderText(result));
  }
  return result;
}
