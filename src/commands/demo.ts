import { intro, log, outro } from "@clack/prompts";

import { STANDARD_CRITERIA } from "../core/quality.js";
import { DEFAULT_REPORT_FILE, averageQualityPercentage, formatPercentage } from "../core/report.js";
import { DEFAULT_CSV_FILE, type AnnotationSession, type AnnotationSessionOptions } from "../core/session.js";
import type { AnnotationReport, ConsistencyReport, DemoCommandOptions } from "../core/types.js";

import { createWorkflowSession } from "./session-factory.js";
import { prepareExportWorkflow } from "./workflow-setup.js";

const DEMO_IMAGES = [
  { id: "IMG_001", category: "vehicle", confidence: 5, notes: "Clear image of a car" },
  { id: "IMG_002", category: "person", confidence: 4, notes: "Person in good lighting" },
  { id: "IMG_003", category: "animal", confidence: 5, notes: "Dog clearly visible" },
  { id: "IMG_004", category: "building", confidence: 4, notes: "Office building, slight blur" },
  { id: "IMG_005", category: "vehicle", confidence: 5, notes: "Truck, side view" }
] as const;

const DEMO_COMPARISONS = [
  { itemA: "Annotation with detailed notes", itemB: "Annotation with minimal notes", criterion: "completeness" },
  { itemA: "High confidence classification", itemB: "Low confidence classification", criterion: "reliability" }
] as const;

const QUALITY_SAMPLE_SIZE = 3;

export interface DemoResult {
  session: AnnotationSession;
  consistency: ConsistencyReport | null;
  report: AnnotationReport;
  reportPath: string;
  csvPath: string | null;
}

export function runDemo(options: DemoCommandOptions, sessionOptions: AnnotationSessionOptions = {}): DemoResult {
  const workflow = prepareExportWorkflow(options, { report: DEFAULT_REPORT_FILE, csv: DEFAULT_CSV_FILE });
  const session = createWorkflowSession(workflow, sessionOptions);

  intro("annotation-ledger demo");

  log.info("Step 1/5: Image classification");
  for (const image of DEMO_IMAGES) {
    session.annotate(image.id, image.category, image.confidence, image.notes);
  }

  log.info("Step 2/5: Quality assessment");
  for (const annotation of session.annotations.slice(0, QUALITY_SAMPLE_SIZE)) {
    session.qualityCheck(annotation, STANDARD_CRITERIA);
  }

  log.info("Step 3/5: Pairwise comparisons");
  for (const comparison of DEMO_COMPARISONS) {
    session.compare(comparison.itemA, comparison.itemB, comparison.criterion);
  }

  log.info("Step 4/5: Consistency analysis");
  const consistency = session.consistencyReport();

  log.info("Step 5/5: Report generation");
  const report = session.generateReport(workflow.reportPath);
  const csvPath = session.exportCsv(workflow.csvPath);

  const average = averageQualityPercentage(session.qualityScores);
  log.info(
    [
      "Summary statistics",
      `Total annotations: ${session.annotations.length}`,
      `Quality checks performed: ${session.qualityScores.length}`,
      `Comparisons completed: ${session.comparisons.length}`,
      ...(average !== null ? [`Average quality score: ${formatPercentage(average)}`] : [])
    ].join("\n")
  );
  outro(`Demo complete. Files generated: ${workflow.reportPath}${csvPath ? `, ${csvPath}` : ""}`);

  return { session, consistency, report, reportPath: workflow.reportPath, csvPath };
}
