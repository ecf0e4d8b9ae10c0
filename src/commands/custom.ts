import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { intro, log, outro } from "@clack/prompts";

import { UserInputError } from "../core/errors.js";
import { annotationBatchSchema, parseJsonWithSchema, type AnnotationBatch } from "../core/schemas.js";
import type { AnnotationSession, AnnotationSessionOptions } from "../core/session.js";
import type { AnnotationReport, CustomCommandOptions } from "../core/types.js";

import { createWorkflowSession } from "./session-factory.js";
import { prepareExportWorkflow } from "./workflow-setup.js";

const CUSTOM_REPORT_FILE = "custom_report.json";
const CUSTOM_CSV_FILE = "custom_annotations.csv";

const SAMPLE_BATCH: AnnotationBatch = [
  { id: "IMG_100", category: "landscape", confidence: 5 },
  { id: "IMG_101", category: "portrait", confidence: 4 },
  { id: "IMG_102", category: "food", confidence: 5 }
];

export interface CustomRunResult {
  session: AnnotationSession;
  report: AnnotationReport;
  reportPath: string;
  csvPath: string | null;
}

export function loadAnnotationBatch(batchPath: string, cwd: string = process.cwd()): AnnotationBatch {
  const absolutePath = resolve(cwd, batchPath);
  if (!existsSync(absolutePath)) {
    throw new UserInputError(`Batch file not found: ${absolutePath}`);
  }
  return parseJsonWithSchema(readFileSync(absolutePath, "utf8"), annotationBatchSchema, `Batch file ${absolutePath}`);
}

export function runCustom(
  batchPath: string | undefined,
  options: CustomCommandOptions,
  sessionOptions: AnnotationSessionOptions = {}
): CustomRunResult {
  const workflow = prepareExportWorkflow(options, { report: CUSTOM_REPORT_FILE, csv: CUSTOM_CSV_FILE });
  const batch = batchPath ? loadAnnotationBatch(batchPath) : SAMPLE_BATCH;
  const session = createWorkflowSession(workflow, sessionOptions);

  intro("annotation-ledger custom batch");
  log.info(`Annotating ${batch.length} image(s) from ${batchPath ?? "the built-in sample"}.`);
  for (const item of batch) {
    session.annotate(item.id, item.category, item.confidence, item.notes ?? "");
  }

  const report = session.generateReport(workflow.reportPath);
  const csvPath = session.exportCsv(workflow.csvPath);
  outro(`Custom batch complete (${session.annotations.length} annotations).`);

  return { session, report, reportPath: workflow.reportPath, csvPath };
}
