export type { ComparisonWinner, OutputFormat, QualityCriterion } from "./types/common.js";
export type { Annotation } from "./types/annotation.js";
export type { QualityEntry, QualityResult } from "./types/quality.js";
export type { ComparisonResult } from "./types/comparison.js";
export type { AnnotationReport, ConsistencyReport, ReportSummary } from "./types/report.js";
export type {
  CustomCommandOptions,
  DemoCommandOptions,
  ExportCommandOptions,
  InspectCommandOptions
} from "./types/commands.js";
