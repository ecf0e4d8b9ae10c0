export { AnnotationSession, DEFAULT_CSV_FILE, type AnnotationSessionOptions } from "./core/session.js";
export {
  COMPARISON_WINNERS,
  randomOutcomeSource,
  scriptedOutcomeSource,
  seededOutcomeSource,
  type OutcomeSource
} from "./core/outcomes.js";
export { STANDARD_CRITERIA, evaluateCriteria, isPresent } from "./core/quality.js";
export { computeConsistencyReport } from "./core/consistency.js";
export { DEFAULT_REPORT_FILE, buildReport, parseReport, serializeReport } from "./core/report.js";
export type { ParsedReport } from "./core/schemas.js";
export { toCsv } from "./core/csv.js";
export { clackSessionLogger, silentSessionLogger, type SessionLogger } from "./core/session-logger.js";
export {
  ExecutionError,
  ExportError,
  LedgerError,
  ReportWriteError,
  ScoringError,
  UserInputError
} from "./core/errors.js";
export type * from "./core/types.js";
