import type { AnnotationReport, OutputFormat } from "./types.js";

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_INPUT_FAILURE = 2;

interface LedgerErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class LedgerError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: LedgerErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends LedgerError {
  constructor(message: string, options: LedgerErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_INPUT_FAILURE, options);
  }
}

/** Raised when a score cannot be computed, e.g. a quality check with no criteria. */
export class ScoringError extends LedgerError {
  constructor(message: string, options: LedgerErrorOptions = {}) {
    super(message, "EMPTY_CRITERIA", EXIT_CODE_CONTRACT_OR_INPUT_FAILURE, options);
  }
}

export class ExecutionError extends LedgerError {
  constructor(message: string, options: LedgerErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class ExportError extends LedgerError {
  constructor(message: string, options: LedgerErrorOptions = {}) {
    super(message, "EXPORT", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

/** The report was built but could not be written; the built report rides along. */
export class ReportWriteError extends ExportError {
  readonly report: AnnotationReport;

  constructor(message: string, report: AnnotationReport, options: LedgerErrorOptions = {}) {
    super(message, options);
    this.report = report;
  }
}

function isCommanderErrorLike(error: unknown): error is { code: string; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof error.code === "string";
}

export function normalizeError(error: unknown): LedgerError {
  if (error instanceof LedgerError) return error;
  if (isCommanderErrorLike(error) && error.code.startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: error.code
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function normalizeOutputFormat(value: string | undefined): OutputFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new UserInputError(`Invalid --format value "${String(value)}". Expected "text" or "json".`);
}

export function resolveOutputFormatFromArgv(argv: readonly string[]): OutputFormat {
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) continue;
    if (token === "--format") {
      const next = argv[index + 1];
      return next?.trim().toLowerCase() === "json" ? "json" : "text";
    }
    if (!token.startsWith("--format=")) continue;
    const value = token.slice("--format=".length).trim().toLowerCase();
    return value === "json" ? "json" : "text";
  }
  return "text";
}

export function toJsonErrorPayload(error: LedgerError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
