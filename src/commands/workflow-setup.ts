import { existsSync, statSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";

import { UserInputError } from "../core/errors.js";
import type { ExportCommandOptions } from "../core/types.js";

export interface ExportFileDefaults {
  report: string;
  csv: string;
}

export interface PreparedExportWorkflow {
  outDir: string;
  reportPath: string;
  csvPath: string;
  strict: boolean;
  seed?: number;
}

function normalizeOutDir(value: string | undefined, cwd: string): string {
  const outDir = resolve(cwd, value?.trim() || ".");
  if (existsSync(outDir) && !statSync(outDir).isDirectory()) {
    throw new UserInputError(`Output path is not a directory: ${outDir}`);
  }
  return outDir;
}

function normalizeFileName(value: string | undefined, fallback: string, outDir: string): string {
  const fileName = value?.trim() || fallback;
  return isAbsolute(fileName) ? fileName : resolve(outDir, fileName);
}

const MIN_SEED = 0;
const MAX_SEED = 0xffff_ffff;

function normalizeSeed(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed =
    typeof value === "number"
      ? value
      : /^-?\d+$/.test(value.trim())
        ? Number.parseInt(value.trim(), 10)
        : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < MIN_SEED || parsed > MAX_SEED) {
    throw new UserInputError(
      `Invalid --seed value "${String(value)}". Expected an integer between ${MIN_SEED} and ${MAX_SEED}.`
    );
  }
  return parsed;
}

export function prepareExportWorkflow(
  options: ExportCommandOptions,
  defaults: ExportFileDefaults,
  cwd: string = process.cwd()
): PreparedExportWorkflow {
  const outDir = normalizeOutDir(options.outDir, cwd);
  const seed = normalizeSeed(options.seed);
  return {
    outDir,
    reportPath: normalizeFileName(options.report, defaults.report, outDir),
    csvPath: normalizeFileName(options.csv, defaults.csv, outDir),
    strict: options.strict === true,
    ...(seed !== undefined ? { seed } : {})
  };
}
