import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { ExportError } from "./errors.js";

function describeFsError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Writes `content` to `path` in one synchronous call, creating the parent
 * directory first. Returns the absolute path written.
 */
export function writeExportFile(path: string, content: string): string {
  const absolutePath = resolve(path);
  const parent = dirname(absolutePath);
  try {
    mkdirSync(parent, { recursive: true });
    writeFileSync(absolutePath, content, { encoding: "utf8", flag: "w" });
  } catch (error) {
    throw new ExportError(`Failed to write ${absolutePath}: ${describeFsError(error)}`, {
      cause: error,
      details: { path: absolutePath }
    });
  }
  return absolutePath;
}
