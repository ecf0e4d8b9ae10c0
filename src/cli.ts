import { readFileSync } from "node:fs";

import { log } from "@clack/prompts";
import { Command, CommanderError } from "commander";

import { runCustom } from "./commands/custom.js";
import { runDemo } from "./commands/demo.js";
import { runInspect } from "./commands/inspect.js";
import { normalizeError, resolveOutputFormatFromArgv, toJsonErrorPayload } from "./core/errors.js";
import { packageManifestSchema, parseJsonWithSchema } from "./core/schemas.js";
import type { CustomCommandOptions, DemoCommandOptions, InspectCommandOptions } from "./core/types.js";

function readCliVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf8");
  return parseJsonWithSchema(raw, packageManifestSchema, "package.json").version;
}

function addExportOptions(command: Command): Command {
  return command
    .option("--out-dir <dir>", "Directory for the generated files (defaults to current working directory)")
    .option("--report <file>", "JSON report file name")
    .option("--csv <file>", "CSV export file name")
    .option("--seed <n>", "Seed (0-4294967295) for reproducible simulated comparison outcomes")
    .option("--strict", "Reject annotations with empty ids or categories, or confidence outside 1-5", false);
}

const program = new Command();

program
  .name("annotation-ledger")
  .description("Record image annotations, score quality checks, log pairwise comparisons and export JSON/CSV reports.")
  .version(readCliVersion())
  .exitOverride();

addExportOptions(
  program.command("demo").description("Run the demonstration annotation workflow on built-in sample data.")
).action((rawOptions: DemoCommandOptions) => {
  runDemo(rawOptions);
});

addExportOptions(
  program
    .command("custom")
    .description("Annotate a batch of images from a JSON file (or the built-in sample) and export the results.")
    .argument("[batch]", "JSON file holding an array of { id, category, confidence, notes? }")
).action((batchArg: string | undefined, rawOptions: CustomCommandOptions) => {
  runCustom(batchArg, rawOptions);
});

program
  .command("inspect")
  .description("Summarize a saved annotation report.")
  .argument("[report]", "Report file (defaults to annotation_report.json)")
  .option("--format <format>", "text | json", "text")
  .action((reportArg: string | undefined, rawOptions: InspectCommandOptions) => {
    runInspect(reportArg, rawOptions);
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError && error.exitCode === 0) return;
    const normalized = normalizeError(error);
    if (resolveOutputFormatFromArgv(process.argv) === "json") {
      process.stderr.write(`${JSON.stringify(toJsonErrorPayload(normalized), null, 2)}\n`);
    } else if (!(error instanceof CommanderError)) {
      // commander has already printed its own usage error
      log.error(normalized.message);
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
