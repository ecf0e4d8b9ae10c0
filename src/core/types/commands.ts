export interface ExportCommandOptions {
  outDir?: string;
  report?: string;
  csv?: string;
  seed?: number | string;
  strict?: boolean;
}

export type DemoCommandOptions = ExportCommandOptions;
export type CustomCommandOptions = ExportCommandOptions;

export interface InspectCommandOptions {
  format?: string;
}
