export const CONFIG_FILE_NAMES = ["triage.config.json", ".triagerc.json"];

export const DEFAULT_PROFILE_ID = "broker";

export const DEFAULT_OUTPUT_DIR = "triage-reports";

export const DEFAULT_STATE_DIR = ".triage";

export const OUTPUT_FORMATS = ["text", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
