import type { LogicalField } from "../types.js";

export class MissingRequiredFieldError extends Error {
  missing: LogicalField[];
  accepted: Record<string, string[]>;

  constructor(missing: LogicalField[], accepted: Partial<Record<LogicalField, string[]>>) {
    const details = missing
      .map((field) => `${field} (${(accepted[field] ?? []).join(", ") || "no aliases"})`)
      .join("; ");
    super(`Missing required columns: ${details}.`);
    this.name = "MissingRequiredFieldError";
    this.missing = missing;
    this.accepted = Object.fromEntries(missing.map((field) => [field, accepted[field] ?? []]));
  }
}

export class EmptyInputError extends Error {
  constructor(source?: string) {
    super(source ? `Input table ${source} has no rows.` : "Input table has no rows.");
    this.name = "EmptyInputError";
  }
}

export class InputNotFoundError extends Error {
  constructor(filePath: string) {
    super(`Input file not found: ${filePath}`);
    this.name = "InputNotFoundError";
  }
}

export class UnsupportedInputFormatError extends Error {
  constructor(filePath: string) {
    super(`Unsupported input format for ${filePath}. Use a .csv or .json file.`);
    this.name = "UnsupportedInputFormatError";
  }
}

export class InputParseError extends Error {
  constructor(filePath: string, message: string) {
    super(`Failed to parse ${filePath}: ${message}`);
    this.name = "InputParseError";
  }
}
