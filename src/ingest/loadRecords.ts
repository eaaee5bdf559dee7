import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { InputNotFoundError, InputParseError, UnsupportedInputFormatError } from "../errors/input.errors.js";
import type { RawRecord, RecordTable } from "../types.js";

const csvGridSchema = z.array(z.array(z.string()));

const rawValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const jsonRowsSchema = z.array(z.record(rawValueSchema));

const jsonTableSchema = z.union([jsonRowsSchema, z.object({ records: jsonRowsSchema }).passthrough()]);

export function parseCsvTable(content: string, source = "input"): RecordTable {
  let grid: unknown;
  try {
    grid = parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InputParseError(source, message);
  }
  const checked = csvGridSchema.safeParse(grid);
  if (!checked.success) {
    throw new InputParseError(source, "expected rows of text cells");
  }
  const [header, ...body] = checked.data;
  if (!header) {
    throw new InputParseError(source, "missing header row");
  }
  const columns = header.map((column) => column.trim());
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) throw new InputParseError(source, `duplicate column "${column}" in header row`);
    seen.add(column);
  }
  const rows = body.map((cells, recordIndex) => {
    // Short rows are padded; only blank cells may trail past the header.
    if (cells.slice(columns.length).some((cell) => cell.trim() !== "")) {
      throw new InputParseError(
        source,
        `record ${recordIndex + 1} has ${cells.length} cells but the header has ${columns.length} columns`
      );
    }
    const row: RawRecord = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? "";
    });
    return row;
  });
  return { columns, rows };
}

export function parseJsonTable(content: string, source = "input"): RecordTable {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InputParseError(source, message);
  }
  const checked = jsonTableSchema.safeParse(parsed);
  if (!checked.success) {
    throw new InputParseError(source, "expected an array of flat objects or { records: [...] }");
  }
  const rows: RawRecord[] = Array.isArray(checked.data) ? checked.data : checked.data.records;
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (seen.has(key)) continue;
      seen.add(key);
      columns.push(key);
    }
  }
  return { columns, rows };
}

export async function loadRecordTable(filePath: string): Promise<RecordTable> {
  if (!existsSync(filePath)) {
    throw new InputNotFoundError(filePath);
  }
  const extension = path.extname(filePath).toLowerCase();
  if (extension !== ".csv" && extension !== ".json") {
    throw new UnsupportedInputFormatError(filePath);
  }
  const content = await readFile(filePath, "utf-8");
  const source = path.basename(filePath);
  return extension === ".csv" ? parseCsvTable(content, source) : parseJsonTable(content, source);
}
