import pc from "picocolors";
import type { ReportPeriod, SummaryMatrix, SummaryRow, TriageDiagnostic, TriageResult } from "../types.js";

type Colors = ReturnType<typeof pc.createColors>;

export type TextFormatOptions = {
  color?: boolean;
  period?: ReportPeriod | null;
  source?: string | null;
};

function severityLabel(colors: Colors, row: SummaryRow, text: string): string {
  if (row.kind === "total") return colors.bold(text);
  if (row.kind === "unrecognized") return colors.magenta(text);
  switch (row.label) {
    case "Critical":
      return colors.red(colors.bold(text));
    case "High":
      return colors.red(text);
    case "Medium":
      return colors.yellow(text);
    case "Low":
      return colors.green(text);
    default:
      return colors.dim(text);
  }
}

function formatCell(value: number | null): string {
  return value === null ? "" : value.toLocaleString("en-US");
}

export function summaryMatrixToCsvRows(matrix: SummaryMatrix): string[][] {
  return [
    ["Severity", ...matrix.columns.map((column) => column.label)],
    ...matrix.rows.map((row) => [row.label, ...row.cells.map((cell) => (cell === null ? "" : String(cell)))])
  ];
}

export function renderMatrixTable(matrix: SummaryMatrix, colors: Colors = pc.createColors(false)): string[] {
  const header = ["Severity", ...matrix.columns.map((column) => column.label)];
  const body = matrix.rows.map((row) => [row.label, ...row.cells.map(formatCell)]);
  const widths = header.map((label, index) =>
    Math.max(label.length, ...body.map((cells) => (cells[index] ?? "").length))
  );
  const separator = widths.map((width) => "-".repeat(width)).join("-+-");

  const headerLine = header
    .map((label, index) => (index === 0 ? label.padEnd(widths[index] ?? 0) : label.padStart(widths[index] ?? 0)))
    .join(" | ");

  const lines = [colors.bold(headerLine), separator];
  matrix.rows.forEach((row, rowIndex) => {
    const cells = body[rowIndex] ?? [];
    if (row.kind === "total") lines.push(separator);
    const rendered = cells.map((cell, index) => {
      const width = widths[index] ?? 0;
      if (index === 0) return severityLabel(colors, row, cell.padEnd(width));
      return row.kind === "total" ? colors.bold(cell.padStart(width)) : cell.padStart(width);
    });
    lines.push(rendered.join(" | "));
  });
  return lines;
}

export function formatDiagnostic(diagnostic: TriageDiagnostic): string {
  const rows = diagnostic.rows.length === 1 ? "1 row" : `${diagnostic.rows.length} rows`;
  if (diagnostic.kind === "unrecognized_severity") {
    return `Unrecognized severity "${diagnostic.value}" counted as "${diagnostic.label}" (${rows})`;
  }
  const scope = diagnostic.path.length ? `${diagnostic.path.join(" > ")} pool` : "top-level";
  return `Rules ${diagnostic.ruleIndexes.join(", ")} overlap at ${scope}: ${diagnostic.groups.join(" vs ")} (${rows}, first rule wins)`;
}

export function formatSummaryText(result: TriageResult, options: TextFormatOptions = {}): string {
  const colors = pc.createColors(options.color ?? pc.isColorSupported);
  const lines: string[] = [];
  lines.push(colors.bold(`Profile: ${result.profile.name} (${result.profile.id})`));
  if (options.source) lines.push(`Input: ${options.source}`);
  if (options.period?.month || options.period?.timestamp) {
    const parts = [options.period.month, options.period.timestamp].filter((part): part is string => Boolean(part));
    lines.push(`Period: ${parts.join(" ")}`);
  }
  lines.push(`Records: ${result.recordCount.toLocaleString("en-US")}`);
  for (const group of result.summary.groups) {
    lines.push(`  ${group.group}: ${group.total.toLocaleString("en-US")}`);
  }
  lines.push("");
  lines.push(...renderMatrixTable(result.matrix, colors));
  if (result.diagnostics.length) {
    lines.push("");
    lines.push(colors.yellow("Warnings:"));
    for (const diagnostic of result.diagnostics) {
      lines.push(colors.yellow(`  - ${formatDiagnostic(diagnostic)}`));
    }
  }
  return lines.join("\n");
}

export function toSummaryPayload(result: TriageResult, period?: ReportPeriod | null) {
  return {
    profile: { id: result.profile.id, name: result.profile.name },
    period: period ?? null,
    recordCount: result.recordCount,
    fieldMap: result.fieldMap,
    groups: result.summary.groups,
    total: result.summary.total,
    matrix: result.matrix,
    diagnostics: result.diagnostics
  };
}

export function formatSummaryJson(result: TriageResult, period?: ReportPeriod | null): string {
  return JSON.stringify(toSummaryPayload(result, period), null, 2);
}
