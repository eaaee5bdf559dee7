import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import { stringify } from "csv-stringify/sync";
import type { NormalizedRecord, RawValue, ReportPeriod, TriageResult } from "../types.js";
import { toFileSafeName } from "./fileNames.js";
import { formatSummaryJson, summaryMatrixToCsvRows } from "./formatters.js";

export type WriteArtifactsParams = {
  outDir: string;
  baseName: string;
  period?: ReportPeriod | null;
  includeAge?: boolean;
};

export type GroupArtifact = {
  group: string;
  path: string;
  rows: number;
};

export type TriageArtifacts = {
  dir: string;
  groups: GroupArtifact[];
  summaryCsvPath: string;
  summaryJsonPath: string;
};

const SUMMARY_STEM = "Summary";

/** Gives each group a file stem no other group or the summary uses, comparing case-insensitively. */
export function uniqueFileStems(groups: string[]): Map<string, string> {
  const used = new Set([SUMMARY_STEM.toLowerCase()]);
  const stems = new Map<string, string>();
  for (const group of groups) {
    const base = toFileSafeName(group);
    let stem = base;
    for (let n = 2; used.has(stem.toLowerCase()); n += 1) {
      stem = `${base}_${n}`;
    }
    used.add(stem.toLowerCase());
    stems.set(group, stem);
  }
  return stems;
}

function cellText(value: RawValue): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

export function groupTableRows(columns: string[], records: NormalizedRecord[], includeAge = false): string[][] {
  const header = includeAge ? [...columns, "Age"] : [...columns];
  const rows = records.map((record) => {
    const cells = columns.map((column) => cellText(record.raw[column]));
    if (includeAge) cells.push(record.ageDays === null ? "" : String(record.ageDays));
    return cells;
  });
  return [header, ...rows];
}

/**
 * Writes one CSV per group (source columns and raw values, in source order),
 * plus the summary matrix as CSV and the full summary as JSON.
 */
export async function writeTriageArtifacts(
  result: TriageResult,
  params: WriteArtifactsParams
): Promise<TriageArtifacts> {
  const suffix = params.period?.suffix ?? "";
  const dir = path.join(params.outDir, `${toFileSafeName(result.profile.id)}${suffix}`);
  await mkdir(dir, { recursive: true });

  const stems = uniqueFileStems(Array.from(result.partition.keys()));
  const groups: GroupArtifact[] = [];
  for (const [group, records] of result.partition) {
    const stem = stems.get(group) ?? toFileSafeName(group);
    const filePath = path.join(dir, `${stem}_${params.baseName}.csv`);
    await writeFile(filePath, stringify(groupTableRows(result.columns, records, params.includeAge)));
    groups.push({ group, path: filePath, rows: records.length });
  }

  const summaryCsvPath = path.join(dir, `${SUMMARY_STEM}_${params.baseName}.csv`);
  const summaryJsonPath = path.join(dir, `${SUMMARY_STEM}_${params.baseName}.json`);
  await writeFile(summaryCsvPath, stringify(summaryMatrixToCsvRows(result.matrix)));
  await writeFile(summaryJsonPath, `${formatSummaryJson(result, params.period)}\n`);

  return { dir, groups, summaryCsvPath, summaryJsonPath };
}
