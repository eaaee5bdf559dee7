import type {
  FieldMap,
  LogicalField,
  NormalizedRecord,
  RawRecord,
  RawValue,
  SeverityPolicy,
  UnrecognizedSeverityDiagnostic
} from "../types.js";
import { DEFAULT_SEVERITY_POLICY, normalizeSeverity, rawToText } from "./severity.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const EXPLOIT_TRUTHY = new Set(["yes", "true"]);

export type NormalizeOptions = {
  severity?: SeverityPolicy;
  now?: Date;
};

export type NormalizedTable = {
  records: NormalizedRecord[];
  diagnostics: UnrecognizedSeverityDiagnostic[];
};

function readField(raw: RawRecord, fieldMap: FieldMap, field: LogicalField): RawValue {
  const column = fieldMap[field];
  if (!column) return undefined;
  return raw[column];
}

function matchText(value: RawValue): string {
  return rawToText(value).toLowerCase();
}

export function isExploitKnown(value: RawValue): boolean {
  return EXPLOIT_TRUTHY.has(matchText(value));
}

function parseTimestamp(value: RawValue): number | null {
  const text = rawToText(value);
  if (!text) return null;
  const parsed = Date.parse(text);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Whole days from detection to resolution for resolved findings, or to `now`
 * for anything still open. Returns null when the detection date is unusable.
 */
export function computeAgeDays(
  firstDetected: RawValue,
  resolvedAt: RawValue,
  status: RawValue,
  now: Date = new Date()
): number | null {
  const start = parseTimestamp(firstDetected);
  if (start === null) return null;
  const resolved = matchText(status) === "resolved" ? parseTimestamp(resolvedAt) : null;
  const end = resolved ?? now.getTime();
  return Math.max(0, Math.floor((end - start) / DAY_MS));
}

export function normalizeRecord(
  raw: RawRecord,
  row: number,
  fieldMap: FieldMap,
  options: NormalizeOptions = {}
): NormalizedRecord {
  const severity = normalizeSeverity(readField(raw, fieldMap, "severity"), options.severity ?? DEFAULT_SEVERITY_POLICY);
  return {
    row,
    asset: matchText(readField(raw, fieldMap, "asset")),
    location: matchText(readField(raw, fieldMap, "location")),
    tier: matchText(readField(raw, fieldMap, "tier")),
    severity: severity.severity,
    severityLabel: severity.label,
    exploitKnown: isExploitKnown(readField(raw, fieldMap, "exploit")),
    ageDays: computeAgeDays(
      readField(raw, fieldMap, "firstDetected"),
      readField(raw, fieldMap, "resolvedAt"),
      readField(raw, fieldMap, "status"),
      options.now
    ),
    raw
  };
}

export function normalizeRecords(
  rows: RawRecord[],
  fieldMap: FieldMap,
  options: NormalizeOptions = {}
): NormalizedTable {
  const now = options.now ?? new Date();
  const policy = options.severity ?? DEFAULT_SEVERITY_POLICY;
  const unrecognized = new Map<string, UnrecognizedSeverityDiagnostic>();
  const records = rows.map((raw, row) => {
    const record = normalizeRecord(raw, row, fieldMap, { severity: policy, now });
    // Folded labels keep their title-cased text while counting as None.
    if (record.severity === null || record.severityLabel !== record.severity) {
      const value = rawToText(readField(raw, fieldMap, "severity"));
      const entry: UnrecognizedSeverityDiagnostic = unrecognized.get(value) ?? {
        kind: "unrecognized_severity",
        value,
        label: record.severityLabel,
        rows: []
      };
      entry.rows.push(row);
      unrecognized.set(value, entry);
    }
    return record;
  });
  return { records, diagnostics: Array.from(unrecognized.values()) };
}
