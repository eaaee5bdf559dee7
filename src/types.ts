export const SEVERITY_LEVELS = ["Critical", "High", "Medium", "Low", "None"] as const;

export type SeverityLevel = (typeof SEVERITY_LEVELS)[number];

export type ExploitSeverity = Extract<SeverityLevel, "Critical" | "High">;

export const EXPLOIT_SEVERITIES: readonly ExploitSeverity[] = ["Critical", "High"];

export type RawValue = string | number | boolean | null | undefined;

export type RawRecord = Record<string, RawValue>;

export interface RecordTable {
  columns: string[];
  rows: RawRecord[];
}

export const LOGICAL_FIELDS = [
  "asset",
  "location",
  "severity",
  "tier",
  "exploit",
  "firstDetected",
  "resolvedAt",
  "status"
] as const;

export type LogicalField = (typeof LOGICAL_FIELDS)[number];

export type FieldAliases = Record<LogicalField, string[]>;

export type FieldMap = Record<LogicalField, string | null>;

// Fields a predicate may test. Values are compared after lower-casing.
export type MatchField = "asset" | "location" | "tier";

export type Predicate =
  | { kind: "contains"; field: MatchField; values: string[] }
  | { kind: "oneOf"; field: MatchField; values: string[] }
  | { kind: "all"; predicates: Predicate[] }
  | { kind: "any"; predicates: Predicate[] }
  | { kind: "not"; predicate: Predicate };

export type LeafRule = {
  when: Predicate;
  group: string;
};

export type PoolRule = {
  when: Predicate;
  pool: string;
  rules: ProfileRule[];
  defaultGroup: string;
};

export type ProfileRule = LeafRule | PoolRule;

export type SeverityMatchMode = "contains" | "exact";

export type UnrecognizedSeverityPolicy = "fold" | "separate";

export interface SeverityPolicy {
  match: SeverityMatchMode;
  unrecognized: UnrecognizedSeverityPolicy;
}

export interface Profile {
  id: string;
  name: string;
  groups: string[];
  defaultGroup: string;
  rules: ProfileRule[];
  exploitGroups: string[];
  severity: SeverityPolicy;
}

export interface NormalizedRecord {
  row: number;
  asset: string;
  location: string;
  tier: string;
  /** `null` marks the pass-through bucket for unrecognized labels. */
  severity: SeverityLevel | null;
  severityLabel: string;
  exploitKnown: boolean;
  ageDays: number | null;
  raw: RawRecord;
}

export type ExploitCounts = Record<ExploitSeverity, number>;

export interface GroupSummary {
  group: string;
  counts: Record<SeverityLevel, number>;
  unrecognized: Record<string, number>;
  exploit: ExploitCounts;
  total: number;
}

export interface TriageSummary {
  groups: GroupSummary[];
  total: GroupSummary;
}

export type UnrecognizedSeverityDiagnostic = {
  kind: "unrecognized_severity";
  value: string;
  label: string;
  rows: number[];
};

export type RuleOverlapDiagnostic = {
  kind: "rule_overlap";
  /** Pool names leading to the rule level, empty for the top level. */
  path: string[];
  ruleIndexes: number[];
  groups: string[];
  rows: number[];
};

export type TriageDiagnostic = UnrecognizedSeverityDiagnostic | RuleOverlapDiagnostic;

export type SummaryColumn =
  | { kind: "total"; label: string }
  | { kind: "group"; label: string; group: string }
  | { kind: "exploit"; label: string; group: string };

export type SummaryRow = {
  kind: "severity" | "unrecognized" | "total";
  label: string;
  cells: Array<number | null>;
};

export interface SummaryMatrix {
  profileId: string;
  columns: SummaryColumn[];
  rows: SummaryRow[];
}

export interface ReportPeriod {
  month: string | null;
  timestamp: string | null;
  suffix: string;
}

export interface TriageResult {
  profile: Profile;
  fieldMap: FieldMap;
  columns: string[];
  recordCount: number;
  partition: Map<string, NormalizedRecord[]>;
  summary: TriageSummary;
  matrix: SummaryMatrix;
  diagnostics: TriageDiagnostic[];
}
