import { TOTAL_GROUP, emptyGroupSummary } from "../aggregate/severityAggregator.js";
import {
  SEVERITY_LEVELS,
  type GroupSummary,
  type Profile,
  type SummaryColumn,
  type SummaryMatrix,
  type SummaryRow,
  type TriageSummary
} from "../types.js";

const RESERVED_ROW_LABELS = new Set<string>([...SEVERITY_LEVELS, TOTAL_GROUP]);

type RowKey =
  | { kind: "severity"; level: (typeof SEVERITY_LEVELS)[number] }
  | { kind: "unrecognized"; label: string }
  | { kind: "total" };

function baseCell(summary: GroupSummary, row: RowKey): number {
  switch (row.kind) {
    case "severity":
      return summary.counts[row.level];
    case "unrecognized":
      return summary.unrecognized[row.label] ?? 0;
    case "total":
      return summary.total;
  }
}

function exploitCell(summary: GroupSummary, row: RowKey): number | null {
  if (row.kind !== "severity") return null;
  if (row.level === "Critical" || row.level === "High") return summary.exploit[row.level];
  return null;
}

function rowLabel(row: RowKey): string {
  switch (row.kind) {
    case "severity":
      return row.level;
    case "unrecognized":
      return RESERVED_ROW_LABELS.has(row.label) ? `${row.label} (unrecognized)` : row.label;
    case "total":
      return TOTAL_GROUP;
  }
}

export function composeSummaryMatrix(summary: TriageSummary, profile: Profile): SummaryMatrix {
  const byGroup = new Map(summary.groups.map((group) => [group.group, group]));
  const exploitGroups = new Set(profile.exploitGroups);

  const totalColumn: SummaryColumn = { kind: "total", label: TOTAL_GROUP };
  const columns: SummaryColumn[] = [totalColumn];
  const sources: Array<{ column: SummaryColumn; summary: GroupSummary }> = [
    { column: totalColumn, summary: summary.total }
  ];
  for (const group of profile.groups) {
    const groupSummary = byGroup.get(group) ?? emptyGroupSummary(group);
    const column: SummaryColumn = { kind: "group", label: group, group };
    columns.push(column);
    sources.push({ column, summary: groupSummary });
    if (exploitGroups.has(group)) {
      const exploitColumn: SummaryColumn = { kind: "exploit", label: `${group} Exploit`, group };
      columns.push(exploitColumn);
      sources.push({ column: exploitColumn, summary: groupSummary });
    }
  }

  const rowKeys: RowKey[] = [
    ...SEVERITY_LEVELS.map((level): RowKey => ({ kind: "severity", level })),
    ...Object.keys(summary.total.unrecognized)
      .sort((a, b) => a.localeCompare(b))
      .map((label): RowKey => ({ kind: "unrecognized", label })),
    { kind: "total" }
  ];

  const rows: SummaryRow[] = rowKeys.map((row) => ({
    kind: row.kind,
    label: rowLabel(row),
    cells: sources.map(({ column, summary: source }) =>
      column.kind === "exploit" ? exploitCell(source, row) : baseCell(source, row)
    )
  }));

  return { profileId: profile.id, columns, rows };
}
