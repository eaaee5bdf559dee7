import {
  EXPLOIT_SEVERITIES,
  SEVERITY_LEVELS,
  type ExploitCounts,
  type GroupSummary,
  type NormalizedRecord,
  type SeverityLevel,
  type TriageSummary
} from "../types.js";

export const TOTAL_GROUP = "Total";

function emptyCounts(): Record<SeverityLevel, number> {
  return { Critical: 0, High: 0, Medium: 0, Low: 0, None: 0 };
}

function emptyExploit(): ExploitCounts {
  return { Critical: 0, High: 0 };
}

export function emptyGroupSummary(group: string): GroupSummary {
  return { group, counts: emptyCounts(), unrecognized: {}, exploit: emptyExploit(), total: 0 };
}

export function summarizeGroup(group: string, records: NormalizedRecord[]): GroupSummary {
  const summary = emptyGroupSummary(group);
  for (const record of records) {
    summary.total += 1;
    const severity = record.severity;
    if (severity === null) {
      summary.unrecognized[record.severityLabel] = (summary.unrecognized[record.severityLabel] ?? 0) + 1;
      continue;
    }
    summary.counts[severity] += 1;
    if (record.exploitKnown && (severity === "Critical" || severity === "High")) {
      summary.exploit[severity] += 1;
    }
  }
  return summary;
}

export function addGroupSummaries(group: string, summaries: GroupSummary[]): GroupSummary {
  const sum = emptyGroupSummary(group);
  for (const summary of summaries) {
    sum.total += summary.total;
    for (const level of SEVERITY_LEVELS) {
      sum.counts[level] += summary.counts[level];
    }
    for (const level of EXPLOIT_SEVERITIES) {
      sum.exploit[level] += summary.exploit[level];
    }
    for (const [label, count] of Object.entries(summary.unrecognized)) {
      sum.unrecognized[label] = (sum.unrecognized[label] ?? 0) + count;
    }
  }
  return sum;
}

export function summarizePartition(partition: Map<string, NormalizedRecord[]>): TriageSummary {
  const groups = Array.from(partition.entries()).map(([group, records]) => summarizeGroup(group, records));
  return { groups, total: addGroupSummaries(TOTAL_GROUP, groups) };
}
