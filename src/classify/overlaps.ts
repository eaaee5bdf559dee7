import type { NormalizedRecord, Profile, ProfileRule, RuleOverlapDiagnostic } from "../types.js";
import { isPoolRule } from "./classifier.js";
import { matchesPredicate } from "./predicates.js";

function ruleTargets(rule: ProfileRule): string {
  return isPoolRule(rule) ? `pool:${rule.pool}` : rule.group;
}

function ruleGroupLabel(rule: ProfileRule): string {
  return isPoolRule(rule) ? `${rule.pool} pool` : rule.group;
}

function scanLevel(
  records: NormalizedRecord[],
  rules: ProfileRule[],
  path: string[],
  found: Map<string, RuleOverlapDiagnostic>
): void {
  for (const record of records) {
    const matched = rules
      .map((rule, index) => ({ rule, index }))
      .filter(({ rule }) => matchesPredicate(record, rule.when));
    const targets = new Set(matched.map(({ rule }) => ruleTargets(rule)));
    if (targets.size < 2) continue;

    const ruleIndexes = matched.map(({ index }) => index);
    const key = `${path.join("/")}|${ruleIndexes.join(",")}`;
    const entry: RuleOverlapDiagnostic = found.get(key) ?? {
      kind: "rule_overlap",
      path,
      ruleIndexes,
      groups: matched.map(({ rule }) => ruleGroupLabel(rule)),
      rows: []
    };
    entry.rows.push(record.row);
    found.set(key, entry);
  }

  rules.forEach((rule, index) => {
    if (!isPoolRule(rule)) return;
    // Only records that actually reach the pool can observe its ordering.
    const reaching = records.filter((record) => {
      const first = rules.findIndex((candidate) => matchesPredicate(record, candidate.when));
      return first === index;
    });
    scanLevel(reaching, rule.rules, [...path, rule.pool], found);
  });
}

/**
 * Reports records that match more than one rule at the same level where the
 * rules route to different groups, so that rule order decides the outcome.
 */
export function detectRuleOverlaps(records: NormalizedRecord[], profile: Profile): RuleOverlapDiagnostic[] {
  const found = new Map<string, RuleOverlapDiagnostic>();
  scanLevel(records, profile.rules, [], found);
  return Array.from(found.values());
}
