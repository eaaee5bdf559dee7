import type { NormalizedRecord, PoolRule, Profile, ProfileRule } from "../types.js";
import { matchesPredicate } from "./predicates.js";

export function isPoolRule(rule: ProfileRule): rule is PoolRule {
  return "pool" in rule;
}

function classifyWithin(record: NormalizedRecord, rules: ProfileRule[], fallback: string): string {
  for (const rule of rules) {
    if (!matchesPredicate(record, rule.when)) continue;
    if (isPoolRule(rule)) {
      return classifyWithin(record, rule.rules, rule.defaultGroup);
    }
    return rule.group;
  }
  return fallback;
}

/** First matching rule wins; unmatched records land in the profile default. */
export function classifyRecord(record: NormalizedRecord, profile: Profile): string {
  return classifyWithin(record, profile.rules, profile.defaultGroup);
}

export function partitionRecords(
  records: NormalizedRecord[],
  profile: Profile
): Map<string, NormalizedRecord[]> {
  const partition = new Map<string, NormalizedRecord[]>();
  for (const group of profile.groups) {
    partition.set(group, []);
  }
  for (const record of records) {
    const group = classifyRecord(record, profile);
    const bucket = partition.get(group);
    if (bucket) {
      bucket.push(record);
    } else {
      // validateProfile keeps rule targets inside the universe; this covers unvalidated profiles.
      partition.set(group, [record]);
    }
  }
  return partition;
}
