import { ProfileValidationError, UnknownProfileError } from "../errors/profile.errors.js";
import type { LogicalField, Predicate, Profile, ProfileRule } from "../types.js";
import { BASE_REQUIRED_FIELDS } from "../normalize/fields.js";
import { DEFAULT_SEVERITY_POLICY } from "../normalize/severity.js";
import { fileNameKey } from "../report/fileNames.js";
import { isPoolRule } from "./classifier.js";
import { collectPredicateFields } from "./predicates.js";

const TOOLING_ASSETS: Predicate = { kind: "contains", field: "asset", values: ["bamboo", "tableau"] };

export const BUILTIN_PROFILES: Profile[] = [
  {
    id: "broker",
    name: "Broker",
    groups: ["SRE", "Dev", "Database"],
    defaultGroup: "Database",
    rules: [
      {
        when: TOOLING_ASSETS,
        pool: "tooling",
        rules: [{ when: { kind: "contains", field: "location", values: [".m2", "xml-data"] }, group: "Dev" }],
        defaultGroup: "SRE"
      }
    ],
    exploitGroups: ["SRE"],
    severity: DEFAULT_SEVERITY_POLICY
  },
  {
    id: "shopper",
    name: "Shopper",
    groups: ["SRE", "Dev"],
    defaultGroup: "SRE",
    rules: [
      {
        when: { kind: "contains", field: "location", values: [".m2", "npm", "node", "xml", "jar", "root"] },
        group: "Dev"
      }
    ],
    exploitGroups: ["SRE"],
    severity: DEFAULT_SEVERITY_POLICY
  },
  {
    id: "employer",
    name: "Employer",
    groups: ["SRE", "Dev"],
    defaultGroup: "SRE",
    rules: [
      {
        when: { kind: "contains", field: "location", values: [".m2", "npm", "node", "xml", "jar", "root"] },
        group: "Dev"
      }
    ],
    exploitGroups: ["SRE"],
    severity: DEFAULT_SEVERITY_POLICY
  },
  {
    id: "platform",
    name: "Platform",
    groups: ["Dev Build", "DevOps Tooling", "DB Production", "DB Non-Production"],
    defaultGroup: "DB Non-Production",
    rules: [
      {
        when: TOOLING_ASSETS,
        pool: "tooling",
        rules: [
          {
            when: { kind: "contains", field: "location", values: [".m2", "xml", "cargo.lock"] },
            group: "Dev Build"
          }
        ],
        defaultGroup: "DevOps Tooling"
      },
      { when: { kind: "contains", field: "tier", values: ["plat"] }, group: "DB Production" }
    ],
    exploitGroups: [],
    severity: { match: "contains", unrecognized: "fold" }
  }
];

function predicateIssues(predicate: Predicate, where: string): string[] {
  switch (predicate.kind) {
    case "contains":
    case "oneOf": {
      if (!predicate.values.length) return [`${where}: ${predicate.kind} on ${predicate.field} has no values`];
      // A blank needle would match every record.
      return predicate.values.flatMap((value, index) =>
        value.trim() ? [] : [`${where}: ${predicate.kind} on ${predicate.field} has a blank value at [${index}]`]
      );
    }
    case "all":
    case "any":
      if (!predicate.predicates.length) return [`${where}: ${predicate.kind} has no predicates`];
      return predicate.predicates.flatMap((inner, index) => predicateIssues(inner, `${where}.${predicate.kind}[${index}]`));
    case "not":
      return predicateIssues(predicate.predicate, `${where}.not`);
  }
}

function ruleIssues(rules: ProfileRule[], universe: Set<string>, where: string): string[] {
  return rules.flatMap((rule, index) => {
    const label = `${where}[${index}]`;
    const issues = predicateIssues(rule.when, `${label}.when`);
    if (isPoolRule(rule)) {
      if (!universe.has(rule.defaultGroup)) {
        issues.push(`${label}: pool "${rule.pool}" default group "${rule.defaultGroup}" is not a declared group`);
      }
      issues.push(...ruleIssues(rule.rules, universe, `${label}.rules`));
    } else if (!universe.has(rule.group)) {
      issues.push(`${label}: group "${rule.group}" is not a declared group`);
    }
    return issues;
  });
}

export function validateProfile(profile: Profile): Profile {
  const issues: string[] = [];
  const universe = new Set<string>();
  if (!profile.groups.length) issues.push("groups must not be empty");
  for (const group of profile.groups) {
    if (!group.trim()) issues.push("group names must not be blank");
    else if (universe.has(group)) issues.push(`group "${group}" is declared twice`);
    universe.add(group);
  }
  const byFileName = new Map<string, string>();
  for (const group of universe) {
    if (!group.trim()) continue;
    const key = fileNameKey(group);
    const taken = byFileName.get(key);
    if (taken === undefined) byFileName.set(key, group);
    else issues.push(`groups "${taken}" and "${group}" would be written to the same file`);
  }
  if (!universe.has(profile.defaultGroup)) {
    issues.push(`default group "${profile.defaultGroup}" is not a declared group`);
  }
  for (const group of profile.exploitGroups) {
    if (!universe.has(group)) issues.push(`exploit group "${group}" is not a declared group`);
  }
  issues.push(...ruleIssues(profile.rules, universe, "rules"));
  if (issues.length) {
    throw new ProfileValidationError(profile.id, issues);
  }
  return profile;
}

export function requiredFieldsForProfile(profile: Profile): LogicalField[] {
  const fields = new Set<LogicalField>(BASE_REQUIRED_FIELDS);
  const visit = (rules: ProfileRule[]) => {
    for (const rule of rules) {
      collectPredicateFields(rule.when).forEach((field) => fields.add(field));
      if (isPoolRule(rule)) visit(rule.rules);
    }
  };
  visit(profile.rules);
  return Array.from(fields);
}

/** Configured profiles replace built-ins that share their id. */
export function mergeProfiles(configured: Profile[] = []): Profile[] {
  const byId = new Map<string, Profile>();
  for (const profile of [...BUILTIN_PROFILES, ...configured]) {
    byId.set(profile.id, profile);
  }
  return Array.from(byId.values());
}

export function findProfile(profiles: Profile[], id: string): Profile {
  const wanted = id.trim().toLowerCase();
  const profile = profiles.find((candidate) => candidate.id.toLowerCase() === wanted);
  if (!profile) {
    throw new UnknownProfileError(id, profiles.map((candidate) => candidate.id));
  }
  return profile;
}
