import type { MatchField, NormalizedRecord, Predicate } from "../types.js";

export function matchesPredicate(record: NormalizedRecord, predicate: Predicate): boolean {
  switch (predicate.kind) {
    case "contains": {
      const value = record[predicate.field];
      return predicate.values.some((needle) => value.includes(needle.trim().toLowerCase()));
    }
    case "oneOf": {
      const value = record[predicate.field];
      return predicate.values.some((candidate) => value === candidate.trim().toLowerCase());
    }
    case "all":
      return predicate.predicates.every((inner) => matchesPredicate(record, inner));
    case "any":
      return predicate.predicates.some((inner) => matchesPredicate(record, inner));
    case "not":
      return !matchesPredicate(record, predicate.predicate);
  }
}

export function collectPredicateFields(predicate: Predicate, into: Set<MatchField> = new Set()): Set<MatchField> {
  switch (predicate.kind) {
    case "contains":
    case "oneOf":
      into.add(predicate.field);
      break;
    case "all":
    case "any":
      predicate.predicates.forEach((inner) => collectPredicateFields(inner, into));
      break;
    case "not":
      collectPredicateFields(predicate.predicate, into);
      break;
  }
  return into;
}

export function describePredicate(predicate: Predicate): string {
  switch (predicate.kind) {
    case "contains":
      return `${predicate.field} contains ${predicate.values.map((v) => `"${v}"`).join(" | ")}`;
    case "oneOf":
      return `${predicate.field} is ${predicate.values.map((v) => `"${v}"`).join(" | ")}`;
    case "all":
      return predicate.predicates.map((inner) => `(${describePredicate(inner)})`).join(" and ");
    case "any":
      return predicate.predicates.map((inner) => `(${describePredicate(inner)})`).join(" or ");
    case "not":
      return `not (${describePredicate(predicate.predicate)})`;
  }
}
