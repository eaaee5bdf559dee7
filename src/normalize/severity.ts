import { SEVERITY_LEVELS, type RawValue, type SeverityLevel, type SeverityPolicy } from "../types.js";

export type SeverityResolution =
  | { severity: SeverityLevel; label: SeverityLevel; recognized: true }
  | { severity: SeverityLevel | null; label: string; recognized: false };

const NONE_SYNONYMS = new Set(["none", "info", "informational", "na", "n/a"]);

// Checked longest first; equal lengths keep taxonomy order.
const SEVERITY_KEYWORDS: Array<{ keyword: string; level: SeverityLevel }> = SEVERITY_LEVELS.filter(
  (level) => level !== "None"
)
  .map((level) => ({ keyword: level.toLowerCase(), level }))
  .sort((a, b) => b.keyword.length - a.keyword.length);

export const DEFAULT_SEVERITY_POLICY: SeverityPolicy = {
  match: "contains",
  unrecognized: "separate"
};

export function rawToText(value: RawValue): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number" && !Number.isFinite(value)) return "";
  return String(value).trim();
}

export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export function isSeverityLevel(value: string): value is SeverityLevel {
  return SEVERITY_LEVELS.some((level) => level === value);
}

function matchKeyword(lowered: string, mode: SeverityPolicy["match"]): SeverityLevel | null {
  if (mode === "exact") {
    const hit = SEVERITY_KEYWORDS.find((entry) => entry.keyword === lowered);
    return hit?.level ?? null;
  }
  const hit = SEVERITY_KEYWORDS.find((entry) => lowered.includes(entry.keyword));
  return hit?.level ?? null;
}

export function normalizeSeverity(
  value: RawValue,
  policy: SeverityPolicy = DEFAULT_SEVERITY_POLICY
): SeverityResolution {
  const text = rawToText(value);
  const lowered = text.toLowerCase();
  if (!lowered || NONE_SYNONYMS.has(lowered)) {
    return { severity: "None", label: "None", recognized: true };
  }

  const level = matchKeyword(lowered, policy.match);
  if (level) {
    return { severity: level, label: level, recognized: true };
  }

  const label = titleCase(text);
  if (policy.unrecognized === "fold") {
    return { severity: "None", label, recognized: false };
  }
  return { severity: null, label, recognized: false };
}
