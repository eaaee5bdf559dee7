import { MissingRequiredFieldError } from "../errors/input.errors.js";
import { LOGICAL_FIELDS, type FieldAliases, type FieldMap, type LogicalField } from "../types.js";

export const BASE_REQUIRED_FIELDS: readonly LogicalField[] = ["asset", "location", "severity"];

export const DEFAULT_FIELD_ALIASES: FieldAliases = {
  asset: ["AssetName", "Asset Name", "Asset"],
  location: ["LocationPath", "Location Path", "Location", "Path"],
  severity: ["VendorSeverity", "Vendor Severity", "Severity"],
  tier: ["SubscriptionName", "Subscription", "Tier"],
  exploit: ["HasExploit", "Has Exploit", "ExploitAvailable"],
  firstDetected: ["FirstDetected", "First Detected", "DetectedAt"],
  resolvedAt: ["ResolvedAt", "Resolved At"],
  status: ["FindingStatus", "Status"]
};

export function columnKey(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_-]+/g, "");
}

export function mergeFieldAliases(overrides?: Partial<FieldAliases> | null): FieldAliases {
  const merged = { ...DEFAULT_FIELD_ALIASES };
  if (!overrides) return merged;
  for (const field of LOGICAL_FIELDS) {
    const extra = overrides[field];
    if (!extra?.length) continue;
    merged[field] = Array.from(new Set([...extra, ...DEFAULT_FIELD_ALIASES[field]]));
  }
  return merged;
}

/**
 * Resolves every logical field to a physical column. Exact header matches win
 * over loose ones; loose matching ignores case, whitespace, `_` and `-`.
 */
export function resolveFieldMap(
  columns: string[],
  aliases: FieldAliases = DEFAULT_FIELD_ALIASES,
  required: Iterable<LogicalField> = BASE_REQUIRED_FIELDS
): FieldMap {
  const exact = new Set(columns);
  const loose = new Map<string, string>();
  for (const column of columns) {
    const key = columnKey(column);
    if (!loose.has(key)) loose.set(key, column);
  }

  const resolve = (field: LogicalField): string | null => {
    for (const alias of aliases[field]) {
      if (exact.has(alias)) return alias;
    }
    for (const alias of aliases[field]) {
      const hit = loose.get(columnKey(alias));
      if (hit) return hit;
    }
    return null;
  };

  const map: FieldMap = {
    asset: resolve("asset"),
    location: resolve("location"),
    severity: resolve("severity"),
    tier: resolve("tier"),
    exploit: resolve("exploit"),
    firstDetected: resolve("firstDetected"),
    resolvedAt: resolve("resolvedAt"),
    status: resolve("status")
  };
  const missing = Array.from(new Set(required)).filter((field) => map[field] === null);
  if (missing.length) {
    throw new MissingRequiredFieldError(missing, aliases);
  }
  return map;
}
