import { EmptyInputError } from "../errors/input.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { summarizePartition } from "../aggregate/severityAggregator.js";
import { partitionRecords } from "../classify/classifier.js";
import { detectRuleOverlaps } from "../classify/overlaps.js";
import { requiredFieldsForProfile, validateProfile } from "../classify/profiles.js";
import { DEFAULT_FIELD_ALIASES, resolveFieldMap } from "../normalize/fields.js";
import { normalizeRecords } from "../normalize/normalizeRecord.js";
import { composeSummaryMatrix } from "../report/summaryMatrix.js";
import type { FieldAliases, Profile, RecordTable, TriageDiagnostic, TriageResult } from "../types.js";

export interface TriageOptions {
  aliases?: FieldAliases;
  checkOverlaps?: boolean;
  now?: Date;
  logger?: Logger;
  source?: string;
}

/**
 * Validates the table against the profile, then normalizes, partitions and
 * summarizes it. Pure apart from logging; throws before classifying anything
 * when the table is empty or a required column is missing.
 */
export function triageRecords(table: RecordTable, profile: Profile, options: TriageOptions = {}): TriageResult {
  const log = options.logger ?? noopLogger;
  validateProfile(profile);

  if (table.rows.length === 0) {
    throw new EmptyInputError(options.source);
  }
  const fieldMap = resolveFieldMap(
    table.columns,
    options.aliases ?? DEFAULT_FIELD_ALIASES,
    requiredFieldsForProfile(profile)
  );
  log.debug("Resolved input columns", { fieldMap });

  const normalized = normalizeRecords(table.rows, fieldMap, { severity: profile.severity, now: options.now });
  const partition = partitionRecords(normalized.records, profile);
  const summary = summarizePartition(partition);
  const matrix = composeSummaryMatrix(summary, profile);

  const diagnostics: TriageDiagnostic[] = [...normalized.diagnostics];
  if (options.checkOverlaps ?? true) {
    diagnostics.push(...detectRuleOverlaps(normalized.records, profile));
  }

  log.info("Partitioned records", {
    profile: profile.id,
    records: normalized.records.length,
    groups: Object.fromEntries(Array.from(partition.entries()).map(([group, records]) => [group, records.length]))
  });

  return {
    profile,
    fieldMap,
    columns: table.columns,
    recordCount: table.rows.length,
    partition,
    summary,
    matrix,
    diagnostics
  };
}
