export * from "./types.js";
export * from "./normalize/severity.js";
export * from "./normalize/fields.js";
export * from "./normalize/normalizeRecord.js";
export * from "./classify/predicates.js";
export * from "./classify/classifier.js";
export * from "./classify/profiles.js";
export * from "./classify/overlaps.js";
export * from "./aggregate/severityAggregator.js";
export * from "./report/summaryMatrix.js";
export * from "./report/formatters.js";
export * from "./report/writeArtifacts.js";
export * from "./report/fileNames.js";
export * from "./ingest/loadRecords.js";
export * from "./ingest/reportPeriod.js";
export * from "./triage/triageRecords.js";
export * from "./triage/runTriage.js";
export * from "./config/loadConfig.js";
export * from "./errors/input.errors.js";
export * from "./errors/profile.errors.js";
export * from "./errors/config.errors.js";
export {
  createAppLogger,
  createConsoleLogger,
  formatLogEntry,
  noopLogger,
  teeLogger,
  withContext,
  type AppLogger,
  type LogEntry,
  type Logger,
  type LogMeta
} from "./logging/logger.js";
