import path from "node:path";
import { loadConfig, type TriageConfig } from "../config/loadConfig.js";
import { findProfile } from "../classify/profiles.js";
import { extractReportPeriod } from "../ingest/reportPeriod.js";
import { loadRecordTable } from "../ingest/loadRecords.js";
import { noopLogger, withContext, type Logger } from "../logging/logger.js";
import { formatDiagnostic } from "../report/formatters.js";
import { writeTriageArtifacts, type TriageArtifacts } from "../report/writeArtifacts.js";
import type { ReportPeriod, TriageResult } from "../types.js";
import { triageRecords } from "./triageRecords.js";

export interface RunTriageOptions {
  inputPath: string;
  projectRoot: string;
  configPath?: string | null;
  profileId?: string | null;
  overrides?: Partial<TriageConfig>;
  write?: boolean;
  now?: Date;
  logger?: Logger;
}

export interface RunTriageResult {
  config: TriageConfig;
  inputPath: string;
  period: ReportPeriod;
  result: TriageResult;
  artifacts: TriageArtifacts | null;
  durationMs: number;
}

export async function runTriage(options: RunTriageOptions): Promise<RunTriageResult> {
  const start = Date.now();
  const log = options.logger ?? noopLogger;
  const config = await loadConfig({
    projectRoot: options.projectRoot,
    configPath: options.configPath,
    overrides: options.overrides
  });
  if (config.configPath) log.debug(`Loaded config from ${config.configPath}`);

  const profile = findProfile(config.profiles, options.profileId || config.defaultProfile);
  const inputPath = path.resolve(options.projectRoot, options.inputPath);
  const runLog = withContext(log, { profile: profile.id, input: path.basename(inputPath) });
  const period = extractReportPeriod(inputPath);
  if (period.month) runLog.info(`Detected reporting month: ${period.month}`);

  const table = await loadRecordTable(inputPath);
  runLog.info(`Loaded ${table.rows.length.toLocaleString("en-US")} records from ${path.basename(inputPath)}`);

  const result = triageRecords(table, profile, {
    aliases: config.fields,
    checkOverlaps: config.diagnostics.checkOverlaps,
    now: options.now,
    logger: runLog,
    source: path.basename(inputPath)
  });
  for (const diagnostic of result.diagnostics) {
    runLog.warn(formatDiagnostic(diagnostic), { diagnostic: diagnostic.kind, rows: diagnostic.rows.length });
  }

  let artifacts: TriageArtifacts | null = null;
  if (options.write ?? true) {
    artifacts = await writeTriageArtifacts(result, {
      outDir: config.output.dir,
      baseName: path.basename(inputPath, path.extname(inputPath)),
      period,
      includeAge: config.output.includeAge
    });
    for (const group of artifacts.groups) {
      runLog.debug(`Wrote ${group.group} table`, { path: group.path, rows: group.rows });
    }
    runLog.info(`Artifacts written to ${artifacts.dir}`);
  }

  return {
    config,
    inputPath,
    period,
    result,
    artifacts,
    durationMs: Date.now() - start
  };
}
