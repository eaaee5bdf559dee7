#!/usr/bin/env node
import path from "node:path";
import { Command, Option } from "commander";
import pc from "picocolors";
import { loadConfig } from "./config/loadConfig.js";
import { OUTPUT_FORMATS, isOutputFormat, type OutputFormat } from "./config/defaults.js";
import { describePredicate } from "./classify/predicates.js";
import { isPoolRule } from "./classify/classifier.js";
import { findProfile } from "./classify/profiles.js";
import { runTriage } from "./triage/runTriage.js";
import { formatSummaryJson, formatSummaryText } from "./report/formatters.js";
import { isTerminalInteractive, promptProfile } from "./ui/prompts.js";
import {
  createAppLogger,
  createConsoleLogger,
  noopLogger,
  teeLogger,
  type AppLogger,
  type Logger
} from "./logging/logger.js";
import { ConfigInvalidOutputFormatError, ConfigParseError } from "./errors/config.errors.js";
import {
  EmptyInputError,
  InputNotFoundError,
  InputParseError,
  MissingRequiredFieldError,
  UnsupportedInputFormatError
} from "./errors/input.errors.js";
import { ProfileValidationError, UnknownProfileError } from "./errors/profile.errors.js";
import type { ProfileRule } from "./types.js";

const program = new Command();

const USER_ERRORS = [
  ConfigParseError,
  ConfigInvalidOutputFormatError,
  EmptyInputError,
  InputNotFoundError,
  InputParseError,
  MissingRequiredFieldError,
  UnsupportedInputFormatError,
  ProfileValidationError,
  UnknownProfileError
];

function exitCodeFor(err: unknown): number {
  return USER_ERRORS.some((ErrorClass) => err instanceof ErrorClass) ? 1 : 2;
}

function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) return "0s";
  const totalSeconds = durationMs / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds - minutes * 60);
  return `${minutes}m ${seconds}s`;
}

async function openAppLogger(stateDir: string, label: string): Promise<AppLogger | null> {
  try {
    return await createAppLogger({ stateDir, label });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${pc.yellow(`Run log disabled: ${message}`)}\n`);
    return null;
  }
}

function describeRules(rules: ProfileRule[], indent: string): string[] {
  return rules.flatMap((rule, index) => {
    const head = `${indent}${index + 1}. ${describePredicate(rule.when)}`;
    if (!isPoolRule(rule)) return [`${head} -> ${rule.group}`];
    return [
      `${head} -> ${rule.pool} pool`,
      ...describeRules(rule.rules, `${indent}   `),
      `${indent}   otherwise -> ${rule.defaultGroup}`
    ];
  });
}

program
  .name("triage")
  .description("Partition security-finding tables into ownership groups and summarize severity")
  .version("0.1.0");

program
  .command("run <input>")
  .description("Triage a CSV or JSON findings table")
  .option("-p, --profile <id>", "Profile to apply (prompts when omitted on a terminal)")
  .option("-c, --config <path>", "Path to triage.config.json")
  .option("-o, --out-dir <dir>", "Directory for group tables and summary files")
  .addOption(new Option("-f, --format <format>", "Output format").choices([...OUTPUT_FORMATS]))
  .option("--json", "Shortcut for --format json")
  .option("--no-write", "Print the summary without writing artifacts")
  .option("--include-age", "Append an Age column (days open) to group tables")
  .option("--no-overlap-check", "Skip the rule overlap diagnostic")
  .option("--debug", "Enable debug logging")
  .action(
    async (
      input: string,
      options: {
        profile?: string;
        config?: string;
        outDir?: string;
        format?: string;
        json?: boolean;
        write: boolean;
        includeAge?: boolean;
        overlapCheck: boolean;
        debug?: boolean;
      }
    ) => {
      const projectRoot = process.cwd();
      const requested = options.json ? "json" : options.format;
      const formatOverride: OutputFormat | undefined =
        requested && isOutputFormat(requested) ? requested : undefined;
      let appLogger: AppLogger | null = null;
      let uiLogger: Logger = createConsoleLogger({ quiet: false, debug: Boolean(options.debug) });

      try {
        const config = await loadConfig({ projectRoot, configPath: options.config ?? null });
        const format = formatOverride ?? config.output.format;
        appLogger = await openAppLogger(config.stateDir, "run");
        const consoleLogger = createConsoleLogger({ quiet: format === "json", debug: Boolean(options.debug) });
        uiLogger = teeLogger(consoleLogger, appLogger ?? noopLogger);

        let profileId = options.profile ?? null;
        if (!profileId && format === "text" && isTerminalInteractive()) {
          const chosen = await promptProfile(config.profiles, config.defaultProfile);
          profileId = chosen?.id ?? null;
        }

        const run = await runTriage({
          inputPath: input,
          projectRoot,
          configPath: options.config ?? null,
          profileId,
          write: options.write,
          logger: uiLogger,
          overrides: {
            output: {
              dir: options.outDir ? path.resolve(projectRoot, options.outDir) : config.output.dir,
              format,
              includeAge: options.includeAge ?? config.output.includeAge
            },
            diagnostics: { checkOverlaps: options.overlapCheck && config.diagnostics.checkOverlaps }
          }
        });

        if (format === "json") {
          console.log(formatSummaryJson(run.result, run.period));
        } else {
          console.log("");
          console.log(formatSummaryText(run.result, { period: run.period, source: path.basename(run.inputPath) }));
          console.log("");
          if (run.artifacts) {
            console.log(pc.green(`Artifacts written to ${run.artifacts.dir}`));
            for (const group of run.artifacts.groups) {
              console.log(`  ${group.group}: ${path.basename(group.path)} (${group.rows.toLocaleString("en-US")} rows)`);
            }
          }
          console.log(pc.dim(`Completed in ${formatDuration(run.durationMs)}.`));
        }
        process.exitCode = 0;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        uiLogger.error(`Error: ${message}`);
        process.exitCode = exitCodeFor(err);
      } finally {
        await appLogger?.close();
      }
    }
  );

program
  .command("profiles")
  .description("List available profiles and their rules")
  .option("-c, --config <path>", "Path to triage.config.json")
  .option("-p, --profile <id>", "Show a single profile")
  .action(async (options: { config?: string; profile?: string }) => {
    try {
      const config = await loadConfig({ projectRoot: process.cwd(), configPath: options.config ?? null });
      const profiles = options.profile ? [findProfile(config.profiles, options.profile)] : config.profiles;
      for (const profile of profiles) {
        const marker = profile.id === config.defaultProfile ? pc.green(" (default)") : "";
        console.log(`${pc.bold(profile.name)} [${profile.id}]${marker}`);
        console.log(`  groups: ${profile.groups.join(", ")}`);
        console.log(`  severity: match=${profile.severity.match}, unrecognized=${profile.severity.unrecognized}`);
        if (profile.exploitGroups.length) console.log(`  exploit columns: ${profile.exploitGroups.join(", ")}`);
        console.log("  rules:");
        for (const line of describeRules(profile.rules, "    ")) console.log(line);
        console.log(`    otherwise -> ${profile.defaultGroup}`);
      }
      process.exitCode = 0;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(pc.red(`Error: ${message}`));
      process.exitCode = exitCodeFor(err);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(pc.red(`Error: ${message}`));
  process.exitCode = 2;
});
