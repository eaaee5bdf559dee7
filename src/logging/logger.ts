import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

type LogFn = (message: string, meta?: LogMeta) => void;

export type Logger = Record<LogLevel, LogFn>;

export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

export type LogEntry = {
  timestamp: string;
  run: string;
  level: "debug" | "info" | "warning" | "error";
  message: string;
  meta?: LogMeta;
};

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

function buildLogger(emit: (level: LogLevel, message: string, meta?: LogMeta) => void): Logger {
  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta)
  };
}

function atLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(minLevel);
}

export function formatLogEntry(run: string, level: LogLevel, message: string, meta?: LogMeta, now = new Date()): string {
  const entry: LogEntry = {
    timestamp: now.toISOString(),
    run,
    level: level === "warn" ? "warning" : level,
    message
  };
  if (meta && Object.keys(meta).length) entry.meta = meta;
  return JSON.stringify(entry);
}

type AppLoggerParams = {
  stateDir: string;
  label?: string;
  minLevel?: LogLevel;
};

/** JSON-lines run log under `<stateDir>/logs`, one file per invocation. */
export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const label = params.label ?? "triage";
  const minLevel = params.minLevel ?? "debug";
  const logsDir = path.join(params.stateDir, "logs");
  await mkdir(logsDir, { recursive: true });
  const filePath = path.join(logsDir, `${label}-${new Date().toISOString().replace(/[:.]/g, "-")}.jsonl`);
  const stream = createWriteStream(filePath, { flags: "a" });
  let open = true;
  stream.on("error", () => {
    open = false;
  });

  const logger = buildLogger((level, message, meta) => {
    if (!open || !atLeast(level, minLevel)) return;
    stream.write(`${formatLogEntry(label, level, message, meta)}\n`);
  });

  return {
    ...logger,
    path: filePath,
    close: async () => {
      if (!open) return;
      open = false;
      await new Promise<void>((resolve) => stream.end(resolve));
    }
  };
}

type ConsoleLoggerParams = {
  quiet?: boolean;
  debug?: boolean;
  write?: (line: string) => void;
};

/** Human-facing progress on stderr, so JSON output can own stdout. */
export function createConsoleLogger(params: ConsoleLoggerParams = {}): Logger {
  const write = params.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  return buildLogger((level, message) => {
    switch (level) {
      case "debug":
        if (params.debug) write(pc.dim(message));
        return;
      case "info":
        if (!params.quiet) write(message);
        return;
      case "warn":
        write(pc.yellow(message));
        return;
      case "error":
        write(pc.red(message));
        return;
    }
  });
}

export function teeLogger(...loggers: Logger[]): Logger {
  return buildLogger((level, message, meta) => {
    for (const logger of loggers) logger[level](message, meta);
  });
}

/** Adds fixed fields to every entry's meta; per-call meta wins on conflict. */
export function withContext(logger: Logger, context: LogMeta): Logger {
  return buildLogger((level, message, meta) => logger[level](message, { ...context, ...meta }));
}
