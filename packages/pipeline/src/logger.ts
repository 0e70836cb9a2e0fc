import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

export interface LogMeta {
  [key: string]: unknown;
}

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

export interface RuntimeLogger extends Logger {
  /** Resolves once every queued file write has settled. */
  flush: () => Promise<void>;
}

export interface RuntimeLoggerOptions {
  logFile?: string;
  echo?: boolean;
  now?: () => Date;
}

function formatMetaValue(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  meta: LogMeta = {},
  at: Date = new Date(),
): string {
  const parts = [at.toISOString(), level.toUpperCase(), message];
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined) {
      continue;
    }
    parts.push(`${key}=${formatMetaValue(value)}`);
  }
  return parts.join(" ");
}

export function createRuntimeLogger(options: RuntimeLoggerOptions = {}): RuntimeLogger {
  const logFile = options.logFile?.trim() ?? "";
  const echo = options.echo ?? true;
  const now = options.now ?? (() => new Date());
  const reportWriteFailure = (error: unknown): void => {
    const reason = error instanceof Error ? error.message : String(error);
    process.stderr.write(`log write failed (${logFile}): ${reason}\n`);
  };
  let queue: Promise<void> = logFile
    ? mkdir(path.dirname(logFile), { recursive: true }).then(() => undefined, reportWriteFailure)
    : Promise.resolve();

  const queueWrite = (line: string): void => {
    queue = queue
      .then(async () => {
        await appendFile(logFile, `${line}\n`, "utf8");
      })
      .catch(reportWriteFailure);
  };

  const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
    const line = formatLogLine(level, message, meta, now());
    if (echo) {
      if (level === "info") {
        console.log(line);
      } else if (level === "warn") {
        console.warn(line);
      } else {
        console.error(line);
      }
    }
    if (logFile) {
      queueWrite(line);
    }
  };

  return {
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    flush: () => queue,
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
