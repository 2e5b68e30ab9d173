import chalk, { type ChalkInstance } from "chalk";
import type { OutputFormat } from "../types/config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | undefined>;

export type LogSink = { write(chunk: string): unknown };

export interface Logger {
  debug(code: string, message: string, fields?: LogFields): void;
  info(code: string, message: string, fields?: LogFields): void;
  warn(code: string, message: string, fields?: LogFields): void;
  error(code: string, message: string, fields?: LogFields): void;
}

export type LoggerOptions = {
  format?: OutputFormat;
  verbose?: boolean;
  stream?: LogSink;
  color?: ChalkInstance;
  now?: () => Date;
};

function clock(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Line logger for diagnostics. Writes to stderr by default so that stdout only
 * carries the command's report.
 *
 * `jsonl` lines have the same shape as the CLI's other machine-readable output:
 * `{ level, code, message, ...fields }`. Debug lines are dropped unless `verbose`.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const format = opts.format ?? "human";
  const verbose = opts.verbose ?? false;
  const stream = opts.stream ?? process.stderr;
  const c = opts.color ?? chalk;
  const now = opts.now ?? (() => new Date());

  function emit(level: LogLevel, code: string, message: string, fields: LogFields = {}): void {
    if (level === "debug" && !verbose) return;

    if (format === "jsonl") {
      stream.write(JSON.stringify({ level, code, message, ...fields }) + "\n");
      return;
    }

    const scope = typeof fields.project === "string" ? `[${fields.project}] ` : "";
    const line = `${clock(now())} ${scope}${message}`;
    switch (level) {
      case "debug":
        stream.write(c.dim(line) + "\n");
        break;
      case "warn":
        stream.write(c.yellow(line) + "\n");
        break;
      case "error":
        stream.write(c.red(line) + "\n");
        break;
      default:
        stream.write(line + "\n");
    }
  }

  return {
    debug: (code, message, fields) => emit("debug", code, message, fields),
    info: (code, message, fields) => emit("info", code, message, fields),
    warn: (code, message, fields) => emit("warn", code, message, fields),
    error: (code, message, fields) => emit("error", code, message, fields),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
