import type { LogEvent, LogLevel, LogSink } from "@barline/core";

export type LoggerLevel = LogLevel | "silent";
export type LoggerFormat = "text" | "json";

export type Logger = Readonly<{
  scope: string;
  level: LoggerLevel;
  log: LogSink;
  child: (scope: string) => Logger;
}>;

export type LoggerOptions = Readonly<{
  scope: string;
  level?: LoggerLevel;
  format?: LoggerFormat;
  /** Receives one complete line without the trailing newline. */
  write?: (line: string) => void;
  now?: () => Date;
}>;

const LEVEL_RANK: Readonly<Record<LoggerLevel, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
});

export const LOGGER_LEVELS: readonly string[] = Object.freeze(Object.keys(LEVEL_RANK));

export function isLoggerLevel(v: string): v is LoggerLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, v);
}

function writeStderr(line: string): void {
  try {
    process.stderr.write(`${line}\n`);
  } catch {
    // stderr closed under us; nothing left to report to.
  }
}

function formatValue(v: string | number | boolean | null): string {
  if (typeof v === "string") return /[\s"=]/.test(v) || v.length === 0 ? JSON.stringify(v) : v;
  return String(v);
}

export function formatTextLine(scope: string, event: LogEvent): string {
  let line = `barline[${scope}] ${event.level}: ${event.message}`;
  if (event.fields) {
    for (const [key, value] of Object.entries(event.fields)) {
      line += ` ${key}=${formatValue(value)}`;
    }
  }
  return line;
}

export function createLogger(opts: LoggerOptions): Logger {
  const level = opts.level ?? "info";
  const format = opts.format ?? "text";
  const write = opts.write ?? writeStderr;
  const now = opts.now ?? (() => new Date());
  const threshold = LEVEL_RANK[level];

  const log: LogSink = (event) => {
    if (LEVEL_RANK[event.level] < threshold) return;
    if (format === "json") {
      write(
        JSON.stringify({
          ts: now().toISOString(),
          pid: process.pid,
          level: event.level,
          scope: opts.scope,
          message: event.message,
          ...(event.fields ?? {}),
        }),
      );
      return;
    }
    write(formatTextLine(opts.scope, event));
  };

  return Object.freeze({
    scope: opts.scope,
    level,
    log,
    child(scope: string): Logger {
      return createLogger({ ...opts, scope: `${opts.scope}:${scope}` });
    },
  });
}
