/**
 * Console logger with bracketed scope tags, e.g. `[retriever] retrieved 4 chunks`.
 * The minimum level comes from LOG_LEVEL (debug | info | warn | error | silent).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type LogContext = Record<string, unknown>;

export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const v = value?.trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error" || v === "silent") return v;
  return fallback;
}

let minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function write(level: Exclude<LogLevel, "silent">, scope: string, msg: string, ctx?: LogContext) {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;

  const line = `[${scope}] ${msg}`;
  const args: unknown[] = ctx ? [line, ctx] : [line];

  if (level === "error") console.error(...args);
  else if (level === "warn") console.warn(...args);
  else console.log(...args);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (msg, ctx) => write("debug", scope, msg, ctx),
    info: (msg, ctx) => write("info", scope, msg, ctx),
    warn: (msg, ctx) => write("warn", scope, msg, ctx),
    error: (msg, ctx) => write("error", scope, msg, ctx),
  };
}
