/**
 * Structured JSON logging.
 *
 * One line per event on stderr, so stdout stays reserved for the stdio
 * MCP transport.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function emit(level: LogLevel, msg: string, fields: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[threshold]) return;
  process.stderr.write(
    JSON.stringify({ timestamp: new Date().toISOString(), level, msg, ...fields }) + "\n",
  );
}

export const log = {
  debug: (msg: string, fields: Record<string, unknown> = {}) => emit("debug", msg, fields),
  info: (msg: string, fields: Record<string, unknown> = {}) => emit("info", msg, fields),
  warn: (msg: string, fields: Record<string, unknown> = {}) => emit("warn", msg, fields),
  error: (msg: string, fields: Record<string, unknown> = {}) => emit("error", msg, fields),
};
