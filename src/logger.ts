// Structured logger for Bug Sleuth.
// Supports log levels (debug, info, warn, error) with timestamped
// single-line messages. Every line goes to stderr so that command
// output on stdout can be piped.
// Limitations: No file-based logging or log rotation.

import type { LogLevel } from "./types.js";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEY_PATTERN = /token|api[-_]?key|authorization|password|secret/i;

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLevel];
}

function redact(ctx: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(ctx)) {
    out[key] = SENSITIVE_KEY_PATTERN.test(key) ? "[redacted]" : value;
  }
  return out;
}

export function formatLine(
  level: LogLevel,
  msg: string,
  ctx?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const tag = level.toUpperCase().padEnd(5);
  let line = `[${now.toISOString()}] ${tag} ${msg}`;
  if (ctx && Object.keys(ctx).length > 0) {
    line += ` ${JSON.stringify(redact(ctx))}`;
  }
  return line;
}

// Bounded view of untrusted text (agent output, HTTP bodies) for log lines.
export function excerpt(text: string, maxChars = 200): string {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= maxChars) {
    return flat;
  }
  return `${flat.slice(0, maxChars)}...`;
}

function emit(
  level: LogLevel,
  msg: string,
  ctx?: Record<string, unknown>
): void {
  if (shouldLog(level)) console.error(formatLine(level, msg, ctx));
}

export const logger = {
  debug(msg: string, ctx?: Record<string, unknown>): void {
    emit("debug", msg, ctx);
  },
  info(msg: string, ctx?: Record<string, unknown>): void {
    emit("info", msg, ctx);
  },
  warn(msg: string, ctx?: Record<string, unknown>): void {
    emit("warn", msg, ctx);
  },
  error(msg: string, ctx?: Record<string, unknown>): void {
    emit("error", msg, ctx);
  },
};
