/**
 * Namespaced stderr logger.
 *
 * Lines look like `2026-01-01T00:00:00.000Z [WARN] [chat-session] message {"key":"value"}`.
 * LOG_LEVEL (debug | info | warn | error | silent, default warn) is read on every call,
 * so loading .env after modules are imported still takes effect; setLogLevel pins it.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EmitLevel = Exclude<LogLevel, "silent">;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

let configuredLevel: LogLevel | null = null;

/** Pin the level for the rest of the process (null returns to reading LOG_LEVEL). */
export function setLogLevel(level: LogLevel | null): void {
  configuredLevel = level;
}

function currentLevel(): LogLevel {
  if (configuredLevel) return configuredLevel;
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function formatLogLine(
  level: EmitLevel,
  namespace: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const contextStr = context && Object.keys(context).length > 0 ? ` ${safeStringify(context)}` : "";
  return `${now.toISOString()} [${level.toUpperCase()}] [${namespace}] ${message}${contextStr}\n`;
}

function safeStringify(context: Record<string, unknown>): string {
  try {
    return JSON.stringify(context, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value
    );
  } catch {
    return '"[unserializable context]"';
  }
}

/** Create a logger for one module; `write` defaults to stderr. */
export function createLogger(
  namespace: string,
  write: (line: string) => void = (line) => {
    process.stderr.write(line);
  }
): Logger {
  const emit = (level: EmitLevel, message: string, context?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel()]) return;
    write(formatLogLine(level, namespace, message, context));
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
  };
}
