export type LogLevel = "debug" | "info" | "warn" | "error";

let currentLevel: LogLevel = "info";

const order: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SECRET_KEYS = new Set(["token", "authorization", "secret"]);

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in order;
}

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel) {
  return order[level] >= order[currentLevel];
}

/**
 * Replace bearer credentials in structured metadata before it reaches the console.
 * Only plain objects are walked; errors and arrays pass through untouched.
 */
export function redact(value: unknown): unknown {
  if (!value || typeof value !== "object" || Array.isArray(value) || value instanceof Error) {
    return value;
  }
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[key] = SECRET_KEYS.has(key.toLowerCase()) ? "[redacted]" : redact(inner);
  }
  return out;
}

export function debug(...args: unknown[]) {
  if (shouldLog("debug")) console.debug(...args.map(redact));
}

export function info(...args: unknown[]) {
  if (shouldLog("info")) console.info(...args.map(redact));
}

export function warn(...args: unknown[]) {
  if (shouldLog("warn")) console.warn(...args.map(redact));
}

export function error(...args: unknown[]) {
  if (shouldLog("error")) console.error(...args.map(redact));
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const emit = (fn: (...args: unknown[]) => void) => (message: string, meta?: Record<string, unknown>) => {
    if (meta) {
      fn(prefix, message, meta);
      return;
    }
    fn(prefix, message);
  };
  return {
    debug: emit(debug),
    info: emit(info),
    warn: emit(warn),
    error: emit(error),
  };
}
