/**
 * Leveled console logger with a context tag and a JSON data payload.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const MASKED_FIELDS = ["secret", "token", "password", "authorization"];

let minLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);

export function parseLevel(input: string | undefined): LogLevel {
  const value = input?.toLowerCase();
  return value === "debug" || value === "info" || value === "warn" || value === "error"
    ? value
    : "info";
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function maskValue(value: string): string {
  if (value.length < 8) return "***";
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

function sanitize(value: unknown, depth = 0): unknown {
  if (depth > 5) return "[nested]";
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map((item) => sanitize(item, depth + 1));
  if (value !== null && typeof value === "object") {
    if ("toJSON" in value && typeof value.toJSON === "function") {
      return String(value);
    }
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const lower = key.toLowerCase();
      if (MASKED_FIELDS.some((f) => lower.includes(f))) {
        out[key] = typeof entry === "string" ? maskValue(entry) : "[redacted]";
      } else {
        out[key] = sanitize(entry, depth + 1);
      }
    }
    return out;
  }
  return value;
}

export function formatMessage(
  level: LogLevel,
  context: string,
  message: string,
  data?: unknown,
): string {
  const base = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${context}] ${message}`;
  return data === undefined ? base : `${base} ${JSON.stringify(sanitize(data))}`;
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[minLevel];
}

function errorData(error: unknown): unknown {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return { message: error.message, code, stack: error.stack };
  }
  return error;
}

export const logger = {
  debug: (context: string, message: string, data?: unknown) => {
    if (shouldLog("debug")) console.log(formatMessage("debug", context, message, data));
  },
  info: (context: string, message: string, data?: unknown) => {
    if (shouldLog("info")) console.log(formatMessage("info", context, message, data));
  },
  warn: (context: string, message: string, data?: unknown) => {
    if (shouldLog("warn")) console.warn(formatMessage("warn", context, message, data));
  },
  error: (context: string, message: string, error?: unknown) => {
    if (shouldLog("error")) {
      console.error(
        formatMessage("error", context, message, error === undefined ? undefined : errorData(error)),
      );
    }
  },
};

export default logger;
