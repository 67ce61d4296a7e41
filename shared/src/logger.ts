/**
 * Pipeline Logging Utilities
 *
 * Thin wrappers over console that respect LOG_LEVEL.
 *
 * LOG_LEVEL=debug → dLog, nLog, wLog, eLog
 * LOG_LEVEL=info  → nLog, wLog, eLog (default)
 * LOG_LEVEL=warn  → wLog, eLog
 * LOG_LEVEL=error → eLog
 * LOG_LEVEL=silent → nothing
 *
 * Callers prefix their own tag, e.g. nLog("[ingest] received 3 records").
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function parseLevel(raw: string | undefined): LogLevel {
  const v = (raw || "").trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error" || v === "silent") {
    return v;
  }
  return "info";
}

let currentLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/** Debug log, only with LOG_LEVEL=debug */
export function dLog(...args: unknown[]): void {
  if (enabled("debug")) console.debug(...args);
}

/** Normal log */
export function nLog(...args: unknown[]): void {
  if (enabled("info")) console.log(...args);
}

/** Warning log */
export function wLog(...args: unknown[]): void {
  if (enabled("warn")) console.warn(...args);
}

/** Error log */
export function eLog(...args: unknown[]): void {
  if (enabled("error")) console.error(...args);
}

/**
 * Best-effort message extraction for logs and persisted error text.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
