export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const LOG_LEVEL_ENV = 'TOOLTUNNEL_LOG_LEVEL';

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const normalized = value?.trim().toUpperCase() ?? '';
  return isLogLevel(normalized) ? normalized : fallback;
}

let threshold: LogLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]);

/**
 * Entries below `level` are dropped.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

function timestamp(dt = new Date()): string {
  const y = dt.getFullYear();
  const m = String(dt.getMonth() + 1).padStart(2, '0');
  const d = String(dt.getDate()).padStart(2, '0');
  const hh = String(dt.getHours()).padStart(2, '0');
  const mm = String(dt.getMinutes()).padStart(2, '0');
  const ss = String(dt.getSeconds()).padStart(2, '0');
  const ms = String(dt.getMilliseconds()).padStart(3, '0');
  return `${y}.${m}.${d} ${hh}:${mm}:${ss}.${ms}`;
}

/**
 * One JSON object per line on stdout: `timestamp`, `level`, `event`, then the extra fields.
 */
export function logJsonl(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
  if (!enabled(level)) {
    return;
  }

  console.log(
    JSON.stringify({
      timestamp: timestamp(),
      level,
      event,
      ...fields,
    }),
  );
}

/**
 * Human-oriented single line, filtered by the same threshold as `logJsonl`.
 */
export function log(level: LogLevel, message: string): void {
  if (!enabled(level)) {
    return;
  }

  console.log(`[${timestamp()}] ${level} - ${message}`);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
