/**
 * Structured log levels, following RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 *   TRACE  — request/response bodies, generated SQL.
 *   DEBUG  — repository calls, backend selection, cache construction.
 *   INFO   — business events: user created, text tagged, language removed.
 *   WARN   — recoverable anomalies: slow request, rejected duplicate.
 *   ERROR  — failed operations: constraint violation, driver error, timeout.
 *   FATAL  — unrecoverable: storage unreachable at startup, bad configuration.
 *   OFF    — suppress all output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

const LEVEL_BY_NAME: Readonly<Record<string, LogLevel>> = {
  TRACE: LogLevel.TRACE,
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  FATAL: LogLevel.FATAL,
  OFF: LogLevel.OFF,
};

/** String → enum mapping (case-insensitive). Unknown input falls back to INFO. */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  const named = LEVEL_BY_NAME[upper];
  if (named !== undefined) return named;
  // Numeric fallback
  const num = Number(upper);
  if (upper !== '' && Number.isInteger(num) && num >= LogLevel.TRACE && num <= LogLevel.OFF) return num;
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/**
 * Log categories allow filtering by subsystem.
 */
export enum LogCategory {
  /** HTTP request/response lifecycle */
  HTTP = 'http',
  /** Repository calls and storage drivers */
  DATABASE = 'database',
  /** Backend selection and environment parsing */
  CONFIG = 'config',
  LANGUAGE = 'language',
  USER = 'user',
  TEXT = 'text',
  TAG = 'tag',
  VOCABULARY = 'vocabulary',
  GENERAL = 'general',
}

const CATEGORY_VALUES: readonly string[] = Object.values(LogCategory);

function isLogCategory(value: string): value is LogCategory {
  return CATEGORY_VALUES.includes(value);
}

export type LogFormat = 'json' | 'pretty';

export interface LogConfig {
  /** Global minimum level (LOG_LEVEL, default INFO). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { database: LogLevel.DEBUG, http: LogLevel.WARN }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include request/response bodies in TRACE output. */
  includePayloads: boolean;

  includeStackTraces: boolean;

  /** Larger values are truncated (default 8KB). */
  maxPayloadSizeBytes: number;

  format: LogFormat;
}

/** Build the log configuration from environment variables. */
export function buildDefaultLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const isProd = env.NODE_ENV === 'production';
  return {
    globalLevel: parseLogLevel(env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(env.LOG_CATEGORY_LEVELS),
    includePayloads: env.LOG_INCLUDE_PAYLOADS === 'true' || (!isProd && env.LOG_INCLUDE_PAYLOADS !== 'false'),
    includeStackTraces: env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd ? 'json' : parseLogFormat(env.LOG_FORMAT),
  };
}

function parseLogFormat(raw: string | undefined): LogFormat {
  return raw?.trim().toLowerCase() === 'json' ? 'json' : 'pretty';
}

/**
 * Parse LOG_CATEGORY_LEVELS.
 * Format: "database=DEBUG,http=WARN". Unknown categories are ignored.
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
