import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
  parseLogLevel,
} from './log-levels';

/**
 * Correlation context attached to every log entry within a single request.
 */
export interface CorrelationContext {
  /** Propagated from the X-Request-Id header or generated. */
  requestId: string;
  method?: string;
  path?: string;
  /** Start timestamp for duration tracking */
  startTime?: number;
}

/**
 * A single structured log entry.
 * In JSON mode these are emitted as one line per entry.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  requestId?: string;
  method?: string;
  path?: string;
  durationMs?: number;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
}

export interface RecentLogQuery {
  limit?: number;
  level?: LogLevel;
  category?: LogCategory;
  requestId?: string;
}

const SENSITIVE_KEY = /secret|password|token|hash|authorization|bearer/i;

// Request-scoped correlation context
const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

/**
 * AppLogger — structured, leveled, correlation-aware logger.
 *
 * - Levels TRACE → FATAL with global and per-category thresholds
 * - Request correlation ids carried across async boundaries
 * - JSON output for production, pretty output for development
 * - Sensitive keys (passwords, hashes, tokens) are redacted
 *
 * Usage:
 *   this.logger.info(LogCategory.USER, 'User created', { userId: user.id });
 *   this.logger.error(LogCategory.DATABASE, 'Insert failed', err, { entity: 'Text' });
 */
@Injectable()
export class AppLogger {
  private config: LogConfig;

  /** Recent entries, newest last */
  private readonly ringBuffer: StructuredLogEntry[] = [];
  private readonly maxRingBufferSize = 500;

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Correlation Context ──────────────────────────────────────────

  runWithContext<T>(ctx: CorrelationContext, fn: () => T): T {
    return correlationStorage.run(ctx, fn);
  }

  getContext(): CorrelationContext | undefined {
    return correlationStorage.getStore();
  }

  // ─── Configuration ────────────────────────────────────────────────

  getConfig(): LogConfig {
    return { ...this.config, categoryLevels: { ...this.config.categoryLevels } };
  }

  updateConfig(partial: Partial<LogConfig>): void {
    this.config = { ...this.config, ...partial };
  }

  setGlobalLevel(level: LogLevel | string): void {
    this.config.globalLevel = typeof level === 'string' ? parseLogLevel(level) : level;
  }

  setCategoryLevel(category: LogCategory, level: LogLevel | string): void {
    this.config.categoryLevels[category] = typeof level === 'string' ? parseLogLevel(level) : level;
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, this.formatError(error));
  }

  fatal(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, category, message, data, this.formatError(error));
  }

  // ─── Ring buffer ──────────────────────────────────────────────────

  getRecentLogs(options?: RecentLogQuery): StructuredLogEntry[] {
    let entries = [...this.ringBuffer];

    if (options?.level !== undefined) {
      const minLevel = options.level;
      entries = entries.filter(e => parseLogLevel(e.level) >= minLevel);
    }
    if (options?.category) {
      const category: string = options.category;
      entries = entries.filter(e => e.category === category);
    }
    if (options?.requestId) {
      entries = entries.filter(e => e.requestId === options.requestId);
    }

    const limit = options?.limit ?? 100;
    return entries.slice(-limit);
  }

  clearRecentLogs(): void {
    this.ringBuffer.length = 0;
  }

  // ─── Core logging logic ───────────────────────────────────────────

  /** Whether a log at `level` in `category` would be emitted. */
  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    const override = category !== undefined ? this.config.categoryLevels[category] : undefined;
    return level >= (override ?? this.config.globalLevel);
  }

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    errorInfo?: StructuredLogEntry['error'],
  ): void {
    if (level === LogLevel.OFF || !this.isEnabled(level, category)) return;

    const ctx = correlationStorage.getStore();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
      requestId: ctx?.requestId,
      method: ctx?.method,
      path: ctx?.path,
    };

    if (ctx?.startTime !== undefined) {
      entry.durationMs = Date.now() - ctx.startTime;
    }

    if (errorInfo) {
      entry.error = this.config.includeStackTraces
        ? errorInfo
        : { message: errorInfo.message, name: errorInfo.name };
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    this.ringBuffer.push(entry);
    if (this.ringBuffer.length > this.maxRingBufferSize) {
      this.ringBuffer.shift();
    }

    if (this.config.format === 'json') {
      this.emitJson(level, entry);
    } else {
      this.emitPretty(level, entry);
    }
  }

  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (error === undefined || error === null) return undefined;
    if (error instanceof Error) {
      return { message: error.message, name: error.name, stack: error.stack };
    }
    return { message: String(error) };
  }

  /** Redact secrets and truncate large payloads. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const max = this.config.maxPayloadSizeBytes;
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_KEY.test(key)) {
        result[key] = '[REDACTED]';
        continue;
      }

      if (typeof value === 'string' && value.length > max) {
        result[key] = value.slice(0, max) + `...[truncated ${value.length - max}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value, (k: string, v: unknown) =>
          k !== '' && SENSITIVE_KEY.test(k) ? '[REDACTED]' : v,
        );
        if (serialized.length > max) {
          result[key] = serialized.slice(0, max) + '...[truncated]';
        } else {
          const redacted: unknown = JSON.parse(serialized);
          result[key] = redacted;
        }
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  /** One JSON line per entry; WARN and above go to stderr. */
  private emitJson(level: LogLevel, entry: StructuredLogEntry): void {
    const line = JSON.stringify(entry) + '\n';
    if (level >= LogLevel.WARN) {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  }

  private emitPretty(level: LogLevel, entry: StructuredLogEntry): void {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const lvl = entry.level.padEnd(5);
    const cat = entry.category.padEnd(10);
    const reqId = entry.requestId ? ` [${entry.requestId.slice(0, 8)}]` : '';
    const dur = entry.durationMs !== undefined ? ` +${entry.durationMs}ms` : '';
    const route = entry.method && entry.path ? ` ${entry.method} ${entry.path}` : '';

    let line = `${ts} ${this.colorize(level, lvl)} ${cat}${reqId}${route}${dur} ${entry.message}`;

    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack) {
        line += `\n${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
      } else {
        const compact = JSON.stringify(entry.data);
        if (compact.length <= 200) {
          line += ` | ${compact}`;
        }
      }
    }

    /* eslint-disable no-console */
    switch (level) {
      case LogLevel.TRACE:
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.log(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.error(line);
        break;
    }
    /* eslint-enable no-console */
  }

  private colorize(level: LogLevel, text: string): string {
    if (!process.stdout.isTTY) return text;
    switch (level) {
      case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;  // gray
      case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;  // cyan
      case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;  // green
      case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;  // yellow
      case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;  // red
      case LogLevel.FATAL: return `\x1b[35m${text}\x1b[0m`;  // magenta
      default: return text;
    }
  }
}
