import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';

import {
  LogLevel,
  LogCategory,
  type LogConfig,
  buildDefaultLogConfig,
  logLevelName,
  parseLogLevel,
} from './log-levels';

/** Per-request fields attached to every entry logged inside the request. */
export interface CorrelationContext {
  /** From X-Request-Id, or generated. */
  requestId: string;
  method?: string;
  path?: string;
  startTime?: number;
}

export interface StructuredLogEntry {
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

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

const SENSITIVE_KEY = /secret|password|token|authorization|bearer|credential/i;

/**
 * DirectoryLogger — leveled, category-aware, request-correlated logger.
 *
 *   this.logger.info(LogCategory.DIRECTORY, 'Search', { q: 'smith' });
 *   this.logger.error(LogCategory.LDAP, 'Bind failed', err);
 *
 * Recent entries are kept in a ring buffer for the admin log endpoints.
 */
@Injectable()
export class DirectoryLogger {
  private config: LogConfig;

  private readonly ringBuffer: StructuredLogEntry[] = [];
  private readonly maxRingBufferSize = 500;

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Correlation Context ──────────────────────────────────────────

  runWithContext<T>(ctx: CorrelationContext, fn: () => T): T {
    return correlationStorage.run(ctx, fn);
  }

  // ─── Configuration ────────────────────────────────────────────────

  getConfig(): LogConfig {
    return { ...this.config, categoryLevels: { ...this.config.categoryLevels } };
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

  getRecentLogs(query: RecentLogQuery = {}): StructuredLogEntry[] {
    let entries = [...this.ringBuffer];

    const minLevel = query.level;
    if (minLevel !== undefined) {
      entries = entries.filter((e) => parseLogLevel(e.level) >= minLevel);
    }
    if (query.category) {
      entries = entries.filter((e) => e.category === query.category);
    }
    if (query.requestId) {
      entries = entries.filter((e) => e.requestId === query.requestId);
    }

    return entries.slice(-(query.limit ?? 100));
  }

  clearRecentLogs(): void {
    this.ringBuffer.length = 0;
  }

  /** Whether a log at this level and category would be recorded. */
  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    const categoryLevel = category ? this.config.categoryLevels[category] : undefined;
    return level >= (categoryLevel ?? this.config.globalLevel);
  }

  // ─── Core ─────────────────────────────────────────────────────────

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
      entry.error = this.config.includeStackTraces ? errorInfo : { message: errorInfo.message, name: errorInfo.name };
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    this.ringBuffer.push(entry);
    if (this.ringBuffer.length > this.maxRingBufferSize) {
      this.ringBuffer.shift();
    }

    this.emit(level, entry);
  }

  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (error === undefined || error === null) return undefined;
    if (error instanceof Error) {
      return { message: error.message, name: error.name, stack: error.stack };
    }
    return { message: String(error) };
  }

  /** Redact secrets, truncate large payloads. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const max = this.config.maxPayloadSizeBytes;
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_KEY.test(key)) {
        result[key] = '[REDACTED]';
      } else if (typeof value === 'string' && value.length > max) {
        result[key] = `${value.slice(0, max)}...[truncated ${value.length - max}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value);
        result[key] = serialized.length > max ? `${serialized.slice(0, max)}...[truncated]` : value;
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  private emit(level: LogLevel, entry: StructuredLogEntry): void {
    if (this.config.format === 'json') {
      const stream = level >= LogLevel.WARN ? process.stderr : process.stdout;
      stream.write(JSON.stringify(entry) + '\n');
      return;
    }

    const line = this.formatPretty(level, entry);
    switch (level) {
      case LogLevel.TRACE:
      case LogLevel.DEBUG:
        // eslint-disable-next-line no-console
        console.debug(line);
        break;
      case LogLevel.INFO:
        // eslint-disable-next-line no-console
        console.log(line);
        break;
      case LogLevel.WARN:
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      default:
        // eslint-disable-next-line no-console
        console.error(line);
    }
  }

  private formatPretty(level: LogLevel, entry: StructuredLogEntry): string {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const reqId = entry.requestId ? ` [${entry.requestId.slice(0, 8)}]` : '';
    const dur = entry.durationMs !== undefined ? ` +${entry.durationMs}ms` : '';

    let line = `${ts} ${this.colorize(level, entry.level.padEnd(5))} ${entry.category.padEnd(10)}${reqId}${dur} ${entry.message}`;

    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack) {
        line += `\n${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      line += level <= LogLevel.DEBUG
        ? `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`
        : ` | ${JSON.stringify(entry.data)}`;
    }

    return line;
  }

  private colorize(level: LogLevel, text: string): string {
    if (!process.stdout.isTTY) return text;
    switch (level) {
      case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;
      case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;
      case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;
      case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;
      case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;
      case LogLevel.FATAL: return `\x1b[35m${text}\x1b[0m`;
      default: return text;
    }
  }
}
