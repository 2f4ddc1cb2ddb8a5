/**
 * Structured log levels, RFC 5424 / OpenTelemetry severity order:
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 *   TRACE: response bodies, raw LDAP filters.
 *   DEBUG: page requests, hit counts, bind/search steps.
 *   INFO : request start/finish, lookups performed.
 *   WARN : slow requests, rejected credentials, generated secrets.
 *   ERROR: directory backend failures, unexpected exceptions.
 *   FATAL: unrecoverable misconfiguration.
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

/** Case-insensitive name or numeric string; anything else is INFO. */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  // typeof check skips the numeric enum's reverse mapping ('0' → 'TRACE')
  const mapped: unknown = LogLevel[upper as keyof typeof LogLevel];
  if (typeof mapped === 'number') return mapped;
  const num = Number(upper);
  if (upper !== '' && Number.isInteger(num) && num >= LogLevel.TRACE && num <= LogLevel.OFF) return num;
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/** Functional areas that can be filtered independently. */
export enum LogCategory {
  /** HTTP request/response lifecycle */
  HTTP = 'http',
  /** Bearer-secret authentication */
  AUTH = 'auth',
  /** Directory search and by-id lookups */
  DIRECTORY = 'directory',
  /** Page request parsing and link building */
  PAGINATION = 'pagination',
  /** LDAP bind/search */
  LDAP = 'ldap',
  /** Configuration loading */
  CONFIG = 'config',
  GENERAL = 'general',
}

export interface LogConfig {
  globalLevel: LogLevel;
  /** e.g. { ldap: LogLevel.TRACE, auth: LogLevel.WARN } */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;
  includeStackTraces: boolean;
  /** Longer string/object payloads are truncated to this many characters. */
  maxPayloadSizeBytes: number;
  /** 'json' for aggregation, 'pretty' for a terminal. */
  format: 'json' | 'pretty';
}

export function isLogCategory(value: string): value is LogCategory {
  return Object.values(LogCategory).some((category) => category === value);
}

/** Default configuration from the environment. */
export function buildDefaultLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const isProd = env.NODE_ENV === 'production';
  const format = env.LOG_FORMAT === 'json' || env.LOG_FORMAT === 'pretty' ? env.LOG_FORMAT : undefined;
  return {
    globalLevel: parseLogLevel(env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(env.LOG_CATEGORY_LEVELS),
    includeStackTraces: env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd ? 'json' : (format ?? 'pretty'),
  };
}

/** LOG_CATEGORY_LEVELS format: "ldap=TRACE,auth=WARN". Unknown categories are ignored. */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    const category = cat?.trim();
    if (category && level && isLogCategory(category)) {
      result[category] = parseLogLevel(level.trim());
    }
  }
  return result;
}
