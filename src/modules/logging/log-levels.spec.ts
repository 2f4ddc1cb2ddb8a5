import {
  LogLevel,
  LogCategory,
  parseLogLevel,
  logLevelName,
  buildDefaultLogConfig,
  parseCategoryLevels,
  isLogCategory,
} from './log-levels';

describe('log-levels', () => {
  // ─── parseLogLevel ────────────────────────────────────────────────

  describe('parseLogLevel', () => {
    it('should return INFO for undefined or empty input', () => {
      expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
      expect(parseLogLevel('')).toBe(LogLevel.INFO);
    });

    it('should parse names case-insensitively', () => {
      expect(parseLogLevel('TRACE')).toBe(LogLevel.TRACE);
      expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel('Warn')).toBe(LogLevel.WARN);
      expect(parseLogLevel('  ERROR  ')).toBe(LogLevel.ERROR);
      expect(parseLogLevel('off')).toBe(LogLevel.OFF);
    });

    it('should accept numeric strings in range', () => {
      expect(parseLogLevel('0')).toBe(LogLevel.TRACE);
      expect(parseLogLevel('5')).toBe(LogLevel.FATAL);
      expect(parseLogLevel('6')).toBe(LogLevel.OFF);
    });

    it('should return INFO for out-of-range or unknown values', () => {
      expect(parseLogLevel('-1')).toBe(LogLevel.INFO);
      expect(parseLogLevel('7')).toBe(LogLevel.INFO);
      expect(parseLogLevel('2.5')).toBe(LogLevel.INFO);
      expect(parseLogLevel('VERBOSE')).toBe(LogLevel.INFO);
    });
  });

  describe('logLevelName', () => {
    it('should map levels back to names', () => {
      expect(logLevelName(LogLevel.TRACE)).toBe('TRACE');
      expect(logLevelName(LogLevel.FATAL)).toBe('FATAL');
    });
  });

  // ─── Categories ───────────────────────────────────────────────────

  describe('parseCategoryLevels', () => {
    it('should return an empty record when unset', () => {
      expect(parseCategoryLevels(undefined)).toEqual({});
    });

    it('should parse known categories and skip unknown ones', () => {
      expect(parseCategoryLevels('ldap=TRACE, auth=warn,billing=DEBUG,broken')).toEqual({
        [LogCategory.LDAP]: LogLevel.TRACE,
        [LogCategory.AUTH]: LogLevel.WARN,
      });
    });
  });

  describe('isLogCategory', () => {
    it('should recognise category values', () => {
      expect(isLogCategory('pagination')).toBe(true);
      expect(isLogCategory('PAGINATION')).toBe(false);
    });
  });

  // ─── buildDefaultLogConfig ────────────────────────────────────────

  describe('buildDefaultLogConfig', () => {
    it('should use pretty output and INFO outside production', () => {
      const config = buildDefaultLogConfig({ NODE_ENV: 'development' });
      expect(config).toEqual({
        globalLevel: LogLevel.INFO,
        categoryLevels: {},
        includeStackTraces: true,
        maxPayloadSizeBytes: 8192,
        format: 'pretty',
      });
    });

    it('should force json output in production', () => {
      const config = buildDefaultLogConfig({ NODE_ENV: 'production', LOG_FORMAT: 'pretty' });
      expect(config.format).toBe('json');
    });

    it('should read level, stacks and payload size from env', () => {
      const config = buildDefaultLogConfig({
        LOG_LEVEL: 'debug',
        LOG_INCLUDE_STACKS: 'false',
        LOG_MAX_PAYLOAD_SIZE: '512',
        LOG_FORMAT: 'json',
        LOG_CATEGORY_LEVELS: 'directory=TRACE',
      });
      expect(config.globalLevel).toBe(LogLevel.DEBUG);
      expect(config.includeStackTraces).toBe(false);
      expect(config.maxPayloadSizeBytes).toBe(512);
      expect(config.format).toBe('json');
      expect(config.categoryLevels).toEqual({ directory: LogLevel.TRACE });
    });
  });
});
