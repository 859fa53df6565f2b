import { AppLogger } from './app-logger.service';
import { LogCategory, LogLevel } from './log-levels';

describe('AppLogger', () => {
  let logger: AppLogger;
  let stdout: jest.SpyInstance;
  let stderr: jest.SpyInstance;

  beforeEach(() => {
    stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    logger = new AppLogger();
    logger.updateConfig({ format: 'json', globalLevel: LogLevel.INFO, categoryLevels: {}, maxPayloadSizeBytes: 8192 });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // ─── Levels ────────────────────────────────────────────────────────

  describe('levels', () => {
    it('should drop entries below the global level', () => {
      logger.debug(LogCategory.USER, 'hidden');
      logger.info(LogCategory.USER, 'shown');

      expect(logger.getRecentLogs().map(entry => entry.message)).toEqual(['shown']);
    });

    it('should let a category override the global level', () => {
      logger.setCategoryLevel(LogCategory.DATABASE, 'TRACE');

      logger.trace(LogCategory.DATABASE, 'Language.getById');
      logger.trace(LogCategory.TEXT, 'hidden');

      expect(logger.getRecentLogs().map(entry => entry.message)).toEqual(['Language.getById']);
      expect(logger.isEnabled(LogLevel.TRACE, LogCategory.DATABASE)).toBe(true);
      expect(logger.isEnabled(LogLevel.TRACE, LogCategory.TEXT)).toBe(false);
    });

    it('should emit nothing when OFF', () => {
      logger.setGlobalLevel(LogLevel.OFF);
      logger.fatal(LogCategory.GENERAL, 'hidden');

      expect(logger.getRecentLogs()).toEqual([]);
      expect(stderr).not.toHaveBeenCalled();
    });
  });

  // ─── Output ────────────────────────────────────────────────────────

  describe('output', () => {
    it('should write INFO to stdout and WARN to stderr as one JSON line each', () => {
      logger.info(LogCategory.LANGUAGE, 'Language created', { languageId: 'lang-1' });
      logger.warn(LogCategory.LANGUAGE, 'Slow');

      expect(stdout).toHaveBeenCalledTimes(1);
      expect(stderr).toHaveBeenCalledTimes(1);
      const line = String(stdout.mock.calls[0]?.[0]);
      expect(line.endsWith('\n')).toBe(true);
      expect(JSON.parse(line)).toMatchObject({
        level: 'INFO',
        category: 'language',
        message: 'Language created',
        data: { languageId: 'lang-1' },
      });
    });

    it('should attach error details', () => {
      logger.error(LogCategory.DATABASE, 'Insert failed', new TypeError('bad row'));

      const [entry] = logger.getRecentLogs();
      expect(entry?.error).toMatchObject({ name: 'TypeError', message: 'bad row' });
      expect(entry?.error?.stack).toEqual(expect.any(String));
    });

    it('should omit stacks when disabled', () => {
      logger.updateConfig({ includeStackTraces: false });
      logger.error(LogCategory.DATABASE, 'Insert failed', new Error('bad row'));

      expect(logger.getRecentLogs()[0]?.error).toEqual({ message: 'bad row', name: 'Error' });
    });
  });

  // ─── Sanitizing ────────────────────────────────────────────────────

  describe('sanitizing', () => {
    it('should redact sensitive keys at any depth', () => {
      logger.info(LogCategory.USER, 'User created', {
        userId: 'user-1',
        passwordHash: 'test-hash',
        body: { email: 'ana@example.com', password: 'test-secret' },
      });

      expect(logger.getRecentLogs()[0]?.data).toEqual({
        userId: 'user-1',
        passwordHash: '[REDACTED]',
        body: { email: 'ana@example.com', password: '[REDACTED]' },
      });
    });

    it('should truncate long strings', () => {
      logger.updateConfig({ maxPayloadSizeBytes: 10 });
      logger.info(LogCategory.TEXT, 'Text created', { content: 'abcdefghijklmnop' });

      expect(logger.getRecentLogs()[0]?.data).toEqual({ content: 'abcdefghij...[truncated 6B]' });
    });
  });

  // ─── Correlation ───────────────────────────────────────────────────

  describe('correlation', () => {
    it('should stamp entries with the request context', async () => {
      await logger.runWithContext({ requestId: 'req-1', method: 'GET', path: '/languages' }, async () => {
        await Promise.resolve();
        logger.info(LogCategory.HTTP, 'inside');
      });
      logger.info(LogCategory.HTTP, 'outside');

      const [inside, outside] = logger.getRecentLogs();
      expect(inside).toMatchObject({ requestId: 'req-1', method: 'GET', path: '/languages' });
      expect(outside?.requestId).toBeUndefined();
    });

    it('should filter recent entries', () => {
      logger.runWithContext({ requestId: 'req-2' }, () => logger.warn(LogCategory.HTTP, 'slow'));
      logger.info(LogCategory.USER, 'created');
      logger.error(LogCategory.DATABASE, 'failed');

      expect(logger.getRecentLogs({ level: LogLevel.WARN }).map(e => e.message)).toEqual(['slow', 'failed']);
      expect(logger.getRecentLogs({ category: LogCategory.USER }).map(e => e.message)).toEqual(['created']);
      expect(logger.getRecentLogs({ requestId: 'req-2' }).map(e => e.message)).toEqual(['slow']);
      expect(logger.getRecentLogs({ limit: 1 }).map(e => e.message)).toEqual(['failed']);

      logger.clearRecentLogs();
      expect(logger.getRecentLogs()).toEqual([]);
    });
  });
});
