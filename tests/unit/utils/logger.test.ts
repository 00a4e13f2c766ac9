import { logger, Logger, LogLevel } from '../../../src/utils/logger';

describe('Logger', () => {
  let write: jest.SpyInstance;

  beforeEach(() => {
    write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    write.mockRestore();
    logger.configure({ level: LogLevel.CRITICAL });
  });

  it('should parse level names case-insensitively', () => {
    expect(Logger.parseLogLevel('warn')).toBe(LogLevel.WARN);
    expect(Logger.parseLogLevel('Debug')).toBe(LogLevel.DEBUG);
    expect(Logger.parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });

  it('should format message, context and error on one line', () => {
    const line = logger.formatLogEntry({
      timestamp: '2026-03-01T12:00:00.000Z',
      level: LogLevel.WARN,
      message: 'Refresh failed',
      context: { repository: 'octo-org/widgets' },
      error: new Error('timeout'),
    });

    expect(line).toBe(
      '[2026-03-01T12:00:00.000Z] WARN: Refresh failed | Context: {"repository":"octo-org/widgets"} | Error: timeout'
    );
  });

  it('should omit an empty context', () => {
    const line = logger.formatLogEntry({
      timestamp: '2026-03-01T12:00:00.000Z',
      level: LogLevel.INFO,
      message: 'Listening for host messages',
      context: {},
    });

    expect(line).toBe('[2026-03-01T12:00:00.000Z] INFO: Listening for host messages');
  });

  it('should write to stderr only at or above the configured level', () => {
    logger.configure({ level: LogLevel.WARN });

    logger.info('ignored');
    logger.warn('kept');

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0])).toMatch(/WARN: kept\n$/);
  });
});
