import { config } from '../../src/config';
import { logger, LogLevel } from '../../src/utils/logger';

describe('Project Setup', () => {
  it('should have proper test environment', () => {
    expect(process.env.NODE_ENV).toBe('test');
    expect(config.isTest()).toBe(true);
  });

  it('should apply the test environment overrides', () => {
    expect(config.get('database').path).toBe(':memory:');
    expect(config.get('github').requestTimeout).toBe(2000);
  });

  it('should keep the logger quiet during tests', () => {
    expect(logger.getLogLevel()).toBe(LogLevel.CRITICAL);
  });
});
