import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, getLogger, resetLogger } from '../../src/logger/index.js';

describe('Logger', () => {
  afterEach(() => {
    resetLogger();
  });

  it('should throw before createLogger() is called', () => {
    expect(() => getLogger()).toThrow('Logger not initialized. Call createLogger() first.');
  });

  it('should create a console logger at the configured level', () => {
    const logger = createLogger({ level: 'warn', maxSize: '10m', maxFiles: 10 });
    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(getLogger()).toBe(logger);
  });
});
