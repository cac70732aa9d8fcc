import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, createLogger, NoopLogger } from '../index';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should filter below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'warn', includeTimestamps: false });

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] shown');
  });

  it('should write prefix and context', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger({ includeTimestamps: false, prefix: 'exporter' });

    logger.error('failed to export view', { view: 'latency' });

    expect(error).toHaveBeenCalledWith('[ERROR] [exporter] failed to export view {"view":"latency"}');
  });

  it('should write nothing when off', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'off' });

    logger.error('silent');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('NoopLogger', () => {
  it('should accept every call', () => {
    const logger = new NoopLogger();

    expect(() => {
      logger.info('a');
      logger.error('b', { c: 1 });
    }).not.toThrow();
  });
});
