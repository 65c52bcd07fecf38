import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, createLogger } from '../console';
import { LogLevel } from '../types';

describe('ConsoleLogger', () => {
  const originalConsole = {
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
    trace: console.trace,
  };

  beforeEach(() => {
    console.debug = vi.fn();
    console.info = vi.fn();
    console.warn = vi.fn();
    console.error = vi.fn();
    console.trace = vi.fn();

    vi.spyOn(Date, 'now').mockReturnValue(1234567890);
  });

  afterEach(() => {
    console.debug = originalConsole.debug;
    console.info = originalConsole.info;
    console.warn = originalConsole.warn;
    console.error = originalConsole.error;
    console.trace = originalConsole.trace;

    vi.restoreAllMocks();
  });

  it('should merge context and timestamp into structured entries', () => {
    const logger = new ConsoleLogger({ component: 'exporter' });

    logger.warn({ status: 503 }, 'Export failed');

    expect(console.warn).toHaveBeenCalledWith(
      { component: 'exporter', status: 503, ts: 1234567890 },
      'Export failed',
    );
  });

  it('should log plain messages with context', () => {
    const logger = new ConsoleLogger({ component: 'batcher' });

    logger.info('Flushed');

    expect(console.info).toHaveBeenCalledWith(
      { component: 'batcher', ts: 1234567890 },
      'Flushed',
    );
  });

  it('should log a context object without message', () => {
    const logger = new ConsoleLogger();

    logger.error({ dropped: 4 });

    expect(console.error).toHaveBeenCalledWith({ dropped: 4, ts: 1234567890 });
  });

  it('should route fatal to console.error', () => {
    const logger = new ConsoleLogger();

    logger.fatal('Shutting down');

    expect(console.error).toHaveBeenCalledWith(
      { ts: 1234567890 },
      'Shutting down',
    );
  });

  it('should discard entries below the configured level', () => {
    const logger = new ConsoleLogger({}, LogLevel.Warn);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(console.debug).not.toHaveBeenCalled();
    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should discard everything when silent', () => {
    const logger = new ConsoleLogger({}, LogLevel.Silent);

    logger.fatal('hidden');

    expect(console.error).not.toHaveBeenCalled();
  });

  it('should create child loggers that inherit context and level', () => {
    const parent = new ConsoleLogger({ app: 'svc' }, LogLevel.Error);
    const child = parent.child({ component: 'fallback' });

    child.warn('hidden');
    child.error({ path: '/tmp/x' }, 'Write failed');

    expect(console.warn).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      { app: 'svc', component: 'fallback', path: '/tmp/x', ts: 1234567890 },
      'Write failed',
    );
  });

  it('should build a logger from options', () => {
    const logger = createLogger({ name: 'spanwire', level: LogLevel.Debug });

    logger.debug('ready');

    expect(console.debug).toHaveBeenCalledWith(
      { name: 'spanwire', ts: 1234567890 },
      'ready',
    );
  });
});
