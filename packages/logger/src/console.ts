import {
  type CreateLoggerOptions,
  LOG_LEVEL_WEIGHT,
  type LogFn,
  LogLevel,
  type Logger,
} from './types';

type ConsoleMethod = (...args: unknown[]) => void;

/**
 * Logger writing to the console methods, with a timestamp merged into
 * the context object. Entries below `level` are discarded.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger({ component: 'exporter' }, LogLevel.Info);
 * logger.warn({ status: 503 }, 'Export failed');
 * // { component: 'exporter', status: 503, ts: 1234567890 } Export failed
 * ```
 */
export class ConsoleLogger implements Logger {
  constructor(
    readonly data: Record<string, unknown> = {},
    readonly level: LogLevel = LogLevel.Info,
  ) {}

  private createLogFn(level: LogLevel, logMethod: ConsoleMethod): LogFn {
    return <T extends object>(
      objOrMsg: T | string,
      msg?: string,
      ...args: unknown[]
    ): void => {
      if (LOG_LEVEL_WEIGHT[level] < LOG_LEVEL_WEIGHT[this.level]) {
        return;
      }

      const ts = Date.now();

      if (typeof objOrMsg === 'string') {
        logMethod({ ...this.data, ts }, objOrMsg, ...args);
        return;
      }

      const mergedData = { ...this.data, ...objOrMsg, ts };
      if (msg) {
        logMethod(mergedData, msg, ...args);
      } else {
        logMethod(mergedData, ...args);
      }
    };
  }

  debug: LogFn = this.createLogFn(LogLevel.Debug, console.debug.bind(console));
  info: LogFn = this.createLogFn(LogLevel.Info, console.info.bind(console));
  warn: LogFn = this.createLogFn(LogLevel.Warn, console.warn.bind(console));
  error: LogFn = this.createLogFn(LogLevel.Error, console.error.bind(console));
  // fatal has no console method of its own
  fatal: LogFn = this.createLogFn(LogLevel.Fatal, console.error.bind(console));
  trace: LogFn = this.createLogFn(LogLevel.Trace, console.trace.bind(console));

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger({ ...this.data, ...bindings }, this.level);
  }
}

/**
 * Creates a console logger with the same options as the pino variant.
 * Redaction is not applied.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const data = options.name ? { name: options.name } : {};
  return new ConsoleLogger(data, options.level);
}
