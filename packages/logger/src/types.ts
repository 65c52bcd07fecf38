/**
 * Logging function type that supports both structured and simple logging.
 *
 * @example
 * ```typescript
 * logger.warn({ url, status: 503 }, 'Export failed');
 * logger.info('Exporter shut down');
 * ```
 */
export type LogFn = {
  /** Structured logging with a context object and optional message */
  <T extends object>(obj: T, msg?: string, ...args: unknown[]): void;
  /** Simple string logging */
  (msg: string): void;
};

/**
 * Diagnostics logger used by the telemetry pipeline.
 * Anything pino-shaped satisfies it.
 */
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  trace: LogFn;
  /**
   * Creates a child logger whose entries all carry `bindings`.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Fatal = 'fatal',
  Silent = 'silent',
}

/** Numeric weight of each level, lowest first. */
export const LOG_LEVEL_WEIGHT: Record<LogLevel, number> = {
  [LogLevel.Trace]: 10,
  [LogLevel.Debug]: 20,
  [LogLevel.Info]: 30,
  [LogLevel.Warn]: 40,
  [LogLevel.Error]: 50,
  [LogLevel.Fatal]: 60,
  [LogLevel.Silent]: Number.POSITIVE_INFINITY,
};

export type CreateLoggerOptions = {
  level?: LogLevel;
  /** Name bound to every entry */
  name?: string;
  /**
   * `true` masks {@link DEFAULT_REDACT_PATHS}; an array adds paths to them.
   */
  redact?: boolean | string[];
};

/**
 * Paths masked when redaction is on. Covers the ingest token and
 * the HTTP headers it travels in.
 */
export const DEFAULT_REDACT_PATHS: string[] = [
  'token',
  'authorization',
  '*.token',
  '*.authorization',
  'headers.authorization',
  'headers.Authorization',
  'headers["authorization"]',
  'headers["Authorization"]',
];
