/**
 * Pino-backed diagnostics logger.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@spanwire/logger/pino';
 *
 * const logger = createLogger({ level: LogLevel.Warn, redact: true });
 * logger.warn({ token: 'abc' }, 'Export failed');
 * // { "token": "[Redacted]", "msg": "Export failed", ... }
 * ```
 *
 * @module
 */
import { pino } from 'pino';
import {
  type CreateLoggerOptions,
  DEFAULT_REDACT_PATHS,
  type Logger,
} from './types';

export function resolveRedactPaths(
  redact: CreateLoggerOptions['redact'],
): string[] | undefined {
  if (redact === undefined || redact === false) {
    return undefined;
  }

  if (redact === true) {
    return DEFAULT_REDACT_PATHS;
  }

  return [...DEFAULT_REDACT_PATHS, ...redact];
}

/**
 * Creates a pino logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'spanwire', redact: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const redact = resolveRedactPaths(options.redact);

  return pino({
    ...(options.name && { name: options.name }),
    ...(options.level && { level: options.level }),
    ...(redact && { redact }),
    formatters: {
      bindings(bindings) {
        return { ...bindings, nodeVersion: process.version };
      },
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
  });
}
