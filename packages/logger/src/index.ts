export { ConsoleLogger } from './console';
export {
  type CreateLoggerOptions,
  DEFAULT_REDACT_PATHS,
  LOG_LEVEL_WEIGHT,
  type LogFn,
  LogLevel,
  type Logger,
} from './types';
