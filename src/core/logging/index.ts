export {
  DEFAULT_LOGGER_CONFIG,
  getLoggerConfigFromEnv,
  LoggerConfigSchema,
  resolveLoggerConfig,
} from './config.js';
export {
  CREDENTIAL_REDACT_PATHS,
  createContextLogger,
  createLogger,
  getComponentLogger,
  getResourceLogger,
  getRunLogger,
  logger,
  serializeError,
} from './logger.js';
export type { LoggerConfig, LoggerContext, LogLevel, StrataLogger } from './types.js';
