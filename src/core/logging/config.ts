import { type } from 'arktype';
import { formatArktypeError } from '../errors.js';
import type { LoggerConfig, LogLevel } from './types.js';

export const LoggerConfigSchema = type({
  level: "'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'",
  pretty: 'boolean',
  'destination?': 'string | undefined',
  timestamp: 'boolean',
  'redact?': 'string[] | undefined',
});

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
  timestamp: true,
};

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Logger settings from STRATA_LOG_* variables. An unknown level falls back
 * to the default rather than failing startup.
 */
export function getLoggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

  const level = env.STRATA_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    config.level = level;
  }
  if (env.NODE_ENV === 'development' || env.STRATA_LOG_PRETTY === 'true') {
    config.pretty = true;
  }
  if (env.STRATA_LOG_DESTINATION) {
    config.destination = env.STRATA_LOG_DESTINATION;
  }
  if (env.STRATA_LOG_TIMESTAMP === 'false') {
    config.timestamp = false;
  }

  return config;
}

/**
 * Environment settings with explicit overrides on top, validated
 */
export function resolveLoggerConfig(overrides: Partial<LoggerConfig> = {}): LoggerConfig {
  const parsed = LoggerConfigSchema({ ...getLoggerConfigFromEnv(), ...overrides });
  if (parsed instanceof type.errors) {
    throw formatArktypeError(parsed, 'logger config');
  }
  return parsed;
}
