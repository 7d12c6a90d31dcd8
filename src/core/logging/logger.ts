import pino from 'pino';
import { StrataError } from '../errors.js';
import { resolveLoggerConfig } from './config.js';
import type { LoggerConfig, LoggerContext, StrataLogger } from './types.js';

/**
 * Fields that carry cluster or database credentials
 */
export const CREDENTIAL_REDACT_PATHS: readonly string[] = [
  'accessToken',
  '*.accessToken',
  'caCertificate',
  '*.caCertificate',
  'password',
  '*.password',
  'stringData',
  '*.stringData',
];

export function serializeError(error: Error): Record<string, unknown> {
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error instanceof StrataError) {
    serialized.code = error.code;
    if (error.context) serialized.context = error.context;
  } else if ('code' in error && typeof error.code === 'string') {
    serialized.code = error.code;
  }
  if (error.cause instanceof Error) {
    serialized.cause = serializeError(error.cause);
  }
  return serialized;
}

class PinoLogger implements StrataLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta, msg);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pinoLogger.error(withError(meta, error), msg);
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pinoLogger.fatal(withError(meta, error), msg);
  }

  child(bindings: Record<string, unknown>): StrataLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function withError(meta: Record<string, unknown> | undefined, error: Error | undefined): Record<string, unknown> {
  return error ? { ...meta, error: serializeError(error) } : { ...meta };
}

function transportFor(config: LoggerConfig): pino.TransportSingleOptions | undefined {
  if (config.pretty) {
    return {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    };
  }
  if (config.destination && config.destination !== 'stdout') {
    return { target: 'pino/file', options: { destination: config.destination, mkdir: true } };
  }
  return undefined;
}

/**
 * Build a logger from STRATA_LOG_* settings and `overrides`
 */
export function createLogger(overrides?: Partial<LoggerConfig>): StrataLogger {
  const config = resolveLoggerConfig(overrides);

  const options: pino.LoggerOptions = {
    level: config.level,
    timestamp: config.timestamp,
    base: { service: 'strata' },
    redact: { paths: [...CREDENTIAL_REDACT_PATHS, ...(config.redact ?? [])], censor: '[redacted]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  const transport = transportFor(config);
  return new PinoLogger(transport ? pino(options, pino.transport(transport)) : pino(options));
}

export function createContextLogger(context: LoggerContext, overrides?: Partial<LoggerConfig>): StrataLogger {
  return createLogger(overrides).child(context);
}

export const logger: StrataLogger = createLogger();

export function getComponentLogger(component: string, context?: LoggerContext): StrataLogger {
  return logger.child({ component, ...context });
}

export function getResourceLogger(nodeId: string, context?: LoggerContext): StrataLogger {
  return logger.child({ nodeId, ...context });
}

/**
 * Logger for one apply or destroy run; every line carries the run id
 */
export function getRunLogger(runId: string, context?: LoggerContext): StrataLogger {
  return logger.child({ runId, ...context });
}
