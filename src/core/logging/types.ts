/**
 * Logger contract used across strata. Every component logs through this
 * interface; pino is the only implementation.
 */
export interface StrataLogger {
  trace(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  /** `error` is serialized with its code and context when it is a StrataError */
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;
  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): StrataLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  /** pino-pretty transport */
  pretty: boolean;
  /** File path for the pino/file transport; stdout when absent */
  destination?: string | undefined;
  timestamp: boolean;
  /** Extra pino redaction paths on top of the credential fields */
  redact?: string[] | undefined;
}

/**
 * Bindings a child logger carries on every line
 */
export interface LoggerContext {
  component?: string;
  nodeId?: string;
  runId?: string;
  stage?: string;
  binding?: string;
  [key: string]: unknown;
}
