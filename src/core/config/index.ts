/**
 * Orchestrator configuration
 *
 * Defaults, then STRATA_* environment variables, then explicit overrides.
 * The merged result is validated once.
 */

import { type } from 'arktype';
import { formatArktypeError, ValidationError } from '../errors.js';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  type OrchestratorConfig,
  type OrchestratorConfigOverrides,
  OrchestratorConfigSchema,
} from './schema.js';

export * from './schema.js';

type Env = Readonly<Record<string, string | undefined>>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number, got '${raw}'`, 'orchestrator config', name, [
      `Unset ${name} or give it a whole number`,
    ]);
  }
  return value;
}

/**
 * Overrides found in the environment
 */
export function getConfigFromEnv(env: Env = process.env): OrchestratorConfigOverrides {
  return {
    concurrency: readNumber(env, 'STRATA_CONCURRENCY'),
    backendCallTimeoutMs: readNumber(env, 'STRATA_BACKEND_TIMEOUT_MS'),
    readiness: {
      timeoutMs: readNumber(env, 'STRATA_READINESS_TIMEOUT_MS'),
      intervalMs: readNumber(env, 'STRATA_READINESS_INTERVAL_MS'),
    },
    deletion: {
      timeoutMs: readNumber(env, 'STRATA_DELETION_TIMEOUT_MS'),
      intervalMs: readNumber(env, 'STRATA_DELETION_INTERVAL_MS'),
      finalizerTimeoutMs: readNumber(env, 'STRATA_FINALIZER_TIMEOUT_MS'),
    },
  };
}

export function mergeConfig(
  base: OrchestratorConfig,
  overrides: OrchestratorConfigOverrides
): OrchestratorConfig {
  const readiness = overrides.readiness ?? {};
  const deletion = overrides.deletion ?? {};
  return {
    concurrency: overrides.concurrency ?? base.concurrency,
    backendCallTimeoutMs: overrides.backendCallTimeoutMs ?? base.backendCallTimeoutMs,
    readiness: {
      timeoutMs: readiness.timeoutMs ?? base.readiness.timeoutMs,
      intervalMs: readiness.intervalMs ?? base.readiness.intervalMs,
    },
    deletion: {
      timeoutMs: deletion.timeoutMs ?? base.deletion.timeoutMs,
      intervalMs: deletion.intervalMs ?? base.deletion.intervalMs,
      finalizerTimeoutMs: deletion.finalizerTimeoutMs ?? base.deletion.finalizerTimeoutMs,
    },
  };
}

export function validateConfig(config: unknown): OrchestratorConfig {
  const result = OrchestratorConfigSchema(config);
  if (result instanceof type.errors) {
    throw formatArktypeError(result, 'orchestrator config');
  }
  return result;
}

/**
 * Defaults, environment and explicit overrides, in that order of precedence
 */
export function resolveConfig(
  overrides: OrchestratorConfigOverrides = {},
  env: Env = process.env
): OrchestratorConfig {
  const merged = mergeConfig(mergeConfig(DEFAULT_ORCHESTRATOR_CONFIG, getConfigFromEnv(env)), overrides);
  return validateConfig(merged);
}
