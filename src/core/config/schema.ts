import { type, type Type } from 'arktype';

export interface WaitWindowConfig {
  timeoutMs: number;
  intervalMs: number;
}

export interface DeletionConfig extends WaitWindowConfig {
  /** Second window, after finalizers were cleared */
  finalizerTimeoutMs: number;
}

export interface OrchestratorConfig {
  /** Worker pool size for independent nodes */
  concurrency: number;
  /** Upper bound of one backend call */
  backendCallTimeoutMs: number;
  readiness: WaitWindowConfig;
  deletion: DeletionConfig;
}

export interface WaitWindowOverrides {
  timeoutMs?: number | undefined;
  intervalMs?: number | undefined;
}

export interface DeletionOverrides extends WaitWindowOverrides {
  finalizerTimeoutMs?: number | undefined;
}

export interface OrchestratorConfigOverrides {
  concurrency?: number | undefined;
  backendCallTimeoutMs?: number | undefined;
  readiness?: WaitWindowOverrides | undefined;
  deletion?: DeletionOverrides | undefined;
}

export const OrchestratorConfigSchema: Type<OrchestratorConfig> = type({
  concurrency: 'number.integer >= 1',
  backendCallTimeoutMs: 'number.integer >= 1',
  readiness: {
    timeoutMs: 'number.integer >= 0',
    intervalMs: 'number.integer >= 1',
  },
  deletion: {
    timeoutMs: 'number.integer >= 0',
    intervalMs: 'number.integer >= 1',
    finalizerTimeoutMs: 'number.integer >= 0',
  },
});

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  concurrency: 10,
  backendCallTimeoutMs: 120_000,
  readiness: {
    timeoutMs: 600_000,
    intervalMs: 10_000,
  },
  deletion: {
    timeoutMs: 300_000,
    intervalMs: 5_000,
    finalizerTimeoutMs: 120_000,
  },
};
