import { describe, expect, it } from 'vitest';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  getConfigFromEnv,
  resolveConfig,
} from '../../../src/core/config/index.js';
import { ValidationError } from '../../../src/core/errors.js';

describe('orchestrator configuration', () => {
  it('should use the defaults without environment or overrides', () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_ORCHESTRATOR_CONFIG);
  });

  it('should read STRATA_* variables', () => {
    expect(
      getConfigFromEnv({ STRATA_CONCURRENCY: '3', STRATA_FINALIZER_TIMEOUT_MS: '1000', STRATA_DELETION_TIMEOUT_MS: ' ' })
    ).toEqual({
      concurrency: 3,
      backendCallTimeoutMs: undefined,
      readiness: { timeoutMs: undefined, intervalMs: undefined },
      deletion: { timeoutMs: undefined, intervalMs: undefined, finalizerTimeoutMs: 1000 },
    });
  });

  it('should let explicit overrides win over the environment', () => {
    const config = resolveConfig(
      { concurrency: 2, readiness: { intervalMs: 50 } },
      { STRATA_CONCURRENCY: '8', STRATA_READINESS_TIMEOUT_MS: '1000' }
    );

    expect(config.concurrency).toBe(2);
    expect(config.readiness).toEqual({ timeoutMs: 1000, intervalMs: 50 });
    expect(config.deletion).toEqual(DEFAULT_ORCHESTRATOR_CONFIG.deletion);
  });

  it('should reject variables that are not numbers', () => {
    expect(() => resolveConfig({}, { STRATA_CONCURRENCY: 'many' })).toThrow(
      new ValidationError("STRATA_CONCURRENCY must be a number, got 'many'", 'orchestrator config')
    );
  });

  it('should validate the merged result', () => {
    let caught: unknown;
    try {
      resolveConfig({ concurrency: 0 }, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.message).toMatch(/^Invalid orchestrator config at 'concurrency': /);
      expect(caught.field).toBe('concurrency');
    }
  });
});
