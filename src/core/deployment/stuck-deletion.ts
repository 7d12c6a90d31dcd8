/**
 * Stuck-deletion recovery
 *
 * Deletion is asynchronous on most backends: the delete call returns and
 * the resource lingers until whatever holds it (finalizers on a cluster
 * object) lets go. Recovery polls for a first window, clears finalizers
 * once, polls a second window and then gives up with StuckDeletionError.
 * Every step is logged.
 */

import { type RecoveryStep, StuckDeletionError } from '../errors.js';
import type { StrataLogger } from '../logging/index.js';
import { type ProbeResult, waitUntilReady } from '../readiness/index.js';
import type { BackendRef, ObservedResource, ResourceBackend } from '../types/backend.js';
import type { ResourceNode } from '../types/resource.js';

export interface DeletionWindows {
  timeoutMs: number;
  intervalMs: number;
  finalizerTimeoutMs: number;
}

export interface AwaitDeletionParams {
  node: ResourceNode;
  ref: BackendRef;
  backend: ResourceBackend;
  windows: DeletionWindows;
  /** Clear finalizers once if the first window runs out */
  recover: boolean;
  logger: StrataLogger;
  /** Reads the resource within the executor's call timeout */
  observe: () => Promise<ObservedResource | null>;
  /** Wraps the clear call in the executor's timeout and error attribution */
  clearFinalizers: () => Promise<void>;
}

/**
 * Wait for a deleted resource to disappear. Resolves with the steps taken.
 */
export async function awaitDeletion(params: AwaitDeletionParams): Promise<RecoveryStep[]> {
  const { node, ref, backend, windows, logger } = params;
  const steps: RecoveryStep[] = ['delete-requested'];
  const started = Date.now();

  const probe = async (): Promise<ProbeResult<null>> => {
    const observed = await params.observe();
    if (observed === null) {
      return { ready: true, value: null };
    }
    return { ready: false, reason: observed.message ?? observed.phase };
  };

  logger.info('Deletion requested', { kind: node.kind, backendId: ref.backendId });

  const first = await waitUntilReady(probe, {
    timeoutMs: windows.timeoutMs,
    intervalMs: windows.intervalMs,
  });
  if (first.outcome === 'ready') {
    steps.push('verified-gone');
    logger.info('Deletion verified', { elapsedMs: Date.now() - started });
    return steps;
  }

  if (!params.recover || !backend.clearFinalizers) {
    steps.push('still-present');
    logger.error('Resource still present after deletion window', undefined, {
      elapsedMs: Date.now() - started,
      lastReason: first.outcome === 'timed-out' ? first.lastReason : first.reason,
    });
    throw new StuckDeletionError(node.id, node.kind, Date.now() - started, steps);
  }

  steps.push('stuck-detected');
  logger.warn('Deletion stuck, clearing finalizers', {
    elapsedMs: Date.now() - started,
    windowMs: windows.timeoutMs,
  });

  await params.clearFinalizers();
  steps.push('finalizers-cleared');
  logger.warn('Finalizers cleared', { elapsedMs: Date.now() - started });

  const second = await waitUntilReady(probe, {
    timeoutMs: windows.finalizerTimeoutMs,
    intervalMs: windows.intervalMs,
  });
  if (second.outcome === 'ready') {
    steps.push('verified-gone');
    logger.info('Deletion verified after clearing finalizers', { elapsedMs: Date.now() - started });
    return steps;
  }

  steps.push('still-present');
  logger.error('Resource still present after clearing finalizers', undefined, {
    elapsedMs: Date.now() - started,
  });
  throw new StuckDeletionError(node.id, node.kind, Date.now() - started, steps);
}
