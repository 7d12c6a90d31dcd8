/**
 * Reconciliation Executor
 *
 * Drives one node through its lifecycle against one backend: create, update
 * on a changed input fingerprint, or destroy according to the deletion
 * policy. All state writes go through the StateStore under the node's lock.
 */

import type { OrchestratorConfig, WaitWindowConfig } from '../config/index.js';
import {
  BackendCallFailedError,
  ProtectedResourceError,
  ResourceFailedError,
  StrataError,
  errorCodeOf,
} from '../errors.js';
import { getResourceLogger, type StrataLogger } from '../logging/index.js';
import { waitUntilReadyOrThrow } from '../readiness/index.js';
import { diffInputs, fingerprintInputs } from '../references/index.js';
import type { StateStore } from '../state/index.js';
import type { BackendRef, ObservedResource, ResourceBackend } from '../types/backend.js';
import type { ApplyEvent, ReconcileAction } from '../types/events.js';
import {
  DeletionPolicy,
  NodeStatus,
  ResourceKind,
  type NodeOutputs,
  type ResolvedInputs,
  type ResourceNode,
} from '../types/resource.js';
import type { StateRecord } from '../types/state.js';
import { awaitDeletion } from './stuck-deletion.js';
import { withTimeout } from './timeouts.js';

/**
 * Kinds that wait for readiness after create/update unless told otherwise
 */
export const READINESS_WAIT_KINDS: ReadonlySet<ResourceKind> = new Set([
  ResourceKind.Cluster,
  ResourceKind.DatabaseInstance,
  ResourceKind.PeeringConnection,
  ResourceKind.CustomResourceDefinition,
  ResourceKind.Certificate,
  ResourceKind.OperatorDeployment,
  ResourceKind.WorkloadInstance,
]);

/**
 * Kinds whose deletion is known to hang on finalizers
 */
export const STUCK_DELETION_RECOVERY_KINDS: ReadonlySet<ResourceKind> = new Set([
  ResourceKind.Namespace,
  ResourceKind.CustomResourceDefinition,
]);

export interface ReconcileResult {
  action: ReconcileAction;
  record: Readonly<StateRecord> | undefined;
}

export function readinessWindow(
  node: ResourceNode,
  defaults: WaitWindowConfig
): WaitWindowConfig | undefined {
  if (node.readiness === false) {
    return undefined;
  }
  if (node.readiness === undefined && !READINESS_WAIT_KINDS.has(node.kind)) {
    return undefined;
  }
  return {
    timeoutMs: node.readiness?.timeoutMs ?? defaults.timeoutMs,
    intervalMs: node.readiness?.intervalMs ?? defaults.intervalMs,
  };
}

export function recoversStuckDeletion(node: ResourceNode): boolean {
  return node.recoverStuckDeletion ?? STUCK_DELETION_RECOVERY_KINDS.has(node.kind);
}

export class ReconciliationExecutor {
  constructor(
    private readonly store: StateStore,
    private readonly config: OrchestratorConfig,
    private readonly emit: (event: ApplyEvent) => void = () => undefined
  ) {}

  /**
   * Bring one node to Ready with the given resolved inputs
   */
  async reconcile(
    node: ResourceNode,
    inputs: ResolvedInputs,
    backend: ResourceBackend
  ): Promise<ReconcileResult> {
    return this.store.withNodeLock(node.id, async () => {
      const logger = getResourceLogger(node.id, { kind: node.kind });
      const current = this.store.ensure(node);
      const fingerprint = fingerprintInputs(inputs);

      if (current.status === NodeStatus.Ready && current.backendId !== undefined) {
        if (current.fingerprint === fingerprint) {
          logger.debug('Inputs unchanged, skipping');
          return { action: 'unchanged', record: current };
        }
        return this.update(node, current, current.backendId, inputs, fingerprint, backend, logger);
      }

      this.resetForRetry(current);
      if (current.backendId !== undefined) {
        return this.resume(node, current, current.backendId, inputs, fingerprint, backend, logger);
      }
      return this.create(node, inputs, fingerprint, backend, logger);
    });
  }

  /**
   * Remove one node according to its deletion policy
   */
  async destroy(node: ResourceNode, backend: ResourceBackend | undefined): Promise<ReconcileResult> {
    return this.store.withNodeLock(node.id, async () => {
      const logger = getResourceLogger(node.id, { kind: node.kind });
      const current = this.store.get(node.id);

      if (!current || current.status === NodeStatus.Destroyed) {
        this.store.remove(node.id);
        return { action: 'absent', record: undefined };
      }

      if (node.deletionPolicy === DeletionPolicy.Protect) {
        throw new ProtectedResourceError(node.id, node.kind);
      }

      if (node.deletionPolicy === DeletionPolicy.Abandon) {
        this.store.remove(node.id);
        logger.info('Abandoned, dropped from state without a backend call');
        return { action: 'abandoned', record: undefined };
      }

      if (current.backendId === undefined) {
        this.store.remove(node.id);
        logger.debug('Never created, nothing to delete');
        return { action: 'absent', record: undefined };
      }

      if (!backend) {
        throw new BackendCallFailedError(node.id, node.kind, 'delete', 'no backend is available');
      }

      if (current.status === NodeStatus.Creating || current.status === NodeStatus.Updating) {
        this.store.transition(node.id, NodeStatus.Failed, {
          lastError: { code: 'INTERRUPTED', message: `interrupted while ${current.status}` },
        });
      }
      this.store.transition(node.id, NodeStatus.Destroying);

      const ref: BackendRef = {
        nodeId: node.id,
        kind: node.kind,
        backendId: current.backendId,
        inputs: current.inputs,
      };

      try {
        await this.call(node, 'delete', () => backend.delete(ref));
        const steps = await awaitDeletion({
          node,
          ref,
          backend,
          windows: this.config.deletion,
          recover: recoversStuckDeletion(node),
          logger,
          observe: () => this.call(node, 'get', () => backend.get(ref)),
          clearFinalizers: () =>
            this.call(node, 'clear finalizers of', async () => {
              if (backend.clearFinalizers) {
                await backend.clearFinalizers(ref);
              }
            }),
        });
        const record = this.store.transition(node.id, NodeStatus.Destroyed);
        this.store.remove(node.id);
        logger.info('Destroyed', { steps });
        return { action: 'destroyed', record };
      } catch (error) {
        throw this.fail(node, error, logger);
      }
    });
  }

  private async create(
    node: ResourceNode,
    inputs: ResolvedInputs,
    fingerprint: string,
    backend: ResourceBackend,
    logger: StrataLogger
  ): Promise<ReconcileResult> {
    this.store.transition(node.id, NodeStatus.Creating, { inputs, fingerprint });
    logger.debug('Creating');

    try {
      const created = await this.call(node, 'create', () =>
        backend.create({ nodeId: node.id, kind: node.kind, inputs })
      );
      this.store.transition(node.id, NodeStatus.Creating, {
        backendId: created.backendId,
        outputs: created.outputs,
      });

      const ref: BackendRef = {
        nodeId: node.id,
        kind: node.kind,
        backendId: created.backendId,
        inputs,
      };
      const observed = await this.awaitReady(node, ref, backend);
      const record = this.store.transition(node.id, NodeStatus.Ready, {
        backendId: created.backendId,
        outputs: { ...created.outputs, ...observed },
        inputs,
        fingerprint,
      });

      logger.info('Created', { backendId: created.backendId });
      return { action: 'created', record };
    } catch (error) {
      throw this.fail(node, error, logger);
    }
  }

  private async update(
    node: ResourceNode,
    current: Readonly<StateRecord>,
    backendId: string,
    inputs: ResolvedInputs,
    fingerprint: string,
    backend: ResourceBackend,
    logger: StrataLogger
  ): Promise<ReconcileResult> {
    const diff = diffInputs(current.inputs, inputs);
    this.store.transition(node.id, NodeStatus.Updating);
    logger.debug('Updating', { diff });

    const ref: BackendRef = { nodeId: node.id, kind: node.kind, backendId, inputs };

    try {
      const updated = await this.call(node, 'update', () => backend.update(ref, inputs, diff));
      const observed = await this.awaitReady(node, ref, backend);
      const record = this.store.transition(node.id, NodeStatus.Ready, {
        outputs: { ...current.outputs, ...updated.outputs, ...observed },
        inputs,
        fingerprint,
      });

      logger.info('Updated', { changed: diff.changed, added: diff.added, removed: diff.removed });
      return { action: 'updated', record };
    } catch (error) {
      throw this.fail(node, error, logger);
    }
  }

  /**
   * Pick up a resource an earlier pass created but never saw through to
   * Ready: apply any input change to the tracked id, then wait for it
   */
  private async resume(
    node: ResourceNode,
    current: Readonly<StateRecord>,
    backendId: string,
    inputs: ResolvedInputs,
    fingerprint: string,
    backend: ResourceBackend,
    logger: StrataLogger
  ): Promise<ReconcileResult> {
    this.store.transition(node.id, NodeStatus.Creating);
    logger.debug('Resuming', { backendId });

    const ref: BackendRef = { nodeId: node.id, kind: node.kind, backendId, inputs };
    let existing: ObservedResource | null;
    try {
      existing = await this.call(node, 'get', () => backend.get(ref));
    } catch (error) {
      throw this.fail(node, error, logger);
    }

    if (existing === null) {
      logger.info('Tracked resource is gone, creating it again', { backendId });
      return this.create(node, inputs, fingerprint, backend, logger);
    }

    try {
      if (existing.phase === 'terminating') {
        throw new ResourceFailedError(`${node.kind} '${node.id}'`, existing.message ?? 'still being deleted');
      }

      const changed = current.fingerprint !== fingerprint;
      let outputs: NodeOutputs = { ...current.outputs, ...(existing.phase === 'ready' ? existing.outputs : {}) };
      if (changed) {
        const diff = diffInputs(current.inputs, inputs);
        logger.debug('Updating', { diff });
        const updated = await this.call(node, 'update', () => backend.update(ref, inputs, diff));
        outputs = { ...outputs, ...updated.outputs };
      }

      const observed = await this.awaitReady(node, ref, backend);
      const record = this.store.transition(node.id, NodeStatus.Ready, {
        backendId,
        outputs: { ...outputs, ...observed },
        inputs,
        fingerprint,
      });

      logger.info('Resumed', { backendId, changed });
      return { action: changed ? 'updated' : 'created', record };
    } catch (error) {
      throw this.fail(node, error, logger);
    }
  }

  /**
   * Poll `get` until the backend reports the resource ready; returns the
   * outputs it reported
   */
  private async awaitReady(
    node: ResourceNode,
    ref: BackendRef,
    backend: ResourceBackend
  ): Promise<NodeOutputs> {
    const window = readinessWindow(node, this.config.readiness);
    if (!window) {
      return {};
    }

    return waitUntilReadyOrThrow<NodeOutputs>(
      `${node.kind} '${node.id}'`,
      async () => {
        const observed = await this.call(node, 'get', () => backend.get(ref));
        if (observed === null) {
          return { ready: false, reason: 'not visible yet' };
        }
        switch (observed.phase) {
          case 'ready':
            return { ready: true, value: observed.outputs ?? {} };
          case 'failed':
            return { ready: false, terminal: true, reason: observed.message ?? 'failed' };
          default:
            return { ready: false, reason: observed.message ?? observed.phase };
        }
      },
      {
        ...window,
        onAttempt: (attempt, result) => {
          if (!result.ready) {
            this.emit({
              type: 'progress',
              nodeId: node.id,
              stage: node.stage,
              message: `Waiting for ${node.kind} '${node.id}' (attempt ${attempt})${
                result.reason ? `: ${result.reason}` : ''
              }`,
              timestamp: new Date(),
            });
          }
        },
      }
    );
  }

  /**
   * Call the backend within the configured timeout, attributing failures to the node
   */
  private async call<T>(node: ResourceNode, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this.config.backendCallTimeoutMs, `${operation} of ${node.kind} '${node.id}'`);
    } catch (error) {
      if (error instanceof StrataError) {
        throw error;
      }
      throw new BackendCallFailedError(node.id, node.kind, operation, error);
    }
  }

  /**
   * A Failed node, or one left mid-operation by an earlier run, restarts at Planned
   */
  private resetForRetry(current: Readonly<StateRecord>): void {
    if (
      current.status === NodeStatus.Creating ||
      current.status === NodeStatus.Updating ||
      current.status === NodeStatus.Destroying
    ) {
      this.store.transition(current.id, NodeStatus.Failed, {
        lastError: { code: 'INTERRUPTED', message: `interrupted while ${current.status}` },
      });
    }
    if (current.status !== NodeStatus.Planned) {
      this.store.transition(current.id, NodeStatus.Planned);
    }
  }

  private fail(node: ResourceNode, error: unknown, logger: StrataLogger): Error {
    const cause =
      error instanceof StrataError ? error : new BackendCallFailedError(node.id, node.kind, 'reconcile', error);
    const record = this.store.get(node.id);
    if (record && record.status !== NodeStatus.Failed) {
      this.store.transition(node.id, NodeStatus.Failed, {
        lastError: { code: errorCodeOf(cause), message: cause.message },
      });
    }
    logger.error('Reconciliation failed', cause);
    return cause;
  }
}
