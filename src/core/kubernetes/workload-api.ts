/**
 * Cluster workload API backend
 *
 * Serves application-stage nodes. A node's resolved inputs carry either one
 * `manifest` or a list of `documents` (the parsed contents of a remote
 * manifest); every document is applied, observed and deleted together.
 */

import { type KubernetesObject, PatchStrategy, type V1ObjectMeta } from '@kubernetes/client-node';
import { ValidationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type {
  BackendRef,
  CreateRequest,
  CreateResult,
  InputDiff,
  ObservedResource,
  ResourceBackend,
  UpdateResult,
} from '../types/backend.js';
import type { ResolvedInputs } from '../types/resource.js';
import type { KubernetesClients, NamespaceFinalizeClient, WorkloadObjectClient } from './client-provider.js';
import { isConflictError, isNotFoundError, isRetryableError, KubernetesApiCallError } from './errors.js';
import { evaluateObjectReadiness, type ObjectReadiness } from './readiness.js';

export const FIELD_MANAGER = 'strata';

/**
 * A manifest with the fields the API server needs to address it
 */
export type KubernetesManifest = KubernetesObject & {
  apiVersion: string;
  kind: string;
  metadata: V1ObjectMeta & { name: string };
};

export function isKubernetesManifest(value: unknown): value is KubernetesManifest {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const metadata: unknown = Reflect.get(value, 'metadata');
  return (
    typeof Reflect.get(value, 'apiVersion') === 'string' &&
    typeof Reflect.get(value, 'kind') === 'string' &&
    typeof metadata === 'object' &&
    metadata !== null &&
    typeof Reflect.get(metadata, 'name') === 'string'
  );
}

/**
 * Manifests a node's inputs describe, in apply order
 */
export function manifestsFromInputs(nodeId: string, inputs: ResolvedInputs): KubernetesManifest[] {
  const candidates: unknown[] = Array.isArray(inputs.documents)
    ? inputs.documents
    : inputs.manifest !== undefined
      ? [inputs.manifest]
      : [];

  if (candidates.length === 0) {
    throw new ValidationError(
      `Node '${nodeId}' has neither a 'manifest' nor 'documents' input`,
      nodeId,
      'manifest'
    );
  }

  return candidates.map((candidate, index) => {
    if (!isKubernetesManifest(candidate)) {
      throw new ValidationError(
        `Document ${index} of node '${nodeId}' lacks apiVersion, kind or metadata.name`,
        nodeId,
        `documents[${index}]`
      );
    }
    return candidate;
  });
}

export function describeObject(manifest: KubernetesManifest): string {
  const { namespace, name } = manifest.metadata;
  return `${manifest.kind}/${namespace ? `${namespace}/` : ''}${name}`;
}

function header(manifest: KubernetesManifest) {
  return {
    apiVersion: manifest.apiVersion,
    kind: manifest.kind,
    metadata: {
      name: manifest.metadata.name,
      ...(manifest.metadata.namespace && { namespace: manifest.metadata.namespace }),
    },
  };
}

const PHASE_PRECEDENCE: readonly ObjectReadiness['phase'][] = ['failed', 'terminating', 'pending', 'ready'];

export class KubernetesWorkloadApi implements ResourceBackend {
  private readonly objects: WorkloadObjectClient;
  private readonly core: NamespaceFinalizeClient;
  private logger = getComponentLogger('kubernetes-workload-api');

  constructor(clients: KubernetesClients) {
    this.objects = clients.objects;
    this.core = clients.core;
  }

  async create(request: CreateRequest): Promise<CreateResult> {
    const manifests = manifestsFromInputs(request.nodeId, request.inputs);
    const applied: KubernetesObject[] = [];
    for (const manifest of manifests) {
      applied.push(await this.applyManifest(manifest));
    }
    return {
      backendId: manifests.map(describeObject).join(','),
      outputs: this.outputsOf(manifests, applied),
    };
  }

  async get(ref: BackendRef): Promise<ObservedResource | null> {
    const manifests = manifestsFromInputs(ref.nodeId, ref.inputs);
    const observed: KubernetesObject[] = [];
    const readiness: ObjectReadiness[] = [];
    const missing: string[] = [];

    for (const manifest of manifests) {
      let current: KubernetesObject | null;
      try {
        current = await this.readManifest(manifest);
      } catch (error) {
        if (!isRetryableError(error)) {
          throw error;
        }
        this.logger.debug('Transient read failure', { nodeId: ref.nodeId, error: String(error) });
        return { phase: 'pending', message: error instanceof Error ? error.message : String(error) };
      }
      if (current === null) {
        missing.push(describeObject(manifest));
        continue;
      }
      observed.push(current);
      readiness.push(evaluateObjectReadiness(current));
    }

    if (observed.length === 0) {
      return null;
    }
    if (missing.length > 0) {
      return { phase: 'pending', message: `not found: ${missing.join(', ')}` };
    }

    const phase =
      PHASE_PRECEDENCE.find((candidate) => readiness.some((entry) => entry.phase === candidate)) ??
      'ready';
    const messages = readiness
      .filter((entry) => entry.phase === phase && entry.message)
      .map((entry) => entry.message);

    const outputs = this.outputsOf(manifests, observed);
    for (const entry of readiness) {
      Object.assign(outputs, entry.outputs);
    }

    return {
      phase,
      ...(messages.length > 0 && { message: messages.join('; ') }),
      ...(phase === 'ready' && { outputs }),
    };
  }

  async update(ref: BackendRef, inputs: ResolvedInputs, diff: InputDiff): Promise<UpdateResult> {
    const manifests = manifestsFromInputs(ref.nodeId, inputs);
    this.logger.debug('Updating objects', { nodeId: ref.nodeId, changed: diff.changed });

    const applied: KubernetesObject[] = [];
    for (const manifest of manifests) {
      applied.push(await this.applyManifest(manifest));
    }

    const previous = manifestsFromInputs(ref.nodeId, ref.inputs);
    const kept = new Set(manifests.map(describeObject));
    for (const stale of previous.filter((manifest) => !kept.has(describeObject(manifest)))) {
      await this.deleteManifest(stale);
    }

    return { outputs: this.outputsOf(manifests, applied) };
  }

  async delete(ref: BackendRef): Promise<void> {
    const manifests = manifestsFromInputs(ref.nodeId, ref.inputs);
    for (const manifest of [...manifests].reverse()) {
      await this.deleteManifest(manifest);
    }
  }

  /**
   * Empty the finalizers of every object that is still present
   */
  async clearFinalizers(ref: BackendRef): Promise<void> {
    const manifests = manifestsFromInputs(ref.nodeId, ref.inputs);
    for (const manifest of manifests) {
      const description = describeObject(manifest);
      try {
        if (manifest.kind === 'Namespace') {
          await this.core.replaceNamespaceFinalize({
            name: manifest.metadata.name,
            body: {
              apiVersion: 'v1',
              kind: 'Namespace',
              metadata: { name: manifest.metadata.name },
              spec: { finalizers: [] },
            },
          });
        } else {
          const patch = header(manifest);
          await this.objects.patch(
            { ...patch, metadata: { ...patch.metadata, finalizers: [] } },
            undefined,
            undefined,
            FIELD_MANAGER,
            undefined,
            PatchStrategy.MergePatch
          );
        }
        this.logger.warn('Finalizers cleared', { object: description });
      } catch (error) {
        if (isNotFoundError(error)) {
          continue;
        }
        throw new KubernetesApiCallError(`Failed to clear finalizers of ${description}`, error);
      }
    }
  }

  private async applyManifest(manifest: KubernetesManifest): Promise<KubernetesObject> {
    const description = describeObject(manifest);
    try {
      const created = await this.objects.create(manifest, undefined, undefined, FIELD_MANAGER);
      this.logger.debug('Object created', { object: description });
      return created;
    } catch (error) {
      if (!isConflictError(error)) {
        throw new KubernetesApiCallError(`Failed to create ${description}`, error);
      }
    }

    try {
      const patched = await this.objects.patch(
        manifest,
        undefined,
        undefined,
        FIELD_MANAGER,
        undefined,
        PatchStrategy.MergePatch
      );
      this.logger.debug('Object existed, patched', { object: description });
      return patched;
    } catch (error) {
      throw new KubernetesApiCallError(`Failed to patch ${description}`, error);
    }
  }

  private async readManifest(manifest: KubernetesManifest): Promise<KubernetesObject | null> {
    try {
      return await this.objects.read(header(manifest));
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw new KubernetesApiCallError(`Failed to read ${describeObject(manifest)}`, error);
    }
  }

  private async deleteManifest(manifest: KubernetesManifest): Promise<void> {
    const description = describeObject(manifest);
    try {
      await this.objects.delete(header(manifest), undefined, undefined, undefined, undefined, 'Background');
      this.logger.debug('Object deletion requested', { object: description });
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.debug('Object already gone', { object: description });
        return;
      }
      throw new KubernetesApiCallError(`Failed to delete ${description}`, error);
    }
  }

  private outputsOf(
    manifests: readonly KubernetesManifest[],
    objects: readonly KubernetesObject[]
  ): Record<string, unknown> {
    const primary = manifests[0];
    const observed = objects[0];
    if (!primary) {
      return {};
    }
    return {
      name: primary.metadata.name,
      ...(primary.metadata.namespace && { namespace: primary.metadata.namespace }),
      ...(observed?.metadata?.uid && { uid: observed.metadata.uid }),
      objects: manifests.map(describeObject),
    };
  }
}
