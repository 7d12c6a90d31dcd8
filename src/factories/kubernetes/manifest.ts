/**
 * Helpers shared by the cluster workload factories
 */

import { ref } from '../../core/references/index.js';
import {
  type InputValue,
  type NodeInputs,
  type ResourceKind,
  type ResourceNode,
  Stage,
} from '../../core/types/index.js';
import { createNode, type NodeOptions, nodeOptions } from '../shared.js';

export type Labels = Readonly<Record<string, InputValue>>;

export interface WorkloadOptions extends Omit<NodeOptions, 'provider'> {
  /** Provider binding of the cluster the object lives in */
  cluster: string;
}

export interface NamespacedOptions extends WorkloadOptions {
  /** Namespace node, or the name of one created elsewhere */
  namespace: ResourceNode | string;
}

/**
 * The namespace name input, and the dependency it implies
 */
export function namespaceOf(config: NamespacedOptions): { name: InputValue; dependsOn: string[] } {
  if (typeof config.namespace === 'string') {
    return { name: config.namespace, dependsOn: [] };
  }
  return { name: ref<string>(config.namespace.id, 'name'), dependsOn: [config.namespace.id] };
}

export interface WorkloadNodeDefinition {
  kind: ResourceKind;
  name: string;
  manifest?: InputValue | undefined;
  manifestUrl?: string | undefined;
  dependsOn?: readonly string[] | undefined;
}

/**
 * Application-stage node served by the cluster's binding
 */
export function createWorkloadNode(config: WorkloadOptions, definition: WorkloadNodeDefinition): ResourceNode {
  const inputs: NodeInputs = definition.manifest !== undefined ? { manifest: definition.manifest } : {};
  return createNode({
    ...nodeOptions(config),
    provider: config.cluster,
    stage: Stage.Application,
    kind: definition.kind,
    name: definition.name,
    dependsOn: [...(config.dependsOn ?? []), ...(definition.dependsOn ?? [])],
    inputs,
    manifestUrl: definition.manifestUrl,
  });
}
