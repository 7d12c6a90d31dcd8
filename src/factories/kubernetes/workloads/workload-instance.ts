import { type InputValue, ResourceKind, type ResourceNode } from '../../../core/types/index.js';
import { createWorkloadNode, type Labels, type NamespacedOptions, namespaceOf } from '../manifest.js';

export interface WorkloadInstanceConfig extends NamespacedOptions {
  name: string;
  apiVersion: string;
  /** Custom resource kind the operator reconciles */
  resourceKind: string;
  spec: Readonly<Record<string, InputValue>>;
  labels?: Labels | undefined;
}

/**
 * A custom resource reconciled by an operator; waits for its Ready condition
 */
export function workloadInstance(config: WorkloadInstanceConfig): ResourceNode {
  const ns = namespaceOf(config);
  return createWorkloadNode(config, {
    kind: ResourceKind.WorkloadInstance,
    name: config.name,
    dependsOn: ns.dependsOn,
    manifest: {
      apiVersion: config.apiVersion,
      kind: config.resourceKind,
      metadata: {
        name: config.name,
        namespace: ns.name,
        labels: config.labels ?? {},
      },
      spec: config.spec,
    },
  });
}
