import { ResourceKind, type ResourceNode } from '../../../core/types/index.js';
import { createWorkloadNode, type Labels, type WorkloadOptions } from '../manifest.js';

export interface NamespaceConfig extends WorkloadOptions {
  name: string;
  labels?: Labels | undefined;
}

/**
 * Namespaces recover from stuck deletion by default
 */
export function namespace(config: NamespaceConfig): ResourceNode {
  return createWorkloadNode(config, {
    kind: ResourceKind.Namespace,
    name: config.name,
    manifest: {
      apiVersion: 'v1',
      kind: 'Namespace',
      metadata: {
        name: config.name,
        labels: config.labels ?? {},
      },
    },
  });
}
