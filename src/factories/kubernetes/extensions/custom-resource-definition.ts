import { ResourceKind, type ResourceNode } from '../../../core/types/index.js';
import { createWorkloadNode, type WorkloadOptions } from '../manifest.js';

export interface CustomResourceDefinitionsConfig extends WorkloadOptions {
  name: string;
  /** Remote multi-document manifest, pinned to a release */
  url: string;
}

/**
 * A remote bundle of CRDs. The node waits for every definition to be
 * established and recovers from stuck deletion by default.
 */
export function customResourceDefinitions(config: CustomResourceDefinitionsConfig): ResourceNode {
  return createWorkloadNode(config, {
    kind: ResourceKind.CustomResourceDefinition,
    name: config.name,
    manifestUrl: config.url,
  });
}
