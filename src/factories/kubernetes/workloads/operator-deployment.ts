import { ResourceKind, type ResourceNode } from '../../../core/types/index.js';
import { createWorkloadNode, type WorkloadOptions } from '../manifest.js';

export interface OperatorDeploymentConfig extends WorkloadOptions {
  name: string;
  /** Remote manifest of the operator's objects */
  url: string;
}

export function operatorDeployment(config: OperatorDeploymentConfig): ResourceNode {
  return createWorkloadNode(config, {
    kind: ResourceKind.OperatorDeployment,
    name: config.name,
    manifestUrl: config.url,
  });
}

/**
 * URL of a manifest published with a release, e.g.
 * `releaseManifestUrl('https://example.test/operator/{version}/crds.yml', '1.2.0')`
 */
export function releaseManifestUrl(pattern: string, version: string): string {
  return pattern.replaceAll('{version}', encodeURIComponent(version));
}
