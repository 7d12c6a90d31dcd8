import { ref } from '../../../core/references/index.js';
import { ResourceKind, type ResourceNode } from '../../../core/types/index.js';
import { createWorkloadNode, type NamespacedOptions, namespaceOf } from '../manifest.js';

export const WORKLOAD_IDENTITY_ANNOTATION = 'iam.gke.io/gcp-service-account';

export interface WorkloadServiceAccountConfig extends NamespacedOptions {
  name: string;
  /** Cloud identity the account impersonates through workload identity */
  identity?: ResourceNode | undefined;
}

export function workloadServiceAccount(config: WorkloadServiceAccountConfig): ResourceNode {
  const ns = namespaceOf(config);
  return createWorkloadNode(config, {
    kind: ResourceKind.WorkloadServiceAccount,
    name: config.name,
    dependsOn: ns.dependsOn,
    manifest: {
      apiVersion: 'v1',
      kind: 'ServiceAccount',
      metadata: {
        name: config.name,
        namespace: ns.name,
        annotations: config.identity
          ? { [WORKLOAD_IDENTITY_ANNOTATION]: ref<string>(config.identity.id, 'email') }
          : {},
      },
    },
  });
}
