import { ResourceKind, type ResourceNode } from '../../../core/types/index.js';
import { createWorkloadNode, type NamespacedOptions, namespaceOf } from '../manifest.js';

export interface CertificateConfig extends NamespacedOptions {
  name: string;
  domains: readonly string[];
}

/**
 * Provider-managed TLS certificate; waits until issuance reports Active
 */
export function certificate(config: CertificateConfig): ResourceNode {
  const ns = namespaceOf(config);
  return createWorkloadNode(config, {
    kind: ResourceKind.Certificate,
    name: config.name,
    dependsOn: ns.dependsOn,
    manifest: {
      apiVersion: 'networking.gke.io/v1',
      kind: 'ManagedCertificate',
      metadata: { name: config.name, namespace: ns.name },
      spec: { domains: [...config.domains] },
    },
  });
}
