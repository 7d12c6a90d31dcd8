import { type InputValue, ResourceKind, type ResourceNode } from '../../../core/types/index.js';
import { createWorkloadNode, type NamespacedOptions, namespaceOf } from '../manifest.js';

export interface NetworkPolicyConfigConfig extends NamespacedOptions {
  name: string;
  /** Ingress front end policy, or the back end policy of a service */
  policyKind?: 'FrontendConfig' | 'BackendConfig' | undefined;
  sslPolicy?: InputValue | undefined;
  redirectToHttps?: boolean | undefined;
  securityPolicy?: InputValue | undefined;
}

export function networkPolicyConfig(config: NetworkPolicyConfigConfig): ResourceNode {
  const ns = namespaceOf(config);
  const policyKind = config.policyKind ?? 'FrontendConfig';

  const spec: Record<string, InputValue> = {};
  if (policyKind === 'FrontendConfig') {
    if (config.sslPolicy !== undefined) spec.sslPolicy = config.sslPolicy;
    if (config.redirectToHttps) spec.redirectToHttps = { enabled: true };
  } else if (config.securityPolicy !== undefined) {
    spec.securityPolicy = { name: config.securityPolicy };
  }

  return createWorkloadNode(config, {
    kind: ResourceKind.NetworkPolicyConfig,
    name: config.name,
    dependsOn: ns.dependsOn,
    manifest: {
      apiVersion: policyKind === 'FrontendConfig' ? 'networking.gke.io/v1beta1' : 'cloud.google.com/v1',
      kind: policyKind,
      metadata: { name: config.name, namespace: ns.name },
      spec,
    },
  });
}
