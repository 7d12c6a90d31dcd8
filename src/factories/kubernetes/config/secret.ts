import { type InputValue, ResourceKind, type ResourceNode } from '../../../core/types/index.js';
import { createWorkloadNode, type NamespacedOptions, namespaceOf } from '../manifest.js';

export interface SecretConfig extends NamespacedOptions {
  name: string;
  /** Plain values; references are resolved before the secret is written */
  stringData: Readonly<Record<string, InputValue>>;
  type?: string | undefined;
}

export function secret(config: SecretConfig): ResourceNode {
  const ns = namespaceOf(config);
  return createWorkloadNode(config, {
    kind: ResourceKind.Secret,
    name: config.name,
    dependsOn: ns.dependsOn,
    manifest: {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: { name: config.name, namespace: ns.name },
      type: config.type ?? 'Opaque',
      stringData: config.stringData,
    },
  });
}
