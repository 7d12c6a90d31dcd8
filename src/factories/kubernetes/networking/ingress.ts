import { ref } from '../../../core/references/index.js';
import { type InputValue, ResourceKind, type ResourceNode } from '../../../core/types/index.js';
import { createWorkloadNode, type NamespacedOptions, namespaceOf } from '../manifest.js';

export interface IngressConfig extends NamespacedOptions {
  name: string;
  host: string;
  serviceName: InputValue;
  servicePort: number;
  /** Name of a reserved global address */
  staticIpName?: InputValue | undefined;
  certificate?: ResourceNode | undefined;
  frontendConfig?: ResourceNode | undefined;
}

/**
 * Waits for a load balancer address, reported as the `address` output
 */
export function ingress(config: IngressConfig): ResourceNode {
  const ns = namespaceOf(config);
  const annotations: Record<string, InputValue> = {};

  if (config.staticIpName !== undefined) {
    annotations['kubernetes.io/ingress.global-static-ip-name'] = config.staticIpName;
  }
  if (config.certificate) {
    annotations['networking.gke.io/managed-certificates'] = ref<string>(config.certificate.id, 'name');
  }
  if (config.frontendConfig) {
    annotations['networking.gke.io/v1beta1.FrontendConfig'] = ref<string>(config.frontendConfig.id, 'name');
  }

  return createWorkloadNode(config, {
    kind: ResourceKind.Ingress,
    name: config.name,
    dependsOn: ns.dependsOn,
    manifest: {
      apiVersion: 'networking.k8s.io/v1',
      kind: 'Ingress',
      metadata: { name: config.name, namespace: ns.name, annotations },
      spec: {
        rules: [
          {
            host: config.host,
            http: {
              paths: [
                {
                  path: '/',
                  pathType: 'Prefix',
                  backend: {
                    service: { name: config.serviceName, port: { number: config.servicePort } },
                  },
                },
              ],
            },
          },
        ],
      },
    },
  });
}
