/**
 * Provider binding for a managed cluster's workload API
 */

import { ValidationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { ref } from '../references/index.js';
import type { ClusterCredentials, CloudResourceApi, ResourceBackend } from '../types/backend.js';
import type { ProviderBindingDefinition } from '../types/provider.js';
import {
  createKubernetesClients,
  type KubernetesClients,
  kubeConfigFromCredentials,
} from './client-provider.js';
import { KubernetesWorkloadApi } from './workload-api.js';

const logger = getComponentLogger('cluster-binding');

export interface ClusterBindingOptions {
  /** Binding name nodes refer to through `provider` */
  name: string;
  /** Id of the Cluster node whose outputs configure the client */
  clusterNodeId: string;
  /** Issues the short-lived access token */
  cloud: CloudResourceApi;
  /** Replaces client construction, for tests */
  createClients?: ((credentials: ClusterCredentials) => KubernetesClients) | undefined;
}

/**
 * Sourced from the cluster's `clusterId`, `endpoint` and `caCertificate`
 * outputs; the access token is fetched fresh at resolution time.
 */
export function kubernetesClusterBinding(options: ClusterBindingOptions): ProviderBindingDefinition {
  const { name, clusterNodeId, cloud } = options;

  return {
    name,
    inputs: {
      clusterId: ref<string>(clusterNodeId, 'clusterId'),
      endpoint: ref<string>(clusterNodeId, 'endpoint'),
      caCertificate: ref<string>(clusterNodeId, 'caCertificate'),
    },
    connect: async (values): Promise<ResourceBackend> => {
      const { clusterId, endpoint, caCertificate } = values;
      if (typeof clusterId !== 'string' || typeof endpoint !== 'string' || typeof caCertificate !== 'string') {
        throw new ValidationError(
          `Cluster '${clusterNodeId}' outputs clusterId, endpoint and caCertificate must be strings`,
          name,
          'inputs'
        );
      }

      const described = await cloud.describeCluster(clusterId);
      const credentials: ClusterCredentials = { endpoint, caCertificate, accessToken: described.accessToken };
      logger.debug('Cluster credentials issued', { binding: name, clusterId, endpoint });

      const clients = options.createClients
        ? options.createClients(credentials)
        : createKubernetesClients(kubeConfigFromCredentials(name, credentials));
      return new KubernetesWorkloadApi(clients);
    },
  };
}
