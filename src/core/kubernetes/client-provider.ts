/**
 * Kubernetes client construction
 *
 * Clusters are created during the apply, so their clients are built from
 * credentials (endpoint, CA bundle, bearer token) rather than a kubeconfig
 * file on disk.
 */

import * as k8s from '@kubernetes/client-node';
import { ValidationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { ClusterCredentials } from '../types/backend.js';

const logger = getComponentLogger('kubernetes-client-provider');

export interface KubernetesClientConfig {
  cluster: {
    name: string;
    server: string;
    /** Base64-encoded CA bundle */
    caData?: string | undefined;
    /**
     * SECURITY WARNING: disables TLS verification. Development only.
     */
    skipTLSVerify?: boolean | undefined;
  };
  user: {
    name: string;
    token: string;
  };
  context?: string | undefined;
}

/**
 * The generic object calls the workload backend makes
 */
export interface WorkloadObjectClient {
  create(spec: k8s.KubernetesObject, pretty?: string, dryRun?: string, fieldManager?: string): Promise<k8s.KubernetesObject>;
  patch(
    spec: k8s.KubernetesObject,
    pretty?: string,
    dryRun?: string,
    fieldManager?: string,
    force?: boolean,
    patchStrategy?: k8s.PatchStrategy
  ): Promise<k8s.KubernetesObject>;
  read(spec: Parameters<k8s.KubernetesObjectApi['read']>[0]): Promise<k8s.KubernetesObject>;
  delete(
    spec: k8s.KubernetesObject,
    pretty?: string,
    dryRun?: string,
    gracePeriodSeconds?: number,
    orphanDependents?: boolean,
    propagationPolicy?: string
  ): Promise<unknown>;
}

/**
 * Namespaces only drop finalizers through their finalize subresource
 */
export interface NamespaceFinalizeClient {
  replaceNamespaceFinalize(request: { name: string; body: k8s.V1Namespace }): Promise<k8s.V1Namespace>;
}

export interface KubernetesClients {
  objects: WorkloadObjectClient;
  core: NamespaceFinalizeClient;
}

/**
 * Create a KubeConfig from explicit cluster and user configuration
 */
export function createKubeConfig(config: KubernetesClientConfig): k8s.KubeConfig {
  const { cluster, user } = config;

  if (!cluster.server) {
    throw new ValidationError('Kubernetes cluster server is empty', cluster.name, 'server', [
      'Wait until the cluster reports its endpoint',
    ]);
  }
  if (cluster.server.startsWith('http://')) {
    logger.warn('Connecting to an HTTP endpoint - connection is not encrypted', {
      cluster: cluster.name,
      server: cluster.server,
    });
  }
  if (cluster.skipTLSVerify === true) {
    logger.warn('TLS verification disabled - use only in development', { cluster: cluster.name });
  } else if (!cluster.caData) {
    logger.debug('No CA bundle given, using the system trust store', { cluster: cluster.name });
  }

  const contextName = config.context ?? `${cluster.name}-context`;
  const kc = new k8s.KubeConfig();
  kc.loadFromOptions({
    clusters: [
      {
        name: cluster.name,
        server: cluster.server,
        skipTLSVerify: cluster.skipTLSVerify === true,
        ...(cluster.caData && { caData: cluster.caData }),
      },
    ],
    users: [{ name: user.name, token: user.token }],
    contexts: [{ name: contextName, cluster: cluster.name, user: user.name }],
    currentContext: contextName,
  });
  return kc;
}

/**
 * KubeConfig for a managed cluster, from the credentials the cloud API reports
 */
export function kubeConfigFromCredentials(
  clusterName: string,
  credentials: ClusterCredentials
): k8s.KubeConfig {
  const server = /^https?:\/\//.test(credentials.endpoint)
    ? credentials.endpoint
    : `https://${credentials.endpoint}`;

  return createKubeConfig({
    cluster: { name: clusterName, server, caData: credentials.caCertificate },
    user: { name: `${clusterName}-user`, token: credentials.accessToken },
  });
}

export function createKubernetesClients(kc: k8s.KubeConfig): KubernetesClients {
  return {
    objects: k8s.KubernetesObjectApi.makeApiClient(kc),
    core: kc.makeApiClient(k8s.CoreV1Api),
  };
}
