import { ref } from '../../core/references/index.js';
import { ResourceKind, type ResourceNode } from '../../core/types/index.js';
import { createNode, type NodeOptions, nodeOptions } from '../shared.js';

export interface NodePoolConfig {
  name: string;
  machineType: string;
  minNodes: number;
  maxNodes: number;
}

export interface ClusterConfig extends NodeOptions {
  name: string;
  location: string;
  network: ResourceNode;
  subnet: ResourceNode;
  /** Secondary range names on the subnet */
  podRange: string;
  serviceRange: string;
  /** Identity namespace workloads authenticate through */
  workloadPool?: string | undefined;
  nodePools?: readonly NodePoolConfig[] | undefined;
  releaseChannel?: 'RAPID' | 'REGULAR' | 'STABLE' | undefined;
}

/**
 * Managed Kubernetes cluster. Outputs `clusterId`, `endpoint` and
 * `caCertificate`, which configure the cluster's provider binding.
 */
export function cluster(config: ClusterConfig): ResourceNode {
  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.Cluster,
    name: config.name,
    inputs: {
      name: config.name,
      location: config.location,
      network: ref<string>(config.network.id, 'selfLink'),
      subnetwork: ref<string>(config.subnet.id, 'selfLink'),
      ipAllocationPolicy: {
        clusterSecondaryRangeName: config.podRange,
        servicesSecondaryRangeName: config.serviceRange,
      },
      workloadPool: config.workloadPool ?? null,
      releaseChannel: config.releaseChannel ?? 'REGULAR',
      nodePools: (config.nodePools ?? []).map((pool) => ({
        name: pool.name,
        machineType: pool.machineType,
        minNodes: pool.minNodes,
        maxNodes: pool.maxNodes,
      })),
    },
  });
}
