import { ref } from '../../core/references/index.js';
import { type InputValue, ResourceKind, type ResourceNode } from '../../core/types/index.js';
import { createNode, type NodeOptions, nodeOptions } from '../shared.js';

export interface NetworkConfig extends NodeOptions {
  name: string;
  autoCreateSubnetworks?: boolean | undefined;
  routingMode?: 'REGIONAL' | 'GLOBAL' | undefined;
}

export function network(config: NetworkConfig): ResourceNode {
  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.Network,
    name: config.name,
    inputs: {
      name: config.name,
      autoCreateSubnetworks: config.autoCreateSubnetworks ?? false,
      routingMode: config.routingMode ?? 'REGIONAL',
    },
  });
}

export interface SecondaryRange {
  rangeName: string;
  ipCidrRange: string;
}

export interface SubnetConfig extends NodeOptions {
  name: string;
  network: ResourceNode;
  region: string;
  ipCidrRange: string;
  secondaryRanges?: readonly SecondaryRange[] | undefined;
  privateIpGoogleAccess?: boolean | undefined;
}

export function subnet(config: SubnetConfig): ResourceNode {
  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.Subnet,
    name: config.name,
    inputs: {
      name: config.name,
      network: ref<string>(config.network.id, 'selfLink'),
      region: config.region,
      ipCidrRange: config.ipCidrRange,
      secondaryRanges: (config.secondaryRanges ?? []).map(
        (range): InputValue => ({ rangeName: range.rangeName, ipCidrRange: range.ipCidrRange })
      ),
      privateIpGoogleAccess: config.privateIpGoogleAccess ?? true,
    },
  });
}

export interface PeeringRangeConfig extends NodeOptions {
  name: string;
  network: ResourceNode;
  prefixLength: number;
  purpose?: string | undefined;
}

/**
 * Internal address range reserved for a private service connection
 */
export function peeringRange(config: PeeringRangeConfig): ResourceNode {
  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.PeeringRange,
    name: config.name,
    inputs: {
      name: config.name,
      network: ref<string>(config.network.id, 'selfLink'),
      prefixLength: config.prefixLength,
      purpose: config.purpose ?? 'VPC_PEERING',
      addressType: 'INTERNAL',
    },
  });
}

export interface PeeringConnectionConfig extends NodeOptions {
  name: string;
  network: ResourceNode;
  ranges: readonly ResourceNode[];
  service: string;
}

export function peeringConnection(config: PeeringConnectionConfig): ResourceNode {
  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.PeeringConnection,
    name: config.name,
    inputs: {
      network: ref<string>(config.network.id, 'selfLink'),
      service: config.service,
      reservedPeeringRanges: config.ranges.map((range) => ref<string>(range.id, 'name')),
    },
  });
}
