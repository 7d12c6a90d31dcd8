import { ref } from '../../core/references/index.js';
import { ResourceKind, type ResourceNode } from '../../core/types/index.js';
import { createNode, type NodeOptions, nodeOptions } from '../shared.js';

export interface DatabaseInstanceConfig extends NodeOptions {
  name: string;
  databaseVersion: string;
  region: string;
  tier: string;
  /** Private IP only, reached through this network's peering */
  network: ResourceNode;
  availabilityType?: 'ZONAL' | 'REGIONAL' | undefined;
  diskSizeGb?: number | undefined;
  backupsEnabled?: boolean | undefined;
}

/**
 * Managed database instance. Outputs `name`, `connectionName` and `privateIp`.
 */
export function databaseInstance(config: DatabaseInstanceConfig): ResourceNode {
  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.DatabaseInstance,
    name: config.name,
    inputs: {
      name: config.name,
      databaseVersion: config.databaseVersion,
      region: config.region,
      tier: config.tier,
      privateNetwork: ref<string>(config.network.id, 'selfLink'),
      ipv4Enabled: false,
      availabilityType: config.availabilityType ?? 'ZONAL',
      diskSizeGb: config.diskSizeGb ?? 10,
      backupsEnabled: config.backupsEnabled ?? true,
    },
  });
}

export interface DatabaseConfig extends NodeOptions {
  name: string;
  instance: ResourceNode;
  charset?: string | undefined;
}

export function database(config: DatabaseConfig): ResourceNode {
  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.Database,
    name: config.name,
    inputs: {
      name: config.name,
      instance: ref<string>(config.instance.id, 'name'),
      charset: config.charset ?? 'UTF8',
    },
  });
}

export interface DatabaseUserConfig extends NodeOptions {
  name: string;
  instance: ResourceNode;
  /** Password or IAM-authenticated service account user */
  type?: 'BUILT_IN' | 'CLOUD_IAM_SERVICE_ACCOUNT' | undefined;
}

export function databaseUser(config: DatabaseUserConfig): ResourceNode {
  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.DatabaseUser,
    name: config.name,
    inputs: {
      name: config.name,
      instance: ref<string>(config.instance.id, 'name'),
      type: config.type ?? 'BUILT_IN',
    },
  });
}

export interface DatabaseGrantConfig extends NodeOptions {
  name: string;
  principal: ResourceNode;
  target: ResourceNode;
  privilege: string;
  /** Binding whose client issues grants */
  provider: string;
}

/**
 * One privilege edge between a principal and a database
 */
export function databaseGrant(config: DatabaseGrantConfig): ResourceNode {
  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.DatabaseGrant,
    name: config.name,
    inputs: {
      principal: ref<string>(config.principal.id, 'name'),
      target: ref<string>(config.target.id, 'name'),
      privilege: config.privilege,
    },
  });
}

export interface GrantSetConfig extends Omit<NodeOptions, 'id'> {
  name: string;
  principals: readonly ResourceNode[];
  target: ResourceNode;
  privilege: string;
  provider: string;
}

/**
 * Expand a grant set into one independent grant node per principal, so one
 * failing edge leaves its siblings untouched
 */
export function grantSet(config: GrantSetConfig): ResourceNode[] {
  const { principals, ...shared } = config;
  return principals.map((principal) =>
    databaseGrant({
      ...shared,
      id: `database-grant-${config.name}-${principal.id}`,
      name: `${config.name}-${principal.id}`,
      principal,
    })
  );
}
