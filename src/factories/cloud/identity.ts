import { ref, template } from '../../core/references/index.js';
import { ResourceKind, type ResourceNode } from '../../core/types/index.js';
import { createNode, type NodeOptions, nodeOptions } from '../shared.js';

export interface ServiceIdentityConfig extends NodeOptions {
  /** Account id, the local part of the generated email */
  name: string;
  displayName?: string | undefined;
}

/**
 * Cloud service account. Outputs `email`.
 */
export function serviceIdentity(config: ServiceIdentityConfig): ResourceNode {
  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.ServiceIdentity,
    name: config.name,
    inputs: {
      accountId: config.name,
      displayName: config.displayName ?? config.name,
    },
  });
}

export interface IdentityBindingConfig extends NodeOptions {
  name: string;
  identity: ResourceNode;
  role: string;
  /** Grant the role on a project or resource; the identity itself when absent */
  resource?: string | undefined;
  /** Workload identity member in the form `<pool>[<namespace>/<serviceAccount>]` */
  workload?:
    | {
        pool: string;
        namespace: string;
        serviceAccount: string;
      }
    | undefined;
}

/**
 * IAM role binding. With `workload`, lets a cluster service account act as the
 * identity; otherwise grants the role to the identity itself.
 */
export function identityBinding(config: IdentityBindingConfig): ResourceNode {
  const member = config.workload
    ? `serviceAccount:${config.workload.pool}[${config.workload.namespace}/${config.workload.serviceAccount}]`
    : template`serviceAccount:${ref<string>(config.identity.id, 'email')}`;

  return createNode({
    ...nodeOptions(config),
    kind: ResourceKind.IdentityBinding,
    name: config.name,
    dependsOn: [...(config.dependsOn ?? []), config.identity.id],
    inputs: {
      role: config.role,
      member,
      resource: config.resource ?? ref<string>(config.identity.id, 'email'),
    },
  });
}
