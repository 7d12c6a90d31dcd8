/**
 * Resource graph model
 *
 * A ResourceNode is one unit of desired state. Declarations are immutable;
 * the status and outputs a node reaches during an apply live in its
 * StateStore record.
 */

import { OUTPUT_REFERENCE_BRAND, OUTPUT_TEMPLATE_BRAND } from '../constants/brands.js';
import type { ManifestDocument } from './backend.js';

export const ResourceKind = {
  Network: 'Network',
  Subnet: 'Subnet',
  PeeringRange: 'PeeringRange',
  PeeringConnection: 'PeeringConnection',
  DatabaseInstance: 'DatabaseInstance',
  Database: 'Database',
  DatabaseUser: 'DatabaseUser',
  DatabaseGrant: 'DatabaseGrant',
  Cluster: 'Cluster',
  ServiceIdentity: 'ServiceIdentity',
  IdentityBinding: 'IdentityBinding',
  Namespace: 'Namespace',
  WorkloadServiceAccount: 'WorkloadServiceAccount',
  CustomResourceDefinition: 'CustomResourceDefinition',
  OperatorDeployment: 'OperatorDeployment',
  Secret: 'Secret',
  WorkloadInstance: 'WorkloadInstance',
  NetworkPolicyConfig: 'NetworkPolicyConfig',
  Certificate: 'Certificate',
  Ingress: 'Ingress',
} as const;

export type ResourceKind = (typeof ResourceKind)[keyof typeof ResourceKind];

export const Stage = {
  Infrastructure: 'infrastructure',
  Application: 'application',
} as const;

export type Stage = (typeof Stage)[keyof typeof Stage];

/**
 * Stages in apply order
 */
export const STAGE_ORDER: readonly Stage[] = [Stage.Infrastructure, Stage.Application];

export const DeletionPolicy = {
  /** Destroy fails fast without calling the backend */
  Protect: 'protect',
  Standard: 'standard',
  /** Dropped from tracked state without calling the backend */
  Abandon: 'abandon',
} as const;

export type DeletionPolicy = (typeof DeletionPolicy)[keyof typeof DeletionPolicy];

export const NodeStatus = {
  Planned: 'Planned',
  Creating: 'Creating',
  Ready: 'Ready',
  Updating: 'Updating',
  Destroying: 'Destroying',
  Destroyed: 'Destroyed',
  Failed: 'Failed',
} as const;

export type NodeStatus = (typeof NodeStatus)[keyof typeof NodeStatus];

/**
 * A reference to an output attribute of another node
 */
export interface OutputReference<T = unknown> {
  [OUTPUT_REFERENCE_BRAND]: true;
  nodeId: string;
  attribute: string;
  /** Phantom field carrying the expected value type */
  _type?: T;
}

/**
 * A string assembled from literal parts and output references
 */
export interface OutputTemplate {
  [OUTPUT_TEMPLATE_BRAND]: true;
  strings: readonly string[];
  references: readonly OutputReference[];
}

/**
 * Node inputs: any JSON-like value, where references may appear at any depth
 */
export type InputValue =
  | string
  | number
  | boolean
  | null
  | OutputReference
  | OutputTemplate
  | readonly InputValue[]
  | { readonly [key: string]: InputValue | undefined };

export type NodeInputs = Readonly<Record<string, InputValue | undefined>>;

/**
 * Readiness behavior after create/update
 */
export type ReadinessSetting =
  | false
  | {
      timeoutMs?: number | undefined;
      intervalMs?: number | undefined;
    };

/**
 * A unit of desired state
 */
export interface ResourceNode {
  id: string;
  kind: ResourceKind;
  stage: Stage;
  dependsOn: readonly string[];
  inputs: NodeInputs;
  deletionPolicy: DeletionPolicy;
  /** Name of the ProviderBinding whose client serves this node; the cloud API otherwise */
  provider?: string | undefined;
  readiness?: ReadinessSetting | undefined;
  recoverStuckDeletion?: boolean | undefined;
  /** Remote manifest whose documents become the `documents` input */
  manifestUrl?: string | undefined;
  /** Filled from `manifestUrl` before planning */
  documents?: readonly ManifestDocument[] | undefined;
  /** `false` removes the node from the graph before planning */
  enabled?: boolean | undefined;
}

/**
 * Resolved inputs: references replaced by the values they point at
 */
export type ResolvedInputs = Record<string, unknown>;

/**
 * Outputs a backend reports for a node
 */
export type NodeOutputs = Readonly<Record<string, unknown>>;
