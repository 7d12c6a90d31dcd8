/**
 * External collaborator contracts
 *
 * The orchestrator reaches cloud, cluster and database backends only through
 * these interfaces. Wire protocols belong to the implementations.
 */

import type { NodeOutputs, ResolvedInputs, ResourceKind } from './resource.js';

export interface CreateRequest {
  nodeId: string;
  kind: ResourceKind;
  inputs: ResolvedInputs;
}

export interface CreateResult {
  /** Backend identifier of the created resource */
  backendId: string;
  outputs: NodeOutputs;
}

/**
 * Everything a backend needs to address a resource it created earlier
 */
export interface BackendRef {
  nodeId: string;
  kind: ResourceKind;
  backendId: string;
  inputs: ResolvedInputs;
}

export type ObservedPhase = 'pending' | 'ready' | 'terminating' | 'failed';

/**
 * Backend view of a resource; `get` returns null once it no longer exists
 */
export interface ObservedResource {
  phase: ObservedPhase;
  outputs?: NodeOutputs | undefined;
  message?: string | undefined;
}

export interface InputDiff {
  added: string[];
  removed: string[];
  changed: string[];
}

export interface UpdateResult {
  outputs: NodeOutputs;
}

/**
 * CRUD shape shared by every collaborator that owns resources
 */
export interface ResourceBackend {
  create(request: CreateRequest): Promise<CreateResult>;
  /** May return stale data right after create */
  get(ref: BackendRef): Promise<ObservedResource | null>;
  update(ref: BackendRef, inputs: ResolvedInputs, diff: InputDiff): Promise<UpdateResult>;
  delete(ref: BackendRef): Promise<void>;
  /** Low-level removal of whatever blocks a deletion from completing */
  clearFinalizers?(ref: BackendRef): Promise<void>;
}

/**
 * Connection material for a managed cluster's API server
 */
export interface ClusterCredentials {
  endpoint: string;
  /** Base64-encoded PEM bundle */
  caCertificate: string;
  /** Short-lived bearer token */
  accessToken: string;
}

/**
 * Network, database instance, managed cluster, static IP, IAM bindings, SSL policy
 */
export interface CloudResourceApi extends ResourceBackend {
  describeCluster(clusterId: string): Promise<ClusterCredentials>;
}

/**
 * Relational grant interface. Assumes target and principal already exist.
 */
export interface GrantInterface {
  grant(principal: string, target: string, privilege: string): Promise<void>;
  revoke?(principal: string, target: string, privilege: string): Promise<void>;
}

/**
 * One parsed document of a remote manifest
 */
export interface ManifestDocument {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string | undefined;
    [key: string]: unknown;
  };
  [key: string]: unknown;
}

export interface ManifestFetcher {
  fetchManifest(url: string): Promise<ManifestDocument[]>;
}
