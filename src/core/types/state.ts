/**
 * Tracked state types
 */

import type {
  NodeOutputs,
  NodeStatus,
  ResolvedInputs,
  ResourceKind,
  Stage,
} from './resource.js';

export interface StateRecordError {
  code: string;
  message: string;
}

/**
 * What the store knows about one node
 */
export interface StateRecord {
  id: string;
  kind: ResourceKind;
  stage: Stage;
  status: NodeStatus;
  backendId?: string | undefined;
  outputs: NodeOutputs;
  /** Resolved inputs the backend last accepted */
  inputs: ResolvedInputs;
  /** Fingerprint of `inputs`, compared on re-apply */
  fingerprint?: string | undefined;
  lastError?: StateRecordError | undefined;
  updatedAt: string;
}

/**
 * Read-only view of the store taken at one point of an apply pass
 */
export type StateSnapshot = ReadonlyMap<string, Readonly<StateRecord>>;

/**
 * Serialized form written by the state file persistence
 */
export interface StateDocument {
  version: 1;
  records: StateRecord[];
}
