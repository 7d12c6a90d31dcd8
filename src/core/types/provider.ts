/**
 * Provider binding types
 */

import type { ResourceBackend } from './backend.js';
import type { OutputReference } from './resource.js';

/**
 * Connection configuration for a class of backend calls, derived from node outputs
 */
export interface ProviderBindingDefinition {
  name: string;
  /** Binding value name -> node output it comes from */
  inputs: Readonly<Record<string, OutputReference>>;
  connect(values: Readonly<Record<string, unknown>>): Promise<ResourceBackend> | ResourceBackend;
}

export type ProviderBindingState = 'unresolved' | 'resolved';

export interface ProviderBindingStatus {
  name: string;
  state: ProviderBindingState;
  /** `nodeId.attribute` of every source output not yet available */
  missing: string[];
  resolvedAt?: Date | undefined;
  /** Nodes whose outputs the resolved values came from */
  sources?: string[] | undefined;
  error?: Error | undefined;
}
