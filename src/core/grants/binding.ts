import type { GrantInterface } from '../types/backend.js';
import type { OutputReference } from '../types/resource.js';
import type { ProviderBindingDefinition } from '../types/provider.js';
import { createGrantBackend } from './backend.js';

export interface DatabaseGrantBindingOptions {
  name: string;
  /** Source outputs, usually the database instance's connection details */
  inputs: Readonly<Record<string, OutputReference>>;
  /** Opens a grant interface from the resolved source values */
  connect: (values: Readonly<Record<string, unknown>>) => Promise<GrantInterface> | GrantInterface;
}

/**
 * Provider binding whose client issues relational grants
 */
export function databaseGrantBinding(options: DatabaseGrantBindingOptions): ProviderBindingDefinition {
  return {
    name: options.name,
    inputs: options.inputs,
    connect: async (values) => createGrantBackend(await options.connect(values)),
  };
}
