/**
 * Shared helpers for node factories
 *
 * Every factory returns a plain ResourceNode with its kind's defaults filled
 * in. Inside `defineTopology` the nodes a factory creates are also collected,
 * so a topology can be written as a sequence of factory calls.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ValidationError } from '../core/errors.js';
import { getComponentLogger } from '../core/logging/index.js';
import {
  DeletionPolicy,
  type NodeInputs,
  type ReadinessSetting,
  type ResourceKind,
  type ResourceNode,
  Stage,
} from '../core/types/index.js';

const logger = getComponentLogger('node-factory');

/**
 * Options every factory accepts on top of its kind-specific config
 */
export interface NodeOptions {
  /** Defaults to `<kind>-<name>` in kebab case */
  id?: string | undefined;
  dependsOn?: readonly string[] | undefined;
  deletionPolicy?: DeletionPolicy | undefined;
  readiness?: ReadinessSetting | undefined;
  recoverStuckDeletion?: boolean | undefined;
  provider?: string | undefined;
  /** Deploy toggle; `false` leaves the node out of the plan */
  enabled?: boolean | undefined;
}

export interface NodeDefinition extends NodeOptions {
  kind: ResourceKind;
  name: string;
  stage?: Stage | undefined;
  inputs: NodeInputs;
  manifestUrl?: string | undefined;
}

const NODE_ID_PATTERN = /^[a-z0-9]([a-z0-9._-]*[a-z0-9])?$/;

export function validateNodeId(id: string): void {
  if (!NODE_ID_PATTERN.test(id)) {
    const suggestion = id
      .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
      .toLowerCase()
      .replace(/[^a-z0-9._-]+/g, '-')
      .replace(/^[-._]+|[-._]+$/g, '');
    throw new ValidationError(
      `Invalid node id '${id}': use lowercase letters, digits, '.', '_' and '-'`,
      id,
      'id',
      suggestion && suggestion !== id ? [suggestion] : undefined
    );
  }
}

function kebabKind(kind: ResourceKind): string {
  return kind.replace(/([a-z0-9])([A-Z])/g, '$1-$2').toLowerCase();
}

/**
 * Default id for a node of the given kind and name
 */
export function generateNodeId(kind: ResourceKind, name: string): string {
  const id = `${kebabKind(kind)}-${name.toLowerCase().replace(/[^a-z0-9._-]+/g, '-')}`;
  validateNodeId(id);
  return id;
}

// Topology collection

export interface TopologyContext {
  name: string;
  nodes: ResourceNode[];
}

const TOPOLOGY_CONTEXT = new AsyncLocalStorage<TopologyContext>();

export function getCurrentTopologyContext(): TopologyContext | undefined {
  return TOPOLOGY_CONTEXT.getStore();
}

/**
 * Run `build` and return every node the factories created inside it, in
 * creation order
 */
export function defineTopology(name: string, build: () => void): ResourceNode[] {
  const context: TopologyContext = { name, nodes: [] };
  TOPOLOGY_CONTEXT.run(context, build);
  logger.debug('Topology defined', { topology: name, nodes: context.nodes.length });
  return context.nodes;
}

/**
 * Build a node, registering it with the active topology
 */
export function createNode(definition: NodeDefinition): ResourceNode {
  const id = definition.id ?? generateNodeId(definition.kind, definition.name);
  validateNodeId(id);

  const node: ResourceNode = {
    id,
    kind: definition.kind,
    stage: definition.stage ?? Stage.Infrastructure,
    dependsOn: [...(definition.dependsOn ?? [])],
    inputs: definition.inputs,
    deletionPolicy: definition.deletionPolicy ?? DeletionPolicy.Standard,
    ...(definition.provider !== undefined && { provider: definition.provider }),
    ...(definition.readiness !== undefined && { readiness: definition.readiness }),
    ...(definition.recoverStuckDeletion !== undefined && {
      recoverStuckDeletion: definition.recoverStuckDeletion,
    }),
    ...(definition.manifestUrl !== undefined && { manifestUrl: definition.manifestUrl }),
    ...(definition.enabled !== undefined && { enabled: definition.enabled }),
  };

  getCurrentTopologyContext()?.nodes.push(node);
  return node;
}

/**
 * Split the options shared by every factory from a kind-specific config
 */
export function nodeOptions<T extends NodeOptions>(config: T): NodeOptions {
  return {
    id: config.id,
    dependsOn: config.dependsOn,
    deletionPolicy: config.deletionPolicy,
    readiness: config.readiness,
    recoverStuckDeletion: config.recoverStuckDeletion,
    provider: config.provider,
    enabled: config.enabled,
  };
}

export { selectEnabled } from '../core/dependencies/index.js';
