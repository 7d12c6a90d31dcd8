/**
 * Relational grants as an ordinary resource backend
 *
 * A DatabaseGrant node's resolved inputs carry `principal`, `target` and
 * `privilege`. The grant interface assumes both ends exist; the planner
 * guarantees that by requiring the grant to depend on them.
 */

import { ValidationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type {
  BackendRef,
  CreateRequest,
  CreateResult,
  GrantInterface,
  InputDiff,
  ObservedResource,
  ResourceBackend,
  UpdateResult,
} from '../types/backend.js';
import type { ResolvedInputs } from '../types/resource.js';

const logger = getComponentLogger('grant-backend');

export interface GrantEdge {
  principal: string;
  target: string;
  privilege: string;
}

function requireString(nodeId: string, inputs: ResolvedInputs, field: string): string {
  const value = inputs[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`Grant '${nodeId}' needs a non-empty string '${field}'`, nodeId, field);
  }
  return value;
}

export function grantEdgeFromInputs(nodeId: string, inputs: ResolvedInputs): GrantEdge {
  return {
    principal: requireString(nodeId, inputs, 'principal'),
    target: requireString(nodeId, inputs, 'target'),
    privilege: requireString(nodeId, inputs, 'privilege'),
  };
}

export function grantId(edge: GrantEdge): string {
  return `${edge.principal}:${edge.target}:${edge.privilege}`;
}

function sameEdge(a: GrantEdge, b: GrantEdge): boolean {
  return grantId(a) === grantId(b);
}

export function createGrantBackend(grants: GrantInterface): ResourceBackend {
  async function revoke(nodeId: string, edge: GrantEdge): Promise<void> {
    if (!grants.revoke) {
      logger.warn('Grant interface cannot revoke; leaving grant in place', { nodeId, grant: grantId(edge) });
      return;
    }
    await grants.revoke(edge.principal, edge.target, edge.privilege);
    logger.debug('Grant revoked', { nodeId, grant: grantId(edge) });
  }

  return {
    async create(request: CreateRequest): Promise<CreateResult> {
      const edge = grantEdgeFromInputs(request.nodeId, request.inputs);
      await grants.grant(edge.principal, edge.target, edge.privilege);
      logger.debug('Grant issued', { nodeId: request.nodeId, grant: grantId(edge) });
      return { backendId: grantId(edge), outputs: { ...edge } };
    },

    // Grants take effect synchronously
    async get(ref: BackendRef): Promise<ObservedResource | null> {
      return { phase: 'ready', outputs: { ...grantEdgeFromInputs(ref.nodeId, ref.inputs) } };
    },

    async update(ref: BackendRef, inputs: ResolvedInputs, _diff: InputDiff): Promise<UpdateResult> {
      const previous = grantEdgeFromInputs(ref.nodeId, ref.inputs);
      const next = grantEdgeFromInputs(ref.nodeId, inputs);
      if (!sameEdge(previous, next)) {
        await revoke(ref.nodeId, previous);
      }
      await grants.grant(next.principal, next.target, next.privilege);
      return { outputs: { ...next } };
    },

    async delete(ref: BackendRef): Promise<void> {
      await revoke(ref.nodeId, grantEdgeFromInputs(ref.nodeId, ref.inputs));
    },
  };
}
