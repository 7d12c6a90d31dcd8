/**
 * Reference Resolution
 *
 * Replaces embedded output references with the values recorded for their
 * target nodes. Resolution is pure: it reads a lookup and never calls a
 * backend, so a reference whose target has no recorded output fails here.
 */

import { createHash } from 'node:crypto';
import { isOutputReference, isOutputTemplate, isRecord } from '../dependencies/type-guards.js';
import { UnresolvableReferenceError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { InputDiff } from '../types/backend.js';
import type { NodeOutputs, OutputReference, ResolvedInputs, ResourceNode } from '../types/resource.js';
import { NodeStatus } from '../types/resource.js';
import type { StateSnapshot } from '../types/state.js';

/**
 * Outputs of a node that has reached Ready, or undefined
 */
export type OutputLookup = (nodeId: string) => NodeOutputs | undefined;

export function lookupFromSnapshot(snapshot: StateSnapshot): OutputLookup {
  return (nodeId) => {
    const record = snapshot.get(nodeId);
    return record && record.status === NodeStatus.Ready ? record.outputs : undefined;
  };
}

/**
 * Read a possibly dotted attribute path from an outputs object
 */
export function readAttribute(outputs: NodeOutputs, attribute: string): unknown {
  let current: unknown = outputs;
  for (const segment of attribute.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export class ReferenceResolver {
  private logger = getComponentLogger('reference-resolver');

  constructor(private readonly lookup: OutputLookup) {}

  static fromSnapshot(snapshot: StateSnapshot): ReferenceResolver {
    return new ReferenceResolver(lookupFromSnapshot(snapshot));
  }

  resolveReference(ref: OutputReference, consumerId: string): unknown {
    const outputs = this.lookup(ref.nodeId);
    if (outputs === undefined) {
      throw new UnresolvableReferenceError(
        `Node '${consumerId}' references '${ref.nodeId}.${ref.attribute}', but '${ref.nodeId}' has no recorded outputs`,
        consumerId,
        ref.nodeId,
        [`Apply '${ref.nodeId}' before '${consumerId}'`]
      );
    }

    const value = readAttribute(outputs, ref.attribute);
    if (value === undefined) {
      throw new UnresolvableReferenceError(
        `Node '${consumerId}' references output '${ref.attribute}' of '${ref.nodeId}', which was not reported`,
        consumerId,
        `${ref.nodeId}.${ref.attribute}`,
        [`Available outputs: ${Object.keys(outputs).sort().join(', ') || 'none'}`]
      );
    }
    return value;
  }

  /**
   * Resolve every reference in a node's inputs, at any depth
   */
  resolveInputs(node: ResourceNode): ResolvedInputs {
    const resolved: ResolvedInputs = {};
    for (const [key, value] of Object.entries(node.inputs)) {
      if (value === undefined) continue;
      resolved[key] = this.resolveValue(value, node.id);
    }
    if (node.documents) {
      resolved.documents = structuredClone(node.documents);
    }
    this.logger.trace('Inputs resolved', { nodeId: node.id, keys: Object.keys(resolved) });
    return resolved;
  }

  resolveValue(value: unknown, consumerId: string): unknown {
    if (isOutputReference(value)) {
      return this.resolveReference(value, consumerId);
    }
    if (isOutputTemplate(value)) {
      let result = value.strings[0] ?? '';
      value.references.forEach((ref, index) => {
        result += stringifyTemplateValue(this.resolveReference(ref, consumerId));
        result += value.strings[index + 1] ?? '';
      });
      return result;
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.resolveValue(item, consumerId));
    }
    if (isRecord(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        if (item === undefined) continue;
        result[key] = this.resolveValue(item, consumerId);
      }
      return result;
    }
    return value;
  }
}

function stringifyTemplateValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * JSON with object keys sorted, so equal inputs always serialize the same
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const item = value[key];
      if (item !== undefined) {
        sorted[key] = sortKeys(item);
      }
    }
    return sorted;
  }
  return value;
}

export function fingerprintInputs(inputs: ResolvedInputs): string {
  return createHash('sha256').update(canonicalize(inputs)).digest('hex');
}

/**
 * Top-level keys added, removed or changed between two resolved inputs
 */
export function diffInputs(previous: ResolvedInputs, next: ResolvedInputs): InputDiff {
  const diff: InputDiff = { added: [], removed: [], changed: [] };

  for (const key of Object.keys(next).sort()) {
    if (!(key in previous)) {
      diff.added.push(key);
    } else if (canonicalize(previous[key]) !== canonicalize(next[key])) {
      diff.changed.push(key);
    }
  }
  for (const key of Object.keys(previous).sort()) {
    if (!(key in next)) {
      diff.removed.push(key);
    }
  }

  return diff;
}
