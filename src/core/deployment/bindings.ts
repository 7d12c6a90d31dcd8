/**
 * Provider binding registry
 *
 * A binding turns outputs of earlier nodes into a backend client. It stays
 * unresolved until every source output is recorded; resolving it connects
 * once and caches the client for the rest of the pass.
 */

import { describeCause, toError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { readAttribute } from '../references/index.js';
import type { ResourceBackend } from '../types/backend.js';
import type { ProviderBindingDefinition, ProviderBindingStatus } from '../types/provider.js';
import { NodeStatus } from '../types/resource.js';
import type { StateSnapshot } from '../types/state.js';

interface BindingEntry {
  definition: ProviderBindingDefinition;
  status: ProviderBindingStatus;
  backend?: ResourceBackend | undefined;
}

export class ProviderBindingRegistry {
  private entries = new Map<string, BindingEntry>();
  private logger = getComponentLogger('provider-bindings');

  constructor(definitions: readonly ProviderBindingDefinition[] = []) {
    for (const definition of definitions) {
      this.entries.set(definition.name, {
        definition,
        status: {
          name: definition.name,
          state: 'unresolved',
          missing: Object.values(definition.inputs).map((ref) => `${ref.nodeId}.${ref.attribute}`),
        },
      });
    }
  }

  names(): string[] {
    return Array.from(this.entries.keys()).sort();
  }

  status(name: string): ProviderBindingStatus | undefined {
    const entry = this.entries.get(name);
    return entry ? this.statusOf(entry) : undefined;
  }

  /**
   * Client of a resolved binding
   */
  backendFor(name: string): ResourceBackend | undefined {
    return this.entries.get(name)?.backend;
  }

  /**
   * Try to resolve a binding from a state snapshot. Returns its status after the attempt.
   */
  async resolve(name: string, snapshot: StateSnapshot): Promise<ProviderBindingStatus> {
    const entry = this.entries.get(name);
    if (!entry) {
      return { name, state: 'unresolved', missing: [], error: new Error(`Unknown provider binding '${name}'`) };
    }
    if (entry.status.state === 'resolved') {
      return this.statusOf(entry);
    }

    const values: Record<string, unknown> = {};
    const missing: string[] = [];
    for (const [key, ref] of Object.entries(entry.definition.inputs)) {
      const record = snapshot.get(ref.nodeId);
      const value =
        record && record.status === NodeStatus.Ready ? readAttribute(record.outputs, ref.attribute) : undefined;
      if (value === undefined) {
        missing.push(`${ref.nodeId}.${ref.attribute}`);
      } else {
        values[key] = value;
      }
    }

    if (missing.length > 0) {
      entry.status = { name, state: 'unresolved', missing };
      this.logger.debug('Provider binding unresolved', { binding: name, missing });
      return this.statusOf(entry);
    }

    try {
      const sources = Array.from(
        new Set(Object.values(entry.definition.inputs).map((ref) => ref.nodeId))
      ).sort();
      entry.backend = await entry.definition.connect(values);
      entry.status = { name, state: 'resolved', missing: [], resolvedAt: new Date(), sources };
      this.logger.info('Provider binding resolved', { binding: name, sources });
    } catch (error) {
      entry.status = { name, state: 'unresolved', missing: [], error: toError(error) };
      this.logger.warn('Provider binding failed to connect', {
        binding: name,
        error: describeCause(error),
      });
    }
    return this.statusOf(entry);
  }

  async resolveAll(snapshot: StateSnapshot): Promise<ProviderBindingStatus[]> {
    const statuses: ProviderBindingStatus[] = [];
    for (const name of this.names()) {
      statuses.push(await this.resolve(name, snapshot));
    }
    return statuses;
  }

  private statusOf(entry: BindingEntry): ProviderBindingStatus {
    return {
      ...entry.status,
      missing: [...entry.status.missing],
      ...(entry.status.sources && { sources: [...entry.status.sources] }),
    };
  }
}
