/**
 * In-memory state store
 *
 * Holds one record per node. Writes to a node are serialized through a
 * per-node lock so parallel reconciliation never interleaves on one record.
 * Snapshots are frozen copies taken between stages.
 */

import { InvalidStateTransitionError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { NodeStatus, type ResourceNode } from '../types/resource.js';
import type { StateDocument, StateRecord, StateSnapshot } from '../types/state.js';

const ALLOWED_TRANSITIONS: Readonly<Record<NodeStatus, readonly NodeStatus[]>> = {
  [NodeStatus.Planned]: [NodeStatus.Creating, NodeStatus.Destroying],
  [NodeStatus.Creating]: [NodeStatus.Ready, NodeStatus.Failed],
  [NodeStatus.Ready]: [NodeStatus.Updating, NodeStatus.Destroying],
  [NodeStatus.Updating]: [NodeStatus.Ready, NodeStatus.Failed],
  [NodeStatus.Destroying]: [NodeStatus.Destroyed, NodeStatus.Failed],
  [NodeStatus.Destroyed]: [NodeStatus.Planned],
  [NodeStatus.Failed]: [NodeStatus.Planned, NodeStatus.Destroying],
};

export function canTransition(from: NodeStatus, to: NodeStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export type StateRecordPatch = Partial<Omit<StateRecord, 'id' | 'kind' | 'stage' | 'status'>>;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
  }
  return value;
}

function copyRecord(record: StateRecord): StateRecord {
  return structuredClone(record);
}

export class StateStore {
  private records = new Map<string, StateRecord>();
  private locks = new Map<string, Promise<void>>();
  private logger = getComponentLogger('state-store');

  constructor(records: Iterable<StateRecord> = []) {
    for (const record of records) {
      this.records.set(record.id, copyRecord(record));
    }
  }

  static fromDocument(document: StateDocument): StateStore {
    return new StateStore(document.records);
  }

  get(id: string): Readonly<StateRecord> | undefined {
    const record = this.records.get(id);
    return record ? deepFreeze(copyRecord(record)) : undefined;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  ids(): string[] {
    return Array.from(this.records.keys()).sort();
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Record for a node about to be reconciled, created as Planned if absent
   */
  ensure(node: ResourceNode): Readonly<StateRecord> {
    let record = this.records.get(node.id);
    if (!record) {
      record = {
        id: node.id,
        kind: node.kind,
        stage: node.stage,
        status: NodeStatus.Planned,
        outputs: {},
        inputs: {},
        updatedAt: new Date().toISOString(),
      };
      this.records.set(node.id, record);
    } else if (record.stage !== node.stage) {
      record.stage = node.stage;
    }
    return deepFreeze(copyRecord(record));
  }

  /**
   * Move a record to a new status, rejecting transitions the lifecycle forbids
   */
  transition(id: string, to: NodeStatus, patch: StateRecordPatch = {}): Readonly<StateRecord> {
    const record = this.records.get(id);
    if (!record) {
      throw new InvalidStateTransitionError(id, 'untracked', to);
    }
    if (record.status !== to && !canTransition(record.status, to)) {
      throw new InvalidStateTransitionError(id, record.status, to);
    }

    const next: StateRecord = {
      ...record,
      ...patch,
      status: to,
      updatedAt: new Date().toISOString(),
    };
    if (to !== NodeStatus.Failed && !('lastError' in patch)) {
      delete next.lastError;
    }
    this.records.set(id, next);

    this.logger.trace('State transition', { nodeId: id, from: record.status, to });
    return deepFreeze(copyRecord(next));
  }

  remove(id: string): boolean {
    return this.records.delete(id);
  }

  /**
   * Run `fn` with exclusive access to one node's record
   */
  async withNodeLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(id) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chained = previous.then(() => current);
    this.locks.set(id, chained);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.locks.get(id) === chained) {
        this.locks.delete(id);
      }
    }
  }

  /**
   * Frozen copy of every record
   */
  snapshot(): StateSnapshot {
    const entries = new Map<string, Readonly<StateRecord>>();
    for (const id of this.ids()) {
      const record = this.records.get(id);
      if (record) {
        entries.set(id, deepFreeze(copyRecord(record)));
      }
    }
    return entries;
  }

  toDocument(): StateDocument {
    return {
      version: 1,
      records: this.ids().flatMap((id) => {
        const record = this.records.get(id);
        return record ? [copyRecord(record)] : [];
      }),
    };
  }
}
