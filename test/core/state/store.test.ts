import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InvalidStateTransitionError, ValidationError } from '../../../src/core/errors.js';
import { canTransition, loadStateFile, saveStateFile, StateStore } from '../../../src/core/state/index.js';
import { NodeStatus } from '../../../src/core/types/resource.js';
import { testNode } from '../../utils/fake-backends.js';

describe('StateStore', () => {
  it('should create Planned records on first sight', () => {
    const store = new StateStore();
    const record = store.ensure(testNode('vpc'));

    expect(record.status).toBe(NodeStatus.Planned);
    expect(record.outputs).toEqual({});
    expect(store.ids()).toEqual(['vpc']);
  });

  it('should follow the node lifecycle', () => {
    const store = new StateStore();
    store.ensure(testNode('vpc'));
    store.transition('vpc', NodeStatus.Creating);
    const ready = store.transition('vpc', NodeStatus.Ready, { backendId: 'Network/vpc', outputs: { name: 'vpc' } });

    expect(ready.status).toBe(NodeStatus.Ready);
    expect(ready.backendId).toBe('Network/vpc');
    expect(() => store.transition('vpc', NodeStatus.Creating)).toThrow(
      new InvalidStateTransitionError('vpc', NodeStatus.Ready, NodeStatus.Creating)
    );
    expect(() => store.transition('ghost', NodeStatus.Creating)).toThrow(
      "Node 'ghost' cannot move from untracked to Creating"
    );
  });

  it('should allow a failed node to be planned again', () => {
    expect(canTransition(NodeStatus.Failed, NodeStatus.Planned)).toBe(true);
    expect(canTransition(NodeStatus.Destroyed, NodeStatus.Ready)).toBe(false);
  });

  it('should keep the last error only while Failed', () => {
    const store = new StateStore();
    store.ensure(testNode('vpc'));
    store.transition('vpc', NodeStatus.Creating);
    const failed = store.transition('vpc', NodeStatus.Failed, {
      lastError: { code: 'BACKEND_CALL_FAILED', message: 'quota exceeded' },
    });
    expect(failed.lastError).toEqual({ code: 'BACKEND_CALL_FAILED', message: 'quota exceeded' });

    store.transition('vpc', NodeStatus.Planned);
    expect(store.get('vpc')?.lastError).toBeUndefined();
  });

  it('should hand out frozen snapshots that later writes do not change', () => {
    const store = new StateStore();
    store.ensure(testNode('vpc'));
    const snapshot = store.snapshot();
    store.transition('vpc', NodeStatus.Creating);

    const record = snapshot.get('vpc');
    expect(record?.status).toBe(NodeStatus.Planned);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('should serialize work on one node', async () => {
    const store = new StateStore();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = store.withNodeLock('vpc', async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = store.withNodeLock('vpc', async () => {
      events.push('second');
    });

    await Promise.resolve();
    releaseFirst();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });
});

describe('state file persistence', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'strata-state-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should round-trip records through a file', async () => {
    const store = new StateStore();
    store.ensure(testNode('vpc'));
    store.transition('vpc', NodeStatus.Creating);
    store.transition('vpc', NodeStatus.Ready, { backendId: 'Network/vpc', outputs: { name: 'vpc' }, fingerprint: 'abc' });

    const path = join(directory, 'nested', 'state.json');
    await saveStateFile(path, store);
    const loaded = await loadStateFile(path);

    expect(loaded.ids()).toEqual(['vpc']);
    expect(loaded.get('vpc')).toEqual(store.get('vpc'));
    expect(JSON.parse(await readFile(path, 'utf8'))).toMatchObject({ version: 1 });
  });

  it('should start empty when the file is missing', async () => {
    const store = await loadStateFile(join(directory, 'absent.json'));
    expect(store.size).toBe(0);
  });

  it('should reject a document that does not match the schema', async () => {
    const path = join(directory, 'state.json');
    await writeFile(path, JSON.stringify({ version: 2, records: [] }), 'utf8');
    await expect(loadStateFile(path)).rejects.toBeInstanceOf(ValidationError);
  });

  it('should reject a file that is not JSON', async () => {
    const path = join(directory, 'state.json');
    await writeFile(path, '{ not json', 'utf8');
    await expect(loadStateFile(path)).rejects.toThrow(/^State file .* is not valid JSON/);
  });
});
