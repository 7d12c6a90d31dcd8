import { describe, expect, it, vi } from 'vitest';
import { ProviderBindingRegistry } from '../../../src/core/deployment/bindings.js';
import { ref } from '../../../src/core/references/index.js';
import { StateStore } from '../../../src/core/state/index.js';
import type { ProviderBindingDefinition } from '../../../src/core/types/provider.js';
import { NodeStatus } from '../../../src/core/types/resource.js';
import { FakeBackend, testNode } from '../../utils/fake-backends.js';

function clusterReady(outputs: Record<string, unknown>): StateStore {
  const store = new StateStore();
  store.ensure(testNode('cluster', { kind: 'Cluster' }));
  store.transition('cluster', NodeStatus.Creating);
  store.transition('cluster', NodeStatus.Ready, { outputs });
  return store;
}

describe('ProviderBindingRegistry', () => {
  const backend = new FakeBackend();

  function definition(connect: ProviderBindingDefinition['connect']): ProviderBindingDefinition {
    return {
      name: 'k8s',
      inputs: { endpoint: ref('cluster', 'endpoint'), caCertificate: ref('cluster', 'caCertificate') },
      connect,
    };
  }

  it('should start every binding unresolved with all sources missing', () => {
    const registry = new ProviderBindingRegistry([definition(() => backend)]);

    expect(registry.names()).toEqual(['k8s']);
    expect(registry.status('k8s')).toEqual({
      name: 'k8s',
      state: 'unresolved',
      missing: ['cluster.endpoint', 'cluster.caCertificate'],
    });
    expect(registry.backendFor('k8s')).toBeUndefined();
  });

  it('should stay unresolved while a source output is missing', async () => {
    const connect = vi.fn(() => backend);
    const registry = new ProviderBindingRegistry([definition(connect)]);

    const status = await registry.resolve('k8s', clusterReady({ endpoint: '10.0.0.2' }).snapshot());

    expect(status).toEqual({ name: 'k8s', state: 'unresolved', missing: ['cluster.caCertificate'] });
    expect(connect).not.toHaveBeenCalled();
  });

  it('should connect once with the source values and cache the client', async () => {
    const connect = vi.fn(() => backend);
    const registry = new ProviderBindingRegistry([definition(connect)]);
    const snapshot = clusterReady({ endpoint: '10.0.0.2', caCertificate: 'dGVzdC1jYQ==' }).snapshot();

    const status = await registry.resolve('k8s', snapshot);
    await registry.resolve('k8s', snapshot);

    expect(status).toMatchObject({ name: 'k8s', state: 'resolved', missing: [], sources: ['cluster'] });
    expect(connect).toHaveBeenCalledTimes(1);
    expect(connect).toHaveBeenCalledWith({ endpoint: '10.0.0.2', caCertificate: 'dGVzdC1jYQ==' });
    expect(registry.backendFor('k8s')).toBe(backend);
  });

  it('should keep a binding unresolved when connecting fails', async () => {
    const registry = new ProviderBindingRegistry([
      definition(() => {
        throw new Error('certificate rejected');
      }),
    ]);

    const [status] = await registry.resolveAll(
      clusterReady({ endpoint: '10.0.0.2', caCertificate: 'dGVzdC1jYQ==' }).snapshot()
    );

    expect(status?.state).toBe('unresolved');
    expect(status?.error?.message).toBe('certificate rejected');
    expect(registry.backendFor('k8s')).toBeUndefined();
  });

  it('should report unknown bindings', async () => {
    const status = await new ProviderBindingRegistry().resolve('nope', new StateStore().snapshot());
    expect(status.error?.message).toBe("Unknown provider binding 'nope'");
  });
});
