import { describe, expect, it, vi } from 'vitest';
import { DependencyResolver } from '../../../src/core/dependencies/index.js';
import { ApplyCoordinator } from '../../../src/core/deployment/index.js';
import { databaseGrantBinding } from '../../../src/core/grants/index.js';
import { ref } from '../../../src/core/references/index.js';
import { StateStore } from '../../../src/core/state/index.js';
import type { ApplyEvent } from '../../../src/core/types/events.js';
import type { ProviderBindingDefinition } from '../../../src/core/types/provider.js';
import { DeletionPolicy, NodeStatus, type ResourceNode } from '../../../src/core/types/resource.js';
import { FakeBackend, FakeGrants, testConfig, testNode } from '../../utils/fake-backends.js';

const resolver = new DependencyResolver();

function clusterTopology(extra: ResourceNode[] = [], vpcPolicy: DeletionPolicy = DeletionPolicy.Standard) {
  return [
    testNode('vpc', { deletionPolicy: vpcPolicy }),
    testNode('subnet', { kind: 'Subnet', inputs: { name: 'subnet', network: ref('vpc', 'selfLink') } }),
    testNode('cluster', { kind: 'Cluster', dependsOn: ['subnet'] }),
    testNode('ns', { kind: 'Namespace', stage: 'application', provider: 'k8s' }),
    ...extra,
  ];
}

function setup(options: { cloud?: FakeBackend } = {}) {
  const cloud = options.cloud ?? new FakeBackend();
  const workloads = new FakeBackend();
  const connect = vi.fn(() => workloads);
  const binding: ProviderBindingDefinition = {
    name: 'k8s',
    inputs: { endpoint: ref('cluster', 'endpoint'), caCertificate: ref('cluster', 'caCertificate') },
    connect,
  };
  const coordinator = new ApplyCoordinator({ cloud, bindings: [binding], config: testConfig() });
  return { cloud, workloads, connect, binding, coordinator };
}

describe('ApplyCoordinator', () => {
  it('should converge both stages, connecting the binding from recorded outputs', async () => {
    const { cloud, workloads, connect, binding, coordinator } = setup();
    const events: ApplyEvent[] = [];
    const plan = resolver.plan(clusterTopology(), { bindings: [binding] });

    const { report, state } = await coordinator.apply(plan, new StateStore(), {
      onEvent: (event) => events.push(event),
    });

    expect(report.status).toBe('converged');
    expect(report.completedNodeIds).toEqual(['vpc', 'subnet', 'cluster', 'ns']);
    expect(report.actions).toEqual({ vpc: 'created', subnet: 'created', cluster: 'created', ns: 'created' });
    expect(cloud.callsFor('create')).toEqual(['vpc', 'subnet', 'cluster']);
    expect(workloads.callsFor('create')).toEqual(['ns']);
    expect(connect).toHaveBeenCalledWith({ endpoint: '10.0.0.2', caCertificate: 'dGVzdC1jYQ==' });
    expect(cloud.resources.get('Subnet/subnet')?.inputs).toEqual({
      name: 'subnet',
      network: 'projects/test-project/Network/vpc',
    });
    expect(state.get('ns')?.status).toBe(NodeStatus.Ready);
    expect(events[0]?.type).toBe('started');
    expect(events.filter((event) => event.type === 'binding-resolved').map((event) => event.message)).toEqual([
      "Provider binding 'k8s' resolved from cluster",
    ]);
  });

  it('should leave converged nodes unchanged on re-apply', async () => {
    const { cloud, workloads, binding, coordinator } = setup();
    const plan = resolver.plan(clusterTopology(), { bindings: [binding] });
    const { state } = await coordinator.apply(plan);

    const { report } = await coordinator.apply(plan, state);

    expect(report.status).toBe('converged');
    expect(report.actions).toEqual({ vpc: 'unchanged', subnet: 'unchanged', cluster: 'unchanged', ns: 'unchanged' });
    expect(cloud.callsFor('create')).toEqual(['vpc', 'subnet', 'cluster']);
    expect(workloads.callsFor('create')).toEqual(['ns']);
  });

  it('should block dependents of a failed node and finish independent ones', async () => {
    const { binding, coordinator } = setup({ cloud: new FakeBackend({ failCreate: ['subnet'] }) });
    const plan = resolver.plan(clusterTopology([testNode('other')]), { bindings: [binding] });

    const { report, state } = await coordinator.apply(plan);

    expect(report.status).toBe('partial-failure');
    if (report.status !== 'partial-failure') return;
    expect(report.completedNodeIds).toEqual(['other', 'vpc']);
    expect(report.failedNodeId).toBe('subnet');
    expect(report.failures.map(({ nodeId, kind, code, message }) => ({ nodeId, kind, code, message }))).toEqual([
      {
        nodeId: 'subnet',
        kind: 'Subnet',
        code: 'BACKEND_CALL_FAILED',
        message: "create of Subnet 'subnet' failed: quota exceeded for subnet",
      },
    ]);
    expect(report.blocked).toEqual([
      { nodeId: 'cluster', reason: "dependency 'subnet' failed" },
      { nodeId: 'ns', reason: "dependency 'cluster' did not complete" },
    ]);
    expect(report.notStarted).toEqual([]);
    expect(report.aborted).toBe(false);
    expect(state.get('vpc')?.status).toBe(NodeStatus.Ready);
    expect(state.get('subnet')?.status).toBe(NodeStatus.Failed);
  });

  it('should block nodes whose binding cannot connect', async () => {
    const cloud = new FakeBackend();
    const binding: ProviderBindingDefinition = {
      name: 'k8s',
      inputs: { endpoint: ref('cluster', 'endpoint') },
      connect: () => {
        throw new Error('certificate rejected');
      },
    };
    const coordinator = new ApplyCoordinator({ cloud, bindings: [binding], config: testConfig() });

    const { report } = await coordinator.apply(resolver.plan(clusterTopology(), { bindings: [binding] }));

    expect(report.status).toBe('partial-failure');
    if (report.status !== 'partial-failure') return;
    expect(report.failures).toEqual([]);
    expect(report.blocked).toEqual([
      { nodeId: 'ns', reason: "provider binding 'k8s' is unresolved (connect failed: certificate rejected)" },
    ]);
  });

  it('should apply each grant of a set independently', async () => {
    const cloud = new FakeBackend();
    const grants = new FakeGrants(new Set(['user-a']));
    const binding = databaseGrantBinding({
      name: 'postgres',
      inputs: { host: ref('instance', 'privateIp') },
      connect: () => grants,
    });
    const grant = (id: string, user: string) =>
      testNode(id, {
        kind: 'DatabaseGrant',
        provider: 'postgres',
        inputs: { principal: ref(user, 'name'), target: ref('db', 'name'), privilege: 'ALL' },
      });
    const nodes = [
      testNode('instance', { kind: 'DatabaseInstance' }),
      testNode('db', { kind: 'Database', inputs: { name: 'identity', instance: ref('instance', 'name') } }),
      testNode('user-a', { kind: 'DatabaseUser', inputs: { name: 'user-a', instance: ref('instance', 'name') } }),
      testNode('user-b', { kind: 'DatabaseUser', inputs: { name: 'user-b', instance: ref('instance', 'name') } }),
      grant('grant-a', 'user-a'),
      grant('grant-b', 'user-b'),
    ];
    const coordinator = new ApplyCoordinator({ cloud, bindings: [binding], config: testConfig() });
    const plan = resolver.plan(nodes, { bindings: [binding] });

    const { report, state } = await coordinator.apply(plan);

    expect(plan.promoted).toEqual(['grant-a', 'grant-b']);
    expect(report.status).toBe('partial-failure');
    if (report.status !== 'partial-failure') return;
    expect(report.failedNodeId).toBe('grant-a');
    expect(report.cause?.message).toBe(`create of DatabaseGrant 'grant-a' failed: role "user-a" does not exist`);
    expect(grants.granted).toEqual(['user-b:identity:ALL']);
    expect(state.get('grant-b')).toMatchObject({
      status: NodeStatus.Ready,
      backendId: 'user-b:identity:ALL',
      outputs: { principal: 'user-b', target: 'identity', privilege: 'ALL' },
    });
    expect(state.get('user-a')?.status).toBe(NodeStatus.Ready);
  });

  it('should start nothing when aborted before the run', async () => {
    const { cloud, binding, coordinator } = setup();
    const controller = new AbortController();
    controller.abort();

    const { report } = await coordinator.apply(
      resolver.plan(clusterTopology(), { bindings: [binding] }),
      new StateStore(),
      { signal: controller.signal }
    );

    expect(report.status).toBe('partial-failure');
    if (report.status !== 'partial-failure') return;
    expect(report.aborted).toBe(true);
    expect(report.notStarted).toEqual(['vpc', 'subnet', 'cluster', 'ns']);
    expect(cloud.calls).toEqual([]);
  });

  it('should let in-flight work finish and start nothing new after an abort', async () => {
    const { cloud, binding } = setup();
    const coordinator = new ApplyCoordinator({
      cloud,
      bindings: [binding],
      config: testConfig({ concurrency: 1 }),
    });
    const controller = new AbortController();

    const { report } = await coordinator.apply(
      resolver.plan(clusterTopology(), { bindings: [binding] }),
      new StateStore(),
      {
        signal: controller.signal,
        onEvent: (event) => {
          if (event.type === 'node-ready' && event.nodeId === 'vpc') {
            controller.abort();
          }
        },
      }
    );

    expect(report.status).toBe('partial-failure');
    if (report.status !== 'partial-failure') return;
    expect(report.completedNodeIds).toEqual(['vpc']);
    expect(report.notStarted).toEqual(['subnet', 'cluster', 'ns']);
    expect(cloud.callsFor('create')).toEqual(['vpc']);
  });

  it('should destroy dependents first, reaching cluster objects through the binding', async () => {
    const { cloud, workloads, binding, coordinator } = setup();
    const nodes = clusterTopology();
    const { state } = await coordinator.apply(resolver.plan(nodes, { bindings: [binding] }));

    const { report } = await coordinator.destroy(resolver.planDestroy(nodes, { bindings: [binding] }), state);

    expect(report.status).toBe('converged');
    expect(report.completedNodeIds).toEqual(['ns', 'cluster', 'subnet', 'vpc']);
    expect(workloads.callsFor('delete')).toEqual(['ns']);
    expect(cloud.callsFor('delete')).toEqual(['cluster', 'subnet', 'vpc']);
    expect(state.size).toBe(0);
  });

  it('should report a protected node without calling delete on it', async () => {
    const { cloud, binding, coordinator } = setup();
    const nodes = clusterTopology([], DeletionPolicy.Protect);
    const { state } = await coordinator.apply(resolver.plan(nodes, { bindings: [binding] }));

    const { report } = await coordinator.destroy(resolver.planDestroy(nodes, { bindings: [binding] }), state);

    expect(report.status).toBe('partial-failure');
    if (report.status !== 'partial-failure') return;
    expect(report.failedNodeId).toBe('vpc');
    expect(report.failures[0]?.code).toBe('PROTECTED_RESOURCE');
    expect(cloud.callsFor('delete')).toEqual(['cluster', 'subnet']);
    expect(state.ids()).toEqual(['vpc']);
  });

  it('should refuse a plan of the wrong operation', async () => {
    const { binding, coordinator } = setup();
    const plan = resolver.plan(clusterTopology(), { bindings: [binding] });
    await expect(coordinator.destroy(plan, new StateStore())).rejects.toThrow('destroy() needs a destroy plan');
  });
});
