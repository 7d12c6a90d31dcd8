import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CycleDetectedError, ManifestFetchError } from '../../src/core/errors.js';
import { Orchestrator } from '../../src/core/orchestrator.js';
import type { ManifestDocument } from '../../src/core/types/backend.js';
import type { ResourceNode } from '../../src/core/types/resource.js';
import { FakeBackend, testNode } from '../utils/fake-backends.js';

const CRD_URL = 'https://manifests.example.test/operator/1.0.0/crds.yml';

const crdDocuments: ManifestDocument[] = [
  {
    apiVersion: 'apiextensions.k8s.io/v1',
    kind: 'CustomResourceDefinition',
    metadata: { name: 'servers.identity.example.test' },
  },
];

const testOverrides = {
  concurrency: 4,
  backendCallTimeoutMs: 1000,
  readiness: { timeoutMs: 200, intervalMs: 5 },
  deletion: { timeoutMs: 40, intervalMs: 5, finalizerTimeoutMs: 40 },
};

function crdNode(id: string): ResourceNode {
  return { ...testNode(id, { kind: 'CustomResourceDefinition', inputs: {} }), manifestUrl: CRD_URL };
}

function fetcher() {
  const fetchManifest = vi.fn(async (_url: string) => crdDocuments);
  return { fetchManifest };
}

describe('Orchestrator', () => {
  it('should reject a cyclic graph before any backend call', async () => {
    const cloud = new FakeBackend();
    const orchestrator = new Orchestrator({ cloud, config: testOverrides, manifestFetcher: fetcher() });

    await expect(
      orchestrator.apply([testNode('a', { dependsOn: ['b'] }), testNode('b', { dependsOn: ['a'] })])
    ).rejects.toBeInstanceOf(CycleDetectedError);
    expect(cloud.calls).toEqual([]);
  });

  it('should leave disabled nodes out of the plan', async () => {
    const orchestrator = new Orchestrator({ cloud: new FakeBackend(), config: testOverrides, manifestFetcher: fetcher() });

    const plan = await orchestrator.plan([
      testNode('vpc'),
      testNode('policy', { enabled: false }),
      testNode('ingress', { dependsOn: ['vpc', 'policy'] }),
    ]);

    expect(plan.order).toEqual(['vpc', 'ingress']);
    expect(plan.stages[0]?.steps[1]?.waitsFor).toEqual(['vpc']);
  });

  it('should fetch each manifest once and pass its documents to the backend', async () => {
    const cloud = new FakeBackend();
    const manifests = fetcher();
    const orchestrator = new Orchestrator({ cloud, config: testOverrides, manifestFetcher: manifests });

    const { report } = await orchestrator.apply([crdNode('crds'), crdNode('crds-copy')]);

    expect(report.status).toBe('converged');
    expect(manifests.fetchManifest).toHaveBeenCalledTimes(1);
    expect(cloud.resources.get('CustomResourceDefinition/crds')?.inputs).toEqual({ documents: crdDocuments });
  });

  it('should fail closed when a manifest cannot be fetched', async () => {
    const cloud = new FakeBackend();
    const orchestrator = new Orchestrator({
      cloud,
      config: testOverrides,
      manifestFetcher: {
        fetchManifest: async (url) => {
          throw new ManifestFetchError(url, 'HTTP 404 Not Found');
        },
      },
    });

    await expect(orchestrator.apply([testNode('vpc'), crdNode('crds')])).rejects.toThrow(
      `Failed to fetch manifest ${CRD_URL}: HTTP 404 Not Found`
    );
    expect(cloud.calls).toEqual([]);
  });

  it('should destroy without fetching manifests', async () => {
    const cloud = new FakeBackend();
    const manifests = fetcher();
    const orchestrator = new Orchestrator({ cloud, config: testOverrides, manifestFetcher: manifests });
    const { state } = await orchestrator.apply([crdNode('crds')]);
    manifests.fetchManifest.mockClear();

    const { report } = await orchestrator.destroy([crdNode('crds')], { state });

    expect(report.status).toBe('converged');
    expect(report.actions).toEqual({ crds: 'destroyed' });
    expect(manifests.fetchManifest).not.toHaveBeenCalled();
  });

  describe('with a state file', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'strata-orchestrator-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('should carry state between runs', async () => {
      const stateFile = join(directory, 'state.json');
      const cloud = new FakeBackend();
      const nodes = [testNode('vpc'), testNode('subnet', { kind: 'Subnet', dependsOn: ['vpc'] })];

      await new Orchestrator({ cloud, config: testOverrides, stateFile }).apply(nodes);
      const { report } = await new Orchestrator({ cloud, config: testOverrides, stateFile }).apply(nodes);

      expect(report.actions).toEqual({ vpc: 'unchanged', subnet: 'unchanged' });
      expect(cloud.callsFor('create')).toEqual(['vpc', 'subnet']);
    });
  });
});
