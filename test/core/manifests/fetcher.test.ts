import { describe, expect, it, vi } from 'vitest';
import { ManifestFetchError } from '../../../src/core/errors.js';
import { HttpManifestFetcher, parseManifestDocuments } from '../../../src/core/manifests/index.js';

const MANIFEST_URL = 'https://manifests.example.test/operator/1.0.0/crds.yml';

const twoDocuments = `---
apiVersion: apiextensions.k8s.io/v1
kind: CustomResourceDefinition
metadata:
  name: servers.identity.example.test
---
---
apiVersion: v1
kind: ServiceAccount
metadata:
  name: identity-operator
  namespace: identity
`;

describe('parseManifestDocuments', () => {
  it('should parse every document and skip empty ones', () => {
    expect(parseManifestDocuments(MANIFEST_URL, twoDocuments)).toEqual([
      {
        apiVersion: 'apiextensions.k8s.io/v1',
        kind: 'CustomResourceDefinition',
        metadata: { name: 'servers.identity.example.test' },
      },
      {
        apiVersion: 'v1',
        kind: 'ServiceAccount',
        metadata: { name: 'identity-operator', namespace: 'identity' },
      },
    ]);
  });

  it('should reject a document that is not a manifest', () => {
    expect(() => parseManifestDocuments(MANIFEST_URL, 'kind: ConfigMap\nmetadata:\n  name: settings\n')).toThrow(
      /^Failed to fetch manifest https:\/\/manifests\.example\.test\/operator\/1\.0\.0\/crds\.yml: document 0 is not a manifest: /
    );
  });

  it('should reject unparsable YAML', () => {
    expect(() => parseManifestDocuments(MANIFEST_URL, 'kind: [unclosed')).toThrow(/: unparsable YAML: /);
  });

  it('should reject content without documents', () => {
    expect(() => parseManifestDocuments(MANIFEST_URL, '')).toThrow(new ManifestFetchError(MANIFEST_URL, 'no documents'));
  });
});

describe('HttpManifestFetcher', () => {
  it('should fetch and parse a manifest', async () => {
    const fetch = vi.fn(async (_url: string) => new Response(twoDocuments, { status: 200 }));
    const fetcher = new HttpManifestFetcher({ fetch });

    const documents = await fetcher.fetchManifest(MANIFEST_URL);

    expect(fetch).toHaveBeenCalledWith(MANIFEST_URL);
    expect(documents.map((document) => document.kind)).toEqual(['CustomResourceDefinition', 'ServiceAccount']);
  });

  it('should fail on a non-2xx response', async () => {
    const fetcher = new HttpManifestFetcher({
      fetch: async () => new Response('missing', { status: 404, statusText: 'Not Found' }),
    });

    await expect(fetcher.fetchManifest(MANIFEST_URL)).rejects.toThrow(new ManifestFetchError(MANIFEST_URL, 'HTTP 404 Not Found'));
  });

  it('should fail on a transport error', async () => {
    const fetcher = new HttpManifestFetcher({
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const error = await fetcher.fetchManifest(MANIFEST_URL).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ManifestFetchError);
    expect(error).toHaveProperty('message', `Failed to fetch manifest ${MANIFEST_URL}: fetch failed`);
    expect(error).toHaveProperty('code', 'MANIFEST_FETCH_FAILED');
  });

  it('should fail when the body is cut off mid-read', async () => {
    const response = new Response(twoDocuments, { status: 200 });
    vi.spyOn(response, 'text').mockRejectedValue(new Error('connection reset'));
    const fetcher = new HttpManifestFetcher({ fetch: async () => response });

    const error = await fetcher.fetchManifest(MANIFEST_URL).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ManifestFetchError);
    expect(error).toHaveProperty('message', `Failed to fetch manifest ${MANIFEST_URL}: connection reset`);
  });
});
