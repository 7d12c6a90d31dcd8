import type { ManifestFetcher } from '../types/backend.js';
import type { ResourceNode } from '../types/resource.js';

/**
 * Fetch every node's remote manifest and attach its documents. They reach
 * the backend as the `documents` input. Any fetch failure rejects before a
 * node is touched.
 */
export async function attachManifests(
  nodes: readonly ResourceNode[],
  fetcher: ManifestFetcher
): Promise<ResourceNode[]> {
  const cache = new Map<string, ReturnType<ManifestFetcher['fetchManifest']>>();

  return Promise.all(
    nodes.map(async (node) => {
      if (!node.manifestUrl) {
        return node;
      }
      let pending = cache.get(node.manifestUrl);
      if (!pending) {
        pending = fetcher.fetchManifest(node.manifestUrl);
        cache.set(node.manifestUrl, pending);
      }
      const documents = await pending;
      return { ...node, documents };
    })
  );
}
