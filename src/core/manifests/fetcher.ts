/**
 * Remote manifest fetching
 *
 * Fails closed: a transport error, a non-2xx response, unparsable YAML or a
 * document without apiVersion, kind and metadata.name rejects the whole
 * manifest.
 */

import { type } from 'arktype';
import * as yaml from 'js-yaml';
import { ManifestFetchError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { ManifestDocument, ManifestFetcher } from '../types/backend.js';

const logger = getComponentLogger('manifest-fetcher');

export const ManifestDocumentSchema = type({
  apiVersion: 'string > 0',
  kind: 'string > 0',
  metadata: {
    name: 'string > 0',
    'namespace?': 'string',
    '[string]': 'unknown',
  },
  '[string]': 'unknown',
});

export type FetchFunction = (url: string) => Promise<Response>;

export interface HttpManifestFetcherOptions {
  /** Defaults to the global fetch */
  fetch?: FetchFunction | undefined;
  /** Per-request budget */
  timeoutMs?: number | undefined;
}

/**
 * Parse a multi-document YAML string into manifest documents
 */
export function parseManifestDocuments(url: string, content: string): ManifestDocument[] {
  let loaded: unknown[];
  try {
    loaded = yaml.loadAll(content);
  } catch (error) {
    throw new ManifestFetchError(
      url,
      `unparsable YAML: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  const documents: ManifestDocument[] = [];
  loaded.forEach((document, index) => {
    // Empty documents between separators
    if (document === null || document === undefined) {
      return;
    }
    const result = ManifestDocumentSchema(document);
    if (result instanceof type.errors) {
      throw new ManifestFetchError(url, `document ${index} is not a manifest: ${result.summary}`);
    }
    documents.push(result);
  });

  if (documents.length === 0) {
    throw new ManifestFetchError(url, 'no documents');
  }
  return documents;
}

function transportError(url: string, error: unknown): ManifestFetchError {
  return new ManifestFetchError(url, error instanceof Error ? error.message : String(error), error);
}

export class HttpManifestFetcher implements ManifestFetcher {
  private readonly fetchFn: FetchFunction;
  private readonly timeoutMs: number;

  constructor(options: HttpManifestFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchFn = options.fetch ?? ((url) => fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) }));
  }

  async fetchManifest(url: string): Promise<ManifestDocument[]> {
    let response: Response;
    try {
      response = await this.fetchFn(url);
    } catch (error) {
      throw transportError(url, error);
    }

    if (!response.ok) {
      throw new ManifestFetchError(url, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    let content: string;
    try {
      content = await response.text();
    } catch (error) {
      throw transportError(url, error);
    }
    const documents = parseManifestDocuments(url, content);
    logger.debug('Manifest fetched', { url, documents: documents.length });
    return documents;
  }
}
