export { attachManifests } from './attach.js';
export {
  type FetchFunction,
  HttpManifestFetcher,
  type HttpManifestFetcherOptions,
  ManifestDocumentSchema,
  parseManifestDocuments,
} from './fetcher.js';
