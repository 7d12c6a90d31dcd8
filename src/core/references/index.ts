/**
 * References module exports
 */

export { ref, template } from './refs.js';
export {
  canonicalize,
  diffInputs,
  fingerprintInputs,
  lookupFromSnapshot,
  type OutputLookup,
  ReferenceResolver,
  readAttribute,
} from './resolver.js';
