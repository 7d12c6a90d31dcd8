export { loadStateFile, parseStateDocument, saveStateFile, StateDocumentSchema } from './persistence.js';
export { canTransition, StateStore, type StateRecordPatch } from './store.js';
