export { createGrantBackend, type GrantEdge, grantEdgeFromInputs, grantId } from './backend.js';
export { type DatabaseGrantBindingOptions, databaseGrantBinding } from './binding.js';
