/**
 * Core type exports
 */

export type * from './backend.js';
export type * from './events.js';
export type * from './plan.js';
export type * from './provider.js';
export type * from './state.js';
export {
  DeletionPolicy,
  NodeStatus,
  ResourceKind,
  STAGE_ORDER,
  Stage,
} from './resource.js';
export type {
  InputValue,
  NodeInputs,
  NodeOutputs,
  OutputReference,
  OutputTemplate,
  ReadinessSetting,
  ResolvedInputs,
  ResourceNode,
} from './resource.js';
