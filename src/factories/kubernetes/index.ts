/**
 * Cluster workload factories
 */

export * from './certificates/index.js';
export * from './config/index.js';
export * from './core/index.js';
export * from './extensions/index.js';
export {
  createWorkloadNode,
  type Labels,
  type NamespacedOptions,
  namespaceOf,
  type WorkloadNodeDefinition,
  type WorkloadOptions,
} from './manifest.js';
export * from './networking/index.js';
export * from './rbac/index.js';
export * from './workloads/index.js';
