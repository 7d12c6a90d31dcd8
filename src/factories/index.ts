/**
 * Factory functions index
 */

export * as cloud from './cloud/index.js';
export * as kubernetes from './kubernetes/index.js';
export {
  createNode,
  defineTopology,
  generateNodeId,
  getCurrentTopologyContext,
  type NodeDefinition,
  type NodeOptions,
  nodeOptions,
  type TopologyContext,
  validateNodeId,
} from './shared.js';
