/**
 * Apply plan types
 */

import type { ResourceNode, Stage } from './resource.js';

export type PlanOperation = 'apply' | 'destroy';

export interface PlanStep {
  node: ResourceNode;
  operation: PlanOperation;
  /** Ids this step waits for; dependents for destroy plans */
  waitsFor: readonly string[];
}

export interface StagePlan {
  stage: Stage;
  steps: readonly PlanStep[];
}

export interface BindingPlan {
  name: string;
  sources: readonly string[];
  consumers: readonly string[];
}

/**
 * Ordered (node, operation) pairs, partitioned by stage
 */
export interface ApplyPlan {
  operation: PlanOperation;
  stages: readonly StagePlan[];
  /** All node ids in execution order */
  order: readonly string[];
  /** Nodes moved to the next stage because their binding resolves only there */
  promoted: readonly string[];
  bindings: readonly BindingPlan[];
}
