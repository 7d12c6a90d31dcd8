/**
 * Dependencies module exports
 */

export { type DependencyNode, DependencyGraph, formatCycleError, type OrderRank } from './graph.js';
export { DependencyResolver, type PlanOptions } from './resolver.js';
export { collectReferences, isOutputReference, isOutputTemplate, isRecord } from './type-guards.js';
export { selectEnabled } from './selection.js';
