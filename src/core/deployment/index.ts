/**
 * Deployment module exports
 */

export { ProviderBindingRegistry } from './bindings.js';
export { ApplyCoordinator, type ApplyResult, type CoordinatorOptions } from './coordinator.js';
export {
  READINESS_WAIT_KINDS,
  ReconciliationExecutor,
  type ReconcileResult,
  readinessWindow,
  recoversStuckDeletion,
  STUCK_DELETION_RECOVERY_KINDS,
} from './executor.js';
export { runSteps, type ScheduleOptions, type ScheduleResult } from './scheduler.js';
export { type AwaitDeletionParams, awaitDeletion, type DeletionWindows } from './stuck-deletion.js';
export { withTimeout } from './timeouts.js';
