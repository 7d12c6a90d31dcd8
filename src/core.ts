/**
 * strata core - consolidated exports
 *
 * Single entry point for the orchestrator's core: the resource graph model,
 * planning, the apply coordinator and its collaborators.
 */

// =============================================================================
// Configuration
// =============================================================================
export {
  DEFAULT_ORCHESTRATOR_CONFIG,
  type DeletionConfig,
  type DeletionOverrides,
  getConfigFromEnv,
  mergeConfig,
  type OrchestratorConfig,
  type OrchestratorConfigOverrides,
  OrchestratorConfigSchema,
  resolveConfig,
  validateConfig,
  type WaitWindowConfig,
  type WaitWindowOverrides,
} from './core/config/index.js';
// =============================================================================
// Dependencies and planning
// =============================================================================
export {
  collectReferences,
  DependencyGraph,
  type DependencyNode,
  DependencyResolver,
  formatCycleError,
  isOutputReference,
  isOutputTemplate,
  type PlanOptions,
  selectEnabled,
} from './core/dependencies/index.js';
// =============================================================================
// Apply coordination
// =============================================================================
export {
  ApplyCoordinator,
  type ApplyResult,
  type CoordinatorOptions,
  ProviderBindingRegistry,
  READINESS_WAIT_KINDS,
  ReconciliationExecutor,
  type ReconcileResult,
  STUCK_DELETION_RECOVERY_KINDS,
  withTimeout,
} from './core/deployment/index.js';
// =============================================================================
// Errors
// =============================================================================
export {
  BackendCallFailedError,
  CycleDetectedError,
  describeCause,
  ErrorCode,
  formatArktypeError,
  InvalidStateTransitionError,
  ManifestFetchError,
  ProtectedResourceError,
  ReadinessTimeoutError,
  type RecoveryStep,
  ResourceFailedError,
  StrataError,
  StuckDeletionError,
  UnresolvableReferenceError,
  ValidationError,
} from './core/errors.js';
// =============================================================================
// Grants
// =============================================================================
export {
  createGrantBackend,
  type DatabaseGrantBindingOptions,
  databaseGrantBinding,
  type GrantEdge,
} from './core/grants/index.js';
// =============================================================================
// Kubernetes workload backend
// =============================================================================
export {
  type ClusterBindingOptions,
  createKubeConfig,
  createKubernetesClients,
  evaluateObjectReadiness,
  type KubernetesClientConfig,
  type KubernetesClients,
  kubernetesClusterBinding,
  KubernetesWorkloadApi,
} from './core/kubernetes/index.js';
// =============================================================================
// Logging
// =============================================================================
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getResourceLogger,
  getRunLogger,
  type LoggerConfig,
  type LoggerContext,
  type LogLevel,
  logger,
  type StrataLogger,
} from './core/logging/index.js';
// =============================================================================
// Manifests
// =============================================================================
export { attachManifests, HttpManifestFetcher, parseManifestDocuments } from './core/manifests/index.js';
// =============================================================================
// Orchestrator
// =============================================================================
export { Orchestrator, type OrchestratorOptions, type RunOptions } from './core/orchestrator.js';
// =============================================================================
// Readiness
// =============================================================================
export {
  type PollOptions,
  type Probe,
  type ProbeResult,
  type WaitOutcome,
  waitUntilReady,
  waitUntilReadyOrThrow,
} from './core/readiness/index.js';
// =============================================================================
// References
// =============================================================================
export { ref, ReferenceResolver, template } from './core/references/index.js';
// =============================================================================
// State
// =============================================================================
export { loadStateFile, saveStateFile, StateStore } from './core/state/index.js';
// =============================================================================
// Types
// =============================================================================
export * from './core/types/index.js';
