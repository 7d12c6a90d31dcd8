/**
 * strata - two-stage convergent infrastructure orchestration.
 */

// =============================================================================
// CORE FUNCTIONALITY
// =============================================================================
export * from './core.js';
// =============================================================================
// FACTORIES
// =============================================================================
export * from './factories/index.js';
// =============================================================================
// REPORTING
// =============================================================================
export { ExitCode, exitCodeFor, formatRunReport, reportRun } from './cli/index.js';
