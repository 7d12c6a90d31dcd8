/**
 * Run reporting for command line front ends
 */

import type { ApplyResult } from '../core/deployment/index.js';
import { describeCause, ErrorCode, StrataError } from '../core/errors.js';
import type { ReconcileAction, RunReport } from '../core/types/events.js';

export const ExitCode = {
  Converged: 0,
  NodeFailure: 1,
  ReadinessTimeout: 2,
  PlanningError: 3,
  Aborted: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const PLANNING_CODES: ReadonlySet<string> = new Set([
  ErrorCode.CycleDetected,
  ErrorCode.UnresolvableReference,
  ErrorCode.Validation,
  ErrorCode.ManifestFetchFailed,
]);

/**
 * Exit code for a finished run, or for the error that stopped one before it
 * started
 */
export function exitCodeFor(outcome: RunReport | Error): ExitCode {
  if (outcome instanceof Error) {
    return outcome instanceof StrataError && PLANNING_CODES.has(outcome.code)
      ? ExitCode.PlanningError
      : ExitCode.NodeFailure;
  }
  if (outcome.status === 'converged') {
    return ExitCode.Converged;
  }
  if (outcome.aborted) {
    return ExitCode.Aborted;
  }
  const firstFailure = outcome.failures[0];
  return firstFailure?.code === ErrorCode.TimedOut ? ExitCode.ReadinessTimeout : ExitCode.NodeFailure;
}

function summarizeActions(actions: Record<string, ReconcileAction>): string {
  const counts = new Map<ReconcileAction, number>();
  for (const action of Object.values(actions)) {
    counts.set(action, (counts.get(action) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([action, count]) => `${count} ${action}`)
    .join(', ');
}

/**
 * Human-readable summary, one line per fact
 */
export function formatRunReport(report: RunReport): string[] {
  const actions = summarizeActions(report.actions);
  const done = `${report.completedNodeIds.length} completed${actions ? ` (${actions})` : ''}`;

  if (report.status === 'converged') {
    return [`${report.operation} ${report.runId} converged: ${done} in ${report.durationMs}ms`];
  }

  const lines: string[] = [];
  const cause = report.cause
    ? describeCause(report.cause)
    : report.aborted
      ? 'run was aborted'
      : `${report.blocked.length} nodes blocked`;
  lines.push(
    report.failedNodeId
      ? `${report.operation} ${report.runId} failed at '${report.failedNodeId}': ${cause}`
      : `${report.operation} ${report.runId} did not converge: ${cause}`
  );
  lines.push(`  ${done}`);
  for (const failure of report.failures) {
    lines.push(`  failed ${failure.nodeId} [${failure.kind}] ${failure.code}: ${failure.message}`);
  }
  for (const blocked of report.blocked) {
    lines.push(`  blocked ${blocked.nodeId}: ${blocked.reason}`);
  }
  if (report.notStarted.length > 0) {
    lines.push(`  not started: ${report.notStarted.join(', ')}`);
  }
  return lines;
}

/**
 * Await a run, print its summary and return the exit code
 */
export async function reportRun(
  run: Promise<ApplyResult>,
  write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)
): Promise<ExitCode> {
  try {
    const { report } = await run;
    for (const line of formatRunReport(report)) {
      write(line);
    }
    return exitCodeFor(report);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    const code = cause instanceof StrataError ? ` ${cause.code}` : '';
    write(`error${code}: ${cause.message}`);
    return exitCodeFor(cause);
  }
}
