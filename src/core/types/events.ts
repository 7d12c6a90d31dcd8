/**
 * Run events and results
 */

import type { ResourceKind, Stage } from './resource.js';

export type ApplyEventType =
  | 'started'
  | 'stage-started'
  | 'stage-completed'
  | 'binding-resolved'
  | 'binding-unresolved'
  | 'progress'
  | 'node-ready'
  | 'node-skipped'
  | 'node-destroyed'
  | 'failed'
  | 'blocked'
  | 'aborted'
  | 'completed';

export interface ApplyEvent {
  type: ApplyEventType;
  message: string;
  timestamp: Date;
  nodeId?: string | undefined;
  stage?: Stage | undefined;
  error?: Error | undefined;
}

export interface ApplyOptions {
  /** Abort stops new node operations; in-flight calls finish */
  signal?: AbortSignal | undefined;
  onEvent?: ((event: ApplyEvent) => void) | undefined;
}

export interface NodeFailure {
  nodeId: string;
  kind: ResourceKind;
  code: string;
  message: string;
  error: Error;
}

export interface BlockedNode {
  nodeId: string;
  reason: string;
}

export type ReconcileAction = 'created' | 'updated' | 'unchanged' | 'destroyed' | 'abandoned' | 'absent';

interface RunReportBase {
  runId: string;
  operation: 'apply' | 'destroy';
  completedNodeIds: string[];
  actions: Record<string, ReconcileAction>;
  durationMs: number;
}

export interface ConvergedReport extends RunReportBase {
  status: 'converged';
}

export interface PartialFailureReport extends RunReportBase {
  status: 'partial-failure';
  /** First failure of the pass, in plan order */
  failedNodeId: string | undefined;
  cause: Error | undefined;
  failures: NodeFailure[];
  blocked: BlockedNode[];
  /** Never started because the run was aborted */
  notStarted: string[];
  aborted: boolean;
}

export type RunReport = ConvergedReport | PartialFailureReport;
