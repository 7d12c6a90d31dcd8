/**
 * Error taxonomy for strata
 *
 * Every error carries a machine-readable code and the context an operator
 * needs to act on it: the node id, its kind and the collaborator's message.
 */

import type { ArkErrors } from 'arktype';
import type { ResourceKind } from './types/resource.js';

export const ErrorCode = {
  CycleDetected: 'CYCLE_DETECTED',
  UnresolvableReference: 'UNRESOLVABLE_REFERENCE',
  BackendCallFailed: 'BACKEND_CALL_FAILED',
  TimedOut: 'TIMED_OUT',
  StuckDeletion: 'STUCK_DELETION',
  ProtectedResource: 'PROTECTED_RESOURCE',
  ManifestFetchFailed: 'MANIFEST_FETCH_FAILED',
  Validation: 'VALIDATION_ERROR',
  InvalidStateTransition: 'INVALID_STATE_TRANSITION',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class StrataError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StrataError';
  }
}

export class ValidationError extends StrataError {
  constructor(
    message: string,
    public readonly subject: string,
    public readonly field?: string,
    public readonly suggestions?: string[]
  ) {
    super(message, ErrorCode.Validation, { subject, field, suggestions });
    this.name = 'ValidationError';
  }
}

/**
 * Planning-time: the node graph is not a DAG
 */
export class CycleDetectedError extends StrataError {
  constructor(
    message: string,
    public readonly cycle: string[]
  ) {
    super(message, ErrorCode.CycleDetected, { cycle });
    this.name = 'CycleDetectedError';
  }
}

/**
 * Planning-time: a reference, dependency or binding cannot be satisfied by
 * the stage ordering. Breaking it needs a human, not a retry.
 */
export class UnresolvableReferenceError extends StrataError {
  constructor(
    message: string,
    public readonly nodeId: string,
    public readonly target: string,
    public readonly suggestions?: string[]
  ) {
    super(message, ErrorCode.UnresolvableReference, { nodeId, target, suggestions });
    this.name = 'UnresolvableReferenceError';
  }
}

/**
 * Wraps a collaborator error, attributed to one node
 */
export class BackendCallFailedError extends StrataError {
  constructor(
    public readonly nodeId: string,
    public readonly kind: ResourceKind,
    public readonly operation: string,
    cause: unknown
  ) {
    super(
      `${operation} of ${kind} '${nodeId}' failed: ${describeCause(cause)}`,
      ErrorCode.BackendCallFailed,
      { nodeId, kind, operation }
    );
    this.name = 'BackendCallFailedError';
    this.cause = cause;
  }
}

export class ReadinessTimeoutError extends StrataError {
  constructor(
    public readonly subject: string,
    public readonly elapsedMs: number,
    public readonly timeoutMs: number,
    public readonly lastReason?: string
  ) {
    super(
      `Timed out after ${elapsedMs}ms (budget ${timeoutMs}ms) waiting for ${subject} to be ready${
        lastReason ? `: ${lastReason}` : ''
      }`,
      ErrorCode.TimedOut,
      { subject, elapsedMs, timeoutMs, lastReason }
    );
    this.name = 'ReadinessTimeoutError';
  }
}

/**
 * The backend reports a state the resource will not recover from
 */
export class ResourceFailedError extends StrataError {
  constructor(
    public readonly subject: string,
    public readonly reason: string
  ) {
    super(`${subject} reported a terminal failure: ${reason}`, ErrorCode.BackendCallFailed, {
      subject,
      reason,
    });
    this.name = 'ResourceFailedError';
  }
}

export type RecoveryStep =
  | 'delete-requested'
  | 'stuck-detected'
  | 'finalizers-cleared'
  | 'verified-gone'
  | 'still-present';

export class StuckDeletionError extends StrataError {
  constructor(
    public readonly nodeId: string,
    public readonly kind: ResourceKind,
    public readonly elapsedMs: number,
    public readonly steps: RecoveryStep[]
  ) {
    super(
      `${kind} '${nodeId}' is still present ${elapsedMs}ms after deletion was requested (steps: ${steps.join(
        ' -> '
      )}); remove it manually`,
      ErrorCode.StuckDeletion,
      { nodeId, kind, elapsedMs, steps }
    );
    this.name = 'StuckDeletionError';
  }
}

export class ProtectedResourceError extends StrataError {
  constructor(
    public readonly nodeId: string,
    public readonly kind: ResourceKind
  ) {
    super(
      `${kind} '${nodeId}' has deletion policy 'protect' and cannot be destroyed`,
      ErrorCode.ProtectedResource,
      { nodeId, kind }
    );
    this.name = 'ProtectedResourceError';
  }
}

export class ManifestFetchError extends StrataError {
  constructor(
    public readonly url: string,
    reason: string,
    cause?: unknown
  ) {
    super(`Failed to fetch manifest ${url}: ${reason}`, ErrorCode.ManifestFetchFailed, {
      url,
      reason,
    });
    this.name = 'ManifestFetchError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class InvalidStateTransitionError extends StrataError {
  constructor(
    public readonly nodeId: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Node '${nodeId}' cannot move from ${from} to ${to}`, ErrorCode.InvalidStateTransition, {
      nodeId,
      from,
      to,
    });
    this.name = 'InvalidStateTransitionError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorCodeOf(error: Error): string {
  return error instanceof StrataError ? error.code : ErrorCode.BackendCallFailed;
}

/**
 * Format arktype validation errors with field paths and suggestions
 */
export function formatArktypeError(errors: ArkErrors, subject: string): ValidationError {
  const [first, ...rest] = errors;

  if (!first) {
    return new ValidationError(`Invalid ${subject}: ${errors.summary}`, subject, undefined, [
      'Check the value against its schema',
    ]);
  }

  const fieldPath = first.path.length > 0 ? first.path.join('.') : 'root';
  let message = `Invalid ${subject} at '${fieldPath}': ${first.message}`;

  const suggestions: string[] = [];
  if (first.code === 'required') {
    suggestions.push(`Add the required field '${fieldPath}'`);
  } else {
    suggestions.push(`Change '${fieldPath}' to ${first.expected}`);
  }

  if (rest.length > 0) {
    message += '\n\nAdditional validation errors:';
    rest.forEach((problem, index) => {
      const path = problem.path.length > 0 ? problem.path.join('.') : 'root';
      message += `\n  ${index + 2}. ${path}: ${problem.message}`;
    });
    suggestions.push(`Fix all ${rest.length + 1} validation errors listed above`);
  }

  return new ValidationError(message, subject, fieldPath, suggestions);
}

/**
 * Suggest node ids close to a missing one
 */
export function suggestSimilarIds(missing: string, available: Iterable<string>): string[] {
  const similar: string[] = [];
  for (const id of available) {
    if (id.includes(missing) || missing.includes(id) || levenshteinDistance(id, missing) <= 2) {
      similar.push(id);
    }
  }
  return similar.sort();
}

function levenshteinDistance(a: string, b: string): number {
  let previous = Array.from({ length: a.length + 1 }, (_, i) => i);

  for (let j = 1; j <= b.length; j++) {
    const current = [j];
    for (let i = 1; i <= a.length; i++) {
      const indicator = a[i - 1] === b[j - 1] ? 0 : 1;
      current[i] = Math.min(
        (current[i - 1] ?? 0) + 1,
        (previous[i] ?? 0) + 1,
        (previous[i - 1] ?? 0) + indicator
      );
    }
    previous = current;
  }

  return previous[a.length] ?? 0;
}
