/**
 * Bounded-parallel step scheduler
 *
 * Runs the steps of one stage on a p-queue worker pool. A step starts once
 * everything it waits for inside the stage has succeeded. When a step fails,
 * its transitive dependents never start; independent branches keep going.
 * Aborting clears the queue, so only in-flight steps finish.
 */

import PQueue from 'p-queue';
import { toError } from '../errors.js';
import type { BlockedNode } from '../types/events.js';
import type { PlanStep } from '../types/plan.js';

export interface ScheduleOptions {
  concurrency: number;
  signal?: AbortSignal | undefined;
  /** Runs one step; a rejection marks it failed */
  execute: (step: PlanStep) => Promise<void>;
  /**
   * Reason a step must not start, decided just before it would run
   * (an unresolved binding, a failed node of an earlier stage)
   */
  blockedReason?: ((step: PlanStep) => string | undefined) | undefined;
  onFailed?: ((step: PlanStep, error: Error) => void) | undefined;
  onBlocked?: ((step: PlanStep, reason: string) => void) | undefined;
}

export interface ScheduleResult {
  completed: string[];
  failed: Map<string, Error>;
  blocked: BlockedNode[];
  notStarted: string[];
}

export async function runSteps(
  steps: readonly PlanStep[],
  options: ScheduleOptions
): Promise<ScheduleResult> {
  const result: ScheduleResult = { completed: [], failed: new Map(), blocked: [], notStarted: [] };
  const inStage = new Set(steps.map((step) => step.node.id));
  const remaining = new Map<string, number>();
  const waiters = new Map<string, PlanStep[]>();
  const settled = new Set<string>();

  for (const step of steps) {
    const internal = step.waitsFor.filter((id) => inStage.has(id));
    remaining.set(step.node.id, internal.length);
    for (const id of internal) {
      const list = waiters.get(id) ?? [];
      list.push(step);
      waiters.set(id, list);
    }
  }

  const queue = new PQueue({ concurrency: Math.max(1, options.concurrency) });
  const onAbort = (): void => {
    queue.clear();
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  const block = (step: PlanStep, reason: string): void => {
    if (settled.has(step.node.id)) return;
    settled.add(step.node.id);
    result.blocked.push({ nodeId: step.node.id, reason });
    options.onBlocked?.(step, reason);
    for (const dependent of waiters.get(step.node.id) ?? []) {
      block(dependent, `dependency '${step.node.id}' did not complete`);
    }
  };

  const release = (id: string): void => {
    for (const dependent of waiters.get(id) ?? []) {
      const left = (remaining.get(dependent.node.id) ?? 0) - 1;
      remaining.set(dependent.node.id, left);
      if (left === 0) {
        schedule(dependent);
      }
    }
  };

  const schedule = (step: PlanStep): void => {
    if (options.signal?.aborted) return;
    void queue.add(async () => {
      if (options.signal?.aborted || settled.has(step.node.id)) return;

      const reason = options.blockedReason?.(step);
      if (reason !== undefined) {
        block(step, reason);
        return;
      }

      try {
        await options.execute(step);
        settled.add(step.node.id);
        result.completed.push(step.node.id);
        release(step.node.id);
      } catch (error) {
        const failure = toError(error);
        settled.add(step.node.id);
        result.failed.set(step.node.id, failure);
        options.onFailed?.(step, failure);
        for (const dependent of waiters.get(step.node.id) ?? []) {
          block(dependent, `dependency '${step.node.id}' failed`);
        }
      }
    });
  };

  try {
    for (const step of steps) {
      if (remaining.get(step.node.id) === 0) {
        schedule(step);
      }
    }
    await queue.onIdle();
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }

  for (const step of steps) {
    if (!settled.has(step.node.id)) {
      result.notStarted.push(step.node.id);
    }
  }

  return result;
}
