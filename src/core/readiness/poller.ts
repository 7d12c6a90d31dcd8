/**
 * Convergence / Readiness Poller
 *
 * Repeats a probe at a fixed interval until it reports ready, reports a
 * terminal failure, or the time budget runs out. The budget is wall-clock:
 * a probe starts only while time remains, and the sleep before the next one
 * never overshoots the deadline.
 */

import { describeCause, ReadinessTimeoutError, ResourceFailedError } from '../errors.js';

export type ProbeResult<T> =
  | { ready: true; value: T }
  | {
      ready: false;
      reason?: string | undefined;
      /** The resource reached a state it will not recover from */
      terminal?: boolean | undefined;
    };

export type Probe<T> = () => Promise<ProbeResult<T>>;

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  /** Called after every probe */
  onAttempt?: ((attempt: number, result: ProbeResult<unknown>) => void) | undefined;
}

interface WaitStats {
  attempts: number;
  elapsedMs: number;
}

export type WaitOutcome<T> =
  | (WaitStats & { outcome: 'ready'; value: T })
  | (WaitStats & { outcome: 'timed-out'; lastReason: string | undefined })
  | (WaitStats & { outcome: 'failed'; reason: string });

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll until ready, failed or out of time. A probe that throws counts as
 * "not ready yet".
 */
export async function waitUntilReady<T>(probe: Probe<T>, options: PollOptions): Promise<WaitOutcome<T>> {
  const start = Date.now();
  const deadline = start + options.timeoutMs;
  const interval = Math.max(1, options.intervalMs);
  let attempts = 0;
  let lastReason: string | undefined;

  while (Date.now() < deadline) {
    attempts++;
    let result: ProbeResult<T>;
    try {
      result = await probe();
    } catch (error) {
      result = { ready: false, reason: describeCause(error) };
    }
    options.onAttempt?.(attempts, result);

    if (result.ready) {
      return { outcome: 'ready', value: result.value, attempts, elapsedMs: Date.now() - start };
    }
    if (result.terminal) {
      return {
        outcome: 'failed',
        reason: result.reason ?? 'unknown failure',
        attempts,
        elapsedMs: Date.now() - start,
      };
    }
    lastReason = result.reason;

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      break;
    }
    await sleep(Math.min(interval, remaining));
  }

  return { outcome: 'timed-out', lastReason, attempts, elapsedMs: Date.now() - start };
}

/**
 * Like waitUntilReady, but a timeout or terminal failure throws
 */
export async function waitUntilReadyOrThrow<T>(
  subject: string,
  probe: Probe<T>,
  options: PollOptions
): Promise<T> {
  const outcome = await waitUntilReady(probe, options);
  switch (outcome.outcome) {
    case 'ready':
      return outcome.value;
    case 'failed':
      throw new ResourceFailedError(subject, outcome.reason);
    case 'timed-out':
      throw new ReadinessTimeoutError(subject, outcome.elapsedMs, options.timeoutMs, outcome.lastReason);
  }
}
