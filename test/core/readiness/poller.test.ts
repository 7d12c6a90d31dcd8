import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ReadinessTimeoutError, ResourceFailedError } from '../../../src/core/errors.js';
import {
  type ProbeResult,
  waitUntilReady,
  waitUntilReadyOrThrow,
} from '../../../src/core/readiness/poller.js';

const pending: ProbeResult<string> = { ready: false, reason: 'provisioning' };

describe('waitUntilReady', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should probe at the interval until the budget is spent', async () => {
    const probe = vi.fn(async () => pending);

    const waiting = waitUntilReady(probe, { timeoutMs: 5000, intervalMs: 1000 });
    await vi.advanceTimersByTimeAsync(5000);
    const outcome = await waiting;

    expect(probe).toHaveBeenCalledTimes(5);
    expect(outcome).toEqual({ outcome: 'timed-out', lastReason: 'provisioning', attempts: 5, elapsedMs: 5000 });
  });

  it('should return the value of the first ready probe', async () => {
    const probe = vi
      .fn<() => Promise<ProbeResult<string>>>()
      .mockResolvedValueOnce(pending)
      .mockResolvedValueOnce(pending)
      .mockResolvedValue({ ready: true, value: '10.0.0.2' });

    const waiting = waitUntilReady(probe, { timeoutMs: 5000, intervalMs: 1000 });
    await vi.advanceTimersByTimeAsync(2000);

    await expect(waiting).resolves.toEqual({ outcome: 'ready', value: '10.0.0.2', attempts: 3, elapsedMs: 2000 });
  });

  it('should stop at a terminal failure', async () => {
    const probe = vi.fn(async (): Promise<ProbeResult<string>> => ({
      ready: false,
      terminal: true,
      reason: 'provisioning error',
    }));

    await expect(waitUntilReady(probe, { timeoutMs: 5000, intervalMs: 1000 })).resolves.toEqual({
      outcome: 'failed',
      reason: 'provisioning error',
      attempts: 1,
      elapsedMs: 0,
    });
  });

  it('should treat a thrown probe as not ready yet', async () => {
    const onAttempt = vi.fn();
    const probe = vi
      .fn<() => Promise<ProbeResult<string>>>()
      .mockRejectedValueOnce(new Error('connection reset'))
      .mockResolvedValue({ ready: true, value: 'ok' });

    const waiting = waitUntilReady(probe, { timeoutMs: 5000, intervalMs: 1000, onAttempt });
    await vi.advanceTimersByTimeAsync(1000);

    await expect(waiting).resolves.toMatchObject({ outcome: 'ready', attempts: 2 });
    expect(onAttempt).toHaveBeenNthCalledWith(1, 1, { ready: false, reason: 'connection reset' });
  });

  it('should never sleep past the deadline', async () => {
    const probe = vi.fn(async () => pending);

    const waiting = waitUntilReady(probe, { timeoutMs: 2500, intervalMs: 1000 });
    await vi.advanceTimersByTimeAsync(2500);

    await expect(waiting).resolves.toMatchObject({ outcome: 'timed-out', attempts: 3, elapsedMs: 2500 });
  });
});

describe('waitUntilReadyOrThrow', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should throw a readiness timeout carrying the last reason', async () => {
    const waiting = waitUntilReadyOrThrow("Network 'vpc'", async () => pending, {
      timeoutMs: 3000,
      intervalMs: 1000,
    });
    const assertion = expect(waiting).rejects.toThrow(
      new ReadinessTimeoutError("Network 'vpc'", 3000, 3000, 'provisioning')
    );
    await vi.advanceTimersByTimeAsync(3000);
    await assertion;
  });

  it('should throw a resource failure for a terminal probe', async () => {
    await expect(
      waitUntilReadyOrThrow("Cluster 'gke'", async () => ({ ready: false, terminal: true, reason: 'ERROR' }), {
        timeoutMs: 3000,
        intervalMs: 1000,
      })
    ).rejects.toThrow(new ResourceFailedError("Cluster 'gke'", 'ERROR'));
  });
});
