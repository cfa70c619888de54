import { afterEach, describe, expect, it, vi } from 'vitest';
import { backoffDelay, retryWithBackoff, sleep } from '@/utils/retryWithBackoff';
import { runWithDeadline } from '@/utils/timeout';
import { KeyedLock, runWithConcurrency } from '@/stability/workQueue';
import { TimeoutError } from '@/services/errors';

describe('backoffDelay', () => {
  it('grows exponentially and caps at maxDelay', () => {
    const options = { initialDelay: 100, maxDelay: 350, jitter: false };
    expect(backoffDelay(0, options)).toBe(100);
    expect(backoffDelay(1, options)).toBe(200);
    expect(backoffDelay(2, options)).toBe(350);
  });

  it('adds at most 25% jitter', () => {
    for (let i = 0; i < 20; i++) {
      const delay = backoffDelay(1, { initialDelay: 100 });
      expect(delay).toBeGreaterThanOrEqual(200);
      expect(delay).toBeLessThanOrEqual(250);
    }
  });
});

describe('retryWithBackoff', () => {
  it('retries until the call succeeds', async () => {
    const attempts: number[] = [];
    const result = await retryWithBackoff(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 2) throw new Error('flaky');
        return 'done';
      },
      { maxRetries: 3, initialDelay: 1, jitter: false },
    );

    expect(result).toBe('done');
    expect(attempts).toEqual([0, 1, 2]);
  });

  it('rethrows the last error once retries run out', async () => {
    let calls = 0;
    const run = retryWithBackoff(
      async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      },
      { maxRetries: 2, initialDelay: 1, jitter: false },
    );

    await expect(run).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
  });

  it('stops when shouldRetry says no', async () => {
    let calls = 0;
    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw new Error('bad request');
        },
        { maxRetries: 5, initialDelay: 1, shouldRetry: () => false },
      ),
    ).rejects.toThrow('bad request');
    expect(calls).toBe(1);
  });

  it('does not retry aborts', async () => {
    let calls = 0;
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw abort;
        },
        { maxRetries: 3, initialDelay: 1 },
      ),
    ).rejects.toBe(abort);
    expect(calls).toBe(1);
  });
});

describe('sleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('stop'));
    await expect(pending).rejects.toThrow('stop');
  });
});

describe('runWithDeadline', () => {
  it('resolves with the task result inside the deadline', async () => {
    await expect(
      runWithDeadline(async () => 42, { timeoutMs: 100, label: 'quick' }),
    ).resolves.toBe(42);
  });

  it('rejects with TimeoutError and aborts the task signal', async () => {
    let taskSignal: AbortSignal | undefined;
    const run = runWithDeadline(
      (signal) => {
        taskSignal = signal;
        return new Promise<never>(() => undefined);
      },
      { timeoutMs: 20, label: 'slow-call' },
    );

    await expect(run).rejects.toBeInstanceOf(TimeoutError);
    await expect(run).rejects.toThrow('slow-call timed out after 20ms');
    expect(taskSignal?.aborted).toBe(true);
  });

  it('follows the caller signal', async () => {
    const controller = new AbortController();
    const run = runWithDeadline(() => new Promise<never>(() => undefined), {
      timeoutMs: 10_000,
      label: 'call',
      signal: controller.signal,
    });
    controller.abort(new Error('caller left'));

    await expect(run).rejects.toThrow('caller left');
  });

  describe('with a task that throws before returning a promise', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('rejects with the thrown error and clears its timer', async () => {
      vi.useFakeTimers();
      const controller = new AbortController();

      const run = runWithDeadline(
        () => {
          throw new Error('bad input');
        },
        { timeoutMs: 10_000, label: 'call', signal: controller.signal },
      );

      await expect(run).rejects.toThrow('bad input');
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  it('rejects at once when the caller already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already gone'));
    let started = false;

    await expect(
      runWithDeadline(
        async () => {
          started = true;
        },
        { timeoutMs: 100, label: 'call', signal: controller.signal },
      ),
    ).rejects.toThrow('already gone');
    expect(started).toBe(false);
  });
});

describe('runWithConcurrency', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await runWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(ms);
      inFlight--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it('rejects a non-positive concurrency', async () => {
    await expect(runWithConcurrency([1], 0, async (x) => x)).rejects.toThrow(TypeError);
  });

  it('returns an empty array for no items', async () => {
    await expect(runWithConcurrency([], 3, async (x: number) => x)).resolves.toEqual([]);
  });
});

describe('KeyedLock', () => {
  it('serializes sections that share a key', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('kyoto', async () => {
        events.push('first:start');
        await sleep(15);
        events.push('first:end');
      }),
      lock.run('kyoto', async () => {
        events.push('second:start');
        events.push('second:end');
      }),
    ]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
    expect(lock.activeKeys).toBe(0);
  });

  it('runs different keys concurrently', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('kyoto', async () => {
        events.push('kyoto:start');
        await sleep(15);
        events.push('kyoto:end');
      }),
      lock.run('bali', async () => {
        events.push('bali:start');
        events.push('bali:end');
      }),
    ]);

    expect(events).toEqual(['kyoto:start', 'bali:start', 'bali:end', 'kyoto:end']);
  });

  it('releases the key when a section throws', async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run('kyoto', async () => {
        throw new Error('write failed');
      }),
    ).rejects.toThrow('write failed');

    await expect(lock.run('kyoto', async () => 'next')).resolves.toBe('next');
    expect(lock.activeKeys).toBe(0);
  });
});
