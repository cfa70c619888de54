import { describe, expect, it } from 'vitest';
import { CircuitBreaker, CircuitOpenError, CircuitState } from '@/stability/circuitBreaker';

function clock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

const fail = () => Promise.reject(new Error('provider down'));
const ok = () => Promise.resolve('ok');

describe('CircuitBreaker', () => {
  it('opens after the configured number of consecutive failures', async () => {
    const time = clock();
    const breaker = new CircuitBreaker({ failureThreshold: 2, successThreshold: 1, cooldownMs: 100, now: time.now });

    await expect(breaker.execute(fail)).rejects.toThrow('provider down');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(fail)).rejects.toThrow('provider down');
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    let called = false;
    await expect(
      breaker.execute(async () => {
        called = true;
        return 'ok';
      }),
    ).rejects.toBeInstanceOf(CircuitOpenError);
    expect(called).toBe(false);
  });

  it('resets the failure count on success', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, successThreshold: 1, cooldownMs: 100 });

    await expect(breaker.execute(fail)).rejects.toThrow();
    await breaker.execute(ok);
    await expect(breaker.execute(fail)).rejects.toThrow();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('lets a trial call through after the cooldown and closes on success', async () => {
    const time = clock();
    const breaker = new CircuitBreaker({ failureThreshold: 1, successThreshold: 1, cooldownMs: 100, now: time.now });
    await expect(breaker.execute(fail)).rejects.toThrow();

    time.advance(99);
    expect(breaker.allowRequest()).toBe(false);
    time.advance(1);
    expect(breaker.allowRequest()).toBe(true);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    breaker.recordSuccess();
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(ok)).resolves.toBe('ok');
  });

  it('admits a single trial call while half-open', async () => {
    const time = clock();
    const breaker = new CircuitBreaker({ failureThreshold: 1, successThreshold: 2, cooldownMs: 100, now: time.now });
    await expect(breaker.execute(fail)).rejects.toThrow();
    time.advance(100);

    expect(breaker.allowRequest()).toBe(true);
    expect(breaker.allowRequest()).toBe(false);
    await expect(breaker.execute(ok)).rejects.toBeInstanceOf(CircuitOpenError);

    breaker.recordSuccess();
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
    expect(breaker.allowRequest()).toBe(true);
    breaker.recordSuccess();
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('reopens when the trial call fails', async () => {
    const time = clock();
    const breaker = new CircuitBreaker({ failureThreshold: 3, successThreshold: 1, cooldownMs: 50, now: time.now });
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow();
    }
    time.advance(50);

    await expect(breaker.execute(fail)).rejects.toThrow('provider down');

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.allowRequest()).toBe(false);
  });

  it('reset closes the circuit', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, successThreshold: 1, cooldownMs: 60_000 });
    await expect(breaker.execute(fail)).rejects.toThrow();

    breaker.reset();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(ok)).resolves.toBe('ok');
  });
});
