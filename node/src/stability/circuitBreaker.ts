// Circuit Breaker for external providers
import { logger } from '@/services/logger';

export enum CircuitState {
  CLOSED = 'CLOSED',       // Normal operation
  OPEN = 'OPEN',           // Failing, reject requests
  HALF_OPEN = 'HALF_OPEN', // Testing if service recovered
}

export interface CircuitBreakerConfig {
  failureThreshold: number;  // Open circuit after N consecutive failures
  successThreshold: number;  // Close circuit after N successes (half-open)
  cooldownMs: number;        // Time before attempting half-open (ms)
  name?: string;
  now?: () => number;
}

export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`Circuit breaker ${name} is OPEN - service unavailable`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private openedAt = 0;
  /** Set while the single half-open trial call is running. */
  private trialInFlight = false;
  private readonly config: Required<CircuitBreakerConfig>;

  constructor(config: CircuitBreakerConfig) {
    this.config = { name: 'provider', now: Date.now, ...config };
  }

  /**
   * Whether a call may go through right now. Once the cooldown has elapsed
   * OPEN moves to HALF_OPEN and exactly one trial call is admitted; others
   * are rejected until that trial is recorded.
   */
  allowRequest(): boolean {
    if (this.state === CircuitState.CLOSED) return true;

    if (this.state === CircuitState.HALF_OPEN) {
      if (this.trialInFlight) return false;
      this.trialInFlight = true;
      return true;
    }

    const sinceOpened = this.config.now() - this.openedAt;
    if (sinceOpened >= this.config.cooldownMs) {
      this.state = CircuitState.HALF_OPEN;
      this.successCount = 0;
      this.trialInFlight = true;
      logger.info('circuit-breaker:half_open', { name: this.config.name });
      return true;
    }
    return false;
  }

  /**
   * Execute function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.allowRequest()) {
      throw new CircuitOpenError(this.config.name);
    }
    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  recordSuccess(): void {
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.trialInFlight = false;
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.state = CircuitState.CLOSED;
        logger.info('circuit-breaker:closed', { name: this.config.name });
      }
    }
  }

  recordFailure(): void {
    this.failureCount++;
    this.trialInFlight = false;

    if (
      this.state === CircuitState.HALF_OPEN ||
      (this.state === CircuitState.CLOSED && this.failureCount >= this.config.failureThreshold)
    ) {
      this.state = CircuitState.OPEN;
      this.openedAt = this.config.now();
      logger.warn('circuit-breaker:open', {
        name: this.config.name,
        consecutiveFailures: this.failureCount,
        cooldownMs: this.config.cooldownMs,
      });
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.openedAt = 0;
    this.trialInFlight = false;
  }
}
