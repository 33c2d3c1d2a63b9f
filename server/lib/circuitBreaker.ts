/**
 * Circuit Breaker for the bar provider. Three states:
 *
 *   CLOSED    → requests pass through
 *   OPEN      → provider assumed down, requests rejected without a call
 *   HALF_OPEN → cooldown elapsed, the next request is a probe
 *
 * Only outage signals (5xx, network errors, timeouts) trip it. Throttling and
 * unknown-ticker responses are the scheduler's business, not an outage.
 */

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Consecutive outage failures before opening. Default 5. */
  failureThreshold?: number;
  /** Milliseconds to stay OPEN before probing. Default 30 000. */
  cooldownMs?: number;
  isInfraError?: (err: unknown) => boolean;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
  clock?: () => number;
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private openedAt = 0;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly isInfraError: (err: unknown) => boolean;
  private readonly onStateChange: ((from: CircuitState, to: CircuitState) => void) | null;
  private readonly clock: () => number;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = Math.max(1, options.failureThreshold ?? 5);
    this.cooldownMs = Math.max(1_000, options.cooldownMs ?? 30_000);
    this.isInfraError = options.isInfraError ?? (() => true);
    this.onStateChange = options.onStateChange ?? null;
    this.clock = options.clock ?? Date.now;
  }

  getState(): CircuitState {
    this.evaluateState();
    return this.state;
  }

  getInfo(): { state: CircuitState; consecutiveFailures: number; cooldownRemainingMs: number } {
    this.evaluateState();
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      cooldownRemainingMs: this.state === 'OPEN' ? Math.round(this.cooldownRemainingMs()) : 0,
    };
  }

  async call<T>(fn: () => Promise<T>): Promise<T> {
    this.evaluateState();
    if (this.state === 'OPEN') {
      throw new CircuitOpenError(this.cooldownRemainingMs());
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err: unknown) {
      this.onError(err);
      throw err;
    }
  }

  reset(): void {
    this.transition('CLOSED');
    this.consecutiveFailures = 0;
    this.openedAt = 0;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private evaluateState(): void {
    if (this.state === 'OPEN' && this.clock() - this.openedAt >= this.cooldownMs) {
      this.transition('HALF_OPEN');
    }
  }

  private onSuccess(): void {
    this.consecutiveFailures = 0;
    this.transition('CLOSED');
  }

  private onError(err: unknown): void {
    if (!this.isInfraError(err)) return;

    this.consecutiveFailures++;
    // A failed probe reopens immediately.
    if (this.state === 'HALF_OPEN' || this.consecutiveFailures >= this.failureThreshold) {
      this.openedAt = this.clock();
      this.transition('OPEN');
    }
  }

  private transition(next: CircuitState): void {
    const prev = this.state;
    if (prev === next) return;
    this.state = next;
    this.onStateChange?.(prev, next);
  }

  private cooldownRemainingMs(): number {
    return Math.max(0, this.cooldownMs - (this.clock() - this.openedAt));
  }
}

/** Thrown when the circuit is OPEN and a request is rejected without calling the provider. */
export class CircuitOpenError extends Error {
  readonly cooldownRemainingMs: number;

  constructor(cooldownRemainingMs: number) {
    super(`Circuit breaker is OPEN; provider requests blocked for ${Math.ceil(cooldownRemainingMs / 1000)}s`);
    this.name = 'CircuitOpenError';
    this.cooldownRemainingMs = cooldownRemainingMs;
  }
}
