/**
 * Circuit breaker guarding calls to the market-data provider.
 *
 *   CLOSED    calls pass through; infrastructure failures are counted
 *   OPEN      calls rejected with CircuitOpenError until the cooldown ends
 *   HALF_OPEN one probe call is let through; its outcome closes or re-opens
 *
 * Errors the classifier does not mark as infrastructure failures (a 404, a
 * malformed payload) pass through without being counted.
 */

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Label used in log lines and errors. */
  name?: string;
  /** Consecutive infrastructure failures that open the circuit. Default 5. */
  failureThreshold?: number;
  /** Milliseconds spent OPEN before a probe is allowed. Default 30 000. */
  cooldownMs?: number;
  isInfraError?: (err: unknown) => boolean;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
  now?: () => number;
}

export class CircuitBreaker {
  readonly name: string;
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private openedAtMs = 0;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly isInfraError: (err: unknown) => boolean;
  private readonly onStateChange: ((from: CircuitState, to: CircuitState) => void) | null;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions = {}) {
    this.name = options.name ?? 'provider';
    this.failureThreshold = Math.max(1, options.failureThreshold ?? 5);
    this.cooldownMs = Math.max(1_000, options.cooldownMs ?? 30_000);
    this.isInfraError = options.isInfraError ?? (() => true);
    this.onStateChange = options.onStateChange ?? null;
    this.now = options.now ?? Date.now;
  }

  getState(): CircuitState {
    if (this.state === 'OPEN' && this.remainingCooldownMs() === 0) {
      this.transition('HALF_OPEN');
    }
    return this.state;
  }

  async call<T>(fn: () => Promise<T>): Promise<T> {
    if (this.getState() === 'OPEN') {
      throw new CircuitOpenError(this.name, this.remainingCooldownMs());
    }

    let result: T;
    try {
      result = await fn();
    } catch (err: unknown) {
      this.recordFailure(err);
      throw err;
    }
    this.failures = 0;
    this.transition('CLOSED');
    return result;
  }

  private recordFailure(err: unknown): void {
    if (!this.isInfraError(err)) return;
    this.failures++;
    const probeFailed = this.state === 'HALF_OPEN';
    if (probeFailed || (this.state === 'CLOSED' && this.failures >= this.failureThreshold)) {
      this.openedAtMs = this.now();
      this.transition('OPEN');
    }
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.onStateChange?.(from, to);
  }

  private remainingCooldownMs(): number {
    return Math.max(0, this.cooldownMs - (this.now() - this.openedAtMs));
  }
}

/** Thrown when the circuit is OPEN and a call is rejected without reaching the provider. */
export class CircuitOpenError extends Error {
  readonly cooldownRemainingMs: number;

  constructor(name: string, cooldownRemainingMs: number) {
    super(`Circuit breaker "${name}" is OPEN; calls blocked for ${Math.ceil(cooldownRemainingMs / 1000)}s`);
    this.name = 'CircuitOpenError';
    this.cooldownRemainingMs = cooldownRemainingMs;
  }
}
