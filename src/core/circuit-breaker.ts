/**
 * Circuit Breaker — stops hammering a license server that keeps failing.
 * While OPEN, calls fail immediately with CircuitOpenError, which the
 * verifier treats like any other unreachable ledger.
 */

import { LicenseError } from './errors.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Consecutive failures before tripping to OPEN */
  failureThreshold: number;
  /** Time in ms before an OPEN circuit lets a trial call through */
  resetTimeoutMs: number;
  /** Millisecond clock, injectable for tests */
  now?: () => number;
}

export type StateChangeCallback = (from: CircuitState, to: CircuitState) => void;

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private openedAt = 0;
  private trialInFlight = false;
  private listeners: StateChangeCallback[] = [];
  private now: () => number;

  constructor(private config: CircuitBreakerConfig) {
    this.now = config.now ?? Date.now;
  }

  /** Execute a function through the circuit breaker. */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.getState() === 'OPEN') {
      throw new CircuitOpenError('License server circuit is open');
    }
    const isTrial = this.state === 'HALF_OPEN';
    if (isTrial) {
      // One trial call at a time decides whether to close again
      if (this.trialInFlight) throw new CircuitOpenError('License server circuit is half-open');
      this.trialInFlight = true;
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure();
      throw err;
    } finally {
      if (isTrial) this.trialInFlight = false;
    }
  }

  getState(): CircuitState {
    if (this.state === 'OPEN' && this.now() - this.openedAt >= this.config.resetTimeoutMs) {
      this.transition('HALF_OPEN');
    }
    return this.state;
  }

  onStateChange(callback: StateChangeCallback): void {
    this.listeners.push(callback);
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  /** Manually reset the circuit breaker to CLOSED. */
  forceReset(): void {
    this.failureCount = 0;
    this.transition('CLOSED');
  }

  private onSuccess(): void {
    this.failureCount = 0;
    this.transition('CLOSED');
  }

  private onFailure(): void {
    this.failureCount++;
    if (this.state === 'HALF_OPEN' || this.failureCount >= this.config.failureThreshold) {
      this.openedAt = this.now();
      this.transition('OPEN');
    }
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    for (const cb of this.listeners) {
      cb(from, to);
    }
  }
}

/** Error thrown when the circuit is open. */
export class CircuitOpenError extends LicenseError {
  constructor(message: string) {
    super('Unreachable', message);
    this.name = 'CircuitOpenError';
  }
}
