/**
 * Per-provider circuit breaker used by the model router.
 * closed -> open after `failureThreshold` consecutive failures; open -> half-open
 * once `resetTimeoutMs` has passed; a half-open success closes it again.
 */
import { logger } from './logger.js';
import { ModelUnavailableError } from './errors.js';

const log = logger.child({ module: 'circuit-breaker' });

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  name: string;
  /** Consecutive failures before opening (default: 5) */
  failureThreshold?: number;
  /** Cool-down before a trial call is let through (default: 30000) */
  resetTimeoutMs?: number;
  /** Injected clock for tests */
  now?: () => number;
}

export interface CircuitSnapshot {
  name: string;
  state: CircuitState;
  failures: number;
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failures = 0;
  private openedAt = 0;
  readonly name: string;
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly now: () => number;

  constructor(opts: CircuitBreakerOptions) {
    this.name = opts.name;
    this.failureThreshold = opts.failureThreshold ?? 5;
    this.resetTimeoutMs = opts.resetTimeoutMs ?? 30_000;
    this.now = opts.now ?? Date.now;
  }

  snapshot(): CircuitSnapshot {
    return { name: this.name, state: this.state, failures: this.failures };
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    log.info({ breaker: this.name, from: this.state, to }, 'circuit breaker state change');
    this.state = to;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      if (this.now() - this.openedAt < this.resetTimeoutMs) {
        throw new ModelUnavailableError(`circuit '${this.name}' is open`);
      }
      this.transition('half-open');
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure();
      throw error;
    }
    this.failures = 0;
    this.transition('closed');
    return result;
  }

  private recordFailure(): void {
    this.failures++;
    if (this.state === 'half-open' || this.failures >= this.failureThreshold) {
      this.openedAt = this.now();
      this.transition('open');
    }
  }
}
