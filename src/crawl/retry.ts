import { NetworkError } from '../shared/errors.js';
import type { DelayPolicy } from './delay.js';

export interface RetryPolicyOptions {
  maxAttempts: number;
  delay: DelayPolicy;
  backoffMultiplier?: number;
  maxDelayMs?: number;
}

/**
 * Bounded retry for transient network failures. Delays grow from a DelayPolicy
 * sample by `backoffMultiplier` per attempt, capped at `maxDelayMs`.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly delay: DelayPolicy;
  private readonly backoffMultiplier: number;
  private readonly maxDelayMs: number;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.delay = options.delay;
    this.backoffMultiplier = options.backoffMultiplier ?? 1;
    this.maxDelayMs = options.maxDelayMs ?? Number.POSITIVE_INFINITY;
  }

  /** Delay before the attempt that follows `attempt` (1-based). */
  nextDelay(attempt: number): number {
    const base = this.delay.nextDelay();
    const scaled = base * Math.pow(this.backoffMultiplier, Math.max(0, attempt - 1));
    return Math.min(scaled, this.maxDelayMs);
  }

  shouldRetry(error: unknown, attempt: number): boolean {
    if (attempt >= this.maxAttempts) return false;
    return error instanceof NetworkError && error.retryable;
  }
}
