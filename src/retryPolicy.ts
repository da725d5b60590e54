import type { Outcome } from './types.js';

export type RetryDecision =
  | { action: 'accept' }
  | { action: 'retry'; afterMs: number; rotateIdentity: boolean };

export type RetryPolicyOptions = {
  maxRetries: number; // extra attempts after the first one
  retryDelayMs: number; // linear backoff base
  rotateIdentity: boolean;
};

/**
 * Decides what happens after attempt `n` (0-based) of a job.
 * Every failure kind is treated the same; the wait grows linearly
 * (d, 2d, 3d, ...) with the number of completed attempts.
 */
export class RetryPolicy {
  constructor(private readonly opts: RetryPolicyOptions) {
    if (!Number.isInteger(opts.maxRetries) || opts.maxRetries < 0) {
      throw new RangeError(`maxRetries must be an integer >= 0, got ${opts.maxRetries}`);
    }
    if (!Number.isFinite(opts.retryDelayMs) || opts.retryDelayMs < 0) {
      throw new RangeError(`retryDelayMs must be >= 0, got ${opts.retryDelayMs}`);
    }
  }

  get maxAttempts(): number {
    return this.opts.maxRetries + 1;
  }

  decide(n: number, outcome: Outcome): RetryDecision {
    if (outcome.ok || n >= this.opts.maxRetries) return { action: 'accept' };
    return {
      action: 'retry',
      afterMs: this.opts.retryDelayMs * (n + 1),
      rotateIdentity: this.opts.rotateIdentity
    };
  }
}
