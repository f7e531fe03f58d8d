/**
 * Agent Gateway - Retry Policy
 * Bounded exponential backoff around a single upstream operation
 */

import logger from '../utils/logger.js';
import { errorMessage, sleep as defaultSleep } from '../utils/helpers.js';
import type { Clock } from '../utils/types.js';

import { isRetryableError } from './classify.js';

// =============================================================================
// Types
// =============================================================================

export interface RetryAttemptInfo {
  /** Zero-based index of the attempt that failed */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryPolicyOptions {
  /** Total attempts including the first */
  maxAttempts?: number;
  minWaitMs?: number;
  maxWaitMs?: number;
  isRetryable?: (error: unknown) => boolean;
  /** Stop retrying once the next wait would end past this many ms from the first attempt */
  deadlineMs?: number;
  /** Label used in log lines */
  name?: string;
  onRetry?: (info: RetryAttemptInfo) => void;
  sleep?: (ms: number) => Promise<void>;
  clock?: Clock;
}

export interface ExecuteOptions {
  /** Overrides the policy's log label for this call */
  name?: string;
  /** Runs after the policy-level hook */
  onRetry?: (info: RetryAttemptInfo) => void;
}

const DEFAULTS = {
  maxAttempts: 3,
  minWaitMs: 2000,
  maxWaitMs: 10000,
};

// =============================================================================
// Retry Policy Class
// =============================================================================

export class RetryPolicy {
  public readonly maxAttempts: number;
  public readonly minWaitMs: number;
  public readonly maxWaitMs: number;

  private readonly isRetryable: (error: unknown) => boolean;
  private readonly deadlineMs: number | undefined;
  private readonly name: string;
  private readonly onRetry: ((info: RetryAttemptInfo) => void) | undefined;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: Clock;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
    this.minWaitMs = options.minWaitMs ?? DEFAULTS.minWaitMs;
    this.maxWaitMs = options.maxWaitMs ?? DEFAULTS.maxWaitMs;
    this.isRetryable = options.isRetryable ?? isRetryableError;
    this.deadlineMs = options.deadlineMs;
    this.name = options.name ?? 'upstream';
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
    if (this.minWaitMs < 0 || this.maxWaitMs < this.minWaitMs) {
      throw new RangeError('Retry waits must satisfy 0 <= minWaitMs <= maxWaitMs');
    }
  }

  /**
   * Wait before the retry that follows failed attempt `attempt` (zero-based)
   */
  public delayFor(attempt: number): number {
    return Math.min(this.maxWaitMs, this.minWaitMs * 2 ** attempt);
  }

  /**
   * Run `fn` until it succeeds, fails permanently, or attempts run out.
   * The last error is re-thrown as the same object.
   */
  public async execute<T>(
    fn: (attempt: number) => Promise<T>,
    options: ExecuteOptions = {}
  ): Promise<T> {
    const startedAt = this.clock();
    const name = options.name ?? this.name;

    for (let attempt = 0; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        const isLast = attempt + 1 >= this.maxAttempts;
        if (isLast || !this.isRetryable(error)) {
          throw error;
        }

        const delayMs = this.delayFor(attempt);
        if (this.deadlineMs !== undefined && this.clock() + delayMs - startedAt > this.deadlineMs) {
          logger.warn('Retry deadline reached', {
            name,
            attempt: attempt + 1,
            deadlineMs: this.deadlineMs,
            error: errorMessage(error),
          });
          throw error;
        }

        const info: RetryAttemptInfo = { attempt, delayMs, error };
        this.onRetry?.(info);
        options.onRetry?.(info);
        await this.sleep(delayMs);
      }
    }
  }
}

export function createRetryPolicy(options?: RetryPolicyOptions): RetryPolicy {
  return new RetryPolicy(options);
}

export default RetryPolicy;
