/**
 * Bounded retry policy
 *
 * Exponential backoff for TransientNetworkError, honouring the provider's
 * Retry-After when a RateLimitError carries one. Sleep is injectable so tests
 * run without real delays.
 */

import { isRateLimitError, isTransientError } from "./errors.js";
import type { Logger } from "./logger.js";

export type SleepFn = (ms: number) => Promise<void>;

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  factor: 2,
  maxDelayMs: 30000,
};

export const realSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryPolicy {
  readonly options: RetryOptions;
  private readonly sleep: SleepFn;
  private readonly logger: Logger | null;

  constructor(options: Partial<RetryOptions> = {}, sleep: SleepFn = realSleep, logger: Logger | null = null) {
    this.options = { ...DEFAULT_RETRY, ...options };
    if (this.options.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be at least 1");
    }
    this.sleep = sleep;
    this.logger = logger;
  }

  /**
   * Delay before retry number `attempt` (1-based: the delay after the first failure is attempt 1).
   */
  delayFor(attempt: number, error: unknown): number {
    if (isRateLimitError(error) && error.retryAfterSeconds !== null) {
      return Math.min(error.retryAfterSeconds * 1000, this.options.maxDelayMs);
    }
    const base = this.options.initialDelayMs * Math.pow(this.options.factor, attempt - 1);
    return Math.min(base, this.options.maxDelayMs);
  }

  /**
   * Run `operation`, retrying failures accepted by `shouldRetry` (transient
   * ones by default). The last error is rethrown once attempts are exhausted;
   * any other error is rethrown at once.
   */
  async execute<T>(
    label: string,
    operation: () => Promise<T>,
    shouldRetry: (error: unknown) => error is Error = isTransientError
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (!shouldRetry(error) || attempt >= this.options.maxAttempts) {
          throw error;
        }
        const delay = this.delayFor(attempt, error);
        this.logger?.warn(
          `${label} failed (${error.message}), retry ${attempt}/${this.options.maxAttempts - 1} in ${delay}ms`
        );
        await this.sleep(delay);
      }
    }
  }
}
