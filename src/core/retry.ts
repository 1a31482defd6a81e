import { errorType, isTransientError } from './errors.js';
import type { Logger } from './logger.js';
import type { Metrics } from './metrics.js';

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export interface BackoffConfig {
  /** Total invocations allowed, including the first (>= 1). */
  maxAttempts: number;
  /** Delay before retry n is backoffFactor^n time units (> 1). */
  backoffFactor: number;
  /** Length of one time unit in milliseconds (default 1000). */
  unitMs?: number;
}

/**
 * Exponential backoff for transient network faults.
 * Anything `isTransientError` rejects is rethrown on the spot; the final
 * transient failure is rethrown unchanged once attempts run out.
 */
export class BackoffRetrier {
  private readonly unitMs: number;

  constructor(
    private readonly config: BackoffConfig,
    private readonly logger: Logger,
    private readonly metrics: Metrics,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1, got ${config.maxAttempts}`);
    }
    if (!(config.backoffFactor > 1)) {
      throw new RangeError(`backoffFactor must be > 1, got ${config.backoffFactor}`);
    }
    this.unitMs = config.unitMs ?? 1000;
  }

  /** Delay in ms before the retry that follows failed attempt `attempt` (1-based). */
  delayFor(attempt: number): number {
    return this.config.backoffFactor ** attempt * this.unitMs;
  }

  async execute<T>(fn: () => Promise<T>, label: string): Promise<T> {
    const { maxAttempts } = this.config;
    let attempt = 0;

    for (;;) {
      try {
        const result = await fn();
        if (attempt > 0) {
          this.logger.info('operation succeeded after retries', {
            label, attempt: attempt + 1, maxAttempts
          });
          this.metrics.increment('retry.recovered', 1, { label });
        }
        return result;
      } catch (error) {
        attempt += 1;
        const type = errorType(error);

        if (!isTransientError(error)) {
          this.metrics.increment('retry.fatal_error', 1, { label });
          throw error;
        }

        if (attempt >= maxAttempts) {
          this.logger.error('operation failed after max retries', {
            label, attempt, maxAttempts, errorType: type, error
          });
          this.metrics.increment('retry.exhausted', 1, { label });
          throw error;
        }

        const delayMs = this.delayFor(attempt);
        this.logger.warn('operation failed, retrying with backoff', {
          label, attempt, maxAttempts, delayMs, errorType: type, error
        });
        this.metrics.increment('retry.attempt', 1, { label });
        await this.wait(delayMs);
      }
    }
  }
}
