import { isRetryable, SynthesizerRequestError } from '../tts/synthesizer.js';

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempt(s)`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * Re-runs an operation with the same input and exponential backoff. A
 * `retryAfterMs` hint on the error replaces the computed delay.
 */
export class RetryPolicy {
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  constructor(config: RetryConfig) {
    this.maxRetries = config.maxRetries;
    this.baseDelayMs = config.baseDelayMs;
    this.maxDelayMs = config.maxDelayMs ?? 30000;
  }

  async execute<T>(
    fn: () => Promise<T>,
    onRetry?: (attempt: number, delayMs: number, error: unknown) => void
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.maxRetries || !isRetryable(error)) {
          throw new RetryExhaustedError(attempt + 1, error);
        }
        const delay = this.calculateBackoff(attempt, error);
        onRetry?.(attempt + 1, delay, error);
        await this.wait(delay);
      }
    }
  }

  calculateBackoff(attempt: number, error?: unknown): number {
    if (error instanceof SynthesizerRequestError && error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }
    return Math.min(this.baseDelayMs * Math.pow(2, attempt), this.maxDelayMs);
  }

  private wait(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
