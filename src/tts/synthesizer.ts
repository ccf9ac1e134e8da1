import { CancelledError } from '../errors.js';

/**
 * Failure reported by a synthesizer. `retryable: false` tells the
 * orchestrator not to spend retries on it (bad credentials, bad request).
 */
export class SynthesizerRequestError extends Error {
  readonly retryable: boolean;
  readonly retryAfterMs: number | undefined;
  readonly status: number | undefined;

  constructor(
    message: string,
    options: { retryable?: boolean; retryAfterMs?: number; status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'SynthesizerRequestError';
    this.retryable = options.retryable ?? true;
    this.retryAfterMs = options.retryAfterMs;
    this.status = options.status;
  }
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof CancelledError) return false;
  return !(error instanceof SynthesizerRequestError) || error.retryable;
}
