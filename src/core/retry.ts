// src/core/retry.ts
import { DocsnapError, toErrorMessage } from './errors.js';
import type { RunLogger } from './logger.js';
import { RETRY_DEFAULTS } from './config/constants.js';

export interface RetryOptions {
  /** Total attempts, not retries: 1 means no retry */
  maxAttempts: number;
  delayMs: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retry applied explicitly at a call site. Only session acquisition and the
 * info fetch go through it.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly delayMs: number;

  constructor(
    options: Partial<RetryOptions> = {},
    private readonly logger?: RunLogger,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? RETRY_DEFAULTS.maxAttempts);
    this.delayMs = Math.max(0, options.delayMs ?? RETRY_DEFAULTS.delayMs);
  }

  async execute<T>(label: string, fn: () => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;

        if (attempt === this.maxAttempts || !RetryPolicy.isRetryable(error)) {
          break;
        }

        this.logger?.warn(`${label} failed, retrying`, {
          attempt,
          maxAttempts: this.maxAttempts,
          retryDelayMs: this.delayMs,
          error: toErrorMessage(error),
        });
        await this.wait(this.delayMs);
      }
    }

    throw lastError;
  }

  static isRetryable(error: unknown): boolean {
    if (error instanceof DocsnapError) {
      return error.retryable;
    }
    return true;
  }
}
