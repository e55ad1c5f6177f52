/**
 * Retry Utilities for LLM Adapters
 *
 * Exponential backoff with jitter for timeouts, network and server errors.
 */

import {
  DEFAULT_RETRY_CONFIG,
  LLMErrorCode,
  type LLMErrorInfo,
  type LLMProvider,
  type RetryConfig,
  type RetryEvent,
  type RetryEventHandler,
} from './types.js';
import { isLLMError, LLMError } from './errors.js';

// ============================================================================
// Retry Utilities
// ============================================================================

/**
 * Delay before the next attempt: `initialDelayMs * multiplier^(attempt - 1)`,
 * capped and jittered.
 */
export function calculateRetryDelay(attemptNumber: number, config: Required<RetryConfig>): number {
  const exponentialDelay =
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attemptNumber - 1);

  let delay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor;
    delay += (Math.random() - 0.5) * jitterRange;
    delay = Math.max(0, delay);
  }

  return Math.round(delay);
}

export function shouldRetry(error: unknown, config: Required<RetryConfig>): boolean {
  if (!isLLMError(error) || !error.retryable) {
    return false;
  }

  const code = error.code;
  return config.retryableErrorCodes.some((allowed) => allowed === code);
}

export function createRetryEvent(
  type: RetryEvent['type'],
  attemptNumber: number,
  maxRetries: number,
  error?: LLMErrorInfo,
  nextDelayMs?: number
): RetryEvent {
  return {
    type,
    attemptNumber,
    maxRetries,
    error,
    nextDelayMs,
    timestamp: new Date(),
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function mergeRetryConfig(config?: Partial<RetryConfig>): Required<RetryConfig> {
  return {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
    retryableErrorCodes: config?.retryableErrorCodes ?? DEFAULT_RETRY_CONFIG.retryableErrorCodes,
  };
}

// ============================================================================
// withRetry Function
// ============================================================================

export interface WithRetryOptions {
  /** Provider stamped on errors that are not LLMErrors already */
  provider: LLMProvider;
  config?: Partial<RetryConfig> | undefined;
  /** Event handler for retry events (useful for logging) */
  onRetryEvent?: RetryEventHandler | undefined;
  /** Abort signal to cancel retries */
  abortSignal?: AbortSignal | undefined;
}

/**
 * Wraps an async function with retry logic using exponential backoff.
 *
 * @throws {LLMError} the last failure once attempts run out, or the first
 *   failure that is not retryable
 *
 * @example
 * ```typescript
 * const result = await withRetry(
 *   () => http.post('/api/generate', body),
 *   {
 *     provider: 'ollama',
 *     config: { maxRetries: 2, initialDelayMs: 500 },
 *     onRetryEvent: (event) => logger.debug('Retry event', { type: event.type }),
 *   }
 * );
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: WithRetryOptions): Promise<T> {
  const config = mergeRetryConfig(options.config);
  const { provider, onRetryEvent, abortSignal } = options;

  let lastError: LLMError | undefined;

  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    if (abortSignal?.aborted) {
      throw new LLMError({
        code: LLMErrorCode.UNKNOWN,
        message: 'Operation aborted',
        provider,
        retryable: false,
      });
    }

    onRetryEvent?.(createRetryEvent('attempt_start', attempt, config.maxRetries));

    try {
      const result = await fn();
      onRetryEvent?.(createRetryEvent('attempt_succeeded', attempt, config.maxRetries));
      return result;
    } catch (error) {
      lastError = LLMError.fromError(error, provider);

      onRetryEvent?.(
        createRetryEvent('attempt_failed', attempt, config.maxRetries, lastError.info)
      );

      const isLastAttempt = attempt > config.maxRetries;
      const canRetry = !isLastAttempt && shouldRetry(lastError, config);

      if (!canRetry) {
        if (isLastAttempt && config.maxRetries > 0) {
          onRetryEvent?.(
            createRetryEvent('max_retries_exceeded', attempt, config.maxRetries, lastError.info)
          );
        }
        throw lastError;
      }

      const delayMs = calculateRetryDelay(attempt, config);

      onRetryEvent?.(
        createRetryEvent('retrying', attempt, config.maxRetries, lastError.info, delayMs)
      );

      await sleep(delayMs);
    }
  }

  throw (
    lastError ??
    new LLMError({
      code: LLMErrorCode.UNKNOWN,
      message: 'Unexpected retry loop exit',
      provider,
      retryable: false,
    })
  );
}
