/**
 * Unit Tests for retry utilities
 */

import { describe, it, expect, vi } from 'vitest';

import {
  calculateRetryDelay,
  mergeRetryConfig,
  shouldRetry,
  withRetry,
} from '../../lib/src/llm/retry.js';
import { LLMError, NetworkError, ModelNotFoundError } from '../../lib/src/llm/errors.js';
import type { RetryEvent } from '../../lib/src/llm/types.js';

const noJitter = mergeRetryConfig({ jitter: false, initialDelayMs: 100, maxDelayMs: 350 });

describe('calculateRetryDelay', () => {
  it('should back off exponentially up to the cap', () => {
    expect(calculateRetryDelay(1, noJitter)).toBe(100);
    expect(calculateRetryDelay(2, noJitter)).toBe(200);
    expect(calculateRetryDelay(3, noJitter)).toBe(350);
  });

  it('should keep jittered delays within range', () => {
    const config = mergeRetryConfig({ initialDelayMs: 1000, jitterFactor: 0.5 });

    for (let i = 0; i < 20; i++) {
      const delay = calculateRetryDelay(1, config);
      expect(delay).toBeGreaterThanOrEqual(750);
      expect(delay).toBeLessThanOrEqual(1250);
    }
  });
});

describe('shouldRetry', () => {
  const config = mergeRetryConfig();

  it('should retry retryable LLM errors only', () => {
    expect(shouldRetry(new NetworkError('down', 'ollama'), config)).toBe(true);
    expect(shouldRetry(new ModelNotFoundError('missing', 'ollama'), config)).toBe(false);
    expect(shouldRetry(new Error('plain'), config)).toBe(false);
  });

  it('should honour the allowed code list', () => {
    const timeoutsOnly = mergeRetryConfig({ retryableErrorCodes: ['timeout'] });

    expect(shouldRetry(new NetworkError('down', 'ollama'), timeoutsOnly)).toBe(false);
  });
});

describe('withRetry', () => {
  it('should retry until the call succeeds and report events', async () => {
    const events: RetryEvent['type'][] = [];
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new NetworkError('down', 'ollama'))
      .mockResolvedValueOnce('ok');

    const result = await withRetry(fn, {
      provider: 'ollama',
      config: { maxRetries: 2, initialDelayMs: 1, jitter: false },
      onRetryEvent: (event) => events.push(event.type),
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(events).toEqual([
      'attempt_start',
      'attempt_failed',
      'retrying',
      'attempt_start',
      'attempt_succeeded',
    ]);
  });

  it('should give up after maxRetries', async () => {
    const events: RetryEvent['type'][] = [];
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new NetworkError('down', 'ollama'));

    await expect(
      withRetry(fn, {
        provider: 'ollama',
        config: { maxRetries: 1, initialDelayMs: 1, jitter: false },
        onRetryEvent: (event) => events.push(event.type),
      })
    ).rejects.toThrow(NetworkError);

    expect(fn).toHaveBeenCalledTimes(2);
    expect(events.at(-1)).toBe('max_retries_exceeded');
  });

  it('should wrap foreign errors without retrying them', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new RangeError('bad'));

    const error = await withRetry(fn, { provider: 'ollama', config: { maxRetries: 3 } }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(LLMError);
    expect(error).toMatchObject({ code: 'unknown', message: 'bad' });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should stop when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn<() => Promise<string>>();

    await expect(
      withRetry(fn, { provider: 'ollama', abortSignal: controller.signal })
    ).rejects.toThrow('Operation aborted');
    expect(fn).not.toHaveBeenCalled();
  });
});
