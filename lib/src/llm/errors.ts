/**
 * LLM Error Types
 *
 * Specific error classes for the ways a completion call can fail. Timeouts,
 * network and server errors are retryable; the rest need a config change.
 */

import { type LLMProvider, type LLMErrorInfo, LLMErrorCode } from './types.js';

// =============================================================================
// Base LLM Error Class
// =============================================================================

/**
 * Base error class for all LLM-related errors.
 */
export class LLMError extends Error {
  /** Structured error information */
  readonly info: LLMErrorInfo;

  constructor(info: LLMErrorInfo) {
    super(info.message);
    this.name = 'LLMError';
    this.info = info;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }

  get code(): LLMErrorInfo['code'] {
    return this.info.code;
  }

  get provider(): LLMProvider {
    return this.info.provider;
  }

  get retryable(): boolean {
    return this.info.retryable;
  }

  /**
   * Wraps an unknown error; LLMErrors pass through unchanged.
   */
  static fromError(error: unknown, provider: LLMProvider): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    const message = error instanceof Error ? error.message : 'Unknown error';

    return new LLMError({
      code: LLMErrorCode.UNKNOWN,
      message,
      provider,
      retryable: false,
      originalError: error,
    });
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Error thrown when the request parameters are invalid.
 */
export class InvalidRequestError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.INVALID_REQUEST,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'InvalidRequestError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidRequestError);
    }
  }
}

/**
 * Error thrown when the requested model has not been pulled.
 *
 * @example
 * ```typescript
 * try {
 *   await adapter.complete(prompt);
 * } catch (error) {
 *   if (error instanceof ModelNotFoundError) {
 *     console.log(`Run: ollama pull ${adapter.model}`);
 *   }
 * }
 * ```
 */
export class ModelNotFoundError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.MODEL_NOT_FOUND,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'ModelNotFoundError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ModelNotFoundError);
    }
  }
}

/**
 * Error thrown when a 2xx response body is not a completion.
 */
export class InvalidResponseError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.INVALID_RESPONSE,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'InvalidResponseError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidResponseError);
    }
  }
}

/**
 * Error thrown when a request times out.
 */
export class TimeoutError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.TIMEOUT,
      message,
      provider,
      retryable: true,
      originalError,
    });
    this.name = 'TimeoutError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TimeoutError);
    }
  }
}

/**
 * Error thrown when the server answers with a 5xx status.
 */
export class ServerError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.SERVER_ERROR,
      message,
      provider,
      retryable: true,
      originalError,
    });
    this.name = 'ServerError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ServerError);
    }
  }
}

/**
 * Error thrown when the server cannot be reached.
 *
 * @example
 * ```typescript
 * if (error instanceof NetworkError) {
 *   console.log('Is Ollama running? Try: ollama serve');
 * }
 * ```
 */
export class NetworkError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.NETWORK_ERROR,
      message,
      provider,
      retryable: true,
      originalError,
    });
    this.name = 'NetworkError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NetworkError);
    }
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

export function isRetryableError(error: unknown): boolean {
  if (isLLMError(error)) {
    return error.retryable;
  }
  return false;
}

// =============================================================================
// Error Factory Function
// =============================================================================

/**
 * Creates the specific error class matching `info.code`.
 */
export function createSpecificError(info: LLMErrorInfo): LLMError {
  switch (info.code) {
    case LLMErrorCode.INVALID_REQUEST:
      return new InvalidRequestError(info.message, info.provider, info.originalError);

    case LLMErrorCode.MODEL_NOT_FOUND:
      return new ModelNotFoundError(info.message, info.provider, info.originalError);

    case LLMErrorCode.INVALID_RESPONSE:
      return new InvalidResponseError(info.message, info.provider, info.originalError);

    case LLMErrorCode.TIMEOUT:
      return new TimeoutError(info.message, info.provider, info.originalError);

    case LLMErrorCode.SERVER_ERROR:
      return new ServerError(info.message, info.provider, info.originalError);

    case LLMErrorCode.NETWORK_ERROR:
      return new NetworkError(info.message, info.provider, info.originalError);

    case LLMErrorCode.UNKNOWN:
    default:
      return new LLMError(info);
  }
}
