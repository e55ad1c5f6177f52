/**
 * LLM Adapter Types
 *
 * Type definitions for the completion service behind the answer composer.
 * Ollama is the only provider; the adapter seam keeps it swappable in tests.
 */

import { z } from 'zod';

// ============================================================================
// LLM Provider Types
// ============================================================================

/**
 * Supported LLM providers
 */
export const LLMProvider = {
  OLLAMA: 'ollama',
} as const;

export type LLMProvider = (typeof LLMProvider)[keyof typeof LLMProvider];

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Zod schema for validating LLMConfig data
 */
export const LLMConfigSchema = z.object({
  /** LLM provider to use */
  provider: z.enum(['ollama']),
  /** Model identifier (e.g., 'llama3.2:3b') */
  model: z.string().min(1),
  /** Maximum tokens in the response */
  maxTokens: z.number().int().positive().max(100000),
  /** Temperature for response randomness (0-2) */
  temperature: z.number().min(0).max(2),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;

// ============================================================================
// Token Usage Types
// ============================================================================

export const LLMTokenUsageSchema = z.object({
  /** Number of tokens in the input/prompt */
  inputTokens: z.number().int().nonnegative(),
  /** Number of tokens in the output/completion */
  outputTokens: z.number().int().nonnegative(),
});

export type LLMTokenUsage = z.infer<typeof LLMTokenUsageSchema>;

// ============================================================================
// Response Types
// ============================================================================

export const LLMResponseSchema = z.object({
  /** The generated text content, trimmed */
  content: z.string(),
  /** Token usage information */
  usage: LLMTokenUsageSchema,
  /** Model identifier used for generation */
  model: z.string().min(1),
});

export type LLMResponse = z.infer<typeof LLMResponseSchema>;

// ============================================================================
// Request Types
// ============================================================================

/**
 * Options for a single completion request
 */
export const LLMCompletionOptionsSchema = z.object({
  /** Instruction text placed ahead of the prompt */
  system: z.string().optional(),
  /** Override default temperature for this request */
  temperature: z.number().min(0).max(2).optional(),
  /** Override default max tokens for this request */
  maxTokens: z.number().int().positive().max(100000).optional(),
  /** Stop sequences to end generation */
  stopSequences: z.array(z.string()).optional(),
});

export type LLMCompletionOptions = z.infer<typeof LLMCompletionOptionsSchema>;

// ============================================================================
// Health Types
// ============================================================================

export interface LLMHealthStatus {
  /** The service answered the model listing */
  available: boolean;
  /** The configured model is among the installed ones */
  modelAvailable: boolean;
  models: string[];
  error?: string;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * LLM-specific error codes
 */
export const LLMErrorCode = {
  /** Invalid request parameters */
  INVALID_REQUEST: 'invalid_request',
  /** Model not found or not pulled */
  MODEL_NOT_FOUND: 'model_not_found',
  /** Response body did not have the expected shape */
  INVALID_RESPONSE: 'invalid_response',
  /** Request timeout */
  TIMEOUT: 'timeout',
  /** Server error from provider */
  SERVER_ERROR: 'server_error',
  /** Network or connection error */
  NETWORK_ERROR: 'network_error',
  /** Generic/unknown error */
  UNKNOWN: 'unknown',
} as const;

export type LLMErrorCode = (typeof LLMErrorCode)[keyof typeof LLMErrorCode];

/**
 * Structured LLM error information
 */
export const LLMErrorInfoSchema = z.object({
  code: z.enum([
    'invalid_request',
    'model_not_found',
    'invalid_response',
    'timeout',
    'server_error',
    'network_error',
    'unknown',
  ]),
  /** Human-readable error message */
  message: z.string(),
  /** Provider that generated the error */
  provider: z.enum(['ollama']),
  /** Whether the request can be retried */
  retryable: z.boolean(),
  /** Original error from the transport */
  originalError: z.unknown().optional(),
});

export type LLMErrorInfo = z.infer<typeof LLMErrorInfoSchema>;

// ============================================================================
// Retry Configuration Types
// ============================================================================

export const RetryableErrorCodeSchema = z.enum(['timeout', 'server_error', 'network_error']);

/**
 * Configuration options for retry behavior
 */
export const RetryConfigSchema = z.object({
  /** Maximum number of retry attempts (excluding the initial request) */
  maxRetries: z.number().int().nonnegative().default(3),
  /** Initial delay in milliseconds before the first retry */
  initialDelayMs: z.number().int().positive().default(1000),
  /** Maximum delay in milliseconds between retries */
  maxDelayMs: z.number().int().positive().default(60000),
  /** Exponential backoff multiplier (e.g., 2 means each retry waits 2x longer) */
  backoffMultiplier: z.number().positive().default(2),
  /** Whether to add random jitter to retry delays */
  jitter: z.boolean().default(true),
  /** Maximum jitter as a fraction of the delay (0.0 to 1.0) */
  jitterFactor: z.number().min(0).max(1).default(0.25),
  /** Which error codes should trigger a retry (defaults to all retryable errors) */
  retryableErrorCodes: z.array(RetryableErrorCodeSchema).optional(),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitter: true,
  jitterFactor: 0.25,
  retryableErrorCodes: ['timeout', 'server_error', 'network_error'],
};

/**
 * Event emitted during retry operations for logging
 */
export interface RetryEvent {
  type: 'attempt_start' | 'attempt_failed' | 'attempt_succeeded' | 'retrying' | 'max_retries_exceeded';
  /** Which attempt number this was (1-based) */
  attemptNumber: number;
  maxRetries: number;
  error?: LLMErrorInfo | undefined;
  /** Delay before next retry (only for 'retrying' events) */
  nextDelayMs?: number | undefined;
  timestamp: Date;
}

export type RetryEventHandler = (event: RetryEvent) => void;

// ============================================================================
// Provider-Specific Configuration Types
// ============================================================================

/**
 * Ollama-specific configuration options
 */
export const OllamaConfigSchema = LLMConfigSchema.extend({
  provider: z.literal('ollama').default('ollama'),
  model: z.string().min(1).default('llama3.2:3b'),
  maxTokens: z.number().int().positive().max(100000).default(512),
  temperature: z.number().min(0).max(2).default(0.7),
  /** Ollama server root */
  baseUrl: z.string().url().default('http://localhost:11434'),
  /** Hard timeout for one generate call */
  timeoutMs: z.number().int().positive().default(60000),
  /** Timeout for the model listing used by the health check */
  healthTimeoutMs: z.number().int().positive().default(5000),
  topP: z.number().min(0).max(1).default(0.9),
  topK: z.number().int().positive().default(40),
  repeatPenalty: z.number().positive().default(1.1),
});

export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;
export type OllamaConfigInput = z.input<typeof OllamaConfigSchema>;
