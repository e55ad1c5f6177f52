/**
 * Ollama LLM Adapter
 *
 * Adapter for a local Ollama server: non-streaming `POST /api/generate` for
 * completions and `GET /api/tags` for the health check.
 */

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { z } from 'zod';

import { LLMAdapter, type LLMAdapterDependencies } from '../adapter.js';
import {
  type LLMResponse,
  type LLMCompletionOptions,
  type LLMHealthStatus,
  type OllamaConfig,
  type OllamaConfigInput,
  type RetryConfig,
  type RetryEvent,
  LLMErrorCode,
  LLMProvider,
  OllamaConfigSchema,
} from '../types.js';
import { LLMError, InvalidResponseError, createSpecificError } from '../errors.js';
import { withRetry, mergeRetryConfig } from '../retry.js';

// =============================================================================
// Wire Schemas
// =============================================================================

const GenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string().default(''),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().int().nonnegative().optional(),
  eval_count: z.number().int().nonnegative().optional(),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

// =============================================================================
// Extended Configuration Types
// =============================================================================

export interface OllamaAdapterConfig extends OllamaConfigInput {
  /** Retry policy; attempts beyond the first default to none */
  retry?: Partial<RetryConfig> | undefined;
}

// =============================================================================
// OllamaAdapter Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * const adapter = new OllamaAdapter(
 *   { baseUrl: 'http://localhost:11434', model: 'llama3.2:3b', retry: { maxRetries: 1 } },
 *   { logger }
 * );
 *
 * const text = await adapter.generate('Apa itu Reog?', { system: 'Jawab singkat.', maxTokens: 256 });
 * ```
 */
export class OllamaAdapter extends LLMAdapter {
  protected override readonly config: OllamaConfig;

  private readonly http: AxiosInstance;
  private readonly retryConfig: Required<RetryConfig>;

  constructor(config?: OllamaAdapterConfig, deps?: LLMAdapterDependencies) {
    const { retry, ...rest } = config ?? {};
    const parsed = OllamaConfigSchema.parse(rest);
    super(parsed, deps);
    this.config = parsed;
    this.retryConfig = mergeRetryConfig({ maxRetries: 0, ...retry });

    this.http = axios.create({
      baseURL: parsed.baseUrl,
      timeout: parsed.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  // ===========================================================================
  // Abstract Method Implementations
  // ===========================================================================

  /**
   * One non-streaming generation. The system text is prepended to the prompt.
   *
   * @throws {LLMError} a TimeoutError, NetworkError, ServerError,
   *   ModelNotFoundError, InvalidRequestError or InvalidResponseError
   */
  async complete(prompt: string, options?: LLMCompletionOptions): Promise<LLMResponse> {
    this.validatePrompt(prompt);

    const merged = this.mergeOptions(options);
    const body = {
      model: this.config.model,
      prompt: this.buildPrompt(prompt, merged.system),
      stream: false,
      options: {
        temperature: merged.temperature,
        num_predict: merged.maxTokens,
        top_p: this.config.topP,
        top_k: this.config.topK,
        repeat_penalty: this.config.repeatPenalty,
        ...(merged.stopSequences !== undefined && { stop: merged.stopSequences }),
      },
    };

    return withRetry(
      async () => {
        let data: unknown;
        try {
          ({ data } = await this.http.post<unknown>('/api/generate', body));
        } catch (error) {
          throw this.handleError(error);
        }

        const parsed = GenerateResponseSchema.safeParse(data);
        if (!parsed.success) {
          throw new InvalidResponseError(
            `Unexpected generate response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`,
            LLMProvider.OLLAMA,
            parsed.error
          );
        }

        return {
          content: parsed.data.response.trim(),
          model: parsed.data.model ?? this.config.model,
          usage: {
            inputTokens: parsed.data.prompt_eval_count ?? 0,
            outputTokens: parsed.data.eval_count ?? 0,
          },
        };
      },
      {
        provider: LLMProvider.OLLAMA,
        config: this.retryConfig,
        onRetryEvent: (event) => this.logRetryEvent(event),
      }
    );
  }

  /**
   * Lists installed models; the configured model must match a name exactly.
   */
  async checkHealth(): Promise<LLMHealthStatus> {
    try {
      const { data } = await this.http.get<unknown>('/api/tags', {
        timeout: this.config.healthTimeoutMs,
      });
      const models = TagsResponseSchema.parse(data).models.map((m) => m.name);
      const modelAvailable = models.includes(this.config.model);

      if (modelAvailable) {
        this.logger.info('Connected to Ollama', { model: this.config.model });
      } else {
        this.logger.warn('Model not installed', {
          model: this.config.model,
          installed: models,
          hint: `ollama pull ${this.config.model}`,
        });
      }
      return { available: true, modelAvailable, models };
    } catch (error) {
      const wrapped = error instanceof z.ZodError ? error : this.handleError(error);
      this.logger.error('Cannot reach Ollama', wrapped, { baseUrl: this.config.baseUrl });
      return { available: false, modelAvailable: false, models: [], error: wrapped.message };
    }
  }

  getBaseUrl(): string {
    return this.config.baseUrl;
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  /**
   * Maps axios failures onto the LLM error classes.
   */
  private handleError(error: unknown): LLMError {
    if (!isAxiosError(error)) {
      return LLMError.fromError(error, LLMProvider.OLLAMA);
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return createSpecificError({
        code: LLMErrorCode.TIMEOUT,
        message: `Ollama request timed out after ${this.config.timeoutMs}ms`,
        provider: LLMProvider.OLLAMA,
        retryable: true,
        originalError: error,
      });
    }

    const status = error.response?.status;
    if (status === undefined) {
      return createSpecificError({
        code: LLMErrorCode.NETWORK_ERROR,
        message: `Cannot connect to Ollama at ${this.config.baseUrl}: ${error.message}`,
        provider: LLMProvider.OLLAMA,
        retryable: true,
        originalError: error,
      });
    }

    const detail = describeErrorBody(error.response?.data);
    if (status === 404) {
      return createSpecificError({
        code: LLMErrorCode.MODEL_NOT_FOUND,
        message: `Model ${this.config.model} not found${detail}`,
        provider: LLMProvider.OLLAMA,
        retryable: false,
        originalError: error,
      });
    }
    if (status >= 500) {
      return createSpecificError({
        code: LLMErrorCode.SERVER_ERROR,
        message: `Ollama server error ${status}${detail}`,
        provider: LLMProvider.OLLAMA,
        retryable: true,
        originalError: error,
      });
    }
    return createSpecificError({
      code: LLMErrorCode.INVALID_REQUEST,
      message: `Ollama rejected the request with status ${status}${detail}`,
      provider: LLMProvider.OLLAMA,
      retryable: false,
      originalError: error,
    });
  }

  private logRetryEvent(event: RetryEvent): void {
    if (event.type === 'retrying') {
      this.logger.warn('Retrying generation', {
        attempt: event.attemptNumber,
        maxRetries: event.maxRetries,
        code: event.error?.code,
        delayMs: event.nextDelayMs,
      });
    } else if (event.type === 'max_retries_exceeded') {
      this.logger.warn('Generation retries exhausted', { attempts: event.attemptNumber });
    }
  }
}

const ErrorBodySchema = z.object({ error: z.string() });

function describeErrorBody(data: unknown): string {
  const parsed = ErrorBodySchema.safeParse(data);
  return parsed.success ? `: ${parsed.data.error}` : '';
}
