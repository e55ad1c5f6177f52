/**
 * LLM Adapter Base Class
 *
 * Abstract base class for completion providers. The answer composer talks
 * to this class only, so tests substitute a scripted subclass.
 */

import { type Logger, createSilentLogger } from '../logging/index.js';
import {
  type LLMConfig,
  type LLMResponse,
  type LLMCompletionOptions,
  type LLMHealthStatus,
  type LLMProvider,
} from './types.js';
import { InvalidRequestError, isLLMError } from './errors.js';

export interface LLMAdapterDependencies {
  logger?: Logger;
}

/**
 * Abstract base class for LLM adapters.
 *
 * @example
 * ```typescript
 * class ScriptedAdapter extends LLMAdapter {
 *   async complete(prompt: string): Promise<LLMResponse> {
 *     return { content: 'Reog berasal dari Ponorogo.', model: this.model, usage: { inputTokens: 0, outputTokens: 0 } };
 *   }
 *
 *   async checkHealth(): Promise<LLMHealthStatus> {
 *     return { available: true, modelAvailable: true, models: [this.model] };
 *   }
 * }
 * ```
 */
export abstract class LLMAdapter {
  protected readonly config: LLMConfig;
  protected readonly logger: Logger;

  constructor(config: LLMConfig, deps?: LLMAdapterDependencies) {
    this.config = { ...config };
    this.logger = deps?.logger ?? createSilentLogger();
  }

  // ===========================================================================
  // Abstract Methods - Must be implemented by subclasses
  // ===========================================================================

  /**
   * Generates a completion for `prompt`.
   *
   * @throws {LLMError} If the completion fails
   */
  abstract complete(prompt: string, options?: LLMCompletionOptions): Promise<LLMResponse>;

  /**
   * Reports whether the service is reachable and the model installed.
   * Never throws.
   */
  abstract checkHealth(): Promise<LLMHealthStatus>;

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  get provider(): LLMProvider {
    return this.config.provider;
  }

  get model(): string {
    return this.config.model;
  }

  getConfig(): Readonly<LLMConfig> {
    return { ...this.config };
  }

  /**
   * Generated text, or `""` when the call fails. Failures are logged with
   * their code; errors that are not LLMErrors propagate.
   */
  async generate(prompt: string, options?: LLMCompletionOptions): Promise<string> {
    try {
      const response = await this.complete(prompt, options);
      this.logger.info('Generated text', {
        model: response.model,
        characters: response.content.length,
        outputTokens: response.usage.outputTokens,
      });
      return response.content;
    } catch (error) {
      if (isLLMError(error)) {
        this.logger.error('Generation failed', error, {
          code: error.code,
          retryable: error.retryable,
        });
        return '';
      }
      throw error;
    }
  }

  // ===========================================================================
  // Protected Helper Methods
  // ===========================================================================

  protected mergeOptions(
    options?: LLMCompletionOptions
  ): Required<Pick<LLMCompletionOptions, 'temperature' | 'maxTokens'>> &
    Omit<LLMCompletionOptions, 'temperature' | 'maxTokens'> {
    return {
      system: options?.system,
      temperature: options?.temperature ?? this.config.temperature,
      maxTokens: options?.maxTokens ?? this.config.maxTokens,
      stopSequences: options?.stopSequences,
    };
  }

  /**
   * The system text and prompt joined by a blank line
   */
  protected buildPrompt(prompt: string, system?: string): string {
    return system ? `${system}\n\n${prompt}` : prompt;
  }

  /**
   * @throws {InvalidRequestError} If the prompt is blank
   */
  protected validatePrompt(prompt: string): void {
    if (prompt.trim().length === 0) {
      throw new InvalidRequestError('Prompt must not be empty', this.config.provider);
    }
  }
}
