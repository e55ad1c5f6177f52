/**
 * Answer Composer
 *
 * Turns retrieved passages and a question into a grounded answer: builds the
 * numbered context block, picks the prompts for the language, calls the
 * completion service and tidies what comes back.
 *
 * @example
 * ```typescript
 * const composer = new AnswerComposer({ llm: new OllamaAdapter(), logger }, { maxTokens: 256 });
 * const answer = await composer.compose('Siapa Warok?', documents, 'id');
 * ```
 */

import { z } from 'zod';

import type { Language } from '../knowledge-base/index.js';
import type { LLMAdapter } from '../llm/index.js';
import { type Logger, createSilentLogger } from '../logging/index.js';
import type { RetrievedDocument } from '../retrieval/index.js';
import { ANSWER_PREFIXES, SYSTEM_PROMPTS, buildUserPrompt } from './prompts.js';

// =============================================================================
// Configuration
// =============================================================================

export const AnswerComposerConfigSchema = z.object({
  /** @default 0.7 */
  temperature: z.number().min(0).max(2).default(0.7),

  /**
   * Token budget for one answer, enough for 2-4 sentences
   * @default 256
   */
  maxTokens: z.number().int().positive().default(256),
});

export type AnswerComposerConfig = z.infer<typeof AnswerComposerConfigSchema>;
export type AnswerComposerConfigInput = z.input<typeof AnswerComposerConfigSchema>;

export interface AnswerComposerDependencies {
  llm: LLMAdapter;
  logger?: Logger | undefined;
}

// =============================================================================
// AnswerComposer Class
// =============================================================================

export class AnswerComposer {
  private readonly llm: LLMAdapter;
  private readonly logger: Logger;
  private readonly config: AnswerComposerConfig;

  constructor(deps: AnswerComposerDependencies, config?: AnswerComposerConfigInput) {
    this.llm = deps.llm;
    this.logger = deps.logger ?? createSilentLogger();
    this.config = AnswerComposerConfigSchema.parse(config ?? {});
  }

  /**
   * Answer `question` from `documents`. Returns `""` when the completion
   * service fails or produces nothing usable.
   */
  async compose(
    question: string,
    documents: RetrievedDocument[],
    language: Language
  ): Promise<string> {
    const context = buildContext(documents);
    const prompt = buildUserPrompt(question, context, language);

    this.logger.debug('Composing answer', {
      language,
      documents: documents.length,
      contextCharacters: context.length,
    });

    const raw = await this.llm.generate(prompt, {
      system: SYSTEM_PROMPTS[language],
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
    });

    const answer = postProcessAnswer(raw, language);
    if (!answer) {
      this.logger.warn('Completion produced no answer', { language, model: this.llm.model });
    }
    return answer;
  }

  /**
   * Model and sampling settings, as reported by pipeline stats
   */
  describeModel(): { model: string; temperature: number; maxTokens: number } {
    const { model, temperature, maxTokens } = this.llm.getConfig();
    return { model, temperature, maxTokens };
  }

  getConfig(): Readonly<AnswerComposerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Formatting Helpers
// =============================================================================

/**
 * Numbered passages, separated by blank lines.
 *
 * @example
 * ```
 * [Dokumen 1: Warok (tokoh)]
 * Warok adalah tokoh sakti ...
 *
 * [Dokumen 2: Asal Usul Reog (sejarah)]
 * Reog berasal dari ...
 * ```
 */
export function buildContext(documents: RetrievedDocument[]): string {
  return documents
    .map(
      (document, index) =>
        `[Dokumen ${index + 1}: ${document.metadata.title} (${document.metadata.category})]\n${document.content}`
    )
    .join('\n\n');
}

/**
 * Trim, drop echoed lead-ins, capitalize, and end on punctuation.
 *
 * @example
 * ```typescript
 * postProcessAnswer('Jawaban: reog berasal dari Ponorogo', 'id'); // 'Reog berasal dari Ponorogo.'
 * postProcessAnswer('   ', 'id');                                // ''
 * ```
 */
export function postProcessAnswer(answer: string, language: Language): string {
  let text = answer.trim();

  for (const prefix of ANSWER_PREFIXES[language]) {
    if (text.startsWith(prefix)) {
      text = text.slice(prefix.length).trim();
    }
  }

  if (!text) {
    return '';
  }

  text = text.charAt(0).toUpperCase() + text.slice(1);
  if (!/[.!?]$/.test(text)) {
    text += '.';
  }
  return text;
}
