/**
 * Answer Pipeline
 *
 * Orchestrates one question: validate, detect the language, retrieve,
 * generate, format. Every call resolves to a response; failures become
 * localized apologies with a machine-readable `error`.
 *
 * @example
 * ```typescript
 * const pipeline = new RAGPipeline({ retriever, composer, speech, logger });
 *
 * const response = await pipeline.answer('Apa itu Dadak Merak?', { returnTiming: true });
 * if (response.success) {
 *   console.log(response.answer, response.sources);
 * }
 * ```
 */

import type { Language } from '../knowledge-base/index.js';
import { type Logger, createSilentLogger } from '../logging/index.js';
import type { Retriever, RetrievedDocument } from '../retrieval/index.js';
import type { AudioInput, TranscriptionService } from '../speech/index.js';
import type { AnswerComposer } from './answer-composer.js';
import { detectLanguage } from './language.js';
import { LatencyTracker, RAGPhase } from './latency-tracker.js';
import { ERROR_REPLIES, NO_INFORMATION_REPLIES } from './prompts.js';
import {
  type AnswerOptions,
  type PipelineConfig,
  type PipelineConfigInput,
  type PipelineResponse,
  type PipelineStats,
  type SourceReference,
  type SpeechPipelineResponse,
  PipelineConfigSchema,
  PipelineState,
  RAGError,
  RAGErrorCode,
  generateRequestId,
} from './types.js';

export interface RAGPipelineDependencies {
  retriever: Retriever;
  composer: AnswerComposer;
  /** Needed only by `answerSpeech` */
  speech?: TranscriptionService | undefined;
  logger?: Logger | undefined;
}

export class RAGPipeline {
  private readonly retriever: Retriever;
  private readonly composer: AnswerComposer;
  private readonly speech: TranscriptionService | undefined;
  private readonly logger: Logger;
  private readonly config: PipelineConfig;

  constructor(deps: RAGPipelineDependencies, config?: PipelineConfigInput) {
    this.retriever = deps.retriever;
    this.composer = deps.composer;
    this.speech = deps.speech;
    this.logger = deps.logger ?? createSilentLogger();
    this.config = PipelineConfigSchema.parse(config ?? {});
  }

  // ===========================================================================
  // Text Questions
  // ===========================================================================

  async answer(question: string, options: AnswerOptions = {}): Promise<PipelineResponse> {
    const requestId = generateRequestId();
    const tracker = new LatencyTracker(requestId, {
      logger: this.logger,
      thresholds: this.config.latencyThresholds,
    });
    const returnSources = options.returnSources ?? true;
    let language: Language = options.language ?? this.config.defaultLanguage;
    let state: PipelineState = this.enter(PipelineState.VALIDATE, requestId);

    try {
      const trimmed = question.trim();
      if (!trimmed) {
        this.logger.warn('Empty question', { requestId });
        return this.errorResponse(language, 'Empty question', RAGErrorCode.VALIDATION_ERROR);
      }

      if (options.language === undefined) {
        state = this.enter(PipelineState.DETECT_LANGUAGE, requestId);
        language = detectLanguage(trimmed);
      }
      this.logger.info('Answering question', {
        requestId,
        language,
        detected: options.language === undefined,
        characters: trimmed.length,
      });

      state = this.enter(PipelineState.RETRIEVE, requestId);
      const documents = await tracker.timePhase(RAGPhase.RETRIEVAL, () =>
        this.retriever.search(trimmed, { topK: options.topK, language })
      );

      if (documents.length === 0) {
        state = this.enter(PipelineState.NO_RESULTS, requestId);
        this.logger.warn('No relevant documents', { requestId, language });
        return {
          answer: NO_INFORMATION_REPLIES[language],
          language,
          success: false,
          sources: [],
        };
      }

      state = this.enter(PipelineState.GENERATE, requestId);
      const answer = await tracker.timePhase(
        RAGPhase.GENERATION,
        () => this.composer.compose(trimmed, documents, language),
        { documents: documents.length }
      );

      if (!answer) {
        this.logger.error('Answer generation failed', { requestId, language });
        return this.errorResponse(
          language,
          'Answer generation failed',
          RAGErrorCode.GENERATION_ERROR
        );
      }

      state = this.enter(PipelineState.FORMAT, requestId);
      const summary = tracker.complete();
      const response: PipelineResponse = { answer, language, success: true };

      if (returnSources) {
        response.sources = formatSources(documents, this.config.excerptLength);
      }
      if (options.returnTiming) {
        response.timing = {
          retrieval: summary.phases[RAGPhase.RETRIEVAL] ?? 0,
          generation: summary.phases[RAGPhase.GENERATION] ?? 0,
          total: summary.totalMs,
        };
      }
      return response;
    } catch (error) {
      const failed = RAGError.fromError(error, errorCodeFor(state), { requestId, state });
      this.enter(PipelineState.ERROR, requestId);
      this.logger.error('Pipeline failed', failed, { requestId, state, code: failed.code });
      return this.errorResponse(language, failed.message, failed.code);
    }
  }

  // ===========================================================================
  // Spoken Questions
  // ===========================================================================

  /**
   * Transcribe, then answer the transcript. A transcript detected as `id` or
   * `en` pins the answer language; otherwise `options.language` or text
   * detection decides.
   */
  async answerSpeech(
    audio: AudioInput,
    options: AnswerOptions = {}
  ): Promise<SpeechPipelineResponse> {
    const fallbackLanguage = options.language ?? this.config.defaultLanguage;
    const speech = this.speech;

    if (!speech) {
      this.logger.error('Speech question without a speech service');
      return {
        ...this.errorResponse(
          fallbackLanguage,
          'Speech recognition not configured',
          RAGErrorCode.SPEECH_UNAVAILABLE
        ),
        transcript: '',
      };
    }

    const tracker = new LatencyTracker(generateRequestId(), {
      logger: this.logger,
      thresholds: this.config.latencyThresholds,
      logSummaryOnComplete: false,
    });
    const transcription = await tracker.timePhase(RAGPhase.TRANSCRIPTION, () =>
      speech.transcribe(audio, options.language)
    );

    if (!transcription.success) {
      return {
        ...this.errorResponse(
          fallbackLanguage,
          transcription.error ?? 'Transcription failed',
          RAGErrorCode.TRANSCRIPTION_ERROR
        ),
        transcript: '',
      };
    }

    const language = toLanguage(transcription.language) ?? options.language;
    const response = await this.answer(transcription.text, { ...options, language });
    return { ...response, transcript: transcription.text };
  }

  // ===========================================================================
  // Stats
  // ===========================================================================

  async getStats(): Promise<PipelineStats> {
    const knowledgeBase = await this.retriever.getCollectionStats();
    const { topK, scoreThreshold } = this.retriever.getConfig();

    return {
      knowledgeBase,
      retrievalConfig: { topK, scoreThreshold, embeddingModel: knowledgeBase.embeddingModel },
      llmConfig: this.composer.describeModel(),
    };
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private enter(state: PipelineState, requestId: string): PipelineState {
    this.logger.trace('Pipeline state', { requestId, state });
    return state;
  }

  private errorResponse(
    language: Language,
    error: string,
    errorCode: RAGErrorCode
  ): PipelineResponse {
    return {
      answer: ERROR_REPLIES[language],
      language,
      success: false,
      sources: [],
      error,
      errorCode,
    };
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Code of an unexpected failure, by the step that was running
 */
function errorCodeFor(state: PipelineState): RAGErrorCode {
  switch (state) {
    case PipelineState.RETRIEVE:
      return RAGErrorCode.RETRIEVAL_ERROR;
    case PipelineState.GENERATE:
      return RAGErrorCode.GENERATION_ERROR;
    default:
      return RAGErrorCode.UNKNOWN;
  }
}

function toLanguage(code: string): Language | undefined {
  return code === 'id' || code === 'en' ? code : undefined;
}

/**
 * Source references in retrieval order.
 *
 * @example
 * ```typescript
 * formatSources([{ content: 'Warok adalah ...', score: 0.87654, metadata: { title: 'Warok', category: 'tokoh', ... }, ... }]);
 * // [{ title: 'Warok', category: 'tokoh', score: 0.877, excerpt: 'Warok adalah ...' }]
 * ```
 */
export function formatSources(
  documents: readonly RetrievedDocument[],
  excerptLength = 150
): SourceReference[] {
  return documents.map((document) => ({
    title: document.metadata.title || 'Unknown',
    category: document.metadata.category || 'Unknown',
    score: Math.round(document.score * 1000) / 1000,
    excerpt:
      document.content.length > excerptLength
        ? `${document.content.slice(0, excerptLength)}...`
        : document.content,
  }));
}
