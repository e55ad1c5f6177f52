/**
 * RAG (Retrieval-Augmented Generation) Module
 *
 * Answers visitor questions about Reog Ponorogo from the knowledge base:
 * - language detection for Indonesian and English questions
 * - multilingual MiniLM retrieval through the retriever
 * - grounded answers from a local Ollama model
 *
 * @example
 * ```typescript
 * import { AnswerComposer, RAGPipeline } from 'reog-museum-guide';
 *
 * const composer = new AnswerComposer({ llm, logger }, { maxTokens: 256 });
 * const pipeline = new RAGPipeline({ retriever, composer, logger });
 *
 * const response = await pipeline.answer('Siapa Bujang Ganong?');
 * console.log(response.answer);
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export {
  RAGErrorCode,
  RAGErrorCodeSchema,
  RAGError,
  isRAGError,
  PipelineState,
  SourceReferenceSchema,
  type SourceReference,
  PipelineTimingSchema,
  type PipelineTiming,
  PipelineResponseSchema,
  type PipelineResponse,
  type SpeechPipelineResponse,
  type AnswerOptions,
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
  type PipelineStats,
  generateRequestId,
} from './types.js';

// =============================================================================
// Prompts & Language
// =============================================================================

export {
  SYSTEM_PROMPTS,
  ANSWER_PREFIXES,
  NO_INFORMATION_REPLIES,
  ERROR_REPLIES,
  buildUserPrompt,
} from './prompts.js';

export { LANGUAGE_MARKERS, detectLanguage, tokenizeWords } from './language.js';

// =============================================================================
// Composition & Orchestration
// =============================================================================

export {
  AnswerComposer,
  AnswerComposerConfigSchema,
  type AnswerComposerConfig,
  type AnswerComposerConfigInput,
  type AnswerComposerDependencies,
  buildContext,
  postProcessAnswer,
} from './answer-composer.js';

export { RAGPipeline, type RAGPipelineDependencies, formatSources } from './pipeline.js';

// =============================================================================
// Latency Tracking
// =============================================================================

export {
  RAGPhase,
  PhaseTimingSchema,
  type PhaseTiming,
  LatencySummarySchema,
  type LatencySummary,
  LatencyThresholdsSchema,
  type LatencyThresholds,
  type LatencyThresholdsInput,
  type LatencyTrackerOptions,
  LatencyTracker,
  formatLatencySummary,
} from './latency-tracker.js';
