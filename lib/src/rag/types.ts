/**
 * RAG Pipeline Types
 *
 * Response records, options and errors of the question-answering pipeline.
 */

import { z } from 'zod';

import { LanguageSchema, type Language } from '../knowledge-base/index.js';
import type { CollectionStats } from '../retrieval/index.js';
import { LatencyThresholdsSchema } from './latency-tracker.js';

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error codes for pipeline failures. The code of a failed response tells a
 * caller which step gave up.
 */
export const RAGErrorCode = {
  /** Question was empty after trimming */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  /** Embedding the question failed */
  EMBEDDING_ERROR: 'EMBEDDING_ERROR',
  /** Vector search failed */
  RETRIEVAL_ERROR: 'RETRIEVAL_ERROR',
  /** Completion service produced no answer */
  GENERATION_ERROR: 'GENERATION_ERROR',
  /** Audio could not be transcribed */
  TRANSCRIPTION_ERROR: 'TRANSCRIPTION_ERROR',
  /** Speech input used without a speech service */
  SPEECH_UNAVAILABLE: 'SPEECH_UNAVAILABLE',
  UNKNOWN: 'UNKNOWN',
} as const;

export type RAGErrorCode = (typeof RAGErrorCode)[keyof typeof RAGErrorCode];

export const RAGErrorCodeSchema = z.enum([
  'VALIDATION_ERROR',
  'EMBEDDING_ERROR',
  'RETRIEVAL_ERROR',
  'GENERATION_ERROR',
  'TRANSCRIPTION_ERROR',
  'SPEECH_UNAVAILABLE',
  'UNKNOWN',
]);

export class RAGError extends Error {
  readonly code: RAGErrorCode;
  readonly cause: Error | undefined;
  readonly metadata: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: RAGErrorCode,
    options?: { cause?: Error; metadata?: Record<string, unknown> }
  ) {
    super(message);
    this.name = 'RAGError';
    this.code = code;
    this.cause = options?.cause;
    this.metadata = options?.metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RAGError);
    }
  }

  /**
   * Wrap an unknown error; RAGErrors pass through unchanged.
   */
  static fromError(
    error: unknown,
    code?: RAGErrorCode,
    metadata?: Record<string, unknown>
  ): RAGError {
    if (error instanceof RAGError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const options: { cause?: Error; metadata?: Record<string, unknown> } = {};
    if (error instanceof Error) {
      options.cause = error;
    }
    if (metadata !== undefined) {
      options.metadata = metadata;
    }

    return new RAGError(message, code ?? RAGErrorCode.UNKNOWN, options);
  }
}

export function isRAGError(error: unknown): error is RAGError {
  return error instanceof RAGError;
}

// =============================================================================
// Pipeline State
// =============================================================================

/**
 * Steps of one `answer` call. Every call ends in FORMAT, NO_RESULTS or ERROR.
 */
export const PipelineState = {
  VALIDATE: 'validate',
  DETECT_LANGUAGE: 'detect_language',
  RETRIEVE: 'retrieve',
  NO_RESULTS: 'no_results',
  GENERATE: 'generate',
  FORMAT: 'format',
  ERROR: 'error',
} as const;

export type PipelineState = (typeof PipelineState)[keyof typeof PipelineState];

// =============================================================================
// Response Schemas
// =============================================================================

export const SourceReferenceSchema = z.object({
  title: z.string(),
  category: z.string(),
  /** Similarity score rounded to 3 decimals */
  score: z.number().min(0).max(1),
  /** First 150 characters of the passage, `...` appended when cut */
  excerpt: z.string(),
});

export type SourceReference = z.infer<typeof SourceReferenceSchema>;

/**
 * Durations in milliseconds. `total` covers the whole call, so it is at least
 * `retrieval + generation`.
 */
export const PipelineTimingSchema = z.object({
  retrieval: z.number().nonnegative(),
  generation: z.number().nonnegative(),
  total: z.number().nonnegative(),
});

export type PipelineTiming = z.infer<typeof PipelineTimingSchema>;

export const PipelineResponseSchema = z.object({
  answer: z.string().min(1),
  language: LanguageSchema,
  success: z.boolean(),
  sources: z.array(SourceReferenceSchema).optional(),
  timing: PipelineTimingSchema.optional(),
  /** Machine-readable failure reason; the answer stays a localized message */
  error: z.string().optional(),
  errorCode: RAGErrorCodeSchema.optional(),
});

export type PipelineResponse = z.infer<typeof PipelineResponseSchema>;

/**
 * Response to a spoken question: the pipeline response plus what was heard.
 */
export interface SpeechPipelineResponse extends PipelineResponse {
  /** Normalized transcript; empty when transcription failed */
  transcript: string;
}

// =============================================================================
// Options & Config
// =============================================================================

export interface AnswerOptions {
  /** Pins the language; skips detection */
  language?: Language | undefined;
  /** Overrides the retriever's default result count */
  topK?: number | undefined;
  /** @default true */
  returnSources?: boolean | undefined;
  /** @default false */
  returnTiming?: boolean | undefined;
}

export const PipelineConfigSchema = z.object({
  /** Language of responses to questions rejected before detection */
  defaultLanguage: LanguageSchema.default('id'),

  /**
   * Characters of passage text kept in a source excerpt
   * @default 150
   */
  excerptLength: z.number().int().positive().default(150),

  /** Phase durations above these are logged as warnings */
  latencyThresholds: LatencyThresholdsSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export interface PipelineStats {
  knowledgeBase: CollectionStats;
  retrievalConfig: {
    topK: number;
    scoreThreshold: number;
    embeddingModel: string;
  };
  llmConfig: {
    model: string;
    temperature: number;
    maxTokens: number;
  };
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Correlates the log entries of one pipeline call
 */
export function generateRequestId(): string {
  return `rag-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}
