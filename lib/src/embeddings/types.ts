/**
 * Embedding Types and Schemas
 *
 * Sentence embeddings for the bilingual knowledge base. The default model is
 * the multilingual paraphrase MiniLM, which maps Indonesian and English text
 * into one 384-dimensional space.
 */

import { z } from 'zod';

// =============================================================================
// Embedding Model Configuration
// =============================================================================

export const EmbeddingModel = {
  /** paraphrase-multilingual-MiniLM-L12-v2 (ONNX export), 384 dimensions */
  PARAPHRASE_MULTILINGUAL_MINILM: 'Xenova/paraphrase-multilingual-MiniLM-L12-v2',
} as const;

export type EmbeddingModel = (typeof EmbeddingModel)[keyof typeof EmbeddingModel];

export const DEFAULT_EMBEDDING_MODEL = EmbeddingModel.PARAPHRASE_MULTILINGUAL_MINILM;

export const DEFAULT_EMBEDDING_DIMENSIONS = 384;

// =============================================================================
// Embedder Configuration
// =============================================================================

export const EmbedderConfigSchema = z.object({
  /**
   * Model identifier passed to transformers.js.
   * @default 'Xenova/paraphrase-multilingual-MiniLM-L12-v2'
   */
  model: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),

  /**
   * Expected vector length; every computed vector is checked against it.
   * @default 384
   */
  dimensions: z.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSIONS),

  /**
   * Use the quantized ONNX weights.
   * @default true
   */
  quantized: z.boolean().default(true),

  /**
   * Scale vectors to unit length. Off by default: distances in the vector
   * store are Euclidean over the raw mean-pooled vectors.
   * @default false
   */
  normalize: z.boolean().default(false),

  /**
   * Texts per model call in `embedBatch`.
   * @default 32
   */
  batchSize: z.number().int().positive().max(256).default(32),

  /**
   * Progress callback for batch processing.
   */
  onProgress: z
    .function()
    .args(
      z.object({
        current: z.number(),
        total: z.number(),
        percentage: z.number(),
      })
    )
    .returns(z.void())
    .optional(),
});

export type EmbedderConfig = z.infer<typeof EmbedderConfigSchema>;
export type EmbedderConfigInput = z.input<typeof EmbedderConfigSchema>;

// =============================================================================
// Embedder Contract
// =============================================================================

/**
 * Anything that turns text into fixed-length vectors. The retriever depends
 * on this interface only, so tests can pass a deterministic fake.
 */
export interface TextEmbedder {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
  getDimensions(): number;
  getModel(): string;
}

// =============================================================================
// Error Types
// =============================================================================

export const EmbeddingErrorCode = {
  /** Model failed to load */
  MODEL_LOAD_ERROR: 'MODEL_LOAD_ERROR',
  /** Input text is empty */
  EMPTY_INPUT: 'EMPTY_INPUT',
  /** Embedding computation failed */
  COMPUTATION_ERROR: 'COMPUTATION_ERROR',
  /** Vector length differs from the configured dimensions */
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  /** Unknown error */
  UNKNOWN: 'UNKNOWN',
} as const;

export type EmbeddingErrorCode = (typeof EmbeddingErrorCode)[keyof typeof EmbeddingErrorCode];

export class EmbeddingError extends Error {
  readonly code: EmbeddingErrorCode;
  readonly cause: Error | undefined;

  constructor(message: string, code: EmbeddingErrorCode, options?: { cause?: Error }) {
    super(message);
    this.name = 'EmbeddingError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmbeddingError);
    }
  }

  static fromError(error: unknown, code?: EmbeddingErrorCode): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new EmbeddingError(message, code ?? EmbeddingErrorCode.UNKNOWN, { cause });
  }
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Scale a vector to unit length. A zero vector is returned unchanged.
 */
export function normalizeVector(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));

  if (magnitude === 0) {
    return vector;
  }

  return vector.map((val) => val / magnitude);
}

/**
 * Euclidean (L2) distance between two vectors of equal length
 */
export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingError(
      `Vector length mismatch: ${a.length} vs ${b.length}`,
      EmbeddingErrorCode.DIMENSION_MISMATCH
    );
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}
