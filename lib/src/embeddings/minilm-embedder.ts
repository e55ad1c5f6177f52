/**
 * MiniLMEmbedder Class
 *
 * Sentence embeddings through transformers.js: mean-pooled token vectors from
 * a multilingual MiniLM, the same recipe sentence-transformers applies.
 *
 * @example
 * ```typescript
 * const embedder = new MiniLMEmbedder();
 * await embedder.initialize();
 *
 * const vector = await embedder.embed('Apa itu Dadak Merak?');
 * vector.length; // 384
 *
 * const vectors = await embedder.embedBatch(['Warok', 'Jathilan']);
 * ```
 */

import {
  type EmbedderConfig,
  type EmbedderConfigInput,
  type TextEmbedder,
  EmbedderConfigSchema,
  EmbeddingError,
  EmbeddingErrorCode,
  normalizeVector,
} from './types.js';
import { type Logger, createSilentLogger } from '../logging/index.js';

// =============================================================================
// Types for Transformers.js
// =============================================================================

/**
 * Tensor returned by the feature-extraction pipeline: `dims` is
 * `[batch, hidden]` after pooling, `data` the row-major values.
 */
interface PipelineOutput {
  data: Float32Array;
  dims: number[];
}

interface FeatureExtractionPipeline {
  (
    texts: string | string[],
    options?: { pooling?: 'mean' | 'none' | 'cls'; normalize?: boolean }
  ): Promise<PipelineOutput>;
}

// =============================================================================
// MiniLMEmbedder Class
// =============================================================================

export class MiniLMEmbedder implements TextEmbedder {
  private readonly config: EmbedderConfig;
  private readonly logger: Logger;
  private pipeline: FeatureExtractionPipeline | null = null;
  private initializePromise: Promise<void> | null = null;

  constructor(config?: EmbedderConfigInput, deps?: { logger?: Logger }) {
    this.config = EmbedderConfigSchema.parse(config ?? {});
    this.logger = deps?.logger ?? createSilentLogger();
  }

  // ===========================================================================
  // Initialization
  // ===========================================================================

  /**
   * Load the model. Idempotent; concurrent callers share one load, and a
   * failed load can be retried.
   *
   * @throws {EmbeddingError} If model loading fails
   */
  async initialize(): Promise<void> {
    if (this.pipeline) {
      return;
    }

    if (!this.initializePromise) {
      this.initializePromise = this.loadModel();
    }

    try {
      await this.initializePromise;
    } catch (error) {
      this.initializePromise = null;
      throw error;
    }
  }

  private async loadModel(): Promise<void> {
    const startTime = Date.now();
    this.logger.info('Loading embedding model', { model: this.config.model });

    try {
      // Dynamic import to avoid loading transformers unless needed
      const { pipeline, env } = await import('@xenova/transformers');

      env.allowLocalModels = false;
      env.useBrowserCache = false;

      this.pipeline = (await pipeline('feature-extraction', this.config.model, {
        quantized: this.config.quantized,
      })) as unknown as FeatureExtractionPipeline;
    } catch (error) {
      throw new EmbeddingError(
        `Failed to load embedding model: ${error instanceof Error ? error.message : String(error)}`,
        EmbeddingErrorCode.MODEL_LOAD_ERROR,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    this.logger.info('Embedding model ready', {
      model: this.config.model,
      durationMs: Date.now() - startTime,
    });
  }

  isInitialized(): boolean {
    return this.pipeline !== null;
  }

  // ===========================================================================
  // Public Embedding Methods
  // ===========================================================================

  /**
   * Embed one text. Loads the model on first use.
   *
   * @throws {EmbeddingError} `EMPTY_INPUT` for blank text
   */
  async embed(text: string): Promise<number[]> {
    if (!text || text.trim().length === 0) {
      throw new EmbeddingError('Input text cannot be empty', EmbeddingErrorCode.EMPTY_INPUT);
    }

    const [embedding] = await this.computeEmbeddings([text]);
    if (!embedding) {
      throw new EmbeddingError('Model returned no embedding', EmbeddingErrorCode.COMPUTATION_ERROR);
    }
    return embedding;
  }

  /**
   * Embed many texts, `batchSize` per model call. Output order matches input.
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    const results: number[][] = [];

    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      const batch = texts.slice(i, i + this.config.batchSize);
      results.push(...(await this.computeEmbeddings(batch)));

      if (this.config.onProgress) {
        const processed = Math.min(i + this.config.batchSize, texts.length);
        this.config.onProgress({
          current: processed,
          total: texts.length,
          percentage: (processed / texts.length) * 100,
        });
      }
    }

    return results;
  }

  // ===========================================================================
  // Core Embedding Logic
  // ===========================================================================

  private async computeEmbeddings(texts: string[]): Promise<number[][]> {
    await this.initialize();
    const pipeline = this.pipeline;
    if (!pipeline) {
      throw new EmbeddingError('Pipeline not initialized', EmbeddingErrorCode.MODEL_LOAD_ERROR);
    }

    let output: PipelineOutput;
    try {
      output = await pipeline(texts, { pooling: 'mean', normalize: false });
    } catch (error) {
      throw new EmbeddingError(
        `Embedding computation failed: ${error instanceof Error ? error.message : String(error)}`,
        EmbeddingErrorCode.COMPUTATION_ERROR,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    const width = output.dims[output.dims.length - 1] ?? 0;
    if (width !== this.config.dimensions) {
      throw new EmbeddingError(
        `Expected ${this.config.dimensions} dimensions, model produced ${width}`,
        EmbeddingErrorCode.DIMENSION_MISMATCH
      );
    }

    const vectors: number[][] = [];
    for (let row = 0; row < texts.length; row++) {
      const vector = Array.from(output.data.subarray(row * width, (row + 1) * width));
      vectors.push(this.config.normalize ? normalizeVector(vector) : vector);
    }
    return vectors;
  }

  // ===========================================================================
  // Utility Methods
  // ===========================================================================

  getDimensions(): number {
    return this.config.dimensions;
  }

  getModel(): string {
    return this.config.model;
  }

  getConfig(): Readonly<EmbedderConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createEmbedder(
  config?: EmbedderConfigInput,
  deps?: { logger?: Logger }
): MiniLMEmbedder {
  return new MiniLMEmbedder(config, deps);
}
