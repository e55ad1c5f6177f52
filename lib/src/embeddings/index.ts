/**
 * Embeddings Module
 *
 * Multilingual sentence embeddings for Indonesian and English passages.
 */

export {
  EmbeddingModel,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_EMBEDDING_DIMENSIONS,
  EmbedderConfigSchema,
  type EmbedderConfig,
  type EmbedderConfigInput,
  type TextEmbedder,
  EmbeddingErrorCode,
  EmbeddingError,
  isEmbeddingError,
  normalizeVector,
  euclideanDistance,
} from './types.js';

export { MiniLMEmbedder, createEmbedder } from './minilm-embedder.js';
