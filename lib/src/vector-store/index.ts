/**
 * Vector Store Module
 *
 * Nearest-neighbour storage for knowledge-base chunks: Qdrant in
 * production, an in-memory map for tests and offline runs.
 */

export {
  DocumentPayloadSchema,
  type DocumentPayload,
  type VectorRecord,
  type StoredDocument,
  type QueryMatch,
  type MetadataFilter,
  type VectorStore,
  VectorStoreErrorCode,
  VectorStoreError,
  isVectorStoreError,
  matchesFilter,
} from './types.js';

export {
  QdrantVectorStore,
  QdrantStoreConfigSchema,
  type QdrantStoreConfig,
  type QdrantStoreConfigInput,
  toPointId,
} from './qdrant-store.js';

export { InMemoryVectorStore } from './memory-store.js';
