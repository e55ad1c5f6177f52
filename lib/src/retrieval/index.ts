/**
 * Retrieval Module
 */

export {
  RetrieverConfigSchema,
  type RetrieverConfig,
  type RetrieverConfigInput,
  type SearchOptions,
  type RetrievedDocument,
  type LoadOptions,
  type LoadResult,
  type CollectionStats,
  distanceToScore,
} from './types.js';

export { Retriever, type RetrieverDependencies } from './retriever.js';
