/**
 * Chunking Module
 *
 * Sentence-packing chunker and text utilities for knowledge-base preparation.
 *
 * @example
 * ```typescript
 * import { chunkDocument, cleanText, extractKeywords } from './chunking/index.js';
 *
 * const result = chunkDocument(cleanText(rawArticle));
 * for (const chunk of result.chunks) {
 *   console.log(chunk.chunkIndex, extractKeywords(chunk.content));
 * }
 * ```
 */

export {
  ChunkingConfigSchema,
  type ChunkingConfig,
  type ChunkingConfigInput,
  createDefaultChunkingConfig,
  TextChunkSchema,
  type TextChunk,
  ChunkingResultSchema,
  type ChunkingResult,
  overlapWordCount,
  countWords,
} from './types.js';

export { chunkText, chunkDocument, splitSentences } from './chunker.js';

export {
  cleanText,
  extractKeywords,
  titleFromFileName,
  toTitleCase,
} from './text-utils.js';
