/**
 * Chunking Types and Schemas
 *
 * Types for splitting knowledge-base articles into retrieval-ready chunks.
 * Sizes are measured in characters; overlap is carried over in whole words.
 */

import { z } from 'zod';

// =============================================================================
// Configuration
// =============================================================================

export const ChunkingConfigSchema = z
  .object({
    /**
     * Target maximum characters per chunk. A single sentence longer than this
     * is emitted on its own rather than cut.
     */
    maxSize: z.number().int().positive().default(600),

    /**
     * Overlap budget in characters. Converted to `floor(overlap / 5)` words
     * carried from the end of a closed chunk into the next one.
     */
    overlap: z.number().int().nonnegative().default(50),

    /**
     * Trailing remnants shorter than this are merged into the previous chunk.
     */
    minSize: z.number().int().nonnegative().default(100),
  })
  .refine((config) => config.minSize <= config.maxSize, {
    message: 'minSize must not exceed maxSize',
    path: ['minSize'],
  });

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type ChunkingConfigInput = z.input<typeof ChunkingConfigSchema>;

export function createDefaultChunkingConfig(
  overrides?: ChunkingConfigInput
): ChunkingConfig {
  return ChunkingConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Chunk Types
// =============================================================================

export const TextChunkSchema = z.object({
  /** Position of the chunk within its source, contiguous from 0 */
  chunkIndex: z.number().int().nonnegative(),

  totalChunks: z.number().int().positive(),

  content: z.string().min(1),

  charCount: z.number().int().positive(),

  wordCount: z.number().int().positive(),

  /** Words repeated from the end of the previous chunk */
  overlapWords: z.number().int().nonnegative(),
});

export type TextChunk = z.infer<typeof TextChunkSchema>;

export const ChunkingResultSchema = z.object({
  chunks: z.array(TextChunkSchema),

  totalChunks: z.number().int().nonnegative(),

  stats: z.object({
    originalCharCount: z.number().int().nonnegative(),
    sentenceCount: z.number().int().nonnegative(),
    avgChunkCharCount: z.number().nonnegative(),
    minChunkCharCount: z.number().int().nonnegative(),
    maxChunkCharCount: z.number().int().nonnegative(),
    /** Sentences that alone exceeded maxSize */
    oversizedSentences: z.number().int().nonnegative(),
    /** Whether a short trailing remnant was merged into the previous chunk */
    mergedTrailingRemnant: z.boolean(),
    durationMs: z.number().nonnegative(),
  }),

  config: z.object({
    maxSize: z.number().int().positive(),
    overlap: z.number().int().nonnegative(),
    minSize: z.number().int().nonnegative(),
  }),
});

export type ChunkingResult = z.infer<typeof ChunkingResultSchema>;

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Number of words carried into the next chunk for a given overlap budget
 */
export function overlapWordCount(overlap: number): number {
  return Math.floor(overlap / 5);
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}
