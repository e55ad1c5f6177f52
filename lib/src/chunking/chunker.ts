/**
 * Knowledge Base Chunker
 *
 * Greedy sentence-packing chunker for museum articles. Sentences are
 * accumulated until the next one would overflow `maxSize`; the closed chunk's
 * last few words then seed the next chunk so neighbouring chunks share
 * context. Sentence detection is a terminal-punctuation heuristic
 * (`.`, `!`, `?` followed by whitespace); abbreviations and decimals are
 * split imprecisely.
 *
 * @example
 * ```typescript
 * const chunks = chunkText(cleanText(article));
 *
 * const result = chunkDocument(cleanText(article), { maxSize: 400 });
 * console.log(`${result.totalChunks} chunks, ${result.stats.oversizedSentences} oversized`);
 * ```
 */

import {
  ChunkingResultSchema,
  createDefaultChunkingConfig,
  countWords,
  overlapWordCount,
  type ChunkingConfig,
  type ChunkingConfigInput,
  type ChunkingResult,
  type TextChunk,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

interface ChunkCandidate {
  content: string;
  overlapWords: number;
}

interface ChunkRun {
  candidates: ChunkCandidate[];
  sentenceCount: number;
  oversizedSentences: number;
  mergedTrailingRemnant: boolean;
}

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

// =============================================================================
// Main Chunking Functions
// =============================================================================

/**
 * Split text into ordered chunks. Deterministic; never drops sentence text.
 * Only a text that is short as a whole yields a chunk below `minSize`.
 */
export function chunkText(text: string, config?: ChunkingConfigInput): string[] {
  const cfg = createDefaultChunkingConfig(config);
  return runChunker(text, cfg).candidates.map((candidate) => candidate.content);
}

/**
 * Chunk text and describe every chunk with its position, size and overlap.
 */
export function chunkDocument(
  text: string,
  config?: ChunkingConfigInput
): ChunkingResult {
  const startTime = performance.now();
  const cfg = createDefaultChunkingConfig(config);
  const run = runChunker(text, cfg);

  const chunks: TextChunk[] = run.candidates.map((candidate, index) => ({
    chunkIndex: index,
    totalChunks: run.candidates.length,
    content: candidate.content,
    charCount: candidate.content.length,
    wordCount: countWords(candidate.content),
    overlapWords: candidate.overlapWords,
  }));

  const sizes = chunks.map((chunk) => chunk.charCount);

  const result: ChunkingResult = {
    chunks,
    totalChunks: chunks.length,
    stats: {
      originalCharCount: text.length,
      sentenceCount: run.sentenceCount,
      avgChunkCharCount:
        sizes.length > 0 ? sizes.reduce((a, b) => a + b, 0) / sizes.length : 0,
      minChunkCharCount: sizes.length > 0 ? Math.min(...sizes) : 0,
      maxChunkCharCount: sizes.length > 0 ? Math.max(...sizes) : 0,
      oversizedSentences: run.oversizedSentences,
      mergedTrailingRemnant: run.mergedTrailingRemnant,
      durationMs: performance.now() - startTime,
    },
    config: { maxSize: cfg.maxSize, overlap: cfg.overlap, minSize: cfg.minSize },
  };

  return ChunkingResultSchema.parse(result);
}

// =============================================================================
// Internal Functions
// =============================================================================

export function splitSentences(text: string): string[] {
  return text.split(SENTENCE_BOUNDARY);
}

function runChunker(text: string, config: ChunkingConfig): ChunkRun {
  const sentences = splitSentences(text);
  const carryWords = overlapWordCount(config.overlap);

  const candidates: ChunkCandidate[] = [];
  let current = '';
  let currentOverlap = 0;
  let oversizedSentences = 0;
  let mergedTrailingRemnant = false;

  for (const sentence of sentences) {
    const piece = `${sentence} `;

    if (piece.length > config.maxSize) {
      let content = piece.trim();
      const pending = current.trim();
      if (pending.length >= config.minSize) {
        candidates.push({ content: pending, overlapWords: currentOverlap });
      } else if (pending && !mergeIntoPrevious(candidates, pending, currentOverlap)) {
        content = `${pending} ${content}`;
      }
      candidates.push({ content, overlapWords: 0 });
      current = '';
      currentOverlap = 0;
      oversizedSentences++;
      continue;
    }

    if (current.length > 0 && current.length + piece.length > config.maxSize) {
      const closed = current.trim();
      if (closed.length >= config.minSize) {
        candidates.push({ content: closed, overlapWords: currentOverlap });
      } else if (!mergeIntoPrevious(candidates, closed, currentOverlap)) {
        // Nothing to merge into yet: the short opening stays with the next sentence
        current += piece;
        continue;
      }

      const carried = carryWords > 0 ? splitWords(closed).slice(-carryWords) : [];
      current = carried.length > 0 ? `${carried.join(' ')} ${piece}` : piece;
      currentOverlap = carried.length;
    } else {
      current += piece;
    }
  }

  const remnant = current.trim();
  if (remnant) {
    if (remnant.length < config.minSize && mergeIntoPrevious(candidates, remnant, currentOverlap)) {
      mergedTrailingRemnant = true;
    } else {
      candidates.push({ content: remnant, overlapWords: currentOverlap });
    }
  }

  if (candidates.length === 0) {
    candidates.push({ content: text, overlapWords: 0 });
  }

  return {
    candidates: candidates.filter((candidate) => candidate.content.trim().length > 0),
    sentenceCount: sentences.filter((sentence) => sentence.trim().length > 0).length,
    oversizedSentences,
    mergedTrailingRemnant,
  };
}

/**
 * Append `content` minus its `overlapWords` carried words, which already end
 * the previous chunk. False when there is no previous chunk.
 */
function mergeIntoPrevious(
  candidates: ChunkCandidate[],
  content: string,
  overlapWords: number
): boolean {
  const previous = candidates[candidates.length - 1];
  if (!previous) {
    return false;
  }
  const tail = splitWords(content).slice(overlapWords).join(' ');
  if (tail) {
    previous.content = `${previous.content} ${tail}`;
  }
  return true;
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}
