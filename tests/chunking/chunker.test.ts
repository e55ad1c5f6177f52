/**
 * Unit Tests for the Knowledge Base Chunker
 *
 * - chunkText() - greedy sentence packing with word overlap
 * - chunkDocument() - per-chunk metadata and statistics
 * - splitSentences() - terminal punctuation boundaries
 */

import { describe, it, expect } from 'vitest';
import {
  chunkText,
  chunkDocument,
  splitSentences,
  createDefaultChunkingConfig,
  type TextChunk,
} from '../../lib/src/chunking/index.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const S1 = 'Alpha beta gamma delta.';
const S2 = 'Epsilon zeta eta theta.';
const S3 = 'Iota kappa lambda mu.';
const THREE_SENTENCES = `${S1} ${S2} ${S3}`;

const LONG_MASK =
  'Barongan atau Dadak Merak dibuat dari kulit kepala harimau dan bulu merak asli yang dirangkai pada bingkai bambu dan rotan sehingga beratnya dapat mencapai lima puluh kilogram dan hanya ditopang oleh gigitan sang pembarong.';
const LONG_SHOW =
  'Pertunjukan lengkap biasanya dibuka oleh tari Warok yang gagah lalu disusul Jathilan Bujang Ganong dan Klono Sewandono sebelum Dadak Merak tampil di tengah arena diiringi kendang kempul terompet dan angklung yang riuh.';

/**
 * A long article of uniform sentences (about 2000 characters)
 */
function buildArticle(sentenceCount: number): string {
  return Array.from(
    { length: sentenceCount },
    (_, i) => `Kalimat nomor ${i + 1} menceritakan sejarah Reog Ponorogo dan para warok.`
  ).join(' ');
}

/**
 * Rebuild the source text by dropping each chunk's carried-over words
 */
function reassemble(chunks: TextChunk[]): string {
  return chunks
    .map((chunk) => chunk.content.split(' ').slice(chunk.overlapWords).join(' '))
    .join(' ');
}

// =============================================================================
// splitSentences
// =============================================================================

describe('splitSentences', () => {
  it('should split after terminal punctuation followed by whitespace', () => {
    expect(splitSentences('Apa itu Reog? Kesenian dari Ponorogo!  Sangat megah.')).toEqual([
      'Apa itu Reog?',
      'Kesenian dari Ponorogo!',
      'Sangat megah.',
    ]);
  });

  it('should not split on punctuation without following whitespace', () => {
    expect(splitSentences('Versi 2.5 dirilis.')).toEqual(['Versi 2.5 dirilis.']);
  });
});

// =============================================================================
// chunkText
// =============================================================================

describe('chunkText', () => {
  it('should return a short text as a single chunk', () => {
    expect(chunkText('Reog adalah kesenian. Berasal dari Ponorogo.')).toEqual([
      'Reog adalah kesenian. Berasal dari Ponorogo.',
    ]);
  });

  it('should seed the next chunk with the last overlap/5 words', () => {
    const chunks = chunkText(THREE_SENTENCES, { maxSize: 50, overlap: 10, minSize: 10 });

    expect(chunks).toEqual([
      'Alpha beta gamma delta. Epsilon zeta eta theta.',
      'eta theta. Iota kappa lambda mu.',
    ]);
  });

  it('should merge a short trailing remnant into the previous chunk', () => {
    const chunks = chunkText(THREE_SENTENCES, { maxSize: 50, overlap: 10, minSize: 40 });

    expect(chunks).toEqual([
      'Alpha beta gamma delta. Epsilon zeta eta theta. Iota kappa lambda mu.',
    ]);
  });

  it('should emit an oversized sentence as its own chunk', () => {
    const long = 'This sentence is definitely longer than thirty characters.';
    const chunks = chunkText(`Short one. ${long} End.`, {
      maxSize: 30,
      overlap: 0,
      minSize: 0,
    });

    expect(chunks).toEqual(['Short one.', long, 'End.']);
  });

  it('should prefix a short opening to the oversized sentence after it', () => {
    const text = `Pembuka singkat. ${LONG_MASK} ${LONG_SHOW}`;

    const chunks = chunkText(text, { maxSize: 200, overlap: 10, minSize: 60 });

    expect(chunks).toEqual([`Pembuka singkat. ${LONG_MASK}`, LONG_SHOW]);
    expect(chunks.join(' ')).toBe(text);
  });

  it('should merge a short buffer before an oversized sentence into the previous chunk', () => {
    const opening = 'Reog Ponorogo adalah kesenian rakyat Jawa Timur.';

    const chunks = chunkText(`${opening} Singkat. ${LONG_MASK}`, {
      maxSize: 55,
      overlap: 0,
      minSize: 20,
    });

    expect(chunks).toEqual([`${opening} Singkat.`, LONG_MASK]);
  });

  it('should carry no words when overlap is below five characters', () => {
    const chunks = chunkText(THREE_SENTENCES, { maxSize: 50, overlap: 4, minSize: 10 });

    expect(chunks).toEqual([
      'Alpha beta gamma delta. Epsilon zeta eta theta.',
      'Iota kappa lambda mu.',
    ]);
  });

  it('should return no chunks for empty or blank input', () => {
    expect(chunkText('')).toEqual([]);
    expect(chunkText('   ')).toEqual([]);
  });

  it('should reject minSize larger than maxSize', () => {
    expect(() => chunkText(THREE_SENTENCES, { maxSize: 50, minSize: 60 })).toThrow();
  });

  it('should be deterministic', () => {
    const article = buildArticle(30);

    expect(chunkText(article)).toEqual(chunkText(article));
  });
});

// =============================================================================
// chunkDocument
// =============================================================================

describe('chunkDocument', () => {
  it('should number chunks contiguously from zero', () => {
    const result = chunkDocument(buildArticle(30));

    expect(result.totalChunks).toBeGreaterThan(1);
    result.chunks.forEach((chunk, index) => {
      expect(chunk.chunkIndex).toBe(index);
      expect(chunk.totalChunks).toBe(result.totalChunks);
      expect(chunk.charCount).toBe(chunk.content.length);
    });
  });

  it('should keep every chunk within size bounds', () => {
    const config = createDefaultChunkingConfig();
    const result = chunkDocument(buildArticle(30));

    for (const chunk of result.chunks.slice(0, -1)) {
      expect(chunk.charCount).toBeLessThanOrEqual(config.maxSize);
    }
    for (const chunk of result.chunks) {
      expect(chunk.charCount).toBeGreaterThanOrEqual(config.minSize);
    }
  });

  it('should carry ten words into every chunk after the first', () => {
    const result = chunkDocument(buildArticle(30));

    expect(result.chunks[0]?.overlapWords).toBe(0);
    for (const chunk of result.chunks.slice(1)) {
      expect(chunk.overlapWords).toBe(10);
    }
  });

  it('should reconstruct the input once overlaps are removed', () => {
    const article = buildArticle(30);

    expect(reassemble(chunkDocument(article).chunks)).toBe(article);
  });

  it('should reconstruct the input after a trailing merge', () => {
    const result = chunkDocument(THREE_SENTENCES, { maxSize: 50, overlap: 10, minSize: 40 });

    expect(result.stats.mergedTrailingRemnant).toBe(true);
    expect(reassemble(result.chunks)).toBe(THREE_SENTENCES);
  });

  it('should keep every chunk above minSize around oversized sentences', () => {
    const text = `Pembuka singkat. ${LONG_MASK} ${LONG_SHOW}`;

    const result = chunkDocument(text, { maxSize: 200, overlap: 10, minSize: 60 });

    expect(result.chunks.map((chunk) => chunk.chunkIndex)).toEqual([0, 1]);
    expect(result.chunks.every((chunk) => chunk.charCount >= 60)).toBe(true);
    expect(result.stats.oversizedSentences).toBe(2);
    expect(reassemble(result.chunks)).toBe(text);
  });

  it('should report statistics', () => {
    const result = chunkDocument(THREE_SENTENCES, { maxSize: 50, overlap: 10, minSize: 10 });

    expect(result.stats.sentenceCount).toBe(3);
    expect(result.stats.originalCharCount).toBe(THREE_SENTENCES.length);
    expect(result.stats.minChunkCharCount).toBe(32);
    expect(result.stats.maxChunkCharCount).toBe(47);
    expect(result.stats.oversizedSentences).toBe(0);
    expect(result.config).toEqual({ maxSize: 50, overlap: 10, minSize: 10 });
  });
});
