/**
 * Text cleanup and keyword extraction for knowledge-base articles.
 */

import { z } from 'zod';

import stopWordData from './stopwords.json' with { type: 'json' };

const StopWordFileSchema = z.object({
  id: z.array(z.string()),
  en: z.array(z.string()),
});

const STOP_WORDS: ReadonlySet<string> = (() => {
  const parsed = StopWordFileSchema.parse(stopWordData);
  return new Set([...parsed.id, ...parsed.en]);
})();

/** Letters, digits, underscore, whitespace and basic punctuation survive cleaning */
const DISALLOWED_CHARS = /[^\p{L}\p{N}_\s.,!?\-—:;'"]/gu;

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Collapse whitespace, straighten curly quotes and drop symbols.
 *
 * @example
 * cleanText('  “Reog”   adalah\n kesenian ★ ') // '"Reog" adalah kesenian'
 */
export function cleanText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(DISALLOWED_CHARS, '')
    .trim();
}

/**
 * Most frequent content words (longer than 3 characters, not a stop word).
 * Ties keep first-seen order.
 */
export function extractKeywords(text: string, topN = 5): string[] {
  const frequencies = new Map<string, number>();

  for (const word of text.toLowerCase().match(WORD_PATTERN) ?? []) {
    if (word.length <= 3 || STOP_WORDS.has(word)) {
      continue;
    }
    frequencies.set(word, (frequencies.get(word) ?? 0) + 1);
  }

  return [...frequencies.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, topN)
    .map(([word]) => word);
}

/**
 * Title from a source file name: `01_asal_usul_reog.txt` → `Asal Usul Reog`
 */
export function titleFromFileName(fileName: string): string {
  const stem = fileName.replace(/\.[^.]+$/, '');
  return toTitleCase(stem.replace(/^\d+_/, '').replace(/_/g, ' '));
}

export function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) =>
      `${boundary}${letter.toUpperCase()}`
    );
}
