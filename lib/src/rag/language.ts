/**
 * Question Language Detection
 *
 * Counts common function words of each language among the question's words.
 * Short questions often carry none; ties, including 0-0, go to Indonesian.
 */

import { Language } from '../knowledge-base/index.js';

export const LANGUAGE_MARKERS: Record<Language, ReadonlySet<string>> = {
  id: new Set(['apa', 'yang', 'adalah', 'ini', 'itu', 'dengan', 'dari', 'ke', 'di', 'untuk']),
  en: new Set(['what', 'is', 'the', 'this', 'that', 'with', 'from', 'to', 'in', 'for']),
};

/**
 * Lowercased words of `text`; punctuation separates words.
 */
export function tokenizeWords(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter((word) => word.length > 0)
  );
}

function countMarkers(words: Set<string>, markers: ReadonlySet<string>): number {
  let count = 0;
  for (const marker of markers) {
    if (words.has(marker)) {
      count++;
    }
  }
  return count;
}

/**
 * @example
 * ```typescript
 * detectLanguage('What is Reog?');       // 'en'
 * detectLanguage('Apa itu Dadak Merak?'); // 'id'
 * detectLanguage('Reog');                // 'id'
 * ```
 */
export function detectLanguage(text: string): Language {
  const words = tokenizeWords(text);
  const indonesian = countMarkers(words, LANGUAGE_MARKERS.id);
  const english = countMarkers(words, LANGUAGE_MARKERS.en);

  return english > indonesian ? Language.ENGLISH : Language.INDONESIAN;
}
