/**
 * Lexical Normalizer
 *
 * Repairs speech-recognition transcripts before they reach the pipeline.
 * Recognisers mis-hear the proper nouns of Reog Ponorogo ("riyadh ponderogo"),
 * so text goes through five stages in a fixed order:
 *
 * 1. case-fold to lowercase
 * 2. drop characters outside `[a-zA-Z0-9\s.,!?]`
 * 3. exact dictionary replacement of known mis-hearings
 * 4. fuzzy correction of single words against the canonical terms
 * 5. restore the canonical capitalisation of every term
 *
 * Each stage is exported on its own. Multi-word terms can only be repaired by
 * the dictionary; fuzzy correction sees one whitespace-delimited token at a time.
 *
 * @example
 * ```typescript
 * const normalizer = createNormalizer();
 * normalizer.normalize('Pertunjukan Reok Ponorogo sangat meriah!');
 * // 'pertunjukan Reog Ponorogo sangat meriah!'
 * ```
 */

import { z } from 'zod';

import { findClosestMatch } from './similarity.js';
import lexiconData from './terms.json' with { type: 'json' };

// =============================================================================
// Types
// =============================================================================

export const LexiconSchema = z.object({
  /** Ordered `[misheard, canonical]` pairs, applied first to last */
  replacements: z.array(z.tuple([z.string().min(1), z.string().min(1)])),
  /** Canonical spellings used for fuzzy matching and capitalisation */
  importantTerms: z.array(z.string().min(1)),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

export const NormalizerConfigSchema = z.object({
  /**
   * Minimum similarity ratio for a fuzzy replacement
   * @default 0.8
   */
  cutoff: z.number().min(0).max(1).default(0.8),
});

export type NormalizerConfig = z.infer<typeof NormalizerConfigSchema>;

export const DEFAULT_LEXICON: Lexicon = LexiconSchema.parse(lexiconData);

// =============================================================================
// Stages
// =============================================================================

export function normalizeCase(text: string): string {
  return text.toLowerCase();
}

export function removeUnwantedChars(text: string): string {
  return text.replace(/[^a-zA-Z0-9\s.,!?]/g, '');
}

/**
 * Replace each misheard phrase with its canonical form. An occurrence that
 * already sits inside the canonical form (`kediri` within `kerajaan kediri`)
 * is left alone so canonical text passes through unchanged.
 */
export function applyDictionary(
  text: string,
  replacements: Lexicon['replacements'] = DEFAULT_LEXICON.replacements
): string {
  let result = text;
  for (const [misheard, canonical] of replacements) {
    result = replaceOutsideCanonical(result, misheard, canonical);
  }
  return result;
}

/**
 * Swap each token for its closest canonical term when the similarity reaches
 * `cutoff`. Comparison ignores case and trailing punctuation, which is kept.
 * A token that already spells a word of some term is left alone, so
 * `singabarong` is not widened to `Raja Singabarong` a second time.
 * Tokens are re-joined with single spaces.
 */
export function fuzzyReplace(
  text: string,
  terms: readonly string[] = DEFAULT_LEXICON.importantTerms,
  cutoff = 0.8
): string {
  const knownWords = new Set(terms.flatMap((term) => term.toLowerCase().split(/\s+/)));

  return text
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token) => {
      const [, word = '', punctuation = ''] = /^(.*?)([.,!?]*)$/.exec(token) ?? [];
      if (!word || knownWords.has(word.toLowerCase())) {
        return token;
      }
      const match = findClosestMatch(word, terms, cutoff, { ignoreCase: true });
      return match ? `${match}${punctuation}` : token;
    })
    .join(' ');
}

export function capitalizeTerms(
  text: string,
  terms: readonly string[] = DEFAULT_LEXICON.importantTerms
): string {
  let result = text;
  for (const term of terms) {
    result = result.replace(new RegExp(escapeRegExp(term.toLowerCase()), 'gi'), term);
  }
  return result;
}

// =============================================================================
// Normalizer
// =============================================================================

export class LexicalNormalizer {
  private readonly config: NormalizerConfig;
  private readonly lexicon: Lexicon;

  constructor(config?: Partial<NormalizerConfig>, lexicon: Lexicon = DEFAULT_LEXICON) {
    this.config = NormalizerConfigSchema.parse(config ?? {});
    this.lexicon = lexicon;
  }

  normalize(text: string): string {
    const lowered = normalizeCase(text);
    const cleaned = removeUnwantedChars(lowered);
    const replaced = applyDictionary(cleaned, this.lexicon.replacements);
    const corrected = fuzzyReplace(replaced, this.lexicon.importantTerms, this.config.cutoff);
    return capitalizeTerms(corrected, this.lexicon.importantTerms).trim();
  }

  getConfig(): Readonly<NormalizerConfig> {
    return { ...this.config };
  }
}

export function createNormalizer(
  config?: Partial<NormalizerConfig>,
  lexicon?: Lexicon
): LexicalNormalizer {
  return new LexicalNormalizer(config, lexicon);
}

// =============================================================================
// Internal Functions
// =============================================================================

function replaceOutsideCanonical(text: string, misheard: string, canonical: string): string {
  if (!text.includes(misheard)) {
    return text;
  }

  const canonicalLower = canonical.toLowerCase();
  const protectedSpans =
    canonicalLower === misheard.toLowerCase() ? [] : findSpans(text.toLowerCase(), canonicalLower);

  let output = '';
  let cursor = 0;
  let index = text.indexOf(misheard);

  while (index !== -1) {
    const end = index + misheard.length;
    const isProtected = protectedSpans.some((span) => index >= span.start && end <= span.end);
    if (!isProtected) {
      output += text.slice(cursor, index) + canonical;
      cursor = end;
    }
    index = text.indexOf(misheard, end);
  }

  return output + text.slice(cursor);
}

function findSpans(haystack: string, needle: string): Array<{ start: number; end: number }> {
  const spans: Array<{ start: number; end: number }> = [];
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    spans.push({ start: index, end: index + needle.length });
    index = haystack.indexOf(needle, index + 1);
  }
  return spans;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
