/**
 * Normalizer Module
 *
 * Lexical clean-up of speech transcripts for the Reog Ponorogo domain.
 */

export {
  LexiconSchema,
  type Lexicon,
  NormalizerConfigSchema,
  type NormalizerConfig,
  DEFAULT_LEXICON,
  normalizeCase,
  removeUnwantedChars,
  applyDictionary,
  fuzzyReplace,
  capitalizeTerms,
  LexicalNormalizer,
  createNormalizer,
} from './normalizer.js';

export { similarityRatio, countMatchingCharacters, findClosestMatch } from './similarity.js';
