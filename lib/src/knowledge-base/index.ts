/**
 * Knowledge Base Module
 *
 * Preparation of the bilingual Reog Ponorogo corpus and its JSON file format.
 */

export {
  Language,
  LanguageSchema,
  SUPPORTED_LANGUAGES,
  CATEGORY_LABELS,
  type Category,
  CategorySchema,
  CATEGORIES,
  DOCUMENT_ID_PATTERN,
  DocumentMetadataSchema,
  type DocumentMetadata,
  KnowledgeDocumentSchema,
  type KnowledgeDocument,
  KnowledgeBaseSchema,
  type KnowledgeBase,
  type ValidationReport,
  KnowledgeBaseErrorCode,
  KnowledgeBaseError,
  isKnowledgeBaseError,
} from './types.js';

export {
  KnowledgeBaseBuilder,
  BuilderConfigSchema,
  type BuilderConfig,
  type BuilderConfigInput,
  formatDocumentId,
  summarize,
} from './builder.js';

export { readKnowledgeBase, writeKnowledgeBase } from './store.js';
