/**
 * Knowledge Base Types
 *
 * Schemas for the prepared knowledge-base file: one document per chunk of a
 * raw `.txt` source, plus corpus-level statistics.
 */

import { z } from 'zod';

// =============================================================================
// Languages & Categories
// =============================================================================

export const Language = {
  INDONESIAN: 'id',
  ENGLISH: 'en',
} as const;

export type Language = (typeof Language)[keyof typeof Language];

export const LanguageSchema = z.enum(['id', 'en']);

export const SUPPORTED_LANGUAGES: readonly Language[] = [Language.INDONESIAN, Language.ENGLISH];

/**
 * Raw-data directory names and their display labels, in processing order
 */
export const CATEGORY_LABELS = {
  sejarah: 'History',
  filosofi: 'Philosophy',
  tokoh: 'Characters',
  kostum: 'Costumes',
  tarian: 'Dance',
  festival: 'Festivals',
  umkm: 'Local Products',
  faq: 'FAQ',
} as const;

export type Category = keyof typeof CATEGORY_LABELS;

export const CategorySchema = z.enum([
  'sejarah',
  'filosofi',
  'tokoh',
  'kostum',
  'tarian',
  'festival',
  'umkm',
  'faq',
]);

export const CATEGORIES: readonly Category[] = CategorySchema.options;

// =============================================================================
// Documents
// =============================================================================

export const DOCUMENT_ID_PATTERN = /^doc_\d{4,}$/;

export const DocumentMetadataSchema = z.object({
  sourceFile: z.string(),
  /** Position of this chunk within its source file, from 0 */
  chunkIndex: z.number().int().nonnegative(),
  totalChunks: z.number().int().positive(),
  wordCount: z.number().int().nonnegative(),
  charCount: z.number().int().nonnegative(),
});

export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>;

export const KnowledgeDocumentSchema = z.object({
  /** `doc_NNNN`, assigned in processing order */
  id: z.string().regex(DOCUMENT_ID_PATTERN),
  category: CategorySchema,
  title: z.string().min(1),
  language: LanguageSchema,
  content: z.string().min(1),
  keywords: z.array(z.string()),
  metadata: DocumentMetadataSchema,
});

export type KnowledgeDocument = z.infer<typeof KnowledgeDocumentSchema>;

export const KnowledgeBaseSchema = z.object({
  metadata: z.object({
    totalDocuments: z.number().int().nonnegative(),
    categories: z.array(CategorySchema),
    languages: z.array(LanguageSchema),
    statistics: z.object({
      byCategory: z.record(z.string(), z.number().int().nonnegative()),
      byLanguage: z.record(z.string(), z.number().int().nonnegative()),
    }),
  }),
  documents: z.array(KnowledgeDocumentSchema),
});

export type KnowledgeBase = z.infer<typeof KnowledgeBaseSchema>;

// =============================================================================
// Validation Report
// =============================================================================

export interface ValidationReport {
  valid: boolean;
  issues: string[];
}

// =============================================================================
// Error Types
// =============================================================================

export const KnowledgeBaseErrorCode = {
  /** Knowledge-base file does not exist */
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  /** File is not valid JSON or does not match KnowledgeBaseSchema */
  INVALID_FORMAT: 'INVALID_FORMAT',
  /** Raw data directory does not exist */
  RAW_DIR_NOT_FOUND: 'RAW_DIR_NOT_FOUND',
  /** Nothing to save */
  EMPTY: 'EMPTY',
} as const;

export type KnowledgeBaseErrorCode =
  (typeof KnowledgeBaseErrorCode)[keyof typeof KnowledgeBaseErrorCode];

export class KnowledgeBaseError extends Error {
  readonly code: KnowledgeBaseErrorCode;
  readonly cause: Error | undefined;

  constructor(message: string, code: KnowledgeBaseErrorCode, options?: { cause?: Error }) {
    super(message);
    this.name = 'KnowledgeBaseError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, KnowledgeBaseError);
    }
  }
}

export function isKnowledgeBaseError(error: unknown): error is KnowledgeBaseError {
  return error instanceof KnowledgeBaseError;
}
