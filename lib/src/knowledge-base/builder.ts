/**
 * Knowledge Base Builder
 *
 * Turns the raw article tree into knowledge-base documents:
 *
 * ```
 * data/raw/<category>/id/*.txt
 * data/raw/<category>/en/*.txt
 * ```
 *
 * Categories are visited in `CATEGORY_LABELS` order and, within each, the
 * Indonesian files before the English ones, each set sorted by name. Every
 * file is cleaned, chunked and given a title from its name; document ids
 * are assigned in that order.
 *
 * @example
 * ```typescript
 * const builder = new KnowledgeBaseBuilder({ rawDataDir: 'data/raw' }, { logger });
 * const knowledgeBase = await builder.build();
 * const report = builder.validate(knowledgeBase);
 * await writeKnowledgeBase('data/processed/knowledge_base.json', knowledgeBase);
 * ```
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import {
  ChunkingConfigSchema,
  chunkDocument,
  cleanText,
  extractKeywords,
  titleFromFileName,
} from '../chunking/index.js';
import { type Logger, createSilentLogger } from '../logging/index.js';
import {
  type Category,
  type KnowledgeBase,
  type KnowledgeDocument,
  type ValidationReport,
  CATEGORIES,
  CATEGORY_LABELS,
  SUPPORTED_LANGUAGES,
  Language,
  KnowledgeBaseError,
  KnowledgeBaseErrorCode,
} from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export const BuilderConfigSchema = z.object({
  rawDataDir: z.string().min(1).default('data/raw'),
  chunking: ChunkingConfigSchema.default({}),
  /** Below this many documents the corpus is reported as thin */
  minTotalDocuments: z.number().int().nonnegative().default(30),
  /** Below this many documents per language the corpus is reported as thin */
  minDocumentsPerLanguage: z.number().int().nonnegative().default(20),
});

export type BuilderConfig = z.infer<typeof BuilderConfigSchema>;
export type BuilderConfigInput = z.input<typeof BuilderConfigSchema>;

// =============================================================================
// KnowledgeBaseBuilder Class
// =============================================================================

export class KnowledgeBaseBuilder {
  private readonly config: BuilderConfig;
  private readonly logger: Logger;
  private documents: KnowledgeDocument[] = [];

  constructor(config?: BuilderConfigInput, deps?: { logger?: Logger }) {
    this.config = BuilderConfigSchema.parse(config ?? {});
    this.logger = deps?.logger ?? createSilentLogger();
  }

  /**
   * Process the whole raw tree and return the assembled knowledge base.
   * Ids restart at `doc_0001` on every call.
   *
   * @throws {KnowledgeBaseError} `RAW_DIR_NOT_FOUND`
   */
  async build(): Promise<KnowledgeBase> {
    this.documents = [];

    if (!(await isDirectory(this.config.rawDataDir))) {
      throw new KnowledgeBaseError(
        `Raw data directory not found: ${this.config.rawDataDir}`,
        KnowledgeBaseErrorCode.RAW_DIR_NOT_FOUND
      );
    }

    for (const category of CATEGORIES) {
      await this.processCategory(category);
    }

    return summarize(this.documents);
  }

  /**
   * Check corpus size, bilingual coverage and chunk length. Issues are
   * logged as warnings.
   */
  validate(knowledgeBase: KnowledgeBase): ValidationReport {
    const { documents } = knowledgeBase;
    const issues: string[] = [];

    if (documents.length < this.config.minTotalDocuments) {
      issues.push(
        `Only ${documents.length} documents (expected at least ${this.config.minTotalDocuments})`
      );
    }

    const indonesian = documents.filter((d) => d.language === Language.INDONESIAN).length;
    const english = documents.filter((d) => d.language === Language.ENGLISH).length;
    if (indonesian < this.config.minDocumentsPerLanguage) {
      issues.push(`Only ${indonesian} Indonesian documents`);
    }
    if (english < this.config.minDocumentsPerLanguage) {
      issues.push(`Only ${english} English documents`);
    }

    const short = documents.filter((d) => d.content.length < this.config.chunking.minSize);
    if (short.length > 0) {
      issues.push(`${short.length} documents shorter than ${this.config.chunking.minSize} characters`);
      for (const doc of short.slice(0, 5)) {
        this.logger.warn('Short document', {
          id: doc.id,
          length: doc.content.length,
          sourceFile: doc.metadata.sourceFile,
        });
      }
    }

    for (const issue of issues) {
      this.logger.warn(issue);
    }
    if (issues.length === 0) {
      this.logger.info('Knowledge base looks good', { documents: documents.length });
    }

    return { valid: issues.length === 0, issues };
  }

  // ===========================================================================
  // Processing
  // ===========================================================================

  private async processCategory(category: Category): Promise<void> {
    const categoryPath = join(this.config.rawDataDir, category);
    if (!(await isDirectory(categoryPath))) {
      this.logger.warn('Category directory not found', { path: categoryPath });
      return;
    }

    this.logger.info(`Processing category: ${CATEGORY_LABELS[category]}`);

    for (const language of SUPPORTED_LANGUAGES) {
      const languagePath = join(categoryPath, language);
      if (!(await isDirectory(languagePath))) {
        this.logger.warn('Language directory not found', { path: languagePath });
        continue;
      }

      const files = (await readdir(languagePath)).filter((name) => name.endsWith('.txt')).sort();
      this.logger.debug('Found source files', { category, language, files: files.length });

      for (const fileName of files) {
        await this.processFile(join(languagePath, fileName), fileName, category, language);
      }
    }
  }

  private async processFile(
    filePath: string,
    fileName: string,
    category: Category,
    language: Language
  ): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      this.logger.error('Failed to read source file', error instanceof Error ? error : undefined, {
        path: filePath,
      });
      return;
    }

    if (raw.trim().length === 0) {
      this.logger.warn('Empty file', { path: filePath });
      return;
    }

    const { chunks } = chunkDocument(cleanText(raw), this.config.chunking);
    const title = titleFromFileName(fileName);

    const kept = chunks.filter((chunk) => {
      if (chunk.charCount >= this.config.chunking.minSize) {
        return true;
      }
      this.logger.warn('Chunk too short, skipped', {
        sourceFile: fileName,
        chunkIndex: chunk.chunkIndex,
        length: chunk.charCount,
      });
      return false;
    });

    // Positions count only the chunks that become documents
    kept.forEach((chunk, index) => {
      this.documents.push({
        id: formatDocumentId(this.documents.length + 1),
        category,
        title: kept.length > 1 ? `${title} - Part ${index + 1}` : title,
        language,
        content: chunk.content,
        keywords: extractKeywords(chunk.content),
        metadata: {
          sourceFile: fileName,
          chunkIndex: index,
          totalChunks: kept.length,
          wordCount: chunk.wordCount,
          charCount: chunk.charCount,
        },
      });
    });

    this.logger.info('Processed file', { sourceFile: fileName, chunks: kept.length });
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * 7 → `doc_0007`
 */
export function formatDocumentId(sequence: number): string {
  return `doc_${String(sequence).padStart(4, '0')}`;
}

/**
 * Wrap documents with counts per category and language. Category and
 * language lists keep first-seen order.
 */
export function summarize(documents: KnowledgeDocument[]): KnowledgeBase {
  const byCategory: Record<string, number> = {};
  const byLanguage: Record<string, number> = {};
  const categories: Category[] = [];
  const languages: Language[] = [];

  for (const doc of documents) {
    if (byCategory[doc.category] === undefined) {
      categories.push(doc.category);
    }
    if (byLanguage[doc.language] === undefined) {
      languages.push(doc.language);
    }
    byCategory[doc.category] = (byCategory[doc.category] ?? 0) + 1;
    byLanguage[doc.language] = (byLanguage[doc.language] ?? 0) + 1;
  }

  return {
    metadata: {
      totalDocuments: documents.length,
      categories,
      languages,
      statistics: { byCategory, byLanguage },
    },
    documents,
  };
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
