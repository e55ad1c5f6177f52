/**
 * Retriever
 *
 * Semantic search over the knowledge base, and the one-off load that fills
 * the vector store from the prepared JSON file.
 *
 * @example
 * ```typescript
 * const retriever = new Retriever({ embedder, store, logger });
 * await retriever.load();
 *
 * const documents = await retriever.search('Siapa Bujang Ganong?', { language: 'id' });
 * for (const doc of documents) {
 *   console.log(doc.metadata.title, doc.score.toFixed(3));
 * }
 * ```
 */

import { type TextEmbedder, EmbeddingError, EmbeddingErrorCode } from '../embeddings/index.js';
import {
  readKnowledgeBase,
  KnowledgeBaseError,
} from '../knowledge-base/index.js';
import { type Logger, createSilentLogger } from '../logging/index.js';
import {
  type VectorStore,
  type VectorRecord,
  type StoredDocument,
  type MetadataFilter,
  VectorStoreError,
} from '../vector-store/index.js';
import {
  type RetrieverConfig,
  type RetrieverConfigInput,
  type SearchOptions,
  type RetrievedDocument,
  type LoadOptions,
  type LoadResult,
  type CollectionStats,
  RetrieverConfigSchema,
  distanceToScore,
} from './types.js';

export interface RetrieverDependencies {
  embedder: TextEmbedder;
  store: VectorStore;
  logger?: Logger;
}

export class Retriever {
  private readonly embedder: TextEmbedder;
  private readonly store: VectorStore;
  private readonly logger: Logger;
  private readonly config: RetrieverConfig;
  /** Tail of the queue that serializes `load` calls */
  private loadQueue: Promise<void> = Promise.resolve();

  constructor(deps: RetrieverDependencies, config?: RetrieverConfigInput) {
    this.embedder = deps.embedder;
    this.store = deps.store;
    this.logger = deps.logger ?? createSilentLogger();
    this.config = RetrieverConfigSchema.parse(config ?? {});
  }

  // ===========================================================================
  // Search
  // ===========================================================================

  /**
   * Nearest documents to `query`, closest first, keeping only those whose
   * score reaches the threshold. Embedding and store failures are logged and
   * yield an empty list.
   */
  async search(query: string, options?: SearchOptions): Promise<RetrievedDocument[]> {
    const topK = options?.topK ?? this.config.topK;
    const where: MetadataFilter = {};
    if (options?.language) {
      where.language = options.language;
    }
    if (options?.category) {
      where.category = options.category;
    }

    let documents: RetrievedDocument[];
    try {
      const vector = await this.embedder.embed(query);
      const matches = await this.store.query(vector, topK, where);
      documents = matches
        .map((match) => ({ ...match, score: distanceToScore(match.distance) }))
        .filter((doc) => doc.score >= this.config.scoreThreshold);
    } catch (error) {
      if (error instanceof EmbeddingError || error instanceof VectorStoreError) {
        this.logger.error('Search failed', error, { code: error.code });
        return [];
      }
      throw error;
    }

    this.logger.info('Search completed', {
      query: query.length > 50 ? `${query.slice(0, 50)}...` : query,
      results: documents.length,
    });
    return documents;
  }

  // ===========================================================================
  // Load
  // ===========================================================================

  /**
   * Fill the store from the knowledge-base file. A populated store is left
   * alone unless `forceReload` is set. Calls run one at a time in call order.
   * Knowledge-base, embedding and store failures resolve with `error` set.
   */
  load(options?: LoadOptions): Promise<LoadResult> {
    const run = this.loadQueue.then(() => this.runLoad(options?.forceReload ?? false));
    this.loadQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runLoad(forceReload: boolean): Promise<LoadResult> {
    const startTime = Date.now();
    try {
      return await this.fillStore(forceReload, startTime);
    } catch (error) {
      if (error instanceof KnowledgeBaseError) {
        this.logger.error('Cannot load knowledge base', error, {
          file: this.config.knowledgeBaseFile,
        });
      } else if (error instanceof EmbeddingError || error instanceof VectorStoreError) {
        this.logger.error('Knowledge base load failed', error, { code: error.code });
      } else {
        throw error;
      }
      return { loaded: 0, skipped: false, durationMs: Date.now() - startTime, error: error.message };
    }
  }

  private async fillStore(forceReload: boolean, startTime: number): Promise<LoadResult> {
    const existing = await this.store.count();

    if (existing > 0 && !forceReload) {
      this.logger.info('Knowledge base already loaded', { documents: existing });
      return { loaded: 0, skipped: true, durationMs: Date.now() - startTime };
    }

    if (existing > 0) {
      this.logger.warn('Force reload: deleting existing collection', { documents: existing });
      await this.store.deleteCollection();
    }
    await this.store.createCollection();

    const { documents } = await readKnowledgeBase(this.config.knowledgeBaseFile);

    this.logger.info('Generating embeddings', { documents: documents.length });
    const vectors = await this.embedder.embedBatch(documents.map((doc) => doc.content));
    if (vectors.length !== documents.length) {
      throw new EmbeddingError(
        `Expected ${documents.length} embeddings, got ${vectors.length}`,
        EmbeddingErrorCode.COMPUTATION_ERROR
      );
    }

    const records: VectorRecord[] = documents.map((doc, index) => ({
      id: doc.id,
      vector: vectors[index] ?? [],
      content: doc.content,
      metadata: {
        title: doc.title,
        category: doc.category,
        language: doc.language,
        keywords: doc.keywords.join(','),
        wordCount: doc.metadata.wordCount,
        sourceFile: doc.metadata.sourceFile,
      },
    }));

    const batchSize = this.config.insertBatchSize;
    for (let i = 0; i < records.length; i += batchSize) {
      const batch = records.slice(i, i + batchSize);
      await this.store.add(batch);
      this.logger.debug('Added batch', {
        batch: Math.floor(i / batchSize) + 1,
        inserted: i + batch.length,
        total: records.length,
      });
    }

    const durationMs = Date.now() - startTime;
    this.logger.info('Knowledge base loaded', { documents: records.length, durationMs });
    return { loaded: records.length, skipped: false, durationMs };
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  /**
   * Document count plus the categories and languages seen in a sample
   */
  async getCollectionStats(): Promise<CollectionStats> {
    const totalDocuments = await this.store.count();
    const base = {
      totalDocuments,
      collectionName: this.store.collectionName,
      embeddingModel: this.embedder.getModel(),
    };

    if (totalDocuments === 0) {
      return { ...base, categories: [], languages: [] };
    }

    const sample = await this.store.peek(Math.min(totalDocuments, this.config.statsSampleSize));
    return {
      ...base,
      categories: distinctSorted(sample.map((doc) => doc.metadata.category)),
      languages: distinctSorted(sample.map((doc) => doc.metadata.language)),
    };
  }

  async getDocumentById(id: string): Promise<StoredDocument | null> {
    const [document] = await this.store.get([id]);
    return document ?? null;
  }

  getConfig(): Readonly<RetrieverConfig> {
    return { ...this.config };
  }
}

function distinctSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}
