/**
 * Qdrant Vector Store
 *
 * Stores knowledge-base chunks in a Qdrant collection with Euclidean
 * distance, so the score Qdrant returns for a search hit is the L2 distance
 * itself. Qdrant point ids must be integers or UUIDs; `doc_0042` is stored
 * as point 42 and the original id is kept in the payload.
 *
 * @example
 * ```typescript
 * const store = new QdrantVectorStore({ url: 'http://localhost:6333' });
 * await store.createCollection();
 * await store.add([{ id: 'doc_0001', vector, content, metadata }]);
 * const matches = await store.query(queryVector, 3, { language: 'id' });
 * ```
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';

import { type Logger, createSilentLogger } from '../logging/index.js';
import {
  type VectorStore,
  type VectorRecord,
  type StoredDocument,
  type QueryMatch,
  type MetadataFilter,
  DocumentPayloadSchema,
  VectorStoreError,
  VectorStoreErrorCode,
} from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export const QdrantStoreConfigSchema = z.object({
  url: z.string().url().default('http://localhost:6333'),
  apiKey: z.string().optional(),
  collectionName: z.string().min(1).default('reog_knowledge'),
  /** Request timeout in milliseconds */
  timeout: z.number().int().positive().default(30000),
  /** Vector size used when creating the collection */
  dimensions: z.number().int().positive().default(384),
});

export type QdrantStoreConfig = z.infer<typeof QdrantStoreConfigSchema>;
export type QdrantStoreConfigInput = z.input<typeof QdrantStoreConfigSchema>;

/** Payload fields that get a keyword index for filtered search */
const INDEXED_FIELDS = ['language', 'category'] as const;

const StoredPayloadSchema = DocumentPayloadSchema.extend({
  docId: z.string(),
  content: z.string(),
});

// =============================================================================
// QdrantVectorStore Class
// =============================================================================

export class QdrantVectorStore implements VectorStore {
  readonly collectionName: string;
  private readonly config: QdrantStoreConfig;
  private readonly client: QdrantClient;
  private readonly logger: Logger;

  constructor(config?: QdrantStoreConfigInput, deps?: { client?: QdrantClient; logger?: Logger }) {
    this.config = QdrantStoreConfigSchema.parse(config ?? {});
    this.collectionName = this.config.collectionName;
    this.logger = deps?.logger ?? createSilentLogger();
    this.client =
      deps?.client ??
      new QdrantClient({
        url: this.config.url,
        apiKey: this.config.apiKey,
        timeout: this.config.timeout,
      });
  }

  // ===========================================================================
  // Collection Management
  // ===========================================================================

  async createCollection(): Promise<void> {
    try {
      if (await this.exists()) {
        return;
      }

      await this.client.createCollection(this.collectionName, {
        vectors: { size: this.config.dimensions, distance: 'Euclid' },
      });
      for (const field of INDEXED_FIELDS) {
        await this.client.createPayloadIndex(this.collectionName, {
          field_name: field,
          field_schema: 'keyword',
          wait: true,
        });
      }
      this.logger.info('Created collection', {
        collection: this.collectionName,
        dimensions: this.config.dimensions,
      });
    } catch (error) {
      throw VectorStoreError.fromError(error, 'Create collection failed');
    }
  }

  async deleteCollection(): Promise<void> {
    try {
      if (!(await this.exists())) {
        return;
      }
      await this.client.deleteCollection(this.collectionName);
      this.logger.warn('Deleted collection', { collection: this.collectionName });
    } catch (error) {
      throw VectorStoreError.fromError(error, 'Delete collection failed');
    }
  }

  async count(): Promise<number> {
    try {
      if (!(await this.exists())) {
        return 0;
      }
      const result = await this.client.count(this.collectionName, { exact: true });
      return result.count;
    } catch (error) {
      throw VectorStoreError.fromError(error, 'Count failed');
    }
  }

  // ===========================================================================
  // Write Operations
  // ===========================================================================

  async add(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    for (const record of records) {
      if (record.vector.length !== this.config.dimensions) {
        throw new VectorStoreError(
          `Vector dimension mismatch for ${record.id}: expected ${this.config.dimensions}, got ${record.vector.length}`,
          VectorStoreErrorCode.DIMENSION_MISMATCH
        );
      }
    }

    const points = records.map((record) => ({
      id: toPointId(record.id),
      vector: record.vector,
      payload: { ...record.metadata, docId: record.id, content: record.content },
    }));

    try {
      await this.client.upsert(this.collectionName, { wait: true, points });
    } catch (error) {
      throw VectorStoreError.fromError(error, 'Upsert failed');
    }
  }

  // ===========================================================================
  // Read Operations
  // ===========================================================================

  async query(vector: number[], k: number, where?: MetadataFilter): Promise<QueryMatch[]> {
    const filter = buildFilter(where);

    let hits: Array<{ id: string | number; score: number; payload?: Record<string, unknown> | null }>;
    try {
      hits = await this.client.search(this.collectionName, {
        vector,
        limit: k,
        with_payload: true,
        ...(filter ? { filter } : {}),
      });
    } catch (error) {
      throw VectorStoreError.fromError(error, 'Search failed');
    }

    return hits.map((hit) => ({ ...parsePayload(hit.payload, hit.id), distance: hit.score }));
  }

  async get(ids: string[]): Promise<StoredDocument[]> {
    const pointIds = ids.filter(isDocumentId).map(toPointId);
    if (pointIds.length === 0) {
      return [];
    }

    let points: Array<{ id: string | number; payload?: Record<string, unknown> | null }>;
    try {
      points = await this.client.retrieve(this.collectionName, {
        ids: pointIds,
        with_payload: true,
        with_vector: false,
      });
    } catch (error) {
      throw VectorStoreError.fromError(error, 'Retrieve failed');
    }

    const byId = new Map(
      points.map((point) => {
        const document = parsePayload(point.payload, point.id);
        return [document.id, document] as const;
      })
    );
    return ids.flatMap((id) => {
      const document = byId.get(id);
      return document ? [document] : [];
    });
  }

  async peek(limit: number): Promise<StoredDocument[]> {
    try {
      if (!(await this.exists())) {
        return [];
      }
      const page = await this.client.scroll(this.collectionName, {
        limit,
        with_payload: true,
        with_vector: false,
      });
      return page.points.map((point) => parsePayload(point.payload, point.id));
    } catch (error) {
      throw VectorStoreError.fromError(error, 'Scroll failed');
    }
  }

  private async exists(): Promise<boolean> {
    const response = await this.client.collectionExists(this.collectionName);
    return response.exists;
  }
}

// =============================================================================
// Internal Functions
// =============================================================================

const DOCUMENT_ID_PATTERN = /^doc_(\d+)$/;

function isDocumentId(id: string): boolean {
  return DOCUMENT_ID_PATTERN.test(id);
}

/**
 * `doc_0042` → 42
 */
export function toPointId(id: string): number {
  const match = DOCUMENT_ID_PATTERN.exec(id);
  if (!match?.[1]) {
    throw new VectorStoreError(
      `Document id "${id}" does not match doc_NNNN`,
      VectorStoreErrorCode.INVALID_ID
    );
  }
  return Number.parseInt(match[1], 10);
}

function buildFilter(
  where?: MetadataFilter
): { must: Array<{ key: string; match: { value: string } }> } | undefined {
  const conditions: Array<{ key: string; match: { value: string } }> = [];

  if (where?.language !== undefined) {
    conditions.push({ key: 'language', match: { value: where.language } });
  }
  if (where?.category !== undefined) {
    conditions.push({ key: 'category', match: { value: where.category } });
  }

  return conditions.length > 0 ? { must: conditions } : undefined;
}

function parsePayload(
  payload: Record<string, unknown> | null | undefined,
  pointId: string | number
): StoredDocument {
  const parsed = StoredPayloadSchema.safeParse(payload ?? {});
  if (!parsed.success) {
    throw new VectorStoreError(
      `Point ${pointId} has an invalid payload: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      VectorStoreErrorCode.INVALID_PAYLOAD
    );
  }

  const { docId, content, ...metadata } = parsed.data;
  return { id: docId, content, metadata };
}
