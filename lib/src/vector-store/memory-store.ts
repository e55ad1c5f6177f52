/**
 * In-Memory Vector Store
 *
 * Brute-force L2 search over records held in a Map. Used by tests and by
 * offline runs that have no Qdrant instance.
 */

import { euclideanDistance } from '../embeddings/index.js';
import {
  type VectorStore,
  type VectorRecord,
  type StoredDocument,
  type QueryMatch,
  type MetadataFilter,
  VectorStoreError,
  VectorStoreErrorCode,
  matchesFilter,
} from './types.js';

export class InMemoryVectorStore implements VectorStore {
  readonly collectionName: string;
  private records = new Map<string, VectorRecord>();
  private dimensions: number | null = null;

  constructor(collectionName = 'reog_knowledge') {
    this.collectionName = collectionName;
  }

  async add(records: VectorRecord[]): Promise<void> {
    for (const record of records) {
      if (this.dimensions === null) {
        this.dimensions = record.vector.length;
      } else if (record.vector.length !== this.dimensions) {
        throw new VectorStoreError(
          `Vector dimension mismatch: expected ${this.dimensions}, got ${record.vector.length}`,
          VectorStoreErrorCode.DIMENSION_MISMATCH
        );
      }
      this.records.set(record.id, { ...record, vector: [...record.vector] });
    }
  }

  async query(vector: number[], k: number, where?: MetadataFilter): Promise<QueryMatch[]> {
    const scored: QueryMatch[] = [];
    for (const record of this.records.values()) {
      if (!matchesFilter(record.metadata, where)) {
        continue;
      }
      scored.push({
        id: record.id,
        content: record.content,
        metadata: record.metadata,
        distance: euclideanDistance(vector, record.vector),
      });
    }

    // Array.prototype.sort is stable: equal distances keep insertion order
    return scored.sort((a, b) => a.distance - b.distance).slice(0, k);
  }

  async get(ids: string[]): Promise<StoredDocument[]> {
    const found: StoredDocument[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) {
        found.push(toStoredDocument(record));
      }
    }
    return found;
  }

  async peek(limit: number): Promise<StoredDocument[]> {
    return [...this.records.values()].slice(0, limit).map(toStoredDocument);
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async deleteCollection(): Promise<void> {
    this.records = new Map();
    this.dimensions = null;
  }

  async createCollection(): Promise<void> {
    // records map always exists
  }
}

function toStoredDocument(record: VectorRecord): StoredDocument {
  return { id: record.id, content: record.content, metadata: record.metadata };
}
