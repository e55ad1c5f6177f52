/**
 * Vector Store Types
 *
 * The storage contract the retriever talks to, plus the payload stored with
 * every knowledge-base chunk.
 */

import { z } from 'zod';

// =============================================================================
// Payload
// =============================================================================

/**
 * Metadata stored beside each vector. Keywords are comma-joined so every
 * field stays a scalar.
 */
export const DocumentPayloadSchema = z.object({
  title: z.string(),
  category: z.string(),
  language: z.string(),
  keywords: z.string(),
  wordCount: z.number().int().nonnegative(),
  sourceFile: z.string(),
});

export type DocumentPayload = z.infer<typeof DocumentPayloadSchema>;

export interface VectorRecord {
  /** Knowledge-base id, e.g. `doc_0042` */
  id: string;
  vector: number[];
  content: string;
  metadata: DocumentPayload;
}

export interface StoredDocument {
  id: string;
  content: string;
  metadata: DocumentPayload;
}

export interface QueryMatch extends StoredDocument {
  /** Euclidean distance to the query vector; smaller is closer */
  distance: number;
}

/**
 * Exact-match conditions on payload fields, combined with AND
 */
export type MetadataFilter = Partial<Pick<DocumentPayload, 'language' | 'category'>>;

// =============================================================================
// Store Contract
// =============================================================================

export interface VectorStore {
  readonly collectionName: string;

  add(records: VectorRecord[]): Promise<void>;

  /**
   * Up to `k` nearest records by ascending distance
   */
  query(vector: number[], k: number, where?: MetadataFilter): Promise<QueryMatch[]>;

  /**
   * Records for the given ids; unknown ids are skipped
   */
  get(ids: string[]): Promise<StoredDocument[]>;

  /**
   * The first `limit` records in storage order
   */
  peek(limit: number): Promise<StoredDocument[]>;

  /**
   * Number of records; 0 when the collection does not exist
   */
  count(): Promise<number>;

  deleteCollection(): Promise<void>;

  /**
   * Create the collection when it is missing
   */
  createCollection(): Promise<void>;
}

// =============================================================================
// Error Types
// =============================================================================

export const VectorStoreErrorCode = {
  /** Failed to connect to the store */
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  /** Collection does not exist */
  COLLECTION_NOT_FOUND: 'COLLECTION_NOT_FOUND',
  /** Vector length differs from the collection's */
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  /** Stored payload does not match DocumentPayloadSchema */
  INVALID_PAYLOAD: 'INVALID_PAYLOAD',
  /** Document id cannot be mapped to a point id */
  INVALID_ID: 'INVALID_ID',
  /** Operation timed out */
  TIMEOUT: 'TIMEOUT',
  /** Unknown error */
  UNKNOWN: 'UNKNOWN',
} as const;

export type VectorStoreErrorCode = (typeof VectorStoreErrorCode)[keyof typeof VectorStoreErrorCode];

export class VectorStoreError extends Error {
  readonly code: VectorStoreErrorCode;
  readonly cause: Error | undefined;

  constructor(message: string, code: VectorStoreErrorCode, options?: { cause?: Error }) {
    super(message);
    this.name = 'VectorStoreError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VectorStoreError);
    }
  }

  /**
   * Wrap a client error, guessing the code from its message
   */
  static fromError(error: unknown, context: string): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;
    const lower = message.toLowerCase();

    let code: VectorStoreErrorCode = VectorStoreErrorCode.UNKNOWN;
    if (lower.includes('timeout')) {
      code = VectorStoreErrorCode.TIMEOUT;
    } else if (lower.includes('connection') || message.includes('ECONNREFUSED')) {
      code = VectorStoreErrorCode.CONNECTION_ERROR;
    } else if (lower.includes('collection') && lower.includes('not found')) {
      code = VectorStoreErrorCode.COLLECTION_NOT_FOUND;
    } else if (lower.includes('dimension')) {
      code = VectorStoreErrorCode.DIMENSION_MISMATCH;
    }

    return new VectorStoreError(`${context}: ${message}`, code, { cause });
  }
}

export function isVectorStoreError(error: unknown): error is VectorStoreError {
  return error instanceof VectorStoreError;
}

// =============================================================================
// Utility Functions
// =============================================================================

export function matchesFilter(metadata: DocumentPayload, where?: MetadataFilter): boolean {
  if (!where) {
    return true;
  }
  if (where.language !== undefined && metadata.language !== where.language) {
    return false;
  }
  if (where.category !== undefined && metadata.category !== where.category) {
    return false;
  }
  return true;
}
