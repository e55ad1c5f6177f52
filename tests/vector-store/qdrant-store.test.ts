/**
 * Unit Tests for QdrantVectorStore
 *
 * The Qdrant REST client is mocked; no server is contacted.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  QdrantVectorStore,
  VectorStoreError,
  VectorStoreErrorCode,
  toPointId,
  type DocumentPayload,
} from '../../lib/src/vector-store/index.js';

// =============================================================================
// Mock Setup
// =============================================================================

const mockClient = vi.hoisted(() => ({
  collectionExists: vi.fn(),
  createCollection: vi.fn(),
  createPayloadIndex: vi.fn(),
  deleteCollection: vi.fn(),
  count: vi.fn(),
  upsert: vi.fn(),
  search: vi.fn(),
  retrieve: vi.fn(),
  scroll: vi.fn(),
}));

vi.mock('@qdrant/js-client-rest', () => ({
  QdrantClient: vi.fn().mockImplementation(function () {
    return mockClient;
  }),
}));

const metadata: DocumentPayload = {
  title: 'Asal Usul Reog',
  category: 'sejarah',
  language: 'id',
  keywords: 'reog,ponorogo',
  wordCount: 120,
  sourceFile: '01_asal_usul_reog.txt',
};

function storedPayload(docId: string, content: string) {
  return { ...metadata, docId, content };
}

beforeEach(() => {
  vi.clearAllMocks();
  mockClient.collectionExists.mockResolvedValue({ exists: true });
});

// =============================================================================
// Point ids
// =============================================================================

describe('toPointId', () => {
  it('should map doc_NNNN to its number', () => {
    expect(toPointId('doc_0042')).toBe(42);
  });

  it('should reject other ids', () => {
    expect(() => toPointId('chunk-1')).toThrow(VectorStoreError);
  });
});

// =============================================================================
// Collection management
// =============================================================================

describe('QdrantVectorStore collections', () => {
  it('should create a Euclid collection with keyword indexes', async () => {
    mockClient.collectionExists.mockResolvedValue({ exists: false });
    const store = new QdrantVectorStore({ dimensions: 384 });

    await store.createCollection();

    expect(mockClient.createCollection).toHaveBeenCalledWith('reog_knowledge', {
      vectors: { size: 384, distance: 'Euclid' },
    });
    expect(mockClient.createPayloadIndex).toHaveBeenCalledTimes(2);
    expect(mockClient.createPayloadIndex).toHaveBeenCalledWith('reog_knowledge', {
      field_name: 'language',
      field_schema: 'keyword',
      wait: true,
    });
  });

  it('should not recreate an existing collection', async () => {
    const store = new QdrantVectorStore();

    await store.createCollection();

    expect(mockClient.createCollection).not.toHaveBeenCalled();
  });

  it('should count zero when the collection is missing', async () => {
    mockClient.collectionExists.mockResolvedValue({ exists: false });
    const store = new QdrantVectorStore();

    expect(await store.count()).toBe(0);
    expect(mockClient.count).not.toHaveBeenCalled();
  });

  it('should return the exact count', async () => {
    mockClient.count.mockResolvedValue({ count: 57 });
    const store = new QdrantVectorStore();

    expect(await store.count()).toBe(57);
    expect(mockClient.count).toHaveBeenCalledWith('reog_knowledge', { exact: true });
  });
});

// =============================================================================
// Writes
// =============================================================================

describe('QdrantVectorStore.add', () => {
  it('should upsert numeric points carrying the document id and content', async () => {
    const store = new QdrantVectorStore({ dimensions: 2 });

    await store.add([{ id: 'doc_0007', vector: [0.1, 0.2], content: 'Reog adalah...', metadata }]);

    expect(mockClient.upsert).toHaveBeenCalledWith('reog_knowledge', {
      wait: true,
      points: [{ id: 7, vector: [0.1, 0.2], payload: storedPayload('doc_0007', 'Reog adalah...') }],
    });
  });

  it('should reject vectors of the wrong size', async () => {
    const store = new QdrantVectorStore({ dimensions: 3 });

    await expect(
      store.add([{ id: 'doc_0001', vector: [1], content: 'x', metadata }])
    ).rejects.toMatchObject({ code: VectorStoreErrorCode.DIMENSION_MISMATCH });
    expect(mockClient.upsert).not.toHaveBeenCalled();
  });
});

// =============================================================================
// Reads
// =============================================================================

describe('QdrantVectorStore.query', () => {
  it('should pass filters and return distances', async () => {
    mockClient.search.mockResolvedValue([
      { id: 3, version: 1, score: 0.42, payload: storedPayload('doc_0003', 'Warok') },
    ]);
    const store = new QdrantVectorStore();

    const matches = await store.query([1, 2], 3, { language: 'id', category: 'tokoh' });

    expect(mockClient.search).toHaveBeenCalledWith('reog_knowledge', {
      vector: [1, 2],
      limit: 3,
      with_payload: true,
      filter: {
        must: [
          { key: 'language', match: { value: 'id' } },
          { key: 'category', match: { value: 'tokoh' } },
        ],
      },
    });
    expect(matches).toEqual([{ id: 'doc_0003', content: 'Warok', metadata, distance: 0.42 }]);
  });

  it('should omit the filter when no condition is given', async () => {
    mockClient.search.mockResolvedValue([]);
    const store = new QdrantVectorStore();

    await store.query([1], 5);

    expect(mockClient.search).toHaveBeenCalledWith('reog_knowledge', {
      vector: [1],
      limit: 5,
      with_payload: true,
    });
  });

  it('should classify client failures', async () => {
    mockClient.search.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6333'));
    const store = new QdrantVectorStore();

    await expect(store.query([1], 1)).rejects.toMatchObject({
      code: VectorStoreErrorCode.CONNECTION_ERROR,
      message: 'Search failed: connect ECONNREFUSED 127.0.0.1:6333',
    });
  });

  it('should reject malformed payloads', async () => {
    mockClient.search.mockResolvedValue([{ id: 1, version: 1, score: 1, payload: { title: 1 } }]);
    const store = new QdrantVectorStore();

    await expect(store.query([1], 1)).rejects.toMatchObject({
      code: VectorStoreErrorCode.INVALID_PAYLOAD,
    });
  });
});

describe('QdrantVectorStore.get', () => {
  it('should return documents in request order and skip unknown ids', async () => {
    mockClient.retrieve.mockResolvedValue([
      { id: 2, payload: storedPayload('doc_0002', 'two') },
      { id: 1, payload: storedPayload('doc_0001', 'one') },
    ]);
    const store = new QdrantVectorStore();

    const documents = await store.get(['doc_0001', 'missing', 'doc_0002']);

    expect(mockClient.retrieve).toHaveBeenCalledWith('reog_knowledge', {
      ids: [1, 2],
      with_payload: true,
      with_vector: false,
    });
    expect(documents.map((d) => d.content)).toEqual(['one', 'two']);
  });

  it('should not call the client for ids it cannot map', async () => {
    const store = new QdrantVectorStore();

    expect(await store.get(['unknown'])).toEqual([]);
    expect(mockClient.retrieve).not.toHaveBeenCalled();
  });
});

describe('QdrantVectorStore.peek', () => {
  it('should scroll the first page', async () => {
    mockClient.scroll.mockResolvedValue({
      points: [{ id: 1, payload: storedPayload('doc_0001', 'one') }],
      next_page_offset: null,
    });
    const store = new QdrantVectorStore();

    const documents = await store.peek(100);

    expect(mockClient.scroll).toHaveBeenCalledWith('reog_knowledge', {
      limit: 100,
      with_payload: true,
      with_vector: false,
    });
    expect(documents).toEqual([{ id: 'doc_0001', content: 'one', metadata }]);
  });
});
