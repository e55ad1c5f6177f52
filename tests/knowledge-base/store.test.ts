/**
 * Unit Tests for knowledge-base file I/O
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  readKnowledgeBase,
  writeKnowledgeBase,
  summarize,
  KnowledgeBaseError,
  KnowledgeBaseErrorCode,
} from '../../lib/src/knowledge-base/index.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'kb-store-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const knowledgeBase = summarize([
  {
    id: 'doc_0001',
    category: 'tokoh',
    title: 'Warok',
    language: 'id',
    content: 'Warok adalah tokoh sakti dalam pertunjukan Reog Ponorogo.',
    keywords: ['warok', 'tokoh'],
    metadata: { sourceFile: 'warok.txt', chunkIndex: 0, totalChunks: 1, wordCount: 8, charCount: 57 },
  },
]);

describe('writeKnowledgeBase / readKnowledgeBase', () => {
  it('should create parent directories and read back the same data', async () => {
    const file = join(dir, 'processed', 'knowledge_base.json');

    await writeKnowledgeBase(file, knowledgeBase);

    expect(await readKnowledgeBase(file)).toEqual(knowledgeBase);
  });

  it('should report a missing file', async () => {
    const error = await readKnowledgeBase(join(dir, 'missing.json')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(KnowledgeBaseError);
    expect(error).toMatchObject({ code: KnowledgeBaseErrorCode.FILE_NOT_FOUND });
  });

  it('should reject malformed JSON', async () => {
    const file = join(dir, 'broken.json');
    await writeFile(file, '{ "metadata": ', 'utf-8');

    await expect(readKnowledgeBase(file)).rejects.toMatchObject({
      code: KnowledgeBaseErrorCode.INVALID_FORMAT,
    });
  });

  it('should reject documents with bad ids', async () => {
    const file = join(dir, 'bad-id.json');
    const [doc] = knowledgeBase.documents;
    await writeFile(
      file,
      JSON.stringify({ ...knowledgeBase, documents: [{ ...doc, id: 'chunk-1' }] }),
      'utf-8'
    );

    await expect(readKnowledgeBase(file)).rejects.toMatchObject({
      code: KnowledgeBaseErrorCode.INVALID_FORMAT,
      message: expect.stringContaining('documents.0.id'),
    });
  });
});
