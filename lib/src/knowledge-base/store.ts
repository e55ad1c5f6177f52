/**
 * Knowledge-base file I/O
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import {
  type KnowledgeBase,
  KnowledgeBaseSchema,
  KnowledgeBaseError,
  KnowledgeBaseErrorCode,
} from './types.js';

/**
 * Read and validate a knowledge-base file.
 *
 * @throws {KnowledgeBaseError} `FILE_NOT_FOUND` or `INVALID_FORMAT`
 */
export async function readKnowledgeBase(filePath: string): Promise<KnowledgeBase> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new KnowledgeBaseError(
      `Knowledge base file not found: ${filePath}`,
      KnowledgeBaseErrorCode.FILE_NOT_FOUND,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new KnowledgeBaseError(
      `Knowledge base file is not valid JSON: ${filePath}`,
      KnowledgeBaseErrorCode.INVALID_FORMAT,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  const parsed = KnowledgeBaseSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
    throw new KnowledgeBaseError(
      `Knowledge base file has an invalid shape (${where})`,
      KnowledgeBaseErrorCode.INVALID_FORMAT,
      { cause: parsed.error }
    );
  }

  return parsed.data;
}

/**
 * Write a knowledge base as indented UTF-8 JSON, creating parent directories
 */
export async function writeKnowledgeBase(filePath: string, knowledgeBase: KnowledgeBase): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(knowledgeBase, null, 2)}\n`, 'utf-8');
}
