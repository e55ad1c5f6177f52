/**
 * Environment Configuration Loader
 *
 * Reads the process environment into a validated {@link AppConfig}.
 *
 * Optional environment variables (defaults in parentheses):
 * - RAG_TOP_K (3), RAG_SCORE_THRESHOLD (0.12), KNOWLEDGE_BASE_FILE
 * - EMBEDDING_MODEL, EMBEDDING_BATCH_SIZE (32)
 * - QDRANT_URL (http://localhost:6333), QDRANT_API_KEY, QDRANT_COLLECTION_NAME
 *   (reog_knowledge), QDRANT_TIMEOUT (30000)
 * - OLLAMA_BASE_URL (http://localhost:11434), OLLAMA_MODEL (llama3.2:3b),
 *   OLLAMA_TEMPERATURE (0.7), OLLAMA_MAX_TOKENS (512), OLLAMA_TIMEOUT_MS (60000),
 *   OLLAMA_MAX_RETRIES (0)
 * - WHISPER_MODEL, STT_LANGUAGE_HINT
 * - LOG_LEVEL (INFO), LOG_FORMAT (pretty)
 * - RAW_DATA_DIR (data/raw)
 *
 * @throws {ConfigError} listing every rejected variable
 */

import { z } from 'zod';

import {
  type AppConfig,
  AppConfigSchema,
  ConfigError,
  ConfigErrorCode,
} from './schema.js';

export type Environment = Record<string, string | undefined>;

function readString(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(
  env: Environment,
  name: string,
  invalid: string[]
): number | undefined {
  const raw = readString(env, name);
  if (raw === undefined) {
    return undefined;
  }

  const value = Number(raw);
  if (Number.isNaN(value)) {
    invalid.push(`${name}: expected a number, received "${raw}"`);
    return undefined;
  }
  return value;
}

export function loadConfig(env: Environment = process.env): AppConfig {
  const invalid: string[] = [];

  const rawConfig = {
    retrieval: {
      topK: readNumber(env, 'RAG_TOP_K', invalid),
      scoreThreshold: readNumber(env, 'RAG_SCORE_THRESHOLD', invalid),
      knowledgeBaseFile: readString(env, 'KNOWLEDGE_BASE_FILE'),
    },
    embedding: {
      model: readString(env, 'EMBEDDING_MODEL'),
      batchSize: readNumber(env, 'EMBEDDING_BATCH_SIZE', invalid),
    },
    vectorStore: {
      url: readString(env, 'QDRANT_URL'),
      apiKey: readString(env, 'QDRANT_API_KEY'),
      collectionName: readString(env, 'QDRANT_COLLECTION_NAME'),
      timeout: readNumber(env, 'QDRANT_TIMEOUT', invalid),
    },
    generation: {
      baseUrl: readString(env, 'OLLAMA_BASE_URL'),
      model: readString(env, 'OLLAMA_MODEL'),
      temperature: readNumber(env, 'OLLAMA_TEMPERATURE', invalid),
      maxTokens: readNumber(env, 'OLLAMA_MAX_TOKENS', invalid),
      timeoutMs: readNumber(env, 'OLLAMA_TIMEOUT_MS', invalid),
      maxRetries: readNumber(env, 'OLLAMA_MAX_RETRIES', invalid),
    },
    speech: {
      model: readString(env, 'WHISPER_MODEL'),
      languageHint: readString(env, 'STT_LANGUAGE_HINT'),
    },
    logging: {
      level: readString(env, 'LOG_LEVEL'),
      format: readString(env, 'LOG_FORMAT'),
    },
    knowledgeBase: {
      rawDataDir: readString(env, 'RAW_DATA_DIR'),
    },
  };

  if (invalid.length > 0) {
    throw new ConfigError(
      `Invalid configuration: ${invalid.join('; ')}`,
      ConfigErrorCode.INVALID_NUMBER,
      { issues: invalid }
    );
  }

  try {
    return AppConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw ConfigError.fromZodError(error);
    }
    throw error;
  }
}

/**
 * Non-throwing variant for scripts that want to print every problem.
 */
export function validateEnvironment(env: Environment = process.env): {
  isValid: boolean;
  errors: string[];
} {
  try {
    loadConfig(env);
    return { isValid: true, errors: [] };
  } catch (error) {
    if (error instanceof ConfigError) {
      return { isValid: false, errors: error.issues };
    }
    throw error;
  }
}
