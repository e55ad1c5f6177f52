/**
 * Application Configuration Schemas
 *
 * Every tunable of the guide (retrieval thresholds, collaborator endpoints,
 * model names) is a named, validated setting. Values are read once at
 * startup; an out-of-range threshold fails loading instead of being accepted.
 */

import { z } from 'zod';

import { LogFormatSchema } from '../logging/index.js';

// =============================================================================
// Section Schemas
// =============================================================================

export const RetrievalConfigSchema = z.object({
  /** Number of documents to retrieve per question */
  topK: z.number().int().positive().max(50).default(3),

  /**
   * Minimum similarity score, `1 / (1 + distance)`, for a document to be used
   * as context.
   */
  scoreThreshold: z.number().min(0).max(1).default(0.12),

  /** Prepared knowledge base consumed by the load step */
  knowledgeBaseFile: z.string().min(1).default('data/processed/knowledge_base.json'),

  /** Points added to the vector store per request during load */
  insertBatchSize: z.number().int().positive().default(100),
});

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;

export const EmbeddingSettingsSchema = z.object({
  model: z.string().min(1).default('Xenova/paraphrase-multilingual-MiniLM-L12-v2'),
  dimensions: z.number().int().positive().default(384),
  batchSize: z.number().int().positive().max(256).default(32),
  quantized: z.boolean().default(true),
});

export type EmbeddingSettings = z.infer<typeof EmbeddingSettingsSchema>;

export const VectorStoreSettingsSchema = z.object({
  url: z.string().url().default('http://localhost:6333'),
  apiKey: z.string().min(1).optional(),
  collectionName: z.string().min(1).default('reog_knowledge'),
  timeout: z.number().int().positive().default(30000),
});

export type VectorStoreSettings = z.infer<typeof VectorStoreSettingsSchema>;

export const GenerationSettingsSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default('llama3.2:3b'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(512),
  /** Token budget for composed answers; kept short for 2-4 sentences */
  answerMaxTokens: z.number().int().positive().default(256),
  /** Hard upper bound on a single completion call */
  timeoutMs: z.number().int().positive().default(60000),
  /** Extra attempts after a timeout, network or server error */
  maxRetries: z.number().int().nonnegative().max(5).default(0),
});

export type GenerationSettings = z.infer<typeof GenerationSettingsSchema>;

export const SpeechSettingsSchema = z.object({
  model: z.string().min(1).default('Xenova/whisper-small'),
  languageHint: z.enum(['id', 'en']).optional(),
});

export type SpeechSettings = z.infer<typeof SpeechSettingsSchema>;

export const LoggingSettingsSchema = z.object({
  level: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(['ERROR', 'WARN', 'INFO', 'DEBUG', 'TRACE']))
    .default('INFO'),
  format: LogFormatSchema.default('pretty'),
});

export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;

export const KnowledgeBaseSettingsSchema = z.object({
  /** Root of `<category>/<language>/*.txt` source documents */
  rawDataDir: z.string().min(1).default('data/raw'),
});

export type KnowledgeBaseSettings = z.infer<typeof KnowledgeBaseSettingsSchema>;

// =============================================================================
// Application Config
// =============================================================================

export const AppConfigSchema = z.object({
  retrieval: RetrievalConfigSchema.default({}),
  embedding: EmbeddingSettingsSchema.default({}),
  vectorStore: VectorStoreSettingsSchema.default({}),
  generation: GenerationSettingsSchema.default({}),
  speech: SpeechSettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
  knowledgeBase: KnowledgeBaseSettingsSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

export function createDefaultAppConfig(overrides?: AppConfigInput): AppConfig {
  return AppConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Error Types
// =============================================================================

export const ConfigErrorCode = {
  INVALID_VALUE: 'INVALID_VALUE',
  INVALID_NUMBER: 'INVALID_NUMBER',
} as const;

export type ConfigErrorCode = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  /** One entry per rejected setting, e.g. `retrieval.scoreThreshold: ...` */
  readonly issues: string[];
  readonly cause: Error | undefined;

  constructor(
    message: string,
    code: ConfigErrorCode,
    options?: { issues?: string[]; cause?: Error }
  ) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.issues = options?.issues ?? [];
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }

  static fromZodError(error: z.ZodError): ConfigError {
    const issues = error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    return new ConfigError(
      `Invalid configuration: ${issues.join('; ')}`,
      ConfigErrorCode.INVALID_VALUE,
      { issues, cause: error }
    );
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
