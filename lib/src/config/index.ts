/**
 * Configuration Module
 */

export {
  RetrievalConfigSchema,
  type RetrievalConfig,
  EmbeddingSettingsSchema,
  type EmbeddingSettings,
  VectorStoreSettingsSchema,
  type VectorStoreSettings,
  GenerationSettingsSchema,
  type GenerationSettings,
  SpeechSettingsSchema,
  type SpeechSettings,
  LoggingSettingsSchema,
  type LoggingSettings,
  KnowledgeBaseSettingsSchema,
  type KnowledgeBaseSettings,
  AppConfigSchema,
  type AppConfig,
  type AppConfigInput,
  createDefaultAppConfig,
  ConfigError,
  ConfigErrorCode,
  isConfigError,
} from './schema.js';

export { loadConfig, validateEnvironment, type Environment } from './loader.js';
