/**
 * Service Wiring
 *
 * Builds every collaborator from one validated config. Nothing here is a
 * singleton: each call returns a fresh graph, and any collaborator can be
 * passed in instead of built (tests hand in fakes).
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const logger = createRootLogger(config.logging);
 * const { pipeline, retriever } = createServices(config, { logger });
 *
 * await retriever.load();
 * const response = await pipeline.answer('Apa itu Reog?');
 * ```
 */

import type { AppConfig } from './config/index.js';
import { type TextEmbedder, MiniLMEmbedder } from './embeddings/index.js';
import { LLMAdapter, OllamaAdapter } from './llm/index.js';
import { type Logger, createSilentLogger } from './logging/index.js';
import { LexicalNormalizer } from './normalizer/index.js';
import { AnswerComposer, RAGPipeline } from './rag/index.js';
import { Retriever } from './retrieval/index.js';
import { type SpeechRecognizer, TranscriptionService, WhisperRecognizer } from './speech/index.js';
import { type VectorStore, QdrantVectorStore } from './vector-store/index.js';

export interface ServiceOverrides {
  logger?: Logger | undefined;
  embedder?: TextEmbedder | undefined;
  store?: VectorStore | undefined;
  llm?: LLMAdapter | undefined;
  recognizer?: SpeechRecognizer | undefined;
}

export interface Services {
  embedder: TextEmbedder;
  store: VectorStore;
  retriever: Retriever;
  llm: LLMAdapter;
  composer: AnswerComposer;
  normalizer: LexicalNormalizer;
  speech: TranscriptionService;
  pipeline: RAGPipeline;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const logger = overrides.logger ?? createSilentLogger();

  const embedder =
    overrides.embedder ??
    new MiniLMEmbedder(
      {
        model: config.embedding.model,
        dimensions: config.embedding.dimensions,
        batchSize: config.embedding.batchSize,
        quantized: config.embedding.quantized,
      },
      { logger: logger.child('embedder') }
    );

  const store =
    overrides.store ??
    new QdrantVectorStore(
      {
        url: config.vectorStore.url,
        apiKey: config.vectorStore.apiKey,
        collectionName: config.vectorStore.collectionName,
        timeout: config.vectorStore.timeout,
        dimensions: config.embedding.dimensions,
      },
      { logger: logger.child('vector-store') }
    );

  const retriever = new Retriever(
    { embedder, store, logger: logger.child('retriever') },
    {
      topK: config.retrieval.topK,
      scoreThreshold: config.retrieval.scoreThreshold,
      knowledgeBaseFile: config.retrieval.knowledgeBaseFile,
      insertBatchSize: config.retrieval.insertBatchSize,
    }
  );

  const llm =
    overrides.llm ??
    new OllamaAdapter(
      {
        baseUrl: config.generation.baseUrl,
        model: config.generation.model,
        temperature: config.generation.temperature,
        maxTokens: config.generation.maxTokens,
        timeoutMs: config.generation.timeoutMs,
        retry: { maxRetries: config.generation.maxRetries },
      },
      { logger: logger.child('llm') }
    );

  const composer = new AnswerComposer(
    { llm, logger: logger.child('composer') },
    { temperature: config.generation.temperature, maxTokens: config.generation.answerMaxTokens }
  );

  const normalizer = new LexicalNormalizer();

  const recognizer =
    overrides.recognizer ??
    new WhisperRecognizer({ model: config.speech.model }, { logger: logger.child('speech') });

  const speech = new TranscriptionService(
    { recognizer, normalizer, logger: logger.child('transcription') },
    { languageHint: config.speech.languageHint }
  );

  const pipeline = new RAGPipeline(
    { retriever, composer, speech, logger: logger.child('pipeline') },
    { defaultLanguage: 'id' }
  );

  return { embedder, store, retriever, llm, composer, normalizer, speech, pipeline };
}
