/**
 * Reog Ponorogo Museum Guide - Library
 *
 * Knowledge-base preparation, retrieval and answer generation for the
 * bilingual museum guide.
 */

// Configuration
export * from './config/index.js';

// Logging
export * from './logging/index.js';

// Chunking (Knowledge-Base Text Splitting)
export * from './chunking/index.js';

// Knowledge Base (Preparation & File Format)
export * from './knowledge-base/index.js';

// Lexical Normalization of Transcripts
export * from './normalizer/index.js';

// Embeddings (Vector Embedding Generation)
export * from './embeddings/index.js';

// Vector Store (Qdrant & In-Memory)
export * from './vector-store/index.js';

// Retrieval
export * from './retrieval/index.js';

// LLM (Completion Service Adapters)
export * from './llm/index.js';

// Speech Recognition
export * from './speech/index.js';

// RAG (Retrieval-Augmented Generation Pipeline)
export * from './rag/index.js';

// Service Wiring
export * from './services.js';
