/**
 * LLM Adapters
 */

export * from './ollama.js';
