/**
 * LLM Module
 *
 * Exports the completion adapter, its errors and retry helpers.
 */

export * from './types.js';
export * from './errors.js';
export * from './adapter.js';
export * from './retry.js';
export * from './adapters/index.js';
