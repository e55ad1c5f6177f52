/**
 * Retrieval Types
 */

import { z } from 'zod';

import type { Category, Language } from '../knowledge-base/index.js';
import type { DocumentPayload } from '../vector-store/index.js';

// =============================================================================
// Configuration
// =============================================================================

export const RetrieverConfigSchema = z.object({
  /**
   * Results requested from the store when the caller gives no topK
   * @default 3
   */
  topK: z.number().int().positive().max(50).default(3),

  /**
   * Minimum score `1 / (1 + distance)` a result must reach
   * @default 0.12
   */
  scoreThreshold: z.number().min(0).max(1).default(0.12),

  /** Prepared knowledge-base JSON read by `load` */
  knowledgeBaseFile: z.string().min(1).default('data/processed/knowledge_base.json'),

  /**
   * Records per store insert during `load`
   * @default 100
   */
  insertBatchSize: z.number().int().positive().default(100),

  /**
   * Documents sampled to list categories and languages in stats
   * @default 100
   */
  statsSampleSize: z.number().int().positive().default(100),
});

export type RetrieverConfig = z.infer<typeof RetrieverConfigSchema>;
export type RetrieverConfigInput = z.input<typeof RetrieverConfigSchema>;

// =============================================================================
// Search
// =============================================================================

export interface SearchOptions {
  topK?: number;
  language?: Language;
  category?: Category;
}

export interface RetrievedDocument {
  id: string;
  content: string;
  metadata: DocumentPayload;
  /** L2 distance to the query; smaller is closer */
  distance: number;
  /** `1 / (1 + distance)`, in (0, 1] */
  score: number;
}

// =============================================================================
// Load & Stats
// =============================================================================

export interface LoadOptions {
  /** Drop and rebuild a non-empty collection */
  forceReload?: boolean;
}

export interface LoadResult {
  /** Documents inserted by this call */
  loaded: number;
  /** True when the collection was already populated and left alone */
  skipped: boolean;
  durationMs: number;
  /** Why nothing was loaded, when the knowledge-base file was unusable */
  error?: string;
}

export interface CollectionStats {
  totalDocuments: number;
  categories: string[];
  languages: string[];
  collectionName: string;
  embeddingModel: string;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Map an L2 distance onto (0, 1]: 0 → 1, growing distance → towards 0
 */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance);
}
