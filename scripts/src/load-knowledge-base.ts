#!/usr/bin/env tsx
/**
 * Load Knowledge Base Script
 *
 * Embeds every prepared document and inserts it into the Qdrant collection.
 * A populated collection is left alone unless --force is given.
 *
 * Usage:
 *   npx tsx scripts/src/load-knowledge-base.ts [--force]
 *
 * Optional environment variables:
 *   - KNOWLEDGE_BASE_FILE, EMBEDDING_MODEL
 *   - QDRANT_URL, QDRANT_API_KEY, QDRANT_COLLECTION_NAME
 */

import { createServices } from '../../lib/src/index.js';
import { printBanner, setupScript } from './setup.js';

async function main(): Promise<void> {
  const forceReload = process.argv.slice(2).includes('--force');
  const { config, logger } = setupScript('load-kb');
  const { retriever } = createServices(config, { logger });

  printBanner('Load Reog Ponorogo Knowledge Base');
  console.log(`  File:       ${config.retrieval.knowledgeBaseFile}`);
  console.log(`  Collection: ${config.vectorStore.collectionName} (${config.vectorStore.url})`);
  console.log(`  Force:      ${forceReload}`);
  console.log('');

  const result = await retriever.load({ forceReload });

  if (result.error) {
    console.error(`ERROR: ${result.error}`);
    console.error('Run the prepare-kb script first.');
    process.exit(1);
  }

  if (result.skipped) {
    console.log('Collection already populated; pass --force to rebuild it.');
  } else {
    console.log(`Loaded ${result.loaded} documents in ${(result.durationMs / 1000).toFixed(1)}s`);
  }

  const stats = await retriever.getCollectionStats();
  console.log('');
  console.log(`Documents:  ${stats.totalDocuments}`);
  console.log(`Categories: ${stats.categories.join(', ') || '-'}`);
  console.log(`Languages:  ${stats.languages.join(', ') || '-'}`);
  console.log(`Embeddings: ${stats.embeddingModel}`);
}

main().catch((error: unknown) => {
  console.error('Knowledge base load failed:', error);
  process.exit(1);
});
