#!/usr/bin/env tsx
/**
 * Prepare Knowledge Base Script
 *
 * Walks `<RAW_DATA_DIR>/<category>/{id,en}/*.txt`, cleans and chunks every
 * file, and writes the knowledge-base JSON consumed by the load step.
 *
 * Usage:
 *   npx tsx scripts/src/prepare-knowledge-base.ts
 *
 * Optional environment variables:
 *   - RAW_DATA_DIR (data/raw)
 *   - KNOWLEDGE_BASE_FILE (data/processed/knowledge_base.json)
 */

import {
  type KnowledgeBase,
  CATEGORY_LABELS,
  CategorySchema,
  KnowledgeBaseBuilder,
  KnowledgeBaseError,
  writeKnowledgeBase,
} from '../../lib/src/index.js';
import { printBanner, setupScript } from './setup.js';

async function main(): Promise<void> {
  const { config, logger } = setupScript('prepare-kb');

  printBanner('Prepare Reog Ponorogo Knowledge Base');
  console.log(`  Raw data: ${config.knowledgeBase.rawDataDir}`);
  console.log(`  Output:   ${config.retrieval.knowledgeBaseFile}`);
  console.log('');

  const builder = new KnowledgeBaseBuilder(
    { rawDataDir: config.knowledgeBase.rawDataDir },
    { logger: logger.child('builder') }
  );

  let knowledgeBase: KnowledgeBase;
  try {
    knowledgeBase = await builder.build();
  } catch (error) {
    if (error instanceof KnowledgeBaseError) {
      console.error(`ERROR: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const report = builder.validate(knowledgeBase);
  await writeKnowledgeBase(config.retrieval.knowledgeBaseFile, knowledgeBase);

  const { statistics, totalDocuments } = knowledgeBase.metadata;
  console.log('');
  console.log(`Documents: ${totalDocuments}`);
  console.log('');
  console.log('By category:');
  for (const [category, count] of Object.entries(statistics.byCategory)) {
    const parsed = CategorySchema.safeParse(category);
    const label = parsed.success ? CATEGORY_LABELS[parsed.data] : category;
    console.log(`  ${label.padEnd(16)} ${count}`);
  }
  console.log('');
  console.log('By language:');
  for (const [language, count] of Object.entries(statistics.byLanguage)) {
    console.log(`  ${language.padEnd(16)} ${count}`);
  }
  console.log('');

  if (!report.valid) {
    console.log('Validation issues:');
    for (const issue of report.issues) {
      console.log(`  - ${issue}`);
    }
    console.log('');
  }

  console.log(`Knowledge base written to ${config.retrieval.knowledgeBaseFile}`);
}

main().catch((error: unknown) => {
  console.error('Knowledge base preparation failed:', error);
  process.exit(1);
});
