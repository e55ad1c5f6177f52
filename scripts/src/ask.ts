#!/usr/bin/env tsx
/**
 * Ask Script
 *
 * Answers one question from the command line against the loaded knowledge
 * base.
 *
 * Usage:
 *   npx tsx scripts/src/ask.ts "Apa itu Dadak Merak?"
 *   npx tsx scripts/src/ask.ts --lang en "What is the Warok?"
 */

import { LanguageSchema, createServices, type AnswerOptions } from '../../lib/src/index.js';
import { printBanner, setupScript } from './setup.js';

function parseArgs(argv: string[]): { question: string; options: AnswerOptions } {
  const options: AnswerOptions = { returnSources: true, returnTiming: true };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--lang') {
      const parsed = LanguageSchema.safeParse(argv[++i]);
      if (!parsed.success) {
        console.error('--lang must be "id" or "en"');
        process.exit(1);
      }
      options.language = parsed.data;
    } else if (arg !== undefined) {
      words.push(arg);
    }
  }

  return { question: words.join(' '), options };
}

async function main(): Promise<void> {
  const { question, options } = parseArgs(process.argv.slice(2));
  if (!question.trim()) {
    console.error('Usage: ask.ts [--lang id|en] "<question>"');
    process.exit(1);
  }

  const { config, logger } = setupScript('ask');
  const { llm, pipeline } = createServices(config, { logger });

  const health = await llm.checkHealth();
  if (!health.modelAvailable) {
    console.error(`WARNING: ${health.error ?? `model ${llm.model} is not available`}`);
    console.error('');
  }

  printBanner(question);
  const response = await pipeline.answer(question, options);

  console.log(response.answer);
  console.log('');

  if (response.sources && response.sources.length > 0) {
    console.log('Sources:');
    response.sources.forEach((source, index) => {
      console.log(`  ${index + 1}. ${source.title} (${source.category}) score ${source.score}`);
    });
    console.log('');
  }

  if (response.timing) {
    const { retrieval, generation, total } = response.timing;
    console.log(
      `Timing: retrieval ${retrieval.toFixed(0)}ms, generation ${generation.toFixed(0)}ms, total ${total.toFixed(0)}ms`
    );
  }

  if (!response.success) {
    console.error(`(${response.errorCode ?? 'NO_RESULTS'}) ${response.error ?? 'no relevant documents'}`);
    process.exit(2);
  }
}

main().catch((error: unknown) => {
  console.error('Ask failed:', error);
  process.exit(1);
});
