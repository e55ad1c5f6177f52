/**
 * Unit Tests for AnswerComposer
 *
 * A scripted adapter stands in for the completion service.
 */

import { describe, it, expect } from 'vitest';

import { NetworkError } from '../../lib/src/llm/index.js';
import {
  AnswerComposer,
  SYSTEM_PROMPTS,
  buildContext,
  buildUserPrompt,
  postProcessAnswer,
} from '../../lib/src/rag/index.js';
import { captureLogger, messagesAt } from '../helpers/capture-logger.js';
import { ScriptedLLM, makeDocument, makeRetrieved } from '../helpers/fakes.js';

const WAROK = makeRetrieved(
  makeDocument(1, { title: 'Warok', category: 'tokoh', content: 'Warok adalah tokoh sakti.' }),
  0.9
);
const GANONG = makeRetrieved(
  makeDocument(2, { title: 'Bujang Ganong', category: 'tokoh', content: 'Bujang Ganong adalah patih.' }),
  0.5
);

// =============================================================================
// Context & Prompts
// =============================================================================

describe('buildContext', () => {
  it('should number passages and separate them by blank lines', () => {
    expect(buildContext([WAROK, GANONG])).toBe(
      '[Dokumen 1: Warok (tokoh)]\nWarok adalah tokoh sakti.\n\n' +
        '[Dokumen 2: Bujang Ganong (tokoh)]\nBujang Ganong adalah patih.'
    );
  });

  it('should be empty without passages', () => {
    expect(buildContext([])).toBe('');
  });
});

describe('buildUserPrompt', () => {
  it('should build the Indonesian prompt', () => {
    expect(buildUserPrompt('Siapa Warok?', 'KONTEKS', 'id')).toBe(
      'Konteks informasi:\nKONTEKS\n\nPertanyaan pengunjung: Siapa Warok?\n\nJawaban (dalam 2-4 kalimat):'
    );
  });

  it('should build the English prompt', () => {
    expect(buildUserPrompt('Who is Warok?', 'CONTEXT', 'en')).toBe(
      'Context information:\nCONTEXT\n\nVisitor question: Who is Warok?\n\nAnswer (in 2-4 sentences):'
    );
  });
});

describe('SYSTEM_PROMPTS', () => {
  it('should give the exact fallback phrase per language', () => {
    expect(SYSTEM_PROMPTS.id).toContain(
      '"Maaf, saya tidak memiliki informasi tentang hal tersebut dalam basis pengetahuan saya."'
    );
    expect(SYSTEM_PROMPTS.en).toContain(
      `"I'm sorry, I don't have information about that in my knowledge base."`
    );
  });

  it('should start with the guide persona', () => {
    expect(SYSTEM_PROMPTS.en.split('\n')[0]).toBe(
      'You are a friendly and knowledgeable Reog Ponorogo virtual museum guide.'
    );
  });
});

// =============================================================================
// Post-processing
// =============================================================================

describe('postProcessAnswer', () => {
  it('should strip an echoed lead-in, capitalize and end the sentence', () => {
    expect(postProcessAnswer('  Jawaban: warok adalah pengawal Reog  ', 'id')).toBe(
      'Warok adalah pengawal Reog.'
    );
  });

  it('should strip several lead-ins in order', () => {
    expect(postProcessAnswer('Answer: Based on the context, reog is a dance', 'en')).toBe(
      'Reog is a dance.'
    );
  });

  it('should only strip lead-ins of the answer language', () => {
    expect(postProcessAnswer('Answer: ok', 'id')).toBe('Answer: ok.');
  });

  it('should make a single pass over the lead-ins', () => {
    expect(postProcessAnswer('Berdasarkan konteks, Jawaban: reog', 'id')).toBe('Jawaban: reog.');
  });

  it('should keep closing punctuation', () => {
    expect(postProcessAnswer('Sungguh megah!', 'id')).toBe('Sungguh megah!');
    expect(postProcessAnswer('is it a mask?', 'en')).toBe('Is it a mask?');
  });

  it('should return an empty string when nothing remains', () => {
    expect(postProcessAnswer('   ', 'id')).toBe('');
    expect(postProcessAnswer('Jawaban:', 'id')).toBe('');
  });
});

// =============================================================================
// compose
// =============================================================================

describe('AnswerComposer.compose', () => {
  it('should send the prompts and return the tidied answer', async () => {
    const llm = new ScriptedLLM(['  Jawaban: warok adalah pengawal Reog  ']);
    const composer = new AnswerComposer({ llm });

    const answer = await composer.compose('Siapa Warok?', [WAROK], 'id');

    expect(answer).toBe('Warok adalah pengawal Reog.');
    expect(llm.calls).toEqual([
      {
        prompt:
          'Konteks informasi:\n[Dokumen 1: Warok (tokoh)]\nWarok adalah tokoh sakti.\n\n' +
          'Pertanyaan pengunjung: Siapa Warok?\n\nJawaban (dalam 2-4 kalimat):',
        options: { system: SYSTEM_PROMPTS.id, temperature: 0.7, maxTokens: 256 },
      },
    ]);
  });

  it('should use the English prompts for English questions', async () => {
    const llm = new ScriptedLLM(['The Warok guards the troupe.']);
    const composer = new AnswerComposer({ llm }, { temperature: 0.2, maxTokens: 128 });

    await composer.compose('Who is the Warok?', [WAROK], 'en');

    expect(llm.calls[0]?.prompt.startsWith('Context information:\n[Dokumen 1: Warok (tokoh)]')).toBe(
      true
    );
    expect(llm.calls[0]?.options).toEqual({
      system: SYSTEM_PROMPTS.en,
      temperature: 0.2,
      maxTokens: 128,
    });
  });

  it('should return an empty string when the completion service fails', async () => {
    const { logger, entries } = captureLogger('composer');
    const llm = new ScriptedLLM([new NetworkError('Cannot connect to Ollama', 'ollama')]);
    const composer = new AnswerComposer({ llm, logger });

    const answer = await composer.compose('Siapa Warok?', [WAROK], 'id');

    expect(answer).toBe('');
    expect(messagesAt(entries, 'WARN')).toEqual(['Completion produced no answer']);
  });

  it('should propagate errors that are not completion failures', async () => {
    const llm = new ScriptedLLM([new TypeError('bad state')]);
    const composer = new AnswerComposer({ llm });

    await expect(composer.compose('Siapa Warok?', [WAROK], 'id')).rejects.toThrow('bad state');
  });
});

describe('AnswerComposer.describeModel', () => {
  it('should report the adapter model and its sampling settings', () => {
    const composer = new AnswerComposer({ llm: new ScriptedLLM() }, { maxTokens: 256 });

    expect(composer.describeModel()).toEqual({
      model: 'scripted-model',
      temperature: 0.7,
      maxTokens: 512,
    });
    expect(composer.getConfig()).toEqual({ temperature: 0.7, maxTokens: 256 });
  });
});
