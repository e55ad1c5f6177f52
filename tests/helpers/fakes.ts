/**
 * In-process stand-ins for the model-backed collaborators
 */

import { EmbeddingError, EmbeddingErrorCode, type TextEmbedder } from '../../lib/src/embeddings/index.js';
import { summarize, type KnowledgeBase, type KnowledgeDocument } from '../../lib/src/knowledge-base/index.js';
import {
  LLMAdapter,
  type LLMAdapterDependencies,
  type LLMCompletionOptions,
  type LLMHealthStatus,
  type LLMResponse,
} from '../../lib/src/llm/index.js';
import type { RetrievedDocument } from '../../lib/src/retrieval/index.js';
import type {
  AudioInput,
  RecognitionOptions,
  RecognitionResult,
  SpeechRecognizer,
} from '../../lib/src/speech/index.js';
import type { VectorRecord } from '../../lib/src/vector-store/index.js';

/**
 * Embeds by table lookup; unknown texts map to `fallback`
 */
export class FakeEmbedder implements TextEmbedder {
  readonly calls: string[] = [];

  constructor(
    private readonly table: Record<string, number[]> = {},
    private readonly fallback: number[] = [0, 0]
  ) {}

  async embed(text: string): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new EmbeddingError('Input text cannot be empty', EmbeddingErrorCode.EMPTY_INPUT);
    }
    this.calls.push(text);
    return this.table[text] ?? this.fallback;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((text) => this.embed(text)));
  }

  getDimensions(): number {
    return this.fallback.length;
  }

  getModel(): string {
    return 'fake-embedder';
  }
}

export function makeDocument(
  sequence: number,
  overrides: Partial<Omit<KnowledgeDocument, 'metadata'>> = {}
): KnowledgeDocument {
  const content = overrides.content ?? `Dokumen nomor ${sequence} tentang Reog Ponorogo.`;
  return {
    id: `doc_${String(sequence).padStart(4, '0')}`,
    category: 'sejarah',
    title: `Dokumen ${sequence}`,
    language: 'id',
    keywords: ['reog', 'ponorogo'],
    ...overrides,
    content,
    metadata: {
      sourceFile: `${sequence}.txt`,
      chunkIndex: 0,
      totalChunks: 1,
      wordCount: content.split(/\s+/).length,
      charCount: content.length,
    },
  };
}

export function makeKnowledgeBase(documents: KnowledgeDocument[]): KnowledgeBase {
  return summarize(documents);
}

/**
 * Store record for a document, as the retriever's load builds it
 */
export function toVectorRecord(document: KnowledgeDocument, vector: number[]): VectorRecord {
  return {
    id: document.id,
    vector,
    content: document.content,
    metadata: {
      title: document.title,
      category: document.category,
      language: document.language,
      keywords: document.keywords.join(','),
      wordCount: document.metadata.wordCount,
      sourceFile: document.metadata.sourceFile,
    },
  };
}

export function makeRetrieved(
  document: KnowledgeDocument,
  score: number
): RetrievedDocument {
  const { metadata, ...record } = toVectorRecord(document, []);
  return { id: record.id, content: record.content, metadata, score, distance: 1 / score - 1 };
}

/**
 * Completion service that replays queued replies; an Error entry is thrown.
 * Once the queue is empty every call returns an empty completion.
 */
export class ScriptedLLM extends LLMAdapter {
  readonly calls: Array<{ prompt: string; options: LLMCompletionOptions | undefined }> = [];
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error> = [], deps?: LLMAdapterDependencies) {
    super({ provider: 'ollama', model: 'scripted-model', maxTokens: 512, temperature: 0.7 }, deps);
    this.replies = [...replies];
  }

  async complete(prompt: string, options?: LLMCompletionOptions): Promise<LLMResponse> {
    this.calls.push({ prompt, options });
    const reply = this.replies.shift() ?? '';
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: reply, model: this.model, usage: { inputTokens: 10, outputTokens: 5 } };
  }

  async checkHealth(): Promise<LLMHealthStatus> {
    return { available: true, modelAvailable: true, models: [this.model] };
  }
}

/**
 * Recognizer returning one scripted result, or throwing the scripted error
 */
export class FakeRecognizer implements SpeechRecognizer {
  readonly calls: Array<{ samples: number; options: RecognitionOptions | undefined }> = [];

  constructor(private readonly outcome: RecognitionResult | Error) {}

  async recognize(audio: AudioInput, options?: RecognitionOptions): Promise<RecognitionResult> {
    this.calls.push({ samples: audio.length, options });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }

  getModel(): string {
    return 'Xenova/whisper-tiny';
  }
}
