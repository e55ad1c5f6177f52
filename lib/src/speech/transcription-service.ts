/**
 * Transcription Service
 *
 * Runs a recognizer and repairs the transcript with the lexical normalizer,
 * so misheard Reog terms reach the retriever spelled the way the knowledge
 * base spells them. Failures come back as results with `success: false`.
 */

import { type Logger, createSilentLogger } from '../logging/index.js';
import { LexicalNormalizer } from '../normalizer/index.js';
import {
  type AudioInput,
  type SpeechModelInfo,
  type SpeechRecognizer,
  type TimedTranscriptionResult,
  type TranscriptSegment,
  type TranscriptionResult,
  type WordTiming,
  describeModelParameters,
} from './types.js';

export interface TranscriptionServiceDependencies {
  recognizer: SpeechRecognizer;
  normalizer?: LexicalNormalizer | undefined;
  logger?: Logger | undefined;
}

export interface TranscriptionServiceOptions {
  /** Language passed to the recognizer when a call names none */
  languageHint?: string | undefined;
}

const PREVIEW_LENGTH = 100;

export class TranscriptionService {
  private readonly recognizer: SpeechRecognizer;
  private readonly normalizer: LexicalNormalizer;
  private readonly logger: Logger;
  private readonly languageHint: string | undefined;

  constructor(deps: TranscriptionServiceDependencies, options: TranscriptionServiceOptions = {}) {
    this.recognizer = deps.recognizer;
    this.normalizer = deps.normalizer ?? new LexicalNormalizer();
    this.logger = deps.logger ?? createSilentLogger();
    this.languageHint = options.languageHint;
  }

  /**
   * @param hint - ISO code passed to the recognizer; defaults to the
   *   configured hint
   */
  async transcribe(audio: AudioInput, hint?: string): Promise<TranscriptionResult> {
    const language = hint ?? this.languageHint;
    this.logger.info('Transcribing audio', {
      samples: audio.length,
      ...(language !== undefined && { languageHint: language }),
    });

    try {
      const result = await this.recognizer.recognize(audio, { language });
      const text = this.normalizer.normalize(result.text);
      const detected = result.language ?? 'unknown';

      this.logger.info('Transcription complete', {
        language: detected,
        characters: text.length,
        preview: text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text,
      });

      return { text, language: detected, segments: result.segments, success: true };
    } catch (error) {
      this.logger.error('Transcription failed', error, { model: this.recognizer.getModel() });
      return {
        text: '',
        language: 'unknown',
        segments: [],
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * `transcribe` plus per-word timings; each segment's duration is split
   * evenly between its words.
   */
  async transcribeWithTimestamps(
    audio: AudioInput,
    language?: string
  ): Promise<TimedTranscriptionResult> {
    const result = await this.transcribe(audio, language);
    return { ...result, words: result.success ? splitIntoWords(result.segments) : [] };
  }

  getModelInfo(): SpeechModelInfo {
    const model = this.recognizer.getModel();
    return { model, parameters: describeModelParameters(model) };
  }
}

/**
 * @example
 * ```typescript
 * splitIntoWords([{ start: 1, end: 2, text: ' Reog Ponorogo ' }]);
 * // [{ word: 'Reog', start: 1, end: 1.5 }, { word: 'Ponorogo', start: 1.5, end: 2 }]
 * ```
 */
export function splitIntoWords(segments: readonly TranscriptSegment[]): WordTiming[] {
  const words: WordTiming[] = [];

  for (const segment of segments) {
    const segmentWords = segment.text.trim().split(/\s+/).filter((word) => word.length > 0);
    const wordDuration = (segment.end - segment.start) / Math.max(segmentWords.length, 1);

    segmentWords.forEach((word, index) => {
      words.push({
        word,
        start: segment.start + index * wordDuration,
        end: segment.start + (index + 1) * wordDuration,
      });
    });
  }

  return words;
}
