/**
 * WhisperRecognizer Class
 *
 * Whisper through the transformers.js `automatic-speech-recognition`
 * pipeline. The model loads on first use.
 *
 * @example
 * ```typescript
 * const recognizer = new WhisperRecognizer({ model: 'Xenova/whisper-small' }, { logger });
 * const { text, segments } = await recognizer.recognize(samples, { language: 'id' });
 * ```
 */

import { z } from 'zod';

import { type Logger, createSilentLogger } from '../logging/index.js';
import {
  type AudioInput,
  type RecognitionOptions,
  type RecognitionResult,
  type RecognizerConfig,
  type RecognizerConfigInput,
  type SpeechRecognizer,
  RecognizerConfigSchema,
  SpeechError,
  SpeechErrorCode,
} from './types.js';

// =============================================================================
// Types for Transformers.js
// =============================================================================

interface AsrPipelineOptions {
  language?: string;
  task?: 'transcribe' | 'translate';
  return_timestamps?: boolean;
  chunk_length_s?: number;
  stride_length_s?: number;
}

interface AutomaticSpeechRecognitionPipeline {
  (audio: Float32Array, options?: AsrPipelineOptions): Promise<unknown>;
}

const AsrOutputSchema = z.object({
  text: z.string(),
  chunks: z
    .array(
      z.object({
        timestamp: z.tuple([z.number(), z.number().nullable()]),
        text: z.string(),
      })
    )
    .optional(),
});

// =============================================================================
// WhisperRecognizer Class
// =============================================================================

export class WhisperRecognizer implements SpeechRecognizer {
  private readonly config: RecognizerConfig;
  private readonly logger: Logger;
  private pipeline: AutomaticSpeechRecognitionPipeline | null = null;
  private initializePromise: Promise<void> | null = null;

  constructor(config?: RecognizerConfigInput, deps?: { logger?: Logger }) {
    this.config = RecognizerConfigSchema.parse(config ?? {});
    this.logger = deps?.logger ?? createSilentLogger();
  }

  /**
   * Load the model. Concurrent callers share one load; a failed load can be
   * retried.
   *
   * @throws {SpeechError} `MODEL_LOAD_ERROR`
   */
  async initialize(): Promise<void> {
    if (this.pipeline) {
      return;
    }

    if (!this.initializePromise) {
      this.initializePromise = this.loadModel();
    }

    try {
      await this.initializePromise;
    } catch (error) {
      this.initializePromise = null;
      throw error;
    }
  }

  private async loadModel(): Promise<void> {
    const startTime = Date.now();
    this.logger.info('Loading speech model', { model: this.config.model });

    try {
      const { pipeline, env } = await import('@xenova/transformers');

      env.allowLocalModels = false;
      env.useBrowserCache = false;

      this.pipeline = (await pipeline('automatic-speech-recognition', this.config.model, {
        quantized: this.config.quantized,
      })) as unknown as AutomaticSpeechRecognitionPipeline;
    } catch (error) {
      throw new SpeechError(
        `Failed to load speech model: ${error instanceof Error ? error.message : String(error)}`,
        SpeechErrorCode.MODEL_LOAD_ERROR,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    this.logger.info('Speech model ready', {
      model: this.config.model,
      durationMs: Date.now() - startTime,
    });
  }

  isInitialized(): boolean {
    return this.pipeline !== null;
  }

  /**
   * Transcribe, with segment timestamps. The reported language is the one
   * asked for; without a hint it is left undetermined.
   *
   * @throws {SpeechError} `INVALID_AUDIO` for an empty recording,
   *   `RECOGNITION_ERROR` when the model fails
   */
  async recognize(audio: AudioInput, options?: RecognitionOptions): Promise<RecognitionResult> {
    if (audio.length === 0) {
      throw new SpeechError('Audio contains no samples', SpeechErrorCode.INVALID_AUDIO);
    }

    await this.initialize();
    const transcriber = this.pipeline;
    if (!transcriber) {
      throw new SpeechError('Speech model not initialized', SpeechErrorCode.MODEL_LOAD_ERROR);
    }

    let output: unknown;
    try {
      output = await transcriber(audio, {
        task: 'transcribe',
        return_timestamps: true,
        chunk_length_s: this.config.chunkLengthSeconds,
        stride_length_s: this.config.strideLengthSeconds,
        ...(options?.language !== undefined && { language: options.language }),
      });
    } catch (error) {
      throw SpeechError.fromError(error, SpeechErrorCode.RECOGNITION_ERROR);
    }

    const parsed = AsrOutputSchema.safeParse(output);
    if (!parsed.success) {
      throw new SpeechError(
        'Unexpected output from speech recognition pipeline',
        SpeechErrorCode.RECOGNITION_ERROR,
        { cause: parsed.error }
      );
    }

    const segments = (parsed.data.chunks ?? []).map((chunk) => {
      const [start, end] = chunk.timestamp;
      return { start, end: end ?? start, text: chunk.text };
    });

    return {
      text: parsed.data.text.trim(),
      language: options?.language,
      segments,
    };
  }

  getModel(): string {
    return this.config.model;
  }

  getConfig(): Readonly<RecognizerConfig> {
    return { ...this.config };
  }
}
