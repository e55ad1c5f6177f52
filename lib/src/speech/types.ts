/**
 * Speech Recognition Types
 *
 * Audio is handed over already decoded: mono PCM samples at 16 kHz, the
 * rate Whisper models are trained on.
 */

import { z } from 'zod';

// =============================================================================
// Configuration
// =============================================================================

export const WHISPER_SAMPLING_RATE = 16000;

/**
 * Parameter counts of the Whisper sizes, keyed by the size in the model name
 */
export const WHISPER_MODEL_PARAMETERS = {
  tiny: '39M',
  base: '74M',
  small: '244M',
  medium: '769M',
  large: '1550M',
} as const;

export const RecognizerConfigSchema = z.object({
  /**
   * transformers.js model identifier
   * @default 'Xenova/whisper-small'
   */
  model: z.string().min(1).default('Xenova/whisper-small'),

  /** Use the quantized ONNX weights */
  quantized: z.boolean().default(true),

  /**
   * Window length for long recordings, in seconds
   * @default 30
   */
  chunkLengthSeconds: z.number().int().positive().default(30),

  /**
   * Overlap between windows, in seconds
   * @default 5
   */
  strideLengthSeconds: z.number().int().nonnegative().default(5),
});

export type RecognizerConfig = z.infer<typeof RecognizerConfigSchema>;
export type RecognizerConfigInput = z.input<typeof RecognizerConfigSchema>;

// =============================================================================
// Recognizer Contract
// =============================================================================

/** Mono PCM samples at 16 kHz, in [-1, 1] */
export type AudioInput = Float32Array;

export const TranscriptSegmentSchema = z.object({
  /** Seconds from the start of the audio */
  start: z.number().nonnegative(),
  end: z.number().nonnegative(),
  text: z.string(),
});

export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;

export interface RecognitionOptions {
  /** Language to transcribe, as an ISO code; the model detects it otherwise */
  language?: string | undefined;
}

export interface RecognitionResult {
  text: string;
  /** Language of the transcript, when the recognizer knows it */
  language?: string | undefined;
  segments: TranscriptSegment[];
}

export interface SpeechRecognizer {
  recognize(audio: AudioInput, options?: RecognitionOptions): Promise<RecognitionResult>;
  getModel(): string;
}

// =============================================================================
// Transcription Results
// =============================================================================

export interface TranscriptionResult {
  /** Normalized transcript; empty on failure */
  text: string;
  /** ISO code, or `unknown` */
  language: string;
  segments: TranscriptSegment[];
  success: boolean;
  error?: string;
}

export interface WordTiming {
  word: string;
  start: number;
  end: number;
}

export interface TimedTranscriptionResult extends TranscriptionResult {
  words: WordTiming[];
}

export interface SpeechModelInfo {
  model: string;
  /** Parameter count of the model size, or `unknown` */
  parameters: string;
}

// =============================================================================
// Error Types
// =============================================================================

export const SpeechErrorCode = {
  MODEL_LOAD_ERROR: 'MODEL_LOAD_ERROR',
  INVALID_AUDIO: 'INVALID_AUDIO',
  RECOGNITION_ERROR: 'RECOGNITION_ERROR',
} as const;

export type SpeechErrorCode = (typeof SpeechErrorCode)[keyof typeof SpeechErrorCode];

export class SpeechError extends Error {
  readonly code: SpeechErrorCode;
  readonly cause: Error | undefined;

  constructor(message: string, code: SpeechErrorCode, options?: { cause?: Error | undefined }) {
    super(message);
    this.name = 'SpeechError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SpeechError);
    }
  }

  static fromError(error: unknown, code?: SpeechErrorCode): SpeechError {
    if (error instanceof SpeechError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new SpeechError(message, code ?? SpeechErrorCode.RECOGNITION_ERROR, { cause });
  }
}

export function isSpeechError(error: unknown): error is SpeechError {
  return error instanceof SpeechError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * `Xenova/whisper-small` → `244M`; sizes with a suffix such as `small.en`
 * count as their base size.
 */
export function describeModelParameters(model: string): string {
  const name = model.split('/').pop()?.toLowerCase() ?? '';
  const size = /whisper-(tiny|base|small|medium|large)/.exec(name)?.[1];
  switch (size) {
    case 'tiny':
    case 'base':
    case 'small':
    case 'medium':
    case 'large':
      return WHISPER_MODEL_PARAMETERS[size];
    default:
      return 'unknown';
  }
}
