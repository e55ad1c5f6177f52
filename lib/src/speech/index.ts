/**
 * Speech Module
 */

export {
  WHISPER_SAMPLING_RATE,
  WHISPER_MODEL_PARAMETERS,
  RecognizerConfigSchema,
  type RecognizerConfig,
  type RecognizerConfigInput,
  type AudioInput,
  TranscriptSegmentSchema,
  type TranscriptSegment,
  type RecognitionOptions,
  type RecognitionResult,
  type SpeechRecognizer,
  type TranscriptionResult,
  type WordTiming,
  type TimedTranscriptionResult,
  type SpeechModelInfo,
  SpeechErrorCode,
  SpeechError,
  isSpeechError,
  describeModelParameters,
} from './types.js';

export { WhisperRecognizer } from './whisper-recognizer.js';

export {
  TranscriptionService,
  type TranscriptionServiceDependencies,
  type TranscriptionServiceOptions,
  splitIntoWords,
} from './transcription-service.js';
