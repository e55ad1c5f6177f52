/**
 * Unit Tests for TranscriptionService
 */

import { describe, it, expect } from 'vitest';

import { LexicalNormalizer, type Lexicon } from '../../lib/src/normalizer/index.js';
import {
  TranscriptionService,
  splitIntoWords,
  type RecognitionResult,
} from '../../lib/src/speech/index.js';
import { captureLogger, messagesAt } from '../helpers/capture-logger.js';
import { FakeRecognizer } from '../helpers/fakes.js';

const AUDIO = new Float32Array([0.1, 0.2, 0.3]);

const LEXICON: Lexicon = {
  replacements: [['reok', 'reog']],
  importantTerms: ['Reog', 'Ponorogo'],
};

function createService(
  outcome: RecognitionResult | Error,
  options: { languageHint?: string } = {}
) {
  const { logger, entries } = captureLogger('transcription');
  const recognizer = new FakeRecognizer(outcome);
  const service = new TranscriptionService(
    { recognizer, normalizer: new LexicalNormalizer({}, LEXICON), logger },
    options
  );
  return { service, recognizer, entries };
}

describe('TranscriptionService.transcribe', () => {
  it('should normalize the recognized text', async () => {
    const segments = [{ start: 0, end: 2, text: ' Pertunjukan Reok Ponorogo!' }];
    const { service } = createService({
      text: 'Pertunjukan Reok Ponorogo!',
      language: 'id',
      segments,
    });

    expect(await service.transcribe(AUDIO)).toEqual({
      text: 'pertunjukan Reog Ponorogo!',
      language: 'id',
      segments,
      success: true,
    });
  });

  it('should report an undetermined language as unknown', async () => {
    const { service } = createService({ text: 'reog', segments: [] });

    const result = await service.transcribe(AUDIO);

    expect(result.language).toBe('unknown');
  });

  it('should pass the configured hint unless the call names one', async () => {
    const { service, recognizer, entries } = createService(
      { text: 'reog', segments: [] },
      { languageHint: 'id' }
    );

    await service.transcribe(AUDIO);
    await service.transcribe(AUDIO, 'en');

    expect(recognizer.calls).toEqual([
      { samples: 3, options: { language: 'id' } },
      { samples: 3, options: { language: 'en' } },
    ]);
    expect(entries.find((entry) => entry.message === 'Transcribing audio')?.context).toEqual({
      samples: 3,
      languageHint: 'id',
    });
  });

  it('should return a failed result when recognition throws', async () => {
    const { service, entries } = createService(new Error('decoder crashed'));

    expect(await service.transcribe(AUDIO)).toEqual({
      text: '',
      language: 'unknown',
      segments: [],
      success: false,
      error: 'decoder crashed',
    });
    const failure = entries.find((entry) => entry.message === 'Transcription failed');
    expect(failure?.context).toEqual({ model: 'Xenova/whisper-tiny' });
    expect(messagesAt(entries, 'ERROR')).toEqual(['Transcription failed']);
  });
});

describe('TranscriptionService.transcribeWithTimestamps', () => {
  it('should add word timings', async () => {
    const { service } = createService({
      text: 'Reog Ponorogo sangat meriah',
      language: 'id',
      segments: [
        { start: 0, end: 1, text: ' Reog Ponorogo' },
        { start: 1, end: 1.5, text: 'sangat meriah' },
      ],
    });

    const result = await service.transcribeWithTimestamps(AUDIO);

    expect(result.words).toEqual([
      { word: 'Reog', start: 0, end: 0.5 },
      { word: 'Ponorogo', start: 0.5, end: 1 },
      { word: 'sangat', start: 1, end: 1.25 },
      { word: 'meriah', start: 1.25, end: 1.5 },
    ]);
  });

  it('should have no words when transcription fails', async () => {
    const { service } = createService(new Error('decoder crashed'));

    const result = await service.transcribeWithTimestamps(AUDIO);

    expect(result.success).toBe(false);
    expect(result.words).toEqual([]);
  });
});

describe('TranscriptionService.getModelInfo', () => {
  it('should describe the recognizer model', () => {
    const { service } = createService({ text: '', segments: [] });

    expect(service.getModelInfo()).toEqual({ model: 'Xenova/whisper-tiny', parameters: '39M' });
  });
});

describe('splitIntoWords', () => {
  it('should skip segments without words', () => {
    expect(splitIntoWords([{ start: 0, end: 1, text: '   ' }])).toEqual([]);
  });
});
