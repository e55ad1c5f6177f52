/**
 * Unit Tests for Ollama Adapter
 *
 * axios.create is mocked to hand back a stub client, so no request leaves
 * the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';

import { OllamaAdapter } from '../../../lib/src/llm/adapters/ollama.js';
import {
  InvalidRequestError,
  InvalidResponseError,
  ModelNotFoundError,
  NetworkError,
  ServerError,
  TimeoutError,
} from '../../../lib/src/llm/errors.js';
import { captureLogger, messagesAt } from '../../helpers/capture-logger.js';

// =============================================================================
// Mock Setup
// =============================================================================

const mockHttp = vi.hoisted(() => ({ post: vi.fn(), get: vi.fn() }));

vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return {
    ...actual,
    default: { ...actual.default, create: vi.fn(() => mockHttp) },
  };
});

// =============================================================================
// Test Fixtures
// =============================================================================

/** Shaped like an AxiosError as far as `isAxiosError` looks */
function axiosFailure(
  message: string,
  fields: { code?: string; response?: { status: number; data?: unknown } }
) {
  return Object.assign(new Error(message), { isAxiosError: true, ...fields });
}

const generateReply = (response: string) => ({
  data: {
    model: 'llama3.2:3b',
    response,
    done: true,
    prompt_eval_count: 12,
    eval_count: 5,
  },
});

function createAdapter(retry?: { maxRetries: number }) {
  const { logger, entries } = captureLogger('llm');
  const adapter = new OllamaAdapter({ model: 'llama3.2:3b', ...(retry && { retry }) }, { logger });
  return { adapter, entries };
}

beforeEach(() => {
  mockHttp.post.mockReset();
  mockHttp.get.mockReset();
});

afterEach(() => {
  vi.useRealTimers();
});

// =============================================================================
// Test Suites
// =============================================================================

describe('OllamaAdapter', () => {
  describe('constructor', () => {
    it('should create an HTTP client for the configured server', () => {
      new OllamaAdapter({ baseUrl: 'http://ollama.local:11434', timeoutMs: 1500 });

      expect(axios.create).toHaveBeenLastCalledWith({
        baseURL: 'http://ollama.local:11434',
        timeout: 1500,
        headers: { 'Content-Type': 'application/json' },
      });
    });

    it('should apply defaults', () => {
      const { adapter } = createAdapter();

      expect(adapter.provider).toBe('ollama');
      expect(adapter.model).toBe('llama3.2:3b');
      expect(adapter.getBaseUrl()).toBe('http://localhost:11434');
      expect(adapter.getConfig()).toMatchObject({ temperature: 0.7, maxTokens: 512, timeoutMs: 60000 });
    });
  });

  describe('complete', () => {
    it('should send a non-streaming request with the system text prepended', async () => {
      const { adapter } = createAdapter();
      mockHttp.post.mockResolvedValue(generateReply('  Reog adalah tarian.  '));

      const response = await adapter.complete('Apa itu Reog?', {
        system: 'Jawab singkat.',
        maxTokens: 256,
      });

      expect(mockHttp.post).toHaveBeenCalledWith('/api/generate', {
        model: 'llama3.2:3b',
        prompt: 'Jawab singkat.\n\nApa itu Reog?',
        stream: false,
        options: {
          temperature: 0.7,
          num_predict: 256,
          top_p: 0.9,
          top_k: 40,
          repeat_penalty: 1.1,
        },
      });
      expect(response).toEqual({
        content: 'Reog adalah tarian.',
        model: 'llama3.2:3b',
        usage: { inputTokens: 12, outputTokens: 5 },
      });
    });

    it('should send the prompt alone and pass stop sequences', async () => {
      const { adapter } = createAdapter();
      mockHttp.post.mockResolvedValue(generateReply('ok'));

      await adapter.complete('Halo', { temperature: 0.2, stopSequences: ['\n\n'] });

      expect(mockHttp.post).toHaveBeenCalledWith(
        '/api/generate',
        expect.objectContaining({
          prompt: 'Halo',
          options: expect.objectContaining({ temperature: 0.2, num_predict: 512, stop: ['\n\n'] }),
        })
      );
    });

    it('should reject a blank prompt without calling the server', async () => {
      const { adapter } = createAdapter();

      await expect(adapter.complete('   ')).rejects.toBeInstanceOf(InvalidRequestError);
      expect(mockHttp.post).not.toHaveBeenCalled();
    });

    it('should map a timeout', async () => {
      const { adapter } = createAdapter();
      mockHttp.post.mockRejectedValue(
        axiosFailure('timeout of 60000ms exceeded', { code: 'ECONNABORTED' })
      );

      const error = await adapter.complete('Apa itu Reog?').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({
        message: 'Ollama request timed out after 60000ms',
        retryable: true,
      });
    });

    it('should map an unreachable server', async () => {
      const { adapter } = createAdapter();
      mockHttp.post.mockRejectedValue(
        axiosFailure('connect ECONNREFUSED 127.0.0.1:11434', { code: 'ECONNREFUSED' })
      );

      await expect(adapter.complete('Apa itu Reog?')).rejects.toThrow(NetworkError);
    });

    it('should map a missing model', async () => {
      const { adapter } = createAdapter();
      mockHttp.post.mockRejectedValue(
        axiosFailure('Request failed with status code 404', {
          response: { status: 404, data: { error: "model 'llama3.2:3b' not found" } },
        })
      );

      const error = await adapter.complete('Apa itu Reog?').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ModelNotFoundError);
      expect(error).toMatchObject({
        message: "Model llama3.2:3b not found: model 'llama3.2:3b' not found",
        retryable: false,
      });
    });

    it('should map server and client errors', async () => {
      const { adapter } = createAdapter();
      mockHttp.post
        .mockRejectedValueOnce(
          axiosFailure('Request failed with status code 500', { response: { status: 500 } })
        )
        .mockRejectedValueOnce(
          axiosFailure('Request failed with status code 400', {
            response: { status: 400, data: { error: 'invalid options' } },
          })
        );

      await expect(adapter.complete('a')).rejects.toThrow(ServerError);
      await expect(adapter.complete('b')).rejects.toThrow(
        'Ollama rejected the request with status 400: invalid options'
      );
    });

    it('should reject a body that is not a completion', async () => {
      const { adapter } = createAdapter();
      mockHttp.post.mockResolvedValue({ data: 'not json' });

      await expect(adapter.complete('Apa itu Reog?')).rejects.toBeInstanceOf(InvalidResponseError);
    });

    it('should not retry by default', async () => {
      const { adapter } = createAdapter();
      mockHttp.post.mockRejectedValue(
        axiosFailure('Request failed with status code 503', { response: { status: 503 } })
      );

      await expect(adapter.complete('Apa itu Reog?')).rejects.toThrow(ServerError);
      expect(mockHttp.post).toHaveBeenCalledTimes(1);
    });

    it('should retry retryable failures when configured', async () => {
      vi.useFakeTimers();
      const { adapter, entries } = createAdapter({ maxRetries: 1 });
      mockHttp.post
        .mockRejectedValueOnce(
          axiosFailure('Request failed with status code 503', { response: { status: 503 } })
        )
        .mockResolvedValueOnce(generateReply('Reog adalah tarian.'));

      const pending = adapter.complete('Apa itu Reog?');
      // first backoff is about one second
      await vi.advanceTimersByTimeAsync(5000);

      await expect(pending).resolves.toMatchObject({ content: 'Reog adalah tarian.' });
      expect(mockHttp.post).toHaveBeenCalledTimes(2);
      expect(messagesAt(entries, 'WARN')).toEqual(['Retrying generation']);
    });

    it('should not retry a missing model', async () => {
      const { adapter } = createAdapter({ maxRetries: 3 });
      mockHttp.post.mockRejectedValue(
        axiosFailure('Request failed with status code 404', { response: { status: 404 } })
      );

      await expect(adapter.complete('Apa itu Reog?')).rejects.toThrow(ModelNotFoundError);
      expect(mockHttp.post).toHaveBeenCalledTimes(1);
    });
  });

  describe('generate', () => {
    it('should return the trimmed text', async () => {
      const { adapter, entries } = createAdapter();
      mockHttp.post.mockResolvedValue(generateReply('\nWarok adalah tokoh sakti.\n'));

      expect(await adapter.generate('Siapa Warok?')).toBe('Warok adalah tokoh sakti.');
      expect(entries.find((e) => e.message === 'Generated text')?.context).toEqual({
        model: 'llama3.2:3b',
        characters: 25,
        outputTokens: 5,
      });
    });

    it('should return an empty string and log when the call fails', async () => {
      const { adapter, entries } = createAdapter();
      mockHttp.post.mockRejectedValue(
        axiosFailure('timeout of 60000ms exceeded', { code: 'ECONNABORTED' })
      );

      expect(await adapter.generate('Siapa Warok?')).toBe('');
      const failure = entries.find((e) => e.message === 'Generation failed');
      expect(failure?.context).toEqual({ code: 'timeout', retryable: true });
      expect(failure?.error?.name).toBe('TimeoutError');
    });
  });

  describe('checkHealth', () => {
    it('should report an installed model', async () => {
      const { adapter } = createAdapter();
      mockHttp.get.mockResolvedValue({
        data: { models: [{ name: 'mistral:7b' }, { name: 'llama3.2:3b' }] },
      });

      expect(await adapter.checkHealth()).toEqual({
        available: true,
        modelAvailable: true,
        models: ['mistral:7b', 'llama3.2:3b'],
      });
      expect(mockHttp.get).toHaveBeenCalledWith('/api/tags', { timeout: 5000 });
    });

    it('should warn when the model is not pulled', async () => {
      const { adapter, entries } = createAdapter();
      mockHttp.get.mockResolvedValue({ data: { models: [{ name: 'mistral:7b' }] } });

      const status = await adapter.checkHealth();

      expect(status).toEqual({ available: true, modelAvailable: false, models: ['mistral:7b'] });
      expect(entries.find((e) => e.message === 'Model not installed')?.context).toMatchObject({
        hint: 'ollama pull llama3.2:3b',
      });
    });

    it('should report an unreachable server without throwing', async () => {
      const { adapter } = createAdapter();
      mockHttp.get.mockRejectedValue(
        axiosFailure('connect ECONNREFUSED 127.0.0.1:11434', { code: 'ECONNREFUSED' })
      );

      expect(await adapter.checkHealth()).toEqual({
        available: false,
        modelAvailable: false,
        models: [],
        error: 'Cannot connect to Ollama at http://localhost:11434: connect ECONNREFUSED 127.0.0.1:11434',
      });
    });
  });
});
