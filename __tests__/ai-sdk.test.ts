/**
 * __tests__/ai-sdk.test.ts
 *
 * Unit tests for the AI SDK model client (app/lib/providers/ai-sdk.ts).
 *
 * A hand-built language model stands in for the provider, so no HTTP request
 * is ever made.
 */

import { describe, it, expect } from 'vitest';
import { APICallError, RetryError, type LanguageModel } from 'ai';
import {
  AiSdkModelClient,
  classifyProviderError,
  createOpenAIModelClient,
  validateApiKeyFormat,
} from '../app/lib/providers/ai-sdk';
import { ModelInvocationError } from '../app/lib/engine/errors';
import { DEFAULT_CONFIG } from '../app/lib/engine/config';

type CallOptions = Parameters<LanguageModel['doGenerate']>[0];

function apiError(statusCode: number | undefined, message = 'upstream said no'): APICallError {
  return new APICallError({
    message,
    url: 'https://api.example.test/v1/chat/completions',
    requestBodyValues: {},
    statusCode,
  });
}

function fakeModel(respond: (options: CallOptions) => string): { model: LanguageModel; calls: CallOptions[] } {
  const calls: CallOptions[] = [];
  const model: LanguageModel = {
    specificationVersion: 'v1',
    provider: 'test',
    modelId: 'test-model',
    defaultObjectGenerationMode: undefined,
    async doGenerate(options) {
      calls.push(options);
      return {
        text: respond(options),
        finishReason: 'stop',
        usage: { promptTokens: 10, completionTokens: 5 },
        rawCall: { rawPrompt: null, rawSettings: {} },
      };
    },
    async doStream() {
      throw new Error('streaming is not used');
    },
  };
  return { model, calls };
}

// ── classifyProviderError() ──────────────────────────────────────────────────

describe('classifyProviderError()', () => {
  it.each([
    [401, 'AuthError', false],
    [403, 'AuthError', false],
    [429, 'RateLimited', true],
    [408, 'Timeout', true],
    [400, 'ProviderError', false],
    [404, 'ProviderError', false],
    [500, 'ProviderError', true],
    [503, 'ProviderError', true],
  ])('maps HTTP %i to %s (transient=%s)', (status, kind, transient) => {
    const classified = classifyProviderError(apiError(status));
    expect(classified.kind).toBe(kind);
    expect(classified.transient).toBe(transient);
  });

  it('keeps the status in the message and the original as cause', () => {
    const original = apiError(429, 'Rate limit reached');
    const classified = classifyProviderError(original);

    expect(classified.message).toBe('Rate limit reached (HTTP 429)');
    expect(classified.cause).toBe(original);
  });

  it('treats a call error without a status as transient', () => {
    const classified = classifyProviderError(apiError(undefined, 'fetch failed'));
    expect(classified.kind).toBe('ProviderError');
    expect(classified.transient).toBe(true);
    expect(classified.message).toBe('fetch failed');
  });

  it('unwraps the SDK retry wrapper', () => {
    const wrapped = new RetryError({
      message: 'Failed after 3 attempts.',
      reason: 'maxRetriesExceeded',
      errors: [apiError(500), apiError(401)],
    });
    expect(classifyProviderError(wrapped).kind).toBe('AuthError');
  });

  it('maps aborts to Timeout', () => {
    const aborted = new Error('This operation was aborted');
    aborted.name = 'AbortError';
    expect(classifyProviderError(aborted).kind).toBe('Timeout');
  });

  it('passes an already-classified error through', () => {
    const err = new ModelInvocationError('RateLimited', 'slow down');
    expect(classifyProviderError(err)).toBe(err);
  });

  it('falls back to a transient ProviderError', () => {
    const classified = classifyProviderError('connection reset');
    expect(classified).toBeInstanceOf(ModelInvocationError);
    expect(classified.kind).toBe('ProviderError');
    expect(classified.transient).toBe(true);
    expect(classified.message).toBe('connection reset');
  });
});

// ── AiSdkModelClient ─────────────────────────────────────────────────────────

describe('AiSdkModelClient', () => {
  const PROMPT = { system: 'You rank items.', prompt: 'Rank these.' };

  it('returns the generated text and forwards temperature and signal', async () => {
    const { model, calls } = fakeModel(() => '{"recommendations":[]}');
    const client = new AiSdkModelClient(model);
    const controller = new AbortController();

    const text = await client.invoke(PROMPT, { ...DEFAULT_CONFIG, temperature: 0.4 }, controller.signal);

    expect(text).toBe('{"recommendations":[]}');
    expect(calls).toHaveLength(1);
    expect(calls[0].temperature).toBe(0.4);
    expect(calls[0].abortSignal).toBe(controller.signal);
    expect(calls[0].prompt[0]).toMatchObject({ role: 'system', content: 'You rank items.' });
  });

  it('classifies provider failures without retrying them itself', async () => {
    let attempts = 0;
    const { model } = fakeModel(() => {
      attempts++;
      throw apiError(503, 'overloaded');
    });
    const client = new AiSdkModelClient(model);

    const failure = client.invoke(PROMPT, DEFAULT_CONFIG, new AbortController().signal);

    await expect(failure).rejects.toBeInstanceOf(ModelInvocationError);
    await expect(failure).rejects.toThrow('overloaded (HTTP 503)');
    expect(attempts).toBe(1);
  });

  it('pings with a tiny completion', async () => {
    const { model, calls } = fakeModel(() => 'ok');
    await new AiSdkModelClient(model).ping();
    expect(calls[0].maxTokens).toBe(5);
  });
});

// ── createOpenAIModelClient() ────────────────────────────────────────────────

describe('createOpenAIModelClient()', () => {
  it('requires an API key', () => {
    expect(() => createOpenAIModelClient({})).toThrow('OPENAI_API_KEY is not set in environment.');
  });

  it('rejects a malformed key', () => {
    expect(() => createOpenAIModelClient({ OPENAI_API_KEY: 'test-secret' })).toThrow(/OPENAI_API_KEY is malformed/);
  });

  it('builds a client for a well-formed key', () => {
    const client = createOpenAIModelClient({
      OPENAI_API_KEY: 'sk-test-placeholder-key',
      OPENAI_BASE_URL: 'http://localhost:4010/v1',
    });
    expect(client).toBeInstanceOf(AiSdkModelClient);
  });
});

describe('validateApiKeyFormat()', () => {
  it('checks prefix and length', () => {
    expect(validateApiKeyFormat('sk-test-placeholder-key')).toBe(true);
    expect(validateApiKeyFormat('sk-short')).toBe(false);
    expect(validateApiKeyFormat('pk-test-placeholder-key')).toBe(false);
  });
});
