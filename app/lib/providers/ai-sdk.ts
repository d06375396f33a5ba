import { APICallError, RetryError, generateText, type LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { ModelInvocationError } from '../engine/errors';
import type { ModelClient } from '../engine/model-client';
import type { RecommendationConfig, RenderedPrompt } from '../types';

export const DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * Map whatever the AI SDK threw onto the engine's model failure kinds.
 *
 *   401 / 403      → AuthError
 *   429            → RateLimited
 *   408, aborts    → Timeout
 *   5xx            → ProviderError (transient)
 *   other 4xx      → ProviderError (not transient; resending will not help)
 *   anything else  → ProviderError (transient)
 */
export function classifyProviderError(err: unknown): ModelInvocationError {
  if (err instanceof ModelInvocationError) return err;

  // With maxRetries: 0 the SDK should not wrap, but unwrap in case it does.
  if (RetryError.isInstance(err)) return classifyProviderError(err.lastError);

  if (APICallError.isInstance(err)) {
    const status = err.statusCode;
    const detail = `${err.message}${status !== undefined ? ` (HTTP ${status})` : ''}`;
    if (status === 401 || status === 403) return new ModelInvocationError('AuthError', detail, { cause: err });
    if (status === 429) return new ModelInvocationError('RateLimited', detail, { cause: err });
    if (status === 408) return new ModelInvocationError('Timeout', detail, { cause: err });
    if (status !== undefined && status >= 400 && status < 500) {
      return new ModelInvocationError('ProviderError', detail, { cause: err, transient: false });
    }
    return new ModelInvocationError('ProviderError', detail, { cause: err, transient: true });
  }

  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
    return new ModelInvocationError('Timeout', err.message, { cause: err });
  }

  const msg = err instanceof Error ? err.message : String(err);
  return new ModelInvocationError('ProviderError', msg, { cause: err, transient: true });
}

/**
 * ModelClient over any Vercel AI SDK language model. The SDK's own retries are
 * switched off; the orchestrator decides what gets retried.
 */
export class AiSdkModelClient implements ModelClient {
  constructor(private readonly model: LanguageModel) {}

  async invoke(prompt: RenderedPrompt, config: RecommendationConfig, signal: AbortSignal): Promise<string> {
    try {
      const { text } = await generateText({
        model: this.model,
        system: prompt.system,
        prompt: prompt.prompt,
        temperature: config.temperature,
        abortSignal: signal,
        maxRetries: 0,
      });
      return text;
    } catch (err: unknown) {
      throw classifyProviderError(err);
    }
  }

  /** Cheap round trip used to confirm the credentials and model name work. */
  async ping(signal?: AbortSignal): Promise<void> {
    try {
      await generateText({
        model: this.model,
        prompt: 'Test connection',
        maxTokens: 5,
        abortSignal: signal,
        maxRetries: 0,
      });
    } catch (err: unknown) {
      throw classifyProviderError(err);
    }
  }
}

// ── OpenAI / OpenRouter ──────────────────────────────────────────────────────

/** OpenAI-style secret keys start with "sk-" and are never shorter than 20 characters. */
export function validateApiKeyFormat(apiKey: string): boolean {
  return apiKey.startsWith('sk-') && apiKey.length >= 20;
}

/**
 * Build a client from environment variables:
 *   OPENAI_API_KEY     — required
 *   OPENAI_BASE_URL    — optional, e.g. https://openrouter.ai/api/v1
 *   RECOMMENDER_MODEL  — optional, defaults to gpt-4o-mini
 */
export function createOpenAIModelClient(env: NodeJS.ProcessEnv = process.env): AiSdkModelClient {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) throw new Error('OPENAI_API_KEY is not set in environment.');
  if (!validateApiKeyFormat(apiKey)) {
    throw new Error('OPENAI_API_KEY is malformed: expected an "sk-" prefix and at least 20 characters.');
  }

  const openai = createOpenAI({ apiKey, baseURL: env.OPENAI_BASE_URL || undefined });
  return new AiSdkModelClient(openai(env.RECOMMENDER_MODEL || DEFAULT_MODEL));
}
