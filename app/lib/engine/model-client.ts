import type { RecommendationConfig, RenderedPrompt } from '../types';

/**
 * The engine's only view of a language model.
 *
 * Implementations send the prompt and resolve with the raw reply text, or
 * reject with a ModelInvocationError (Timeout, RateLimited, ProviderError,
 * AuthError). They must not retry on their own; retry policy belongs to the
 * orchestrator. `signal` aborts when the per-attempt timeout fires or the
 * caller cancels, and implementations should stop work when it does.
 */
export interface ModelClient {
  invoke(prompt: RenderedPrompt, config: RecommendationConfig, signal: AbortSignal): Promise<string>;
}
