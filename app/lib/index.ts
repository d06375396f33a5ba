export * from './types';
export { Recommender, abortableSleep } from './engine/orchestrator';
export type { RecommenderDeps, RecommendOptions, Sleep } from './engine/orchestrator';
export { InMemoryResultCache, KeyValueResultCache } from './engine/cache';
export type { ResultCache, KeyValueStore, InMemoryResultCacheOptions, KeyValueResultCacheOptions } from './engine/cache';
export type { ModelClient } from './engine/model-client';
export { buildPrompt, buildCorrectivePrompt, neutralize, SYSTEM_PROMPT } from './engine/prompt';
export { parseRecommendations, extractJsonBlock } from './engine/parser';
export { fingerprint, stableStringify } from './engine/fingerprint';
export { createConsoleEventSink, createMemoryEventSink } from './engine/events';
export type { EventSink, MemoryEventSink } from './engine/events';
export {
  DEFAULT_CONFIG,
  DEFAULT_ENGINE_OPTIONS,
  loadEngineOptions,
  recommendationConfigSchema,
} from './engine/config';
export type { EngineOptions, LoadedEngineConfig } from './engine/config';
export {
  RecommendationError,
  ModelInvocationError,
  ResponseParseError,
  PromptTooLargeError,
  describeFailure,
  isRecommendationError,
} from './engine/errors';
export type { FailureKind, ModelFailureKind, ParseFailureKind, FailureDescription } from './engine/errors';
export { AiSdkModelClient, classifyProviderError, createOpenAIModelClient } from './providers/ai-sdk';
export { loadCatalog, toCandidates, toProductDisplays } from './catalog';
export { normalizeCandidate, validateCandidate } from './utils/normalizer';
