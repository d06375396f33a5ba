/**
 * Call-boundary validation and engine-level options.
 *
 * RecommendationConfig is per call and validated on every recommend();
 * EngineOptions are per Recommender and normally come from the environment.
 */
import { z } from 'zod';
import type { CandidateItem, RecommendationConfig, UserContext } from '../types';

// ── Per-call config ──────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: RecommendationConfig = {
  maxResults: 5,
  temperature: 0.2,
  rationale: true,
  timeoutMs: 30_000,
  retryCount: 2,
};

export const recommendationConfigSchema = z
  .object({
    maxResults: z.number().int().positive().default(DEFAULT_CONFIG.maxResults),
    temperature: z.number().finite().min(0).max(2).default(DEFAULT_CONFIG.temperature),
    rationale: z.boolean().default(DEFAULT_CONFIG.rationale),
    timeoutMs: z.number().int().positive().default(DEFAULT_CONFIG.timeoutMs),
    retryCount: z.number().int().nonnegative().default(DEFAULT_CONFIG.retryCount),
  })
  .strict();

// Compile-time assertion: the schema output must stay assignable to RecommendationConfig.
type _InferredConfig = z.output<typeof recommendationConfigSchema>;
const _configCheck: _InferredConfig extends RecommendationConfig ? true : never = true;
void _configCheck;

// ── Per-call inputs ──────────────────────────────────────────────────────────

export const userContextSchema = z.object({
  id: z.string().min(1),
  attributes: z.record(z.string()),
});

export const candidateItemSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  tags: z.record(z.string()),
  priorScore: z.number().finite().optional(),
});

export const candidateListSchema = z
  .array(candidateItemSchema)
  .min(1, 'candidate set must not be empty')
  .superRefine((items, ctx) => {
    const seen = new Set<string>();
    items.forEach((item, index) => {
      if (seen.has(item.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `duplicate candidate id "${item.id}"`,
        });
      }
      seen.add(item.id);
    });
  });

type _InferredCandidate = z.infer<typeof candidateItemSchema>;
const _candidateCheck: _InferredCandidate extends CandidateItem ? true : never = true;
void _candidateCheck;
type _InferredUser = z.infer<typeof userContextSchema>;
const _userCheck: _InferredUser extends UserContext ? true : never = true;
void _userCheck;

// ── Engine options ───────────────────────────────────────────────────────────

export interface EngineOptions {
  /** Candidate-count ceiling; larger sets fail with PromptTooLarge. */
  maxCandidates: number;
  cacheTtlMs: number;
  /** Requests with a temperature above this neither read nor write the cache. */
  stochasticTemperatureThreshold: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  maxCandidates: 50,
  cacheTtlMs: 10 * 60_000,
  stochasticTemperatureThreshold: 0.7,
  backoffBaseMs: 250,
  backoffMaxMs: 4_000,
};

/** Default LRU capacity for InMemoryResultCache. */
export const DEFAULT_CACHE_MAX_ENTRIES = 500;

const envSchema = z.object({
  RECOMMENDER_MAX_CANDIDATES: z.coerce.number().int().positive().optional(),
  RECOMMENDER_CACHE_TTL_MS: z.coerce.number().int().positive().optional(),
  RECOMMENDER_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional(),
  RECOMMENDER_STOCHASTIC_THRESHOLD: z.coerce.number().min(0).optional(),
  RECOMMENDER_BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().optional(),
  RECOMMENDER_BACKOFF_MAX_MS: z.coerce.number().int().nonnegative().optional(),
});

export interface LoadedEngineConfig {
  options: EngineOptions;
  cacheMaxEntries: number;
}

/**
 * Read engine options from environment variables, falling back to defaults.
 * Throws a ZodError when a variable is set to something that is not a valid number.
 */
export function loadEngineOptions(env: NodeJS.ProcessEnv = process.env): LoadedEngineConfig {
  // Empty strings count as unset, so `FOO=` in a .env file keeps the default.
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('RECOMMENDER_') && value !== ''),
  );
  const parsed = envSchema.parse(present);

  return {
    options: {
      maxCandidates: parsed.RECOMMENDER_MAX_CANDIDATES ?? DEFAULT_ENGINE_OPTIONS.maxCandidates,
      cacheTtlMs: parsed.RECOMMENDER_CACHE_TTL_MS ?? DEFAULT_ENGINE_OPTIONS.cacheTtlMs,
      stochasticTemperatureThreshold:
        parsed.RECOMMENDER_STOCHASTIC_THRESHOLD ?? DEFAULT_ENGINE_OPTIONS.stochasticTemperatureThreshold,
      backoffBaseMs: parsed.RECOMMENDER_BACKOFF_BASE_MS ?? DEFAULT_ENGINE_OPTIONS.backoffBaseMs,
      backoffMaxMs: parsed.RECOMMENDER_BACKOFF_MAX_MS ?? DEFAULT_ENGINE_OPTIONS.backoffMaxMs,
    },
    cacheMaxEntries: parsed.RECOMMENDER_CACHE_MAX_ENTRIES ?? DEFAULT_CACHE_MAX_ENTRIES,
  };
}

/** Exponential backoff before retry number `retry` (1-based), capped at `backoffMaxMs`. */
export function backoffDelay(retry: number, options: Pick<EngineOptions, 'backoffBaseMs' | 'backoffMaxMs'>): number {
  return Math.min(options.backoffBaseMs * 2 ** (retry - 1), options.backoffMaxMs);
}
