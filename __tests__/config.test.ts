/**
 * __tests__/config.test.ts
 *
 * Unit tests for call-config validation, environment options and backoff
 * (app/lib/engine/config.ts).
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  DEFAULT_CACHE_MAX_ENTRIES,
  DEFAULT_CONFIG,
  DEFAULT_ENGINE_OPTIONS,
  backoffDelay,
  candidateListSchema,
  loadEngineOptions,
  recommendationConfigSchema,
} from '../app/lib/engine/config';
import { makeCandidates } from './helpers/fakes';

describe('recommendationConfigSchema', () => {
  it('fills every omitted field with its default', () => {
    expect(recommendationConfigSchema.parse({})).toEqual(DEFAULT_CONFIG);
    expect(recommendationConfigSchema.parse({ maxResults: 2 })).toEqual({ ...DEFAULT_CONFIG, maxResults: 2 });
  });

  it('accepts the temperature bounds', () => {
    expect(recommendationConfigSchema.safeParse({ temperature: 0 }).success).toBe(true);
    expect(recommendationConfigSchema.safeParse({ temperature: 2 }).success).toBe(true);
    expect(recommendationConfigSchema.safeParse({ temperature: 2.01 }).success).toBe(false);
  });

  it('rejects unknown keys', () => {
    expect(recommendationConfigSchema.safeParse({ maxResult: 3 }).success).toBe(false);
  });
});

describe('candidateListSchema', () => {
  it('accepts distinct ids', () => {
    expect(candidateListSchema.safeParse(makeCandidates(3)).success).toBe(true);
  });

  it('reports the position of a duplicate id', () => {
    const candidates = [...makeCandidates(2), ...makeCandidates(1)];
    const result = candidateListSchema.safeParse(candidates);

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]).toMatchObject({ path: [2, 'id'], message: 'duplicate candidate id "item-1"' });
  });
});

describe('loadEngineOptions()', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadEngineOptions({})).toEqual({
      options: DEFAULT_ENGINE_OPTIONS,
      cacheMaxEntries: DEFAULT_CACHE_MAX_ENTRIES,
    });
  });

  it('reads numeric overrides', () => {
    const { options, cacheMaxEntries } = loadEngineOptions({
      RECOMMENDER_MAX_CANDIDATES: '20',
      RECOMMENDER_CACHE_TTL_MS: '1000',
      RECOMMENDER_CACHE_MAX_ENTRIES: '10',
      RECOMMENDER_STOCHASTIC_THRESHOLD: '1.2',
      RECOMMENDER_BACKOFF_BASE_MS: '100',
      RECOMMENDER_BACKOFF_MAX_MS: '800',
    });

    expect(options).toEqual({
      maxCandidates: 20,
      cacheTtlMs: 1000,
      stochasticTemperatureThreshold: 1.2,
      backoffBaseMs: 100,
      backoffMaxMs: 800,
    });
    expect(cacheMaxEntries).toBe(10);
  });

  it('treats empty values as unset and ignores unrelated variables', () => {
    const { options } = loadEngineOptions({ RECOMMENDER_MAX_CANDIDATES: '', PATH: '/usr/bin' });
    expect(options.maxCandidates).toBe(DEFAULT_ENGINE_OPTIONS.maxCandidates);
  });

  it('throws on a value that is not a number', () => {
    expect(() => loadEngineOptions({ RECOMMENDER_CACHE_TTL_MS: 'ten minutes' })).toThrow(ZodError);
  });
});

describe('backoffDelay()', () => {
  const opts = { backoffBaseMs: 250, backoffMaxMs: 4_000 };

  it('doubles per retry', () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, opts))).toEqual([250, 500, 1_000, 2_000]);
  });

  it('is capped at backoffMaxMs', () => {
    expect(backoffDelay(6, opts)).toBe(4_000);
    expect(backoffDelay(20, opts)).toBe(4_000);
  });
});
