import { createHash } from 'node:crypto';
import type { CandidateItem, RecommendationConfig, UserContext } from '../types';

// Bump when the cached RankedList shape or the prompt contract changes, so old
// entries in a shared key-value store stop matching.
const FINGERPRINT_VERSION = 'v1';

/**
 * Deterministic JSON serialization with sorted object keys.
 * `{a:1, b:2}` and `{b:2, a:1}` produce identical strings; array order is kept.
 * `undefined` object values are skipped, matching JSON.stringify.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  const entries: Array<[string, unknown]> = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
}

/**
 * Cache key for one recommend() call: SHA-256 over the canonical form of the
 * user context, the ordered candidate list and the resolved config. Depends on
 * nothing but its arguments, so it is stable across process restarts.
 */
export function fingerprint(
  userContext: UserContext,
  candidates: readonly CandidateItem[],
  config: RecommendationConfig,
): string {
  const canonical = stableStringify({
    version: FINGERPRINT_VERSION,
    user: userContext,
    candidates,
    config,
  });
  return createHash('sha256').update(canonical).digest('hex');
}
