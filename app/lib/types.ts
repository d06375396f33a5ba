// ── Call inputs ──────────────────────────────────────────────────────────────

/**
 * Who the recommendation is for. `attributes` carries preferences, a history
 * summary and the free-text query, e.g. `{ interest: "landscape photography" }`.
 */
export interface UserContext {
  id: string;
  attributes: Record<string, string>;
}

export interface CandidateItem {
  id: string;
  name: string;
  description: string;
  tags: Record<string, string>;   // e.g. { category: "Cooking", price: "3900" }
  priorScore?: number;            // upstream relevance hint, rendered into the prompt
}

export interface RecommendationConfig {
  maxResults: number;
  temperature: number;
  rationale: boolean;
  timeoutMs: number;
  retryCount: number;
}

/** What callers may pass; omitted fields take the defaults in config.ts. */
export type RecommendationConfigInput = Partial<RecommendationConfig>;

// ── Engine output ────────────────────────────────────────────────────────────

export interface RankedRecommendation {
  itemId: string;
  rank: number;          // 1-based, contiguous within a RankedList
  score: number;         // higher = more relevant
  rationale?: string;
}

export type RankedList = RankedRecommendation[];

// ── Prompt layer ─────────────────────────────────────────────────────────────

export interface RenderedPrompt {
  system: string;
  prompt: string;
}

// ── Cache layer ──────────────────────────────────────────────────────────────

export interface CacheEntry {
  fingerprint: string;
  list: RankedList;
  createdAt: number;     // epoch ms
  ttlMs: number;
}

// ── Observability ────────────────────────────────────────────────────────────

export type EngineState =
  | 'Validating'
  | 'CacheLookup'
  | 'Building'
  | 'Invoking'
  | 'Parsing'
  | 'Caching'
  | 'Done'
  | 'Failed';

export type EngineEventName =
  | 'state'
  | 'cache_hit'
  | 'cache_miss'
  | 'cache_bypass'
  | 'cache_read_failed'
  | 'cache_write_failed'
  | 'model_attempt'
  | 'retry'
  | 'corrective_retry'
  | 'failed'
  | 'done';

export interface EngineEvent {
  timestamp: string;     // ISO 8601
  correlationId: string;
  event: EngineEventName;
  detail: Record<string, unknown>;
}

// ── Catalog layer ────────────────────────────────────────────────────────────

export interface CatalogProduct {
  id: string;
  name: string;
  price: number;
  description: string;
  image: string;
}

/** Category name → products, as stored in data/catalog.json. */
export type ProductCatalog = Record<string, CatalogProduct[]>;

/** A recommendation joined back to its catalog product for display. */
export interface ProductDisplay {
  rank: number;
  category: string;
  product: string;
  price: number;
  reason: string;
  confidence: number;
  image: string;
}
