import { z } from 'zod';
import type { CacheEntry, RankedList } from '../types';
import { DEFAULT_CACHE_MAX_ENTRIES } from './config';

/**
 * Memoizes parsed recommendation results by fingerprint.
 * Async so that implementations can sit in front of an external store.
 */
export interface ResultCache {
  get(fingerprint: string): Promise<RankedList | undefined>;
  put(fingerprint: string, list: RankedList, ttlMs: number): Promise<void>;
}

function copyList(list: RankedList): RankedList {
  return list.map((rec) => ({ ...rec }));
}

function isExpired(entry: Pick<CacheEntry, 'createdAt' | 'ttlMs'>, now: number): boolean {
  return now - entry.createdAt >= entry.ttlMs;
}

// ── In-memory LRU ────────────────────────────────────────────────────────────

export interface InMemoryResultCacheOptions {
  maxEntries?: number;
  now?: () => number;
}

/**
 * Process-local LRU cache with per-entry TTL.
 *
 * A Map keeps insertion order, so re-inserting on every hit keeps the least
 * recently used entry at the front. Expired entries are evicted lazily when a
 * lookup finds them. Lists are copied in and out; callers never share a
 * reference with a stored entry.
 */
export class InMemoryResultCache implements ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: InMemoryResultCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new Error(`maxEntries must be a positive integer, got ${this.maxEntries}.`);
    }
    this.now = options.now ?? Date.now;
  }

  async get(fingerprint: string): Promise<RankedList | undefined> {
    const entry = this.entries.get(fingerprint);
    if (!entry) return undefined;

    this.entries.delete(fingerprint);
    if (isExpired(entry, this.now())) return undefined;

    this.entries.set(fingerprint, entry);
    return copyList(entry.list);
  }

  async put(fingerprint: string, list: RankedList, ttlMs: number): Promise<void> {
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, {
      fingerprint,
      list: copyList(list),
      createdAt: this.now(),
      ttlMs,
    });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (oldest === undefined) break;
      this.entries.delete(oldest);
    }
  }

  delete(fingerprint: string): boolean {
    return this.entries.delete(fingerprint);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Stored entries, expired ones included until a lookup evicts them. */
  get size(): number {
    return this.entries.size;
  }
}

// ── External key-value store ─────────────────────────────────────────────────

/** Minimal contract for a shared store (Redis, Memcached, a DynamoDB table…). */
export interface KeyValueStore {
  get(key: string): Promise<string | null | undefined>;
  /** `ttlMs` is a hint; the cache re-checks expiry itself on read. */
  set(key: string, value: string, ttlMs: number): Promise<void>;
}

const storedEntrySchema = z.object({
  fingerprint: z.string(),
  createdAt: z.number(),
  ttlMs: z.number(),
  list: z.array(
    z.object({
      itemId: z.string(),
      rank: z.number().int().positive(),
      score: z.number(),
      rationale: z.string().optional(),
    }),
  ),
});

export interface KeyValueResultCacheOptions {
  namespace?: string;
  now?: () => number;
}

/**
 * ResultCache backed by an external KeyValueStore. Entries are stored as JSON
 * CacheEntry records under `<namespace>:<fingerprint>`.
 *
 * Writes for the same fingerprint are chained in the order put() was called,
 * so the last caller's list is the one left in the store.
 */
export class KeyValueResultCache implements ResultCache {
  private readonly namespace: string;
  private readonly now: () => number;
  private readonly pendingWrites = new Map<string, Promise<void>>();

  constructor(
    private readonly store: KeyValueStore,
    options: KeyValueResultCacheOptions = {},
  ) {
    this.namespace = options.namespace ?? 'recommender:v1';
    this.now = options.now ?? Date.now;
  }

  private key(fingerprint: string): string {
    return `${this.namespace}:${fingerprint}`;
  }

  async get(fingerprint: string): Promise<RankedList | undefined> {
    const raw = await this.store.get(this.key(fingerprint));
    if (raw === null || raw === undefined) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn(`[KeyValueResultCache] Ignoring unreadable entry for ${fingerprint.slice(0, 12)}`);
      return undefined;
    }

    const parsed = storedEntrySchema.safeParse(json);
    if (!parsed.success || parsed.data.fingerprint !== fingerprint) {
      console.warn(`[KeyValueResultCache] Ignoring malformed entry for ${fingerprint.slice(0, 12)}`);
      return undefined;
    }
    if (isExpired(parsed.data, this.now())) return undefined;

    return parsed.data.list;
  }

  async put(fingerprint: string, list: RankedList, ttlMs: number): Promise<void> {
    const entry: CacheEntry = { fingerprint, list: copyList(list), createdAt: this.now(), ttlMs };
    const payload = JSON.stringify(entry);

    const previous = this.pendingWrites.get(fingerprint) ?? Promise.resolve();
    // A failed earlier write must not block this one; its own caller sees that failure.
    const write = previous
      .catch(() => undefined)
      .then(() => this.store.set(this.key(fingerprint), payload, ttlMs));
    this.pendingWrites.set(fingerprint, write);

    try {
      await write;
    } finally {
      if (this.pendingWrites.get(fingerprint) === write) {
        this.pendingWrites.delete(fingerprint);
      }
    }
  }
}
