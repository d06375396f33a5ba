/**
 * Recommendation orchestrator — the engine's single public operation.
 *
 *   Validating → CacheLookup → Building → Invoking → Parsing → Caching → Done
 *
 * Any state can end in Failed(kind). Every transition, cache outcome, retry and
 * failure is emitted to the EventSink under one correlation id per call.
 *
 * Retry policy lives here, not in the model client:
 *   - Timeout / RateLimited / transient ProviderError → up to `retryCount`
 *     retries with capped exponential backoff
 *   - AuthError → Unauthorized, never retried
 *   - an unparsable reply → exactly one corrective re-prompt
 */
import { randomUUID } from 'node:crypto';
import type { ZodType, ZodTypeDef } from 'zod';
import type {
  CandidateItem,
  EngineEventName,
  EngineState,
  RankedList,
  RecommendationConfig,
  RecommendationConfigInput,
  RenderedPrompt,
  UserContext,
} from '../types';
import type { ResultCache } from './cache';
import {
  DEFAULT_ENGINE_OPTIONS,
  backoffDelay,
  candidateListSchema,
  recommendationConfigSchema,
  userContextSchema,
  type EngineOptions,
} from './config';
import {
  ModelInvocationError,
  PromptTooLargeError,
  RecommendationError,
  ResponseParseError,
} from './errors';
import { createConsoleEventSink, type EventSink } from './events';
import { fingerprint } from './fingerprint';
import type { ModelClient } from './model-client';
import { parseRecommendations } from './parser';
import { buildCorrectivePrompt, buildPrompt } from './prompt';

/** Corrective re-prompts allowed after the first unparsable reply. */
const MAX_CORRECTIVE_RETRIES = 1;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RecommenderDeps {
  modelClient: ModelClient;
  cache: ResultCache;
  events?: EventSink;
  options?: Partial<EngineOptions>;
  /** Backoff wait. Defaults to an abortable setTimeout. */
  sleep?: Sleep;
  now?: () => Date;
  createCorrelationId?: () => string;
}

export interface RecommendOptions {
  /** Cancels the call; an in-flight model request is aborted. */
  signal?: AbortSignal;
  correlationId?: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

// ── Per-call bookkeeping ─────────────────────────────────────────────────────

class RecommendationRun {
  state: EngineState | undefined;
  modelCalls = 0;

  constructor(
    readonly correlationId: string,
    private readonly sink: EventSink,
    private readonly now: () => Date,
  ) {}

  emit(event: EngineEventName, detail: Record<string, unknown> = {}): void {
    this.sink.emit({
      timestamp: this.now().toISOString(),
      correlationId: this.correlationId,
      event,
      detail,
    });
  }

  enter(next: EngineState): void {
    this.emit('state', { from: this.state ?? null, to: next });
    this.state = next;
  }
}

function cancelled(reason?: unknown): RecommendationError {
  return new RecommendationError('Cancelled', 'Recommendation was cancelled by the caller.', { cause: reason });
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw cancelled(signal.reason);
}

function toFailure(err: unknown): RecommendationError | undefined {
  if (err instanceof RecommendationError) return err;
  if (err instanceof PromptTooLargeError) {
    return new RecommendationError('PromptTooLarge', err.message, { cause: err });
  }
  return undefined;
}

function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const where = issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
  throw new RecommendationError('InvalidInput', `Invalid ${label}${where}: ${issue.message}`, {
    cause: result.error,
  });
}

// ── Orchestrator ─────────────────────────────────────────────────────────────

export class Recommender {
  private readonly modelClient: ModelClient;
  private readonly cache: ResultCache;
  private readonly events: EventSink;
  private readonly options: EngineOptions;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly createCorrelationId: () => string;

  constructor(deps: RecommenderDeps) {
    this.modelClient = deps.modelClient;
    this.cache = deps.cache;
    this.events = deps.events ?? createConsoleEventSink();
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...deps.options };
    this.sleep = deps.sleep ?? abortableSleep;
    this.now = deps.now ?? (() => new Date());
    this.createCorrelationId = deps.createCorrelationId ?? randomUUID;
  }

  /**
   * Rank `candidates` for `userContext`.
   * Resolves with a grounded, contiguously ranked list, or rejects with a
   * RecommendationError; never with a partial list.
   */
  async recommend(
    userContext: UserContext,
    candidates: readonly CandidateItem[],
    config: RecommendationConfigInput = {},
    callOptions: RecommendOptions = {},
  ): Promise<RankedList> {
    const run = new RecommendationRun(
      callOptions.correlationId ?? this.createCorrelationId(),
      this.events,
      this.now,
    );

    try {
      return await this.execute(run, userContext, candidates, config, callOptions.signal);
    } catch (err: unknown) {
      const failure = toFailure(err);
      // Nothing else is expected to escape execute(); surface it rather than guess a kind.
      if (!failure) throw err;
      run.enter('Failed');
      run.emit('failed', {
        kind: failure.kind,
        message: failure.message,
        modelCalls: run.modelCalls,
        ...(failure.parseFailure && { parseFailure: failure.parseFailure }),
      });
      throw failure;
    }
  }

  private async execute(
    run: RecommendationRun,
    rawUser: UserContext,
    rawCandidates: readonly CandidateItem[],
    rawConfig: RecommendationConfigInput,
    signal: AbortSignal | undefined,
  ): Promise<RankedList> {
    // ── Validating ──────────────────────────────────────────────────────────
    run.enter('Validating');
    throwIfCancelled(signal);
    const userContext = validate(userContextSchema, rawUser, 'user context');
    const candidates = validate(candidateListSchema, rawCandidates, 'candidates');
    const config = validate(recommendationConfigSchema, rawConfig, 'config');

    // ── CacheLookup ─────────────────────────────────────────────────────────
    throwIfCancelled(signal);
    run.enter('CacheLookup');
    const cacheKey =
      config.temperature > this.options.stochasticTemperatureThreshold
        ? undefined
        : fingerprint(userContext, candidates, config);

    if (cacheKey === undefined) {
      run.emit('cache_bypass', {
        temperature: config.temperature,
        threshold: this.options.stochasticTemperatureThreshold,
      });
    } else {
      const cached = await this.readCache(run, cacheKey);
      throwIfCancelled(signal);
      if (cached) {
        run.enter('Done');
        run.emit('done', { results: cached.length, modelCalls: 0, cached: true });
        return cached;
      }
    }

    // ── Building ────────────────────────────────────────────────────────────
    throwIfCancelled(signal);
    run.enter('Building');
    const prompt = buildPrompt(userContext, candidates, config, {
      maxCandidates: this.options.maxCandidates,
    });

    // ── Invoking / Parsing ──────────────────────────────────────────────────
    const list = await this.invokeAndParse(run, prompt, candidates, config, signal);

    // ── Caching ─────────────────────────────────────────────────────────────
    throwIfCancelled(signal);
    run.enter('Caching');
    if (cacheKey !== undefined) await this.writeCache(run, cacheKey, list);
    throwIfCancelled(signal);

    run.enter('Done');
    run.emit('done', { results: list.length, modelCalls: run.modelCalls, cached: false });
    return list;
  }

  private async invokeAndParse(
    run: RecommendationRun,
    initialPrompt: RenderedPrompt,
    candidates: readonly CandidateItem[],
    config: RecommendationConfig,
    signal: AbortSignal | undefined,
  ): Promise<RankedList> {
    let prompt = initialPrompt;

    for (let corrections = 0; ; corrections++) {
      throwIfCancelled(signal);
      run.enter('Invoking');
      const raw = await this.invokeWithRetry(run, prompt, config, signal);

      throwIfCancelled(signal);
      run.enter('Parsing');
      try {
        return parseRecommendations(raw, candidates, config);
      } catch (err: unknown) {
        if (!(err instanceof ResponseParseError)) throw err;
        if (corrections >= MAX_CORRECTIVE_RETRIES) {
          throw new RecommendationError(
            'UnparsableResponse',
            `Model response could not be used after a corrective retry: ${err.message}`,
            { cause: err, parseFailure: err.kind },
          );
        }
        run.emit('corrective_retry', { reason: err.kind, message: err.message });
        prompt = buildCorrectivePrompt(prompt, err);
      }
    }
  }

  private async invokeWithRetry(
    run: RecommendationRun,
    prompt: RenderedPrompt,
    config: RecommendationConfig,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    for (let attempt = 1; ; attempt++) {
      run.modelCalls++;
      run.emit('model_attempt', { attempt, timeoutMs: config.timeoutMs });

      try {
        return await this.invokeOnce(prompt, config, signal);
      } catch (err: unknown) {
        if (err instanceof RecommendationError) throw err;
        if (signal?.aborted) throw cancelled(signal.reason);

        const failure =
          err instanceof ModelInvocationError
            ? err
            : new ModelInvocationError('ProviderError', errorMessage(err), { cause: err });

        if (failure.kind === 'AuthError') {
          throw new RecommendationError('Unauthorized', `Model provider rejected credentials: ${failure.message}`, {
            cause: failure,
          });
        }
        if (!failure.transient || attempt > config.retryCount) {
          throw new RecommendationError(
            'ModelUnavailable',
            `Model unavailable after ${attempt} attempt${attempt === 1 ? '' : 's'}: ${failure.message}`,
            { cause: failure },
          );
        }

        const delayMs = backoffDelay(attempt, this.options);
        run.emit('retry', { attempt, delayMs, reason: failure.kind, message: failure.message });
        await this.pause(delayMs, signal);
      }
    }
  }

  /**
   * One model call bounded by `config.timeoutMs`. The race against the abort
   * promise keeps the bound even when a client ignores its signal.
   */
  private async invokeOnce(
    prompt: RenderedPrompt,
    config: RecommendationConfig,
    outer: AbortSignal | undefined,
  ): Promise<string> {
    throwIfCancelled(outer);

    const controller = new AbortController();
    let rejectAbort: (reason: unknown) => void = () => undefined;
    const aborted = new Promise<never>((_, reject) => {
      rejectAbort = reject;
    });

    const timer = setTimeout(() => {
      const timeout = new ModelInvocationError('Timeout', `Model call exceeded ${config.timeoutMs}ms.`);
      controller.abort(timeout);
      rejectAbort(timeout);
    }, config.timeoutMs);

    const onOuterAbort = () => {
      controller.abort(outer?.reason);
      rejectAbort(cancelled(outer?.reason));
    };
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    try {
      return await Promise.race([this.modelClient.invoke(prompt, config, controller.signal), aborted]);
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onOuterAbort);
    }
  }

  private async pause(ms: number, signal: AbortSignal | undefined): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (err: unknown) {
      if (signal?.aborted) throw cancelled(signal.reason);
      throw err;
    }
    throwIfCancelled(signal);
  }

  private async readCache(run: RecommendationRun, key: string): Promise<RankedList | undefined> {
    try {
      const hit = await this.cache.get(key);
      run.emit(hit ? 'cache_hit' : 'cache_miss', { fingerprint: key.slice(0, 12) });
      return hit;
    } catch (err: unknown) {
      run.emit('cache_read_failed', { fingerprint: key.slice(0, 12), message: errorMessage(err) });
      return undefined;
    }
  }

  private async writeCache(run: RecommendationRun, key: string, list: RankedList): Promise<void> {
    try {
      await this.cache.put(key, list, this.options.cacheTtlMs);
    } catch (err: unknown) {
      run.emit('cache_write_failed', { fingerprint: key.slice(0, 12), message: errorMessage(err) });
    }
  }
}
