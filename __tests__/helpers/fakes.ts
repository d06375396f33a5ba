/**
 * __tests__/helpers/fakes.ts
 *
 * In-process stand-ins for the engine's collaborators: a scripted model
 * client, a Map-backed key-value store and a sleep that records delays.
 */
import type { ModelClient } from '../../app/lib/engine/model-client';
import type { KeyValueStore } from '../../app/lib/engine/cache';
import type { Sleep } from '../../app/lib/engine/orchestrator';
import type { CandidateItem, RecommendationConfig, RenderedPrompt, UserContext } from '../../app/lib/types';

export const USER: UserContext = {
  id: 'user-1',
  attributes: { interest: 'trail running', budget: 'under 5000' },
};

/** `item-1` … `item-n`, alternating between two categories. */
export function makeCandidates(n: number): CandidateItem[] {
  return Array.from({ length: n }, (_, i) => ({
    id: `item-${i + 1}`,
    name: `Item ${i + 1}`,
    description: `Description for item ${i + 1}.`,
    tags: { category: i % 2 === 0 ? 'outdoor' : 'kitchen' },
  }));
}

export function reply(recommendations: Array<{ id: string; score: number; rationale?: string; rank?: number }>): string {
  return JSON.stringify({ recommendations });
}

export type ScriptStep = string | Error | ((signal: AbortSignal) => Promise<string>);

/**
 * Plays back one step per invoke() call; the last step repeats once the
 * script runs out. Records every prompt, config and signal it receives.
 */
export class ScriptedModelClient implements ModelClient {
  readonly prompts: RenderedPrompt[] = [];
  readonly configs: RecommendationConfig[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(private readonly script: ScriptStep[]) {}

  get callCount(): number {
    return this.prompts.length;
  }

  async invoke(prompt: RenderedPrompt, config: RecommendationConfig, signal: AbortSignal): Promise<string> {
    this.prompts.push(prompt);
    this.configs.push(config);
    this.signals.push(signal);
    const step = this.script[Math.min(this.prompts.length, this.script.length) - 1];
    if (typeof step === 'string') return step;
    if (step instanceof Error) throw step;
    return step(signal);
  }
}

export class MapStore implements KeyValueStore {
  readonly data = new Map<string, string>();
  readonly ttls = new Map<string, number>();

  async get(key: string): Promise<string | undefined> {
    return this.data.get(key);
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.data.set(key, value);
    this.ttls.set(key, ttlMs);
  }
}

export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
