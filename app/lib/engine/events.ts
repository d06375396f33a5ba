import type { EngineEvent } from '../types';

/** Receives structured engine events. Storage and formatting are up to the sink. */
export interface EventSink {
  emit(event: EngineEvent): void;
}

const WARN_EVENTS = new Set<EngineEvent['event']>(['retry', 'corrective_retry', 'cache_read_failed', 'cache_write_failed']);

/**
 * Default sink: one console line per event, tagged `[recommender]`.
 * State transitions are chatty, so they only print when `verbose` is set.
 */
export function createConsoleEventSink(options: { verbose?: boolean } = {}): EventSink {
  return {
    emit(event) {
      if (event.event === 'state' && !options.verbose) return;
      const line = `[recommender] ${event.correlationId} ${event.event} ${JSON.stringify(event.detail)}`;
      if (event.event === 'failed') console.error(line);
      else if (WARN_EVENTS.has(event.event)) console.warn(line);
      else console.info(line);
    },
  };
}

export interface MemoryEventSink extends EventSink {
  readonly events: EngineEvent[];
}

/** Collects events in an array; handy for tests and debugging panels. */
export function createMemoryEventSink(): MemoryEventSink {
  const events: EngineEvent[] = [];
  return {
    events,
    emit(event) {
      events.push(event);
    },
  };
}
