import type { RuntimeResource } from '../lifecycle';
import type { JsonValue } from '../entities/json';

/**
 * A single, immutable occurrence delivered to external subscribers.
 */
export interface EngineEvent {
    /** Namespace (e.g. 'execution', 'debug') */
    channel: string;
    /** Event identifier within the channel (e.g. 'node_enter') */
    name: string;
    /** Monotonic sequence assigned by the bus */
    seq: number;
    /** ISO timestamp assigned by the bus */
    timestamp: string;
    payload: JsonValue;
    metadata?: Record<string, unknown>;
}

export type EventReducer = (event: EngineEvent) => EngineEvent | EngineEvent[] | null;

/**
 * Best-effort event sink. `emit` returns immediately and never throws into
 * the caller; delivery to subscribers happens later.
 */
export interface EventBus extends RuntimeResource {
    emit(event: Omit<EngineEvent, 'seq' | 'timestamp'>): void;

    /** Reducers can transform, drop (null) or fan out (array) events. */
    use(reducer: EventReducer): void;

    /** Patterns are `channel:name` with `*` wildcards, e.g. 'execution:*'. */
    subscribe(pattern: string, handler: (event: EngineEvent) => void): () => void;
}
