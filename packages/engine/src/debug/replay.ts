import type { ExecutionTrace, JsonObject, TraceEvent, TraceEventType } from '@weave/core';
import { sleep } from '../utils/async';

export type ReplayHandler = (event: TraceEvent, index: number) => void;

export interface PlayOptions {
    /** Playback multiplier, clamped to 0.1–10. */
    speed?: number;
}

export interface ReplayedState {
    version: number;
    data: JsonObject;
    path: string[];
    /** Sequence of the snapshot the state comes from. */
    sequence: number;
}

export const MIN_REPLAY_SPEED = 0.1;
export const MAX_REPLAY_SPEED = 10;

/**
 * Walks a recorded trace. Moving the cursor delivers the event at the new
 * position to the handlers registered for its type. Nodes are never invoked.
 */
export class ReplayController {
    private readonly events: TraceEvent[];
    private readonly handlers = new Map<TraceEventType | '*', ReplayHandler[]>();
    private cursor = -1;
    private playback: AbortController | null = null;

    constructor(private readonly trace: ExecutionTrace) {
        this.events = [...trace.events].sort((a, b) => a.sequence - b.sequence);
    }

    public get length(): number {
        return this.events.length;
    }

    /** Index of the last delivered event, -1 before the first. */
    public get position(): number {
        return this.cursor;
    }

    public get isPlaying(): boolean {
        return this.playback !== null;
    }

    public on(type: TraceEventType | '*', handler: ReplayHandler): () => void {
        const list = this.handlers.get(type) ?? [];
        list.push(handler);
        this.handlers.set(type, list);
        return () => {
            const index = list.indexOf(handler);
            if (index >= 0) list.splice(index, 1);
        };
    }

    public stepForward(): TraceEvent | null {
        if (this.cursor >= this.events.length - 1) return null;
        return this.moveTo(this.cursor + 1);
    }

    public stepBackward(): TraceEvent | null {
        if (this.cursor <= 0) return null;
        return this.moveTo(this.cursor - 1);
    }

    public jumpTo(index: number): TraceEvent {
        if (!Number.isInteger(index) || index < 0 || index >= this.events.length) {
            throw new RangeError(`Replay index ${index} is outside 0..${this.events.length - 1}`);
        }
        return this.moveTo(index);
    }

    /**
     * Replays the remaining events with their recorded spacing divided by
     * `speed`. Resolves at the end of the trace or once {@link pause} is called.
     */
    public async play(options: PlayOptions = {}): Promise<void> {
        if (this.playback) return;
        const speed = Math.min(MAX_REPLAY_SPEED, Math.max(MIN_REPLAY_SPEED, options.speed ?? 1));
        const controller = new AbortController();
        this.playback = controller;

        try {
            while (this.cursor < this.events.length - 1) {
                const current = this.events[this.cursor];
                const next = this.events[this.cursor + 1];
                if (!next) break;

                const gap = current ? Math.max(0, next.timestamp - current.timestamp) : 0;
                if (gap > 0) {
                    try {
                        await sleep(gap / speed, controller.signal);
                    } catch (err) {
                        if (controller.signal.aborted) return;
                        throw err;
                    }
                }
                if (controller.signal.aborted) return;
                this.moveTo(this.cursor + 1);
            }
        } finally {
            if (this.playback === controller) {
                this.playback = null;
            }
        }
    }

    public pause(): void {
        this.playback?.abort();
        this.playback = null;
    }

    /** Nodes entered up to and including `index`. */
    public visitedNodes(index: number = this.cursor): string[] {
        return this.events
            .slice(0, index + 1)
            .filter((event) => event.type === 'node_enter' && event.nodeId !== null)
            .map((event) => event.nodeId ?? '');
    }

    /** State from the newest snapshot taken at or before the event at `index`. */
    public stateAt(index: number = this.cursor): ReplayedState | null {
        const event = this.events[index];
        if (!event) return null;

        let nearest: ExecutionTrace['snapshots'][number] | undefined;
        for (const snapshot of this.trace.snapshots) {
            if (snapshot.sequence <= event.sequence && (!nearest || snapshot.sequence >= nearest.sequence)) {
                nearest = snapshot;
            }
        }
        if (!nearest) return null;

        return {
            version: nearest.version,
            data: structuredClone(nearest.data),
            path: [...nearest.path],
            sequence: nearest.sequence
        };
    }

    private moveTo(index: number): TraceEvent {
        const event = this.events[index];
        if (!event) {
            throw new RangeError(`Replay index ${index} is out of range`);
        }
        this.cursor = index;
        for (const handler of [...(this.handlers.get(event.type) ?? []), ...(this.handlers.get('*') ?? [])]) {
            handler(event, index);
        }
        return event;
    }
}
