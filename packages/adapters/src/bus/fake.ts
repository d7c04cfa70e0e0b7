import type { EngineEvent, EventBus, EventReducer } from '@weave/core';

/** Records emitted events synchronously; subscribers are stored but never called. */
export class FakeEventBus implements EventBus {
    public events: Array<Omit<EngineEvent, 'seq' | 'timestamp'>> = [];
    public reducers: EventReducer[] = [];
    public subscribers: Map<string, Array<(event: EngineEvent) => void>> = new Map();

    public async start(): Promise<void> { }

    public async close(): Promise<void> { }

    public emit(event: Omit<EngineEvent, 'seq' | 'timestamp'>): void {
        this.events.push(event);
    }

    public use(reducer: EventReducer): void {
        this.reducers.push(reducer);
    }

    public subscribe(pattern: string, handler: (event: EngineEvent) => void): () => void {
        const list = this.subscribers.get(pattern) ?? [];
        list.push(handler);
        this.subscribers.set(pattern, list);
        return () => {
            this.subscribers.set(pattern, (this.subscribers.get(pattern) ?? []).filter((h) => h !== handler));
        };
    }

    public names(): string[] {
        return this.events.map((event) => `${event.channel}:${event.name}`);
    }
}
