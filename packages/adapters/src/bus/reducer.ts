import type { EngineEvent, EventBus, EventReducer, Logger } from '@weave/core';

type PendingEvent = Omit<EngineEvent, 'seq' | 'timestamp'>;

/**
 * Event bus with zero-latency ingestion: `emit` only queues, and a drain
 * scheduled on the next macrotask assigns sequence numbers, runs reducers and
 * dispatches to subscribers. Nothing is scheduled while the queue is empty.
 */
export class ReducerEventBus implements EventBus {
    private ingestQueue: PendingEvent[] = [];
    private reducers: EventReducer[] = [];
    private subscribers: Subscription[] = [];
    private nextSeq = 1;
    private isRunning = false;
    private drainScheduled = false;

    constructor(private readonly logger?: Logger) { }

    async start(): Promise<void> {
        if (this.isRunning) return;
        this.isRunning = true;
        this.scheduleDrain();
    }

    /** Stops accepting work after delivering what is already queued. */
    async close(): Promise<void> {
        this.drain();
        this.isRunning = false;
    }

    emit(event: PendingEvent): void {
        this.ingestQueue.push(event);
        this.scheduleDrain();
    }

    use(reducer: EventReducer): void {
        this.reducers.push(reducer);
    }

    subscribe(pattern: string, handler: (event: EngineEvent) => void): () => void {
        const subscription = new Subscription(pattern, handler);
        this.subscribers.push(subscription);
        return () => {
            this.subscribers = this.subscribers.filter((entry) => entry !== subscription);
        };
    }

    /** Resolves once everything emitted so far has been dispatched. */
    async flush(): Promise<void> {
        this.drain();
    }

    private scheduleDrain(): void {
        if (!this.isRunning || this.drainScheduled || this.ingestQueue.length === 0) return;
        this.drainScheduled = true;
        setImmediate(() => {
            this.drainScheduled = false;
            this.drain();
        });
    }

    private drain(): void {
        const batch = this.ingestQueue;
        this.ingestQueue = [];
        for (const pending of batch) {
            const event: EngineEvent = { ...pending, seq: this.nextSeq++, timestamp: new Date().toISOString() };
            this.applyReducers(event).forEach((reduced) => this.dispatch(reduced));
        }
        // Subscribers may emit while dispatching.
        if (this.ingestQueue.length > 0) this.drain();
    }

    /** Each reducer sees every event the previous one produced; `null` drops, arrays fan out. */
    private applyReducers(event: EngineEvent): EngineEvent[] {
        return this.reducers.reduce<EngineEvent[]>(
            (events, reducer) =>
                events.flatMap((current) => {
                    const result = reducer(current);
                    if (result === null) return [];
                    return Array.isArray(result) ? result : [result];
                }),
            [event]
        );
    }

    private dispatch(event: EngineEvent): void {
        const key = `${event.channel}:${event.name}`;
        const matching = this.subscribers.filter((subscriber) => subscriber.matches(key));
        for (const subscriber of matching) {
            try {
                subscriber.handler(event);
            } catch (err) {
                this.logger?.warn({ err, key, pattern: subscriber.pattern }, 'Event subscriber failed');
            }
        }
    }
}

class Subscription {
    private readonly regex: RegExp;

    constructor(
        public readonly pattern: string,
        public readonly handler: (event: EngineEvent) => void
    ) {
        // `*` spans any run of characters, including the `:` separator.
        const parts = pattern.split('*').map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'));
        this.regex = new RegExp(`^${parts.join('.*')}$`);
    }

    matches(key: string): boolean {
        return this.regex.test(key);
    }
}
