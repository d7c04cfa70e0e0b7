import { PoolOverloadedError } from '@weave/core';

interface QueuedTask {
    start: () => void;
}

/**
 * Bounds how many node invocations run at once across all executions.
 * Tasks beyond `size` wait in FIFO order; beyond `maxQueue` waiting tasks
 * the pool rejects with {@link PoolOverloadedError}.
 */
export class WorkerPool {
    private inFlight = 0;
    private readonly queue: QueuedTask[] = [];
    private readonly idleWaiters: Array<() => void> = [];

    constructor(
        private readonly size: number,
        private readonly maxQueue: number = Number.POSITIVE_INFINITY
    ) {
        if (!Number.isInteger(size) || size < 1) {
            throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
        }
    }

    public get inFlightCount(): number {
        return this.inFlight;
    }

    public get queuedCount(): number {
        return this.queue.length;
    }

    public run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        if (this.inFlight < this.size) {
            return this.execute(task);
        }
        if (this.queue.length >= this.maxQueue) {
            return Promise.reject(new PoolOverloadedError(this.maxQueue));
        }

        return new Promise<T>((resolve, reject) => {
            const entry: QueuedTask = {
                start: () => {
                    signal?.removeEventListener('abort', onAbort);
                    this.execute(task).then(resolve, reject);
                }
            };
            const onAbort = () => {
                const index = this.queue.indexOf(entry);
                if (index >= 0) {
                    this.queue.splice(index, 1);
                    reject(signal?.reason instanceof Error ? signal.reason : new Error('Task aborted while queued'));
                }
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.queue.push(entry);
        });
    }

    /** Resolves once nothing is running or queued. */
    public drain(): Promise<void> {
        if (this.inFlight === 0 && this.queue.length === 0) {
            return Promise.resolve();
        }
        return new Promise((resolve) => this.idleWaiters.push(resolve));
    }

    private async execute<T>(task: () => Promise<T>): Promise<T> {
        this.inFlight += 1;
        try {
            return await task();
        } finally {
            this.inFlight -= 1;
            this.next();
        }
    }

    private next(): void {
        const queued = this.queue.shift();
        if (queued) {
            queued.start();
            return;
        }
        if (this.inFlight === 0) {
            for (const resolve of this.idleWaiters.splice(0)) {
                resolve();
            }
        }
    }
}
