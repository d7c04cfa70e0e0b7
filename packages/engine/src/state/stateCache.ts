import { WorkflowState } from '@weave/core';
import type { StateRecord } from '@weave/core';

interface CacheEntry {
    record: StateRecord;
    lastAccess: number;
}

export interface StateCacheOptions {
    ttlMs: number;
    maxEntries: number;
    now?: () => number;
}

/**
 * LRU cache of state versions with an idle TTL. Entries are stored and handed
 * out as deep copies, so callers can mutate what they get back.
 */
export class StateCache {
    // Map iteration order doubles as recency order: oldest first.
    private readonly entries = new Map<string, CacheEntry>();
    private readonly now: () => number;

    constructor(private readonly options: StateCacheOptions) {
        this.now = options.now ?? Date.now;
    }

    public get size(): number {
        return this.entries.size;
    }

    public get(stateId: string): WorkflowState | null {
        const entry = this.entries.get(stateId);
        if (!entry) return null;

        const now = this.now();
        if (now - entry.lastAccess > this.options.ttlMs) {
            this.entries.delete(stateId);
            return null;
        }

        entry.lastAccess = now;
        this.entries.delete(stateId);
        this.entries.set(stateId, entry);
        return WorkflowState.fromRecord(entry.record);
    }

    public put(state: WorkflowState): void {
        this.entries.delete(state.stateId);
        this.entries.set(state.stateId, { record: state.toRecord(), lastAccess: this.now() });

        // Expired entries make room before live ones lose their place.
        if (this.entries.size > this.options.maxEntries) {
            this.evictExpired();
        }
        while (this.entries.size > this.options.maxEntries) {
            const [oldest] = this.entries.keys();
            if (oldest === undefined) break;
            this.entries.delete(oldest);
        }
    }

    public delete(stateId: string): boolean {
        return this.entries.delete(stateId);
    }

    /** Drops every entry of the execution, e.g. after retention cleanup. */
    public deleteExecution(executionId: string): void {
        for (const [stateId, entry] of this.entries) {
            if (entry.record.executionId === executionId) {
                this.entries.delete(stateId);
            }
        }
    }

    public evictExpired(): number {
        const now = this.now();
        let evicted = 0;
        for (const [stateId, entry] of this.entries) {
            if (now - entry.lastAccess > this.options.ttlMs) {
                this.entries.delete(stateId);
                evicted++;
            }
        }
        return evicted;
    }

    public clear(): void {
        this.entries.clear();
    }
}
