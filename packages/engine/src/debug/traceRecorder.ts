import { randomUUID } from 'node:crypto';
import {
    ReplayError,
    type BlobStoragePort,
    type ExecutionEvent,
    type ExecutionHooks,
    type ExecutionTrace,
    type Logger,
    type TraceEvent,
    type TraceEventType,
    type TraceStatus
} from '@weave/core';
import { ExecutionTraceSchema, SnapshotDataSchema } from './schemas';

export interface TraceRecorderOptions {
    logger: Logger;
    blobs?: BlobStoragePort;
    maxEvents: number;
    snapshotEveryNodes: number;
    /** Finished traces kept in memory; the oldest are dropped once exceeded. Unbounded when omitted. */
    maxTraces?: number;
}

const TERMINAL_STATUS: Partial<Record<TraceEventType, TraceStatus>> = {
    execution_complete: 'completed',
    execution_failed: 'failed',
    execution_cancelled: 'cancelled'
};

export function traceBlobPath(executionId: string): string {
    return `traces/${executionId}.json`;
}

/**
 * Keeps an ordered, bounded event log per execution together with node
 * timings and periodic state snapshots taken from node exits.
 */
export class TraceRecorder implements ExecutionHooks {
    private readonly traces = new Map<string, ExecutionTrace>();
    private readonly sequences = new Map<string, number>();
    private readonly nodeExits = new Map<string, number>();
    private readonly logger: Logger;

    constructor(private readonly options: TraceRecorderOptions) {
        this.logger = options.logger.child({ component: 'TraceRecorder' });
    }

    public onEvent(event: ExecutionEvent): void {
        const trace = this.traceFor(event);
        const sequence = (this.sequences.get(event.executionId) ?? 0) + 1;
        this.sequences.set(event.executionId, sequence);

        if (event.type === 'execution_start') {
            trace.status = 'running';
            trace.endedAt = null;
        }

        if (trace.events.length < this.options.maxEvents) {
            const recorded: TraceEvent = { ...event, data: structuredClone(event.data), eventId: randomUUID(), sequence };
            trace.events.push(recorded);
        } else {
            if (trace.droppedEvents === 0) {
                this.logger.warn({ executionId: event.executionId, maxEvents: this.options.maxEvents }, 'Trace event cap reached; dropping further events');
            }
            trace.droppedEvents += 1;
        }

        if (event.type === 'node_exit' && event.nodeId !== null) {
            this.recordPerformance(trace, event.nodeId, event.data.durationMs);
            const exits = (this.nodeExits.get(event.executionId) ?? 0) + 1;
            this.nodeExits.set(event.executionId, exits);
            if (exits % this.options.snapshotEveryNodes === 0) {
                this.takeSnapshot(trace, event, sequence);
            }
        }

        const terminal = TERMINAL_STATUS[event.type];
        if (terminal) {
            trace.status = terminal;
            trace.endedAt = event.timestamp;
            this.takeSnapshot(trace, event, sequence);
            this.evictFinished(event.executionId);
        }
    }

    /** A copy of the live trace, or null when the execution is unknown here. */
    public getTrace(executionId: string): ExecutionTrace | null {
        const trace = this.traces.get(executionId);
        return trace ? structuredClone(trace) : null;
    }

    public async persistTrace(executionId: string): Promise<string> {
        const trace = this.traces.get(executionId);
        if (!trace) {
            throw new ReplayError(`No trace recorded for execution ${executionId}`);
        }
        const blobs = this.requireBlobs();
        const pointer = await blobs.put(traceBlobPath(executionId), JSON.stringify(trace));
        this.logger.debug({ executionId, events: trace.events.length, pointer }, 'Trace persisted');
        return pointer;
    }

    /** Memory first, then blob storage. */
    public async loadTrace(executionId: string): Promise<ExecutionTrace> {
        const live = this.getTrace(executionId);
        if (live) return live;

        const blobs = this.options.blobs;
        const path = traceBlobPath(executionId);
        if (!blobs || !(await blobs.exists(path))) {
            throw new ReplayError(`Trace for execution ${executionId} is not available`);
        }

        const raw: unknown = JSON.parse((await blobs.get(path)).toString('utf8'));
        const parsed = ExecutionTraceSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ReplayError(`Stored trace for execution ${executionId} is malformed: ${parsed.error.message}`);
        }
        return parsed.data;
    }

    public discard(executionId: string): void {
        this.traces.delete(executionId);
        this.sequences.delete(executionId);
        this.nodeExits.delete(executionId);
    }

    /** Keeps finished traces in finish order and drops the oldest beyond `maxTraces`. */
    private evictFinished(executionId: string): void {
        const trace = this.traces.get(executionId);
        if (trace) {
            this.traces.delete(executionId);
            this.traces.set(executionId, trace);
        }

        const limit = this.options.maxTraces;
        if (limit === undefined) return;
        const finished = [...this.traces.values()].filter((entry) => entry.status !== 'running');
        for (const stale of finished.slice(0, Math.max(0, finished.length - limit))) {
            this.logger.debug({ executionId: stale.executionId }, 'Evicting finished trace');
            this.discard(stale.executionId);
        }
    }

    private traceFor(event: ExecutionEvent): ExecutionTrace {
        const existing = this.traces.get(event.executionId);
        if (existing) return existing;

        const trace: ExecutionTrace = {
            traceId: randomUUID(),
            executionId: event.executionId,
            workflowId: event.workflowId,
            status: 'running',
            startedAt: event.timestamp,
            endedAt: null,
            events: [],
            droppedEvents: 0,
            snapshots: [],
            performance: {}
        };
        this.traces.set(event.executionId, trace);
        return trace;
    }

    private recordPerformance(trace: ExecutionTrace, nodeId: string, duration: unknown): void {
        const durationMs = typeof duration === 'number' ? duration : 0;
        const perf = trace.performance[nodeId] ?? { nodeId, visits: 0, totalDurationMs: 0, maxDurationMs: 0 };
        perf.visits += 1;
        perf.totalDurationMs += durationMs;
        perf.maxDurationMs = Math.max(perf.maxDurationMs, durationMs);
        trace.performance[nodeId] = perf;
    }

    private takeSnapshot(trace: ExecutionTrace, event: ExecutionEvent, sequence: number): void {
        const parsed = SnapshotDataSchema.safeParse(event.data.snapshot);
        if (!parsed.success) return;

        trace.snapshots.push({
            snapshotId: randomUUID(),
            nodeId: event.nodeId,
            version: parsed.data.version,
            data: parsed.data.data,
            path: parsed.data.path,
            sequence,
            timestamp: event.timestamp
        });
    }

    private requireBlobs(): BlobStoragePort {
        if (!this.options.blobs) {
            throw new ReplayError('Trace persistence requires blob storage');
        }
        return this.options.blobs;
    }
}
