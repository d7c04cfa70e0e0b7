import type { JsonObject } from './json';

export const TRACE_EVENT_TYPES = [
    'execution_start',
    'node_enter',
    'node_exit',
    'node_error',
    'edge_traverse',
    'state_change',
    'breakpoint_hit',
    'backtrack',
    'execution_complete',
    'execution_failed',
    'execution_cancelled'
] as const;

export type TraceEventType = typeof TRACE_EVENT_TYPES[number];

/** A lifecycle occurrence as emitted by the executor. */
export interface ExecutionEvent {
    type: TraceEventType;
    executionId: string;
    workflowId: string;
    nodeId: string | null;
    branchId: string;
    data: JsonObject;
    timestamp: number;
}

/** An {@link ExecutionEvent} once the recorder has ordered it. */
export interface TraceEvent extends ExecutionEvent {
    eventId: string;
    sequence: number;
}

export interface TraceSnapshot {
    snapshotId: string;
    nodeId: string | null;
    version: number;
    data: JsonObject;
    path: string[];
    sequence: number;
    timestamp: number;
}

export type TraceStatus = 'running' | 'completed' | 'failed' | 'cancelled';

export interface NodePerformance {
    nodeId: string;
    visits: number;
    totalDurationMs: number;
    maxDurationMs: number;
}

export interface ExecutionTrace {
    traceId: string;
    executionId: string;
    workflowId: string;
    status: TraceStatus;
    startedAt: number;
    endedAt: number | null;
    events: TraceEvent[];
    droppedEvents: number;
    snapshots: TraceSnapshot[];
    performance: Record<string, NodePerformance>;
}
