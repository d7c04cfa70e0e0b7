import type { ExecutionTrace, JsonObject, TraceStatus } from '@weave/core';

export interface NodeStats {
    nodeId: string;
    visits: number;
    totalDurationMs: number;
    averageDurationMs: number;
    maxDurationMs: number;
}

export interface CriticalPath {
    branchId: string;
    nodes: string[];
    durationMs: number;
}

export interface TraceError {
    nodeId: string | null;
    code: string;
    message: string;
    timestamp: number;
}

export interface TraceAnalysis {
    executionId: string;
    status: TraceStatus;
    totalDurationMs: number;
    eventCount: number;
    droppedEvents: number;
    nodeStats: NodeStats[];
    averageNodeDurationMs: number;
    criticalPath: CriticalPath;
    /** Nodes whose total time exceeds the slow-node threshold, slowest first. */
    bottlenecks: NodeStats[];
    errors: TraceError[];
}

interface BranchTiming {
    exits: Array<{ nodeId: string; sequence: number }>;
    durationMs: number;
}

export function analyzeTrace(trace: ExecutionTrace, slowNodeThresholdMs: number): TraceAnalysis {
    const lastTimestamp = trace.events[trace.events.length - 1]?.timestamp ?? trace.startedAt;
    const totalDurationMs = Math.max(0, (trace.endedAt ?? lastTimestamp) - trace.startedAt);

    const nodeStats = Object.values(trace.performance)
        .map((perf) => ({
            nodeId: perf.nodeId,
            visits: perf.visits,
            totalDurationMs: perf.totalDurationMs,
            averageDurationMs: perf.visits > 0 ? perf.totalDurationMs / perf.visits : 0,
            maxDurationMs: perf.maxDurationMs
        }))
        .sort((a, b) => b.totalDurationMs - a.totalDurationMs || a.nodeId.localeCompare(b.nodeId));

    const visits = nodeStats.reduce((sum, stats) => sum + stats.visits, 0);
    const busy = nodeStats.reduce((sum, stats) => sum + stats.totalDurationMs, 0);

    const errors: TraceError[] = [];
    for (const event of trace.events) {
        if (event.type !== 'node_error' && event.type !== 'execution_failed') continue;
        const error = event.data.error;
        const detail: JsonObject = error !== null && typeof error === 'object' && !Array.isArray(error) ? error : {};
        errors.push({
            nodeId: event.nodeId,
            code: typeof detail.code === 'string' ? detail.code : 'unknown',
            message: typeof detail.message === 'string' ? detail.message : '',
            timestamp: event.timestamp
        });
    }

    return {
        executionId: trace.executionId,
        status: trace.status,
        totalDurationMs,
        eventCount: trace.events.length,
        droppedEvents: trace.droppedEvents,
        nodeStats,
        averageNodeDurationMs: visits > 0 ? busy / visits : 0,
        criticalPath: findCriticalPath(trace),
        bottlenecks: nodeStats.filter((stats) => stats.totalDurationMs > slowNodeThresholdMs),
        errors
    };
}

/**
 * The slowest chain of branches. Branch ids nest (`main/B/D`), so a branch's
 * chain is itself plus every ancestor, including the steps after each join.
 */
function findCriticalPath(trace: ExecutionTrace): CriticalPath {
    const branches = new Map<string, BranchTiming>();
    for (const event of trace.events) {
        if (event.type !== 'node_exit' || event.nodeId === null) continue;
        const timing = branches.get(event.branchId) ?? { exits: [], durationMs: 0 };
        timing.exits.push({ nodeId: event.nodeId, sequence: event.sequence });
        timing.durationMs += typeof event.data.durationMs === 'number' ? event.data.durationMs : 0;
        branches.set(event.branchId, timing);
    }

    let best: CriticalPath = { branchId: 'main', nodes: [], durationMs: 0 };
    for (const branchId of branches.keys()) {
        const chain = ancestry(branchId)
            .map((id) => branches.get(id))
            .filter((timing): timing is BranchTiming => timing !== undefined);
        const durationMs = chain.reduce((sum, timing) => sum + timing.durationMs, 0);
        if (durationMs > best.durationMs || best.nodes.length === 0) {
            const nodes = chain
                .flatMap((timing) => timing.exits)
                .sort((a, b) => a.sequence - b.sequence)
                .map((exit) => exit.nodeId);
            best = { branchId, nodes, durationMs };
        }
    }
    return best;
}

function ancestry(branchId: string): string[] {
    const parts = branchId.split('/');
    return parts.map((_, index) => parts.slice(0, index + 1).join('/'));
}
