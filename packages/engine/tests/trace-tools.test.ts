import { describe, expect, it } from 'vitest';
import type { ExecutionTrace, JsonObject, TraceEvent, TraceEventType } from '@weave/core';
import { CSV_HEADER, EXPORT_EXTENSIONS, ReplayController, analyzeTrace, exportTrace, sleep } from '../src/index';

function traceEvent(
    sequence: number,
    type: TraceEventType,
    nodeId: string | null,
    timestamp: number,
    data: JsonObject = {},
    branchId = 'main'
): TraceEvent {
    return { eventId: `e${sequence}`, sequence, type, executionId: 'exec-1', workflowId: 'wf-1', nodeId, branchId, data, timestamp };
}

const boom = { code: 'node_failed', message: 'boom' };

function failedTrace(): ExecutionTrace {
    return {
        traceId: 'trace-1',
        executionId: 'exec-1',
        workflowId: 'wf-1',
        status: 'failed',
        startedAt: 1_000,
        endedAt: 1_030,
        events: [
            traceEvent(1, 'execution_start', null, 1_000),
            traceEvent(2, 'node_enter', 'A', 1_000),
            traceEvent(3, 'node_exit', 'A', 1_010, { durationMs: 10 }),
            traceEvent(4, 'edge_traverse', 'A', 1_010, { from: 'A', to: 'B' }),
            traceEvent(5, 'node_enter', 'B', 1_020),
            traceEvent(6, 'node_error', 'B', 1_030, { error: boom }),
            traceEvent(7, 'execution_failed', null, 1_030, { error: boom })
        ],
        droppedEvents: 0,
        snapshots: [
            { snapshotId: 's1', nodeId: 'A', version: 3, data: { a: 1 }, path: ['A'], sequence: 3, timestamp: 1_010 }
        ],
        performance: {
            A: { nodeId: 'A', visits: 1, totalDurationMs: 10, maxDurationMs: 10 }
        }
    };
}

describe('ReplayController', () => {
    it('walks events in sequence order', () => {
        const trace = failedTrace();
        trace.events.reverse();
        const replay = new ReplayController(trace);
        const entered: Array<[string | null, number]> = [];
        const off = replay.on('node_enter', (event, index) => entered.push([event.nodeId, index]));

        expect(replay.length).toBe(7);
        expect(replay.position).toBe(-1);
        expect(replay.stepBackward()).toBeNull();
        expect(replay.stepForward()?.type).toBe('execution_start');
        expect(replay.stepForward()?.nodeId).toBe('A');
        expect(entered).toEqual([['A', 1]]);

        off();
        expect(replay.jumpTo(4).type).toBe('node_enter');
        expect(entered).toEqual([['A', 1]]);
        expect(replay.stepBackward()?.type).toBe('edge_traverse');
        expect(replay.position).toBe(3);

        replay.jumpTo(6);
        expect(replay.stepForward()).toBeNull();
        replay.jumpTo(0);
        expect(replay.stepBackward()).toBeNull();
    });

    it('rejects positions outside the trace', () => {
        const replay = new ReplayController(failedTrace());
        expect(() => replay.jumpTo(7)).toThrow(RangeError);
        expect(() => replay.jumpTo(7)).toThrow('Replay index 7 is outside 0..6');
        expect(() => replay.jumpTo(-1)).toThrow(RangeError);
    });

    it('reconstructs visited nodes and the nearest snapshot', () => {
        const replay = new ReplayController(failedTrace());

        expect(replay.visitedNodes(4)).toEqual(['A', 'B']);
        expect(replay.visitedNodes(2)).toEqual(['A']);
        expect(replay.stateAt(4)).toEqual({ version: 3, data: { a: 1 }, path: ['A'], sequence: 3 });
        expect(replay.stateAt(1)).toBeNull();
        expect(replay.stateAt()).toBeNull();
    });

    it('plays the remaining events', async () => {
        const replay = new ReplayController(failedTrace());
        const seen: string[] = [];
        replay.on('*', (event) => seen.push(event.eventId));

        await replay.play({ speed: 10 });

        expect(seen).toEqual(['e1', 'e2', 'e3', 'e4', 'e5', 'e6', 'e7']);
        expect(replay.position).toBe(6);
        expect(replay.isPlaying).toBe(false);
    });

    it('stops playing on pause', async () => {
        const replay = new ReplayController(failedTrace());
        const playing = replay.play({ speed: 0.1 });
        expect(replay.isPlaying).toBe(true);

        await sleep(20);
        replay.pause();
        await playing;

        expect(replay.position).toBe(1);
        expect(replay.isPlaying).toBe(false);
    });
});

describe('exportTrace', () => {
    it('writes the events as JSON', () => {
        const trace = failedTrace();
        expect(JSON.parse(exportTrace(trace, 'json'))).toEqual(trace.events);
    });

    it('writes one CSV row per event', () => {
        expect(exportTrace(failedTrace(), 'csv')).toBe([
            CSV_HEADER,
            'e1,execution_start,,1000,1',
            'e2,node_enter,A,1000,2',
            'e3,node_exit,A,1010,3',
            'e4,edge_traverse,A,1010,4',
            'e5,node_enter,B,1020,5',
            'e6,node_error,B,1030,6',
            'e7,execution_failed,,1030,7',
            ''
        ].join('\n'));
    });

    it('quotes CSV cells that need it', () => {
        const trace = failedTrace();
        trace.events = [traceEvent(1, 'node_enter', 'say "hi", then', 1_000)];
        expect(exportTrace(trace, 'csv').split('\n')[1]).toBe('e1,node_enter,"say ""hi"", then",1000,1');
    });

    it('turns node visits into complete events for chrome tracing', () => {
        const output: unknown = JSON.parse(exportTrace(failedTrace(), 'chrome_trace'));
        expect(output).toEqual({
            traceEvents: [
                { name: 'execution_start', cat: 'execution', ph: 'i', ts: 1_000_000, pid: 1, tid: 'main', s: 't', args: { sequence: 1 } },
                { name: 'A', cat: 'node', ph: 'X', ts: 1_000_000, dur: 10_000, pid: 1, tid: 'main', args: { sequence: 2, outcome: 'ok' } },
                { name: 'edge_traverse:A', cat: 'execution', ph: 'i', ts: 1_010_000, pid: 1, tid: 'main', s: 't', args: { sequence: 4 } },
                { name: 'B', cat: 'node', ph: 'X', ts: 1_020_000, dur: 10_000, pid: 1, tid: 'main', args: { sequence: 5, outcome: 'error' } },
                { name: 'execution_failed', cat: 'execution', ph: 'i', ts: 1_030_000, pid: 1, tid: 'main', s: 't', args: { sequence: 7 } }
            ]
        });
        expect(EXPORT_EXTENSIONS.chrome_trace).toBe('trace.json');
    });
});

describe('analyzeTrace', () => {
    it('summarizes timings and errors', () => {
        const stats = { nodeId: 'A', visits: 1, totalDurationMs: 10, averageDurationMs: 10, maxDurationMs: 10 };

        expect(analyzeTrace(failedTrace(), 5)).toEqual({
            executionId: 'exec-1',
            status: 'failed',
            totalDurationMs: 30,
            eventCount: 7,
            droppedEvents: 0,
            nodeStats: [stats],
            averageNodeDurationMs: 10,
            criticalPath: { branchId: 'main', nodes: ['A'], durationMs: 10 },
            bottlenecks: [stats],
            errors: [
                { nodeId: 'B', code: 'node_failed', message: 'boom', timestamp: 1_030 },
                { nodeId: null, code: 'node_failed', message: 'boom', timestamp: 1_030 }
            ]
        });
        expect(analyzeTrace(failedTrace(), 50).bottlenecks).toEqual([]);
    });

    it('follows the slowest parallel branch through its ancestors', () => {
        const trace = failedTrace();
        trace.events = [
            traceEvent(1, 'node_exit', 'A', 1_005, { durationMs: 5 }),
            traceEvent(2, 'node_exit', 'C', 1_015, { durationMs: 10 }, 'main/C'),
            traceEvent(3, 'node_exit', 'B', 1_035, { durationMs: 30 }, 'main/B'),
            traceEvent(4, 'node_exit', 'D', 1_040, { durationMs: 5 })
        ];

        expect(analyzeTrace(trace, 1_000).criticalPath).toEqual({
            branchId: 'main/B',
            nodes: ['A', 'B', 'D'],
            durationMs: 40
        });
    });
});
