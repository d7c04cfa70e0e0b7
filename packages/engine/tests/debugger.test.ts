import { afterEach, describe, expect, it } from 'vitest';
import { ExecutionCancelledError, ReplayError, type NodeProcessor, type WorkflowDefinition } from '@weave/core';
import { TEST_TENANT, createTestEngine, passThrough, setValues, type FakeEngineDeps } from '@weave/testing';
import {
    BREAKPOINT_COLLECTION,
    CSV_HEADER,
    WorkflowGraphBuilder,
    createDeferred,
    sleep,
    type DebugSessionEvent,
    type WorkflowEngine
} from '../src/index';

const engines: WorkflowEngine[] = [];

function setup(definition: WorkflowDefinition, deps: Partial<FakeEngineDeps> = {}) {
    const { engine, deps: created } = createTestEngine({ deps });
    engines.push(engine);
    const events: string[] = [];
    engine.debugger.on('session', (event: DebugSessionEvent) => {
        events.push(event.nodeId ? `${event.type}:${event.nodeId}` : event.type);
    });
    return { engine, deps: created, events, executor: engine.createExecutor(definition) };
}

function counting(a: NodeProcessor = setValues({ count: 1 })): WorkflowDefinition {
    return new WorkflowGraphBuilder('debugged')
        .addNode('A', a)
        .addNode('B', passThrough)
        .addNode('C', passThrough)
        .addEdge('A', 'B')
        .addEdge('B', 'C')
        .build();
}

async function waitFor(check: () => boolean): Promise<void> {
    for (let i = 0; i < 500 && !check(); i += 1) {
        await sleep(2);
    }
    if (!check()) throw new Error('condition not reached');
}

function pausedAt(engine: WorkflowEngine, sessionId: string, nodeId: string): () => boolean {
    return () => {
        const session = engine.debugger.getSession(sessionId);
        return session?.state === 'paused' && session.currentNodeId === nodeId;
    };
}

afterEach(async () => {
    await Promise.all(engines.splice(0).map((engine) => engine.close()));
});

describe('WorkflowDebugger', () => {
    it('steps through nodes one at a time', async () => {
        const { engine, executor, events } = setup(counting());
        const session = await engine.debugger.startSession('exec-step', 'step');
        const handle = executor.execute({ tenantId: TEST_TENANT, executionId: 'exec-step' });

        await waitFor(pausedAt(engine, session.sessionId, 'A'));
        expect(engine.debugger.getSession(session.sessionId)?.pausedBranches).toEqual(['main']);
        const first = await engine.debugger.executeCommand(session.sessionId, { type: 'inspect' });
        expect(first).toMatchObject({
            type: 'inspect',
            inspection: { nodeId: 'A', branchId: 'main', state: { version: 1, data: {}, path: [] } }
        });
        if (first.type === 'inspect') {
            expect(first.inspection.recentEvents.map((event) => event.type)).toEqual(['execution_start']);
        }

        const stepped = await engine.debugger.executeCommand(session.sessionId, { type: 'step' });
        expect(stepped.session.stepCount).toBe(1);
        await waitFor(pausedAt(engine, session.sessionId, 'B'));
        expect(await engine.debugger.executeCommand(session.sessionId, { type: 'inspect' })).toMatchObject({
            inspection: { nodeId: 'B', state: { version: 3, data: { count: 1 }, path: ['A'] } }
        });

        await engine.debugger.executeCommand(session.sessionId, { type: 'continue' });
        const final = await handle.result;

        expect(final.path).toEqual(['A', 'B', 'C']);
        expect(engine.debugger.getSession(session.sessionId)).toBeNull();
        expect(events).toEqual(['started', 'paused:A', 'resumed', 'paused:B', 'resumed', 'finished']);
    });

    it('pauses on a node breakpoint and records the hit', async () => {
        const { engine, executor, deps } = setup(counting());
        const breakpoint = await engine.debugger.setBreakpoint('exec-bp', { kind: 'node', nodeId: 'C' });
        const session = await engine.debugger.startSession('exec-bp');
        const handle = executor.execute({ tenantId: TEST_TENANT, executionId: 'exec-bp' });

        await waitFor(pausedAt(engine, session.sessionId, 'C'));
        expect(engine.debugger.listBreakpoints('exec-bp')).toMatchObject([{ breakpointId: breakpoint.breakpointId, hitCount: 1 }]);
        expect(await deps.documents.get(BREAKPOINT_COLLECTION, breakpoint.breakpointId)).toMatchObject({ kind: 'node', nodeId: 'C', hitCount: 1 });
        const hit = engine.recorder.getTrace('exec-bp')?.events.find((event) => event.type === 'breakpoint_hit');
        expect(hit).toMatchObject({ nodeId: 'C', data: { breakpointId: breakpoint.breakpointId, kind: 'node', hitCount: 1 } });

        await engine.debugger.executeCommand(session.sessionId, { type: 'continue' });
        expect((await handle.result).path).toEqual(['A', 'B', 'C']);
    });

    it('scopes condition breakpoints to a node', async () => {
        const { engine, executor, events } = setup(counting());
        const session = await engine.debugger.startSession('exec-cond');
        const result = await engine.debugger.executeCommand(session.sessionId, {
            type: 'set_breakpoint',
            breakpoint: { kind: 'condition', expression: 'count >= 1', nodeId: 'C' }
        });
        expect(result.type).toBe('set_breakpoint');

        const handle = executor.execute({ tenantId: TEST_TENANT, executionId: 'exec-cond' });
        await waitFor(pausedAt(engine, session.sessionId, 'C'));
        await engine.debugger.executeCommand(session.sessionId, { type: 'continue' });
        await handle.result;

        expect(events.filter((event) => event.startsWith('paused'))).toEqual(['paused:C']);
    });

    it('pauses when a watched variable changes', async () => {
        const { engine, executor } = setup(counting());
        await engine.debugger.setBreakpoint('exec-var', { kind: 'variable_change', variable: 'count' });
        const session = await engine.debugger.startSession('exec-var');
        const handle = executor.execute({ tenantId: TEST_TENANT, executionId: 'exec-var' });

        await waitFor(pausedAt(engine, session.sessionId, 'B'));
        await engine.debugger.executeCommand(session.sessionId, { type: 'continue' });
        await handle.result;

        expect(engine.debugger.listBreakpoints('exec-var')[0]?.hitCount).toBe(1);
    });

    it('only counts hits in watch mode', async () => {
        const { engine, executor, events } = setup(counting());
        await engine.debugger.setBreakpoint('exec-watch', { kind: 'condition', expression: 'count >= 1' });
        await engine.debugger.startSession('exec-watch', 'watch');

        const final = await executor.execute({ tenantId: TEST_TENANT, executionId: 'exec-watch' }).result;

        expect(final.path).toEqual(['A', 'B', 'C']);
        expect(engine.debugger.listBreakpoints('exec-watch')[0]?.hitCount).toBe(2);
        expect(events).toEqual(['started', 'breakpoint_hit:B', 'breakpoint_hit:C', 'finished']);
    });

    it('pauses at the next node on request', async () => {
        const started = createDeferred<void>();
        const gate = createDeferred<void>();
        const a: NodeProcessor = async (state) => {
            started.resolve();
            await gate.promise;
            return state;
        };
        const { engine, executor } = setup(counting(a));
        const session = await engine.debugger.startSession('exec-pause');
        const handle = executor.execute({ tenantId: TEST_TENANT, executionId: 'exec-pause' });

        await started.promise;
        await engine.debugger.executeCommand(session.sessionId, { type: 'pause' });
        gate.resolve();

        await waitFor(pausedAt(engine, session.sessionId, 'B'));
        await engine.debugger.executeCommand(session.sessionId, { type: 'continue' });
        expect((await handle.result).path).toEqual(['A', 'B', 'C']);
    });

    it('lets a terminated session run to completion', async () => {
        const { engine, executor, events } = setup(counting());
        const session = await engine.debugger.startSession('exec-term', 'step');
        const handle = executor.execute({ tenantId: TEST_TENANT, executionId: 'exec-term' });

        await waitFor(pausedAt(engine, session.sessionId, 'A'));
        const result = await engine.debugger.executeCommand(session.sessionId, { type: 'terminate' });
        expect(result.session.state).toBe('finished');

        expect((await handle.result).path).toEqual(['A', 'B', 'C']);
        expect(events).toEqual(['started', 'paused:A', 'resumed', 'finished']);
        await expect(engine.debugger.executeCommand(session.sessionId, { type: 'continue' }))
            .rejects.toThrow(`Debug session '${session.sessionId}' not found`);
    });

    it('releases a paused branch when the execution is cancelled', async () => {
        const { engine, executor } = setup(counting());
        const session = await engine.debugger.startSession('exec-cancel', 'step');
        const handle = executor.execute({ tenantId: TEST_TENANT, executionId: 'exec-cancel' });

        await waitFor(pausedAt(engine, session.sessionId, 'A'));
        handle.cancel('debugging done');

        await expect(handle.result).rejects.toThrow(ExecutionCancelledError);
        expect(executor.getExecution('exec-cancel')?.status).toBe('cancelled');
        expect(engine.debugger.getSession(session.sessionId)).toBeNull();
    });

    it('rejects malformed condition breakpoints', async () => {
        const { engine } = setup(counting());
        await expect(engine.debugger.setBreakpoint('exec-x', { kind: 'condition', expression: 'not a condition' }))
            .rejects.toThrow("Invalid breakpoint condition 'not a condition'");
        expect(engine.debugger.listBreakpoints('exec-x')).toEqual([]);
    });

    it('reloads persisted breakpoints in a new engine', async () => {
        const { engine, deps } = setup(counting());
        const breakpoint = await engine.debugger.setBreakpoint('exec-p', { kind: 'duration', thresholdMs: 250 });

        const { engine: restarted } = setup(counting(), { documents: deps.documents });
        const session = await restarted.debugger.startSession('exec-p');
        expect(restarted.debugger.listBreakpoints('exec-p')).toMatchObject([
            { breakpointId: breakpoint.breakpointId, kind: 'duration', thresholdMs: 250, hitCount: 0 }
        ]);

        const removed = await restarted.debugger.executeCommand(session.sessionId, {
            type: 'remove_breakpoint',
            breakpointId: breakpoint.breakpointId
        });
        expect(removed).toMatchObject({ type: 'remove_breakpoint', removed: true });
        expect(deps.documents.count(BREAKPOINT_COLLECTION)).toBe(0);
        expect(await restarted.debugger.removeBreakpoint('exec-p', breakpoint.breakpointId)).toBe(false);
    });

    it('analyzes and exports finished executions', async () => {
        const { engine, executor, deps } = setup(counting());
        await executor.execute({ tenantId: TEST_TENANT, executionId: 'exec-done' }).result;

        const analysis = await engine.debugger.analyzeExecution('exec-done');
        expect(analysis.nodeStats.map((stats) => stats.nodeId).sort()).toEqual(['A', 'B', 'C']);
        expect(analysis.errors).toEqual([]);

        const json = await engine.debugger.exportTrace('exec-done', 'json');
        expect(JSON.parse(json)).toHaveLength(13);

        const path = await engine.debugger.exportTraceToStorage('exec-done', 'csv');
        expect(path).toMatch(/^exports\/exec-done\/\d+\.csv$/);
        const csv = (await deps.blobs.get(path)).toString('utf8');
        expect(csv.split('\n')[0]).toBe(CSV_HEADER);

        await expect(engine.debugger.analyzeExecution('exec-none')).rejects.toThrow(ReplayError);
    });
});
