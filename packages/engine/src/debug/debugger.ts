import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import {
    ReplayError,
    type BlobStoragePort,
    type Breakpoint,
    type BreakpointTarget,
    type DocumentStore,
    type ExecutionEvent,
    type ExecutionHooks,
    type JsonObject,
    type Logger,
    type NodeVisit,
    type TraceEvent
} from '@weave/core';
import { abortReason, createDeferred, type Deferred } from '../utils/async';
import { analyzeTrace, type TraceAnalysis } from './analysis';
import { matchesBreakpoint, parseCondition } from './breakpoints';
import { EXPORT_EXTENSIONS, exportTrace, type ExportFormat } from './export';
import { BreakpointSchema } from './schemas';
import type { TraceRecorder } from './traceRecorder';

export const BREAKPOINT_COLLECTION = 'workflow_breakpoints';

export type DebugMode = 'step' | 'breakpoint' | 'watch';
export type DebugSessionState = 'running' | 'paused' | 'finished';

export interface DebugSession {
    sessionId: string;
    executionId: string;
    mode: DebugMode;
    state: DebugSessionState;
    currentNodeId: string | null;
    pausedBranches: string[];
    stepCount: number;
    commandHistory: Array<{ command: DebugCommand['type']; at: number }>;
    startedAt: number;
}

export type DebugCommand =
    | { type: 'continue' }
    | { type: 'step' }
    | { type: 'pause' }
    | { type: 'set_breakpoint'; breakpoint: BreakpointTarget }
    | { type: 'remove_breakpoint'; breakpointId: string }
    | { type: 'inspect' }
    | { type: 'terminate' };

export interface Inspection {
    nodeId: string | null;
    branchId: string | null;
    state: { version: number; data: JsonObject; path: string[]; metadata: Record<string, string> } | null;
    breakpoints: Breakpoint[];
    recentEvents: TraceEvent[];
}

export type DebugCommandResult =
    | { type: 'continue' | 'step' | 'pause' | 'terminate'; session: DebugSession }
    | { type: 'set_breakpoint'; session: DebugSession; breakpoint: Breakpoint }
    | { type: 'remove_breakpoint'; session: DebugSession; removed: boolean }
    | { type: 'inspect'; session: DebugSession; inspection: Inspection };

export interface DebugSessionEvent {
    type: 'started' | 'paused' | 'resumed' | 'breakpoint_hit' | 'finished';
    sessionId: string;
    executionId: string;
    nodeId?: string;
    branchId?: string;
    breakpointId?: string;
}

export interface WorkflowDebuggerOptions {
    logger: Logger;
    documents: DocumentStore;
    recorder: TraceRecorder;
    blobs?: BlobStoragePort;
    slowNodeThresholdMs: number;
}

interface SessionRuntime {
    session: DebugSession;
    /** Pause at the next node reached by any branch. */
    stepping: boolean;
    waiters: Map<string, Deferred<void>>;
    lastVisit: NodeVisit | null;
}

const RECENT_EVENT_COUNT = 20;

/**
 * Interactive debugging for running executions. Registered as an execution
 * hook, it evaluates breakpoints before every node and holds a branch while
 * its session is paused.
 */
export class WorkflowDebugger implements ExecutionHooks {
    private readonly sessions = new Map<string, SessionRuntime>();
    private readonly breakpoints = new Map<string, Breakpoint[]>();
    /** Last data seen per `executionId/branchId`, for variable-change breakpoints. */
    private readonly lastData = new Map<string, JsonObject>();
    private readonly emitter = new EventEmitter();
    private readonly logger: Logger;

    constructor(private readonly options: WorkflowDebuggerOptions) {
        this.logger = options.logger.child({ component: 'WorkflowDebugger' });
    }

    public on(event: 'session', listener: (event: DebugSessionEvent) => void): () => void {
        this.emitter.on(event, listener);
        return () => this.emitter.off(event, listener);
    }

    /** Attaches a session and loads the execution's persisted breakpoints. */
    public async startSession(executionId: string, mode: DebugMode = 'breakpoint'): Promise<DebugSession> {
        await this.loadBreakpoints(executionId);

        const session: DebugSession = {
            sessionId: randomUUID(),
            executionId,
            mode,
            state: 'running',
            currentNodeId: null,
            pausedBranches: [],
            stepCount: 0,
            commandHistory: [],
            startedAt: Date.now()
        };
        this.sessions.set(session.sessionId, { session, stepping: mode === 'step', waiters: new Map(), lastVisit: null });
        this.logger.info({ sessionId: session.sessionId, executionId, mode }, 'Debug session started');
        this.publish({ type: 'started', sessionId: session.sessionId, executionId });
        return this.snapshot(session);
    }

    public getSession(sessionId: string): DebugSession | null {
        const runtime = this.sessions.get(sessionId);
        return runtime ? this.snapshot(runtime.session) : null;
    }

    public async executeCommand(sessionId: string, command: DebugCommand): Promise<DebugCommandResult> {
        const runtime = this.sessions.get(sessionId);
        if (!runtime) {
            throw new ReplayError(`Debug session '${sessionId}' not found`);
        }
        const { session } = runtime;
        session.commandHistory.push({ command: command.type, at: Date.now() });

        switch (command.type) {
            case 'continue':
                runtime.stepping = false;
                this.release(runtime);
                return { type: 'continue', session: this.snapshot(session) };
            case 'step':
                runtime.stepping = true;
                session.stepCount += 1;
                this.release(runtime);
                return { type: 'step', session: this.snapshot(session) };
            case 'pause':
                runtime.stepping = true;
                return { type: 'pause', session: this.snapshot(session) };
            case 'set_breakpoint': {
                const breakpoint = await this.setBreakpoint(session.executionId, command.breakpoint);
                return { type: 'set_breakpoint', session: this.snapshot(session), breakpoint };
            }
            case 'remove_breakpoint': {
                const removed = await this.removeBreakpoint(session.executionId, command.breakpointId);
                return { type: 'remove_breakpoint', session: this.snapshot(session), removed };
            }
            case 'inspect':
                return { type: 'inspect', session: this.snapshot(session), inspection: this.inspect(runtime) };
            case 'terminate':
                this.finish(runtime);
                return { type: 'terminate', session: this.snapshot(session) };
        }
    }

    public async setBreakpoint(executionId: string, target: BreakpointTarget): Promise<Breakpoint> {
        if (target.kind === 'condition') {
            parseCondition(target.expression);
        }

        const breakpoint: Breakpoint = {
            ...target,
            breakpointId: randomUUID(),
            executionId,
            enabled: true,
            hitCount: 0,
            createdAt: new Date().toISOString()
        };
        const list = this.breakpoints.get(executionId) ?? [];
        list.push(breakpoint);
        this.breakpoints.set(executionId, list);
        await this.persistBreakpoint(breakpoint);
        return { ...breakpoint };
    }

    public async removeBreakpoint(executionId: string, breakpointId: string): Promise<boolean> {
        const list = this.breakpoints.get(executionId) ?? [];
        const index = list.findIndex((bp) => bp.breakpointId === breakpointId);
        if (index >= 0) {
            list.splice(index, 1);
        }
        const deleted = await this.options.documents.delete(BREAKPOINT_COLLECTION, breakpointId);
        return index >= 0 || deleted;
    }

    public listBreakpoints(executionId: string): Breakpoint[] {
        return (this.breakpoints.get(executionId) ?? []).map((bp) => ({ ...bp }));
    }

    public async beforeNode(visit: NodeVisit): Promise<void> {
        const runtime = this.activeSession(visit.executionId);
        const branchKey = `${visit.executionId}/${visit.branchId}`;
        const data = visit.state.data;
        const previousData = this.lastData.get(branchKey) ?? this.lastData.get(visit.executionId) ?? null;
        this.lastData.set(branchKey, data);
        this.lastData.set(visit.executionId, data);

        if (!runtime) return;
        runtime.lastVisit = visit;
        runtime.session.currentNodeId = visit.nodeId;

        const hits = (this.breakpoints.get(visit.executionId) ?? []).filter((bp) => matchesBreakpoint(bp, {
            nodeId: visit.nodeId,
            data,
            previousData,
            previousNodeId: visit.previousNodeId,
            previousDurationMs: visit.previousDurationMs
        }));

        for (const breakpoint of hits) {
            breakpoint.hitCount += 1;
            await this.persistBreakpoint(breakpoint);
            this.options.recorder.onEvent({
                type: 'breakpoint_hit',
                executionId: visit.executionId,
                workflowId: visit.workflowId,
                nodeId: visit.nodeId,
                branchId: visit.branchId,
                data: { breakpointId: breakpoint.breakpointId, kind: breakpoint.kind, hitCount: breakpoint.hitCount },
                timestamp: Date.now()
            });
            this.publish({
                type: 'breakpoint_hit',
                sessionId: runtime.session.sessionId,
                executionId: visit.executionId,
                nodeId: visit.nodeId,
                branchId: visit.branchId,
                breakpointId: breakpoint.breakpointId
            });
        }

        const shouldPause = runtime.session.mode !== 'watch' && (runtime.stepping || hits.length > 0);
        if (shouldPause) {
            await this.pause(runtime, visit);
        }
    }

    public onEvent(event: ExecutionEvent): void {
        if (event.type !== 'execution_complete' && event.type !== 'execution_failed' && event.type !== 'execution_cancelled') {
            return;
        }
        for (const runtime of this.sessions.values()) {
            if (runtime.session.executionId === event.executionId && runtime.session.state !== 'finished') {
                this.finish(runtime);
            }
        }
        this.forgetData(event.executionId);
    }

    /** Drops the in-memory breakpoints of an execution; the persisted ones are reloaded by the next session. */
    public discard(executionId: string): void {
        this.breakpoints.delete(executionId);
        this.forgetData(executionId);
    }

    public async analyzeExecution(executionId: string): Promise<TraceAnalysis> {
        const trace = await this.options.recorder.loadTrace(executionId);
        return analyzeTrace(trace, this.options.slowNodeThresholdMs);
    }

    public async exportTrace(executionId: string, format: ExportFormat): Promise<string> {
        const trace = await this.options.recorder.loadTrace(executionId);
        return exportTrace(trace, format);
    }

    /** Writes the export to `exports/<executionId>/<timestamp>.<ext>` and returns its path. */
    public async exportTraceToStorage(executionId: string, format: ExportFormat): Promise<string> {
        if (!this.options.blobs) {
            throw new ReplayError('Trace export requires blob storage');
        }
        const content = await this.exportTrace(executionId, format);
        const path = `exports/${executionId}/${Date.now()}.${EXPORT_EXTENSIONS[format]}`;
        return this.options.blobs.put(path, content);
    }

    private forgetData(executionId: string): void {
        for (const key of [...this.lastData.keys()]) {
            if (key === executionId || key.startsWith(`${executionId}/`)) {
                this.lastData.delete(key);
            }
        }
    }

    private async pause(runtime: SessionRuntime, visit: NodeVisit): Promise<void> {
        const { session } = runtime;
        const waiter = createDeferred<void>();
        runtime.waiters.set(visit.branchId, waiter);
        session.state = 'paused';
        session.pausedBranches = [...runtime.waiters.keys()];
        this.logger.debug({ sessionId: session.sessionId, nodeId: visit.nodeId, branchId: visit.branchId }, 'Execution paused');
        this.publish({
            type: 'paused',
            sessionId: session.sessionId,
            executionId: session.executionId,
            nodeId: visit.nodeId,
            branchId: visit.branchId
        });

        const onAbort = () => waiter.reject(abortReason(visit.signal));
        if (visit.signal.aborted) {
            onAbort();
        } else {
            visit.signal.addEventListener('abort', onAbort, { once: true });
        }

        try {
            await waiter.promise;
        } finally {
            visit.signal.removeEventListener('abort', onAbort);
            runtime.waiters.delete(visit.branchId);
            session.pausedBranches = [...runtime.waiters.keys()];
            if (runtime.waiters.size === 0 && session.state === 'paused') {
                session.state = 'running';
            }
        }
    }

    private release(runtime: SessionRuntime): void {
        if (runtime.waiters.size === 0) return;
        const { session } = runtime;
        for (const waiter of runtime.waiters.values()) {
            waiter.resolve();
        }
        if (session.state === 'paused') {
            session.state = 'running';
        }
        this.publish({ type: 'resumed', sessionId: session.sessionId, executionId: session.executionId });
    }

    private finish(runtime: SessionRuntime): void {
        runtime.stepping = false;
        this.release(runtime);
        runtime.session.state = 'finished';
        this.sessions.delete(runtime.session.sessionId);
        this.logger.info({ sessionId: runtime.session.sessionId }, 'Debug session finished');
        this.publish({ type: 'finished', sessionId: runtime.session.sessionId, executionId: runtime.session.executionId });
    }

    private inspect(runtime: SessionRuntime): Inspection {
        const visit = runtime.lastVisit;
        const trace = this.options.recorder.getTrace(runtime.session.executionId);
        return {
            nodeId: visit?.nodeId ?? null,
            branchId: visit?.branchId ?? null,
            state: visit
                ? {
                    version: visit.state.version,
                    data: visit.state.data,
                    path: [...visit.state.path],
                    metadata: visit.state.metadata
                }
                : null,
            breakpoints: this.listBreakpoints(runtime.session.executionId),
            recentEvents: trace ? trace.events.slice(-RECENT_EVENT_COUNT) : []
        };
    }

    private activeSession(executionId: string): SessionRuntime | undefined {
        for (const runtime of this.sessions.values()) {
            if (runtime.session.executionId === executionId && runtime.session.state !== 'finished') {
                return runtime;
            }
        }
        return undefined;
    }

    private async loadBreakpoints(executionId: string): Promise<void> {
        if (this.breakpoints.has(executionId)) return;
        const docs = await this.options.documents.query(BREAKPOINT_COLLECTION, (data) => data.executionId === executionId);
        const loaded: Breakpoint[] = [];
        for (const doc of docs) {
            const parsed = BreakpointSchema.safeParse(doc.data);
            if (parsed.success) {
                loaded.push(parsed.data);
            } else {
                this.logger.warn({ breakpointId: doc.id, issues: parsed.error.issues }, 'Ignoring malformed stored breakpoint');
            }
        }
        this.breakpoints.set(executionId, loaded);
    }

    private async persistBreakpoint(breakpoint: Breakpoint): Promise<void> {
        await this.options.documents.set(BREAKPOINT_COLLECTION, breakpoint.breakpointId, encodeBreakpoint(breakpoint));
    }

    private publish(event: DebugSessionEvent): void {
        try {
            this.emitter.emit('session', event);
        } catch (err) {
            this.logger.warn({ err, type: event.type }, 'Debug session listener failed');
        }
    }

    private snapshot(session: DebugSession): DebugSession {
        return {
            ...session,
            pausedBranches: [...session.pausedBranches],
            commandHistory: session.commandHistory.map((entry) => ({ ...entry }))
        };
    }
}

function encodeBreakpoint(breakpoint: Breakpoint): JsonObject {
    const info = {
        breakpointId: breakpoint.breakpointId,
        executionId: breakpoint.executionId,
        enabled: breakpoint.enabled,
        hitCount: breakpoint.hitCount,
        createdAt: breakpoint.createdAt
    };
    switch (breakpoint.kind) {
        case 'node':
            return { ...info, kind: 'node', nodeId: breakpoint.nodeId };
        case 'condition':
            return {
                ...info,
                kind: 'condition',
                expression: breakpoint.expression,
                ...(breakpoint.nodeId !== undefined ? { nodeId: breakpoint.nodeId } : {})
            };
        case 'variable_change':
            return { ...info, kind: 'variable_change', variable: breakpoint.variable };
        case 'duration':
            return {
                ...info,
                kind: 'duration',
                thresholdMs: breakpoint.thresholdMs,
                ...(breakpoint.nodeId !== undefined ? { nodeId: breakpoint.nodeId } : {})
            };
    }
}
