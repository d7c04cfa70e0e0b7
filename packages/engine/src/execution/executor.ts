import { randomUUID } from 'node:crypto';
import { isDeepStrictEqual } from 'node:util';
import {
    AccessDeniedError,
    END,
    ExecutionCancelledError,
    ExecutionConflictError,
    MaxStepsExceededError,
    NodeExecutionError,
    NodeTimeoutError,
    PersistenceError,
    QuotaExceededError,
    ReplayError,
    UnknownNodeError,
    WeaveError,
    WorkflowState,
    serializeError,
    type AccessGate,
    type Checkpoint,
    type CheckpointType,
    type EngineConfig,
    type EventBus,
    type ExecutionEvent,
    type ExecutionHooks,
    type JsonObject,
    type Logger,
    type NodeDefinition,
    type SerializedError,
    type TraceEventType,
    type WorkflowDefinition
} from '@weave/core';
import type { ConditionalRouter } from '../routing/router';
import type { StateStore } from '../state/stateStore';
import { abortReason } from '../utils/async';
import { withTimeout } from '../utils/timeout';
import { assertTransition, isTerminal, type ExecutionStatus } from './status';
import type { WorkerPool } from './workerPool';

export const STATE_ERROR_KEYS = ['error', 'errorCode', 'failedNode'] as const;

export interface WorkflowExecutorDeps {
    config: EngineConfig;
    logger: Logger;
    stateStore: StateStore;
    router: ConditionalRouter;
    pool: WorkerPool;
    gate: AccessGate;
    bus?: EventBus;
    hooks?: ExecutionHooks[];
}

export interface ExecuteInput {
    tenantId: string;
    data?: JsonObject;
    metadata?: Record<string, string>;
    executionId?: string;
    /** Starts at this node instead of the workflow's entrypoint. */
    entrypoint?: string;
    signal?: AbortSignal;
}

export interface ResumeInput {
    checkpointId: string;
    tenantId: string;
    signal?: AbortSignal;
}

export interface ExecutionHandle {
    executionId: string;
    /** Final state; rejects with the failure or {@link ExecutionCancelledError}. */
    result: Promise<WorkflowState>;
    cancel(reason?: string): void;
}

export interface ExecutionSummary {
    executionId: string;
    workflowId: string;
    tenantId: string;
    status: ExecutionStatus;
    currentNodes: string[];
    failingNode: string | null;
    error: SerializedError | null;
    lastCheckpointId: string | null;
    path: string[];
    version: number;
    startedAt: number;
    endedAt: number | null;
}

/**
 * How the first step of a branch treats its starting node:
 * - `enter`: a fresh visit
 * - `reenter`: the state already records the visit (auto and error checkpoints)
 * - `route`: the node already ran; route from its output (branch checkpoints)
 */
type StartMode = 'enter' | 'reenter' | 'route';

interface TraversedEdge {
    from: string;
    to: string;
    confidence: number;
}

interface ExecutionRecord {
    executionId: string;
    tenantId: string;
    status: ExecutionStatus;
    controller: AbortController;
    logger: Logger;
    version: number;
    steps: number;
    currentNodes: Map<string, string>;
    failingNode: string | null;
    error: SerializedError | null;
    lastCheckpointId: string | null;
    lastState: WorkflowState | null;
    resumePoint: { nodeId: string; state: WorkflowState } | null;
    traversed: TraversedEdge[];
    /** Errors already written to an error checkpoint by an inner branch. */
    captured: Set<unknown>;
    startedAt: number;
    endedAt: number | null;
    settled: Promise<void>;
    /** Removes the listener on the caller's abort signal. */
    detachSignal: () => void;
}

interface BranchContext {
    record: ExecutionRecord;
    branchId: string;
    /** Join node of the enclosing fork; the branch stops before entering it. */
    stopAt: string | null;
}

interface BranchOutcome {
    state: WorkflowState;
    stoppedAt: string | null;
    visits: string[];
}

/**
 * Runs executions of one {@link WorkflowDefinition}.
 *
 * Each branch walks the graph one node at a time: gate, debug hook, entry
 * checkpoint, node invocation on the shared worker pool, persistence, then
 * routing. Parallel edges fork branches that merge again at their join node.
 */
export class WorkflowExecutor {
    /** Insertion order is finish order for terminal records; the oldest are evicted first. */
    private readonly records = new Map<string, ExecutionRecord>();
    /** Execution ids claimed by a resume that is still loading its checkpoint. */
    private readonly resuming = new Set<string>();
    /** Nodes that have failed at least once; checkpointed under `risky_only`. */
    private readonly riskyNodes = new Set<string>();
    private readonly reachability = new Map<string, ReadonlySet<string>>();
    private readonly logger: Logger;
    private readonly hooks: ExecutionHooks[];

    constructor(
        private readonly definition: WorkflowDefinition,
        private readonly deps: WorkflowExecutorDeps
    ) {
        this.logger = deps.logger.child({ component: 'WorkflowExecutor', workflowId: definition.id });
        this.hooks = deps.hooks ?? [];
    }

    public execute(input: ExecuteInput): ExecutionHandle {
        const executionId = input.executionId ?? randomUUID();
        const startNode = input.entrypoint ?? this.definition.entrypoint;

        if (this.isActive(executionId)) {
            return this.rejectedHandle(executionId, new ExecutionConflictError(executionId));
        }
        if (!this.definition.nodes.has(startNode)) {
            return this.rejectedHandle(executionId, new UnknownNodeError(startNode, 'execute entrypoint'));
        }

        const state = WorkflowState.create({
            executionId,
            workflowId: this.definition.id,
            data: input.data ?? {},
            metadata: { tenantId: input.tenantId, ...input.metadata }
        });

        return this.start(executionId, input.tenantId, state, startNode, 'enter', 0, input.signal);
    }

    /**
     * Continues an execution from one of its checkpoints under a fresh
     * execution record with the same id.
     */
    public async resume(input: ResumeInput): Promise<ExecutionHandle> {
        const { checkpoint, state: restored } = await this.deps.stateStore.restoreFromCheckpoint(input.checkpointId);
        if (checkpoint.workflowId !== this.definition.id) {
            throw new ReplayError(`Checkpoint '${checkpoint.checkpointId}' belongs to workflow '${checkpoint.workflowId}'`);
        }
        if (!this.definition.nodes.has(checkpoint.nodeId)) {
            throw new UnknownNodeError(checkpoint.nodeId, `checkpoint '${checkpoint.checkpointId}'`);
        }

        const { executionId } = checkpoint;
        if (this.isActive(executionId)) {
            throw new ExecutionConflictError(executionId);
        }

        // Claimed until `start` registers the record, so a concurrent resume sees the conflict.
        this.resuming.add(executionId);
        try {
            const latest = await this.deps.stateStore.getLatestVersion(executionId);
            const state = restored.derive(Math.max(latest, restored.version) + 1);
            for (const key of STATE_ERROR_KEYS) {
                state.deleteMeta(key);
            }

            this.logger.info({
                executionId,
                checkpointId: checkpoint.checkpointId,
                nodeId: checkpoint.nodeId,
                type: checkpoint.type
            }, 'Resuming execution from checkpoint');

            return this.start(
                executionId,
                input.tenantId,
                state,
                checkpoint.nodeId,
                startModeFor(checkpoint.type),
                state.version,
                input.signal
            );
        } finally {
            this.resuming.delete(executionId);
        }
    }

    public getExecution(executionId: string): ExecutionSummary | null {
        const record = this.records.get(executionId);
        if (!record) return null;

        return {
            executionId: record.executionId,
            workflowId: this.definition.id,
            tenantId: record.tenantId,
            status: record.status,
            currentNodes: [...new Set(record.currentNodes.values())],
            failingNode: record.failingNode,
            error: record.error,
            lastCheckpointId: record.lastCheckpointId,
            path: record.lastState ? [...record.lastState.path] : [],
            version: record.lastState?.version ?? 0,
            startedAt: record.startedAt,
            endedAt: record.endedAt
        };
    }

    /** Checkpoints the state the execution would feed to its next node. */
    public async createManualCheckpoint(executionId: string): Promise<Checkpoint> {
        const record = this.records.get(executionId);
        if (!record?.resumePoint) {
            throw new ReplayError(`No committed state for execution ${executionId}`);
        }
        const { nodeId, state } = record.resumePoint;
        return this.checkpoint(record, state, nodeId, 'manual');
    }

    /**
     * Forgets a finished execution: its record and backtrack points. Returns
     * false for unknown or still running executions.
     */
    public discard(executionId: string): boolean {
        const record = this.records.get(executionId);
        if (!record || !isTerminal(record.status)) return false;
        this.records.delete(executionId);
        this.deps.router.backtracks.clear(executionId);
        return true;
    }

    /**
     * Cancels this executor's in-flight executions and waits for them to
     * settle. Routing history and the worker pool belong to the engine and
     * are left alone.
     */
    public async close(): Promise<void> {
        const records = [...this.records.values()];
        for (const record of records) {
            if (!isTerminal(record.status)) {
                this.cancel(record, 'executor closed');
            }
        }
        await Promise.all(records.map((record) => record.settled));
        for (const record of records) {
            this.deps.router.backtracks.clear(record.executionId);
        }
        this.records.clear();
        this.logger.debug('Executor closed');
    }

    private start(
        executionId: string,
        tenantId: string,
        state: WorkflowState,
        startNode: string,
        mode: StartMode,
        initialVersion: number,
        signal?: AbortSignal
    ): ExecutionHandle {
        let resolveSettled: () => void = () => undefined;
        const record: ExecutionRecord = {
            executionId,
            tenantId,
            status: 'scheduled',
            controller: new AbortController(),
            logger: this.logger.child({ executionId }),
            version: Math.max(initialVersion, state.version),
            steps: 0,
            currentNodes: new Map(),
            failingNode: null,
            error: null,
            lastCheckpointId: null,
            lastState: state,
            resumePoint: null,
            traversed: [],
            captured: new Set(),
            startedAt: Date.now(),
            endedAt: null,
            settled: new Promise<void>((resolve) => { resolveSettled = resolve; }),
            detachSignal: () => undefined
        };
        this.records.delete(executionId);
        this.records.set(executionId, record);

        if (signal) {
            if (signal.aborted) {
                this.cancel(record, abortReason(signal).message);
            } else {
                const onAbort = () => this.cancel(record, abortReason(signal).message);
                signal.addEventListener('abort', onAbort, { once: true });
                record.detachSignal = () => signal.removeEventListener('abort', onAbort);
            }
        }

        const result = this.run(record, state, startNode, mode);
        void result.then(resolveSettled, resolveSettled);

        return {
            executionId,
            result,
            cancel: (reason?: string) => this.cancel(record, reason)
        };
    }

    private rejectedHandle(executionId: string, error: WeaveError): ExecutionHandle {
        const result = Promise.reject(error);
        // Callers that never read `result` must not trip unhandled rejections.
        void result.catch(() => undefined);
        return { executionId, result, cancel: () => undefined };
    }

    private cancel(record: ExecutionRecord, reason = 'cancelled'): void {
        if (isTerminal(record.status) || record.controller.signal.aborted) return;
        record.logger.info({ reason }, 'Cancelling execution');
        record.controller.abort(new ExecutionCancelledError(record.executionId, reason));
    }

    private async run(record: ExecutionRecord, state: WorkflowState, startNode: string, mode: StartMode): Promise<WorkflowState> {
        if (record.controller.signal.aborted) {
            this.finish(record, 'cancelled');
            this.emit(record, 'execution_cancelled', null, 'main', { reason: abortReason(record.controller.signal).message });
            throw abortReason(record.controller.signal);
        }

        this.transition(record, 'running');
        this.emit(record, 'execution_start', startNode, 'main', { tenantId: record.tenantId, version: state.version });
        record.logger.info({ startNode, mode }, 'Execution started');

        try {
            const outcome = await this.runBranch({ record, branchId: 'main', stopAt: null }, startNode, state, mode);
            this.finish(record, 'completed');
            this.emit(record, 'execution_complete', outcome.state.currentNode ?? null, 'main', {
                snapshot: snapshotOf(outcome.state)
            });
            this.recordOutcomes(record, true);
            record.logger.info({ steps: record.steps, version: outcome.state.version }, 'Execution completed');
            return outcome.state;
        } catch (err) {
            if (record.controller.signal.aborted) {
                const reason = abortReason(record.controller.signal);
                this.finish(record, 'cancelled');
                this.emit(record, 'execution_cancelled', null, 'main', {
                    reason: reason.message,
                    ...(record.lastState ? { snapshot: snapshotOf(record.lastState) } : {})
                });
                record.logger.info({ reason: reason.message }, 'Execution cancelled');
                throw reason;
            }

            record.error = record.error ?? serializeError(err);
            this.finish(record, 'failed');
            this.emit(record, 'execution_failed', record.failingNode, 'main', {
                error: { code: record.error.code, message: record.error.message },
                ...(record.lastState ? { snapshot: snapshotOf(record.lastState) } : {})
            });
            this.recordOutcomes(record, false);
            record.logger.error({ err, failingNode: record.failingNode }, 'Execution failed');
            throw err;
        }
    }

    private async runBranch(ctx: BranchContext, startNode: string, startState: WorkflowState, mode: StartMode): Promise<BranchOutcome> {
        const { record, branchId } = ctx;
        const signal = record.controller.signal;
        const visits: string[] = [];

        let nodeId = startNode;
        let state = startState;
        let stepMode = mode;
        let previousNodeId: string | null = null;
        let previousDurationMs: number | null = null;

        try {
            while (true) {
                if (nodeId === END) {
                    return { state, stoppedAt: null, visits };
                }
                if (ctx.stopAt === nodeId && stepMode !== 'route') {
                    return { state, stoppedAt: nodeId, visits };
                }

                const node = this.definition.nodes.get(nodeId);
                if (!node) {
                    throw new UnknownNodeError(nodeId, `branch ${branchId}`);
                }

                this.throwIfCancelled(record);
                if (stepMode !== 'route') {
                    record.steps += 1;
                    if (record.steps > this.deps.config.maxSteps) {
                        throw new MaxStepsExceededError(record.executionId, this.deps.config.maxSteps);
                    }
                }

                record.currentNodes.set(branchId, nodeId);
                let committed: WorkflowState;
                let entry: WorkflowState | null = null;

                try {
                    if (stepMode === 'route') {
                        committed = state;
                    } else {
                        if (stepMode === 'enter') {
                            record.resumePoint = { nodeId, state };
                        }
                        await this.authorize(record, nodeId);
                        await this.beforeNode(record, branchId, nodeId, state, previousNodeId, previousDurationMs);
                        this.throwIfCancelled(record);

                        entry = state.derive(this.nextVersion(record, state.version));
                        if (stepMode === 'enter') {
                            entry.recordVisit(nodeId);
                        }
                        visits.push(nodeId);

                        if (this.shouldCheckpoint(nodeId)) {
                            await this.checkpoint(record, entry, nodeId, 'auto');
                        }

                        this.emit(record, 'node_enter', nodeId, branchId, { version: entry.version });
                        const startedAt = Date.now();
                        const output = await this.invoke(record, node, entry);
                        const durationMs = Date.now() - startedAt;

                        committed = output.derive(this.nextVersion(record, output.version));
                        this.emit(record, 'node_exit', nodeId, branchId, {
                            durationMs,
                            snapshot: snapshotOf(committed)
                        });
                        previousNodeId = nodeId;
                        previousDurationMs = durationMs;
                    }

                    const edges = this.definition.edges.get(nodeId) ?? [];
                    if (edges.length === 0) {
                        await this.commit(record, branchId, nodeId, entry, committed);
                        return { state: committed, stoppedAt: null, visits };
                    }

                    const decision = await this.deps.router.route({
                        workflowId: this.definition.id,
                        executionId: record.executionId,
                        currentNode: nodeId,
                        edges,
                        state: committed,
                        signal
                    });

                    if (decision.requiresBacktrackPoint) {
                        this.deps.router.createBacktrackPoint({
                            executionId: record.executionId,
                            nodeId,
                            state: committed,
                            alternativeScores: decision.alternativeScores,
                            selectedNode: decision.selectedNode
                        });
                    }

                    const targets = unique([
                        ...decision.parallelNodes,
                        ...(decision.selectedNode !== null ? [decision.selectedNode] : [])
                    ]);

                    if (decision.parallelNodes.length === 0 && decision.selectedNode !== null) {
                        committed.recordTransition(nodeId, decision.selectedNode, decision.reasoning);
                        await this.commit(record, branchId, nodeId, entry, committed);
                        this.traverse(record, branchId, nodeId, decision.selectedNode, decision.confidence, {
                            reasoning: decision.reasoning,
                            aiAssisted: decision.aiAssisted
                        });
                        nodeId = decision.selectedNode;
                        state = committed;
                        stepMode = 'enter';
                        continue;
                    }

                    for (const target of targets) {
                        committed.recordTransition(nodeId, target, 'parallel fork');
                    }
                    await this.commit(record, branchId, nodeId, entry, committed);
                    await this.checkpoint(record, committed, nodeId, 'branch');

                    const joined = await this.fork(ctx, nodeId, committed, targets, decision.confidence);
                    visits.push(...joined.visits);
                    if (joined.stoppedAt === null) {
                        return { state: joined.state, stoppedAt: null, visits };
                    }
                    nodeId = joined.stoppedAt;
                    state = joined.state;
                    stepMode = 'enter';
                } catch (err) {
                    if (
                        signal.aborted
                        || err instanceof ExecutionCancelledError
                        || err instanceof PersistenceError
                        || err instanceof MaxStepsExceededError
                        || record.captured.has(err)
                    ) {
                        throw err;
                    }

                    if (this.deps.config.backtrackOnFailure) {
                        const decision = this.deps.router.backtrack(
                            record.executionId,
                            nodeId,
                            () => this.nextVersion(record, 0)
                        );
                        if (decision.canBacktrack) {
                            record.logger.warn({ nodeId, err, resumeAt: decision.nextNode }, 'Node failed; backtracking');
                            this.emit(record, 'backtrack', nodeId, branchId, {
                                from: decision.nodeId,
                                to: decision.nextNode,
                                failedNode: nodeId,
                                reason: decision.reason
                            });
                            decision.state.recordTransition(decision.nodeId, decision.nextNode, 'backtrack');
                            await this.deps.stateStore.saveState(decision.state);
                            this.traverse(record, branchId, decision.nodeId, decision.nextNode, 0, { backtrack: true });
                            nodeId = decision.nextNode;
                            state = decision.state;
                            stepMode = 'enter';
                            continue;
                        }
                    }

                    await this.captureFailure(record, branchId, nodeId, entry ?? state, entry === null && stepMode === 'enter', err);
                    throw err;
                }
            }
        } finally {
            record.currentNodes.delete(branchId);
        }
    }

    /**
     * Runs one branch per target and merges their results into a state
     * derived from the fork state. The join node is the first node, in
     * topological order, reachable from every branch start.
     */
    private async fork(
        ctx: BranchContext,
        forkNode: string,
        forkState: WorkflowState,
        targets: string[],
        confidence: number
    ): Promise<BranchOutcome> {
        const { record } = ctx;
        const join = this.findJoin(targets) ?? ctx.stopAt;
        record.logger.debug({ forkNode, targets, join }, 'Forking parallel branches');

        const completed: BranchOutcome[] = [];
        const settled = await Promise.allSettled(targets.map(async (target) => {
            const branchId = `${ctx.branchId}/${target}`;
            const branchState = forkState.derive(this.nextVersion(record, forkState.version));
            this.traverse(record, branchId, forkNode, target, confidence, { parallel: true });
            const outcome = await this.runBranch({ record, branchId, stopAt: join }, target, branchState, 'enter');
            completed.push(outcome);
            return outcome;
        }));

        const failure = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
        if (failure) {
            throw failure.reason;
        }

        const merged = forkState.derive(this.nextVersion(record, forkState.version));
        const before = forkState.data;
        const visits: string[] = [];
        for (const outcome of completed) {
            const after = outcome.state.data;
            for (const [key, value] of Object.entries(after)) {
                if (!isDeepStrictEqual(before[key], value)) {
                    merged.set(key, value);
                }
            }
            for (const key of Object.keys(before)) {
                if (!(key in after)) {
                    merged.delete(key);
                }
            }
            for (const visited of outcome.state.path.slice(forkState.path.length)) {
                merged.recordVisit(visited);
            }
            visits.push(...outcome.visits);
        }

        const reachedJoin = join !== null && completed.some((outcome) => outcome.stoppedAt === join);
        if (reachedJoin) {
            merged.recordTransition(forkNode, join, 'parallel join');
        }
        await this.deps.stateStore.saveState(merged);
        record.lastState = merged;
        this.emit(record, 'state_change', join, ctx.branchId, {
            version: merged.version,
            merged: completed.length,
            changedKeys: changedKeys(forkState, merged)
        });

        return { state: merged, stoppedAt: reachedJoin ? join : null, visits };
    }

    private findJoin(targets: string[]): string | null {
        if (targets.length < 2) return null;
        const reachable = targets.map((target) => this.reachableFrom(target));
        for (const nodeId of this.definition.topologicalOrder) {
            if (reachable.every((set) => set.has(nodeId))) {
                return nodeId;
            }
        }
        return null;
    }

    /** Nodes reachable from `nodeId`, including itself. */
    private reachableFrom(nodeId: string): ReadonlySet<string> {
        const cached = this.reachability.get(nodeId);
        if (cached) return cached;

        const result = new Set<string>([nodeId]);
        for (const edge of this.definition.edges.get(nodeId) ?? []) {
            if (edge.to === END) continue;
            for (const descendant of this.reachableFrom(edge.to)) {
                result.add(descendant);
            }
        }
        this.reachability.set(nodeId, result);
        return result;
    }

    private async invoke(record: ExecutionRecord, node: NodeDefinition, entry: WorkflowState): Promise<WorkflowState> {
        const timeoutMs = node.timeoutMs ?? this.deps.config.nodeTimeoutMs;
        const signal = record.controller.signal;
        // The node works on its own copy; `entry` stays intact for error capture.
        const input = WorkflowState.fromRecord(entry.toRecord());

        let output: WorkflowState;
        try {
            output = await this.deps.pool.run(() => withTimeout({
                timeoutMs,
                signal,
                run: (nodeSignal) => node.process(input, nodeSignal),
                onTimeout: () => new NodeTimeoutError(node.id, timeoutMs)
            }), signal);
        } catch (err) {
            if (err instanceof WeaveError || signal.aborted) {
                throw err;
            }
            const message = err instanceof Error ? err.message : String(err);
            throw new NodeExecutionError(node.id, `Node '${node.id}' failed: ${message}`, { cause: err });
        }

        if (!(output instanceof WorkflowState) || output.executionId !== record.executionId) {
            throw new NodeExecutionError(node.id, `Node '${node.id}' returned a state that does not belong to execution ${record.executionId}`);
        }
        return output;
    }

    private async authorize(record: ExecutionRecord, nodeId: string): Promise<void> {
        const decision = await this.deps.gate.authorize({
            tenantId: record.tenantId,
            operation: 'node.execute',
            executionId: record.executionId,
            nodeId
        });
        if (decision.allowed) return;

        throw decision.code === 'quota_exceeded'
            ? new QuotaExceededError(record.tenantId, decision.reason)
            : new AccessDeniedError(record.tenantId, decision.reason);
    }

    private async beforeNode(
        record: ExecutionRecord,
        branchId: string,
        nodeId: string,
        state: WorkflowState,
        previousNodeId: string | null,
        previousDurationMs: number | null
    ): Promise<void> {
        for (const hook of this.hooks) {
            if (!hook.beforeNode) continue;
            await hook.beforeNode({
                executionId: record.executionId,
                workflowId: this.definition.id,
                branchId,
                nodeId,
                state,
                previousNodeId,
                previousDurationMs,
                signal: record.controller.signal
            });
        }
    }

    private async commit(
        record: ExecutionRecord,
        branchId: string,
        nodeId: string,
        entry: WorkflowState | null,
        committed: WorkflowState
    ): Promise<void> {
        await this.deps.stateStore.saveState(committed);
        record.lastState = committed;
        if (entry) {
            this.emit(record, 'state_change', nodeId, branchId, {
                version: committed.version,
                changedKeys: changedKeys(entry, committed)
            });
        }
    }

    private traverse(record: ExecutionRecord, branchId: string, from: string, to: string, confidence: number, extra: JsonObject): void {
        record.traversed.push({ from, to, confidence });
        this.emit(record, 'edge_traverse', from, branchId, { from, to, confidence, ...extra });
    }

    private async captureFailure(
        record: ExecutionRecord,
        branchId: string,
        nodeId: string,
        base: WorkflowState,
        recordVisit: boolean,
        err: unknown
    ): Promise<void> {
        const serialized = serializeError(err);
        this.riskyNodes.add(nodeId);
        record.captured.add(err);
        record.failingNode = nodeId;
        record.error = serialized;

        // Error checkpoints are re-entered on resume, so the visit must already be on the path.
        const failed = base.derive(this.nextVersion(record, base.version));
        if (recordVisit) {
            failed.recordVisit(nodeId);
        }
        failed.setMeta('error', serialized.message);
        failed.setMeta('errorCode', serialized.code);
        failed.setMeta('failedNode', nodeId);
        record.lastState = failed;

        this.emit(record, 'node_error', nodeId, branchId, { error: { code: serialized.code, message: serialized.message } });
        record.logger.warn({ nodeId, branchId, err }, 'Node step failed');

        await this.checkpoint(record, failed, nodeId, 'error');
    }

    private async checkpoint(record: ExecutionRecord, state: WorkflowState, nodeId: string, type: CheckpointType): Promise<Checkpoint> {
        const checkpoint = await this.deps.stateStore.createCheckpoint(state, nodeId, type);
        record.lastCheckpointId = checkpoint.checkpointId;
        return checkpoint;
    }

    private shouldCheckpoint(nodeId: string): boolean {
        return this.deps.config.checkpointPolicy === 'every_node' || this.riskyNodes.has(nodeId);
    }

    private nextVersion(record: ExecutionRecord, atLeast: number): number {
        record.version = Math.max(record.version, atLeast) + 1;
        return record.version;
    }

    private throwIfCancelled(record: ExecutionRecord): void {
        if (record.controller.signal.aborted) {
            throw abortReason(record.controller.signal);
        }
    }

    private transition(record: ExecutionRecord, to: ExecutionStatus): void {
        assertTransition(record.status, to);
        record.status = to;
    }

    private finish(record: ExecutionRecord, to: ExecutionStatus): void {
        this.transition(record, to);
        record.endedAt = Date.now();
        record.currentNodes.clear();
        record.detachSignal();
        // A failed execution keeps its backtrack points for a resume that may backtrack.
        if (to !== 'failed' || !this.deps.config.backtrackOnFailure) {
            this.deps.router.backtracks.clear(record.executionId);
        }
        this.records.delete(record.executionId);
        this.records.set(record.executionId, record);
        this.evictFinished();
    }

    private evictFinished(): void {
        let excess = [...this.records.values()].filter((record) => isTerminal(record.status)).length
            - this.deps.config.retainedExecutions;
        for (const record of this.records.values()) {
            if (excess <= 0) break;
            if (!isTerminal(record.status)) continue;
            this.records.delete(record.executionId);
            this.deps.router.backtracks.clear(record.executionId);
            excess -= 1;
        }
    }

    private isActive(executionId: string): boolean {
        const existing = this.records.get(executionId);
        return this.resuming.has(executionId) || (existing !== undefined && !isTerminal(existing.status));
    }

    private recordOutcomes(record: ExecutionRecord, success: boolean): void {
        for (const edge of record.traversed) {
            this.deps.router.recordOutcome(this.definition.id, edge.from, edge.to, edge.confidence, success);
        }
    }

    /** Delivers an event to hooks and the bus. Sink failures are logged, never thrown. */
    private emit(record: ExecutionRecord, type: TraceEventType, nodeId: string | null, branchId: string, data: JsonObject): void {
        const event: ExecutionEvent = {
            type,
            executionId: record.executionId,
            workflowId: this.definition.id,
            nodeId,
            branchId,
            data,
            timestamp: Date.now()
        };

        for (const hook of this.hooks) {
            try {
                hook.onEvent?.(event);
            } catch (err) {
                record.logger.warn({ err, type }, 'Execution hook failed');
            }
        }

        if (!this.deps.bus) return;
        try {
            this.deps.bus.emit({
                channel: 'execution',
                name: type,
                payload: {
                    executionId: event.executionId,
                    workflowId: event.workflowId,
                    nodeId: event.nodeId,
                    branchId: event.branchId,
                    data: event.data,
                    timestamp: event.timestamp
                }
            });
        } catch (err) {
            record.logger.warn({ err, type }, 'Event bus emit failed');
        }
    }
}

function startModeFor(type: CheckpointType): StartMode {
    switch (type) {
        case 'auto':
        case 'error':
            return 'reenter';
        case 'branch':
            return 'route';
        case 'manual':
            return 'enter';
    }
}

function snapshotOf(state: WorkflowState): JsonObject {
    return {
        version: state.version,
        data: state.data,
        path: [...state.path]
    };
}

function changedKeys(before: WorkflowState, after: WorkflowState): string[] {
    const previous = before.data;
    const next = after.data;
    const keys = new Set([...Object.keys(previous), ...Object.keys(next)]);
    return [...keys].filter((key) => !isDeepStrictEqual(previous[key], next[key]));
}

function unique(values: string[]): string[] {
    return [...new Set(values)];
}
