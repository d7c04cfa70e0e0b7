import type {
    AccessGate,
    BlobStoragePort,
    DocumentStore,
    EngineConfig,
    EngineConfigOverrides,
    EventBus,
    Logger,
    RoutingAdvisor,
    RuntimeResource,
    WorkflowDefinition
} from '@weave/core';
import { resolveEngineConfig } from './config';
import { WorkflowDebugger } from './debug/debugger';
import { TraceRecorder } from './debug/traceRecorder';
import { WorkflowExecutor } from './execution/executor';
import { isTerminal } from './execution/status';
import { WorkerPool } from './execution/workerPool';
import { ConditionalRouter } from './routing/router';
import { StateCache } from './state/stateCache';
import { StateStore } from './state/stateStore';

export interface WorkflowEngineOptions {
    documents: DocumentStore;
    blobs: BlobStoragePort;
    logger: Logger;
    gate: AccessGate;
    bus?: EventBus;
    advisor?: RoutingAdvisor;
    config?: EngineConfigOverrides;
    /** Randomness for probabilistic routing. */
    random?: () => number;
}

/**
 * The shared components behind every executor: one state store, router,
 * worker pool, trace recorder and debugger per engine instance.
 */
export interface WorkflowEngine extends RuntimeResource {
    readonly config: EngineConfig;
    readonly stateStore: StateStore;
    readonly router: ConditionalRouter;
    readonly pool: WorkerPool;
    readonly recorder: TraceRecorder;
    readonly debugger: WorkflowDebugger;
    createExecutor(definition: WorkflowDefinition): WorkflowExecutor;
    /**
     * Drops everything held in memory for a finished execution: executor
     * record, backtrack points, trace, breakpoints and cached states. Stored
     * states, checkpoints and persisted traces stay. Returns false, and keeps
     * everything, while the execution is still running.
     */
    discardExecution(executionId: string): boolean;
    start(): Promise<void>;
    close(): Promise<void>;
}

export function createWorkflowEngine(options: WorkflowEngineOptions): WorkflowEngine {
    const config = resolveEngineConfig(options.config);
    const logger = options.logger;

    const cache = new StateCache({ ttlMs: config.stateCacheTtlMs, maxEntries: config.stateCacheMaxEntries });
    const stateStore = new StateStore({
        documents: options.documents,
        blobs: options.blobs,
        logger,
        cache,
        inlineThresholdBytes: config.inlineStateThresholdBytes
    });
    const router = new ConditionalRouter({
        config: config.routing,
        advisorTimeoutMs: config.advisorTimeoutMs,
        logger,
        ...(options.advisor ? { advisor: options.advisor } : {}),
        ...(options.random ? { random: options.random } : {})
    });
    const pool = new WorkerPool(config.maxConcurrency, config.maxQueuedTasks);
    const recorder = new TraceRecorder({
        logger,
        blobs: options.blobs,
        maxEvents: config.maxTraceEvents,
        snapshotEveryNodes: config.snapshotEveryNodes,
        maxTraces: config.retainedExecutions
    });
    const debuggerInstance = new WorkflowDebugger({
        logger,
        documents: options.documents,
        recorder,
        blobs: options.blobs,
        slowNodeThresholdMs: config.slowNodeThresholdMs
    });

    const executors: WorkflowExecutor[] = [];
    const resources: RuntimeResource[] = [options.documents, options.blobs, ...(options.bus ? [options.bus] : [])];

    return {
        config,
        stateStore,
        router,
        pool,
        recorder,
        debugger: debuggerInstance,
        createExecutor(definition: WorkflowDefinition): WorkflowExecutor {
            const executor = new WorkflowExecutor(definition, {
                config,
                logger,
                stateStore,
                router,
                pool,
                gate: options.gate,
                ...(options.bus ? { bus: options.bus } : {}),
                hooks: [recorder, debuggerInstance]
            });
            executors.push(executor);
            return executor;
        },
        discardExecution(executionId: string): boolean {
            const running = executors.some((executor) => {
                const summary = executor.getExecution(executionId);
                return summary !== null && !isTerminal(summary.status);
            });
            if (running) return false;

            for (const executor of executors) {
                executor.discard(executionId);
            }
            router.backtracks.clear(executionId);
            recorder.discard(executionId);
            debuggerInstance.discard(executionId);
            cache.deleteExecution(executionId);
            return true;
        },
        async start(): Promise<void> {
            for (const resource of resources) {
                await resource.start?.();
            }
            logger.debug({ maxConcurrency: config.maxConcurrency }, 'Workflow engine started');
        },
        async close(): Promise<void> {
            await Promise.all(executors.map((executor) => executor.close()));
            await pool.drain();
            router.clear();
            cache.clear();
            for (const resource of [...resources].reverse()) {
                await resource.close?.();
            }
            logger.debug('Workflow engine closed');
        }
    };
}
