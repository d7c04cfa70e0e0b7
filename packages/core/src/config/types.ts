export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Heuristics of the conditional router. The magnitudes are tuning knobs;
 * only the existence of a per-strategy adjustment is part of the contract.
 */
export interface RoutingConfig {
    /** Share of the final score taken from the edge's historical success rate. */
    historyWeight: number;
    /** Success rate assumed for an edge with no recorded outcomes. */
    defaultSuccessRate: number;
    /** Probabilistic edges are multiplied by a factor in [1 - jitter, 1 + jitter]. */
    probabilisticJitter: number;
    /** Multiplicative boost for the sole exclusive candidate. */
    exclusiveBoost: number;
    /** Multiplier applied to the candidate the routing advisor recommends. */
    aiBoost: number;
    /** Score above which a losing candidate counts as a close contender. */
    closeContenderThreshold: number;
}

export type CheckpointPolicy = 'every_node' | 'risky_only';

export interface EngineConfig {
    /** Concurrent node invocations across all executions. */
    maxConcurrency: number;
    /** Node invocations allowed to wait for a worker; beyond it they fail. */
    maxQueuedTasks: number;
    nodeTimeoutMs: number;
    advisorTimeoutMs: number;
    /** Guard against runaway executions (counts node steps across branches). */
    maxSteps: number;
    checkpointPolicy: CheckpointPolicy;
    /** Ask the router for an alternative path before failing an execution. */
    backtrackOnFailure: boolean;
    inlineStateThresholdBytes: number;
    stateCacheTtlMs: number;
    stateCacheMaxEntries: number;
    maxTraceEvents: number;
    snapshotEveryNodes: number;
    slowNodeThresholdMs: number;
    /** Finished executions (records and in-memory traces) kept before the oldest are evicted. */
    retainedExecutions: number;
    routing: RoutingConfig;
    logging: {
        level: LogLevel;
        prettyPrint: boolean;
    };
}

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'routing' | 'logging'>> & {
    routing?: Partial<RoutingConfig>;
    logging?: Partial<EngineConfig['logging']>;
};
