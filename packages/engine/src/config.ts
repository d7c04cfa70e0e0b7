import { z } from 'zod';
import {
    ENGINE_DEFAULTS,
    LOGGING_DEFAULTS,
    ROUTING_DEFAULTS,
    STORAGE_DEFAULTS,
    TRACE_DEFAULTS,
    type EngineConfig,
    type EngineConfigOverrides,
    type LogLevel
} from '@weave/core';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

const unitInterval = z.number().min(0).max(1);
const positiveInteger = z.number().int().positive();

const EngineConfigSchema = z.object({
    maxConcurrency: positiveInteger,
    maxQueuedTasks: z.number().int().nonnegative(),
    nodeTimeoutMs: positiveInteger,
    advisorTimeoutMs: positiveInteger,
    maxSteps: positiveInteger,
    checkpointPolicy: z.enum(['every_node', 'risky_only']),
    backtrackOnFailure: z.boolean(),
    inlineStateThresholdBytes: positiveInteger,
    stateCacheTtlMs: positiveInteger,
    stateCacheMaxEntries: positiveInteger,
    maxTraceEvents: positiveInteger,
    snapshotEveryNodes: positiveInteger,
    slowNodeThresholdMs: positiveInteger,
    retainedExecutions: positiveInteger,
    routing: z.object({
        historyWeight: unitInterval,
        defaultSuccessRate: unitInterval,
        probabilisticJitter: unitInterval,
        exclusiveBoost: z.number().min(0),
        aiBoost: z.number().min(1),
        closeContenderThreshold: unitInterval
    }),
    logging: z.object({
        level: z.enum(LOG_LEVELS),
        prettyPrint: z.boolean()
    })
}).refine((config) => config.advisorTimeoutMs < config.nodeTimeoutMs, {
    message: 'must be shorter than nodeTimeoutMs',
    path: ['advisorTimeoutMs']
});

function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

export function defaultEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const envLevel = env.LOG_LEVEL?.toLowerCase();
    return {
        maxConcurrency: ENGINE_DEFAULTS.MAX_CONCURRENCY,
        maxQueuedTasks: ENGINE_DEFAULTS.MAX_QUEUED_TASKS,
        nodeTimeoutMs: ENGINE_DEFAULTS.NODE_TIMEOUT_MS,
        advisorTimeoutMs: ENGINE_DEFAULTS.ADVISOR_TIMEOUT_MS,
        maxSteps: ENGINE_DEFAULTS.MAX_STEPS,
        checkpointPolicy: ENGINE_DEFAULTS.CHECKPOINT_POLICY,
        backtrackOnFailure: ENGINE_DEFAULTS.BACKTRACK_ON_FAILURE,
        inlineStateThresholdBytes: STORAGE_DEFAULTS.INLINE_STATE_THRESHOLD_BYTES,
        stateCacheTtlMs: STORAGE_DEFAULTS.STATE_CACHE_TTL_MS,
        stateCacheMaxEntries: STORAGE_DEFAULTS.STATE_CACHE_MAX_ENTRIES,
        maxTraceEvents: TRACE_DEFAULTS.MAX_TRACE_EVENTS,
        snapshotEveryNodes: TRACE_DEFAULTS.SNAPSHOT_EVERY_NODES,
        slowNodeThresholdMs: TRACE_DEFAULTS.SLOW_NODE_THRESHOLD_MS,
        retainedExecutions: TRACE_DEFAULTS.RETAINED_EXECUTIONS,
        routing: {
            historyWeight: ROUTING_DEFAULTS.HISTORY_WEIGHT,
            defaultSuccessRate: ROUTING_DEFAULTS.DEFAULT_SUCCESS_RATE,
            probabilisticJitter: ROUTING_DEFAULTS.PROBABILISTIC_JITTER,
            exclusiveBoost: ROUTING_DEFAULTS.EXCLUSIVE_BOOST,
            aiBoost: ROUTING_DEFAULTS.AI_BOOST,
            closeContenderThreshold: ROUTING_DEFAULTS.CLOSE_CONTENDER_THRESHOLD
        },
        logging: {
            level: isLogLevel(envLevel) ? envLevel : LOGGING_DEFAULTS.LEVEL,
            prettyPrint: env.NODE_ENV !== 'production'
        }
    };
}

/**
 * Merges overrides onto the defaults and validates the result.
 * Throws `Invalid engine config: ...` naming every offending key.
 */
export function resolveEngineConfig(
    overrides: EngineConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env
): EngineConfig {
    const defaults = defaultEngineConfig(env);
    const merged: EngineConfig = {
        ...defaults,
        ...overrides,
        routing: { ...defaults.routing, ...overrides.routing },
        logging: { ...defaults.logging, ...overrides.logging }
    };

    const result = EngineConfigSchema.safeParse(merged);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.')} (${issue.message})`)
            .join('; ');
        throw new Error(`Invalid engine config: ${details}`);
    }

    const config: EngineConfig = result.data;
    return config;
}
