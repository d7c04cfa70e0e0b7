export type WeaveErrorCode =
    | 'graph_invalid'
    | 'graph_cycle'
    | 'unknown_node'
    | 'node_failed'
    | 'node_timeout'
    | 'no_valid_route'
    | 'quota_exceeded'
    | 'access_denied'
    | 'persistence_failed'
    | 'replay_unavailable'
    | 'cancelled'
    | 'max_steps_exceeded'
    | 'pool_overloaded'
    | 'invalid_transition'
    | 'execution_conflict'
    | 'invalid_breakpoint';

export class WeaveError extends Error {
    public readonly code: WeaveErrorCode;

    public constructor(code: WeaveErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'WeaveError';
        this.code = code;
    }
}

export class GraphValidationError extends WeaveError {
    public constructor(message: string) {
        super('graph_invalid', message);
        this.name = 'GraphValidationError';
    }
}

export class GraphCycleError extends WeaveError {
    public readonly cycle: readonly string[];

    public constructor(cycle: readonly string[]) {
        super('graph_cycle', `Workflow graph contains a cycle: ${cycle.join(' -> ')}`);
        this.name = 'GraphCycleError';
        this.cycle = cycle;
    }
}

export class UnknownNodeError extends WeaveError {
    public readonly nodeId: string;

    public constructor(nodeId: string, context: string) {
        super('unknown_node', `Unknown node '${nodeId}' referenced by ${context}`);
        this.name = 'UnknownNodeError';
        this.nodeId = nodeId;
    }
}

export class NodeExecutionError extends WeaveError {
    public readonly nodeId: string;

    public constructor(nodeId: string, message: string, options?: { cause?: unknown; code?: 'node_failed' | 'node_timeout' }) {
        super(options?.code ?? 'node_failed', message, { cause: options?.cause });
        this.name = 'NodeExecutionError';
        this.nodeId = nodeId;
    }
}

export class NodeTimeoutError extends NodeExecutionError {
    public readonly timeoutMs: number;

    public constructor(nodeId: string, timeoutMs: number) {
        super(nodeId, `Node '${nodeId}' timed out after ${timeoutMs}ms`, { code: 'node_timeout' });
        this.name = 'NodeTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export class NoValidRouteError extends WeaveError {
    public readonly nodeId: string;

    public constructor(nodeId: string) {
        super('no_valid_route', `No valid routing path from '${nodeId}'`);
        this.name = 'NoValidRouteError';
        this.nodeId = nodeId;
    }
}

export class QuotaExceededError extends WeaveError {
    public readonly tenantId: string;

    public constructor(tenantId: string, reason: string) {
        super('quota_exceeded', `Quota exceeded for tenant '${tenantId}': ${reason}`);
        this.name = 'QuotaExceededError';
        this.tenantId = tenantId;
    }
}

export class AccessDeniedError extends WeaveError {
    public readonly tenantId: string;

    public constructor(tenantId: string, reason: string) {
        super('access_denied', `Access denied for tenant '${tenantId}': ${reason}`);
        this.name = 'AccessDeniedError';
        this.tenantId = tenantId;
    }
}

export class PersistenceError extends WeaveError {
    public readonly operation: string;

    public constructor(operation: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super('persistence_failed', `Persistence operation '${operation}' failed: ${reason}`, { cause });
        this.name = 'PersistenceError';
        this.operation = operation;
    }
}

export class ReplayError extends WeaveError {
    public constructor(message: string) {
        super('replay_unavailable', message);
        this.name = 'ReplayError';
    }
}

export class ExecutionCancelledError extends WeaveError {
    public readonly executionId: string;

    public constructor(executionId: string, reason = 'cancelled') {
        super('cancelled', `Execution ${executionId} was cancelled: ${reason}`);
        this.name = 'ExecutionCancelledError';
        this.executionId = executionId;
    }
}

export class MaxStepsExceededError extends WeaveError {
    public constructor(executionId: string, maxSteps: number) {
        super('max_steps_exceeded', `Max steps (${maxSteps}) exceeded for execution ${executionId}`);
        this.name = 'MaxStepsExceededError';
    }
}

export class PoolOverloadedError extends WeaveError {
    public constructor(maxQueue: number) {
        super('pool_overloaded', `Worker pool queue is full (${maxQueue} waiting)`);
        this.name = 'PoolOverloadedError';
    }
}

export class InvalidTransitionError extends WeaveError {
    public constructor(from: string, to: string) {
        super('invalid_transition', `Invalid execution transition: ${from} -> ${to}`);
        this.name = 'InvalidTransitionError';
    }
}

export class ExecutionConflictError extends WeaveError {
    public readonly executionId: string;

    public constructor(executionId: string) {
        super('execution_conflict', `Execution ${executionId} is already in flight`);
        this.name = 'ExecutionConflictError';
        this.executionId = executionId;
    }
}

export class InvalidBreakpointError extends WeaveError {
    public readonly expression: string;

    public constructor(expression: string) {
        super('invalid_breakpoint', `Invalid breakpoint condition '${expression}'`);
        this.name = 'InvalidBreakpointError';
        this.expression = expression;
    }
}

export interface SerializedError {
    code: string;
    message: string;
}

export function serializeError(error: unknown): SerializedError {
    if (error instanceof WeaveError) {
        return { code: error.code, message: error.message };
    }
    if (error instanceof Error) {
        return { code: 'internal', message: error.message };
    }
    return { code: 'internal', message: String(error) };
}
