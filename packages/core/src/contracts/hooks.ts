import type { WorkflowState } from '../entities/state';
import type { ExecutionEvent } from '../entities/trace';

export interface NodeVisit {
    executionId: string;
    workflowId: string;
    branchId: string;
    nodeId: string;
    state: WorkflowState;
    previousNodeId: string | null;
    previousDurationMs: number | null;
    signal: AbortSignal;
}

/**
 * Observation points the executor offers to tracing and debugging.
 * `onEvent` must not throw; `beforeNode` may suspend the branch (a paused
 * debug session) and must settle once `signal` aborts.
 */
export interface ExecutionHooks {
    onEvent?(event: ExecutionEvent): void;
    beforeNode?(visit: NodeVisit): Promise<void>;
}
