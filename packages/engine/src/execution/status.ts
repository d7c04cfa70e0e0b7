import { InvalidTransitionError } from '@weave/core';

export type ExecutionStatus = 'scheduled' | 'running' | 'completed' | 'failed' | 'cancelled';

const transitions: Record<ExecutionStatus, Set<ExecutionStatus>> = {
    scheduled: new Set(['running', 'cancelled']),
    running: new Set(['completed', 'failed', 'cancelled']),
    completed: new Set(),
    failed: new Set(),
    cancelled: new Set()
};

export function canTransition(from: ExecutionStatus, to: ExecutionStatus): boolean {
    return transitions[from].has(to);
}

export function assertTransition(from: ExecutionStatus, to: ExecutionStatus): void {
    if (!canTransition(from, to)) {
        throw new InvalidTransitionError(from, to);
    }
}

export function isTerminal(status: ExecutionStatus): boolean {
    return transitions[status].size === 0;
}
