import { WorkflowState, type BacktrackDecision, type BacktrackPoint } from '@weave/core';

export interface CreateBacktrackPointInput {
    executionId: string;
    nodeId: string;
    state: WorkflowState;
    alternativeScores: Record<string, number>;
    /** The node the router picked; it starts out as tried. */
    selectedNode: string | null;
    checkpointId?: string;
}

/**
 * Per-execution stacks of saved routing decisions. `backtrack` works on the
 * most recent point and hands back its best untried alternative with a fresh
 * copy of the saved state.
 */
export class BacktrackRegistry {
    private readonly stacks = new Map<string, BacktrackPoint[]>();

    constructor(private readonly now: () => number = Date.now) { }

    public create(input: CreateBacktrackPointInput): BacktrackPoint {
        const point: BacktrackPoint = {
            executionId: input.executionId,
            nodeId: input.nodeId,
            savedState: WorkflowState.fromRecord(input.state.toRecord()),
            alternativeScores: { ...input.alternativeScores },
            tried: new Set(input.selectedNode === null ? [] : [input.selectedNode]),
            createdAt: this.now(),
            ...(input.checkpointId !== undefined ? { checkpointId: input.checkpointId } : {})
        };

        const stack = this.stacks.get(input.executionId) ?? [];
        stack.push(point);
        this.stacks.set(input.executionId, stack);
        return point;
    }

    /**
     * Marks `currentNode` as tried on the newest point and returns its best
     * untried alternative with a copy of the saved state. A point with nothing
     * left is popped and reported as exhausted.
     *
     * `nextVersion` supplies the version of the returned state copy.
     */
    public backtrack(executionId: string, currentNode: string, nextVersion?: () => number): BacktrackDecision {
        const stack = this.stacks.get(executionId);
        const point = stack?.[stack.length - 1];
        if (!stack || !point) {
            return { canBacktrack: false, reason: 'No backtrack points available' };
        }

        point.tried.add(currentNode);
        const alternative = bestUntried(point);
        if (alternative === null) {
            stack.pop();
            if (stack.length === 0) {
                this.stacks.delete(executionId);
            }
            return { canBacktrack: false, reason: `All alternatives from '${point.nodeId}' exhausted` };
        }

        point.tried.add(alternative);
        const version = nextVersion?.();
        const score = point.alternativeScores[alternative] ?? 0;
        return {
            canBacktrack: true,
            nodeId: point.nodeId,
            nextNode: alternative,
            state: version === undefined ? point.savedState.derive() : point.savedState.derive(version),
            reason: `Backtracking from '${currentNode}' to '${point.nodeId}', trying '${alternative}' (score ${score.toFixed(3)})`
        };
    }

    public peek(executionId: string): BacktrackPoint | undefined {
        const stack = this.stacks.get(executionId);
        return stack?.[stack.length - 1];
    }

    public depth(executionId: string): number {
        return this.stacks.get(executionId)?.length ?? 0;
    }

    public clear(executionId?: string): void {
        if (executionId === undefined) {
            this.stacks.clear();
            return;
        }
        this.stacks.delete(executionId);
    }

    /** Drops points older than `maxAgeMs`; returns how many were removed. */
    public cleanupOlderThan(maxAgeMs: number): number {
        const cutoff = this.now() - maxAgeMs;
        let removed = 0;
        for (const [executionId, stack] of this.stacks) {
            const kept = stack.filter((point) => point.createdAt >= cutoff);
            removed += stack.length - kept.length;
            if (kept.length === 0) {
                this.stacks.delete(executionId);
            } else {
                this.stacks.set(executionId, kept);
            }
        }
        return removed;
    }
}

function bestUntried(point: BacktrackPoint): string | null {
    let best: string | null = null;
    let bestScore = 0;
    for (const [nodeId, score] of Object.entries(point.alternativeScores)) {
        if (point.tried.has(nodeId) || score <= 0) continue;
        if (best === null || score > bestScore) {
            best = nodeId;
            bestScore = score;
        }
    }
    return best;
}
