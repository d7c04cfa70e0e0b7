export interface RoutingStats {
    workflowId: string;
    from: string;
    to: string;
    attempts: number;
    successes: number;
    totalConfidence: number;
}

/**
 * Running outcome statistics per (workflow, from, to) edge. Updates are
 * synchronous, so concurrent executions never interleave inside one.
 */
export class RoutingHistory {
    private readonly stats = new Map<string, RoutingStats>();

    public recordDecision(workflowId: string, from: string, to: string, confidence: number, success: boolean): void {
        const key = historyKey(workflowId, from, to);
        const entry = this.stats.get(key) ?? { workflowId, from, to, attempts: 0, successes: 0, totalConfidence: 0 };
        entry.attempts += 1;
        entry.successes += success ? 1 : 0;
        entry.totalConfidence += confidence;
        this.stats.set(key, entry);
    }

    /** Null until the edge has been traversed at least once. */
    public getSuccessRate(workflowId: string, from: string, to: string): number | null {
        const entry = this.stats.get(historyKey(workflowId, from, to));
        return entry && entry.attempts > 0 ? entry.successes / entry.attempts : null;
    }

    public getAverageConfidence(workflowId: string, from: string, to: string): number | null {
        const entry = this.stats.get(historyKey(workflowId, from, to));
        return entry && entry.attempts > 0 ? entry.totalConfidence / entry.attempts : null;
    }

    public snapshot(): RoutingStats[] {
        return [...this.stats.values()].map((entry) => ({ ...entry }));
    }

    public clear(): void {
        this.stats.clear();
    }
}

function historyKey(workflowId: string, from: string, to: string): string {
    return `${workflowId}\u0000${from}\u0000${to}`;
}
