import type { JsonValue } from '../entities/json';
import type { WorkflowState } from '../entities/state';
import type { RoutingStrategy } from './graph';

export interface RoutingDecision {
    /** Winner among non-parallel edges, or null when only parallel edges qualified. */
    selectedNode: string | null;
    confidence: number;
    reasoning: string;
    alternativeScores: Record<string, number>;
    requiresBacktrackPoint: boolean;
    parallelNodes: string[];
    aiAssisted: boolean;
}

export interface BacktrackPoint {
    executionId: string;
    nodeId: string;
    savedState: WorkflowState;
    alternativeScores: Record<string, number>;
    tried: Set<string>;
    createdAt: number;
    checkpointId?: string;
}

export type BacktrackDecision =
    | { canBacktrack: true; nodeId: string; nextNode: string; state: WorkflowState; reason: string }
    | { canBacktrack: false; reason: string };

export interface RoutingCandidateSummary {
    to: string;
    strategy: RoutingStrategy;
    conditions: string[];
    metadata: Record<string, JsonValue>;
    score: number;
}

/** What the AI-assisted routing capability is asked about. */
export interface RoutingAdviceRequest {
    workflowId: string;
    executionId: string;
    currentNode: string;
    stateSummary: {
        recentPath: string[];
        dataKeys: string[];
    };
    candidates: RoutingCandidateSummary[];
}

export interface RoutingAdvice {
    recommendedNode: string;
    confidence?: number;
    reasoning?: string;
}
