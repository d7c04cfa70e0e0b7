import { z } from 'zod';
import {
    NoValidRouteError,
    type BacktrackDecision,
    type BacktrackPoint,
    type EdgeDefinition,
    type Logger,
    type RoutingAdvice,
    type RoutingAdviceRequest,
    type RoutingAdvisor,
    type RoutingConfig,
    type RoutingDecision,
    type WorkflowState
} from '@weave/core';
import { withTimeout } from '../utils/timeout';
import { BacktrackRegistry, type CreateBacktrackPointInput } from './backtrack';
import { RoutingHistory } from './history';

export const RoutingAdviceSchema = z.object({
    recommendedNode: z.string().min(1),
    confidence: z.number().min(0).max(1).optional(),
    reasoning: z.string().optional()
});

export interface ConditionalRouterOptions {
    config: RoutingConfig;
    advisorTimeoutMs: number;
    logger: Logger;
    history?: RoutingHistory;
    backtracks?: BacktrackRegistry;
    advisor?: RoutingAdvisor;
    /** Source of randomness for probabilistic edges; `Math.random` by default. */
    random?: () => number;
}

export interface RouteInput {
    workflowId: string;
    executionId: string;
    currentNode: string;
    edges: readonly EdgeDefinition[];
    state: WorkflowState;
    signal?: AbortSignal;
}

interface Candidate {
    edge: EdgeDefinition;
    score: number;
}

class AdvisorTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`Routing advisor timed out after ${timeoutMs}ms`);
        this.name = 'AdvisorTimeoutError';
    }
}

export function clampScore(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.min(1, Math.max(0, value));
}

/**
 * Score of an edge from its own conditions: `priority × satisfied/total`
 * over the weighted sub-conditions, or the priority alone when there are none.
 */
export function baseEdgeScore(edge: EdgeDefinition, state: WorkflowState): number {
    const priority = clampScore(edge.priority);
    if (edge.conditions.length === 0) {
        return priority;
    }

    let total = 0;
    let satisfied = 0;
    for (const condition of edge.conditions) {
        const raw = typeof condition.weight === 'function' ? condition.weight(state) : condition.weight;
        const weight = Number.isFinite(raw) && raw > 0 ? raw : 0;
        total += weight;
        if (condition.predicate(state)) {
            satisfied += weight;
        }
    }

    return total > 0 ? clampScore(priority * (satisfied / total)) : 0;
}

/**
 * Picks the next node(s) for a branch. Scores blend each edge's own
 * conditions with the observed success rate of the edge, get a per-strategy
 * adjustment and, for AI-assisted edges, an optional advisor boost.
 */
export class ConditionalRouter {
    public readonly history: RoutingHistory;
    public readonly backtracks: BacktrackRegistry;

    private readonly config: RoutingConfig;
    private readonly advisorTimeoutMs: number;
    private readonly advisor: RoutingAdvisor | undefined;
    private readonly random: () => number;
    private readonly logger: Logger;

    constructor(options: ConditionalRouterOptions) {
        this.config = options.config;
        this.advisorTimeoutMs = options.advisorTimeoutMs;
        this.advisor = options.advisor;
        this.random = options.random ?? Math.random;
        this.history = options.history ?? new RoutingHistory();
        this.backtracks = options.backtracks ?? new BacktrackRegistry();
        this.logger = options.logger.child({ component: 'ConditionalRouter' });
    }

    public async route(input: RouteInput): Promise<RoutingDecision> {
        const { workflowId, currentNode, edges, state } = input;

        const parallelNodes: string[] = [];
        const candidates: Candidate[] = [];
        for (const edge of edges) {
            const base = baseEdgeScore(edge, state);
            if (edge.strategy === 'parallel') {
                if (base > 0) parallelNodes.push(edge.to);
                continue;
            }
            candidates.push({ edge, score: this.blendHistory(workflowId, edge, base) });
        }

        const exclusiveCount = candidates.filter((c) => c.edge.strategy === 'exclusive' && c.score > 0).length;
        for (const candidate of candidates) {
            candidate.score = this.adjustForStrategy(candidate, exclusiveCount);
        }

        let aiAssisted = false;
        let aiReasoning: string | undefined;
        if (this.advisor && candidates.some((c) => c.edge.strategy === 'ai_assisted')) {
            const advice = await this.consultAdvisor(this.advisor, input, candidates);
            const target = advice ? candidates.find((c) => c.edge.to === advice.recommendedNode && c.score > 0) : undefined;
            if (advice && target) {
                target.score = clampScore(target.score * this.config.aiBoost);
                aiAssisted = true;
                aiReasoning = advice.reasoning;
            } else if (advice) {
                this.logger.warn({ currentNode, recommendedNode: advice.recommendedNode }, 'Advisor recommended a node that is not a viable candidate');
            }
        }

        const alternativeScores: Record<string, number> = {};
        let winner: Candidate | undefined;
        for (const candidate of candidates) {
            const to = candidate.edge.to;
            alternativeScores[to] = Math.max(alternativeScores[to] ?? 0, candidate.score);
            // Strict comparison keeps the earliest-registered edge on ties.
            if (candidate.score > 0 && (!winner || candidate.score > winner.score)) {
                winner = candidate;
            }
        }

        if (!winner && parallelNodes.length === 0) {
            throw new NoValidRouteError(currentNode);
        }

        const selectedNode = winner?.edge.to ?? null;
        const contenders = Object.entries(alternativeScores)
            .filter(([to, score]) => to !== selectedNode && score > this.config.closeContenderThreshold)
            .length;

        const confidence = winner ? winner.score : 1;
        const reasoning = aiReasoning
            ?? (winner
                ? `Selected '${winner.edge.to}' with highest score ${winner.score.toFixed(3)}`
                : `Fanning out to parallel branches: ${parallelNodes.join(', ')}`);

        const decision: RoutingDecision = {
            selectedNode,
            confidence,
            reasoning,
            alternativeScores,
            requiresBacktrackPoint: contenders > 1 && (winner?.edge.allowBacktrack ?? false),
            parallelNodes,
            aiAssisted
        };

        this.logger.debug({ executionId: input.executionId, currentNode, selectedNode, parallelNodes, confidence }, 'Route selected');
        return decision;
    }

    public recordOutcome(workflowId: string, from: string, to: string, confidence: number, success: boolean): void {
        this.history.recordDecision(workflowId, from, to, confidence, success);
    }

    public createBacktrackPoint(input: CreateBacktrackPointInput): BacktrackPoint {
        return this.backtracks.create(input);
    }

    public backtrack(executionId: string, currentNode: string, nextVersion?: () => number): BacktrackDecision {
        const decision = this.backtracks.backtrack(executionId, currentNode, nextVersion);
        this.logger.info({ executionId, currentNode, canBacktrack: decision.canBacktrack }, decision.reason);
        return decision;
    }

    public clear(): void {
        this.history.clear();
        this.backtracks.clear();
    }

    private blendHistory(workflowId: string, edge: EdgeDefinition, base: number): number {
        if (base <= 0) return 0;
        const h = this.config.historyWeight;
        const rate = this.history.getSuccessRate(workflowId, edge.from, edge.to) ?? this.config.defaultSuccessRate;
        return clampScore((1 - h) * base + h * rate);
    }

    private adjustForStrategy(candidate: Candidate, exclusiveCount: number): number {
        if (candidate.score <= 0) return 0;
        switch (candidate.edge.strategy) {
            case 'probabilistic': {
                const jitter = this.config.probabilisticJitter;
                return clampScore(candidate.score * (1 - jitter + this.random() * 2 * jitter));
            }
            case 'exclusive':
                return exclusiveCount === 1
                    ? clampScore(candidate.score * (1 + this.config.exclusiveBoost))
                    : candidate.score;
            default:
                return candidate.score;
        }
    }

    private async consultAdvisor(
        advisor: RoutingAdvisor,
        input: RouteInput,
        candidates: Candidate[]
    ): Promise<RoutingAdvice | null> {
        const request: RoutingAdviceRequest = {
            workflowId: input.workflowId,
            executionId: input.executionId,
            currentNode: input.currentNode,
            stateSummary: {
                recentPath: input.state.path.slice(-3),
                dataKeys: input.state.keys()
            },
            candidates: candidates.map((c) => ({
                to: c.edge.to,
                strategy: c.edge.strategy,
                conditions: c.edge.conditions.map((condition) => condition.name),
                metadata: { ...c.edge.metadata },
                score: c.score
            }))
        };

        try {
            const raw = await withTimeout({
                timeoutMs: this.advisorTimeoutMs,
                run: (signal) => advisor.recommend(request, signal),
                onTimeout: () => new AdvisorTimeoutError(this.advisorTimeoutMs),
                ...(input.signal ? { signal: input.signal } : {})
            });
            const parsed = RoutingAdviceSchema.safeParse(raw);
            if (!parsed.success) {
                this.logger.warn({ currentNode: input.currentNode, issues: parsed.error.issues }, 'Malformed routing advice; using plain scores');
                return null;
            }
            return parsed.data;
        } catch (err) {
            if (input.signal?.aborted) {
                throw err;
            }
            this.logger.warn({ currentNode: input.currentNode, err }, 'Routing advisor unavailable; using plain scores');
            return null;
        }
    }
}
