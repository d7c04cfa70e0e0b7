import type { JsonValue } from '../entities/json';
import type { WorkflowState } from '../entities/state';

/** Terminal sentinel: routing to it completes the branch. */
export const END = '__end__';

export type RoutingStrategy =
    | 'simple'
    | 'ai_assisted'
    | 'probabilistic'
    | 'weighted'
    | 'parallel'
    | 'exclusive';

export type StatePredicate = (state: WorkflowState) => boolean;

export type EdgeWeight = number | ((state: WorkflowState) => number);

export interface RoutingCondition {
    name: string;
    predicate: StatePredicate;
    weight: EdgeWeight;
}

export interface EdgeDefinition {
    from: string;
    to: string;
    strategy: RoutingStrategy;
    priority: number;
    conditions: readonly RoutingCondition[];
    metadata: Readonly<Record<string, JsonValue>>;
    allowBacktrack: boolean;
    /** Registration order among the edges leaving `from`; breaks score ties. */
    order: number;
}

/**
 * The host-supplied work of a node. It receives its own copy of the state and
 * returns the state to continue with. The signal aborts on timeout or cancel.
 */
export type NodeProcessor = (state: WorkflowState, signal: AbortSignal) => Promise<WorkflowState>;

export interface NodeDefinition {
    id: string;
    process: NodeProcessor;
    timeoutMs?: number;
    description?: string;
}

export interface WorkflowDefinition {
    id: string;
    name: string;
    entrypoint: string;
    nodes: ReadonlyMap<string, NodeDefinition>;
    edges: ReadonlyMap<string, readonly EdgeDefinition[]>;
    /** Node ids sorted so every edge points forward. */
    topologicalOrder: readonly string[];
}
