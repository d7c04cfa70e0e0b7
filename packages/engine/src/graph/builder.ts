import {
    END,
    GraphCycleError,
    GraphValidationError,
    UnknownNodeError,
    type EdgeDefinition,
    type EdgeWeight,
    type JsonValue,
    type NodeDefinition,
    type NodeProcessor,
    type RoutingCondition,
    type RoutingStrategy,
    type StatePredicate,
    type WorkflowDefinition
} from '@weave/core';

export interface NodeOptions {
    /** Overrides the engine-wide node timeout for this node. */
    timeoutMs?: number;
    description?: string;
}

export interface WeightedCondition {
    name: string;
    predicate: StatePredicate;
    weight?: EdgeWeight;
}

export interface EdgeOptions {
    weight?: EdgeWeight;
    strategy?: RoutingStrategy;
    priority?: number;
    when?: WeightedCondition[];
    metadata?: Record<string, JsonValue>;
    allowBacktrack?: boolean;
}

export interface WorkflowSummary {
    id: string;
    name: string;
    entrypoint: string;
    nodes: string[];
    edges: Array<{
        from: string;
        to: string;
        strategy: RoutingStrategy;
        priority: number;
        conditions: string[];
    }>;
}

/**
 * Collects nodes and edges and produces an immutable, validated
 * {@link WorkflowDefinition}. The builder can be reused after `build()`;
 * later changes do not affect definitions already built.
 */
export class WorkflowGraphBuilder {
    private readonly nodes = new Map<string, NodeDefinition>();
    private readonly edges: EdgeDefinition[] = [];
    private entrypoint: string | undefined;

    constructor(private readonly id: string, private readonly name: string = id) { }

    public addNode(id: string, process: NodeProcessor, options: NodeOptions = {}): this {
        if (id.length === 0) {
            throw new GraphValidationError('Node id must not be empty');
        }
        if (id === END) {
            throw new GraphValidationError(`Node id '${END}' is reserved for the terminal sentinel`);
        }
        if (this.nodes.has(id)) {
            throw new GraphValidationError(`Duplicate node id '${id}'`);
        }
        if (options.timeoutMs !== undefined && (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0)) {
            throw new GraphValidationError(`Node '${id}' timeout must be a positive number`);
        }

        this.nodes.set(id, {
            id,
            process,
            ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
            ...(options.description !== undefined ? { description: options.description } : {})
        });
        return this;
    }

    public addEdge(from: string, to: string, condition?: StatePredicate, options: EdgeOptions = {}): this {
        const conditions: RoutingCondition[] = [];
        if (condition) {
            conditions.push({ name: 'condition', predicate: condition, weight: options.weight ?? 1 });
        }
        for (const extra of options.when ?? []) {
            conditions.push({ name: extra.name, predicate: extra.predicate, weight: extra.weight ?? 1 });
        }

        const order = this.edges.filter((edge) => edge.from === from).length;
        this.edges.push({
            from,
            to,
            strategy: options.strategy ?? 'simple',
            priority: options.priority ?? 1,
            conditions,
            metadata: { ...options.metadata },
            allowBacktrack: options.allowBacktrack ?? true,
            order
        });
        return this;
    }

    public setEntrypoint(id: string): this {
        this.entrypoint = id;
        return this;
    }

    public build(): WorkflowDefinition {
        if (this.nodes.size === 0) {
            throw new GraphValidationError(`Workflow '${this.id}' has no nodes`);
        }

        const [firstNode] = this.nodes.keys();
        const entrypoint = this.entrypoint ?? firstNode;
        if (entrypoint === undefined || !this.nodes.has(entrypoint)) {
            throw new UnknownNodeError(entrypoint ?? '', 'entrypoint');
        }

        const adjacency = new Map<string, EdgeDefinition[]>();
        for (const nodeId of this.nodes.keys()) {
            adjacency.set(nodeId, []);
        }
        for (const edge of this.edges) {
            const outgoing = adjacency.get(edge.from);
            if (!outgoing) {
                throw new UnknownNodeError(edge.from, `edge ${edge.from} -> ${edge.to}`);
            }
            if (edge.to !== END && !this.nodes.has(edge.to)) {
                throw new UnknownNodeError(edge.to, `edge ${edge.from} -> ${edge.to}`);
            }
            outgoing.push(edge);
        }

        const topologicalOrder = sortTopologically([...this.nodes.keys()], adjacency);

        const frozenEdges = new Map<string, readonly EdgeDefinition[]>();
        for (const [nodeId, outgoing] of adjacency) {
            frozenEdges.set(nodeId, Object.freeze(outgoing.map((edge) => Object.freeze({
                ...edge,
                conditions: Object.freeze(edge.conditions.map((c) => Object.freeze({ ...c }))),
                metadata: Object.freeze({ ...edge.metadata })
            }))));
        }

        return Object.freeze({
            id: this.id,
            name: this.name,
            entrypoint,
            nodes: new Map(this.nodes),
            edges: frozenEdges,
            topologicalOrder: Object.freeze(topologicalOrder)
        });
    }
}

/**
 * Depth-first topological sort. A back edge means a cycle; the error names
 * its members with the first node repeated at the end.
 */
function sortTopologically(nodeIds: string[], adjacency: ReadonlyMap<string, readonly EdgeDefinition[]>): string[] {
    const VISITING = 1;
    const DONE = 2;
    const marks = new Map<string, number>();
    const stack: string[] = [];
    const postOrder: string[] = [];

    const visit = (nodeId: string): void => {
        marks.set(nodeId, VISITING);
        stack.push(nodeId);

        for (const edge of adjacency.get(nodeId) ?? []) {
            if (edge.to === END) continue;
            const mark = marks.get(edge.to);
            if (mark === VISITING) {
                const start = stack.indexOf(edge.to);
                throw new GraphCycleError([...stack.slice(start), edge.to]);
            }
            if (mark === undefined) {
                visit(edge.to);
            }
        }

        stack.pop();
        marks.set(nodeId, DONE);
        postOrder.push(nodeId);
    };

    for (const nodeId of nodeIds) {
        if (!marks.has(nodeId)) {
            visit(nodeId);
        }
    }

    return postOrder.reverse();
}

export function describeWorkflow(definition: WorkflowDefinition): WorkflowSummary {
    const edges: WorkflowSummary['edges'] = [];
    for (const outgoing of definition.edges.values()) {
        for (const edge of outgoing) {
            edges.push({
                from: edge.from,
                to: edge.to,
                strategy: edge.strategy,
                priority: edge.priority,
                conditions: edge.conditions.map((c) => c.name)
            });
        }
    }

    return {
        id: definition.id,
        name: definition.name,
        entrypoint: definition.entrypoint,
        nodes: [...definition.topologicalOrder],
        edges
    };
}
