import { cloneJson, type JsonObject, type JsonValue } from './json';

export interface StateTransition {
    from: string;
    to: string;
    reason: string;
    timestamp: number;
}

/**
 * Serialized form of a single state version, as written to the document store.
 */
export interface StateRecord {
    executionId: string;
    workflowId: string;
    version: number;
    data: JsonObject;
    path: string[];
    metadata: Record<string, string>;
    transitions: StateTransition[];
    timestamp: string;
}

export interface CreateStateInput {
    executionId: string;
    workflowId: string;
    data?: JsonObject;
    metadata?: Record<string, string>;
}

/**
 * The versioned working memory of one execution.
 *
 * Instances are mutable while a node works on them, but every hand-off between
 * engine steps goes through {@link WorkflowState.derive}, which deep-copies all
 * structure so a forked or restored version never aliases its parent.
 */
export class WorkflowState {
    public readonly executionId: string;
    public readonly workflowId: string;
    public readonly version: number;
    public readonly timestamp: Date;

    private readonly values: JsonObject;
    private readonly visited: string[];
    private readonly meta: Record<string, string>;
    private readonly transitionLog: StateTransition[];
    private dirty: boolean;

    private constructor(record: StateRecord, dirty: boolean) {
        this.executionId = record.executionId;
        this.workflowId = record.workflowId;
        this.version = record.version;
        this.timestamp = new Date(record.timestamp);
        this.values = cloneJson(record.data);
        this.visited = [...record.path];
        this.meta = { ...record.metadata };
        this.transitionLog = record.transitions.map((t) => ({ ...t }));
        this.dirty = dirty;
    }

    public static create(input: CreateStateInput): WorkflowState {
        return new WorkflowState({
            executionId: input.executionId,
            workflowId: input.workflowId,
            version: 1,
            data: input.data ?? {},
            path: [],
            metadata: input.metadata ?? {},
            transitions: [],
            timestamp: new Date().toISOString()
        }, true);
    }

    /** Rebuilds a state loaded from storage. The result is clean until mutated. */
    public static fromRecord(record: StateRecord): WorkflowState {
        return new WorkflowState(record, false);
    }

    public get stateId(): string {
        return `${this.executionId}_v${this.version}`;
    }

    public get(key: string): JsonValue | undefined {
        const value = this.values[key];
        return value === undefined ? undefined : cloneJson(value);
    }

    public has(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.values, key);
    }

    public keys(): string[] {
        return Object.keys(this.values);
    }

    public set(key: string, value: JsonValue): this {
        this.values[key] = cloneJson(value);
        this.dirty = true;
        return this;
    }

    public merge(values: JsonObject): this {
        for (const [key, value] of Object.entries(values)) {
            this.values[key] = cloneJson(value);
        }
        this.dirty = true;
        return this;
    }

    public delete(key: string): boolean {
        if (!this.has(key)) return false;
        delete this.values[key];
        this.dirty = true;
        return true;
    }

    /** Deep copy of the data map. */
    public get data(): JsonObject {
        return cloneJson(this.values);
    }

    public getMeta(key: string): string | undefined {
        return this.meta[key];
    }

    public setMeta(key: string, value: string): this {
        this.meta[key] = value;
        this.dirty = true;
        return this;
    }

    public deleteMeta(key: string): this {
        if (key in this.meta) {
            delete this.meta[key];
            this.dirty = true;
        }
        return this;
    }

    public get metadata(): Record<string, string> {
        return { ...this.meta };
    }

    public get path(): readonly string[] {
        return [...this.visited];
    }

    public get currentNode(): string | undefined {
        return this.visited[this.visited.length - 1];
    }

    public recordVisit(nodeId: string): this {
        this.visited.push(nodeId);
        this.dirty = true;
        return this;
    }

    public recordTransition(from: string, to: string, reason: string): this {
        this.transitionLog.push({ from, to, reason, timestamp: Date.now() });
        this.dirty = true;
        return this;
    }

    public get transitions(): readonly StateTransition[] {
        return this.transitionLog.map((t) => ({ ...t }));
    }

    /**
     * Produces the next version. The engine passes an execution-scoped version
     * so sibling branches forked from the same parent never collide.
     */
    public derive(version: number = this.version + 1): WorkflowState {
        if (!Number.isInteger(version) || version <= this.version) {
            throw new RangeError(`Derived version ${version} must be greater than ${this.version}`);
        }
        return new WorkflowState({
            ...this.toRecord(),
            version,
            timestamp: new Date().toISOString()
        }, true);
    }

    public isDirty(): boolean {
        return this.dirty;
    }

    public markClean(): void {
        this.dirty = false;
    }

    public toRecord(): StateRecord {
        return {
            executionId: this.executionId,
            workflowId: this.workflowId,
            version: this.version,
            data: cloneJson(this.values),
            path: [...this.visited],
            metadata: { ...this.meta },
            transitions: this.transitionLog.map((t) => ({ ...t })),
            timestamp: this.timestamp.toISOString()
        };
    }
}
