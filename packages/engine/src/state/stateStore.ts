import { randomUUID } from 'node:crypto';
import {
    PersistenceError,
    ReplayError,
    WorkflowState,
    type BlobStoragePort,
    type Checkpoint,
    type CheckpointType,
    type DocumentStore,
    type Logger,
    type StateTransition,
    type StorageLocation
} from '@weave/core';
import type { StateCache } from './stateCache';
import {
    StateRecordSchema,
    StoredStateSchema,
    decodeCheckpoint,
    encodeCheckpoint,
    encodeStateRecord,
    encodeStoredState,
    type StoredState
} from './schemas';

export const STATE_COLLECTION = 'workflow_states';
export const CHECKPOINT_COLLECTION = 'workflow_checkpoints';

export interface StateStoreOptions {
    documents: DocumentStore;
    blobs: BlobStoragePort;
    logger: Logger;
    cache: StateCache;
    inlineThresholdBytes: number;
    now?: () => number;
}

export interface RestoredCheckpoint {
    checkpoint: Checkpoint;
    state: WorkflowState;
}

export interface CleanupResult {
    states: number;
    checkpoints: number;
}

export function stateBlobPath(workflowId: string, executionId: string, version: number): string {
    return `states/${workflowId}/${executionId}_v${version}.json`;
}

/**
 * Persists state versions and the checkpoints that point at them.
 *
 * Small records live inline in the state document; larger ones are written to
 * blob storage first and the document keeps only the pointer. The document
 * write is the commit point for a version.
 */
export class StateStore {
    private readonly documents: DocumentStore;
    private readonly blobs: BlobStoragePort;
    private readonly logger: Logger;
    private readonly cache: StateCache;
    private readonly inlineThresholdBytes: number;
    private readonly now: () => number;

    constructor(options: StateStoreOptions) {
        this.documents = options.documents;
        this.blobs = options.blobs;
        this.logger = options.logger.child({ component: 'StateStore' });
        this.cache = options.cache;
        this.inlineThresholdBytes = options.inlineThresholdBytes;
        this.now = options.now ?? Date.now;
    }

    /** Writes the state if it changed since it was last saved or loaded. */
    public async saveState(state: WorkflowState): Promise<void> {
        if (!state.isDirty()) return;
        await this.write(state);
    }

    public async loadState(executionId: string, version: number): Promise<WorkflowState | null> {
        const stateId = `${executionId}_v${version}`;
        const cached = this.cache.get(stateId);
        if (cached) return cached;

        return this.guard('loadState', async () => {
            const raw = await this.documents.get(STATE_COLLECTION, stateId);
            if (raw === null) return null;

            const stored = StoredStateSchema.parse(raw);
            const record = stored.tier === 'inline'
                ? stored.record
                : StateRecordSchema.parse(JSON.parse((await this.blobs.get(stored.pointer)).toString('utf8')));

            const state = WorkflowState.fromRecord(record);
            this.cache.put(state);
            return state;
        });
    }

    /**
     * Saves the state (when needed) and then records a checkpoint for it, so
     * a checkpoint never points at a version that is not durable.
     */
    public async createCheckpoint(state: WorkflowState, nodeId: string, type: CheckpointType): Promise<Checkpoint> {
        const storage = state.isDirty() ? await this.write(state) : await this.locate(state);

        const checkpoint: Checkpoint = {
            checkpointId: randomUUID(),
            executionId: state.executionId,
            workflowId: state.workflowId,
            nodeId,
            stateVersion: state.version,
            storage,
            type,
            createdAt: new Date(this.now())
        };

        await this.guard('createCheckpoint', () =>
            this.documents.set(CHECKPOINT_COLLECTION, checkpoint.checkpointId, encodeCheckpoint(checkpoint))
        );

        this.logger.debug({
            executionId: state.executionId,
            nodeId,
            checkpointId: checkpoint.checkpointId,
            version: state.version,
            type
        }, 'Checkpoint created');
        return checkpoint;
    }

    public async getCheckpoint(checkpointId: string): Promise<Checkpoint | null> {
        return this.guard('getCheckpoint', async () => {
            const raw = await this.documents.get(CHECKPOINT_COLLECTION, checkpointId);
            return raw === null ? null : decodeCheckpoint(raw);
        });
    }

    public async restoreFromCheckpoint(checkpointId: string): Promise<RestoredCheckpoint> {
        const checkpoint = await this.getCheckpoint(checkpointId);
        if (!checkpoint) {
            throw new ReplayError(`Checkpoint '${checkpointId}' not found`);
        }

        const state = await this.loadState(checkpoint.executionId, checkpoint.stateVersion);
        if (!state) {
            throw new ReplayError(
                `State version ${checkpoint.stateVersion} of execution ${checkpoint.executionId} is missing for checkpoint '${checkpointId}'`
            );
        }

        return { checkpoint, state };
    }

    /** Highest persisted version of the execution, 0 when none. */
    public async getLatestVersion(executionId: string): Promise<number> {
        return this.guard('getLatestVersion', async () => {
            const docs = await this.documents.query(STATE_COLLECTION, (data) => data.executionId === executionId);
            return docs.reduce((max, doc) => Math.max(max, StoredStateSchema.parse(doc.data).version), 0);
        });
    }

    /** Newest first. */
    public async listCheckpoints(executionId: string): Promise<Checkpoint[]> {
        return this.guard('listCheckpoints', async () => {
            const docs = await this.documents.query(CHECKPOINT_COLLECTION, (data) => data.executionId === executionId);
            return docs
                .map((doc) => decodeCheckpoint(doc.data))
                .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.stateVersion - a.stateVersion);
        });
    }

    /** Every transition recorded by any version of the execution, oldest first. */
    public async getStateHistory(executionId: string): Promise<StateTransition[]> {
        const versions = await this.guard('getStateHistory', async () => {
            const docs = await this.documents.query(STATE_COLLECTION, (data) => data.executionId === executionId);
            return docs.map((doc) => StoredStateSchema.parse(doc.data).version).sort((a, b) => a - b);
        });

        const seen = new Set<string>();
        const history: StateTransition[] = [];
        for (const version of versions) {
            const state = await this.loadState(executionId, version);
            for (const transition of state?.transitions ?? []) {
                // Derived versions carry their parent's transitions forward.
                const key = `${transition.from}|${transition.to}|${transition.timestamp}|${transition.reason}`;
                if (seen.has(key)) continue;
                seen.add(key);
                history.push(transition);
            }
        }

        return history.sort((a, b) => a.timestamp - b.timestamp);
    }

    /** Deletes state versions (with their blobs) and checkpoints older than the retention window. */
    public async cleanOldStates(retentionMs: number): Promise<CleanupResult> {
        const cutoff = this.now() - retentionMs;

        return this.guard('cleanOldStates', async () => {
            const states = await this.documents.query(STATE_COLLECTION, (data) =>
                typeof data.savedAt === 'number' && data.savedAt < cutoff
            );
            for (const doc of states) {
                const stored = StoredStateSchema.parse(doc.data);
                if (stored.tier === 'blob') {
                    await this.blobs.delete(stored.pointer);
                }
                await this.documents.delete(STATE_COLLECTION, doc.id);
                this.cache.delete(doc.id);
            }

            const checkpoints = await this.documents.query(CHECKPOINT_COLLECTION, (data) =>
                typeof data.createdAt === 'number' && data.createdAt < cutoff
            );
            for (const doc of checkpoints) {
                await this.documents.delete(CHECKPOINT_COLLECTION, doc.id);
            }

            this.logger.info({ states: states.length, checkpoints: checkpoints.length, cutoff }, 'Old states cleaned');
            return { states: states.length, checkpoints: checkpoints.length };
        });
    }

    private async write(state: WorkflowState): Promise<StorageLocation> {
        const record = state.toRecord();
        const serialized = JSON.stringify(encodeStateRecord(record));
        const sizeBytes = Buffer.byteLength(serialized, 'utf8');
        const base = {
            stateId: state.stateId,
            executionId: record.executionId,
            workflowId: record.workflowId,
            version: record.version,
            savedAt: this.now(),
            sizeBytes
        };

        const location = await this.guard('saveState', async (): Promise<StorageLocation> => {
            let stored: StoredState;
            if (sizeBytes < this.inlineThresholdBytes) {
                stored = { ...base, tier: 'inline', record };
            } else {
                const pointer = stateBlobPath(record.workflowId, record.executionId, record.version);
                await this.blobs.put(pointer, serialized);
                stored = { ...base, tier: 'blob', pointer };
            }
            await this.documents.set(STATE_COLLECTION, state.stateId, encodeStoredState(stored));
            return stored.tier === 'blob' ? { tier: 'blob', pointer: stored.pointer } : { tier: 'inline' };
        });

        state.markClean();
        this.cache.put(state);
        this.logger.trace({ executionId: record.executionId, version: record.version, tier: location.tier, sizeBytes }, 'State saved');
        return location;
    }

    private async locate(state: WorkflowState): Promise<StorageLocation> {
        const location = await this.guard('locateState', async (): Promise<StorageLocation | null> => {
            const raw = await this.documents.get(STATE_COLLECTION, state.stateId);
            if (raw === null) return null;
            const stored = StoredStateSchema.parse(raw);
            return stored.tier === 'blob' ? { tier: 'blob', pointer: stored.pointer } : { tier: 'inline' };
        });
        return location ?? this.write(state);
    }

    private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
        try {
            return await run();
        } catch (error) {
            if (error instanceof PersistenceError) throw error;
            this.logger.error({ operation, err: error }, 'Persistence operation failed');
            throw new PersistenceError(operation, error);
        }
    }
}
