import { z } from 'zod';
import type { Checkpoint, JsonObject, JsonValue, StateRecord } from '@weave/core';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() => z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
]));

export const JsonObjectSchema = z.record(JsonValueSchema);

export const StateRecordSchema = z.object({
    executionId: z.string().min(1),
    workflowId: z.string().min(1),
    version: z.number().int().positive(),
    data: JsonObjectSchema,
    path: z.array(z.string()),
    metadata: z.record(z.string()),
    transitions: z.array(z.object({
        from: z.string(),
        to: z.string(),
        reason: z.string(),
        timestamp: z.number()
    })),
    timestamp: z.string()
});

const StoredStateBase = z.object({
    stateId: z.string(),
    executionId: z.string(),
    workflowId: z.string(),
    version: z.number().int().positive(),
    savedAt: z.number(),
    sizeBytes: z.number().int().nonnegative()
});

export const StoredStateSchema = z.discriminatedUnion('tier', [
    StoredStateBase.extend({ tier: z.literal('inline'), record: StateRecordSchema }),
    StoredStateBase.extend({ tier: z.literal('blob'), pointer: z.string().min(1) })
]);

export type StoredState = z.infer<typeof StoredStateSchema>;

export const CheckpointDocumentSchema = z.object({
    checkpointId: z.string(),
    executionId: z.string(),
    workflowId: z.string(),
    nodeId: z.string(),
    stateVersion: z.number().int().positive(),
    type: z.enum(['auto', 'manual', 'error', 'branch']),
    createdAt: z.number(),
    tier: z.enum(['inline', 'blob']),
    pointer: z.string().nullable()
});

export function encodeStateRecord(record: StateRecord): JsonObject {
    return {
        executionId: record.executionId,
        workflowId: record.workflowId,
        version: record.version,
        data: record.data,
        path: record.path,
        metadata: record.metadata,
        transitions: record.transitions.map((t) => ({
            from: t.from,
            to: t.to,
            reason: t.reason,
            timestamp: t.timestamp
        })),
        timestamp: record.timestamp
    };
}

export function encodeStoredState(stored: StoredState): JsonObject {
    const base = {
        stateId: stored.stateId,
        executionId: stored.executionId,
        workflowId: stored.workflowId,
        version: stored.version,
        savedAt: stored.savedAt,
        sizeBytes: stored.sizeBytes
    };
    return stored.tier === 'inline'
        ? { ...base, tier: 'inline', record: encodeStateRecord(stored.record) }
        : { ...base, tier: 'blob', pointer: stored.pointer };
}

export function encodeCheckpoint(checkpoint: Checkpoint): JsonObject {
    return {
        checkpointId: checkpoint.checkpointId,
        executionId: checkpoint.executionId,
        workflowId: checkpoint.workflowId,
        nodeId: checkpoint.nodeId,
        stateVersion: checkpoint.stateVersion,
        type: checkpoint.type,
        createdAt: checkpoint.createdAt.getTime(),
        tier: checkpoint.storage.tier,
        pointer: checkpoint.storage.tier === 'blob' ? checkpoint.storage.pointer : null
    };
}

export function decodeCheckpoint(raw: unknown): Checkpoint {
    const doc = CheckpointDocumentSchema.parse(raw);
    return {
        checkpointId: doc.checkpointId,
        executionId: doc.executionId,
        workflowId: doc.workflowId,
        nodeId: doc.nodeId,
        stateVersion: doc.stateVersion,
        type: doc.type,
        createdAt: new Date(doc.createdAt),
        storage: doc.tier === 'blob' && doc.pointer !== null
            ? { tier: 'blob', pointer: doc.pointer }
            : { tier: 'inline' }
    };
}
