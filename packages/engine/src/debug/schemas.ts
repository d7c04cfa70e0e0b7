import { z } from 'zod';
import { TRACE_EVENT_TYPES } from '@weave/core';
import { JsonObjectSchema } from '../state/schemas';

export const SnapshotDataSchema = z.object({
    version: z.number().int().positive(),
    data: JsonObjectSchema,
    path: z.array(z.string())
});

export const TraceEventSchema = z.object({
    eventId: z.string(),
    sequence: z.number().int().positive(),
    type: z.enum(TRACE_EVENT_TYPES),
    executionId: z.string(),
    workflowId: z.string(),
    nodeId: z.string().nullable(),
    branchId: z.string(),
    data: JsonObjectSchema,
    timestamp: z.number()
});

export const ExecutionTraceSchema = z.object({
    traceId: z.string(),
    executionId: z.string(),
    workflowId: z.string(),
    status: z.enum(['running', 'completed', 'failed', 'cancelled']),
    startedAt: z.number(),
    endedAt: z.number().nullable(),
    events: z.array(TraceEventSchema),
    droppedEvents: z.number().int().nonnegative(),
    snapshots: z.array(z.object({
        snapshotId: z.string(),
        nodeId: z.string().nullable(),
        version: z.number().int().positive(),
        data: JsonObjectSchema,
        path: z.array(z.string()),
        sequence: z.number().int().nonnegative(),
        timestamp: z.number()
    })),
    performance: z.record(z.object({
        nodeId: z.string(),
        visits: z.number().int().nonnegative(),
        totalDurationMs: z.number().nonnegative(),
        maxDurationMs: z.number().nonnegative()
    }))
});

const BreakpointInfoSchema = z.object({
    breakpointId: z.string(),
    executionId: z.string(),
    enabled: z.boolean(),
    hitCount: z.number().int().nonnegative(),
    createdAt: z.string()
});

export const BreakpointSchema = z.discriminatedUnion('kind', [
    BreakpointInfoSchema.extend({ kind: z.literal('node'), nodeId: z.string() }),
    BreakpointInfoSchema.extend({ kind: z.literal('condition'), expression: z.string(), nodeId: z.string().optional() }),
    BreakpointInfoSchema.extend({ kind: z.literal('variable_change'), variable: z.string() }),
    BreakpointInfoSchema.extend({ kind: z.literal('duration'), thresholdMs: z.number().nonnegative(), nodeId: z.string().optional() })
]);
