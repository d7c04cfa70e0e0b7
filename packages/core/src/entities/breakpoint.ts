/**
 * Where or when a debug session pauses an execution.
 *
 * Condition breakpoints use a small expression (`path op value`) instead of a
 * function so they can be persisted alongside the rest of the debug metadata.
 */
export type BreakpointTarget =
    | { kind: 'node'; nodeId: string }
    | { kind: 'condition'; expression: string; nodeId?: string }
    | { kind: 'variable_change'; variable: string }
    | { kind: 'duration'; thresholdMs: number; nodeId?: string };

export type BreakpointKind = BreakpointTarget['kind'];

export interface BreakpointInfo {
    breakpointId: string;
    executionId: string;
    enabled: boolean;
    hitCount: number;
    createdAt: string;
}

export type Breakpoint = BreakpointTarget & BreakpointInfo;
