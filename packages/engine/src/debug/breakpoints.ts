import { isDeepStrictEqual } from 'node:util';
import { InvalidBreakpointError, type Breakpoint, type JsonObject, type JsonValue } from '@weave/core';

export type ConditionOperator = '==' | '!=' | '>' | '>=' | '<' | '<=' | 'exists';

export interface ParsedCondition {
    path: string[];
    operator: ConditionOperator;
    value: JsonValue | undefined;
}

const COMPARISON = /^\s*([A-Za-z_$][\w$]*(?:\.[\w$]+)*)\s*(==|!=|>=|<=|>|<)\s*(.+?)\s*$/;
const EXISTS = /^\s*([A-Za-z_$][\w$]*(?:\.[\w$]+)*)\s+exists\s*$/;

/**
 * Parses `path op value`, e.g. `retry >= 2`, `user.tier == "gold"` or
 * `draft exists`. Values are read as JSON and fall back to a bare string.
 */
export function parseCondition(expression: string): ParsedCondition {
    const exists = EXISTS.exec(expression);
    if (exists?.[1]) {
        return { path: exists[1].split('.'), operator: 'exists', value: undefined };
    }

    const match = COMPARISON.exec(expression);
    const [, path, operator, rawValue] = match ?? [];
    if (!path || !rawValue || !isOperator(operator)) {
        throw new InvalidBreakpointError(expression);
    }
    return { path: path.split('.'), operator, value: parseValue(rawValue) };
}

function isOperator(value: string | undefined): value is ConditionOperator {
    return value === '==' || value === '!=' || value === '>' || value === '>=' || value === '<' || value === '<=';
}

function parseValue(raw: string): JsonValue {
    try {
        const parsed: JsonValue = JSON.parse(raw);
        return parsed;
    } catch {
        return raw.replace(/^'(.*)'$/, '$1');
    }
}

/** Follows own keys only; `constructor` or `__proto__` never resolve. */
export function resolvePath(data: JsonObject, path: readonly string[]): JsonValue | undefined {
    let current: JsonValue | undefined = data;
    for (const segment of path) {
        if (Array.isArray(current)) {
            current = /^\d+$/.test(segment) ? current[Number(segment)] : undefined;
        } else if (current !== null && typeof current === 'object' && Object.hasOwn(current, segment)) {
            current = current[segment];
        } else {
            return undefined;
        }
    }
    return current;
}

export function evaluateCondition(condition: ParsedCondition, data: JsonObject): boolean {
    const actual = resolvePath(data, condition.path);
    const expected = condition.value;

    switch (condition.operator) {
        case 'exists':
            return actual !== undefined;
        case '==':
            return looselyEqual(actual, expected);
        case '!=':
            return !looselyEqual(actual, expected);
        default:
            return compare(actual, expected, condition.operator);
    }
}

function looselyEqual(actual: JsonValue | undefined, expected: JsonValue | undefined): boolean {
    if (isDeepStrictEqual(actual, expected)) return true;
    const primitive = (v: JsonValue | undefined) => typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean';
    return primitive(actual) && primitive(expected) && String(actual) === String(expected);
}

function compare(actual: JsonValue | undefined, expected: JsonValue | undefined, operator: '>' | '>=' | '<' | '<='): boolean {
    let order: number;
    if (typeof actual === 'number' && typeof expected === 'number') {
        order = actual - expected;
    } else if (typeof actual === 'string' && typeof expected === 'string') {
        order = actual < expected ? -1 : actual > expected ? 1 : 0;
    } else {
        return false;
    }

    switch (operator) {
        case '>': return order > 0;
        case '>=': return order >= 0;
        case '<': return order < 0;
        case '<=': return order <= 0;
    }
}

export interface BreakpointContext {
    nodeId: string;
    data: JsonObject;
    /** Data the branch last paused or passed through, if any. */
    previousData: JsonObject | null;
    previousNodeId: string | null;
    previousDurationMs: number | null;
}

/** True when the breakpoint applies to the node about to run. */
export function matchesBreakpoint(breakpoint: Breakpoint, visit: BreakpointContext): boolean {
    if (!breakpoint.enabled) return false;

    switch (breakpoint.kind) {
        case 'node':
            return breakpoint.nodeId === visit.nodeId;
        case 'condition':
            if (breakpoint.nodeId !== undefined && breakpoint.nodeId !== visit.nodeId) return false;
            return evaluateCondition(parseCondition(breakpoint.expression), visit.data);
        case 'variable_change': {
            if (visit.previousData === null) return false;
            const path = breakpoint.variable.split('.');
            return !isDeepStrictEqual(resolvePath(visit.previousData, path), resolvePath(visit.data, path));
        }
        case 'duration':
            if (visit.previousDurationMs === null) return false;
            if (breakpoint.nodeId !== undefined && breakpoint.nodeId !== visit.previousNodeId) return false;
            return visit.previousDurationMs > breakpoint.thresholdMs;
    }
}
