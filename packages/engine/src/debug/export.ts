import type { ExecutionTrace, JsonObject, TraceEvent } from '@weave/core';

export type ExportFormat = 'json' | 'csv' | 'chrome_trace';

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    json: 'json',
    csv: 'csv',
    chrome_trace: 'trace.json'
};

export const CSV_HEADER = 'EventId,Type,NodeId,Timestamp,Sequence';

interface ChromeTraceEvent {
    name: string;
    cat: string;
    ph: 'X' | 'i';
    ts: number;
    dur?: number;
    pid: number;
    tid: string;
    s?: 't';
    args: JsonObject;
}

export function exportTrace(trace: ExecutionTrace, format: ExportFormat): string {
    switch (format) {
        case 'json':
            return JSON.stringify(trace.events, null, 2);
        case 'csv':
            return toCsv(trace.events);
        case 'chrome_trace':
            return JSON.stringify({ traceEvents: toChromeTrace(trace.events) });
    }
}

function toCsv(events: readonly TraceEvent[]): string {
    const rows = events.map((event) => [
        event.eventId,
        event.type,
        event.nodeId ?? '',
        String(event.timestamp),
        String(event.sequence)
    ].map(csvCell).join(','));
    return [CSV_HEADER, ...rows].join('\n') + '\n';
}

function csvCell(value: string): string {
    return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Node visits become complete (`X`) events spanning enter to exit or error;
 * everything else is an instant (`i`). Timestamps are in microseconds.
 */
function toChromeTrace(events: readonly TraceEvent[]): ChromeTraceEvent[] {
    const open = new Map<string, TraceEvent>();
    const out: ChromeTraceEvent[] = [];

    for (const event of events) {
        const key = `${event.branchId}\u0000${event.nodeId ?? ''}`;
        if (event.type === 'node_enter') {
            open.set(key, event);
            continue;
        }

        const enter = open.get(key);
        if ((event.type === 'node_exit' || event.type === 'node_error') && enter && event.nodeId !== null) {
            open.delete(key);
            out.push({
                name: event.nodeId,
                cat: 'node',
                ph: 'X',
                ts: enter.timestamp * 1000,
                dur: Math.max(0, event.timestamp - enter.timestamp) * 1000,
                pid: 1,
                tid: event.branchId,
                args: { sequence: enter.sequence, outcome: event.type === 'node_exit' ? 'ok' : 'error' }
            });
            continue;
        }

        out.push({
            name: event.nodeId === null ? event.type : `${event.type}:${event.nodeId}`,
            cat: 'execution',
            ph: 'i',
            ts: event.timestamp * 1000,
            pid: 1,
            tid: event.branchId,
            s: 't',
            args: { sequence: event.sequence }
        });
    }

    return out;
}
