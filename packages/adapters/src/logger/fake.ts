import type { Logger, LogLevel } from '@weave/core';

export interface LogEntry {
    level: LogLevel;
    bindings: Record<string, unknown>;
    obj?: Record<string, unknown>;
    msg?: string;
}

type LogFn = Logger['info'];

/**
 * Captures log calls for assertions. Children share the parent's entry list
 * and add their bindings to every entry they write.
 */
export class FakeLogger implements Logger {
    public readonly logs: LogEntry[];

    public readonly trace: LogFn = this.recorder('trace');
    public readonly debug: LogFn = this.recorder('debug');
    public readonly info: LogFn = this.recorder('info');
    public readonly warn: LogFn = this.recorder('warn');
    public readonly error: LogFn = this.recorder('error');
    public readonly fatal: LogFn = this.recorder('fatal');

    constructor(private readonly bindings: Record<string, unknown> = {}, logs: LogEntry[] = []) {
        this.logs = logs;
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new FakeLogger({ ...this.bindings, ...bindings }, this.logs);
    }

    /** Messages in call order, optionally for one level. */
    public messages(level?: LogLevel): string[] {
        return this.logs.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.msg ?? '');
    }

    private recorder(level: LogLevel): LogFn {
        return (objOrMsg: Record<string, unknown> | string, msg?: string): void => {
            const entry: LogEntry =
                typeof objOrMsg === 'string'
                    ? { level, bindings: this.bindings, msg: objOrMsg }
                    : { level, bindings: this.bindings, obj: objOrMsg, ...(msg !== undefined ? { msg } : {}) };
            this.logs.push(entry);
        };
    }
}
