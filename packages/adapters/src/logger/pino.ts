import type { EngineConfig, Logger, LogLevel } from '@weave/core';
import pino, { type Logger as PinoInstance } from 'pino';

export interface PinoLoggerOptions {
    level?: LogLevel;
    prettyPrint?: boolean;
    name?: string;
    /** Explicit sink. Takes precedence over `prettyPrint`. */
    destination?: pino.DestinationStream;
}

// Advisor credentials can ride along in config objects that get logged.
const REDACTED_PATHS = ['apiKey', '*.apiKey', 'authorization', '*.authorization'];

export function createPinoInstance(options: PinoLoggerOptions = {}): PinoInstance {
    const { level = 'info', prettyPrint = false, name, destination } = options;

    const pinoOptions: pino.LoggerOptions = {
        level,
        serializers: { err: pino.stdSerializers.err },
        redact: { paths: REDACTED_PATHS, censor: '[redacted]' }
    };

    if (name) {
        pinoOptions.name = name;
    }

    if (destination) {
        return pino(pinoOptions, destination);
    }

    if (prettyPrint) {
        pinoOptions.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        };
    }

    return pino(pinoOptions);
}

/** Engine logger driven by the resolved `logging` section of the engine config. */
export function createEngineLogger(logging: EngineConfig['logging'], name = 'weave'): PinoLogger {
    return new PinoLogger({ level: logging.level, prettyPrint: logging.prettyPrint, name });
}

type LogMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    /** Pass an existing pino instance to wrap it instead of creating one. */
    constructor(options: PinoLoggerOptions | PinoInstance = {}) {
        this.pino = isPinoInstance(options) ? options : createPinoInstance(options);
    }

    public get level(): string {
        return this.pino.level;
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('trace', arg1, arg2);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('debug', arg1, arg2);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('info', arg1, arg2);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('warn', arg1, arg2);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('error', arg1, arg2);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('fatal', arg1, arg2);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger(this.pino.child(bindings));
    }

    private write(method: LogMethod, arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino[method](arg1);
        } else {
            this.pino[method](arg1, arg2);
        }
    }
}

function isPinoInstance(value: PinoLoggerOptions | PinoInstance): value is PinoInstance {
    return 'child' in value && typeof value.child === 'function';
}
