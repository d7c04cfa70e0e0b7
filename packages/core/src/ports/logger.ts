/**
 * Structured logger used throughout the engine.
 *
 * Every method takes either a context object followed by a message, or a bare
 * message, which is Pino's call signature. Components bind their own fields
 * (`component`, `executionId`, `nodeId`) through {@link Logger.child}.
 */
export interface Logger {
    trace(obj: Record<string, unknown>, msg?: string): void;
    trace(msg: string): void;
    debug(obj: Record<string, unknown>, msg?: string): void;
    debug(msg: string): void;
    info(obj: Record<string, unknown>, msg?: string): void;
    info(msg: string): void;
    warn(obj: Record<string, unknown>, msg?: string): void;
    warn(msg: string): void;
    error(obj: Record<string, unknown>, msg?: string): void;
    error(msg: string): void;
    fatal(obj: Record<string, unknown>, msg?: string): void;
    fatal(msg: string): void;

    child(bindings: Record<string, unknown>): Logger;
}
