/**
 * Anything the engine starts before use and closes on shutdown.
 * Both hooks are optional so in-memory adapters can skip them.
 */
export interface RuntimeResource {
    start?(): Promise<void>;
    close?(): Promise<void>;
}
