import type { RuntimeResource } from '../lifecycle';
import type { JsonObject } from '../entities/json';

export interface StoredDocument {
    id: string;
    data: JsonObject;
}

/**
 * Keyed document store holding state, checkpoint and breakpoint metadata.
 * Readers validate what comes back; the store itself is schemaless.
 */
export interface DocumentStore extends RuntimeResource {
    set(collection: string, id: string, data: JsonObject): Promise<void>;
    get(collection: string, id: string): Promise<JsonObject | null>;
    delete(collection: string, id: string): Promise<boolean>;
    query(collection: string, predicate: (data: JsonObject) => boolean): Promise<StoredDocument[]>;
}
