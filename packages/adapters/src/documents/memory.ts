import type { DocumentStore, JsonObject, StoredDocument } from '@weave/core';

/**
 * Collection-keyed in-process document store. Documents are deep-copied on
 * the way in and out, as a networked store would.
 */
export class MemoryDocumentStore implements DocumentStore {
    private collections = new Map<string, Map<string, JsonObject>>();

    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    public async set(collection: string, id: string, data: JsonObject): Promise<void> {
        this.collection(collection).set(id, structuredClone(data));
    }

    public async get(collection: string, id: string): Promise<JsonObject | null> {
        const data = this.collections.get(collection)?.get(id);
        return data ? structuredClone(data) : null;
    }

    public async delete(collection: string, id: string): Promise<boolean> {
        return this.collections.get(collection)?.delete(id) ?? false;
    }

    public async query(collection: string, predicate: (data: JsonObject) => boolean): Promise<StoredDocument[]> {
        const results: StoredDocument[] = [];
        for (const [id, data] of this.collections.get(collection) ?? []) {
            if (predicate(data)) {
                results.push({ id, data: structuredClone(data) });
            }
        }
        return results;
    }

    public count(collection: string): number {
        return this.collections.get(collection)?.size ?? 0;
    }

    private collection(name: string): Map<string, JsonObject> {
        let collection = this.collections.get(name);
        if (!collection) {
            collection = new Map();
            this.collections.set(name, collection);
        }
        return collection;
    }
}
