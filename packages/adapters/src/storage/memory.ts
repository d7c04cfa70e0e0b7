import type { BlobStoragePort } from '@weave/core';

/** Blob tier kept in process memory. Buffers are copied on the way in and out. */
export class MemoryBlobStorage implements BlobStoragePort {
    private readonly blobs = new Map<string, Buffer>();

    async start(): Promise<void> {}

    async close(): Promise<void> {}

    async put(path: string, data: Buffer | string): Promise<string> {
        this.blobs.set(path, Buffer.from(data));
        return path;
    }

    async get(path: string): Promise<Buffer> {
        const blob = this.blobs.get(path);
        if (blob === undefined) {
            throw new Error(`Blob not found: ${path}`);
        }
        return Buffer.from(blob);
    }

    async delete(path: string): Promise<void> {
        this.blobs.delete(path);
    }

    async exists(path: string): Promise<boolean> {
        return this.blobs.has(path);
    }

    /** Stored paths in lexical order. */
    paths(): string[] {
        return Array.from(this.blobs.keys()).sort();
    }
}
