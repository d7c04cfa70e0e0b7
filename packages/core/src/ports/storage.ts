import type { RuntimeResource } from '../lifecycle';

/** Blob storage for state payloads too large to inline, traces and exports. */
export interface BlobStoragePort extends RuntimeResource {
    put(path: string, data: Buffer | string): Promise<string>;
    get(path: string): Promise<Buffer>;
    delete(path: string): Promise<void>;
    exists(path: string): Promise<boolean>;
}
