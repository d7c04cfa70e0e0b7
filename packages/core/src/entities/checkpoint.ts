/**
 * Why a checkpoint was taken:
 * - `auto`: at a node boundary
 * - `manual`: requested by the host
 * - `error`: the state a node failed on
 * - `branch`: at a parallel fork, once the forking node has committed
 */
export type CheckpointType = 'auto' | 'manual' | 'error' | 'branch';

export type StorageLocation =
    | { tier: 'inline' }
    | { tier: 'blob'; pointer: string };

/**
 * Durable pointer to one persisted state version. Resuming from a checkpoint
 * re-enters `nodeId` with that version.
 */
export interface Checkpoint {
    checkpointId: string;
    executionId: string;
    workflowId: string;
    nodeId: string;
    stateVersion: number;
    storage: StorageLocation;
    type: CheckpointType;
    createdAt: Date;
}
