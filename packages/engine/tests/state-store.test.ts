import { describe, expect, it, vi } from 'vitest';
import { PersistenceError, ReplayError, WorkflowState, type JsonObject } from '@weave/core';
import { FakeLogger, MemoryBlobStorage, MemoryDocumentStore } from '@weave/testing';
import { CHECKPOINT_COLLECTION, STATE_COLLECTION, StateCache, StateStore, stateBlobPath } from '../src/index';

class FailingDocumentStore extends MemoryDocumentStore {
    public override async set(): Promise<void> {
        throw new Error('document store offline');
    }
}

function createStore(options: { documents?: MemoryDocumentStore; blobs?: MemoryBlobStorage; now?: () => number; threshold?: number } = {}) {
    const documents = options.documents ?? new MemoryDocumentStore();
    const blobs = options.blobs ?? new MemoryBlobStorage();
    const logger = new FakeLogger();
    const store = new StateStore({
        documents,
        blobs,
        logger,
        cache: new StateCache({ ttlMs: 60_000, maxEntries: 100 }),
        inlineThresholdBytes: options.threshold ?? 1024,
        ...(options.now ? { now: options.now } : {})
    });
    return { store, documents, blobs, logger };
}

function newState(data: JsonObject = { x: 1 }) {
    return WorkflowState.create({ executionId: 'exec-1', workflowId: 'wf-1', data });
}

describe('StateStore', () => {
    it('saves inline and loads through a fresh cache', async () => {
        const { store, documents, blobs } = createStore();
        const state = newState();
        state.recordVisit('A');
        await store.saveState(state);

        const doc = await documents.get(STATE_COLLECTION, 'exec-1_v1');
        expect(doc?.tier).toBe('inline');
        expect(blobs.paths()).toEqual([]);

        const reader = createStore({ documents, blobs }).store;
        const loaded = await reader.loadState('exec-1', 1);
        expect(loaded?.data).toEqual({ x: 1 });
        expect(loaded?.path).toEqual(['A']);
        expect(loaded?.isDirty()).toBe(false);
        expect(await reader.loadState('exec-1', 2)).toBeNull();
    });

    it('moves large records to blob storage and keeps a pointer', async () => {
        const { store, documents, blobs } = createStore({ threshold: 256 });
        await store.saveState(newState({ text: 'a'.repeat(500) }));

        const doc = await documents.get(STATE_COLLECTION, 'exec-1_v1');
        expect(doc?.tier).toBe('blob');
        expect(doc?.pointer).toBe(stateBlobPath('wf-1', 'exec-1', 1));
        expect(blobs.paths()).toEqual(['states/wf-1/exec-1_v1.json']);

        const loaded = await createStore({ documents, blobs }).store.loadState('exec-1', 1);
        expect(loaded?.get('text')).toBe('a'.repeat(500));
    });

    it('skips writes for clean states', async () => {
        const { store, documents } = createStore();
        const state = newState();
        await store.saveState(state);
        expect(state.isDirty()).toBe(false);

        const set = vi.spyOn(documents, 'set');
        await store.saveState(state);
        expect(set).not.toHaveBeenCalled();
    });

    it('round-trips a checkpoint to the same version', async () => {
        const { store } = createStore();
        const state = newState({ step: 'b' });
        state.recordVisit('B');

        const checkpoint = await store.createCheckpoint(state, 'B', 'auto');
        expect(checkpoint).toMatchObject({ nodeId: 'B', type: 'auto', stateVersion: 1, storage: { tier: 'inline' } });

        const restored = await store.restoreFromCheckpoint(checkpoint.checkpointId);
        expect(restored.checkpoint).toEqual(checkpoint);
        expect(restored.state.version).toBe(1);
        expect(restored.state.data).toEqual({ step: 'b' });
        expect(restored.state.path).toEqual(['B']);
    });

    it('checkpoints an already saved state without writing it again', async () => {
        const { store, documents } = createStore();
        const state = newState();
        await store.saveState(state);

        const set = vi.spyOn(documents, 'set');
        await store.createCheckpoint(state, 'A', 'manual');
        expect(set).toHaveBeenCalledTimes(1);
        expect(set.mock.calls[0]?.[0]).toBe(CHECKPOINT_COLLECTION);
    });

    it('fails restores of unknown checkpoints', async () => {
        const { store } = createStore();
        await expect(store.restoreFromCheckpoint('missing')).rejects.toThrow(ReplayError);
        await expect(store.restoreFromCheckpoint('missing')).rejects.toThrow("Checkpoint 'missing' not found");
    });

    it('wraps storage failures and leaves the state dirty', async () => {
        const { store, logger } = createStore({ documents: new FailingDocumentStore() });
        const state = newState();

        await expect(store.saveState(state)).rejects.toThrow(PersistenceError);
        await expect(store.saveState(state)).rejects.toThrow("Persistence operation 'saveState' failed: document store offline");
        expect(state.isDirty()).toBe(true);
        expect(logger.messages('error')).toContain('Persistence operation failed');
    });

    it('reports the latest version and lists checkpoints newest first', async () => {
        let clock = 1_000;
        const { store } = createStore({ now: () => clock });
        const v1 = newState();
        const first = await store.createCheckpoint(v1, 'A', 'auto');
        clock = 2_000;
        const v2 = v1.derive();
        const second = await store.createCheckpoint(v2, 'B', 'auto');

        expect(await store.getLatestVersion('exec-1')).toBe(2);
        expect(await store.getLatestVersion('other')).toBe(0);
        expect((await store.listCheckpoints('exec-1')).map((c) => c.checkpointId)).toEqual([second.checkpointId, first.checkpointId]);
    });

    it('collects transitions across versions without duplicates', async () => {
        const { store } = createStore();
        const v1 = newState();
        v1.recordTransition('A', 'B', 'first');
        await store.saveState(v1);
        const v2 = v1.derive();
        v2.recordTransition('B', 'C', 'second');
        await store.saveState(v2);

        const history = await store.getStateHistory('exec-1');
        expect(history.map((t) => `${t.from}->${t.to}:${t.reason}`)).toEqual(['A->B:first', 'B->C:second']);
    });

    it('removes states, blobs and checkpoints past retention', async () => {
        let clock = 1_000;
        const { store, documents, blobs } = createStore({ now: () => clock, threshold: 64 });
        await store.createCheckpoint(newState({ text: 'b'.repeat(100) }), 'A', 'auto');

        clock = 10_000;
        const recent = WorkflowState.create({ executionId: 'exec-2', workflowId: 'wf-1', data: {} });
        await store.saveState(recent);

        expect(await store.cleanOldStates(5_000)).toEqual({ states: 1, checkpoints: 1 });
        expect(await documents.get(STATE_COLLECTION, 'exec-1_v1')).toBeNull();
        expect(await documents.get(STATE_COLLECTION, 'exec-2_v1')).not.toBeNull();
        expect(blobs.paths()).toEqual(['states/wf-1/exec-2_v1.json']);
        expect(await store.loadState('exec-1', 1)).toBeNull();
    });
});

describe('StateCache', () => {
    it('expires entries idle for longer than the ttl', () => {
        let clock = 0;
        const cache = new StateCache({ ttlMs: 100, maxEntries: 10, now: () => clock });
        cache.put(newState());

        clock = 80;
        expect(cache.get('exec-1_v1')?.get('x')).toBe(1);
        clock = 160;
        expect(cache.get('exec-1_v1')).not.toBeNull();
        clock = 261;
        expect(cache.get('exec-1_v1')).toBeNull();
        expect(cache.size).toBe(0);
    });

    it('evicts the least recently used entry', () => {
        const cache = new StateCache({ ttlMs: 1_000, maxEntries: 2 });
        const v1 = newState();
        const v2 = v1.derive();
        const v3 = v2.derive();
        cache.put(v1);
        cache.put(v2);
        cache.get(v1.stateId);
        cache.put(v3);

        expect(cache.get(v2.stateId)).toBeNull();
        expect(cache.get(v1.stateId)).not.toBeNull();
        expect(cache.get(v3.stateId)).not.toBeNull();
    });

    it('sweeps every expired entry before evicting live ones', () => {
        let clock = 0;
        const cache = new StateCache({ ttlMs: 100, maxEntries: 3, now: () => clock });
        const v1 = newState();
        const v2 = v1.derive();
        cache.put(v1);
        clock = 10;
        cache.put(v2);
        clock = 150;
        const v3 = v2.derive();
        const v4 = v3.derive();
        cache.put(v3);
        cache.put(v4);

        expect(cache.size).toBe(2);
        expect(cache.get(v3.stateId)).not.toBeNull();
        expect(cache.evictExpired()).toBe(0);
        clock = 300;
        expect(cache.evictExpired()).toBe(2);
    });

    it('drops every version of one execution', () => {
        const cache = new StateCache({ ttlMs: 1_000, maxEntries: 10 });
        const first = newState();
        cache.put(first);
        cache.put(first.derive());
        cache.put(WorkflowState.create({ executionId: 'exec-2', workflowId: 'wf-1', data: {} }));

        cache.deleteExecution('exec-1');

        expect(cache.size).toBe(1);
        expect(cache.get(first.stateId)).toBeNull();
        expect(cache.get('exec-2_v1')).not.toBeNull();
    });

    it('returns copies that do not write through', () => {
        const cache = new StateCache({ ttlMs: 1_000, maxEntries: 2 });
        cache.put(newState());
        cache.get('exec-1_v1')?.set('x', 2);
        expect(cache.get('exec-1_v1')?.get('x')).toBe(1);
    });
});
