import { describe, expect, it, vi } from 'vitest';
import { ScanRecordStore } from '@/lib/scan-store';
import { ConnectivityMonitor } from '@/lib/connectivity-monitor';
import { InMemoryAutoSyncSettings, type AutoSyncSettings } from '@/lib/auto-sync-settings';
import { SyncOrchestrator, SyncStateStore, countSyncNeeded, describeSyncResult, needsSync } from '@/lib/sync';
import { FakeScanApi, deferred, makeRecord } from './helpers/fakes';

function setup(options: { settings?: AutoSyncSettings; connectivity?: ConnectivityMonitor } = {}) {
  const api = new FakeScanApi();
  const store = new ScanRecordStore();
  const syncState = new SyncStateStore();
  const orchestrator = new SyncOrchestrator({
    store,
    api,
    syncState,
    settings: options.settings ?? new InMemoryAutoSyncSettings(),
    connectivity: options.connectivity,
  });
  return { api, store, syncState, orchestrator };
}

describe('needsSync', () => {
  it('selects failed and unregistered local records only', () => {
    expect(needsSync(makeRecord({ id: 'a', status: 'failed', remoteId: '1' }))).toBe(true);
    expect(needsSync(makeRecord({ id: 'b', status: 'pending' }))).toBe(true);
    expect(needsSync(makeRecord({ id: 'c', status: 'uploaded' }))).toBe(true);
    expect(needsSync(makeRecord({ id: 'd', status: 'uploaded', remoteId: '4' }))).toBe(false);
    expect(needsSync(makeRecord({ id: 'e', status: 'uploading' }))).toBe(false);
    expect(needsSync(makeRecord({ id: 'f', source: 'remote', status: 'failed' }))).toBe(false);
  });

  it('counts failed and unregistered records separately', () => {
    expect(countSyncNeeded([
      makeRecord({ id: 'a', status: 'failed' }),
      makeRecord({ id: 'b', status: 'failed', remoteId: '2' }),
      makeRecord({ id: 'c', status: 'pending' }),
      makeRecord({ id: 'd', status: 'uploaded', remoteId: '4' }),
    ])).toEqual({ pendingCount: 2, initializedCount: 1 });
  });
});

describe('describeSyncResult', () => {
  it('summarises batches', () => {
    expect(describeSyncResult({ attempted: 0, succeeded: 0, failed: 0, cancelled: false }, 'manual')).toBe('All scans are up to date');
    expect(describeSyncResult({ attempted: 3, succeeded: 3, failed: 0, cancelled: false }, 'auto')).toBe('Auto-sync completed: 3 synced');
    expect(describeSyncResult({ attempted: 5, succeeded: 3, failed: 2, cancelled: false }, 'manual')).toBe('Sync completed: 3 synced, 2 failed');
    expect(describeSyncResult({ attempted: 2, succeeded: 1, failed: 0, cancelled: true }, 'manual')).toBe('Sync cancelled: 1 of 2 synced');
  });
});

describe('SyncOrchestrator.syncAll', () => {
  it('isolates failing records from the rest of the batch', async () => {
    const { api, store, syncState, orchestrator } = setup();
    for (const id of ['s1', 's2', 's3', 's4', 's5']) {
      await store.add(makeRecord({ id, status: id === 's2' ? 'failed' : 'pending' }));
    }
    api.failRegistrationFor = new Set(['s2', 's4']);

    const result = await orchestrator.syncAll();

    expect(result).toMatchObject({ attempted: 5, succeeded: 3, failed: 2, cancelled: false });
    expect(result.message).toBe('Sync completed: 3 synced, 2 failed');
    expect(result.failures.map((failure) => failure.scanId).sort()).toEqual(['s2', 's4']);
    expect(store.require('s2')).toMatchObject({ status: 'failed', lastError: { kind: 'network', code: 'NETWORK_ERROR' } });
    expect(store.require('s4').status).toBe('failed');
    for (const id of ['s1', 's3', 's5']) {
      expect(store.require(id).remoteId).toBeDefined();
    }
    const state = syncState.get();
    expect(state.isSyncing).toBe(false);
    expect(state.lastSyncMessage).toBe('Sync completed: 3 synced, 2 failed');
    expect(state.recentErrors).toHaveLength(2);
    expect(state.recentErrors).toContain('Scan s2: No internet connection available.');
  });

  it('joins a batch that is already running', async () => {
    const { api, store, orchestrator } = setup();
    await store.add(makeRecord({ id: 's1' }));
    const gate = deferred();
    api.registerGate = gate.promise;

    const first = orchestrator.syncAll();
    const second = orchestrator.syncAll();
    expect(second).toBe(first);
    expect(orchestrator.isSyncing()).toBe(true);

    gate.resolve();
    await first;
    expect(api.registerCalls).toEqual(['s1']);
    expect(orchestrator.isSyncing()).toBe(false);
  });

  it('repairs records whose model already exists and tells the server', async () => {
    const { api, store, orchestrator } = setup();
    await store.add(makeRecord({ id: 's1', status: 'failed', artifactPaths: { modelPath: '/captures/s1/model.usdz' } }));

    const result = await orchestrator.syncAll();

    expect(result.succeeded).toBe(1);
    const record = store.require('s1');
    expect(record.status).toBe('uploaded');
    expect(record.remoteId).toBe('500');
    expect(api.statusUpdates).toEqual([{ remoteId: '500', status: 'uploaded' }]);
  });

  it('leaves a record alone when another writer moved it during a failed attempt', async () => {
    const { api, store, orchestrator } = setup();
    await store.add(makeRecord({ id: 's1' }));
    const gate = deferred();
    api.registerGate = gate.promise;
    api.failRegistrationFor = new Set(['s1']);

    const run = orchestrator.syncAll();
    await vi.waitFor(() => expect(api.registerCalls).toEqual(['s1']));
    await store.transition('s1', 'uploading');
    gate.resolve();
    const result = await run;

    expect(result).toMatchObject({ attempted: 1, succeeded: 0, failed: 1 });
    expect(store.require('s1').status).toBe('uploading');
    expect(store.require('s1').lastError).toBeUndefined();
  });

  it('reports an empty batch as up to date', async () => {
    const { store, orchestrator } = setup();
    await store.add(makeRecord({ id: 'done', status: 'uploaded', remoteId: '9' }));

    expect(await orchestrator.syncAll()).toMatchObject({ attempted: 0, message: 'All scans are up to date' });
  });

  it('skips the batch while offline', async () => {
    const connectivity = new ConnectivityMonitor();
    connectivity.report(false);
    const { api, store, syncState, orchestrator } = setup({ connectivity });
    await store.add(makeRecord({ id: 's1' }));

    const result = await orchestrator.syncAll();

    expect(result).toMatchObject({ attempted: 0, message: 'Sync skipped: no internet connection' });
    expect(api.registerCalls).toEqual([]);
    expect(syncState.get().lastSyncMessage).toBe('Sync skipped: no internet connection');
  });

  it('stops picking up records after cancel', async () => {
    const { api, store, orchestrator } = setup();
    for (const id of ['s1', 's2', 's3', 's4']) {
      await store.add(makeRecord({ id }));
    }
    const gate = deferred();
    api.registerGate = gate.promise;

    const run = orchestrator.syncAll();
    await vi.waitFor(() => expect(api.registerCalls).toHaveLength(2));
    expect(orchestrator.cancel()).toBe(true);
    gate.resolve();
    const result = await run;

    expect(result.cancelled).toBe(true);
    expect(result.attempted).toBe(2);
    expect(result.succeeded).toBe(0);
    expect(result.failed).toBe(0);
    expect(result.message).toBe('Sync cancelled: 0 of 2 synced');
    expect(api.registerCalls).toHaveLength(2);
    expect(store.require(api.registerCalls[0]).remoteId).toBeDefined();
    expect(store.filter((record) => !record.remoteId)).toHaveLength(2);
  });
});

describe('SyncOrchestrator wiring', () => {
  it('keeps the counts current as records change', async () => {
    const { store, syncState, orchestrator } = setup();
    orchestrator.attach();

    await store.add(makeRecord({ id: 's1' }));
    await store.add(makeRecord({ id: 's2', status: 'failed', remoteId: '2' }));

    expect(syncState.get()).toMatchObject({ pendingCount: 1, initializedCount: 1 });
  });

  it('auto-syncs once per reconnect edge', async () => {
    const connectivity = new ConnectivityMonitor();
    const { api, store, syncState, orchestrator } = setup({ connectivity });
    await store.add(makeRecord({ id: 's1' }));
    const detach = orchestrator.attach();
    const syncAll = vi.spyOn(orchestrator, 'syncAll');

    connectivity.report(true);
    connectivity.report(true);
    expect(syncAll).not.toHaveBeenCalled();
    expect(syncState.get().isOnline).toBe(true);

    connectivity.report(false);
    connectivity.report(true);
    connectivity.report(true);

    expect(syncAll).toHaveBeenCalledTimes(1);
    expect(syncAll).toHaveBeenCalledWith('auto');
    await vi.waitFor(() => expect(orchestrator.isSyncing()).toBe(false));
    expect(api.registerCalls).toEqual(['s1']);
    expect(syncState.get().lastSyncMessage).toBe('Auto-sync completed: 1 synced');
    detach();
  });

  it('does not auto-sync when the toggle is off', async () => {
    const connectivity = new ConnectivityMonitor();
    const { orchestrator } = setup({ connectivity, settings: new InMemoryAutoSyncSettings(false) });
    await orchestrator.loadSettings();
    orchestrator.attach();
    const syncAll = vi.spyOn(orchestrator, 'syncAll');

    connectivity.report(false);
    connectivity.report(true);

    expect(syncAll).not.toHaveBeenCalled();
  });

  it('persists the toggle without starting a sync', async () => {
    const connectivity = new ConnectivityMonitor();
    connectivity.report(true);
    const settings = new InMemoryAutoSyncSettings(false);
    const { store, syncState, orchestrator } = setup({ connectivity, settings });
    await store.add(makeRecord({ id: 's1' }));
    const syncAll = vi.spyOn(orchestrator, 'syncAll');

    expect(await orchestrator.toggleAutoSync(true)).toBe(true);

    expect(await settings.getAutoSyncEnabled()).toBe(true);
    expect(syncState.get()).toMatchObject({ autoSyncEnabled: true, lastSyncMessage: 'Auto-sync enabled' });
    expect(syncAll).not.toHaveBeenCalled();
  });

  it('records a toggle that could not be saved', async () => {
    const settings: AutoSyncSettings = {
      getAutoSyncEnabled: async () => true,
      setAutoSyncEnabled: async () => {
        throw new Error('Access Denied');
      },
    };
    const { syncState, orchestrator } = setup({ settings });

    expect(await orchestrator.toggleAutoSync(false)).toBe(false);
    expect(syncState.get()).toMatchObject({
      autoSyncEnabled: true,
      recentErrors: ['Failed to set auto-sync: Access Denied'],
    });
  });
});

describe('SyncOrchestrator.uploadScan', () => {
  it('registers one local record', async () => {
    const { api, store, syncState, orchestrator } = setup();
    await store.add(makeRecord({ id: 's1', status: 'uploaded' }));

    expect(await orchestrator.uploadScan('s1')).toBe(true);
    expect(store.require('s1').remoteId).toBe('500');
    expect(api.registerCalls).toEqual(['s1']);
    expect(syncState.get().lastSyncMessage).toBe('Scan uploaded successfully');
  });

  it('reports a failed upload', async () => {
    const { api, store, syncState, orchestrator } = setup();
    await store.add(makeRecord({ id: 's1', metadata: { name: 'Garden wall' } }));
    api.failRegistrationFor.add('s1');

    expect(await orchestrator.uploadScan('s1')).toBe(false);
    expect(syncState.get().recentErrors).toEqual(['Failed to upload scan: Garden wall']);
  });

  it('rejects remote records', async () => {
    const { store, orchestrator } = setup();
    await store.add(makeRecord({ id: 'r1', source: 'remote', remoteId: '1' }));

    await expect(orchestrator.uploadScan('r1')).rejects.toThrow('Scan r1 is not a local scan');
  });
});
