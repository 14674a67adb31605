/**
 * Remote status polling: one poller per non-terminal remote record.
 *
 * Each poller ticks every interval (first tick after one interval), normalizes the
 * server's status and applies it to the store. It stops itself once the server
 * reports completed, failed or uploaded. A failed refresh is recorded in the
 * session's recent errors and the next tick goes ahead as usual.
 */

import type { ScanMetadata, ScanRecord, ScanRecordPatch } from './scan-types';
import type { RemoteScanSnapshot, ScanApi } from './collaborators';
import type { ScanRecordStore } from './scan-store';
import type { SyncStateStore } from './sync/sync-state';
import { AbortRegistry } from './sync/sync-abort-registry';
import { isTerminalStatus, normalizeStatus } from './scan-status';
import { errorMessage } from './errors';
import { runRetryLoop, throwIfAborted, type Sleep } from './retry';
import { scopedLogger } from './logger';

const log = scopedLogger('POLLER');

export const DEFAULT_POLL_INTERVAL_MS = 30_000;

function definedMetadata(metadata: Partial<ScanMetadata>): Partial<ScanMetadata> {
  const result: Partial<ScanMetadata> = {};
  if (metadata.name) result.name = metadata.name;
  if (metadata.locationName !== undefined) result.locationName = metadata.locationName;
  if (metadata.coordinates && metadata.coordinates.length > 0) result.coordinates = metadata.coordinates;
  if (metadata.imageCount !== undefined) result.imageCount = metadata.imageCount;
  if (metadata.durationSeconds !== undefined) result.durationSeconds = metadata.durationSeconds;
  if (metadata.dataSizeBytes !== undefined) result.dataSizeBytes = metadata.dataSizeBytes;
  if (metadata.createdAt) result.createdAt = metadata.createdAt;
  return result;
}

/** Field groups a server snapshot carries, as a store patch. */
export function patchFromSnapshot(snapshot: RemoteScanSnapshot): ScanRecordPatch {
  const patch: ScanRecordPatch = { metadata: definedMetadata(snapshot.metadata) };
  if (snapshot.processedModelUrl || snapshot.snapshotUrl) {
    patch.artifactPaths = {};
    if (snapshot.processedModelUrl) patch.artifactPaths.modelPath = snapshot.processedModelUrl;
    if (snapshot.snapshotUrl) patch.artifactPaths.snapshotPath = snapshot.snapshotUrl;
  }
  if (snapshot.errorMessage) {
    patch.lastError = { kind: 'server', message: snapshot.errorMessage };
  }
  return patch;
}

/** Normalize and apply one server snapshot to a record. */
export function applyRemoteSnapshot(
  store: ScanRecordStore,
  scanId: string,
  snapshot: RemoteScanSnapshot
): Promise<ScanRecord> {
  return store.applyObserved(scanId, normalizeStatus(snapshot.status), patchFromSnapshot(snapshot));
}

export interface StatusPollerOptions {
  api: ScanApi;
  store: ScanRecordStore;
  syncState: SyncStateStore;
  intervalMs?: number;
  sleep?: Sleep;
  abortRegistry?: AbortRegistry;
}

export class StatusPollerRegistry {
  private readonly api: ScanApi;
  private readonly store: ScanRecordStore;
  private readonly syncState: SyncStateStore;
  private readonly intervalMs: number;
  private readonly sleep?: Sleep;
  private readonly abortRegistry: AbortRegistry;
  private readonly running = new Map<string, AbortController>();

  constructor(options: StatusPollerOptions) {
    this.api = options.api;
    this.store = options.store;
    this.syncState = options.syncState;
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.sleep = options.sleep;
    this.abortRegistry = options.abortRegistry ?? new AbortRegistry();
  }

  /**
   * Start polling a record. Returns false when it is already polled, is not a
   * remote record, has no server id or is already terminal.
   */
  start(scanId: string): boolean {
    if (this.running.has(scanId)) return false;
    const record = this.store.get(scanId);
    if (!record || record.source !== 'remote' || !record.remoteId || isTerminalStatus(record.status)) {
      return false;
    }

    const controller = this.abortRegistry.register(this.taskId(scanId));
    this.running.set(scanId, controller);
    log.log(`Polling ${scanId} every ${this.intervalMs / 1000}s`);

    this.poll(scanId, record.remoteId, controller.signal)
      .catch((error: unknown) => {
        if (!controller.signal.aborted) {
          log.error(`Poller for ${scanId} stopped`, error);
        }
      })
      .finally(() => {
        if (this.running.get(scanId) === controller) this.running.delete(scanId);
        this.abortRegistry.unregister(this.taskId(scanId), controller);
      });
    return true;
  }

  /** Start a poller for every non-terminal remote record in the store. */
  startAll(): number {
    let started = 0;
    for (const record of this.store.all()) {
      if (this.start(record.id)) started++;
    }
    return started;
  }

  stop(scanId: string): boolean {
    const controller = this.running.get(scanId);
    if (!controller) return false;
    controller.abort();
    this.running.delete(scanId);
    this.abortRegistry.unregister(this.taskId(scanId), controller);
    log.log(`Stopped polling ${scanId}`);
    return true;
  }

  stopAll(): void {
    for (const scanId of [...this.running.keys()]) {
      this.stop(scanId);
    }
  }

  isPolling(scanId: string): boolean {
    return this.running.has(scanId);
  }

  pollingIds(): string[] {
    return [...this.running.keys()];
  }

  private taskId(scanId: string): string {
    return `poll:${scanId}`;
  }

  private async poll(scanId: string, remoteId: string, signal: AbortSignal): Promise<void> {
    const result = await runRetryLoop<ScanRecord>({
      attempt: async (_tick, tickSignal) => {
        const snapshot = await this.api.getScanStatus(remoteId, tickSignal);
        throwIfAborted(signal);
        const canonical = normalizeStatus(snapshot.status);
        const record = await applyRemoteSnapshot(this.store, scanId, snapshot);
        if (canonical === 'completed' || canonical === 'failed' || canonical === 'uploaded') {
          return { done: true, value: record };
        }
        return { done: false };
      },
      onError: (error) => {
        const record = this.store.get(scanId);
        if (!record) return 'fail';
        const message = `Status refresh failed for ${record.metadata.name || scanId}: ${errorMessage(error)}`;
        log.warn(`⚠️ ${message}`);
        this.syncState.recordError(message);
        return 'retry';
      },
      delayMs: this.intervalMs,
      initialDelay: true,
      signal,
      sleep: this.sleep,
    });

    if (result.outcome === 'done') {
      log.log(`✅ ${scanId} reached ${result.value.status}, polling stopped`);
    }
  }
}
