/**
 * Sync orchestrator: collect → register → repair, per record, with bounded concurrency.
 * Checks the abort signal before each record; a failing record never stops the batch.
 *
 * Single-flight: a second syncAll() while one is running joins the running batch.
 */

import type { ScanRecord, ScanStatus, SyncRecordFailure, SyncResult } from '@/lib/scan-types';
import type { ScanRecordStore } from '@/lib/scan-store';
import type { ScanApi } from '@/lib/collaborators';
import type { ConnectivityMonitor } from '@/lib/connectivity-monitor';
import type { AutoSyncSettings } from '@/lib/auto-sync-settings';
import { needsStatusRepair } from '@/lib/scan-lifecycle';
import { isTerminalStatus } from '@/lib/scan-status';
import { ScanSyncError, errorMessage, isAbortError, toScanError } from '@/lib/errors';
import { scopedLogger } from '@/lib/logger';
import { throwIfAborted } from '@/lib/retry';
import { AbortRegistry } from './sync-abort-registry';
import type { SyncStateStore } from './sync-state';
import { countSyncNeeded, describeSyncResult, recordsNeedingSync } from './determine-sync-status';

const log = scopedLogger('SYNC');

const SYNC_ALL_TASK = 'sync-all';

export type SyncTrigger = 'manual' | 'auto';

/** Status the record was left in by the current attempt; null once another writer owns it. */
interface SyncAttempt {
  status: ScanStatus | null;
}

export interface SyncOrchestratorOptions {
  store: ScanRecordStore;
  api: ScanApi;
  syncState: SyncStateStore;
  settings: AutoSyncSettings;
  connectivity?: ConnectivityMonitor;
  abortRegistry?: AbortRegistry;
  /** Records registered in parallel. */
  concurrency?: number;
}

async function runWithConcurrency<T>(
  items: T[],
  limit: number,
  fn: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let nextIndex = 0;
  const worker = async () => {
    while (nextIndex < items.length) {
      if (signal?.aborted) return;
      const i = nextIndex++;
      await fn(items[i], i);
    }
  };
  await Promise.all(
    Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => worker())
  );
}

function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  return !!signal?.aborted || isAbortError(error) || (error instanceof ScanSyncError && error.kind === 'cancelled');
}

export class SyncOrchestrator {
  private readonly store: ScanRecordStore;
  private readonly api: ScanApi;
  private readonly syncState: SyncStateStore;
  private readonly settings: AutoSyncSettings;
  private readonly connectivity?: ConnectivityMonitor;
  private readonly abortRegistry: AbortRegistry;
  private readonly concurrency: number;
  private inFlight: Promise<SyncResult> | null = null;

  constructor(options: SyncOrchestratorOptions) {
    this.store = options.store;
    this.api = options.api;
    this.syncState = options.syncState;
    this.settings = options.settings;
    this.connectivity = options.connectivity;
    this.abortRegistry = options.abortRegistry ?? new AbortRegistry();
    this.concurrency = options.concurrency ?? 2;
  }

  isSyncing(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Keep counts and the online flag current, and sync on every offline → online
   * edge while auto-sync is on. Returns the detach function.
   */
  attach(): () => void {
    const unsubscribers: Array<() => void> = [];

    this.refreshCounts(this.store.all());
    unsubscribers.push(this.store.subscribe(({ records }) => this.refreshCounts(records)));

    if (this.connectivity) {
      unsubscribers.push(this.connectivity.onTransition(({ to }) => {
        this.syncState.update({ isOnline: to === 'online' });
      }));
      unsubscribers.push(this.connectivity.onReconnect(() => this.handleReconnect()));
    }

    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }

  async loadSettings(): Promise<boolean> {
    const enabled = await this.settings.getAutoSyncEnabled();
    this.syncState.update({ autoSyncEnabled: enabled });
    return enabled;
  }

  /** Persist the toggle. Never starts a sync, even when turning auto-sync on while online. */
  async toggleAutoSync(enabled: boolean): Promise<boolean> {
    try {
      await this.settings.setAutoSyncEnabled(enabled);
    } catch (error) {
      log.warn(`Failed to set auto-sync: ${errorMessage(error)}`);
      this.syncState.recordError(`Failed to set auto-sync: ${errorMessage(error)}`);
      return false;
    }
    this.syncState.update({
      autoSyncEnabled: enabled,
      lastSyncMessage: enabled ? 'Auto-sync enabled' : 'Auto-sync disabled',
      lastSyncTime: new Date().toISOString(),
    });
    return true;
  }

  syncAll(trigger: SyncTrigger = 'manual'): Promise<SyncResult> {
    if (this.inFlight) {
      log.debug('Sync already running, joining it');
      return this.inFlight;
    }
    const run = this.runBatch(trigger).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  cancel(): boolean {
    return this.abortRegistry.abort(SYNC_ALL_TASK);
  }

  /**
   * Register a single local record outside a batch. Unknown ids and remote records
   * are rejected; a failed upload is recorded and reported as false.
   */
  async uploadScan(scanId: string): Promise<boolean> {
    const record = this.store.require(scanId);
    if (record.source !== 'local') {
      throw new ScanSyncError('validation', `Scan ${scanId} is not a local scan`, { code: 'INVALID_SCAN_ID' });
    }

    const taskId = `upload:${scanId}`;
    const controller = this.abortRegistry.register(taskId);
    const attempt: SyncAttempt = { status: null };
    try {
      await this.syncRecord(record, controller.signal, attempt);
      this.syncState.update({
        lastSyncMessage: 'Scan uploaded successfully',
        lastSyncTime: new Date().toISOString(),
      });
      return true;
    } catch (error) {
      if (isCancellation(error, controller.signal)) return false;
      this.syncState.recordError(`Failed to upload scan: ${record.metadata.name}`);
      return false;
    } finally {
      this.abortRegistry.unregister(taskId, controller);
    }
  }

  private handleReconnect(): void {
    if (!this.syncState.get().autoSyncEnabled) {
      log.log('Back online; auto-sync is off');
      return;
    }
    log.log('🔄 Back online, starting auto-sync');
    this.syncAll('auto').catch((error: unknown) => {
      log.error('Auto-sync failed', error);
    });
  }

  private refreshCounts(records: ScanRecord[]): void {
    const { pendingCount, initializedCount } = countSyncNeeded(records);
    const current = this.syncState.get();
    if (current.pendingCount === pendingCount && current.initializedCount === initializedCount) return;
    this.syncState.update({ pendingCount, initializedCount });
  }

  private async runBatch(trigger: SyncTrigger): Promise<SyncResult> {
    if (this.connectivity?.currentStatus() === 'offline') {
      const message = 'Sync skipped: no internet connection';
      this.syncState.update({ lastSyncMessage: message, lastSyncTime: new Date().toISOString() });
      return { attempted: 0, succeeded: 0, failed: 0, failures: [], message, cancelled: false };
    }

    const controller = this.abortRegistry.register(SYNC_ALL_TASK);
    const { signal } = controller;
    const syncStartTime = Date.now();
    this.syncState.update({
      isSyncing: true,
      lastSyncMessage: trigger === 'manual' ? 'Starting manual sync...' : 'Auto-sync in progress...',
    });

    let attempted = 0;
    let succeeded = 0;
    const failures: SyncRecordFailure[] = [];

    try {
      const records = recordsNeedingSync(this.store.all());
      log.log(`Starting ${trigger} sync of ${records.length} scans`);

      await runWithConcurrency(records, this.concurrency, async (record) => {
        if (signal.aborted) return;
        attempted++;
        const attempt: SyncAttempt = { status: null };
        try {
          await this.syncRecord(record, signal, attempt);
          succeeded++;
        } catch (error) {
          if (isCancellation(error, signal)) return;
          const scanError = toScanError(error);
          failures.push({ scanId: record.id, error: scanError });
          log.warn(`⚠️ ${record.id} failed: ${scanError.message}`);
          await this.recordFailure(record.id, error, attempt);
        }
      }, signal);
    } catch (error) {
      const message = `Sync failed: ${errorMessage(error)}`;
      this.syncState.update({ isSyncing: false, lastSyncMessage: message, lastSyncTime: new Date().toISOString() });
      this.syncState.recordError(message);
      throw error;
    } finally {
      this.abortRegistry.unregister(SYNC_ALL_TASK, controller);
    }

    const cancelled = signal.aborted;
    const counts = { attempted, succeeded, failed: failures.length, cancelled };
    const message = describeSyncResult(counts, trigger);
    const duration = ((Date.now() - syncStartTime) / 1000).toFixed(2);
    if (cancelled) {
      log.log(`🛑 ${message}`);
    } else if (failures.length === 0) {
      log.log(`✅ ${message} in ${duration}s`);
    } else {
      log.warn(`❌ ${message} in ${duration}s`);
    }

    for (const failure of failures) {
      const name = this.store.get(failure.scanId)?.metadata.name ?? failure.scanId;
      this.syncState.recordError(`${name}: ${failure.error.message}`);
    }
    this.syncState.update({
      isSyncing: false,
      lastSyncMessage: message,
      lastSyncTime: new Date().toISOString(),
    });

    return { ...counts, failures, message };
  }

  /**
   * failed → pending, register when the server has no id yet, then repair the
   * status of records whose model already exists. Status writes only apply when
   * the record is still where this attempt left it; `attempt.status` tracks that.
   * A record another writer moved first (a processing retry) is left to it.
   */
  private async syncRecord(record: ScanRecord, signal: AbortSignal, attempt: SyncAttempt): Promise<void> {
    let current = this.store.require(record.id);
    attempt.status = current.status;

    if (current.status === 'failed') {
      const retried = await this.store.transitionIf(current.id, 'failed', 'pending');
      if (!retried) {
        log.debug(`${current.id} was retried elsewhere; leaving its status alone`);
        attempt.status = null;
        current = this.store.require(current.id);
      } else {
        attempt.status = retried.status;
        current = retried;
      }
    }

    if (!current.remoteId) {
      // Keep the id even when cancelled meanwhile; the server already has the scan
      const { remoteId } = await this.api.registerScan(current, signal);
      current = await this.store.update(current.id, { remoteId });
      log.debug(`${current.id} registered as ${remoteId}`);
    }
    throwIfAborted(signal);

    if (attempt.status !== null && needsStatusRepair(current)) {
      const repaired = await this.store.transitionIf(current.id, current.status, 'uploaded', 'repair');
      if (!repaired) return;
      attempt.status = repaired.status;
      if (repaired.remoteId) {
        await this.api.updateScanStatus(repaired.remoteId, 'uploaded', signal);
      }
    }
  }

  /**
   * Record a failed attempt on the record, but only while it is still in the
   * status the attempt left it in. Non-terminal records go to failed; terminal
   * ones only keep the error.
   */
  private async recordFailure(scanId: string, error: unknown, attempt: SyncAttempt): Promise<void> {
    const expected = attempt.status;
    if (expected === null) return;
    const lastError = toScanError(error);
    const to = isTerminalStatus(expected) ? expected : 'failed';
    try {
      const written = await this.store.transitionIf(scanId, expected, to, 'action', { lastError });
      if (!written) log.debug(`${scanId} moved on; not recording the sync failure on it`);
    } catch (storeError) {
      log.error(`Could not record failure for ${scanId}`, storeError);
    }
  }
}
