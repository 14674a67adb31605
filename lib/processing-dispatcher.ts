/**
 * Routes a scan to on-device processing (local records) or to a server job
 * (remote records) and writes the outcome back to the store.
 *
 * Setup problems (unknown id, no capture folder, no server id, offline) are thrown
 * to the caller before any status changes. Failures of the processing itself end
 * as `failed` with a classified lastError and the failed record is returned.
 */

import type { ArtifactPaths, ScanRecord, ScanRecordPatch } from './scan-types';
import type { LocalProcessingCapability, ScanApi } from './collaborators';
import type { ScanRecordStore } from './scan-store';
import type { ConnectivityMonitor } from './connectivity-monitor';
import type { StatusPollerRegistry } from './status-poller';
import type { SyncStateStore } from './sync/sync-state';
import { AbortRegistry } from './sync/sync-abort-registry';
import { needsStatusRepair, retryPlan } from './scan-lifecycle';
import { formatEstimate, isInProgressStatus } from './scan-status';
import { ScanSyncError, errorFromCode, errorMessage, isAbortError, toScanError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('DISPATCH');

export const OFFLINE_PROCESSING_MESSAGE = 'For processing, you need to connect to the internet.';

const SUB_STATUS_MESSAGES: Readonly<Record<string, string>> = {
  uploading: 'Uploading model data...',
  downloading: 'Downloading processed model...',
  processing: 'Processing model on server...',
};

function artifactPathsFor(modelPath: string, snapshotPath?: string): Partial<ArtifactPaths> {
  return snapshotPath ? { modelPath, snapshotPath } : { modelPath };
}

export interface LocalArtifactReport {
  usdzPath: string;
  folderPath?: string;
  snapshotPath?: string;
  modelSizeBytes?: number;
}

export interface ProcessingDispatcherOptions {
  store: ScanRecordStore;
  api: ScanApi;
  syncState: SyncStateStore;
  pollers: StatusPollerRegistry;
  localProcessing?: LocalProcessingCapability;
  connectivity?: ConnectivityMonitor;
  abortRegistry?: AbortRegistry;
}

export class ProcessingDispatcher {
  private readonly store: ScanRecordStore;
  private readonly api: ScanApi;
  private readonly syncState: SyncStateStore;
  private readonly pollers: StatusPollerRegistry;
  private readonly localProcessing?: LocalProcessingCapability;
  private readonly connectivity?: ConnectivityMonitor;
  private readonly abortRegistry: AbortRegistry;
  private readonly inFlight = new Map<string, Promise<ScanRecord>>();

  constructor(options: ProcessingDispatcherOptions) {
    this.store = options.store;
    this.api = options.api;
    this.syncState = options.syncState;
    this.pollers = options.pollers;
    this.localProcessing = options.localProcessing;
    this.connectivity = options.connectivity;
    this.abortRegistry = options.abortRegistry ?? new AbortRegistry();
  }

  /** Process a pending scan. A second call while one runs returns the running one. */
  processScan(scanId: string): Promise<ScanRecord> {
    const running = this.inFlight.get(scanId);
    if (running) return running;

    let record: ScanRecord;
    try {
      record = this.store.require(scanId);
      this.assertCanProcess(record);
    } catch (error) {
      return Promise.reject(error);
    }

    const run = (record.source === 'local' ? this.processLocally(record) : this.processOnServer(record))
      .finally(() => {
        this.inFlight.delete(scanId);
      });
    this.inFlight.set(scanId, run);
    return run;
  }

  /** failed → pending (clearing the error), then the path the record's source selects. */
  async retryProcessing(scanId: string): Promise<ScanRecord> {
    const record = this.store.require(scanId);
    const plan = retryPlan(record);
    this.assertCanProcess({ ...record, status: plan.status });
    log.log(`🔄 Retrying ${scanId} on the ${plan.path} path`);
    await this.store.transition(scanId, plan.status);
    return this.processScan(scanId);
  }

  /** Native "processing finished" notification, matched to its record by capture folder. */
  async handleProcessingComplete(report: LocalArtifactReport): Promise<ScanRecord | null> {
    const record = report.folderPath ? this.store.findByFolderPath(report.folderPath) : this.singleUploadingRecord();
    if (!record) {
      log.warn(`Processing result ${report.usdzPath} matches no scan`);
      return null;
    }
    const patch: ScanRecordPatch = { artifactPaths: artifactPathsFor(report.usdzPath, report.snapshotPath) };
    if (report.modelSizeBytes !== undefined) patch.metadata = { dataSizeBytes: report.modelSizeBytes };
    if (record.status === 'uploading') {
      const next = await this.store.transition(record.id, 'uploaded', 'action', patch);
      await this.informServer(next);
      return next;
    }
    const updated = await this.store.update(record.id, patch);
    if (!needsStatusRepair(updated)) return updated;
    return this.repair(updated);
  }

  /** Native sub-status ("uploading", "downloading", "processing") for a running job. */
  async setProcessingMessage(status: string, folderPath?: string): Promise<void> {
    const message = SUB_STATUS_MESSAGES[status.trim().toLowerCase()] ?? 'Processing model...';
    const targets = folderPath
      ? [this.store.findByFolderPath(folderPath)]
      : this.store.filter((record) => isInProgressStatus(record.status));
    for (const record of targets) {
      if (!record || !isInProgressStatus(record.status)) continue;
      await this.store.update(record.id, { processingMessage: message });
    }
  }

  cancelAll(): void {
    for (const taskId of this.abortRegistry.ids()) {
      if (taskId.startsWith('process:')) this.abortRegistry.abort(taskId);
    }
  }

  private assertCanProcess(record: ScanRecord): void {
    if (record.status === 'uploaded' || needsStatusRepair(record)) return;
    if (this.connectivity?.currentStatus() === 'offline') {
      throw new ScanSyncError('network', OFFLINE_PROCESSING_MESSAGE, { code: 'NETWORK_ERROR' });
    }
    if (record.source === 'local') {
      if (!record.artifactPaths?.folderPath) {
        throw new ScanSyncError('validation', `Scan ${record.id} has no capture folder`, { code: 'INVALID_PATH' });
      }
      if (!this.localProcessing) {
        throw new ScanSyncError('validation', 'On-device processing is not available');
      }
    } else if (!record.remoteId) {
      throw errorFromCode('INVALID_SCAN_ID');
    }
  }

  private singleUploadingRecord(): ScanRecord | undefined {
    const uploading = this.store.filter((record) => record.source === 'local' && record.status === 'uploading');
    return uploading.length === 1 ? uploading[0] : undefined;
  }

  private async processLocally(record: ScanRecord): Promise<ScanRecord> {
    if (needsStatusRepair(record)) return this.repair(record);
    if (record.status === 'uploaded') return record;
    if (record.status !== 'pending') {
      throw new ScanSyncError('validation', `Scan ${record.id} is ${record.status}; only pending scans can be processed`);
    }

    const folderPath = record.artifactPaths?.folderPath;
    const capability = this.localProcessing;
    if (!folderPath || !capability) {
      throw new ScanSyncError('validation', `Scan ${record.id} has no capture folder`, { code: 'INVALID_PATH' });
    }

    const taskId = `process:${record.id}`;
    const controller = this.abortRegistry.register(taskId);
    const { signal } = controller;
    try {
      const sizeBytes = capability.getCaptureSize
        ? await capability.getCaptureSize(folderPath).catch(() => record.metadata.dataSizeBytes ?? 0)
        : record.metadata.dataSizeBytes ?? 0;
      const processingMessage = sizeBytes > 0
        ? `Processing model... (about ${formatEstimate(sizeBytes)} min)`
        : 'Processing model...';
      await this.store.transition(record.id, 'uploading', 'action', { processingMessage });
      log.log(`Processing ${record.id} on device`);

      const result = await capability.processLocal(folderPath, signal);
      if (signal.aborted) return this.store.require(record.id);

      const next = await this.store.transitionIf(record.id, 'uploading', 'uploaded', 'action', {
        artifactPaths: artifactPathsFor(result.artifactPath, result.snapshotPath),
        metadata: { dataSizeBytes: result.sizeBytes },
      });
      if (!next) {
        // The native completion notification got there first
        return this.store.update(record.id, { artifactPaths: { modelPath: result.artifactPath } });
      }
      log.log(`✅ ${record.id} processed: ${result.artifactPath}`);
      await this.informServer(next);
      return next;
    } catch (error) {
      if (signal.aborted || isAbortError(error)) return this.store.require(record.id);
      return this.failRecord(record.id, error);
    } finally {
      this.abortRegistry.unregister(taskId, controller);
    }
  }

  private async processOnServer(record: ScanRecord): Promise<ScanRecord> {
    if (record.status === 'processing') {
      this.pollers.start(record.id);
      return record;
    }
    if (record.status === 'completed') return record;
    if (record.status !== 'pending') {
      throw new ScanSyncError('validation', `Scan ${record.id} is ${record.status}; only pending scans can be processed`);
    }
    const remoteId = record.remoteId;
    if (!remoteId) throw errorFromCode('INVALID_SCAN_ID');

    const taskId = `process:${record.id}`;
    const controller = this.abortRegistry.register(taskId);
    const { signal } = controller;
    try {
      log.log(`Submitting processing job for ${record.id} (${remoteId})`);
      const job = await this.api.submitProcessingJob(remoteId, signal);
      if (signal.aborted) return this.store.require(record.id);
      if (!job.accepted) {
        return this.failRecord(record.id, errorFromCode(job.code, job.message));
      }
      const sizeBytes = record.metadata.dataSizeBytes ?? 0;
      const next = await this.store.transition(record.id, 'processing', 'action', {
        processingMessage: sizeBytes > 0
          ? `Processing on server (about ${formatEstimate(sizeBytes)} min)`
          : 'Processing on server...',
      });
      this.pollers.start(record.id);
      return next;
    } catch (error) {
      if (signal.aborted || isAbortError(error)) return this.store.require(record.id);
      return this.failRecord(record.id, error);
    } finally {
      this.abortRegistry.unregister(taskId, controller);
    }
  }

  /** Model already on disk: straight to uploaded, tell the server, skip processing. */
  private async repair(record: ScanRecord): Promise<ScanRecord> {
    log.log(`Repairing ${record.id}: model already exists`);
    const next = await this.store.transition(record.id, 'uploaded', 'repair');
    await this.informServer(next);
    return next;
  }

  private async informServer(record: ScanRecord): Promise<void> {
    if (!record.remoteId) return;
    try {
      await this.api.updateScanStatus(record.remoteId, 'uploaded');
    } catch (error) {
      const message = `Could not update server status for ${record.metadata.name || record.id}: ${errorMessage(error)}`;
      log.warn(`⚠️ ${message}`);
      this.syncState.recordError(message);
    }
  }

  private async failRecord(scanId: string, error: unknown): Promise<ScanRecord> {
    const lastError = toScanError(error);
    log.warn(`❌ ${scanId} failed: ${lastError.message}`);
    const current = this.store.require(scanId);
    if (current.status === 'failed' || current.status === 'uploaded' || current.status === 'completed') {
      return this.store.update(scanId, { lastError });
    }
    return this.store.transition(scanId, 'failed', 'action', { lastError });
  }
}
