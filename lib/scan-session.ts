/**
 * One application session: builds the store, sync state, connectivity monitor,
 * pollers, downloader, dispatcher and orchestrator, wires them together and
 * exposes the operations the presentation layer calls.
 *
 * Nothing here is global. Two sessions share no state; `dispose()` cancels every
 * background task the session started.
 */

import * as crypto from 'crypto';
import type {
  DownloadRequest,
  ScanRecord,
  SyncResult,
  SyncState,
} from './scan-types';
import type {
  CaptureCapability,
  CaptureResult,
  LocalProcessingCapability,
  RemoteScanSnapshot,
  ScanApi,
} from './collaborators';
import { ScanRecordStore, type StoreListener } from './scan-store';
import type { ScanRecordPersistence } from './scan-persistence';
import { InMemoryAutoSyncSettings, type AutoSyncSettings } from './auto-sync-settings';
import { ConnectivityMonitor, type ConnectivityProbe, type TransitionListener } from './connectivity-monitor';
import { FileArtifactStorage, type ArtifactStorage } from './artifact-storage';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  ReadinessRetryDownloader,
  type DownloadCallbacks,
  type DownloadHandle,
} from './readiness-downloader';
import { DEFAULT_POLL_INTERVAL_MS, StatusPollerRegistry, applyRemoteSnapshot } from './status-poller';
import { ProcessingDispatcher } from './processing-dispatcher';
import { ScanEventChannel, type CaptureCompletePayload, type ScanEvent } from './scan-events';
import { AbortRegistry, SyncOrchestrator, SyncStateStore, DEFAULT_RECENT_ERRORS_CAP } from './sync';
import type { SyncStateListener } from './sync';
import { projectStatusForSource } from './scan-lifecycle';
import { normalizeStatus } from './scan-status';
import { ScanSyncError, errorFromCode, errorMessage } from './errors';
import type { Sleep } from './retry';
import { scopedLogger } from './logger';

const log = scopedLogger('SESSION');

export interface ScanSessionTuning {
  pollIntervalMs: number;
  probeDelayMs: number;
  maxReadinessRetries: number;
  recentErrorsCap: number;
  syncConcurrency: number;
  downloadsDir: string;
  /** Reachability probe cadence when a connectivity probe is given. */
  connectivityProbeIntervalMs: number;
}

export const DEFAULT_SESSION_TUNING: ScanSessionTuning = {
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  probeDelayMs: DEFAULT_RETRY_DELAY_MS,
  maxReadinessRetries: DEFAULT_MAX_RETRIES,
  recentErrorsCap: DEFAULT_RECENT_ERRORS_CAP,
  syncConcurrency: 2,
  downloadsDir: './Downloads',
  connectivityProbeIntervalMs: 15_000,
};

export interface ScanSessionDeps {
  api: ScanApi;
  capture?: CaptureCapability;
  localProcessing?: LocalProcessingCapability;
  settings?: AutoSyncSettings;
  persistence?: ScanRecordPersistence;
  storage?: ArtifactStorage;
  connectivityProbe?: ConnectivityProbe;
  tuning?: Partial<ScanSessionTuning>;
  /** Replaces every fixed-delay wait (pollers, readiness probes, connectivity probes). */
  sleep?: Sleep;
  now?: () => Date;
}

/** Capture timestamps arrive as ISO strings or epoch seconds/milliseconds. */
function toIsoTimestamp(raw: string | undefined, fallback: Date): string {
  if (!raw) return fallback.toISOString();
  const numeric = Number(raw);
  const date = Number.isFinite(numeric)
    ? new Date(numeric < 1e12 ? numeric * 1000 : numeric)
    : new Date(raw);
  return Number.isNaN(date.getTime()) ? fallback.toISOString() : date.toISOString();
}

export class ScanSession {
  readonly store: ScanRecordStore;
  readonly syncState: SyncStateStore;
  readonly connectivity: ConnectivityMonitor;
  readonly events: ScanEventChannel;
  readonly downloader: ReadinessRetryDownloader;
  readonly pollers: StatusPollerRegistry;
  readonly dispatcher: ProcessingDispatcher;
  readonly orchestrator: SyncOrchestrator;

  private readonly api: ScanApi;
  private readonly capture?: CaptureCapability;
  private readonly connectivityProbe?: ConnectivityProbe;
  private readonly tuning: ScanSessionTuning;
  private readonly abortRegistry = new AbortRegistry();
  private readonly sleep?: Sleep;
  private readonly now: () => Date;
  private detachOrchestrator: (() => void) | null = null;
  private dispatchLoop: Promise<void> | null = null;
  private started = false;
  private disposed = false;

  constructor(deps: ScanSessionDeps) {
    this.api = deps.api;
    this.capture = deps.capture;
    this.connectivityProbe = deps.connectivityProbe;
    this.tuning = { ...DEFAULT_SESSION_TUNING, ...deps.tuning };
    this.sleep = deps.sleep;
    this.now = deps.now ?? (() => new Date());

    this.store = new ScanRecordStore({ persistence: deps.persistence, now: this.now });
    this.syncState = new SyncStateStore(this.tuning.recentErrorsCap);
    this.connectivity = new ConnectivityMonitor();
    this.events = new ScanEventChannel();

    this.downloader = new ReadinessRetryDownloader({
      api: this.api,
      storage: deps.storage ?? new FileArtifactStorage(this.tuning.downloadsDir),
      maxRetries: this.tuning.maxReadinessRetries,
      retryDelayMs: this.tuning.probeDelayMs,
      sleep: this.sleep,
      abortRegistry: this.abortRegistry,
    });
    this.pollers = new StatusPollerRegistry({
      api: this.api,
      store: this.store,
      syncState: this.syncState,
      intervalMs: this.tuning.pollIntervalMs,
      sleep: this.sleep,
      abortRegistry: this.abortRegistry,
    });
    this.dispatcher = new ProcessingDispatcher({
      store: this.store,
      api: this.api,
      syncState: this.syncState,
      pollers: this.pollers,
      localProcessing: deps.localProcessing,
      connectivity: this.connectivity,
      abortRegistry: this.abortRegistry,
    });
    this.orchestrator = new SyncOrchestrator({
      store: this.store,
      api: this.api,
      syncState: this.syncState,
      settings: deps.settings ?? new InMemoryAutoSyncSettings(),
      connectivity: this.connectivity,
      abortRegistry: this.abortRegistry,
      concurrency: this.tuning.syncConcurrency,
    });
  }

  /** Load persisted state, wire the components and start background work. */
  async start(): Promise<void> {
    if (this.disposed) throw new ScanSyncError('validation', 'Session has been disposed');
    if (this.started) return;
    this.started = true;

    const loaded = await this.store.load();
    try {
      await this.orchestrator.loadSettings();
    } catch (error) {
      log.warn(`Could not load auto-sync setting: ${errorMessage(error)}`);
      this.syncState.recordError(`Failed to load auto-sync setting: ${errorMessage(error)}`);
    }
    this.detachOrchestrator = this.orchestrator.attach();

    this.dispatchLoop = this.events
      .consume(
        (event) => this.handleEvent(event),
        (error, event) => {
          log.error(`Handling ${event.type} failed`, error);
          this.syncState.recordError(`${event.type}: ${errorMessage(error)}`);
        }
      )
      .catch((error: unknown) => {
        log.error('Event dispatch loop stopped', error);
      });

    const polling = this.pollers.startAll();
    if (this.connectivityProbe) {
      this.connectivity.startProbing(this.connectivityProbe, this.tuning.connectivityProbeIntervalMs, this.sleep);
    }
    log.log(`Session started: ${loaded} scans loaded, ${polling} pollers running`);
  }

  /** Cancel everything the session started and flush the store. Safe to call twice. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    this.events.close();
    this.detachOrchestrator?.();
    this.detachOrchestrator = null;
    this.pollers.stopAll();
    this.downloader.dispose();
    this.dispatcher.cancelAll();
    this.orchestrator.cancel();
    this.connectivity.dispose();
    const aborted = this.abortRegistry.abortAll();

    await this.dispatchLoop;
    await this.store.flush();
    log.log(`Session disposed (${aborted} tasks aborted)`);
  }

  subscribeRecords(listener: StoreListener): () => void {
    return this.store.subscribe(listener);
  }

  subscribeSyncState(listener: SyncStateListener): () => void {
    return this.syncState.subscribe(listener);
  }

  subscribeConnectivity(listener: TransitionListener): () => void {
    return this.connectivity.onTransition(listener);
  }

  getRecords(): ScanRecord[] {
    return this.store.all();
  }

  getSyncState(): SyncState {
    return this.syncState.get();
  }

  /** Start the native capture; the record is created when captureComplete arrives. */
  async captureScan(): Promise<CaptureResult> {
    if (!this.capture) {
      throw new ScanSyncError('validation', 'Scan capture is not available on this device');
    }
    const result = await this.capture.startCapture();
    if (!result.started) {
      throw errorFromCode('AR_SESSION_ERROR');
    }
    return result;
  }

  processScan(scanId: string): Promise<ScanRecord> {
    return this.dispatcher.processScan(scanId);
  }

  retryProcessing(scanId: string): Promise<ScanRecord> {
    return this.dispatcher.retryProcessing(scanId);
  }

  triggerManualSync(): Promise<SyncResult> {
    return this.orchestrator.syncAll('manual');
  }

  uploadScan(scanId: string): Promise<boolean> {
    return this.orchestrator.uploadScan(scanId);
  }

  toggleAutoSync(enabled: boolean): Promise<boolean> {
    return this.orchestrator.toggleAutoSync(enabled);
  }

  startDownload(request: DownloadRequest, callbacks?: DownloadCallbacks): DownloadHandle {
    return this.downloader.start(request, callbacks);
  }

  cancelDownload(sessionId: string): boolean {
    return this.downloader.cancel(sessionId);
  }

  retryDownload(sessionId: string, callbacks?: DownloadCallbacks): DownloadHandle {
    return this.downloader.retry(sessionId, callbacks);
  }

  clearErrors(): void {
    this.syncState.clearErrors();
  }

  /**
   * Merge the server's scan list into the store by remote id and poll every
   * remote scan that is still moving. Returns the number of scans listed.
   */
  async refreshRemoteScans(): Promise<number> {
    let snapshots: RemoteScanSnapshot[];
    try {
      snapshots = await this.api.listScans();
    } catch (error) {
      this.syncState.recordError(`Failed to refresh scans: ${errorMessage(error)}`);
      throw error;
    }

    for (const snapshot of snapshots) {
      const existing = this.store.findByRemoteId(snapshot.remoteId);
      if (!existing) {
        await this.store.add(this.remoteRecordFrom(snapshot));
      } else if (existing.source === 'remote') {
        await applyRemoteSnapshot(this.store, existing.id, snapshot);
      }
    }
    this.pollers.startAll();
    log.log(`Refreshed ${snapshots.length} remote scans`);
    return snapshots.length;
  }

  /** Create the local record for a finished capture, or merge into the one already there. */
  async ingestCapture(payload: CaptureCompletePayload): Promise<ScanRecord> {
    const existing = this.store.findByFolderPath(payload.folderPath)
      ?? (payload.scanID ? this.store.get(payload.scanID) : undefined);
    const createdAt = toIsoTimestamp(payload.timestamp, this.now());

    if (existing) {
      const metadata: Partial<ScanRecord['metadata']> = {};
      if (payload.name) metadata.name = payload.name;
      if (payload.locationName) metadata.locationName = payload.locationName;
      if (payload.coordinates) metadata.coordinates = payload.coordinates;
      if (payload.imageCount !== undefined) metadata.imageCount = payload.imageCount;
      if (payload.durationSeconds !== undefined) metadata.durationSeconds = payload.durationSeconds;
      return this.store.update(existing.id, { metadata, artifactPaths: { folderPath: payload.folderPath } });
    }

    const record: ScanRecord = {
      id: payload.scanID ?? `scan-${crypto.randomUUID()}`,
      source: 'local',
      status: 'pending',
      metadata: {
        name: payload.name || `Scan ${createdAt.slice(0, 10)}`,
        locationName: payload.locationName,
        coordinates: payload.coordinates ?? [],
        imageCount: payload.imageCount ?? 0,
        durationSeconds: payload.durationSeconds ?? 0,
        createdAt,
        updatedAt: createdAt,
      },
      artifactPaths: { folderPath: payload.folderPath },
    };
    log.log(`Captured ${record.id} (${record.metadata.imageCount} images)`);
    return this.store.add(record);
  }

  private remoteRecordFrom(snapshot: RemoteScanSnapshot): ScanRecord {
    const { metadata } = snapshot;
    const createdAt = metadata.createdAt ?? this.now().toISOString();
    const record: ScanRecord = {
      id: snapshot.remoteId,
      remoteId: snapshot.remoteId,
      source: 'remote',
      status: projectStatusForSource(normalizeStatus(snapshot.status), 'remote'),
      metadata: {
        name: metadata.name || `Scan ${snapshot.remoteId}`,
        locationName: metadata.locationName,
        coordinates: metadata.coordinates ?? [],
        imageCount: metadata.imageCount ?? 0,
        durationSeconds: metadata.durationSeconds ?? 0,
        dataSizeBytes: metadata.dataSizeBytes,
        createdAt,
        updatedAt: createdAt,
      },
    };
    if (snapshot.processedModelUrl || snapshot.snapshotUrl) {
      record.artifactPaths = {};
      if (snapshot.processedModelUrl) record.artifactPaths.modelPath = snapshot.processedModelUrl;
      if (snapshot.snapshotUrl) record.artifactPaths.snapshotPath = snapshot.snapshotUrl;
    }
    if (record.status === 'failed') {
      record.lastError = { kind: 'server', message: snapshot.errorMessage || 'Scan processing failed on the server.' };
    }
    return record;
  }

  private async handleEvent(event: ScanEvent): Promise<void> {
    switch (event.type) {
      case 'captureComplete':
        await this.ingestCapture(event.payload);
        return;
      case 'processingComplete':
        await this.dispatcher.handleProcessingComplete(event.payload);
        return;
      case 'uploadComplete':
        if (event.payload.success) {
          this.syncState.update({
            lastSyncMessage: event.payload.message || 'Scan uploaded successfully',
            lastSyncTime: this.now().toISOString(),
          });
        } else {
          this.syncState.recordError(`Failed to upload scan: ${event.payload.folderPath ?? 'unknown scan'}`);
        }
        return;
      case 'connectivityChanged':
        this.connectivity.report(event.payload.isOnline);
        return;
      case 'processingStatus':
        await this.dispatcher.setProcessingMessage(event.payload.status, event.payload.folderPath);
        return;
    }
  }
}

export function createScanSession(deps: ScanSessionDeps): ScanSession {
  return new ScanSession(deps);
}
