/**
 * Readiness retry downloader: probe → wait → probe ... → stream.
 *
 * Server-side exports are prepared asynchronously; until then the artifact URL
 * answers 404/403. Each not-ready probe counts one retry and waits a fixed delay.
 * Past the retry ceiling the session fails with a timeout, which is reported
 * separately from network failures and from cancellation (not an error at all).
 *
 * Every session delivers at most one terminal callback. Cancelling settles the
 * session on the spot; whatever the in-flight probe or stream does afterwards is
 * dropped.
 */

import * as crypto from 'crypto';
import type {
  DownloadOutcome,
  DownloadRequest,
  DownloadSnapshot,
  ScanError,
} from './scan-types';
import type { ArtifactSink, ScanApi } from './collaborators';
import type { ArtifactStorage } from './artifact-storage';
import { ScanSyncError, errorFromCode, errorMessage, isAbortError, isRetryable, toScanError } from './errors';
import { runRetryLoop, type Sleep } from './retry';
import { AbortRegistry } from './sync/sync-abort-registry';
import { scopedLogger } from './logger';

const log = scopedLogger('DOWNLOAD');

export const DEFAULT_MAX_RETRIES = 24;
export const DEFAULT_RETRY_DELAY_MS = 5_000;

/** Settled sessions kept around for inspection and retryDownload(). */
const MAX_SETTLED_SESSIONS = 20;

export interface DownloadCallbacks {
  onStateChange?: (snapshot: DownloadSnapshot) => void;
  onProgress?: (snapshot: DownloadSnapshot) => void;
  onComplete?: (filePath: string, snapshot: DownloadSnapshot) => void;
  onError?: (error: ScanError, snapshot: DownloadSnapshot) => void;
  onCancelled?: (snapshot: DownloadSnapshot) => void;
}

export interface DownloadHandle {
  sessionId: string;
  /** Resolves once with the session outcome; never rejects. */
  done: Promise<DownloadOutcome>;
  cancel: () => boolean;
}

export interface ReadinessRetryDownloaderOptions {
  api: ScanApi;
  storage: ArtifactStorage;
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: Sleep;
  abortRegistry?: AbortRegistry;
}

interface Session {
  snapshot: DownloadSnapshot;
  callbacks: DownloadCallbacks;
  controller: AbortController;
  settled: boolean;
  resolve: (outcome: DownloadOutcome) => void;
}

export class ReadinessRetryDownloader {
  private readonly api: ScanApi;
  private readonly storage: ArtifactStorage;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep?: Sleep;
  private readonly abortRegistry: AbortRegistry;
  private readonly active = new Map<string, Session>();
  private readonly settled = new Map<string, DownloadSnapshot>();

  constructor(options: ReadinessRetryDownloaderOptions) {
    this.api = options.api;
    this.storage = options.storage;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.sleep = options.sleep;
    this.abortRegistry = options.abortRegistry ?? new AbortRegistry();
  }

  start(request: DownloadRequest, callbacks: DownloadCallbacks = {}): DownloadHandle {
    if (!request.url) {
      throw new ScanSyncError('validation', 'Download URL is required', { code: 'INVALID_PATH' });
    }
    if (!request.fileName) {
      throw new ScanSyncError('validation', 'Download file name is required', { code: 'INVALID_PATH' });
    }

    const sessionId = `download-${crypto.randomUUID()}`;
    const controller = this.abortRegistry.register(sessionId);
    let resolve: (outcome: DownloadOutcome) => void = () => undefined;
    const done = new Promise<DownloadOutcome>((r) => {
      resolve = r;
    });

    const session: Session = {
      snapshot: { sessionId, request, state: 'preparing', progress: null, retryCount: 0 },
      callbacks,
      controller,
      settled: false,
      resolve,
    };
    this.active.set(sessionId, session);
    log.log(`Session ${sessionId} started for ${request.fileName}`);

    this.run(session).catch((error: unknown) => {
      this.fail(session, toScanError(error));
    });

    return { sessionId, done, cancel: () => this.cancel(sessionId) };
  }

  /** Idempotent; returns false when the session is unknown or already settled. */
  cancel(sessionId: string): boolean {
    const session = this.active.get(sessionId);
    if (!session || session.settled) return false;
    session.controller.abort();
    log.log(`🛑 Session ${sessionId} cancelled`);
    this.settle(session, { state: 'cancelled', retryCount: session.snapshot.retryCount });
    return true;
  }

  /** Restart a session that failed with a retryable error, as a new session. */
  retry(sessionId: string, callbacks: DownloadCallbacks = {}): DownloadHandle {
    const previous = this.settled.get(sessionId);
    if (!previous || previous.state !== 'failed') {
      throw new ScanSyncError('validation', `Download ${sessionId} is not a failed session`);
    }
    if (!isRetryable(previous.error)) {
      throw new ScanSyncError(
        'validation',
        `Download ${sessionId} failed with a ${previous.error?.kind ?? 'unknown'} error and cannot be retried`
      );
    }
    this.settled.delete(sessionId);
    return this.start(previous.request, callbacks);
  }

  get(sessionId: string): DownloadSnapshot | undefined {
    const session = this.active.get(sessionId);
    if (session) return { ...session.snapshot };
    const snapshot = this.settled.get(sessionId);
    return snapshot ? { ...snapshot } : undefined;
  }

  activeSessions(): DownloadSnapshot[] {
    return [...this.active.values()].map((session) => ({ ...session.snapshot }));
  }

  dispose(): void {
    for (const sessionId of [...this.active.keys()]) {
      this.cancel(sessionId);
    }
  }

  private async run(session: Session): Promise<void> {
    const { request } = session.snapshot;
    const { signal } = session.controller;

    const probe = await runRetryLoop<true>({
      attempt: async (_attempt, attemptSignal) => {
        const result = await this.api.probeArtifact(request.url, attemptSignal);
        if (result === 'ready') return { done: true, value: true };
        if (result === 'failed') throw errorFromCode('PREPARATION_FAILED');
        return { done: false, reason: 'not ready' };
      },
      delayMs: this.retryDelayMs,
      maxRetries: this.maxRetries,
      signal,
      sleep: this.sleep,
      onRetry: (retryCount) => {
        if (session.settled) return;
        log.debug(`${request.fileName} not ready, retry ${retryCount}/${this.maxRetries}`);
        this.setSnapshot(session, { retryCount });
        this.notify(session, 'onStateChange');
      },
    }).catch((error: unknown) => {
      if (signal.aborted || isAbortError(error)) return null;
      throw error;
    });

    if (probe === null || session.settled) return;

    if (probe.outcome === 'exhausted') {
      this.fail(session, new ScanSyncError(
        'timeout',
        `File preparation timed out after ${this.maxRetries} retries. Please try again later.`
      ).toScanError());
      return;
    }

    await this.download(session);
  }

  private async download(session: Session): Promise<void> {
    const { request } = session.snapshot;
    const { signal } = session.controller;
    this.setSnapshot(session, { state: 'downloading', progress: null });
    this.notify(session, 'onStateChange');

    let sink: ArtifactSink | null = null;
    try {
      sink = await this.storage.createSink(request.fileName);
      await this.api.downloadArtifact(
        request.url,
        sink,
        ({ received, total }) => {
          if (session.settled) return;
          const progress = total && total > 0 ? Math.min(1, received / total) : null;
          this.setSnapshot(session, { progress });
          this.notify(session, 'onProgress');
        },
        signal
      );
      if (session.settled || signal.aborted) {
        await sink.abort();
        return;
      }
      const filePath = await sink.close();
      if (session.settled || signal.aborted) {
        await this.storage.remove(filePath).catch((removeError: unknown) => {
          log.warn(`Could not remove cancelled ${request.fileName}: ${errorMessage(removeError)}`);
        });
        return;
      }
      log.log(`✅ ${request.fileName} saved to ${filePath}`);
      this.settle(session, { state: 'complete', filePath, retryCount: session.snapshot.retryCount });
    } catch (error) {
      if (sink) {
        await sink.abort().catch((abortError: unknown) => {
          log.warn(`Could not discard partial ${request.fileName}: ${errorMessage(abortError)}`);
        });
      }
      if (session.settled || signal.aborted || isAbortError(error)) return;
      this.fail(session, toScanError(error));
    }
  }

  private fail(session: Session, error: ScanError): void {
    if (session.settled) return;
    log.warn(`❌ ${session.snapshot.request.fileName}: ${error.message}`);
    this.settle(session, { state: 'failed', error, retryCount: session.snapshot.retryCount });
  }

  private settle(session: Session, outcome: DownloadOutcome): void {
    if (session.settled) return;
    session.settled = true;
    const patch: Partial<DownloadSnapshot> = { state: outcome.state };
    if (outcome.state === 'complete') {
      patch.filePath = outcome.filePath;
      patch.progress = 1;
    }
    if (outcome.state === 'failed') patch.error = outcome.error;
    this.setSnapshot(session, patch);

    const { sessionId } = session.snapshot;
    this.active.delete(sessionId);
    this.abortRegistry.unregister(sessionId, session.controller);
    this.settled.set(sessionId, { ...session.snapshot });
    while (this.settled.size > MAX_SETTLED_SESSIONS) {
      const oldest = this.settled.keys().next();
      if (oldest.done) break;
      this.settled.delete(oldest.value);
    }

    const snapshot = { ...session.snapshot };
    this.invoke(() => session.callbacks.onStateChange?.(snapshot));
    switch (outcome.state) {
      case 'complete':
        this.invoke(() => session.callbacks.onComplete?.(outcome.filePath, snapshot));
        break;
      case 'failed':
        this.invoke(() => session.callbacks.onError?.(outcome.error, snapshot));
        break;
      case 'cancelled':
        this.invoke(() => session.callbacks.onCancelled?.(snapshot));
        break;
    }
    session.resolve(outcome);
  }

  private setSnapshot(session: Session, patch: Partial<DownloadSnapshot>): void {
    session.snapshot = { ...session.snapshot, ...patch };
  }

  private notify(session: Session, callback: 'onStateChange' | 'onProgress'): void {
    if (session.settled) return;
    const snapshot = { ...session.snapshot };
    this.invoke(() => session.callbacks[callback]?.(snapshot));
  }

  private invoke(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      log.error('Download callback threw', error);
    }
  }
}
