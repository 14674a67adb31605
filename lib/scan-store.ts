/**
 * ScanRecord store: the single source of truth the presentation layer observes.
 *
 * Writes are serialized through one queue, so concurrent updates to the same record
 * apply in arrival order and each field group (metadata, artifacts, error, ...) is
 * last-writer-wins. Status only changes through `transition` and `transitionIf`,
 * which check the lifecycle table against the record as it is when the write runs,
 * not when it was requested. Records entering the store have their status folded
 * into their source's vocabulary.
 *
 * Persistence writes are coalesced: at most one in flight, and only the latest
 * snapshot is written after it.
 */

import type { ScanRecord, ScanRecordPatch, ScanStatus } from './scan-types';
import { checkTransition, projectStatusForSource, type TransitionReason } from './scan-lifecycle';
import { ScanSyncError, errorMessage } from './errors';
import type { ScanRecordPersistence } from './scan-persistence';
import { scopedLogger } from './logger';

const log = scopedLogger('STORE');

export type StoreListener = (change: { record: ScanRecord | null; removedId?: string; records: ScanRecord[] }) => void;

export interface ScanRecordStoreOptions {
  persistence?: ScanRecordPersistence;
  now?: () => Date;
}

/** Fold a record's status into its source's vocabulary before it enters the store. */
function withSourceStatus(record: ScanRecord): ScanRecord {
  const status = projectStatusForSource(record.status, record.source);
  if (status === record.status) return record;
  log.warn(`${record.id}: ${record.source} scan cannot be ${record.status}, stored as ${status}`);
  return { ...record, status };
}

function applyPatch(record: ScanRecord, patch: ScanRecordPatch, timestamp: string): ScanRecord {
  const next: ScanRecord = {
    ...record,
    metadata: { ...record.metadata, ...patch.metadata, updatedAt: timestamp },
  };
  if (patch.remoteId !== undefined) next.remoteId = patch.remoteId;
  if (patch.artifactPaths) next.artifactPaths = { ...record.artifactPaths, ...patch.artifactPaths };
  if (patch.lastError === null) delete next.lastError;
  else if (patch.lastError) next.lastError = patch.lastError;
  if (patch.processingMessage === null) delete next.processingMessage;
  else if (patch.processingMessage !== undefined) next.processingMessage = patch.processingMessage;
  return next;
}

export class ScanRecordStore {
  private readonly records = new Map<string, ScanRecord>();
  private readonly listeners = new Set<StoreListener>();
  private readonly persistence?: ScanRecordPersistence;
  private readonly now: () => Date;
  private queue: Promise<unknown> = Promise.resolve();
  private writeInFlight: Promise<void> | null = null;
  private pendingSnapshot = false;

  constructor(options: ScanRecordStoreOptions = {}) {
    this.persistence = options.persistence;
    this.now = options.now ?? (() => new Date());
  }

  /** Replace the in-memory contents with the persisted snapshot, if there is one. */
  async load(): Promise<number> {
    if (!this.persistence) return 0;
    const saved = await this.persistence.load();
    return this.enqueue(() => {
      this.records.clear();
      for (const record of saved) {
        this.records.set(record.id, withSourceStatus(record));
      }
      log.log(`Loaded ${saved.length} scan records`);
      this.emit(null);
      return saved.length;
    });
  }

  get(id: string): ScanRecord | undefined {
    return this.records.get(id);
  }

  require(id: string): ScanRecord {
    if (!id) {
      throw new ScanSyncError('validation', 'Scan id is required', { code: 'INVALID_SCAN_ID' });
    }
    const record = this.records.get(id);
    if (!record) {
      throw new ScanSyncError('validation', `Scan not found: ${id}`, { code: 'INVALID_SCAN_ID' });
    }
    return record;
  }

  findByRemoteId(remoteId: string): ScanRecord | undefined {
    for (const record of this.records.values()) {
      if (record.remoteId === remoteId) return record;
    }
    return undefined;
  }

  findByFolderPath(folderPath: string): ScanRecord | undefined {
    for (const record of this.records.values()) {
      if (record.artifactPaths?.folderPath === folderPath) return record;
    }
    return undefined;
  }

  /** All records, newest first. */
  all(): ScanRecord[] {
    return [...this.records.values()].sort(
      (a, b) => new Date(b.metadata.createdAt).getTime() - new Date(a.metadata.createdAt).getTime()
    );
  }

  filter(predicate: (record: ScanRecord) => boolean): ScanRecord[] {
    return this.all().filter(predicate);
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  add(record: ScanRecord): Promise<ScanRecord> {
    return this.enqueue(() => {
      if (this.records.has(record.id)) {
        throw new ScanSyncError('validation', `Scan already exists: ${record.id}`);
      }
      const stored = withSourceStatus(record);
      this.records.set(stored.id, stored);
      this.emit(stored);
      return stored;
    });
  }

  /** Merge field groups into a record. Does not touch `status`. */
  update(id: string, patch: ScanRecordPatch): Promise<ScanRecord> {
    return this.enqueue(() => {
      const next = applyPatch(this.require(id), patch, this.timestamp());
      this.records.set(id, next);
      this.emit(next);
      return next;
    });
  }

  /**
   * Move a record to `to`. Entering `pending` by retry clears the error; entering
   * `failed` without an error attaches a generic one. Leaving an in-progress state
   * clears the processing sub-status.
   */
  transition(id: string, to: ScanStatus, reason: TransitionReason = 'action', patch: ScanRecordPatch = {}): Promise<ScanRecord> {
    return this.enqueue(() => this.applyTransition(this.require(id), to, reason, patch));
  }

  /**
   * Transition only if the record is still `from` when the write runs; otherwise
   * resolves to null and leaves the record alone. `from === to` merges the patch.
   */
  transitionIf(
    id: string,
    from: ScanStatus,
    to: ScanStatus,
    reason: TransitionReason = 'action',
    patch: ScanRecordPatch = {}
  ): Promise<ScanRecord | null> {
    return this.enqueue(() => {
      const current = this.require(id);
      if (current.status !== from) return null;
      if (from === to) {
        const next = applyPatch(current, patch, this.timestamp());
        this.records.set(id, next);
        this.emit(next);
        return next;
      }
      return this.applyTransition(current, to, reason, patch);
    });
  }

  /**
   * Apply a status reported from outside (server refresh, capture metadata). The
   * canonical value is projected onto the record's source first; an unchanged
   * status only merges the patch.
   */
  applyObserved(id: string, canonical: ScanStatus, patch: ScanRecordPatch = {}): Promise<ScanRecord> {
    return this.enqueue(() => {
      const current = this.require(id);
      const to = projectStatusForSource(canonical, current.source);
      if (to === current.status) {
        const next = applyPatch(current, patch, this.timestamp());
        this.records.set(id, next);
        this.emit(next);
        return next;
      }
      return this.applyTransition(current, to, 'observed', patch);
    });
  }

  private applyTransition(current: ScanRecord, to: ScanStatus, reason: TransitionReason, patch: ScanRecordPatch): ScanRecord {
    checkTransition(current, to, reason);

    const effective: ScanRecordPatch = { ...patch };
    if (to === 'failed' && !patch.lastError) {
      effective.lastError = { kind: 'server', message: 'Scan processing failed.' };
    }
    if (to !== 'failed' && patch.lastError === undefined) {
      effective.lastError = null;
    }
    if (to !== 'uploading' && to !== 'processing' && patch.processingMessage === undefined) {
      effective.processingMessage = null;
    }

    const next: ScanRecord = { ...applyPatch(current, effective, this.timestamp()), status: to };
    this.records.set(current.id, next);
    log.debug(`${current.id}: ${current.status} -> ${to} (${reason})`);
    this.emit(next);
    return next;
  }

  remove(id: string): Promise<boolean> {
    return this.enqueue(() => {
      const existed = this.records.delete(id);
      if (existed) this.emit(null, id);
      return existed;
    });
  }

  /** Resolves once every queued write and the latest persistence write have finished. */
  async flush(): Promise<void> {
    await this.queue;
    while (this.writeInFlight) {
      await this.writeInFlight;
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private enqueue<T>(fn: () => T): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private emit(record: ScanRecord | null, removedId?: string): void {
    const records = this.all();
    for (const listener of [...this.listeners]) {
      try {
        listener({ record, removedId, records });
      } catch (error) {
        log.error('Store listener threw', error);
      }
    }
    this.schedulePersist();
  }

  private schedulePersist(): void {
    if (!this.persistence) return;
    if (this.writeInFlight) {
      this.pendingSnapshot = true;
      return;
    }
    this.writeInFlight = this.persistLatest();
  }

  private async persistLatest(): Promise<void> {
    const persistence = this.persistence;
    if (!persistence) return;
    try {
      do {
        this.pendingSnapshot = false;
        try {
          await persistence.save([...this.records.values()]);
        } catch (error) {
          log.warn(`Persisting scan records failed: ${errorMessage(error)}`);
        }
      } while (this.pendingSnapshot);
    } finally {
      this.writeInFlight = null;
    }
  }
}
