import type { ScanRecord } from './scan-types';
import type { S3JsonStore } from './s3-config';
import { scanSnapshotSchema, type ScanSnapshot } from './validation';

export const SCAN_RECORDS_KEY = 'scan-records';

/** Where the store keeps its records between sessions. */
export interface ScanRecordPersistence {
  load(): Promise<ScanRecord[]>;
  save(records: ScanRecord[]): Promise<void>;
}

function toSnapshot(records: ScanRecord[]): ScanSnapshot {
  return { version: 1, savedAt: new Date().toISOString(), records };
}

export class S3ScanRecordPersistence implements ScanRecordPersistence {
  constructor(
    private readonly store: S3JsonStore,
    private readonly key: string = SCAN_RECORDS_KEY
  ) {}

  async load(): Promise<ScanRecord[]> {
    const snapshot = await this.store.getConfig(this.key, scanSnapshotSchema);
    return snapshot?.records ?? [];
  }

  async save(records: ScanRecord[]): Promise<void> {
    await this.store.putConfig(this.key, toSnapshot(records));
  }
}

/** Keeps the last saved snapshot in memory; also what tests persist into. */
export class InMemoryScanRecordPersistence implements ScanRecordPersistence {
  private snapshot: ScanSnapshot | null = null;
  saveCount = 0;

  constructor(initial: ScanRecord[] = []) {
    if (initial.length > 0) this.snapshot = toSnapshot(initial);
  }

  async load(): Promise<ScanRecord[]> {
    return this.snapshot ? this.snapshot.records.map(record => ({ ...record })) : [];
  }

  async save(records: ScanRecord[]): Promise<void> {
    this.saveCount++;
    this.snapshot = toSnapshot(records.map(record => ({ ...record })));
  }

  lastSaved(): ScanRecord[] {
    return this.snapshot?.records ?? [];
  }
}
