/**
 * Which records the orchestrator has to push, and the counts derived from that.
 *
 * A local record needs sync when it failed, or when it was never registered with
 * the server (no remoteId) and is waiting at `pending` or `uploaded`. Remote
 * records are the server's own and never need pushing.
 */

import type { ScanRecord, SyncResult } from '@/lib/scan-types';

export function isAwaitingRegistration(record: ScanRecord): boolean {
  return record.source === 'local'
    && !record.remoteId
    && (record.status === 'pending' || record.status === 'uploaded');
}

export function needsSync(record: ScanRecord): boolean {
  if (record.source !== 'local') return false;
  return record.status === 'failed' || isAwaitingRegistration(record);
}

export function recordsNeedingSync(records: ScanRecord[]): ScanRecord[] {
  return records.filter(needsSync);
}

export interface SyncCounts {
  /** Local records sitting in `failed`. */
  pendingCount: number;
  /** Local records not yet registered with the server. */
  initializedCount: number;
}

export function countSyncNeeded(records: ScanRecord[]): SyncCounts {
  let pendingCount = 0;
  let initializedCount = 0;
  for (const record of records) {
    if (record.source !== 'local') continue;
    if (record.status === 'failed') pendingCount++;
    else if (isAwaitingRegistration(record)) initializedCount++;
  }
  return { pendingCount, initializedCount };
}

export function describeSyncResult(
  result: Pick<SyncResult, 'attempted' | 'succeeded' | 'failed' | 'cancelled'>,
  trigger: 'manual' | 'auto'
): string {
  if (result.cancelled) return `Sync cancelled: ${result.succeeded} of ${result.attempted} synced`;
  if (result.attempted === 0) return 'All scans are up to date';
  const prefix = trigger === 'auto' ? 'Auto-sync completed' : 'Sync completed';
  return result.failed === 0
    ? `${prefix}: ${result.succeeded} synced`
    : `${prefix}: ${result.succeeded} synced, ${result.failed} failed`;
}
