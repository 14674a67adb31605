/**
 * Scan lifecycle state machine.
 *
 * Local records end in `uploaded`, remote records end in `completed`; the two
 * sources never share a terminal-success state. All status writes in the store go
 * through `checkTransition`.
 */

import type { ScanRecord, ScanSource, ScanStatus } from './scan-types';
import { ScanSyncError } from './errors';

/**
 * - action: a user or engine step (start processing, fail, retry)
 * - observed: a status reported by the server or by local capture metadata
 * - repair: local artifact found on disk while the record was not yet `uploaded`
 */
export type TransitionReason = 'action' | 'observed' | 'repair';

type TransitionTable = Readonly<Partial<Record<ScanStatus, readonly ScanStatus[]>>>;

const ACTION_TRANSITIONS: Record<ScanSource, TransitionTable> = {
  local: {
    pending: ['uploading', 'failed'],
    uploading: ['uploaded', 'failed'],
    failed: ['pending'],
  },
  remote: {
    pending: ['processing', 'failed'],
    processing: ['completed', 'failed'],
    failed: ['pending'],
  },
};

const REACHABLE: Record<ScanSource, ReadonlySet<ScanStatus>> = {
  local: new Set<ScanStatus>(['pending', 'uploading', 'uploaded', 'failed']),
  remote: new Set<ScanStatus>(['pending', 'processing', 'completed', 'failed']),
};

const REPAIRABLE: ReadonlySet<ScanStatus> = new Set<ScanStatus>(['pending', 'uploading', 'failed']);

export function reachableStatuses(source: ScanSource): ReadonlySet<ScanStatus> {
  return REACHABLE[source];
}

/**
 * Fold a canonical status into the vocabulary of a source. The server's
 * post-upload state is "waiting for a processing request" for a remote record;
 * a local record treats a finished job as its own terminal `uploaded`.
 */
export function projectStatusForSource(status: ScanStatus, source: ScanSource): ScanStatus {
  if (source === 'remote') {
    switch (status) {
      case 'uploaded':
      case 'uploading':
        return 'pending';
      case 'syncing':
        return 'processing';
      default:
        return status;
    }
  }
  switch (status) {
    case 'completed':
    case 'syncing':
      return 'uploaded';
    case 'processing':
      return 'uploading';
    default:
      return status;
  }
}

export function canTransition(
  source: ScanSource,
  from: ScanStatus,
  to: ScanStatus,
  reason: TransitionReason = 'action'
): boolean {
  if (from === to) return false;
  if (!REACHABLE[source].has(to)) return false;
  switch (reason) {
    case 'action':
      return ACTION_TRANSITIONS[source][from]?.includes(to) ?? false;
    case 'repair':
      return source === 'local' && to === 'uploaded' && REPAIRABLE.has(from);
    case 'observed':
      return true;
  }
}

/** Throws a validation error when `to` is not a legal next status for the record. */
export function checkTransition(
  record: Pick<ScanRecord, 'id' | 'source' | 'status'>,
  to: ScanStatus,
  reason: TransitionReason = 'action'
): void {
  if (!canTransition(record.source, record.status, to, reason)) {
    throw new ScanSyncError(
      'validation',
      `Illegal ${reason} transition for ${record.source} scan ${record.id}: ${record.status} -> ${to}`,
      { code: 'INVALID_TRANSITION' }
    );
  }
}

/** A local record whose model file is already on disk should be `uploaded`. */
export function needsStatusRepair(record: ScanRecord): boolean {
  return (
    record.source === 'local' &&
    !!record.artifactPaths?.modelPath &&
    REPAIRABLE.has(record.status)
  );
}

/** Status a retry re-enters, and the path it will take. */
export function retryPlan(record: ScanRecord): { status: ScanStatus; path: 'local' | 'server' } {
  if (record.status !== 'failed') {
    throw new ScanSyncError('validation', `Scan ${record.id} is ${record.status}; only failed scans can be retried`);
  }
  return { status: 'pending', path: record.source === 'local' ? 'local' : 'server' };
}
