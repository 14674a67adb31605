/**
 * Status normalization: every raw status token, whether it comes from local capture
 * metadata or from the scan API, is mapped onto the canonical ScanStatus here and
 * nowhere else.
 */

import type { ScanRecord, ScanStatus } from './scan-types';
import { userMessageFor } from './errors';

/**
 * Synonym table. Keys are lower-case, whitespace and dashes folded to underscores.
 * `uploaded` and `syncing` are the same post-upload state in both vocabularies.
 */
const STATUS_SYNONYMS: Readonly<Record<string, ScanStatus>> = {
  pending: 'pending',
  initialized: 'pending',
  queued: 'pending',
  scheduled: 'pending',
  created: 'pending',
  new: 'pending',
  uploading: 'uploading',
  syncing: 'uploaded',
  uploaded: 'uploaded',
  upload_complete: 'uploaded',
  processing: 'processing',
  running: 'processing',
  in_progress: 'processing',
  completed: 'completed',
  complete: 'completed',
  done: 'completed',
  success: 'completed',
  failed: 'failed',
  error: 'failed',
};

/** Statuses after which nothing changes without an explicit user action. */
const TERMINAL_STATUSES: ReadonlySet<ScanStatus> = new Set<ScanStatus>(['uploaded', 'completed', 'failed']);

function foldToken(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

/**
 * Map a raw status token onto the canonical status. Unknown, empty or non-string
 * input yields 'pending'; this never throws.
 */
export function normalizeStatus(raw: unknown): ScanStatus {
  if (typeof raw !== 'string') return 'pending';
  const key = foldToken(raw);
  return Object.prototype.hasOwnProperty.call(STATUS_SYNONYMS, key) ? STATUS_SYNONYMS[key] : 'pending';
}

export function isKnownStatusToken(raw: string): boolean {
  return Object.prototype.hasOwnProperty.call(STATUS_SYNONYMS, foldToken(raw));
}

export function statusSynonyms(): Array<[string, ScanStatus]> {
  return Object.entries(STATUS_SYNONYMS);
}

export function isTerminalStatus(status: ScanStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function isInProgressStatus(status: ScanStatus): boolean {
  return status === 'uploading' || status === 'syncing' || status === 'processing';
}

const STATUS_LABELS: Record<ScanStatus, string> = {
  pending: 'Pending',
  uploading: 'Uploading',
  syncing: 'Syncing',
  processing: 'Processing',
  uploaded: 'Uploaded',
  completed: 'Completed',
  failed: 'Failed',
};

export function statusLabel(status: ScanStatus): string {
  return STATUS_LABELS[status];
}

/** Rough server/device processing time: 2 minutes per 50 MB. */
export function estimateProcessingMinutes(sizeBytes: number): number {
  if (!Number.isFinite(sizeBytes) || sizeBytes <= 0) return 0;
  const sizeMb = sizeBytes / (1024 * 1024);
  return (sizeMb / 50) * 2;
}

export function formatEstimate(sizeBytes: number): string {
  return estimateProcessingMinutes(sizeBytes).toFixed(1);
}

function localStatusMessage(record: Pick<ScanRecord, 'status' | 'lastError'>): string {
  switch (record.status) {
    case 'uploaded':
      return 'Tap to view 3D model';
    case 'uploading':
    case 'syncing':
    case 'processing':
      return 'Processing model...';
    case 'failed':
      return `Model processing failed: ${userMessageFor(record.lastError)}`;
    case 'pending':
    case 'completed':
    default:
      return 'Data has not been processed. Tap to process the model.';
  }
}

function remoteStatusMessage(record: Pick<ScanRecord, 'status' | 'lastError'>): string {
  switch (record.status) {
    case 'completed':
      return 'Scan completed and available for viewing';
    case 'processing':
    case 'syncing':
      return 'Scan is being processed on the server. This may take several minutes.';
    case 'uploaded':
      return 'Scan uploaded successfully';
    case 'failed':
      return `Scan processing failed: ${userMessageFor(record.lastError)}`;
    case 'pending':
    case 'uploading':
    default:
      return 'Scan is pending processing';
  }
}

/** Human-readable status line for a record, in the vocabulary of its source. */
export function statusMessage(record: Pick<ScanRecord, 'status' | 'source' | 'lastError'>): string {
  return record.source === 'local' ? localStatusMessage(record) : remoteStatusMessage(record);
}
