/**
 * Scan system types - single source of truth for scan records, sync state and downloads.
 */

export type ScanSource = 'local' | 'remote';

export type ScanStatus =
  | 'pending'
  | 'uploading'
  | 'syncing'
  | 'processing'
  | 'uploaded'
  | 'completed'
  | 'failed';

export type ScanErrorKind =
  | 'validation'
  | 'network'
  | 'timeout'
  | 'permission'
  | 'server'
  | 'cancelled';

export interface ScanError {
  kind: ScanErrorKind;
  message: string;
  /** Platform or server error code, when one was reported. */
  code?: string;
}

export interface Coordinate {
  latitude: number;
  longitude: number;
  accuracy?: number;
  timestamp?: string;
}

export interface ScanMetadata {
  name: string;
  locationName?: string;
  coordinates: Coordinate[];
  imageCount: number;
  durationSeconds: number;
  dataSizeBytes?: number;
  createdAt: string;
  updatedAt: string;
}

export interface ArtifactPaths {
  modelPath?: string;
  snapshotPath?: string;
  folderPath?: string;
}

export interface ScanRecord {
  id: string;
  remoteId?: string;
  source: ScanSource;
  status: ScanStatus;
  metadata: ScanMetadata;
  artifactPaths?: ArtifactPaths;
  lastError?: ScanError;
  /** Transient sub-status reported while processing runs ("Uploading model data..."). */
  processingMessage?: string;
}

/** Field groups of a record; concurrent writes are last-writer-wins per group. */
export interface ScanRecordPatch {
  remoteId?: string;
  metadata?: Partial<ScanMetadata>;
  artifactPaths?: Partial<ArtifactPaths>;
  lastError?: ScanError | null;
  processingMessage?: string | null;
}

export interface SyncState {
  /** null until the first connectivity signal arrives. */
  isOnline: boolean | null;
  isSyncing: boolean;
  autoSyncEnabled: boolean;
  pendingCount: number;
  initializedCount: number;
  lastSyncTime?: string;
  lastSyncMessage?: string;
  recentErrors: string[];
}

export interface SyncRecordFailure {
  scanId: string;
  error: ScanError;
}

export interface SyncResult {
  attempted: number;
  succeeded: number;
  failed: number;
  failures: SyncRecordFailure[];
  message: string;
  cancelled: boolean;
}

export type DownloadState = 'preparing' | 'downloading' | 'complete' | 'failed' | 'cancelled';

export interface DownloadRequest {
  url: string;
  /** Declared filename; the local path is derived from it. */
  fileName: string;
  scanId?: string;
}

export type DownloadOutcome =
  | { state: 'complete'; filePath: string; retryCount: number }
  | { state: 'failed'; error: ScanError; retryCount: number }
  | { state: 'cancelled'; retryCount: number };

export interface DownloadSnapshot {
  sessionId: string;
  request: DownloadRequest;
  state: DownloadState;
  /** 0..1, or null while the total size is unknown. */
  progress: number | null;
  retryCount: number;
  filePath?: string;
  error?: ScanError;
}
