/**
 * Contracts of the collaborators the engine drives but does not implement:
 * the native capture and processing capabilities and the scan API.
 */

import type { Coordinate, ScanMetadata, ScanRecord, ScanStatus } from './scan-types';

export interface CaptureResult {
  started: boolean;
  /** Some platforms report the capture folder up front; the rest send it with `captureComplete`. */
  folderPath?: string;
}

export interface CaptureCapability {
  startCapture(): Promise<CaptureResult>;
}

export interface LocalProcessingResult {
  artifactPath: string;
  sizeBytes: number;
  snapshotPath?: string;
}

/**
 * On-device processing. Failures are thrown as ScanSyncError carrying the platform
 * code (INVALID_ZIP_DATA, SERVER_UNAVAILABLE, ...).
 */
export interface LocalProcessingCapability {
  processLocal(folderPath: string, signal?: AbortSignal): Promise<LocalProcessingResult>;
  /** Size of the packed capture, used for the processing time estimate. */
  getCaptureSize?(folderPath: string): Promise<number>;
}

/** Scan state as reported by the server, already parsed but with the raw status token. */
export interface RemoteScanSnapshot {
  remoteId: string;
  status: string;
  metadata: Partial<ScanMetadata> & { coordinates?: Coordinate[] };
  processedModelUrl?: string;
  snapshotUrl?: string;
  errorMessage?: string;
}

export type ProcessingJobResult =
  | { accepted: true; message?: string }
  | { accepted: false; code?: string; message: string };

/**
 * - ready: artifact exists, download can start
 * - notReady: still being prepared (404/403 from the artifact URL)
 * - failed: server says the artifact will never be produced
 */
export type ProbeResult = 'ready' | 'notReady' | 'failed';

export interface DownloadProgress {
  received: number;
  /** null when the server sent no content length. */
  total: number | null;
}

/** Destination for downloaded bytes. */
export interface ArtifactSink {
  write(chunk: Uint8Array): Promise<void>;
  /** Flush and return the final local path. */
  close(): Promise<string>;
  /** Drop partial output. Safe to call more than once. */
  abort(): Promise<void>;
}

export interface ScanApi {
  getScanStatus(remoteId: string, signal?: AbortSignal): Promise<RemoteScanSnapshot>;
  listScans(signal?: AbortSignal): Promise<RemoteScanSnapshot[]>;
  submitProcessingJob(remoteId: string, signal?: AbortSignal): Promise<ProcessingJobResult>;
  registerScan(record: ScanRecord, signal?: AbortSignal): Promise<{ remoteId: string }>;
  updateScanStatus(remoteId: string, status: ScanStatus, signal?: AbortSignal): Promise<void>;
  /** Network failures are thrown; readiness is returned. */
  probeArtifact(url: string, signal?: AbortSignal): Promise<ProbeResult>;
  downloadArtifact(
    url: string,
    sink: ArtifactSink,
    onProgress: (progress: DownloadProgress) => void,
    signal?: AbortSignal
  ): Promise<void>;
}
