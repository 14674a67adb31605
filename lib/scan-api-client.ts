/**
 * HTTP client for the scan API (REST, trailing-slash endpoints, `Token` auth).
 *
 *   GET   scans/               list
 *   POST  scans/               register a captured scan
 *   GET   scans/{id}/          detail / status
 *   PATCH scans/{id}/          status update
 *   POST  scans/process/       submit a processing job
 *
 * Responses are parsed with zod at this boundary; the rest of the engine only sees
 * RemoteScanSnapshot values.
 */

import type { ScanRecord, ScanStatus } from './scan-types';
import type {
  ArtifactSink,
  DownloadProgress,
  ProbeResult,
  ProcessingJobResult,
  RemoteScanSnapshot,
  ScanApi,
} from './collaborators';
import { ScanSyncError, errorMessage, isAbortError, kindForHttpStatus } from './errors';
import { CancelledError } from './retry';
import {
  parseWith,
  processingJobResponseSchema,
  registerScanResponseSchema,
  remoteScanListSchema,
  remoteScanSchema,
  type RemoteScanPayload,
} from './validation';
import { scopedLogger } from './logger';

const log = scopedLogger('API');

const BYTES_PER_MB = 1024 * 1024;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpScanApiOptions {
  baseUrl: string;
  token?: string;
  fetchImpl?: FetchLike;
}

export function toRemoteSnapshot(payload: RemoteScanPayload): RemoteScanSnapshot {
  return {
    remoteId: payload.id,
    status: payload.status,
    metadata: {
      name: payload.title || undefined,
      locationName: payload.location_name,
      coordinates: payload.gps_points,
      imageCount: payload.total_images,
      durationSeconds: payload.duration,
      dataSizeBytes: payload.data_size_mb > 0 ? Math.round(payload.data_size_mb * BYTES_PER_MB) : undefined,
      createdAt: payload.created_at,
    },
    processedModelUrl: payload.point_cloud?.processed_model ?? undefined,
    snapshotUrl: payload.point_cloud?.snapshot ?? undefined,
    errorMessage: payload.upload_status?.error_message || undefined,
  };
}

async function readErrorDetail(response: Response): Promise<string> {
  const fallback = response.statusText || `Request failed with status ${response.status}`;
  try {
    const data: unknown = await response.json();
    if (typeof data === 'object' && data !== null) {
      for (const field of ['detail', 'error', 'message'] as const) {
        const value: unknown = Reflect.get(data, field);
        if (typeof value === 'string' && value) return value;
      }
    }
    return fallback;
  } catch {
    // Non-JSON error body
    return fallback;
  }
}

function statusError(status: number, detail: string): ScanSyncError {
  const code = status === 502 || status === 503 || status === 504 ? 'SERVER_UNAVAILABLE' : undefined;
  return new ScanSyncError(kindForHttpStatus(status), detail, { status, code });
}

export class HttpScanApi implements ScanApi {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpScanApiOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.token = options.token;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async getScanStatus(remoteId: string, signal?: AbortSignal): Promise<RemoteScanSnapshot> {
    const data = await this.requestJson('GET', `scans/${encodeURIComponent(remoteId)}/`, undefined, signal);
    return toRemoteSnapshot(parseWith(remoteScanSchema, data, 'scan detail', 'server'));
  }

  async listScans(signal?: AbortSignal): Promise<RemoteScanSnapshot[]> {
    const data = await this.requestJson('GET', 'scans/', undefined, signal);
    return parseWith(remoteScanListSchema, data, 'scan list', 'server').map(toRemoteSnapshot);
  }

  async submitProcessingJob(remoteId: string, signal?: AbortSignal): Promise<ProcessingJobResult> {
    const scanId = /^\d+$/.test(remoteId) ? Number(remoteId) : remoteId;
    const data = await this.requestJson('POST', 'scans/process/', { scan_id: scanId }, signal);
    const body = parseWith(processingJobResponseSchema, data, 'processing response', 'server');
    const rejected = body.success === false || body.accepted === false;
    if (rejected) {
      return {
        accepted: false,
        code: body.error_code ?? body.code,
        message: body.message ?? 'Processing request was rejected',
      };
    }
    return { accepted: true, message: body.message };
  }

  async registerScan(record: ScanRecord, signal?: AbortSignal): Promise<{ remoteId: string }> {
    const { metadata } = record;
    const data = await this.requestJson('POST', 'scans/', {
      title: metadata.name,
      location_name: metadata.locationName ?? '',
      gps_points: metadata.coordinates,
      total_images: metadata.imageCount,
      duration: metadata.durationSeconds,
      data_size_mb: metadata.dataSizeBytes ? Number((metadata.dataSizeBytes / BYTES_PER_MB).toFixed(2)) : 0,
      status: record.status === 'uploaded' ? 'uploaded' : 'pending',
      local_id: record.id,
      created_at: metadata.createdAt,
    }, signal);
    const { id } = parseWith(registerScanResponseSchema, data, 'register response', 'server');
    return { remoteId: id };
  }

  async updateScanStatus(remoteId: string, status: ScanStatus, signal?: AbortSignal): Promise<void> {
    await this.requestJson('PATCH', `scans/${encodeURIComponent(remoteId)}/`, { status }, signal);
  }

  /** HEAD the artifact: 2xx ready, 404/403/202 still preparing, 410 never coming. */
  async probeArtifact(url: string, signal?: AbortSignal): Promise<ProbeResult> {
    const response = await this.send(url, { method: 'HEAD' }, signal);
    if (response.ok && response.status !== 202) return 'ready';
    if (response.status === 202 || response.status === 404 || response.status === 403) return 'notReady';
    if (response.status === 410) return 'failed';
    throw statusError(response.status, response.statusText || `Probe failed with status ${response.status}`);
  }

  async downloadArtifact(
    url: string,
    sink: ArtifactSink,
    onProgress: (progress: DownloadProgress) => void,
    signal?: AbortSignal
  ): Promise<void> {
    const response = await this.send(url, { method: 'GET' }, signal);
    if (!response.ok) {
      throw statusError(response.status, await readErrorDetail(response));
    }
    if (!response.body) {
      throw new ScanSyncError('server', 'Download response has no body');
    }

    const length = Number(response.headers.get('content-length'));
    const total = Number.isFinite(length) && length > 0 ? length : null;
    let received = 0;
    onProgress({ received, total });

    const reader = response.body.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        if (signal?.aborted) throw new CancelledError();
        if (!(value instanceof Uint8Array)) {
          throw new ScanSyncError('server', 'Unexpected chunk in download stream');
        }
        await sink.write(value);
        received += value.byteLength;
        onProgress({ received, total });
      }
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) throw new CancelledError();
      if (error instanceof ScanSyncError) throw error;
      throw new ScanSyncError('network', `Download interrupted: ${errorMessage(error)}`, { code: 'NETWORK_ERROR', cause: error });
    } finally {
      reader.releaseLock();
    }
  }

  /** Reachability check for the connectivity monitor: any answer below 500 counts. */
  async isReachable(signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await this.send(this.baseUrl, { method: 'HEAD' }, signal);
      return response.status < 500;
    } catch (error) {
      if (error instanceof ScanSyncError && error.kind === 'network') return false;
      throw error;
    }
  }

  private resolve(pathOrUrl: string): string {
    return /^https?:\/\//i.test(pathOrUrl) ? pathOrUrl : `${this.baseUrl}${pathOrUrl.replace(/^\/+/, '')}`;
  }

  private headers(url: string, json: boolean): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (json) headers['Content-Type'] = 'application/json';
    if (this.token && url.startsWith(this.baseUrl)) headers.Authorization = `Token ${this.token}`;
    return headers;
  }

  private async send(pathOrUrl: string, init: RequestInit & { json?: unknown }, signal?: AbortSignal): Promise<Response> {
    const url = this.resolve(pathOrUrl);
    const { json, ...rest } = init;
    try {
      return await this.fetchImpl(url, {
        ...rest,
        headers: this.headers(url, json !== undefined),
        body: json === undefined ? undefined : JSON.stringify(json),
        signal,
      });
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) throw new CancelledError();
      log.debug(`${rest.method ?? 'GET'} ${url} failed: ${errorMessage(error)}`);
      throw new ScanSyncError('network', 'No internet connection available.', { code: 'NETWORK_ERROR', cause: error });
    }
  }

  private async requestJson(method: string, path: string, json: unknown, signal?: AbortSignal): Promise<unknown> {
    const response = await this.send(path, { method, json }, signal);
    if (!response.ok) {
      throw statusError(response.status, await readErrorDetail(response));
    }
    if (response.status === 204) return {};
    try {
      const data: unknown = await response.json();
      return data;
    } catch (error) {
      throw new ScanSyncError('server', `Unexpected response format from ${path}`, { status: response.status, cause: error });
    }
  }
}
