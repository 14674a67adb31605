import type { ScanRecord, ScanStatus } from '@/lib/scan-types';
import type {
  ArtifactSink,
  DownloadProgress,
  LocalProcessingCapability,
  LocalProcessingResult,
  ProbeResult,
  ProcessingJobResult,
  RemoteScanSnapshot,
  ScanApi,
} from '@/lib/collaborators';
import type { ArtifactStorage } from '@/lib/artifact-storage';
import { sanitizeFileName } from '@/lib/artifact-storage';
import type { ObjectTransport } from '@/lib/s3-config';
import { ScanSyncError } from '@/lib/errors';
import { CancelledError, type Sleep } from '@/lib/retry';

export const CREATED_AT = '2026-03-01T10:00:00.000Z';

type RecordOverrides = Omit<Partial<ScanRecord>, 'metadata'> & { id: string; metadata?: Partial<ScanRecord['metadata']> };

export function makeRecord(overrides: RecordOverrides): ScanRecord {
  const { metadata, ...rest } = overrides;
  return {
    source: 'local',
    status: 'pending',
    ...rest,
    metadata: {
      name: `Scan ${overrides.id}`,
      coordinates: [],
      imageCount: 12,
      durationSeconds: 40,
      createdAt: CREATED_AT,
      updatedAt: CREATED_AT,
      ...metadata,
    },
  };
}

export function remoteSnapshot(remoteId: string, status: string, extra: Partial<RemoteScanSnapshot> = {}): RemoteScanSnapshot {
  return { remoteId, status, metadata: {}, ...extra };
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Resolves every wait on the next macrotask and records the requested delays. */
export function recordingSleep(): { sleep: Sleep; waits: number[] } {
  const waits: number[] = [];
  const sleep: Sleep = async (ms, signal) => {
    waits.push(ms);
    if (signal?.aborted) throw new CancelledError();
    await new Promise<void>((resolve) => setImmediate(resolve));
    if (signal?.aborted) throw new CancelledError();
  };
  return { sleep, waits };
}

/** Waits stay pending until the test releases them; aborting a wait rejects it. */
export class ManualSleep {
  readonly waits: number[] = [];
  private pending: Array<() => void> = [];

  readonly sleep: Sleep = (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      this.waits.push(ms);
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      const release = () => resolve();
      this.pending.push(release);
      signal?.addEventListener('abort', () => {
        this.pending = this.pending.filter((entry) => entry !== release);
        reject(new CancelledError());
      }, { once: true });
    });

  get pendingCount(): number {
    return this.pending.length;
  }

  release(): boolean {
    const next = this.pending.shift();
    next?.();
    return next !== undefined;
  }
}

export class FakeScanApi implements ScanApi {
  /** Consumed in order by getScanStatus; the last entry repeats. */
  statusResponses: Array<RemoteScanSnapshot | Error> = [];
  statusCalls = 0;
  listResult: RemoteScanSnapshot[] | Error = [];
  jobResult: ProcessingJobResult | Error = { accepted: true };
  submitCalls: string[] = [];
  registerCalls: string[] = [];
  failRegistrationFor = new Set<string>();
  registerGate: Promise<void> | null = null;
  statusUpdates: Array<{ remoteId: string; status: ScanStatus }> = [];
  updateStatusError: Error | null = null;
  /** Consumed in order by probeArtifact; the last entry repeats. */
  probeResults: Array<ProbeResult | Error> = ['ready'];
  probeCalls = 0;
  downloadChunks: Uint8Array[] = [new Uint8Array([1, 2, 3]), new Uint8Array([4, 5])];
  downloadTotal: number | null = 5;
  downloadGate: Promise<void> | null = null;
  downloadError: Error | null = null;
  downloadCalls = 0;
  private nextRemoteId = 500;

  async getScanStatus(_remoteId: string): Promise<RemoteScanSnapshot> {
    this.statusCalls++;
    const next = this.statusResponses.length > 1 ? this.statusResponses.shift() : this.statusResponses[0];
    if (!next) throw new Error('No status response configured');
    if (next instanceof Error) throw next;
    return next;
  }

  async listScans(): Promise<RemoteScanSnapshot[]> {
    if (this.listResult instanceof Error) throw this.listResult;
    return this.listResult;
  }

  async submitProcessingJob(remoteId: string): Promise<ProcessingJobResult> {
    this.submitCalls.push(remoteId);
    if (this.jobResult instanceof Error) throw this.jobResult;
    return this.jobResult;
  }

  async registerScan(record: ScanRecord): Promise<{ remoteId: string }> {
    this.registerCalls.push(record.id);
    if (this.registerGate) await this.registerGate;
    if (this.failRegistrationFor.has(record.id)) {
      throw new ScanSyncError('network', 'No internet connection available.', { code: 'NETWORK_ERROR' });
    }
    return { remoteId: String(this.nextRemoteId++) };
  }

  async updateScanStatus(remoteId: string, status: ScanStatus): Promise<void> {
    if (this.updateStatusError) throw this.updateStatusError;
    this.statusUpdates.push({ remoteId, status });
  }

  async probeArtifact(): Promise<ProbeResult> {
    this.probeCalls++;
    const next = this.probeResults.length > 1 ? this.probeResults.shift() : this.probeResults[0];
    if (next === undefined) return 'ready';
    if (next instanceof Error) throw next;
    return next;
  }

  async downloadArtifact(
    _url: string,
    sink: ArtifactSink,
    onProgress: (progress: DownloadProgress) => void,
    signal?: AbortSignal
  ): Promise<void> {
    this.downloadCalls++;
    let received = 0;
    onProgress({ received, total: this.downloadTotal });
    if (this.downloadGate) await this.downloadGate;
    if (this.downloadError) throw this.downloadError;
    for (const chunk of this.downloadChunks) {
      if (signal?.aborted) throw new CancelledError();
      await sink.write(chunk);
      received += chunk.byteLength;
      onProgress({ received, total: this.downloadTotal });
    }
  }
}

export class MemoryArtifactStorage implements ArtifactStorage {
  readonly files = new Map<string, number[]>();
  readonly aborted: string[] = [];
  readonly removed: string[] = [];
  closeGate: Promise<void> | null = null;
  closeCalls = 0;

  pathFor(fileName: string): string {
    return `/downloads/${sanitizeFileName(fileName)}`;
  }

  async createSink(fileName: string): Promise<ArtifactSink> {
    const filePath = this.pathFor(fileName);
    const bytes: number[] = [];
    return {
      write: async (chunk) => {
        bytes.push(...chunk);
      },
      close: async () => {
        this.closeCalls++;
        if (this.closeGate) await this.closeGate;
        this.files.set(filePath, bytes);
        return filePath;
      },
      abort: async () => {
        this.aborted.push(filePath);
      },
    };
  }

  async remove(filePath: string): Promise<void> {
    this.removed.push(filePath);
    this.files.delete(filePath);
  }
}

export class MemoryObjectTransport implements ObjectTransport {
  readonly objects = new Map<string, string>();
  reads = 0;
  writes = 0;
  failWrites = false;

  async getText(key: string): Promise<string | null> {
    this.reads++;
    return this.objects.get(key) ?? null;
  }

  async putText(key: string, body: string): Promise<void> {
    if (this.failWrites) throw new Error('Access Denied');
    this.writes++;
    this.objects.set(key, body);
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }
}

export class FakeLocalProcessing implements LocalProcessingCapability {
  readonly calls: string[] = [];
  result: LocalProcessingResult | Error = { artifactPath: '/captures/model.usdz', sizeBytes: 2_097_152 };
  gate: Promise<void> | null = null;
  captureSize = 0;

  async processLocal(folderPath: string, signal?: AbortSignal): Promise<LocalProcessingResult> {
    this.calls.push(folderPath);
    if (this.gate) await this.gate;
    if (signal?.aborted) throw new CancelledError();
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }

  async getCaptureSize(): Promise<number> {
    return this.captureSize;
  }
}
