import type { ScanError, ScanErrorKind } from './scan-types';

/**
 * Typed error carried through the scan engine. `kind` drives retry affordances;
 * `code` keeps the platform/server code that produced it.
 */
export class ScanSyncError extends Error {
  readonly kind: ScanErrorKind;
  readonly code?: string;
  readonly status?: number;

  constructor(kind: ScanErrorKind, message: string, options: { code?: string; status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ScanSyncError';
    this.kind = kind;
    this.code = options.code;
    this.status = options.status;
  }

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }

  toScanError(): ScanError {
    return this.code ? { kind: this.kind, message: this.message, code: this.code } : { kind: this.kind, message: this.message };
  }
}

export function isRetryableKind(kind: ScanErrorKind): boolean {
  return kind === 'network' || kind === 'timeout' || kind === 'server';
}

export function isRetryable(error: ScanError | undefined): boolean {
  return !!error && isRetryableKind(error.kind);
}

interface ErrorCodeEntry {
  kind: ScanErrorKind;
  message: string;
}

/**
 * Platform/server error codes → user-facing category. The UI keys retry
 * affordances off these categories, so entries must stay stable.
 */
const ERROR_CODES: Readonly<Record<string, ErrorCodeEntry>> = {
  API_STATUS_ERROR: {
    kind: 'network',
    message: "Couldn't process the model. Please check your internet connection and try again.",
  },
  API_REQUEST_FAILED: {
    kind: 'network',
    message: "Couldn't process the model. Please check your internet connection and try again.",
  },
  NETWORK_ERROR: {
    kind: 'network',
    message: 'Network error. Please check your internet connection and try again.',
  },
  INVALID_ZIP_DATA: {
    kind: 'validation',
    message: 'Scan data is incomplete. Please try scanning again.',
  },
  CAMERA_PERMISSION_DENIED: {
    kind: 'permission',
    message: 'Camera access denied. Please enable camera permissions in Settings.',
  },
  PERMISSION_DENIED: {
    kind: 'permission',
    message: "You don't have permission to process this scan.",
  },
  AR_SESSION_ERROR: {
    kind: 'validation',
    message: 'Unable to start scan. Please try again in a well-lit area.',
  },
  SERVER_UNAVAILABLE: {
    kind: 'server',
    message: 'Server is unavailable. Please try again later.',
  },
  PROCESSING_FAILED: {
    kind: 'server',
    message: 'Scan processing failed on the server. Please try again.',
  },
  INVALID_INPUT: {
    kind: 'server',
    message: 'The server rejected the scan data as invalid input.',
  },
  INVALID_SCAN_ID: {
    kind: 'validation',
    message: 'Scan ID is required for server processing.',
  },
  INVALID_PATH: {
    kind: 'validation',
    message: 'Scan files are missing. Please try scanning again.',
  },
  PREPARATION_FAILED: {
    kind: 'server',
    message: 'The export could not be prepared on the server. Please try again later.',
  },
};

const KIND_MESSAGES: Record<ScanErrorKind, string> = {
  validation: 'Scan data is incomplete. Please try scanning again.',
  network: 'Network error. Please check your internet connection and try again.',
  timeout: 'File preparation timed out. Please try again later.',
  permission: 'Permission denied. Please check your access and sign in again.',
  server: "Couldn't process the model. Please try again.",
  cancelled: 'Cancelled.',
};

export function classifyErrorCode(code: string | undefined): ErrorCodeEntry {
  if (code && Object.prototype.hasOwnProperty.call(ERROR_CODES, code)) {
    return ERROR_CODES[code];
  }
  return { kind: 'server', message: KIND_MESSAGES.server };
}

export function errorFromCode(code: string | undefined, detail?: string): ScanSyncError {
  const entry = classifyErrorCode(code);
  return new ScanSyncError(entry.kind, detail || entry.message, { code });
}

/**
 * User-facing text for a failure. Retryable kinds end with the retry hint; the
 * others tell the user what to fix instead.
 */
export function userMessageFor(error: ScanError | undefined): string {
  if (!error) return `${KIND_MESSAGES.server} Tap to retry.`;
  const base = error.code && Object.prototype.hasOwnProperty.call(ERROR_CODES, error.code)
    ? ERROR_CODES[error.code].message
    : KIND_MESSAGES[error.kind];
  return isRetryableKind(error.kind) ? `${base} Tap to retry.` : base;
}

export function kindForHttpStatus(status: number): ScanErrorKind {
  if (status === 400 || status === 422) return 'validation';
  if (status === 401 || status === 403) return 'permission';
  if (status === 408) return 'timeout';
  return 'server';
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || (err instanceof ScanSyncError && err.kind === 'cancelled'));
}

/** Convert anything thrown into the structured error kept on records. */
export function toScanError(err: unknown): ScanError {
  if (err instanceof ScanSyncError) return err.toScanError();
  if (isAbortError(err)) return { kind: 'cancelled', message: 'Cancelled' };
  if (err instanceof TypeError && /fetch failed|network|ECONN|ENOTFOUND|EAI_AGAIN/i.test(`${err.message} ${String(err.cause ?? '')}`)) {
    return { kind: 'network', message: 'No internet connection available.' };
  }
  if (err instanceof Error) return { kind: 'server', message: err.message };
  return { kind: 'server', message: String(err) };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
