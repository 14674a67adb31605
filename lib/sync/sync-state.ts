/**
 * Session-wide sync state. Owned by the session, written by the orchestrator and
 * the connectivity wiring, observed by the presentation layer. Never persisted.
 */

import type { SyncState } from '@/lib/scan-types';
import { scopedLogger } from '@/lib/logger';

const log = scopedLogger('SYNC');

export const DEFAULT_RECENT_ERRORS_CAP = 5;

export type SyncStateListener = (state: SyncState) => void;

export type SyncStatePatch = Partial<Omit<SyncState, 'recentErrors'>>;

export class SyncStateStore {
  private state: SyncState;
  private readonly listeners = new Set<SyncStateListener>();

  constructor(private readonly recentErrorsCap: number = DEFAULT_RECENT_ERRORS_CAP) {
    this.state = {
      isOnline: null,
      isSyncing: false,
      autoSyncEnabled: true,
      pendingCount: 0,
      initializedCount: 0,
      recentErrors: [],
    };
  }

  get(): SyncState {
    return { ...this.state, recentErrors: [...this.state.recentErrors] };
  }

  subscribe(listener: SyncStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  update(patch: SyncStatePatch): SyncState {
    this.state = { ...this.state, ...patch };
    this.emit();
    return this.get();
  }

  /** Most recent first; the oldest entry is dropped past the cap. */
  recordError(message: string): void {
    const recentErrors = [message, ...this.state.recentErrors].slice(0, this.recentErrorsCap);
    this.state = { ...this.state, recentErrors };
    this.emit();
  }

  clearErrors(): void {
    if (this.state.recentErrors.length === 0) return;
    this.state = { ...this.state, recentErrors: [] };
    this.emit();
  }

  private emit(): void {
    const snapshot = this.get();
    for (const listener of [...this.listeners]) {
      try {
        listener(snapshot);
      } catch (error) {
        log.error('Sync state listener threw', error);
      }
    }
  }
}
