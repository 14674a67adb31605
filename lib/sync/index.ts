export { SyncOrchestrator } from './sync-orchestrator';
export type { SyncOrchestratorOptions, SyncTrigger } from './sync-orchestrator';
export {
  needsSync,
  isAwaitingRegistration,
  recordsNeedingSync,
  countSyncNeeded,
  describeSyncResult,
} from './determine-sync-status';
export type { SyncCounts } from './determine-sync-status';
export { AbortRegistry } from './sync-abort-registry';
export { SyncStateStore, DEFAULT_RECENT_ERRORS_CAP } from './sync-state';
export type { SyncStateListener, SyncStatePatch } from './sync-state';
