import { z } from 'zod';
import type { S3JsonStore } from './s3-config';

export const AUTO_SYNC_SETTINGS_KEY = 'auto-sync';

const autoSyncDocumentSchema = z.object({
  enabled: z.boolean(),
  updatedAt: z.string().optional(),
});

/** Persistence of the auto-sync toggle. */
export interface AutoSyncSettings {
  getAutoSyncEnabled(): Promise<boolean>;
  setAutoSyncEnabled(enabled: boolean): Promise<void>;
}

export class S3AutoSyncSettings implements AutoSyncSettings {
  constructor(
    private readonly store: S3JsonStore,
    private readonly defaultEnabled = true,
    private readonly key: string = AUTO_SYNC_SETTINGS_KEY
  ) {}

  async getAutoSyncEnabled(): Promise<boolean> {
    const doc = await this.store.initConfigIfNeeded(this.key, autoSyncDocumentSchema, { enabled: this.defaultEnabled });
    return doc.enabled;
  }

  async setAutoSyncEnabled(enabled: boolean): Promise<void> {
    await this.store.putConfig(this.key, { enabled, updatedAt: new Date().toISOString() });
  }
}

export class InMemoryAutoSyncSettings implements AutoSyncSettings {
  constructor(private enabled = true) {}

  async getAutoSyncEnabled(): Promise<boolean> {
    return this.enabled;
  }

  async setAutoSyncEnabled(enabled: boolean): Promise<void> {
    this.enabled = enabled;
  }
}
