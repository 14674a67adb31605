/**
 * One-shot sync of persisted scan records against the scan API.
 * Run with: npx tsx scripts/sync-scans.ts [--refresh]
 *
 *   --refresh   also pull the server's scan list before syncing
 */

import { config } from 'dotenv';
import { resolve } from 'path';

// Load .env file
config({ path: resolve(process.cwd(), '.env') });

import { loadConfig } from '../lib/config';
import { HttpScanApi } from '../lib/scan-api-client';
import { createS3Client, S3JsonStore, S3ObjectTransport } from '../lib/s3-config';
import {
  InMemoryScanRecordPersistence,
  S3ScanRecordPersistence,
  type ScanRecordPersistence,
} from '../lib/scan-persistence';
import { InMemoryAutoSyncSettings, S3AutoSyncSettings, type AutoSyncSettings } from '../lib/auto-sync-settings';
import { createScanSession } from '../lib/scan-session';
import { errorMessage } from '../lib/errors';

async function main(): Promise<number> {
  const cfg = loadConfig();
  if (!cfg.api.baseUrl) {
    console.error('❌ SCAN_API_BASE_URL is not configured');
    return 1;
  }

  const api = new HttpScanApi({ baseUrl: cfg.api.baseUrl, token: cfg.api.token });

  let persistence: ScanRecordPersistence;
  let settings: AutoSyncSettings;
  if (cfg.s3) {
    const jsonStore = new S3JsonStore(new S3ObjectTransport(createS3Client(cfg.s3), cfg.s3.bucket));
    persistence = new S3ScanRecordPersistence(jsonStore);
    settings = new S3AutoSyncSettings(jsonStore, cfg.autoSyncDefault);
    console.log(`📦 Scan records: s3://${cfg.s3.bucket}/config/`);
  } else {
    persistence = new InMemoryScanRecordPersistence();
    settings = new InMemoryAutoSyncSettings(cfg.autoSyncDefault);
    console.warn('⚠️  SCAN_STATE_BUCKET not set; starting from an empty in-memory store');
  }

  const session = createScanSession({
    api,
    persistence,
    settings,
    tuning: {
      pollIntervalMs: cfg.pollIntervalMs,
      probeDelayMs: cfg.probeDelayMs,
      maxReadinessRetries: cfg.maxReadinessRetries,
      recentErrorsCap: cfg.recentErrorsCap,
      syncConcurrency: cfg.syncConcurrency,
      downloadsDir: cfg.downloadsDir,
    },
  });

  await session.start();
  try {
    const online = await api.isReachable();
    session.events.push({ type: 'connectivityChanged', payload: { isOnline: online } });
    await session.events.whenIdle();
    if (!online) {
      console.error('❌ Scan API is not reachable');
      return 1;
    }

    if (process.argv.includes('--refresh')) {
      const listed = await session.refreshRemoteScans();
      console.log(`🔄 ${listed} scans listed by the server`);
      // Pollers are for long-running sessions
      session.pollers.stopAll();
    }

    const result = await session.triggerManualSync();
    console.log(`${result.failed === 0 ? '✅' : '❌'} ${result.message}`);
    for (const failure of result.failures) {
      console.log(`   ${failure.scanId}: ${failure.error.message}`);
    }
    return result.failed === 0 ? 0 : 2;
  } finally {
    await session.dispose();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`❌ Sync failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
