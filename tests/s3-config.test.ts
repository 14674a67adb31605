import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { S3JsonStore } from '@/lib/s3-config';
import { S3ScanRecordPersistence, SCAN_RECORDS_KEY } from '@/lib/scan-persistence';
import { AUTO_SYNC_SETTINGS_KEY, S3AutoSyncSettings } from '@/lib/auto-sync-settings';
import { MemoryObjectTransport, makeRecord } from './helpers/fakes';

const limitsSchema = z.object({ maxScans: z.number() });

describe('S3JsonStore', () => {
  it('returns null for a missing document', async () => {
    const store = new S3JsonStore(new MemoryObjectTransport());
    expect(await store.getConfig('limits', limitsSchema)).toBeNull();
  });

  it('returns null for invalid JSON and for documents that fail validation', async () => {
    const transport = new MemoryObjectTransport();
    transport.objects.set('broken', '{not json');
    transport.objects.set('wrong', JSON.stringify({ maxScans: 'many' }));
    const store = new S3JsonStore(transport);

    expect(await store.getConfig('broken', limitsSchema)).toBeNull();
    expect(await store.getConfig('wrong', limitsSchema)).toBeNull();
  });

  it('serves reads from the cache until the entry expires', async () => {
    const transport = new MemoryObjectTransport();
    transport.objects.set('limits', JSON.stringify({ maxScans: 5 }));
    let clock = 1_000;
    const store = new S3JsonStore(transport, 60_000, () => clock);

    expect(await store.getConfig('limits', limitsSchema)).toEqual({ maxScans: 5 });
    transport.objects.set('limits', JSON.stringify({ maxScans: 9 }));
    expect(await store.getConfig('limits', limitsSchema)).toEqual({ maxScans: 5 });
    expect(transport.reads).toBe(1);

    clock += 60_000;
    expect(await store.getConfig('limits', limitsSchema)).toEqual({ maxScans: 9 });
    expect(transport.reads).toBe(2);
  });

  it('re-reads after invalidate', async () => {
    const transport = new MemoryObjectTransport();
    transport.objects.set('limits', JSON.stringify({ maxScans: 5 }));
    const store = new S3JsonStore(transport);

    await store.getConfig('limits', limitsSchema);
    store.invalidate('limits');
    await store.getConfig('limits', limitsSchema);

    expect(transport.reads).toBe(2);
  });

  it('writes documents and refreshes the cache', async () => {
    const transport = new MemoryObjectTransport();
    const store = new S3JsonStore(transport);

    await store.putConfig('limits', { maxScans: 3 });

    expect(transport.objects.get('limits')).toBe(JSON.stringify({ maxScans: 3 }, null, 2));
    expect(await store.getConfig('limits', limitsSchema)).toEqual({ maxScans: 3 });
    expect(transport.reads).toBe(0);
  });

  it('throws write failures', async () => {
    const transport = new MemoryObjectTransport();
    transport.failWrites = true;
    const store = new S3JsonStore(transport);

    await expect(store.putConfig('limits', { maxScans: 3 })).rejects.toThrow('Access Denied');
  });

  it('initializes a missing document with the defaults', async () => {
    const transport = new MemoryObjectTransport();
    const store = new S3JsonStore(transport);

    expect(await store.initConfigIfNeeded('limits', limitsSchema, { maxScans: 10 })).toEqual({ maxScans: 10 });
    expect(transport.writes).toBe(1);
  });

  it('does not overwrite an existing but invalid document', async () => {
    const transport = new MemoryObjectTransport();
    transport.objects.set('limits', '{"maxScans": "lots"}');
    const store = new S3JsonStore(transport);

    expect(await store.initConfigIfNeeded('limits', limitsSchema, { maxScans: 10 })).toEqual({ maxScans: 10 });
    expect(transport.writes).toBe(0);
    expect(transport.objects.get('limits')).toBe('{"maxScans": "lots"}');
  });
});

describe('S3ScanRecordPersistence', () => {
  it('saves a versioned snapshot and loads the records back', async () => {
    const transport = new MemoryObjectTransport();
    const persistence = new S3ScanRecordPersistence(new S3JsonStore(transport));
    const record = makeRecord({ id: 's1', status: 'failed', lastError: { kind: 'network', message: 'offline' } });

    await persistence.save([record]);
    const body = transport.objects.get(SCAN_RECORDS_KEY);
    expect(body).toBeDefined();
    expect(JSON.parse(body ?? '{}')).toMatchObject({ version: 1, records: [{ id: 's1', status: 'failed' }] });

    const fresh = new S3ScanRecordPersistence(new S3JsonStore(transport));
    expect(await fresh.load()).toEqual([record]);
  });

  it('loads nothing from a corrupt snapshot', async () => {
    const transport = new MemoryObjectTransport();
    transport.objects.set(SCAN_RECORDS_KEY, JSON.stringify({ version: 2, records: [] }));
    const persistence = new S3ScanRecordPersistence(new S3JsonStore(transport));

    expect(await persistence.load()).toEqual([]);
  });
});

describe('S3AutoSyncSettings', () => {
  it('defaults to the configured value and persists changes', async () => {
    const transport = new MemoryObjectTransport();
    const settings = new S3AutoSyncSettings(new S3JsonStore(transport), false);

    expect(await settings.getAutoSyncEnabled()).toBe(false);
    await settings.setAutoSyncEnabled(true);

    const fresh = new S3AutoSyncSettings(new S3JsonStore(transport), false);
    expect(await fresh.getAutoSyncEnabled()).toBe(true);
    expect(JSON.parse(transport.objects.get(AUTO_SYNC_SETTINGS_KEY) ?? '{}')).toMatchObject({ enabled: true });
  });
});
