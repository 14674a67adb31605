import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
  HeadObjectCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { z } from 'zod';
import { scopedLogger } from './logger';
import { errorMessage } from './errors';
import { formatZodError } from './validation';

const log = scopedLogger('S3-CONFIG');

// ── In-memory cache for config reads ────────────────────────────────────
// Each entry has a TTL; writes replace the cached value for that key.

const CONFIG_CACHE_TTL_MS = 60_000; // 60 seconds

interface CacheEntry {
  data: unknown;
  expiresAt: number;
}

/** Raw object access below the JSON store. */
export interface ObjectTransport {
  /** null when the object does not exist. */
  getText(key: string): Promise<string | null>;
  putText(key: string, body: string): Promise<void>;
  exists(key: string): Promise<boolean>;
}

export interface S3ClientSettings {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export function createS3Client(settings: S3ClientSettings): S3Client {
  const credentials = settings.accessKeyId && settings.secretAccessKey
    ? { accessKeyId: settings.accessKeyId, secretAccessKey: settings.secretAccessKey }
    : undefined;
  return new S3Client({
    region: settings.region,
    credentials,
    requestChecksumCalculation: 'WHEN_REQUIRED',
    responseChecksumValidation: 'WHEN_REQUIRED',
  });
}

function isNotFound(error: unknown): boolean {
  return error instanceof S3ServiceException
    && (error.name === 'NoSuchKey' || error.name === 'NotFound' || error.$metadata.httpStatusCode === 404);
}

/**
 * JSON documents stored as `config/<key>.json` in one bucket.
 */
export class S3ObjectTransport implements ObjectTransport {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly prefix = 'config/'
  ) {}

  private objectKey(key: string): string {
    return `${this.prefix}${key}.json`;
  }

  async getText(key: string): Promise<string | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({
        Bucket: this.bucket,
        Key: this.objectKey(key),
      }));
      const body = await response.Body?.transformToString();
      return body || null;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async putText(key: string, body: string): Promise<void> {
    await this.client.send(new PutObjectCommand({
      Bucket: this.bucket,
      Key: this.objectKey(key),
      Body: body,
      ContentType: 'application/json',
    }));
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({
        Bucket: this.bucket,
        Key: this.objectKey(key),
      }));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }
}

/**
 * Typed JSON config store with a read cache.
 * Reads never throw: a missing, unreadable or invalid document is `null`.
 */
export class S3JsonStore {
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    private readonly transport: ObjectTransport,
    private readonly ttlMs: number = CONFIG_CACHE_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  invalidate(key: string): void {
    this.cache.delete(key);
  }

  async getConfig<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const entry = this.cache.get(key);
    if (entry && this.now() < entry.expiresAt) {
      const cached = schema.safeParse(entry.data);
      if (cached.success) return cached.data;
    }
    this.cache.delete(key);

    let body: string | null;
    try {
      body = await this.transport.getText(key);
    } catch (error) {
      log.error(`Error reading config/${key}.json: ${errorMessage(error)}`);
      return null;
    }
    if (!body) {
      log.debug(`Config file not found: config/${key}.json`);
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (error) {
      log.error(`config/${key}.json is not valid JSON: ${errorMessage(error)}`);
      return null;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      log.error(`config/${key}.json failed validation: ${formatZodError(parsed.error)}`);
      return null;
    }
    this.cache.set(key, { data: parsed.data, expiresAt: this.now() + this.ttlMs });
    return parsed.data;
  }

  /** Write a document and refresh the cache. Write failures are thrown. */
  async putConfig<T>(key: string, data: T): Promise<void> {
    const json = JSON.stringify(data, null, 2);
    try {
      await this.transport.putText(key, json);
    } catch (error) {
      log.error(`❌ Error saving config/${key}.json: ${errorMessage(error)}`);
      throw error;
    }
    this.cache.set(key, { data, expiresAt: this.now() + this.ttlMs });
    log.debug(`✅ Saved config/${key}.json`);
  }

  /** Read, falling back to (and storing) the defaults when the document is missing. */
  async initConfigIfNeeded<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, defaults: T): Promise<T> {
    const existing = await this.getConfig(key, schema);
    if (existing !== null) return existing;

    let exists = false;
    try {
      exists = await this.transport.exists(key);
    } catch (error) {
      log.warn(`Could not check config/${key}.json: ${errorMessage(error)}`);
      return defaults;
    }
    if (exists) return defaults;

    log.log(`📝 Initializing config/${key}.json with defaults`);
    try {
      await this.putConfig(key, defaults);
    } catch {
      log.warn(`Could not initialize config/${key}.json, using in-memory default`);
    }
    return defaults;
  }
}
