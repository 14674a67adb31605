/**
 * Validation schemas using Zod
 *
 * Everything untyped that enters the engine (scan API responses, native platform
 * events, persisted snapshots) is parsed here once and handed on as typed values.
 */

import { z } from 'zod'
import { ScanSyncError } from './errors'

const lenientNumber = z.coerce.number().catch(0)
const optionalString = z.union([z.string(), z.number()]).transform(String).optional().catch(undefined)

/**
 * Coordinate as sent by the server (strings) or the native layer (numbers)
 */
export const coordinateSchema = z.object({
  latitude: z.coerce.number(),
  longitude: z.coerce.number(),
  accuracy: z.coerce.number().optional(),
  timestamp: z.string().optional(),
})

/**
 * Scan detail returned by the scan API
 */
export const remoteScanSchema = z.object({
  id: z.union([z.string().min(1), z.number().int().positive()]).transform(String),
  title: z.string().catch(''),
  description: z.string().optional().catch(undefined),
  status: z.string().catch('pending'),
  duration: lenientNumber,
  data_size_mb: lenientNumber,
  total_images: lenientNumber,
  location_name: z.string().optional().catch(undefined),
  gps_points: z.array(coordinateSchema).catch([]),
  point_cloud: z.object({
    processed_model: z.string().nullish(),
    snapshot: z.string().nullish(),
  }).nullish().catch(null),
  upload_status: z.object({
    status: z.string().catch(''),
    error_message: z.string().catch(''),
    retry_count: lenientNumber,
  }).nullish().catch(null),
  created_at: optionalString,
  updated_at: optionalString,
})

export type RemoteScanPayload = z.infer<typeof remoteScanSchema>

/**
 * Scan list: either a bare array or a paginated `{ results: [...] }` envelope
 */
export const remoteScanListSchema = z.union([
  z.array(remoteScanSchema),
  z.object({ results: z.array(remoteScanSchema) }).transform((page) => page.results),
])

export const processingJobResponseSchema = z.object({
  success: z.boolean().optional(),
  accepted: z.boolean().optional(),
  status: z.string().optional(),
  message: z.string().optional(),
  error_code: z.string().optional(),
  code: z.string().optional(),
})

export const registerScanResponseSchema = z.object({
  id: z.union([z.string().min(1), z.number().int().positive()]).transform(String),
})

/**
 * Native platform events, keyed by the method name the platform sends
 */
export const captureCompleteArgsSchema = z.object({
  folderPath: z.string().min(1),
  scanID: optionalString,
  name: z.string().optional(),
  timestamp: optionalString,
  locationName: z.string().optional(),
  coordinates: z.array(coordinateSchema).optional().catch(undefined),
  imageCount: z.coerce.number().int().min(0).optional(),
  durationSeconds: z.coerce.number().min(0).optional(),
})

export const processingCompleteArgsSchema = z.object({
  usdzPath: z.string().min(1),
  folderPath: z.string().optional(),
  snapshotPath: z.string().optional(),
  modelSizeBytes: z.coerce.number().min(0).optional(),
})

export const uploadCompleteArgsSchema = z.object({
  success: z.boolean(),
  folderPath: z.string().optional(),
  message: z.string().optional(),
})

export const networkStatusArgsSchema = z.object({
  isOnline: z.boolean(),
})

export const processingStatusArgsSchema = z.object({
  status: z.string().catch('processing'),
  folderPath: z.string().optional(),
})

const scanStatusSchema = z.enum(['pending', 'uploading', 'syncing', 'processing', 'uploaded', 'completed', 'failed'])

const scanErrorSchema = z.object({
  kind: z.enum(['validation', 'network', 'timeout', 'permission', 'server', 'cancelled']),
  message: z.string(),
  code: z.string().optional(),
})

/**
 * Persisted scan record (store snapshot)
 */
export const scanRecordSchema = z.object({
  id: z.string().min(1),
  remoteId: z.string().optional(),
  source: z.enum(['local', 'remote']),
  status: scanStatusSchema,
  metadata: z.object({
    name: z.string(),
    locationName: z.string().optional(),
    coordinates: z.array(coordinateSchema),
    imageCount: z.number(),
    durationSeconds: z.number(),
    dataSizeBytes: z.number().optional(),
    createdAt: z.string(),
    updatedAt: z.string(),
  }),
  artifactPaths: z.object({
    modelPath: z.string().optional(),
    snapshotPath: z.string().optional(),
    folderPath: z.string().optional(),
  }).optional(),
  lastError: scanErrorSchema.optional(),
  processingMessage: z.string().optional(),
})

export const scanSnapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  records: z.array(scanRecordSchema),
})

export type ScanSnapshot = z.infer<typeof scanSnapshotSchema>

export function formatZodError(error: z.ZodError): string {
  return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join(', ')
}

/**
 * Parse external data, turning schema failures into a ScanSyncError of the given kind
 */
export function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  what: string,
  kind: 'validation' | 'server' = 'validation'
): T {
  const result = schema.safeParse(data)
  if (!result.success) {
    throw new ScanSyncError(kind, `Invalid ${what}: ${formatZodError(result.error)}`)
  }
  return result.data
}
