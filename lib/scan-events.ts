/**
 * Platform notifications as a typed event channel.
 *
 * The native layer sends loosely-typed method calls; they are parsed once here
 * into a closed set of events and queued. One consumer per session drains the
 * queue in arrival order, so handlers never run concurrently with each other.
 */

import type { z } from 'zod';
import {
  captureCompleteArgsSchema,
  networkStatusArgsSchema,
  parseWith,
  processingCompleteArgsSchema,
  processingStatusArgsSchema,
  uploadCompleteArgsSchema,
} from './validation';
import { ScanSyncError } from './errors';

export type CaptureCompletePayload = z.infer<typeof captureCompleteArgsSchema>;
export type ProcessingCompletePayload = z.infer<typeof processingCompleteArgsSchema>;
export type UploadCompletePayload = z.infer<typeof uploadCompleteArgsSchema>;
export type ProcessingStatusPayload = z.infer<typeof processingStatusArgsSchema>;

export type ScanEvent =
  | { type: 'captureComplete'; payload: CaptureCompletePayload }
  | { type: 'processingComplete'; payload: ProcessingCompletePayload }
  | { type: 'uploadComplete'; payload: UploadCompletePayload }
  | { type: 'connectivityChanged'; payload: { isOnline: boolean } }
  | { type: 'processingStatus'; payload: ProcessingStatusPayload };

export type ScanEventType = ScanEvent['type'];

/** Native method names as the platform sends them. */
export function parsePlatformEvent(method: string, args: unknown): ScanEvent {
  switch (method) {
    case 'scanComplete':
    case 'captureComplete':
      return { type: 'captureComplete', payload: parseWith(captureCompleteArgsSchema, args, `${method} arguments`) };
    case 'processingComplete':
      return { type: 'processingComplete', payload: parseWith(processingCompleteArgsSchema, args, `${method} arguments`) };
    case 'scanUploadComplete':
      return { type: 'uploadComplete', payload: parseWith(uploadCompleteArgsSchema, args, `${method} arguments`) };
    case 'networkStatusChanged':
      return { type: 'connectivityChanged', payload: parseWith(networkStatusArgsSchema, args, `${method} arguments`) };
    case 'updateProcessingStatus':
      return { type: 'processingStatus', payload: parseWith(processingStatusArgsSchema, args, `${method} arguments`) };
    default:
      throw new ScanSyncError('validation', `Unknown platform event: ${method}`);
  }
}

export type ScanEventHandler = (event: ScanEvent) => Promise<void>;

export class ScanEventChannel {
  private readonly queue: ScanEvent[] = [];
  private wake: (() => void) | null = null;
  private idleWaiters: Array<() => void> = [];
  private closed = false;
  private consuming = false;
  private busy = false;

  get size(): number {
    return this.queue.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  push(event: ScanEvent): void {
    if (this.closed) {
      throw new ScanSyncError('validation', `Event channel is closed; dropped ${event.type}`);
    }
    this.queue.push(event);
    this.wake?.();
  }

  /** Parse a raw platform call and queue it. Invalid payloads are thrown to the sender. */
  pushPlatform(method: string, args: unknown): ScanEvent {
    const event = parsePlatformEvent(method, args);
    this.push(event);
    return event;
  }

  /** Stop accepting events; the consumer finishes what is queued and returns. */
  close(): void {
    this.closed = true;
    this.wake?.();
  }

  /** Resolves when the queue is empty and no handler is running. */
  whenIdle(): Promise<void> {
    if (this.queue.length === 0 && !this.busy) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * The dispatch loop. Runs until the channel is closed and drained. A handler
   * error is passed to `onError` and the loop moves on to the next event.
   */
  async consume(handler: ScanEventHandler, onError: (error: unknown, event: ScanEvent) => void): Promise<void> {
    if (this.consuming) {
      throw new ScanSyncError('validation', 'Event channel already has a consumer');
    }
    this.consuming = true;
    try {
      for (;;) {
        const event = this.queue.shift();
        if (!event) {
          this.notifyIdle();
          if (this.closed) return;
          await new Promise<void>((resolve) => {
            this.wake = resolve;
          });
          this.wake = null;
          continue;
        }
        this.busy = true;
        try {
          await handler(event);
        } catch (error) {
          onError(error, event);
        } finally {
          this.busy = false;
        }
      }
    } finally {
      this.consuming = false;
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
