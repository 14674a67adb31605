/**
 * Edge-triggered connectivity tracking.
 *
 * Signals may arrive repeatedly (platform pushes, periodic probes); listeners only
 * hear about changes. Reconnect handlers (offline -> online) are a separate set so
 * the sync orchestrator is woken exactly once per edge however many subsystems
 * watch transitions.
 */

import { scopedLogger } from './logger';
import { errorMessage } from './errors';
import { runRetryLoop, type Sleep } from './retry';

const log = scopedLogger('NET');

export type ConnectivityStatus = 'online' | 'offline';

export interface ConnectivityTransition {
  from: ConnectivityStatus | 'unknown';
  to: ConnectivityStatus;
  at: string;
}

export type TransitionListener = (transition: ConnectivityTransition) => void;

/** Reachability check used for periodic probing; resolve true when the API answers. */
export type ConnectivityProbe = (signal?: AbortSignal) => Promise<boolean>;

export class ConnectivityMonitor {
  private status: ConnectivityStatus | 'unknown' = 'unknown';
  private readonly listeners = new Set<TransitionListener>();
  private readonly reconnectHandlers = new Set<() => void>();
  private probeController: AbortController | null = null;

  currentStatus(): ConnectivityStatus | 'unknown' {
    return this.status;
  }

  isOnline(): boolean {
    return this.status === 'online';
  }

  /**
   * Feed a raw signal. Returns true when it changed the status. The first signal
   * only establishes the status; it is not a reconnect.
   */
  report(online: boolean): boolean {
    const next: ConnectivityStatus = online ? 'online' : 'offline';
    if (next === this.status) return false;

    const transition: ConnectivityTransition = {
      from: this.status,
      to: next,
      at: new Date().toISOString(),
    };
    this.status = next;
    log.log(`${transition.from} -> ${transition.to}`);

    for (const listener of [...this.listeners]) {
      this.invoke(() => listener(transition));
    }
    if (transition.from === 'offline' && transition.to === 'online') {
      for (const handler of [...this.reconnectHandlers]) {
        this.invoke(handler);
      }
    }
    return true;
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Fires on offline -> online edges only. Registering the same handler twice is a no-op. */
  onReconnect(handler: () => void): () => void {
    this.reconnectHandlers.add(handler);
    return () => {
      this.reconnectHandlers.delete(handler);
    };
  }

  /** Probe reachability every `intervalMs` until `stopProbing()` or `dispose()`. */
  startProbing(probe: ConnectivityProbe, intervalMs: number, sleep?: Sleep): void {
    this.stopProbing();
    const controller = new AbortController();
    this.probeController = controller;

    runRetryLoop<never>({
      attempt: async (_n, signal) => {
        this.report(await probe(signal));
        return { done: false };
      },
      onError: (error) => {
        log.debug(`Probe failed: ${errorMessage(error)}`);
        if (!controller.signal.aborted) this.report(false);
        return 'retry';
      },
      delayMs: intervalMs,
      signal: controller.signal,
      sleep,
    }).catch((error: unknown) => {
      if (!controller.signal.aborted) {
        log.error('Connectivity probing stopped unexpectedly', error);
      }
    });
  }

  stopProbing(): void {
    this.probeController?.abort();
    this.probeController = null;
  }

  dispose(): void {
    this.stopProbing();
    this.listeners.clear();
    this.reconnectHandlers.clear();
  }

  private invoke(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      log.error('Connectivity listener threw', error);
    }
  }
}
