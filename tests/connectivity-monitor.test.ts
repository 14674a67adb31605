import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConnectivityMonitor } from '@/lib/connectivity-monitor';
import { ManualSleep } from './helpers/fakes';

describe('ConnectivityMonitor', () => {
  let monitor: ConnectivityMonitor;

  afterEach(() => {
    monitor.dispose();
  });

  it('notifies once for repeated identical signals', () => {
    monitor = new ConnectivityMonitor();
    const listener = vi.fn();
    monitor.onTransition(listener);

    expect(monitor.report(true)).toBe(true);
    expect(monitor.report(true)).toBe(false);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toMatchObject({ from: 'unknown', to: 'online' });
  });

  it('does not treat the first online signal as a reconnect', () => {
    monitor = new ConnectivityMonitor();
    const reconnect = vi.fn();
    monitor.onReconnect(reconnect);

    monitor.report(true);

    expect(reconnect).not.toHaveBeenCalled();
    expect(monitor.isOnline()).toBe(true);
  });

  it('fires reconnect handlers once per offline to online edge', () => {
    monitor = new ConnectivityMonitor();
    const reconnect = vi.fn();
    monitor.onReconnect(reconnect);

    monitor.report(false);
    monitor.report(true);
    monitor.report(true);
    monitor.report(false);
    monitor.report(false);
    monitor.report(true);

    expect(reconnect).toHaveBeenCalledTimes(2);
  });

  it('keeps notifying other listeners when one throws', () => {
    monitor = new ConnectivityMonitor();
    const second = vi.fn();
    monitor.onTransition(() => {
      throw new Error('listener bug');
    });
    monitor.onTransition(second);

    monitor.report(false);

    expect(second).toHaveBeenCalledTimes(1);
  });

  it('stops notifying after unsubscribe', () => {
    monitor = new ConnectivityMonitor();
    const listener = vi.fn();
    const unsubscribe = monitor.onTransition(listener);
    unsubscribe();

    monitor.report(true);

    expect(listener).not.toHaveBeenCalled();
  });

  it('feeds probe results into the status and treats probe errors as offline', async () => {
    monitor = new ConnectivityMonitor();
    const manual = new ManualSleep();
    const answers: Array<boolean | Error> = [true, new Error('ECONNREFUSED'), true];
    const probe = vi.fn(async () => {
      const next = answers.shift() ?? true;
      if (next instanceof Error) throw next;
      return next;
    });
    const reconnect = vi.fn();
    monitor.onReconnect(reconnect);

    monitor.startProbing(probe, 15_000, manual.sleep);
    await vi.waitFor(() => expect(manual.pendingCount).toBe(1));
    expect(monitor.currentStatus()).toBe('online');

    manual.release();
    await vi.waitFor(() => expect(manual.pendingCount).toBe(1));
    expect(monitor.currentStatus()).toBe('offline');

    manual.release();
    await vi.waitFor(() => expect(manual.pendingCount).toBe(1));
    expect(monitor.currentStatus()).toBe('online');
    expect(reconnect).toHaveBeenCalledTimes(1);
    expect(manual.waits).toEqual([15_000, 15_000, 15_000]);

    monitor.stopProbing();
    expect(manual.pendingCount).toBe(0);
    expect(probe).toHaveBeenCalledTimes(3);
  });
});
