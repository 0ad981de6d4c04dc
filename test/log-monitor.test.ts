import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AlertManager, LogGrouper } from '../src/core';
import { LogMonitor } from '../src/services/log-monitor.service';
import type { LogSource } from '../src/services/printer.service';

const NOW = new Date(2026, 5, 5, 14, 30, 0);

const ERROR_LINE = 'Jun 5 14:22:01 printer01 PrinterService[812]:ERR - Print head offline';
const INFO_LINE = 'Jun 5 14:23:01 printer01 PrinterService[812]: idle';

class FakeSource implements LogSource {
  public requests: number[] = [];
  public lines: string[] = [ERROR_LINE, INFO_LINE];
  public failWith?: Error;

  describe(): string {
    return 'fake printer';
  }

  async fetchLogLines(count: number): Promise<string[]> {
    this.requests.push(count);
    if (this.failWith) throw this.failWith;
    return this.lines;
  }
}

function createMonitor(source?: LogSource) {
  const logGrouper = new LogGrouper({ now: () => NOW });
  const alertManager = new AlertManager({ now: () => NOW });
  const monitor = new LogMonitor({
    logGrouper,
    alertManager,
    source,
    pollLines: 50,
    pollIntervalMs: 1000,
    cleanupIntervalMs: 10000,
    alertRetentionHours: 24,
  });
  return { logGrouper, alertManager, monitor };
}

describe('LogMonitor', () => {
  it('groups pushed lines and raises alerts for errors', () => {
    const { monitor, alertManager } = createMonitor();

    const result = monitor.ingest([ERROR_LINE, INFO_LINE]);

    expect(result.entries.map((entry) => entry.type)).toEqual(['info', 'error']);
    expect(result.alerts).toHaveLength(1);
    expect(result.alerts[0].message).toBe('PrinterService[812]:ERR - Print head offline');
    expect(alertManager.getActiveAlerts()).toHaveLength(1);
  });

  it('raises nothing when the same window is read again', () => {
    let current = new Date(NOW);
    const logGrouper = new LogGrouper({ now: () => current });
    const alertManager = new AlertManager({ now: () => current });
    const monitor = new LogMonitor({ logGrouper, alertManager });

    const [alert] = monitor.ingest([ERROR_LINE, INFO_LINE]).alerts;
    alertManager.resolveAlert(alert.id);

    current = new Date(NOW.getTime() + 65_000);
    expect(monitor.ingest([ERROR_LINE, INFO_LINE]).alerts).toEqual([]);
    expect(alertManager.getActiveAlerts()).toEqual([]);
  });

  it('does not bump an alert for lines it already counted', () => {
    let current = new Date(NOW);
    const logGrouper = new LogGrouper({ now: () => current });
    const alertManager = new AlertManager({ now: () => current });
    const monitor = new LogMonitor({ logGrouper, alertManager });

    const [alert] = monitor.ingest([ERROR_LINE]).alerts;

    current = new Date(NOW.getTime() + 130_000);
    monitor.ingest([ERROR_LINE]);
    expect(alertManager.getAlert(alert.id)?.occurrence_count).toBe(1);

    const repeat = 'Jun 5 14:22:30 printer01 PrinterService[812]:ERR - Print head offline';
    monitor.ingest([ERROR_LINE, repeat]);
    expect(alertManager.getAlert(alert.id)?.occurrence_count).toBe(2);
  });

  it('polls the source and records a successful cycle', async () => {
    const source = new FakeSource();
    const { monitor, logGrouper } = createMonitor(source);

    await monitor.runCycle();

    expect(source.requests).toEqual([50]);
    expect(logGrouper.getRecentLogs()).toHaveLength(2);
    expect(monitor.getState()).toMatchObject({
      enabled: true,
      running: false,
      runs: 1,
      failures: 0,
      last_batch_size: 2,
      last_entry_count: 2,
    });
    expect(monitor.getState().last_success_at).toBeDefined();
  });

  it('records a failed cycle without rejecting', async () => {
    const source = new FakeSource();
    source.failWith = new Error('printer unreachable');
    const { monitor } = createMonitor(source);

    await expect(monitor.runCycle()).resolves.toBeUndefined();

    expect(monitor.getState()).toMatchObject({
      runs: 1,
      failures: 1,
      last_error: 'printer unreachable',
    });
    expect(monitor.getState().last_success_at).toBeUndefined();
  });

  it('clears the last error once a poll succeeds again', async () => {
    const source = new FakeSource();
    source.failWith = new Error('printer unreachable');
    const { monitor } = createMonitor(source);

    await monitor.runCycle();
    source.failWith = undefined;
    await monitor.runCycle();

    expect(monitor.getState()).toMatchObject({ runs: 2, failures: 1 });
    expect(monitor.getState().last_error).toBeUndefined();
  });

  it('does nothing when no source is configured', async () => {
    const { monitor } = createMonitor();

    await monitor.runCycle();

    expect(monitor.getState()).toEqual({ enabled: false, running: false, runs: 0, failures: 0 });
  });

  it('does not start a cycle while one is in flight', async () => {
    let release: (lines: string[]) => void = () => undefined;
    const source: LogSource = {
      describe: () => 'slow printer',
      fetchLogLines: vi.fn(
        () =>
          new Promise<string[]>((resolve) => {
            release = resolve;
          })
      ),
    };
    const { monitor } = createMonitor(source);

    const first = monitor.runCycle();
    await monitor.runCycle();
    release([INFO_LINE]);
    await first;

    expect(source.fetchLogLines).toHaveBeenCalledTimes(1);
    expect(monitor.getState().runs).toBe(1);
  });

  it('runs both cleanups', () => {
    const { monitor, alertManager } = createMonitor();
    const spy = vi.spyOn(alertManager, 'clearOldAlerts');

    const result = monitor.runCleanup();

    expect(result).toEqual({
      logs: { groups_evicted: 0, groups_trimmed: 0, seen_messages_reset: false },
      alerts: { active_removed: 0, history_removed: 0, local_removed: 0 },
    });
    expect(spy).toHaveBeenCalledWith(24);
    expect(monitor.getState().last_cleanup_at).toBeDefined();
  });

  describe('timers', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('polls immediately and then on every interval until stopped', async () => {
      const source = new FakeSource();
      const { monitor } = createMonitor(source);

      monitor.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(source.requests).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(2000);
      expect(source.requests).toHaveLength(3);

      monitor.stop();
      await vi.advanceTimersByTimeAsync(5000);
      expect(source.requests).toHaveLength(3);
    });

    it('keeps running cleanup when polling is disabled', async () => {
      const { monitor } = createMonitor();
      const cleanup = vi.spyOn(monitor, 'runCleanup');

      monitor.start();
      await vi.advanceTimersByTimeAsync(20000);
      monitor.stop();

      expect(cleanup).toHaveBeenCalledTimes(2);
      expect(monitor.getState().runs).toBe(0);
    });
  });
});
