/**
 * Log Monitor Service - polls the printer log and feeds the engines
 */

import { forwardLogAlerts } from '../core';
import type { AlertManager, LogGrouper } from '../core';
import type { Alert, AlertCleanupSummary, CleanupSummary, LogEntry, MonitorState } from '../types';
import { componentLogger } from '../utils/logger';
import type { LogSource } from './printer.service';

const log = componentLogger('log-monitor');

export interface LogMonitorOptions {
  logGrouper: LogGrouper;
  alertManager: AlertManager;
  /** Without a source, polling is disabled and only pushed batches are processed */
  source?: LogSource;
  pollLines?: number;
  pollIntervalMs?: number;
  cleanupIntervalMs?: number;
  alertRetentionHours?: number;
}

export interface IngestResult {
  entries: LogEntry[];
  alerts: Alert[];
}

export interface CleanupResult {
  logs: CleanupSummary;
  alerts: AlertCleanupSummary;
}

export class LogMonitor {
  private readonly logGrouper: LogGrouper;
  private readonly alertManager: AlertManager;
  private readonly source?: LogSource;
  private readonly pollLines: number;
  private readonly pollIntervalMs: number;
  private readonly cleanupIntervalMs: number;
  private readonly alertRetentionHours: number;
  private readonly state: MonitorState;
  private pollTimer?: ReturnType<typeof setInterval>;
  private cleanupTimer?: ReturnType<typeof setInterval>;

  constructor(options: LogMonitorOptions) {
    this.logGrouper = options.logGrouper;
    this.alertManager = options.alertManager;
    this.source = options.source;
    this.pollLines = options.pollLines ?? 200;
    this.pollIntervalMs = options.pollIntervalMs ?? 5000;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 5 * 60 * 1000;
    this.alertRetentionHours = options.alertRetentionHours ?? 24;
    this.state = {
      enabled: this.source !== undefined,
      running: false,
      runs: 0,
      failures: 0,
    };
  }

  start(): void {
    this.stop();

    this.cleanupTimer = setInterval(() => {
      this.runCleanup();
    }, this.cleanupIntervalMs);
    this.cleanupTimer.unref();

    if (!this.source) {
      log.info('No printer configured, log polling disabled');
      return;
    }

    log.info(`Polling ${this.source.describe()} every ${this.pollIntervalMs}ms`);
    this.pollTimer = setInterval(() => {
      void this.runCycle();
    }, this.pollIntervalMs);
    this.pollTimer.unref();
    void this.runCycle();
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = undefined;
    }
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  getState(): MonitorState {
    return { ...this.state };
  }

  /**
   * Group a batch of raw lines and raise alerts for its warnings and errors
   */
  ingest(lines: readonly string[]): IngestResult {
    const entries = this.logGrouper.processBatch(lines);
    const alerts = forwardLogAlerts(entries, this.alertManager);
    return { entries, alerts };
  }

  /**
   * One poll of the printer log. Never rejects: failures land in the state.
   */
  async runCycle(): Promise<void> {
    if (!this.source || this.state.running) return;

    this.state.running = true;
    this.state.runs++;
    this.state.last_run_at = new Date().toISOString();
    const started = performance.now();

    try {
      const lines = await this.source.fetchLogLines(this.pollLines);
      const { entries } = this.ingest(lines);

      this.state.last_batch_size = lines.length;
      this.state.last_entry_count = entries.length;
      this.state.last_success_at = new Date().toISOString();
      this.state.last_error = undefined;
    } catch (error) {
      this.state.failures++;
      this.state.last_error = error instanceof Error ? error.message : String(error);
      log.warn(`Log poll failed: ${this.state.last_error}`);
    } finally {
      this.state.last_duration_ms = Number((performance.now() - started).toFixed(2));
      this.state.running = false;
    }
  }

  runCleanup(): CleanupResult {
    const result: CleanupResult = {
      logs: this.logGrouper.clearOldData(),
      alerts: this.alertManager.clearOldAlerts(this.alertRetentionHours),
    };
    this.state.last_cleanup_at = new Date().toISOString();
    return result;
  }
}
