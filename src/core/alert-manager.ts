/**
 * Alert Lifecycle Service
 *
 * Features:
 * 1. Content-derived alert ids, so repeats of one condition share an alert
 * 2. Occurrence counting throttled to one bump per update interval
 * 3. Resolve with a suppression window against resolve/reopen flapping
 * 4. Bounded history and age-based expiry
 *
 * Mutations are synchronous; each one runs to completion before any other
 * handler sees the maps.
 */

import type {
  Alert,
  AlertCandidate,
  AlertCleanupSummary,
  AlertStats,
  JsonObject,
  LocalAlert,
  LogType,
} from '../types';
import { componentLogger } from '../utils/logger';
import { generateAlertId } from './alert-normalizer';

const log = componentLogger('alert-manager');

export interface AlertManagerOptions {
  historySize?: number;
  updateIntervalSeconds?: number;
  resolveSuppressionSeconds?: number;
  now?: () => Date;
}

export interface LocalAlertInput {
  id: string;
  type: LogType;
  message: string;
  details?: JsonObject;
}

function ageMs(now: Date, iso: string): number {
  return now.getTime() - Date.parse(iso);
}

export class AlertManager {
  // Active alerts (content id -> alert)
  private activeAlerts: Map<string, Alert> = new Map();

  // Alerts raised directly by the UI layer (caller id -> alert)
  private localAlerts: Map<string, LocalAlert> = new Map();

  // Immutable snapshots, oldest first
  private history: Alert[] = [];

  private createdTotal = 0;
  private suppressedTotal = 0;

  private readonly historySize: number;
  private readonly updateIntervalMs: number;
  private readonly resolveSuppressionMs: number;
  private readonly now: () => Date;

  constructor(options: AlertManagerOptions = {}) {
    this.historySize = options.historySize ?? 1000;
    this.updateIntervalMs = (options.updateIntervalSeconds ?? 60) * 1000;
    this.resolveSuppressionMs = (options.resolveSuppressionSeconds ?? 60) * 1000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Process incoming alert candidate
   * Returns: the new or existing alert, or null if it was resolved too recently
   */
  public processAlert(candidate: AlertCandidate): Alert | null {
    const id = generateAlertId(candidate);
    const now = this.now();

    if (this.wasRecentlyResolved(id, now)) {
      this.suppressedTotal++;
      log.debug(`Suppressed recently resolved alert ${id}`);
      return null;
    }

    const existing = this.activeAlerts.get(id);
    if (existing) {
      if (ageMs(now, existing.updated_at) >= this.updateIntervalMs) {
        existing.updated_at = now.toISOString();
        existing.occurrence_count++;
        if (candidate.details !== undefined) {
          existing.details = { ...candidate.details };
        }
        log.debug(`Updated alert ${id} (count: ${existing.occurrence_count})`);
      }
      return this.snapshot(existing);
    }

    const createdAt = now.toISOString();
    const alert: Alert = {
      id,
      type: candidate.type,
      message: candidate.message,
      details: { ...candidate.details },
      created_at: createdAt,
      updated_at: createdAt,
      occurrence_count: 1,
    };

    this.activeAlerts.set(id, alert);
    this.appendHistory(this.snapshot(alert));
    this.createdTotal++;
    log.info(`Created ${alert.type} alert ${id}: ${alert.message}`);

    return this.snapshot(alert);
  }

  /**
   * Mark alert as resolved and move it to history
   */
  public resolveAlert(id: string): Alert | null {
    const alert = this.activeAlerts.get(id);
    if (!alert) return null;

    const resolved: Alert = {
      ...this.snapshot(alert),
      resolved_at: this.now().toISOString(),
      resolved: true,
    };

    this.appendHistory(resolved);
    this.activeAlerts.delete(id);
    log.info(`Resolved alert ${id}`);

    return { ...resolved, details: { ...resolved.details } };
  }

  public getAlert(id: string): Alert | undefined {
    const alert = this.activeAlerts.get(id);
    return alert ? this.snapshot(alert) : undefined;
  }

  /**
   * Active alerts followed by local alerts
   */
  public getActiveAlerts(): Array<Alert | LocalAlert> {
    return [
      ...Array.from(this.activeAlerts.values(), (alert) => this.snapshot(alert)),
      ...Array.from(this.localAlerts.values(), (alert) => ({ ...alert, details: { ...alert.details } })),
    ];
  }

  /**
   * Most recently appended history records, oldest first
   */
  public getAlertHistory(limit: number = 100): Alert[] {
    if (limit <= 0) return [];
    return this.history.slice(-limit).map((alert) => ({ ...alert, details: { ...alert.details } }));
  }

  public addLocalAlert(input: LocalAlertInput): LocalAlert {
    const now = this.now().toISOString();
    const existing = this.localAlerts.get(input.id);
    const alert: LocalAlert = {
      id: input.id,
      type: input.type,
      message: input.message,
      details: { ...input.details },
      created_at: existing?.created_at ?? now,
      updated_at: now,
      occurrence_count: existing ? existing.occurrence_count + 1 : 1,
    };

    this.localAlerts.set(input.id, alert);
    return { ...alert, details: { ...alert.details } };
  }

  public removeLocalAlert(id: string): boolean {
    return this.localAlerts.delete(id);
  }

  /**
   * Drop alerts older than maxAgeHours: active by last update, history and
   * local alerts by creation
   */
  public clearOldAlerts(maxAgeHours: number = 24): AlertCleanupSummary {
    const now = this.now();
    const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
    const summary: AlertCleanupSummary = { active_removed: 0, history_removed: 0, local_removed: 0 };

    for (const [id, alert] of this.activeAlerts.entries()) {
      if (ageMs(now, alert.updated_at) >= maxAgeMs) {
        this.activeAlerts.delete(id);
        summary.active_removed++;
      }
    }

    const keptHistory = this.history.filter((alert) => ageMs(now, alert.created_at) < maxAgeMs);
    summary.history_removed = this.history.length - keptHistory.length;
    this.history = keptHistory;

    for (const [id, alert] of this.localAlerts.entries()) {
      if (ageMs(now, alert.created_at) >= maxAgeMs) {
        this.localAlerts.delete(id);
        summary.local_removed++;
      }
    }

    const removed = summary.active_removed + summary.history_removed + summary.local_removed;
    if (removed > 0) {
      log.info(`Cleaned up ${removed} expired alert records`, { ...summary });
    }

    return summary;
  }

  public getStats(): AlertStats {
    return {
      active_alerts: this.activeAlerts.size,
      local_alerts: this.localAlerts.size,
      history_entries: this.history.length,
      resolved_in_history: this.history.filter((alert) => alert.resolved === true).length,
      created_total: this.createdTotal,
      suppressed_total: this.suppressedTotal,
    };
  }

  private wasRecentlyResolved(id: string, now: Date): boolean {
    return this.history.some(
      (alert) =>
        alert.id === id &&
        alert.resolved_at !== undefined &&
        ageMs(now, alert.resolved_at) < this.resolveSuppressionMs
    );
  }

  private appendHistory(alert: Alert): void {
    this.history.push(alert);
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }
  }

  private snapshot(alert: Alert): Alert {
    return { ...alert, details: { ...alert.details } };
  }
}
