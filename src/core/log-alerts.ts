/**
 * Raise alerts from the warning and error entries of a processed batch.
 * Entries whose lines were all counted by an earlier batch are skipped.
 */

import type { Alert, LogEntry } from '../types';
import type { AlertManager } from './alert-manager';

export function forwardLogAlerts(entries: readonly LogEntry[], alerts: AlertManager): Alert[] {
  const raised: Alert[] = [];

  for (const entry of entries) {
    if (entry.type === 'info' || entry.new_occurrences === 0) continue;

    const alert = alerts.processAlert({
      type: entry.type,
      message: entry.message,
      details: {
        timestamp: entry.timestamp,
        raw_message: entry.raw,
        occurrences: entry.occurrences,
      },
    });
    if (alert) raised.push(alert);
  }

  return raised;
}
