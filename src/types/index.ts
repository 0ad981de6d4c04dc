/**
 * Core Type Definitions for the Printer Log Monitor
 */

export type LogType = 'info' | 'warning' | 'error';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Bucket of near-duplicate lines sharing a pattern within one wall-clock minute.
 * Invariant: count === raw_messages.length
 */
export interface MessageGroup {
  pattern: string;
  count: number;
  first_timestamp: string;
  last_timestamp: string;
  raw_messages: string[];
  parsed_time: Date;
}

export interface LogEntry {
  timestamp: string;
  message: string;
  type: LogType;
  occurrences: number;
  /** Lines of this entry added by the batch that emitted it; 0 for a re-read window */
  new_occurrences: number;
  raw: string;
  pattern: string;
  details?: string;
}

export interface AlertCandidate {
  type: LogType;
  message: string;
  details?: JsonObject;
}

export interface Alert {
  id: string;
  type: LogType;
  message: string;
  details: JsonObject;
  created_at: string;
  updated_at: string;
  resolved_at?: string;
  resolved?: boolean;
  occurrence_count: number;
}

/**
 * Alert raised by the UI layer itself (e.g. printer connectivity), keyed by
 * a caller-chosen id rather than a content hash.
 */
export interface LocalAlert {
  id: string;
  type: LogType;
  message: string;
  details: JsonObject;
  created_at: string;
  updated_at: string;
  occurrence_count: number;
}

export interface GrouperStats {
  total_groups: number;
  buffered_entries: number;
  tracked_messages: number;
  total_lines: number;
  deduplication_rate: string;
}

export interface CleanupSummary {
  groups_evicted: number;
  groups_trimmed: number;
  seen_messages_reset: boolean;
}

export interface AlertStats {
  active_alerts: number;
  local_alerts: number;
  history_entries: number;
  resolved_in_history: number;
  created_total: number;
  suppressed_total: number;
}

export interface AlertCleanupSummary {
  active_removed: number;
  history_removed: number;
  local_removed: number;
}

export interface MonitorState {
  enabled: boolean;
  running: boolean;
  runs: number;
  failures: number;
  last_run_at?: string;
  last_success_at?: string;
  last_duration_ms?: number;
  last_batch_size?: number;
  last_entry_count?: number;
  last_error?: string;
  last_cleanup_at?: string;
}
