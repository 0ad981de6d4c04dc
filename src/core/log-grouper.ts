/**
 * Log Grouping and Deduplication Engine
 *
 * Buckets raw controller log lines by (pattern, minute), emits one display
 * entry per bucket touched by a batch, and keeps a rolling buffer of the
 * latest entry per bucket for the "recent logs" view.
 *
 * Every mutating method is synchronous, so on the event loop a whole
 * batch is applied before any other caller can observe the state.
 */

import type { CleanupSummary, GrouperStats, LogEntry, LogType, MessageGroup } from '../types';
import { componentLogger } from '../utils/logger';
import { MJPG_CLIENT_PATTERN, extractDetails, matchPattern, normalizePattern } from './pattern-normalizer';
import { parseLogLine, stripLinePrefix, toMinuteKey } from './syslog-line';

const log = componentLogger('log-grouper');

export const WAIT_FOR_CLEANUP = 'WAIT_FOR_CLEANUP';

const FAILED_FETCH_REGEX = /Failed to fetch .+ at (http\S+)/;

export interface LogGrouperOptions {
  bufferSize?: number;
  groupRetentionMinutes?: number;
  maxSeenMessages?: number;
  maxPatternGroups?: number;
  now?: () => Date;
}

interface GroupState {
  group: MessageGroup;
  // raw line -> times it is recorded in the group
  lineCounts: Map<string, number>;
}

interface BufferedEntry {
  entry: LogEntry;
  sortTime: number;
}

interface SeverityRule {
  type: LogType;
  matches: (message: string) => boolean;
}

// "WAR" is a plain substring test, so e.g. "SOFTWARE" also reads as a warning
const SEVERITY_RULES: ReadonlyArray<SeverityRule> = [
  { type: 'warning', matches: (message) => message.includes('WAR') },
  {
    type: 'error',
    matches: (message) => message.includes('ERR') || message.toUpperCase().includes('ERROR'),
  },
];

export function classifySeverity(message: string): LogType {
  return SEVERITY_RULES.find((rule) => rule.matches(message))?.type ?? 'info';
}

function copyGroup(group: MessageGroup): MessageGroup {
  return { ...group, raw_messages: [...group.raw_messages] };
}

function uniqueSorted(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

export class LogGrouper {
  // Pattern buckets (pattern key -> group)
  private groups: Map<string, GroupState> = new Map();

  // Latest entry per pattern key, insertion-ordered oldest first
  private buffer: Map<string, BufferedEntry> = new Map();

  private seenMessages: Set<string> = new Set();

  // WAIT_FOR_CLEANUP raw timestamp -> parsed epoch ms
  private cleanupMarks: Map<string, number> = new Map();

  private totalLines = 0;

  private readonly bufferSize: number;
  private readonly groupRetentionMs: number;
  private readonly maxSeenMessages: number;
  private readonly maxPatternGroups: number;
  private readonly now: () => Date;

  constructor(options: LogGrouperOptions = {}) {
    this.bufferSize = options.bufferSize ?? 1000;
    this.groupRetentionMs = (options.groupRetentionMinutes ?? 60) * 60 * 1000;
    this.maxSeenMessages = options.maxSeenMessages ?? 10000;
    this.maxPatternGroups = options.maxPatternGroups ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Bucket a batch of raw lines and return one entry per bucket touched,
   * newest first. Lines that do not parse are skipped. `new_occurrences`
   * tells how many of the entry's lines this batch added.
   */
  public processBatch(lines: readonly string[]): LogEntry[] {
    const now = this.now();
    const added: Map<string, number> = new Map();
    const batchCounts: Map<string, number> = new Map();

    for (const line of lines) {
      const result = this.ingestLine(line, now, batchCounts);
      if (result !== null) {
        added.set(result.key, (added.get(result.key) ?? 0) + (result.counted ? 1 : 0));
      }
    }

    const entries = Array.from(added.entries()).flatMap(([key, newOccurrences]) => {
      const group = this.groups.get(key)?.group;
      if (!group) return [];
      const entry = this.toEntry(group, newOccurrences);
      this.remember(key, entry, group.parsed_time.getTime());
      return [{ entry, sortTime: group.parsed_time.getTime() }];
    });

    if (entries.length > 0) {
      log.debug(`Processed batch of ${lines.length} lines into ${entries.length} entries`);
    }

    return entries.sort((a, b) => b.sortTime - a.sortTime).map(({ entry }) => entry);
  }

  /**
   * Most recent entries from the rolling buffer, newest first
   */
  public getRecentLogs(limit: number = 100): LogEntry[] {
    if (limit <= 0) return [];
    return Array.from(this.buffer.values())
      .sort((a, b) => b.sortTime - a.sortTime)
      .slice(0, limit)
      .map(({ entry }) => ({ ...entry }));
  }

  /**
   * Get group by pattern key ("{pattern}:{YYYYMMDDHHMM}")
   */
  public getGroup(key: string): MessageGroup | undefined {
    const state = this.groups.get(key);
    return state ? copyGroup(state.group) : undefined;
  }

  public getGroups(): Array<{ key: string; group: MessageGroup }> {
    return Array.from(this.groups.entries()).map(([key, { group }]) => ({ key, group: copyGroup(group) }));
  }

  /**
   * Evict stale buckets and bound the tracking structures
   */
  public clearOldData(): CleanupSummary {
    const cutoff = this.now().getTime() - this.groupRetentionMs;
    const summary: CleanupSummary = { groups_evicted: 0, groups_trimmed: 0, seen_messages_reset: false };

    for (const [key, { group }] of this.groups.entries()) {
      if (group.parsed_time.getTime() < cutoff) {
        this.groups.delete(key);
        summary.groups_evicted++;
      }
    }

    for (const [timestamp, parsedMs] of this.cleanupMarks.entries()) {
      if (parsedMs < cutoff) this.cleanupMarks.delete(timestamp);
    }

    if (this.seenMessages.size > this.maxSeenMessages) {
      this.seenMessages = new Set(Array.from(this.buffer.values(), ({ entry }) => entry.raw));
      summary.seen_messages_reset = true;
    }

    if (this.groups.size > this.maxPatternGroups) {
      const bufferedPatterns = new Set(Array.from(this.buffer.values(), ({ entry }) => entry.pattern));
      for (const [key, { group }] of this.groups.entries()) {
        if (!bufferedPatterns.has(group.pattern)) {
          this.groups.delete(key);
          summary.groups_trimmed++;
        }
      }
    }

    if (summary.groups_evicted > 0 || summary.groups_trimmed > 0) {
      log.info(
        `Cleaned up ${summary.groups_evicted} expired and ${summary.groups_trimmed} untracked pattern groups`
      );
    }

    return summary;
  }

  public getStats(): GrouperStats {
    const groups = Array.from(this.groups.values(), ({ group }) => group);
    const grouped = groups.reduce((sum, group) => sum + group.count, 0);

    return {
      total_groups: groups.length,
      buffered_entries: this.buffer.size,
      tracked_messages: this.seenMessages.size,
      total_lines: this.totalLines,
      deduplication_rate:
        grouped > 0 ? ((grouped - groups.length) / grouped * 100).toFixed(2) + '%' : '0%',
    };
  }

  /**
   * Apply one line to its bucket. Returns the pattern key and whether the
   * line was counted, or null when it was dropped.
   */
  private ingestLine(
    line: string,
    now: Date,
    batchCounts: Map<string, number>
  ): { key: string; counted: boolean } | null {
    const parsed = parseLogLine(line, now);
    if (!parsed) {
      log.debug('Skipped unparseable log line', { line });
      return null;
    }

    if (parsed.message.includes(WAIT_FOR_CLEANUP)) {
      if (this.cleanupMarks.has(parsed.timestamp)) return null;
      this.cleanupMarks.set(parsed.timestamp, parsed.parsedTime.getTime());
    }

    const { bucket } = matchPattern(parsed.message);
    const key = `${bucket}:${toMinuteKey(parsed.parsedTime)}`;
    const occurrenceInBatch = (batchCounts.get(line) ?? 0) + 1;
    batchCounts.set(line, occurrenceInBatch);
    this.seenMessages.add(line);

    const state = this.groups.get(key);
    if (!state) {
      this.groups.set(key, {
        group: {
          pattern: bucket,
          count: 1,
          first_timestamp: parsed.timestamp,
          last_timestamp: parsed.timestamp,
          raw_messages: [line],
          parsed_time: parsed.parsedTime,
        },
        lineCounts: new Map([[line, 1]]),
      });
      this.totalLines++;
      return { key, counted: true };
    }

    // Polls return overlapping windows: a line is only new if this batch
    // holds it more often than the bucket already does
    const recorded = state.lineCounts.get(line) ?? 0;
    if (occurrenceInBatch <= recorded) return { key, counted: false };

    const { group } = state;
    state.lineCounts.set(line, recorded + 1);
    group.raw_messages.push(line);
    group.count++;
    group.last_timestamp = parsed.timestamp;
    this.totalLines++;
    return { key, counted: true };
  }

  private toEntry(group: MessageGroup, newOccurrences: number): LogEntry {
    const raw = group.raw_messages[0];
    const message = stripLinePrefix(raw);
    const entry: LogEntry = {
      timestamp: group.first_timestamp,
      message,
      type: classifySeverity(message),
      occurrences: group.count,
      new_occurrences: newOccurrences,
      raw,
      pattern: group.pattern,
    };

    const details = this.describeGroup(group, message);
    if (details !== undefined) entry.details = details;
    return entry;
  }

  private describeGroup(group: MessageGroup, message: string): string | undefined {
    const messages = group.raw_messages.map(stripLinePrefix);

    if (group.pattern === MJPG_CLIENT_PATTERN) {
      const clients = uniqueSorted(
        messages.flatMap((text) => extractDetails(text, normalizePattern(text)) ?? [])
      );
      return clients.length > 0 ? `Clients: ${clients.join(', ')}` : undefined;
    }

    if (message.includes('Failed to fetch')) {
      const urls = uniqueSorted(messages.flatMap((text) => FAILED_FETCH_REGEX.exec(text)?.[1] ?? []));
      return urls.length > 0 ? `Failed endpoints: ${urls.join(', ')}` : undefined;
    }

    return extractDetails(message, normalizePattern(message));
  }

  private remember(key: string, entry: LogEntry, sortTime: number): void {
    this.buffer.delete(key);
    this.buffer.set(key, { entry, sortTime });

    while (this.buffer.size > this.bufferSize) {
      const oldest = this.buffer.keys().next();
      if (oldest.done) break;
      this.buffer.delete(oldest.value);
    }
  }
}
