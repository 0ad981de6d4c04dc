/**
 * Log Pattern Normalizer
 *
 * Turns a free-text log message into a canonical pattern so that lines
 * describing the same event collapse into one bucket regardless of which
 * PID, IP, UUID or clock time they carry. Rules are evaluated in order and
 * the first one whose matcher accepts the message wins.
 */

export type PatternRuleName =
  | 'mjpg-client'
  | 'printcore-extrusion'
  | 'nfc-tag-queue'
  | 'nfc-tag-write'
  | 'generic';

export interface PatternMatch {
  rule: PatternRuleName;
  pattern: string;
  /** Key used for time-bucketing; coarser than `pattern` for some rules */
  bucket: string;
}

interface PatternRule {
  name: PatternRuleName;
  matches: (message: string) => boolean;
  normalize: (message: string) => { pattern: string; bucket?: string };
  details?: (message: string) => string | undefined;
}

export const MJPG_CLIENT_PATTERN = 'MJPG-streamer serving client';

const CLIENT_REGEX = /serving client: (\S+)/;
const CORE_INDEX_REGEX = /PrintCore (\d+)/;
const EXTRUSION_REGEX =
  /PrintCore (\d+) extruded ([\d.]+) mm in ([\d.]+) s, remaining length = (\d+) mm/;
const HOTEND_REGEX = /hotend (\d+)/;
const HOTEND_INDEX_REGEX = /hotend index # (\d+)/;

const GENERIC_MASKS: ReadonlyArray<[RegExp, string]> = [
  [/\[\d+\]/g, '[PID]'],
  [/\d{2}:\d{2}:\d{2}/g, 'TIME'],
  [/\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}/g, 'IP'],
  [/[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}/g, 'UUID'],
];

function withIndex(regex: RegExp, message: string, found: (index: string) => string, fallback: string): string {
  const match = regex.exec(message);
  return match ? found(match[1]) : fallback;
}

export function maskVariables(message: string): string {
  return GENERIC_MASKS.reduce((masked, [regex, placeholder]) => masked.replace(regex, placeholder), message);
}

const PATTERN_RULES: ReadonlyArray<PatternRule> = [
  {
    name: 'mjpg-client',
    matches: (message) => message.includes('MJPG-streamer') && message.includes('serving client'),
    normalize: (message) => ({
      pattern: withIndex(CLIENT_REGEX, message, (client) => `${MJPG_CLIENT_PATTERN}: ${client}`, MJPG_CLIENT_PATTERN),
      bucket: MJPG_CLIENT_PATTERN,
    }),
    details: (message) => CLIENT_REGEX.exec(message)?.[1],
  },
  {
    name: 'printcore-extrusion',
    matches: (message) => message.includes('PrintCore') && message.includes('extruded'),
    normalize: (message) => ({
      pattern: withIndex(
        CORE_INDEX_REGEX,
        message,
        (core) => `PrintCore ${core} extrusion update`,
        'PrintCore extrusion update'
      ),
    }),
    details: (message) => {
      const match = EXTRUSION_REGEX.exec(message);
      if (!match) return undefined;
      const [, core, amount, seconds, remaining] = match;
      return `Core ${core}: ${amount}mm in ${seconds}s (${remaining}mm remaining)`;
    },
  },
  {
    name: 'nfc-tag-queue',
    matches: (message) => message.includes('Queueing tag for hotend'),
    normalize: (message) => ({
      pattern: withIndex(
        HOTEND_REGEX,
        message,
        (hotend) => `NFC tag queue update for hotend ${hotend}`,
        'NFC tag queue update'
      ),
    }),
  },
  {
    name: 'nfc-tag-write',
    matches: (message) => message.includes('Writing tag'),
    normalize: (message) => ({
      pattern: withIndex(
        HOTEND_INDEX_REGEX,
        message,
        (hotend) => `NFC tag write for hotend ${hotend}`,
        'NFC tag write'
      ),
    }),
  },
  {
    name: 'generic',
    matches: () => true,
    normalize: (message) => ({ pattern: maskVariables(message) }),
  },
];

function findRule(message: string): PatternRule {
  const rule = PATTERN_RULES.find((candidate) => candidate.matches(message));
  if (!rule) {
    // The generic rule accepts everything
    throw new Error(`No pattern rule accepted message: ${message}`);
  }
  return rule;
}

export function matchPattern(message: string): PatternMatch {
  const rule = findRule(message);
  const { pattern, bucket } = rule.normalize(message);
  return { rule: rule.name, pattern, bucket: bucket ?? pattern };
}

/**
 * Normalize a log message (timestamp and host already stripped) into its pattern
 */
export function normalizePattern(message: string): string {
  return matchPattern(message).pattern;
}

/**
 * Extract the human-relevant detail of a message, given the pattern it
 * normalized to. Only client-serving and extrusion lines carry details.
 */
export function extractDetails(message: string, pattern: string): string | undefined {
  const rule = PATTERN_RULES.find(
    (candidate) => candidate.details !== undefined && candidate.matches(message) && candidate.normalize(message).pattern === pattern
  );
  return rule?.details?.(message);
}
