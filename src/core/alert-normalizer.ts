/**
 * Alert Message Normalizer
 *
 * Alert identity is derived from content, not assigned. Two alerts whose
 * messages differ only in clock times, dates, counters, UUIDs or hex values
 * hash to the same id. Unlike log pattern masking, bare numbers are masked
 * here too.
 */

import { createHash } from 'crypto';
import type { AlertCandidate } from '../types';

interface PhraseRule {
  contains: string;
  normalized: string;
}

// Known noisy messages whose whole text collapses to a fixed phrase
const PHRASE_RULES: ReadonlyArray<PhraseRule> = [
  {
    contains: 'Build has completed and is waiting for cleanup',
    normalized: 'Build has completed and is waiting for cleanup',
  },
  { contains: 'Next update check scheduled for', normalized: 'Next update check scheduled' },
  { contains: 'Stardust service connection issues', normalized: 'Stardust service connection issues' },
];

// UUID and HEX run before NUM so their digits stay inside one token
const ALERT_MASKS: ReadonlyArray<[RegExp, string]> = [
  [/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/g, 'UUID'],
  [/0x[0-9a-fA-F]+/g, 'HEX'],
  [/\b\d{2}:\d{2}:\d{2}\b/g, 'TIME'],
  [/\b(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) {1,2}\d{1,2}\b/g, 'DATE'],
  // A number is masked unless it belongs to a percentage, also when it ends a sentence
  [/(?<!\d)\d+(?:\.\d+)?(?![\d%]|\.\d)/g, 'NUM'],
];

export function normalizeAlertMessage(message: string): string {
  const phrase = PHRASE_RULES.find((rule) => message.includes(rule.contains));
  if (phrase) return phrase.normalized;

  return ALERT_MASKS.reduce((masked, [regex, placeholder]) => masked.replace(regex, placeholder), message);
}

/**
 * Stable id for an alert candidate. A `raw_message` in the details, when
 * present, takes precedence over the display message.
 */
export function generateAlertId(candidate: AlertCandidate): string {
  const rawMessage = candidate.details?.raw_message;
  const message = typeof rawMessage === 'string' ? rawMessage : candidate.message;
  const content = `${candidate.type}-${normalizeAlertMessage(message)}`;
  return createHash('md5').update(content).digest('hex');
}
