/**
 * Timestamp parsing for the formats Health Auto Export has used over time.
 *
 * Formats are tried in order and the first match wins:
 * 1. "2024-01-01 08:00:00 +0100"  (exporter default)
 * 2. "2024-01-01 08:00:00"        (no offset, read as UTC)
 * 3. "2024-01-01"                 (midnight UTC)
 * 4. "2024-01-01T08:00:00Z"       (ISO 8601, state of mind entries)
 */

const OFFSET_TIMESTAMP_REGEX =
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2})$/;
const NAIVE_TIMESTAMP_REGEX = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const DATE_ONLY_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_TIMESTAMP_REGEX =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,9})?(?:Z|[+-]\d{2}:\d{2})$/;

export interface TimestampFormat {
  name: string;
  parse: (value: string) => Date | undefined;
}

/**
 * Build a UTC instant from calendar fields, rejecting out-of-range values
 * (month 13, February 30, hour 24) instead of rolling them over.
 */
function fromFields(fields: string[], offsetMinutes = 0): Date | undefined {
  const [year, month, day, hour = 0, minute = 0, second = 0] = fields.map(Number);
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(ms);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return undefined;

  return new Date(ms - offsetMinutes * 60_000);
}

export const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  {
    name: 'datetime-offset',
    parse: (value) => {
      const match = OFFSET_TIMESTAMP_REGEX.exec(value);
      if (!match) return undefined;
      const [, year, month, day, hour, minute, second, sign, offsetHours, offsetMins] = match;
      const offset = (Number(offsetHours) * 60 + Number(offsetMins)) * (sign === '-' ? -1 : 1);
      return fromFields([year, month, day, hour, minute, second], offset);
    },
  },
  {
    name: 'datetime',
    parse: (value) => {
      const match = NAIVE_TIMESTAMP_REGEX.exec(value);
      return match ? fromFields(match.slice(1)) : undefined;
    },
  },
  {
    name: 'date',
    parse: (value) => {
      const match = DATE_ONLY_REGEX.exec(value);
      return match ? fromFields(match.slice(1)) : undefined;
    },
  },
  {
    name: 'iso-8601',
    parse: (value) => {
      if (!ISO_TIMESTAMP_REGEX.test(value)) return undefined;
      const ms = Date.parse(value);
      return Number.isNaN(ms) ? undefined : new Date(ms);
    },
  },
];

/**
 * Parse a textual timestamp. Returns undefined when no format matches.
 */
export function parseTimestamp(value: string): Date | undefined {
  const trimmed = value.trim();
  for (const format of TIMESTAMP_FORMATS) {
    const date = format.parse(trimmed);
    if (date) return date;
  }
  return undefined;
}

/**
 * Seconds since the epoch, fractional part kept to the millisecond.
 */
export function parseUnixSeconds(value: number): Date | undefined {
  if (!Number.isFinite(value)) return undefined;
  return new Date(Math.round(value * 1000));
}

/**
 * Format as "YYYY-MM-DD HH:mm:ss +0000" (UTC), the exporter's own layout.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${String(date.getUTCFullYear())}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${day} ${time} +0000`;
}
