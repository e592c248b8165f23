/**
 * ISO-8601 timestamp handling shared by the normalizer and the miners.
 *
 * A trailing `Z` is the same as `+00:00`; a timestamp with no offset is read
 * as UTC. The offset written in the source is kept so weekday and hour can be
 * read on the wall clock the platform recorded.
 */

/** A parsed timestamp with the offset it was written in. */
export interface ParsedTimestamp {
  timestamp: Date;
  /** Offset east of UTC in minutes. */
  utc_offset_minutes: number;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const MS_PER_MINUTE = 60_000;

/**
 * Parse an ISO-8601 date-time. Returns null for anything that is not a
 * well-formed, in-range date-time.
 */
export function parseTimestamp(value: unknown): ParsedTimestamp | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : { timestamp: new Date(value.getTime()), utc_offset_minutes: 0 };
  }
  if (typeof value !== 'string') return null;

  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h, mi, s, frac, zone] = match;
  const year = parseInt(y, 10);
  const month = parseInt(mo, 10);
  const day = parseInt(d, 10);
  const hour = parseInt(h, 10);
  const minute = parseInt(mi, 10);
  const second = s ? parseInt(s, 10) : 0;
  const millis = frac ? parseInt(frac.slice(0, 3).padEnd(3, '0'), 10) : 0;

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  const offset = parseOffset(zone);
  if (offset === null) return null;

  const wallClock = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  // Date.UTC rolls 2024-02-30 over into March; reject instead.
  if (new Date(wallClock).getUTCDate() !== day) return null;

  return {
    timestamp: new Date(wallClock - offset * MS_PER_MINUTE),
    utc_offset_minutes: offset,
  };
}

function parseOffset(zone: string | undefined): number | null {
  if (!zone || zone.toUpperCase() === 'Z') return 0;

  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? parseInt(digits.slice(2), 10) : 0;
  if (hours > 23 || minutes > 59) return null;

  return sign * (hours * 60 + minutes);
}

/** Wall-clock view of an instant in the offset it was recorded in. */
function wallClock(at: { timestamp: Date; utc_offset_minutes: number }): Date {
  return new Date(at.timestamp.getTime() + at.utc_offset_minutes * MS_PER_MINUTE);
}

/** Day of week with Monday = 0 … Sunday = 6. */
export function localWeekday(at: { timestamp: Date; utc_offset_minutes: number }): number {
  return (wallClock(at).getUTCDay() + 6) % 7;
}

/** Hour of day (0-23) on the recorded wall clock. */
export function localHour(at: { timestamp: Date; utc_offset_minutes: number }): number {
  return wallClock(at).getUTCHours();
}

/**
 * Format an hour (0-23) as `HH:00`.
 */
export function formatHour(hour: number): string {
  return `${hour.toString().padStart(2, '0')}:00`;
}

/**
 * Format a date as a compact `YYYYMMDDHHmmss` stamp (UTC).
 */
export function compactStamp(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, '')
    .replace(/[-:T]/g, '');
}
