/**
 * Date helpers for feed timestamps and "since" windows.
 * Normalized timestamps are UTC ISO strings (YYYY-MM-DDTHH:mm:ss.SSSZ), so
 * they sort correctly as plain strings.
 */

import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import customParseFormat from 'dayjs/plugin/customParseFormat';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

// "Mon, 15 Jan 2024 10:30:00 GMT", "15 Jan 24 10:30 +0100", "Mon, 15 Jan 2024 10:30:00 CEST"
const RFC_2822 =
  /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4}|\d{2})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([+-]\d{4}|[A-Za-z]{1,5})?$/;

// Hours from UTC for the zone names RFC 822 defines; any other name reads as UTC
const RFC_822_ZONES: Record<string, number> = {
  UT: 0,
  UTC: 0,
  GMT: 0,
  Z: 0,
  AST: -4,
  ADT: -3,
  EST: -5,
  EDT: -4,
  CST: -6,
  CDT: -5,
  MST: -7,
  MDT: -6,
  PST: -8,
  PDT: -7
};

function zoneOffsetMinutes(zone: string): number {
  const numeric = /^([+-])(\d{2})(\d{2})$/.exec(zone);
  if (numeric) {
    const minutes = parseInt(numeric[2], 10) * 60 + parseInt(numeric[3], 10);
    return numeric[1] === '-' ? -minutes : minutes;
  }
  return (RFC_822_ZONES[zone.toUpperCase()] ?? 0) * 60;
}

/**
 * Two-digit years follow dayjs's YY pivot: 69-99 are 19xx, 00-68 are 20xx.
 */
function parseRfc2822(value: string): string | null {
  const match = RFC_2822.exec(value);
  if (!match) return null;

  const [, day, month, year, hour, minute, second = '00', zone = ''] = match;
  const stamp = [
    day.padStart(2, '0'),
    month.charAt(0).toUpperCase() + month.slice(1).toLowerCase(),
    year,
    `${hour.padStart(2, '0')}:${minute}:${second}`
  ].join(' ');
  const format = year.length === 2 ? 'DD MMM YY HH:mm:ss' : 'DD MMM YYYY HH:mm:ss';

  const parsed = dayjs.utc(stamp, format, true);
  if (!parsed.isValid()) return null;
  return parsed.subtract(zoneOffsetMinutes(zone), 'minute').toISOString();
}

// ISO 8601 carrying its own zone: "2024-01-15T10:30:00Z", "2024-01-15T10:30:00.123+05:30"
const ISO_WITH_ZONE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})$/;

// Zone-less formats, read as UTC
const NAIVE_FORMATS = ['YYYY-MM-DD[T]HH:mm:ss', 'YYYY-MM-DD HH:mm:ss', 'YYYY-MM-DD'];

const NORMALIZED = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

/**
 * Normalize a feed date string. Returns null for empty input and the input
 * unchanged when no known format matches.
 */
export function parseFeedDate(raw: string | undefined | null): string | null {
  if (!raw) return null;
  const value = raw.trim();
  if (!value) return null;

  const rfc2822 = parseRfc2822(value);
  if (rfc2822) return rfc2822;

  if (ISO_WITH_ZONE.test(value)) {
    const parsed = dayjs(value);
    if (parsed.isValid()) return parsed.utc().toISOString();
  }

  for (const format of NAIVE_FORMATS) {
    const parsed = dayjs.utc(value, format, true);
    if (parsed.isValid()) return parsed.toISOString();
  }

  return value;
}

/**
 * Epoch millis of a normalized timestamp, or null when the value was never
 * successfully parsed.
 */
export function toTimestamp(publishedAt: string | null): number | null {
  if (!publishedAt || !NORMALIZED.test(publishedAt)) return null;
  const millis = Date.parse(publishedAt);
  return Number.isNaN(millis) ? null : millis;
}

/**
 * Turn a "since" expression into a cutoff date.
 * Accepts 24h / 7d / 2w / 1m (30 days), an ISO date, "today" and "yesterday".
 */
export function parseSince(since: string, now: Date = new Date()): Date | null {
  const value = since.trim().toLowerCase();
  const reference = dayjs.utc(now);

  const relative = /^(\d+)([hdwm])$/.exec(value);
  if (relative) {
    const amount = parseInt(relative[1], 10);
    switch (relative[2]) {
      case 'h':
        return reference.subtract(amount, 'hour').toDate();
      case 'd':
        return reference.subtract(amount, 'day').toDate();
      case 'w':
        return reference.subtract(amount, 'week').toDate();
      default:
        return reference.subtract(amount * 30, 'day').toDate();
    }
  }

  if (value === 'today') return reference.startOf('day').toDate();
  if (value === 'yesterday') return reference.subtract(1, 'day').startOf('day').toDate();

  const absolute = parseFeedDate(since.trim());
  const millis = toTimestamp(absolute);
  return millis === null ? null : new Date(millis);
}

/**
 * Compact UTC stamp for artifact file names: 20240115_103000
 */
export function fileStamp(date: Date): string {
  return dayjs.utc(date).format('YYYYMMDD_HHmmss');
}
