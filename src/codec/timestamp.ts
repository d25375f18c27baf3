/**
 * csafkit - Timestamp normalization
 *
 * Accepts RFC 3339 date-times (`Z` or `±hh:mm` offset, optional fraction) and
 * bare `YYYY-MM-DD` dates. Everything is rewritten to UTC with millisecond
 * precision, e.g. `2021-07-21T10:00:00.000Z`.
 *
 * `Date` has no leap seconds, so a `:60` second is rejected rather than
 * rolled into the next minute. Fractions longer than three digits are
 * truncated to milliseconds, not rounded, and the dropped digits are lost on
 * re-serialization.
 */

const DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2})))?$/;

/**
 * Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear takes them literally
 */
function utcEpoch(year: number, monthIndex: number, day: number, h: number, mi: number, s: number, ms: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(h, mi, s, ms);
  return date.getTime();
}

/**
 * Normalize a timestamp, or return undefined if the text is not one
 */
export function normalizeTimestamp(text: string): string | undefined {
  const match = DATE_TIME_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }

  const [, year, month, day, hour, minute, second, fraction, zulu, sign, offsetHour, offsetMinute] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);

  // Reject dates like 2021-02-30 that would silently roll over
  const midnight = new Date(utcEpoch(y, mo - 1, d, 0, 0, 0, 0));
  if (midnight.getUTCFullYear() !== y || midnight.getUTCMonth() !== mo - 1 || midnight.getUTCDate() !== d) {
    return undefined;
  }

  if (hour === undefined) {
    return midnight.toISOString();
  }
  // A time without an offset is ambiguous
  if (zulu === undefined && sign === undefined) {
    return undefined;
  }

  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);
  if (h > 23 || mi > 59 || s > 59) {
    return undefined;
  }

  let offsetMinutes = 0;
  if (sign !== undefined) {
    const oh = Number(offsetHour);
    const om = Number(offsetMinute);
    if (oh > 23 || om > 59) {
      return undefined;
    }
    offsetMinutes = (sign === '-' ? -1 : 1) * (oh * 60 + om);
  }

  const millis = fraction === undefined ? 0 : Number(fraction.padEnd(3, '0').slice(0, 3));
  const epoch = utcEpoch(y, mo - 1, d, h, mi, s, millis) - offsetMinutes * 60_000;
  const normalized = new Date(epoch).toISOString();

  // Offsets can push a year-0000 or year-9999 instant outside four digits
  return /^\d{4}-/.test(normalized) ? normalized : undefined;
}

/**
 * Calendar date (`YYYY-MM-DD`) part of a normalized timestamp
 */
export function datePart(timestamp: string): string {
  return timestamp.slice(0, 10);
}
