import type { Instant } from "../types";
import { InvalidTimestampError } from "./errors";

const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Matches Jira timestamps such as 2024-01-01T10:00:00.000+0000
 * Captures: date parts, time parts, fraction, offset
 */
const TIMESTAMP_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})$/;

/**
 * Parses a UTC offset ("Z", "+0530", "-08:00") into minutes
 */
function parseOffset(offset: string): number | null {
  if (offset === "Z") {
    return 0;
  }

  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = parseInt(digits.slice(2), 10);

  if (hours > 23 || minutes > 59) {
    return null;
  }

  return sign * (hours * 60 + minutes);
}

/**
 * Parses a zoned ISO 8601 timestamp as returned by the Jira REST API
 *
 * Fractional seconds may have up to nine digits and are kept below
 * millisecond precision. A timestamp without an offset is rejected.
 *
 * @example
 * ```
 * parseTimestamp("2024-01-01T10:00:00.000000+0000").epochMs; // 1704103200000
 * ```
 * @throws {InvalidTimestampError} When the value does not match the format
 */
export function parseTimestamp(value: string): Instant {
  const match = TIMESTAMP_REGEX.exec(value.trim());
  if (!match) {
    throw new InvalidTimestampError(value);
  }

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  const offsetMinutes = parseOffset(offset);
  if (offsetMinutes === null) {
    throw new InvalidTimestampError(value);
  }

  const y = parseInt(year, 10);
  const mo = parseInt(month, 10);
  const d = parseInt(day, 10);
  const h = parseInt(hour, 10);
  const mi = parseInt(minute, 10);
  const s = parseInt(second, 10);

  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const calendarDate = new Date(0);
  calendarDate.setUTCFullYear(y, mo - 1, d);
  calendarDate.setUTCHours(h, mi, s, 0);
  if (
    mo < 1 ||
    mo > 12 ||
    calendarDate.getUTCFullYear() !== y ||
    calendarDate.getUTCDate() !== d ||
    h > 23 ||
    mi > 59 ||
    s > 59
  ) {
    throw new InvalidTimestampError(value);
  }

  const fractionMs = fraction
    ? parseInt(fraction.padEnd(9, "0"), 10) / 1_000_000
    : 0;

  const localMs = calendarDate.getTime();

  return {
    epochMs: localMs + fractionMs - offsetMinutes * 60 * 1000,
    offsetMinutes,
    raw: value,
  };
}

/**
 * Wraps a JavaScript Date as a UTC instant
 */
export function instantFromDate(date: Date): Instant {
  return {
    epochMs: date.getTime(),
    offsetMinutes: 0,
    raw: date.toISOString(),
  };
}

/**
 * Signed number of hours from start to end
 */
export function hoursBetween(start: Instant, end: Instant): number {
  return (end.epochMs - start.epochMs) / MS_PER_HOUR;
}

/**
 * Orders two instants by the point in time they denote
 */
export function compareInstants(a: Instant, b: Instant): number {
  return a.epochMs - b.epochMs;
}
