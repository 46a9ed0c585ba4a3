/**
 * Timestamp Normalizer
 *
 * Source pages publish ISO-8601 timestamps with truncated fractional seconds
 * (".45", ".4") and either a "Z" or a numeric offset glued directly to the
 * fraction. Everything is normalized to microsecond precision and an explicit
 * offset before it is read as an instant.
 */

import { TimestampParseError } from '../utils/errors.js';

export type TimestampResult =
  | { ok: true; value: Date }
  | { ok: false; error: TimestampParseError };

const FRACTION_DIGITS = 6;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{6}))?)?(?:([+-])(\d{2}):?(\d{2}))?)?$/;

/**
 * Right-pad the fractional seconds to six digits, keeping any timezone
 * marker that directly follows them, and rewrite a trailing "Z" as "+00:00"
 */
export function padFractionalSeconds(raw: string): string {
  let value = raw;
  const dot = value.indexOf('.');

  if (dot !== -1) {
    const head = value.slice(0, dot);
    const rest = value.slice(dot + 1);
    const digits = /^\d*/.exec(rest)?.[0] ?? '';
    const zone = rest.slice(digits.length);

    value = `${head}.${digits.padEnd(FRACTION_DIGITS, '0')}${zone}`;
  }

  return value.endsWith('Z') ? `${value.slice(0, -1)}+00:00` : value;
}

function toInt(part: string | undefined, fallback = 0): number {
  return part === undefined ? fallback : parseInt(part, 10);
}

/**
 * Parse an already normalized timestamp. Values without an offset are UTC.
 */
function parseNormalized(value: string): Date | null {
  const match = ISO_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, y, mo, d, h, mi, s, micros, sign, offH, offM] = match;
  const year = toInt(y);
  const month = toInt(mo);
  const day = toInt(d);
  const hour = toInt(h);
  const minute = toInt(mi);
  const second = toInt(s);
  const offsetHours = toInt(offH);
  const offsetMinutes = toInt(offM);

  if (hour > 23 || minute > 59 || second > 59 || offsetHours > 23 || offsetMinutes > 59) {
    return null;
  }

  const calendarDay = new Date(Date.UTC(year, month - 1, day));
  if (calendarDay.getUTCMonth() !== month - 1 || calendarDay.getUTCDate() !== day) {
    return null;
  }

  const offsetMs = (sign === '-' ? -1 : 1) * (offsetHours * 60 + offsetMinutes) * 60_000;
  const millis = Math.floor(toInt(micros) / 1000);
  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis) - offsetMs;

  return new Date(utc);
}

/**
 * Normalize a raw timestamp string into a timezone-aware instant
 */
export function normalizeTimestamp(raw: string | null | undefined): TimestampResult {
  const trimmed = raw?.trim() ?? '';
  if (!trimmed) {
    return { ok: false, error: new TimestampParseError('missing', raw ?? undefined) };
  }

  const parsed = parseNormalized(padFractionalSeconds(trimmed));
  if (!parsed) {
    return { ok: false, error: new TimestampParseError('invalid', trimmed) };
  }

  return { ok: true, value: parsed };
}

/**
 * Convenience wrapper returning null instead of an error
 */
export function parseTimestamp(raw: string | null | undefined): Date | null {
  const result = normalizeTimestamp(raw);
  return result.ok ? result.value : null;
}
