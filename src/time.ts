import { InvalidTimeValue } from "./errors.js";

/** Date-only or date-time string, a Date, or epoch milliseconds. */
export type TimeInput = Date | string | number;

// YYYY-MM-DD, optionally followed by a time and an optional UTC offset.
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

function parseOffsetMinutes(offset: string): number {
  if (offset.toUpperCase() === "Z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) throw new InvalidTimeValue(`Invalid UTC offset "${offset}"`);
  return sign * (hours * 60 + minutes);
}

function parseIsoString(raw: string): Date {
  const text = raw.trim();
  const m = ISO_PATTERN.exec(text);
  if (!m) throw new InvalidTimeValue(`Not a recognizable date or date-time: "${raw}"`);

  const [, y, mo, d, h = "0", mi = "0", s = "0", frac = "", offset] = m;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const ms = frac.length > 0 ? Math.floor(Number(`0.${frac}`) * 1000) : 0;

  if (hour > 23 || minute > 59 || second > 59) {
    throw new InvalidTimeValue(`Time of day out of range: "${raw}"`);
  }

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, ms);
  const check = new Date(utc);
  // Date.UTC rolls Feb 30 over into March; reject instead.
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new InvalidTimeValue(`Calendar date out of range: "${raw}"`);
  }

  // Naive values are taken as UTC, never local time.
  const offsetMinutes = offset ? parseOffsetMinutes(offset) : 0;
  return new Date(utc - offsetMinutes * 60_000);
}

export function toUtcInstant(value: TimeInput): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new InvalidTimeValue("Invalid Date");
    return new Date(value.getTime());
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new InvalidTimeValue(`Not a finite epoch time: ${value}`);
    return new Date(value);
  }
  if (typeof value === "string") return parseIsoString(value);
  throw new InvalidTimeValue(`Unsupported time value: ${String(value)}`);
}

/** Wire form: `2021-09-20T18:00:00Z`, with milliseconds only when non-zero. */
export function formatUtc(d: Date): string {
  return d.toISOString().replace(".000Z", "Z");
}

export const MS_PER_MINUTE = 60_000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export function addUtcMonths(d: Date, months: number): Date {
  return new Date(
    Date.UTC(
      d.getUTCFullYear(),
      d.getUTCMonth() + months,
      d.getUTCDate(),
      d.getUTCHours(),
      d.getUTCMinutes(),
      d.getUTCSeconds(),
      d.getUTCMilliseconds(),
    ),
  );
}
