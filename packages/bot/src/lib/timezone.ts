/**
 * Wall-clock arithmetic in IANA timezones
 *
 * Calendar dates are plain `{ year, month, day }` values; conversion to and
 * from instants goes through `Intl.DateTimeFormat`, the same API config uses
 * to validate timezone names.
 */

import { isValidTimezone } from "./config";

export interface LocalDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export interface LocalDateTime extends LocalDate {
  hour: number;
  minute: number;
  second: number;
}

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(tz: string): Intl.DateTimeFormat {
  let formatter = formatters.get(tz);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: tz,
      hourCycle: "h23",
      year: "numeric",
      month: "numeric",
      day: "numeric",
      hour: "numeric",
      minute: "numeric",
      second: "numeric",
    });
    formatters.set(tz, formatter);
  }
  return formatter;
}

/** Unknown names fall back to UTC so one bad row cannot break planning. */
export function resolveTimezone(tz: string | null | undefined): string {
  return tz && isValidTimezone(tz) ? tz : "UTC";
}

export function toLocal(instant: Date, tz: string): LocalDateTime {
  const fields: Record<string, number> = {};
  for (const part of formatterFor(tz).formatToParts(instant)) {
    if (part.type !== "literal") {
      fields[part.type] = Number(part.value);
    }
  }
  return {
    year: fields.year,
    month: fields.month,
    day: fields.day,
    hour: fields.hour,
    minute: fields.minute,
    second: fields.second,
  };
}

export function localDateOf(instant: Date, tz: string): LocalDate {
  const { year, month, day } = toLocal(instant, tz);
  return { year, month, day };
}

function utcMidnight(date: LocalDate): number {
  return Date.UTC(date.year, date.month - 1, date.day);
}

export function addDays(date: LocalDate, days: number): LocalDate {
  const shifted = new Date(utcMidnight(date) + days * DAY_MS);
  return { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth() + 1, day: shifted.getUTCDate() };
}

export function daysBetween(from: LocalDate, to: LocalDate): number {
  return Math.round((utcMidnight(to) - utcMidnight(from)) / DAY_MS);
}

/** Monday = 0 ... Sunday = 6 */
export function weekdayOf(date: LocalDate): number {
  return (new Date(utcMidnight(date)).getUTCDay() + 6) % 7;
}

/** Offset of `tz` from UTC at `instantMs`, positive east of Greenwich. */
function offsetAt(instantMs: number, tz: string): number {
  const whole = Math.floor(instantMs / 1000) * 1000;
  const local = toLocal(new Date(whole), tz);
  return Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second) - whole;
}

/**
 * The instant at which the wall clock in `tz` shows `date` `hour:minute`.
 *
 * A time that occurs twice (clocks going back) resolves to the earlier
 * instant. A time skipped by clocks going forward moves one hour later.
 */
export function zonedToUtc(date: LocalDate, hour: number, minute: number, tz: string): Date {
  const wall = Date.UTC(date.year, date.month - 1, date.day, hour, minute);
  const offsets = new Set([offsetAt(wall - DAY_MS, tz), offsetAt(wall, tz), offsetAt(wall + DAY_MS, tz)]);
  const matches = [...offsets].map((offset) => wall - offset).filter((instant) => instant + offsetAt(instant, tz) === wall);

  if (matches.length > 0) {
    return new Date(Math.min(...matches));
  }

  const bumped = new Date(wall + HOUR_MS);
  return zonedToUtc(
    { year: bumped.getUTCFullYear(), month: bumped.getUTCMonth() + 1, day: bumped.getUTCDate() },
    bumped.getUTCHours(),
    bumped.getUTCMinutes(),
    tz
  );
}
