import type { Weekday } from "@schoolcore/db/schema";

/** Calendar date as `YYYY-MM-DD`. */
export type IsoDate = string;

export type DateRange = { start: IsoDate; end: IsoDate };

const WEEKDAY_BY_INDEX: readonly Weekday[] = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
];

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Reduces a date, date string or timestamp string to its calendar date.
 * Strings keep the date they were written with; `Date` objects use their
 * UTC date. Returns null when the value is not a real calendar date.
 */
export function toIsoDate(value: string | Date): IsoDate | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? null
      : value.toISOString().slice(0, 10);
  }

  const match = ISO_DATE_PREFIX.exec(value.trim());
  if (!match) return null;

  const [, year, month, day] = match;
  const parsed = new Date(`${year}-${month}-${day}T00:00:00Z`);
  if (
    Number.isNaN(parsed.getTime()) ||
    parsed.getUTCMonth() + 1 !== Number(month) ||
    parsed.getUTCDate() !== Number(day)
  ) {
    return null;
  }
  return `${year}-${month}-${day}`;
}

function toUtc(date: IsoDate): Date {
  return new Date(`${date}T00:00:00Z`);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return new Date(toUtc(date).getTime() + days * DAY_MS)
    .toISOString()
    .slice(0, 10);
}

/** Every date from start to end, both inclusive; empty when start > end. */
export function eachDay({ start, end }: DateRange): IsoDate[] {
  const days: IsoDate[] = [];
  for (let d = start; d <= end; d = addDays(d, 1)) {
    days.push(d);
  }
  return days;
}

/** 0 = Sunday … 6 = Saturday */
export function weekdayIndex(date: IsoDate): number {
  return toUtc(date).getUTCDay();
}

export function weekdayName(date: IsoDate): Weekday {
  return WEEKDAY_BY_INDEX[weekdayIndex(date)] ?? "sunday";
}

export function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function monthLabel(year: number, month: number): string {
  const name = new Date(Date.UTC(year, month - 1, 1)).toLocaleString("en-US", {
    month: "long",
    timeZone: "UTC",
  });
  return `${name} ${year}`;
}

export function lastDayOfMonth(year: number, month: number): IsoDate {
  return new Date(Date.UTC(year, month, 0)).toISOString().slice(0, 10);
}

/** The calendar date it currently is in the given IANA time zone. */
export function todayIn(timeZone: string, now: Date = new Date()): IsoDate {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(now);
}
