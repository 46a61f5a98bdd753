/**
 * Calendar helpers for picking the reporting period.
 * Dates travel as `YYYY-MM-DD` strings; arithmetic happens in UTC so a
 * local DST change can never shift a day.
 */

import type { DateRange, IsoDate } from './types.js';

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Format a Date's local calendar day */
export function toIsoDate(date: Date): IsoDate {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/** Today's local date */
export function today(): IsoDate {
  return toIsoDate(new Date());
}

/**
 * Validate a `YYYY-MM-DD` string.
 * Throws on malformed input and on impossible days such as `2024-02-30`.
 */
export function parseIsoDate(value: string): IsoDate {
  const match = ISO_DATE_RE.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid date '${value}'. Expected YYYY-MM-DD.`);
  }
  const [, y, m, d] = match;
  const utc = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (utc.toISOString().slice(0, 10) !== `${y}-${m}-${d}`) {
    throw new Error(`Invalid date '${value}'. Expected YYYY-MM-DD.`);
  }
  return `${y}-${m}-${d}`;
}

function toUtc(date: IsoDate): Date {
  const [y, m, d] = date.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d));
}

/** Shift a date by a number of days (negative goes back) */
export function addDays(date: IsoDate, days: number): IsoDate {
  return new Date(toUtc(date).getTime() + days * DAY_MS).toISOString().slice(0, 10);
}

/** Day of week, 0 = Sunday … 6 = Saturday */
export function weekday(date: IsoDate): number {
  return toUtc(date).getUTCDay();
}

function isMonday(date: IsoDate): boolean {
  return weekday(date) === 1;
}

/**
 * The working day a standup on `ref` reports on.
 * Monday reports on the previous Friday, every other day on the day before.
 */
export function previousWorkday(ref: IsoDate): IsoDate {
  return addDays(ref, isMonday(ref) ? -3 : -1);
}

/**
 * The range to search for issues and commits.
 * On a Monday it stretches from the workday to Sunday so weekend
 * activity is included.
 */
export function workdayRange(workday: IsoDate, ref: IsoDate): DateRange {
  if (isMonday(ref)) {
    return { start: workday, end: addDays(ref, -1) };
  }
  return { start: workday, end: workday };
}

/**
 * Resolve the reporting range for a run.
 * An explicit date always yields that single day.
 */
export function resolveReportingRange(
  explicitDate: IsoDate | undefined,
  ref: IsoDate
): { workday: IsoDate; range: DateRange } {
  if (explicitDate) {
    return { workday: explicitDate, range: { start: explicitDate, end: explicitDate } };
  }
  const workday = previousWorkday(ref);
  return { workday, range: workdayRange(workday, ref) };
}

/** UTC timestamps bounding the range: start 00:00:00 to end 23:59:59 */
export function dayWindow(range: DateRange): { since: string; until: string } {
  return {
    since: `${range.start}T00:00:00Z`,
    until: `${range.end}T23:59:59Z`,
  };
}

/** Whether a timestamp's calendar day (as written) falls within the range */
export function isWithinRange(timestamp: string | null, range: DateRange): boolean {
  if (!timestamp) return false;
  const day = timestamp.slice(0, 10);
  return range.start <= day && day <= range.end;
}

/** `start – end`, or just the date for a single day */
export function formatRange(range: DateRange): string {
  return range.start === range.end ? range.start : `${range.start} – ${range.end}`;
}
