/**
 * @passbook/ledger — Calendar-day helpers.
 *
 * Dates are "YYYY-MM-DD" strings, so ordering is plain string
 * comparison and no time zone ever enters the picture.
 */

import { daysInMonth, isCalendarDate } from "@passbook/types";
import type { CalendarDate, YearMonth } from "@passbook/types";
import { LedgerError } from "./types.js";

const MONTH_FORMAT = new Intl.DateTimeFormat("en-US", { month: "long", timeZone: "UTC" });

/**
 * Validate and return a calendar date.
 * Throws LedgerError("INVALID_DATE") for anything that is not a real day.
 */
export function parseCalendarDate(text: string): CalendarDate {
  const trimmed = text.trim();
  if (!isCalendarDate(trimmed)) {
    throw new LedgerError("INVALID_DATE", `Invalid date: "${trimmed}". Expected YYYY-MM-DD`);
  }
  return trimmed;
}

export function compareDates(a: CalendarDate, b: CalendarDate): -1 | 0 | 1 {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isSameDay(a: CalendarDate, b: CalendarDate): boolean {
  return a === b;
}

export function isSameMonth(a: CalendarDate, b: CalendarDate): boolean {
  return periodOf(a) === periodOf(b);
}

/** "2024-02-20" → "2024-02" */
export function periodOf(date: CalendarDate): YearMonth {
  return date.slice(0, 7);
}

/** "2024-02-20" → "2024-02-29" */
export function lastDayOfMonth(date: CalendarDate): CalendarDate {
  const year = Number(date.slice(0, 4));
  const month = Number(date.slice(5, 7));
  return `${periodOf(date)}-${String(daysInMonth(year, month)).padStart(2, "0")}`;
}

/** "2024-02-20" → "February" */
export function monthName(date: CalendarDate): string {
  const month = Number(date.slice(5, 7));
  return MONTH_FORMAT.format(new Date(Date.UTC(2000, month - 1, 1)));
}
