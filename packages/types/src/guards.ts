/**
 * Runtime Type Guards
 *
 * Narrowing functions for Passbook domain types.
 * Used where values cross a boundary: user input and deserialized data.
 */

import type { AccountKind, CalendarDate, YearMonth } from "./financial.js";
import { daysInMonth } from "./calendar.js";

const ACCOUNT_KINDS = new Set<string>(["savings", "checking"]);
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const PERIOD_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

export function isAccountKind(value: unknown): value is AccountKind {
  return typeof value === "string" && ACCOUNT_KINDS.has(value);
}

export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL_PATTERN.test(value);
}

/**
 * Accepts "YYYY-MM-DD" only when it names a day that exists
 * (no 2023-02-29, no 2024-13-01).
 */
export function isCalendarDate(value: unknown): value is CalendarDate {
  if (typeof value !== "string" || !DATE_PATTERN.test(value)) return false;
  const year = Number(value.slice(0, 4));
  const month = Number(value.slice(5, 7));
  const day = Number(value.slice(8, 10));
  if (month < 1 || month > 12 || day < 1) return false;
  return day <= daysInMonth(year, month);
}

export function isYearMonth(value: unknown): value is YearMonth {
  return typeof value === "string" && PERIOD_PATTERN.test(value);
}
