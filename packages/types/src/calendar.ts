/**
 * Calendar helpers shared by the guards and the ledger core.
 *
 * Gregorian rules computed directly, so years below 100 are not
 * remapped to the 1900s the way Date.UTC does.
 */

export function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

/** Number of days in a 1-based month. */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  if (month === 4 || month === 6 || month === 9 || month === 11) return 30;
  return 31;
}
