/**
 * @passbook/types — Shared domain types for the Passbook stack.
 *
 * Used across all Passbook packages:
 * - Calendar dates and assessment periods
 * - Transaction records and account state
 * - Bank snapshot state
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

export type {
  AccountKind,
  CalendarDate,
  YearMonth,
  TransactionRecord,
  LedgerState,
  BankState,
} from "./financial.js";

export { isLeapYear, daysInMonth } from "./calendar.js";

export {
  isAccountKind,
  isDecimalString,
  isCalendarDate,
  isYearMonth,
} from "./guards.js";
