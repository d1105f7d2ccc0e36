/**
 * @passbook/ledger — Personal account ledger engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies beyond
 * @passbook/types. Enforces per-account invariants:
 * - Transactions are admitted in non-decreasing date order
 * - User transactions never take the balance below zero
 * - Savings accounts cap transactions per day and per month
 * - Interest and fees are assessed at most once per month
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - Transactions are immutable
 * - Fail-closed: rejected input throws, never silently drops
 * - Savings and Checking are policies, not subclasses
 */

// Core engine
export { Ledger } from "./ledger.js";
export type { AssessmentResult } from "./ledger.js";

// Transactions
export {
  Transaction,
  compareTransactions,
  sumTransactions,
  latestTransaction,
} from "./transaction.js";

// Account policies
export {
  createPolicy,
  createSavingsPolicy,
  createCheckingPolicy,
  DEFAULT_POLICY_CONFIG,
} from "./policy.js";
export type {
  AccountPolicy,
  FeeCharge,
  PolicyConfig,
  SavingsPolicyConfig,
  CheckingPolicyConfig,
} from "./policy.js";

// Decimal arithmetic
export {
  ZERO,
  parseDecimal,
  toDecimalString,
  normalizeDecimal,
  addDecimal,
  multiplyDecimal,
  sumDecimals,
  compareDecimal,
  isNegativeDecimal,
  roundDecimal,
  formatCurrency,
} from "./decimal.js";
export type { Decimal } from "./decimal.js";

// Calendar
export {
  parseCalendarDate,
  compareDates,
  isSameDay,
  isSameMonth,
  periodOf,
  lastDayOfMonth,
  monthName,
} from "./calendar.js";

// Errors and options
export {
  LedgerError,
  TransactionSequenceError,
  OverdraftError,
  TransactionLimitError,
} from "./types.js";
export type {
  LedgerErrorCode,
  LimitKind,
  LedgerTraceEvent,
  LedgerTraceFn,
  LedgerOptions,
} from "./types.js";
