/**
 * @passbook/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored transactions
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { CalendarDate, YearMonth } from "@passbook/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "SEQUENCE"
  | "OVERDRAFT"
  | "LIMIT"
  | "INVALID_AMOUNT"
  | "INVALID_DATE"
  | "INVALID_STATE";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}

/**
 * A transaction dated before the latest one held, or a second
 * assessment within the same month.
 */
export class TransactionSequenceError extends LedgerError {
  /** Date of the latest transaction at the time of rejection */
  public readonly latestDate: CalendarDate;

  /** Month name when the rejection is a repeated assessment */
  public readonly month: string | undefined;

  constructor(latestDate: CalendarDate, month?: string) {
    super(
      "SEQUENCE",
      month === undefined
        ? `New transactions must be from ${latestDate} onward.`
        : `Cannot apply interest and fees again in the month of ${month}.`,
    );
    this.name = "TransactionSequenceError";
    this.latestDate = latestDate;
    this.month = month;
  }
}

export class OverdraftError extends LedgerError {
  constructor() {
    super(
      "OVERDRAFT",
      "This transaction could not be completed due to an insufficient account balance.",
    );
    this.name = "OverdraftError";
  }
}

/** Which rate limit a Savings transaction ran into. */
export type LimitKind = "daily" | "monthly";

export class TransactionLimitError extends LedgerError {
  public readonly limit: LimitKind;
  public readonly max: number;

  constructor(limit: LimitKind, max: number) {
    super(
      "LIMIT",
      `This transaction could not be completed because this account already has ${String(max)} transactions in this ${limit === "daily" ? "day" : "month"}.`,
    );
    this.name = "TransactionLimitError";
    this.limit = limit;
    this.max = max;
  }
}

// ─── Trace Types ─────────────────────────────────────────────────────────

/**
 * Diagnostic events emitted by a Ledger.
 * The core has no logger of its own; callers forward these.
 */
export type LedgerTraceEvent =
  | {
      readonly type: "transaction.created";
      readonly accountNumber: number;
      readonly amount: string;
      readonly date: CalendarDate;
      readonly exempt: boolean;
    }
  | {
      readonly type: "assessment.triggered";
      readonly accountNumber: number;
      readonly period: YearMonth;
    };

export type LedgerTraceFn = (event: LedgerTraceEvent) => void;

/**
 * Options for constructing a Ledger.
 */
export interface LedgerOptions {
  readonly trace?: LedgerTraceFn | undefined;
}
