/**
 * Financial Types
 *
 * Serializable primitives shared by the ledger core, the bank registry
 * and the persistence layer.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - Dates are calendar days with no time component
 * - Records are plain data; behavior lives in @passbook/ledger
 */

/**
 * A calendar day in ISO form, e.g. "2024-01-31".
 * Lexicographic order equals chronological order.
 */
export type CalendarDate = string;

/**
 * A calendar month in ISO form, e.g. "2024-01".
 * Used as the assessment period marker.
 */
export type YearMonth = string;

/** The account variants a bank can open. */
export type AccountKind = "savings" | "checking";

/**
 * One persisted ledger line.
 */
export interface TransactionRecord {
  /** Signed decimal string (e.g., "-5.75", "0.0400") */
  readonly amount: string;

  /** Calendar day of the transaction */
  readonly date: CalendarDate;

  /** True for interest and fee entries generated by the system */
  readonly exempt: boolean;
}

/**
 * Full serializable state of one account.
 * Transactions keep their insertion order.
 */
export interface LedgerState {
  readonly accountNumber: number;
  readonly kind: AccountKind;
  readonly transactions: readonly TransactionRecord[];
  readonly lastAssessedPeriod: YearMonth | null;
}

/**
 * Full serializable state of a bank, versioned for forward migration.
 */
export interface BankState {
  readonly version: 1;
  readonly accounts: readonly LedgerState[];
}
