/**
 * @passbook/ledger — Core Ledger class.
 *
 * One account's transaction history. Transactions are only ever
 * appended, and only after passing admission.
 *
 * API surface:
 * - addTransaction() — Admit a transaction (chronology → overdraft → limits)
 * - getBalance() — Exact sum of every amount held
 * - getTransactions() — History in date order
 * - assessInterestAndFees() — Month-end interest and fees, once per month
 * - snapshot() — Serialize the account state
 * - fromSnapshot() — Restore an account, replaying admission
 *
 * There is NO update() or delete().
 */

import { isYearMonth } from "@passbook/types";
import type { AccountKind, CalendarDate, LedgerState, YearMonth } from "@passbook/types";
import { lastDayOfMonth, monthName, parseCalendarDate, periodOf } from "./calendar.js";
import {
  addDecimal,
  formatCurrency,
  multiplyDecimal,
  parseDecimal,
  toDecimalString,
} from "./decimal.js";
import type { Decimal } from "./decimal.js";
import type { AccountPolicy } from "./policy.js";
import {
  Transaction,
  compareTransactions,
  latestTransaction,
  sumTransactions,
} from "./transaction.js";
import type { LedgerOptions, LedgerTraceFn } from "./types.js";
import { LedgerError, TransactionSequenceError } from "./types.js";

/**
 * Outcome of a monthly assessment.
 */
export interface AssessmentResult {
  readonly period: YearMonth;
  readonly interest: Transaction;
  readonly fee?: Transaction | undefined;
}

export class Ledger {
  private readonly _accountNumber: number;
  private readonly _policy: AccountPolicy;
  private readonly _trace: LedgerTraceFn | undefined;
  private readonly _transactions: Transaction[] = [];
  private _lastAssessedPeriod: YearMonth | null = null;

  constructor(accountNumber: number, policy: AccountPolicy, options?: LedgerOptions) {
    if (!Number.isSafeInteger(accountNumber) || accountNumber < 1) {
      throw new LedgerError(
        "INVALID_STATE",
        `Account number must be a positive integer, got: ${String(accountNumber)}`,
      );
    }
    this._accountNumber = accountNumber;
    this._policy = policy;
    this._trace = options?.trace;
  }

  get accountNumber(): number {
    return this._accountNumber;
  }

  get kind(): AccountKind {
    return this._policy.kind;
  }

  get lastAssessedPeriod(): YearMonth | null {
    return this._lastAssessedPeriod;
  }

  get transactionCount(): number {
    return this._transactions.length;
  }

  // ─── Admission ───────────────────────────────────────────────────────

  /**
   * Admit a transaction.
   *
   * Checks, in order (fail-closed — the ledger is untouched on failure):
   * 1. Date is not before the latest held transaction (all transactions)
   * 2. Balance stays non-negative (non-exempt only)
   * 3. Policy rate limits (non-exempt only)
   */
  addTransaction(amount: Decimal | string, date: CalendarDate, exempt = false): Transaction {
    const value = typeof amount === "string" ? parseDecimal(amount) : amount;
    const transaction = new Transaction(value, parseCalendarDate(date), exempt);
    this._admit(transaction);
    return transaction;
  }

  private _admit(candidate: Transaction, traced = true): void {
    this._assertChronological(candidate);

    if (!candidate.exempt) {
      candidate.checkOverdraft(this.getBalance());
      this._policy.checkLimits(candidate, this._transactions);
    }

    this._transactions.push(candidate);
    if (!traced) {
      return;
    }
    this._trace?.({
      type: "transaction.created",
      accountNumber: this._accountNumber,
      amount: toDecimalString(candidate.amount),
      date: candidate.date,
      exempt: candidate.exempt,
    });
  }

  private _assertChronological(candidate: Transaction): void {
    const latest = latestTransaction(this._transactions);
    if (latest !== undefined && candidate.precedes(latest)) {
      throw new TransactionSequenceError(latest.date);
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getBalance(): Decimal {
    return sumTransactions(this._transactions);
  }

  /**
   * Transactions in ascending date order; same-day entries keep
   * their insertion order.
   */
  getTransactions(): readonly Transaction[] {
    return [...this._transactions].sort(compareTransactions);
  }

  // ─── Monthly Assessment ──────────────────────────────────────────────

  /**
   * Append interest, then any policy fee, dated on the last day of
   * the month holding the latest transaction.
   *
   * Returns undefined for an empty ledger. Throws
   * TransactionSequenceError when that month was already assessed.
   */
  assessInterestAndFees(): AssessmentResult | undefined {
    const latest = latestTransaction(this._transactions);
    if (latest === undefined) {
      return undefined;
    }

    const date = lastDayOfMonth(latest.date);
    const period = periodOf(date);

    if (this._lastAssessedPeriod === period) {
      throw new TransactionSequenceError(latest.date, monthName(latest.date));
    }

    const balance = this.getBalance();
    const interestAmount = multiplyDecimal(balance, this._policy.interestRate());
    const interest = new Transaction(interestAmount, date, true);

    const charge = this._policy.assessFees(addDecimal(balance, interestAmount), date);
    const fee = charge === undefined ? undefined : new Transaction(charge.amount, charge.date, true);
    if (fee !== undefined && fee.precedes(interest)) {
      throw new TransactionSequenceError(interest.date);
    }

    this._trace?.({
      type: "assessment.triggered",
      accountNumber: this._accountNumber,
      period,
    });

    this._admit(interest);
    if (fee !== undefined) {
      this._admit(fee);
    }
    this._lastAssessedPeriod = period;

    return { period, interest, fee };
  }

  // ─── Rendering ───────────────────────────────────────────────────────

  /** "Checking#000000001,\tbalance: $44.29" */
  toString(): string {
    const number = String(this._accountNumber).padStart(9, "0");
    return `${this._policy.label}#${number},\tbalance: $${formatCurrency(this.getBalance())}`;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerState {
    return {
      accountNumber: this._accountNumber,
      kind: this._policy.kind,
      transactions: this._transactions.map((t) => t.toRecord()),
      lastAssessedPeriod: this._lastAssessedPeriod,
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Every record is replayed through admission in its stored order.
   */
  static fromSnapshot(state: LedgerState, policy: AccountPolicy, options?: LedgerOptions): Ledger {
    if (state.kind !== policy.kind) {
      throw new LedgerError(
        "INVALID_STATE",
        `Snapshot for account ${String(state.accountNumber)} is "${state.kind}" but policy is "${policy.kind}"`,
      );
    }

    const ledger = new Ledger(state.accountNumber, policy, options);

    for (const record of state.transactions) {
      ledger._admit(Transaction.fromRecord(record), false);
    }

    const period = state.lastAssessedPeriod;
    if (period !== null) {
      const latest = latestTransaction(ledger._transactions);
      if (!isYearMonth(period) || latest === undefined || period > periodOf(latest.date)) {
        throw new LedgerError(
          "INVALID_STATE",
          `Invalid last assessed period "${period}" for account ${String(state.accountNumber)}`,
        );
      }
      ledger._lastAssessedPeriod = period;
    }

    return ledger;
  }
}
