/**
 * @passbook/ledger — Transaction value object.
 *
 * A signed amount on a calendar day. Construction performs no
 * validation; admission is the Ledger's job.
 */

import type { CalendarDate, TransactionRecord } from "@passbook/types";
import { compareDates, isSameDay, isSameMonth, parseCalendarDate } from "./calendar.js";
import {
  addDecimal,
  formatCurrency,
  isNegativeDecimal,
  parseDecimal,
  sumDecimals,
  toDecimalString,
} from "./decimal.js";
import type { Decimal } from "./decimal.js";
import { OverdraftError } from "./types.js";

export class Transaction {
  readonly amount: Decimal;
  readonly date: CalendarDate;

  /** Interest and fee entries bypass overdraft and rate-limit checks. */
  readonly exempt: boolean;

  constructor(amount: Decimal, date: CalendarDate, exempt = false) {
    this.amount = amount;
    this.date = date;
    this.exempt = exempt;
    Object.freeze(this);
  }

  /**
   * Throws OverdraftError if this transaction is a withdrawal that
   * would take `balance` below zero. Deposits always pass.
   */
  checkOverdraft(balance: Decimal): void {
    if (!isNegativeDecimal(this.amount)) {
      return;
    }
    if (isNegativeDecimal(addDecimal(balance, this.amount))) {
      throw new OverdraftError();
    }
  }

  isSameDay(other: Transaction): boolean {
    return isSameDay(this.date, other.date);
  }

  isSameMonth(other: Transaction): boolean {
    return isSameMonth(this.date, other.date);
  }

  precedes(other: Transaction): boolean {
    return compareDates(this.date, other.date) < 0;
  }

  /** "2024-01-31, $-5.75" */
  toString(): string {
    return `${this.date}, $${formatCurrency(this.amount)}`;
  }

  toRecord(): TransactionRecord {
    return {
      amount: toDecimalString(this.amount),
      date: this.date,
      exempt: this.exempt,
    };
  }

  static fromRecord(record: TransactionRecord): Transaction {
    return new Transaction(
      parseDecimal(record.amount),
      parseCalendarDate(record.date),
      record.exempt,
    );
  }
}

// ─── Collection Helpers ──────────────────────────────────────────────────

/** Date comparator; pair with Array.prototype.sort, which is stable. */
export function compareTransactions(a: Transaction, b: Transaction): number {
  return compareDates(a.date, b.date);
}

export function sumTransactions(transactions: Iterable<Transaction>): Decimal {
  const amounts: Decimal[] = [];
  for (const transaction of transactions) {
    amounts.push(transaction.amount);
  }
  return sumDecimals(amounts);
}

/**
 * The transaction with the greatest date. On ties the earliest
 * inserted one wins.
 */
export function latestTransaction(
  transactions: readonly Transaction[],
): Transaction | undefined {
  let latest: Transaction | undefined;
  for (const transaction of transactions) {
    if (latest === undefined || latest.precedes(transaction)) {
      latest = transaction;
    }
  }
  return latest;
}
