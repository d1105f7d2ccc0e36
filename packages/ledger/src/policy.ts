/**
 * @passbook/ledger — Account policies.
 *
 * A Ledger is one type; what differs between Savings and Checking is
 * the policy it is created with:
 * - interestRate() — monthly rate applied at assessment
 * - checkLimits() — extra admission rule for non-exempt transactions
 * - assessFees() — charge applied after interest, if any
 */

import type { AccountKind, CalendarDate } from "@passbook/types";
import { compareDecimal, parseDecimal } from "./decimal.js";
import type { Decimal } from "./decimal.js";
import type { Transaction } from "./transaction.js";
import { LedgerError, TransactionLimitError } from "./types.js";

// ─── Configuration ───────────────────────────────────────────────────────

export interface SavingsPolicyConfig {
  /** Monthly rate as a decimal string */
  readonly interestRate: string;
  readonly dailyLimit: number;
  readonly monthlyLimit: number;
}

export interface CheckingPolicyConfig {
  /** Monthly rate as a decimal string */
  readonly interestRate: string;
  /** A fee applies when the post-interest balance is strictly below this */
  readonly lowBalanceThreshold: string;
  /** Signed fee amount, e.g. "-5.75" */
  readonly lowBalanceFee: string;
}

export interface PolicyConfig {
  readonly savings: SavingsPolicyConfig;
  readonly checking: CheckingPolicyConfig;
}

export const DEFAULT_POLICY_CONFIG: PolicyConfig = {
  savings: {
    interestRate: "0.0033",
    dailyLimit: 2,
    monthlyLimit: 5,
  },
  checking: {
    interestRate: "0.0008",
    lowBalanceThreshold: "100",
    lowBalanceFee: "-5.75",
  },
};

// ─── Policy Interface ────────────────────────────────────────────────────

/** A charge the assessment routine appends as an exempt transaction. */
export interface FeeCharge {
  readonly amount: Decimal;
  readonly date: CalendarDate;
}

export interface AccountPolicy {
  readonly kind: AccountKind;

  /** Display name used when rendering the account, e.g. "Savings" */
  readonly label: string;

  interestRate(): Decimal;

  /**
   * Throws if admitting `candidate` would break a rate limit.
   * `held` never contains the candidate.
   */
  checkLimits(candidate: Transaction, held: readonly Transaction[]): void;

  assessFees(postInterestBalance: Decimal, date: CalendarDate): FeeCharge | undefined;
}

// ─── Savings ─────────────────────────────────────────────────────────────

export function createSavingsPolicy(
  config: SavingsPolicyConfig = DEFAULT_POLICY_CONFIG.savings,
): AccountPolicy {
  const rate = parseDecimal(config.interestRate);
  assertLimit("dailyLimit", config.dailyLimit);
  assertLimit("monthlyLimit", config.monthlyLimit);

  return {
    kind: "savings",
    label: "Savings",
    interestRate: () => rate,
    checkLimits(candidate, held) {
      let today = 0;
      let thisMonth = 0;
      for (const t of held) {
        if (t.exempt) continue;
        if (t.isSameDay(candidate)) today++;
        if (t.isSameMonth(candidate)) thisMonth++;
      }
      if (today >= config.dailyLimit) {
        throw new TransactionLimitError("daily", config.dailyLimit);
      }
      if (thisMonth >= config.monthlyLimit) {
        throw new TransactionLimitError("monthly", config.monthlyLimit);
      }
    },
    assessFees: () => undefined,
  };
}

// ─── Checking ────────────────────────────────────────────────────────────

export function createCheckingPolicy(
  config: CheckingPolicyConfig = DEFAULT_POLICY_CONFIG.checking,
): AccountPolicy {
  const rate = parseDecimal(config.interestRate);
  const threshold = parseDecimal(config.lowBalanceThreshold);
  const fee = parseDecimal(config.lowBalanceFee);

  return {
    kind: "checking",
    label: "Checking",
    interestRate: () => rate,
    checkLimits: () => undefined,
    assessFees(postInterestBalance, date) {
      if (compareDecimal(postInterestBalance, threshold) < 0) {
        return { amount: fee, date };
      }
      return undefined;
    },
  };
}

// ─── Factory ─────────────────────────────────────────────────────────────

export function createPolicy(
  kind: AccountKind,
  config: PolicyConfig = DEFAULT_POLICY_CONFIG,
): AccountPolicy {
  switch (kind) {
    case "savings":
      return createSavingsPolicy(config.savings);
    case "checking":
      return createCheckingPolicy(config.checking);
  }
}

function assertLimit(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new LedgerError("INVALID_STATE", `${name} must be a positive integer, got: ${String(value)}`);
  }
}
