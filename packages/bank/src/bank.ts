/**
 * @passbook/bank — Account registry.
 *
 * Owns every Ledger, assigns account numbers and looks accounts up.
 *
 * Rules:
 * - Account numbers are positive, unique and never reused
 * - Accounts are never removed
 * - The policy of an account is fixed when it is opened
 */

import { isAccountKind } from "@passbook/types";
import type { AccountKind, BankState } from "@passbook/types";
import { DEFAULT_POLICY_CONFIG, Ledger, createPolicy } from "@passbook/ledger";
import type { PolicyConfig } from "@passbook/ledger";
import type { BankOptions, BankTraceFn } from "./types.js";
import { BankError } from "./types.js";

export class Bank {
  private readonly _accounts: Map<number, Ledger> = new Map();
  private readonly _policies: PolicyConfig;
  private readonly _trace: BankTraceFn | undefined;

  constructor(options?: BankOptions) {
    this._policies = options?.policies ?? DEFAULT_POLICY_CONFIG;
    this._trace = options?.trace;
  }

  /**
   * Open a new account of the given kind ("savings" or "checking",
   * case-insensitive). Throws BankError for any other kind.
   */
  openAccount(kind: string): Ledger {
    const normalized = kind.trim().toLowerCase();
    if (!isAccountKind(normalized)) {
      throw new BankError(
        "UNKNOWN_ACCOUNT_KIND",
        `Unknown account type "${kind.trim()}". Expected checking or savings`,
      );
    }

    const ledger = this._createLedger(this._nextAccountNumber(), normalized);
    this._accounts.set(ledger.accountNumber, ledger);
    this._trace?.({ type: "account.opened", accountNumber: ledger.accountNumber, kind: normalized });
    return ledger;
  }

  getAccount(accountNumber: number): Ledger | undefined {
    return this._accounts.get(accountNumber);
  }

  /**
   * Get an account by number. Throws if not found.
   */
  requireAccount(accountNumber: number): Ledger {
    const ledger = this._accounts.get(accountNumber);
    if (ledger === undefined) {
      throw new BankError("UNKNOWN_ACCOUNT", `Account ${String(accountNumber)} not found.`);
    }
    return ledger;
  }

  /** Accounts in the order they were opened. */
  getAccounts(): readonly Ledger[] {
    return [...this._accounts.values()];
  }

  get count(): number {
    return this._accounts.size;
  }

  /** One rendered line per account. */
  summary(): readonly string[] {
    return this.getAccounts().map((ledger) => ledger.toString());
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): BankState {
    return {
      version: 1,
      accounts: this.getAccounts().map((ledger) => ledger.snapshot()),
    };
  }

  /**
   * Rebuild a bank, replaying every account through admission.
   */
  static fromSnapshot(state: BankState, options?: BankOptions): Bank {
    const bank = new Bank(options);

    for (const account of state.accounts) {
      if (bank._accounts.has(account.accountNumber)) {
        throw new BankError(
          "DUPLICATE_ACCOUNT_NUMBER",
          `Account number ${String(account.accountNumber)} appears more than once`,
        );
      }
      const ledger = Ledger.fromSnapshot(
        account,
        createPolicy(account.kind, bank._policies),
        { trace: bank._trace },
      );
      bank._accounts.set(ledger.accountNumber, ledger);
    }

    return bank;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _createLedger(accountNumber: number, kind: AccountKind): Ledger {
    return new Ledger(accountNumber, createPolicy(kind, this._policies), { trace: this._trace });
  }

  private _nextAccountNumber(): number {
    let highest = 0;
    for (const accountNumber of this._accounts.keys()) {
      highest = Math.max(highest, accountNumber);
    }
    return highest + 1;
  }
}
