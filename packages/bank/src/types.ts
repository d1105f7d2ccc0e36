/**
 * @passbook/bank — Types and errors for the registry and persistence layer.
 */

import type { AccountKind } from "@passbook/types";
import type { LedgerTraceEvent, PolicyConfig } from "@passbook/ledger";

// ─── Error Types ─────────────────────────────────────────────────────────

export type BankErrorCode =
  | "UNKNOWN_ACCOUNT"
  | "UNKNOWN_ACCOUNT_KIND"
  | "DUPLICATE_ACCOUNT_NUMBER"
  | "CORRUPT_SNAPSHOT"
  | "INTEGRITY_MISMATCH"
  | "STORAGE_LOCKED"
  | "STORAGE_CLOSED";

/**
 * Structured error from the registry or the persistence boundary.
 */
export class BankError extends Error {
  public readonly code: BankErrorCode;

  constructor(code: BankErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BankError";
    this.code = code;
  }
}

// ─── Trace Types ─────────────────────────────────────────────────────────

export type BankTraceEvent =
  | LedgerTraceEvent
  | {
      readonly type: "account.opened";
      readonly accountNumber: number;
      readonly kind: AccountKind;
    };

export type BankTraceFn = (event: BankTraceEvent) => void;

// ─── Options ─────────────────────────────────────────────────────────────

export interface BankOptions {
  /** Rates, limits and fees for every account the bank opens or restores */
  readonly policies?: PolicyConfig | undefined;
  readonly trace?: BankTraceFn | undefined;
}
