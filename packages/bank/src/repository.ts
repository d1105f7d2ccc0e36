/**
 * @passbook/bank — Bank repository.
 *
 * Loads and saves a whole Bank through a StorageProvider.
 *
 * On disk the bank is a JSON envelope:
 *   { format, savedAt, stateHash, state }
 * where stateHash is the SHA-256 of the canonical JSON of `state`.
 *
 * Loading is fail-closed: unparseable JSON, a schema violation, a hash
 * mismatch or a history that fails replay all throw BankError. An
 * empty or missing store loads as an empty bank.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { BankState } from "@passbook/types";
import { LedgerError } from "@passbook/ledger";
import { Bank } from "./bank.js";
import { SNAPSHOT_FORMAT, SnapshotEnvelopeSchema } from "./schema.js";
import { withStorage } from "./storage.js";
import type { StorageProvider } from "./storage.js";
import type { BankOptions } from "./types.js";
import { BankError } from "./types.js";

/**
 * SHA-256 of the canonical JSON representation of a bank state.
 */
export function computeStateHash(state: BankState): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

export class BankRepository {
  private readonly _provider: StorageProvider;
  private readonly _options: BankOptions | undefined;

  /**
   * @param options - Applied to every bank this repository loads
   */
  constructor(provider: StorageProvider, options?: BankOptions) {
    this._provider = provider;
    this._options = options;
  }

  load(): Bank {
    return withStorage(this._provider, (handle) => {
      const content = handle.read();
      if (content === undefined || content.trim() === "") {
        return new Bank(this._options);
      }
      return this._decode(content);
    });
  }

  save(bank: Bank): void {
    const state = bank.snapshot();
    const envelope = {
      format: SNAPSHOT_FORMAT,
      savedAt: new Date().toISOString(),
      stateHash: computeStateHash(state),
      state,
    };
    withStorage(this._provider, (handle) => {
      handle.write(`${JSON.stringify(envelope, null, 2)}\n`);
    });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _decode(content: string): Bank {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new BankError("CORRUPT_SNAPSHOT", "Snapshot is not valid JSON", { cause: err });
    }

    const parsed = SnapshotEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new BankError("CORRUPT_SNAPSHOT", `Snapshot failed validation: ${issues}`, {
        cause: parsed.error,
      });
    }

    const { state, stateHash } = parsed.data;
    if (computeStateHash(state) !== stateHash) {
      throw new BankError("INTEGRITY_MISMATCH", "Snapshot state hash does not match its contents");
    }

    try {
      return Bank.fromSnapshot(state, this._options);
    } catch (err) {
      if (err instanceof LedgerError || err instanceof BankError) {
        throw new BankError("CORRUPT_SNAPSHOT", `Snapshot could not be replayed: ${err.message}`, {
          cause: err,
        });
      }
      throw err;
    }
  }
}
