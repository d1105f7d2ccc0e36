/**
 * @passbook/bank — Account registry and persistence.
 *
 * - Bank — opens, numbers and looks up accounts
 * - BankRepository — loads and saves a Bank through a StorageProvider
 * - InMemoryStorage / FileStorage — where the snapshot lives
 */

export { Bank } from "./bank.js";

export { BankRepository, computeStateHash } from "./repository.js";

export {
  SNAPSHOT_FORMAT,
  TransactionRecordSchema,
  LedgerStateSchema,
  BankStateSchema,
  SnapshotEnvelopeSchema,
} from "./schema.js";
export type { SnapshotEnvelope } from "./schema.js";

export { withStorage, InMemoryStorage, FileStorage } from "./storage.js";
export type { StorageHandle, StorageProvider } from "./storage.js";

export { BankError } from "./types.js";
export type { BankErrorCode, BankTraceEvent, BankTraceFn, BankOptions } from "./types.js";
