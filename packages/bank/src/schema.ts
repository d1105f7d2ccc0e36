/**
 * @passbook/bank — Snapshot schemas.
 *
 * Zod schemas for everything read back from storage. Nothing from a
 * snapshot file reaches a Ledger without passing through these.
 */

import { z } from "zod";
import { isCalendarDate, isDecimalString, isYearMonth } from "@passbook/types";

export const SNAPSHOT_FORMAT = "passbook.bank.v1";

export const TransactionRecordSchema = z.object({
  amount: z.string().refine(isDecimalString, { message: "Expected a decimal string" }),
  date: z.string().refine(isCalendarDate, { message: "Expected a YYYY-MM-DD date" }),
  exempt: z.boolean(),
});

export const LedgerStateSchema = z.object({
  accountNumber: z.number().int().positive(),
  kind: z.enum(["savings", "checking"]),
  transactions: z.array(TransactionRecordSchema),
  lastAssessedPeriod: z
    .string()
    .refine(isYearMonth, { message: "Expected a YYYY-MM period" })
    .nullable(),
});

export const BankStateSchema = z.object({
  version: z.literal(1),
  accounts: z.array(LedgerStateSchema),
});

export const SnapshotEnvelopeSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  savedAt: z.string().datetime(),
  stateHash: z.string().regex(/^[0-9a-f]{64}$/, "Expected a SHA-256 hex digest"),
  state: BankStateSchema,
});

export type SnapshotEnvelope = z.infer<typeof SnapshotEnvelopeSchema>;
