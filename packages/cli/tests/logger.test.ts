/**
 * Tests for logger.ts — file logger + trace forwarding.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import { Bank } from "@passbook/bank";
import { createLogger, traceToLogger } from "../src/logger.js";

describe("createLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "passbook-log-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes JSON lines to the log file, creating its directory", () => {
    const file = join(dir, "logs", "passbook.log");
    const logger = createLogger({ LOG_FILE: file, LOG_LEVEL: "info" });

    logger.info({ accounts: 2 }, "Bank loaded");
    logger.debug("not written at info level");

    const lines = readFileSync(file, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      level: 30,
      service: "passbook",
      accounts: 2,
      msg: "Bank loaded",
    });
  });
});

describe("traceToLogger", () => {
  it("forwards bank and ledger events at debug level", () => {
    const logs: string[] = [];
    const logger = pino({ level: "debug" }, {
      write: (msg: string) => {
        logs.push(msg);
      },
    });
    const bank = new Bank({ trace: traceToLogger(logger) });

    bank.openAccount("checking").addTransaction("12.00", "2024-05-06");

    expect(logs.map((line) => JSON.parse(line))).toMatchObject([
      {
        level: 20,
        msg: "account.opened",
        event: { type: "account.opened", accountNumber: 1, kind: "checking" },
      },
      {
        level: 20,
        msg: "transaction.created",
        event: {
          type: "transaction.created",
          accountNumber: 1,
          amount: "12.00",
          date: "2024-05-06",
          exempt: false,
        },
      },
    ]);
  });

  it("is silent above debug level", () => {
    const logs: string[] = [];
    const logger = pino({ level: "info" }, {
      write: (msg: string) => {
        logs.push(msg);
      },
    });

    new Bank({ trace: traceToLogger(logger) }).openAccount("savings");

    expect(logs).toEqual([]);
  });
});
