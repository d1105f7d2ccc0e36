/**
 * Tests for MenuSession.
 *
 * Drives the menu with scripted input and asserts the exact transcript:
 * every printed line and every prompt, in order.
 */

import { describe, it, expect, vi } from "vitest";
import { Chalk } from "chalk";
import pino from "pino";
import { Bank } from "@passbook/bank";
import { MenuSession, MENU_OPTIONS, MESSAGES } from "../src/session.js";
import type { SessionIO } from "../src/session.js";

// =============================================================================
// Helpers
// =============================================================================

function scripted(inputs: readonly string[]): { io: SessionIO; transcript: string[] } {
  const transcript: string[] = [];
  const queue = [...inputs];
  const io: SessionIO = {
    prompt: (text) => {
      transcript.push(text);
      return Promise.resolve(queue.shift());
    },
    print: (line) => {
      transcript.push(line);
    },
  };
  return { io, transcript };
}

/** The menu block, ending with the command prompt. */
function menu(selected = "None"): string[] {
  return [
    "--------------------------------",
    `Currently selected account: ${selected}`,
    "Enter command",
    ...MENU_OPTIONS,
    ">",
  ];
}

function createSession(
  inputs: readonly string[],
  bank = new Bank(),
  chalkLevel: 0 | 1 = 0,
) {
  const { io, transcript } = scripted(inputs);
  const logs: string[] = [];
  const logger = pino({ level: "info" }, {
    write: (msg: string) => {
      logs.push(msg);
    },
  });
  const session = new MenuSession({ bank, io, logger, chalk: new Chalk({ level: chalkLevel }) });
  return { session, transcript, logs, bank };
}

const CHECKING_0 = "Checking#000000001,\tbalance: $0.00";
const CHECKING_50 = "Checking#000000001,\tbalance: $50.00";
const CHECKING_44 = "Checking#000000001,\tbalance: $44.29";

// =============================================================================
// Tests
// =============================================================================

describe("MenuSession", () => {
  it("ends at end of input without running anything", async () => {
    const { session, transcript } = createSession([]);

    await expect(session.run()).resolves.toBe("end-of-input");
    expect(transcript).toEqual(menu());
  });

  it("runs the checking month-end walkthrough", async () => {
    const { session, transcript, bank } = createSession([
      "1", "checking",
      "3", "1",
      "4", "50.00", "2024-01-10",
      "6",
      "5",
      "2",
      "7",
    ]);

    await expect(session.run()).resolves.toBe("quit");

    expect(transcript).toEqual([
      ...menu(),
      "Type of account? (checking/savings)\n>",
      ...menu(),
      "Enter account number\n>",
      ...menu(CHECKING_0),
      "Amount?\n>",
      "Date? (YYYY-MM-DD)\n>",
      ...menu(CHECKING_50),
      ...menu(CHECKING_44),
      "2024-01-10, $50.00",
      "2024-01-31, $0.04",
      "2024-01-31, $-5.75",
      ...menu(CHECKING_44),
      CHECKING_44,
      ...menu(CHECKING_44),
    ]);
    expect(bank.count).toBe(1);
    expect(session.selected?.accountNumber).toBe(1);
  });

  it("accepts commands and answers with surrounding spaces", async () => {
    const { session, bank } = createSession([" 1 ", "  Savings  "]);

    await session.run();

    expect(bank.requireAccount(1).kind).toBe("savings");
  });

  it("ignores unknown commands", async () => {
    const { session, transcript } = createSession(["9", "hello"]);

    await session.run();

    expect(transcript).toEqual([...menu(), ...menu(), ...menu()]);
  });

  describe("account selection", () => {
    it("requires a selection for account commands", async () => {
      const { session, transcript } = createSession(["4", "5", "6"]);

      await session.run();

      expect(transcript).toEqual([
        ...menu(),
        MESSAGES.noAccountSelected,
        ...menu(),
        MESSAGES.noAccountSelected,
        ...menu(),
        MESSAGES.noAccountSelected,
        ...menu(),
      ]);
    });

    it("reports an unknown account number", async () => {
      const { session, transcript } = createSession(["3", "9"]);

      await session.run();

      expect(transcript).toEqual([
        ...menu(),
        "Enter account number\n>",
        "Account 9 not found.",
        ...menu(),
      ]);
    });

    it("rejects a non-numeric account number", async () => {
      const { session, transcript } = createSession(["3", "first"]);

      await session.run();

      expect(transcript.slice(-12, -11)).toEqual([MESSAGES.invalidAccountNumber]);
    });

    it("keeps the previous selection when a lookup fails", async () => {
      const bank = new Bank();
      bank.openAccount("savings");
      const { session } = createSession(["3", "1", "3", "5"], bank);

      await session.run();

      expect(session.selected?.accountNumber).toBe(1);
    });
  });

  describe("input validation", () => {
    it("rejects a bad amount before asking for a date", async () => {
      const bank = new Bank();
      bank.openAccount("checking");
      const { session, transcript } = createSession(["3", "1", "4", "ten dollars"], bank);

      await session.run();

      expect(transcript).toEqual([
        ...menu(),
        "Enter account number\n>",
        ...menu(CHECKING_0),
        "Amount?\n>",
        MESSAGES.invalidAmount,
        ...menu(CHECKING_0),
      ]);
    });

    it("rejects an impossible date", async () => {
      const bank = new Bank();
      bank.openAccount("checking");
      const { session, transcript } = createSession(
        ["3", "1", "4", "20", "2024-02-30"],
        bank,
      );

      await session.run();

      expect(transcript.slice(-12)).toEqual([MESSAGES.invalidDate, ...menu(CHECKING_0)]);
      expect(bank.requireAccount(1).transactionCount).toBe(0);
    });

    it("reports an unknown account type", async () => {
      const { session, transcript, bank } = createSession(["1", "brokerage"]);

      await session.run();

      expect(transcript.slice(-12)).toEqual([
        'Unknown account type "brokerage". Expected checking or savings',
        ...menu(),
      ]);
      expect(bank.count).toBe(0);
    });

    it("stops at end of input in the middle of a command", async () => {
      const { session, bank } = createSession(["1"]);

      await expect(session.run()).resolves.toBe("end-of-input");
      expect(bank.count).toBe(0);
    });
  });

  describe("ledger errors", () => {
    it("shows an overdraft and leaves the balance alone", async () => {
      const bank = new Bank();
      bank.openAccount("checking");
      const { session, transcript } = createSession(
        ["3", "1", "4", "-10", "2024-01-01"],
        bank,
      );

      await session.run();

      expect(transcript.slice(-12)).toEqual([
        "This transaction could not be completed due to an insufficient account balance.",
        ...menu(CHECKING_0),
      ]);
    });

    it("shows the savings daily limit", async () => {
      const bank = new Bank();
      bank.openAccount("savings");
      const { session, transcript } = createSession(
        [
          "3", "1",
          "4", "10", "2024-03-04",
          "4", "10", "2024-03-04",
          "4", "10", "2024-03-04",
        ],
        bank,
      );

      await session.run();

      expect(transcript.slice(-12)).toEqual([
        "This transaction could not be completed because this account already has 2 transactions in this day.",
        ...menu("Savings#000000001,\tbalance: $20.00"),
      ]);
    });

    it("shows a repeated assessment for the same month", async () => {
      const bank = new Bank();
      bank.openAccount("savings").addTransaction("100", "2024-01-15");
      const { session, transcript } = createSession(["3", "1", "6", "6"], bank);

      await session.run();

      expect(transcript.slice(-12)).toEqual([
        "Cannot apply interest and fees again in the month of January.",
        ...menu("Savings#000000001,\tbalance: $100.33"),
      ]);
    });

    it("logs rejected commands at info level", async () => {
      const { session, logs } = createSession(["3", "4"]);

      await session.run();

      const entry = JSON.parse(logs.at(-1) ?? "{}");
      expect(entry).toMatchObject({ level: 30, code: "UNKNOWN_ACCOUNT", msg: "Account 4 not found." });
    });
  });

  describe("unexpected failures", () => {
    it("logs the error, apologises and ends the session", async () => {
      const bank = new Bank();
      vi.spyOn(bank, "summary").mockImplementation(() => {
        throw new TypeError("summary exploded");
      });
      const { session, transcript, logs } = createSession(["2", "2"], bank);

      await expect(session.run()).resolves.toBe("failed");

      expect(transcript).toEqual([...menu(), MESSAGES.unexpected]);
      const entry = JSON.parse(logs.at(-1) ?? "{}");
      expect(entry).toMatchObject({
        level: 50,
        command: "2",
        msg: "Unexpected failure in menu session",
        err: { type: "TypeError", message: "summary exploded" },
      });
    });
  });

  describe("colour", () => {
    it("styles errors and prompts when enabled", async () => {
      const { session, transcript } = createSession(["4", "3"], new Bank(), 1);

      await session.run();

      expect(transcript).toContain(`\u001b[31m${MESSAGES.noAccountSelected}\u001b[39m`);
      expect(transcript).toContain("\u001b[36mEnter account number\u001b[39m\n>");
      expect(transcript).toContain("\u001b[1mEnter command\u001b[22m");
    });
  });
});
