/**
 * @passbook/cli — Menu session.
 *
 * Drives one interactive session against a Bank: print the menu, read
 * a command, run it, repeat. Input and output go through SessionIO so
 * the loop runs the same against a terminal or a scripted test.
 *
 * Rules:
 * - Ledger and bank errors are shown to the user and the loop goes on
 * - Anything else is logged, reported once, and ends the session
 * - The session never saves; the caller decides what an outcome means
 */

import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";
import type { Bank } from "@passbook/bank";
import { BankError } from "@passbook/bank";
import { LedgerError, parseCalendarDate, parseDecimal } from "@passbook/ledger";
import type { Ledger } from "@passbook/ledger";
import type { CalendarDate } from "@passbook/types";

// =============================================================================
// Types
// =============================================================================

export interface SessionIO {
  /** Show `text` and resolve with the next line, or undefined at end of input */
  prompt(text: string): Promise<string | undefined>;
  print(line: string): void;
}

export type SessionOutcome = "quit" | "end-of-input" | "failed";

export interface MenuSessionOptions {
  readonly bank: Bank;
  readonly io: SessionIO;
  readonly logger: Logger;
  readonly chalk: ChalkInstance;
}

type CommandResult = "continue" | "quit" | "end-of-input";

// =============================================================================
// Text
// =============================================================================

export const MENU_OPTIONS: readonly string[] = [
  "1: open account",
  "2: summary",
  "3: select account",
  "4: add transaction",
  "5: list transactions",
  "6: interest and fees",
  "7: quit",
];

export const MESSAGES = {
  invalidAmount: "Please try again with a valid dollar amount.",
  invalidDate: "Please try again with a valid date in the format YYYY-MM-DD.",
  invalidAccountNumber: "Please try again with a valid account number.",
  noAccountSelected: "This command requires that you first select an account.",
  unexpected: "Sorry! Something unexpected happened. Check the log for details.",
} as const;

const SEPARATOR = "-".repeat(32);

// =============================================================================
// Session
// =============================================================================

export class MenuSession {
  private readonly _bank: Bank;
  private readonly _io: SessionIO;
  private readonly _logger: Logger;
  private readonly _chalk: ChalkInstance;
  private _selected: Ledger | undefined;

  constructor(options: MenuSessionOptions) {
    this._bank = options.bank;
    this._io = options.io;
    this._logger = options.logger;
    this._chalk = options.chalk;
  }

  get selected(): Ledger | undefined {
    return this._selected;
  }

  async run(): Promise<SessionOutcome> {
    for (;;) {
      this._printMenu();
      const command = await this._io.prompt(">");
      if (command === undefined) {
        return "end-of-input";
      }

      let result: CommandResult;
      try {
        result = await this._dispatch(command.trim());
      } catch (err) {
        if (err instanceof LedgerError || err instanceof BankError) {
          this._logger.info({ code: err.code }, err.message);
          this._error(err.message);
          continue;
        }
        this._logger.error({ err, command: command.trim() }, "Unexpected failure in menu session");
        this._error(MESSAGES.unexpected);
        return "failed";
      }

      if (result !== "continue") {
        return result;
      }
    }
  }

  // ─── Commands ────────────────────────────────────────────────────────

  private async _dispatch(command: string): Promise<CommandResult> {
    switch (command) {
      case "1":
        return this._openAccount();
      case "2":
        return this._summary();
      case "3":
        return this._selectAccount();
      case "4":
        return this._addTransaction();
      case "5":
        return this._listTransactions();
      case "6":
        return this._assess();
      case "7":
        return "quit";
      default:
        return "continue";
    }
  }

  private async _openAccount(): Promise<CommandResult> {
    const kind = await this._ask("Type of account? (checking/savings)");
    if (kind === undefined) {
      return "end-of-input";
    }
    const ledger = this._bank.openAccount(kind);
    this._logger.info({ accountNumber: ledger.accountNumber, kind: ledger.kind }, "Account opened");
    return "continue";
  }

  private _summary(): CommandResult {
    for (const line of this._bank.summary()) {
      this._io.print(line);
    }
    return "continue";
  }

  private async _selectAccount(): Promise<CommandResult> {
    const text = await this._ask("Enter account number");
    if (text === undefined) {
      return "end-of-input";
    }
    if (!/^\d+$/.test(text)) {
      this._error(MESSAGES.invalidAccountNumber);
      return "continue";
    }
    this._selected = this._bank.requireAccount(Number.parseInt(text, 10));
    this._logger.info({ accountNumber: this._selected.accountNumber }, "Account selected");
    return "continue";
  }

  private async _addTransaction(): Promise<CommandResult> {
    const ledger = this._requireSelection();
    if (ledger === undefined) {
      return "continue";
    }

    const amountText = await this._ask("Amount?");
    if (amountText === undefined) {
      return "end-of-input";
    }
    const amount = parseOrUndefined(() => parseDecimal(amountText), "INVALID_AMOUNT");
    if (amount === undefined) {
      this._error(MESSAGES.invalidAmount);
      return "continue";
    }

    const dateText = await this._ask("Date? (YYYY-MM-DD)");
    if (dateText === undefined) {
      return "end-of-input";
    }
    const date = parseOrUndefined<CalendarDate>(() => parseCalendarDate(dateText), "INVALID_DATE");
    if (date === undefined) {
      this._error(MESSAGES.invalidDate);
      return "continue";
    }

    ledger.addTransaction(amount, date);
    return "continue";
  }

  private _listTransactions(): CommandResult {
    const ledger = this._requireSelection();
    for (const transaction of ledger?.getTransactions() ?? []) {
      this._io.print(transaction.toString());
    }
    return "continue";
  }

  private _assess(): CommandResult {
    const ledger = this._requireSelection();
    const result = ledger?.assessInterestAndFees();
    if (ledger !== undefined && result !== undefined) {
      this._logger.info(
        { accountNumber: ledger.accountNumber, period: result.period, charged: result.fee !== undefined },
        "Interest and fees assessed",
      );
    }
    return "continue";
  }

  // ─── Helpers ─────────────────────────────────────────────────────────

  private _printMenu(): void {
    const selected = this._selected === undefined ? "None" : this._selected.toString();
    this._io.print(SEPARATOR);
    this._io.print(`Currently selected account: ${selected}`);
    this._io.print(this._chalk.bold("Enter command"));
    for (const option of MENU_OPTIONS) {
      this._io.print(option);
    }
  }

  private async _ask(question: string): Promise<string | undefined> {
    const answer = await this._io.prompt(`${this._chalk.cyan(question)}\n>`);
    return answer?.trim();
  }

  private _requireSelection(): Ledger | undefined {
    if (this._selected === undefined) {
      this._error(MESSAGES.noAccountSelected);
    }
    return this._selected;
  }

  private _error(message: string): void {
    this._io.print(this._chalk.red(message));
  }
}

/**
 * Run a parser, mapping its LedgerError with `code` to undefined.
 */
function parseOrUndefined<T>(parse: () => T, code: LedgerError["code"]): T | undefined {
  try {
    return parse();
  } catch (err) {
    if (err instanceof LedgerError && err.code === code) {
      return undefined;
    }
    throw err;
  }
}
