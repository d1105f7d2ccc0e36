/**
 * @passbook/cli — Entry point.
 *
 * Loads config and the bank file, runs the menu on stdin/stdout, and
 * saves only when the user quits.
 */

import { createInterface } from "node:readline";
import { Chalk } from "chalk";
import { BankRepository, FileStorage } from "@passbook/bank";
import type { Bank } from "@passbook/bank";
import { loadConfig, toPolicyConfig } from "./config.js";
import { createLogger, traceToLogger } from "./logger.js";
import { MenuSession } from "./session.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = createLogger(config);
  const chalk = new Chalk({ level: (config.PASSBOOK_COLOR ?? process.stdout.isTTY) ? 1 : 0 });

  const repository = new BankRepository(new FileStorage(config.BANK_FILE), {
    policies: toPolicyConfig(config),
    trace: traceToLogger(logger),
  });

  let bank: Bank;
  try {
    bank = repository.load();
  } catch (err) {
    logger.fatal({ err, file: config.BANK_FILE }, "Could not load bank");
    const reason = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${chalk.red(`Could not load ${config.BANK_FILE}: ${reason}`)}\n`);
    return 1;
  }
  logger.info({ file: config.BANK_FILE, accounts: bank.count }, "Bank loaded");

  const rl = createInterface({ input: process.stdin, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();
  const onSigint = (): void => {
    rl.close();
  };
  process.once("SIGINT", onSigint);

  try {
    const session = new MenuSession({
      bank,
      logger,
      chalk,
      io: {
        print: (line) => {
          process.stdout.write(`${line}\n`);
        },
        prompt: async (text) => {
          process.stdout.write(text);
          const next = await lines.next();
          return next.done === true ? undefined : next.value;
        },
      },
    });

    const outcome = await session.run();
    switch (outcome) {
      case "quit":
        repository.save(bank);
        logger.info({ file: config.BANK_FILE, accounts: bank.count }, "Bank saved");
        return 0;
      case "end-of-input":
        logger.info("End of input, exiting without saving");
        return 0;
      case "failed":
        return 1;
    }
  } catch (err) {
    logger.fatal({ err }, "Passbook failed");
    throw err;
  } finally {
    process.off("SIGINT", onSigint);
    rl.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Fatal:", err);
    process.exitCode = 1;
  });
