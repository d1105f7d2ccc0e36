/**
 * @passbook/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Policy variables are optional; anything unset keeps its default.
 */

import { z } from "zod";
import { isDecimalString } from "@passbook/types";
import { DEFAULT_POLICY_CONFIG } from "@passbook/ledger";
import type { PolicyConfig } from "@passbook/ledger";

// =============================================================================
// Schema
// =============================================================================

const decimalString = z
  .string()
  .trim()
  .refine(isDecimalString, { message: "Expected a decimal number such as 0.0033" });

export const ConfigSchema = z.object({
  BANK_FILE: z.string().min(1).default("bank.json"),
  LOG_FILE: z.string().min(1).default("passbook.log"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // Unset means: colour when stdout is a terminal
  PASSBOOK_COLOR: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),

  // Savings policy
  SAVINGS_INTEREST_RATE: decimalString.optional(),
  SAVINGS_DAILY_LIMIT: z.coerce.number().int().min(1).optional(),
  SAVINGS_MONTHLY_LIMIT: z.coerce.number().int().min(1).optional(),

  // Checking policy
  CHECKING_INTEREST_RATE: decimalString.optional(),
  CHECKING_FEE_THRESHOLD: decimalString.optional(),
  CHECKING_LOW_BALANCE_FEE: decimalString.optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Overlay the configured policy values on the defaults.
 */
export function toPolicyConfig(config: AppConfig): PolicyConfig {
  const { savings, checking } = DEFAULT_POLICY_CONFIG;
  return {
    savings: {
      interestRate: config.SAVINGS_INTEREST_RATE ?? savings.interestRate,
      dailyLimit: config.SAVINGS_DAILY_LIMIT ?? savings.dailyLimit,
      monthlyLimit: config.SAVINGS_MONTHLY_LIMIT ?? savings.monthlyLimit,
    },
    checking: {
      interestRate: config.CHECKING_INTEREST_RATE ?? checking.interestRate,
      lowBalanceThreshold: config.CHECKING_FEE_THRESHOLD ?? checking.lowBalanceThreshold,
      lowBalanceFee: config.CHECKING_LOW_BALANCE_FEE ?? checking.lowBalanceFee,
    },
  };
}
