/**
 * @passbook/ledger — Exact decimal arithmetic.
 *
 * A decimal is a bigint of units plus a scale (digits after the point):
 * "-50.25" → { units: -5025n, scale: 2 }.
 *
 * Rules:
 * - No floating-point operations
 * - Operands are aligned to the larger scale before add/compare
 * - Multiplication is exact; scales add
 * - Rounding happens only for display
 */

import { LedgerError } from "./types.js";

export interface Decimal {
  readonly units: bigint;
  readonly scale: number;
}

export const ZERO: Decimal = { units: 0n, scale: 0 };

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Internal Helpers ────────────────────────────────────────────────────

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

function rescale(value: Decimal, scale: number): bigint {
  return value.units * pow10(scale - value.scale);
}

// ─── Conversion ──────────────────────────────────────────────────────────

/**
 * Parse a decimal string.
 *
 * "100.50" → { units: 10050n, scale: 2 }
 * "-5.75"  → { units: -575n, scale: 2 }
 * "7"      → { units: 7n, scale: 0 }
 */
export function parseDecimal(text: string): Decimal {
  const trimmed = text.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");
  const units = BigInt(intPart + fracPart);

  return { units: negative ? -units : units, scale: fracPart.length };
}

/**
 * Exact text form, keeping every stored fraction digit.
 *
 * { units: 4n, scale: 2 }    → "0.04"
 * { units: -575n, scale: 2 } → "-5.75"
 */
export function toDecimalString(value: Decimal): string {
  if (value.scale === 0) {
    return value.units.toString();
  }

  const negative = value.units < 0n;
  const abs = negative ? -value.units : value.units;
  const str = abs.toString().padStart(value.scale + 1, "0");
  const intPart = str.slice(0, str.length - value.scale);
  const fracPart = str.slice(str.length - value.scale);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Drop trailing fraction zeros: "0.040000" → "0.04", "5.00" → "5".
 */
export function normalizeDecimal(value: Decimal): Decimal {
  let { units, scale } = value;
  while (scale > 0 && units % 10n === 0n) {
    units /= 10n;
    scale--;
  }
  return { units, scale };
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function addDecimal(a: Decimal, b: Decimal): Decimal {
  const scale = Math.max(a.scale, b.scale);
  return { units: rescale(a, scale) + rescale(b, scale), scale };
}

export function multiplyDecimal(a: Decimal, b: Decimal): Decimal {
  return normalizeDecimal({ units: a.units * b.units, scale: a.scale + b.scale });
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = addDecimal(total, value);
  }
  return total;
}

/**
 * Compare two decimals. Returns -1, 0, or 1.
 */
export function compareDecimal(a: Decimal, b: Decimal): -1 | 0 | 1 {
  const scale = Math.max(a.scale, b.scale);
  const va = rescale(a, scale);
  const vb = rescale(b, scale);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function isNegativeDecimal(value: Decimal): boolean {
  return value.units < 0n;
}

// ─── Display ─────────────────────────────────────────────────────────────

/**
 * Round to a fixed number of fraction digits, half away from zero.
 *
 * 0.125 → 0.13, -0.125 → -0.13, 0.124 → 0.12
 */
export function roundDecimal(value: Decimal, places: number): Decimal {
  if (value.scale <= places) {
    return { units: rescale(value, places), scale: places };
  }

  const divisor = pow10(value.scale - places);
  const negative = value.units < 0n;
  const abs = negative ? -value.units : value.units;
  let quotient = abs / divisor;
  if ((abs % divisor) * 2n >= divisor) {
    quotient += 1n;
  }

  return { units: negative ? -quotient : quotient, scale: places };
}

/**
 * Currency text: thousands separators and exactly two fraction digits.
 *
 * 1234.5 → "1,234.50", -5.75 → "-5.75", -0.0038 → "-0.00"
 *
 * The sign comes from the unrounded value.
 */
export function formatCurrency(value: Decimal): string {
  const negative = value.units < 0n;
  const text = toDecimalString(roundDecimal(value, 2));
  const abs = text.startsWith("-") ? text.slice(1) : text;
  const [intPart = "0", fracPart = "00"] = abs.split(".");
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ",");

  return `${negative ? "-" : ""}${grouped}.${fracPart}`;
}
