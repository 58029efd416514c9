/**
 * @strongbox/ledger — Deterministic unsigned monetary arithmetic.
 *
 * All arithmetic uses bigint base units. Decimal strings are converted
 * to/from base units via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - No negative amounts: subtraction below zero throws instead of wrapping
 * - Amounts must be valid decimal strings
 * - Zero runtime dependencies
 */

import type { Money } from "@strongbox/types";
import { LedgerError } from "./types.js";

// ─── Parsing & Formatting ────────────────────────────────────────────────

/**
 * Parse a decimal string amount into base units.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  // Unsigned: digits, optional decimal point + digits
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const parts = trimmed.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Parse an integer string of base units ("2000000000" → 2000000000n).
 */
export function parseBaseUnits(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Base units must be a non-negative integer string, got: "${value}"`);
  }
  return BigInt(value);
}

/**
 * Convert base units back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 */
export function formatAmount(units: bigint, decimals: number): string {
  assertUnsigned(units);
  if (decimals === 0) {
    return units.toString();
  }

  const str = units.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}

/**
 * Render base units as a Money value.
 */
export function toMoney(units: bigint, currency: string, decimals: number): Money {
  return {
    amount: formatAmount(units, decimals),
    currency,
    decimals,
  };
}

// ─── Checked Arithmetic ──────────────────────────────────────────────────

/**
 * Throw unless `value` is a non-negative bigint.
 */
export function assertUnsigned(value: bigint): void {
  if (value < 0n) {
    throw new LedgerError("ARITHMETIC_UNDERFLOW", `Negative amount: ${value.toString()}`);
  }
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  assertUnsigned(a);
  assertUnsigned(b);
  return a + b;
}

/**
 * Subtract b from a. Throws rather than produce a negative result.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  assertUnsigned(a);
  assertUnsigned(b);
  if (b > a) {
    throw new LedgerError(
      "ARITHMETIC_UNDERFLOW",
      `Cannot subtract ${b.toString()} from ${a.toString()}`,
    );
  }
  return a - b;
}

/**
 * Throw ZERO_AMOUNT unless `amount` is strictly positive.
 */
export function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new LedgerError("ZERO_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
  }
}
