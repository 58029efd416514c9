/**
 * @strongbox/ledger — Internal types for the custody ledger.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are unsigned bigint base units
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Currency } from "@strongbox/types";

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Immutable parameters fixed when the ledger is created.
 */
export interface LedgerConfig {
  /** Settlement currency symbol (e.g. "USDC") */
  readonly currency: Currency;

  /** Decimal places of the settlement currency */
  readonly decimals: number;

  /** Maximum aggregate custodied value, in base units. Must be > 0. */
  readonly capacity: bigint;

  /** Maximum amount withdrawable in a single call, in base units. Must be > 0. */
  readonly withdrawalCeiling: bigint;
}

// ─── Mutations ───────────────────────────────────────────────────────────

/**
 * A single staged or committed change to one user's balance.
 */
export interface LedgerMutation {
  readonly kind: "credit" | "debit";
  readonly user: string;
  readonly amount: bigint;
  readonly balanceAfter: bigint;
  readonly totalAfter: bigint;
}

export type DraftState = "open" | "committed" | "discarded";

/**
 * One user's balance.
 */
export interface LedgerHolder {
  readonly user: string;
  readonly balance: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ZERO_AMOUNT"
  | "CAPACITY_EXCEEDED"
  | "INSUFFICIENT_BALANCE"
  | "WITHDRAWAL_CEILING_EXCEEDED"
  | "INVALID_CONFIGURATION"
  | "INVALID_AMOUNT"
  | "ARITHMETIC_UNDERFLOW"
  | "DRAFT_CLOSED"
  | "CONCURRENT_MODIFICATION"
  | "INVALID_SNAPSHOT";

export type LedgerErrorDetails = Readonly<Record<string, bigint | string | number>>;

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: LedgerErrorDetails;

  constructor(code: LedgerErrorCode, message: string, details: LedgerErrorDetails = {}) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }

  static capacityExceeded(currentTotal: bigint, proceeds: bigint, limit: bigint): LedgerError {
    return new LedgerError(
      "CAPACITY_EXCEEDED",
      `Crediting ${proceeds.toString()} on top of ${currentTotal.toString()} would exceed capacity ${limit.toString()}`,
      { currentTotal, proceeds, limit },
    );
  }

  static insufficientBalance(available: bigint, requested: bigint): LedgerError {
    return new LedgerError(
      "INSUFFICIENT_BALANCE",
      `Requested ${requested.toString()} but only ${available.toString()} is available`,
      { available, requested },
    );
  }

  static withdrawalCeilingExceeded(ceiling: bigint, requested: bigint): LedgerError {
    return new LedgerError(
      "WITHDRAWAL_CEILING_EXCEEDED",
      `Requested ${requested.toString()} exceeds the per-call withdrawal ceiling ${ceiling.toString()}`,
      { ceiling, requested },
    );
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the entire ledger state.
 * Amounts are decimal strings of base units.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly currency: Currency;
  readonly decimals: number;
  readonly capacity: string;
  readonly withdrawalCeiling: string;
  readonly balances: readonly { readonly user: string; readonly balance: string }[];
  readonly totalCustodied: string;
  readonly depositCount: number;
  readonly withdrawalCount: number;
  readonly revision: number;
  readonly createdAt: string;
}
