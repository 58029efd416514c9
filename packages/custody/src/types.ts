/**
 * @strongbox/custody domain types.
 *
 * Custody converts deposits into one settlement currency and credits
 * the depositor's ledger balance:
 * - Native deposits are converted through the exchange and refunded on failure
 * - Token deposits are pulled, converted (unless already settlement) and credited
 * - Withdrawals release settlement currency against the ledger balance
 */

import type { Address, AssetId, TokenFailurePolicy } from "@strongbox/types";

// =============================================================================
// Configuration
// =============================================================================

export interface SettlementCurrency {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;
}

export interface CustodyConfig {
  /** Address custody holds funds under; recipient of every conversion */
  readonly custody: Address;

  /** Only address allowed to read the aggregate custodied value */
  readonly owner: Address;

  readonly settlement: SettlementCurrency;

  /** Wrapped form of the native token, first hop of native conversions */
  readonly nativeWrapper: Address;

  /** Maximum aggregate custodied value, in settlement base units */
  readonly capacity: bigint;

  /** Maximum amount withdrawable per call, in settlement base units */
  readonly withdrawalCeiling: bigint;

  /** Seconds added to the current time for the exchange deadline. Default: 300 */
  readonly deadlineWindowSeconds?: number | undefined;

  /** What to do with pulled tokens when their conversion fails. Default: "retain" */
  readonly tokenFailurePolicy?: TokenFailurePolicy | undefined;

  /** Clock in milliseconds. Default: Date.now */
  readonly now?: (() => number) | undefined;
}

/**
 * Configuration after validation: addresses lowercased, defaults applied.
 */
export interface ResolvedCustodyConfig {
  readonly custody: Address;
  readonly owner: Address;
  readonly settlement: SettlementCurrency;
  readonly nativeWrapper: Address;
  readonly exchange: Address;
  readonly capacity: bigint;
  readonly withdrawalCeiling: bigint;
  readonly deadlineWindowSeconds: number;
  readonly tokenFailurePolicy: TokenFailurePolicy;
  readonly now: () => number;
}

// =============================================================================
// Solvency
// =============================================================================

export interface SolvencyReport {
  /** Settlement currency custody actually holds */
  readonly held: bigint;

  /** Sum of all user balances */
  readonly owed: bigint;

  /** held − owed when held ≥ owed, else 0 */
  readonly surplus: bigint;

  /** owed − held when owed > held, else 0 */
  readonly shortfall: bigint;

  readonly solvent: boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type CustodyErrorCode =
  | "ZERO_AMOUNT"
  | "ZERO_PROCEEDS"
  | "TRANSFER_FAILED"
  | "EXCHANGE_FAILED"
  | "REENTRANT_CALL"
  | "INVALID_CONFIGURATION"
  | "INVALID_ADDRESS"
  | "UNAUTHORIZED";

export type CustodyErrorDetails = Readonly<Record<string, bigint | string | number>>;

export class CustodyError extends Error {
  public readonly code: CustodyErrorCode;
  public readonly details: CustodyErrorDetails;

  constructor(
    code: CustodyErrorCode,
    message: string,
    details: CustodyErrorDetails = {},
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CustodyError";
    this.code = code;
    this.details = details;
  }

  static transferFailed(asset: AssetId, cause?: unknown): CustodyError {
    return new CustodyError("TRANSFER_FAILED", `Transfer of ${asset} failed`, { asset }, cause);
  }

  static invalidConfiguration(reason: string, message: string): CustodyError {
    return new CustodyError("INVALID_CONFIGURATION", message, { reason });
  }
}
