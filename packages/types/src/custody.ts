/**
 * Custody Types
 *
 * Identities and records of the custody ledger.
 *
 * Rules:
 * - Addresses are 20-byte hex strings, compared case-insensitively
 * - The native value-token has no address and is marked with NATIVE_ASSET
 * - Records are immutable once emitted
 */

import type { BaseUnits } from "./financial.js";

/**
 * A 20-byte account or contract address ("0x" + 40 hex chars).
 */
export type Address = `0x${string}`;

/** Marker for the chain's native value-token in records and errors. */
export const NATIVE_ASSET = "native" as const;

export type NativeAsset = typeof NATIVE_ASSET;

/**
 * An asset custody can receive: a fungible token contract or the native token.
 */
export type AssetId = Address | NativeAsset;

/**
 * What custody does with pulled-in tokens when their conversion fails.
 *
 * - "retain": tokens stay in custody, uncredited
 * - "refund": tokens are sent back to the depositor
 */
export type TokenFailurePolicy = "retain" | "refund";

interface RecordBase {
  /** Position in the record log (1-based, monotonically increasing) */
  readonly sequence: number;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  readonly user: Address;
}

/**
 * Emitted once per successful deposit.
 */
export interface DepositRecord extends RecordBase {
  readonly kind: "deposit";

  /** Asset the user brought in */
  readonly asset: AssetId;

  /** Amount of `asset` the user brought in */
  readonly amountIn: BaseUnits;

  /** Settlement currency credited, as measured */
  readonly proceeds: BaseUnits;
}

/**
 * Emitted once per successful withdrawal.
 */
export interface WithdrawalRecord extends RecordBase {
  readonly kind: "withdrawal";

  /** Settlement currency released to the user */
  readonly amount: BaseUnits;
}

export type CustodyRecord = DepositRecord | WithdrawalRecord;

export type CustodyRecordKind = CustodyRecord["kind"];
