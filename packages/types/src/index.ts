/**
 * @strongbox/types — Shared domain types for the Strongbox stack.
 *
 * These types are used across all Strongbox packages:
 * - Financial primitives (Money, base units)
 * - Custody identities (Address, AssetId)
 * - Deposit and withdrawal records
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Money,
  Currency,
  BaseUnits,
} from "./financial.js";

// Custody types
export type {
  Address,
  AssetId,
  NativeAsset,
  TokenFailurePolicy,
  DepositRecord,
  WithdrawalRecord,
  CustodyRecord,
  CustodyRecordKind,
} from "./custody.js";

export { NATIVE_ASSET } from "./custody.js";

// Runtime type guards
export { isAssetId, isTokenFailurePolicy } from "./guards.js";
