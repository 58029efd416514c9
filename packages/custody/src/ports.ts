/**
 * Collaborators custody depends on. Each one is an external call:
 * the reentrancy lock is held across all of them.
 */

import type { Address, AssetId, CustodyRecord } from "@strongbox/types";

// ─── Exchange ────────────────────────────────────────────────────────────

export interface ConversionRequest {
  readonly amountIn: bigint;
  readonly minAmountOut: bigint;

  /** Input asset first, settlement currency last */
  readonly path: readonly Address[];

  readonly recipient: Address;

  /** Unix seconds after which the conversion must not execute */
  readonly deadline: bigint;

  /** Native value sent along with the request (native conversions only) */
  readonly value?: bigint | undefined;
}

/**
 * Swaps an exact input for at least `minAmountOut` of the last asset in
 * the path. The reported output is informational; custody measures what
 * actually arrived.
 */
export interface ExchangeAdapter {
  readonly address: Address;
  convertExactInput(request: ConversionRequest): Promise<bigint>;
}

// ─── Assets ──────────────────────────────────────────────────────────────

/**
 * Fungible token movement. Boolean results report success; a rejected
 * promise is treated the same as `false`.
 */
export interface AssetTransferProtocol {
  /** Move `amount` from `from` to `to` using the allowance `from` granted `to`. */
  pull(asset: Address, from: Address, to: Address, amount: bigint): Promise<boolean>;

  /** Set the allowance `owner` grants `spender` to exactly `amount`. */
  authorize(asset: Address, owner: Address, spender: Address, amount: bigint): Promise<boolean>;

  transfer(asset: Address, from: Address, to: Address, amount: bigint): Promise<boolean>;

  balanceOf(asset: Address, holder: Address): Promise<bigint>;
}

/**
 * Native value bound to the custody account.
 */
export interface NativeValueChannel {
  /** Take `amount` of native value from the caller into custody. */
  collect(from: Address, amount: bigint): Promise<boolean>;

  /** Send `amount` of native value from custody to `to`. */
  release(to: Address, amount: bigint): Promise<boolean>;
}

// ─── Records ─────────────────────────────────────────────────────────────

/**
 * Receives each record after its operation has committed. `emit` must not
 * throw: the operation has already taken effect.
 */
export interface RecordSink {
  emit(record: CustodyRecord): void;
}
