/**
 * In-process token ledger standing in for a chain.
 *
 * Holds fungible token balances, allowances and native balances, and
 * implements both AssetTransferProtocol and (per holder) NativeValueChannel.
 * Used by tests, the demo and the node sandbox.
 */

import type { Address } from "@strongbox/types";
import type { AssetTransferProtocol, NativeValueChannel } from "../ports.js";

export type BankOperation = "pull" | "authorize" | "transfer" | "collect" | "release";

/** How an injected failure shows up: a `false` result or a rejection. */
export type FailureMode = "reject" | "return-false";

const NATIVE_KEY = "native";

type Key = Address | typeof NATIVE_KEY;

export class InMemoryTokenBank implements AssetTransferProtocol {
  private readonly balances = new Map<Key, Map<Address, bigint>>();
  private readonly allowances = new Map<string, bigint>();
  private readonly failures = new Map<BankOperation, FailureMode[]>();

  // ─── Setup & inspection ──────────────────────────────────────────────

  mint(asset: Address, to: Address, amount: bigint): void {
    this.credit(lower(asset), lower(to), amount);
  }

  mintNative(to: Address, amount: bigint): void {
    this.credit(NATIVE_KEY, lower(to), amount);
  }

  balance(asset: Address, holder: Address): bigint {
    return this.read(lower(asset), lower(holder));
  }

  nativeBalance(holder: Address): bigint {
    return this.read(NATIVE_KEY, lower(holder));
  }

  allowance(asset: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(asset, owner, spender)) ?? 0n;
  }

  /** Grant an allowance directly, as the owner would on chain. */
  approve(asset: Address, owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(asset, owner, spender), amount);
  }

  /**
   * Make the next call to `operation` fail. Queued failures are consumed
   * in order, one per call.
   */
  failNext(operation: BankOperation, mode: FailureMode = "return-false"): void {
    const queue = this.failures.get(operation) ?? [];
    queue.push(mode);
    this.failures.set(operation, queue);
  }

  // ─── AssetTransferProtocol ───────────────────────────────────────────

  async pull(asset: Address, from: Address, to: Address, amount: bigint): Promise<boolean> {
    if (this.injected("pull")) return false;
    return this.spend(asset, to, from, to, amount);
  }

  async authorize(asset: Address, owner: Address, spender: Address, amount: bigint): Promise<boolean> {
    if (this.injected("authorize")) return false;
    this.approve(asset, owner, spender, amount);
    return true;
  }

  async transfer(asset: Address, from: Address, to: Address, amount: bigint): Promise<boolean> {
    if (this.injected("transfer")) return false;
    return this.move(lower(asset), lower(from), lower(to), amount);
  }

  async balanceOf(asset: Address, holder: Address): Promise<bigint> {
    return this.balance(asset, holder);
  }

  /**
   * Move `amount` from `from` to `to`, consuming the allowance `from`
   * granted `spender`. Returns false without side effects when either
   * the allowance or the balance is short.
   */
  spend(asset: Address, spender: Address, from: Address, to: Address, amount: bigint): boolean {
    const key = allowanceKey(asset, from, spender);
    const allowed = this.allowances.get(key) ?? 0n;
    if (allowed < amount || this.balance(asset, from) < amount) {
      return false;
    }
    this.allowances.set(key, allowed - amount);
    return this.move(lower(asset), lower(from), lower(to), amount);
  }

  // ─── Native value ────────────────────────────────────────────────────

  /** Native value channel bound to `holder` (the custody account). */
  nativeChannel(holder: Address): NativeValueChannel {
    const account = lower(holder);
    return {
      collect: async (from, amount) => {
        if (this.injected("collect")) return false;
        return this.move(NATIVE_KEY, lower(from), account, amount);
      },
      release: async (to, amount) => {
        if (this.injected("release")) return false;
        return this.move(NATIVE_KEY, account, lower(to), amount);
      },
    };
  }

  /** Direct token move, bypassing injected failures. */
  send(asset: Address, from: Address, to: Address, amount: bigint): boolean {
    return this.move(lower(asset), lower(from), lower(to), amount);
  }

  moveNative(from: Address, to: Address, amount: bigint): boolean {
    return this.move(NATIVE_KEY, lower(from), lower(to), amount);
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private injected(operation: BankOperation): boolean {
    const mode = this.failures.get(operation)?.shift();
    if (mode === "reject") {
      throw new Error(`Injected ${operation} failure`);
    }
    return mode === "return-false";
  }

  private move(asset: Key, from: Address, to: Address, amount: bigint): boolean {
    if (amount < 0n || this.read(asset, from) < amount) {
      return false;
    }
    this.debit(asset, from, amount);
    this.credit(asset, to, amount);
    return true;
  }

  private read(asset: Key, holder: Address): bigint {
    return this.balances.get(asset)?.get(holder) ?? 0n;
  }

  private credit(asset: Key, holder: Address, amount: bigint): void {
    const book = this.balances.get(asset) ?? new Map<Address, bigint>();
    book.set(holder, (book.get(holder) ?? 0n) + amount);
    this.balances.set(asset, book);
  }

  private debit(asset: Key, holder: Address, amount: bigint): void {
    const book = this.balances.get(asset) ?? new Map<Address, bigint>();
    book.set(holder, (book.get(holder) ?? 0n) - amount);
    this.balances.set(asset, book);
  }
}

function lower(address: Address): Address {
  return `0x${address.slice(2).toLowerCase()}`;
}

function allowanceKey(asset: Address, owner: Address, spender: Address): string {
  return `${lower(asset)}:${lower(owner)}:${lower(spender)}`;
}
