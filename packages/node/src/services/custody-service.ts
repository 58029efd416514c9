/**
 * CustodyService — one Custody instance over sandbox collaborators.
 *
 * Wires the custody coordinator to an in-process token bank and a
 * fixed-rate exchange, owns the record log, and offers the sandbox
 * operations (minting, caller approvals) the HTTP layer exposes.
 */

import {
  Custody,
  FixedRateExchange,
  InMemoryRecordLog,
  InMemoryTokenBank,
  normalizeAddress,
} from "@strongbox/custody";
import type { CustodyConfig, RecordHandler, RecordSubscription } from "@strongbox/custody";
import type { Address, CustodyRecord } from "@strongbox/types";
import { NATIVE_ASSET } from "@strongbox/types";
import type { SandboxRate } from "../config.js";

export interface CustodyServiceConfig {
  readonly custody: CustodyConfig;
  readonly exchange: Address;
  readonly rates: readonly SandboxRate[];

  /** Settlement currency the sandbox exchange starts with */
  readonly liquidity: bigint;

  /** Called when a record subscriber throws */
  readonly onRecordError?: ((error: unknown, record: CustodyRecord) => void) | undefined;
}

export class CustodyService {
  readonly custody: Custody;
  readonly records: InMemoryRecordLog;
  readonly bank: InMemoryTokenBank;
  readonly exchange: FixedRateExchange;

  constructor(config: CustodyServiceConfig) {
    this.bank = new InMemoryTokenBank();
    this.records = new InMemoryRecordLog({ onHandlerError: config.onRecordError });
    this.exchange = new FixedRateExchange({
      address: config.exchange,
      bank: this.bank,
      account: config.custody.custody,
      nativeWrapper: config.custody.nativeWrapper,
      now: config.custody.now,
    });
    for (const rate of config.rates) {
      this.exchange.setRate(rate.asset, rate.numerator, rate.denominator);
    }
    this.bank.mint(config.custody.settlement.address, config.exchange, config.liquidity);

    this.custody = new Custody({
      config: config.custody,
      exchange: this.exchange,
      transfers: this.bank,
      native: this.bank.nativeChannel(config.custody.custody),
      records: this.records,
    });
  }

  onRecord(handler: RecordHandler): RecordSubscription {
    return this.records.subscribe(handler);
  }

  // ─── Sandbox operations ──────────────────────────────────────────────

  /**
   * Credit `amount` of a token (or native value) to `to` in the bank.
   */
  mint(asset: string, to: string, amount: bigint): void {
    const recipient = normalizeAddress(to, "to");
    if (asset === NATIVE_ASSET) {
      this.bank.mintNative(recipient, amount);
      return;
    }
    this.bank.mint(normalizeAddress(asset, "asset"), recipient, amount);
  }

  /**
   * Let custody pull up to `amount` of `asset` from `owner`.
   */
  approve(owner: Address, asset: string, amount: bigint): void {
    this.bank.approve(normalizeAddress(asset, "asset"), owner, this.custody.config.custody, amount);
  }

  holdings(holder: Address): { readonly native: bigint; readonly settlement: bigint } {
    return {
      native: this.bank.nativeBalance(holder),
      settlement: this.bank.balance(this.custody.config.settlement.address, holder),
    };
  }
}
