/**
 * Custody — coordinator over one ledger.
 *
 * Composes the ledger, the reentrancy lock, the deposit pipeline and the
 * withdrawal gate. Mutating calls share the lock; queries never take it
 * and only see committed state.
 *
 * Usage:
 *   const custody = new Custody({ config, exchange, transfers, native });
 *   await custody.depositNative(user, 10n ** 18n);
 *   await custody.withdraw(user, 500_000_000n);
 */

import { Ledger } from "@strongbox/ledger";
import type { LedgerSnapshot } from "@strongbox/ledger";
import type { DepositRecord, Money, WithdrawalRecord } from "@strongbox/types";
import { normalizeAddress, resolveCustodyConfig } from "./config.js";
import type { CustodyContext } from "./context.js";
import { DepositPipeline } from "./deposit-pipeline.js";
import { ReentrancyLock } from "./lock.js";
import type {
  AssetTransferProtocol,
  ExchangeAdapter,
  NativeValueChannel,
  RecordSink,
} from "./ports.js";
import { InMemoryRecordLog } from "./records.js";
import type { CustodyConfig, ResolvedCustodyConfig, SolvencyReport } from "./types.js";
import { CustodyError } from "./types.js";
import { WithdrawalGate } from "./withdrawal-gate.js";

export interface CustodyOptions {
  readonly config: CustodyConfig;
  readonly exchange: ExchangeAdapter;
  readonly transfers: AssetTransferProtocol;
  readonly native: NativeValueChannel;

  /** Where committed records go. Default: a fresh InMemoryRecordLog */
  readonly records?: RecordSink | undefined;

  /** Resume from a snapshot instead of an empty ledger */
  readonly snapshot?: LedgerSnapshot | undefined;
}

export class Custody {
  readonly config: ResolvedCustodyConfig;
  readonly records: RecordSink;
  private readonly ledger: Ledger;
  private readonly lock = new ReentrancyLock();
  private readonly pipeline: DepositPipeline;
  private readonly gate: WithdrawalGate;
  private readonly transfers: AssetTransferProtocol;

  constructor(options: CustodyOptions) {
    this.config = resolveCustodyConfig(options.config, options.exchange.address);
    this.records = options.records ?? new InMemoryRecordLog();
    this.transfers = options.transfers;
    this.ledger = options.snapshot
      ? this.restore(options.snapshot)
      : new Ledger({
          currency: this.config.settlement.symbol,
          decimals: this.config.settlement.decimals,
          capacity: this.config.capacity,
          withdrawalCeiling: this.config.withdrawalCeiling,
        });

    const ctx: CustodyContext = {
      config: this.config,
      ledger: this.ledger,
      lock: this.lock,
      exchange: options.exchange,
      transfers: options.transfers,
      native: options.native,
      records: this.records,
    };
    this.pipeline = new DepositPipeline(ctx);
    this.gate = new WithdrawalGate(ctx);
  }

  // ─── Mutating ────────────────────────────────────────────────────────

  depositNative(caller: string, value: bigint, minProceeds?: bigint): Promise<DepositRecord> {
    return this.pipeline.depositNative(caller, value, minProceeds);
  }

  depositAsset(
    caller: string,
    asset: string,
    amount: bigint,
    minProceeds?: bigint,
  ): Promise<DepositRecord> {
    return this.pipeline.depositAsset(caller, asset, amount, minProceeds);
  }

  withdraw(caller: string, amount: bigint): Promise<WithdrawalRecord> {
    return this.gate.withdraw(caller, amount);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get busy(): boolean {
    return this.lock.held;
  }

  balanceOf(user: string): bigint {
    return this.ledger.balanceOf(normalizeAddress(user, "user"));
  }

  /**
   * Aggregate custodied value. Owner only.
   */
  totalCustodied(requester: string): bigint {
    if (normalizeAddress(requester, "requester") !== this.config.owner) {
      throw new CustodyError("UNAUTHORIZED", "Only the owner may read the custodied total", {
        requester,
      });
    }
    return this.ledger.totalCustodied;
  }

  get depositCount(): number {
    return this.ledger.depositCount;
  }

  get withdrawalCount(): number {
    return this.ledger.withdrawalCount;
  }

  get capacity(): bigint {
    return this.ledger.capacity;
  }

  get withdrawalCeiling(): bigint {
    return this.ledger.withdrawalCeiling;
  }

  get headroom(): bigint {
    return this.ledger.headroom;
  }

  toMoney(units: bigint): Money {
    return this.ledger.toMoney(units);
  }

  snapshot(): LedgerSnapshot {
    return this.ledger.snapshot();
  }

  /**
   * Compare settlement currency held by custody with what the ledger owes.
   */
  async verifySolvency(): Promise<SolvencyReport> {
    const owed = this.ledger.totalCustodied;
    const held = await this.transfers.balanceOf(this.config.settlement.address, this.config.custody);
    return {
      held,
      owed,
      surplus: held > owed ? held - owed : 0n,
      shortfall: owed > held ? owed - held : 0n,
      solvent: held >= owed,
    };
  }

  private restore(snapshot: LedgerSnapshot): Ledger {
    const ledger = Ledger.fromSnapshot(snapshot);
    if (
      ledger.capacity !== this.config.capacity ||
      ledger.withdrawalCeiling !== this.config.withdrawalCeiling ||
      ledger.config.decimals !== this.config.settlement.decimals
    ) {
      throw CustodyError.invalidConfiguration("snapshot", "Snapshot limits do not match the custody configuration");
    }
    return ledger;
  }
}
