/**
 * @strongbox/ledger — Core Ledger class.
 *
 * Single-currency custody ledger. Holds one balance per user, the
 * aggregate custodied value, and lifetime deposit/withdrawal counters.
 *
 * API surface:
 * - credit() — Add measured proceeds to a user (capacity-checked)
 * - debit() — Remove value from a user (ceiling- and balance-checked)
 * - begin() — Open a draft for staged mutations
 * - balanceOf() / totalCustodied / depositCount / withdrawalCount
 * - snapshot() — Serialize the entire ledger state
 * - fromSnapshot() — Restore ledger from a snapshot
 *
 * Invariants:
 * - totalCustodied == sum of all balances
 * - totalCustodied <= capacity
 * - counters only increase, once per committed credit/debit
 */

import type { Money } from "@strongbox/types";
import { LedgerDraft } from "./draft.js";
import { checkedAdd, checkedSub, parseBaseUnits, toMoney } from "./money-math.js";
import type {
  LedgerConfig,
  LedgerHolder,
  LedgerMutation,
  LedgerSnapshot,
} from "./types.js";
import { LedgerError } from "./types.js";

export class Ledger {
  readonly config: LedgerConfig;
  private readonly _balances = new Map<string, bigint>();
  private _total = 0n;
  private _deposits = 0;
  private _withdrawals = 0;
  private _revision = 0;

  constructor(config: LedgerConfig) {
    if (config.capacity <= 0n) {
      throw new LedgerError("INVALID_CONFIGURATION", "Capacity must be greater than zero", {
        reason: "capacity",
      });
    }
    if (config.withdrawalCeiling <= 0n) {
      throw new LedgerError("INVALID_CONFIGURATION", "Withdrawal ceiling must be greater than zero", {
        reason: "withdrawalCeiling",
      });
    }
    if (!Number.isInteger(config.decimals) || config.decimals < 0) {
      throw new LedgerError("INVALID_CONFIGURATION", `Invalid decimals: ${String(config.decimals)}`, {
        reason: "decimals",
      });
    }
    this.config = { ...config };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Committed balance of a user. Zero for unknown users.
   */
  balanceOf(user: string): bigint {
    return this._balances.get(user.toLowerCase()) ?? 0n;
  }

  get totalCustodied(): bigint {
    return this._total;
  }

  get capacity(): bigint {
    return this.config.capacity;
  }

  get withdrawalCeiling(): bigint {
    return this.config.withdrawalCeiling;
  }

  /** Remaining room under capacity. */
  get headroom(): bigint {
    return checkedSub(this.config.capacity, this._total);
  }

  get depositCount(): number {
    return this._deposits;
  }

  get withdrawalCount(): number {
    return this._withdrawals;
  }

  /** Incremented once per committed draft. */
  get revision(): number {
    return this._revision;
  }

  /**
   * All users with a recorded balance (including zero), in first-credit order.
   */
  holders(): readonly LedgerHolder[] {
    return [...this._balances].map(([user, balance]) => ({ user, balance }));
  }

  /**
   * Check that the aggregate total equals the sum of all balances.
   */
  isConserved(): boolean {
    let sum = 0n;
    for (const balance of this._balances.values()) {
      sum += balance;
    }
    return sum === this._total;
  }

  toMoney(units: bigint): Money {
    return toMoney(units, this.config.currency, this.config.decimals);
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Open a draft. Staged changes stay invisible until the draft commits.
   */
  begin(): LedgerDraft {
    return new LedgerDraft(this, (baseRevision, mutations) => {
      this._apply(baseRevision, mutations);
    });
  }

  /**
   * Credit a user with measured proceeds.
   */
  credit(user: string, amount: bigint): LedgerMutation {
    const draft = this.begin();
    const mutation = draft.credit(user, amount);
    draft.commit();
    return mutation;
  }

  /**
   * Debit a user.
   */
  debit(user: string, amount: bigint): LedgerMutation {
    const draft = this.begin();
    const mutation = draft.debit(user, amount);
    draft.commit();
    return mutation;
  }

  private _apply(baseRevision: number, mutations: readonly LedgerMutation[]): void {
    if (baseRevision !== this._revision) {
      throw new LedgerError(
        "CONCURRENT_MODIFICATION",
        `Draft opened at revision ${String(baseRevision)} but ledger is at ${String(this._revision)}`,
      );
    }
    if (mutations.length === 0) {
      return;
    }

    // Validation happened at staging time against this same revision,
    // so replaying the amounts cannot fail part-way.
    for (const m of mutations) {
      const current = this.balanceOf(m.user);
      if (m.kind === "credit") {
        this._balances.set(m.user, checkedAdd(current, m.amount));
        this._total = checkedAdd(this._total, m.amount);
        this._deposits += 1;
      } else {
        this._balances.set(m.user, checkedSub(current, m.amount));
        this._total = checkedSub(this._total, m.amount);
        this._withdrawals += 1;
      }
    }
    this._revision += 1;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Can be restored with Ledger.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      currency: this.config.currency,
      decimals: this.config.decimals,
      capacity: this.config.capacity.toString(),
      withdrawalCeiling: this.config.withdrawalCeiling.toString(),
      balances: this.holders().map((h) => ({ user: h.user, balance: h.balance.toString() })),
      totalCustodied: this._total.toString(),
      depositCount: this._deposits,
      withdrawalCount: this._withdrawals,
      revision: this._revision,
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Re-checks conservation and capacity before accepting it.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): Ledger {
    if (snapshot.version !== 1) {
      throw new LedgerError("INVALID_SNAPSHOT", `Unsupported snapshot version: ${String(snapshot.version)}`, {
        reason: "version",
      });
    }

    const ledger = new Ledger({
      currency: snapshot.currency,
      decimals: snapshot.decimals,
      capacity: parseBaseUnits(snapshot.capacity),
      withdrawalCeiling: parseBaseUnits(snapshot.withdrawalCeiling),
    });

    let sum = 0n;
    for (const { user, balance } of snapshot.balances) {
      const key = user.toLowerCase();
      if (ledger._balances.has(key)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Duplicate balance entry for ${key}`, {
          reason: "duplicate",
        });
      }
      const units = parseBaseUnits(balance);
      ledger._balances.set(key, units);
      sum += units;
    }

    const total = parseBaseUnits(snapshot.totalCustodied);
    if (sum !== total) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Balances sum to ${sum.toString()} but total is ${total.toString()}`,
        { reason: "conservation" },
      );
    }
    if (total > ledger.config.capacity) {
      throw new LedgerError("INVALID_SNAPSHOT", "Total exceeds capacity", { reason: "capacity" });
    }
    for (const count of [snapshot.depositCount, snapshot.withdrawalCount, snapshot.revision]) {
      if (!Number.isInteger(count) || count < 0) {
        throw new LedgerError("INVALID_SNAPSHOT", `Invalid counter: ${String(count)}`, {
          reason: "counter",
        });
      }
    }

    ledger._total = total;
    ledger._deposits = snapshot.depositCount;
    ledger._withdrawals = snapshot.withdrawalCount;
    ledger._revision = snapshot.revision;
    return ledger;
  }
}
