/**
 * @strongbox/ledger — Staged ledger mutations.
 *
 * A draft validates credits and debits against the committed ledger plus
 * its own earlier staged changes. Nothing is observable through the ledger
 * until commit(). A draft opened at one revision cannot commit once the
 * ledger has moved on.
 */

import { assertPositive, checkedAdd, checkedSub } from "./money-math.js";
import type { DraftState, LedgerMutation } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Read access the draft needs from the committed ledger.
 */
export interface LedgerView {
  readonly revision: number;
  readonly totalCustodied: bigint;
  readonly capacity: bigint;
  readonly withdrawalCeiling: bigint;
  balanceOf(user: string): bigint;
}

export type DraftCommitter = (
  baseRevision: number,
  mutations: readonly LedgerMutation[],
) => void;

export class LedgerDraft {
  private readonly _view: LedgerView;
  private readonly _commit: DraftCommitter;
  private readonly _baseRevision: number;
  private readonly _balances = new Map<string, bigint>();
  private readonly _mutations: LedgerMutation[] = [];
  private _total: bigint;
  private _state: DraftState = "open";

  constructor(view: LedgerView, commit: DraftCommitter) {
    this._view = view;
    this._commit = commit;
    this._baseRevision = view.revision;
    this._total = view.totalCustodied;
  }

  get state(): DraftState {
    return this._state;
  }

  get baseRevision(): number {
    return this._baseRevision;
  }

  get mutations(): readonly LedgerMutation[] {
    return [...this._mutations];
  }

  /** Aggregate total including staged changes. */
  get totalCustodied(): bigint {
    return this._total;
  }

  /** Balance including staged changes. */
  balanceOf(user: string): bigint {
    const key = user.toLowerCase();
    return this._balances.get(key) ?? this._view.balanceOf(key);
  }

  /**
   * Stage a credit. `amount` is the measured proceeds being credited.
   */
  credit(user: string, amount: bigint): LedgerMutation {
    this._assertOpen();
    assertPositive(amount);

    const limit = this._view.capacity;
    if (checkedAdd(this._total, amount) > limit) {
      throw LedgerError.capacityExceeded(this._total, amount, limit);
    }

    const key = user.toLowerCase();
    const balanceAfter = checkedAdd(this.balanceOf(key), amount);
    this._total = checkedAdd(this._total, amount);
    return this._stage({ kind: "credit", user: key, amount, balanceAfter, totalAfter: this._total });
  }

  /**
   * Stage a debit. Ceiling is checked before balance.
   */
  debit(user: string, amount: bigint): LedgerMutation {
    this._assertOpen();
    assertPositive(amount);

    const ceiling = this._view.withdrawalCeiling;
    if (amount > ceiling) {
      throw LedgerError.withdrawalCeilingExceeded(ceiling, amount);
    }

    const key = user.toLowerCase();
    const available = this.balanceOf(key);
    if (amount > available) {
      throw LedgerError.insufficientBalance(available, amount);
    }

    const balanceAfter = checkedSub(available, amount);
    this._total = checkedSub(this._total, amount);
    return this._stage({ kind: "debit", user: key, amount, balanceAfter, totalAfter: this._total });
  }

  /**
   * Make all staged mutations observable, atomically.
   */
  commit(): readonly LedgerMutation[] {
    this._assertOpen();
    this._commit(this._baseRevision, this._mutations);
    this._state = "committed";
    return this.mutations;
  }

  /**
   * Drop all staged mutations.
   */
  discard(): void {
    this._assertOpen();
    this._state = "discarded";
  }

  private _stage(mutation: LedgerMutation): LedgerMutation {
    this._balances.set(mutation.user, mutation.balanceAfter);
    this._mutations.push(mutation);
    return mutation;
  }

  private _assertOpen(): void {
    if (this._state !== "open") {
      throw new LedgerError("DRAFT_CLOSED", `Draft is already ${this._state}`);
    }
  }
}
