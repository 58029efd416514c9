/**
 * Single-entry guard held across every external call custody makes.
 *
 * The lock is taken synchronously when run() is called, so a nested
 * call issued from inside an exchange or transfer callback is refused
 * before it can touch the ledger.
 */

import { CustodyError } from "./types.js";

export class ReentrancyLock {
  private _held = false;

  get held(): boolean {
    return this._held;
  }

  run<T>(operation: string, body: () => Promise<T>): Promise<T> {
    if (this._held) {
      return Promise.reject(
        new CustodyError("REENTRANT_CALL", `Reentrant call to ${operation} refused`, { operation }),
      );
    }
    this._held = true;

    let pending: Promise<T>;
    try {
      pending = body();
    } catch (error) {
      this._held = false;
      return Promise.reject(error);
    }
    return pending.finally(() => {
      this._held = false;
    });
  }
}
