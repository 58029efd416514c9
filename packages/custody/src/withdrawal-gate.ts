/**
 * WithdrawalGate — releases settlement currency against a ledger balance.
 *
 * The debit is staged before the transfer and committed only once the
 * transfer succeeded, so a failed release leaves no observable decrement.
 */

import { LedgerError } from "@strongbox/ledger";
import type { WithdrawalRecord } from "@strongbox/types";
import { normalizeAddress } from "./config.js";
import type { CustodyContext } from "./context.js";
import { release, requirePositive, timestamp } from "./context.js";

export class WithdrawalGate {
  constructor(private readonly ctx: CustodyContext) {}

  withdraw(caller: string, amount: bigint): Promise<WithdrawalRecord> {
    return this.ctx.lock.run("withdraw", async () => {
      const user = normalizeAddress(caller, "caller");
      requirePositive(amount, "amount");

      const { ledger } = this.ctx;
      if (amount > ledger.withdrawalCeiling) {
        throw LedgerError.withdrawalCeilingExceeded(ledger.withdrawalCeiling, amount);
      }
      const available = ledger.balanceOf(user);
      if (amount > available) {
        throw LedgerError.insufficientBalance(available, amount);
      }

      const draft = ledger.begin();
      draft.debit(user, amount);
      try {
        await release(this.ctx, this.ctx.config.settlement.address, user, amount);
      } catch (error) {
        draft.discard();
        throw error;
      }
      draft.commit();

      const record: WithdrawalRecord = {
        kind: "withdrawal",
        sequence: ledger.revision,
        timestamp: timestamp(this.ctx),
        user,
        amount,
      };
      this.ctx.records.emit(record);
      return record;
    });
  }
}
