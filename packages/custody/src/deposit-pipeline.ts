/**
 * DepositPipeline — native and token deposits.
 *
 * Every deposit runs under the custody lock:
 *   collect/pull → measure → convert → measure → stage credit → commit → record
 *
 * The ledger only ever sees measured proceeds. Anything that fails before
 * the commit leaves the ledger untouched and hands back what custody took:
 * the deposit itself before a conversion, the proceeds after one. Only a
 * failed token conversion under the "retain" policy keeps the tokens.
 */

import type { Address, AssetId, DepositRecord } from "@strongbox/types";
import { NATIVE_ASSET } from "@strongbox/types";
import { normalizeAddress } from "./config.js";
import type { CustodyContext } from "./context.js";
import { attempt, deadline, release, requirePositive, timestamp } from "./context.js";
import { ProceedsMeter } from "./measure.js";
import type { ConversionRequest } from "./ports.js";
import { CustodyError } from "./types.js";

export class DepositPipeline {
  constructor(private readonly ctx: CustodyContext) {}

  // ─── Native ──────────────────────────────────────────────────────────

  /**
   * Convert carried native value into settlement currency and credit it.
   * On conversion failure the full native amount goes back to the caller.
   * Once the conversion has run the native value is spent: a refused
   * credit returns the proceeds in settlement currency, and a conversion
   * that delivered nothing (ZERO_PROCEEDS) returns nothing.
   */
  depositNative(caller: string, value: bigint, minProceeds = 0n): Promise<DepositRecord> {
    return this.ctx.lock.run("depositNative", async () => {
      const user = normalizeAddress(caller, "caller");
      requirePositive(value, "value");

      const collected = await attempt(() => this.ctx.native.collect(user, value));
      if (!collected.ok) {
        throw CustodyError.transferFailed(NATIVE_ASSET, collected.cause);
      }

      let proceeds: bigint;
      try {
        proceeds = await this.convert({
          amountIn: value,
          minAmountOut: minProceeds,
          path: [this.ctx.config.nativeWrapper, this.ctx.config.settlement.address],
          value,
        });
      } catch (cause) {
        await release(this.ctx, NATIVE_ASSET, user, value, cause);
        throw exchangeFailed(NATIVE_ASSET, value, cause);
      }

      return this.settle(user, NATIVE_ASSET, value, proceeds);
    });
  }

  // ─── Token ───────────────────────────────────────────────────────────

  /**
   * Pull `amount` of `asset` from the caller, convert it unless it already
   * is the settlement currency, and credit the measured proceeds.
   */
  depositAsset(
    caller: string,
    asset: string,
    amount: bigint,
    minProceeds = 0n,
  ): Promise<DepositRecord> {
    return this.ctx.lock.run("depositAsset", async () => {
      const user = normalizeAddress(caller, "caller");
      requirePositive(amount, "amount");
      const token = normalizeAddress(asset, "asset");
      const { custody, exchange, settlement, tokenFailurePolicy } = this.ctx.config;
      const refund = tokenFailurePolicy === "refund";

      const pulled = await attempt(() => this.ctx.transfers.pull(token, user, custody, amount));
      if (!pulled.ok) {
        throw CustodyError.transferFailed(token, pulled.cause);
      }

      if (token === settlement.address) {
        return this.settle(user, token, amount, amount);
      }

      const authorized = await attempt(() =>
        this.ctx.transfers.authorize(token, custody, exchange, amount),
      );
      if (!authorized.ok) {
        const error = CustodyError.transferFailed(token, authorized.cause);
        await release(this.ctx, token, user, amount, error);
        throw error;
      }

      let proceeds: bigint;
      try {
        proceeds = await this.convert({
          amountIn: amount,
          minAmountOut: minProceeds,
          path: [token, settlement.address],
        });
      } catch (cause) {
        const revoked = await attempt(() => this.ctx.transfers.authorize(token, custody, exchange, 0n));
        if (refund) {
          await release(this.ctx, token, user, amount, cause);
        }
        if (!revoked.ok) {
          throw CustodyError.transferFailed(token, revoked.cause ?? cause);
        }
        throw exchangeFailed(token, amount, cause);
      }

      return this.settle(user, token, amount, proceeds);
    });
  }

  // ─── Shared steps ────────────────────────────────────────────────────

  private async convert(
    request: Pick<ConversionRequest, "amountIn" | "minAmountOut" | "path" | "value">,
  ): Promise<bigint> {
    const { custody, settlement } = this.ctx.config;
    const meter = await ProceedsMeter.start(this.ctx.transfers, settlement.address, custody);
    await this.ctx.exchange.convertExactInput({
      ...request,
      recipient: custody,
      deadline: deadline(this.ctx),
    });
    return meter.finish();
  }

  /**
   * Credit measured proceeds. When the credit is refused the proceeds go
   * back to the caller in settlement currency.
   */
  private async settle(
    user: Address,
    asset: AssetId,
    amountIn: bigint,
    proceeds: bigint,
  ): Promise<DepositRecord> {
    const draft = this.ctx.ledger.begin();
    try {
      if (proceeds === 0n) {
        throw new CustodyError("ZERO_PROCEEDS", `Conversion of ${amountIn.toString()} ${asset} produced nothing`, {
          asset,
          amountIn,
        });
      }
      draft.credit(user, proceeds);
    } catch (error) {
      draft.discard();
      if (proceeds > 0n) {
        await release(this.ctx, this.ctx.config.settlement.address, user, proceeds, error);
      }
      throw error;
    }
    draft.commit();

    const record: DepositRecord = {
      kind: "deposit",
      sequence: this.ctx.ledger.revision,
      timestamp: timestamp(this.ctx),
      user,
      asset,
      amountIn,
      proceeds,
    };
    this.ctx.records.emit(record);
    return record;
  }
}

function exchangeFailed(asset: AssetId, amountIn: bigint, cause: unknown): CustodyError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new CustodyError("EXCHANGE_FAILED", `Conversion of ${asset} failed: ${reason}`, { asset, amountIn }, cause);
}
