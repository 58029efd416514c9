import type { Address } from "@strongbox/types";
import type { AssetTransferProtocol } from "./ports.js";

/**
 * Two-step measurement of what a conversion actually delivered.
 *
 *   const meter = await ProceedsMeter.start(transfers, settlement, custody);
 *   await exchange.convertExactInput(...);
 *   const proceeds = await meter.finish();
 *
 * A balance that did not increase counts as zero proceeds.
 */
export class ProceedsMeter {
  private constructor(
    private readonly transfers: AssetTransferProtocol,
    private readonly asset: Address,
    private readonly holder: Address,
    readonly before: bigint,
  ) {}

  static async start(
    transfers: AssetTransferProtocol,
    asset: Address,
    holder: Address,
  ): Promise<ProceedsMeter> {
    const before = await transfers.balanceOf(asset, holder);
    return new ProceedsMeter(transfers, asset, holder, before);
  }

  async finish(): Promise<bigint> {
    const after = await this.transfers.balanceOf(this.asset, this.holder);
    return after > this.before ? after - this.before : 0n;
  }
}
