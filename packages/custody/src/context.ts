import type { Ledger } from "@strongbox/ledger";
import type { Address, AssetId } from "@strongbox/types";
import { NATIVE_ASSET } from "@strongbox/types";
import type { ReentrancyLock } from "./lock.js";
import type {
  AssetTransferProtocol,
  ExchangeAdapter,
  NativeValueChannel,
  RecordSink,
} from "./ports.js";
import type { ResolvedCustodyConfig } from "./types.js";
import { CustodyError } from "./types.js";

/**
 * Everything the pipeline and the gate share. Owned by one Custody.
 */
export interface CustodyContext {
  readonly config: ResolvedCustodyConfig;
  readonly ledger: Ledger;
  readonly lock: ReentrancyLock;
  readonly exchange: ExchangeAdapter;
  readonly transfers: AssetTransferProtocol;
  readonly native: NativeValueChannel;
  readonly records: RecordSink;
}

export type Attempt = { readonly ok: true } | { readonly ok: false; readonly cause?: unknown };

/**
 * Run a boolean collaborator call. A rejection counts as `false` and
 * its error is kept as the cause.
 */
export async function attempt(call: () => Promise<boolean>): Promise<Attempt> {
  try {
    return (await call()) ? { ok: true } : { ok: false };
  } catch (cause) {
    return { ok: false, cause };
  }
}

export function requirePositive(amount: bigint, field: string): void {
  if (amount <= 0n) {
    throw new CustodyError("ZERO_AMOUNT", `${field} must be positive, got ${amount.toString()}`, {
      field,
    });
  }
}

/**
 * Send `amount` of `asset` from custody to `to`. Failure surfaces as
 * TRANSFER_FAILED for that asset. The error that made the release
 * necessary, when given, is the cause; otherwise the collaborator's own.
 */
export async function release(
  ctx: CustodyContext,
  asset: AssetId,
  to: Address,
  amount: bigint,
  cause?: unknown,
): Promise<void> {
  const result =
    asset === NATIVE_ASSET
      ? await attempt(() => ctx.native.release(to, amount))
      : await attempt(() => ctx.transfers.transfer(asset, ctx.config.custody, to, amount));
  if (!result.ok) {
    throw CustodyError.transferFailed(asset, cause ?? result.cause);
  }
}

export function timestamp(ctx: CustodyContext): string {
  return new Date(ctx.config.now()).toISOString();
}

/** Unix seconds the exchange must settle by. */
export function deadline(ctx: CustodyContext): bigint {
  return BigInt(Math.floor(ctx.config.now() / 1000) + ctx.config.deadlineWindowSeconds);
}
