/**
 * Exchange with fixed per-asset rates, settled through an InMemoryTokenBank.
 *
 * Acts for one trading account (the custody address): token input is
 * taken through that account's allowance, native input from its native
 * balance. Output is paid from the exchange's own settlement liquidity.
 */

import type { Address } from "@strongbox/types";
import type { ConversionRequest, ExchangeAdapter } from "../ports.js";
import type { InMemoryTokenBank } from "./token-bank.js";

export interface FixedRateExchangeOptions {
  readonly address: Address;
  readonly bank: InMemoryTokenBank;

  /** Account whose funds the exchange spends */
  readonly account: Address;

  /** Wrapped native token; a path starting here is a native conversion */
  readonly nativeWrapper: Address;

  /** Clock in milliseconds. Default: Date.now */
  readonly now?: (() => number) | undefined;
}

export interface Rate {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/** Called before a conversion executes. */
export type ConversionHook = (request: ConversionRequest) => Promise<void> | void;

export class ExchangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExchangeError";
  }
}

export class FixedRateExchange implements ExchangeAdapter {
  readonly address: Address;
  private readonly bank: InMemoryTokenBank;
  private readonly account: Address;
  private readonly nativeWrapper: string;
  private readonly now: () => number;
  private readonly rates = new Map<string, Rate>();
  private hook: ConversionHook | undefined;
  private _conversions = 0;

  constructor(options: FixedRateExchangeOptions) {
    this.address = options.address;
    this.bank = options.bank;
    this.account = options.account;
    this.nativeWrapper = options.nativeWrapper.toLowerCase();
    this.now = options.now ?? Date.now;
  }

  get conversions(): number {
    return this._conversions;
  }

  /**
   * One unit of `asset` buys numerator/denominator units of settlement.
   * A zero numerator models a conversion that delivers nothing.
   */
  setRate(asset: Address, numerator: bigint, denominator = 1n): void {
    if (numerator < 0n || denominator <= 0n) {
      throw new ExchangeError(`Invalid rate ${numerator.toString()}/${denominator.toString()}`);
    }
    this.rates.set(asset.toLowerCase(), { numerator, denominator });
  }

  quote(asset: Address, amountIn: bigint): bigint {
    const rate = this.rates.get(asset.toLowerCase());
    if (!rate) {
      throw new ExchangeError(`No rate for ${asset}`);
    }
    return (amountIn * rate.numerator) / rate.denominator;
  }

  onConvert(hook: ConversionHook | undefined): void {
    this.hook = hook;
  }

  async convertExactInput(request: ConversionRequest): Promise<bigint> {
    await this.hook?.(request);

    const [input, output, ...rest] = request.path;
    if (input === undefined || output === undefined || rest.length > 0) {
      throw new ExchangeError(`Unsupported path of length ${String(request.path.length)}`);
    }
    if (BigInt(Math.floor(this.now() / 1000)) > request.deadline) {
      throw new ExchangeError("Deadline expired");
    }

    const amountOut = this.quote(input, request.amountIn);
    if (amountOut < request.minAmountOut) {
      throw new ExchangeError(
        `Insufficient output: ${amountOut.toString()} < ${request.minAmountOut.toString()}`,
      );
    }
    if (this.bank.balance(output, this.address) < amountOut) {
      throw new ExchangeError("Insufficient liquidity");
    }

    const native = input.toLowerCase() === this.nativeWrapper;
    if (native) {
      if (request.value !== request.amountIn) {
        throw new ExchangeError("Native value does not match input amount");
      }
      if (!this.bank.moveNative(this.account, this.address, request.amountIn)) {
        throw new ExchangeError("Native input not available");
      }
    } else if (!this.bank.spend(input, this.address, this.account, this.address, request.amountIn)) {
      throw new ExchangeError("Input transfer not authorized");
    }

    this.bank.send(output, this.address, request.recipient, amountOut);
    this._conversions += 1;
    return amountOut;
  }
}
