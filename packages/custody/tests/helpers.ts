/**
 * Shared fixtures for custody tests.
 */

import type { Address } from "@strongbox/types";
import { Custody } from "../src/custody.js";
import { InMemoryRecordLog } from "../src/records.js";
import type { CustodyConfig } from "../src/types.js";
import { FixedRateExchange } from "../src/simulated/fixed-rate-exchange.js";
import { InMemoryTokenBank } from "../src/simulated/token-bank.js";

export const CUSTODY: Address = "0x1111111111111111111111111111111111111111";
export const OWNER: Address = "0x2222222222222222222222222222222222222222";
export const SETTLEMENT: Address = "0x3333333333333333333333333333333333333333";
export const WRAPPER: Address = "0x4444444444444444444444444444444444444444";
export const EXCHANGE: Address = "0x5555555555555555555555555555555555555555";
export const TOKEN: Address = "0x6666666666666666666666666666666666666666";
export const ALICE: Address = "0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";
export const BOB: Address = "0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb";

/** 2026-01-01T00:00:00.000Z */
export const NOW = Date.UTC(2026, 0, 1);

export function baseConfig(overrides: Partial<CustodyConfig> = {}): CustodyConfig {
  return {
    custody: CUSTODY,
    owner: OWNER,
    settlement: { address: SETTLEMENT, symbol: "USDC", decimals: 6 },
    nativeWrapper: WRAPPER,
    capacity: 10_000n,
    withdrawalCeiling: 1_000n,
    now: () => NOW,
    ...overrides,
  };
}

/**
 * Custody over a simulated bank and exchange.
 * Rates: 1 native unit → 2000 settlement, 1 TOKEN → 1/2 settlement.
 */
export function createHarness(overrides: Partial<CustodyConfig> = {}) {
  const bank = new InMemoryTokenBank();
  const exchange = new FixedRateExchange({
    address: EXCHANGE,
    bank,
    account: CUSTODY,
    nativeWrapper: WRAPPER,
    now: () => NOW,
  });
  exchange.setRate(WRAPPER, 2_000n);
  exchange.setRate(TOKEN, 1n, 2n);
  bank.mint(SETTLEMENT, EXCHANGE, 1_000_000_000n);

  const log = new InMemoryRecordLog();
  const custody = new Custody({
    config: baseConfig(overrides),
    exchange,
    transfers: bank,
    native: bank.nativeChannel(CUSTODY),
    records: log,
  });
  return { bank, exchange, custody, log };
}

/**
 * Await a promise expected to reject and hand back what it rejected with.
 */
export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected promise to reject");
}

/** Give `holder` settlement currency and let custody pull it. */
export function fundSettlement(bank: InMemoryTokenBank, holder: Address, amount: bigint): void {
  bank.mint(SETTLEMENT, holder, amount);
  bank.approve(SETTLEMENT, holder, CUSTODY, amount);
}
