import { describe, it, expect } from "vitest";
import { LedgerError } from "@strongbox/ledger";
import type { Address } from "@strongbox/types";
import { Custody } from "../src/custody.js";
import type { AssetTransferProtocol } from "../src/ports.js";
import { InMemoryRecordLog } from "../src/records.js";
import { FixedRateExchange } from "../src/simulated/fixed-rate-exchange.js";
import { InMemoryTokenBank } from "../src/simulated/token-bank.js";
import {
  ALICE,
  CUSTODY,
  EXCHANGE,
  OWNER,
  SETTLEMENT,
  WRAPPER,
  baseConfig,
  createHarness,
  fundSettlement,
  rejection,
} from "./helpers.js";

async function harnessWithBalance(balance: bigint) {
  const harness = createHarness();
  fundSettlement(harness.bank, ALICE, balance);
  await harness.custody.depositAsset(ALICE, SETTLEMENT, balance);
  return harness;
}

describe("withdraw", () => {
  it("debits the ledger and releases settlement currency", async () => {
    const { bank, custody, log } = createHarness();
    bank.mintNative(ALICE, 1n);
    await custody.depositNative(ALICE, 1n);

    const record = await custody.withdraw(ALICE, 500n);

    expect(record).toEqual({
      kind: "withdrawal",
      sequence: 2,
      timestamp: "2026-01-01T00:00:00.000Z",
      user: ALICE,
      amount: 500n,
    });
    expect(custody.balanceOf(ALICE)).toBe(1_500n);
    expect(custody.withdrawalCount).toBe(1);
    expect(custody.totalCustodied(OWNER)).toBe(1_500n);
    expect(bank.balance(SETTLEMENT, ALICE)).toBe(500n);
    expect(log.list({ kind: "withdrawal" })).toEqual([record]);
  });

  it("rejects an amount over the per-call ceiling", async () => {
    const { custody } = await harnessWithBalance(1_500n);

    const error = await rejection(custody.withdraw(ALICE, 1_001n));

    expect(error).toBeInstanceOf(LedgerError);
    expect(error).toMatchObject({
      code: "WITHDRAWAL_CEILING_EXCEEDED",
      details: { ceiling: 1_000n, requested: 1_001n },
    });
    expect(custody.balanceOf(ALICE)).toBe(1_500n);
  });

  it("allows exactly the ceiling", async () => {
    const { custody } = await harnessWithBalance(1_500n);
    await custody.withdraw(ALICE, 1_000n);
    expect(custody.balanceOf(ALICE)).toBe(500n);
  });

  it("rejects an amount over the balance", async () => {
    const { custody } = await harnessWithBalance(100n);

    const error = await rejection(custody.withdraw(ALICE, 101n));

    expect(error).toMatchObject({
      code: "INSUFFICIENT_BALANCE",
      details: { available: 100n, requested: 101n },
    });
  });

  it("rejects zero", async () => {
    const { custody } = await harnessWithBalance(100n);
    expect(await rejection(custody.withdraw(ALICE, 0n))).toMatchObject({ code: "ZERO_AMOUNT" });
  });

  it("leaves no decrement when the release returns false", async () => {
    const { bank, custody, log } = await harnessWithBalance(1_500n);
    bank.failNext("transfer");

    const error = await rejection(custody.withdraw(ALICE, 500n));

    expect(error).toMatchObject({ code: "TRANSFER_FAILED", details: { asset: SETTLEMENT } });
    expect(custody.balanceOf(ALICE)).toBe(1_500n);
    expect(custody.withdrawalCount).toBe(0);
    expect(custody.totalCustodied(OWNER)).toBe(1_500n);
    expect(log.size).toBe(1);
  });

  it("leaves no decrement when the release rejects", async () => {
    const { bank, custody } = await harnessWithBalance(1_500n);
    bank.failNext("transfer", "reject");

    const error = await rejection(custody.withdraw(ALICE, 500n));

    expect(error).toMatchObject({ code: "TRANSFER_FAILED" });
    expect(error instanceof Error && error.cause).toEqual(new Error("Injected transfer failure"));
    expect(custody.balanceOf(ALICE)).toBe(1_500n);
  });

  it("refuses a second withdrawal started while the first is in flight", async () => {
    const { custody } = await harnessWithBalance(1_500n);

    const first = custody.withdraw(ALICE, 600n);
    const second = custody.withdraw(ALICE, 600n);

    expect(await rejection(second)).toMatchObject({ code: "REENTRANT_CALL" });
    await first;
    expect(custody.balanceOf(ALICE)).toBe(900n);
    expect(custody.withdrawalCount).toBe(1);
  });

  describe("during the release", () => {
    async function observedHarness(
      during: (custody: Custody) => Promise<void>,
    ): Promise<{ custody: Custody; bank: InMemoryTokenBank }> {
      const bank = new InMemoryTokenBank();
      const exchange = new FixedRateExchange({
        address: EXCHANGE,
        bank,
        account: CUSTODY,
        nativeWrapper: WRAPPER,
      });
      let custodyRef: Custody | undefined;
      const transfers: AssetTransferProtocol = {
        pull: (asset, from, to, amount) => bank.pull(asset, from, to, amount),
        authorize: (asset, owner, spender, amount) => bank.authorize(asset, owner, spender, amount),
        balanceOf: (asset, holder) => bank.balanceOf(asset, holder),
        transfer: async (asset: Address, from: Address, to: Address, amount: bigint) => {
          if (custodyRef) {
            await during(custodyRef);
          }
          return bank.transfer(asset, from, to, amount);
        },
      };
      const custody = new Custody({
        config: baseConfig(),
        exchange,
        transfers,
        native: bank.nativeChannel(CUSTODY),
        records: new InMemoryRecordLog(),
      });
      fundSettlement(bank, ALICE, 1_500n);
      await custody.depositAsset(ALICE, SETTLEMENT, 1_500n);
      custodyRef = custody;
      return { custody, bank };
    }

    it("queries see the committed balance, not the staged debit", async () => {
      const seen: bigint[] = [];
      const { custody } = await observedHarness(async (c) => {
        seen.push(c.balanceOf(ALICE), c.totalCustodied(OWNER));
      });

      await custody.withdraw(ALICE, 500n);

      expect(seen).toEqual([1_500n, 1_500n]);
      expect(custody.balanceOf(ALICE)).toBe(1_000n);
    });

    it("a nested withdrawal is refused", async () => {
      const nested: unknown[] = [];
      const { custody, bank } = await observedHarness(async (c) => {
        nested.push(await rejection(c.withdraw(ALICE, 1_000n)));
      });

      await custody.withdraw(ALICE, 1_000n);

      expect(nested).toHaveLength(1);
      expect(nested[0]).toMatchObject({ code: "REENTRANT_CALL" });
      expect(custody.balanceOf(ALICE)).toBe(500n);
      expect(bank.balance(SETTLEMENT, ALICE)).toBe(1_000n);
    });
  });
});
