import { describe, it, expect } from "vitest";
import { InMemoryTokenBank } from "../../src/simulated/token-bank.js";
import { ALICE, BOB, CUSTODY, TOKEN } from "../helpers.js";

describe("InMemoryTokenBank", () => {
  it("moves tokens and reports balances case-insensitively", async () => {
    const bank = new InMemoryTokenBank();
    bank.mint(TOKEN, ALICE, 100n);

    expect(await bank.transfer(TOKEN, ALICE, BOB, 40n)).toBe(true);
    expect(await bank.balanceOf(TOKEN, "0xBBBBBBBBBBBBBBBBBBBBBBBBBBBBBBBBBBBBBBBB")).toBe(40n);
    expect(bank.balance(TOKEN, ALICE)).toBe(60n);
  });

  it("refuses transfers over the balance without side effects", async () => {
    const bank = new InMemoryTokenBank();
    bank.mint(TOKEN, ALICE, 10n);

    expect(await bank.transfer(TOKEN, ALICE, BOB, 11n)).toBe(false);
    expect(bank.balance(TOKEN, ALICE)).toBe(10n);
    expect(bank.balance(TOKEN, BOB)).toBe(0n);
  });

  it("pulls against the allowance the owner granted the recipient", async () => {
    const bank = new InMemoryTokenBank();
    bank.mint(TOKEN, ALICE, 100n);
    bank.approve(TOKEN, ALICE, CUSTODY, 50n);

    expect(await bank.pull(TOKEN, ALICE, CUSTODY, 60n)).toBe(false);
    expect(await bank.pull(TOKEN, ALICE, CUSTODY, 30n)).toBe(true);
    expect(bank.allowance(TOKEN, ALICE, CUSTODY)).toBe(20n);
    expect(bank.balance(TOKEN, CUSTODY)).toBe(30n);
  });

  it("sets allowances exactly on authorize", async () => {
    const bank = new InMemoryTokenBank();
    await bank.authorize(TOKEN, CUSTODY, BOB, 70n);
    await bank.authorize(TOKEN, CUSTODY, BOB, 0n);
    expect(bank.allowance(TOKEN, CUSTODY, BOB)).toBe(0n);
  });

  it("consumes injected failures one call at a time", async () => {
    const bank = new InMemoryTokenBank();
    bank.mint(TOKEN, ALICE, 100n);
    bank.failNext("transfer");
    bank.failNext("transfer", "reject");

    expect(await bank.transfer(TOKEN, ALICE, BOB, 1n)).toBe(false);
    await expect(bank.transfer(TOKEN, ALICE, BOB, 1n)).rejects.toThrow("Injected transfer failure");
    expect(await bank.transfer(TOKEN, ALICE, BOB, 1n)).toBe(true);
    expect(bank.balance(TOKEN, BOB)).toBe(1n);
  });

  it("binds a native channel to one holder", async () => {
    const bank = new InMemoryTokenBank();
    bank.mintNative(ALICE, 5n);
    const channel = bank.nativeChannel(CUSTODY);

    expect(await channel.collect(ALICE, 3n)).toBe(true);
    expect(await channel.release(BOB, 4n)).toBe(false);
    expect(await channel.release(BOB, 2n)).toBe(true);
    expect(bank.nativeBalance(CUSTODY)).toBe(1n);
    expect(bank.nativeBalance(BOB)).toBe(2n);
  });
});
