#!/usr/bin/env node
/**
 * @strongbox/demo — Interactive CLI walkthrough.
 *
 * Runs a custody session in your terminal:
 * native deposit -> token deposit -> failed conversion -> capacity limit ->
 * withdrawal -> ceiling limit -> reentrant call -> solvency
 *
 * Uses the real custody packages over the in-process token bank and
 * fixed-rate exchange (no chain, no HTTP server).
 */

import chalk from "chalk";
import {
  Custody,
  CustodyError,
  FixedRateExchange,
  InMemoryRecordLog,
  InMemoryTokenBank,
} from "@strongbox/custody";
import { LedgerError } from "@strongbox/ledger";
import type { Address } from "@strongbox/types";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

const CUSTODY: Address = "0x00000000000000000000000000000000000c0de1";
const OWNER: Address = "0x00000000000000000000000000000000000000a1";
const USDC: Address = "0x00000000000000000000000000000000000005e1";
const WETH: Address = "0x0000000000000000000000000000000000000e7f";
const EXCHANGE: Address = "0x0000000000000000000000000000000000000e8c";
const DAI: Address = "0x00000000000000000000000000000000000000da";
const ALICE: Address = "0x000000000000000000000000000000000000a11c";
const BOB: Address = "0x0000000000000000000000000000000000000b0b";

const USDC_UNIT = 1_000_000n;
const ETH_UNIT = 10n ** 18n;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     STRONGBOX DEMO                      ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Single-Asset Custody Ledger                    ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(50 - title.length));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function refused(msg: string): void {
  console.log(chalk.yellow("    ✗ ") + chalk.yellow(msg));
}

/**
 * Run an operation that is expected to be refused and report its code.
 */
async function expectRefusal(operation: Promise<unknown>): Promise<string> {
  return operation.then(
    () => {
      throw new Error("Operation was expected to be refused");
    },
    (err: unknown) => {
      if (err instanceof CustodyError || err instanceof LedgerError) {
        return err.code;
      }
      throw err;
    },
  );
}

const TOTAL_STEPS = 9;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of one custody instance."));
  console.log(chalk.gray("  Every step uses the real custody packages.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const bank = new InMemoryTokenBank();
  const exchange = new FixedRateExchange({
    address: EXCHANGE,
    bank,
    account: CUSTODY,
    nativeWrapper: WETH,
  });
  exchange.setRate(WETH, 2_000n * USDC_UNIT, ETH_UNIT);
  exchange.setRate(DAI, USDC_UNIT, ETH_UNIT);
  bank.mint(USDC, EXCHANGE, 1_000_000n * USDC_UNIT);
  ok("Exchange seeded (1 ETH = 2,000 USDC, 1 DAI = 1 USDC)");

  const records = new InMemoryRecordLog();
  records.subscribe((record) => {
    const what = record.kind === "deposit" ? `deposit of ${record.asset}` : "withdrawal";
    console.log(chalk.gray("    ") + chalk.dim(`record #${record.sequence}: ${what}`));
  });

  const custody = new Custody({
    config: {
      custody: CUSTODY,
      owner: OWNER,
      settlement: { address: USDC, symbol: "USDC", decimals: 6 },
      nativeWrapper: WETH,
      capacity: 10_000n * USDC_UNIT,
      withdrawalCeiling: 1_000n * USDC_UNIT,
      tokenFailurePolicy: "refund",
    },
    exchange,
    transfers: bank,
    native: bank.nativeChannel(CUSTODY),
    records,
  });
  info("capacity", `${custody.toMoney(custody.capacity).amount} USDC`);
  info("ceiling", `${custody.toMoney(custody.withdrawalCeiling).amount} USDC`);
  info("policy", custody.config.tokenFailurePolicy);
  ok("Custody initialized");

  bank.mintNative(ALICE, 5n * ETH_UNIT);
  bank.mint(DAI, BOB, 9_000n * ETH_UNIT);
  ok("Alice holds 5 ETH, Bob holds 9,000 DAI");

  await sleep(DELAY_MS);

  // ─── Step 2: Native deposit ─────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Native Deposit");

  const native = await custody.depositNative(ALICE, 2n * ETH_UNIT);
  info("amount in", "2 ETH");
  info("proceeds", `${custody.toMoney(native.proceeds).amount} USDC`);
  ok(`Alice credited, balance ${custody.toMoney(custody.balanceOf(ALICE)).amount} USDC`);

  await sleep(DELAY_MS);

  // ─── Step 3: Token deposit ──────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Token Deposit");

  bank.approve(DAI, BOB, CUSTODY, 1_500n * ETH_UNIT);
  const token = await custody.depositAsset(BOB, DAI, 1_500n * ETH_UNIT);
  info("amount in", "1,500 DAI");
  info("proceeds", `${custody.toMoney(token.proceeds).amount} USDC`);
  info("allowance left", `${bank.allowance(DAI, CUSTODY, EXCHANGE).toString()} DAI units`);
  ok("Bob credited; custody's allowance to the exchange is spent");

  await sleep(DELAY_MS);

  // ─── Step 4: Failed conversion ──────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Failed Conversion");

  bank.approve(DAI, BOB, CUSTODY, 100n * ETH_UNIT);
  const slippage = await expectRefusal(
    custody.depositAsset(BOB, DAI, 100n * ETH_UNIT, 101n * USDC_UNIT),
  );
  refused(`Minimum proceeds of 101 USDC not met: ${slippage}`);
  info("allowance", `${bank.allowance(DAI, CUSTODY, EXCHANGE).toString()} (revoked)`);
  ok(`Refund policy returned the DAI, Bob holds ${(bank.balance(DAI, BOB) / ETH_UNIT).toString()} DAI`);

  await sleep(DELAY_MS);

  // ─── Step 5: Capacity ───────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Capacity");

  info("headroom", `${custody.toMoney(custody.headroom).amount} USDC`);
  bank.approve(DAI, BOB, CUSTODY, 5_000n * ETH_UNIT);
  const capacity = await expectRefusal(custody.depositAsset(BOB, DAI, 5_000n * ETH_UNIT));
  refused(`5,000 DAI would overflow capacity: ${capacity}`);
  ok(`Proceeds returned to Bob in USDC: ${custody.toMoney(bank.balance(USDC, BOB)).amount}`);

  await sleep(DELAY_MS);

  // ─── Step 6: Withdrawal ─────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Withdrawal");

  const withdrawal = await custody.withdraw(ALICE, 750n * USDC_UNIT);
  info("released", `${custody.toMoney(withdrawal.amount).amount} USDC`);
  ok(`Alice balance ${custody.toMoney(custody.balanceOf(ALICE)).amount} USDC`);

  await sleep(DELAY_MS);

  // ─── Step 7: Ceiling ────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Withdrawal Ceiling");

  const ceiling = await expectRefusal(custody.withdraw(ALICE, 1_001n * USDC_UNIT));
  refused(`1,001 USDC in one call: ${ceiling}`);
  ok("Balance unchanged; smaller withdrawals still go through");

  await sleep(DELAY_MS);

  // ─── Step 8: Reentrant call ─────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Reentrant Call");

  let reentry = "none";
  exchange.onConvert(async () => {
    reentry = await expectRefusal(custody.withdraw(ALICE, 1n));
  });
  await custody.depositNative(ALICE, ETH_UNIT);
  exchange.onConvert(undefined);
  refused(`Exchange tried to withdraw mid-deposit: ${reentry}`);
  ok("Outer deposit completed, lock released");

  await sleep(DELAY_MS);

  // ─── Step 9: Solvency ───────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Solvency");

  const report = await custody.verifySolvency();
  const total = custody.totalCustodied(OWNER);

  console.log();
  console.log(chalk.white("    Records:             ") + chalk.cyan.bold(String(records.size)));
  console.log(chalk.white("    Deposits:            ") + chalk.cyan.bold(String(custody.depositCount)));
  console.log(chalk.white("    Withdrawals:         ") + chalk.cyan.bold(String(custody.withdrawalCount)));
  console.log(chalk.white("    Total custodied:     ") + chalk.cyan.bold(`${custody.toMoney(total).amount} USDC`));
  console.log(chalk.white("    Held by custody:     ") + chalk.cyan.bold(`${custody.toMoney(report.held).amount} USDC`));
  console.log(
    chalk.white("    Solvent:             ") +
      (report.solvent ? chalk.green.bold("YES") : chalk.red.bold("NO")),
  );
  console.log();
  console.log(chalk.gray("    Credits follow measured proceeds, never quotes."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
