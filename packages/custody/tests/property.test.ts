/**
 * Property-based tests for custody.
 *
 * For any sequence of deposits and withdrawals, successful or not:
 * 1. The ledger stays conserved and under capacity
 * 2. Under either token failure policy custody holds exactly what it owes
 * 3. Counters equal the number of successful operations
 * 4. Record sequences are strictly increasing
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ALICE, BOB, OWNER, SETTLEMENT, createHarness } from "./helpers.js";

type Step =
  | { readonly kind: "native"; readonly user: `0x${string}`; readonly value: bigint }
  | { readonly kind: "settlement"; readonly user: `0x${string}`; readonly amount: bigint }
  | { readonly kind: "withdraw"; readonly user: `0x${string}`; readonly amount: bigint };

const arbUser = fc.constantFrom(ALICE, BOB);
const arbPolicy = fc.constantFrom("retain" as const, "refund" as const);

const arbStep: fc.Arbitrary<Step> = fc.oneof(
  fc.record({ kind: fc.constant("native" as const), user: arbUser, value: fc.bigInt({ min: 0n, max: 3n }) }),
  fc.record({
    kind: fc.constant("settlement" as const),
    user: arbUser,
    amount: fc.bigInt({ min: 0n, max: 4_000n }),
  }),
  fc.record({
    kind: fc.constant("withdraw" as const),
    user: arbUser,
    amount: fc.bigInt({ min: 0n, max: 1_500n }),
  }),
);

describe("custody properties", () => {
  it("stays solvent and conserved over any operation sequence", async () => {
    await fc.assert(
      fc.asyncProperty(arbPolicy, fc.array(arbStep, { maxLength: 30 }), async (policy, steps) => {
        const { bank, custody, log } = createHarness({ tokenFailurePolicy: policy });
        for (const user of [ALICE, BOB]) {
          bank.mintNative(user, 100n);
          bank.mint(SETTLEMENT, user, 1_000_000n);
          bank.approve(SETTLEMENT, user, custody.config.custody, 1_000_000n);
        }

        let deposits = 0;
        let withdrawals = 0;
        for (const step of steps) {
          try {
            if (step.kind === "native") {
              await custody.depositNative(step.user, step.value);
              deposits += 1;
            } else if (step.kind === "settlement") {
              await custody.depositAsset(step.user, SETTLEMENT, step.amount);
              deposits += 1;
            } else {
              await custody.withdraw(step.user, step.amount);
              withdrawals += 1;
            }
          } catch (error) {
            expect(error).toHaveProperty("code");
          }
        }

        const owed = custody.totalCustodied(OWNER);
        expect(custody.balanceOf(ALICE) + custody.balanceOf(BOB)).toBe(owed);
        expect(owed <= custody.capacity).toBe(true);

        const report = await custody.verifySolvency();
        expect(report.held).toBe(owed);
        expect(report.solvent).toBe(true);

        expect(custody.depositCount).toBe(deposits);
        expect(custody.withdrawalCount).toBe(withdrawals);

        const sequences = log.list().map((r) => r.sequence);
        expect(sequences).toEqual(sequences.map((_, i) => i + 1));
      }),
      { numRuns: 100 },
    );
  });
});
