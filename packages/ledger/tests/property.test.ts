/**
 * Property-Based Tests for @strongbox/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence
 * of operations:
 *
 * 1. Conservation: total == sum of balances
 * 2. Per-user accounting: credits − debits == balance
 * 3. Capacity is never exceeded
 * 4. Failed operations leave no trace
 * 5. Snapshot → restore preserves every balance
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Ledger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const USERS = [
  "0x1111111111111111111111111111111111111111",
  "0x2222222222222222222222222222222222222222",
  "0x3333333333333333333333333333333333333333",
] as const;

interface Op {
  readonly kind: "credit" | "debit";
  readonly user: string;
  readonly amount: bigint;
}

const arbOp: fc.Arbitrary<Op> = fc.record({
  kind: fc.constantFrom("credit" as const, "debit" as const),
  user: fc.constantFrom(...USERS),
  amount: fc.bigInt({ min: 0n, max: 3_000n }),
});

const arbOps = fc.array(arbOp, { minLength: 1, maxLength: 40 });

function newLedger(): Ledger {
  return new Ledger({
    currency: "USDC",
    decimals: 6,
    capacity: 10_000n,
    withdrawalCeiling: 1_000n,
  });
}

/**
 * Apply ops, tracking accepted credits/debits per user.
 */
function run(ops: readonly Op[]): {
  ledger: Ledger;
  credited: Map<string, bigint>;
  debited: Map<string, bigint>;
  accepted: { credits: number; debits: number };
} {
  const ledger = newLedger();
  const credited = new Map<string, bigint>();
  const debited = new Map<string, bigint>();
  const accepted = { credits: 0, debits: 0 };

  for (const op of ops) {
    const before = ledger.snapshot();
    try {
      if (op.kind === "credit") {
        ledger.credit(op.user, op.amount);
        credited.set(op.user, (credited.get(op.user) ?? 0n) + op.amount);
        accepted.credits++;
      } else {
        ledger.debit(op.user, op.amount);
        debited.set(op.user, (debited.get(op.user) ?? 0n) + op.amount);
        accepted.debits++;
      }
    } catch (err) {
      if (!(err instanceof LedgerError)) throw err;
      // Failure must leave no partial mutation
      const after = ledger.snapshot();
      expect({ ...after, createdAt: "" }).toEqual({ ...before, createdAt: "" });
    }
  }

  return { ledger, credited, debited, accepted };
}

// =============================================================================
// Properties
// =============================================================================

describe("property: ledger conservation", () => {
  it("aggregate total equals the sum of balances after any sequence", () => {
    fc.assert(
      fc.property(arbOps, (ops) => {
        const { ledger } = run(ops);
        const sum = USERS.reduce((acc, u) => acc + ledger.balanceOf(u), 0n);
        expect(ledger.totalCustodied).toBe(sum);
        expect(ledger.isConserved()).toBe(true);
      }),
      { numRuns: 200 },
    );
  });

  it("credits minus debits equals each user's balance", () => {
    fc.assert(
      fc.property(arbOps, (ops) => {
        const { ledger, credited, debited } = run(ops);
        for (const user of USERS) {
          const expected = (credited.get(user) ?? 0n) - (debited.get(user) ?? 0n);
          expect(ledger.balanceOf(user)).toBe(expected);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("never exceeds capacity", () => {
    fc.assert(
      fc.property(arbOps, (ops) => {
        const { ledger } = run(ops);
        expect(ledger.totalCustodied <= ledger.capacity).toBe(true);
      }),
      { numRuns: 200 },
    );
  });

  it("counts exactly the accepted operations", () => {
    fc.assert(
      fc.property(arbOps, (ops) => {
        const { ledger, accepted } = run(ops);
        expect(ledger.depositCount).toBe(accepted.credits);
        expect(ledger.withdrawalCount).toBe(accepted.debits);
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: snapshot restore", () => {
  it("restores every balance and counter", () => {
    fc.assert(
      fc.property(arbOps, (ops) => {
        const { ledger } = run(ops);
        const restored = Ledger.fromSnapshot(ledger.snapshot());
        for (const user of USERS) {
          expect(restored.balanceOf(user)).toBe(ledger.balanceOf(user));
        }
        expect(restored.totalCustodied).toBe(ledger.totalCustodied);
        expect(restored.depositCount).toBe(ledger.depositCount);
        expect(restored.withdrawalCount).toBe(ledger.withdrawalCount);
      }),
      { numRuns: 100 },
    );
  });
});
