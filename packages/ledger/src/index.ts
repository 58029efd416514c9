/**
 * @strongbox/ledger — Single-currency custody ledger.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces the custody invariants:
 * - Aggregate total equals the sum of user balances
 * - Aggregate total never exceeds capacity
 * - Debits respect the per-call ceiling and the user's balance
 * - All monetary arithmetic is unsigned bigint (no floating point, no wraparound)
 * - Staged drafts become observable only on commit
 */

// Core engine
export { Ledger } from "./ledger.js";

// Drafts
export { LedgerDraft } from "./draft.js";
export type { LedgerView, DraftCommitter } from "./draft.js";

// Money arithmetic
export {
  parseAmount,
  parseBaseUnits,
  formatAmount,
  toMoney,
  assertUnsigned,
  assertPositive,
  checkedAdd,
  checkedSub,
} from "./money-math.js";

// Types
export type {
  LedgerConfig,
  LedgerMutation,
  LedgerHolder,
  DraftState,
  LedgerErrorCode,
  LedgerErrorDetails,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
