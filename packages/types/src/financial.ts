/**
 * Financial Types
 *
 * Monetary primitives shared by the ledger, custody and service layers.
 *
 * Rules:
 * - Amounts are bigint base units inside the core
 * - Rendered amounts are strings to avoid floating-point errors
 * - Currency is always explicit
 */

/**
 * Currency identifier (token symbol, e.g. "USDC").
 */
export type Currency = string;

/**
 * A rendered monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** Decimal representation of the amount (e.g., "100.50", "1000000") */
  readonly amount: string;

  /** Currency symbol or identifier (e.g., "USDC") */
  readonly currency: Currency;

  /**
   * Number of decimal places for this currency.
   * USDC = 6, ETH = 18 (wei).
   */
  readonly decimals: number;
}

/**
 * An amount in the smallest indivisible unit of an asset.
 * Never negative.
 */
export type BaseUnits = bigint;
