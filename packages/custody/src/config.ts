/**
 * Custody configuration validation.
 */

import type { Address } from "@strongbox/types";
import { isAddress, zeroAddress } from "viem";
import type { CustodyConfig, ResolvedCustodyConfig } from "./types.js";
import { CustodyError } from "./types.js";

export const DEFAULT_DEADLINE_WINDOW_SECONDS = 300;

/**
 * Validate an address and return it lowercased. Mixed-case input must
 * carry a valid checksum.
 */
export function normalizeAddress(value: string, field: string): Address {
  if (!isAddress(value)) {
    throw new CustodyError("INVALID_ADDRESS", `Invalid ${field} address: "${value}"`, { field, value });
  }
  return `0x${value.slice(2).toLowerCase()}`;
}

function requireNonZero(value: string, field: string): Address {
  const address = normalizeAddress(value, field);
  if (address === zeroAddress) {
    throw CustodyError.invalidConfiguration(field, `${field} must not be the zero address`);
  }
  return address;
}

/**
 * Check every parameter and apply defaults. Runs once, at construction.
 */
export function resolveCustodyConfig(config: CustodyConfig, exchange: string): ResolvedCustodyConfig {
  if (config.capacity <= 0n) {
    throw CustodyError.invalidConfiguration("capacity", "Capacity must be greater than zero");
  }
  if (config.withdrawalCeiling <= 0n) {
    throw CustodyError.invalidConfiguration("withdrawalCeiling", "Withdrawal ceiling must be greater than zero");
  }
  const { decimals, symbol } = config.settlement;
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw CustodyError.invalidConfiguration("decimals", `Invalid settlement decimals: ${String(decimals)}`);
  }
  if (symbol.trim() === "") {
    throw CustodyError.invalidConfiguration("symbol", "Settlement symbol must not be empty");
  }

  const window = config.deadlineWindowSeconds ?? DEFAULT_DEADLINE_WINDOW_SECONDS;
  if (!Number.isInteger(window) || window <= 0) {
    throw CustodyError.invalidConfiguration(
      "deadlineWindowSeconds",
      `Deadline window must be a positive integer, got ${String(window)}`,
    );
  }

  return {
    custody: requireNonZero(config.custody, "custody"),
    owner: requireNonZero(config.owner, "owner"),
    settlement: {
      address: requireNonZero(config.settlement.address, "settlement"),
      symbol,
      decimals,
    },
    nativeWrapper: requireNonZero(config.nativeWrapper, "nativeWrapper"),
    exchange: requireNonZero(exchange, "exchange"),
    capacity: config.capacity,
    withdrawalCeiling: config.withdrawalCeiling,
    deadlineWindowSeconds: window,
    tokenFailurePolicy: config.tokenFailurePolicy ?? "retain",
    now: config.now ?? Date.now,
  };
}
