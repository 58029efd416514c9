/**
 * @strongbox/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAddress } from "viem";
import type { Address } from "@strongbox/types";
import { isTokenFailurePolicy } from "@strongbox/types";

// =============================================================================
// Field schemas
// =============================================================================

const AddressSchema = z
  .string()
  .refine((value): value is Address => isAddress(value), { message: "Invalid address" })
  .transform((value): Address => `0x${value.slice(2).toLowerCase()}`);

const BaseUnitsSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer of base units")
  .transform((value) => BigInt(value));

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().optional(),
  JWT_ISSUER: z.string().default("strongbox"),

  // Identities
  CUSTODY_ADDRESS: AddressSchema.default("0x00000000000000000000000000000000000c0de1"),
  OWNER_ADDRESS: AddressSchema.default("0x00000000000000000000000000000000000000a1"),
  SETTLEMENT_ADDRESS: AddressSchema.default("0x00000000000000000000000000000000000005e1"),
  NATIVE_WRAPPER_ADDRESS: AddressSchema.default("0x0000000000000000000000000000000000000e7f"),
  EXCHANGE_ADDRESS: AddressSchema.default("0x0000000000000000000000000000000000000e8c"),

  // Settlement currency
  SETTLEMENT_SYMBOL: z.string().min(1).default("USDC"),
  SETTLEMENT_DECIMALS: z.coerce.number().int().min(0).max(36).default(6),

  // Limits (settlement base units)
  CAPACITY: BaseUnitsSchema.default("1000000000000"),
  WITHDRAWAL_CEILING: BaseUnitsSchema.default("10000000000"),

  // Deposit behaviour
  DEADLINE_WINDOW_SECONDS: z.coerce.number().int().min(1).default(300),
  TOKEN_FAILURE_POLICY: z
    .string()
    .refine(isTokenFailurePolicy, { message: "Expected retain or refund" })
    .default("retain"),

  // Sandbox collaborators
  SANDBOX_ROUTES: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("true"),
  SANDBOX_RATES: z.string().default(""),
  SANDBOX_LIQUIDITY: BaseUnitsSchema.default("1000000000000000"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: "admin" | "operator" | "viewer";
  readonly address: Address;
}

const RoleSchema = z.enum(["admin", "operator", "viewer"]);

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:0xaddress1,key2:role2:0xaddress2"
 * The address is the caller identity custody acts for.
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, address] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || address === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    const parsedRole = RoleSchema.safeParse(role);
    if (!parsedRole.success) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    const parsedAddress = AddressSchema.safeParse(address);
    if (!parsedAddress.success) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }

    keys.push({ key, role: parsedRole.data, address: parsedAddress.data });
  }

  return keys;
}

// =============================================================================
// Sandbox Rates
// =============================================================================

export interface SandboxRate {
  readonly asset: Address;
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/**
 * Parse SANDBOX_RATES: "0xasset=num/den,0xasset=num".
 * One unit of the asset buys num/den settlement units.
 */
export function parseSandboxRates(raw: string): readonly SandboxRate[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const match = /^(0x[0-9a-fA-F]{40})=(\d+)(?:\/(\d+))?$/.exec(entry.trim());
    const asset = AddressSchema.safeParse(match?.[1]);
    if (!match || !asset.success || match[3] === "0") {
      throw new Error(
        `Invalid SANDBOX_RATES entry: "${entry.trim()}". Expected format: address=numerator[/denominator]`,
      );
    }
    return {
      asset: asset.data,
      numerator: BigInt(match[2] ?? "0"),
      denominator: BigInt(match[3] ?? "1"),
    };
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
