/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Amounts cross the wire as decimal strings of base units. Addresses are
 * passed through as strings; custody validates them.
 */

import { z } from "zod";
import type { CustodyRecord, Money } from "@strongbox/types";
import { isAssetId } from "@strongbox/types";
import type { SolvencyReport } from "@strongbox/custody";

// =============================================================================
// Shared Schemas
// =============================================================================

export const BaseUnitsSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer string of base units")
  .transform((value) => BigInt(value));

// =============================================================================
// Deposit & Withdrawal DTOs
// =============================================================================

export const NativeDepositSchema = z.object({
  value: BaseUnitsSchema,
  minProceeds: BaseUnitsSchema.default("0"),
});

export type NativeDepositDto = z.infer<typeof NativeDepositSchema>;

export const AssetDepositSchema = z.object({
  asset: z.string().min(1),
  amount: BaseUnitsSchema,
  minProceeds: BaseUnitsSchema.default("0"),
});

export type AssetDepositDto = z.infer<typeof AssetDepositSchema>;

export const WithdrawalSchema = z.object({
  amount: BaseUnitsSchema,
});

export type WithdrawalDto = z.infer<typeof WithdrawalSchema>;

// =============================================================================
// Record DTOs
// =============================================================================

export const ListRecordsQuerySchema = z.object({
  kind: z.enum(["deposit", "withdrawal"]).optional(),
  user: z.string().optional(),
  fromSequence: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type ListRecordsQuery = z.infer<typeof ListRecordsQuerySchema>;

// =============================================================================
// Sandbox DTOs
// =============================================================================

export const SandboxMintSchema = z.object({
  asset: z.string().refine(isAssetId, { message: 'Expected a token address or "native"' }),
  to: z.string().min(1),
  amount: BaseUnitsSchema,
});

export type SandboxMintDto = z.infer<typeof SandboxMintSchema>;

export const SandboxApproveSchema = z.object({
  asset: z.string().min(1),
  amount: BaseUnitsSchema,
});

export type SandboxApproveDto = z.infer<typeof SandboxApproveSchema>;

// =============================================================================
// Response DTOs
// =============================================================================

export type CustodyRecordDto =
  | {
      readonly kind: "deposit";
      readonly sequence: number;
      readonly timestamp: string;
      readonly user: string;
      readonly asset: string;
      readonly amountIn: string;
      readonly proceeds: string;
    }
  | {
      readonly kind: "withdrawal";
      readonly sequence: number;
      readonly timestamp: string;
      readonly user: string;
      readonly amount: string;
    };

export function toRecordDto(record: CustodyRecord): CustodyRecordDto {
  if (record.kind === "deposit") {
    return {
      kind: "deposit",
      sequence: record.sequence,
      timestamp: record.timestamp,
      user: record.user,
      asset: record.asset,
      amountIn: record.amountIn.toString(),
      proceeds: record.proceeds.toString(),
    };
  }
  return {
    kind: "withdrawal",
    sequence: record.sequence,
    timestamp: record.timestamp,
    user: record.user,
    amount: record.amount.toString(),
  };
}

export interface AmountDto {
  readonly units: string;
  readonly money: Money;
}

export interface SolvencyDto {
  readonly held: string;
  readonly owed: string;
  readonly surplus: string;
  readonly shortfall: string;
  readonly solvent: boolean;
}

export function toSolvencyDto(report: SolvencyReport): SolvencyDto {
  return {
    held: report.held.toString(),
    owed: report.owed.toString(),
    surplus: report.surplus.toString(),
    shortfall: report.shortfall.toString(),
    solvent: report.solvent,
  };
}
