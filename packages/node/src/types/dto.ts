/**
 * Request and response shapes for the HTTP API.
 *
 * Amounts travel as decimal strings in whole units ("0.02"); the service
 * scales them by the asset's decimals. Assets are named by symbol or id.
 */

import { z } from "zod";
import { isAddress } from "@yieldmesh/types";

// =============================================================================
// Request Schemas
// =============================================================================

const AddressSchema = z
  .string()
  .refine(isAddress, "Expected a 0x-prefixed 20-byte hex address");

const DecimalSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal string");

export const DepositSchema = z.object({
  account: AddressSchema,
  asset: z.string().min(1),
  amount: DecimalSchema,
  sellForSettlement: z.boolean().optional(),
});

export const WithdrawSchema = z.object({
  account: AddressSchema,
  shares: DecimalSchema,
  recipient: AddressSchema.optional(),
});

export const FaucetSchema = z.object({
  account: AddressSchema,
  asset: z.string().min(1),
  amount: DecimalSchema,
});

export const AdvanceTimeSchema = z.object({
  seconds: z.number().int().min(0),
});

export { AddressSchema };

export type DepositDto = z.infer<typeof DepositSchema>;
export type WithdrawDto = z.infer<typeof WithdrawSchema>;
export type FaucetDto = z.infer<typeof FaucetSchema>;
export type AdvanceTimeDto = z.infer<typeof AdvanceTimeSchema>;

// =============================================================================
// Response Shapes
// =============================================================================

export interface VaultSummary {
  readonly address: string;
  readonly shareAsset: string;
  readonly strategy: string | null;
  readonly totalAssets: string;
  readonly totalSupply: string;
  readonly sharePrice: string;
  readonly minLockUpPeriod: number;
  readonly now: number;
}

export interface PositionView {
  readonly holder: string;
  readonly shares: string;
  readonly assets: string;
  readonly lockedUntil: number;
  readonly withdrawable: boolean;
}

export interface ReserveView {
  readonly asset: string;
  readonly symbol: string;
  readonly reserve: string;
  readonly value: string;
}

export interface DepositReceipt {
  readonly account: string;
  readonly asset: string;
  readonly amount: string;
  readonly shares: string;
  readonly position: PositionView;
}

export interface WithdrawalReceipt {
  readonly account: string;
  readonly recipient: string;
  readonly shares: string;
  readonly settlementOut: string;
  readonly nativeOut: string;
}

export interface FaucetReceipt {
  readonly account: string;
  readonly asset: string;
  readonly amount: string;
  readonly balance: string;
}
