/**
 * Vault Types
 *
 * Domain types for share issuance and lock-up.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Amounts and share counts are bigint base units
 * - Timestamps are chain seconds
 */

import type { Address, AssetId } from "@yieldmesh/types";

// =============================================================================
// Vault
// =============================================================================

export interface VaultParams {
  readonly owner: Address;
  /** Seconds a holder must wait after their latest deposit */
  readonly minLockUpPeriod: number;
  /** Symbol of the share token; the share token id is the vault address */
  readonly shareSymbol?: string | undefined;
  readonly address?: Address | undefined;
}

/**
 * A holder's standing in a vault.
 */
export interface VaultPosition {
  readonly holder: Address;
  readonly shares: bigint;
  /** Settlement-equivalent value of the shares right now */
  readonly assets: bigint;
  /** Earliest permitted redemption, 0 for a holder who never deposited */
  readonly lockedUntil: number;
  readonly withdrawable: boolean;
}

// =============================================================================
// Single-asset sibling vault
// =============================================================================

export interface SingleAssetVaultParams {
  readonly owner: Address;
  /** The one asset accepted for deposits */
  readonly heldAsset: AssetId;
  readonly minDepositAmount: bigint;
  readonly minLockUpPeriod: number;
  readonly shareSymbol?: string | undefined;
  readonly address?: Address | undefined;
}

/**
 * Accounted balances of a sibling vault. Tokens sent straight to its
 * address are not part of either figure.
 */
export interface SiblingHoldings {
  readonly heldAsset: bigint;
  readonly heldNative: bigint;
}
