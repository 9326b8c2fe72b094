/**
 * Strategy Types
 *
 * Capabilities the strategy consumes (injected at construction) and the
 * surface it exposes to its vault.
 *
 * Rules:
 * - Capabilities are opaque: the strategy never assumes their math
 * - Every amount is bigint base units
 * - Every mutating capability call receives the caller's Msg
 */

import type { Address, AssetAmount, AssetId, Msg } from "@yieldmesh/types";

// =============================================================================
// Consumed capabilities
// =============================================================================

/**
 * Executes one atomic exchange. Must fail with SLIPPAGE_EXCEEDED when the
 * realized output is below `minAmountOut`. Input is pulled from
 * `msg.sender`; native input arrives as `msg.value`. Output is paid to
 * `msg.sender`.
 */
export interface Swapper {
  readonly address: Address;
  swap(
    msg: Msg,
    tokenIn: AssetId,
    amountIn: bigint,
    tokenOut: AssetId,
    minAmountOut: bigint,
  ): bigint;
}

/**
 * External custodian that mints a yield-bearing receipt against
 * settlement-asset deposits.
 */
export interface Registry {
  readonly address: Address;
  readonly settlementAsset: AssetId;
  readonly receiptAsset: AssetId;
  /** Pull `amount` of the settlement asset from msg.sender, mint receipt to `owner`. */
  deposit(msg: Msg, owner: Address, amount: bigint): void;
  /** Burn `amount` of receipt from msg.sender, pay settlement proceeds to `recipient`. */
  withdraw(msg: Msg, recipient: Address, amount: bigint): bigint;
  /** Precheck that `owner` may redeem or move `amount` of receipt right now. */
  canWithdraw(owner: Address, amount: bigint): boolean;
}

/**
 * Converts a non-canonical form of an asset into its canonical wrapped form
 * (e.g. a rebasing derivative into its non-rebasing wrapper).
 */
export interface AssetWrapper {
  readonly address: Address;
  /** The non-canonical asset accepted by wrap() */
  readonly asset: AssetId;
  /** The canonical asset produced by wrap() */
  readonly wrappedAsset: AssetId;
  /** Pull `amount` of `asset` from msg.sender, pay the wrapped amount to msg.sender. */
  wrap(msg: Msg, amount: bigint): bigint;
}

/**
 * Settlement-asset-equivalent value of a quantity, from live external rates.
 * Never cached: rates accrue between calls.
 */
export interface Valuation {
  assetValue(asset: AssetId, amount: bigint): bigint;
}

/**
 * Value function for a single asset.
 */
export interface ValueSource {
  settlementValue(amount: bigint): bigint;
}

// =============================================================================
// Strategy configuration and results
// =============================================================================

export interface UnderlyingAssetConfig {
  /** Smallest accepted deposit, in canonical base units */
  readonly minDepositAmount: bigint;
  /** Maximum total reserve for the asset; 0 means no ceiling */
  readonly depositCeiling: bigint;
}

export interface StrategyParams {
  readonly owner: Address;
  readonly vault: Address;
  readonly manager?: Address | undefined;
  readonly settlementAsset: AssetId;
  readonly registry: Registry;
  readonly valuation: Valuation;
  /** Wrappers for non-canonical forms, keyed by their input asset */
  readonly wrappers?: readonly AssetWrapper[] | undefined;
  readonly address?: Address | undefined;
}

export interface WithdrawalResult {
  readonly settlementOut: bigint;
  readonly nativeOut: bigint;
}

/**
 * Assets moved out by migrateFunds(), in holding-set order.
 */
export interface MigrationManifest {
  readonly from: Address;
  readonly to: Address;
  readonly assets: readonly AssetAmount[];
}

/**
 * What a vault, and anything reporting on it, needs from its strategy.
 */
export interface VaultStrategy {
  readonly address: Address;
  readonly vault: Address;
  readonly retired: boolean;
  totalAssets(): bigint;
  holdingAssets(): readonly AssetId[];
  reserves(asset: AssetId): bigint;
  assetValue(asset: AssetId, amount: bigint): bigint;
  deposit(msg: Msg, asset: AssetId, amount: bigint, sellForSettlement: boolean): bigint;
  withdraw(msg: Msg, shareAmount: bigint, totalSupply: bigint, recipient: Address): WithdrawalResult;
  migrateFunds(msg: Msg, newStrategy: Address): MigrationManifest;
  acceptMigration(msg: Msg, prevStrategy: VaultStrategy): void;
  migrationManifest(): MigrationManifest | undefined;
}
