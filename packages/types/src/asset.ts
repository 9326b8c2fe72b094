/**
 * Asset Types
 *
 * Identifiers for accounts, contracts and fungible assets.
 *
 * Rules:
 * - Amounts are bigint base units, never floating point
 * - The native coin is addressed through a sentinel, not a token contract
 * - The zero address is never a valid owner, recipient or target
 */

/**
 * Account or contract identifier (e.g., "0x00000000000000000000000000000000000000a1").
 */
export type Address = string;

/**
 * Fungible asset identifier. Token assets use their contract address;
 * the native coin uses {@link NATIVE_COIN}.
 */
export type AssetId = string;

/**
 * Sentinel identifying the chain's native coin.
 */
export const NATIVE_COIN: AssetId = "0xEeeeeEeeeEeEeEeEeEeeEEEeeeeEeeeeeeeEEeE";

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/** 1e18, the fixed-point unit for rates and share prices. */
export const WAD = 10n ** 18n;

/**
 * Static metadata for an asset registered in the token book.
 */
export interface AssetInfo {
  readonly id: AssetId;
  readonly symbol: string;
  readonly decimals: number;
}

/**
 * A quantity of a specific asset.
 */
export interface AssetAmount {
  readonly asset: AssetId;
  readonly amount: bigint;
}
