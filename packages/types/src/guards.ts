/**
 * Runtime Type Guards
 *
 * Narrowing functions for identifiers and amounts arriving at system
 * boundaries (API inputs, configuration, deserialized fixtures).
 */

import { NATIVE_COIN, ZERO_ADDRESS } from "./asset.js";
import type { Address, AssetAmount, AssetId } from "./asset.js";
import { ProtocolError } from "./errors.js";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isZeroAddress(value: Address): boolean {
  return value === "" || value.toLowerCase() === ZERO_ADDRESS;
}

export function isNativeCoin(asset: AssetId): boolean {
  return asset.toLowerCase() === NATIVE_COIN.toLowerCase();
}

export function isAssetAmount(value: unknown): value is AssetAmount {
  if (value === null || typeof value !== "object") return false;
  if (!("asset" in value) || !("amount" in value)) return false;
  const { asset, amount } = value;
  return (
    typeof asset === "string" &&
    asset.length > 0 &&
    typeof amount === "bigint" &&
    amount >= 0n
  );
}

/**
 * Throw ZERO_ADDRESS when `value` is empty or the zero address.
 */
export function assertNonZeroAddress(value: Address, what: string): void {
  if (isZeroAddress(value)) {
    throw new ProtocolError("ZERO_ADDRESS", `${what} cannot be the zero address`);
  }
}
