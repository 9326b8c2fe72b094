/**
 * @yieldmesh/types: Shared domain types for the YieldMesh stack.
 *
 * These types are used across all YieldMesh packages:
 * - Asset and account identifiers
 * - Call context (sender, attached native coin)
 * - The protocol error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are bigint base units
 */

// Asset types
export type { Address, AssetId, AssetInfo, AssetAmount } from "./asset.js";
export { NATIVE_COIN, ZERO_ADDRESS, WAD } from "./asset.js";

// Call context
export type { Msg } from "./call.js";

// Errors
export type { ProtocolErrorCode } from "./errors.js";
export { ProtocolError, isProtocolError } from "./errors.js";

// Runtime type guards
export {
  isAddress,
  isZeroAddress,
  isNativeCoin,
  isAssetAmount,
  assertNonZeroAddress,
} from "./guards.js";
