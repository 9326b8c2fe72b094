/**
 * @yieldmesh/strategy: Strategy accounting and swap routing.
 *
 * - Strategy: reserve ledger, deposit gating, proportional withdrawal,
 *   manager swaps, migration
 * - Swapper bindings: enabled and default routes per asset pair
 * - Capability interfaces (Swapper, Registry, AssetWrapper, Valuation)
 *   and in-process adapters implementing them
 */

// Strategy
export { Strategy } from "./strategy.js";
export { SwapperBindings } from "./swapper-bindings.js";
export { RECEIPT_DUST_FLOOR } from "./constants.js";

// Adapters
export { FixedRateSwapper } from "./adapters/fixed-rate-swapper.js";
export type { FixedRateSwapperParams } from "./adapters/fixed-rate-swapper.js";
export { ReceiptRegistry } from "./adapters/receipt-registry.js";
export type { ReceiptRegistryParams } from "./adapters/receipt-registry.js";
export { RateWrapper } from "./adapters/rate-wrapper.js";
export type { RateWrapperParams } from "./adapters/rate-wrapper.js";
export { RateOracle, MutableRate, AccruingRate, fixedRate } from "./adapters/rate-oracle.js";
export type { RateFeed, Clock, AccruingRateOptions } from "./adapters/rate-oracle.js";

// Types
export type {
  Swapper,
  Registry,
  AssetWrapper,
  Valuation,
  ValueSource,
  UnderlyingAssetConfig,
  StrategyParams,
  WithdrawalResult,
  MigrationManifest,
  VaultStrategy,
} from "./types.js";
