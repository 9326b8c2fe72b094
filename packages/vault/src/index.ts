/**
 * @yieldmesh/vault: Share issuance and lock-up.
 *
 * - Vault: multi-asset deposits priced against a strategy's value
 * - SingleAssetVault: one-asset sibling vault redeemed in native coin
 * - deployReferenceVault: complete wiring on an in-process chain
 */

export { Vault } from "./vault.js";
export { SingleAssetVault } from "./single-asset-vault.js";
export { LockUpBook } from "./lock-up.js";
export { deployReferenceVault, DEFAULT_OWNER, DEFAULT_MANAGER } from "./deployment.js";
export type { ReferenceOptions, ReferenceAssets, ReferenceDeployment } from "./deployment.js";

export type {
  VaultParams,
  VaultPosition,
  SingleAssetVaultParams,
  SiblingHoldings,
} from "./types.js";
