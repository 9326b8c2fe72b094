/**
 * @yieldmesh/ledger: Types for the reserve ledger.
 *
 * Rules:
 * - All types are readonly
 * - Entries are never deleted, only driven to zero
 */

import type { AssetId } from "@yieldmesh/types";

/**
 * Accounted quantity of one asset.
 */
export interface ReserveEntry {
  readonly asset: AssetId;
  readonly amount: bigint;
}

/**
 * Serializable copy of a ledger, in first-touch order.
 */
export interface ReserveSnapshot {
  readonly version: 1;
  readonly entries: readonly ReserveEntry[];
}
