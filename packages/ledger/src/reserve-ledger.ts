/**
 * @yieldmesh/ledger: Reserve Ledger.
 *
 * Per-asset accounted balance held by a strategy. This is the ground
 * truth for every proportional calculation; it is deliberately independent
 * of the live token balance, so tokens sent straight to the holder's
 * address (donations) are invisible here.
 *
 * API surface:
 * - reserveOf(): Accounted quantity (0 for an untouched asset)
 * - credit() / debit(): The only write operations
 * - entries(): All touched assets in first-touch order
 * - snapshot() / fromSnapshot() / restore()
 */

import { ProtocolError } from "@yieldmesh/types";
import type { AssetId } from "@yieldmesh/types";
import type { ReserveEntry, ReserveSnapshot } from "./types.js";

export class ReserveLedger {
  private readonly _reserves: Map<AssetId, bigint> = new Map();

  reserveOf(asset: AssetId): bigint {
    return this._reserves.get(asset) ?? 0n;
  }

  /**
   * Increase the reserve of `asset`. Returns the new reserve.
   */
  credit(asset: AssetId, amount: bigint): bigint {
    assertNonNegative(asset, amount);
    const next = this.reserveOf(asset) + amount;
    this._reserves.set(asset, next);
    return next;
  }

  /**
   * Decrease the reserve of `asset`. Fails rather than going negative.
   */
  debit(asset: AssetId, amount: bigint): bigint {
    assertNonNegative(asset, amount);
    const current = this.reserveOf(asset);
    if (amount > current) {
      throw new ProtocolError(
        "INSUFFICIENT_RESERVE",
        `Cannot debit ${amount.toString()} of ${asset}: reserve is ${current.toString()}`,
      );
    }
    const next = current - amount;
    this._reserves.set(asset, next);
    return next;
  }

  entries(): readonly ReserveEntry[] {
    return [...this._reserves].map(([asset, amount]) => ({ asset, amount }));
  }

  snapshot(): ReserveSnapshot {
    return { version: 1, entries: this.entries() };
  }

  /**
   * Replace the whole ledger with the contents of `snapshot`.
   */
  restore(snapshot: ReserveSnapshot): void {
    this._reserves.clear();
    for (const entry of snapshot.entries) {
      this._reserves.set(entry.asset, entry.amount);
    }
  }

  static fromSnapshot(snapshot: ReserveSnapshot): ReserveLedger {
    const ledger = new ReserveLedger();
    ledger.restore(snapshot);
    return ledger;
  }
}

function assertNonNegative(asset: AssetId, amount: bigint): void {
  if (amount < 0n) {
    throw new ProtocolError(
      "INVALID_AMOUNT",
      `Reserve movements must be non-negative. Got ${amount.toString()} for ${asset}`,
    );
  }
}
