/**
 * Swapper Bindings: which swappers may be used for which asset pair.
 *
 * Two tables:
 * - enabled: (tokenIn, tokenOut) → ordered set of swapper addresses
 *   (any of them may be picked by the manager for a manual swap)
 * - default: (tokenIn, tokenOut) → the one swapper used for unattended
 *   routing during deposits and withdrawals
 *
 * Rules:
 * - A default must be enabled for its pair (NOT_SUPPORTED_SWAPPER)
 * - The current default cannot be removed (SET_DEFAULT_SWAPPER_BEFORE)
 */

import { ProtocolError } from "@yieldmesh/types";
import type { Address, AssetId } from "@yieldmesh/types";
import { OrderedSet } from "@yieldmesh/ledger";
import type { Swapper } from "./types.js";

function pairKey(tokenIn: AssetId, tokenOut: AssetId): string {
  return `${tokenIn}->${tokenOut}`;
}

export class SwapperBindings {
  private readonly _enabled: Map<string, OrderedSet<Address>> = new Map();
  private readonly _defaults: Map<string, Address> = new Map();
  private readonly _swappers: Map<Address, Swapper> = new Map();

  // ───────────────────────────────────────────────────────────────────────
  // Writes
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Enable `swapper` for the pair. Returns false if it already was.
   */
  add(tokenIn: AssetId, tokenOut: AssetId, swapper: Swapper): boolean {
    this._swappers.set(swapper.address, swapper);
    const key = pairKey(tokenIn, tokenOut);
    let set = this._enabled.get(key);
    if (set === undefined) {
      set = new OrderedSet();
      this._enabled.set(key, set);
    }
    return set.add(swapper.address);
  }

  remove(tokenIn: AssetId, tokenOut: AssetId, swapper: Address): void {
    const key = pairKey(tokenIn, tokenOut);
    if (this._defaults.get(key) === swapper) {
      throw new ProtocolError(
        "SET_DEFAULT_SWAPPER_BEFORE",
        `${swapper} is the default route ${key}; set another default first`,
      );
    }
    if (this._enabled.get(key)?.remove(swapper) !== true) {
      throw new ProtocolError("NOT_SUPPORTED_SWAPPER", `${swapper} is not enabled for ${key}`);
    }
  }

  setDefault(tokenIn: AssetId, tokenOut: AssetId, swapper: Address): void {
    if (!this.isEnabled(tokenIn, tokenOut, swapper)) {
      throw new ProtocolError(
        "NOT_SUPPORTED_SWAPPER",
        `${swapper} is not enabled for ${pairKey(tokenIn, tokenOut)}`,
      );
    }
    this._defaults.set(pairKey(tokenIn, tokenOut), swapper);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  isEnabled(tokenIn: AssetId, tokenOut: AssetId, swapper: Address): boolean {
    return this._enabled.get(pairKey(tokenIn, tokenOut))?.has(swapper) ?? false;
  }

  enabled(tokenIn: AssetId, tokenOut: AssetId): readonly Address[] {
    return this._enabled.get(pairKey(tokenIn, tokenOut))?.values() ?? [];
  }

  defaultAddress(tokenIn: AssetId, tokenOut: AssetId): Address | undefined {
    return this._defaults.get(pairKey(tokenIn, tokenOut));
  }

  defaultFor(tokenIn: AssetId, tokenOut: AssetId): Swapper | undefined {
    const address = this.defaultAddress(tokenIn, tokenOut);
    return address === undefined ? undefined : this._swappers.get(address);
  }

  resolve(swapper: Address): Swapper | undefined {
    return this._swappers.get(swapper);
  }

  clone(): SwapperBindings {
    const copy = new SwapperBindings();
    for (const [key, set] of this._enabled) {
      copy._enabled.set(key, set.clone());
    }
    for (const [key, address] of this._defaults) {
      copy._defaults.set(key, address);
    }
    for (const [address, swapper] of this._swappers) {
      copy._swappers.set(address, swapper);
    }
    return copy;
  }
}
