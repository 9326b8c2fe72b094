/**
 * @yieldmesh/chain: Token Book.
 *
 * Balances of every fungible asset (native coin included) for every
 * address. Stands in for the token contracts themselves; allowances are
 * not modelled, a transfer is executed on behalf of `from` by whoever
 * holds the call.
 *
 * Rules:
 * - Balances never go negative (INSUFFICIENT_BALANCE)
 * - Nothing is ever transferred to the zero address
 * - Supply changes only through mint() and burn()
 */

import { ProtocolError, assertNonZeroAddress } from "@yieldmesh/types";
import type { Address, AssetId, AssetInfo } from "@yieldmesh/types";
import type { Journaled, Restore } from "./types.js";

export class TokenBook implements Journaled {
  private _balances: Map<AssetId, Map<Address, bigint>> = new Map();
  private _supply: Map<AssetId, bigint> = new Map();
  private readonly _info: Map<AssetId, AssetInfo> = new Map();

  // ─── Metadata ────────────────────────────────────────────────────────

  register(info: AssetInfo): AssetInfo {
    const existing = this._info.get(info.id);
    if (existing !== undefined) {
      return existing;
    }
    this._info.set(info.id, info);
    return info;
  }

  info(asset: AssetId): AssetInfo | undefined {
    return this._info.get(asset);
  }

  listAssets(): readonly AssetInfo[] {
    return [...this._info.values()];
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(asset: AssetId, holder: Address): bigint {
    return this._balances.get(asset)?.get(holder) ?? 0n;
  }

  totalSupply(asset: AssetId): bigint {
    return this._supply.get(asset) ?? 0n;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  mint(asset: AssetId, to: Address, amount: bigint): void {
    assertNonZeroAddress(to, "mint recipient");
    assertNonNegative(amount);
    this.setBalance(asset, to, this.balanceOf(asset, to) + amount);
    this._supply.set(asset, this.totalSupply(asset) + amount);
  }

  burn(asset: AssetId, from: Address, amount: bigint): void {
    assertNonNegative(amount);
    this.debit(asset, from, amount);
    this._supply.set(asset, this.totalSupply(asset) - amount);
  }

  transfer(asset: AssetId, from: Address, to: Address, amount: bigint): void {
    assertNonZeroAddress(to, "transfer recipient");
    assertNonNegative(amount);
    this.debit(asset, from, amount);
    this.setBalance(asset, to, this.balanceOf(asset, to) + amount);
  }

  // ─── Journal ─────────────────────────────────────────────────────────

  checkpoint(): Restore {
    const balances = new Map(
      [...this._balances].map(([asset, holders]) => [asset, new Map(holders)] as const),
    );
    const supply = new Map(this._supply);
    return () => {
      this._balances = balances;
      this._supply = supply;
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private debit(asset: AssetId, from: Address, amount: bigint): void {
    const balance = this.balanceOf(asset, from);
    if (amount > balance) {
      const symbol = this._info.get(asset)?.symbol ?? asset;
      throw new ProtocolError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${balance.toString()} ${symbol}, needs ${amount.toString()}`,
      );
    }
    this.setBalance(asset, from, balance - amount);
  }

  private setBalance(asset: AssetId, holder: Address, amount: bigint): void {
    let holders = this._balances.get(asset);
    if (holders === undefined) {
      holders = new Map();
      this._balances.set(asset, holders);
    }
    holders.set(holder, amount);
  }
}

function assertNonNegative(amount: bigint): void {
  if (amount < 0n) {
    throw new ProtocolError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount.toString()}`);
  }
}
