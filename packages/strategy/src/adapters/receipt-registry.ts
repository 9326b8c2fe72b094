/**
 * Receipt Registry: pooled staking custodian.
 *
 * Takes the settlement asset, mints a receipt token against a pooled
 * balance, and redeems receipts for their pro-rata share of the pool.
 * Rewards added to the pool raise the receipt's value for every holder.
 *
 * Rules:
 * - Receipt minted = amount * receiptSupply / pooled (1:1 for an empty pool)
 * - Redemption pays floor(amount * pooled / receiptSupply)
 * - Settlement sent straight to the registry address is not pooled
 * - While withdrawals are paused, canWithdraw() is false for everyone
 */

import { Contract } from "@yieldmesh/chain";
import type { Chain, Restore } from "@yieldmesh/chain";
import { mulDiv } from "@yieldmesh/ledger";
import { ProtocolError, WAD, assertNonZeroAddress } from "@yieldmesh/types";
import type { Address, AssetId, Msg } from "@yieldmesh/types";
import type { Registry, ValueSource } from "../types.js";

export interface ReceiptRegistryParams {
  readonly owner: Address;
  readonly settlementAsset: AssetId;
  readonly receiptAsset: AssetId;
  readonly address?: Address | undefined;
}

export class ReceiptRegistry extends Contract implements Registry, ValueSource {
  readonly owner: Address;
  readonly settlementAsset: AssetId;
  readonly receiptAsset: AssetId;
  private _pooled = 0n;
  private _withdrawalsPaused = false;

  constructor(chain: Chain, params: ReceiptRegistryParams) {
    super(chain, params.address);
    assertNonZeroAddress(params.owner, "owner");
    this.owner = params.owner;
    this.settlementAsset = params.settlementAsset;
    this.receiptAsset = params.receiptAsset;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get pooled(): bigint {
    return this._pooled;
  }

  get withdrawalsPaused(): boolean {
    return this._withdrawalsPaused;
  }

  receiptSupply(): bigint {
    return this.chain.tokens.totalSupply(this.receiptAsset);
  }

  /**
   * Settlement value of `amount` receipt.
   */
  settlementValue(amount: bigint): bigint {
    const supply = this.receiptSupply();
    if (supply === 0n) {
      return amount;
    }
    return mulDiv(amount, this._pooled, supply);
  }

  /**
   * Settlement per receipt, WAD-scaled.
   */
  rate(): bigint {
    return this.settlementValue(WAD);
  }

  canWithdraw(owner: Address, amount: bigint): boolean {
    return !this._withdrawalsPaused && this.chain.tokens.balanceOf(this.receiptAsset, owner) >= amount;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  deposit(msg: Msg, owner: Address, amount: bigint): void {
    this.nonReentrant(() => {
      this.rejectValue(msg);
      assertNonZeroAddress(owner, "receipt owner");
      if (amount <= 0n) {
        throw new ProtocolError("INVALID_AMOUNT", "Registry deposit must be positive");
      }

      const supply = this.receiptSupply();
      const minted = supply === 0n || this._pooled === 0n ? amount : mulDiv(amount, supply, this._pooled);

      this.chain.tokens.transfer(this.settlementAsset, msg.sender, this.address, amount);
      this._pooled += amount;
      this.chain.tokens.mint(this.receiptAsset, owner, minted);
    });
  }

  withdraw(msg: Msg, recipient: Address, amount: bigint): bigint {
    return this.nonReentrant(() => {
      this.rejectValue(msg);
      assertNonZeroAddress(recipient, "recipient");
      if (this._withdrawalsPaused) {
        throw new ProtocolError("REGISTRY_WITHDRAW_BLOCKED", "Registry withdrawals are paused");
      }

      const proceeds = this.settlementValue(amount);
      this.chain.tokens.burn(this.receiptAsset, msg.sender, amount);
      this._pooled -= proceeds;
      this.chain.tokens.transfer(this.settlementAsset, this.address, recipient, proceeds);
      return proceeds;
    });
  }

  /**
   * Pull `amount` of settlement from the caller into the pool.
   */
  distributeRewards(msg: Msg, amount: bigint): void {
    this.atomic(() => {
      if (amount <= 0n) {
        throw new ProtocolError("INVALID_AMOUNT", "Reward must be positive");
      }
      if (this.receiptSupply() === 0n) {
        throw new ProtocolError("INVALID_AMOUNT", "No receipts outstanding to reward");
      }
      this.chain.tokens.transfer(this.settlementAsset, msg.sender, this.address, amount);
      this._pooled += amount;
    });
  }

  setWithdrawalsPaused(msg: Msg, paused: boolean): void {
    this.atomic(() => {
      if (msg.sender !== this.owner) {
        throw new ProtocolError("UNAUTHORIZED", `${msg.sender} is not the owner`);
      }
      this._withdrawalsPaused = paused;
    });
  }

  checkpoint(): Restore {
    const pooled = this._pooled;
    const paused = this._withdrawalsPaused;
    return () => {
      this._pooled = pooled;
      this._withdrawalsPaused = paused;
    };
  }
}
