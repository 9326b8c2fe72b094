/**
 * Vault: share issuance and lock-up over a pluggable strategy.
 *
 * Users deposit any asset the strategy accepts and receive shares priced
 * against the strategy's settlement-equivalent value. Shares are the
 * token whose id is the vault's own address.
 *
 * Lifecycle:
 *   deposit → (lock-up) → withdraw
 *   setStrategy (once) → migrateStrategy (any number of times)
 *
 * Rules:
 * - Shares are priced against totalAssets measured BEFORE the deposit
 * - The deposit's value is the measured change in totalAssets, never the
 *   nominal amount sent
 * - No virtual-share offset: the minimum deposit is the only inflation guard
 * - Withdraw burns first, then asks the strategy to pay out against the
 *   pre-burn supply
 */

import { Contract } from "@yieldmesh/chain";
import type { Chain, Restore } from "@yieldmesh/chain";
import { mulDiv } from "@yieldmesh/ledger";
import type { VaultStrategy, WithdrawalResult } from "@yieldmesh/strategy";
import { ProtocolError, WAD, assertNonZeroAddress, isNativeCoin } from "@yieldmesh/types";
import type { Address, AssetId, Msg } from "@yieldmesh/types";
import { LockUpBook } from "./lock-up.js";
import type { VaultParams, VaultPosition } from "./types.js";

// =============================================================================
// Vault
// =============================================================================

export class Vault extends Contract {
  readonly owner: Address;
  private _strategy: VaultStrategy | undefined;
  private _locks: LockUpBook;

  constructor(chain: Chain, params: VaultParams) {
    super(chain, params.address);
    assertNonZeroAddress(params.owner, "owner");
    this.owner = params.owner;
    this._locks = new LockUpBook(params.minLockUpPeriod);
    chain.tokens.register({
      id: this.address,
      symbol: params.shareSymbol ?? "ymSHARE",
      decimals: 18,
    });
  }

  /** The share token id */
  get shareAsset(): AssetId {
    return this.address;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  get strategy(): VaultStrategy | undefined {
    return this._strategy;
  }

  get minLockUpPeriod(): number {
    return this._locks.period;
  }

  totalAssets(): bigint {
    return this._strategy?.totalAssets() ?? 0n;
  }

  totalSupply(): bigint {
    return this.chain.tokens.totalSupply(this.shareAsset);
  }

  balanceOf(holder: Address): bigint {
    return this.chain.tokens.balanceOf(this.shareAsset, holder);
  }

  lockedUntil(holder: Address): number {
    return this._locks.lockedUntil(holder);
  }

  /**
   * Settlement value per share, WAD-scaled. 1e18 for an empty vault.
   */
  sharePrice(): bigint {
    const supply = this.totalSupply();
    if (supply === 0n) {
      return WAD;
    }
    return mulDiv(this.totalAssets(), WAD, supply);
  }

  convertToAssets(shares: bigint): bigint {
    const supply = this.totalSupply();
    if (supply === 0n) {
      return shares;
    }
    return mulDiv(shares, this.totalAssets(), supply);
  }

  position(holder: Address): VaultPosition {
    const shares = this.balanceOf(holder);
    return {
      holder,
      shares,
      assets: this.convertToAssets(shares),
      lockedUntil: this.lockedUntil(holder),
      withdrawable: shares > 0n && this._locks.isUnlocked(holder, this.chain.now()),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposit / Withdraw
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Deposit `amount` of `asset` and mint shares to the caller.
   * Native coin must be attached as `msg.value`. Returns shares minted.
   */
  deposit(msg: Msg, asset: AssetId, amount: bigint, sellForSettlement = false): bigint {
    return this.nonReentrant(() => {
      const strategy = this.requireStrategy();
      if (amount <= 0n) {
        throw new ProtocolError("TOO_SMALL", "Deposit amount must be positive");
      }

      if (isNativeCoin(asset)) {
        if ((msg.value ?? 0n) !== amount) {
          throw new ProtocolError(
            "INVALID_AMOUNT",
            `Native deposit of ${amount.toString()} sent ${(msg.value ?? 0n).toString()}`,
          );
        }
        this.collectValue(msg);
        this.chain.sendValueOrRevert(this.address, strategy.address, amount);
      } else {
        this.rejectValue(msg);
        this.chain.tokens.transfer(asset, msg.sender, strategy.address, amount);
      }

      const supply = this.totalSupply();
      const before = strategy.totalAssets();
      strategy.deposit({ sender: this.address }, asset, amount, sellForSettlement);
      const after = strategy.totalAssets();
      const depositValue = after > before ? after - before : 0n;

      let shares: bigint;
      if (supply === 0n) {
        shares = depositValue;
      } else if (before === 0n) {
        throw new ProtocolError(
          "VAULT_INSOLVENT",
          `${supply.toString()} shares outstanding against zero assets`,
        );
      } else {
        shares = mulDiv(depositValue, supply, before);
      }

      if (shares === 0n) {
        throw new ProtocolError(
          "TOO_SMALL",
          `Deposit worth ${depositValue.toString()} would mint zero shares`,
        );
      }

      this.chain.tokens.mint(this.shareAsset, msg.sender, shares);
      this._locks.refresh(msg.sender, this.chain.now());
      return shares;
    });
  }

  /**
   * Redeem `shares` of the caller's position, paid to `recipient`
   * (the caller by default).
   */
  withdraw(msg: Msg, shares: bigint, recipient: Address = msg.sender): WithdrawalResult {
    return this.nonReentrant(() => {
      this.rejectValue(msg);
      if (shares <= 0n) {
        throw new ProtocolError("TOO_SMALL", "Cannot withdraw zero shares");
      }
      assertNonZeroAddress(recipient, "recipient");
      this._locks.assertUnlocked(msg.sender, this.chain.now());

      const balance = this.balanceOf(msg.sender);
      if (shares > balance) {
        throw new ProtocolError(
          "INSUFFICIENT_SHARES",
          `${msg.sender} holds ${balance.toString()} shares, tried to redeem ${shares.toString()}`,
        );
      }
      const strategy = this.requireStrategy();

      const supply = this.totalSupply();
      this.chain.tokens.burn(this.shareAsset, msg.sender, shares);
      return strategy.withdraw({ sender: this.address }, shares, supply, recipient);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Initial wiring. A vault that already has a strategy moves funds with
   * migrateStrategy() instead.
   */
  setStrategy(msg: Msg, strategy: VaultStrategy): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      if (this._strategy !== undefined) {
        throw new ProtocolError(
          "INVALID_STRATEGY",
          `Strategy already set to ${this._strategy.address}; use migrateStrategy`,
        );
      }
      this.assertServesThisVault(strategy);
      this._strategy = strategy;
    });
  }

  /**
   * Point the vault at `next` and move every reserve across in one call.
   */
  migrateStrategy(msg: Msg, next: VaultStrategy): void {
    this.nonReentrant(() => {
      this.onlyOwner(msg);
      const prev = this.requireStrategy();
      this.assertServesThisVault(next);
      if (next.address === prev.address) {
        throw new ProtocolError("INVALID_STRATEGY", `${next.address} is already the strategy`);
      }

      this._strategy = next;
      prev.migrateFunds({ sender: this.address }, next.address);
      next.acceptMigration({ sender: this.address }, prev);
    });
  }

  setMinLockUpPeriod(msg: Msg, seconds: number): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      this._locks.setPeriod(seconds);
    });
  }

  checkpoint(): Restore {
    const strategy = this._strategy;
    const locks = this._locks.clone();
    return () => {
      this._strategy = strategy;
      this._locks = locks;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checks
  // ───────────────────────────────────────────────────────────────────────

  private onlyOwner(msg: Msg): void {
    if (msg.sender !== this.owner) {
      throw new ProtocolError("UNAUTHORIZED", `${msg.sender} is not the owner`);
    }
  }

  private requireStrategy(): VaultStrategy {
    if (this._strategy === undefined) {
      throw new ProtocolError("INVALID_STRATEGY", "Vault has no strategy");
    }
    return this._strategy;
  }

  private assertServesThisVault(strategy: VaultStrategy): void {
    if (strategy.vault !== this.address) {
      throw new ProtocolError(
        "INVALID_STRATEGY",
        `${strategy.address} serves ${strategy.vault}, not ${this.address}`,
      );
    }
    if (strategy.retired) {
      throw new ProtocolError("STRATEGY_RETIRED", `${strategy.address} has been retired`);
    }
  }
}
