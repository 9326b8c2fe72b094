/**
 * Single-Asset Vault: sibling vault over one asset, redeemed in native coin.
 *
 * Deposits of the held asset mint shares against the accounted
 * `heldAsset + heldNative` total at 1:1 nominal value. Withdrawals pay
 * native coin only, so they depend on native liquidity brought in by
 * swapNativeForAsset(): anyone may hand in native coin and take the held
 * asset at 1:1. The same exchange is exposed as a Swapper for the single
 * pair native coin → held asset, which lets a strategy route native
 * deposits through it.
 *
 * Rules:
 * - Balances are accounted, never read from the token book
 * - Withdrawal without enough accounted native coin → FAILED_TO_SEND_ETH
 * - Exchange without enough held asset → INSUFFICIENT_LIQUIDITY
 */

import { Contract } from "@yieldmesh/chain";
import type { Chain, Restore } from "@yieldmesh/chain";
import { mulDiv } from "@yieldmesh/ledger";
import type { Swapper } from "@yieldmesh/strategy";
import { NATIVE_COIN, ProtocolError, assertNonZeroAddress, isNativeCoin } from "@yieldmesh/types";
import type { Address, AssetId, Msg } from "@yieldmesh/types";
import { LockUpBook } from "./lock-up.js";
import type { SiblingHoldings, SingleAssetVaultParams } from "./types.js";

export class SingleAssetVault extends Contract implements Swapper {
  readonly owner: Address;
  readonly heldAsset: AssetId;
  private _minDepositAmount: bigint;
  private _locks: LockUpBook;
  private _holdings: SiblingHoldings = { heldAsset: 0n, heldNative: 0n };

  constructor(chain: Chain, params: SingleAssetVaultParams) {
    super(chain, params.address);
    assertNonZeroAddress(params.owner, "owner");
    assertNonZeroAddress(params.heldAsset, "held asset");
    if (isNativeCoin(params.heldAsset)) {
      throw new ProtocolError("UNKNOWN_ASSET", "The held asset cannot be the native coin");
    }
    this.owner = params.owner;
    this.heldAsset = params.heldAsset;
    this._minDepositAmount = params.minDepositAmount;
    this._locks = new LockUpBook(params.minLockUpPeriod);
    chain.tokens.register({
      id: this.address,
      symbol: params.shareSymbol ?? "ymSINGLE",
      decimals: 18,
    });
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get shareAsset(): AssetId {
    return this.address;
  }

  get minDepositAmount(): bigint {
    return this._minDepositAmount;
  }

  get minLockUpPeriod(): number {
    return this._locks.period;
  }

  holdings(): SiblingHoldings {
    return this._holdings;
  }

  totalAssets(): bigint {
    return this._holdings.heldAsset + this._holdings.heldNative;
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

  convertToAssets(shares: bigint): bigint {
    const supply = this.totalSupply();
    if (supply === 0n) {
      return shares;
    }
    return mulDiv(shares, this.totalAssets(), supply);
  }

  // ─── Deposit / Withdraw ──────────────────────────────────────────────

  deposit(msg: Msg, amount: bigint): bigint {
    return this.nonReentrant(() => {
      this.rejectValue(msg);
      if (amount < this._minDepositAmount || amount === 0n) {
        throw new ProtocolError(
          "TOO_SMALL",
          `Deposit of ${amount.toString()} is below the minimum ${this._minDepositAmount.toString()}`,
        );
      }

      const supply = this.totalSupply();
      const total = this.totalAssets();
      const shares = supply === 0n || total === 0n ? amount : mulDiv(amount, supply, total);
      if (shares === 0n) {
        throw new ProtocolError("TOO_SMALL", `Deposit of ${amount.toString()} would mint zero shares`);
      }

      this.chain.tokens.transfer(this.heldAsset, msg.sender, this.address, amount);
      this._holdings = { ...this._holdings, heldAsset: this._holdings.heldAsset + amount };
      this.chain.tokens.mint(this.shareAsset, msg.sender, shares);
      this._locks.refresh(msg.sender, this.chain.now());
      return shares;
    });
  }

  /**
   * Redeem `shares` for native coin. Returns the native amount paid.
   */
  withdraw(msg: Msg, shares: bigint, recipient: Address = msg.sender): bigint {
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

      const amount = mulDiv(shares, this.totalAssets(), this.totalSupply());
      if (amount > this._holdings.heldNative) {
        throw new ProtocolError(
          "FAILED_TO_SEND_ETH",
          `Withdrawal of ${amount.toString()} exceeds native liquidity ${this._holdings.heldNative.toString()}`,
        );
      }

      this.chain.tokens.burn(this.shareAsset, msg.sender, shares);
      this._holdings = { ...this._holdings, heldNative: this._holdings.heldNative - amount };
      this.chain.sendValueOrRevert(this.address, recipient, amount);
      return amount;
    });
  }

  // ─── Exchange ────────────────────────────────────────────────────────

  /**
   * Pay `msg.value` of the held asset for the attached native coin.
   */
  swapNativeForAsset(msg: Msg): bigint {
    return this.nonReentrant(() => this.exchange(msg));
  }

  swap(
    msg: Msg,
    tokenIn: AssetId,
    amountIn: bigint,
    tokenOut: AssetId,
    minAmountOut: bigint,
  ): bigint {
    return this.nonReentrant(() => {
      if (!isNativeCoin(tokenIn) || tokenOut !== this.heldAsset) {
        throw new ProtocolError(
          "NOT_SUPPORTED_SWAPPER",
          `Only ${NATIVE_COIN} -> ${this.heldAsset} is supported`,
        );
      }
      if ((msg.value ?? 0n) !== amountIn) {
        throw new ProtocolError(
          "INVALID_AMOUNT",
          `Native swap of ${amountIn.toString()} sent ${(msg.value ?? 0n).toString()}`,
        );
      }
      if (amountIn < minAmountOut) {
        throw new ProtocolError(
          "SLIPPAGE_EXCEEDED",
          `Swap returns ${amountIn.toString()}, minimum is ${minAmountOut.toString()}`,
        );
      }
      return this.exchange(msg);
    });
  }

  // ─── Administration ──────────────────────────────────────────────────

  setMinDepositAmount(msg: Msg, amount: bigint): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      if (amount < 0n) {
        throw new ProtocolError("INVALID_AMOUNT", "Minimum deposit must be non-negative");
      }
      this._minDepositAmount = amount;
    });
  }

  setMinLockUpPeriod(msg: Msg, seconds: number): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      this._locks.setPeriod(seconds);
    });
  }

  checkpoint(): Restore {
    const holdings = this._holdings;
    const minDeposit = this._minDepositAmount;
    const locks = this._locks.clone();
    return () => {
      this._holdings = holdings;
      this._minDepositAmount = minDeposit;
      this._locks = locks;
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private exchange(msg: Msg): bigint {
    const value = msg.value ?? 0n;
    if (value === 0n) {
      throw new ProtocolError("INVALID_AMOUNT", "Attach native coin to exchange");
    }
    if (value > this._holdings.heldAsset) {
      throw new ProtocolError(
        "INSUFFICIENT_LIQUIDITY",
        `Vault holds ${this._holdings.heldAsset.toString()} of ${this.heldAsset}, needs ${value.toString()}`,
      );
    }

    this.collectValue(msg);
    this._holdings = {
      heldAsset: this._holdings.heldAsset - value,
      heldNative: this._holdings.heldNative + value,
    };
    this.chain.tokens.transfer(this.heldAsset, this.address, msg.sender, value);
    return value;
  }

  private onlyOwner(msg: Msg): void {
    if (msg.sender !== this.owner) {
      throw new ProtocolError("UNAUTHORIZED", `${msg.sender} is not the owner`);
    }
  }
}
