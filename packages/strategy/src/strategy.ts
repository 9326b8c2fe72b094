/**
 * Strategy: reserve accounting and swap routing for one vault.
 *
 * Holds every asset the vault has taken in, keeps a per-asset reserve
 * ledger independent of live token balances, and routes value between
 * assets through bound swappers and the settlement registry.
 *
 * Vault-facing surface:
 * - deposit(): Canonicalize, credit, gate, forward settlement to the registry
 * - withdraw(): Pay out a proportional slice of every holding asset
 * - migrateFunds() / acceptMigration(): Hand the whole book to a successor
 * - totalAssets(): Settlement-equivalent value of all reserves
 *
 * Rules:
 * - Role checks run first and fail with UNAUTHORIZED
 * - Every mutating entry point is atomic and re-entrancy guarded
 * - Unattended swaps use the default route with NO minimum output;
 *   only manager-directed swaps carry slippage protection
 * - Registry redemptions debit the receipt by the requested amount but
 *   credit the settlement by what actually arrived (residual drift is
 *   not reconciled)
 */

import { Contract } from "@yieldmesh/chain";
import type { Chain, Restore } from "@yieldmesh/chain";
import { OrderedSet, ReserveLedger, mulDiv } from "@yieldmesh/ledger";
import {
  NATIVE_COIN,
  ProtocolError,
  assertNonZeroAddress,
  isNativeCoin,
} from "@yieldmesh/types";
import type { Address, AssetAmount, AssetId, Msg } from "@yieldmesh/types";
import { RECEIPT_DUST_FLOOR } from "./constants.js";
import { SwapperBindings } from "./swapper-bindings.js";
import type {
  AssetWrapper,
  MigrationManifest,
  Registry,
  StrategyParams,
  Swapper,
  UnderlyingAssetConfig,
  Valuation,
  VaultStrategy,
  WithdrawalResult,
} from "./types.js";

// =============================================================================
// Strategy
// =============================================================================

export class Strategy extends Contract implements VaultStrategy {
  readonly owner: Address;
  readonly vault: Address;
  readonly settlementAsset: AssetId;
  readonly receiptAsset: AssetId;
  private readonly registry: Registry;
  private readonly valuation: Valuation;
  private readonly wrappers: ReadonlyMap<AssetId, AssetWrapper>;

  private _manager: Address;
  private _reserves: ReserveLedger = new ReserveLedger();
  private _underlying: OrderedSet<AssetId> = new OrderedSet();
  private _holding: OrderedSet<AssetId>;
  private _configs: Map<AssetId, UnderlyingAssetConfig> = new Map();
  private _bindings: SwapperBindings = new SwapperBindings();
  private _retired = false;
  private _manifest: MigrationManifest | undefined;

  constructor(chain: Chain, params: StrategyParams) {
    super(chain, params.address);
    assertNonZeroAddress(params.owner, "owner");
    assertNonZeroAddress(params.vault, "vault");
    assertNonZeroAddress(params.settlementAsset, "settlement asset");
    if (params.registry.settlementAsset !== params.settlementAsset) {
      throw new ProtocolError(
        "UNKNOWN_ASSET",
        `Registry settles in ${params.registry.settlementAsset}, strategy in ${params.settlementAsset}`,
      );
    }

    this.owner = params.owner;
    this.vault = params.vault;
    this._manager = params.manager ?? params.owner;
    this.settlementAsset = params.settlementAsset;
    this.receiptAsset = params.registry.receiptAsset;
    this.registry = params.registry;
    this.valuation = params.valuation;
    this.wrappers = new Map(
      (params.wrappers ?? []).map((w) => [w.asset, w] as const),
    );
    this._holding = new OrderedSet([this.settlementAsset, this.receiptAsset]);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  get manager(): Address {
    return this._manager;
  }

  get retired(): boolean {
    return this._retired;
  }

  reserves(asset: AssetId): bigint {
    return this._reserves.reserveOf(asset);
  }

  assetValue(asset: AssetId, amount: bigint): bigint {
    if (amount === 0n) {
      return 0n;
    }
    return this.valuation.assetValue(asset, amount);
  }

  /**
   * Σ assetValue(asset, reserves(asset)) over the holding set, at live rates.
   */
  totalAssets(): bigint {
    let total = 0n;
    for (const asset of this._holding) {
      total += this.assetValue(asset, this._reserves.reserveOf(asset));
    }
    return total;
  }

  holdingAssets(): readonly AssetId[] {
    return this._holding.values();
  }

  underlyingAssets(): readonly AssetId[] {
    return this._underlying.values();
  }

  underlyingAssetConfig(asset: AssetId): UnderlyingAssetConfig | undefined {
    return this._configs.get(asset);
  }

  isSwapperEnabled(tokenIn: AssetId, tokenOut: AssetId, swapper: Address): boolean {
    return this._bindings.isEnabled(tokenIn, tokenOut, swapper);
  }

  defaultSwapper(tokenIn: AssetId, tokenOut: AssetId): Address | undefined {
    return this._bindings.defaultAddress(tokenIn, tokenOut);
  }

  migrationManifest(): MigrationManifest | undefined {
    return this._manifest;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Vault entry points
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Account for `amount` of `asset` already transferred here by the vault.
   * Returns the canonical amount credited.
   */
  deposit(msg: Msg, asset: AssetId, amount: bigint, sellForSettlement: boolean): bigint {
    return this.nonReentrant(() => {
      this.onlyVault(msg);
      this.notRetired();

      let canonical = asset;
      let credited = amount;
      const wrapper = this.wrappers.get(asset);
      if (wrapper !== undefined) {
        credited = wrapper.wrap({ sender: this.address }, amount);
        canonical = wrapper.wrappedAsset;
      }

      // Credit first, then gate: the ceiling applies to the new total.
      const newReserve = this._reserves.credit(canonical, credited);

      const config = this._configs.get(canonical);
      if (!this._underlying.has(canonical) || config === undefined) {
        throw new ProtocolError("UNKNOWN_ASSET", `${canonical} is not an accepted underlying asset`);
      }
      if (credited < config.minDepositAmount) {
        throw new ProtocolError(
          "TOO_SMALL",
          `Deposit of ${credited.toString()} is below the minimum ${config.minDepositAmount.toString()}`,
        );
      }
      if (config.depositCeiling > 0n && newReserve > config.depositCeiling) {
        throw new ProtocolError(
          "EXCEEDS_DEPOSIT_CEILING",
          `Reserve of ${canonical} would reach ${newReserve.toString()}, ceiling is ${config.depositCeiling.toString()}`,
        );
      }

      if (canonical === this.settlementAsset) {
        this.forwardToRegistry(credited);
      } else if (sellForSettlement) {
        const proceeds = this.swapTokenForToken(canonical, credited, this.settlementAsset);
        this.forwardToRegistry(proceeds);
      }

      return credited;
    });
  }

  /**
   * Pay `recipient` the `shareAmount / totalSupply` slice of every holding
   * asset: settlement directly, receipts redeemed through the registry,
   * everything else sold into native coin.
   */
  withdraw(
    msg: Msg,
    shareAmount: bigint,
    totalSupply: bigint,
    recipient: Address,
  ): WithdrawalResult {
    return this.nonReentrant(() => {
      this.onlyVault(msg);
      this.notRetired();
      assertNonZeroAddress(recipient, "recipient");
      if (totalSupply === 0n || shareAmount > totalSupply) {
        throw new ProtocolError(
          "INSUFFICIENT_SHARES",
          `Cannot redeem ${shareAmount.toString()} of ${totalSupply.toString()} shares`,
        );
      }

      let settlementOut = 0n;
      let nativeOut = 0n;

      // Slices are fixed before any redemption or swap adds to a reserve.
      const slices = this._holding.values().map(
        (asset) => [asset, mulDiv(this._reserves.reserveOf(asset), shareAmount, totalSupply)] as const,
      );

      for (const [asset, amount] of slices) {
        if (amount === 0n) {
          continue;
        }

        if (asset === this.settlementAsset) {
          settlementOut += amount;
        } else if (asset === this.receiptAsset) {
          if (amount >= RECEIPT_DUST_FLOOR) {
            settlementOut += this.redeemReceipt(amount);
          }
        } else if (isNativeCoin(asset)) {
          nativeOut += amount;
        } else {
          nativeOut += this.swapTokenForToken(asset, amount, NATIVE_COIN);
        }
      }

      if (settlementOut > 0n) {
        this._reserves.debit(this.settlementAsset, settlementOut);
        this.chain.tokens.transfer(this.settlementAsset, this.address, recipient, settlementOut);
      }
      if (nativeOut > 0n) {
        this._reserves.debit(NATIVE_COIN, nativeOut);
        this.chain.sendValueOrRevert(this.address, recipient, nativeOut);
      }

      return { settlementOut, nativeOut };
    });
  }

  /**
   * Move every holding asset to `newStrategy` and retire this strategy.
   */
  migrateFunds(msg: Msg, newStrategy: Address): MigrationManifest {
    return this.nonReentrant(() => {
      this.onlyVault(msg);
      this.notRetired();
      assertNonZeroAddress(newStrategy, "new strategy");
      if (newStrategy === this.address) {
        throw new ProtocolError("INVALID_STRATEGY", "Cannot migrate a strategy into itself");
      }

      const moved: AssetAmount[] = [];
      for (const asset of this._holding.values()) {
        const amount = this._reserves.reserveOf(asset);
        if (amount === 0n) {
          continue;
        }
        if (asset === this.receiptAsset && !this.registry.canWithdraw(this.address, amount)) {
          throw new ProtocolError(
            "REGISTRY_WITHDRAW_BLOCKED",
            `Registry does not release ${amount.toString()} receipt for ${this.address}`,
          );
        }

        this._reserves.debit(asset, amount);
        if (isNativeCoin(asset)) {
          this.chain.sendValueOrRevert(this.address, newStrategy, amount);
        } else {
          this.chain.tokens.transfer(asset, this.address, newStrategy, amount);
        }
        moved.push({ asset, amount });
      }

      const manifest: MigrationManifest = {
        from: this.address,
        to: newStrategy,
        assets: moved,
      };
      this._manifest = manifest;
      this._retired = true;
      return manifest;
    });
  }

  /**
   * Book the assets `prevStrategy` just moved here.
   */
  acceptMigration(msg: Msg, prevStrategy: VaultStrategy): void {
    this.nonReentrant(() => {
      this.onlyVault(msg);
      this.notRetired();

      const manifest = prevStrategy.migrationManifest();
      if (
        manifest === undefined ||
        manifest.from !== prevStrategy.address ||
        manifest.to !== this.address
      ) {
        throw new ProtocolError(
          "INVALID_STRATEGY",
          `${prevStrategy.address} has not migrated funds to ${this.address}`,
        );
      }

      for (const { asset, amount } of manifest.assets) {
        this._holding.add(asset);
        this._reserves.credit(asset, amount);
      }
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Manager entry point
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Manager-directed swap through any swapper enabled for the pair.
   * The output must be a holding asset; settlement output is forwarded
   * into the registry.
   */
  invokeSwap(
    msg: Msg,
    swapper: Address,
    tokenIn: AssetId,
    amountIn: bigint,
    tokenOut: AssetId,
    minAmountOut: bigint,
  ): bigint {
    return this.nonReentrant(() => {
      if (msg.sender !== this._manager) {
        throw new ProtocolError("UNAUTHORIZED", `${msg.sender} is not the manager`);
      }
      this.notRetired();

      const bound = this._bindings.resolve(swapper);
      if (bound === undefined || !this._bindings.isEnabled(tokenIn, tokenOut, swapper)) {
        throw new ProtocolError(
          "INVALID_SWAPPER",
          `${swapper} is not enabled for ${tokenIn} -> ${tokenOut}`,
        );
      }
      if (!this._holding.has(tokenOut)) {
        throw new ProtocolError("UNKNOWN_ASSET", `${tokenOut} is not a holding asset`);
      }

      const amountOut = this.executeSwap(bound, tokenIn, amountIn, tokenOut, minAmountOut);
      if (tokenOut === this.settlementAsset) {
        this.forwardToRegistry(amountOut);
      }
      return amountOut;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Owner administration
  // ───────────────────────────────────────────────────────────────────────

  setManager(msg: Msg, manager: Address): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      assertNonZeroAddress(manager, "manager");
      this._manager = manager;
    });
  }

  addUnderlyingAsset(msg: Msg, asset: AssetId, config: UnderlyingAssetConfig): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      assertNonZeroAddress(asset, "asset");
      this._underlying.add(asset);
      this._holding.add(asset);
      this._configs.set(asset, config);
    });
  }

  removeUnderlyingAsset(msg: Msg, asset: AssetId): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      if (!this._underlying.remove(asset)) {
        throw new ProtocolError("UNKNOWN_ASSET", `${asset} is not an accepted underlying asset`);
      }
      this._configs.delete(asset);
    });
  }

  setMinDepositAmount(msg: Msg, asset: AssetId, minDepositAmount: bigint): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      const config = this.requireConfig(asset);
      this._configs.set(asset, { ...config, minDepositAmount });
    });
  }

  setDepositCeiling(msg: Msg, asset: AssetId, depositCeiling: bigint): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      const config = this.requireConfig(asset);
      this._configs.set(asset, { ...config, depositCeiling });
    });
  }

  addHoldingAsset(msg: Msg, asset: AssetId): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      assertNonZeroAddress(asset, "asset");
      this._holding.add(asset);
    });
  }

  removeHoldingAsset(msg: Msg, asset: AssetId): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      if (asset === this.settlementAsset || asset === this.receiptAsset) {
        throw new ProtocolError("UNAUTHORIZED", `${asset} is a permanent holding asset`);
      }
      if (this._underlying.has(asset)) {
        throw new ProtocolError(
          "UNAUTHORIZED",
          `${asset} is still an accepted underlying; remove it as an underlying first`,
        );
      }
      const reserve = this._reserves.reserveOf(asset);
      if (reserve > 0n) {
        throw new ProtocolError(
          "NON_ZERO_RESERVE",
          `${asset} still has a reserve of ${reserve.toString()}`,
        );
      }
      if (!this._holding.remove(asset)) {
        throw new ProtocolError("UNKNOWN_ASSET", `${asset} is not a holding asset`);
      }
    });
  }

  addSwapper(msg: Msg, tokenIn: AssetId, tokenOut: AssetId, swapper: Swapper): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      assertNonZeroAddress(swapper.address, "swapper");
      this._bindings.add(tokenIn, tokenOut, swapper);
    });
  }

  removeSwapper(msg: Msg, tokenIn: AssetId, tokenOut: AssetId, swapper: Address): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      this._bindings.remove(tokenIn, tokenOut, swapper);
    });
  }

  setDefaultSwapper(msg: Msg, tokenIn: AssetId, tokenOut: AssetId, swapper: Address): void {
    this.atomic(() => {
      this.onlyOwner(msg);
      this._bindings.setDefault(tokenIn, tokenOut, swapper);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Contract hooks
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Accepts native coin from anyone. Unsolicited value is not booked.
   */
  override receiveValue(): void {
    // accepted
  }

  checkpoint(): Restore {
    const reserves = this._reserves.snapshot();
    const underlying = this._underlying.clone();
    const holding = this._holding.clone();
    const configs = new Map(this._configs);
    const bindings = this._bindings.clone();
    const manager = this._manager;
    const retired = this._retired;
    const manifest = this._manifest;

    return () => {
      this._reserves = ReserveLedger.fromSnapshot(reserves);
      this._underlying = underlying;
      this._holding = holding;
      this._configs = configs;
      this._bindings = bindings;
      this._manager = manager;
      this._retired = retired;
      this._manifest = manifest;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal routing
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Unattended swap through the default route, zero minimum output.
   */
  private swapTokenForToken(tokenIn: AssetId, amountIn: bigint, tokenOut: AssetId): bigint {
    const swapper = this._bindings.defaultFor(tokenIn, tokenOut);
    if (swapper === undefined) {
      throw new ProtocolError(
        "SET_DEFAULT_SWAPPER_BEFORE",
        `No default swapper for ${tokenIn} -> ${tokenOut}`,
      );
    }
    return this.executeSwap(swapper, tokenIn, amountIn, tokenOut, 0n);
  }

  private executeSwap(
    swapper: Swapper,
    tokenIn: AssetId,
    amountIn: bigint,
    tokenOut: AssetId,
    minAmountOut: bigint,
  ): bigint {
    this._reserves.debit(tokenIn, amountIn);
    const msg: Msg = isNativeCoin(tokenIn)
      ? { sender: this.address, value: amountIn }
      : { sender: this.address };
    const amountOut = swapper.swap(msg, tokenIn, amountIn, tokenOut, minAmountOut);
    this._reserves.credit(tokenOut, amountOut);
    return amountOut;
  }

  /**
   * Move settlement reserve into the registry, booking the receipt
   * actually minted.
   */
  private forwardToRegistry(amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    this._reserves.debit(this.settlementAsset, amount);
    const before = this.chain.tokens.balanceOf(this.receiptAsset, this.address);
    this.registry.deposit({ sender: this.address }, this.address, amount);
    const minted = this.chain.tokens.balanceOf(this.receiptAsset, this.address) - before;
    this._reserves.credit(this.receiptAsset, minted);
  }

  /**
   * Redeem `amount` of receipt. Debits the requested receipt amount,
   * credits the settlement actually received, returns that delta.
   */
  private redeemReceipt(amount: bigint): bigint {
    if (!this.registry.canWithdraw(this.address, amount)) {
      throw new ProtocolError(
        "REGISTRY_WITHDRAW_BLOCKED",
        `Registry does not release ${amount.toString()} receipt for ${this.address}`,
      );
    }
    const before = this.chain.tokens.balanceOf(this.settlementAsset, this.address);
    this.registry.withdraw({ sender: this.address }, this.address, amount);
    const received = this.chain.tokens.balanceOf(this.settlementAsset, this.address) - before;

    this._reserves.credit(this.settlementAsset, received);
    this._reserves.debit(this.receiptAsset, amount);
    return received;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Capability checks
  // ───────────────────────────────────────────────────────────────────────

  private onlyOwner(msg: Msg): void {
    if (msg.sender !== this.owner) {
      throw new ProtocolError("UNAUTHORIZED", `${msg.sender} is not the owner`);
    }
  }

  private onlyVault(msg: Msg): void {
    if (msg.sender !== this.vault) {
      throw new ProtocolError("UNAUTHORIZED", `${msg.sender} is not the vault`);
    }
  }

  private notRetired(): void {
    if (this._retired) {
      throw new ProtocolError("STRATEGY_RETIRED", `Strategy ${this.address} has migrated its funds`);
    }
  }

  private requireConfig(asset: AssetId): UnderlyingAssetConfig {
    const config = this._configs.get(asset);
    if (config === undefined || !this._underlying.has(asset)) {
      throw new ProtocolError("UNKNOWN_ASSET", `${asset} is not an accepted underlying asset`);
    }
    return config;
  }
}
