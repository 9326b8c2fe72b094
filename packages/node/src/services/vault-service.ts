/**
 * VaultService: the simulated deployment behind the HTTP API.
 *
 * Owns one in-process chain with the reference vault wired on it, turns
 * decimal-string inputs into base units, and renders results back as
 * decimal strings.
 *
 * Every state-changing operation is logged: `info` with its inputs and
 * outcome, `warn` with the error code when the call reverts.
 */

import type { Logger } from "pino";
import { Chain } from "@yieldmesh/chain";
import { formatAmount, parseAmount } from "@yieldmesh/ledger";
import { NATIVE_COIN, ProtocolError, isProtocolError } from "@yieldmesh/types";
import type { Address, AssetInfo, Msg } from "@yieldmesh/types";
import { deployReferenceVault } from "@yieldmesh/vault";
import type { ReferenceDeployment } from "@yieldmesh/vault";
import type {
  AdvanceTimeDto,
  DepositDto,
  DepositReceipt,
  FaucetDto,
  FaucetReceipt,
  PositionView,
  ReserveView,
  VaultSummary,
  WithdrawDto,
  WithdrawalReceipt,
} from "../types/dto.js";

const SHARE_DECIMALS = 18;

export interface VaultServiceConfig {
  readonly genesisTime: number;
  readonly minLockUpPeriod: number;
  readonly siblingLockUpPeriod: number;
  /** Base units */
  readonly minDepositAmount: bigint;
  /** Base units; 0 = no ceiling */
  readonly depositCeiling: bigint;
  readonly owner?: Address | undefined;
  readonly manager?: Address | undefined;
}

export class VaultService {
  readonly deployment: ReferenceDeployment;
  private readonly logger: Logger;
  private readonly faucetAssets: ReadonlySet<string>;

  constructor(config: VaultServiceConfig, logger: Logger) {
    const chain = new Chain({ genesisTime: config.genesisTime });
    this.deployment = deployReferenceVault(chain, {
      owner: config.owner,
      manager: config.manager,
      minLockUpPeriod: config.minLockUpPeriod,
      siblingLockUpPeriod: config.siblingLockUpPeriod,
      minDepositAmount: config.minDepositAmount,
      depositCeiling: config.depositCeiling,
    });
    this.logger = logger.child({ component: "vault-service" });

    const { assets } = this.deployment;
    this.faucetAssets = new Set([
      assets.settlement,
      assets.staked,
      assets.rebasing,
      assets.restaked,
      NATIVE_COIN,
    ]);
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  summary(): VaultSummary {
    const { vault, chain } = this.deployment;
    return {
      address: vault.address,
      shareAsset: vault.shareAsset,
      strategy: vault.strategy?.address ?? null,
      totalAssets: formatAmount(vault.totalAssets(), SHARE_DECIMALS),
      totalSupply: formatAmount(vault.totalSupply(), SHARE_DECIMALS),
      sharePrice: formatAmount(vault.sharePrice(), SHARE_DECIMALS),
      minLockUpPeriod: vault.minLockUpPeriod,
      now: chain.now(),
    };
  }

  position(holder: Address): PositionView {
    const p = this.deployment.vault.position(holder);
    return {
      holder: p.holder,
      shares: formatAmount(p.shares, SHARE_DECIMALS),
      assets: formatAmount(p.assets, SHARE_DECIMALS),
      lockedUntil: p.lockedUntil,
      withdrawable: p.withdrawable,
    };
  }

  /**
   * Reserves of the vault's current strategy in holding-set order.
   * Empty while no strategy is set.
   */
  reserves(): readonly ReserveView[] {
    const { strategy } = this.deployment.vault;
    if (strategy === undefined) {
      return [];
    }
    return strategy.holdingAssets().map((asset) => {
      const info = this.assetInfo(asset);
      const reserve = strategy.reserves(asset);
      return {
        asset,
        symbol: info.symbol,
        reserve: formatAmount(reserve, info.decimals),
        value: formatAmount(strategy.assetValue(asset, reserve), SHARE_DECIMALS),
      };
    });
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  deposit(dto: DepositDto): DepositReceipt {
    const sell = dto.sellForSettlement ?? false;
    return this.record("deposit", { account: dto.account, asset: dto.asset, amount: dto.amount, sell }, () => {
      const info = this.resolveAsset(dto.asset);
      const amount = parseAmount(dto.amount, info.decimals);
      const msg: Msg = info.id === NATIVE_COIN
        ? { sender: dto.account, value: amount }
        : { sender: dto.account };

      const shares = this.deployment.vault.deposit(msg, info.id, amount, sell);
      return {
        account: dto.account,
        asset: info.symbol,
        amount: formatAmount(amount, info.decimals),
        shares: formatAmount(shares, SHARE_DECIMALS),
        position: this.position(dto.account),
      };
    }, (r) => ({ shares: r.shares }));
  }

  withdraw(dto: WithdrawDto): WithdrawalReceipt {
    const recipient = dto.recipient ?? dto.account;
    return this.record("withdraw", { account: dto.account, shares: dto.shares, recipient }, () => {
      const shares = parseAmount(dto.shares, SHARE_DECIMALS);
      const result = this.deployment.vault.withdraw({ sender: dto.account }, shares, recipient);
      return {
        account: dto.account,
        recipient,
        shares: formatAmount(shares, SHARE_DECIMALS),
        settlementOut: formatAmount(result.settlementOut, SHARE_DECIMALS),
        nativeOut: formatAmount(result.nativeOut, SHARE_DECIMALS),
      };
    }, (r) => ({ settlementOut: r.settlementOut, nativeOut: r.nativeOut }));
  }

  /**
   * Mint test funds. Only the deposit-side assets are dispensed.
   */
  faucet(dto: FaucetDto): FaucetReceipt {
    return this.record("faucet", { account: dto.account, asset: dto.asset, amount: dto.amount }, () => {
      const info = this.resolveAsset(dto.asset);
      if (!this.faucetAssets.has(info.id)) {
        throw new ProtocolError("UNKNOWN_ASSET", `The faucet does not dispense ${info.symbol}`);
      }
      const amount = parseAmount(dto.amount, info.decimals);
      if (amount <= 0n) {
        throw new ProtocolError("INVALID_AMOUNT", "Faucet amount must be positive");
      }

      const { tokens } = this.deployment.chain;
      tokens.mint(info.id, dto.account, amount);
      return {
        account: dto.account,
        asset: info.symbol,
        amount: formatAmount(amount, info.decimals),
        balance: formatAmount(tokens.balanceOf(info.id, dto.account), info.decimals),
      };
    }, (r) => ({ balance: r.balance }));
  }

  advanceTime(dto: AdvanceTimeDto): number {
    const now = this.deployment.chain.advanceTime(dto.seconds);
    this.logger.info({ op: "advanceTime", seconds: dto.seconds, now }, "advanceTime ok");
    return now;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Look an asset up by id, then by symbol.
   */
  private resolveAsset(ref: string): AssetInfo {
    const { tokens } = this.deployment.chain;
    const info = tokens.info(ref) ?? tokens.listAssets().find((a) => a.symbol === ref);
    if (info === undefined) {
      throw new ProtocolError("UNKNOWN_ASSET", `Unknown asset: ${ref}`);
    }
    return info;
  }

  private assetInfo(asset: string): AssetInfo {
    return this.deployment.chain.tokens.info(asset) ?? { id: asset, symbol: asset, decimals: 18 };
  }

  private record<T>(
    op: string,
    fields: Record<string, unknown>,
    fn: () => T,
    outcome: (result: T) => Record<string, unknown>,
  ): T {
    try {
      const result = fn();
      this.logger.info({ op, ...fields, ...outcome(result) }, `${op} ok`);
      return result;
    } catch (err) {
      if (isProtocolError(err)) {
        this.logger.warn({ op, ...fields, code: err.code }, `${op} rejected: ${err.message}`);
      }
      throw err;
    }
  }
}
