/**
 * Reference deployment: a complete vault wired on one chain.
 *
 * Assets (all 18 decimals, ids are chain addresses):
 * - WETH: settlement asset, valued 1:1
 * - rcptWETH: registry receipt, valued at the registry's pool rate
 * - wstkETH: wrapped staking derivative, accruing from 1.15 at 4%/yr
 * - stkETH: rebasing form of wstkETH, wrapped on deposit
 * - xETH: second derivative, accruing from 1.00 at 3%/yr
 * - native coin, valued 1:1
 *
 * Routes: derivatives → native coin and → WETH through a fixed-rate
 * swapper; native coin → WETH through the sibling vault.
 */

import type { Chain } from "@yieldmesh/chain";
import {
  AccruingRate,
  FixedRateSwapper,
  RateOracle,
  RateWrapper,
  ReceiptRegistry,
  Strategy,
  fixedRate,
} from "@yieldmesh/strategy";
import { NATIVE_COIN, WAD } from "@yieldmesh/types";
import type { Address, AssetId, Msg } from "@yieldmesh/types";
import { SingleAssetVault } from "./single-asset-vault.js";
import { Vault } from "./vault.js";

export const DEFAULT_OWNER: Address = "0x0000000000000000000000000000000000000f01";
export const DEFAULT_MANAGER: Address = "0x0000000000000000000000000000000000000f02";

const ONE_DAY = 86_400;

export interface ReferenceOptions {
  readonly owner?: Address | undefined;
  readonly manager?: Address | undefined;
  readonly minLockUpPeriod?: number | undefined;
  readonly siblingLockUpPeriod?: number | undefined;
  /** Per-asset minimum deposit, base units (default 0.001) */
  readonly minDepositAmount?: bigint | undefined;
  /** Per-asset reserve ceiling, base units; 0 = none */
  readonly depositCeiling?: bigint | undefined;
  /** Native coin and WETH minted to the swapper (default 1000) */
  readonly swapperLiquidity?: bigint | undefined;
  /** WETH the owner deposits into the sibling vault (default 10) */
  readonly siblingSeed?: bigint | undefined;
}

export interface ReferenceAssets {
  readonly settlement: AssetId;
  readonly receipt: AssetId;
  readonly staked: AssetId;
  readonly rebasing: AssetId;
  readonly restaked: AssetId;
}

export interface ReferenceDeployment {
  readonly chain: Chain;
  readonly owner: Address;
  readonly manager: Address;
  readonly assets: ReferenceAssets;
  readonly registry: ReceiptRegistry;
  readonly oracle: RateOracle;
  readonly stakedRate: AccruingRate;
  readonly restakedRate: AccruingRate;
  readonly swapper: FixedRateSwapper;
  readonly wrapper: RateWrapper;
  readonly vault: Vault;
  readonly sibling: SingleAssetVault;
  /** The strategy wired at deployment */
  readonly strategy: Strategy;
  /** Deploy and configure another strategy for the same vault */
  deployStrategy(): Strategy;
}

export function deployReferenceVault(chain: Chain, options: ReferenceOptions = {}): ReferenceDeployment {
  const owner = options.owner ?? DEFAULT_OWNER;
  const manager = options.manager ?? DEFAULT_MANAGER;
  const minDepositAmount = options.minDepositAmount ?? WAD / 1_000n;
  const depositCeiling = options.depositCeiling ?? 0n;
  const liquidity = options.swapperLiquidity ?? 1_000n * WAD;
  const siblingSeed = options.siblingSeed ?? 10n * WAD;
  const asOwner: Msg = { sender: owner };

  // ─── Assets ──────────────────────────────────────────────────────────

  const token = (symbol: string): AssetId => {
    const id = chain.newAddress();
    chain.tokens.register({ id, symbol, decimals: 18 });
    return id;
  };
  const assets: ReferenceAssets = {
    settlement: token("WETH"),
    receipt: token("rcptWETH"),
    staked: token("wstkETH"),
    rebasing: token("stkETH"),
    restaked: token("xETH"),
  };

  // ─── Capabilities ────────────────────────────────────────────────────

  const registry = new ReceiptRegistry(chain, {
    owner,
    settlementAsset: assets.settlement,
    receiptAsset: assets.receipt,
  });

  const stakedRate = new AccruingRate(chain, { baseRate: (115n * WAD) / 100n, ratePerYear: WAD / 25n });
  const restakedRate = new AccruingRate(chain, { baseRate: WAD, ratePerYear: (3n * WAD) / 100n });

  const oracle = new RateOracle([
    [assets.settlement, fixedRate(WAD)],
    [assets.receipt, registry],
    [assets.staked, stakedRate],
    [assets.restaked, restakedRate],
    [NATIVE_COIN, fixedRate(WAD)],
  ]);

  const wrapper = new RateWrapper(chain, {
    asset: assets.rebasing,
    wrappedAsset: assets.staked,
    rate: stakedRate,
  });

  const swapper = new FixedRateSwapper(chain, { owner });
  for (const target of [NATIVE_COIN, assets.settlement]) {
    swapper.setRate(asOwner, assets.staked, target, stakedRate.rate());
    swapper.setRate(asOwner, assets.restaked, target, restakedRate.rate());
  }
  swapper.setRate(asOwner, NATIVE_COIN, assets.settlement, WAD);
  chain.tokens.mint(NATIVE_COIN, swapper.address, liquidity);
  chain.tokens.mint(assets.settlement, swapper.address, liquidity);

  // ─── Vaults ──────────────────────────────────────────────────────────

  const vault = new Vault(chain, {
    owner,
    minLockUpPeriod: options.minLockUpPeriod ?? ONE_DAY,
    shareSymbol: "ymETH",
  });

  const sibling = new SingleAssetVault(chain, {
    owner,
    heldAsset: assets.settlement,
    minDepositAmount,
    minLockUpPeriod: options.siblingLockUpPeriod ?? ONE_DAY,
    shareSymbol: "ymWETH",
  });
  if (siblingSeed > 0n) {
    chain.tokens.mint(assets.settlement, owner, siblingSeed);
    sibling.deposit(asOwner, siblingSeed);
  }

  // ─── Strategy ────────────────────────────────────────────────────────

  const deployStrategy = (): Strategy => {
    const strategy = new Strategy(chain, {
      owner,
      vault: vault.address,
      manager,
      settlementAsset: assets.settlement,
      registry,
      valuation: oracle,
      wrappers: [wrapper],
    });

    const config = { minDepositAmount, depositCeiling };
    for (const asset of [assets.settlement, assets.staked, assets.restaked, NATIVE_COIN]) {
      strategy.addUnderlyingAsset(asOwner, asset, config);
    }

    for (const tokenIn of [assets.staked, assets.restaked]) {
      for (const tokenOut of [NATIVE_COIN, assets.settlement]) {
        strategy.addSwapper(asOwner, tokenIn, tokenOut, swapper);
        strategy.setDefaultSwapper(asOwner, tokenIn, tokenOut, swapper.address);
      }
    }
    strategy.addSwapper(asOwner, NATIVE_COIN, assets.settlement, swapper);
    strategy.addSwapper(asOwner, NATIVE_COIN, assets.settlement, sibling);
    strategy.setDefaultSwapper(asOwner, NATIVE_COIN, assets.settlement, sibling.address);

    return strategy;
  };

  const strategy = deployStrategy();
  vault.setStrategy(asOwner, strategy);

  return {
    chain,
    owner,
    manager,
    assets,
    registry,
    oracle,
    stakedRate,
    restakedRate,
    swapper,
    wrapper,
    vault,
    sibling,
    strategy,
    deployStrategy,
  };
}
