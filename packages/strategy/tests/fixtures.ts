/**
 * Shared wiring for strategy tests.
 *
 * Assets:
 * - SETTLE (settlement, valued 1:1) and RECEIPT (registry receipt)
 * - ALPHA, valued at a mutable 1.1 rate
 * - REBASE, wrapped into ALPHA at 1.25 REBASE per ALPHA
 * - native coin, valued 1:1
 *
 * The vault is a plain account: the strategy only checks msg.sender.
 */

import { Chain, Contract } from "@yieldmesh/chain";
import type { Restore } from "@yieldmesh/chain";
import { NATIVE_COIN, WAD } from "@yieldmesh/types";
import type { AssetId, Msg } from "@yieldmesh/types";
import { Strategy } from "../src/strategy.js";
import { FixedRateSwapper } from "../src/adapters/fixed-rate-swapper.js";
import { ReceiptRegistry } from "../src/adapters/receipt-registry.js";
import { RateWrapper } from "../src/adapters/rate-wrapper.js";
import { MutableRate, RateOracle, fixedRate } from "../src/adapters/rate-oracle.js";

export const OWNER = "0x00000000000000000000000000000000000000e1";
export const MANAGER = "0x00000000000000000000000000000000000000e2";
export const VAULT = "0x00000000000000000000000000000000000000e3";
export const BOB = "0x00000000000000000000000000000000000000b0";

export const SETTLE = "SETTLE";
export const RECEIPT = "RECEIPT";
export const ALPHA = "ALPHA";
export const REBASE = "REBASE";

export const MIN_DEPOSIT = 10n ** 15n;
export const ALPHA_RATE = (11n * WAD) / 10n;

export interface StrategyFixture {
  chain: Chain;
  registry: ReceiptRegistry;
  oracle: RateOracle;
  alphaRate: MutableRate;
  swapper: FixedRateSwapper;
  altSwapper: FixedRateSwapper;
  wrapper: RateWrapper;
  strategy: Strategy;
  /** Fund the vault, move the asset to `target` and call its deposit() */
  deposit(asset: AssetId, amount: bigint, sell?: boolean, target?: Strategy): bigint;
  /** A second strategy sharing the registry, oracle and vault */
  makeStrategy(): Strategy;
}

export function setupStrategy(): StrategyFixture {
  const chain = new Chain({ genesisTime: 1_000 });
  const registry = new ReceiptRegistry(chain, {
    owner: OWNER,
    settlementAsset: SETTLE,
    receiptAsset: RECEIPT,
  });

  const alphaRate = new MutableRate(ALPHA_RATE);
  const oracle = new RateOracle([
    [SETTLE, fixedRate(WAD)],
    [RECEIPT, registry],
    [ALPHA, alphaRate],
    [NATIVE_COIN, fixedRate(WAD)],
  ]);

  const owner: Msg = { sender: OWNER };

  const swapper = new FixedRateSwapper(chain, { owner: OWNER });
  swapper.setRate(owner, ALPHA, NATIVE_COIN, ALPHA_RATE);
  swapper.setRate(owner, ALPHA, SETTLE, ALPHA_RATE);
  swapper.setRate(owner, NATIVE_COIN, SETTLE, WAD);
  chain.tokens.mint(NATIVE_COIN, swapper.address, 100n * WAD);
  chain.tokens.mint(SETTLE, swapper.address, 100n * WAD);

  const altSwapper = new FixedRateSwapper(chain, { owner: OWNER });
  altSwapper.setRate(owner, ALPHA, SETTLE, (12n * WAD) / 10n);
  chain.tokens.mint(SETTLE, altSwapper.address, 100n * WAD);

  const wrapper = new RateWrapper(chain, {
    asset: REBASE,
    wrappedAsset: ALPHA,
    rate: fixedRate((125n * WAD) / 100n),
  });

  const makeStrategy = (): Strategy =>
    new Strategy(chain, {
      owner: OWNER,
      vault: VAULT,
      manager: MANAGER,
      settlementAsset: SETTLE,
      registry,
      valuation: oracle,
      wrappers: [wrapper],
    });

  const strategy = makeStrategy();
  const config = { minDepositAmount: MIN_DEPOSIT, depositCeiling: 0n };
  strategy.addUnderlyingAsset(owner, SETTLE, config);
  strategy.addUnderlyingAsset(owner, ALPHA, config);
  strategy.addUnderlyingAsset(owner, NATIVE_COIN, config);

  const routes: Array<[AssetId, AssetId]> = [
    [ALPHA, NATIVE_COIN],
    [ALPHA, SETTLE],
    [NATIVE_COIN, SETTLE],
  ];
  for (const [tokenIn, tokenOut] of routes) {
    strategy.addSwapper(owner, tokenIn, tokenOut, swapper);
    strategy.setDefaultSwapper(owner, tokenIn, tokenOut, swapper.address);
  }
  strategy.addSwapper(owner, ALPHA, SETTLE, altSwapper);

  const deposit = (asset: AssetId, amount: bigint, sell = false, target: Strategy = strategy): bigint => {
    chain.tokens.mint(asset, VAULT, amount);
    chain.tokens.transfer(asset, VAULT, target.address, amount);
    return target.deposit({ sender: VAULT }, asset, amount, sell);
  };

  return { chain, registry, oracle, alphaRate, swapper, altSwapper, wrapper, strategy, deposit, makeStrategy };
}

/**
 * Native coin recipient that can be told to refuse value, or to run a
 * callback from inside its receive hook. Its state survives rollbacks.
 */
export class Recipient extends Contract {
  accepting = false;
  onReceive: ((msg: Msg) => void) | undefined;

  override receiveValue(msg: Msg): void {
    this.onReceive?.(msg);
    if (!this.accepting) {
      super.receiveValue(msg);
    }
  }

  checkpoint(): Restore {
    return () => undefined;
  }
}

/**
 * Fixed-rate swapper that records the minimum output of every call.
 */
export class RecordingSwapper extends FixedRateSwapper {
  readonly minimums: bigint[] = [];

  override swap(msg: Msg, tokenIn: AssetId, amountIn: bigint, tokenOut: AssetId, minAmountOut: bigint): bigint {
    this.minimums.push(minAmountOut);
    return super.swap(msg, tokenIn, amountIn, tokenOut, minAmountOut);
  }
}

export function reservesOf(strategy: Strategy, assets: readonly AssetId[]): Record<AssetId, bigint> {
  return Object.fromEntries(assets.map((asset) => [asset, strategy.reserves(asset)]));
}
