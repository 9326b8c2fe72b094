/**
 * Tests for Strategy.
 *
 * Covers:
 * - Deposit gating, wrapping, registry forwarding and selling
 * - Proportional withdrawal across settlement, receipt, underlyings, native
 * - Manager swaps and swapper administration
 * - Holding/underlying set administration
 * - Migration between strategies
 * - Rollback, re-entrancy and donations
 */

import { describe, it, expect, beforeEach } from "vitest";
import { NATIVE_COIN, WAD, ZERO_ADDRESS, isProtocolError } from "@yieldmesh/types";
import type { ProtocolErrorCode } from "@yieldmesh/types";
import { FixedRateSwapper } from "../src/adapters/fixed-rate-swapper.js";
import {
  ALPHA,
  ALPHA_RATE,
  BOB,
  MANAGER,
  MIN_DEPOSIT,
  OWNER,
  REBASE,
  RECEIPT,
  Recipient,
  RecordingSwapper,
  SETTLE,
  VAULT,
  reservesOf,
  setupStrategy,
} from "./fixtures.js";
import type { StrategyFixture } from "./fixtures.js";

const ALL = [SETTLE, RECEIPT, ALPHA, NATIVE_COIN];
const vault = { sender: VAULT };
const owner = { sender: OWNER };
const manager = { sender: MANAGER };

function expectCode(fn: () => unknown, code: ProtocolErrorCode): void {
  try {
    fn();
  } catch (err) {
    expect(isProtocolError(err) ? err.code : err).toBe(code);
    return;
  }
  expect.unreachable(`expected ${code}`);
}

describe("Strategy", () => {
  let f: StrategyFixture;

  beforeEach(() => {
    f = setupStrategy();
  });

  // ─── Deposit ───────────────────────────────────────────────────────────

  describe("deposit", () => {
    it("forwards the settlement asset into the registry", () => {
      expect(f.deposit(SETTLE, WAD)).toBe(WAD);

      expect(f.strategy.reserves(SETTLE)).toBe(0n);
      expect(f.strategy.reserves(RECEIPT)).toBe(WAD);
      expect(f.registry.pooled).toBe(WAD);
      expect(f.chain.tokens.balanceOf(RECEIPT, f.strategy.address)).toBe(WAD);
      expect(f.strategy.totalAssets()).toBe(WAD);
    });

    it("holds an underlying asset at its live value", () => {
      f.deposit(ALPHA, WAD);

      expect(f.strategy.reserves(ALPHA)).toBe(WAD);
      expect(f.strategy.totalAssets()).toBe(1_100_000_000_000_000_000n);

      f.alphaRate.setRate(2n * WAD);
      expect(f.strategy.totalAssets()).toBe(2n * WAD);
    });

    it("sells an underlying for settlement when asked", () => {
      f.deposit(ALPHA, WAD, true);

      expect(f.strategy.reserves(ALPHA)).toBe(0n);
      expect(f.strategy.reserves(RECEIPT)).toBe(1_100_000_000_000_000_000n);
      expect(f.registry.pooled).toBe(1_100_000_000_000_000_000n);
      expect(f.chain.tokens.balanceOf(SETTLE, f.swapper.address)).toBe(98_900_000_000_000_000_000n);
      expect(f.strategy.totalAssets()).toBe(1_100_000_000_000_000_000n);
    });

    it("sells native coin through the native route", () => {
      f.deposit(NATIVE_COIN, WAD, true);

      expect(f.strategy.reserves(NATIVE_COIN)).toBe(0n);
      expect(f.strategy.reserves(RECEIPT)).toBe(WAD);
      expect(f.chain.tokens.balanceOf(NATIVE_COIN, f.swapper.address)).toBe(101n * WAD);
    });

    it("wraps a non-canonical form before crediting", () => {
      expect(f.deposit(REBASE, 1_250_000_000_000_000_000n)).toBe(WAD);

      expect(f.strategy.reserves(ALPHA)).toBe(WAD);
      expect(f.strategy.reserves(REBASE)).toBe(0n);
      expect(f.chain.tokens.balanceOf(REBASE, f.wrapper.address)).toBe(1_250_000_000_000_000_000n);
      expect(f.chain.tokens.balanceOf(ALPHA, f.strategy.address)).toBe(WAD);
    });

    it("rejects a deposit below the minimum and rolls it back", () => {
      expectCode(() => f.deposit(ALPHA, MIN_DEPOSIT - 1n), "TOO_SMALL");
      expect(f.strategy.reserves(ALPHA)).toBe(0n);
    });

    it("accepts a deposit exactly at the minimum", () => {
      expect(f.deposit(ALPHA, MIN_DEPOSIT)).toBe(MIN_DEPOSIT);
      expect(f.strategy.reserves(ALPHA)).toBe(MIN_DEPOSIT);
    });

    it("enforces the deposit ceiling against the new total", () => {
      f.strategy.setDepositCeiling(owner, ALPHA, 2n * WAD);
      f.deposit(ALPHA, 1_500_000_000_000_000_000n);

      expectCode(() => f.deposit(ALPHA, WAD), "EXCEEDS_DEPOSIT_CEILING");
      expect(f.strategy.reserves(ALPHA)).toBe(1_500_000_000_000_000_000n);

      f.deposit(ALPHA, 500_000_000_000_000_000n);
      expect(f.strategy.reserves(ALPHA)).toBe(2n * WAD);
    });

    it("rejects an asset that is not an accepted underlying", () => {
      expectCode(() => f.deposit("GAMMA", WAD), "UNKNOWN_ASSET");
      expect(f.strategy.reserves("GAMMA")).toBe(0n);
    });

    it("rejects callers other than the vault", () => {
      expectCode(() => f.strategy.deposit({ sender: BOB }, ALPHA, WAD, false), "UNAUTHORIZED");
    });

    it("fails a sale with no default route", () => {
      f.strategy.addUnderlyingAsset(owner, "GAMMA", { minDepositAmount: 1n, depositCeiling: 0n });
      expectCode(() => f.deposit("GAMMA", WAD, true), "SET_DEFAULT_SWAPPER_BEFORE");
      expect(f.strategy.reserves("GAMMA")).toBe(0n);
    });
  });

  // ─── Donations ─────────────────────────────────────────────────────────

  describe("donations", () => {
    it("ignores tokens sent straight to the strategy", () => {
      f.deposit(SETTLE, WAD);
      f.chain.tokens.mint(ALPHA, f.strategy.address, 100n * WAD);

      expect(f.strategy.reserves(ALPHA)).toBe(0n);
      expect(f.strategy.totalAssets()).toBe(WAD);
    });

    it("accepts native coin without booking it", () => {
      f.chain.tokens.mint(NATIVE_COIN, BOB, WAD);
      expect(f.chain.sendValue(BOB, f.strategy.address, WAD)).toEqual({ ok: true });

      expect(f.strategy.nativeBalance()).toBe(WAD);
      expect(f.strategy.reserves(NATIVE_COIN)).toBe(0n);
      expect(f.strategy.totalAssets()).toBe(0n);
    });
  });

  // ─── Withdraw ──────────────────────────────────────────────────────────

  describe("withdraw", () => {
    beforeEach(() => {
      f.deposit(SETTLE, WAD);
      f.deposit(ALPHA, WAD);
      f.deposit(NATIVE_COIN, WAD);
    });

    it("pays a proportional slice of every holding asset", () => {
      const result = f.strategy.withdraw(vault, 1n, 2n, BOB);

      // receipt 0.5 redeemed for 0.5 settlement; 0.5 ALPHA sold for 0.55 native
      expect(result).toEqual({
        settlementOut: 500_000_000_000_000_000n,
        nativeOut: 1_050_000_000_000_000_000n,
      });
      expect(f.chain.tokens.balanceOf(SETTLE, BOB)).toBe(500_000_000_000_000_000n);
      expect(f.chain.tokens.balanceOf(NATIVE_COIN, BOB)).toBe(1_050_000_000_000_000_000n);
      expect(reservesOf(f.strategy, ALL)).toEqual({
        [SETTLE]: 0n,
        [RECEIPT]: 500_000_000_000_000_000n,
        [ALPHA]: 500_000_000_000_000_000n,
        [NATIVE_COIN]: 500_000_000_000_000_000n,
      });
      expect(f.strategy.nativeBalance()).toBe(500_000_000_000_000_000n);
    });

    it("pays the registry's measured proceeds for a rewarded receipt slice", () => {
      f.chain.tokens.mint(SETTLE, OWNER, WAD);
      f.registry.distributeRewards(owner, WAD);

      const result = f.strategy.withdraw(vault, 1n, 2n, BOB);

      // 0.5 receipt now settles for 1.0 out of a 2.0 pool
      expect(f.strategy.reserves(RECEIPT)).toBe(500_000_000_000_000_000n);
      expect(result.settlementOut).toBe(WAD);
      expect(f.chain.tokens.balanceOf(SETTLE, BOB)).toBe(WAD);
      expect(f.strategy.reserves(SETTLE)).toBe(0n);
      expect(f.registry.pooled).toBe(WAD);
    });

    it("empties every reserve when redeeming the whole supply", () => {
      const result = f.strategy.withdraw(vault, 7n, 7n, BOB);

      expect(result).toEqual({ settlementOut: WAD, nativeOut: 2_100_000_000_000_000_000n });
      for (const asset of ALL) {
        expect(f.strategy.reserves(asset)).toBe(0n);
      }
      expect(f.strategy.totalAssets()).toBe(0n);
    });

    it("leaves receipt dust in reserve", () => {
      const result = f.strategy.withdraw(vault, 1n, WAD, BOB);

      // receipt slice is 1 unit, below the floor; ALPHA 1 → 1 native
      expect(result).toEqual({ settlementOut: 0n, nativeOut: 2n });
      expect(f.strategy.reserves(RECEIPT)).toBe(WAD);
    });

    it("fails when the registry blocks redemptions", () => {
      f.registry.setWithdrawalsPaused(owner, true);

      expectCode(() => f.strategy.withdraw(vault, 1n, 2n, BOB), "REGISTRY_WITHDRAW_BLOCKED");
      expect(f.strategy.reserves(RECEIPT)).toBe(WAD);
      expect(f.strategy.reserves(ALPHA)).toBe(WAD);
    });

    it("reverts completely when the native leg is rejected, then succeeds once accepted", () => {
      const recipient = new Recipient(f.chain);
      const before = reservesOf(f.strategy, ALL);

      expectCode(() => f.strategy.withdraw(vault, 1n, 2n, recipient.address), "FAILED_TO_SEND_ETH");
      expect(reservesOf(f.strategy, ALL)).toEqual(before);
      expect(f.registry.pooled).toBe(WAD);
      expect(f.chain.tokens.balanceOf(SETTLE, recipient.address)).toBe(0n);
      expect(f.chain.tokens.balanceOf(NATIVE_COIN, f.swapper.address)).toBe(100n * WAD);

      recipient.accepting = true;
      const result = f.strategy.withdraw(vault, 1n, 2n, recipient.address);
      expect(result.nativeOut).toBe(1_050_000_000_000_000_000n);
      expect(recipient.nativeBalance()).toBe(1_050_000_000_000_000_000n);
    });

    it("rejects re-entry from the recipient's receive hook", () => {
      const recipient = new Recipient(f.chain);
      let inner: unknown;
      recipient.onReceive = () => {
        try {
          f.strategy.withdraw(vault, 1n, 2n, BOB);
        } catch (err) {
          inner = err;
          throw err;
        }
      };

      expectCode(() => f.strategy.withdraw(vault, 1n, 2n, recipient.address), "FAILED_TO_SEND_ETH");
      expect(isProtocolError(inner, "REENTRANT_CALL")).toBe(true);
    });

    it("rejects more shares than the supply, or an empty supply", () => {
      expectCode(() => f.strategy.withdraw(vault, 3n, 2n, BOB), "INSUFFICIENT_SHARES");
      expectCode(() => f.strategy.withdraw(vault, 0n, 0n, BOB), "INSUFFICIENT_SHARES");
    });

    it("rejects the zero address and foreign callers", () => {
      expectCode(() => f.strategy.withdraw(vault, 1n, 2n, ZERO_ADDRESS), "ZERO_ADDRESS");
      expectCode(() => f.strategy.withdraw({ sender: BOB }, 1n, 2n, BOB), "UNAUTHORIZED");
    });

    it("fails an asset with no route to native coin", () => {
      f.strategy.addUnderlyingAsset(owner, "GAMMA", { minDepositAmount: 1n, depositCeiling: 0n });
      f.deposit("GAMMA", WAD);
      expectCode(() => f.strategy.withdraw(vault, 1n, 2n, BOB), "SET_DEFAULT_SWAPPER_BEFORE");
    });
  });

  // ─── Manager swaps ─────────────────────────────────────────────────────

  describe("invokeSwap", () => {
    beforeEach(() => {
      f.deposit(ALPHA, WAD);
    });

    it("swaps through any enabled swapper and forwards settlement", () => {
      const out = f.strategy.invokeSwap(manager, f.altSwapper.address, ALPHA, WAD, SETTLE, 1_200_000_000_000_000_000n);

      expect(out).toBe(1_200_000_000_000_000_000n);
      expect(f.strategy.reserves(ALPHA)).toBe(0n);
      expect(f.strategy.reserves(SETTLE)).toBe(0n);
      expect(f.strategy.reserves(RECEIPT)).toBe(1_200_000_000_000_000_000n);
    });

    it("keeps non-settlement output in reserve", () => {
      const out = f.strategy.invokeSwap(manager, f.swapper.address, ALPHA, WAD, NATIVE_COIN, 0n);

      expect(out).toBe(1_100_000_000_000_000_000n);
      expect(f.strategy.reserves(NATIVE_COIN)).toBe(1_100_000_000_000_000_000n);
    });

    it("honours the minimum output", () => {
      expectCode(
        () => f.strategy.invokeSwap(manager, f.altSwapper.address, ALPHA, WAD, SETTLE, 1_300_000_000_000_000_000n),
        "SLIPPAGE_EXCEEDED",
      );
      expect(f.strategy.reserves(ALPHA)).toBe(WAD);
    });

    it("rejects a swapper not enabled for the pair", () => {
      expectCode(
        () => f.strategy.invokeSwap(manager, f.altSwapper.address, ALPHA, WAD, NATIVE_COIN, 0n),
        "INVALID_SWAPPER",
      );
      expectCode(() => f.strategy.invokeSwap(manager, BOB, ALPHA, WAD, SETTLE, 0n), "INVALID_SWAPPER");
    });

    it("is manager-only", () => {
      expectCode(() => f.strategy.invokeSwap(owner, f.swapper.address, ALPHA, WAD, SETTLE, 0n), "UNAUTHORIZED");

      f.strategy.setManager(owner, BOB);
      expect(f.strategy.invokeSwap({ sender: BOB }, f.swapper.address, ALPHA, WAD, SETTLE, 0n)).toBe(
        1_100_000_000_000_000_000n,
      );
    });

    it("refuses output outside the holding set until it is added", () => {
      const betaSwapper = new FixedRateSwapper(f.chain, { owner: OWNER });
      betaSwapper.setRate(owner, ALPHA, "BETA", WAD);
      f.chain.tokens.mint("BETA", betaSwapper.address, WAD);
      f.strategy.addSwapper(owner, ALPHA, "BETA", betaSwapper);

      expectCode(() => f.strategy.invokeSwap(manager, betaSwapper.address, ALPHA, WAD, "BETA", 0n), "UNKNOWN_ASSET");
      expect(f.strategy.reserves(ALPHA)).toBe(WAD);
      expect(f.chain.tokens.balanceOf("BETA", f.strategy.address)).toBe(0n);

      f.strategy.addHoldingAsset(owner, "BETA");
      expect(f.strategy.invokeSwap(manager, betaSwapper.address, ALPHA, WAD, "BETA", 0n)).toBe(WAD);
      expect(f.strategy.reserves("BETA")).toBe(WAD);
    });

    it("forwards the manager's minimum, while default-route sales accept any output", () => {
      const recorder = new RecordingSwapper(f.chain, { owner: OWNER });
      recorder.setRate(owner, ALPHA, NATIVE_COIN, ALPHA_RATE);
      f.chain.tokens.mint(NATIVE_COIN, recorder.address, 10n * WAD);
      f.strategy.addSwapper(owner, ALPHA, NATIVE_COIN, recorder);
      f.strategy.setDefaultSwapper(owner, ALPHA, NATIVE_COIN, recorder.address);

      f.strategy.withdraw(vault, 1n, 2n, BOB);
      f.strategy.invokeSwap(manager, recorder.address, ALPHA, 250_000_000_000_000_000n, NATIVE_COIN, 270_000_000_000_000_000n);

      expect(recorder.minimums).toEqual([0n, 270_000_000_000_000_000n]);
      expect(f.strategy.reserves(NATIVE_COIN)).toBe(275_000_000_000_000_000n);
      expect(f.strategy.reserves(ALPHA)).toBe(250_000_000_000_000_000n);
    });

    it("cannot spend more than the reserve", () => {
      expectCode(() => f.strategy.invokeSwap(manager, f.swapper.address, ALPHA, 2n * WAD, SETTLE, 0n), "INSUFFICIENT_RESERVE");
    });
  });

  // ─── Administration ────────────────────────────────────────────────────

  describe("swapper administration", () => {
    it("refuses to remove the default route", () => {
      expectCode(
        () => f.strategy.removeSwapper(owner, ALPHA, SETTLE, f.swapper.address),
        "SET_DEFAULT_SWAPPER_BEFORE",
      );

      f.strategy.setDefaultSwapper(owner, ALPHA, SETTLE, f.altSwapper.address);
      f.strategy.removeSwapper(owner, ALPHA, SETTLE, f.swapper.address);

      expect(f.strategy.isSwapperEnabled(ALPHA, SETTLE, f.swapper.address)).toBe(false);
      expect(f.strategy.defaultSwapper(ALPHA, SETTLE)).toBe(f.altSwapper.address);
    });

    it("only defaults to an enabled swapper", () => {
      expectCode(
        () => f.strategy.setDefaultSwapper(owner, ALPHA, NATIVE_COIN, f.altSwapper.address),
        "NOT_SUPPORTED_SWAPPER",
      );
    });

    it("is owner-only", () => {
      expectCode(() => f.strategy.addSwapper(manager, ALPHA, SETTLE, f.altSwapper), "UNAUTHORIZED");
      expectCode(() => f.strategy.setDefaultSwapper(vault, ALPHA, SETTLE, f.altSwapper.address), "UNAUTHORIZED");
    });
  });

  describe("asset administration", () => {
    it("starts with settlement and receipt, then underlyings in order", () => {
      expect(f.strategy.holdingAssets()).toEqual([SETTLE, RECEIPT, ALPHA, NATIVE_COIN]);
      expect(f.strategy.underlyingAssets()).toEqual([SETTLE, ALPHA, NATIVE_COIN]);
      expect(f.strategy.underlyingAssetConfig(ALPHA)).toEqual({ minDepositAmount: MIN_DEPOSIT, depositCeiling: 0n });
    });

    it("removes an empty holding asset with swap-and-pop ordering", () => {
      f.strategy.removeUnderlyingAsset(owner, ALPHA);
      f.strategy.removeHoldingAsset(owner, ALPHA);
      expect(f.strategy.holdingAssets()).toEqual([SETTLE, RECEIPT, NATIVE_COIN]);
    });

    it("refuses to drop a holding asset with a reserve", () => {
      f.deposit(ALPHA, WAD);
      f.strategy.removeUnderlyingAsset(owner, ALPHA);
      expectCode(() => f.strategy.removeHoldingAsset(owner, ALPHA), "NON_ZERO_RESERVE");
    });

    it("keeps an accepted underlying in the holding set", () => {
      expectCode(() => f.strategy.removeHoldingAsset(owner, ALPHA), "UNAUTHORIZED");
      expect(f.strategy.holdingAssets()).toContain(ALPHA);

      f.deposit(ALPHA, WAD);
      expect(f.strategy.reserves(ALPHA)).toBe(WAD);
      expect(f.strategy.totalAssets()).toBe(1_100_000_000_000_000_000n);
    });

    it("keeps settlement and receipt permanently", () => {
      expectCode(() => f.strategy.removeHoldingAsset(owner, SETTLE), "UNAUTHORIZED");
      expectCode(() => f.strategy.removeHoldingAsset(owner, RECEIPT), "UNAUTHORIZED");
    });

    it("stops accepting a removed underlying but keeps holding it", () => {
      f.strategy.removeUnderlyingAsset(owner, ALPHA);

      expectCode(() => f.deposit(ALPHA, WAD), "UNKNOWN_ASSET");
      expect(f.strategy.holdingAssets()).toContain(ALPHA);
      expect(f.strategy.underlyingAssetConfig(ALPHA)).toBeUndefined();
    });

    it("updates the minimum deposit of an accepted underlying only", () => {
      f.strategy.setMinDepositAmount(owner, ALPHA, WAD);
      expectCode(() => f.deposit(ALPHA, WAD - 1n), "TOO_SMALL");

      expectCode(() => f.strategy.setMinDepositAmount(owner, "GAMMA", 1n), "UNKNOWN_ASSET");
    });

    it("rolls back a failed admin call", () => {
      expectCode(() => f.strategy.setManager(owner, ZERO_ADDRESS), "ZERO_ADDRESS");
      expect(f.strategy.manager).toBe(MANAGER);
    });
  });

  // ─── Migration ─────────────────────────────────────────────────────────

  describe("migration", () => {
    beforeEach(() => {
      f.deposit(SETTLE, WAD);
      f.deposit(ALPHA, WAD);
      f.deposit(NATIVE_COIN, WAD);
    });

    it("moves every reserve to the successor", () => {
      const next = f.makeStrategy();
      const valueBefore = f.strategy.totalAssets();

      const manifest = f.strategy.migrateFunds(vault, next.address);
      expect(manifest).toEqual({
        from: f.strategy.address,
        to: next.address,
        assets: [
          { asset: RECEIPT, amount: WAD },
          { asset: ALPHA, amount: WAD },
          { asset: NATIVE_COIN, amount: WAD },
        ],
      });
      for (const asset of ALL) {
        expect(f.strategy.reserves(asset)).toBe(0n);
      }
      expect(f.strategy.retired).toBe(true);

      next.acceptMigration(vault, f.strategy);
      expect(reservesOf(next, ALL)).toEqual({
        [SETTLE]: 0n,
        [RECEIPT]: WAD,
        [ALPHA]: WAD,
        [NATIVE_COIN]: WAD,
      });
      expect(next.holdingAssets()).toEqual([SETTLE, RECEIPT, ALPHA, NATIVE_COIN]);
      expect(next.totalAssets()).toBe(valueBefore);
      expect(valueBefore).toBe(3_100_000_000_000_000_000n);
      expect(next.nativeBalance()).toBe(WAD);
    });

    it("retires the old strategy", () => {
      const next = f.makeStrategy();
      f.strategy.migrateFunds(vault, next.address);

      expectCode(() => f.deposit(SETTLE, WAD), "STRATEGY_RETIRED");
      expectCode(() => f.strategy.withdraw(vault, 1n, 2n, BOB), "STRATEGY_RETIRED");
      expectCode(() => f.strategy.migrateFunds(vault, next.address), "STRATEGY_RETIRED");
      expectCode(() => f.strategy.invokeSwap(manager, f.swapper.address, ALPHA, 1n, SETTLE, 0n), "STRATEGY_RETIRED");
    });

    it("rejects an invalid target", () => {
      expectCode(() => f.strategy.migrateFunds(vault, ZERO_ADDRESS), "ZERO_ADDRESS");
      expectCode(() => f.strategy.migrateFunds(vault, f.strategy.address), "INVALID_STRATEGY");
      expectCode(() => f.strategy.migrateFunds({ sender: BOB }, BOB), "UNAUTHORIZED");
    });

    it("requires the registry to release the receipt", () => {
      const next = f.makeStrategy();
      f.registry.setWithdrawalsPaused(owner, true);

      expectCode(() => f.strategy.migrateFunds(vault, next.address), "REGISTRY_WITHDRAW_BLOCKED");
      expect(f.strategy.retired).toBe(false);
      expect(f.strategy.reserves(ALPHA)).toBe(WAD);
    });

    it("only accepts a manifest addressed to itself", () => {
      const next = f.makeStrategy();
      const other = f.makeStrategy();

      expectCode(() => next.acceptMigration(vault, f.strategy), "INVALID_STRATEGY");

      f.strategy.migrateFunds(vault, next.address);
      expectCode(() => other.acceptMigration(vault, f.strategy), "INVALID_STRATEGY");
    });
  });
});
