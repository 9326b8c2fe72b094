#!/usr/bin/env node
/**
 * @yieldmesh/demo: Terminal walkthrough.
 *
 * Runs the reference deployment through four scenarios:
 * donation attack -> lock-up rejection -> sibling backstop -> strategy migration
 *
 * Uses the domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import { Chain } from "@yieldmesh/chain";
import { formatAmount } from "@yieldmesh/ledger";
import { NATIVE_COIN, WAD, isProtocolError } from "@yieldmesh/types";
import type { Address, AssetId, Msg } from "@yieldmesh/types";
import { deployReferenceVault } from "@yieldmesh/vault";
import type { ReferenceDeployment, ReferenceOptions } from "@yieldmesh/vault";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;
const ONE_DAY = 86_400;

const ALICE: Address = "0x00000000000000000000000000000000000000a1";
const BOB: Address = "0x00000000000000000000000000000000000000b0";
const MALLORY: Address = "0x00000000000000000000000000000000000000c0";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     YIELDMESH DEMO                       ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Multi-asset vault on an in-process chain          ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.white(value));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

/** Six decimal places of an 18-decimal amount. */
function fmt(amount: bigint): string {
  const full = formatAmount(amount, 18);
  return full.slice(0, full.indexOf(".") + 7);
}

function deploy(options: ReferenceOptions = {}): ReferenceDeployment {
  return deployReferenceVault(new Chain(), options);
}

function fundAndDeposit(d: ReferenceDeployment, account: Address, asset: AssetId, amount: bigint, sell = false): bigint {
  d.chain.tokens.mint(asset, account, amount);
  const msg: Msg = asset === NATIVE_COIN ? { sender: account, value: amount } : { sender: account };
  return d.vault.deposit(msg, asset, amount, sell);
}

/**
 * Run a call that must revert and print its code.
 */
function expectRevert(label: string, fn: () => unknown): void {
  try {
    fn();
  } catch (err) {
    if (!isProtocolError(err)) {
      throw err;
    }
    warn(`${label} reverted with ${err.code}`);
    return;
  }
  throw new Error(`${label} was expected to revert`);
}

const TOTAL_STEPS = 6;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Deposits, donations, lock-ups and migrations against"));
  console.log(chalk.gray("  the reference deployment. No mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Deploy ─────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Deploy");

  const d = deploy();
  const { assets, vault } = d;
  ok(`Vault ${vault.address} (lock-up ${String(vault.minLockUpPeriod)}s)`);
  ok(`Strategy ${d.strategy.address}`);
  info("wstkETH rate", fmt(d.stakedRate.rate()));
  info("xETH rate", fmt(d.restakedRate.rate()));

  await sleep(DELAY_MS);

  // ─── Step 2: Donation attack ────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Donation Attack");

  const point02 = (2n * WAD) / 100n;
  fundAndDeposit(d, ALICE, assets.restaked, point02);
  ok(`Alice deposits ${fmt(point02)} xETH`);
  info("totalAssets", fmt(vault.totalAssets()));

  d.chain.tokens.mint(assets.staked, MALLORY, 100n * WAD);
  d.chain.tokens.transfer(assets.staked, MALLORY, d.strategy.address, 50n * WAD);
  d.chain.tokens.transfer(assets.staked, MALLORY, vault.address, 50n * WAD);
  warn("Mallory sends 100 wstkETH straight to the strategy and the vault");
  info("totalAssets", fmt(vault.totalAssets()));
  info("share price", fmt(vault.sharePrice()));

  const bobShares = fundAndDeposit(d, BOB, assets.restaked, point02);
  ok(`Bob deposits ${fmt(point02)} xETH for ${fmt(bobShares)} shares`);
  info("totalAssets", fmt(vault.totalAssets()));

  await sleep(DELAY_MS);

  // ─── Step 3: Lock-up ────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Lock-Up");

  info("Bob locked until", String(vault.lockedUntil(BOB)));
  expectRevert("Immediate withdrawal", () => vault.withdraw({ sender: BOB }, bobShares));

  d.chain.advanceTime(ONE_DAY);
  const out = vault.withdraw({ sender: BOB }, bobShares);
  ok(`After one day Bob redeems ${fmt(bobShares)} shares`);
  info("native out", fmt(out.nativeOut));
  info("settlement out", fmt(out.settlementOut));

  await sleep(DELAY_MS);

  // ─── Step 4: Sibling backstop ───────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Sibling Backstop");

  const s = deploy({ siblingSeed: 0n });
  s.chain.tokens.mint(s.assets.settlement, ALICE, WAD);
  s.sibling.deposit({ sender: ALICE }, WAD);
  s.chain.advanceTime(ONE_DAY);
  ok("Alice deposits 1 WETH into the sibling vault");

  expectRevert("Sibling withdrawal", () => s.sibling.withdraw({ sender: ALICE }, WAD / 2n));

  fundAndDeposit(s, BOB, NATIVE_COIN, WAD / 2n, true);
  ok("Bob deposits 0.5 ETH into the main vault, sold for WETH through the sibling");
  const holdings = s.sibling.holdings();
  info("sibling WETH", fmt(holdings.heldAsset));
  info("sibling ETH", fmt(holdings.heldNative));

  const paid = s.sibling.withdraw({ sender: ALICE }, WAD / 2n);
  ok(`Alice's retry pays ${fmt(paid)} ETH`);

  await sleep(DELAY_MS);

  // ─── Step 5: Migration ──────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Strategy Migration");

  fundAndDeposit(d, ALICE, assets.settlement, WAD);
  const before = vault.totalAssets();
  const previous = d.strategy;
  const next = d.deployStrategy();
  vault.migrateStrategy({ sender: d.owner }, next);
  ok(`Funds moved to ${next.address}`);

  for (const asset of previous.holdingAssets()) {
    const symbol = d.chain.tokens.info(asset)?.symbol ?? asset;
    info(symbol, `${fmt(previous.reserves(asset))} -> ${fmt(next.reserves(asset))}`);
  }
  info("totalAssets", `${fmt(before)} -> ${fmt(vault.totalAssets())}`);
  expectRevert("Deposit into the retired strategy", () =>
    previous.deposit({ sender: vault.address }, assets.settlement, WAD, false),
  );

  await sleep(DELAY_MS);

  // ─── Step 6: Summary ────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Summary");

  const alice = vault.position(ALICE);
  info("Alice shares", fmt(alice.shares));
  info("Alice value", fmt(alice.assets));
  info("share price", fmt(vault.sharePrice()));
  console.log();
  console.log(chalk.gray("    Reserves are accounted, never read from balances;"));
  console.log(chalk.gray("    donations change nothing a holder can redeem."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
