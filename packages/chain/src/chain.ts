/**
 * @yieldmesh/chain: In-process execution host.
 *
 * Sequential, single-threaded execution model:
 * - One call runs to completion before the next begins
 * - Every call made through atomic() is all-or-nothing: a thrown error
 *   restores the token book and every deployed contract
 * - Block time only moves when advanceTime()/warpTo() is called
 *
 * API surface:
 * - deploy() / contractAt(): Contract registry
 * - atomic(): Run a call with rollback on failure
 * - sendValue(): Low-level native coin transfer that reports failure
 * - now() / advanceTime() / warpTo(): Block clock
 */

import { NATIVE_COIN, ProtocolError, isProtocolError } from "@yieldmesh/types";
import type { Address } from "@yieldmesh/types";
import { TokenBook } from "./token-book.js";
import type { Contract } from "./contract.js";
import type { ChainOptions, Restore, SendResult } from "./types.js";

const DEFAULT_GENESIS_TIME = 1_700_000_000;

export class Chain {
  readonly tokens: TokenBook = new TokenBook();
  private readonly _contracts: Map<Address, Contract> = new Map();
  private _now: number;
  private _nonce = 0;

  constructor(options: ChainOptions = {}) {
    this._now = options.genesisTime ?? DEFAULT_GENESIS_TIME;
    this.tokens.register({
      id: NATIVE_COIN,
      symbol: options.nativeSymbol ?? "ETH",
      decimals: 18,
    });
  }

  // ─── Clock ───────────────────────────────────────────────────────────

  now(): number {
    return this._now;
  }

  advanceTime(seconds: number): number {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new RangeError(`Cannot advance time by ${String(seconds)} seconds`);
    }
    this._now += seconds;
    return this._now;
  }

  warpTo(timestamp: number): number {
    if (!Number.isInteger(timestamp) || timestamp < this._now) {
      throw new RangeError(`Cannot warp back from ${String(this._now)} to ${String(timestamp)}`);
    }
    this._now = timestamp;
    return this._now;
  }

  // ─── Contracts ───────────────────────────────────────────────────────

  newAddress(): Address {
    this._nonce++;
    return `0x${this._nonce.toString(16).padStart(40, "0")}`;
  }

  deploy(contract: Contract): void {
    if (this._contracts.has(contract.address)) {
      throw new Error(`Address already in use: ${contract.address}`);
    }
    this._contracts.set(contract.address, contract);
  }

  contractAt(address: Address): Contract | undefined {
    return this._contracts.get(address);
  }

  isContract(address: Address): boolean {
    return this._contracts.has(address);
  }

  // ─── Execution ───────────────────────────────────────────────────────

  /**
   * Run `fn` so that any thrown error leaves no trace: the token book and
   * every deployed contract are restored before the error propagates.
   * Nested calls take their own checkpoint.
   */
  atomic<T>(fn: () => T): T {
    const restores = this.checkpoint();
    try {
      return fn();
    } catch (err) {
      for (const restore of restores) {
        restore();
      }
      throw err;
    }
  }

  /**
   * Transfer native coin and run the recipient's receive hook.
   *
   * A revert (ProtocolError) anywhere in the transfer or the hook is
   * rolled back and reported as `{ ok: false }`; the caller decides
   * whether that fails its own call. Any other error propagates.
   */
  sendValue(from: Address, to: Address, amount: bigint): SendResult {
    try {
      this.atomic(() => {
        this.tokens.transfer(NATIVE_COIN, from, to, amount);
        this._contracts.get(to)?.receiveValue({ sender: from, value: amount });
      });
      return { ok: true };
    } catch (err) {
      if (isProtocolError(err)) {
        return { ok: false, reason: err };
      }
      throw err;
    }
  }

  /**
   * sendValue() that fails the current call with FAILED_TO_SEND_ETH.
   */
  sendValueOrRevert(from: Address, to: Address, amount: bigint): void {
    const result = this.sendValue(from, to, amount);
    if (!result.ok) {
      throw new ProtocolError(
        "FAILED_TO_SEND_ETH",
        `Native transfer of ${amount.toString()} to ${to} failed: ${result.reason.message}`,
      );
    }
  }

  private checkpoint(): Restore[] {
    const restores: Restore[] = [this.tokens.checkpoint()];
    for (const contract of this._contracts.values()) {
      restores.push(contract.checkpoint());
    }
    return restores;
  }
}
