/**
 * Lock-up book: per-holder earliest redemption time.
 *
 * Every deposit refreshes the holder's lock to `now + period`, even when
 * that moves it later than an earlier lock. Redemption is permitted at
 * or after `lockedUntil`.
 */

import { ProtocolError } from "@yieldmesh/types";
import type { Address } from "@yieldmesh/types";

export function assertLockUpPeriod(seconds: number): void {
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new ProtocolError(
      "INVALID_AMOUNT",
      `Lock-up period must be a non-negative whole number of seconds, got ${String(seconds)}`,
    );
  }
}

export class LockUpBook {
  private _period: number;
  private readonly _until: Map<Address, number>;

  constructor(period: number, until: Iterable<readonly [Address, number]> = []) {
    assertLockUpPeriod(period);
    this._period = period;
    this._until = new Map(until);
  }

  get period(): number {
    return this._period;
  }

  setPeriod(seconds: number): void {
    assertLockUpPeriod(seconds);
    this._period = seconds;
  }

  lockedUntil(holder: Address): number {
    return this._until.get(holder) ?? 0;
  }

  isUnlocked(holder: Address, now: number): boolean {
    return now >= this.lockedUntil(holder);
  }

  refresh(holder: Address, now: number): number {
    const until = now + this._period;
    this._until.set(holder, until);
    return until;
  }

  assertUnlocked(holder: Address, now: number): void {
    const until = this.lockedUntil(holder);
    if (now < until) {
      throw new ProtocolError(
        "COME_BACK_LATER",
        `Shares of ${holder} are locked for another ${String(until - now)}s`,
      );
    }
  }

  clone(): LockUpBook {
    return new LockUpBook(this._period, this._until);
  }
}
