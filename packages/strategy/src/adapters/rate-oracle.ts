/**
 * Rate Oracle: Valuation backed by per-asset value sources.
 *
 * Sources are read on every call; nothing is cached, so an accruing
 * source moves totalAssets() as the clock advances.
 */

import { ProtocolError, WAD } from "@yieldmesh/types";
import type { AssetId } from "@yieldmesh/types";
import { wadMul } from "@yieldmesh/ledger";
import type { Valuation, ValueSource } from "../types.js";

const SECONDS_PER_YEAR = 365n * 24n * 60n * 60n;

// ─── Rate feeds ──────────────────────────────────────────────────────────

/**
 * A value source priced by a single WAD-scaled rate.
 */
export interface RateFeed extends ValueSource {
  rate(): bigint;
}

export interface Clock {
  now(): number;
}

/**
 * Constant rate. `fixedRate(WAD)` is the identity.
 */
export function fixedRate(rate: bigint): RateFeed {
  return {
    rate: () => rate,
    settlementValue: (amount) => wadMul(amount, rate),
  };
}

export class MutableRate implements RateFeed {
  private _rate: bigint;

  constructor(rate: bigint = WAD) {
    this._rate = rate;
  }

  rate(): bigint {
    return this._rate;
  }

  setRate(rate: bigint): void {
    if (rate < 0n) {
      throw new ProtocolError("INVALID_AMOUNT", `Rate must be non-negative, got ${rate.toString()}`);
    }
    this._rate = rate;
  }

  settlementValue(amount: bigint): bigint {
    return wadMul(amount, this._rate);
  }
}

export interface AccruingRateOptions {
  /** Rate at `since`, WAD-scaled */
  readonly baseRate: bigint;
  /** Simple annual growth, WAD-scaled (5% = WAD / 20n) */
  readonly ratePerYear: bigint;
  /** Start of accrual, seconds; defaults to the clock's current time */
  readonly since?: number | undefined;
}

/**
 * Linearly accruing rate, the way a staking derivative's exchange rate
 * drifts upward between reports.
 */
export class AccruingRate implements RateFeed {
  private readonly clock: Clock;
  private readonly baseRate: bigint;
  private readonly ratePerYear: bigint;
  private readonly since: number;

  constructor(clock: Clock, options: AccruingRateOptions) {
    this.clock = clock;
    this.baseRate = options.baseRate;
    this.ratePerYear = options.ratePerYear;
    this.since = options.since ?? clock.now();
  }

  rate(): bigint {
    const elapsed = BigInt(Math.max(0, this.clock.now() - this.since));
    const growth = (wadMul(this.baseRate, this.ratePerYear) * elapsed) / SECONDS_PER_YEAR;
    return this.baseRate + growth;
  }

  settlementValue(amount: bigint): bigint {
    return wadMul(amount, this.rate());
  }
}

// ─── Oracle ──────────────────────────────────────────────────────────────

export class RateOracle implements Valuation {
  private readonly _sources: Map<AssetId, ValueSource> = new Map();

  constructor(sources: Iterable<readonly [AssetId, ValueSource]> = []) {
    for (const [asset, source] of sources) {
      this._sources.set(asset, source);
    }
  }

  setSource(asset: AssetId, source: ValueSource): void {
    this._sources.set(asset, source);
  }

  assetValue(asset: AssetId, amount: bigint): bigint {
    if (amount === 0n) {
      return 0n;
    }
    const source = this._sources.get(asset);
    if (source === undefined) {
      throw new ProtocolError("UNKNOWN_ASSET", `No value source for ${asset}`);
    }
    return source.settlementValue(amount);
  }
}
