/**
 * Rate Wrapper: canonical wrapped form of a rebasing asset.
 *
 * wrap() takes the rebasing asset and mints the wrapped asset at the
 * feed's current rate (rebasing units per wrapped unit, WAD-scaled);
 * unwrap() reverses it at the rate of the moment.
 */

import { Contract } from "@yieldmesh/chain";
import type { Chain, Restore } from "@yieldmesh/chain";
import { wadDiv, wadMul } from "@yieldmesh/ledger";
import { ProtocolError } from "@yieldmesh/types";
import type { Address, AssetId, Msg } from "@yieldmesh/types";
import type { AssetWrapper } from "../types.js";
import type { RateFeed } from "./rate-oracle.js";

export interface RateWrapperParams {
  readonly asset: AssetId;
  readonly wrappedAsset: AssetId;
  readonly rate: RateFeed;
  readonly address?: Address | undefined;
}

export class RateWrapper extends Contract implements AssetWrapper {
  readonly asset: AssetId;
  readonly wrappedAsset: AssetId;
  private readonly feed: RateFeed;

  constructor(chain: Chain, params: RateWrapperParams) {
    super(chain, params.address);
    if (params.asset === params.wrappedAsset) {
      throw new ProtocolError("UNKNOWN_ASSET", "Wrapped asset must differ from its input asset");
    }
    this.asset = params.asset;
    this.wrappedAsset = params.wrappedAsset;
    this.feed = params.rate;
  }

  /** Wrapped amount `amount` of the input asset converts to right now */
  getWrappedAmount(amount: bigint): bigint {
    return wadDiv(amount, this.feed.rate());
  }

  /** Input-asset amount `wrappedAmount` unwraps to right now */
  getUnwrappedAmount(wrappedAmount: bigint): bigint {
    return wadMul(wrappedAmount, this.feed.rate());
  }

  wrap(msg: Msg, amount: bigint): bigint {
    return this.nonReentrant(() => {
      this.rejectValue(msg);
      const wrapped = this.getWrappedAmount(amount);
      this.chain.tokens.transfer(this.asset, msg.sender, this.address, amount);
      this.chain.tokens.mint(this.wrappedAsset, msg.sender, wrapped);
      return wrapped;
    });
  }

  unwrap(msg: Msg, wrappedAmount: bigint): bigint {
    return this.nonReentrant(() => {
      this.rejectValue(msg);
      const amount = this.getUnwrappedAmount(wrappedAmount);
      this.chain.tokens.burn(this.wrappedAsset, msg.sender, wrappedAmount);
      this.chain.tokens.transfer(this.asset, this.address, msg.sender, amount);
      return amount;
    });
  }

  checkpoint(): Restore {
    return () => undefined;
  }
}
