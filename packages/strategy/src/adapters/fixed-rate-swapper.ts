/**
 * Fixed-rate swap venue.
 *
 * Quotes each enabled pair at a WAD-scaled rate and pays out of its own
 * token balance (its liquidity). Liquidity is funded by minting or
 * transferring tokens to the swapper's address.
 *
 * Rules:
 * - Unknown pair → NOT_SUPPORTED_SWAPPER
 * - Native input must arrive as msg.value == amountIn (INVALID_AMOUNT)
 * - Output below minAmountOut → SLIPPAGE_EXCEEDED
 * - Output above held liquidity → INSUFFICIENT_LIQUIDITY
 */

import { Contract } from "@yieldmesh/chain";
import type { Chain, Restore } from "@yieldmesh/chain";
import { wadMul } from "@yieldmesh/ledger";
import { ProtocolError, assertNonZeroAddress, isNativeCoin } from "@yieldmesh/types";
import type { Address, AssetId, Msg } from "@yieldmesh/types";
import type { Swapper } from "../types.js";

export interface FixedRateSwapperParams {
  readonly owner: Address;
  readonly address?: Address | undefined;
}

export class FixedRateSwapper extends Contract implements Swapper {
  readonly owner: Address;
  private _rates: Map<string, bigint> = new Map();

  constructor(chain: Chain, params: FixedRateSwapperParams) {
    super(chain, params.address);
    assertNonZeroAddress(params.owner, "owner");
    this.owner = params.owner;
  }

  rateOf(tokenIn: AssetId, tokenOut: AssetId): bigint | undefined {
    return this._rates.get(`${tokenIn}->${tokenOut}`);
  }

  /**
   * Quote `tokenOut` per `tokenIn`, WAD-scaled. A rate of 0 disables the pair.
   */
  setRate(msg: Msg, tokenIn: AssetId, tokenOut: AssetId, rate: bigint): void {
    this.atomic(() => {
      if (msg.sender !== this.owner) {
        throw new ProtocolError("UNAUTHORIZED", `${msg.sender} is not the owner`);
      }
      if (rate < 0n) {
        throw new ProtocolError("INVALID_AMOUNT", `Rate must be non-negative, got ${rate.toString()}`);
      }
      const key = `${tokenIn}->${tokenOut}`;
      if (rate === 0n) {
        this._rates.delete(key);
      } else {
        this._rates.set(key, rate);
      }
    });
  }

  quote(tokenIn: AssetId, amountIn: bigint, tokenOut: AssetId): bigint {
    const rate = this.rateOf(tokenIn, tokenOut);
    if (rate === undefined) {
      throw new ProtocolError("NOT_SUPPORTED_SWAPPER", `No rate for ${tokenIn} -> ${tokenOut}`);
    }
    return wadMul(amountIn, rate);
  }

  swap(
    msg: Msg,
    tokenIn: AssetId,
    amountIn: bigint,
    tokenOut: AssetId,
    minAmountOut: bigint,
  ): bigint {
    return this.nonReentrant(() => {
      const amountOut = this.quote(tokenIn, amountIn, tokenOut);

      if (isNativeCoin(tokenIn)) {
        if ((msg.value ?? 0n) !== amountIn) {
          throw new ProtocolError(
            "INVALID_AMOUNT",
            `Native swap of ${amountIn.toString()} sent ${(msg.value ?? 0n).toString()}`,
          );
        }
        this.collectValue(msg);
      } else {
        this.rejectValue(msg);
        this.chain.tokens.transfer(tokenIn, msg.sender, this.address, amountIn);
      }

      if (amountOut < minAmountOut) {
        throw new ProtocolError(
          "SLIPPAGE_EXCEEDED",
          `Swap returns ${amountOut.toString()}, minimum is ${minAmountOut.toString()}`,
        );
      }
      const liquidity = this.chain.tokens.balanceOf(tokenOut, this.address);
      if (amountOut > liquidity) {
        throw new ProtocolError(
          "INSUFFICIENT_LIQUIDITY",
          `Swapper holds ${liquidity.toString()} of ${tokenOut}, needs ${amountOut.toString()}`,
        );
      }

      if (isNativeCoin(tokenOut)) {
        this.chain.sendValueOrRevert(this.address, msg.sender, amountOut);
      } else {
        this.chain.tokens.transfer(tokenOut, this.address, msg.sender, amountOut);
      }
      return amountOut;
    });
  }

  /**
   * Native liquidity top-ups.
   */
  override receiveValue(): void {
    // accepted
  }

  checkpoint(): Restore {
    const rates = new Map(this._rates);
    return () => {
      this._rates = rates;
    };
  }
}
