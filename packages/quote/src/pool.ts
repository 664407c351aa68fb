/**
 * Constant-product pool — single-sided share redemption.
 *
 * Redeeming shares into the base asset is modelled as a proportional
 * withdrawal of both reserves followed by a swap of the paired part
 * back into base along x·y = k. Every division floors, so the payout
 * is never more than the reserves support.
 */

import type { AssetId } from "@granary/types";
import type { PoolConfig } from "./types.js";
import { PRICE_PRECISION, QuoteError } from "./types.js";

export class ConstantProductPool {
  readonly asset: AssetId;
  private baseReserve: bigint;
  private readonly pairedReserve: bigint;
  private shareSupply: bigint;
  private readonly pairedPrice: bigint;

  constructor(config: PoolConfig) {
    if (
      config.baseReserve <= 0n ||
      config.pairedReserve <= 0n ||
      config.shareSupply <= 0n ||
      config.pairedPrice <= 0n
    ) {
      throw new QuoteError(
        "INVALID_RESERVES",
        `Pool '${config.asset}' needs positive reserves, supply and paired price`,
      );
    }
    this.asset = config.asset;
    this.baseReserve = config.baseReserve;
    this.pairedReserve = config.pairedReserve;
    this.shareSupply = config.shareSupply;
    this.pairedPrice = config.pairedPrice;
  }

  state(): PoolConfig {
    return {
      asset: this.asset,
      baseReserve: this.baseReserve,
      pairedReserve: this.pairedReserve,
      shareSupply: this.shareSupply,
      pairedPrice: this.pairedPrice,
    };
  }

  /**
   * Base-asset value paid for burning `shares`.
   */
  previewRemove(shares: bigint): bigint {
    if (shares < 0n || shares > this.shareSupply) {
      throw new QuoteError(
        "INSUFFICIENT_LIQUIDITY",
        `Pool '${this.asset}' has ${this.shareSupply.toString()} shares, cannot remove ${shares.toString()}`,
      );
    }
    if (shares === 0n) {
      return 0n;
    }

    const baseOut = (this.baseReserve * shares) / this.shareSupply;
    const pairedOut = (this.pairedReserve * shares) / this.shareSupply;
    const baseLeft = this.baseReserve - baseOut;
    const pairedLeft = this.pairedReserve - pairedOut;

    // Swap the withdrawn paired amount back into base against what remains.
    const swapOut = (baseLeft * pairedOut) / (pairedLeft + pairedOut);
    return baseOut + swapOut;
  }

  /**
   * Smallest share amount whose removal pays at least `value`.
   * Values beyond the whole pool resolve to the full supply.
   */
  sharesForValue(value: bigint): bigint {
    if (value <= 0n) {
      return 0n;
    }
    if (this.previewRemove(this.shareSupply) < value) {
      return this.shareSupply;
    }

    // Invariant: previewRemove(lo) < value <= previewRemove(hi)
    let lo = 0n;
    let hi = this.shareSupply;
    while (hi - lo > 1n) {
      const mid = (lo + hi) / 2n;
      if (this.previewRemove(mid) >= value) {
        hi = mid;
      } else {
        lo = mid;
      }
    }
    return hi;
  }

  /**
   * Burn shares and pay out base. The paired side returns to the pool
   * through the swap, so only the base reserve and supply shrink.
   */
  remove(shares: bigint, minValueOut: bigint): bigint {
    const out = this.previewRemove(shares);
    if (out < minValueOut) {
      throw new QuoteError(
        "SLIPPAGE_EXCEEDED",
        `Pool '${this.asset}' pays ${out.toString()} for ${shares.toString()} shares, minimum is ${minValueOut.toString()}`,
      );
    }
    this.baseReserve -= out;
    this.shareSupply -= shares;
    return out;
  }

  /**
   * Return to an earlier state of this pool. Only the base reserve and
   * the share supply move on removal.
   */
  reset(state: PoolConfig): void {
    if (
      state.asset !== this.asset ||
      state.pairedReserve !== this.pairedReserve ||
      state.pairedPrice !== this.pairedPrice
    ) {
      throw new QuoteError("INVALID_RESERVES", `State does not belong to pool '${this.asset}'`);
    }
    this.baseReserve = state.baseReserve;
    this.shareSupply = state.shareSupply;
  }

  /**
   * Price of one base unit inside this pool, scaled by PRICE_PRECISION.
   */
  basePrice(): bigint {
    if (this.baseReserve === 0n) {
      return 0n;
    }
    return (this.pairedReserve * this.pairedPrice) / this.baseReserve;
  }

  /**
   * Value of the paired side, in PRICE_PRECISION-scaled units.
   */
  pairedValue(): bigint {
    return this.pairedReserve * this.pairedPrice;
  }

  get baseBalance(): bigint {
    return this.baseReserve;
  }
}
