/**
 * PoolBook — in-process Quote, PriceSource and LiquiditySource.
 *
 * Holds one constant-product pool per pool-share asset. The base asset
 * converts 1:1 with value; its market price is the liquidity-weighted
 * price across all pools.
 *
 * Rules:
 * - One pool per asset
 * - Quotes are read-only
 * - Only redeem() and redeemBatch() move reserves
 */

import type { AssetId } from "@granary/types";
import { ConstantProductPool } from "./pool.js";
import type { LiquiditySource, PoolConfig, PriceSource, Quote, RedeemOrder } from "./types.js";
import { PRICE_PRECISION, QuoteError } from "./types.js";

export class PoolBook implements Quote, PriceSource, LiquiditySource {
  private readonly baseAsset: AssetId;
  private readonly pools: Map<AssetId, ConstantProductPool> = new Map();

  constructor(baseAsset: AssetId) {
    this.baseAsset = baseAsset;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pool management
  // ───────────────────────────────────────────────────────────────────────

  addPool(config: PoolConfig): ConstantProductPool {
    if (config.asset === this.baseAsset || this.pools.has(config.asset)) {
      throw new QuoteError("DUPLICATE_POOL", `Pool '${config.asset}' already exists`);
    }
    const pool = new ConstantProductPool(config);
    this.pools.set(config.asset, pool);
    return pool;
  }

  getPool(asset: AssetId): ConstantProductPool {
    const pool = this.pools.get(asset);
    if (!pool) {
      throw new QuoteError("UNKNOWN_POOL", `No pool for asset '${asset}'`);
    }
    return pool;
  }

  hasPool(asset: AssetId): boolean {
    return this.pools.has(asset);
  }

  listPools(): readonly PoolConfig[] {
    return [...this.pools.values()].map((p) => p.state());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Quote
  // ───────────────────────────────────────────────────────────────────────

  valueToUnits(asset: AssetId, value: bigint): bigint {
    if (asset === this.baseAsset) {
      return value > 0n ? value : 0n;
    }
    return this.getPool(asset).sharesForValue(value);
  }

  unitsToValue(asset: AssetId, units: bigint): bigint {
    if (asset === this.baseAsset) {
      return units > 0n ? units : 0n;
    }
    return this.getPool(asset).previewRemove(units);
  }

  // ───────────────────────────────────────────────────────────────────────
  // PriceSource
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Base price inside a pool, or the liquidity-weighted price across
   * every pool for the base asset itself (the peg when there are none).
   */
  priceOf(asset: AssetId): bigint {
    if (asset !== this.baseAsset) {
      return this.getPool(asset).basePrice();
    }

    let pairedValue = 0n;
    let baseHeld = 0n;
    for (const pool of this.pools.values()) {
      pairedValue += pool.pairedValue();
      baseHeld += pool.baseBalance;
    }
    return baseHeld === 0n ? PRICE_PRECISION : pairedValue / baseHeld;
  }

  // ───────────────────────────────────────────────────────────────────────
  // LiquiditySource
  // ───────────────────────────────────────────────────────────────────────

  previewRedeem(asset: AssetId, units: bigint): bigint {
    return this.getPool(asset).previewRemove(units);
  }

  redeem(asset: AssetId, units: bigint, minValueOut: bigint): bigint {
    return this.getPool(asset).remove(units, minValueOut);
  }

  /**
   * Apply every order in turn; on the first failure, put each touched
   * pool back to the state it had before the batch.
   */
  redeemBatch(orders: readonly RedeemOrder[]): readonly bigint[] {
    const before = new Map<AssetId, PoolConfig>();
    for (const order of orders) {
      if (!before.has(order.asset)) {
        before.set(order.asset, this.getPool(order.asset).state());
      }
    }

    try {
      return orders.map((order) => this.getPool(order.asset).remove(order.units, order.minValueOut));
    } catch (err) {
      for (const [asset, state] of before) {
        this.getPool(asset).reset(state);
      }
      throw err;
    }
  }
}
