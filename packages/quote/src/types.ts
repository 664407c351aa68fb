/**
 * @granary/quote — Capability interfaces and pool types.
 *
 * The planner and redeemer never read reserves directly; they go
 * through these three narrow capabilities so that any oracle or AMM
 * can stand behind them.
 *
 * Rules:
 * - All quantities are bigint
 * - Conversions round against the caller (no value from nothing)
 * - Reads never mutate; only `redeem` and `redeemBatch` move reserves
 */

import type { AssetId } from "@granary/types";

/** Fixed-point precision for prices (6 decimals, like the base asset). */
export const PRICE_PRECISION = 1_000_000n;

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Read-only conversion between value and asset-native units.
 */
export interface Quote {
  /** Smallest number of units that redeems for at least `value`. */
  valueToUnits(asset: AssetId, value: bigint): bigint;

  /** Value `units` redeem for, rounded down. */
  unitsToValue(asset: AssetId, units: bigint): bigint;
}

/**
 * Current market price of the base asset as seen through each asset.
 */
export interface PriceSource {
  /** Price scaled by PRICE_PRECISION. */
  priceOf(asset: AssetId): bigint;
}

/**
 * Redemption of pool shares into base-asset value.
 */
export interface LiquiditySource {
  /** What `redeem` would return right now. */
  previewRedeem(asset: AssetId, units: bigint): bigint;

  /**
   * Burn `units` and return the base-asset value paid out.
   * Throws SLIPPAGE_EXCEEDED when the payout is below `minValueOut`.
   */
  redeem(asset: AssetId, units: bigint, minValueOut: bigint): bigint;

  /**
   * Redeem several orders as one unit. Returns each payout in order, or
   * throws with no reserves moved.
   */
  redeemBatch(orders: readonly RedeemOrder[]): readonly bigint[];
}

/**
 * One leg of a batched redemption.
 */
export interface RedeemOrder {
  readonly asset: AssetId;
  readonly units: bigint;
  readonly minValueOut: bigint;
}

// =============================================================================
// Pools
// =============================================================================

/**
 * A two-sided constant-product pool whose shares are a depositable asset.
 */
export interface PoolConfig {
  /** The pool-share asset */
  readonly asset: AssetId;

  /** Base asset held by the pool */
  readonly baseReserve: bigint;

  /** Paired asset held by the pool */
  readonly pairedReserve: bigint;

  /** Outstanding pool shares */
  readonly shareSupply: bigint;

  /** Value of one paired unit, scaled by PRICE_PRECISION */
  readonly pairedPrice: bigint;
}

// =============================================================================
// Errors
// =============================================================================

export type QuoteErrorCode =
  | "UNKNOWN_POOL"
  | "DUPLICATE_POOL"
  | "INVALID_RESERVES"
  | "INSUFFICIENT_LIQUIDITY"
  | "SLIPPAGE_EXCEEDED";

export class QuoteError extends Error {
  public readonly code: QuoteErrorCode;

  constructor(code: QuoteErrorCode, message: string) {
    super(message);
    this.name = "QuoteError";
    this.code = code;
  }
}
