/**
 * @granary/quote — Value/unit conversion and pool redemption.
 *
 * Capabilities consumed by the planner and redeemer:
 * - Quote: value ↔ asset-native units
 * - PriceSource: market price per asset
 * - LiquiditySource: redeem pool shares into base value
 *
 * PoolBook provides all three from in-process constant-product pools.
 */

export { PoolBook } from "./pool-book.js";
export { ConstantProductPool } from "./pool.js";

export type {
  Quote,
  PriceSource,
  LiquiditySource,
  PoolConfig,
  RedeemOrder,
  QuoteErrorCode,
} from "./types.js";

export { QuoteError, PRICE_PRECISION } from "./types.js";
