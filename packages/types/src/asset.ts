/**
 * Asset Types
 *
 * Depositable assets and how the silo treats them.
 *
 * Rules:
 * - Exactly one asset is the base asset (the unit of value)
 * - Every other asset is a pool share redeemable into the base asset
 * - Reward rate and maturity window are expressed in growth-index units
 */

/**
 * Asset identifier (token symbol or address, e.g. "BEAN", "BEAN:USDC-LP").
 */
export type AssetId = string;

/**
 * Depositor identifier. Authentication happens before the engine is called.
 */
export type OwnerId = string;

/**
 * How an asset relates to the accounting unit.
 */
export type AssetKind = "base" | "poolShare";

/**
 * A registered depositable asset.
 */
export interface AssetDefinition {
  /** Unique asset identifier */
  readonly id: AssetId;

  /** Base asset (units are value) or a liquidity-pool share */
  readonly kind: AssetKind;

  /** Growth-index increment applied to the asset's tip once per period */
  readonly rewardRate: bigint;

  /**
   * Accrued weight a lot needs before it counts as mature.
   * Lots with `tip - index < maturityWindow` are immature.
   */
  readonly maturityWindow: bigint;
}
