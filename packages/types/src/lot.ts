/**
 * Lot Types
 *
 * A lot is one deposit record. Its key is (owner, asset, index);
 * the index is the asset's growth tip at the time of the deposit.
 *
 * Rules:
 * - Amounts and values are bigint, never floating point
 * - A stored lot never has a zero amount
 * - Partial withdrawal keeps the index and shrinks amount and value
 */

import type { AssetId, OwnerId } from "./asset.js";

/**
 * A single deposit lot as read from the ledger.
 */
export interface Lot {
  readonly owner: OwnerId;
  readonly asset: AssetId;

  /** Growth index recorded when the lot was created */
  readonly index: bigint;

  /** Asset-native units */
  readonly amount: bigint;

  /** Accounting-unit value fixed at creation */
  readonly value: bigint;
}

/**
 * An (index, amount) pair referencing part or all of a lot.
 */
export interface LotEntry {
  readonly index: bigint;
  readonly amount: bigint;
}
