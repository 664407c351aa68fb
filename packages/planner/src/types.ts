/**
 * @granary/planner domain types.
 *
 * The planner turns "raise this much value" into a withdrawal plan:
 * which lots, of which assets, in what order. The redeemer carries a
 * plan out against the ledger and the pools.
 *
 * - Filter policy (index bounds, accrued-weight cap, maturity, low accrual)
 * - Source selectors (concrete asset or a sorting strategy)
 * - Plans, selections and execution receipts
 */

import type { AssetId, LotEntry, OwnerId } from "@granary/types";
import type { DebitResult } from "@granary/ledger";

// =============================================================================
// Filter policy
// =============================================================================

/**
 * What to do with lots whose accrued weight is below the threshold.
 * - use: treat them like any other lot
 * - useLast: visit them after every other eligible lot
 * - omit: never select them
 */
export type LowAccrualMode = "use" | "useLast" | "omit";

export interface FilterPolicy {
  /** Lowest creation index allowed (inclusive). Absent = unbounded. */
  readonly minIndex?: bigint | undefined;

  /** Highest creation index allowed (inclusive). Absent = unbounded. */
  readonly maxIndex?: bigint | undefined;

  /**
   * Lots with (tip − index) / value above this cap are skipped.
   * Absent = unbounded.
   */
  readonly maxAccruedWeightPerValue?: bigint | undefined;

  readonly excludeBaseAsset: boolean;
  readonly excludeImmatureLots: boolean;
  readonly lowAccrualMode: LowAccrualMode;
  readonly lowAccrualThreshold: bigint;
}

// =============================================================================
// Source selection
// =============================================================================

export type SourceSelector =
  | { readonly kind: "asset"; readonly asset: AssetId }
  | { readonly kind: "ascendingPrice" }
  | { readonly kind: "ascendingRewardRate" };

// =============================================================================
// Selection & plans
// =============================================================================

/** Amounts already spoken for, per lot index. */
export type ClaimedAmounts = ReadonlyMap<bigint, bigint>;

/** Claimed amounts per asset. */
export type PlanClaims = ReadonlyMap<AssetId, ClaimedAmounts>;

export interface SelectRequest {
  readonly owner: OwnerId;
  readonly asset: AssetId;
  /** Units wanted (value, for the base asset). Must be positive. */
  readonly target: bigint;
  readonly policy: FilterPolicy;
  readonly claimed?: ClaimedAmounts | undefined;
}

/** What the selector picked from one asset, in asset-native units. */
export interface LotSelection {
  readonly asset: AssetId;
  readonly entries: readonly LotEntry[];
  readonly available: bigint;
}

export interface PlanRequest {
  readonly owner: OwnerId;
  readonly sources: readonly SourceSelector[];
  /** Base-asset value to raise. Must be positive. */
  readonly target: bigint;
  readonly policy: FilterPolicy;
}

export interface PlanSource {
  readonly asset: AssetId;
  readonly entries: readonly LotEntry[];
  /** Base-asset value these entries are expected to raise. */
  readonly availableValue: bigint;
}

export interface WithdrawalPlan {
  readonly sources: readonly PlanSource[];
  readonly totalAvailableValue: bigint;
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Where delivered value lands.
 */
export interface ValueSink {
  credit(recipient: string, value: bigint): void;
}

/** Payment to the operator, taken out of the proceeds. */
export interface OperatorTip {
  readonly recipient: string;
  readonly amount: bigint;
}

export interface ExecuteOptions {
  /** Tolerated shortfall per pool source, in basis points (0–10000). */
  readonly slippageBps: number;
  readonly destination: string;
  readonly tip?: OperatorTip | undefined;
}

export interface RedeemedSource {
  readonly asset: AssetId;
  readonly units: bigint;
  readonly minValueOut: bigint;
  readonly valueOut: bigint;
}

export interface ExecutionReceipt {
  readonly owner: OwnerId;
  readonly sources: readonly RedeemedSource[];
  readonly debits: readonly DebitResult[];
  /** Value raised before the tip. */
  readonly proceeds: bigint;
  readonly tipPaid: bigint;
  /** Value credited to the destination. */
  readonly valueDelivered: bigint;
}
