/**
 * @granary/planner — Withdrawal planning engine.
 *
 * Decides which deposit lots to spend to raise a target value, across
 * one or many source assets, and executes the result:
 * - orderedLots(): newest-first lot ordering
 * - selectLots(): single-asset greedy selection under a filter policy
 * - WithdrawalPlanner: multi-asset plans, exclusion, combination
 * - Redeemer: validated, all-or-nothing execution
 * - Plan codec: JSON form and content digest
 *
 * Planning is read-only. Only the Redeemer mutates the ledger.
 */

export { orderedLots } from "./ordering.js";
export { selectLots } from "./selector.js";
export { DEFAULT_FILTER_POLICY, createFilterPolicy, validatePolicy } from "./policy.js";
export {
  resolveSourceAssets,
  assetSource,
  ASCENDING_PRICE,
  ASCENDING_REWARD_RATE,
} from "./sources.js";
export type { ResolveContext } from "./sources.js";
export { WithdrawalPlanner } from "./planner.js";
export type { PlannerDeps } from "./planner.js";
export { combinePlans, claimsFromPlan } from "./combinator.js";
export { Redeemer, BPS_DENOMINATOR } from "./redeemer.js";
export type { RedeemerDeps } from "./redeemer.js";
export { InMemoryValueSink } from "./value-sink.js";
export type { ValueCredit } from "./value-sink.js";
export {
  planToJSON,
  planFromJSON,
  assertPlanConsistent,
  planDigest,
} from "./plan-codec.js";
export type { PlanJSON, PlanSourceJSON, LotEntryJSON } from "./plan-codec.js";

export { PlanError, RedeemError } from "./errors.js";
export type { PlanErrorCode, RedeemErrorCode } from "./errors.js";

export type {
  LowAccrualMode,
  FilterPolicy,
  SourceSelector,
  ClaimedAmounts,
  PlanClaims,
  SelectRequest,
  LotSelection,
  PlanRequest,
  PlanSource,
  WithdrawalPlan,
  ValueSink,
  OperatorTip,
  ExecuteOptions,
  RedeemedSource,
  ExecutionReceipt,
} from "./types.js";
