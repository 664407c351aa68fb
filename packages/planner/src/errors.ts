/**
 * Planner and redeemer errors.
 *
 * Planning errors are safe to retry: nothing was changed.
 * Redeem errors are raised before any ledger or pool mutation.
 */

export type PlanErrorCode =
  | "NO_LOTS"
  | "INVALID_POLICY"
  | "INVALID_TARGET"
  | "INVALID_PLAN"
  | "UNKNOWN_SOURCE";

export class PlanError extends Error {
  public readonly code: PlanErrorCode;
  constructor(code: PlanErrorCode, message: string) {
    super(message);
    this.name = "PlanError";
    this.code = code;
  }
}

export type RedeemErrorCode =
  | "INSUFFICIENT_LOT_BALANCE"
  | "SLIPPAGE_EXCEEDED"
  | "TIP_EXCEEDS_PROCEEDS"
  | "INVALID_SLIPPAGE";

export class RedeemError extends Error {
  public readonly code: RedeemErrorCode;
  constructor(code: RedeemErrorCode, message: string) {
    super(message);
    this.name = "RedeemError";
    this.code = code;
  }
}
