/**
 * Filter policy construction and validation.
 */

import { PlanError } from "./errors.js";
import type { FilterPolicy } from "./types.js";

export const DEFAULT_FILTER_POLICY: FilterPolicy = Object.freeze<FilterPolicy>({
  excludeBaseAsset: false,
  excludeImmatureLots: false,
  lowAccrualMode: "use",
  lowAccrualThreshold: 0n,
});

/**
 * Build an immutable policy from defaults plus overrides.
 * Contradictory bounds are rejected here, before any ledger read.
 */
export function createFilterPolicy(overrides: Partial<FilterPolicy> = {}): FilterPolicy {
  const policy: FilterPolicy = Object.freeze<FilterPolicy>({ ...DEFAULT_FILTER_POLICY, ...overrides });
  validatePolicy(policy);
  return policy;
}

export function validatePolicy(policy: FilterPolicy): void {
  if (
    policy.minIndex !== undefined &&
    policy.maxIndex !== undefined &&
    policy.minIndex > policy.maxIndex
  ) {
    throw new PlanError(
      "INVALID_POLICY",
      `minIndex ${policy.minIndex.toString()} is above maxIndex ${policy.maxIndex.toString()}`,
    );
  }
  if (policy.maxAccruedWeightPerValue !== undefined && policy.maxAccruedWeightPerValue < 0n) {
    throw new PlanError(
      "INVALID_POLICY",
      `maxAccruedWeightPerValue must be non-negative, got ${policy.maxAccruedWeightPerValue.toString()}`,
    );
  }
  if (policy.lowAccrualThreshold < 0n) {
    throw new PlanError(
      "INVALID_POLICY",
      `lowAccrualThreshold must be non-negative, got ${policy.lowAccrualThreshold.toString()}`,
    );
  }
  if (!["use", "useLast", "omit"].includes(policy.lowAccrualMode)) {
    throw new PlanError("INVALID_POLICY", `Unknown lowAccrualMode '${String(policy.lowAccrualMode)}'`);
  }
}
