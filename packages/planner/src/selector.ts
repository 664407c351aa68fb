/**
 * Single-asset selector.
 *
 * Walks an owner's lots newest-first and accumulates them toward a
 * target, taking only what is still needed from the last lot.
 *
 * Filters, in order:
 *   1. creation index within [minIndex, maxIndex]
 *   2. (tip − index) / value ≤ maxAccruedWeightPerValue
 *   3. mature (tip − index ≥ maturityWindow) when excludeImmatureLots
 * then the low-accrual partition decides whether lots with accrued
 * weight strictly below the threshold are used, deferred or dropped.
 *
 * The selector never fails on insufficiency; it reports what it found.
 */

import type { AssetDefinition, Lot, LotEntry } from "@granary/types";
import type { LotReader } from "@granary/ledger";
import { PlanError } from "./errors.js";
import { orderedLots } from "./ordering.js";
import { validatePolicy } from "./policy.js";
import type { FilterPolicy, LotSelection, SelectRequest } from "./types.js";

interface Candidate {
  readonly index: bigint;
  readonly amount: bigint;
  readonly accruedWeight: bigint;
}

export function selectLots(reader: LotReader, request: SelectRequest): LotSelection {
  validatePolicy(request.policy);
  if (request.target <= 0n) {
    throw new PlanError(
      "INVALID_TARGET",
      `Selection target must be positive, got ${request.target.toString()}`,
    );
  }

  const definition = reader.getAsset(request.asset);
  if (definition === undefined) {
    throw new PlanError("UNKNOWN_SOURCE", `Unknown source asset '${request.asset}'`);
  }

  const tip = reader.creationIndexTip(request.asset);
  const candidates: Candidate[] = [];

  for (const lot of orderedLots(reader, request.owner, request.asset)) {
    const amount = lot.amount - (request.claimed?.get(lot.index) ?? 0n);
    if (amount <= 0n) {
      continue;
    }
    if (!passesFilters(lot, tip, definition, request.policy)) {
      continue;
    }
    candidates.push({ index: lot.index, amount, accruedWeight: tip - lot.index });
  }

  const entries: LotEntry[] = [];
  let remaining = request.target;

  for (const candidate of visitOrder(candidates, request.policy)) {
    if (remaining === 0n) {
      break;
    }
    const take = candidate.amount < remaining ? candidate.amount : remaining;
    entries.push({ index: candidate.index, amount: take });
    remaining -= take;
  }

  return {
    asset: request.asset,
    entries,
    available: request.target - remaining,
  };
}

function passesFilters(
  lot: Lot,
  tip: bigint,
  definition: AssetDefinition,
  policy: FilterPolicy,
): boolean {
  if (policy.minIndex !== undefined && lot.index < policy.minIndex) {
    return false;
  }
  if (policy.maxIndex !== undefined && lot.index > policy.maxIndex) {
    return false;
  }

  const accruedWeight = tip - lot.index;

  // (tip − index) / value > cap, without dividing
  if (
    policy.maxAccruedWeightPerValue !== undefined &&
    accruedWeight > policy.maxAccruedWeightPerValue * lot.value
  ) {
    return false;
  }
  if (policy.excludeImmatureLots && accruedWeight < definition.maturityWindow) {
    return false;
  }
  return true;
}

/**
 * Candidates arrive newest-first; this only moves or drops the
 * low-accrual ones, keeping relative order inside each group.
 */
function visitOrder(candidates: readonly Candidate[], policy: FilterPolicy): readonly Candidate[] {
  switch (policy.lowAccrualMode) {
    case "use":
      return candidates;
    case "omit":
      return candidates.filter((c) => c.accruedWeight >= policy.lowAccrualThreshold);
    case "useLast": {
      const normal = candidates.filter((c) => c.accruedWeight >= policy.lowAccrualThreshold);
      const low = candidates.filter((c) => c.accruedWeight < policy.lowAccrualThreshold);
      return [...normal, ...low];
    }
  }
}
