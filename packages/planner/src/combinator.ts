/**
 * Plan combinator — merge plans, and turn a plan into claims.
 *
 * Totals are summed from the inputs' own figures rather than
 * re-quoted from merged amounts, so merging never drifts value.
 */

import type { AssetId, LotEntry } from "@granary/types";
import type { PlanClaims, PlanSource, WithdrawalPlan } from "./types.js";

interface MergedSource {
  readonly amounts: Map<bigint, bigint>;
  availableValue: bigint;
}

/**
 * Merge plans by summing amounts per (asset, index).
 * Assets and entries keep the order of their first appearance.
 */
export function combinePlans(plans: readonly WithdrawalPlan[]): WithdrawalPlan {
  const merged = new Map<AssetId, MergedSource>();
  let totalAvailableValue = 0n;

  for (const plan of plans) {
    totalAvailableValue += plan.totalAvailableValue;
    for (const source of plan.sources) {
      let target = merged.get(source.asset);
      if (target === undefined) {
        target = { amounts: new Map(), availableValue: 0n };
        merged.set(source.asset, target);
      }
      target.availableValue += source.availableValue;
      addEntries(target.amounts, source.entries);
    }
  }

  const sources: PlanSource[] = [];
  for (const [asset, source] of merged) {
    const entries: LotEntry[] = [];
    for (const [index, amount] of source.amounts) {
      entries.push({ index, amount });
    }
    sources.push({ asset, entries, availableValue: source.availableValue });
  }

  return { sources, totalAvailableValue };
}

/**
 * Per-asset, per-index amounts a plan already claims.
 */
export function claimsFromPlan(plan: WithdrawalPlan): PlanClaims {
  const claims = new Map<AssetId, Map<bigint, bigint>>();
  for (const source of plan.sources) {
    let amounts = claims.get(source.asset);
    if (amounts === undefined) {
      amounts = new Map();
      claims.set(source.asset, amounts);
    }
    addEntries(amounts, source.entries);
  }
  return claims;
}

function addEntries(amounts: Map<bigint, bigint>, entries: readonly LotEntry[]): void {
  for (const entry of entries) {
    amounts.set(entry.index, (amounts.get(entry.index) ?? 0n) + entry.amount);
  }
}
