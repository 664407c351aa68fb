/**
 * Source asset resolution.
 *
 * Expands sorting strategies into concrete assets before planning
 * starts, so the planner only ever iterates asset IDs.
 */

import type { AssetDefinition, AssetId } from "@granary/types";
import type { LotReader } from "@granary/ledger";
import type { PriceSource } from "@granary/quote";
import { PlanError } from "./errors.js";
import type { FilterPolicy, SourceSelector } from "./types.js";

export function assetSource(asset: AssetId): SourceSelector {
  return { kind: "asset", asset };
}

export const ASCENDING_PRICE: SourceSelector = { kind: "ascendingPrice" };
export const ASCENDING_REWARD_RATE: SourceSelector = { kind: "ascendingRewardRate" };

export interface ResolveContext {
  readonly reader: LotReader;
  readonly prices: PriceSource;
  readonly policy: FilterPolicy;
}

/**
 * Resolve selectors into an ordered, duplicate-free asset list.
 *
 * Strategies sort every registered asset ascending by price or reward
 * rate; equal keys keep registration order. An asset already listed
 * is not listed again, and the base asset is dropped when the policy
 * excludes it.
 */
export function resolveSourceAssets(
  selectors: readonly SourceSelector[],
  context: ResolveContext,
): readonly AssetId[] {
  const registered = context.reader.listAssets();
  const baseId = context.reader.baseAsset()?.id;
  const resolved: AssetId[] = [];
  const seen = new Set<AssetId>();

  const add = (asset: AssetId): void => {
    if (seen.has(asset)) return;
    if (context.policy.excludeBaseAsset && asset === baseId) return;
    seen.add(asset);
    resolved.push(asset);
  };

  for (const selector of selectors) {
    switch (selector.kind) {
      case "asset":
        if (context.reader.getAsset(selector.asset) === undefined) {
          throw new PlanError("UNKNOWN_SOURCE", `Unknown source asset '${selector.asset}'`);
        }
        add(selector.asset);
        break;
      case "ascendingPrice":
        sortAscending(registered, (a) => context.prices.priceOf(a.id)).forEach((a) => add(a.id));
        break;
      case "ascendingRewardRate":
        sortAscending(registered, (a) => a.rewardRate).forEach((a) => add(a.id));
        break;
    }
  }

  return resolved;
}

function sortAscending(
  assets: readonly AssetDefinition[],
  key: (asset: AssetDefinition) => bigint,
): readonly AssetDefinition[] {
  const keyed = assets.map((asset, order) => ({ asset, order, key: key(asset) }));
  keyed.sort((a, b) => {
    if (a.key !== b.key) return a.key < b.key ? -1 : 1;
    return a.order - b.order;
  });
  return keyed.map((k) => k.asset);
}
