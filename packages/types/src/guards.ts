/**
 * Runtime Type Guards
 *
 * Narrowing functions for silo domain types.
 * Used where untyped records come back in, such as ledger snapshots.
 */

import type { AssetDefinition, AssetKind } from "./asset.js";
import type { Lot } from "./lot.js";

const ASSET_KINDS = new Set<string>(["base", "poolShare"]);

export function isAssetKind(value: unknown): value is AssetKind {
  return typeof value === "string" && ASSET_KINDS.has(value);
}

export function isAssetDefinition(value: unknown): value is AssetDefinition {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    isAssetKind(v.kind) &&
    typeof v.rewardRate === "bigint" &&
    v.rewardRate >= 0n &&
    typeof v.maturityWindow === "bigint" &&
    v.maturityWindow >= 0n
  );
}

export function isLot(value: unknown): value is Lot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.owner === "string" &&
    typeof v.asset === "string" &&
    typeof v.index === "bigint" &&
    typeof v.amount === "bigint" &&
    v.amount > 0n &&
    typeof v.value === "bigint" &&
    v.value > 0n
  );
}
