/**
 * Response views — domain values rendered for JSON.
 *
 * JSON has no bigint, so every integer quantity is a decimal string.
 */

import type { ExecutionReceipt } from "@granary/planner";
import { planToJSON } from "@granary/planner";
import type { PlanJSON } from "@granary/planner";
import type { Lot } from "@granary/types";
import type { AssetOverview, PlanResult } from "../services/granary-service.js";

export interface LotView {
  readonly owner: string;
  readonly asset: string;
  readonly index: string;
  readonly amount: string;
  readonly value: string;
}

export function toLotView(lot: Lot): LotView {
  return {
    owner: lot.owner,
    asset: lot.asset,
    index: lot.index.toString(),
    amount: lot.amount.toString(),
    value: lot.value.toString(),
  };
}

export interface AssetView {
  readonly id: string;
  readonly kind: string;
  readonly rewardRate: string;
  readonly maturityWindow: string;
  readonly tip: string;
  readonly price: string;
  readonly pool?: {
    readonly baseReserve: string;
    readonly pairedReserve: string;
    readonly shareSupply: string;
    readonly pairedPrice: string;
  };
}

export function toAssetView(overview: AssetOverview): AssetView {
  const { definition, pool } = overview;
  const view: AssetView = {
    id: definition.id,
    kind: definition.kind,
    rewardRate: definition.rewardRate.toString(),
    maturityWindow: definition.maturityWindow.toString(),
    tip: overview.tip.toString(),
    price: overview.price.toString(),
  };
  if (pool === undefined) {
    return view;
  }
  return {
    ...view,
    pool: {
      baseReserve: pool.baseReserve.toString(),
      pairedReserve: pool.pairedReserve.toString(),
      shareSupply: pool.shareSupply.toString(),
      pairedPrice: pool.pairedPrice.toString(),
    },
  };
}

export interface PlanView {
  readonly plan: PlanJSON;
  readonly digest: string;
  readonly target: string;
  readonly sufficient: boolean;
}

export function toPlanView(result: PlanResult): PlanView {
  return {
    plan: planToJSON(result.plan),
    digest: result.digest,
    target: result.target.toString(),
    sufficient: result.sufficient,
  };
}

export interface ReceiptView {
  readonly owner: string;
  readonly sources: readonly {
    readonly asset: string;
    readonly units: string;
    readonly minValueOut: string;
    readonly valueOut: string;
  }[];
  readonly proceeds: string;
  readonly tipPaid: string;
  readonly valueDelivered: string;
}

export function toReceiptView(receipt: ExecutionReceipt): ReceiptView {
  return {
    owner: receipt.owner,
    sources: receipt.sources.map((s) => ({
      asset: s.asset,
      units: s.units.toString(),
      minValueOut: s.minValueOut.toString(),
      valueOut: s.valueOut.toString(),
    })),
    proceeds: receipt.proceeds.toString(),
    tipPaid: receipt.tipPaid.toString(),
    valueDelivered: receipt.valueDelivered.toString(),
  };
}
