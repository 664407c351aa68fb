/**
 * Multi-asset withdrawal planner.
 *
 * Runs the single-asset selector over each resolved source asset,
 * converting the outstanding need into the asset's units and the
 * selected units back into value, until the target is met or the
 * sources run out.
 *
 * Rules:
 * - Read-only: planning never touches the ledger or pools
 * - Each asset is queried at most once per plan
 * - Pool-share subtotals are quoted down and capped at the need, so a
 *   plan never promises more value than its units redeem for
 * - Falling short of the target is a normal result, not an error
 */

import type { AssetId, OwnerId } from "@granary/types";
import { minAmount, sumAmounts } from "@granary/ledger";
import type { LotReader } from "@granary/ledger";
import type { PriceSource, Quote } from "@granary/quote";
import { claimsFromPlan, combinePlans } from "./combinator.js";
import { PlanError } from "./errors.js";
import { orderedLots } from "./ordering.js";
import { validatePolicy } from "./policy.js";
import { selectLots } from "./selector.js";
import { resolveSourceAssets } from "./sources.js";
import type {
  ClaimedAmounts,
  FilterPolicy,
  LotSelection,
  PlanClaims,
  PlanRequest,
  PlanSource,
  SelectRequest,
  WithdrawalPlan,
} from "./types.js";

export interface PlannerDeps {
  readonly reader: LotReader;
  readonly quote: Quote;
  readonly prices: PriceSource;
}

const NO_CLAIMS: PlanClaims = new Map();

export class WithdrawalPlanner {
  private readonly reader: LotReader;
  private readonly quote: Quote;
  private readonly prices: PriceSource;

  constructor(deps: PlannerDeps) {
    this.reader = deps.reader;
    this.quote = deps.quote;
    this.prices = deps.prices;
  }

  orderedLots(owner: OwnerId, asset: AssetId) {
    return orderedLots(this.reader, owner, asset);
  }

  selectLots(request: SelectRequest): LotSelection {
    return selectLots(this.reader, request);
  }

  resolveSources(request: Pick<PlanRequest, "sources" | "policy">): readonly AssetId[] {
    return resolveSourceAssets(request.sources, {
      reader: this.reader,
      prices: this.prices,
      policy: request.policy,
    });
  }

  /**
   * Plan withdrawals worth `target` from the requested sources.
   */
  buildPlan(request: PlanRequest): WithdrawalPlan {
    return this.plan(request, NO_CLAIMS);
  }

  /**
   * Plan as buildPlan would, but treat everything `prior` already
   * claims as spent. The two plans never claim the same units.
   */
  excludingPlan(request: PlanRequest, prior: WithdrawalPlan): WithdrawalPlan {
    return this.plan(request, claimsFromPlan(prior));
  }

  /**
   * Merge plans by summing amounts per (asset, index).
   */
  combine(plans: readonly WithdrawalPlan[]): WithdrawalPlan {
    return combinePlans(plans);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private plan(request: PlanRequest, claims: PlanClaims): WithdrawalPlan {
    validatePolicy(request.policy);
    if (request.target <= 0n) {
      throw new PlanError(
        "INVALID_TARGET",
        `Plan target must be positive, got ${request.target.toString()}`,
      );
    }

    const baseId = this.reader.baseAsset()?.id;
    const sources: PlanSource[] = [];
    let total = 0n;

    for (const asset of this.resolveSources(request)) {
      if (total >= request.target) {
        break;
      }
      const need = request.target - total;
      const isBase = asset === baseId;

      const units = isBase ? need : this.quote.valueToUnits(asset, need);
      if (units <= 0n) {
        continue;
      }

      const selection = this.select(request.owner, asset, units, request.policy, claims.get(asset));
      if (selection.entries.length === 0) {
        continue;
      }

      const availableValue = isBase
        ? selection.available
        : minAmount(this.quote.unitsToValue(asset, sumAmounts(selection.entries.map((e) => e.amount))), need);
      if (availableValue <= 0n) {
        continue;
      }

      sources.push({ asset, entries: selection.entries, availableValue });
      total += availableValue;
    }

    return { sources, totalAvailableValue: total };
  }

  /**
   * Select from one asset; an owner without lots there contributes nothing.
   */
  private select(
    owner: OwnerId,
    asset: AssetId,
    target: bigint,
    policy: FilterPolicy,
    claimed: ClaimedAmounts | undefined,
  ): LotSelection {
    try {
      return selectLots(this.reader, { owner, asset, target, policy, claimed });
    } catch (err) {
      if (err instanceof PlanError && err.code === "NO_LOTS") {
        return { asset, entries: [], available: 0n };
      }
      throw err;
    }
  }
}
