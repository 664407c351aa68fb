/**
 * GranaryService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One service owns one ledger, one pool book and
 * the value sink that executions credit.
 */

import { DepositLedger } from "@granary/ledger";
import type { LedgerSnapshot } from "@granary/ledger";
import { PoolBook } from "@granary/quote";
import type { PoolConfig } from "@granary/quote";
import {
  InMemoryValueSink,
  Redeemer,
  WithdrawalPlanner,
  createFilterPolicy,
  planDigest,
} from "@granary/planner";
import type {
  ExecuteOptions,
  ExecutionReceipt,
  FilterPolicy,
  SourceSelector,
  WithdrawalPlan,
} from "@granary/planner";
import type { AssetDefinition, AssetId, Lot, OwnerId } from "@granary/types";

// =============================================================================
// Configuration
// =============================================================================

export interface GranaryServiceConfig {
  readonly assets: readonly AssetDefinition[];
  readonly pools: readonly PoolConfig[];
  /** Highest slippage an execution may ask for, in basis points. */
  readonly maxSlippageBps: number;
}

// =============================================================================
// Errors
// =============================================================================

export type ServiceErrorCode =
  | "INVALID_ASSET_CONFIG"
  | "PLAN_DIGEST_MISMATCH"
  | "SLIPPAGE_ABOVE_LIMIT";

export class ServiceError extends Error {
  public readonly code: ServiceErrorCode;
  constructor(code: ServiceErrorCode, message: string) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
  }
}

// =============================================================================
// Inputs & Outputs
// =============================================================================

export interface PlanInput {
  readonly owner: OwnerId;
  readonly sources: readonly SourceSelector[];
  readonly target: bigint;
  readonly policy: Partial<FilterPolicy>;
}

export interface PlanResult {
  readonly plan: WithdrawalPlan;
  readonly digest: string;
  readonly target: bigint;
  readonly sufficient: boolean;
}

export interface ExecuteInput extends ExecuteOptions {
  readonly owner: OwnerId;
  readonly plan: WithdrawalPlan;
  readonly expectedDigest?: string | undefined;
}

export interface AssetOverview {
  readonly definition: AssetDefinition;
  readonly tip: bigint;
  readonly price: bigint;
  readonly pool?: PoolConfig | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class GranaryService {
  readonly ledger: DepositLedger;
  readonly pools: PoolBook;
  readonly planner: WithdrawalPlanner;
  readonly redeemer: Redeemer;
  readonly sink: InMemoryValueSink;

  private readonly _maxSlippageBps: number;

  constructor(config: GranaryServiceConfig) {
    const base = config.assets.find((a) => a.kind === "base");
    if (base === undefined) {
      throw new ServiceError("INVALID_ASSET_CONFIG", "No base asset configured");
    }

    this.ledger = new DepositLedger();
    for (const asset of config.assets) {
      this.ledger.registerAsset(asset);
    }

    this.pools = new PoolBook(base.id);
    for (const pool of config.pools) {
      const asset = this.ledger.getAsset(pool.asset);
      if (asset?.kind !== "poolShare") {
        throw new ServiceError(
          "INVALID_ASSET_CONFIG",
          `Pool '${pool.asset}' must belong to a registered pool-share asset`,
        );
      }
      this.pools.addPool(pool);
    }
    for (const asset of config.assets) {
      if (asset.kind === "poolShare" && !this.pools.hasPool(asset.id)) {
        throw new ServiceError("INVALID_ASSET_CONFIG", `Pool-share asset '${asset.id}' has no pool`);
      }
    }

    this.sink = new InMemoryValueSink();
    this.planner = new WithdrawalPlanner({
      reader: this.ledger,
      quote: this.pools,
      prices: this.pools,
    });
    this.redeemer = new Redeemer({
      ledger: this.ledger,
      liquidity: this.pools,
      sink: this.sink,
    });
    this._maxSlippageBps = config.maxSlippageBps;
  }

  // ─── Assets ──────────────────────────────────────────────────────────

  listAssets(): readonly AssetOverview[] {
    return this.ledger.listAssets().map((definition) => ({
      definition,
      tip: this.ledger.creationIndexTip(definition.id),
      price: this.pools.priceOf(definition.id),
      pool: this.pools.hasPool(definition.id) ? this.pools.getPool(definition.id).state() : undefined,
    }));
  }

  // ─── Deposits & Periods ──────────────────────────────────────────────

  deposit(owner: OwnerId, asset: AssetId, amount: bigint, value: bigint): Lot {
    return this.ledger.deposit(owner, asset, amount, value);
  }

  /**
   * Close `periods` accrual periods and return every asset's new tip.
   */
  advancePeriods(periods: number): ReadonlyMap<AssetId, bigint> {
    for (let i = 0; i < periods; i++) {
      this.ledger.advancePeriod();
    }
    const tips = new Map<AssetId, bigint>();
    for (const asset of this.ledger.listAssets()) {
      tips.set(asset.id, this.ledger.creationIndexTip(asset.id));
    }
    return tips;
  }

  lotsOf(owner: OwnerId, asset: AssetId): readonly Lot[] {
    return this.ledger.lotsOf(owner, asset);
  }

  // ─── Planning ────────────────────────────────────────────────────────

  buildPlan(input: PlanInput): PlanResult {
    const plan = this.planner.buildPlan({
      owner: input.owner,
      sources: input.sources,
      target: input.target,
      policy: createFilterPolicy(input.policy),
    });
    return this.describe(plan, input.target);
  }

  excludingPlan(input: PlanInput, prior: WithdrawalPlan): PlanResult {
    const plan = this.planner.excludingPlan(
      {
        owner: input.owner,
        sources: input.sources,
        target: input.target,
        policy: createFilterPolicy(input.policy),
      },
      prior,
    );
    return this.describe(plan, input.target);
  }

  combinePlans(plans: readonly WithdrawalPlan[]): PlanResult {
    const plan = this.planner.combine(plans);
    return this.describe(plan, plan.totalAvailableValue);
  }

  // ─── Execution ───────────────────────────────────────────────────────

  execute(input: ExecuteInput): ExecutionReceipt {
    if (input.slippageBps > this._maxSlippageBps) {
      throw new ServiceError(
        "SLIPPAGE_ABOVE_LIMIT",
        `slippageBps ${input.slippageBps} is above the limit of ${this._maxSlippageBps}`,
      );
    }
    if (input.expectedDigest !== undefined) {
      const digest = planDigest(input.plan);
      if (digest !== input.expectedDigest) {
        throw new ServiceError(
          "PLAN_DIGEST_MISMATCH",
          `Plan digest ${digest} does not match the pinned ${input.expectedDigest}`,
        );
      }
    }

    return this.redeemer.execute(input.owner, input.plan, {
      slippageBps: input.slippageBps,
      destination: input.destination,
      tip: input.tip,
    });
  }

  balanceOf(recipient: string): bigint {
    return this.sink.balanceOf(recipient);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return this.ledger.snapshot();
  }

  isReady(): boolean {
    return this.ledger.baseAsset() !== undefined;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private describe(plan: WithdrawalPlan, target: bigint): PlanResult {
    return {
      plan,
      digest: planDigest(plan),
      target,
      sufficient: plan.totalAvailableValue >= target,
    };
  }
}
