/**
 * Redeemer — carries a withdrawal plan out.
 *
 * Execution runs in phases; everything that can fail is checked
 * before the first mutation:
 *
 *   1. Validate    slippage bound, plan structure
 *   2. Balances    every entry's lot still holds enough
 *   3. Preview     each pool payout within slippage of the plan's value
 *   4. Tip         the operator tip fits inside the proceeds
 *   5. Commit      debit lots, redeem every pool source as one batch,
 *                  credit value
 *
 * A redemption that still fails at commit puts the debited lots back
 * before the error propagates; the batch itself leaves pools unchanged.
 *
 * A plan built earlier may have gone stale; the balance phase is what
 * catches lots consumed in between.
 */

import type { AssetId, OwnerId } from "@granary/types";
import { mulDiv, sumAmounts } from "@granary/ledger";
import type { LotDebit, LotReader, LotWriter } from "@granary/ledger";
import type { LiquiditySource } from "@granary/quote";
import { RedeemError } from "./errors.js";
import { assertPlanConsistent } from "./plan-codec.js";
import type {
  ExecuteOptions,
  ExecutionReceipt,
  RedeemedSource,
  ValueSink,
  WithdrawalPlan,
} from "./types.js";

/** Basis-point denominator for slippage. */
export const BPS_DENOMINATOR = 10_000;

export interface RedeemerDeps {
  readonly ledger: LotWriter & Pick<LotReader, "baseAsset">;
  readonly liquidity: LiquiditySource;
  readonly sink: ValueSink;
}

interface PreparedSource {
  readonly asset: AssetId;
  readonly units: bigint;
  readonly isBase: boolean;
  readonly minValueOut: bigint;
  readonly preview: bigint;
}

export class Redeemer {
  private readonly ledger: RedeemerDeps["ledger"];
  private readonly liquidity: LiquiditySource;
  private readonly sink: ValueSink;

  constructor(deps: RedeemerDeps) {
    this.ledger = deps.ledger;
    this.liquidity = deps.liquidity;
    this.sink = deps.sink;
  }

  execute(owner: OwnerId, plan: WithdrawalPlan, options: ExecuteOptions): ExecutionReceipt {
    // Phase 1: validate
    if (
      !Number.isInteger(options.slippageBps) ||
      options.slippageBps < 0 ||
      options.slippageBps > BPS_DENOMINATOR
    ) {
      throw new RedeemError(
        "INVALID_SLIPPAGE",
        `slippageBps must be an integer in [0, ${BPS_DENOMINATOR}], got ${options.slippageBps}`,
      );
    }
    assertPlanConsistent(plan);

    // Phase 2: balances
    const debits = this.checkBalances(owner, plan);

    // Phase 3: preview
    const prepared = this.preview(plan, BigInt(options.slippageBps));
    const proceeds = sumAmounts(prepared.map((p) => p.preview));

    // Phase 4: tip
    const tipPaid = options.tip?.amount ?? 0n;
    if (tipPaid < 0n || tipPaid > proceeds) {
      throw new RedeemError(
        "TIP_EXCEEDS_PROCEEDS",
        `Tip ${tipPaid.toString()} must be between 0 and the proceeds ${proceeds.toString()}`,
      );
    }

    // Phase 5: commit
    const debitResults = this.ledger.debitBatch(owner, debits);
    const orders = prepared.filter((p) => !p.isBase);
    let payouts: readonly bigint[];
    try {
      payouts = orders.length === 0 ? [] : this.liquidity.redeemBatch(orders);
    } catch (err) {
      this.ledger.restore(owner, debitResults);
      throw err;
    }

    const paid = new Map<AssetId, bigint>();
    orders.forEach((order, i) => {
      paid.set(order.asset, payouts[i] ?? 0n);
    });
    const sources: RedeemedSource[] = prepared.map((p) => ({
      asset: p.asset,
      units: p.units,
      minValueOut: p.minValueOut,
      valueOut: p.isBase ? p.units : (paid.get(p.asset) ?? 0n),
    }));

    const raised = sumAmounts(sources.map((s) => s.valueOut));
    const valueDelivered = raised - tipPaid;
    if (options.tip !== undefined && tipPaid > 0n) {
      this.sink.credit(options.tip.recipient, tipPaid);
    }
    if (valueDelivered > 0n) {
      this.sink.credit(options.destination, valueDelivered);
    }

    return {
      owner,
      sources,
      debits: debitResults,
      proceeds: raised,
      tipPaid,
      valueDelivered,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private checkBalances(owner: OwnerId, plan: WithdrawalPlan): readonly LotDebit[] {
    const debits: LotDebit[] = [];
    const requested = new Map<string, bigint>();

    for (const source of plan.sources) {
      for (const entry of source.entries) {
        const key = JSON.stringify([source.asset, entry.index.toString()]);
        const total = (requested.get(key) ?? 0n) + entry.amount;
        requested.set(key, total);

        const held = this.ledger.getLot(owner, source.asset, entry.index)?.amount ?? 0n;
        if (held < total) {
          throw new RedeemError(
            "INSUFFICIENT_LOT_BALANCE",
            `Lot ${source.asset}@${entry.index.toString()} of '${owner}' holds ${held.toString()}, plan needs ${total.toString()}`,
          );
        }
        debits.push({ asset: source.asset, index: entry.index, amount: entry.amount });
      }
    }
    return debits;
  }

  private preview(plan: WithdrawalPlan, slippageBps: bigint): readonly PreparedSource[] {
    const baseId = this.ledger.baseAsset()?.id;
    const keep = BigInt(BPS_DENOMINATOR) - slippageBps;

    return plan.sources.map((source) => {
      const units = sumAmounts(source.entries.map((e) => e.amount));
      if (source.asset === baseId) {
        return { asset: source.asset, units, isBase: true, minValueOut: units, preview: units };
      }

      const minValueOut = mulDiv(source.availableValue, keep, BigInt(BPS_DENOMINATOR));
      const preview = this.liquidity.previewRedeem(source.asset, units);
      if (preview < minValueOut) {
        throw new RedeemError(
          "SLIPPAGE_EXCEEDED",
          `'${source.asset}' redeems for ${preview.toString()}, minimum is ${minValueOut.toString()}`,
        );
      }
      return { asset: source.asset, units, isBase: false, minValueOut, preview };
    });
  }
}
