/**
 * Shared fixtures for planner tests: assets, a seeded ledger and a
 * linear stand-in for pool quotes and redemption.
 */

import type { AssetDefinition, AssetId } from "@granary/types";
import { DepositLedger, mulDiv, mulDivUp } from "@granary/ledger";
import type { LiquiditySource, PriceSource, Quote, RedeemOrder } from "@granary/quote";
import { PRICE_PRECISION, QuoteError } from "@granary/quote";

export const BEAN: AssetDefinition = { id: "BEAN", kind: "base", rewardRate: 2n, maturityWindow: 4n };
export const WETH_LP: AssetDefinition = {
  id: "BEAN:WETH",
  kind: "poolShare",
  rewardRate: 4n,
  maturityWindow: 0n,
};
export const CRV_LP: AssetDefinition = {
  id: "BEAN:3CRV",
  kind: "poolShare",
  rewardRate: 1n,
  maturityWindow: 0n,
};

export function newLedger(...assets: AssetDefinition[]): DepositLedger {
  const ledger = new DepositLedger();
  for (const asset of assets.length > 0 ? assets : [BEAN, WETH_LP, CRV_LP]) {
    ledger.registerAsset(asset);
  }
  return ledger;
}

/**
 * Four BEAN lots of 1000 units / 1000 value at indices 0, 2, 4, 6.
 * The tip ends at 6.
 */
export function fourBeanLots(ledger: DepositLedger, owner = "alice"): void {
  for (let period = 0; period < 4; period++) {
    if (period > 0) ledger.advanceTip(BEAN.id, BEAN.rewardRate);
    ledger.deposit(owner, BEAN.id, 1000n, 1000n);
  }
}

interface Rate {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/**
 * Each pool-share unit is worth numerator/denominator value.
 * Previews and redemptions can be shaved by a per-asset haircut.
 */
export class LinearMarket implements Quote, PriceSource, LiquiditySource {
  readonly redeemed: { asset: AssetId; units: bigint; valueOut: bigint }[] = [];
  private readonly rates = new Map<AssetId, Rate>();
  private readonly prices = new Map<AssetId, bigint>();
  private readonly haircuts = new Map<AssetId, bigint>();

  constructor(private readonly base: AssetId = BEAN.id) {}

  setRate(asset: AssetId, numerator: bigint, denominator = 1n): this {
    this.rates.set(asset, { numerator, denominator });
    return this;
  }

  setPrice(asset: AssetId, price: bigint): this {
    this.prices.set(asset, price);
    return this;
  }

  setHaircut(asset: AssetId, bps: bigint): this {
    this.haircuts.set(asset, bps);
    return this;
  }

  valueToUnits(asset: AssetId, value: bigint): bigint {
    if (asset === this.base) return value;
    const rate = this.rateOf(asset);
    return mulDivUp(value, rate.denominator, rate.numerator);
  }

  unitsToValue(asset: AssetId, units: bigint): bigint {
    if (asset === this.base) return units;
    const rate = this.rateOf(asset);
    return mulDiv(units, rate.numerator, rate.denominator);
  }

  priceOf(asset: AssetId): bigint {
    return this.prices.get(asset) ?? PRICE_PRECISION;
  }

  previewRedeem(asset: AssetId, units: bigint): bigint {
    const haircut = this.haircuts.get(asset) ?? 0n;
    return mulDiv(this.unitsToValue(asset, units), 10_000n - haircut, 10_000n);
  }

  redeem(asset: AssetId, units: bigint, minValueOut: bigint): bigint {
    const valueOut = this.previewRedeem(asset, units);
    if (valueOut < minValueOut) {
      throw new QuoteError("SLIPPAGE_EXCEEDED", `${asset} pays ${valueOut.toString()}`);
    }
    this.redeemed.push({ asset, units, valueOut });
    return valueOut;
  }

  redeemBatch(orders: readonly RedeemOrder[]): readonly bigint[] {
    for (const order of orders) {
      const valueOut = this.previewRedeem(order.asset, order.units);
      if (valueOut < order.minValueOut) {
        throw new QuoteError("SLIPPAGE_EXCEEDED", `${order.asset} pays ${valueOut.toString()}`);
      }
    }
    const recorded = this.redeemed.length;
    try {
      return orders.map((order) => this.redeem(order.asset, order.units, order.minValueOut));
    } catch (err) {
      this.redeemed.length = recorded;
      throw err;
    }
  }

  private rateOf(asset: AssetId): Rate {
    const rate = this.rates.get(asset);
    if (rate === undefined) {
      throw new QuoteError("UNKNOWN_POOL", `No rate for '${asset}'`);
    }
    return rate;
  }
}

export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
      return err.code;
    }
    throw err;
  }
  return undefined;
}
