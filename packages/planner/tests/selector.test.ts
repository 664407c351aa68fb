/**
 * Tests for lot ordering and the single-asset selector.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { DepositLedger, LotReader } from "@granary/ledger";
import { orderedLots } from "../src/ordering.js";
import { selectLots } from "../src/selector.js";
import { DEFAULT_FILTER_POLICY, createFilterPolicy } from "../src/policy.js";
import type { FilterPolicy } from "../src/types.js";
import { BEAN, codeOf, fourBeanLots, newLedger } from "./fixtures.js";

function select(ledger: DepositLedger, target: bigint, policy: FilterPolicy = DEFAULT_FILTER_POLICY, claimed?: Map<bigint, bigint>) {
  return selectLots(ledger, { owner: "alice", asset: BEAN.id, target, policy, claimed });
}

describe("orderedLots", () => {
  let ledger: DepositLedger;

  beforeEach(() => {
    ledger = newLedger();
    fourBeanLots(ledger);
  });

  it("returns lots newest-first", () => {
    expect(orderedLots(ledger, "alice", BEAN.id).map((l) => l.index)).toEqual([6n, 4n, 2n, 0n]);
  });

  it("is stable across repeated calls", () => {
    expect(orderedLots(ledger, "alice", BEAN.id)).toEqual(orderedLots(ledger, "alice", BEAN.id));
  });

  it("throws NO_LOTS for an owner without lots", () => {
    expect(codeOf(() => orderedLots(ledger, "bob", BEAN.id))).toBe("NO_LOTS");
  });
});

describe("selectLots", () => {
  let ledger: DepositLedger;

  beforeEach(() => {
    ledger = newLedger();
    fourBeanLots(ledger);
  });

  // ─── Accumulation ────────────────────────────────────────────────────

  it("takes the newest lot whole and the next one partially", () => {
    const selection = select(ledger, 1900n);
    expect(selection.entries).toEqual([
      { index: 6n, amount: 1000n },
      { index: 4n, amount: 900n },
    ]);
    expect(selection.available).toBe(1900n);
  });

  it("adds no partial entry when the target lands on a lot boundary", () => {
    expect(select(ledger, 2000n).entries).toEqual([
      { index: 6n, amount: 1000n },
      { index: 4n, amount: 1000n },
    ]);
  });

  it("returns every eligible lot when the target is out of reach", () => {
    const selection = select(ledger, 5000n);
    expect(selection.entries.map((e) => e.index)).toEqual([6n, 4n, 2n, 0n]);
    expect(selection.available).toBe(4000n);
  });

  it("leaves the ledger untouched", () => {
    select(ledger, 1900n);
    expect(ledger.lotsOf("alice", BEAN.id).map((l) => l.amount)).toEqual([1000n, 1000n, 1000n, 1000n]);
  });

  // ─── Claims ──────────────────────────────────────────────────────────

  it("subtracts claimed amounts from each lot", () => {
    const selection = select(ledger, 1000n, DEFAULT_FILTER_POLICY, new Map([[6n, 400n]]));
    expect(selection.entries).toEqual([
      { index: 6n, amount: 600n },
      { index: 4n, amount: 400n },
    ]);
  });

  it("skips lots that are fully claimed", () => {
    const selection = select(ledger, 500n, DEFAULT_FILTER_POLICY, new Map([[6n, 1000n]]));
    expect(selection.entries).toEqual([{ index: 4n, amount: 500n }]);
  });

  // ─── Filters ─────────────────────────────────────────────────────────

  it("keeps only lots inside the index bounds", () => {
    const policy = createFilterPolicy({ minIndex: 2n, maxIndex: 4n });
    expect(select(ledger, 5000n, policy).entries).toEqual([
      { index: 4n, amount: 1000n },
      { index: 2n, amount: 1000n },
    ]);
  });

  it("drops lots whose accrued weight per value exceeds the cap", () => {
    // value 1000 each; weights are 0, 2, 4, 6 for indices 6, 4, 2, 0
    const policy = createFilterPolicy({ maxAccruedWeightPerValue: 0n });
    expect(select(ledger, 5000n, policy).entries).toEqual([{ index: 6n, amount: 1000n }]);
  });

  it("compares the accrued weight cap without rounding", () => {
    const small = newLedger();
    small.deposit("alice", BEAN.id, 10n, 3n);
    small.advanceTip(BEAN.id, 7n);
    // weight 7 against 2 × 3 = 6 is over, against 3 × 3 = 9 is under
    expect(select(small, 10n, createFilterPolicy({ maxAccruedWeightPerValue: 2n })).entries).toEqual([]);
    expect(select(small, 10n, createFilterPolicy({ maxAccruedWeightPerValue: 3n })).entries).toEqual([
      { index: 0n, amount: 10n },
    ]);
  });

  it("excludes immature lots when asked", () => {
    // maturity window 4: indices 6 and 4 are immature
    const policy = createFilterPolicy({ excludeImmatureLots: true });
    expect(select(ledger, 1500n, policy).entries).toEqual([
      { index: 2n, amount: 1000n },
      { index: 0n, amount: 500n },
    ]);
  });

  it("returns an empty selection when everything is filtered out", () => {
    const selection = select(ledger, 1000n, createFilterPolicy({ minIndex: 7n }));
    expect(selection).toEqual({ asset: BEAN.id, entries: [], available: 0n });
  });

  // ─── Low accrual ─────────────────────────────────────────────────────

  it("omits low-accrual lots", () => {
    const policy = createFilterPolicy({ lowAccrualMode: "omit", lowAccrualThreshold: 4n });
    expect(select(ledger, 1500n, policy).entries).toEqual([
      { index: 2n, amount: 1000n },
      { index: 0n, amount: 500n },
    ]);
  });

  it("visits low-accrual lots last", () => {
    const policy = createFilterPolicy({ lowAccrualMode: "useLast", lowAccrualThreshold: 4n });
    expect(select(ledger, 2500n, policy).entries).toEqual([
      { index: 2n, amount: 1000n },
      { index: 0n, amount: 1000n },
      { index: 6n, amount: 500n },
    ]);
  });

  it("treats a lot exactly at the threshold as normal", () => {
    // index 4 has accrued weight 2; only index 6 (weight 0) is low
    const deferred = createFilterPolicy({ lowAccrualMode: "useLast", lowAccrualThreshold: 2n });
    expect(select(ledger, 1500n, deferred).entries).toEqual([
      { index: 4n, amount: 1000n },
      { index: 2n, amount: 500n },
    ]);

    const omitted = createFilterPolicy({ lowAccrualMode: "omit", lowAccrualThreshold: 2n });
    const selection = select(ledger, 5000n, omitted);
    expect(selection.entries.map((e) => e.index)).toEqual([4n, 2n, 0n]);
    expect(selection.available).toBe(3000n);
  });

  it("ignores the threshold in use mode", () => {
    const policy = createFilterPolicy({ lowAccrualMode: "use", lowAccrualThreshold: 100n });
    expect(select(ledger, 1000n, policy).entries).toEqual([{ index: 6n, amount: 1000n }]);
  });

  // ─── Errors ──────────────────────────────────────────────────────────

  it("rejects a bad policy before reading the ledger", () => {
    const untouchable: LotReader = {
      lotsOf: () => {
        throw new Error("ledger read");
      },
      creationIndexTip: () => {
        throw new Error("ledger read");
      },
      getAsset: () => {
        throw new Error("ledger read");
      },
      listAssets: () => {
        throw new Error("ledger read");
      },
      baseAsset: () => {
        throw new Error("ledger read");
      },
    };
    const policy: FilterPolicy = { ...DEFAULT_FILTER_POLICY, minIndex: 5n, maxIndex: 1n };
    expect(
      codeOf(() => selectLots(untouchable, { owner: "alice", asset: BEAN.id, target: 1n, policy })),
    ).toBe("INVALID_POLICY");
  });

  it("rejects a non-positive target", () => {
    expect(codeOf(() => select(ledger, 0n))).toBe("INVALID_TARGET");
    expect(codeOf(() => select(ledger, -5n))).toBe("INVALID_TARGET");
  });

  it("rejects an unknown asset", () => {
    expect(
      codeOf(() =>
        selectLots(ledger, { owner: "alice", asset: "DOGE", target: 1n, policy: DEFAULT_FILTER_POLICY }),
      ),
    ).toBe("UNKNOWN_SOURCE");
  });

  it("throws NO_LOTS for an owner without lots", () => {
    expect(
      codeOf(() =>
        selectLots(ledger, { owner: "bob", asset: BEAN.id, target: 1n, policy: DEFAULT_FILTER_POLICY }),
      ),
    ).toBe("NO_LOTS");
  });
});
