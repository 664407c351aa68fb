/**
 * Property-Based Tests for @granary/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Debits conserve amount and value (lot + removed = original)
 * 2. A failed batch leaves the ledger unchanged
 * 3. Snapshot → restore → snapshot preserves every lot
 * 4. Tips never decrease
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { DepositLedger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbPositive = fc.bigInt({ min: 1n, max: 10n ** 12n });

function freshLedger(): DepositLedger {
  const ledger = new DepositLedger();
  ledger.registerAsset({ id: "BEAN", kind: "base", rewardRate: 2n, maturityWindow: 0n });
  return ledger;
}

// =============================================================================
// Property: conservation on partial debit
// =============================================================================

describe("property: debits conserve amount and value", () => {
  it("remaining + removed equals the original lot", () => {
    fc.assert(
      fc.property(arbPositive, arbPositive, fc.double({ min: 0, max: 1, noNaN: true }), (amount, value, fraction) => {
        const ledger = freshLedger();
        ledger.deposit("alice", "BEAN", amount, value);

        const scaled = BigInt(Math.floor(fraction * 1_000_000));
        let take = (amount * scaled) / 1_000_000n;
        if (take === 0n) take = 1n;

        const removed = ledger.debit("alice", "BEAN", 0n, take);
        const rest = ledger.getLot("alice", "BEAN", 0n);

        expect(removed.amount + (rest?.amount ?? 0n)).toBe(amount);
        expect(removed.value + (rest?.value ?? 0n)).toBe(value);
        if (rest !== undefined) {
          expect(rest.amount > 0n).toBe(true);
          expect(rest.value > 0n).toBe(true);
        }
      }),
      { numRuns: 300 },
    );
  });
});

// =============================================================================
// Property: atomic batches
// =============================================================================

describe("property: failed batches change nothing", () => {
  it("an overdrawn batch leaves every lot as it was", () => {
    fc.assert(
      fc.property(fc.array(arbPositive, { minLength: 1, maxLength: 8 }), (amounts) => {
        const ledger = freshLedger();
        for (const amount of amounts) {
          ledger.deposit("alice", "BEAN", amount, amount);
          ledger.advancePeriod();
        }
        const before = ledger.lotsOf("alice", "BEAN");

        const debits = before.map((lot, i) => ({
          asset: "BEAN",
          index: lot.index,
          amount: i === before.length - 1 ? lot.amount + 1n : lot.amount,
        }));

        expect(() => ledger.debitBatch("alice", debits)).toThrow(LedgerError);
        expect(ledger.lotsOf("alice", "BEAN")).toEqual(before);
      }),
      { numRuns: 100 },
    );
  });
});

// =============================================================================
// Property: snapshot round trip
// =============================================================================

describe("property: snapshot restore preserves lots", () => {
  it("restore(snapshot) reads back identical lots", () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(fc.constantFrom("alice", "bob"), arbPositive, fc.boolean()), { maxLength: 12 }),
        (ops) => {
          const ledger = freshLedger();
          for (const [owner, amount, advance] of ops) {
            ledger.deposit(owner, "BEAN", amount, amount);
            if (advance) ledger.advancePeriod();
          }

          const restored = DepositLedger.fromSnapshot(ledger.snapshot());
          for (const owner of ["alice", "bob"]) {
            expect(restored.lotsOf(owner, "BEAN")).toEqual(ledger.lotsOf(owner, "BEAN"));
          }
          expect(restored.creationIndexTip("BEAN")).toBe(ledger.creationIndexTip("BEAN"));
        },
      ),
      { numRuns: 100 },
    );
  });
});

// =============================================================================
// Property: monotonic tips
// =============================================================================

describe("property: tips never decrease", () => {
  it("any sequence of advances is non-decreasing", () => {
    fc.assert(
      fc.property(fc.array(fc.bigInt({ min: -5n, max: 5n }), { maxLength: 20 }), (deltas) => {
        const ledger = freshLedger();
        let last = ledger.creationIndexTip("BEAN");
        for (const delta of deltas) {
          try {
            ledger.advanceTip("BEAN", delta);
          } catch (err) {
            expect(err).toBeInstanceOf(LedgerError);
          }
          const tip = ledger.creationIndexTip("BEAN");
          expect(tip >= last).toBe(true);
          last = tip;
        }
      }),
      { numRuns: 100 },
    );
  });
});
