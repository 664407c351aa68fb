/**
 * @granary/ledger — Core DepositLedger class.
 *
 * Per-owner, per-asset collections of deposit lots. Each lot is keyed
 * by the asset's growth tip at the moment it was created; that index is
 * the lot's durable identity across partial withdrawals.
 *
 * API surface:
 * - registerAsset() — Add an asset with its reward rate and maturity window
 * - deposit() — Create (or top up) the lot at the current tip
 * - lotsOf() / getLot() — Read lots
 * - debit() / debitBatch() — Reduce lots; the batch is all-or-nothing
 * - restore() — Undo a debit batch
 * - advancePeriod() / advanceTip() — Move growth tips forward
 * - snapshot() / fromSnapshot() — Serialize and restore
 */

import type { AssetDefinition, AssetId, Lot, OwnerId } from "@granary/types";
import { isAssetDefinition, isLot } from "@granary/types";
import { AssetRegistry } from "./assets.js";
import { mulDiv, parseUnits } from "./amount-math.js";
import type {
  DebitResult,
  LedgerSnapshot,
  LotDebit,
  LotReader,
  LotWriter,
} from "./types.js";
import { LedgerError } from "./types.js";

interface LotRecord {
  amount: bigint;
  value: bigint;
}

interface LotGroup {
  readonly owner: OwnerId;
  readonly asset: AssetId;
  readonly lots: Map<bigint, LotRecord>;
}

function lotsKey(owner: OwnerId, asset: AssetId): string {
  return JSON.stringify([owner, asset]);
}

/**
 * In-memory deposit ledger.
 *
 * Lots live in a map keyed by index, so partial consumption is a
 * decrement on the record and full consumption is a delete.
 */
export class DepositLedger implements LotReader, LotWriter {
  private readonly _assets: AssetRegistry = new AssetRegistry();
  private readonly _groups: Map<string, LotGroup> = new Map();

  // ─── Asset Management ────────────────────────────────────────────────

  /**
   * Register a depositable asset. Its tip starts at `initialTip`.
   */
  registerAsset(definition: AssetDefinition, initialTip?: bigint): AssetDefinition {
    return this._assets.register(definition, initialTip);
  }

  getAsset(asset: AssetId): AssetDefinition | undefined {
    return this._assets.get(asset);
  }

  listAssets(): readonly AssetDefinition[] {
    return this._assets.getAll();
  }

  baseAsset(): AssetDefinition | undefined {
    return this._assets.base;
  }

  creationIndexTip(asset: AssetId): bigint {
    return this._assets.tipOf(asset);
  }

  // ─── Growth Tips ─────────────────────────────────────────────────────

  /**
   * Close one accrual period: every asset's tip grows by its reward rate.
   */
  advancePeriod(): void {
    for (const asset of this._assets.getAll()) {
      this._assets.advance(asset.id, asset.rewardRate);
    }
  }

  advanceTip(asset: AssetId, delta: bigint): bigint {
    return this._assets.advance(asset, delta);
  }

  // ─── Deposits ────────────────────────────────────────────────────────

  /**
   * Deposit `amount` units worth `value` at the asset's current tip.
   * A second deposit in the same period tops up the existing lot.
   */
  deposit(owner: OwnerId, asset: AssetId, amount: bigint, value: bigint): Lot {
    this._assets.assertExists(asset);
    if (amount <= 0n || value <= 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Deposit amount and value must be positive, got amount=${amount.toString()} value=${value.toString()}`,
      );
    }

    const index = this._assets.tipOf(asset);
    const lots = this.lotMap(owner, asset, true);
    let record = lots.get(index);
    if (record === undefined) {
      record = { amount, value };
      lots.set(index, record);
    } else {
      record.amount += amount;
      record.value += value;
    }

    return { owner, asset, index, amount: record.amount, value: record.value };
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  /**
   * All lots of an owner for an asset, ascending by index.
   * Unknown assets throw; an owner with no lots gets an empty list.
   */
  lotsOf(owner: OwnerId, asset: AssetId): readonly Lot[] {
    this._assets.assertExists(asset);
    const lots = this.lotMap(owner, asset, false);
    if (lots === undefined) {
      return [];
    }

    const result: Lot[] = [];
    for (const [index, record] of lots) {
      result.push({ owner, asset, index, amount: record.amount, value: record.value });
    }
    return result.sort((a, b) => (a.index < b.index ? -1 : a.index > b.index ? 1 : 0));
  }

  getLot(owner: OwnerId, asset: AssetId, index: bigint): Lot | undefined {
    const record = this.lotMap(owner, asset, false)?.get(index);
    if (record === undefined) {
      return undefined;
    }
    return { owner, asset, index, amount: record.amount, value: record.value };
  }

  /**
   * Total number of lots across all owners and assets.
   */
  get lotCount(): number {
    let count = 0;
    for (const group of this._groups.values()) {
      count += group.lots.size;
    }
    return count;
  }

  // ─── Debits ──────────────────────────────────────────────────────────

  debit(owner: OwnerId, asset: AssetId, index: bigint, amount: bigint): DebitResult {
    const [result] = this.debitBatch(owner, [{ asset, index, amount }]);
    if (result === undefined) {
      throw new LedgerError("INVALID_AMOUNT", "Debit produced no result");
    }
    return result;
  }

  /**
   * Debit a set of lots.
   *
   * Validation rules (fail-closed — all must pass before anything changes):
   * 1. Every asset must be registered
   * 2. Every amount must be positive
   * 3. The summed debit per (asset, index) must not exceed the lot's amount
   *
   * The value removed from a partially debited lot is
   * floor(value × amount / lotAmount); an emptied lot gives up all of it.
   */
  debitBatch(owner: OwnerId, debits: readonly LotDebit[]): readonly DebitResult[] {
    const totals = new Map<string, bigint>();

    for (const debit of debits) {
      this._assets.assertExists(debit.asset);
      if (debit.amount <= 0n) {
        throw new LedgerError(
          "INVALID_AMOUNT",
          `Debit amount must be positive, got ${debit.amount.toString()} for ${debit.asset}@${debit.index.toString()}`,
        );
      }

      const key = JSON.stringify([debit.asset, debit.index.toString()]);
      const requested = (totals.get(key) ?? 0n) + debit.amount;
      totals.set(key, requested);

      const record = this.lotMap(owner, debit.asset, false)?.get(debit.index);
      const available = record?.amount ?? 0n;
      if (requested > available) {
        throw new LedgerError(
          "INSUFFICIENT_LOT_BALANCE",
          `Lot ${debit.asset}@${debit.index.toString()} of "${owner}" holds ${available.toString()}, debit requires ${requested.toString()}`,
        );
      }
    }

    // All validations passed — apply
    const results: DebitResult[] = [];
    for (const debit of debits) {
      const lots = this.lotMap(owner, debit.asset, true);
      const record = lots.get(debit.index);
      if (record === undefined) {
        throw new LedgerError(
          "INSUFFICIENT_LOT_BALANCE",
          `Lot ${debit.asset}@${debit.index.toString()} vanished during debit`,
        );
      }

      const emptied = debit.amount === record.amount;
      const value = emptied ? record.value : mulDiv(record.value, debit.amount, record.amount);

      if (emptied) {
        lots.delete(debit.index);
        if (lots.size === 0) {
          this._groups.delete(lotsKey(owner, debit.asset));
        }
      } else {
        record.amount -= debit.amount;
        record.value -= value;
      }

      results.push({
        asset: debit.asset,
        index: debit.index,
        amount: debit.amount,
        value,
        removed: emptied,
      });
    }

    return results;
  }

  /**
   * Undo the results of a debitBatch, newest first, so a lot debited
   * twice in one batch gets back exactly its amount and value.
   */
  restore(owner: OwnerId, results: readonly DebitResult[]): void {
    for (const result of results) {
      this._assets.assertExists(result.asset);
      if (result.amount <= 0n || result.value < 0n) {
        throw new LedgerError(
          "INVALID_AMOUNT",
          `Cannot restore ${result.amount.toString()} units worth ${result.value.toString()} to ${result.asset}@${result.index.toString()}`,
        );
      }
    }

    for (let i = results.length - 1; i >= 0; i--) {
      const result = results[i];
      if (result === undefined) continue;
      const lots = this.lotMap(owner, result.asset, true);
      const record = lots.get(result.index);
      if (record === undefined) {
        lots.set(result.index, { amount: result.amount, value: result.value });
      } else {
        record.amount += result.amount;
        record.value += result.value;
      }
    }
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Can be restored with DepositLedger.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    const lots: LedgerSnapshot["lots"][number][] = [];
    for (const group of this._groups.values()) {
      for (const [index, record] of group.lots) {
        lots.push({
          owner: group.owner,
          asset: group.asset,
          index: index.toString(),
          amount: record.amount.toString(),
          value: record.value.toString(),
        });
      }
    }

    return {
      version: 1,
      assets: this._assets.getAll().map((asset) => ({
        id: asset.id,
        kind: asset.kind,
        rewardRate: asset.rewardRate.toString(),
        maturityWindow: asset.maturityWindow.toString(),
        tip: this._assets.tipOf(asset.id).toString(),
      })),
      lots,
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot, re-validating every record.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): DepositLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const ledger = new DepositLedger();

    for (const asset of snapshot.assets) {
      const definition: unknown = {
        id: asset.id,
        kind: asset.kind,
        rewardRate: parseUnits(asset.rewardRate),
        maturityWindow: parseUnits(asset.maturityWindow),
      };
      if (!isAssetDefinition(definition)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Snapshot asset ${JSON.stringify(asset.id)} is not a valid asset definition`,
        );
      }
      ledger._assets.register(definition, parseUnits(asset.tip));
    }

    for (const lot of snapshot.lots) {
      ledger._assets.assertExists(lot.asset);
      const index = parseUnits(lot.index);
      const restored: unknown = {
        owner: lot.owner,
        asset: lot.asset,
        index,
        amount: parseUnits(lot.amount),
        value: parseUnits(lot.value),
      };
      if (!isLot(restored)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Snapshot lot ${lot.asset}@${lot.index} of "${String(lot.owner)}" is malformed or has a non-positive amount or value`,
        );
      }
      if (index > ledger._assets.tipOf(lot.asset)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Snapshot lot ${lot.asset}@${lot.index} is ahead of the asset tip`,
        );
      }

      const records = ledger.lotMap(lot.owner, lot.asset, true);
      if (records.has(index)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Duplicate snapshot lot ${lot.asset}@${lot.index} for "${lot.owner}"`,
        );
      }
      records.set(index, { amount: restored.amount, value: restored.value });
    }

    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private lotMap(owner: OwnerId, asset: AssetId, create: true): Map<bigint, LotRecord>;
  private lotMap(owner: OwnerId, asset: AssetId, create: false): Map<bigint, LotRecord> | undefined;
  private lotMap(owner: OwnerId, asset: AssetId, create: boolean): Map<bigint, LotRecord> | undefined {
    const key = lotsKey(owner, asset);
    let group = this._groups.get(key);
    if (group === undefined && create) {
      group = { owner, asset, lots: new Map() };
      this._groups.set(key, group);
    }
    return group?.lots;
  }
}
