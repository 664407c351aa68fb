/**
 * @granary/ledger — Asset registry.
 *
 * Manages the set of depositable assets and their growth tips.
 * Definitions are immutable once registered; only the tip moves,
 * and only upward.
 *
 * Rules:
 * - No duplicate asset IDs
 * - At most one base asset
 * - Registration order is stable and used for tie-breaks
 */

import type { AssetDefinition, AssetId } from "@granary/types";
import { LedgerError } from "./types.js";

interface AssetRecord {
  readonly definition: AssetDefinition;
  tip: bigint;
}

export class AssetRegistry {
  private readonly _assets: Map<AssetId, AssetRecord> = new Map();
  private _base: AssetDefinition | undefined;

  /**
   * Register a new asset with its starting tip.
   * Throws if the ID exists or a second base asset is added.
   */
  register(definition: AssetDefinition, initialTip: bigint = 0n): AssetDefinition {
    if (this._assets.has(definition.id)) {
      throw new LedgerError(
        "DUPLICATE_ASSET",
        `Asset already registered: "${definition.id}"`,
      );
    }
    if (definition.kind === "base" && this._base !== undefined) {
      throw new LedgerError(
        "DUPLICATE_BASE_ASSET",
        `Base asset already registered: "${this._base.id}"`,
      );
    }
    if (definition.rewardRate < 0n || definition.maturityWindow < 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Reward rate and maturity window must be non-negative for "${definition.id}"`,
      );
    }

    const stored: AssetDefinition = { ...definition };
    this._assets.set(definition.id, { definition: stored, tip: initialTip });
    if (stored.kind === "base") {
      this._base = stored;
    }
    return stored;
  }

  get(id: AssetId): AssetDefinition | undefined {
    return this._assets.get(id)?.definition;
  }

  /**
   * Assert an asset exists. Throws if not found.
   */
  assertExists(id: AssetId): AssetDefinition {
    return this.record(id).definition;
  }

  tipOf(id: AssetId): bigint {
    return this.record(id).tip;
  }

  /**
   * Move an asset's tip forward. A negative delta is rejected.
   */
  advance(id: AssetId, delta: bigint): bigint {
    if (delta < 0n) {
      throw new LedgerError(
        "TIP_REGRESSION",
        `Growth tip of "${id}" cannot move backwards (delta ${delta.toString()})`,
      );
    }
    const record = this.record(id);
    record.tip += delta;
    return record.tip;
  }

  get base(): AssetDefinition | undefined {
    return this._base;
  }

  /**
   * All registered assets, in registration order.
   */
  getAll(): readonly AssetDefinition[] {
    return [...this._assets.values()].map((r) => r.definition);
  }

  get count(): number {
    return this._assets.size;
  }

  private record(id: AssetId): AssetRecord {
    const record = this._assets.get(id);
    if (record === undefined) {
      throw new LedgerError("UNKNOWN_ASSET", `Unknown asset: "${id}"`);
    }
    return record;
  }
}
