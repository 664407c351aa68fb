/**
 * @granary/ledger — Internal types for the deposit ledger.
 *
 * These extend the shared @granary/types with ledger-specific
 * structures: read/write capabilities, debit records, snapshots.
 *
 * Rules:
 * - All types are readonly
 * - Lots are keyed by (owner, asset, index), never by handle
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type {
  AssetDefinition,
  AssetId,
  AssetKind,
  Lot,
  OwnerId,
} from "@granary/types";

// ─── Capabilities ────────────────────────────────────────────────────────

/**
 * Read side of the deposit ledger.
 *
 * The planning engine only ever sees this interface, so every plan is
 * a pure function of what it returns.
 */
export interface LotReader {
  /** All lots an owner holds of an asset, ascending by index. */
  lotsOf(owner: OwnerId, asset: AssetId): readonly Lot[];

  /** Current growth-index tip of an asset. */
  creationIndexTip(asset: AssetId): bigint;

  getAsset(asset: AssetId): AssetDefinition | undefined;

  /** Registered assets in registration order. */
  listAssets(): readonly AssetDefinition[];

  baseAsset(): AssetDefinition | undefined;
}

/**
 * Write side used by the redeemer.
 */
export interface LotWriter {
  getLot(owner: OwnerId, asset: AssetId, index: bigint): Lot | undefined;

  /** Debit several lots atomically. Either every debit applies or none. */
  debitBatch(owner: OwnerId, debits: readonly LotDebit[]): readonly DebitResult[];

  /** Put back what a debitBatch removed, leaving the lots as they were before it. */
  restore(owner: OwnerId, results: readonly DebitResult[]): void;
}

// ─── Operations ──────────────────────────────────────────────────────────

/**
 * A requested reduction of one lot.
 */
export interface LotDebit {
  readonly asset: AssetId;
  readonly index: bigint;
  readonly amount: bigint;
}

/**
 * Outcome of a debit: the units and the share of the lot's value removed.
 */
export interface DebitResult {
  readonly asset: AssetId;
  readonly index: bigint;
  readonly amount: bigint;
  readonly value: bigint;
  /** True when the lot was emptied and removed. */
  readonly removed: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNKNOWN_ASSET"
  | "DUPLICATE_ASSET"
  | "DUPLICATE_BASE_ASSET"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_LOT_BALANCE"
  | "TIP_REGRESSION"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the deposit ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Asset record inside a snapshot. Bigints are carried as decimal strings
 * so the snapshot survives JSON.
 */
export interface AssetSnapshot {
  readonly id: AssetId;
  readonly kind: AssetKind;
  readonly rewardRate: string;
  readonly maturityWindow: string;
  readonly tip: string;
}

export interface LotSnapshot {
  readonly owner: OwnerId;
  readonly asset: AssetId;
  readonly index: string;
  readonly amount: string;
  readonly value: string;
}

/**
 * Serializable snapshot of the entire ledger state.
 * Used for persistence and rehydration.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly assets: readonly AssetSnapshot[];
  readonly lots: readonly LotSnapshot[];
  readonly createdAt: string;
}
