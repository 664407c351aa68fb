/**
 * @granary/types — Shared domain types for the Granary silo.
 *
 * Used across all Granary packages:
 * - Asset definitions and identifiers
 * - Deposit lots and lot references
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Asset types
export type {
  AssetId,
  OwnerId,
  AssetKind,
  AssetDefinition,
} from "./asset.js";

// Lot types
export type {
  Lot,
  LotEntry,
} from "./lot.js";

// Runtime type guards
export {
  isAssetKind,
  isAssetDefinition,
  isLot,
} from "./guards.js";
