/**
 * @granary/ledger — Deposit ledger for the Granary silo.
 *
 * A pure TypeScript lot ledger with zero runtime dependencies.
 * Enforces the deposit invariants:
 * - Lots are keyed by (owner, asset, growth index)
 * - Stored lots never hold a zero amount
 * - Growth tips never decrease
 * - Batched debits apply completely or not at all
 * - All arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All exposed types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Zero runtime dependencies
 */

// Core engine
export { DepositLedger } from "./ledger.js";

// Asset registry
export { AssetRegistry } from "./assets.js";

// Integer arithmetic
export {
  parseUnits,
  mulDiv,
  mulDivUp,
  minAmount,
  sumAmounts,
} from "./amount-math.js";

// Types
export type {
  LotReader,
  LotWriter,
  LotDebit,
  DebitResult,
  LedgerErrorCode,
  AssetSnapshot,
  LotSnapshot,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
