/**
 * @granary/ledger — Deterministic integer arithmetic.
 *
 * All quantities are bigint. Division always states its rounding
 * direction so callers can bias it against over-reporting value.
 *
 * Rules:
 * - No floating-point operations
 * - Division by zero throws
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

/**
 * Parse an integer decimal string ("1000", "-4") into a bigint.
 */
export function parseUnits(raw: string): bigint {
  if (typeof raw !== "string" || !/^-?\d+$/.test(raw.trim())) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid integer amount: "${String(raw)}"`);
  }
  return BigInt(raw.trim());
}

function assertDivisor(denominator: bigint): void {
  if (denominator === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
}

/**
 * floor(a × b / denominator) for non-negative operands.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  assertDivisor(denominator);
  return (a * b) / denominator;
}

/**
 * ceil(a × b / denominator) for non-negative operands.
 */
export function mulDivUp(a: bigint, b: bigint, denominator: bigint): bigint {
  assertDivisor(denominator);
  const product = a * b;
  const quotient = product / denominator;
  return product % denominator === 0n ? quotient : quotient + 1n;
}

export function minAmount(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function sumAmounts(amounts: Iterable<bigint>): bigint {
  let total = 0n;
  for (const amount of amounts) {
    total += amount;
  }
  return total;
}
