/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain error codes (LedgerError, QuoteError, PlanError,
 * RedeemError, ServiceError) to HTTP status codes.
 */

import type { Context } from "hono";
import { createErrorEnvelope, isCodedError } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 409 | 422 | 500;

const STATUS_MAP: ReadonlyMap<string, ErrorStatus> = new Map<string, ErrorStatus>([
  // Ledger errors
  ["UNKNOWN_ASSET", 404],
  ["DUPLICATE_ASSET", 409],
  ["DUPLICATE_BASE_ASSET", 409],
  ["INVALID_AMOUNT", 400],
  ["INSUFFICIENT_LOT_BALANCE", 409],
  ["TIP_REGRESSION", 400],
  ["INVALID_SNAPSHOT", 400],

  // Quote errors
  ["UNKNOWN_POOL", 404],
  ["DUPLICATE_POOL", 409],
  ["INVALID_RESERVES", 400],
  ["INSUFFICIENT_LIQUIDITY", 422],
  ["SLIPPAGE_EXCEEDED", 409],

  // Planner errors
  ["NO_LOTS", 404],
  ["INVALID_POLICY", 400],
  ["INVALID_TARGET", 400],
  ["INVALID_PLAN", 400],
  ["UNKNOWN_SOURCE", 404],

  // Redeem errors
  ["TIP_EXCEEDS_PROCEEDS", 422],
  ["INVALID_SLIPPAGE", 400],

  // Service errors
  ["PLAN_DIGEST_MISMATCH", 409],
  ["SLIPPAGE_ABOVE_LIMIT", 422],
]);

/**
 * HTTP status for an error code; unknown codes are internal errors.
 */
export function statusForCode(code: string): ErrorStatus {
  return STATUS_MAP.get(code) ?? 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = isCodedError(err) ? err.code : "INTERNAL_ERROR";
  const status = statusForCode(code);

  // Don't leak internal details
  const message = status === 500 ? "Internal server error" : err.message;

  return c.json(createErrorEnvelope(status === 500 ? "INTERNAL_ERROR" : code, message), status);
}
