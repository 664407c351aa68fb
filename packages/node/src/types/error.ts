/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Known API error codes.
 *
 * These are mapped from domain errors and HTTP semantics.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "IDEMPOTENCY_CONFLICT"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Domain errors
// =============================================================================

/**
 * Every domain package throws an Error subclass carrying a string code.
 */
export function isCodedError(err: unknown): err is Error & { readonly code: string } {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}
