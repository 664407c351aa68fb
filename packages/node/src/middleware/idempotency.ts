/**
 * Idempotency middleware.
 *
 * Caches POST mutation responses by Idempotency-Key header, so an
 * operator retrying an execution after a dropped connection gets the
 * original receipt instead of a second withdrawal.
 *
 * A key is bound to the route and the body it was first used with;
 * reusing it for a different request is a conflict. So is reusing it
 * while the first request is still being handled.
 */

import { createHash } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly path: string;
  /** sha256 hex of the request body */
  readonly fingerprint: string;
  readonly status: number;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;

  constructor(ttlMs: number = 86400000) {
    this._ttlMs = ttlMs;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (Date.now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  /**
   * Store a response, dropping every entry that has outlived the TTL.
   */
  set(key: string, response: CachedResponse): void {
    const now = Date.now();
    for (const [cachedKey, entry] of this._cache) {
      if (now - entry.cachedAt > this._ttlMs) {
        this._cache.delete(cachedKey);
      }
    }
    this._cache.set(key, response);
  }

  get size(): number {
    return this._cache.size;
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  const inFlight = new Set<string>();

  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    // Checked and claimed before the first await
    if (inFlight.has(idempotencyKey)) {
      return c.json(
        createErrorEnvelope(
          "IDEMPOTENCY_CONFLICT",
          "A request with this Idempotency-Key is still in progress",
        ),
        409,
      );
    }
    const cached = store.get(idempotencyKey);
    if (cached !== undefined && cached.path !== c.req.path) {
      return c.json(
        createErrorEnvelope(
          "IDEMPOTENCY_CONFLICT",
          `Idempotency-Key was already used on ${cached.path}`,
        ),
        409,
      );
    }
    inFlight.add(idempotencyKey);

    try {
      const fingerprint = createHash("sha256").update(await c.req.text()).digest("hex");

      if (cached !== undefined) {
        if (cached.fingerprint !== fingerprint) {
          return c.json(
            createErrorEnvelope(
              "IDEMPOTENCY_CONFLICT",
              "Idempotency-Key was already used with a different request body",
            ),
            409,
          );
        }
        const headers = new Headers(cached.headers);
        headers.set(REPLAY_HEADER, "true");
        return new Response(cached.body, { status: cached.status, headers });
      }

      await next();

      if (c.res.status < 400) {
        const clonedRes = c.res.clone();
        const body = await clonedRes.text();
        const headers: Record<string, string> = {};
        clonedRes.headers.forEach((value, key) => {
          headers[key] = value;
        });

        store.set(idempotencyKey, {
          path: c.req.path,
          fingerprint,
          status: clonedRes.status,
          body,
          headers,
          cachedAt: Date.now(),
        });
      }
    } finally {
      inFlight.delete(idempotencyKey);
    }
  };
}
