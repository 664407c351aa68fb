/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests create the
 * app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv, EventLogFn } from "./types/api-contract.js";
import { GranaryService } from "./services/granary-service.js";
import type { GranaryServiceConfig } from "./services/granary-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { createHealthRoutes } from "./routes/health.js";
import { createLedgerRoutes } from "./routes/ledger.js";
import { createPlanRoutes } from "./routes/plans.js";
import { createExecutionRoutes } from "./routes/executions.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: GranaryServiceConfig;
  /** Per-request log sink */
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Domain event log sink (plans built, executions) */
  readonly logEvent?: EventLogFn;
  readonly idempotencyTtlMs?: number;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: GranaryService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new GranaryService(options.serviceConfig);
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn, { skipPaths: ["/health", "/ready"] }));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Idempotency for POST /api/* requests
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  // Mount v1 API routes
  app.route("/api/v1", createLedgerRoutes());
  app.route("/api/v1/plans", createPlanRoutes({ logEvent: options.logEvent }));
  app.route("/api/v1/executions", createExecutionRoutes({ logEvent: options.logEvent }));

  return { app, service, idempotencyStore };
}
