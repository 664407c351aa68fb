/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (a base asset is registered)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { GranaryService } from "../services/granary-service.js";

export function createHealthRoutes(service: GranaryService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        assets: service.ledger.listAssets().length,
        lots: service.ledger.lotCount,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
