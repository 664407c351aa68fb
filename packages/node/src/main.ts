/**
 * @granary/node — Entry point.
 *
 * Bootstraps the Hono app, loads config and asset definitions, starts
 * the HTTP server, and handles graceful shutdown.
 */

import { fileURLToPath } from "node:url";
import { serve } from "@hono/node-server";
import pino from "pino";
import { loadAssetsFile, loadConfig, toServiceConfig } from "./config.js";
import { createApp } from "./app.js";

const DEFAULT_ASSETS_FILE = fileURLToPath(new URL("../config/assets.json", import.meta.url));

// =============================================================================
// Bootstrap
// =============================================================================

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const assetsFile = config.ASSETS_FILE ?? DEFAULT_ASSETS_FILE;
  const assets = loadAssetsFile(assetsFile);
  logger.info(
    { assetsFile, assets: assets.assets.length, pools: assets.pools.length },
    "Assets loaded",
  );

  const { app } = createApp({
    serviceConfig: toServiceConfig(config, assets),
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    logEvent: (fields, message) => {
      logger.info(fields, message);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, maxSlippageBps: config.MAX_SLIPPAGE_BPS },
    "Granary node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
