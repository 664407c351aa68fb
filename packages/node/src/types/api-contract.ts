/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { GranaryService } from "../services/granary-service.js";

/**
 * Hono environment type for the Granary app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The service backing the API (set by the service middleware) */
    service: GranaryService;
  };
}

/**
 * Structured event logger for domain actions (plan built, plan executed).
 * pino's `logger.info.bind(logger)` fits this shape.
 */
export type EventLogFn = (fields: Record<string, unknown>, message: string) => void;
