/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createLedgerRoutes } from "./ledger.js";
export { createPlanRoutes } from "./plans.js";
export type { PlanRouteDeps } from "./plans.js";
export { createExecutionRoutes } from "./executions.js";
export type { ExecutionRouteDeps } from "./executions.js";
