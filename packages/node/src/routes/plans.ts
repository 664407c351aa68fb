/**
 * Planning routes. Read-only: nothing here changes the ledger.
 *
 * POST /api/v1/plans          — Build a withdrawal plan
 * POST /api/v1/plans/exclude  — Build a plan disjoint from a prior one
 * POST /api/v1/plans/combine  — Merge plans
 */

import { Hono } from "hono";
import { planFromJSON } from "@granary/planner";
import type { AppEnv, EventLogFn } from "../types/api-contract.js";
import { CombinePlansSchema, ExcludePlanSchema, PlanRequestSchema } from "../types/dto.js";
import { toPlanView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export interface PlanRouteDeps {
  readonly logEvent?: EventLogFn | undefined;
}

export function createPlanRoutes(deps?: PlanRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const logEvent = deps?.logEvent;

  // POST /api/v1/plans — Build
  routes.post("/", validateBody(PlanRequestSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const result = service.buildPlan(body);
    logEvent?.(
      {
        requestId: c.get("requestId"),
        owner: body.owner,
        target: body.target.toString(),
        available: result.plan.totalAvailableValue.toString(),
        digest: result.digest,
      },
      "Plan built",
    );
    return c.json({ data: toPlanView(result) });
  });

  // POST /api/v1/plans/exclude — Build around a prior plan
  routes.post("/exclude", validateBody(ExcludePlanSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const result = service.excludingPlan(body, planFromJSON(body.prior));
    logEvent?.(
      {
        requestId: c.get("requestId"),
        owner: body.owner,
        target: body.target.toString(),
        available: result.plan.totalAvailableValue.toString(),
        digest: result.digest,
      },
      "Excluding plan built",
    );
    return c.json({ data: toPlanView(result) });
  });

  // POST /api/v1/plans/combine — Merge
  routes.post("/combine", validateBody(CombinePlansSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const result = service.combinePlans(body.plans.map((plan) => planFromJSON(plan)));
    return c.json({ data: toPlanView(result) });
  });

  return routes;
}
