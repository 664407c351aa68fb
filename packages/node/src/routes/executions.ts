/**
 * Execution routes.
 *
 * POST /api/v1/executions — Execute a plan on an owner's behalf
 */

import { Hono } from "hono";
import { planFromJSON } from "@granary/planner";
import type { AppEnv, EventLogFn } from "../types/api-contract.js";
import { ExecutePlanSchema } from "../types/dto.js";
import { toReceiptView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export interface ExecutionRouteDeps {
  readonly logEvent?: EventLogFn | undefined;
}

export function createExecutionRoutes(deps?: ExecutionRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const logEvent = deps?.logEvent;

  routes.post("/", validateBody(ExecutePlanSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const receipt = service.execute({
      owner: body.owner,
      plan: planFromJSON(body.plan),
      slippageBps: body.slippageBps,
      destination: body.destination,
      tip: body.tip,
      expectedDigest: body.expectedDigest,
    });

    logEvent?.(
      {
        requestId: c.get("requestId"),
        owner: receipt.owner,
        proceeds: receipt.proceeds.toString(),
        tipPaid: receipt.tipPaid.toString(),
        valueDelivered: receipt.valueDelivered.toString(),
      },
      "Plan executed",
    );
    return c.json({ data: toReceiptView(receipt) }, 201);
  });

  return routes;
}
