/**
 * Ledger routes.
 *
 * GET  /api/v1/assets                     — Registered assets with tips and prices
 * POST /api/v1/deposits                   — Deposit into the lot at the current tip
 * POST /api/v1/periods/advance            — Close accrual periods
 * GET  /api/v1/owners/:owner/lots/:asset  — An owner's lots, ascending by index
 * GET  /api/v1/ledger/snapshot            — Serializable ledger snapshot
 * GET  /api/v1/balances/:recipient        — Value credited by executions
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AdvancePeriodSchema, DepositSchema } from "../types/dto.js";
import { toAssetView, toLotView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/assets", (c) => {
    const service = c.get("service");
    return c.json({ data: service.listAssets().map(toAssetView) });
  });

  routes.post("/deposits", validateBody(DepositSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const lot = service.deposit(body.owner, body.asset, body.amount, body.value);
    return c.json({ data: toLotView(lot) }, 201);
  });

  routes.post("/periods/advance", validateBody(AdvancePeriodSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const tips = service.advancePeriods(body.periods);
    return c.json({
      data: {
        tips: [...tips].map(([asset, tip]) => ({ asset, tip: tip.toString() })),
      },
    });
  });

  routes.get("/owners/:owner/lots/:asset", (c) => {
    const service = c.get("service");
    const lots = service.lotsOf(c.req.param("owner"), c.req.param("asset"));
    return c.json({ data: lots.map(toLotView) });
  });

  routes.get("/ledger/snapshot", (c) => {
    const service = c.get("service");
    return c.json({ data: service.snapshot() });
  });

  routes.get("/balances/:recipient", (c) => {
    const service = c.get("service");
    const recipient = c.req.param("recipient");
    return c.json({ data: { recipient, value: service.balanceOf(recipient).toString() } });
  });

  return routes;
}
