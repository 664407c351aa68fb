/**
 * Tests for planning routes.
 *
 * alice holds 1000 BEAN and 1000 BEAN:WETH shares in a balanced pool of
 * 1,000,000 on each side; 451 shares redeem for 901 and 251 for 501.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";
import type { ErrorBody, PlanBody } from "./setup.js";
import type { AppInstance } from "../src/app.js";

let instance: AppInstance;

const BEAN_THEN_WETH = [
  { kind: "asset", asset: "BEAN" },
  { kind: "asset", asset: "BEAN:WETH" },
];

beforeEach(() => {
  instance = createTestApp();
  instance.service.deposit("alice", "BEAN", 1000n, 1000n);
  instance.service.deposit("alice", "BEAN:WETH", 1000n, 1999n);
});

async function plan(body: Record<string, unknown>): Promise<Response> {
  return instance.app.request(jsonRequest("/api/v1/plans", "POST", body));
}

// =============================================================================
// POST /api/v1/plans
// =============================================================================

describe("POST /api/v1/plans", () => {
  it("plans across the base asset and a pool", async () => {
    const res = await plan({ owner: "alice", sources: BEAN_THEN_WETH, target: "1900" });
    expect(res.status).toBe(200);

    const body = (await res.json()) as PlanBody;
    expect(body.data.plan).toEqual({
      sources: [
        { asset: "BEAN", entries: [{ index: "0", amount: "1000" }], availableValue: "1000" },
        { asset: "BEAN:WETH", entries: [{ index: "0", amount: "451" }], availableValue: "900" },
      ],
      totalAvailableValue: "1900",
    });
    expect(body.data.target).toBe("1900");
    expect(body.data.sufficient).toBe(true);
    expect(body.data.digest).toMatch(/^[0-9a-f]{64}$/);
  });

  it("flags a plan that falls short", async () => {
    const res = await plan({ owner: "alice", sources: BEAN_THEN_WETH, target: "5000" });
    const body = (await res.json()) as PlanBody;
    expect(body.data.plan.totalAvailableValue).toBe("2999");
    expect(body.data.sufficient).toBe(false);
  });

  it("expands a sorting strategy", async () => {
    const res = await plan({ owner: "alice", sources: [{ kind: "ascendingRewardRate" }], target: "500" });
    const body = (await res.json()) as PlanBody;
    // BEAN's reward rate (2) is below BEAN:WETH's (4)
    expect(body.data.plan.sources.map((s) => s.asset)).toEqual(["BEAN"]);
  });

  it("honours the filter policy", async () => {
    const res = await plan({
      owner: "alice",
      sources: BEAN_THEN_WETH,
      target: "500",
      policy: { excludeBaseAsset: true },
    });
    const body = (await res.json()) as PlanBody;
    expect(body.data.plan.sources).toEqual([
      { asset: "BEAN:WETH", entries: [{ index: "0", amount: "251" }], availableValue: "500" },
    ]);
  });

  it("does not move the ledger", async () => {
    await plan({ owner: "alice", sources: BEAN_THEN_WETH, target: "1900" });
    expect(instance.service.lotsOf("alice", "BEAN")[0]?.amount).toBe(1000n);
  });

  it("returns 400 for contradictory index bounds", async () => {
    const res = await plan({
      owner: "alice",
      sources: BEAN_THEN_WETH,
      target: "100",
      policy: { minIndex: "5", maxIndex: "1" },
    });
    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_POLICY");
  });

  it("returns 404 for an unknown source asset", async () => {
    const res = await plan({ owner: "alice", sources: [{ kind: "asset", asset: "DOGE" }], target: "100" });
    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("UNKNOWN_SOURCE");
  });

  it("requires at least one source", async () => {
    const res = await plan({ owner: "alice", sources: [], target: "100" });
    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("rejects a zero target", async () => {
    const res = await plan({ owner: "alice", sources: BEAN_THEN_WETH, target: "0" });
    expect(res.status).toBe(400);
  });
});

// =============================================================================
// POST /api/v1/plans/exclude and /combine
// =============================================================================

describe("plan composition", () => {
  async function priorPlan(): Promise<PlanBody["data"]["plan"]> {
    const res = await plan({ owner: "alice", sources: BEAN_THEN_WETH, target: "1900" });
    return ((await res.json()) as PlanBody).data.plan;
  }

  it("plans around a prior plan", async () => {
    const prior = await priorPlan();
    const res = await instance.app.request(
      jsonRequest("/api/v1/plans/exclude", "POST", {
        owner: "alice",
        sources: BEAN_THEN_WETH,
        target: "500",
        prior,
      }),
    );
    expect(res.status).toBe(200);

    const body = (await res.json()) as PlanBody;
    expect(body.data.plan).toEqual({
      sources: [{ asset: "BEAN:WETH", entries: [{ index: "0", amount: "251" }], availableValue: "500" }],
      totalAvailableValue: "500",
    });
  });

  it("combines plans by summing amounts", async () => {
    const prior = await priorPlan();
    const excludeRes = await instance.app.request(
      jsonRequest("/api/v1/plans/exclude", "POST", {
        owner: "alice",
        sources: BEAN_THEN_WETH,
        target: "500",
        prior,
      }),
    );
    const next = ((await excludeRes.json()) as PlanBody).data.plan;

    const res = await instance.app.request(jsonRequest("/api/v1/plans/combine", "POST", { plans: [prior, next] }));
    expect(res.status).toBe(200);

    const body = (await res.json()) as PlanBody;
    expect(body.data.plan).toEqual({
      sources: [
        { asset: "BEAN", entries: [{ index: "0", amount: "1000" }], availableValue: "1000" },
        { asset: "BEAN:WETH", entries: [{ index: "0", amount: "702" }], availableValue: "1400" },
      ],
      totalAvailableValue: "2400",
    });
    expect(body.data.target).toBe("2400");
  });

  it("rejects an inconsistent plan", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/plans/combine", "POST", {
        plans: [
          {
            sources: [{ asset: "BEAN", entries: [{ index: "0", amount: "10" }], availableValue: "10" }],
            totalAvailableValue: "11",
          },
        ],
      }),
    );
    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_PLAN");
  });
});
