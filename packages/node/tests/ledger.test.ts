/**
 * Tests for ledger routes.
 *
 * Covers: assets, deposits, periods, lots, snapshot, balances.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";
import type { ErrorBody } from "./setup.js";
import type { AppInstance } from "../src/app.js";
import type { AssetView, LotView } from "../src/types/views.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

function deposit(owner: string, asset: string, amount: string, value: string): Promise<Response> {
  return Promise.resolve(
    instance.app.request(jsonRequest("/api/v1/deposits", "POST", { owner, asset, amount, value })),
  );
}

// =============================================================================
// GET /api/v1/assets
// =============================================================================

describe("GET /api/v1/assets", () => {
  it("lists assets with tips, prices and pools", async () => {
    const res = await instance.app.request("/api/v1/assets");
    expect(res.status).toBe(200);

    const body = (await res.json()) as { data: AssetView[] };
    expect(body.data).toEqual([
      { id: "BEAN", kind: "base", rewardRate: "2", maturityWindow: "0", tip: "0", price: "1000000" },
      {
        id: "BEAN:WETH",
        kind: "poolShare",
        rewardRate: "4",
        maturityWindow: "0",
        tip: "0",
        price: "1000000",
        pool: {
          baseReserve: "1000000",
          pairedReserve: "1000000",
          shareSupply: "1000000",
          pairedPrice: "1000000",
        },
      },
    ]);
  });
});

// =============================================================================
// POST /api/v1/deposits
// =============================================================================

describe("POST /api/v1/deposits", () => {
  it("creates a lot at the current tip", async () => {
    const res = await deposit("alice", "BEAN", "1000", "1000");
    expect(res.status).toBe(201);

    const body = (await res.json()) as { data: LotView };
    expect(body.data).toEqual({ owner: "alice", asset: "BEAN", index: "0", amount: "1000", value: "1000" });
  });

  it("tops up a lot deposited in the same period", async () => {
    await deposit("alice", "BEAN", "1000", "1000");
    const res = await deposit("alice", "BEAN", "500", "400");

    const body = (await res.json()) as { data: LotView };
    expect(body.data.amount).toBe("1500");
    expect(body.data.value).toBe("1400");
  });

  it.each(["0", "-5", "1.5", "abc"])("rejects amount %s", async (amount) => {
    const res = await deposit("alice", "BEAN", amount, "1000");
    expect(res.status).toBe(400);

    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("returns 404 for an unknown asset", async () => {
    const res = await deposit("alice", "DOGE", "1000", "1000");
    expect(res.status).toBe(404);

    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("UNKNOWN_ASSET");
  });

  it("returns 400 for malformed JSON", async () => {
    const res = await instance.app.request(
      new Request("http://localhost/api/v1/deposits", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );
    expect(res.status).toBe(400);

    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

// =============================================================================
// POST /api/v1/periods/advance
// =============================================================================

describe("POST /api/v1/periods/advance", () => {
  it("advances one period by default", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/periods/advance", "POST", {}));
    expect(res.status).toBe(200);

    const body = (await res.json()) as { data: { tips: { asset: string; tip: string }[] } };
    expect(body.data.tips).toEqual([
      { asset: "BEAN", tip: "2" },
      { asset: "BEAN:WETH", tip: "4" },
    ]);
  });

  it("advances several periods", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/periods/advance", "POST", { periods: 3 }));

    const body = (await res.json()) as { data: { tips: { asset: string; tip: string }[] } };
    expect(body.data.tips).toEqual([
      { asset: "BEAN", tip: "6" },
      { asset: "BEAN:WETH", tip: "12" },
    ]);
  });

  it("rejects zero periods", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/periods/advance", "POST", { periods: 0 }));
    expect(res.status).toBe(400);
  });
});

// =============================================================================
// GET /api/v1/owners/:owner/lots/:asset
// =============================================================================

describe("GET /api/v1/owners/:owner/lots/:asset", () => {
  it("returns lots ascending by index", async () => {
    await deposit("alice", "BEAN", "1000", "1000");
    await instance.app.request(jsonRequest("/api/v1/periods/advance", "POST", {}));
    await deposit("alice", "BEAN", "700", "600");

    const res = await instance.app.request("/api/v1/owners/alice/lots/BEAN");
    expect(res.status).toBe(200);

    const body = (await res.json()) as { data: LotView[] };
    expect(body.data.map((l) => [l.index, l.amount, l.value])).toEqual([
      ["0", "1000", "1000"],
      ["2", "700", "600"],
    ]);
  });

  it("returns an empty list for an owner without lots", async () => {
    const res = await instance.app.request("/api/v1/owners/bob/lots/BEAN");
    const body = (await res.json()) as { data: LotView[] };
    expect(body.data).toEqual([]);
  });

  it("returns 404 for an unknown asset", async () => {
    const res = await instance.app.request("/api/v1/owners/alice/lots/DOGE");
    expect(res.status).toBe(404);
  });
});

// =============================================================================
// Snapshot & balances
// =============================================================================

describe("GET /api/v1/ledger/snapshot", () => {
  it("returns every lot with string quantities", async () => {
    await deposit("alice", "BEAN", "1000", "1000");

    const res = await instance.app.request("/api/v1/ledger/snapshot");
    const body = (await res.json()) as {
      data: { version: number; lots: { owner: string; asset: string; index: string; amount: string; value: string }[] };
    };
    expect(body.data.version).toBe(1);
    expect(body.data.lots).toEqual([{ owner: "alice", asset: "BEAN", index: "0", amount: "1000", value: "1000" }]);
  });
});

describe("GET /api/v1/balances/:recipient", () => {
  it("reports zero for a recipient never credited", async () => {
    const res = await instance.app.request("/api/v1/balances/alice-wallet");
    const body = (await res.json()) as { data: { recipient: string; value: string } };
    expect(body.data).toEqual({ recipient: "alice-wallet", value: "0" });
  });
});
