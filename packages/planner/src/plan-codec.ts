/**
 * Plan codec — JSON form, structural checks and content digest.
 *
 * Plans leave the process as JSON with every bigint written as a
 * decimal string. The digest is SHA-256 over the RFC 8785 canonical
 * form, so an operator can pin exactly the plan an owner approved.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { LedgerError, parseUnits } from "@granary/ledger";
import type { LotEntry } from "@granary/types";
import { PlanError } from "./errors.js";
import type { PlanSource, WithdrawalPlan } from "./types.js";

export interface LotEntryJSON {
  readonly index: string;
  readonly amount: string;
}

export interface PlanSourceJSON {
  readonly asset: string;
  readonly entries: readonly LotEntryJSON[];
  readonly availableValue: string;
}

export interface PlanJSON {
  readonly sources: readonly PlanSourceJSON[];
  readonly totalAvailableValue: string;
}

// =============================================================================
// Encoding
// =============================================================================

export function planToJSON(plan: WithdrawalPlan): PlanJSON {
  return {
    sources: plan.sources.map((source) => ({
      asset: source.asset,
      entries: source.entries.map((entry) => ({
        index: entry.index.toString(),
        amount: entry.amount.toString(),
      })),
      availableValue: source.availableValue.toString(),
    })),
    totalAvailableValue: plan.totalAvailableValue.toString(),
  };
}

/**
 * Decode and check a plan received from outside the process.
 */
export function planFromJSON(input: unknown): WithdrawalPlan {
  const rawSources = isRecord(input) ? input["sources"] : undefined;
  if (!isRecord(input) || !Array.isArray(rawSources)) {
    throw new PlanError("INVALID_PLAN", "Plan must be an object with a sources array");
  }

  const sources: PlanSource[] = rawSources.map((raw: unknown, i: number) => decodeSource(raw, i));
  const plan: WithdrawalPlan = {
    sources,
    totalAvailableValue: decodeUnits(input["totalAvailableValue"], "totalAvailableValue"),
  };
  assertPlanConsistent(plan);
  return plan;
}

function decodeSource(raw: unknown, i: number): PlanSource {
  if (!isRecord(raw)) {
    throw new PlanError("INVALID_PLAN", `Plan source ${i} is malformed`);
  }
  const asset = raw["asset"];
  const rawEntries = raw["entries"];
  if (typeof asset !== "string" || !Array.isArray(rawEntries)) {
    throw new PlanError("INVALID_PLAN", `Plan source ${i} is malformed`);
  }

  const entries: LotEntry[] = rawEntries.map((entry: unknown, j: number) => {
    if (!isRecord(entry)) {
      throw new PlanError("INVALID_PLAN", `Plan source ${i} entry ${j} is malformed`);
    }
    return {
      index: decodeUnits(entry["index"], `sources[${i}].entries[${j}].index`),
      amount: decodeUnits(entry["amount"], `sources[${i}].entries[${j}].amount`),
    };
  });

  return {
    asset,
    entries,
    availableValue: decodeUnits(raw["availableValue"], `sources[${i}].availableValue`),
  };
}

// =============================================================================
// Checks
// =============================================================================

/**
 * Structural rules every executable plan satisfies:
 * - each source names an asset once and has at least one entry
 * - entry indices are non-negative, amounts positive
 * - subtotals are non-negative and sum to the total
 */
export function assertPlanConsistent(plan: WithdrawalPlan): void {
  const seen = new Set<string>();
  let sum = 0n;

  for (const source of plan.sources) {
    if (seen.has(source.asset)) {
      throw new PlanError("INVALID_PLAN", `Asset '${source.asset}' appears in more than one source`);
    }
    seen.add(source.asset);

    if (source.entries.length === 0) {
      throw new PlanError("INVALID_PLAN", `Source '${source.asset}' has no entries`);
    }
    for (const entry of source.entries) {
      if (entry.amount <= 0n) {
        throw new PlanError(
          "INVALID_PLAN",
          `Entry ${source.asset}@${entry.index.toString()} has non-positive amount ${entry.amount.toString()}`,
        );
      }
      if (entry.index < 0n) {
        throw new PlanError("INVALID_PLAN", `Entry index ${entry.index.toString()} is negative`);
      }
    }
    if (source.availableValue < 0n) {
      throw new PlanError("INVALID_PLAN", `Source '${source.asset}' has a negative value`);
    }
    sum += source.availableValue;
  }

  if (sum !== plan.totalAvailableValue) {
    throw new PlanError(
      "INVALID_PLAN",
      `Source values sum to ${sum.toString()}, plan total is ${plan.totalAvailableValue.toString()}`,
    );
  }
}

// =============================================================================
// Digest
// =============================================================================

/**
 * Hex SHA-256 of the plan's canonical JSON.
 */
export function planDigest(plan: WithdrawalPlan): string {
  return createHash("sha256").update(canonicalize(planToJSON(plan))).digest("hex");
}

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeUnits(raw: unknown, field: string): bigint {
  if (typeof raw !== "string") {
    throw new PlanError("INVALID_PLAN", `${field} must be a decimal string`);
  }
  try {
    return parseUnits(raw);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw new PlanError("INVALID_PLAN", `${field}: ${err.message}`);
    }
    throw err;
  }
}
