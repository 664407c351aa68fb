/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body validation. Every integer
 * quantity travels as a decimal string and is parsed to bigint here.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const UnitsSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer string")
  .transform((v) => BigInt(v));

export const PositiveUnitsSchema = UnitsSchema.refine((v) => v > 0n, "Must be positive");

const IdSchema = z.string().min(1).max(128);

export const FilterPolicySchema = z.object({
  minIndex: UnitsSchema.optional(),
  maxIndex: UnitsSchema.optional(),
  maxAccruedWeightPerValue: UnitsSchema.optional(),
  excludeBaseAsset: z.boolean().default(false),
  excludeImmatureLots: z.boolean().default(false),
  lowAccrualMode: z.enum(["use", "useLast", "omit"]).default("use"),
  lowAccrualThreshold: UnitsSchema.default("0"),
});

export const SourceSelectorSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("asset"), asset: IdSchema }),
  z.object({ kind: z.literal("ascendingPrice") }),
  z.object({ kind: z.literal("ascendingRewardRate") }),
]);

/**
 * Wire form of a plan. Amounts stay strings here; the plan codec
 * parses them and checks the plan's internal consistency.
 */
export const PlanJsonSchema = z.object({
  sources: z.array(
    z.object({
      asset: IdSchema,
      entries: z.array(z.object({ index: z.string(), amount: z.string() })),
      availableValue: z.string(),
    }),
  ),
  totalAvailableValue: z.string(),
});

// =============================================================================
// Ledger DTOs
// =============================================================================

export const DepositSchema = z.object({
  owner: IdSchema,
  asset: IdSchema,
  amount: PositiveUnitsSchema,
  value: PositiveUnitsSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const AdvancePeriodSchema = z.object({
  periods: z.number().int().min(1).max(1000).default(1),
});

export type AdvancePeriodDto = z.infer<typeof AdvancePeriodSchema>;

// =============================================================================
// Plan DTOs
// =============================================================================

export const PlanRequestSchema = z.object({
  owner: IdSchema,
  sources: z.array(SourceSelectorSchema).min(1),
  target: PositiveUnitsSchema,
  policy: FilterPolicySchema.default({}),
});

export type PlanRequestDto = z.infer<typeof PlanRequestSchema>;

export const ExcludePlanSchema = PlanRequestSchema.extend({
  prior: PlanJsonSchema,
});

export type ExcludePlanDto = z.infer<typeof ExcludePlanSchema>;

export const CombinePlansSchema = z.object({
  plans: z.array(PlanJsonSchema).min(1),
});

export type CombinePlansDto = z.infer<typeof CombinePlansSchema>;

// =============================================================================
// Execution DTOs
// =============================================================================

export const ExecutePlanSchema = z.object({
  owner: IdSchema,
  plan: PlanJsonSchema,
  slippageBps: z.number().int().min(0).max(10000),
  destination: IdSchema,
  tip: z
    .object({
      recipient: IdSchema,
      amount: UnitsSchema,
    })
    .optional(),
  expectedDigest: z
    .string()
    .regex(/^[0-9a-f]{64}$/, "Expected a hex SHA-256 digest")
    .optional(),
});

export type ExecutePlanDto = z.infer<typeof ExecutePlanSchema>;
