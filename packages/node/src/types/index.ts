/**
 * Type barrel — re-exports all public types from @granary/node.
 */

// DTOs
export {
  UnitsSchema,
  PositiveUnitsSchema,
  FilterPolicySchema,
  SourceSelectorSchema,
  PlanJsonSchema,
  DepositSchema,
  AdvancePeriodSchema,
  PlanRequestSchema,
  ExcludePlanSchema,
  CombinePlansSchema,
  ExecutePlanSchema,
} from "./dto.js";
export type {
  DepositDto,
  AdvancePeriodDto,
  PlanRequestDto,
  ExcludePlanDto,
  CombinePlansDto,
  ExecutePlanDto,
} from "./dto.js";

// Views
export { toLotView, toAssetView, toPlanView, toReceiptView } from "./views.js";
export type { LotView, AssetView, PlanView, ReceiptView } from "./views.js";

// Error
export { createErrorEnvelope, isCodedError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, EventLogFn } from "./api-contract.js";
