/**
 * @granary/node — HTTP service for depositors and operators.
 *
 * Public API of the package. The server bootstrap lives in main.ts.
 */

export { GranaryService, ServiceError } from "./services/granary-service.js";
export type {
  GranaryServiceConfig,
  ServiceErrorCode,
  PlanInput,
  PlanResult,
  ExecuteInput,
  AssetOverview,
} from "./services/granary-service.js";
export {
  loadConfig,
  loadAssetsFile,
  parseAssetsFile,
  toServiceConfig,
  ConfigSchema,
  AssetsFileSchema,
} from "./config.js";
export type { AppConfig, AssetsFile } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
