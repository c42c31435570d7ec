/**
 * @bridge-core/node — HTTP read and preflight surface for the bridge.
 *
 * @packageDocumentation
 */

export { BridgeService } from "./services/bridge-service.js";
export type {
  BridgeServiceConfig,
  AdminView,
  WithdrawalView,
  PreflightResult,
} from "./services/bridge-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
