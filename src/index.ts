export * from "./leverage/index.js";
export * from "./market/index.js";
export {
  loadConfig,
  mergeSettings,
  DEFAULT_SETTINGS,
  CalculatorSettingsSchema,
  AppConfigSchema,
} from "./config/config.js";
export type { AppConfig, CalculatorSettings } from "./config/config.js";
export { leverageHandlers, createLeverageHandlers } from "./gateway/server-methods/leverage.js";
export type {
  GatewayRequestHandlers,
  GatewayRequestHandler,
  GatewayRequestContext,
  GatewayError,
  RespondFn,
} from "./gateway/server-methods/types.js";
export { createLeverageTools } from "./agents/tools/leverage-tools.js";
export type { AnyAgentTool, AgentTool, AgentToolResult } from "./agents/tools/common.js";
export { logger, setLogLevel } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
export { ConfigError, errorMessage } from "./utils/errors.js";
