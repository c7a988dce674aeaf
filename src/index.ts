export * from "./types/index.js";
export * from "./config/index.js";
export * from "./driver/index.js";
export { XdotoolDriver, type XdotoolDriverOptions } from "./driver/xdotool.js";
export * from "./fire/index.js";
export * from "./layout/index.js";
export * from "./ledger/index.js";
export * from "./readiness/index.js";
export * from "./session/index.js";
export * from "./stage/index.js";
export * from "./state/index.js";
export { createSalvoRuntime, type SalvoRuntime, type SalvoRuntimeOptions } from "./runtime.js";
export {
  defineSalvoTool,
  SalvoServer,
  type SalvoServerConfig,
  type SalvoToolContext,
  type SalvoToolDefinition,
  type ToolMeta,
  type ToolResult
} from "./server.js";
export { coreTools } from "./tools/index.js";
export { createLogger, EventLog, type LogFormat, type Logger, type LogLevel } from "./utils/index.js";
