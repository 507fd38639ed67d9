export * from "./errors.js";
export * from "./types.js";
export * from "./logger.js";
export * from "./catalog/toolSpec.js";
export * from "./catalog/catalog.js";
export * from "./catalog/sources.js";
export * from "./registry/toolInstance.js";
export * from "./registry/typeRegistry.js";
export * from "./registry/instanceCache.js";
export * from "./health/healthTracker.js";
export * from "./validation/validator.js";
export * from "./cache/resultCache.js";
export * from "./dispatch/classification.js";
export * from "./dispatch/dispatcher.js";
export * from "./config/engineConfig.js";
export * from "./infra/callContext.js";
export * from "./infra/deadline.js";
export * from "./engine.js";
export * from "./tools/builtin/index.js";
export * from "./server/mcpServer.js";
export * from "./diagnostics/healthReport.js";
