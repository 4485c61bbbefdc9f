export * from "./protocol.js";
export * from "./errors.js";
export { decodeRequest, encodeResponse, encodeRequest, decodeResponse } from "./codec.js";
export { LifecycleStateMachine, type LifecycleAction } from "./lifecycle.js";
export { resolveAction } from "./dispatcher.js";
export { aggregateStatus, buildHealthReport, lifecycleCheck, DEFAULT_FRESHNESS_MS } from "./health.js";
export { describeSchema, requiredFields, toZodSchema, validateParameters } from "./schema.js";
export { definePlugin } from "./plugin.js";
export type { ActionHandlers, ActionOutcome, PluginContext, PluginDefinition, TriggerHandlers } from "./plugin.js";
export { PluginRuntime, type RuntimeOptions } from "./runtime.js";
export { serve, runPlugin, type ServeOptions } from "./serve.js";
export { loadRuntimeConfig, type LogLevel, type RuntimeConfig } from "./config.js";
export { createComponentLogger, createPluginLogger, getLogger, type Logger } from "./logger.js";
