export { PluginProcess, type ExitInfo, type PluginCommand } from "./adapter.js";
export { PluginClient } from "./client.js";
export { loadHostConfig, type CallKind, type HostConfig } from "./config.js";
export { loadRegistry, parseRegistry, type PluginEntry } from "./registry.js";
export { checkAll, checkPlugin, formatReport, type CheckOptions, type PluginReport, type StepResult } from "./driver.js";
