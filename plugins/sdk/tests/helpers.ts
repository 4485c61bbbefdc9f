import pino from "pino";
import { definePlugin, type PluginDefinition } from "../src/index.js";
import type { ActionHandlers, TriggerHandlers } from "../src/plugin.js";
import type { Capability } from "../src/protocol.js";

export const silentLog = pino({ level: "silent" });

export interface TestConfig {
  label: string;
  limit: number;
}

interface TestPluginOptions {
  capabilities?: Capability[];
  recoverable?: boolean;
  start?: PluginDefinition<TestConfig>["start"];
  stop?: PluginDefinition<TestConfig>["stop"];
  checks?: PluginDefinition<TestConfig>["checks"];
  trigger?: TriggerHandlers<TestConfig>;
  action?: ActionHandlers<TestConfig>;
}

const defaultTrigger: TriggerHandlers<TestConfig> = {
  async detectTriggers(ctx) {
    return [
      {
        id: "evt-1",
        type: "test.threshold",
        severity: "high",
        timestamp: "2026-01-01T00:00:00.000Z",
        source: "test-plugin",
        payload: { label: ctx.config.label },
      },
    ];
  },
};

const defaultAction: ActionHandlers<TestConfig> = {
  parameters: {
    message: { type: "string", description: "Text to echo", required: true },
  },
  async execute(request, ctx) {
    return { status: ctx.demoMode ? "simulated" : "done", output: { echo: request.parameters.message } };
  },
};

export function createTestPlugin(options: TestPluginOptions = {}): PluginDefinition<TestConfig> {
  const capabilities = options.capabilities ?? ["trigger", "action"];
  return definePlugin<TestConfig>({
    descriptor: { id: "test-plugin", name: "Test Plugin", version: "0.0.1", capabilities },
    description: "Plugin used by the runtime tests",
    configSchema: {
      label: { type: "string", description: "Label", default: "default" },
      limit: { type: "integer", description: "Limit", default: 10, minimum: 1 },
    },
    recoverable: options.recoverable,
    parseConfig(values) {
      return { label: String(values.label), limit: Number(values.limit) };
    },
    start: options.start,
    stop: options.stop,
    checks: options.checks,
    trigger: capabilities.includes("trigger") ? (options.trigger ?? defaultTrigger) : undefined,
    action: capabilities.includes("action") ? (options.action ?? defaultAction) : undefined,
  });
}
