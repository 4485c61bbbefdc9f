import type { Logger } from "pino";
import type {
  ActionRequest,
  CheckResult,
  ConfigSchema,
  PluginDescriptor,
  TriggerEvent,
} from "./protocol.js";

/**
 * Everything a handler may touch. Passed explicitly on every call so one
 * process can host several plugin instances without shared globals.
 */
export interface PluginContext<TConfig> {
  readonly config: TConfig;
  readonly demoMode: boolean;
  readonly log: Logger;
  /** Aborted when the plugin is stopped. */
  readonly signal: AbortSignal;
}

export interface TriggerHandlers<TConfig> {
  detectTriggers(ctx: PluginContext<TConfig>): Promise<TriggerEvent[]>;
}

export interface ActionOutcome {
  status: string;
  output?: unknown;
  error?: string;
}

export interface ActionHandlers<TConfig> {
  parameters: ConfigSchema;
  execute(request: ActionRequest, ctx: PluginContext<TConfig>): Promise<ActionOutcome>;
}

export interface PluginDefinition<TConfig> {
  readonly descriptor: PluginDescriptor;
  /** Human-readable summary returned with the config schema. */
  readonly description: string;
  readonly configSchema: ConfigSchema;
  /** Allow `initialize` to leave the failed state. */
  readonly recoverable?: boolean;
  /** Sub-checks older than this make the plugin degraded. */
  readonly healthFreshnessMs?: number;

  /**
   * Turn schema-validated values into the plugin's config. Throw a
   * ValidationError for cross-field rules.
   */
  parseConfig(values: Record<string, unknown>, env: { demoMode: boolean }): TConfig;
  start?(ctx: PluginContext<TConfig>): Promise<void>;
  stop?(ctx: PluginContext<TConfig>): Promise<void>;
  checks?(ctx: PluginContext<TConfig>): Promise<Record<string, CheckResult>>;

  readonly trigger?: TriggerHandlers<TConfig>;
  readonly action?: ActionHandlers<TConfig>;
}

export function definePlugin<TConfig>(definition: PluginDefinition<TConfig>): PluginDefinition<TConfig> {
  const { descriptor } = definition;
  const declaresTrigger = descriptor.capabilities.includes("trigger");
  const declaresAction = descriptor.capabilities.includes("action");

  if (declaresTrigger !== (definition.trigger !== undefined)) {
    throw new Error(`Plugin "${descriptor.id}": trigger capability and trigger handlers must be declared together`);
  }
  if (declaresAction !== (definition.action !== undefined)) {
    throw new Error(`Plugin "${descriptor.id}": action capability and action handlers must be declared together`);
  }

  return {
    ...definition,
    descriptor: Object.freeze({
      ...descriptor,
      capabilities: Object.freeze([...descriptor.capabilities]),
      ...(descriptor.tags ? { tags: Object.freeze([...descriptor.tags]) } : {}),
    }),
  };
}
