import {
  PluginError,
  createComponentLogger,
  fail,
  isActionName,
  toErrorInfo,
  validateParameters,
  type ActionName,
  type ActionRequest,
  type ConfigSchema,
  type Logger,
  type PluginState,
  type RequestEnvelope,
  type ResponseEnvelope,
  type SchemaDescription,
} from "@plughost/sdk";
import type { PluginProcess } from "./adapter.js";
import { loadHostConfig, type CallKind, type HostConfig } from "./config.js";

const CALL_KIND: Record<ActionName, CallKind> = {
  get_info: "query",
  get_status: "query",
  get_health: "query",
  get_trigger_config: "query",
  get_action_config: "query",
  initialize: "lifecycle",
  start: "lifecycle",
  stop: "lifecycle",
  detect_triggers: "trigger",
  execute_action: "action",
};

const STATE_AFTER: Partial<Record<ActionName, PluginState>> = {
  initialize: "initialized",
  start: "running",
  stop: "stopped",
};

function isSchemaDescription(value: unknown): value is SchemaDescription {
  return typeof value === "object" && value !== null && "config" in value && "required" in value;
}

/**
 * Typed calls against one plugin process. Transport failures come back as
 * `success: false` envelopes, never as rejections.
 */
export class PluginClient {
  private knownState: PluginState = "uninitialized";
  private schema: SchemaDescription | null = null;
  private readonly config: HostConfig;
  private readonly log: Logger;

  constructor(
    private readonly plugin: PluginProcess,
    options: { config?: HostConfig; log?: Logger; id?: string } = {},
  ) {
    this.config = options.config ?? loadHostConfig();
    this.log = options.log ?? createComponentLogger("client", { plugin: options.id ?? plugin.spec.command });
  }

  /** Last state the host observed. Treated as failed once the process is unreachable. */
  get state(): PluginState {
    return this.knownState;
  }

  async send(request: RequestEnvelope, timeoutMs?: number): Promise<ResponseEnvelope> {
    const action = isActionName(request.action) ? request.action : null;
    const timeout = timeoutMs ?? this.config.timeouts[action ? CALL_KIND[action] : "query"];

    let response: ResponseEnvelope;
    try {
      response = await this.plugin.call(request, timeout);
    } catch (err) {
      const info = toErrorInfo(err);
      if (info.kind === "TimeoutError" || info.kind === "ProcessExitedError") {
        this.knownState = "failed";
      }
      this.log.error({ action: request.action, error: info }, "Plugin call failed");
      return fail(info);
    }

    const next = action ? STATE_AFTER[action] : undefined;
    if (response.success) {
      if (next) this.knownState = next;
    } else if (response.error?.kind === "InternalError" && action !== "initialize" && action !== "start") {
      // initialize and start failures leave the plugin where it was.
      this.knownState = "failed";
    }
    return response;
  }

  getInfo(): Promise<ResponseEnvelope> {
    return this.send({ action: "get_info" });
  }

  getStatus(): Promise<ResponseEnvelope> {
    return this.send({ action: "get_status" });
  }

  getHealth(): Promise<ResponseEnvelope> {
    return this.send({ action: "get_health" });
  }

  async getTriggerConfig(): Promise<ResponseEnvelope> {
    return this.rememberSchema(await this.send({ action: "get_trigger_config" }));
  }

  async getActionConfig(): Promise<ResponseEnvelope> {
    return this.rememberSchema(await this.send({ action: "get_action_config" }));
  }

  /** Validates against the advertised schema first, when one was fetched. */
  initialize(config: Record<string, unknown> = {}): Promise<ResponseEnvelope> {
    const invalid = this.precheck(this.schema?.config, config, "config");
    if (invalid) return Promise.resolve(invalid);
    return this.send({ action: "initialize", config });
  }

  start(): Promise<ResponseEnvelope> {
    return this.send({ action: "start" });
  }

  stop(): Promise<ResponseEnvelope> {
    return this.send({ action: "stop" });
  }

  detectTriggers(): Promise<ResponseEnvelope> {
    return this.send({ action: "detect_triggers" });
  }

  executeAction(request: ActionRequest): Promise<ResponseEnvelope> {
    const invalid = this.precheck(this.schema?.parameters, request.parameters, "parameters");
    if (invalid) return Promise.resolve(invalid);
    return this.send({ action: "execute_action", action_request: request });
  }

  close(): Promise<unknown> {
    return this.plugin.close(this.config.closeGraceMs);
  }

  private rememberSchema(response: ResponseEnvelope): ResponseEnvelope {
    if (response.success && isSchemaDescription(response.data)) {
      this.schema = response.data;
    }
    return response;
  }

  private precheck(
    schema: ConfigSchema | undefined,
    values: Record<string, unknown>,
    label: string,
  ): ResponseEnvelope | null {
    if (!schema) return null;
    try {
      validateParameters(schema, values, label);
      return null;
    } catch (err) {
      if (err instanceof PluginError) return fail(err.toInfo());
      throw err;
    }
  }
}
