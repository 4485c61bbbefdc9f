import type { Logger } from "pino";
import { decodeRequest, encodeResponse } from "./codec.js";
import { loadRuntimeConfig } from "./config.js";
import { resolveAction } from "./dispatcher.js";
import { InternalError, ValidationError, isRecoverable, toErrorInfo } from "./errors.js";
import { DEFAULT_FRESHNESS_MS, buildHealthReport } from "./health.js";
import { LifecycleStateMachine } from "./lifecycle.js";
import { createPluginLogger } from "./logger.js";
import type { PluginContext, PluginDefinition } from "./plugin.js";
import {
  fail,
  ok,
  type ActionName,
  type ActionResult,
  type CheckResult,
  type ErrorInfo,
  type HealthReport,
  type PluginState,
  type RequestEnvelope,
  type ResponseEnvelope,
  type StatusReport,
} from "./protocol.js";
import { describeSchema, validateParameters } from "./schema.js";

export interface RuntimeOptions {
  demoMode?: boolean;
  log?: Logger;
}

/**
 * Hosts one plugin instance: owns its lifecycle state, configuration and
 * last error, and answers request envelopes one at a time.
 */
export class PluginRuntime<TConfig> {
  private readonly lifecycle: LifecycleStateMachine;
  private readonly log: Logger;
  private readonly demoMode: boolean;
  private settings: { config: TConfig } | null = null;
  private controller: AbortController | null = null;
  private lastError: ErrorInfo | null = null;
  private startedAt: Date | null = null;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly definition: PluginDefinition<TConfig>,
    options: RuntimeOptions = {},
  ) {
    this.lifecycle = new LifecycleStateMachine({ recoverable: definition.recoverable });
    this.log = options.log ?? createPluginLogger(definition.descriptor.id);
    this.demoMode = options.demoMode ?? loadRuntimeConfig().demoMode;
  }

  get state(): PluginState {
    return this.lifecycle.state;
  }

  /** Requests are linearized: each waits for the previous one to settle. */
  handle(request: RequestEnvelope): Promise<ResponseEnvelope> {
    const run = this.tail.then(() => this.dispatch(request));
    this.tail = run.catch(() => undefined);
    return run;
  }

  async handleLine(line: string): Promise<string> {
    let request: RequestEnvelope;
    try {
      request = decodeRequest(line);
    } catch (err) {
      this.log.warn({ line: line.slice(0, 100) }, "Rejected malformed request");
      return encodeResponse(fail(toErrorInfo(err)));
    }
    return encodeResponse(await this.handle(request));
  }

  /** Stop a running plugin once its input is exhausted. */
  async shutdown(): Promise<void> {
    await this.tail;
    if (this.lifecycle.state !== "running") return;
    const response = await this.handle({ action: "stop" });
    if (!response.success) {
      this.log.error({ error: response.error }, "Stop during shutdown failed");
    }
  }

  private async dispatch(request: RequestEnvelope): Promise<ResponseEnvelope> {
    let action: ActionName;
    try {
      action = resolveAction(request.action, this.definition.descriptor.capabilities, this.lifecycle);
    } catch (err) {
      const info = toErrorInfo(err);
      this.log.warn({ action: request.action, error: info }, "Request rejected");
      return fail(info);
    }

    try {
      return ok(await this.invoke(action, request));
    } catch (err) {
      return fail(this.recordFailure(action, err));
    }
  }

  private recordFailure(action: ActionName, err: unknown): ErrorInfo {
    const info = toErrorInfo(err);
    this.lastError = info;

    if (isRecoverable(err)) {
      this.log.warn({ action, error: info }, "Request failed");
    } else if (action === "initialize" || action === "start") {
      // Preconditions not met: state stays where it was.
      this.log.error({ action, error: info }, "Lifecycle step failed");
    } else {
      this.lifecycle.fail();
      this.controller?.abort();
      this.startedAt = null;
      this.log.error({ action, error: info }, "Plugin entered failed state");
    }
    return info;
  }

  private async invoke(action: ActionName, request: RequestEnvelope): Promise<unknown> {
    const { definition } = this;
    switch (action) {
      case "get_info":
        return { ...definition.descriptor, demo_mode: this.demoMode };
      case "get_status":
        return this.status();
      case "get_health":
        return this.health();
      case "get_trigger_config":
        return describeSchema(definition.description, definition.configSchema);
      case "get_action_config":
        return describeSchema(definition.description, definition.configSchema, definition.action?.parameters);
      case "initialize":
        return this.initialize(request.config ?? {});
      case "start":
        return this.start();
      case "stop":
        return this.stop();
      case "detect_triggers":
        return this.detectTriggers();
      case "execute_action":
        return this.executeAction(request);
    }
  }

  private status(): StatusReport {
    return {
      state: this.lifecycle.state,
      demo_mode: this.demoMode,
      started_at: this.startedAt ? this.startedAt.toISOString() : null,
    };
  }

  private context(): PluginContext<TConfig> {
    if (!this.settings) {
      throw new InternalError("Plugin has no configuration");
    }
    return {
      config: this.settings.config,
      demoMode: this.demoMode,
      log: this.log,
      signal: (this.controller ?? new AbortController()).signal,
    };
  }

  private initialize(values: Record<string, unknown>): StatusReport {
    const validated = validateParameters(this.definition.configSchema, values, "config");
    const config = this.definition.parseConfig(validated, { demoMode: this.demoMode });
    this.settings = { config };
    this.lifecycle.complete("initialize");
    this.lastError = null;
    this.log.info({ demo_mode: this.demoMode }, "Plugin initialized");
    return this.status();
  }

  private async start(): Promise<StatusReport> {
    if (this.lifecycle.isNoop("start")) {
      this.log.warn("Plugin is already running");
      return this.status();
    }
    this.controller = new AbortController();
    try {
      await this.definition.start?.(this.context());
    } catch (err) {
      this.controller.abort();
      this.controller = null;
      throw err;
    }
    this.lifecycle.complete("start");
    this.startedAt = new Date();
    this.log.info("Plugin started");
    return this.status();
  }

  private async stop(): Promise<StatusReport> {
    if (this.lifecycle.isNoop("stop")) {
      return this.status();
    }
    const wasRunning = this.lifecycle.state === "running";
    const ctx = this.context();
    this.controller?.abort();
    if (wasRunning) {
      await this.definition.stop?.(ctx);
    }
    this.controller = null;
    this.startedAt = null;
    this.lifecycle.complete("stop");
    this.log.info("Plugin stopped");
    return this.status();
  }

  private async health(): Promise<HealthReport> {
    const state = this.lifecycle.state;
    let checks: Record<string, CheckResult> = {};

    if (this.definition.checks && this.settings && (state === "initialized" || state === "running")) {
      try {
        checks = await this.definition.checks(this.context());
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        checks = { "plugin-checks": { status: "fail", message, observed_at: new Date().toISOString() } };
      }
    }

    return buildHealthReport({
      state,
      lastError: this.lastError,
      checks,
      startedAt: this.startedAt,
      freshnessMs: this.definition.healthFreshnessMs ?? DEFAULT_FRESHNESS_MS,
    });
  }

  private async detectTriggers(): Promise<unknown> {
    const trigger = this.definition.trigger;
    if (!trigger) throw new InternalError("Trigger handlers missing");
    const events = await trigger.detectTriggers(this.context());
    if (events.length > 0) {
      this.log.info({ count: events.length }, "Triggers detected");
    }
    return events;
  }

  private async executeAction(request: RequestEnvelope): Promise<ActionResult> {
    const action = this.definition.action;
    if (!action) throw new InternalError("Action handlers missing");
    const actionRequest = request.action_request;
    if (!actionRequest) {
      throw new ValidationError("action_request is required for execute_action");
    }

    const parameters = validateParameters(action.parameters, actionRequest.parameters);
    const started = new Date();
    const outcome = await action.execute({ id: actionRequest.id, parameters }, this.context());
    const completed = new Date();

    return {
      id: actionRequest.id,
      status: outcome.status,
      ...(outcome.output !== undefined ? { output: outcome.output } : {}),
      ...(outcome.error !== undefined ? { error: outcome.error } : {}),
      started_at: started.toISOString(),
      completed_at: completed.toISOString(),
      duration_ms: completed.getTime() - started.getTime(),
    };
  }
}
