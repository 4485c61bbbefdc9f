import {
  createComponentLogger,
  type ErrorInfo,
  type Logger,
  type ResponseEnvelope,
} from "@plughost/sdk";
import { PluginProcess } from "./adapter.js";
import { PluginClient } from "./client.js";
import { loadHostConfig, type HostConfig } from "./config.js";
import type { PluginEntry } from "./registry.js";

export interface StepResult {
  action: string;
  success: boolean;
  duration_ms: number;
  error?: ErrorInfo;
}

export interface PluginReport {
  id: string;
  type: PluginEntry["type"];
  passed: boolean;
  steps: StepResult[];
}

export interface CheckOptions {
  config?: HostConfig;
  log?: Logger;
}

type Step = [action: string, run: (client: PluginClient) => Promise<ResponseEnvelope>];

function stepsFor(entry: PluginEntry): Step[] {
  const steps: Step[] = [["get_info", (c) => c.getInfo()]];

  if (entry.type === "trigger") {
    steps.push(["get_trigger_config", (c) => c.getTriggerConfig()]);
  } else {
    steps.push(["get_action_config", (c) => c.getActionConfig()]);
  }

  steps.push(
    ["initialize", (c) => c.initialize(entry.config)],
    ["start", (c) => c.start()],
    ["get_health", (c) => c.getHealth()],
  );

  if (entry.type === "trigger") {
    steps.push(["detect_triggers", (c) => c.detectTriggers()]);
  } else if (entry.sample_action) {
    const sample = entry.sample_action;
    steps.push(["execute_action", (c) => c.executeAction(sample).then((res) => checkEcho(res, sample.id))]);
  }

  steps.push(
    ["get_status", (c) => c.getStatus()],
    ["stop", (c) => c.stop()],
  );
  return steps;
}

function checkEcho(response: ResponseEnvelope, id: string): ResponseEnvelope {
  if (!response.success) return response;
  const data = response.data;
  const echoed = typeof data === "object" && data !== null && "id" in data ? data.id : undefined;
  if (echoed === id) return response;
  return {
    success: false,
    data: response.data,
    error: { kind: "ProtocolError", message: `Action result id ${String(echoed)} does not match request id ${id}` },
  };
}

/**
 * Drive one plugin through its whole lifecycle, stopping at the first
 * failing step. The subprocess is always closed afterwards.
 */
export async function checkPlugin(entry: PluginEntry, options: CheckOptions = {}): Promise<PluginReport> {
  const config = options.config ?? loadHostConfig();
  const log = options.log ?? createComponentLogger("driver", { plugin: entry.id });
  const plugin = new PluginProcess(
    { command: entry.command, args: entry.args, cwd: entry.cwd, env: entry.env },
    { log },
  );
  const client = new PluginClient(plugin, { config, log, id: entry.id });
  const steps: StepResult[] = [];

  try {
    for (const [action, run] of stepsFor(entry)) {
      const started = Date.now();
      const response = await run(client);
      const result: StepResult = { action, success: response.success, duration_ms: Date.now() - started };
      if (response.error) result.error = response.error;
      steps.push(result);

      if (!response.success) {
        log.warn({ action, error: response.error }, "Plugin check failed");
        break;
      }
    }
  } finally {
    await client.close();
  }

  return { id: entry.id, type: entry.type, passed: steps.every((s) => s.success), steps };
}

export async function checkAll(
  entries: PluginEntry[],
  options: CheckOptions = {},
): Promise<{ reports: PluginReport[]; exitCode: number }> {
  const reports = await Promise.all(entries.map((entry) => checkPlugin(entry, options)));
  const failed = reports.filter((r) => !r.passed).length;
  return { reports, exitCode: Math.min(failed, 125) };
}

export function formatReport(report: PluginReport): string {
  const lines = [`${report.passed ? "PASS" : "FAIL"} ${report.id} (${report.type})`];
  for (const step of report.steps) {
    const mark = step.success ? "ok  " : "FAIL";
    const detail = step.error ? ` ${step.error.kind}: ${step.error.message}` : "";
    lines.push(`  ${mark} ${step.action}${detail}`);
  }
  return lines.join("\n");
}
