// plughost wire protocol types: one JSON envelope per line over stdin/stdout.

export const BASE_ACTIONS = [
  "get_info",
  "initialize",
  "start",
  "stop",
  "get_status",
  "get_health",
] as const;

export const TRIGGER_ACTIONS = ["detect_triggers", "get_trigger_config"] as const;

export const ACTION_ACTIONS = ["execute_action", "get_action_config"] as const;

export type BaseAction = (typeof BASE_ACTIONS)[number];
export type TriggerAction = (typeof TRIGGER_ACTIONS)[number];
export type ActionAction = (typeof ACTION_ACTIONS)[number];
export type ActionName = BaseAction | TriggerAction | ActionAction;

export const ACTION_NAMES: readonly ActionName[] = [
  ...BASE_ACTIONS,
  ...TRIGGER_ACTIONS,
  ...ACTION_ACTIONS,
];

export function isActionName(value: string): value is ActionName {
  return (ACTION_NAMES as readonly string[]).includes(value);
}

export type Capability = "trigger" | "action";

export type PluginState = "uninitialized" | "initialized" | "running" | "stopped" | "failed";

export type ErrorKind =
  | "ProtocolError"
  | "ValidationError"
  | "CapabilityMissing"
  | "UnsupportedAction"
  | "InvalidState"
  | "TimeoutError"
  | "ProcessExitedError"
  | "InternalError";

export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

// --- Envelopes ---

export interface ActionRequest {
  id: string;
  parameters: Record<string, unknown>;
}

export interface RequestEnvelope {
  readonly action: string;
  readonly config?: Record<string, unknown>;
  readonly action_request?: ActionRequest;
}

export interface ResponseEnvelope<T = unknown> {
  success: boolean;
  data: T | null;
  error: ErrorInfo | null;
}

export function ok<T>(data: T): ResponseEnvelope<T> {
  return { success: true, data, error: null };
}

export function fail(error: ErrorInfo): ResponseEnvelope<never> {
  return { success: false, data: null, error };
}

// --- Plugin identity ---

export interface PluginDescriptor {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly capabilities: readonly Capability[];
  readonly description?: string;
  readonly tags?: readonly string[];
}

// --- Domain payloads ---

export type Severity = "info" | "low" | "medium" | "high" | "critical";

export interface TriggerEvent {
  id: string;
  type: string;
  severity: Severity;
  timestamp: string;
  source: string;
  payload: Record<string, unknown>;
}

export interface ActionResult {
  id: string;
  status: string;
  output?: unknown;
  error?: string;
  started_at: string;
  completed_at: string;
  duration_ms: number;
}

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export type CheckStatus = "pass" | "fail" | "unknown";

export interface CheckResult {
  status: CheckStatus;
  message?: string;
  observed_at: string;
}

export interface HealthReport {
  status: HealthStatus;
  state: PluginState;
  last_error: ErrorInfo | null;
  checks: Record<string, CheckResult>;
  uptime_seconds: number;
  timestamp: string;
}

export type ParameterType = "string" | "number" | "integer" | "boolean" | "array" | "object";

export interface ParameterSpec {
  type: ParameterType | readonly ParameterType[];
  description: string;
  required?: boolean;
  default?: unknown;
  minimum?: number;
  maximum?: number;
  max_length?: number;
  items?: { type: ParameterType };
}

export type ConfigSchema = Record<string, ParameterSpec>;

export interface SchemaDescription {
  description: string;
  config: ConfigSchema;
  parameters?: ConfigSchema;
  required: string[];
}

export interface StatusReport {
  state: PluginState;
  demo_mode: boolean;
  started_at: string | null;
}
