import {
  CapabilityMissingError,
  InvalidStateError,
  UnsupportedActionError,
} from "./errors.js";
import type { LifecycleStateMachine } from "./lifecycle.js";
import { isActionName, type ActionName, type Capability, type PluginState } from "./protocol.js";

const ALL_STATES: readonly PluginState[] = [
  "uninitialized",
  "initialized",
  "running",
  "stopped",
  "failed",
];

const REQUIRED_CAPABILITY: Partial<Record<ActionName, Capability>> = {
  detect_triggers: "trigger",
  get_trigger_config: "trigger",
  execute_action: "action",
  get_action_config: "action",
};

function allowedStates(action: ActionName, lifecycle: LifecycleStateMachine): readonly PluginState[] {
  switch (action) {
    case "initialize":
    case "start":
    case "stop":
      return lifecycle.allowedFrom(action);
    case "detect_triggers":
    case "execute_action":
      return ["running"];
    // Declarations and probes answer in every state.
    case "get_info":
    case "get_status":
    case "get_health":
    case "get_trigger_config":
    case "get_action_config":
      return ALL_STATES;
  }
}

/**
 * Resolve a raw action name against the plugin's capability set and the
 * current lifecycle state. Checks run in a fixed order: unknown action,
 * then missing capability, then state.
 */
export function resolveAction(
  action: string,
  capabilities: readonly Capability[],
  lifecycle: LifecycleStateMachine,
): ActionName {
  if (!isActionName(action)) {
    throw new UnsupportedActionError(action);
  }

  const required = REQUIRED_CAPABILITY[action];
  if (required && !capabilities.includes(required)) {
    throw new CapabilityMissingError(action, required);
  }

  if (!allowedStates(action, lifecycle).includes(lifecycle.state)) {
    throw new InvalidStateError(action, lifecycle.state);
  }

  return action;
}
