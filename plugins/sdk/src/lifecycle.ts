import type { PluginState } from "./protocol.js";

export type LifecycleAction = "initialize" | "start" | "stop";

interface Transition {
  from: readonly PluginState[];
  to: PluginState;
}

const TRANSITIONS: Record<LifecycleAction, Transition> = {
  initialize: { from: ["uninitialized", "initialized", "stopped"], to: "initialized" },
  start: { from: ["initialized", "running"], to: "running" },
  stop: { from: ["initialized", "running", "stopped"], to: "stopped" },
};

/**
 * Owns the single PluginState of a plugin process. Every other component
 * reads `state`; only this class writes it.
 */
export class LifecycleStateMachine {
  private current: PluginState = "uninitialized";
  private readonly recoverable: boolean;

  constructor(options: { recoverable?: boolean } = {}) {
    this.recoverable = options.recoverable ?? false;
  }

  get state(): PluginState {
    return this.current;
  }

  /** States from which `action` may run. */
  allowedFrom(action: LifecycleAction): readonly PluginState[] {
    const { from } = TRANSITIONS[action];
    return action === "initialize" && this.recoverable ? [...from, "failed"] : from;
  }

  canApply(action: LifecycleAction): boolean {
    return this.allowedFrom(action).includes(this.current);
  }

  /**
   * True when the action would leave the state where it already is, so
   * the handler must not run again (start while running, stop while stopped).
   */
  isNoop(action: LifecycleAction): boolean {
    return (
      (action === "start" && this.current === "running") ||
      (action === "stop" && this.current === "stopped")
    );
  }

  /** Record a successful handler completion. */
  complete(action: LifecycleAction): PluginState {
    if (!this.canApply(action)) {
      throw new Error(`Illegal transition: ${action} from ${this.current}`);
    }
    this.current = TRANSITIONS[action].to;
    return this.current;
  }

  fail(): PluginState {
    this.current = "failed";
    return this.current;
  }
}
