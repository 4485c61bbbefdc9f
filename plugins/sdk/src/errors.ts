import type { ErrorInfo, ErrorKind } from "./protocol.js";

export class PluginError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.details = details;
  }

  toInfo(): ErrorInfo {
    return this.details
      ? { kind: this.kind, message: this.message, details: this.details }
      : { kind: this.kind, message: this.message };
  }
}

export class ProtocolError extends PluginError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ProtocolError", message, { reason: "malformed", ...details });
  }
}

export class ValidationError extends PluginError {
  constructor(message: string, issues: string[] = []) {
    super("ValidationError", message, issues.length > 0 ? { issues } : undefined);
  }
}

export class CapabilityMissingError extends PluginError {
  constructor(action: string, capability: string) {
    super("CapabilityMissing", `Action "${action}" requires the ${capability} capability`, {
      action,
      capability,
    });
  }
}

export class UnsupportedActionError extends PluginError {
  constructor(action: string) {
    super("UnsupportedAction", `Unknown action: ${action}`, { action });
  }
}

export class InvalidStateError extends PluginError {
  constructor(action: string, state: string) {
    super("InvalidState", `Action "${action}" is not allowed in state "${state}"`, {
      action,
      state,
    });
  }
}

export class TimeoutError extends PluginError {
  constructor(action: string, timeoutMs: number) {
    super("TimeoutError", `No response to "${action}" within ${timeoutMs}ms`, {
      action,
      timeout_ms: timeoutMs,
    });
  }
}

export class ProcessExitedError extends PluginError {
  readonly exitCode: number | null;

  constructor(exitCode: number | null, signal: string | null, message?: string) {
    super(
      "ProcessExitedError",
      message ?? `Plugin process exited before responding (code=${exitCode}, signal=${signal})`,
      { exit_code: exitCode, signal },
    );
    this.exitCode = exitCode;
  }
}

export class InternalError extends PluginError {
  constructor(message: string) {
    super("InternalError", message);
  }
}

/** Kinds that leave plugin state untouched when a handler raises them. */
const RECOVERABLE_KINDS: ReadonlySet<ErrorKind> = new Set([
  "ProtocolError",
  "ValidationError",
  "CapabilityMissing",
  "UnsupportedAction",
  "InvalidState",
]);

export function isRecoverable(err: unknown): err is PluginError {
  return err instanceof PluginError && RECOVERABLE_KINDS.has(err.kind);
}

/**
 * Wire form of any thrown value. Only the message crosses the boundary,
 * never the stack.
 */
export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof PluginError) return err.toInfo();
  const message = err instanceof Error ? err.message : String(err);
  return { kind: "InternalError", message };
}
