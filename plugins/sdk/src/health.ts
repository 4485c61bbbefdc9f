import type {
  CheckResult,
  ErrorInfo,
  HealthReport,
  HealthStatus,
  PluginState,
} from "./protocol.js";

export const DEFAULT_FRESHNESS_MS = 5 * 60_000;

export interface HealthInput {
  state: PluginState;
  lastError: ErrorInfo | null;
  checks: Record<string, CheckResult>;
  startedAt: Date | null;
  now?: Date;
  freshnessMs?: number;
}

export function lifecycleCheck(state: PluginState, now: Date): CheckResult {
  const observed_at = now.toISOString();
  switch (state) {
    case "running":
      return { status: "pass", message: "Plugin is running", observed_at };
    case "failed":
      return { status: "fail", message: "Plugin has failed", observed_at };
    default:
      return { status: "unknown", message: `Plugin is ${state}`, observed_at };
  }
}

function isStale(check: CheckResult, now: Date, freshnessMs: number): boolean {
  const observed = Date.parse(check.observed_at);
  if (Number.isNaN(observed)) return true;
  return now.getTime() - observed > freshnessMs;
}

/**
 * Overall status: any failing check is unhealthy; any inconclusive or
 * stale check is degraded.
 */
export function aggregateStatus(
  checks: Record<string, CheckResult>,
  now: Date,
  freshnessMs: number = DEFAULT_FRESHNESS_MS,
): HealthStatus {
  const results = Object.values(checks);
  if (results.some((c) => c.status === "fail")) return "unhealthy";
  if (results.some((c) => c.status === "unknown" || isStale(c, now, freshnessMs))) return "degraded";
  return "healthy";
}

export function buildHealthReport(input: HealthInput): HealthReport {
  const now = input.now ?? new Date();
  const checks: Record<string, CheckResult> = {
    lifecycle: lifecycleCheck(input.state, now),
    ...input.checks,
  };
  const uptime = input.startedAt ? (now.getTime() - input.startedAt.getTime()) / 1000 : 0;
  return {
    status: aggregateStatus(checks, now, input.freshnessMs),
    state: input.state,
    last_error: input.lastError,
    checks,
    uptime_seconds: Math.max(0, uptime),
    timestamp: now.toISOString(),
  };
}
