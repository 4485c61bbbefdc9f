import { z } from "zod";

// Node timers overflow above a signed 32-bit delay.
const MAX_TIMER_MS = 2_147_483_647;

const ms = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number(v))
    .pipe(z.number().int().positive().max(MAX_TIMER_MS));

const EnvSchema = z.object({
  PLUGIN_LIFECYCLE_TIMEOUT_MS: ms("5000"),
  PLUGIN_QUERY_TIMEOUT_MS: ms("5000"),
  PLUGIN_TRIGGER_TIMEOUT_MS: ms("30000"),
  PLUGIN_ACTION_TIMEOUT_MS: ms("60000"),
  PLUGIN_CLOSE_GRACE_MS: ms("2000"),
});

export type CallKind = "lifecycle" | "query" | "trigger" | "action";

export interface HostConfig {
  timeouts: Record<CallKind, number>;
  closeGraceMs: number;
}

export function loadHostConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid host environment: ${issues}`);
  }
  const e = parsed.data;
  return {
    timeouts: {
      lifecycle: e.PLUGIN_LIFECYCLE_TIMEOUT_MS,
      query: e.PLUGIN_QUERY_TIMEOUT_MS,
      trigger: e.PLUGIN_TRIGGER_TIMEOUT_MS,
      action: e.PLUGIN_ACTION_TIMEOUT_MS,
    },
    closeGraceMs: e.PLUGIN_CLOSE_GRACE_MS,
  };
}
