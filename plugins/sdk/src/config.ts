import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  PLUGIN_DEMO_MODE: z
    .string()
    .default("true")
    .transform((v) => v.trim().toLowerCase() === "true"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_PRETTY: z
    .string()
    .optional()
    .transform((v) => v === "true"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RuntimeConfig {
  demoMode: boolean;
  logLevel: LogLevel;
  logPretty: boolean;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid plugin environment: ${issues}`);
  }
  return {
    demoMode: parsed.data.PLUGIN_DEMO_MODE,
    logLevel: parsed.data.LOG_LEVEL,
    logPretty: parsed.data.LOG_PRETTY,
  };
}
