import * as os from "node:os";
import {
  ValidationError,
  definePlugin,
  type CheckResult,
  type ConfigSchema,
  type PluginDefinition,
  type Severity,
  type TriggerEvent,
} from "@plughost/sdk";

export interface MemoryConfig {
  memoryThreshold: number;
  criticalThreshold: number;
  intervalMs: number;
  alertCooldownMs: number;
}

export interface MemoryReading {
  total: number;
  free: number;
}

export interface MemorySample {
  total: number;
  used: number;
  available: number;
  percent: number;
  observedAt: Date;
}

export interface MemoryMonitorDeps {
  readMemory?: () => MemoryReading;
  now?: () => Date;
}

// setInterval takes a signed 32-bit delay in milliseconds.
const MAX_TIMER_SECONDS = 2_147_483;

const configSchema: ConfigSchema = {
  memory_threshold: {
    type: "number",
    description: "Memory usage threshold percentage (0-100)",
    default: 85,
    minimum: 0,
    maximum: 100,
  },
  critical_threshold: {
    type: "number",
    description: "Memory usage percentage reported as critical (0-100)",
    default: 95,
    minimum: 0,
    maximum: 100,
  },
  interval: {
    type: "integer",
    description: "Sampling interval in seconds",
    default: 60,
    minimum: 1,
    maximum: MAX_TIMER_SECONDS,
  },
  alert_cooldown: {
    type: "integer",
    description: "Seconds between repeated memory alerts",
    default: 300,
    minimum: 0,
  },
};

function systemMemory(): MemoryReading {
  return { total: os.totalmem(), free: os.freemem() };
}

export function toSample(reading: MemoryReading, observedAt: Date): MemorySample {
  const used = reading.total - reading.free;
  const percent = reading.total > 0 ? Math.round((used / reading.total) * 10_000) / 100 : 0;
  return { total: reading.total, used, available: reading.free, percent, observedAt };
}

/** Halfway between the two thresholds is where a breach becomes high rather than medium. */
export function severityFor(percent: number, config: MemoryConfig): Severity {
  if (percent >= config.criticalThreshold) return "critical";
  if (percent >= (config.memoryThreshold + config.criticalThreshold) / 2) return "high";
  return "medium";
}

export function createMemoryMonitor(deps: MemoryMonitorDeps = {}): PluginDefinition<MemoryConfig> {
  const readMemory = deps.readMemory ?? systemMemory;
  const now = deps.now ?? (() => new Date());
  let latest: MemorySample | null = null;
  let lastAlertAt: number | null = null;

  const sample = (): MemorySample => {
    latest = toSample(readMemory(), now());
    return latest;
  };

  return definePlugin<MemoryConfig>({
    descriptor: {
      id: "memory-monitor",
      name: "Memory Monitor",
      version: "1.0.0",
      capabilities: ["trigger"],
      description: "Monitors RAM usage with configurable thresholds",
      tags: ["system", "monitoring", "memory"],
    },
    description: "Memory monitoring configuration",
    configSchema,

    parseConfig(values) {
      const memoryThreshold = Number(values.memory_threshold);
      const criticalThreshold = Number(values.critical_threshold);
      if (memoryThreshold >= criticalThreshold) {
        throw new ValidationError("Critical threshold must be higher than memory threshold");
      }
      return {
        memoryThreshold,
        criticalThreshold,
        intervalMs: Number(values.interval) * 1000,
        alertCooldownMs: Number(values.alert_cooldown) * 1000,
      };
    },

    async start(ctx) {
      lastAlertAt = null;
      sample();
      const timer = setInterval(() => {
        const current = sample();
        ctx.log.debug({ percent: current.percent }, "Memory sampled");
      }, ctx.config.intervalMs);
      timer.unref();
      ctx.signal.addEventListener("abort", () => clearInterval(timer), { once: true });
    },

    async stop() {
      latest = null;
    },

    async checks(ctx): Promise<Record<string, CheckResult>> {
      const at = now();
      const observed_at = at.toISOString();
      if (!latest) {
        return { "memory-sampler": { status: "unknown", message: "No sample taken yet", observed_at } };
      }
      const ageMs = at.getTime() - latest.observedAt.getTime();
      if (ageMs > 2 * ctx.config.intervalMs) {
        return {
          "memory-sampler": {
            status: "unknown",
            message: `Last sample is ${Math.round(ageMs / 1000)}s old`,
            observed_at: latest.observedAt.toISOString(),
          },
        };
      }
      return {
        "memory-sampler": {
          status: "pass",
          message: `Memory at ${latest.percent}%`,
          observed_at: latest.observedAt.toISOString(),
        },
      };
    },

    trigger: {
      async detectTriggers(ctx) {
        const { config } = ctx;
        const current = sample();
        if (current.percent < config.memoryThreshold) return [];

        const at = current.observedAt.getTime();
        if (lastAlertAt !== null && at - lastAlertAt < config.alertCooldownMs) return [];
        lastAlertAt = at;

        const event: TriggerEvent = {
          id: `memory-high-${at}`,
          type: "memory.high",
          severity: severityFor(current.percent, config),
          timestamp: current.observedAt.toISOString(),
          source: "memory-monitor",
          payload: {
            usage_percent: current.percent,
            threshold: config.memoryThreshold,
            total: current.total,
            used: current.used,
            available: current.available,
            hostname: os.hostname(),
          },
        };
        ctx.log.warn({ percent: current.percent, threshold: config.memoryThreshold }, "Memory usage alert");
        return [event];
      },
    },
  });
}
