import * as fs from "node:fs/promises";
import * as os from "node:os";
import {
  ValidationError,
  definePlugin,
  type CheckResult,
  type ConfigSchema,
  type Logger,
  type PluginDefinition,
  type TriggerEvent,
} from "@plughost/sdk";

export interface DiskSpaceConfig {
  threshold: number;
  criticalThreshold: number;
  monitoredPaths: string[];
  alertCooldownMs: number;
}

export interface FilesystemUsage {
  path: string;
  total: number;
  used: number;
  free: number;
  percent: number;
}

export type StatFs = (path: string) => Promise<{ blocks: number; bfree: number; bavail: number; bsize: number }>;

export interface DiskSpaceDeps {
  statfs?: StatFs;
  now?: () => Date;
}

type AlertLevel = "warning" | "critical";

const configSchema: ConfigSchema = {
  threshold: {
    type: "number",
    description: "Disk usage threshold percentage (0-100)",
    default: 85,
    minimum: 0,
    maximum: 100,
  },
  critical_threshold: {
    type: "number",
    description: "Critical disk usage threshold percentage (0-100)",
    default: 95,
    minimum: 0,
    maximum: 100,
  },
  monitored_paths: {
    type: "array",
    items: { type: "string" },
    description: "Filesystem paths to monitor",
    default: ["/"],
  },
  alert_cooldown: {
    type: "integer",
    description: "Seconds between repeated alerts for the same path and level",
    default: 600,
    minimum: 60,
  },
};

export async function readUsage(statfs: StatFs, target: string): Promise<FilesystemUsage> {
  const stats = await statfs(target);
  const total = stats.blocks * stats.bsize;
  const used = (stats.blocks - stats.bfree) * stats.bsize;
  const free = stats.bavail * stats.bsize;
  const percent = total > 0 ? Math.round((used / total) * 10_000) / 100 : 0;
  return { path: target, total, used, free, percent };
}

export function createDiskSpaceMonitor(deps: DiskSpaceDeps = {}): PluginDefinition<DiskSpaceConfig> {
  const statfs: StatFs = deps.statfs ?? ((p) => fs.statfs(p));
  const now = deps.now ?? (() => new Date());
  // Keyed by "<path>|<level>".
  const lastAlert = new Map<string, number>();

  async function collect(paths: string[], log: Logger) {
    const usage: FilesystemUsage[] = [];
    const unreachable: string[] = [];
    for (const target of paths) {
      try {
        usage.push(await readUsage(statfs, target));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        log.warn({ path: target, error: msg }, "Cannot read filesystem usage");
        unreachable.push(target);
      }
    }
    return { usage, unreachable };
  }

  return definePlugin<DiskSpaceConfig>({
    descriptor: {
      id: "disk-space-monitor",
      name: "Disk Space Monitor",
      version: "1.0.0",
      capabilities: ["trigger"],
      description: "Monitors disk usage across filesystems with configurable thresholds",
      tags: ["system", "monitoring", "disk"],
    },
    description: "Disk space monitoring configuration",
    configSchema,

    parseConfig(values) {
      const threshold = Number(values.threshold);
      const criticalThreshold = Number(values.critical_threshold);
      if (threshold >= criticalThreshold) {
        throw new ValidationError("Critical threshold must be higher than regular threshold");
      }
      const monitoredPaths = Array.isArray(values.monitored_paths) ? values.monitored_paths.map(String) : ["/"];
      return {
        threshold,
        criticalThreshold,
        monitoredPaths,
        alertCooldownMs: Number(values.alert_cooldown) * 1000,
      };
    },

    async start() {
      lastAlert.clear();
    },

    async checks(ctx): Promise<Record<string, CheckResult>> {
      const { unreachable } = await collect(ctx.config.monitoredPaths, ctx.log);
      return {
        "disk-accessible":
          unreachable.length === 0
            ? { status: "pass", observed_at: now().toISOString() }
            : { status: "fail", message: `Cannot read ${unreachable.join(", ")}`, observed_at: now().toISOString() },
      };
    },

    trigger: {
      async detectTriggers(ctx) {
        const { config } = ctx;
        const { usage } = await collect(config.monitoredPaths, ctx.log);
        const at = now();
        const events: TriggerEvent[] = [];

        for (const fsUsage of usage) {
          let level: AlertLevel;
          let limit: number;
          if (fsUsage.percent >= config.criticalThreshold) {
            level = "critical";
            limit = config.criticalThreshold;
          } else if (fsUsage.percent >= config.threshold) {
            level = "warning";
            limit = config.threshold;
          } else {
            continue;
          }

          const key = `${fsUsage.path}|${level}`;
          const previous = lastAlert.get(key);
          if (previous !== undefined && at.getTime() - previous < config.alertCooldownMs) continue;
          lastAlert.set(key, at.getTime());

          ctx.log.warn({ path: fsUsage.path, percent: fsUsage.percent, threshold: limit }, "Disk usage alert");
          events.push({
            id: `disk-${level}-${fsUsage.path.replace(/\//g, "_")}-${at.getTime()}`,
            type: `disk.space.${level}`,
            severity: level === "critical" ? "critical" : "high",
            timestamp: at.toISOString(),
            source: "disk-space-monitor",
            payload: {
              alert_level: level,
              threshold: limit,
              usage_percent: fsUsage.percent,
              filesystem: fsUsage,
              hostname: os.hostname(),
            },
          });
        }
        return events;
      },
    },
  });
}
