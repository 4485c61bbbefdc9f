import pino, { type Logger } from "pino";
import { loadRuntimeConfig, type LogLevel } from "./config.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

// stdout belongs to the protocol; every log line goes to stderr (fd 2).
function createBaseLogger(options: LoggerOptions = {}): Logger {
  const env = loadRuntimeConfig();
  const level = options.level ?? env.logLevel;
  const pretty = options.pretty ?? env.logPretty;

  const destination = pretty
    ? pino.transport({
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      })
    : pino.destination(2);

  return pino(
    {
      level,
      redact: ["password", "*.password", "config.password", "token", "secret"],
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    destination,
  );
}

let baseLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!baseLogger) baseLogger = createBaseLogger();
  return baseLogger;
}

export function createPluginLogger(pluginId: string): Logger {
  return getLogger().child({ plugin: pluginId });
}

export function createComponentLogger(component: string, context: Record<string, unknown> = {}): Logger {
  return getLogger().child({ component, ...context });
}
