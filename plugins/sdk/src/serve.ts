import * as readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { createPluginLogger } from "./logger.js";
import type { PluginDefinition } from "./plugin.js";
import { PluginRuntime, type RuntimeOptions } from "./runtime.js";

export interface ServeOptions {
  input?: Readable;
  output?: Writable;
}

/**
 * Answer one response line per request line until the input closes,
 * then stop the plugin if it is still running.
 */
export async function serve<TConfig>(runtime: PluginRuntime<TConfig>, options: ServeOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const rl = readline.createInterface({ input, terminal: false });

  for await (const line of rl) {
    if (!line.trim()) continue;
    const response = await runtime.handleLine(line);
    output.write(response + "\n");
  }

  await runtime.shutdown();
}

// --- CLI ---

export function runPlugin<TConfig>(
  definition: PluginDefinition<TConfig>,
  argv: readonly string[] = process.argv,
  options: RuntimeOptions = {},
): void {
  const log = options.log ?? createPluginLogger(definition.descriptor.id);
  const cmd = argv[2] || "serve";

  switch (cmd) {
    case "serve":
      serve(new PluginRuntime(definition, { ...options, log })).catch((err) => {
        log.fatal({ err }, "Fatal error");
        process.exit(1);
      });
      break;

    case "info":
      process.stdout.write(JSON.stringify(definition.descriptor) + "\n");
      break;

    default:
      process.stderr.write(`Unknown command: ${cmd}\n`);
      process.exit(64);
  }
}
