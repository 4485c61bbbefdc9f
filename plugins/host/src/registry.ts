import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const ActionRequestSchema = z.object({
  id: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
});

const PluginEntrySchema = z.object({
  id: z.string().min(1),
  type: z.enum(["trigger", "action"]),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  env: z.record(z.string()).default({}),
  config: z.record(z.unknown()).default({}),
  sample_action: ActionRequestSchema.optional(),
});

const RegistrySchema = z.object({
  plugins: z.array(PluginEntrySchema).min(1),
});

export type PluginEntry = z.infer<typeof PluginEntrySchema>;

/**
 * Load the plugins a host should drive. Relative `cwd` values resolve
 * against the registry file's directory.
 */
export function loadRegistry(registryPath: string): PluginEntry[] {
  const content = fs.readFileSync(registryPath, "utf-8");
  return parseRegistry(content, path.dirname(path.resolve(registryPath)));
}

export function parseRegistry(content: string, baseDir: string = process.cwd()): PluginEntry[] {
  const parsed = RegistrySchema.safeParse(parseYaml(content));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid plugin registry: ${issues}`);
  }

  const seen = new Set<string>();
  return parsed.data.plugins.map((entry) => {
    if (seen.has(entry.id)) {
      throw new Error(`Invalid plugin registry: duplicate plugin id "${entry.id}"`);
    }
    seen.add(entry.id);
    return { ...entry, cwd: path.resolve(baseDir, entry.cwd ?? ".") };
  });
}
