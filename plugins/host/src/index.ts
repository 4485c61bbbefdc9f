import { createComponentLogger } from "@plughost/sdk";
import { checkAll, formatReport } from "./driver.js";
import { loadRegistry } from "./registry.js";

const log = createComponentLogger("cli");

async function check(registryPath: string | undefined): Promise<number> {
  if (!registryPath) {
    process.stderr.write("Usage: plughost check <registry.yaml>\n");
    return 64;
  }
  const entries = loadRegistry(registryPath);
  log.info({ plugins: entries.map((e) => e.id) }, "Checking plugins");

  const { reports, exitCode } = await checkAll(entries);
  for (const report of reports) {
    process.stdout.write(formatReport(report) + "\n");
  }
  const passed = reports.filter((r) => r.passed).length;
  process.stdout.write(`\n${passed}/${reports.length} plugins passed\n`);
  return exitCode;
}

// --- CLI ---
const cmd = process.argv[2] || "check";

switch (cmd) {
  case "check":
    check(process.argv[3])
      .then((code) => {
        process.exitCode = code;
      })
      .catch((err) => {
        log.fatal({ err }, "Fatal");
        process.exitCode = 1;
      });
    break;

  default:
    process.stderr.write(`Unknown command: ${cmd}\nUsage: plughost check <registry.yaml>\n`);
    process.exit(64);
}
