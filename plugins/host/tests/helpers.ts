import pino from "pino";
import type { HostConfig, PluginCommand } from "../src/host.js";

export const silentLog = pino({ level: "silent" });

export const fastConfig: HostConfig = {
  timeouts: { lifecycle: 2_000, query: 2_000, trigger: 2_000, action: 2_000 },
  closeGraceMs: 500,
};

// Answers every request and tracks lifecycle state the way a real plugin would.
const ECHO_PLUGIN = `
const rl = require("node:readline").createInterface({ input: process.stdin });
let state = "uninitialized";
rl.on("line", (line) => {
  let req;
  try {
    req = JSON.parse(line);
  } catch {
    process.stdout.write(JSON.stringify({ success: false, data: null, error: { kind: "ProtocolError", message: "bad line" } }) + "\\n");
    return;
  }
  const next = { initialize: "initialized", start: "running", stop: "stopped" }[req.action];
  if (next) state = next;
  let data = { action: req.action, state };
  if (req.action === "execute_action") data = { id: req.action_request.id, status: "done" };
  if (req.action === "detect_triggers") data = [];
  if (req.action === "get_action_config" || req.action === "get_trigger_config") {
    data = {
      description: "fake",
      config: {},
      parameters: { message: { type: "string", description: "Message", required: true } },
      required: ["message"],
    };
  }
  process.stdout.write(JSON.stringify({ success: true, data, error: null }) + "\\n");
});
`;

// Lifecycle plugin whose stop cleanup fails and whose start fails while the marker env var is set.
const FAILING_STOP_PLUGIN = `
const rl = require("node:readline").createInterface({ input: process.stdin });
let state = "uninitialized";
const reply = (body) => process.stdout.write(JSON.stringify(body) + "\\n");
const internal = (message) => reply({ success: false, data: null, error: { kind: "InternalError", message } });
rl.on("line", (line) => {
  const req = JSON.parse(line);
  if (req.action === "stop") {
    state = "failed";
    return internal("cleanup exploded");
  }
  if (req.action === "start" && process.env.FAIL_START === "1") return internal("cannot open sandbox");
  if (req.action === "initialize") state = "initialized";
  if (req.action === "start") state = "running";
  reply({ success: true, data: { state }, error: null });
});
`;

const SILENT_PLUGIN = `process.stdin.resume(); setInterval(() => {}, 1000);`;

const EXITING_PLUGIN = `process.stdin.once("data", () => process.exit(3));`;

const GARBAGE_PLUGIN = `process.stdin.on("data", () => process.stdout.write("this is not json\\n"));`;

function inline(script: string): PluginCommand {
  return { command: process.execPath, args: ["-e", script] };
}

export const echoPlugin = inline(ECHO_PLUGIN);
export const silentPlugin = inline(SILENT_PLUGIN);
export const exitingPlugin = inline(EXITING_PLUGIN);
export const garbagePlugin = inline(GARBAGE_PLUGIN);
export const failingStopPlugin = inline(FAILING_STOP_PLUGIN);
