import { describe, it, expect } from "vitest";
import { PluginRuntime } from "../src/runtime.js";
import type { RequestEnvelope, ResponseEnvelope } from "../src/protocol.js";
import { createTestPlugin, silentLog, type TestConfig } from "./helpers.js";

function runtimeFor(plugin = createTestPlugin(), demoMode = true): PluginRuntime<TestConfig> {
  return new PluginRuntime(plugin, { demoMode, log: silentLog });
}

async function send(rt: PluginRuntime<TestConfig>, request: RequestEnvelope): Promise<ResponseEnvelope> {
  return rt.handle(request);
}

describe("PluginRuntime lifecycle", () => {
  it("should start uninitialized and refuse start before initialize", async () => {
    const rt = runtimeFor();
    expect(rt.state).toBe("uninitialized");
    const res = await send(rt, { action: "start" });
    expect(res.success).toBe(false);
    expect(res.error?.kind).toBe("InvalidState");
    expect(rt.state).toBe("uninitialized");
  });

  it("should allow initialize, start, stop, initialize as a restart cycle", async () => {
    const rt = runtimeFor();
    for (const action of ["initialize", "start", "stop", "initialize"]) {
      const res = await send(rt, { action, config: {} });
      expect(res.success).toBe(true);
    }
    expect(rt.state).toBe("initialized");
  });

  it("should succeed when stop is called twice", async () => {
    const rt = runtimeFor();
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    const first = await send(rt, { action: "stop" });
    const second = await send(rt, { action: "stop" });
    expect(first.success).toBe(true);
    expect(second.success).toBe(true);
    expect(rt.state).toBe("stopped");
  });

  it("should run the start handler once when start is repeated", async () => {
    let starts = 0;
    const rt = runtimeFor(
      createTestPlugin({
        start: async () => {
          starts += 1;
        },
      }),
    );
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    const again = await send(rt, { action: "start" });
    expect(again.success).toBe(true);
    expect(starts).toBe(1);
  });

  it("should answer get_info and get_health in every reachable state", async () => {
    const rt = runtimeFor(
      createTestPlugin({
        trigger: {
          async detectTriggers() {
            throw new Error("sensor offline");
          },
        },
      }),
    );
    const probe = async () => {
      const info = await send(rt, { action: "get_info" });
      const health = await send(rt, { action: "get_health" });
      expect(info.success).toBe(true);
      expect(health.success).toBe(true);
    };

    await probe();
    await send(rt, { action: "initialize" });
    await probe();
    await send(rt, { action: "start" });
    await probe();
    await send(rt, { action: "stop" });
    await probe();
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    await send(rt, { action: "detect_triggers" });
    expect(rt.state).toBe("failed");
    await probe();
  });

  it("should keep the state when the config fails validation", async () => {
    const rt = runtimeFor();
    const res = await send(rt, { action: "initialize", config: { limit: 0 } });
    expect(res.success).toBe(false);
    expect(res.error?.kind).toBe("ValidationError");
    expect(res.error?.message).toBe("Invalid config: limit: Number must be greater than or equal to 1");
    expect(rt.state).toBe("uninitialized");
  });

  it("should stay initialized when the start handler fails", async () => {
    const rt = runtimeFor(
      createTestPlugin({
        start: async () => {
          throw new Error("cannot open sandbox");
        },
      }),
    );
    await send(rt, { action: "initialize" });
    const res = await send(rt, { action: "start" });
    expect(res.error).toEqual({ kind: "InternalError", message: "cannot open sandbox" });
    expect(rt.state).toBe("initialized");
  });

  it("should enter failed when the stop handler fails", async () => {
    const rt = runtimeFor(
      createTestPlugin({
        stop: async () => {
          throw new Error("flush failed");
        },
      }),
    );
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    const res = await send(rt, { action: "stop" });
    expect(res.success).toBe(false);
    expect(rt.state).toBe("failed");
    const again = await send(rt, { action: "stop" });
    expect(again.error?.kind).toBe("InvalidState");
  });

  it("should let a recoverable plugin re-initialize after failing", async () => {
    const rt = runtimeFor(
      createTestPlugin({
        recoverable: true,
        trigger: {
          async detectTriggers() {
            throw new Error("probe crashed");
          },
        },
      }),
    );
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    await send(rt, { action: "detect_triggers" });
    expect(rt.state).toBe("failed");
    const res = await send(rt, { action: "initialize" });
    expect(res.success).toBe(true);
    expect(rt.state).toBe("initialized");
  });
});

describe("PluginRuntime capabilities", () => {
  it("should reject execute_action on a trigger-only plugin", async () => {
    const rt = runtimeFor(createTestPlugin({ capabilities: ["trigger"] }));
    const res = await send(rt, { action: "execute_action", action_request: { id: "x", parameters: {} } });
    expect(res.error?.kind).toBe("CapabilityMissing");
  });

  it("should reject detect_triggers on an action-only plugin", async () => {
    const rt = runtimeFor(createTestPlugin({ capabilities: ["action"] }));
    const res = await send(rt, { action: "detect_triggers" });
    expect(res.error?.kind).toBe("CapabilityMissing");
  });

  it("should reject unknown actions", async () => {
    const res = await send(runtimeFor(), { action: "reboot" });
    expect(res.error).toEqual({
      kind: "UnsupportedAction",
      message: "Unknown action: reboot",
      details: { action: "reboot" },
    });
  });

  it("should serve the config schema before initialize", async () => {
    const res = await send(runtimeFor(), { action: "get_action_config" });
    expect(res.success).toBe(true);
    expect(res.data).toMatchObject({
      description: "Plugin used by the runtime tests",
      required: ["message"],
    });
  });
});

describe("PluginRuntime domain handlers", () => {
  it("should echo the action request id", async () => {
    const rt = runtimeFor();
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    const res = await send(rt, {
      action: "execute_action",
      action_request: { id: "req-42", parameters: { message: "hello" } },
    });
    expect(res.success).toBe(true);
    expect(res.data).toMatchObject({ id: "req-42", status: "simulated", output: { echo: "hello" } });
  });

  it("should pass the demo mode flag to handlers", async () => {
    const rt = runtimeFor(createTestPlugin(), false);
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    const res = await send(rt, {
      action: "execute_action",
      action_request: { id: "live-1", parameters: { message: "x" } },
    });
    expect(res.data).toMatchObject({ id: "live-1", status: "done" });
  });

  it("should reject execute_action without an action request", async () => {
    const rt = runtimeFor();
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    const res = await send(rt, { action: "execute_action" });
    expect(res.error?.kind).toBe("ValidationError");
    expect(rt.state).toBe("running");
  });

  it("should reject parameters that fail the schema without failing the plugin", async () => {
    const rt = runtimeFor();
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    const res = await send(rt, { action: "execute_action", action_request: { id: "p-1", parameters: {} } });
    expect(res.error?.kind).toBe("ValidationError");
    expect(rt.state).toBe("running");
  });

  it("should return the events detected with the stored config", async () => {
    const rt = runtimeFor();
    await send(rt, { action: "initialize", config: { label: "rack-7" } });
    await send(rt, { action: "start" });
    const res = await send(rt, { action: "detect_triggers" });
    expect(res.data).toEqual([
      {
        id: "evt-1",
        type: "test.threshold",
        severity: "high",
        timestamp: "2026-01-01T00:00:00.000Z",
        source: "test-plugin",
        payload: { label: "rack-7" },
      },
    ]);
  });

  it("should fail the plugin on an unexpected handler error and report it in health", async () => {
    const rt = runtimeFor(
      createTestPlugin({
        trigger: {
          async detectTriggers() {
            throw new Error("sensor offline");
          },
        },
      }),
    );
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    const res = await send(rt, { action: "detect_triggers" });
    expect(res.error).toEqual({ kind: "InternalError", message: "sensor offline" });
    expect(rt.state).toBe("failed");

    const again = await send(rt, { action: "detect_triggers" });
    expect(again.error?.kind).toBe("InvalidState");

    const health = await send(rt, { action: "get_health" });
    expect(health.data).toMatchObject({
      status: "unhealthy",
      state: "failed",
      last_error: { kind: "InternalError", message: "sensor offline" },
      uptime_seconds: 0,
    });

    const status = await send(rt, { action: "get_status" });
    expect(status.data).toEqual({ state: "failed", demo_mode: true, started_at: null });
  });
});

describe("PluginRuntime ordering", () => {
  it("should let stop wait for an in-flight handler and abort the signal", async () => {
    const order: string[] = [];
    let release: () => void = () => undefined;
    const seen: { signal?: AbortSignal } = {};

    const rt = runtimeFor(
      createTestPlugin({
        trigger: {
          async detectTriggers(ctx) {
            seen.signal = ctx.signal;
            await new Promise<void>((resolve) => {
              release = resolve;
            });
            order.push("detect");
            return [];
          },
        },
        stop: async () => {
          order.push("stop");
        },
      }),
    );
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });

    const detecting = send(rt, { action: "detect_triggers" });
    const stopping = send(rt, { action: "stop" });
    await new Promise((resolve) => setTimeout(resolve, 10));
    release();
    await Promise.all([detecting, stopping]);

    expect(order).toEqual(["detect", "stop"]);
    expect(seen.signal?.aborted).toBe(true);
  });

  it("should stop a running plugin on shutdown", async () => {
    const rt = runtimeFor();
    await send(rt, { action: "initialize" });
    await send(rt, { action: "start" });
    await rt.shutdown();
    expect(rt.state).toBe("stopped");
  });
});
