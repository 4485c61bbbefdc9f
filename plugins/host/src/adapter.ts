import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import * as readline from "node:readline";
import {
  ProcessExitedError,
  TimeoutError,
  createComponentLogger,
  decodeResponse,
  encodeRequest,
  type Logger,
  type RequestEnvelope,
  type ResponseEnvelope,
} from "@plughost/sdk";

export interface PluginCommand {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

interface PendingCall {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
}

/**
 * One long-lived plugin subprocess. Each call writes a single request line
 * and waits for a single response line; calls never overlap.
 */
export class PluginProcess {
  private child: ChildProcessWithoutNullStreams | null = null;
  private pending: PendingCall | null = null;
  private exitInfo: ExitInfo | null = null;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly log: Logger;
  private resolveExited: (info: ExitInfo) => void = () => undefined;

  /** Settles once the subprocess has exited and its streams are closed. */
  readonly exited: Promise<ExitInfo>;

  constructor(
    readonly spec: PluginCommand,
    options: { log?: Logger } = {},
  ) {
    this.log = options.log ?? createComponentLogger("adapter", { command: spec.command });
    this.exited = new Promise((resolve) => {
      this.resolveExited = resolve;
    });
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  get alive(): boolean {
    return this.child !== null && this.exitInfo === null;
  }

  call(request: RequestEnvelope, timeoutMs: number): Promise<ResponseEnvelope> {
    const run = this.tail.then(() => this.exchange(request, timeoutMs));
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** End stdin and wait for the plugin to exit, killing it after `graceMs`. */
  async close(graceMs = 2000): Promise<ExitInfo | null> {
    if (!this.child) return null;
    if (this.exitInfo) return this.exitInfo;

    this.child.stdin.end();
    const timer = setTimeout(() => this.kill("SIGKILL"), graceMs);
    try {
      return await this.exited;
    } finally {
      clearTimeout(timer);
    }
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    if (this.alive) this.child?.kill(signal);
  }

  private ensureStarted(): ChildProcessWithoutNullStreams {
    if (this.child) return this.child;

    const { command, args = [], cwd, env } = this.spec;
    const child = spawn(command, args, {
      cwd,
      env: { ...process.env, ...env },
      stdio: ["pipe", "pipe", "pipe"],
    });
    this.child = child;

    readline.createInterface({ input: child.stdout, terminal: false }).on("line", (line) => {
      this.onLine(line);
    });
    readline.createInterface({ input: child.stderr, terminal: false }).on("line", (line) => {
      this.log.debug({ pid: child.pid }, line);
    });

    child.on("error", (err) => {
      this.log.error({ err }, "Plugin process error");
      this.onExit({ code: null, signal: null }, err.message);
    });
    child.on("close", (code, signal) => {
      this.onExit({ code, signal });
    });
    // A plugin that dies mid-write must not crash the host.
    child.stdin.on("error", (err) => {
      this.log.warn({ err }, "Plugin stdin closed");
    });

    this.log.debug({ pid: child.pid }, "Spawned plugin process");
    return child;
  }

  private exchange(request: RequestEnvelope, timeoutMs: number): Promise<ResponseEnvelope> {
    if (this.exitInfo) {
      return Promise.reject(new ProcessExitedError(this.exitInfo.code, this.exitInfo.signal));
    }
    const child = this.ensureStarted();

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        this.log.warn({ action: request.action, timeoutMs }, "Plugin call timed out, terminating");
        this.kill("SIGKILL");
        reject(new TimeoutError(request.action, timeoutMs));
      }, timeoutMs);

      this.pending = {
        resolve: (line) => {
          clearTimeout(timer);
          resolve(line);
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };

      child.stdin.write(encodeRequest(request) + "\n");
    }).then((line) => decodeResponse(line));
  }

  private onLine(line: string): void {
    if (!line.trim()) return;
    const pending = this.pending;
    if (!pending) {
      this.log.warn({ line: line.slice(0, 100) }, "Discarding unsolicited plugin output");
      return;
    }
    this.pending = null;
    pending.resolve(line);
  }

  private onExit(info: ExitInfo, message?: string): void {
    if (this.exitInfo) return;
    this.exitInfo = info;
    const pending = this.pending;
    this.pending = null;
    pending?.reject(new ProcessExitedError(info.code, info.signal, message));
    this.log.debug({ code: info.code, signal: info.signal }, "Plugin process exited");
    this.resolveExited(info);
  }
}
