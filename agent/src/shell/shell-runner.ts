/**
 * ShellRunner: runs validated command lines in the project root.
 *
 * Each command gets its own process group so a timeout or abort takes down
 * everything it started: SIGTERM first, SIGKILL after a grace period, and the
 * group is always reaped before the promise settles.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { getLog } from "../lib/logger.js";

const log = getLog(import.meta);

export const DEFAULT_KILL_GRACE_MS = 2_000;
const MIN_TIMEOUT_MS = 200;

export interface ShellRunnerOptions {
  cwd: string;
  env: Record<string, string>;
  defaultTimeoutMs: number;
  maxTimeoutMs: number;
  maxOutputBytes: number;
  killGraceMs?: number;
  shell?: string;
}

export interface ShellRunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ShellRunResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  aborted: boolean;
  truncated: boolean;
  durationMs: number;
}

/**
 * Collects a stream's bytes up to a cap; everything past it is counted and
 * dropped.
 */
export class OutputBuffer {
  private chunks: Buffer[] = [];
  private bytes = 0;
  private dropped = 0;

  constructor(private readonly maxBytes: number) {}

  push(chunk: Buffer): void {
    const room = this.maxBytes - this.bytes;
    if (room <= 0) {
      this.dropped += chunk.byteLength;
      return;
    }
    const kept = chunk.byteLength <= room ? chunk : chunk.subarray(0, room);
    this.chunks.push(kept);
    this.bytes += kept.byteLength;
    this.dropped += chunk.byteLength - kept.byteLength;
  }

  /** Return the collected text and start over. */
  take(): { text: string; droppedBytes: number } {
    const text = Buffer.concat(this.chunks).toString("utf8");
    const droppedBytes = this.dropped;
    this.chunks = [];
    this.bytes = 0;
    this.dropped = 0;
    return { text, droppedBytes };
  }
}

/**
 * Signal every process in the child's group. Returns false when the group is
 * already gone.
 */
export function signalProcessGroup(child: ChildProcess, signal: NodeJS.Signals): boolean {
  if (child.pid === undefined) {
    return false;
  }
  try {
    process.kill(-child.pid, signal);
    return true;
  } catch {
    // group leader already exited; fall back to the child itself
    return child.kill(signal);
  }
}

export interface ChildExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface RunningCommand {
  child: ChildProcess;
  /** Settles once the process has exited and its stdio has closed. */
  closed: Promise<ChildExit>;
}

function isRunning(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

export class ShellRunner {
  readonly cwd: string;
  readonly env: Record<string, string>;
  private readonly shell: string;
  readonly killGraceMs: number;
  readonly maxOutputBytes: number;
  private readonly defaultTimeoutMs: number;
  private readonly maxTimeoutMs: number;

  constructor(options: ShellRunnerOptions) {
    this.cwd = options.cwd;
    this.env = options.env;
    this.shell = options.shell ?? "bash";
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.maxOutputBytes = options.maxOutputBytes;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.maxTimeoutMs = options.maxTimeoutMs;
  }

  /** Requested timeout bounded to [200ms, maxTimeoutMs]. */
  clampTimeout(requested?: number): number {
    const timeout = requested ?? this.defaultTimeoutMs;
    return Math.max(MIN_TIMEOUT_MS, Math.min(this.maxTimeoutMs, Math.floor(timeout)));
  }

  /** Start a command in its own process group with piped output. */
  spawn(command: string): RunningCommand {
    const child = spawn(this.shell, ["-c", command], {
      cwd: this.cwd,
      env: this.env,
      detached: true,
      stdio: ["ignore", "pipe", "pipe"],
    });
    const closed = new Promise<ChildExit>((resolve, reject) => {
      child.once("close", (code: number | null, signal: NodeJS.Signals | null) => resolve({ code, signal }));
      child.on("error", reject);
    });
    return { child, closed };
  }

  /**
   * Terminate a command's process group and wait for it to be reaped.
   */
  async terminate(running: RunningCommand): Promise<ChildExit> {
    if (isRunning(running.child)) {
      signalProcessGroup(running.child, "SIGTERM");
    }
    const escalate = setTimeout(() => {
      signalProcessGroup(running.child, "SIGKILL");
    }, this.killGraceMs);
    try {
      return await running.closed;
    } finally {
      clearTimeout(escalate);
    }
  }

  async run(command: string, options: ShellRunOptions = {}): Promise<ShellRunResult> {
    const timeoutMs = this.clampTimeout(options.timeoutMs);
    const started = Date.now();
    const running = this.spawn(command);
    const { child } = running;
    const stdout = new OutputBuffer(this.maxOutputBytes);
    const stderr = new OutputBuffer(this.maxOutputBytes);
    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    log.debug({ pid: child.pid, timeoutMs }, `run: ${command}`);

    const state = { timedOut: false, aborted: false, stopping: false };
    const stop = (): void => {
      if (state.stopping) return;
      state.stopping = true;
      // the caller awaits `closed`; this only drives the signals
      this.terminate(running).catch((err: unknown) => {
        log.warn({ pid: child.pid, err: String(err) }, "terminate failed");
      });
    };

    const timer = setTimeout(() => {
      state.timedOut = true;
      stop();
    }, timeoutMs);
    const onAbort = (): void => {
      state.aborted = true;
      stop();
    };
    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    try {
      const exit = await running.closed;
      const out = stdout.take();
      const err = stderr.take();
      return {
        stdout: out.text,
        stderr: err.text,
        exitCode: exit.code,
        signal: exit.signal,
        timedOut: state.timedOut,
        aborted: state.aborted,
        truncated: out.droppedBytes > 0 || err.droppedBytes > 0,
        durationMs: Date.now() - started,
      };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}
