import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { OutputBuffer, ShellRunner } from "./shell-runner.js";

function makeRunner(cwd: string, overrides: Partial<ConstructorParameters<typeof ShellRunner>[0]> = {}): ShellRunner {
  return new ShellRunner({
    cwd,
    env: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
    defaultTimeoutMs: 5_000,
    maxTimeoutMs: 10_000,
    maxOutputBytes: 64 * 1024,
    killGraceMs: 500,
    ...overrides,
  });
}

describe("ShellRunner", () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "toolgate-shell-")));
  });

  afterEach(async () => {
    await fs.rm(workspace, { recursive: true, force: true });
  });

  test("captures stdout and exit code", async () => {
    const result = await makeRunner(workspace).run("echo hello");
    expect(result.stdout).toBe("hello\n");
    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
  });

  test("captures stderr and non-zero exit", async () => {
    const result = await makeRunner(workspace).run("echo oops >&2; exit 3");
    expect(result.stderr).toBe("oops\n");
    expect(result.exitCode).toBe(3);
  });

  test("runs in the project root", async () => {
    const result = await makeRunner(workspace).run("pwd");
    expect(result.stdout.trim()).toBe(workspace);
  });

  test("passes only the configured environment", async () => {
    process.env.TOOLGATE_PARENT_MARKER = "leaked";
    try {
      const runner = makeRunner(workspace, { env: { PATH: process.env.PATH ?? "/usr/bin:/bin", GREETING: "hi" } });
      const result = await runner.run('echo "$GREETING-${TOOLGATE_PARENT_MARKER:-unset}"');
      expect(result.stdout).toBe("hi-unset\n");
    } finally {
      delete process.env.TOOLGATE_PARENT_MARKER;
    }
  });

  test("kills the process group on timeout", async () => {
    const started = Date.now();
    const result = await makeRunner(workspace).run("sleep 5; echo late", { timeoutMs: 300 });
    expect(result.timedOut).toBe(true);
    expect(result.stdout).toBe("");
    expect(result.exitCode).toBeNull();
    expect(Date.now() - started).toBeLessThan(4_000);
  });

  test("stops on abort", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);
    const result = await makeRunner(workspace).run("sleep 5", { signal: controller.signal });
    expect(result.aborted).toBe(true);
    expect(result.timedOut).toBe(false);
  });

  test("caps output per stream", async () => {
    const result = await makeRunner(workspace, { maxOutputBytes: 10 }).run("printf 0123456789abcdef");
    expect(result.stdout).toBe("0123456789");
    expect(result.truncated).toBe(true);
  });

  test("clamps requested timeouts", () => {
    const runner = makeRunner(workspace, { defaultTimeoutMs: 1_000, maxTimeoutMs: 5_000 });
    expect(runner.clampTimeout()).toBe(1_000);
    expect(runner.clampTimeout(10)).toBe(200);
    expect(runner.clampTimeout(99_999)).toBe(5_000);
  });
});

describe("OutputBuffer", () => {
  test("keeps bytes up to the cap and counts the rest", () => {
    const buffer = new OutputBuffer(4);
    buffer.push(Buffer.from("abc"));
    buffer.push(Buffer.from("def"));
    expect(buffer.take()).toEqual({ text: "abcd", droppedBytes: 2 });
    expect(buffer.take()).toEqual({ text: "", droppedBytes: 0 });
  });
});
