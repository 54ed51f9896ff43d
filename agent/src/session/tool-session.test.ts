import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import * as path from "node:path";
import { loadConfig, type ToolgateConfig } from "../config/config.js";
import { openToolSession, type ToolSession } from "./tool-session.js";
import type { ProcessSpawner } from "../protocol/protocol-adapter.js";
import { FakeToolServer, fakeSpawner, withHandshake } from "../testing/fake-tool-server.js";
import { makeWorkspace, removeWorkspace, writeFiles } from "../testing/tool-context.js";

function navigateServer(): FakeToolServer {
  return new FakeToolServer(
    withHandshake((message, server) => {
      if (message.method === "tools/call") {
        server.reply(message, { content: [{ type: "text", text: "Navigated" }] });
      }
    })
  );
}

/** Hands out the given servers one launch at a time. */
function sequenceSpawner(servers: FakeToolServer[]): ProcessSpawner {
  let next = 0;
  return () => {
    const server = servers[next++];
    if (!server) throw new Error("no more fake servers");
    return server;
  };
}

describe("ToolSession", () => {
  let workspace: string;
  let session: ToolSession | undefined;

  function config(overrides: Record<string, string> = {}): ToolgateConfig {
    return loadConfig(
      {
        TOOLGATE_PROJECT_ROOT: workspace,
        TOOLGATE_BROWSER_COMMAND: "browser-server",
        TOOLGATE_BROWSER_ARGS: "--stdio",
        TOOLGATE_START_TIMEOUT_MS: "500",
        TOOLGATE_CALL_TIMEOUT_MS: "500",
        LOG_LEVEL: "silent",
        ...overrides,
      },
      workspace
    );
  }

  beforeEach(async () => {
    workspace = await makeWorkspace();
    await writeFiles(workspace, { "notes.txt": "hello\n" });
  });

  afterEach(async () => {
    await session?.close();
    session = undefined;
    await removeWorkspace(workspace);
  });

  test("runs tools without a browser", async () => {
    session = await openToolSession(config(), { sessionId: "s1", env: { PATH: "/usr/bin:/bin" } });

    expect(session.id).toBe("s1");
    expect(session.browser).toBeUndefined();
    await expect(session.reconnectBrowser()).resolves.toBe(false);
    await expect(
      session.executor.execute({ callId: "c1", name: "read_file", arguments: { path: "notes.txt" } })
    ).resolves.toEqual({ callId: "c1", ok: true, content: "hello\n" });
    await expect(
      session.executor.execute({ callId: "c2", name: "puppeteer_navigate", arguments: { url: "http://localhost" } })
    ).resolves.toEqual({
      callId: "c2",
      ok: false,
      error: { kind: "Unavailable", message: "Browser tools are unavailable" },
    });
  });

  test("strips secrets from the child environment", async () => {
    session = await openToolSession(config({ TOOLGATE_PASS_ENV: "GITHUB_TOKEN" }), {
      env: { PATH: "/usr/bin:/bin", ANTHROPIC_API_KEY: "test-secret", GITHUB_TOKEN: "test-token", HOME: "/home/dev" },
    });

    expect(session.shell.env).toEqual({ PATH: "/usr/bin:/bin", GITHUB_TOKEN: "test-token", HOME: "/home/dev" });
  });

  test("starts the browser server and routes prefixed tool names to it", async () => {
    const server = navigateServer();
    const spawn = fakeSpawner(server);
    session = await openToolSession(config({ TOOLGATE_BROWSER_ENABLED: "true" }), { env: {}, spawn });

    expect(session.browser?.state).toBe("ready");
    expect(spawn.launches).toEqual([{ command: "browser-server", args: ["--stdio"], cwd: workspace }]);
    await expect(
      session.executor.execute({
        callId: "c1",
        name: "mcp__puppeteer__puppeteer_navigate",
        arguments: { url: "http://localhost:3000" },
      })
    ).resolves.toEqual({ callId: "c1", ok: true, content: "Navigated" });
  });

  test("continues without the browser when it fails to start", async () => {
    const silent = new FakeToolServer(() => undefined);
    session = await openToolSession(config({ TOOLGATE_BROWSER_ENABLED: "true", TOOLGATE_START_TIMEOUT_MS: "50" }), {
      env: {},
      spawn: fakeSpawner(silent),
    });

    expect(session.browser).toBeUndefined();
    expect(silent.signals).toEqual(["SIGTERM"]);
    const result = await session.executor.execute({ callId: "c1", name: "puppeteer_click", arguments: { selector: "a" } });
    expect(result).toEqual({
      callId: "c1",
      ok: false,
      error: { kind: "Unavailable", message: "Browser tools are unavailable" },
    });
  });

  test("replaces a browser adapter whose server died on reconnect", async () => {
    const first = navigateServer();
    const second = navigateServer();
    session = await openToolSession(config({ TOOLGATE_BROWSER_ENABLED: "true" }), {
      env: {},
      spawn: sequenceSpawner([first, second]),
    });
    const original = session.browser;
    const states: string[] = [];
    original?.onStateChange((state) => states.push(state));

    first.exit(1);
    await vi.waitFor(() => expect(states).toEqual(["degraded", "stopped"]));
    await expect(
      session.executor.execute({ callId: "c1", name: "puppeteer_navigate", arguments: { url: "http://a" } })
    ).resolves.toMatchObject({ ok: false, error: { kind: "Unavailable" } });

    await expect(session.reconnectBrowser()).resolves.toBe(true);
    expect(original?.state).toBe("stopped");
    expect(session.browser).not.toBe(original);
    expect(session.browser?.state).toBe("ready");
    await expect(
      session.executor.execute({ callId: "c2", name: "puppeteer_navigate", arguments: { url: "http://a" } })
    ).resolves.toEqual({ callId: "c2", ok: true, content: "Navigated" });
  });

  test("close stops jobs and the browser once", async () => {
    const server = navigateServer();
    const current = await openToolSession(config({ TOOLGATE_BROWSER_ENABLED: "true" }), {
      env: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
      spawn: fakeSpawner(server),
    });
    const adapter = current.browser;
    await current.executor.execute({
      callId: "c1",
      name: "bash",
      arguments: { command: "sleep 30", run_in_background: true },
    });

    const closing = current.close();
    expect(current.close()).toBe(closing);
    await closing;

    expect(current.jobs.list().map((job) => job.status)).toEqual(["killed"]);
    expect(adapter?.state).toBe("stopped");
    expect(server.stdinClosed).toBe(true);
    expect(current.browser).toBeUndefined();
    await expect(current.reconnectBrowser()).resolves.toBe(false);
  });

  test("writes an audit row per call when an audit database is configured", async () => {
    session = await openToolSession(config({ TOOLGATE_AUDIT_DB: "audit.db" }), { sessionId: "audited", env: {} });

    await session.executor.execute({ callId: "c1", name: "read_file", arguments: { path: "notes.txt" } });
    await session.executor.execute({ callId: "c2", name: "read_file", arguments: { path: "../etc/passwd" } });

    expect(config({ TOOLGATE_AUDIT_DB: "audit.db" }).auditDbPath).toBe(path.join(workspace, "audit.db"));
    expect(
      session.audit?.listRecent(10, "audited").map(({ callId, toolName, outcome }) => ({ callId, toolName, outcome }))
    ).toEqual([
      { callId: "c2", toolName: "read_file", outcome: "SecurityDenied" },
      { callId: "c1", toolName: "read_file", outcome: "ok" },
    ]);
  });
});
