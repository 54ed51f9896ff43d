/**
 * Test helpers: a throwaway project directory and a ToolContext rooted in it.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { PathGuard } from "../security/path-guard.js";
import { CommandValidator } from "../security/command-validator.js";
import { ShellRunner } from "../shell/shell-runner.js";
import { BackgroundJobs } from "../shell/background-jobs.js";
import type { ProtocolAdapter } from "../protocol/protocol-adapter.js";
import type { ToolContext } from "../tools/types.js";

export async function makeWorkspace(prefix = "toolgate-test-"): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function removeWorkspace(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Write files relative to `root`, creating directories as needed. */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

export interface TestContextOptions {
  maxReadBytes?: number;
  maxOutputBytes?: number;
  browser?: ProtocolAdapter;
  /** PATH for commands the tools spawn; defaults to the test process's PATH. */
  path?: string;
}

export function makeToolContext(root: string, options: TestContextOptions = {}): ToolContext {
  const pathGuard = new PathGuard(root);
  const shell = new ShellRunner({
    cwd: pathGuard.root,
    env: { PATH: options.path ?? process.env.PATH ?? "/usr/bin:/bin" },
    defaultTimeoutMs: 5_000,
    maxTimeoutMs: 10_000,
    maxOutputBytes: options.maxOutputBytes ?? 64 * 1024,
    killGraceMs: 500,
  });
  return {
    callId: "test-call",
    projectRoot: pathGuard.root,
    pathGuard,
    commandValidator: new CommandValidator(),
    shell,
    jobs: new BackgroundJobs(shell),
    limits: { maxReadBytes: options.maxReadBytes ?? 1024 * 1024 },
    browser: () => options.browser,
  };
}
