#!/usr/bin/env node
/**
 * toolgate CLI: inspect the sandbox and run single tool calls
 * Usage: toolgate <command> [args]
 */

import { pathToFileURL } from "node:url";
import { ConfigError, loadConfig, loadEnvFiles, type ToolgateConfig } from "../agent/src/config/config.js";
import { setLogLevel } from "../agent/src/lib/logger.js";
import { PathGuard } from "../agent/src/security/path-guard.js";
import { CommandValidator } from "../agent/src/security/command-validator.js";
import { ToolRegistry } from "../agent/src/tools/registry.js";
import { isToolError } from "../agent/src/tools/errors.js";
import { openToolSession } from "../agent/src/session/tool-session.js";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  env: Record<string, string | undefined>;
  cwd: string;
}

const USAGE = `
toolgate: sandboxed tool execution for coding agents

Usage: toolgate <command> [args]

Commands:
  check-command <command...>        Check a shell command against the allowlist (exit 0 allow, 1 deny)
  check-path <path>                 Print the canonical path inside the project root, or why it is denied
  exec <tool> [json-args]           Run one tool call and print the ToolResult as JSON (exit 0 ok, 1 error)
  tools                             Print the tool catalog as JSON

Examples:
  toolgate check-command "git status && npm test"
  toolgate check-path src/index.ts
  toolgate exec read_file '{"path": "package.json", "limit": 20}'
  toolgate tools
`;

function usage(io: CliIO): number {
  io.stderr(USAGE);
  return 2;
}

// ───────────────────────────────────────────────────────────────────────────
// check-command <command...>
// ───────────────────────────────────────────────────────────────────────────
function checkCommand(io: CliIO, words: string[]): number {
  const decision = new CommandValidator().validate(words.join(" "));
  if (decision.allowed) {
    io.stdout("ALLOW");
    return 0;
  }
  io.stdout(`DENY: ${decision.reason}`);
  return 1;
}

// ───────────────────────────────────────────────────────────────────────────
// check-path <path>
// ───────────────────────────────────────────────────────────────────────────
async function checkPath(io: CliIO, config: ToolgateConfig, requested: string): Promise<number> {
  try {
    io.stdout(await new PathGuard(config.projectRoot).resolve(requested));
    return 0;
  } catch (err) {
    if (!isToolError(err)) throw err;
    io.stdout(`DENY: ${err.message}`);
    return 1;
  }
}

// ───────────────────────────────────────────────────────────────────────────
// exec <tool> [json-args]
// ───────────────────────────────────────────────────────────────────────────
async function execTool(io: CliIO, config: ToolgateConfig, name: string, rawArgs: string | undefined): Promise<number> {
  let parsed: unknown = {};
  if (rawArgs !== undefined) {
    try {
      parsed = JSON.parse(rawArgs);
    } catch (err) {
      io.stderr(`Error: arguments must be JSON: ${err instanceof Error ? err.message : String(err)}`);
      return 2;
    }
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    io.stderr("Error: arguments must be a JSON object");
    return 2;
  }

  const session = await openToolSession(config, { env: io.env });
  try {
    const result = await session.executor.execute({
      callId: "cli-1",
      name,
      arguments: Object.fromEntries(Object.entries(parsed)),
    });
    io.stdout(JSON.stringify(result, null, 2));
    return result.ok ? 0 : 1;
  } finally {
    await session.close();
  }
}

// ───────────────────────────────────────────────────────────────────────────
// tools
// ───────────────────────────────────────────────────────────────────────────
function listTools(io: CliIO): number {
  const catalog = new ToolRegistry().getToolsForProfile("full").map((tool) => ({
    name: tool.name,
    category: tool.category,
    description: tool.description,
    parameters: tool.parameters,
  }));
  io.stdout(JSON.stringify(catalog, null, 2));
  return 0;
}

export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const [command, ...args] = argv;

  let config: ToolgateConfig;
  try {
    config = loadConfig(io.env, io.cwd);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    io.stderr(`Error: ${err.message}`);
    return 2;
  }
  setLogLevel(config.logLevel);

  switch (command) {
    case "check-command":
      return args.length === 0 ? usage(io) : checkCommand(io, args);
    case "check-path":
      return args.length !== 1 ? usage(io) : checkPath(io, config, args[0]);
    case "exec":
      return args.length < 1 || args.length > 2 ? usage(io) : execTool(io, config, args[0], args[1]);
    case "tools":
      return listTools(io);
    default:
      return usage(io);
  }
}

const invokedPath = process.argv[1];
if (invokedPath !== undefined && import.meta.url === pathToFileURL(invokedPath).href) {
  loadEnvFiles();
  runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    env: process.env,
    cwd: process.cwd(),
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error("Error:", err instanceof Error ? err.message : err);
      process.exitCode = 1;
    }
  );
}
