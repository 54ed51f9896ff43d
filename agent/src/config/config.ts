/**
 * Runtime configuration for a tool session.
 *
 * Values come from the environment (optionally seeded from `.env` files by
 * {@link loadEnvFiles}) and are validated with zod. Invalid values fail fast
 * at startup with the offending variable named.
 */

import fs from "node:fs";
import path from "node:path";
import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

// ── Schema ──────────────────────────────────────

const BooleanFlag = z
  .union([z.boolean(), z.string().transform((s) => s === "true" || s === "1")])
  .default(false);

// Largest delay setTimeout accepts; anything above fires immediately
const MAX_TIMER_MS = 2_147_483_647;

const Millis = z.coerce
  .number()
  .int()
  .nonnegative()
  .max(MAX_TIMER_MS, `must be at most ${MAX_TIMER_MS}`);

const Timeout = z.coerce
  .number()
  .int()
  .positive("must be greater than 0")
  .max(MAX_TIMER_MS, `must be at most ${MAX_TIMER_MS}`);

const envSchema = z.object({
  TOOLGATE_PROJECT_ROOT: z.string().min(1).optional(),
  TOOLGATE_BROWSER_ENABLED: BooleanFlag,
  TOOLGATE_BROWSER_COMMAND: z.string().min(1).default("npx"),
  TOOLGATE_BROWSER_ARGS: z.string().default("-y puppeteer-mcp-server"),
  TOOLGATE_START_TIMEOUT_MS: Timeout.default(30_000),
  TOOLGATE_CALL_TIMEOUT_MS: Timeout.default(60_000),
  TOOLGATE_HEALTH_INTERVAL_MS: Millis.default(0),
  TOOLGATE_SHELL_TIMEOUT_MS: Timeout.default(300_000),
  TOOLGATE_SHELL_MAX_TIMEOUT_MS: Timeout.default(600_000),
  TOOLGATE_MAX_OUTPUT_BYTES: z.coerce.number().int().positive().default(256 * 1024),
  TOOLGATE_MAX_READ_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
  TOOLGATE_PASS_ENV: z.string().default(""),
  TOOLGATE_AUDIT_DB: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
});

// ── Types ───────────────────────────────────────

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface BrowserServerConfig {
  enabled: boolean;
  command: string;
  args: string[];
  startTimeoutMs: number;
  callTimeoutMs: number;
  healthCheckIntervalMs: number;
}

export interface ShellConfig {
  defaultTimeoutMs: number;
  maxTimeoutMs: number;
  maxOutputBytes: number;
}

export interface ToolgateConfig {
  projectRoot: string;
  browser: BrowserServerConfig;
  shell: ShellConfig;
  maxReadBytes: number;
  passEnv: string[];
  auditDbPath?: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ── Loading ─────────────────────────────────────

/**
 * Seed `process.env` from `.env` and `.env.local` in `dir`. Variables that are
 * already set win over `.env`; `.env.local` wins over `.env`.
 */
export function loadEnvFiles(dir: string = process.cwd()): void {
  const envPath = path.join(dir, ".env");
  if (fs.existsSync(envPath)) {
    dotenvConfig({ path: envPath });
  }
  const envLocalPath = path.join(dir, ".env.local");
  if (fs.existsSync(envLocalPath)) {
    dotenvConfig({ path: envLocalPath, override: true });
  }
}

function splitList(value: string, separator: RegExp): string[] {
  return value
    .split(separator)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): ToolgateConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") ?? "environment";
    throw new ConfigError(`Invalid ${key}: ${issue?.message ?? "unknown error"}`);
  }
  const values = parsed.data;

  const shellTimeout = values.TOOLGATE_SHELL_TIMEOUT_MS;
  const shellMax = values.TOOLGATE_SHELL_MAX_TIMEOUT_MS;
  if (shellTimeout > shellMax) {
    throw new ConfigError(
      `Invalid TOOLGATE_SHELL_TIMEOUT_MS: ${shellTimeout} exceeds TOOLGATE_SHELL_MAX_TIMEOUT_MS (${shellMax})`
    );
  }

  return {
    projectRoot: path.resolve(cwd, values.TOOLGATE_PROJECT_ROOT ?? "."),
    browser: {
      enabled: values.TOOLGATE_BROWSER_ENABLED,
      command: values.TOOLGATE_BROWSER_COMMAND,
      args: splitList(values.TOOLGATE_BROWSER_ARGS, /\s+/),
      startTimeoutMs: values.TOOLGATE_START_TIMEOUT_MS,
      callTimeoutMs: values.TOOLGATE_CALL_TIMEOUT_MS,
      healthCheckIntervalMs: values.TOOLGATE_HEALTH_INTERVAL_MS,
    },
    shell: {
      defaultTimeoutMs: shellTimeout,
      maxTimeoutMs: shellMax,
      maxOutputBytes: values.TOOLGATE_MAX_OUTPUT_BYTES,
    },
    maxReadBytes: values.TOOLGATE_MAX_READ_BYTES,
    passEnv: splitList(values.TOOLGATE_PASS_ENV, /,/),
    ...(values.TOOLGATE_AUDIT_DB !== undefined && { auditDbPath: path.resolve(cwd, values.TOOLGATE_AUDIT_DB) }),
    logLevel: values.LOG_LEVEL,
  };
}
