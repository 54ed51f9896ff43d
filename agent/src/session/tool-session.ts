/**
 * ToolSession: one agent session's tool runtime.
 *
 * Builds the guards, shell runner, background jobs, executor, optional audit
 * store and (when enabled) the browser adapter, and tears all of them down on
 * `close()`. Nothing here is process-wide: two sessions share no state.
 */

import { randomUUID } from "node:crypto";
import type { ToolgateConfig } from "../config/config.js";
import { sanitizeEnv } from "../lib/env.js";
import { getLog } from "../lib/logger.js";
import { openAuditDb, type AuditDbHandle } from "../db/index.js";
import { SqliteToolAudit } from "../audit/tool-audit.js";
import { PathGuard } from "../security/path-guard.js";
import { CommandValidator } from "../security/command-validator.js";
import { ShellRunner } from "../shell/shell-runner.js";
import { BackgroundJobs } from "../shell/background-jobs.js";
import { ProtocolAdapter, type ProcessSpawner } from "../protocol/protocol-adapter.js";
import { ToolRegistry } from "../tools/registry.js";
import { ToolExecutor } from "../tools/executor.js";
import type { ToolProfile } from "../tools/types.js";

const log = getLog(import.meta);

export interface ToolSessionOptions {
  sessionId?: string;
  profile?: ToolProfile;
  registry?: ToolRegistry;
  /** Environment the sanitized child environment is derived from. */
  env?: Record<string, string | undefined>;
  /** Replaces the real process spawner for the browser server. */
  spawn?: ProcessSpawner;
}

export class ToolSession {
  readonly id: string;
  readonly pathGuard: PathGuard;
  readonly commandValidator: CommandValidator;
  readonly shell: ShellRunner;
  readonly jobs: BackgroundJobs;
  readonly registry: ToolRegistry;
  readonly executor: ToolExecutor;
  readonly audit: SqliteToolAudit | undefined;

  private adapter: ProtocolAdapter | undefined;
  private closing: Promise<void> | undefined;

  constructor(
    private readonly config: ToolgateConfig,
    private readonly childEnv: Record<string, string>,
    private readonly auditDb: AuditDbHandle | undefined,
    private readonly options: ToolSessionOptions
  ) {
    this.id = options.sessionId ?? randomUUID();
    this.pathGuard = new PathGuard(config.projectRoot);
    this.commandValidator = new CommandValidator();
    this.shell = new ShellRunner({
      cwd: this.pathGuard.root,
      env: childEnv,
      defaultTimeoutMs: config.shell.defaultTimeoutMs,
      maxTimeoutMs: config.shell.maxTimeoutMs,
      maxOutputBytes: config.shell.maxOutputBytes,
    });
    this.jobs = new BackgroundJobs(this.shell);
    this.registry = options.registry ?? new ToolRegistry();
    this.audit = auditDb ? new SqliteToolAudit(auditDb.db) : undefined;
    this.executor = new ToolExecutor({
      registry: this.registry,
      profile: options.profile,
      audit: this.audit,
      sessionId: this.id,
      context: {
        projectRoot: this.pathGuard.root,
        pathGuard: this.pathGuard,
        commandValidator: this.commandValidator,
        shell: this.shell,
        jobs: this.jobs,
        limits: { maxReadBytes: config.maxReadBytes },
        browser: () => this.adapter,
      },
    });
  }

  /** The browser adapter currently attached, if any. */
  get browser(): ProtocolAdapter | undefined {
    return this.adapter;
  }

  /**
   * Attach a fresh browser adapter, replacing a degraded or stopped one.
   * Resolves to whether the browser is ready afterwards.
   */
  async reconnectBrowser(): Promise<boolean> {
    if (!this.config.browser.enabled || this.closing) {
      return false;
    }
    if (this.adapter?.state === "ready") {
      return true;
    }
    const previous = this.adapter;
    this.adapter = undefined;
    if (previous) {
      await previous.shutdown();
    }

    const adapter = new ProtocolAdapter({
      name: "browser",
      command: this.config.browser.command,
      args: this.config.browser.args,
      cwd: this.pathGuard.root,
      env: this.childEnv,
      startTimeoutMs: this.config.browser.startTimeoutMs,
      callTimeoutMs: this.config.browser.callTimeoutMs,
      healthCheckIntervalMs: this.config.browser.healthCheckIntervalMs,
      ...(this.options.spawn && { spawn: this.options.spawn }),
    });
    try {
      await adapter.start();
    } catch {
      // the adapter has already logged why
      log.info({ sessionId: this.id }, "continuing without browser tools");
      return false;
    }
    this.adapter = adapter;
    return true;
  }

  /** Kill background jobs, stop the browser server, close the audit db. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    await this.jobs.killAll();
    const adapter = this.adapter;
    this.adapter = undefined;
    if (adapter) {
      await adapter.shutdown();
    }
    this.auditDb?.close();
    log.debug({ sessionId: this.id }, "session closed");
  }
}

export async function openToolSession(config: ToolgateConfig, options: ToolSessionOptions = {}): Promise<ToolSession> {
  const childEnv = sanitizeEnv(options.env ?? process.env, config.passEnv);
  const auditDb = config.auditDbPath === undefined ? undefined : openAuditDb(config.auditDbPath);
  const session = new ToolSession(config, childEnv, auditDb, options);
  log.info(
    { sessionId: session.id, projectRoot: session.pathGuard.root, profile: session.executor.profile },
    "tool session opened"
  );
  if (config.browser.enabled) {
    await session.reconnectBrowser();
  }
  return session;
}
