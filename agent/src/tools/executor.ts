/**
 * ToolExecutor: the boundary between agent logic and system operations.
 *
 * All agent tool usage goes through `execute`. The agent never touches the
 * filesystem, spawns processes or talks to the browser server directly.
 *
 * `execute` never rejects: denials, validation failures, protocol errors and
 * unexpected exceptions all come back as a failed ToolResult.
 */

import { getLog, logError } from '../lib/logger.js';
import type { ToolAuditSink } from '../audit/tool-audit.js';
import { ToolError, isToolError, toToolError } from './errors.js';
import type { ToolRegistry } from './registry.js';
import type { ToolCall, ToolContent, ToolContext, ToolProfile, ToolResult } from './types.js';

const log = getLog(import.meta);

/** Argument keys that ask for the sandbox to be switched off. */
const BYPASS_KEYS = ['dangerouslyDisableSandbox', 'disableSandbox', 'bypassSandbox', 'unsafe'] as const;

export type SessionToolContext = Omit<ToolContext, 'callId' | 'signal'>;

export interface ToolExecutorOptions {
  registry: ToolRegistry;
  context: SessionToolContext;
  profile?: ToolProfile;
  audit?: ToolAuditSink;
  sessionId?: string;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The first argument key requesting a sandbox bypass, if any. */
export function findSandboxBypass(args: Record<string, unknown>): string | undefined {
  for (const key of BYPASS_KEYS) {
    if (key in args && args[key] !== false && args[key] !== undefined && args[key] !== null) {
      return key;
    }
  }
  if ('sandbox' in args && args.sandbox === false) {
    return 'sandbox';
  }
  return undefined;
}

function contentText(content: ToolContent): string {
  return typeof content === 'string' ? content : JSON.stringify(content);
}

export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly context: SessionToolContext;
  readonly profile: ToolProfile;
  private readonly audit: ToolAuditSink | undefined;
  private readonly sessionId: string;

  constructor(options: ToolExecutorOptions) {
    this.registry = options.registry;
    this.context = options.context;
    this.profile = options.profile ?? 'full';
    this.audit = options.audit;
    this.sessionId = options.sessionId ?? 'default';
  }

  async execute(call: ToolCall, options: ExecuteOptions = {}): Promise<ToolResult> {
    const started = Date.now();
    const callId = typeof call.callId === 'string' ? call.callId : '';
    const name = typeof call.name === 'string' ? call.name : '';

    let result: ToolResult;
    try {
      const content = await this.dispatch(callId, name, call.arguments, options.signal);
      result = { callId, ok: true, content };
    } catch (err) {
      if (!isToolError(err)) {
        logError(log, err, `unexpected failure in ${name}`);
      }
      const toolError = toToolError(err);
      if (toolError.kind === 'SecurityDenied') {
        log.info({ callId, tool: name }, `denied: ${toolError.message}`);
      } else if (toolError.kind === 'ExecutionFailed') {
        log.warn({ callId, tool: name, err: toolError.message }, 'tool failed');
      } else {
        log.debug({ callId, tool: name, kind: toolError.kind }, toolError.message);
      }
      result = { callId, ok: false, error: { kind: toolError.kind, message: toolError.message } };
    }

    this.recordAudit(name, result, Date.now() - started);
    return result;
  }

  private async dispatch(
    callId: string,
    name: string,
    rawArgs: unknown,
    signal: AbortSignal | undefined
  ): Promise<ToolContent> {
    const args = rawArgs ?? {};
    if (!isRecord(args)) {
      throw new ToolError('InvalidArguments', 'Tool arguments must be a JSON object');
    }
    // handlers get a snapshot; the caller's object is never read again
    const frozen = Object.freeze({ ...args });

    const bypass = findSandboxBypass(frozen);
    if (bypass !== undefined) {
      throw new ToolError('SecurityDenied', `Sandbox bypass requested via '${bypass}' is not allowed`);
    }

    const tool = this.registry.getTool(name, this.profile);
    if (!tool) {
      throw new ToolError(
        'UnknownTool',
        this.registry.hasTool(name)
          ? `Tool ${name} is not available in the ${this.profile} profile`
          : `Unknown tool: ${name}`
      );
    }

    log.debug({ callId, tool: tool.name }, 'executing tool');
    return tool.run(frozen, { ...this.context, callId, ...(signal !== undefined && { signal }) });
  }

  private recordAudit(name: string, result: ToolResult, durationMs: number): void {
    if (!this.audit) return;
    try {
      this.audit.record({
        sessionId: this.sessionId,
        callId: result.callId,
        toolName: name,
        outcome: result.ok ? 'ok' : result.error.kind,
        message: result.ok ? contentText(result.content) : result.error.message,
        durationMs,
      });
    } catch (err) {
      log.warn({ callId: result.callId, err: err instanceof Error ? err.message : String(err) }, 'audit sink failed');
    }
  }
}
