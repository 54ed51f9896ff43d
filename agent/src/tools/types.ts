/**
 * Tool definitions: the contract between provider integrations, the
 * executor and individual tools.
 */

import type { z } from 'zod';
import type { ToolErrorKind } from './errors.js';
import type { PathGuard } from '../security/path-guard.js';
import type { CommandValidator } from '../security/command-validator.js';
import type { ShellRunner } from '../shell/shell-runner.js';
import type { BackgroundJobs } from '../shell/background-jobs.js';
import type { ProtocolAdapter } from '../protocol/protocol-adapter.js';

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';
  description?: string;
  enum?: unknown[];
  items?: JsonSchemaProperty;
  properties?: Record<string, JsonSchemaProperty>;
  required?: string[];
  default?: unknown;
  minimum?: number;
}

export interface JsonSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
}

// ── Calls and results ───────────────────────────

export interface ToolCall {
  callId: string;
  name: string;
  /** Decoded model output; anything but a JSON object is rejected. */
  arguments: unknown;
}

export type ToolContent = string | Record<string, unknown>;

export interface ToolSuccess {
  callId: string;
  ok: true;
  content: ToolContent;
}

export interface ToolFailure {
  callId: string;
  ok: false;
  error: {
    kind: ToolErrorKind;
    message: string;
  };
}

export type ToolResult = ToolSuccess | ToolFailure;

// ── Definitions ─────────────────────────────────

export type ToolCategory = 'file' | 'shell' | 'browser';

export interface ToolLimits {
  maxReadBytes: number;
}

export interface ToolContext {
  callId: string;
  projectRoot: string;
  pathGuard: PathGuard;
  commandValidator: CommandValidator;
  shell: ShellRunner;
  jobs: BackgroundJobs;
  limits: ToolLimits;
  /** The browser adapter currently attached to the session, if any. */
  browser(): ProtocolAdapter | undefined;
  signal?: AbortSignal;
}

export interface ToolDefinition {
  name: string;
  description: string;
  category: ToolCategory;
  parameters: JsonSchema;
  /** Validates `params` against the tool's schema, then runs the tool. */
  run(params: unknown, ctx: ToolContext): Promise<ToolContent>;
}

export interface ToolSpec<S extends z.ZodObject<z.ZodRawShape>> {
  name: string;
  description: string;
  category: ToolCategory;
  schema: S;
  handle(args: z.infer<S>, ctx: ToolContext): Promise<ToolContent>;
}

export type ToolProfile = 'full' | 'readonly';
