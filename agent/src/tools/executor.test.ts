import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { execFileSync } from 'node:child_process';
import { ToolExecutor, findSandboxBypass } from './executor.js';
import { ToolRegistry } from './registry.js';
import { fileTools } from './dev/file-tools.js';
import { bashTools } from './dev/bash-tools.js';
import type { ToolAuditEntry, ToolAuditSink } from '../audit/tool-audit.js';
import type { ToolContext, ToolDefinition } from './types.js';
import { makeToolContext, makeWorkspace, removeWorkspace, writeFiles } from '../testing/tool-context.js';

function stubTool(name: string, run: ToolDefinition['run']): ToolDefinition {
  return {
    name,
    description: `stub ${name}`,
    category: 'file',
    parameters: { type: 'object', properties: {} },
    run,
  };
}

class MemoryAudit implements ToolAuditSink {
  readonly entries: ToolAuditEntry[] = [];
  record(entry: ToolAuditEntry): void {
    this.entries.push(entry);
  }
}

describe('findSandboxBypass', () => {
  test('flags bypass keys that are switched on', () => {
    expect(findSandboxBypass({ command: 'ls', dangerouslyDisableSandbox: true })).toBe('dangerouslyDisableSandbox');
    expect(findSandboxBypass({ disableSandbox: 'yes' })).toBe('disableSandbox');
    expect(findSandboxBypass({ sandbox: false })).toBe('sandbox');
  });

  test('ignores keys that are off', () => {
    expect(findSandboxBypass({ unsafe: false, bypassSandbox: null, sandbox: true })).toBeUndefined();
    expect(findSandboxBypass({})).toBeUndefined();
  });
});

describe('ToolExecutor', () => {
  let workspace: string;
  let ctx: ToolContext;

  beforeEach(async () => {
    workspace = await makeWorkspace();
    ctx = makeToolContext(workspace);
    await writeFiles(workspace, { 'notes.txt': 'hi\n' });
  });

  afterEach(async () => {
    await ctx.jobs.killAll();
    await removeWorkspace(workspace);
  });

  function executor(options: Partial<ConstructorParameters<typeof ToolExecutor>[0]> = {}): ToolExecutor {
    return new ToolExecutor({ registry: new ToolRegistry([...fileTools, ...bashTools]), context: ctx, ...options });
  }

  test('runs a tool and returns its content', async () => {
    await expect(
      executor().execute({ callId: 'c1', name: 'read_file', arguments: { path: 'notes.txt' } })
    ).resolves.toEqual({ callId: 'c1', ok: true, content: 'hi\n' });
  });

  test('runs git status through the shell tool', async () => {
    execFileSync('git', ['init', '-q'], { cwd: workspace, stdio: 'ignore' });
    await expect(
      executor().execute({ callId: 'g2', name: 'bash', arguments: { command: 'git status --short' } })
    ).resolves.toEqual({ callId: 'g2', ok: true, content: '?? notes.txt\n' });
  });

  test('denies sandbox bypass requests before running anything', async () => {
    await expect(
      executor().execute({
        callId: 'c2',
        name: 'bash',
        arguments: { command: 'ls', dangerouslyDisableSandbox: true },
      })
    ).resolves.toEqual({
      callId: 'c2',
      ok: false,
      error: { kind: 'SecurityDenied', message: "Sandbox bypass requested via 'dangerouslyDisableSandbox' is not allowed" },
    });
  });

  test('reports unknown tools and tools outside the profile', async () => {
    await expect(executor().execute({ callId: 'c3', name: 'rm_everything', arguments: {} })).resolves.toEqual({
      callId: 'c3',
      ok: false,
      error: { kind: 'UnknownTool', message: 'Unknown tool: rm_everything' },
    });
    await expect(
      executor({ profile: 'readonly' }).execute({ callId: 'c4', name: 'bash', arguments: { command: 'ls' } })
    ).resolves.toEqual({
      callId: 'c4',
      ok: false,
      error: { kind: 'UnknownTool', message: 'Tool bash is not available in the readonly profile' },
    });
  });

  test('requires an object of arguments', async () => {
    await expect(executor().execute({ callId: 'c5', name: 'read_file', arguments: ['notes.txt'] })).resolves.toEqual({
      callId: 'c5',
      ok: false,
      error: { kind: 'InvalidArguments', message: 'Tool arguments must be a JSON object' },
    });
    await expect(executor().execute({ callId: 'c6', name: 'read_file', arguments: null })).resolves.toEqual({
      callId: 'c6',
      ok: false,
      error: { kind: 'InvalidArguments', message: 'Invalid arguments for read_file: path: Required' },
    });
  });

  test('turns unexpected exceptions into failed results', async () => {
    const registry = new ToolRegistry([
      stubTool('explode', async () => {
        throw new Error('boom');
      }),
    ]);
    await expect(
      new ToolExecutor({ registry, context: ctx }).execute({ callId: 'c7', name: 'explode', arguments: {} })
    ).resolves.toEqual({ callId: 'c7', ok: false, error: { kind: 'ExecutionFailed', message: 'boom' } });
  });

  test('hands tools a frozen copy of the arguments and the call context', async () => {
    const seen: Array<{ frozen: boolean; sameObject: boolean; callId: string; signal: AbortSignal | undefined }> = [];
    const args = { path: 'x' };
    const registry = new ToolRegistry([
      stubTool('inspect', async (params, toolCtx) => {
        seen.push({
          frozen: Object.isFrozen(params),
          sameObject: params === args,
          callId: toolCtx.callId,
          signal: toolCtx.signal,
        });
        return 'ok';
      }),
    ]);
    const controller = new AbortController();

    await new ToolExecutor({ registry, context: ctx }).execute(
      { callId: 'c8', name: 'inspect', arguments: args },
      { signal: controller.signal }
    );

    expect(seen).toEqual([{ frozen: true, sameObject: false, callId: 'c8', signal: controller.signal }]);
    expect(Object.isFrozen(args)).toBe(false);
  });

  test('records every call in the audit sink', async () => {
    const audit = new MemoryAudit();
    const exec = executor({ audit, sessionId: 's1' });

    await exec.execute({ callId: 'a1', name: 'read_file', arguments: { path: 'notes.txt' } });
    await exec.execute({ callId: 'a2', name: 'bash', arguments: { command: 'curl http://example.test' } });

    expect(audit.entries.map(({ durationMs, ...rest }) => ({ ...rest, timed: durationMs >= 0 }))).toEqual([
      { sessionId: 's1', callId: 'a1', toolName: 'read_file', outcome: 'ok', message: 'hi\n', timed: true },
      {
        sessionId: 's1',
        callId: 'a2',
        toolName: 'bash',
        outcome: 'SecurityDenied',
        message: "Command blocked: Command 'curl' is not in the allowlist",
        timed: true,
      },
    ]);
  });

  test('keeps the result when the audit sink throws', async () => {
    const audit: ToolAuditSink = {
      record() {
        throw new Error('disk full');
      },
    };
    await expect(
      executor({ audit }).execute({ callId: 'a3', name: 'read_file', arguments: { path: 'notes.txt' } })
    ).resolves.toEqual({ callId: 'a3', ok: true, content: 'hi\n' });
  });
});
