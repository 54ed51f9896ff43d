import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { spawn } from 'node:child_process';
import { bashOutputTool, bashTool, formatCommandOutput, killShellTool } from './bash-tools.js';
import { makeToolContext, makeWorkspace, removeWorkspace, writeFiles } from '../../testing/tool-context.js';
import type { ToolContext } from '../types.js';

describe('formatCommandOutput', () => {
  test('appends stderr and a non-zero exit code', () => {
    expect(formatCommandOutput({ stdout: 'out\n', stderr: 'warn\n', exitCode: 3 })).toBe(
      'out\n\n[stderr]: warn\n\n[exit code: 3]'
    );
  });

  test('omits a zero exit code', () => {
    expect(formatCommandOutput({ stdout: 'ok\n', stderr: '', exitCode: 0 })).toBe('ok\n');
  });

  test('reports signals and truncation', () => {
    expect(formatCommandOutput({ stdout: 'x', stderr: '', exitCode: null, signal: 'SIGTERM', truncated: true })).toBe(
      'x\n[signal: SIGTERM]\n[output truncated]'
    );
  });

  test('marks empty output', () => {
    expect(formatCommandOutput({ stdout: '', stderr: '', exitCode: 0 })).toBe('(no output)');
  });
});

describe('shell tools', () => {
  let workspace: string;
  let ctx: ToolContext;

  beforeEach(async () => {
    workspace = await makeWorkspace();
    ctx = makeToolContext(workspace);
  });

  afterEach(async () => {
    await ctx.jobs.killAll();
    await removeWorkspace(workspace);
  });

  describe('bash', () => {
    test('runs an allowed command in the project root', async () => {
      await writeFiles(workspace, { 'b.txt': '', 'a.txt': '' });
      await expect(bashTool.run({ command: 'ls' }, ctx)).resolves.toBe('a.txt\nb.txt\n');
    });

    test('reports stderr and the exit code of a failing command', async () => {
      await expect(bashTool.run({ command: 'ls missing-file' }, ctx)).resolves.toBe(
        "\n[stderr]: ls: cannot access 'missing-file': No such file or directory\n\n[exit code: 2]"
      );
    });

    test('blocks commands outside the allowlist', async () => {
      await expect(bashTool.run({ command: 'ls && curl http://example.test' }, ctx)).rejects.toMatchObject({
        kind: 'SecurityDenied',
        message: "Command blocked: Command 'curl' is not in the allowlist",
      });
    });

    test('times out long commands', async () => {
      await expect(bashTool.run({ command: 'sleep 5', timeout: 300 }, ctx)).rejects.toMatchObject({
        kind: 'Timeout',
        message: 'Command timed out after 300ms',
      });
    });

    test('stops when the call is cancelled', async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 100);
      await expect(
        bashTool.run({ command: 'sleep 5' }, { ...ctx, signal: controller.signal })
      ).rejects.toMatchObject({ kind: 'Cancelled', message: 'Command was cancelled' });
    });

    test('only kills processes the agent started', async () => {
      await expect(bashTool.run({ command: 'kill 1' }, ctx)).rejects.toMatchObject({
        kind: 'SecurityDenied',
        message: 'Command blocked: kill target 1 was not started by the agent',
      });

      const job = ctx.jobs.start('sleep 30');
      await expect(bashTool.run({ command: `kill ${job.pid}` }, ctx)).resolves.toBe('(no output)');
    });

    test('does not signal processes by name', async () => {
      const unrelated = spawn('sleep', ['30'], { stdio: 'ignore' });
      try {
        ctx.jobs.start('sleep 30');
        await expect(bashTool.run({ command: 'pkill sleep' }, ctx)).rejects.toMatchObject({
          kind: 'SecurityDenied',
          message: "Command blocked: Command 'pkill' is not in the allowlist",
        });
        expect(unrelated.exitCode).toBeNull();
        expect(unrelated.signalCode).toBeNull();
      } finally {
        unrelated.kill('SIGKILL');
      }
    });
  });

  describe('background jobs', () => {
    test('starts a job and reads its output incrementally', async () => {
      const started = await bashTool.run({ command: 'echo hello; sleep 0.2; echo done', run_in_background: true }, ctx);
      expect(started).toMatch(
        /^Started background job job_1 \(pid \d+\)\. Use bash_output with job_id "job_1" to read its output\.$/
      );

      await vi.waitFor(() => expect(ctx.jobs.list()[0].status).toBe('exited'), { timeout: 5_000 });

      await expect(bashOutputTool.run({ job_id: 'job_1' }, ctx)).resolves.toBe(
        '[job_1 exited with code 0]\nhello\ndone\n'
      );
      await expect(bashOutputTool.run({ job_id: 'job_1' }, ctx)).resolves.toBe(
        '[job_1 exited with code 0]\n(no new output)'
      );
    });

    test('kills a running job', async () => {
      await bashTool.run({ command: 'sleep 30', run_in_background: true }, ctx);

      await expect(killShellTool.run({ job_id: 'job_1' }, ctx)).resolves.toBe('Killed background job job_1');
      await expect(killShellTool.run({ job_id: 'job_1' }, ctx)).resolves.toBe('Background job job_1 already killed');
      await expect(bashOutputTool.run({ job_id: 'job_1' }, ctx)).resolves.toBe('[job_1 killed]\n(no new output)');
    });

    test('rejects unknown job ids', async () => {
      await expect(bashOutputTool.run({ job_id: 'job_9' }, ctx)).rejects.toMatchObject({
        kind: 'NotFound',
        message: 'No background job with id job_9',
      });
      await expect(killShellTool.run({ job_id: 'job_9' }, ctx)).rejects.toMatchObject({ kind: 'NotFound' });
    });
  });
});
