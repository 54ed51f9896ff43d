import { z } from 'zod';
import type { ToolDefinition } from '../types.js';
import { defineTool } from '../define-tool.js';
import { ToolError } from '../errors.js';
import { getLog } from '../../lib/logger.js';
import type { JobOutput } from '../../shell/background-jobs.js';

const log = getLog(import.meta);

interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal?: NodeJS.Signals | null;
  truncated?: boolean;
}

export function formatCommandOutput({ stdout, stderr, exitCode, signal, truncated }: CommandOutput): string {
  let output = stdout;
  if (stderr) {
    output += `\n[stderr]: ${stderr}`;
  }
  if (exitCode !== null && exitCode !== 0) {
    output += `\n[exit code: ${exitCode}]`;
  }
  if (signal) {
    output += `\n[signal: ${signal}]`;
  }
  if (truncated) {
    output += '\n[output truncated]';
  }
  return output.trim() ? output : '(no output)';
}

function describeJob(job: JobOutput): string {
  switch (job.status) {
    case 'running':
      return `[${job.jobId} running]`;
    case 'exited':
      return `[${job.jobId} exited with code ${job.exitCode ?? 'unknown'}]`;
    case 'killed':
      return `[${job.jobId} killed]`;
    case 'failed':
      return `[${job.jobId} failed to start]`;
  }
}

// bash
const bashSchema = z.object({
  command: z.string().min(1).describe('Shell command to execute from the project root'),
  timeout: z.number().int().min(0).optional().describe('Timeout in milliseconds (default: 300000, max: 600000)'),
  run_in_background: z
    .boolean()
    .default(false)
    .describe('Start the command in the background and return a job id; read its output with bash_output'),
});

export const bashTool = defineTool({
  name: 'bash',
  description:
    'Execute a shell command in the project root. Only allowlisted commands run; pipes, && and ; chains are checked command by command. Returns stdout, stderr and a non-zero exit code.',
  category: 'shell',
  schema: bashSchema,
  async handle({ command, timeout, run_in_background: background }, ctx) {
    const decision = ctx.commandValidator.validate(command, { ownedPids: ctx.jobs.ownedPids() });
    if (!decision.allowed) {
      log.info({ callId: ctx.callId, reason: decision.reason }, `command denied: ${command}`);
      throw new ToolError('SecurityDenied', `Command blocked: ${decision.reason}`);
    }

    if (background) {
      const job = ctx.jobs.start(command);
      const pid = job.pid === undefined ? '' : ` (pid ${job.pid})`;
      return `Started background job ${job.jobId}${pid}. Use bash_output with job_id "${job.jobId}" to read its output.`;
    }

    const timeoutMs = ctx.shell.clampTimeout(timeout);
    const result = await ctx.shell.run(command, { timeoutMs, signal: ctx.signal });
    if (result.timedOut) {
      throw new ToolError('Timeout', `Command timed out after ${timeoutMs}ms`, {
        stdout: result.stdout,
        stderr: result.stderr,
      });
    }
    if (result.aborted) {
      throw new ToolError('Cancelled', 'Command was cancelled');
    }
    return formatCommandOutput(result);
  },
});

// bash_output
const bashOutputSchema = z.object({
  job_id: z.string().min(1).describe('Id returned by bash with run_in_background'),
});

export const bashOutputTool = defineTool({
  name: 'bash_output',
  description: 'Read output a background job produced since the last call, along with its status.',
  category: 'shell',
  schema: bashOutputSchema,
  async handle({ job_id: jobId }, ctx) {
    const job = ctx.jobs.poll(jobId);
    const lines = [describeJob(job)];
    if (job.stdout) lines.push(job.stdout);
    if (job.stderr) lines.push(`[stderr]: ${job.stderr}`);
    if (job.droppedBytes > 0) lines.push(`[${job.droppedBytes} bytes dropped]`);
    if (lines.length === 1) lines.push('(no new output)');
    return lines.join('\n');
  },
});

// kill_shell
const killShellSchema = z.object({
  job_id: z.string().min(1).describe('Id of the background job to terminate'),
});

export const killShellTool = defineTool({
  name: 'kill_shell',
  description: 'Terminate a background job and everything it started.',
  category: 'shell',
  schema: killShellSchema,
  async handle({ job_id: jobId }, ctx) {
    const before = ctx.jobs.list().find((job) => job.jobId === jobId);
    const job = await ctx.jobs.kill(jobId);
    if (before?.status !== 'running') {
      return `Background job ${jobId} already ${job.status}`;
    }
    return `Killed background job ${jobId}`;
  },
});

export const bashTools: ToolDefinition[] = [bashTool, bashOutputTool, killShellTool];
