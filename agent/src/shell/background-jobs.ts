/**
 * Background shell jobs started with `run_in_background`.
 *
 * Output accumulates per job and `poll` hands back what arrived since the
 * previous poll. Jobs are owned by one session; `killAll` reaps them on close.
 */

import { getLog } from "../lib/logger.js";
import { ToolError } from "../tools/errors.js";
import { OutputBuffer, type ChildExit, type RunningCommand, type ShellRunner } from "./shell-runner.js";

const log = getLog(import.meta);

export type JobStatus = "running" | "exited" | "killed" | "failed";

export interface JobSnapshot {
  jobId: string;
  command: string;
  pid?: number;
  status: JobStatus;
  exitCode: number | null;
  startedAt: string;
}

export interface JobOutput extends JobSnapshot {
  stdout: string;
  stderr: string;
  droppedBytes: number;
}

interface Job {
  id: string;
  command: string;
  running: RunningCommand;
  status: JobStatus;
  exitCode: number | null;
  startedAt: Date;
  stdout: OutputBuffer;
  stderr: OutputBuffer;
  error?: string;
}

export class BackgroundJobs {
  private readonly jobs = new Map<string, Job>();
  private nextId = 1;

  constructor(private readonly runner: ShellRunner) {}

  start(command: string): JobSnapshot {
    const running = this.runner.spawn(command);
    const job: Job = {
      id: `job_${this.nextId++}`,
      command,
      running,
      status: "running",
      exitCode: null,
      startedAt: new Date(),
      stdout: new OutputBuffer(this.runner.maxOutputBytes),
      stderr: new OutputBuffer(this.runner.maxOutputBytes),
    };
    running.child.stdout?.on("data", (chunk: Buffer) => job.stdout.push(chunk));
    running.child.stderr?.on("data", (chunk: Buffer) => job.stderr.push(chunk));
    void running.closed.then(
      (exit) => this.settle(job, exit),
      (err: unknown) => {
        job.status = "failed";
        job.error = err instanceof Error ? err.message : String(err);
        log.warn({ jobId: job.id, err: job.error }, "background job failed to start");
      }
    );

    this.jobs.set(job.id, job);
    log.info({ jobId: job.id, pid: running.child.pid }, `background job started: ${command}`);
    return this.snapshot(job);
  }

  /** Output produced since the previous poll, plus the job's status. */
  poll(jobId: string): JobOutput {
    const job = this.get(jobId);
    const stdout = job.stdout.take();
    const stderr = job.stderr.take();
    return {
      ...this.snapshot(job),
      stdout: stdout.text,
      stderr: job.error !== undefined && stderr.text === "" ? job.error : stderr.text,
      droppedBytes: stdout.droppedBytes + stderr.droppedBytes,
    };
  }

  async kill(jobId: string): Promise<JobSnapshot> {
    const job = this.get(jobId);
    if (job.status === "running") {
      job.status = "killed";
      await this.runner.terminate(job.running);
      log.info({ jobId }, "background job killed");
    }
    return this.snapshot(job);
  }

  async killAll(): Promise<void> {
    const running = [...this.jobs.values()].filter((job) => job.status === "running");
    await Promise.all(running.map((job) => this.kill(job.id)));
  }

  list(): JobSnapshot[] {
    return [...this.jobs.values()].map((job) => this.snapshot(job));
  }

  /** PIDs of running jobs; the shell may signal these. */
  ownedPids(): number[] {
    return [...this.jobs.values()].flatMap((job) => {
      const pid = job.running.child.pid;
      return job.status === "running" && pid !== undefined ? [pid] : [];
    });
  }

  private get(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new ToolError("NotFound", `No background job with id ${jobId}`);
    }
    return job;
  }

  private settle(job: Job, exit: ChildExit): void {
    job.exitCode = exit.code;
    if (job.status === "running") {
      job.status = "exited";
    }
    log.debug({ jobId: job.id, exitCode: exit.code, signal: exit.signal }, "background job finished");
  }

  private snapshot(job: Job): JobSnapshot {
    return {
      jobId: job.id,
      command: job.command,
      ...(job.running.child.pid !== undefined && { pid: job.running.child.pid }),
      status: job.status,
      exitCode: job.exitCode,
      startedAt: job.startedAt.toISOString(),
    };
  }
}
