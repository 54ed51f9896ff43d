/**
 * ProtocolAdapter: owns a tool-server subprocess speaking line-delimited
 * JSON-RPC over stdio (an MCP server such as the puppeteer browser server).
 *
 * Lifecycle:
 *
 *   not_started → starting → ready → degraded → stopped
 *                     └──────────────────────────┘
 *
 * - `start()` spawns the server, performs the `initialize` handshake within the
 *   start timeout, then sends `notifications/initialized`. Any failure reaps
 *   the process and leaves the adapter `stopped`.
 * - `call()` may be issued concurrently; responses are matched by id and each
 *   call has its own timeout. A timeout affects only that call.
 * - Process exit, a failed write or a failed health check moves the adapter to
 *   `degraded`: pending calls fail with `Disconnected` and later calls are
 *   rejected immediately. The process is then reaped and its readers closed,
 *   after which the adapter is `stopped`. It is replaced, not revived.
 * - `shutdown()` cancels pending calls, closes stdin, sends SIGTERM, escalates
 *   to SIGKILL after a grace period and reaps the process.
 */

import { spawn } from 'node:child_process';
import { once } from 'node:events';
import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { z } from 'zod';
import { getLog } from '../lib/logger.js';
import {
  METHOD_NOT_FOUND,
  encodeMessage,
  parseMessage,
  type IncomingMessage,
  type JsonRpcId,
  type JsonRpcMessage,
} from './json-rpc.js';

const log = getLog(import.meta);

export const MCP_PROTOCOL_VERSION = '2024-11-05';

export type AdapterState = 'not_started' | 'starting' | 'ready' | 'degraded' | 'stopped';

export type ProtocolErrorKind =
  | 'Timeout'
  | 'Disconnected'
  | 'Cancelled'
  | 'Unavailable'
  | 'MalformedResponse'
  | 'StartupFailed'
  | 'RemoteError';

export class ProtocolError extends Error {
  readonly kind: ProtocolErrorKind;
  readonly code?: number;
  readonly data?: unknown;

  constructor(kind: ProtocolErrorKind, message: string, extra: { code?: number; data?: unknown } = {}) {
    super(message);
    this.name = 'ProtocolError';
    this.kind = kind;
    this.code = extra.code;
    this.data = extra.data;
  }
}

/** The parts of a child process the adapter relies on. */
export interface ProtocolProcess {
  readonly pid?: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
}

export type ProcessSpawner = (
  command: string,
  args: readonly string[],
  options: { cwd: string; env: Record<string, string> }
) => ProtocolProcess;

export const spawnProcess: ProcessSpawner = (command, args, options) =>
  spawn(command, [...args], { cwd: options.cwd, env: options.env });

export interface ProtocolAdapterOptions {
  /** Label used in logs and error messages. */
  name?: string;
  command: string;
  args?: readonly string[];
  cwd: string;
  env: Record<string, string>;
  startTimeoutMs?: number;
  callTimeoutMs?: number;
  healthCheckTimeoutMs?: number;
  healthCheckIntervalMs?: number;
  shutdownGraceMs?: number;
  clientInfo?: { name: string; version: string };
  spawn?: ProcessSpawner;
}

export interface CallOptions {
  timeoutMs?: number;
}

const initializeResultSchema = z
  .object({
    protocolVersion: z.string(),
    capabilities: z.record(z.unknown()).optional(),
    serverInfo: z.object({ name: z.string(), version: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export type InitializeResult = z.infer<typeof initializeResultSchema>;

type StateListener = (state: AdapterState, previous: AdapterState) => void;
type NotificationListener = (method: string, params: unknown) => void;

interface PendingCall {
  method: string;
  resolve(value: unknown): void;
  reject(err: ProtocolError): void;
  timer: NodeJS.Timeout;
}

export class ProtocolAdapter {
  readonly name: string;
  private readonly options: ProtocolAdapterOptions;
  private readonly spawner: ProcessSpawner;
  private readonly startTimeoutMs: number;
  private readonly callTimeoutMs: number;
  private readonly healthCheckTimeoutMs: number;
  private readonly shutdownGraceMs: number;

  private currentState: AdapterState = 'not_started';
  private proc: ProtocolProcess | undefined;
  private exited: Promise<void> | undefined;
  private readers: Interface[] = [];
  private readonly pending = new Map<JsonRpcId, PendingCall>();
  private nextId = 1;
  private stopping: Promise<void> | undefined;
  private startupLost: string | undefined;
  private lostReason: string | undefined;
  private healthTimer: NodeJS.Timeout | undefined;
  private initializeResult: InitializeResult | undefined;
  private readonly stateListeners = new Set<StateListener>();
  private readonly notificationListeners = new Set<NotificationListener>();

  constructor(options: ProtocolAdapterOptions) {
    this.options = options;
    this.name = options.name ?? options.command;
    this.spawner = options.spawn ?? spawnProcess;
    this.startTimeoutMs = options.startTimeoutMs ?? 30_000;
    this.callTimeoutMs = options.callTimeoutMs ?? 60_000;
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs ?? 5_000;
    this.shutdownGraceMs = options.shutdownGraceMs ?? 2_000;
  }

  get state(): AdapterState {
    return this.currentState;
  }

  get pid(): number | undefined {
    return this.proc?.pid;
  }

  /** Result of the `initialize` handshake, once ready. */
  get serverInfo(): InitializeResult | undefined {
    return this.initializeResult;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  onNotification(listener: NotificationListener): () => void {
    this.notificationListeners.add(listener);
    return () => this.notificationListeners.delete(listener);
  }

  // ── Lifecycle ─────────────────────────────────

  /**
   * @throws {ProtocolError} `StartupFailed` when the server cannot be spawned
   *   or the handshake fails; the adapter is then `stopped`.
   */
  async start(): Promise<void> {
    if (this.currentState !== 'not_started') {
      throw new ProtocolError('StartupFailed', `${this.name} was already started (state: ${this.currentState})`);
    }
    this.setState('starting');

    try {
      this.spawnServer();
      const result = await this.request(
        'initialize',
        {
          protocolVersion: MCP_PROTOCOL_VERSION,
          capabilities: { roots: { listChanged: false } },
          clientInfo: this.options.clientInfo ?? { name: 'toolgate', version: '0.1.0' },
        },
        this.startTimeoutMs
      );
      const parsed = initializeResultSchema.safeParse(result);
      if (!parsed.success) {
        throw new ProtocolError('MalformedResponse', 'initialize returned an invalid result');
      }
      this.initializeResult = parsed.data;
      await this.write({ jsonrpc: '2.0', method: 'notifications/initialized' });
      if (this.startupLost !== undefined) {
        throw new Error(this.startupLost);
      }
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.error({ server: this.name, err: reason }, 'tool server failed to start');
      await this.teardown(`startup failed: ${reason}`);
      throw new ProtocolError('StartupFailed', `${this.name} failed to start: ${reason}`);
    }

    if (this.stopping) {
      throw new ProtocolError('StartupFailed', `${this.name} was shut down during startup`);
    }
    this.setState('ready');
    log.info(
      { server: this.name, pid: this.proc?.pid, protocolVersion: this.initializeResult?.protocolVersion },
      'tool server ready'
    );

    const interval = this.options.healthCheckIntervalMs ?? 0;
    if (interval > 0) {
      this.startHealthChecks(interval);
    }
  }

  /**
   * Cancel pending calls and stop the server. Safe to call in any state and
   * more than once.
   */
  shutdown(): Promise<void> {
    if (this.currentState === 'stopped') {
      return Promise.resolve();
    }
    this.stopping ??= this.teardown('adapter shut down');
    return this.stopping;
  }

  // ── Calls ─────────────────────────────────────

  call(method: string, params?: unknown, options: CallOptions = {}): Promise<unknown> {
    const unavailable = this.unavailableError();
    if (unavailable) {
      return Promise.reject(unavailable);
    }
    return this.request(method, params, options.timeoutMs ?? this.callTimeoutMs);
  }

  async notify(method: string, params?: unknown): Promise<void> {
    const unavailable = this.unavailableError();
    if (unavailable) {
      throw unavailable;
    }
    await this.write({ jsonrpc: '2.0', method, ...(params !== undefined && { params }) });
  }

  /**
   * Send a `ping`. A server that answers, even with an error, is healthy; a
   * timeout or disconnect degrades the adapter and kills a hung process.
   */
  async healthCheck(): Promise<boolean> {
    if (this.currentState !== 'ready') {
      return false;
    }
    try {
      await this.request('ping', undefined, this.healthCheckTimeoutMs);
      return true;
    } catch (err) {
      if (err instanceof ProtocolError && err.kind === 'RemoteError') {
        return true;
      }
      if (this.currentState === 'ready') {
        const reason = err instanceof Error ? err.message : String(err);
        this.proc?.kill('SIGKILL');
        this.degrade(`health check failed: ${reason}`);
      }
      return false;
    }
  }

  startHealthChecks(intervalMs: number): void {
    this.stopHealthChecks();
    this.healthTimer = setInterval(() => {
      void this.healthCheck();
    }, intervalMs);
    this.healthTimer.unref();
  }

  stopHealthChecks(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = undefined;
    }
  }

  // ── Internals ─────────────────────────────────

  private unavailableError(): ProtocolError | undefined {
    if (this.lostReason !== undefined) {
      return new ProtocolError('Disconnected', `${this.name} is disconnected: ${this.lostReason}`);
    }
    if (this.stopping || this.currentState === 'stopped') {
      return new ProtocolError('Unavailable', `${this.name} is stopped`);
    }
    if (this.currentState !== 'ready') {
      return new ProtocolError('Unavailable', `${this.name} is not ready (state: ${this.currentState})`);
    }
    return undefined;
  }

  private setState(next: AdapterState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    log.info({ server: this.name, from: previous, to: next }, 'adapter state changed');
    for (const listener of this.stateListeners) {
      listener(next, previous);
    }
  }

  private spawnServer(): void {
    const proc = this.spawner(this.options.command, this.options.args ?? [], {
      cwd: this.options.cwd,
      env: this.options.env,
    });
    this.proc = proc;

    this.exited = new Promise<void>((resolve) => {
      proc.once('exit', (code, signal) => {
        log.debug({ server: this.name, code, signal }, 'tool server exited');
        resolve();
        this.connectionLost(`${this.name} exited (${signal ?? `code ${code ?? 'unknown'}`})`);
      });
      proc.once('error', (err) => {
        resolve();
        this.connectionLost(`${this.name} process error: ${err.message}`);
      });
    });

    proc.stdin.on('error', (err: Error) => {
      this.connectionLost(`write to ${this.name} failed: ${err.message}`);
    });

    const stdout = createInterface({ input: proc.stdout, crlfDelay: Infinity });
    stdout.on('line', (line) => this.handleLine(line));
    stdout.on('close', () => this.connectionLost(`${this.name} closed its output`));

    const stderr = createInterface({ input: proc.stderr, crlfDelay: Infinity });
    stderr.on('line', (line) => log.debug({ server: this.name }, line));

    this.readers = [stdout, stderr];
  }

  private request(method: string, params: unknown, timeoutMs: number): Promise<unknown> {
    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(id)) {
          log.warn({ server: this.name, id, method, timeoutMs }, 'call timed out');
          reject(new ProtocolError('Timeout', `${method} timed out after ${timeoutMs}ms`));
        }
      }, timeoutMs);
      this.pending.set(id, { method, resolve, reject, timer });

      this.write({ jsonrpc: '2.0', id, method, ...(params !== undefined && { params }) }).catch((err: unknown) => {
        const reason = err instanceof Error ? err.message : String(err);
        this.settle(id, (call) => call.reject(new ProtocolError('Disconnected', `write failed: ${reason}`)));
        this.connectionLost(`write to ${this.name} failed: ${reason}`);
      });
    });
  }

  private async write(message: JsonRpcMessage): Promise<void> {
    const stdin = this.proc?.stdin;
    if (!stdin || stdin.destroyed || stdin.writableEnded) {
      throw new ProtocolError('Disconnected', `${this.name} stdin is closed`);
    }
    if (!stdin.write(encodeMessage(message))) {
      await once(stdin, 'drain');
    }
  }

  /** Remove a pending call and settle it; false if it was already gone. */
  private settle(id: JsonRpcId, action: (call: PendingCall) => void): boolean {
    const call = this.pending.get(id);
    if (!call) return false;
    this.pending.delete(id);
    clearTimeout(call.timer);
    action(call);
    return true;
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;
    this.handleMessage(parseMessage(trimmed));
  }

  private handleMessage(message: IncomingMessage): void {
    switch (message.kind) {
      case 'result':
        if (!this.settle(message.id, (call) => call.resolve(message.result))) {
          log.warn({ server: this.name, id: message.id }, 'dropping response with unknown or duplicate id');
        }
        return;

      case 'error': {
        const { code, message: text, data } = message.error;
        const settled = this.settle(message.id, (call) =>
          call.reject(new ProtocolError('RemoteError', `${call.method} failed (${code}): ${text}`, { code, data }))
        );
        if (!settled) {
          log.warn({ server: this.name, id: message.id }, 'dropping error with unknown or duplicate id');
        }
        return;
      }

      case 'request':
        log.debug({ server: this.name, method: message.method }, 'rejecting server-initiated request');
        this.write({
          jsonrpc: '2.0',
          id: message.id,
          error: { code: METHOD_NOT_FOUND, message: `Method not supported by client: ${message.method}` },
        }).catch((err: unknown) => {
          log.warn({ server: this.name, err: String(err) }, 'failed to answer server request');
        });
        return;

      case 'notification':
        log.debug({ server: this.name, method: message.method }, 'notification');
        for (const listener of this.notificationListeners) {
          listener(message.method, message.params);
        }
        return;

      case 'invalid': {
        const id = message.id;
        const settled =
          id !== undefined &&
          this.settle(id, (call) =>
            call.reject(new ProtocolError('MalformedResponse', `${call.method} returned a malformed response: ${message.reason}`))
          );
        if (!settled) {
          log.warn({ server: this.name, id, reason: message.reason }, 'dropping malformed message');
        }
        return;
      }
    }
  }

  private failPending(makeError: (method: string) => ProtocolError): void {
    const ids = [...this.pending.keys()];
    for (const id of ids) {
      this.settle(id, (call) => call.reject(makeError(call.method)));
    }
  }

  /** The server went away or became unusable. */
  private connectionLost(reason: string): void {
    if (this.stopping || this.currentState === 'stopped' || this.currentState === 'degraded') {
      return;
    }
    if (this.currentState === 'starting') {
      this.startupLost ??= reason;
      this.failPending((method) => new ProtocolError('Disconnected', `${method} aborted: ${reason}`));
      return;
    }
    this.degrade(reason);
  }

  /** Fail pending calls, then reap the process; the adapter ends up `stopped`. */
  private degrade(reason: string): void {
    this.stopHealthChecks();
    this.lostReason = reason;
    this.setState('degraded');
    log.warn({ server: this.name, reason, pending: this.pending.size }, 'tool server degraded');
    this.failPending((method) => new ProtocolError('Disconnected', `${method} aborted: ${reason}`));
    this.stopping ??= this.teardown(reason);
  }

  private async teardown(reason: string): Promise<void> {
    this.stopHealthChecks();
    this.failPending((method) => new ProtocolError('Cancelled', `${method} cancelled: ${reason}`));

    const proc = this.proc;
    if (proc && this.exited) {
      const alive = (): boolean => proc.exitCode === null && proc.signalCode === null;
      if (!proc.stdin.destroyed) {
        proc.stdin.end();
      }
      if (alive()) {
        proc.kill('SIGTERM');
      }
      if (!(await this.waitForExit(this.shutdownGraceMs)) && alive()) {
        log.warn({ server: this.name, pid: proc.pid }, 'tool server ignored SIGTERM, killing');
        proc.kill('SIGKILL');
        if (!(await this.waitForExit(this.shutdownGraceMs))) {
          log.error({ server: this.name, pid: proc.pid }, 'tool server did not exit after SIGKILL');
        }
      }
    }

    for (const reader of this.readers) {
      reader.close();
    }
    this.readers = [];
    this.setState('stopped');
  }

  private async waitForExit(timeoutMs: number): Promise<boolean> {
    if (!this.exited) return true;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.exited.then(() => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}
