// toolgate: sandboxed tool execution for coding agents

// Tools
export * from './tools/index.js';

// Security
export { PathGuard, hasPathPrefix, resolveWithinRoot } from './security/path-guard.js';
export { CommandValidator, MAX_COMMAND_LENGTH } from './security/command-validator.js';
export type { SecurityDecision, ValidationContext } from './security/command-validator.js';
export { COMMAND_RULES } from './security/allowlist.js';
export type { CommandRule, RiskLevel } from './security/allowlist.js';
export { parseCommandLine, tokenize, ShellSyntaxError } from './security/shell-tokenizer.js';

// Shell
export { ShellRunner } from './shell/shell-runner.js';
export type { ShellRunnerOptions, ShellRunOptions, ShellRunResult } from './shell/shell-runner.js';
export { BackgroundJobs } from './shell/background-jobs.js';
export type { JobOutput, JobSnapshot, JobStatus } from './shell/background-jobs.js';

// Protocol adapter (JSON-RPC over stdio)
export { ProtocolAdapter, ProtocolError, MCP_PROTOCOL_VERSION, spawnProcess } from './protocol/protocol-adapter.js';
export type {
  AdapterState,
  ProtocolErrorKind,
  ProtocolAdapterOptions,
  ProtocolProcess,
  ProcessSpawner,
} from './protocol/protocol-adapter.js';

// Providers
export { toAnthropicTools, toolCallFromAnthropic, toolResultToAnthropic } from './providers/anthropic.js';

// Session
export { ToolSession, openToolSession } from './session/tool-session.js';
export type { ToolSessionOptions } from './session/tool-session.js';

// Configuration, logging, audit
export { loadConfig, loadEnvFiles, ConfigError } from './config/config.js';
export type { ToolgateConfig, BrowserServerConfig, ShellConfig, LogLevel } from './config/config.js';
export { getLog, setLogLevel } from './lib/logger.js';
export { sanitizeEnv, isSecretName } from './lib/env.js';
export { SqliteToolAudit } from './audit/tool-audit.js';
export type { ToolAuditEntry, ToolAuditSink } from './audit/tool-audit.js';
export { openAuditDb } from './db/index.js';
