/**
 * CommandValidator: allowlist gate for shell command lines.
 *
 * Every executable a line would run is checked: commands chained with
 * `&&`, `||`, `;` and pipes, subshells, and `$(…)`/backtick substitutions
 * (validated recursively). The validator fails closed: anything the
 * tokenizer cannot parse is denied.
 */

import path from 'node:path';
import {
  COMMAND_RULES,
  PROJECT_SCRIPTS,
  SANDBOX_BYPASS_FLAG,
  SYSTEM_BIN_DIRS,
  projectPathViolation,
  type CommandRule,
  type RuleContext,
} from './allowlist.js';
import {
  ShellSyntaxError,
  parseCommandLine,
  type ParsedCommandLine,
  type Redirection,
  type WordToken,
} from './shell-tokenizer.js';

export const MAX_COMMAND_LENGTH = 10_000;
const MAX_SUBSTITUTION_DEPTH = 4;

export interface SecurityDecision {
  allowed: boolean;
  reason: string;
}

export interface ValidationContext {
  /** PIDs of processes the agent started; `kill` may only target these. */
  ownedPids?: Iterable<number>;
}

type Outcome = { ok: true; executables: string[] } | { ok: false; reason: string };

function deny(reason: string): Outcome {
  return { ok: false, reason };
}

export class CommandValidator {
  constructor(private readonly rules: ReadonlyMap<string, CommandRule> = COMMAND_RULES) {}

  validate(commandLine: string, context: ValidationContext = {}): SecurityDecision {
    if (typeof commandLine !== 'string' || commandLine.trim() === '') {
      return { allowed: false, reason: 'Empty command' };
    }
    if (commandLine.length > MAX_COMMAND_LENGTH) {
      return { allowed: false, reason: `Command exceeds ${MAX_COMMAND_LENGTH} characters` };
    }
    if (commandLine.includes('\0')) {
      return { allowed: false, reason: 'Command contains a NUL byte' };
    }

    const ruleContext: RuleContext = {
      ownedPids: new Set(context.ownedPids ?? []),
    };
    const outcome = this.check(commandLine, ruleContext, 0);
    if (!outcome.ok) {
      return { allowed: false, reason: outcome.reason };
    }
    const names = [...new Set(outcome.executables)];
    return { allowed: true, reason: `Allowed: ${names.join(', ')}` };
  }

  /** Basename of an executable word, or undefined if it cannot be trusted. */
  executableName(word: WordToken): string | undefined {
    if (word.expansions || word.glob || word.value === '') {
      return undefined;
    }
    const value = word.value;
    if (!value.includes('/')) {
      return value;
    }
    const base = path.posix.basename(value);
    if (PROJECT_SCRIPTS.get(base) === value) {
      return base;
    }
    if (SYSTEM_BIN_DIRS.includes(path.posix.dirname(value))) {
      return base;
    }
    return undefined;
  }

  private check(commandLine: string, ctx: RuleContext, depth: number): Outcome {
    if (depth > MAX_SUBSTITUTION_DEPTH) {
      return deny('Command substitution is nested too deeply');
    }

    let parsed: ParsedCommandLine;
    try {
      parsed = parseCommandLine(commandLine);
    } catch (err) {
      if (err instanceof ShellSyntaxError) {
        return deny(`Could not parse command: ${err.message}`);
      }
      throw err;
    }

    const executables: string[] = [];
    for (const command of parsed.commands) {
      const [head, ...args] = command.argv;

      const name = this.executableName(head);
      if (name === undefined) {
        return deny(`Executable '${head.raw}' must be a plain command name`);
      }
      if (PROJECT_SCRIPTS.has(name) && head.value !== PROJECT_SCRIPTS.get(name)) {
        return deny(`${name} may only be run as '${PROJECT_SCRIPTS.get(name)}'`);
      }
      const rule = this.rules.get(name);
      if (!rule) {
        return deny(`Command '${name}' is not in the allowlist`);
      }

      const bypass = args.find((arg) => SANDBOX_BYPASS_FLAG.test(arg.value));
      if (bypass) {
        return deny(`Sandbox bypass flag '${bypass.value}' is not honored`);
      }

      const reason = rule.check?.(args, ctx);
      if (reason !== undefined) {
        return deny(reason);
      }
      executables.push(name);

      for (const word of [...command.assignments, ...command.argv]) {
        for (const substitution of word.substitutions) {
          const nested = this.check(substitution, ctx, depth + 1);
          if (!nested.ok) {
            return deny(`In command substitution: ${nested.reason}`);
          }
          executables.push(...nested.executables);
        }
      }
    }

    for (const redirect of parsed.redirects) {
      const reason = this.checkRedirect(redirect);
      if (reason !== undefined) {
        return deny(reason);
      }
    }

    return { ok: true, executables };
  }

  private checkRedirect(redirect: Redirection): string | undefined {
    const target = redirect.target;
    if (target === undefined || target.value === '/dev/null') {
      return undefined;
    }
    const violation = projectPathViolation(target);
    return violation ? `Redirection ${redirect.op}: ${violation}` : undefined;
  }
}
