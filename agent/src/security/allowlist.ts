/**
 * Executable allowlist and per-command argument rules.
 *
 * This table is the whole shell policy: a command whose basename is not a key
 * here is denied. Argument checks return a denial reason, or undefined to
 * allow. They are heuristics for review, not a complete sandbox.
 */

import type { WordToken } from './shell-tokenizer.js';

export type RiskLevel = 'low' | 'medium' | 'high';

export interface RuleContext {
  ownedPids: ReadonlySet<number>;
}

export type ArgumentCheck = (args: readonly WordToken[], ctx: RuleContext) => string | undefined;

export interface CommandRule {
  risk: RiskLevel;
  check?: ArgumentCheck;
}

// ── Helpers ─────────────────────────────────────

function values(args: readonly WordToken[]): string[] {
  return args.map((arg) => arg.value);
}

/** Operands before `--` that look like flags, and everything else. */
function splitFlags(args: readonly WordToken[]): { flags: string[]; operands: WordToken[] } {
  const flags: string[] = [];
  const operands: WordToken[] = [];
  let endOfFlags = false;
  for (const arg of args) {
    if (!endOfFlags && arg.value === '--') {
      endOfFlags = true;
    } else if (!endOfFlags && arg.value.startsWith('-') && arg.value.length > 1) {
      flags.push(arg.value);
    } else {
      operands.push(arg);
    }
  }
  return { flags, operands };
}

function hasShortFlag(flags: readonly string[], letter: string): boolean {
  return flags.some((flag) => !flag.startsWith('--') && flag.slice(1).includes(letter));
}

function hasParentSegment(value: string): boolean {
  return value.split('/').includes('..');
}

/**
 * Reason a path operand may not be written to, if any: absolute paths, home
 * paths, `..` segments and expansions all reach outside the project.
 */
export function projectPathViolation(arg: WordToken): string | undefined {
  if (arg.expansions) return `path '${arg.raw}' uses shell expansion`;
  if (arg.value.startsWith('/')) return `absolute path '${arg.value}' is outside the project`;
  if (arg.value.startsWith('~')) return `home path '${arg.value}' is outside the project`;
  if (hasParentSegment(arg.value)) return `path '${arg.value}' contains '..'`;
  return undefined;
}

function checkOperands(name: string, operands: readonly WordToken[]): string | undefined {
  for (const operand of operands) {
    const violation = projectPathViolation(operand);
    if (violation) return `${name}: ${violation}`;
  }
  return undefined;
}

function checkWritePaths(name: string): ArgumentCheck {
  return (args) => checkOperands(name, splitFlags(args).operands);
}

// ── Command rules ───────────────────────────────

const checkRm: ArgumentCheck = (args) => {
  const { flags, operands } = splitFlags(args);
  if (flags.includes('--no-preserve-root')) {
    return 'rm --no-preserve-root is not allowed';
  }
  const recursive = hasShortFlag(flags, 'r') || hasShortFlag(flags, 'R') || flags.includes('--recursive');
  const force = hasShortFlag(flags, 'f') || flags.includes('--force');
  if (recursive && force) {
    return 'rm with both recursive and force flags is not allowed';
  }
  for (const operand of operands) {
    if (/^[*./]+$/.test(operand.value)) {
      return `rm target '${operand.value}' is too broad`;
    }
  }
  return checkOperands('rm', operands);
};

const checkChmod: ArgumentCheck = (args) => {
  const { flags, operands } = splitFlags(args);
  if (flags.some((flag) => flag === '--recursive' || (!flag.startsWith('--') && flag.includes('R')))) {
    return 'chmod -R is not allowed';
  }
  const [mode, ...targets] = operands;
  if (mode === undefined || !/^[ugoa]*\+x$/.test(mode.value)) {
    return `chmod only allows '+x' modes, got '${mode?.value ?? ''}'`;
  }
  if (flags.length > 0) {
    return `chmod flags are not allowed: ${flags.join(' ')}`;
  }
  return checkOperands('chmod', targets);
};

const FIND_ACTIONS = new Set(['-exec', '-execdir', '-ok', '-okdir', '-delete', '-fprint', '-fprint0', '-fprintf', '-fls']);

const checkFind: ArgumentCheck = (args) => {
  const action = values(args).find((value) => FIND_ACTIONS.has(value));
  return action ? `find ${action} is not allowed` : undefined;
};

const checkCd: ArgumentCheck = (args) => {
  const { operands } = splitFlags(args);
  const [target] = operands;
  if (target === undefined || target.value === '-') {
    return 'cd must name a directory inside the project';
  }
  return checkOperands('cd', [target]);
};

const checkGit: ArgumentCheck = (args) => {
  const argv = values(args);
  // Global options come before the subcommand
  let index = 0;
  while (index < argv.length && argv[index].startsWith('-')) {
    const option = argv[index];
    if (option === '-c' || option.startsWith('--config-env') || option.startsWith('--exec-path')) {
      return `git ${option} is not allowed`;
    }
    index += option === '-C' || option === '--git-dir' || option === '--work-tree' ? 2 : 1;
  }
  const subcommand = argv[index];
  const rest = argv.slice(index + 1);

  switch (subcommand) {
    case 'push':
      if (rest.some((arg) => arg === '-f' || arg.startsWith('--force') || arg.startsWith('+') || arg === '--mirror' || arg === '--delete')) {
        return 'git push with force, mirror or delete is not allowed';
      }
      return undefined;
    case 'config':
      if (rest.some((arg) => arg === '--global' || arg === '--system')) {
        return 'git config --global/--system is not allowed';
      }
      return undefined;
    case 'clean':
      if (rest.some((arg) => arg === '--force' || (/^-[a-zA-Z]+$/.test(arg) && arg.includes('f')))) {
        return 'git clean -f is not allowed';
      }
      return undefined;
    case 'filter-branch':
      return 'git filter-branch is not allowed';
    default:
      return undefined;
  }
};

const PACKAGE_MANAGER_DENIED = new Set([
  'publish',
  'unpublish',
  'login',
  'logout',
  'adduser',
  'deprecate',
  'owner',
  'token',
  'access',
  'global',
]);

function checkPackageManager(name: string): ArgumentCheck {
  return (args) => {
    const argv = values(args);
    const global = argv.find((arg) => arg === '-g' || arg === '--global' || arg === '--location=global');
    if (global) {
      return `${name} ${global} is not allowed`;
    }
    const subcommand = argv.find((arg) => !arg.startsWith('-'));
    if (subcommand !== undefined && PACKAGE_MANAGER_DENIED.has(subcommand)) {
      return `${name} ${subcommand} is not allowed`;
    }
    return undefined;
  };
}

const SIGNAL = /^-(?:\d+|[A-Z][A-Z0-9+-]*)$/;

const checkKill: ArgumentCheck = (args, ctx) => {
  const argv = values(args);
  const targets: string[] = [];
  let endOfFlags = false;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!endOfFlags && arg === '--') {
      endOfFlags = true;
    } else if (!endOfFlags && (arg === '-s' || arg === '-n')) {
      i++;
    } else if (endOfFlags || targets.length > 0 || !SIGNAL.test(arg)) {
      targets.push(arg);
    }
  }
  if (targets.length === 0) {
    return 'kill requires a process id';
  }
  for (const target of targets) {
    if (!/^\d+$/.test(target)) {
      return `kill target '${target}' must be a process id started by the agent`;
    }
    if (!ctx.ownedPids.has(Number(target))) {
      return `kill target ${target} was not started by the agent`;
    }
  }
  return undefined;
};

const checkNode: ArgumentCheck = (args) => {
  const flag = values(args).find((arg) => arg === '-e' || arg === '--eval' || arg === '-p' || arg === '--print');
  return flag ? `node ${flag} is not allowed` : undefined;
};

export const COMMAND_RULES: ReadonlyMap<string, CommandRule> = new Map<string, CommandRule>([
  // inspection
  ['ls', { risk: 'low' }],
  ['cat', { risk: 'low' }],
  ['head', { risk: 'low' }],
  ['tail', { risk: 'low' }],
  ['wc', { risk: 'low' }],
  ['grep', { risk: 'low' }],
  ['rg', { risk: 'low', check: (args) => (values(args).some((a) => a.startsWith('--pre')) ? 'rg --pre is not allowed' : undefined) }],
  ['find', { risk: 'low', check: checkFind }],
  ['tree', { risk: 'low' }],
  ['file', { risk: 'low' }],
  ['stat', { risk: 'low' }],
  ['du', { risk: 'low' }],
  ['df', { risk: 'low' }],
  ['pwd', { risk: 'low' }],
  ['echo', { risk: 'low' }],
  ['printf', { risk: 'low' }],
  ['sort', { risk: 'low' }],
  ['uniq', { risk: 'low' }],
  ['diff', { risk: 'low' }],
  ['which', { risk: 'low' }],
  ['date', { risk: 'low' }],
  ['sleep', { risk: 'low' }],
  ['true', { risk: 'low' }],
  ['false', { risk: 'low' }],
  ['jq', { risk: 'low' }],
  ['basename', { risk: 'low' }],
  ['dirname', { risk: 'low' }],
  ['realpath', { risk: 'low' }],
  ['ps', { risk: 'low' }],
  ['lsof', { risk: 'low' }],
  ['cd', { risk: 'low', check: checkCd }],
  // file changes inside the project
  ['mkdir', { risk: 'medium', check: checkWritePaths('mkdir') }],
  ['touch', { risk: 'medium', check: checkWritePaths('touch') }],
  ['cp', { risk: 'medium', check: checkWritePaths('cp') }],
  ['mv', { risk: 'medium', check: checkWritePaths('mv') }],
  ['tee', { risk: 'medium', check: checkWritePaths('tee') }],
  ['rm', { risk: 'high', check: checkRm }],
  ['chmod', { risk: 'high', check: checkChmod }],
  // development
  ['git', { risk: 'medium', check: checkGit }],
  ['npm', { risk: 'medium', check: checkPackageManager('npm') }],
  ['pnpm', { risk: 'medium', check: checkPackageManager('pnpm') }],
  ['yarn', { risk: 'medium', check: checkPackageManager('yarn') }],
  ['node', { risk: 'medium', check: checkNode }],
  ['init.sh', { risk: 'medium' }],
  // process control
  ['kill', { risk: 'high', check: checkKill }],
]);

/** System directories an executable may be named through by absolute path. */
export const SYSTEM_BIN_DIRS: readonly string[] = ['/bin', '/usr/bin', '/usr/local/bin'];

/** Executables that may only be run through a fixed relative path. */
export const PROJECT_SCRIPTS: ReadonlyMap<string, string> = new Map([['init.sh', './init.sh']]);

export const SANDBOX_BYPASS_FLAG =
  /^--?(?:dangerously[-_]?disable[-_]?sandbox|disable[-_]?sandbox|no[-_]?sandbox|bypass[-_]?sandbox|dangerously[-_]?skip[-_]?permissions)(?:=.*)?$/i;
