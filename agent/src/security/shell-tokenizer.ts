/**
 * Shell tokenizer and command-line splitter.
 *
 * Understands enough POSIX shell to find every command a line would run:
 * quoting, backslash escapes, control operators, subshells, redirections and
 * command substitution. Anything outside that subset is a ShellSyntaxError,
 * which callers treat as a denial.
 */

export type ControlOperator = '&&' | '||' | ';' | '|' | '|&' | '&' | '(' | ')' | '\n';

export interface WordToken {
  type: 'word';
  /** Text after quote removal; expansions are kept verbatim. */
  value: string;
  raw: string;
  quoted: boolean;
  /** Contains `$…`, `${…}`, `$(…)` or backticks. */
  expansions: boolean;
  /** Contains an unquoted glob or brace character. */
  glob: boolean;
  /** Source text of every `$(…)` and backtick substitution in the word. */
  substitutions: string[];
}

export interface OperatorToken {
  type: 'op';
  value: ControlOperator;
}

export interface RedirectToken {
  type: 'redirect';
  op: string;
  fd?: number;
  /** Target of a descriptor duplication such as `2>&1`. */
  dup?: string;
}

export type ShellToken = WordToken | OperatorToken | RedirectToken;

export interface Redirection {
  op: string;
  fd?: number;
  dup?: string;
  target?: WordToken;
}

export interface SimpleCommand {
  assignments: WordToken[];
  argv: WordToken[];
  redirects: Redirection[];
}

export interface ParsedCommandLine {
  commands: SimpleCommand[];
  /** Redirections from simple commands and subshell groups alike. */
  redirects: Redirection[];
}

export class ShellSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShellSyntaxError';
  }
}

const WORD_BREAKS = new Set([' ', '\t', '\n', ';', '&', '|', '(', ')', '<', '>']);
const GLOB_CHARS = new Set(['*', '?', '[', '{']);
const DOUBLE_QUOTE_ESCAPES = new Set(['$', '`', '"', '\\', '\n']);
const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*\+?=/;

interface WordBuilder {
  value: string;
  quoted: boolean;
  expansions: boolean;
  glob: boolean;
  substitutions: string[];
}

class Lexer {
  pos: number;

  constructor(private readonly input: string, start: number) {
    this.pos = start;
  }

  /**
   * Lex to the end of input, or (inside `$(…)`) to the unmatched `)`,
   * leaving `pos` just past it.
   */
  lex(inSubstitution: boolean): ShellToken[] {
    const tokens: ShellToken[] = [];
    const input = this.input;
    let depth = 0;

    while (this.pos < input.length) {
      const ch = input[this.pos];
      const next = input[this.pos + 1];

      if (ch === ' ' || ch === '\t') {
        this.pos++;
        continue;
      }
      if (ch === '\\' && next === '\n') {
        this.pos += 2;
        continue;
      }
      if (ch === '#') {
        while (this.pos < input.length && input[this.pos] !== '\n') this.pos++;
        continue;
      }
      if (ch === '\n' || ch === ';') {
        if (ch === ';' && next === ';') {
          throw new ShellSyntaxError("Unsupported operator ';;'");
        }
        tokens.push({ type: 'op', value: ch === ';' ? ';' : '\n' });
        this.pos++;
        continue;
      }
      if (ch === '&') {
        if (next === '&') {
          tokens.push({ type: 'op', value: '&&' });
          this.pos += 2;
        } else if (next === '>') {
          this.pos++;
          const both = this.redirect(undefined);
          tokens.push({ ...both, op: `&${both.op}` });
        } else {
          tokens.push({ type: 'op', value: '&' });
          this.pos++;
        }
        continue;
      }
      if (ch === '|') {
        const value: ControlOperator = next === '|' ? '||' : next === '&' ? '|&' : '|';
        tokens.push({ type: 'op', value });
        this.pos += value.length;
        continue;
      }
      if (ch === '(') {
        depth++;
        tokens.push({ type: 'op', value: '(' });
        this.pos++;
        continue;
      }
      if (ch === ')') {
        this.pos++;
        if (inSubstitution && depth === 0) {
          return tokens;
        }
        depth--;
        tokens.push({ type: 'op', value: ')' });
        continue;
      }
      if (ch === '<' || ch === '>') {
        tokens.push(this.redirect(undefined));
        continue;
      }

      const fd = /^(\d+)[<>]/.exec(input.slice(this.pos));
      if (fd) {
        this.pos += fd[1].length;
        tokens.push(this.redirect(Number(fd[1])));
        continue;
      }

      tokens.push(this.word());
    }

    if (inSubstitution) {
      throw new ShellSyntaxError('Unterminated command substitution');
    }
    return tokens;
  }

  private redirect(fd: number | undefined): RedirectToken {
    const rest = this.input.slice(this.pos);
    if (rest.startsWith('<<')) {
      throw new ShellSyntaxError('Heredocs and here-strings are not allowed');
    }
    if (rest.startsWith('<(') || rest.startsWith('>(')) {
      throw new ShellSyntaxError('Process substitution is not allowed');
    }
    const match = /^(>>|>\||>&|<&|<>|>|<)/.exec(rest);
    if (!match) {
      throw new ShellSyntaxError(`Unexpected redirection near '${rest.slice(0, 10)}'`);
    }
    const op = match[1];
    this.pos += op.length;

    if (op === '>&' || op === '<&') {
      const dup = /^(\d+|-)/.exec(this.input.slice(this.pos));
      if (dup) {
        this.pos += dup[1].length;
        return { type: 'redirect', op, dup: dup[1], ...(fd !== undefined && { fd }) };
      }
      if (op === '>&' && fd === undefined) {
        // `>&file` sends both streams to file
        return { type: 'redirect', op: '&>' };
      }
      throw new ShellSyntaxError(`Invalid descriptor duplication '${op}'`);
    }
    return { type: 'redirect', op, ...(fd !== undefined && { fd }) };
  }

  private word(): WordToken {
    const input = this.input;
    const start = this.pos;
    const word: WordBuilder = { value: '', quoted: false, expansions: false, glob: false, substitutions: [] };

    while (this.pos < input.length) {
      const ch = input[this.pos];
      if (WORD_BREAKS.has(ch)) break;

      if (ch === '\\') {
        const escaped = input[this.pos + 1];
        if (escaped === undefined) {
          throw new ShellSyntaxError('Trailing backslash');
        }
        this.pos += 2;
        if (escaped !== '\n') {
          word.value += escaped;
          word.quoted = true;
        }
        continue;
      }
      if (ch === "'") {
        const close = input.indexOf("'", this.pos + 1);
        if (close < 0) {
          throw new ShellSyntaxError('Unterminated single quote');
        }
        word.value += input.slice(this.pos + 1, close);
        word.quoted = true;
        this.pos = close + 1;
        continue;
      }
      if (ch === '"') {
        this.pos++;
        word.quoted = true;
        this.doubleQuoted(word);
        continue;
      }
      if (ch === '$') {
        this.dollar(word, false);
        continue;
      }
      if (ch === '`') {
        this.backtick(word);
        continue;
      }

      if (GLOB_CHARS.has(ch)) word.glob = true;
      word.value += ch;
      this.pos++;
    }

    return {
      type: 'word',
      value: word.value,
      raw: input.slice(start, this.pos),
      quoted: word.quoted,
      expansions: word.expansions,
      glob: word.glob,
      substitutions: word.substitutions,
    };
  }

  private doubleQuoted(word: WordBuilder): void {
    const input = this.input;
    while (this.pos < input.length) {
      const ch = input[this.pos];
      if (ch === '"') {
        this.pos++;
        return;
      }
      if (ch === '\\') {
        const escaped = input[this.pos + 1];
        if (escaped !== undefined && DOUBLE_QUOTE_ESCAPES.has(escaped)) {
          if (escaped !== '\n') word.value += escaped;
          this.pos += 2;
          continue;
        }
        word.value += ch;
        this.pos++;
        continue;
      }
      if (ch === '$') {
        this.dollar(word, true);
        continue;
      }
      if (ch === '`') {
        this.backtick(word);
        continue;
      }
      word.value += ch;
      this.pos++;
    }
    throw new ShellSyntaxError('Unterminated double quote');
  }

  private dollar(word: WordBuilder, inDoubleQuotes: boolean): void {
    const input = this.input;
    const start = this.pos;
    const next = input[this.pos + 1];

    if (next === '(') {
      const sub = new Lexer(input, this.pos + 2);
      sub.lex(true);
      word.substitutions.push(input.slice(this.pos + 2, sub.pos - 1));
      this.pos = sub.pos;
    } else if (next === '{') {
      const close = input.indexOf('}', this.pos + 2);
      if (close < 0) {
        throw new ShellSyntaxError('Unterminated parameter expansion');
      }
      const body = input.slice(this.pos + 2, close);
      if (body.includes('$(') || body.includes('`')) {
        throw new ShellSyntaxError('Command substitution inside parameter expansion is not allowed');
      }
      this.pos = close + 1;
    } else if (next === "'" && !inDoubleQuotes) {
      // ANSI-C quoting; the decoded text is never trusted
      let i = this.pos + 2;
      while (i < input.length && input[i] !== "'") {
        i += input[i] === '\\' ? 2 : 1;
      }
      if (i >= input.length) {
        throw new ShellSyntaxError('Unterminated single quote');
      }
      this.pos = i + 1;
    } else if (next !== undefined && /[A-Za-z0-9_@*#?$!-]/.test(next)) {
      const name = /^[A-Za-z_][A-Za-z0-9_]*/.exec(input.slice(this.pos + 1));
      this.pos += 1 + (name ? name[0].length : 1);
    } else {
      word.value += '$';
      this.pos++;
      return;
    }

    word.expansions = true;
    word.value += input.slice(start, this.pos);
  }

  private backtick(word: WordBuilder): void {
    const input = this.input;
    const start = this.pos;
    let inner = '';
    let i = this.pos + 1;
    while (i < input.length && input[i] !== '`') {
      if (input[i] === '\\' && i + 1 < input.length) {
        const escaped = input[i + 1];
        inner += escaped === '`' || escaped === '\\' || escaped === '$' ? escaped : `\\${escaped}`;
        i += 2;
        continue;
      }
      inner += input[i];
      i++;
    }
    if (i >= input.length) {
      throw new ShellSyntaxError('Unterminated backtick substitution');
    }
    this.pos = i + 1;
    word.substitutions.push(inner);
    word.expansions = true;
    word.value += input.slice(start, this.pos);
  }
}

export function tokenize(input: string): ShellToken[] {
  return new Lexer(input, 0).lex(false);
}

export function isAssignment(word: WordToken): boolean {
  const match = ASSIGNMENT.exec(word.raw);
  return match !== null && !match[0].includes('"') && !match[0].includes("'");
}

/**
 * Split a command line into the simple commands it runs, flattening
 * pipelines, `&&`/`||`/`;` lists and `( … )` subshells.
 *
 * @throws {ShellSyntaxError} on malformed input, background `&`, or an empty command
 */
export function parseCommandLine(input: string): ParsedCommandLine {
  const tokens = tokenize(input);
  const parser = new Parser(tokens);
  const parsed = parser.list(false);
  if (parsed.commands.length === 0) {
    throw new ShellSyntaxError('Empty command');
  }
  return parsed;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: ShellToken[]) {}

  list(inGroup: boolean): ParsedCommandLine {
    const commands: SimpleCommand[] = [];
    const redirects: Redirection[] = [];
    let expectCommand = true;
    let lastSeparator: ControlOperator | undefined;

    while (this.index < this.tokens.length) {
      const token = this.tokens[this.index];

      if (token.type === 'op') {
        if (token.value === ')') {
          if (!inGroup) throw new ShellSyntaxError("Unbalanced ')'");
          break;
        }
        if (token.value === '(') {
          if (!expectCommand) throw new ShellSyntaxError("Unexpected '('");
          this.index++;
          const group = this.list(true);
          const close = this.tokens[this.index];
          if (close === undefined || close.type !== 'op' || close.value !== ')') {
            throw new ShellSyntaxError("Unbalanced '('");
          }
          if (group.commands.length === 0) {
            throw new ShellSyntaxError('Empty subshell');
          }
          this.index++;
          commands.push(...group.commands);
          redirects.push(...group.redirects, ...this.trailingRedirects());
          expectCommand = false;
          continue;
        }
        if (token.value === '&') {
          throw new ShellSyntaxError("Background execution with '&' is not allowed; use run_in_background");
        }
        if (token.value === '\n' && expectCommand) {
          this.index++;
          continue;
        }
        if (expectCommand) {
          throw new ShellSyntaxError(`Unexpected '${token.value}'`);
        }
        lastSeparator = token.value;
        expectCommand = true;
        this.index++;
        continue;
      }

      if (!expectCommand) {
        throw new ShellSyntaxError(`Unexpected token after ')'`);
      }
      const command = this.simpleCommand();
      commands.push(command);
      redirects.push(...command.redirects);
      expectCommand = false;
    }

    if (
      expectCommand &&
      (lastSeparator === '&&' || lastSeparator === '||' || lastSeparator === '|' || lastSeparator === '|&')
    ) {
      throw new ShellSyntaxError(`Command line ends with '${lastSeparator}'`);
    }
    return { commands, redirects };
  }

  private simpleCommand(): SimpleCommand {
    const command: SimpleCommand = { assignments: [], argv: [], redirects: [] };

    while (this.index < this.tokens.length) {
      const token = this.tokens[this.index];
      if (token.type === 'op') break;
      this.index++;

      if (token.type === 'redirect') {
        command.redirects.push(this.redirection(token));
      } else if (command.argv.length === 0 && isAssignment(token)) {
        command.assignments.push(token);
      } else {
        command.argv.push(token);
      }
    }

    if (command.argv.length === 0) {
      throw new ShellSyntaxError('Missing command name');
    }
    return command;
  }

  private trailingRedirects(): Redirection[] {
    const redirects: Redirection[] = [];
    let token = this.tokens[this.index];
    while (token !== undefined && token.type === 'redirect') {
      this.index++;
      redirects.push(this.redirection(token));
      token = this.tokens[this.index];
    }
    return redirects;
  }

  private redirection(token: RedirectToken): Redirection {
    const base: Redirection = {
      op: token.op,
      ...(token.fd !== undefined && { fd: token.fd }),
    };
    if (token.dup !== undefined) {
      return { ...base, dup: token.dup };
    }
    const target = this.tokens[this.index];
    if (target === undefined || target.type !== 'word') {
      throw new ShellSyntaxError(`Missing target for '${token.op}'`);
    }
    this.index++;
    return { ...base, target };
  }
}
