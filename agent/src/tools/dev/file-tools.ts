import fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import path from 'node:path';
import { execFile } from 'node:child_process';
import { StringDecoder } from 'node:string_decoder';
import { z } from 'zod';
import type { ToolContext, ToolDefinition } from '../types.js';
import { defineTool } from '../define-tool.js';
import { ToolError, errnoCode } from '../errors.js';
import { expandBraces, globWalk } from './glob-match.js';

const MAX_GLOB_RESULTS = 1000;
const RG_MAX_BUFFER = 16 * 1024 * 1024;

async function statTarget(target: string, notFound: string): Promise<Stats> {
  try {
    return await fs.stat(target);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new ToolError('NotFound', notFound);
    }
    throw err;
  }
}

async function readCapped(target: string, size: number, maxBytes: number): Promise<{ buffer: Buffer; truncated: boolean }> {
  if (size <= maxBytes) {
    return { buffer: await fs.readFile(target), truncated: false };
  }
  const handle = await fs.open(target, 'r');
  try {
    const buffer = Buffer.alloc(maxBytes);
    const { bytesRead } = await handle.read(buffer, 0, maxBytes, 0);
    return { buffer: buffer.subarray(0, bytesRead), truncated: true };
  } finally {
    await handle.close();
  }
}

function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

// read_file
const readFileSchema = z.object({
  path: z.string().describe('Relative path to the file (within the project directory)'),
  offset: z.number().int().min(0).optional().describe('Optional 0-based line number to start reading from'),
  limit: z.number().int().min(1).optional().describe('Optional number of lines to read starting at offset'),
});

export const readFileTool = defineTool({
  name: 'read_file',
  description:
    'Read the contents of a file. Supports optional offset/limit to page through very large files; paged output starts with a [lines a-b of n] header.',
  category: 'file',
  schema: readFileSchema,
  async handle({ path: requested, offset, limit }, ctx) {
    const target = await ctx.pathGuard.resolve(requested);
    const stat = await statTarget(target, `File not found: ${requested}`);
    if (!stat.isFile()) {
      throw new ToolError('InvalidArguments', `Not a file: ${requested}`);
    }

    const { buffer, truncated } = await readCapped(target, stat.size, ctx.limits.maxReadBytes);
    if (buffer.includes(0)) {
      throw new ToolError('InvalidArguments', `Cannot read binary file: ${requested}`);
    }
    // A decoder holds back a character the byte cap cut in half
    const content = truncated ? new StringDecoder('utf8').write(buffer) : buffer.toString('utf8');

    if (offset === undefined && limit === undefined) {
      return truncated
        ? `${content}\n[truncated: showing first ${Buffer.byteLength(content)} of ${stat.size} bytes]`
        : content;
    }

    const lines = splitLines(content);
    const total = lines.length;
    const start = offset ?? 0;
    if (total === 0) {
      if (start === 0) return '[lines 0-0 of 0] (file is empty)';
      throw new ToolError('InvalidArguments', 'Offset beyond end of file (file is empty)');
    }
    if (start >= total) {
      throw new ToolError('InvalidArguments', `Offset ${start} beyond end of file (total ${total} lines)`);
    }
    const end = limit === undefined ? total : Math.min(total, start + limit);
    return `[lines ${start + 1}-${end} of ${total}]\n${lines.slice(start, end).join('\n')}`;
  },
});

// write_file
const writeFileSchema = z.object({
  path: z.string().describe('Relative path to the file (within the project directory)'),
  content: z.string().describe('Complete file contents to write'),
});

export const writeFileTool = defineTool({
  name: 'write_file',
  description:
    'Create a new file or completely overwrite an existing file with the provided content. Parent directories are created as needed.',
  category: 'file',
  schema: writeFileSchema,
  async handle({ path: requested, content }, ctx) {
    const target = await ctx.pathGuard.resolve(requested);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf8');
    return `Successfully wrote ${Buffer.byteLength(content, 'utf8')} bytes to ${requested}`;
  },
});

// edit_file
const editFileSchema = z.object({
  path: z.string().describe('Relative path to the file'),
  old_string: z.string().min(1).describe('Exact text to replace (must match exactly, including whitespace)'),
  new_string: z.string().describe('Text to replace it with'),
  replace_all: z.boolean().default(false).describe('Replace every occurrence instead of exactly one'),
});

export const editFileTool = defineTool({
  name: 'edit_file',
  description:
    'Replace existing text within a file. The target string must exist and be unique unless replace_all is true. Use read_file first to see the exact content.',
  category: 'file',
  schema: editFileSchema,
  async handle({ path: requested, old_string: search, new_string: replacement, replace_all: replaceAll }, ctx) {
    const target = await ctx.pathGuard.resolve(requested);
    const stat = await statTarget(target, `File not found: ${requested}`);
    if (!stat.isFile()) {
      throw new ToolError('InvalidArguments', `Not a file: ${requested}`);
    }
    if (search === replacement) {
      throw new ToolError('NoOp', 'old_string and new_string are identical; nothing to change');
    }

    const content = await fs.readFile(target, 'utf8');
    const occurrences = content.split(search).length - 1;
    if (occurrences === 0) {
      const preview = search.length > 100 ? `${search.slice(0, 100)}...` : search;
      throw new ToolError('NotFound', `String not found in ${requested}: ${preview}`);
    }
    if (occurrences > 1 && !replaceAll) {
      throw new ToolError(
        'InvalidArguments',
        `Search string appears ${occurrences} times in ${requested}. Make it more specific or set replace_all.`
      );
    }

    // split/join keeps `$` sequences in the replacement literal
    const updated = replaceAll ? content.split(search).join(replacement) : content.replace(search, () => replacement);
    await fs.writeFile(target, updated, 'utf8');
    return `Replaced ${replaceAll ? occurrences : 1} occurrence(s) in ${requested}`;
  },
});

// glob_search
const globSearchSchema = z.object({
  pattern: z.string().min(1).describe('Glob pattern to match (e.g., "src/**/*.ts", "*.{json,yaml}")'),
  path: z.string().optional().describe('Directory to search from, relative to the project root'),
});

export const globSearchTool = defineTool({
  name: 'glob_search',
  description:
    'List files and directories matching a glob pattern. Returns paths relative to the project root, one per line.',
  category: 'file',
  schema: globSearchSchema,
  async handle({ pattern, path: requested }, ctx) {
    if (expandBraces(pattern).some((p) => path.isAbsolute(p) || p.split('/').includes('..'))) {
      throw new ToolError('InvalidArguments', `Glob pattern must be relative to the search directory: ${pattern}`);
    }
    const shown = requested ?? '.';
    const base = await ctx.pathGuard.resolve(shown);
    const stat = await statTarget(base, `Directory not found: ${shown}`);
    if (!stat.isDirectory()) {
      throw new ToolError('InvalidArguments', `Not a directory: ${shown}`);
    }

    const { matches, truncated } = await globWalk(pattern, {
      base,
      root: ctx.pathGuard.root,
      maxResults: MAX_GLOB_RESULTS,
    });
    if (matches.length === 0) {
      return 'No matches found';
    }
    const relative = [...new Set(matches.map((m) => ctx.pathGuard.relative(m)))].sort();
    if (truncated) {
      relative.push(`... (results truncated at ${MAX_GLOB_RESULTS})`);
    }
    return relative.join('\n');
  },
});

// grep_search
const grepSearchSchema = z.object({
  pattern: z.string().min(1).describe('Regular expression to search for (ripgrep syntax)'),
  path: z.string().optional().describe('File or directory to search, relative to the project root'),
  glob: z.string().optional().describe('Only search files matching this glob (e.g., "*.ts")'),
  type: z.string().optional().describe('Only search files of this ripgrep type (e.g., "ts", "py")'),
  output_mode: z
    .enum(['content', 'files_with_matches', 'count'])
    .default('files_with_matches')
    .describe('content shows matching lines, files_with_matches lists files, count gives counts per file'),
  '-A': z.number().int().min(0).optional().describe('Lines of context after each match'),
  '-B': z.number().int().min(0).optional().describe('Lines of context before each match'),
  '-C': z.number().int().min(0).optional().describe('Lines of context around each match'),
  '-n': z.boolean().optional().describe('Show line numbers in content mode (default: true)'),
  '-i': z.boolean().optional().describe('Case insensitive search'),
  head_limit: z.number().int().min(1).optional().describe('Return at most this many lines'),
  offset: z.number().int().min(0).optional().describe('Skip this many lines before head_limit applies'),
  multiline: z.boolean().default(false).describe('Allow patterns to span lines'),
});

type GrepArgs = z.infer<typeof grepSearchSchema>;

export function ripgrepArgs(args: GrepArgs, target: string): string[] {
  const argv = ['--color', 'never'];
  if (args.glob) argv.push('--glob', args.glob);
  if (args.type) argv.push('--type', args.type);
  if (args['-C'] !== undefined) {
    argv.push('-C', String(args['-C']));
  } else {
    if (args['-B'] !== undefined) argv.push('-B', String(args['-B']));
    if (args['-A'] !== undefined) argv.push('-A', String(args['-A']));
  }
  if (args.output_mode === 'files_with_matches') {
    argv.push('-l');
  } else if (args.output_mode === 'count') {
    argv.push('-c');
  } else if (args['-n'] ?? true) {
    argv.push('-n');
  }
  if (args['-i']) argv.push('-i');
  if (args.multiline) argv.push('-U', '--multiline-dotall');
  // `--` keeps a pattern starting with '-' from being read as a flag
  argv.push('--', args.pattern, target);
  return argv;
}

interface RipgrepOutput {
  code: number;
  stdout: string;
  stderr: string;
}

function runRipgrep(argv: string[], ctx: ToolContext): Promise<RipgrepOutput> {
  return new Promise((resolve, reject) => {
    execFile(
      'rg',
      argv,
      { cwd: ctx.projectRoot, env: ctx.shell.env, maxBuffer: RG_MAX_BUFFER, signal: ctx.signal },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ code: 0, stdout, stderr });
        } else if (typeof error.code === 'number') {
          resolve({ code: error.code, stdout, stderr });
        } else if (error.code === 'ENOENT') {
          reject(new ToolError('Unavailable', 'ripgrep (rg) is not installed'));
        } else {
          reject(error);
        }
      }
    );
  });
}

export const grepSearchTool = defineTool({
  name: 'grep_search',
  description:
    'Search file contents with ripgrep. Defaults to listing matching files; use output_mode "content" for matching lines. Supports context lines, globs, file types and paging with head_limit/offset.',
  category: 'file',
  schema: grepSearchSchema,
  async handle(args, ctx) {
    const target = await ctx.pathGuard.resolve(args.path ?? '.');
    const result = await runRipgrep(ripgrepArgs(args, ctx.pathGuard.relative(target)), ctx);

    const stdout = result.stdout.trim();
    const stderr = result.stderr.trim();
    if (result.code !== 0 && result.code !== 1) {
      throw new ToolError('ExecutionFailed', stderr || `rg failed with exit code ${result.code}`);
    }
    if (result.code === 1 && !stdout) {
      return 'No matches found';
    }

    const lines = stdout.split('\n');
    const start = args.offset ?? 0;
    if (start >= lines.length) {
      throw new ToolError('InvalidArguments', `Offset ${start} skips all output (${lines.length} lines)`);
    }
    const end = args.head_limit === undefined ? lines.length : start + args.head_limit;
    const page = lines.slice(start, end);
    if (end < lines.length) {
      page.push('... (results truncated)');
    }

    let output = page.join('\n');
    if (stderr) {
      output = `${output}\n[stderr]: ${stderr}`;
    }
    return output || '(no output)';
  },
});

export const fileTools: ToolDefinition[] = [
  readFileTool,
  writeFileTool,
  editFileTool,
  globSearchTool,
  grepSearchTool,
];
