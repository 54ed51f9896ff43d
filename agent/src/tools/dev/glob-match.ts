import fs from 'node:fs/promises';
import path from 'node:path';
import { hasPathPrefix } from '../../security/path-guard.js';
import { ToolError } from '../errors.js';

const MAX_BRACE_EXPANSIONS = 256;

const REGEX_SPECIALS = /[.+^${}()|\\]/;

function translateSegment(segment: string): string {
  let out = segment.startsWith('.') ? '' : '(?!\\.)';
  for (let i = 0; i < segment.length; i++) {
    const ch = segment[i];
    if (ch === '*') {
      out += '[^/]*';
    } else if (ch === '?') {
      out += '[^/]';
    } else if (ch === '[') {
      const close = segment.indexOf(']', i + 2);
      if (close === -1) {
        out += '\\[';
        continue;
      }
      let body = segment.slice(i + 1, close).replace(/\\/g, '\\\\');
      if (body.startsWith('!')) body = `^${body.slice(1)}`;
      out += `[${body}]`;
      i = close;
    } else if (REGEX_SPECIALS.test(ch)) {
      out += `\\${ch}`;
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Expand `{a,b}` alternatives (nested ones too) into plain patterns. A brace
 * with no matching close or no top-level comma stays literal.
 */
export function expandBraces(pattern: string): string[] {
  const expanded = expandOnce(pattern);
  if (expanded === undefined) return [pattern];
  const results: string[] = [];
  for (const alternative of expanded) {
    for (const result of expandBraces(alternative)) {
      if (results.length >= MAX_BRACE_EXPANSIONS) {
        throw new ToolError('InvalidArguments', `Glob pattern expands to more than ${MAX_BRACE_EXPANSIONS} alternatives`);
      }
      results.push(result);
    }
  }
  return results;
}

function expandOnce(pattern: string): string[] | undefined {
  for (let open = pattern.indexOf('{'); open !== -1; open = pattern.indexOf('{', open + 1)) {
    const alternatives: string[] = [];
    let depth = 0;
    let start = open + 1;
    for (let i = open + 1; i < pattern.length; i++) {
      const ch = pattern[i];
      if (ch === '{') {
        depth++;
      } else if (ch === '}' && depth > 0) {
        depth--;
      } else if (ch === ',' && depth === 0) {
        alternatives.push(pattern.slice(start, i));
        start = i + 1;
      } else if (ch === '}') {
        if (alternatives.length === 0) break;
        alternatives.push(pattern.slice(start, i));
        const prefix = pattern.slice(0, open);
        const suffix = pattern.slice(i + 1);
        return alternatives.map((alternative) => `${prefix}${alternative}${suffix}`);
      }
    }
  }
  return undefined;
}

function patternSource(pattern: string): string {
  const segments = pattern.split('/').filter((s) => s.length > 0);
  let source = '';
  segments.forEach((segment, index) => {
    const last = index === segments.length - 1;
    if (segment === '**') {
      source += last ? '(?:(?!\\.)[^/]+(?:/(?!\\.)[^/]+)*)?' : '(?:(?!\\.)[^/]+/)*';
    } else {
      source += translateSegment(segment) + (last ? '' : '/');
    }
  });
  return source;
}

/**
 * Compile a glob into a regular expression over `/`-separated relative paths.
 * `*` and `?` stay within one segment, `**` spans segments, `{a,b}` matches
 * either alternative, and wildcards do not match a leading dot.
 *
 * @throws {ToolError} `InvalidArguments` when braces expand too far.
 */
export function globToRegExp(pattern: string): RegExp {
  return new RegExp(`^(?:${expandBraces(pattern).map(patternSource).join('|')})$`);
}

export interface GlobWalkOptions {
  /** Directory the pattern is relative to. */
  base: string;
  /** Entries resolving outside this directory are skipped. */
  root: string;
  maxResults: number;
}

/**
 * Walk `base` and return the absolute paths matching `pattern`. Symlinks are
 * reported only when their target stays under `root`, and are never descended.
 */
export async function globWalk(pattern: string, options: GlobWalkOptions): Promise<{ matches: string[]; truncated: boolean }> {
  const regex = globToRegExp(pattern);
  const maxDepth = Math.max(
    ...expandBraces(pattern).map((alternative) => {
      const segments = alternative.split('/').filter((s) => s.length > 0);
      return segments.includes('**') ? Infinity : segments.length;
    })
  );
  const matches: string[] = [];
  let truncated = false;

  const visit = async (dir: string, rel: string, depth: number): Promise<void> => {
    if (depth > maxDepth || truncated) return;
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const abs = path.join(dir, entry.name);
      const entryRel = rel ? `${rel}/${entry.name}` : entry.name;

      if (entry.isSymbolicLink()) {
        const target = await fs.realpath(abs).catch(() => undefined);
        if (target === undefined || !hasPathPrefix(target, options.root)) continue;
      }

      if (regex.test(entryRel)) {
        if (matches.length >= options.maxResults) {
          truncated = true;
          return;
        }
        matches.push(abs);
      }
      if (entry.isDirectory()) {
        await visit(abs, entryRel, depth + 1);
      }
    }
  };

  await visit(options.base, '', 1);
  return { matches, truncated };
}
