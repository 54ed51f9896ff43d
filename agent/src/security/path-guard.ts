/**
 * PathGuard: confines file-system paths to a project root.
 *
 * Validation:
 * 1. Resolve the input against the root (absolute inputs stay absolute)
 * 2. Canonicalize with fs.realpath(); for paths that don't exist yet, the
 *    nearest existing ancestor is canonicalized and the rest re-appended,
 *    following dangling symlinks along the way
 * 3. Require the canonical path to be the root or live under `root + sep`
 *
 * ```typescript
 * const guard = new PathGuard('/workspace');
 * await guard.resolve('src/index.ts');     // ✓ /workspace/src/index.ts
 * await guard.resolve('../etc/passwd');    // ✗ PathEscapeError
 * await guard.resolve('evil-link');        // ✗ if the link points outside
 * ```
 */

import fs from 'node:fs';
import path from 'node:path';
import { PathEscapeError, ToolError, errnoCode } from '../tools/errors.js';

const MAX_SYMLINK_HOPS = 40;

export function hasPathPrefix(target: string, root: string): boolean {
  const normalizedRoot = root.endsWith(path.sep) ? root : `${root}${path.sep}`;
  return target === root || target.startsWith(normalizedRoot);
}

export class PathGuard {
  readonly root: string;

  constructor(projectRoot: string) {
    // macOS maps /tmp to /private/tmp; compare against the canonical root
    try {
      this.root = fs.realpathSync(path.resolve(projectRoot));
    } catch {
      this.root = path.resolve(projectRoot);
    }
  }

  /**
   * @returns the canonical absolute path
   * @throws {PathEscapeError} if the path resolves outside the root
   * @throws {ToolError} `InvalidArguments` for empty or NUL-containing input
   */
  async resolve(rawPath: string): Promise<string> {
    if (typeof rawPath !== 'string' || rawPath.length === 0) {
      throw new ToolError('InvalidArguments', 'Path must be a non-empty string');
    }
    const trimmed = rawPath.trim();
    if (trimmed === '') {
      throw new ToolError('InvalidArguments', 'Path cannot be empty or whitespace');
    }
    if (trimmed.includes('\0')) {
      throw new ToolError('InvalidArguments', 'Path contains a NUL byte');
    }

    const resolved = path.resolve(this.root, trimmed);
    let canonical: string;
    try {
      canonical = await canonicalize(resolved, 0);
    } catch (err) {
      if (errnoCode(err) === 'ELOOP') {
        throw new ToolError('SecurityDenied', `Path cannot be resolved: ${trimmed} (symlink loop)`);
      }
      throw err;
    }

    if (!hasPathPrefix(canonical, this.root)) {
      throw new PathEscapeError(trimmed, canonical === resolved ? undefined : canonical);
    }
    return canonical;
  }

  /** Root-relative form of a canonical path, for display. */
  relative(canonical: string): string {
    return path.relative(this.root, canonical) || '.';
  }
}

export async function resolveWithinRoot(rawPath: string, projectRoot: string): Promise<string> {
  return new PathGuard(projectRoot).resolve(rawPath);
}

async function canonicalize(absPath: string, hops: number): Promise<string> {
  try {
    return await fs.promises.realpath(absPath);
  } catch (err) {
    const code = errnoCode(err);
    if (code !== 'ENOENT' && code !== 'ENOTDIR') {
      throw err;
    }
  }

  const parent = path.dirname(absPath);
  if (parent === absPath) {
    return absPath;
  }
  const candidate = path.join(await canonicalize(parent, hops), path.basename(absPath));

  // A dangling symlink: writing through it would land on its target
  const stat = await fs.promises.lstat(candidate).catch(() => undefined);
  if (stat?.isSymbolicLink()) {
    if (hops >= MAX_SYMLINK_HOPS) {
      throw Object.assign(new Error(`Too many symlinks: ${absPath}`), { code: 'ELOOP' });
    }
    const target = await fs.promises.readlink(candidate);
    return canonicalize(path.resolve(path.dirname(candidate), target), hops + 1);
  }
  return candidate;
}
