/**
 * Rigger Runtime Host — Filesystem Helpers
 *
 * Shared by NodeLocalHost (controller side) and LocalNode (target side).
 * Uses node:fs/promises for all I/O. Kernel code never imports node:fs; the
 * kernel reaches the filesystem only through the adapters built on these.
 *
 * Ownership is read with `stat -c '%a %U %G'` rather than fs.stat(), since
 * the kernel compares owner and group by name, not by numeric id.
 */

import { access, readFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { isAbsolute, resolve } from 'node:path';
import type { FileStat } from '@rigger/kernel';
import { spawnProcess } from './exec.js';

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

/**
 * Reject paths containing null bytes.
 *
 * Null bytes are never valid in filesystem paths and can truncate a path at
 * the OS boundary.
 */
export function assertSafePath(path: string): void {
  if (path.includes('\0')) {
    throw new Error(`Invalid path: null byte detected in path: ${JSON.stringify(path)}`);
  }
}

/** Resolve `path` against `cwd` (or the process cwd) unless it is absolute. */
export function resolveAgainst(cwd: string | undefined, path: string): string {
  assertSafePath(path);
  if (isAbsolute(path)) return path;
  return cwd !== undefined ? resolve(cwd, path) : resolve(path);
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return false;
    throw err;
  }
}

/** Parse `stat -c '%a %U %G'` output, e.g. "644 root adm". */
export function parseStatOutput(output: string): FileStat | undefined {
  const [mode, user, group] = output.trim().split(/\s+/);
  if (mode === undefined || user === undefined || group === undefined) return undefined;
  const permissions = Number.parseInt(mode, 8);
  if (Number.isNaN(permissions)) return undefined;
  return { permissions, user, group };
}

/** Owner, group and mode of `path`; `undefined` when it does not exist. */
export async function statPath(path: string): Promise<FileStat | undefined> {
  assertSafePath(path);
  const result = await spawnProcess('stat', ['-c', '%a %U %G', path]);
  if (result.exitCode !== 0) return undefined;
  return parseStatOutput(result.stdout);
}

/** Hex SHA-1 of the file content; `undefined` when the file does not exist. */
export async function sha1File(path: string): Promise<string | undefined> {
  assertSafePath(path);
  try {
    return createHash('sha1').update(await readFile(path)).digest('hex');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return undefined;
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'code' in err &&
    (err as NodeJS.ErrnoException).code === code
  );
}
