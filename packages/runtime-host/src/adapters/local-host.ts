/**
 * Rigger Runtime Host — Controller-side LocalHost
 *
 * Implements the LocalHost interface from @rigger/kernel for the machine the
 * CLI runs on. Payload files are read from here, rendered templates are
 * written to a temp directory here, and diagnostic commands (runLocal) run
 * here through `sh -c`.
 */

import { copyFile, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import type { CommandResult, FileStat, LocalHost } from '@rigger/kernel';
import { spawnShell } from './exec.js';
import { assertSafePath, pathExists, statPath } from './fs.js';

export interface NodeLocalHostOptions {
  /** Directory for rendered templates. Defaults to os.tmpdir(). */
  readonly tempDir?: string | undefined;
  /** Working directory for exec(). Defaults to the process cwd. */
  readonly cwd?: string | undefined;
}

export class NodeLocalHost implements LocalHost {
  private readonly tempDir: string;
  private readonly cwd: string | undefined;

  constructor(options: NodeLocalHostOptions = {}) {
    this.tempDir = options.tempDir ?? tmpdir();
    this.cwd = options.cwd;
  }

  exec(command: string): Promise<CommandResult> {
    return spawnShell(command, { cwd: this.cwd });
  }

  async readFile(path: string): Promise<Uint8Array> {
    assertSafePath(path);
    const buffer = await readFile(path);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  async exists(path: string): Promise<boolean> {
    assertSafePath(path);
    return pathExists(path);
  }

  async stat(path: string): Promise<FileStat | undefined> {
    return statPath(path);
  }

  /**
   * Write into the temp directory. `name` is taken as a bare file name; any
   * directory part is dropped so a caller cannot write outside the temp dir.
   */
  async writeTempFile(name: string, content: Uint8Array): Promise<string> {
    assertSafePath(name);
    await mkdir(this.tempDir, { recursive: true });
    const path = join(this.tempDir, basename(name));
    await writeFile(path, content);
    return path;
  }

  async copyFile(from: string, to: string): Promise<void> {
    assertSafePath(from);
    assertSafePath(to);
    await mkdir(dirname(to), { recursive: true });
    await copyFile(from, to);
  }

  async remove(path: string): Promise<void> {
    assertSafePath(path);
    await rm(path, { force: true });
  }
}
