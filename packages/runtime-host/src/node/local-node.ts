/**
 * Rigger Runtime Host — Local Target Node
 *
 * A TargetNode for the machine the CLI itself runs on. It lets packages be
 * applied, validated and reverted without a remote transport, and it is the
 * reference for what a transport has to provide.
 *
 * Commands:
 *   run(cmd)   sh -c cmd                      (as the process user)
 *              sudo -n -u <user> sh -c cmd    (after forUser(<user>))
 *   sudo(cmd)  sudo -n sh -c cmd
 *
 * `sudo -n` never prompts: a sudo that needs a password fails with a
 * CommandFailedError instead of hanging the run.
 *
 * File operations use node:fs as the process user. After forUser(<user>)
 * they become commands run through `sudo -n -u <user>` as well, so files
 * are created and changed by the account the action runs as. download()
 * stays with the process user: its target is on the controller side.
 *
 * Relative paths (the kernel's upload temp names, for instance) resolve
 * against the helper's working directory, which is also the cwd of every
 * spawned command, so `mv rigger-tmp-… /etc/x` finds what upload() wrote.
 */

import { chmod, copyFile, cp, mkdir, rename, rm } from 'node:fs/promises';
import { userInfo } from 'node:os';
import { dirname } from 'node:path';
import { formatMode, ownerSpec, shellQuote } from '@rigger/kernel';
import type {
  CommandResult,
  ConfigInput,
  FileStat,
  LogSink,
  NodeHelper,
  RunOptions,
  TargetNode,
} from '@rigger/kernel';
import { spawnProcess, spawnShell } from '../adapters/exec.js';
import { resolveAgainst, sha1File, statPath } from '../adapters/fs.js';
import { CommandFailedError } from '../errors.js';

export interface LocalNodeOptions {
  /** Display name. Defaults to "localhost". */
  readonly name?: string | undefined;
  /** Account commands run as. Defaults to the process user. */
  readonly user?: string | undefined;
  readonly config?: ConfigInput | undefined;
  /** Initial working directory. Defaults to the process cwd. */
  readonly cwd?: string | undefined;
}

export class LocalNodeHelper implements NodeHelper {
  constructor(public cwd: string | undefined) {}

  setCwd(path: string | undefined): string | undefined {
    const previous = this.cwd;
    this.cwd = path;
    return previous;
  }
}

export class LocalNode implements TargetNode {
  readonly name: string;
  readonly user: string;
  readonly config: ConfigInput;
  readonly helper: LocalNodeHelper;
  private readonly processUser: string;
  private sink: LogSink | undefined;

  constructor(private readonly options: LocalNodeOptions = {}) {
    this.processUser = userInfo().username;
    this.name = options.name ?? 'localhost';
    this.user = options.user ?? this.processUser;
    this.config = options.config ?? {};
    this.helper = new LocalNodeHelper(options.cwd);
  }

  /** True when commands have to go through `sudo -u` to run as `user`. */
  get impersonating(): boolean {
    return this.user !== this.processUser;
  }

  logTo(sink: LogSink): void {
    this.sink = sink;
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  run(command: string, options?: RunOptions): Promise<string> {
    return this.impersonating
      ? this.execute(command, ['sudo', '-n', '-u', this.user, 'sh', '-c', command], options)
      : this.execute(command, ['sh', '-c', command], options);
  }

  sudo(command: string, options?: RunOptions): Promise<string> {
    return this.execute(command, ['sudo', '-n', 'sh', '-c', command], options);
  }

  /**
   * @throws {CommandFailedError} on a non-zero exit status
   */
  private async execute(
    command: string,
    argv: ReadonlyArray<string>,
    options: RunOptions | undefined,
  ): Promise<string> {
    const [program, ...args] = argv;
    if (program === undefined) {
      throw new Error('LocalNode: empty command vector');
    }
    const result: CommandResult = await spawnProcess(program, args, {
      cwd: this.helper.cwd,
      env: options?.env,
      timeoutMs: options?.timeoutMs,
    });
    if (result.exitCode !== 0) {
      throw new CommandFailedError(command, result.exitCode, result.stdout, result.stderr);
    }
    if (result.stderr !== '') {
      this.sink?.stderr(result.stderr);
    }
    return result.stdout;
  }

  // -------------------------------------------------------------------------
  // Files
  // -------------------------------------------------------------------------

  private path(path: string): string {
    return resolveAgainst(this.helper.cwd, path);
  }

  /** Controller and node are the same machine: a copy from the process cwd. */
  async upload(from: string, to: string): Promise<void> {
    const source = resolveAgainst(undefined, from);
    const target = this.path(to);
    if (this.impersonating) {
      await this.run(`mkdir -p ${shellQuote(dirname(target))} && cp ${shellQuote(source)} ${shellQuote(target)}`);
      return;
    }
    await mkdir(dirname(target), { recursive: true });
    await copyFile(source, target);
  }

  async download(from: string, to: string): Promise<void> {
    const target = resolveAgainst(undefined, to);
    await mkdir(dirname(target), { recursive: true });
    await copyFile(this.path(from), target);
  }

  async mkdir(path: string): Promise<void> {
    if (this.impersonating) {
      await this.run(`mkdir -p ${shellQuote(this.path(path))}`);
      return;
    }
    await mkdir(this.path(path), { recursive: true });
  }

  async delete(path: string): Promise<void> {
    if (this.impersonating) {
      await this.run(`rm -rf ${shellQuote(this.path(path))}`);
      return;
    }
    await rm(this.path(path), { recursive: true, force: true });
  }

  async copy(from: string, to: string): Promise<void> {
    if (this.impersonating) {
      await this.run(`cp -R ${shellQuote(this.path(from))} ${shellQuote(this.path(to))}`);
      return;
    }
    await cp(this.path(from), this.path(to), { recursive: true });
  }

  async move(from: string, to: string): Promise<void> {
    if (this.impersonating) {
      await this.run(`mv ${shellQuote(this.path(from))} ${shellQuote(this.path(to))}`);
      return;
    }
    await rename(this.path(from), this.path(to));
  }

  async setPermissions(path: string, mask: number): Promise<void> {
    if (this.impersonating) {
      await this.run(`chmod ${formatMode(mask)} ${shellQuote(this.path(path))}`);
      return;
    }
    await chmod(this.path(path), mask);
  }

  /**
   * chown for a user (optionally with group), chgrp for a group alone.
   * Runs elevated, since handing a file to another account needs root.
   */
  async setOwner(path: string, user: string | undefined, group?: string): Promise<void> {
    const target = shellQuote(this.path(path));
    if (user !== undefined) {
      await this.sudo(`chown ${shellQuote(ownerSpec(user, group))} ${target}`);
    } else if (group !== undefined) {
      await this.sudo(`chgrp ${shellQuote(group)} ${target}`);
    } else {
      throw new Error(`LocalNode.setOwner(${path}): a user or a group is required.`);
    }
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  async env(name: string): Promise<string | undefined> {
    if (!this.impersonating) {
      return process.env[name];
    }
    const result = await spawnProcess('sudo', ['-n', '-u', this.user, 'printenv', name]);
    return result.exitCode === 0 ? result.stdout.replace(/\n$/, '') : undefined;
  }

  async binaryExists(name: string): Promise<boolean> {
    const result = await spawnShell(`command -v ${shellQuote(name)}`, { cwd: this.helper.cwd });
    return result.exitCode === 0;
  }

  async stat(path: string): Promise<FileStat | undefined> {
    return statPath(this.path(path));
  }

  async checksum(path: string): Promise<string | undefined> {
    return sha1File(this.path(path));
  }

  forUser(user: string): LocalNode {
    return new LocalNode({ ...this.options, user, cwd: this.helper.cwd });
  }
}
