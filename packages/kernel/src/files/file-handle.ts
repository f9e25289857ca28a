/**
 * Rigger Kernel — File Handles
 *
 * LocalFile names a file on the controlling machine, RemoteFile a file on
 * the target node. Both are bound to the context that created them, so every
 * node-side operation goes through the context primitives (and is therefore
 * logged, and mocked under a MockExecutionContext). Controller-side
 * operations go through the context's LocalHost.
 *
 * Content equality:
 *   local vs local   — byte comparison
 *   any other pair   — SHA-1 digest comparison (the remote side is hashed on
 *                      the node, so no download is needed)
 * A missing file never matches anything.
 */

import { createHash } from 'node:crypto';
import type { ExecutionContext } from '../context/execution-context.js';
import type { FileStat } from '../types/node.js';

export type FileHandle = LocalFile | RemoteFile;

export abstract class BaseFile {
  constructor(
    protected readonly context: ExecutionContext,
    readonly path: string,
  ) {}

  abstract exists(): Promise<boolean>;
  abstract hash(): Promise<string | undefined>;
  abstract stat(): Promise<FileStat | undefined>;
  abstract delete(): Promise<void>;

  async permissions(): Promise<number | undefined> {
    return (await this.stat())?.permissions;
  }

  async user(): Promise<string | undefined> {
    return (await this.stat())?.user;
  }

  async group(): Promise<string | undefined> {
    return (await this.stat())?.group;
  }

  async matches(other: FileHandle): Promise<boolean> {
    const mine = await this.hash();
    if (mine === undefined) return false;
    return mine === (await other.hash());
  }

  toString(): string {
    return this.path;
  }
}

// ---------------------------------------------------------------------------
// LocalFile
// ---------------------------------------------------------------------------

export class LocalFile extends BaseFile {
  readonly isLocal = true;

  exists(): Promise<boolean> {
    return this.context.host.exists(this.path);
  }

  async bytes(): Promise<Uint8Array> {
    return this.context.host.readFile(this.path);
  }

  async hash(): Promise<string | undefined> {
    if (!(await this.exists())) return undefined;
    return sha1(await this.bytes());
  }

  stat(): Promise<FileStat | undefined> {
    return this.context.host.stat(this.path);
  }

  async copyTo(target: FileHandle): Promise<void> {
    if (target instanceof RemoteFile) {
      await this.context.upload(this.path, target.path);
      return;
    }
    this.context.log(`COPY (local): ${this.path} => ${target.path}`);
    await this.context.host.copyFile(this.path, target.path);
  }

  async delete(): Promise<void> {
    this.context.log(`REMOVE (local): ${this.path}`);
    await this.context.host.remove(this.path);
  }

  override async matches(other: FileHandle): Promise<boolean> {
    if (!(other instanceof LocalFile)) {
      return super.matches(other);
    }
    if (!(await this.exists()) || !(await other.exists())) return false;
    return Buffer.from(await this.bytes()).equals(await other.bytes());
  }
}

// ---------------------------------------------------------------------------
// RemoteFile
// ---------------------------------------------------------------------------

export class RemoteFile extends BaseFile {
  readonly isLocal = false;

  async exists(): Promise<boolean> {
    return (await this.stat()) !== undefined;
  }

  hash(): Promise<string | undefined> {
    return this.context.checksum(this.path);
  }

  stat(): Promise<FileStat | undefined> {
    return this.context.stat(this.path);
  }

  copyTo(target: FileHandle): Promise<void> {
    if (target instanceof RemoteFile) {
      return this.context.copy(this.path, target.path);
    }
    return this.context.download(this.path, target.path);
  }

  delete(): Promise<void> {
    return this.context.remove(this.path);
  }

  setPermissions(mask: number): Promise<void> {
    return this.context.setPermissions(this.path, mask);
  }

  setOwner(user: string | undefined, group?: string): Promise<void> {
    return this.context.setOwner(this.path, user, group);
  }
}

function sha1(bytes: Uint8Array): string {
  return createHash('sha1').update(bytes).digest('hex');
}
